/**
 * FileObserver — structured JSONL file logging with rotation.
 *
 * Each event is serialised as a single JSON line (JSONL) and appended to the
 * configured log file. When the file exceeds `maxBytes` it is rotated: the
 * current file is renamed with a `.1` suffix (overwriting any previous
 * rotation) and a fresh file is opened.
 *
 * Default path : ~/.switchboard/logs/switchboard.jsonl
 * Default limit: 10 MB
 */

import { writeFileSync, appendFileSync, renameSync, statSync, mkdirSync, existsSync, chmodSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';

import type {
  ChannelMessageEvent,
  ExecutionMeta,
  ExecutionStats,
  IObserver,
  ModelCallEvent,
  SecurityEvent,
  ToolConfig,
  ToolInvocationEvent,
} from '@switchboard/core';
import { toError } from '@switchboard/core';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return resolve(homedir(), p.slice(2));
  }
  return resolve(p);
}

function serializeError(err: Error): Record<string, unknown> {
  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
  };
}

// ---------------------------------------------------------------------------
// FileObserver
// ---------------------------------------------------------------------------

export interface FileObserverOptions {
  /** Absolute or ~-relative path to the JSONL log file. */
  filePath?: string;
  /** Max file size in bytes before rotation (default 10 MB). */
  maxBytes?: number;
}

export class FileObserver implements IObserver {
  private readonly filePath: string;
  private readonly maxBytes: number;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private flushing = false;
  private writeFailed = false;

  constructor(opts: FileObserverOptions = {}) {
    this.filePath = expandHome(opts.filePath ?? '~/.switchboard/logs/switchboard.jsonl');
    this.maxBytes = opts.maxBytes ?? 10 * 1024 * 1024; // 10 MB
    this.ensureDir();
  }

  // ---- internal -----------------------------------------------------------

  private ensureDir(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  private write(type: string, data: Record<string, unknown>): void {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      type,
      ...data,
    });
    this.buffer.push(line);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer !== null) return;
    this.flushTimer = setTimeout(() => {
      this.flushSync();
      this.flushTimer = null;
    }, 100);
  }

  private flushSync(): void {
    if (this.buffer.length === 0 || this.flushing) return;
    this.flushing = true;

    const payload = this.buffer.join('\n') + '\n';
    this.buffer = [];

    try {
      this.rotateIfNeeded();
      appendFileSync(this.filePath, payload, { encoding: 'utf-8', mode: 0o600 });
      chmodSync(this.filePath, 0o600);
    } catch (err) {
      // Logging must never crash the host; report once on stderr and drop the batch.
      if (!this.writeFailed) {
        this.writeFailed = true;
        console.error(`[switchboard] cannot write log file ${this.filePath}: ${toError(err).message}`);
      }
    } finally {
      this.flushing = false;
    }
  }

  private rotateIfNeeded(): void {
    // Nothing to rotate before the first write.
    if (!existsSync(this.filePath)) return;
    if (statSync(this.filePath).size < this.maxBytes) return;

    const rotatedPath = this.filePath + '.1';
    renameSync(this.filePath, rotatedPath);
    writeFileSync(this.filePath, '', { encoding: 'utf-8', mode: 0o600 });
  }

  // ---- IObserver ----------------------------------------------------------

  onExecutionStart(meta: ExecutionMeta): void {
    this.write('execution_start', {
      executionId: meta.executionId,
      channelType: meta.channelType,
      channelId: meta.channelId,
      userId: meta.userId,
      startedAt: meta.startedAt.toISOString(),
    });
  }

  onExecutionEnd(meta: ExecutionMeta, stats: ExecutionStats): void {
    this.write('execution_end', {
      executionId: meta.executionId,
      status: stats.status,
      duration: stats.duration,
      iterations: stats.iterations,
      toolsUsed: stats.toolsUsed,
      tokensUsed: stats.tokensUsed,
    });
  }

  onPermissionsResolved(meta: { channelType: string; userId: string }, config: ToolConfig): void {
    this.write('permissions_resolved', {
      channelType: meta.channelType,
      userId: meta.userId,
      unrestricted: config.unrestricted,
      allowList: config.unrestricted ? undefined : config.allowList,
      roles: config.roleNames,
    });
  }

  onToolInvocation(event: ToolInvocationEvent): void {
    this.write('tool_invocation', {
      executionId: event.executionId,
      taskId: event.taskId,
      tool: event.tool,
      args: event.args,
      success: event.success,
      duration: event.duration,
      error: event.error,
    });
  }

  onModelCall(event: ModelCallEvent): void {
    this.write('model_call', {
      executionId: event.executionId,
      taskId: event.taskId,
      model: event.model,
      iteration: event.iteration,
      usage: event.usage,
      duration: event.duration,
      outcome: event.outcome,
    });
  }

  onChannelMessage(event: ChannelMessageEvent): void {
    this.write('channel_message', {
      channelType: event.channelType,
      channelId: event.channelId,
      direction: event.direction,
      userId: event.userId,
      messageLength: event.messageLength,
      timestamp: event.timestamp.toISOString(),
    });
  }

  onSecurityEvent(event: SecurityEvent): void {
    this.write('security_event', {
      securityType: event.type,
      details: event.details,
      timestamp: event.timestamp.toISOString(),
    });
  }

  onWarning(message: string, context?: Record<string, unknown>): void {
    this.write('warning', { message, context });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.write('error', {
      error: serializeError(error),
      context,
    });
  }

  async flush(): Promise<void> {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    this.flushSync();
  }
}
