/**
 * ConsoleObserver — human-readable, level-filtered log lines.
 *
 * debug and info go to stdout, warn and error to stderr. Every line carries
 * the `[switchboard]` prefix so the output can be grepped out of a shared log.
 */

import type {
  ChannelMessageEvent,
  ExecutionMeta,
  ExecutionStats,
  IObserver,
  LogLevel,
  ModelCallEvent,
  SecurityEvent,
  ToolConfig,
  ToolInvocationEvent,
} from '@switchboard/core';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const PREFIX = '[switchboard]';

function formatContext(context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) return '';
  return ' ' + JSON.stringify(context);
}

export class ConsoleObserver implements IObserver {
  private readonly threshold: number;

  constructor(level: LogLevel = 'info') {
    this.threshold = LEVEL_ORDER[level];
  }

  // ---- internal -----------------------------------------------------------

  private log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const line = `${PREFIX} ${level.toUpperCase()} ${message}`;
    if (level === 'warn') console.warn(line);
    else if (level === 'error') console.error(line);
    else console.log(line);
  }

  // ---- IObserver ----------------------------------------------------------

  onExecutionStart(meta: ExecutionMeta): void {
    this.log('info', `execution ${meta.executionId} started (${meta.channelType}:${meta.userId})`);
  }

  onExecutionEnd(meta: ExecutionMeta, stats: ExecutionStats): void {
    this.log(
      'info',
      `execution ${meta.executionId} ${stats.status} in ${stats.duration}ms ` +
        `(${stats.iterations} iterations, ${stats.toolsUsed} tools, ${stats.tokensUsed} tokens)`,
    );
  }

  onPermissionsResolved(meta: { channelType: string; userId: string }, config: ToolConfig): void {
    const scope = config.unrestricted ? 'all tools' : `${config.allowList.length} tools`;
    const roles = config.roleNames.length > 0 ? ` via ${config.roleNames.join(', ')}` : '';
    this.log('debug', `permissions for ${meta.channelType}:${meta.userId}: ${scope}${roles}`);
  }

  onToolInvocation(event: ToolInvocationEvent): void {
    if (event.success) {
      this.log('debug', `tool ${event.tool} ok (${event.duration}ms)`);
    } else {
      this.log('warn', `tool ${event.tool} failed (${event.duration}ms): ${event.error ?? 'unknown error'}`);
    }
  }

  onModelCall(event: ModelCallEvent): void {
    const tokens = event.usage ? `, ${event.usage.inputTokens}+${event.usage.outputTokens} tokens` : '';
    this.log('debug', `model ${event.model} #${event.iteration} ${event.outcome} (${event.duration}ms${tokens})`);
  }

  onChannelMessage(event: ChannelMessageEvent): void {
    const arrow = event.direction === 'inbound' ? '<-' : '->';
    this.log('debug', `${arrow} ${event.channelType}:${event.channelId} (${event.messageLength} chars)`);
  }

  onSecurityEvent(event: SecurityEvent): void {
    const level: LogLevel = event.type === 'permission_denied' ? 'warn' : 'info';
    this.log(level, `security ${event.type}${formatContext(event.details)}`);
  }

  onWarning(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message + formatContext(context));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.log('error', `${error.message}${formatContext(context)}`);
  }
}
