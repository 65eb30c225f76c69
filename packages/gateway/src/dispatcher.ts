/**
 * Dispatcher — turns one inbound message into one reply.
 *
 *   1. normalized message in (channel binding)
 *   2. identity getOrCreate
 *   3. load or create the session
 *   4. resolve the ToolConfig, append the user entry
 *   5. build context (history + recalled memories + system prompt), run the loop
 *   6. extract and save memory directives, strip them from the reply
 *   7. append tool_call / tool_result / assistant entries
 *   8. return the reply and usage
 *
 * A failure in 1-4 returns a structured error and leaves the session as it
 * was. From step 5 on the user always gets a reply: a loop that throws or
 * times out still goes through 6-8 with whatever it produced.
 *
 * Dispatches for the same (channelType, channelId) are serialized through a
 * keyed queue; different sessions run in parallel.
 */

import type {
  ExecutionMeta,
  IIdentityStore,
  IMemoryStore,
  IModelInvoker,
  IObserver,
  ISessionStore,
  IToolInvoker,
  Identity,
  MemoryRecord,
  Message,
  NormalizedMessage,
  Session,
  SessionEntry,
  SwitchboardConfig,
  ToolConfig,
} from '@switchboard/core';
import { DispatchError, SwitchboardError, toError } from '@switchboard/core';
import {
  MODEL_UNAVAILABLE_NOTICE,
  RegisterStore,
  ToolLoop,
} from '@switchboard/agent';
import type {
  ExecutionTracker,
  SubAgentSpawner,
  ToolLoopResult,
  ToolLoopStatus,
} from '@switchboard/agent';
import { extractMemoryDirectives } from './memory-directives.js';
import { KeyedQueue } from './session-queue.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PermissionSource {
  resolve(channelType: string, userId: string, isAdmin: boolean): Promise<ToolConfig>;
}

export interface DispatcherOpts {
  config: SwitchboardConfig;
  model: IModelInvoker;
  tools: IToolInvoker;
  permissions: PermissionSource;
  identities: IIdentityStore;
  sessions: ISessionStore;
  tracker: ExecutionTracker;
  memory?: IMemoryStore;
  /** Usually the Director; omitted or disabled means no sub-agents. */
  spawner?: SubAgentSpawner & { release?(executionId: string): void };
  observer?: IObserver;
  /** Base delay for model retry backoff. Default: 1000. */
  retryBaseMs?: number;
}

export type DispatchStatus = ToolLoopStatus | 'timeout' | 'reset';

export interface DispatchUsage {
  tokensUsed: number;
  toolsUsed: string[];
  iterations: number;
}

export type DispatchResult =
  | {
      success: true;
      text: string;
      status: DispatchStatus;
      /** Null for commands that do not run the loop. */
      executionId: string | null;
      usage: DispatchUsage;
      memoriesSaved: number;
    }
  | {
      success: false;
      error: { code: string; message: string; stage?: DispatchError['stage'] };
    };

export const RESET_REPLY = "Session reset. Let's start fresh!";
/** Sent when a reply held nothing but memory directives. */
export const MEMORY_ONLY_REPLY = 'Noted.';
const RESET_COMMANDS = new Set(['/new', '/reset']);

const NO_USAGE: DispatchUsage = { tokensUsed: 0, toolsUsed: [], iterations: 0 };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function failure(err: unknown): DispatchResult {
  const error = toError(err);
  if (error instanceof DispatchError) {
    return { success: false, error: { code: error.code, message: error.message, stage: error.stage } };
  }
  const code = error instanceof SwitchboardError ? error.code : 'DISPATCH_ERROR';
  return { success: false, error: { code, message: error.message } };
}

/** Wrap a step 2-4 failure so the caller learns which step broke. */
async function stage<T>(name: DispatchError['stage'], step: () => Promise<T>): Promise<T> {
  try {
    return await step();
  } catch (err) {
    const cause = toError(err);
    throw new DispatchError(`Failed to resolve ${name}: ${cause.message}`, name, { cause: cause.message });
  }
}

/** Replay user and assistant turns; tool entries stay in the session log only. */
function toMessages(entries: SessionEntry[]): Message[] {
  const messages: Message[] = [];
  for (const entry of entries) {
    if (entry.role === 'user' || entry.role === 'assistant') {
      messages.push({ role: entry.role, content: entry.content });
    }
  }
  return messages;
}

function memoryBlock(memories: MemoryRecord[]): string {
  if (memories.length === 0) return '';
  const lines = memories.map((m) => `- ${m.content}`);
  return `Things you remember about this user:\n${lines.join('\n')}`;
}

/** Session entries for what the loop appended after the input history. */
function transcriptEntries(result: ToolLoopResult, from: number, now: Date): SessionEntry[] {
  const entries: SessionEntry[] = [];
  for (const message of result.history.slice(from)) {
    if (message.role === 'assistant' && message.toolCalls) {
      for (const call of message.toolCalls) {
        entries.push({
          role: 'tool_call',
          content: JSON.stringify(call.args ?? {}),
          toolName: call.name,
          toolCallId: call.id,
          timestamp: now,
        });
      }
    } else if (message.role === 'tool') {
      entries.push({
        role: 'tool_result',
        content: message.content,
        ...(message.name !== undefined ? { toolName: message.name } : {}),
        ...(message.toolCallId !== undefined ? { toolCallId: message.toolCallId } : {}),
        timestamp: now,
      });
    }
  }
  return entries;
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export class Dispatcher {
  private readonly opts: DispatcherOpts;
  private readonly admins: Set<string>;
  private readonly queue = new KeyedQueue();

  constructor(opts: DispatcherOpts) {
    this.opts = opts;
    this.admins = new Set(opts.config.permissions.admins);
  }

  /** Admin status comes from config; forceSafeMode always wins. */
  isAdmin(message: Pick<NormalizedMessage, 'channelType' | 'userId' | 'forceSafeMode'>): boolean {
    if (message.forceSafeMode) return false;
    return this.admins.has(`${message.channelType}:${message.userId}`);
  }

  async dispatch(message: NormalizedMessage): Promise<DispatchResult> {
    this.opts.observer?.onChannelMessage({
      channelType: message.channelType,
      channelId: message.channelId,
      direction: 'inbound',
      userId: message.userId,
      messageLength: message.content.length,
      timestamp: message.receivedAt,
    });

    const key = `${message.channelType}:${message.channelId}`;
    const command = message.content.trim().toLowerCase();
    const result = await this.queue.run(key, () =>
      RESET_COMMANDS.has(command) ? this.reset(message) : this.execute(message),
    );

    if (result.success) {
      this.opts.observer?.onChannelMessage({
        channelType: message.channelType,
        channelId: message.channelId,
        direction: 'outbound',
        userId: message.userId,
        messageLength: result.text.length,
        timestamp: new Date(),
      });
    }
    return result;
  }

  // -----------------------------------------------------------------------
  // Commands
  // -----------------------------------------------------------------------

  private async reset(message: NormalizedMessage): Promise<DispatchResult> {
    try {
      const session = await stage('session', () =>
        this.opts.sessions.getOrCreate(message.channelType, message.channelId),
      );
      await stage('session', () => this.opts.sessions.reset(session.sessionId));
    } catch (err) {
      this.opts.observer?.onError(toError(err), { phase: 'session_reset', channelId: message.channelId });
      return failure(err);
    }
    return {
      success: true,
      text: RESET_REPLY,
      status: 'reset',
      executionId: null,
      usage: NO_USAGE,
      memoriesSaved: 0,
    };
  }

  // -----------------------------------------------------------------------
  // Pipeline
  // -----------------------------------------------------------------------

  private async execute(message: NormalizedMessage): Promise<DispatchResult> {
    const { config, observer, sessions } = this.opts;

    // ----- Steps 2-4: any failure aborts with no session mutation -----
    let identity: Identity;
    let session: Session;
    let toolConfig: ToolConfig;
    let history: SessionEntry[];
    try {
      identity = await stage('identity', () =>
        this.opts.identities.getOrCreate(message.channelType, message.userId, message.username),
      );
      session = await stage('session', () => sessions.getOrCreate(message.channelType, message.channelId));
      toolConfig = await stage('permissions', () =>
        this.opts.permissions.resolve(message.channelType, message.userId, this.isAdmin(message)),
      );
      history = await stage('session', () => sessions.read(session.sessionId, config.agent.historyLimit));
      await stage('session', () =>
        sessions.append(session.sessionId, [
          { role: 'user', content: message.content, userId: message.userId, timestamp: message.receivedAt },
        ]),
      );
    } catch (err) {
      observer?.onError(toError(err), {
        phase: 'dispatch_setup',
        channelType: message.channelType,
        channelId: message.channelId,
        userId: message.userId,
      });
      return failure(err);
    }

    // ----- Step 5: run the loop -----
    const memories = await this.recall(identity.identityId);
    const executionId = this.opts.tracker.startExecution('dispatch');
    const meta: ExecutionMeta = {
      executionId,
      channelType: message.channelType,
      channelId: message.channelId,
      userId: message.userId,
      startedAt: new Date(),
    };
    observer?.onExecutionStart(meta);

    const registers = new RegisterStore({ observer });
    const controller = new AbortController();
    let timedOut = false;
    const timer = config.agent.timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, config.agent.timeoutMs)
      : null;

    const context: Message[] = [...toMessages(history), { role: 'user', content: message.content }];
    let result: ToolLoopResult;
    try {
      result = await this.runLoop(message, executionId, context, toolConfig, registers, memories, controller.signal);
    } finally {
      if (timer !== null) clearTimeout(timer);
    }
    const status: DispatchStatus = timedOut && result.status === 'cancelled' ? 'timeout' : result.status;
    if (status === 'timeout') {
      observer?.onWarning(`Dispatch timed out after ${config.agent.timeoutMs ?? 0}ms`, { executionId });
    }

    try {
      // ----- Step 6: memory directives -----
      const { directives, text } = extractMemoryDirectives(result.finalText);
      const reply = text.trim() ? text : MEMORY_ONLY_REPLY;
      let memoriesSaved = 0;
      if (this.opts.memory && config.memory.enabled) {
        for (const directive of directives) {
          try {
            await this.opts.memory.save(directive, {
              identityId: identity.identityId,
              sessionId: session.sessionId,
              channelType: message.channelType,
            });
            memoriesSaved++;
          } catch (err) {
            observer?.onError(toError(err), { phase: 'memory_save', executionId, kind: directive.kind });
          }
        }
      }

      // ----- Step 7: transcript -----
      const now = new Date();
      const entries: SessionEntry[] = [
        ...transcriptEntries(result, context.length, now),
        { role: 'assistant', content: reply, timestamp: now },
      ];
      try {
        await sessions.append(session.sessionId, entries);
      } catch (err) {
        observer?.onError(toError(err), { phase: 'session_append', executionId, sessionId: session.sessionId });
      }

      // ----- Step 8: reply -----
      this.opts.tracker.completeExecution(executionId, reply);
      observer?.onExecutionEnd(meta, {
        duration: Date.now() - meta.startedAt.getTime(),
        iterations: result.iterations,
        toolsUsed: result.toolsUsed.length,
        tokensUsed: result.tokensUsed,
        status,
      });

      return {
        success: true,
        text: reply,
        status,
        executionId,
        usage: { tokensUsed: result.tokensUsed, toolsUsed: result.toolsUsed, iterations: result.iterations },
        memoriesSaved,
      };
    } finally {
      this.opts.spawner?.release?.(executionId);
      registers.clear();
      this.opts.tracker.dispose(executionId);
    }
  }

  private async runLoop(
    message: NormalizedMessage,
    executionId: string,
    context: Message[],
    toolConfig: ToolConfig,
    registers: RegisterStore,
    memories: MemoryRecord[],
    signal: AbortSignal,
  ): Promise<ToolLoopResult> {
    const { config, observer } = this.opts;
    const systemPrompt = [config.agent.systemPrompt ?? '', memoryBlock(memories)]
      .filter((part) => part.length > 0)
      .join('\n\n');

    const loop = new ToolLoop({
      model: this.opts.model,
      tools: this.opts.tools,
      tracker: this.opts.tracker,
      scope: {
        executionId,
        taskId: executionId,
        channelType: message.channelType,
        userId: message.userId,
        depth: 0,
      },
      observer,
      maxIterations: config.agent.maxIterations,
      maxRetries: config.agent.maxRetries,
      retryBaseMs: this.opts.retryBaseMs,
      ...(systemPrompt ? { systemPrompt } : {}),
      ...(config.subagents.enabled && this.opts.spawner ? { spawner: this.opts.spawner } : {}),
      signal,
    });

    try {
      return await loop.run(context, toolConfig, registers);
    } catch (err) {
      const error = toError(err);
      observer?.onError(error, { phase: 'tool_loop', executionId });
      return {
        status: 'model_error',
        finalText: MODEL_UNAVAILABLE_NOTICE,
        history: context,
        toolsUsed: [],
        tokensUsed: 0,
        iterations: 0,
        error: error.message,
      };
    }
  }

  /** Recalled memories for the context; a failed recall means none. */
  private async recall(identityId: string): Promise<MemoryRecord[]> {
    const { memory, config, observer } = this.opts;
    if (!memory || !config.memory.enabled || config.memory.recallLimit === 0) return [];
    try {
      return await memory.recall(identityId, config.memory.recallLimit);
    } catch (err) {
      observer?.onWarning('Memory recall failed; continuing without memories', {
        identityId,
        error: toError(err).message,
      });
      return [];
    }
  }
}
