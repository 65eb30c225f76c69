/**
 * ToolLoop — the bounded tool-calling loop behind every dispatch.
 *
 * Each round sends the conversation to the model. A text answer ends the
 * loop; a batch of tool calls is executed in order and the results are
 * appended before the next round:
 *
 *   THINKING → MODEL_CALL → FINAL_ANSWER
 *                         → TOOL_CALLS_PENDING → execute → APPEND_RESULTS → THINKING
 *
 * The loop stops at `maxIterations` model-call rounds and answers with the
 * best partial text it has. Tool calls outside the allow list are rejected
 * locally and never reach the invoker. A failed invocation's error string is
 * appended as the tool result verbatim, and the model decides how to go on.
 *
 * Model failures are retried with exponential backoff. Once `maxRetries`
 * consecutive attempts fail (or one fails with a non-retryable ModelError),
 * the loop ends with a degraded answer instead of throwing.
 *
 * Cancellation, by `cancel()` or the abort signal, is observed before each
 * model call. A tool that is already running is allowed to finish.
 */

import type {
  IModelInvoker,
  IObserver,
  IRegisterStore,
  IToolInvoker,
  Message,
  ModelResponse,
  SubAgentControl,
  ToolCall,
  ToolConfig,
  ToolContext,
  ToolResult,
} from '@switchboard/core';
import {
  ModelError,
  SUBAGENT_TOOL_NAMES,
  abortableSleep,
  backoffDelay,
  toError,
} from '@switchboard/core';
import type { ExecutionTracker } from './task-tracker.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ToolLoopStatus = 'completed' | 'iteration_cap' | 'cancelled' | 'model_error';

export interface ToolLoopResult {
  status: ToolLoopStatus;
  /** Reply text with register templates expanded. Never empty. */
  finalText: string;
  /** Input history plus every message this run appended. */
  history: Message[];
  /** Tools actually invoked, in call order. */
  toolsUsed: string[];
  tokensUsed: number;
  iterations: number;
  /** Last model error, when status is model_error. */
  error?: string;
}

/** Where the loop sits in the execution tree. */
export interface LoopScope {
  executionId: string;
  /** Node whose counters this loop updates. */
  taskId: string;
  channelType: string;
  userId: string;
  /** 0 for the top-level loop of a dispatch. */
  depth: number;
}

/** Implemented by the Director; hands tools a way to spawn children. */
export interface SubAgentSpawner {
  readonly maxDepth: number;
  controlFor(scope: LoopScope, toolConfig: ToolConfig, signal?: AbortSignal): SubAgentControl;
}

export interface ToolLoopOpts {
  model: IModelInvoker;
  tools: IToolInvoker;
  tracker: ExecutionTracker;
  scope: LoopScope;
  observer?: IObserver;
  /** Model-call rounds before a forced stop. Default: 10. */
  maxIterations?: number;
  /** Consecutive model failures before a degraded answer. Default: 3. */
  maxRetries?: number;
  /** Base delay for retry backoff in ms. Default: 1000. */
  retryBaseMs?: number;
  systemPrompt?: string;
  spawner?: SubAgentSpawner;
  signal?: AbortSignal;
}

export const ITERATION_CAP_NOTICE =
  'I ran out of steps before finishing this request. Please try again with a narrower question.';
export const MODEL_UNAVAILABLE_NOTICE =
  'I could not reach the model to finish this request. Please try again shortly.';
export const CANCELLED_NOTICE = 'The request was cancelled before it finished.';
export const NO_ANSWER_NOTICE = 'I was not able to produce an answer for this request.';

// ---------------------------------------------------------------------------
// ToolLoop
// ---------------------------------------------------------------------------

export class ToolLoop {
  private readonly opts: ToolLoopOpts;
  private readonly maxIterations: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly signal: AbortSignal;
  private cancelled = false;

  constructor(opts: ToolLoopOpts) {
    this.opts = opts;
    this.maxIterations = opts.maxIterations ?? 10;
    this.maxRetries = opts.maxRetries ?? 3;
    this.retryBaseMs = opts.retryBaseMs ?? 1000;
    this.signal = opts.signal ?? new AbortController().signal;
  }

  /** Request a stop before the next model call. */
  cancel(): void {
    this.cancelled = true;
  }

  isCancelled(): boolean {
    return this.cancelled || this.signal.aborted;
  }

  async run(
    history: Message[],
    toolConfig: ToolConfig,
    registers: IRegisterStore,
  ): Promise<ToolLoopResult> {
    const { model, tracker, scope, observer } = this.opts;
    const messages: Message[] = [...history];
    const toolsUsed: string[] = [];
    const canSpawn = this.opts.spawner !== undefined && scope.depth < this.opts.spawner.maxDepth;
    const permitted = this.permittedTools(toolConfig, canSpawn);
    const definitions = this.opts.tools.getToolDefinitions([...permitted]);
    const subagents = canSpawn
      ? this.opts.spawner?.controlFor(scope, toolConfig, this.opts.signal)
      : undefined;

    let iterations = 0;
    let consecutiveErrors = 0;
    let tokensUsed = 0;
    let lastAssistantText = '';
    let lastToolOutput = '';
    let lastModelError: Error | undefined;
    let status: ToolLoopStatus | undefined;
    let finalText = '';

    const bestPartial = (): string => lastAssistantText || lastToolOutput;

    while (status === undefined && iterations < this.maxIterations) {
      if (this.isCancelled()) {
        status = 'cancelled';
        break;
      }

      iterations++;
      this.think(iterations === 1 ? 'Thinking' : 'Reviewing tool results');

      // ----- Model call -----
      let response: ModelResponse;
      const started = Date.now();
      try {
        response = await model.invoke(
          { messages: [...messages], tools: definitions, systemPrompt: this.opts.systemPrompt },
          { signal: this.signal },
        );
      } catch (err) {
        const error = toError(err);
        lastModelError = error;
        consecutiveErrors++;
        observer?.onModelCall({
          executionId: scope.executionId,
          taskId: scope.taskId,
          model: model.id,
          iteration: iterations,
          duration: Date.now() - started,
          outcome: 'error',
        });
        observer?.onError(error, { phase: 'model_call', iteration: iterations, taskId: scope.taskId });

        const nonRetryable = error instanceof ModelError && !error.retryable;
        if (nonRetryable || consecutiveErrors >= this.maxRetries) {
          status = 'model_error';
          break;
        }

        // Abort-aware so cancellation isn't delayed by a pending retry.
        await abortableSleep(backoffDelay(consecutiveErrors, this.retryBaseMs), this.signal);
        continue;
      }

      consecutiveErrors = 0;
      if (response.usage) {
        tokensUsed += response.usage.inputTokens + response.usage.outputTokens;
      }
      observer?.onModelCall({
        executionId: scope.executionId,
        taskId: scope.taskId,
        model: model.id,
        iteration: iterations,
        duration: Date.now() - started,
        usage: response.usage,
        outcome: response.type,
      });

      // ----- Final answer -----
      if (response.type === 'text') {
        messages.push({ role: 'assistant', content: response.text });
        if (response.text.trim()) lastAssistantText = response.text;
        finalText = bestPartial() || NO_ANSWER_NOTICE;
        status = 'completed';
        this.report(toolsUsed.length, tokensUsed);
        break;
      }

      // ----- Tool calls -----
      if (response.text?.trim()) lastAssistantText = response.text;
      messages.push({ role: 'assistant', content: response.text ?? '', toolCalls: response.toolCalls });

      for (const call of response.toolCalls) {
        if (!permitted.has(call.name)) {
          messages.push(this.reject(call));
          continue;
        }

        this.think(`Running ${call.name}`);
        const result = await this.invoke(call, registers, subagents);
        toolsUsed.push(call.name);

        const content = result.success ? result.output : (result.error ?? result.output);
        if (result.success && result.output.trim()) lastToolOutput = result.output;
        messages.push({ role: 'tool', name: call.name, toolCallId: call.id, content });
      }

      this.report(toolsUsed.length, tokensUsed);
    }

    switch (status) {
      case 'completed':
        break;
      case 'cancelled':
        finalText = bestPartial() || CANCELLED_NOTICE;
        break;
      case 'model_error': {
        const partial = bestPartial();
        finalText = partial ? `${partial}\n\n${MODEL_UNAVAILABLE_NOTICE}` : MODEL_UNAVAILABLE_NOTICE;
        break;
      }
      case undefined:
        status = 'iteration_cap';
        finalText = bestPartial() || ITERATION_CAP_NOTICE;
        observer?.onWarning(`Tool loop stopped at the iteration cap (${this.maxIterations})`, {
          executionId: scope.executionId,
          taskId: scope.taskId,
        });
        break;
    }

    return {
      status,
      finalText: registers.expandTemplates(finalText),
      history: messages,
      toolsUsed,
      tokensUsed,
      iterations,
      ...(status === 'model_error' && lastModelError ? { error: lastModelError.message } : {}),
    };
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /**
   * Names the model may call this run: the allow list (or the whole registry
   * for unrestricted callers), minus the sub-agent tools when this loop may
   * not spawn.
   */
  private permittedTools(toolConfig: ToolConfig, canSpawn: boolean): Set<string> {
    const registered = new Set(this.opts.tools.names());
    const source = toolConfig.unrestricted ? [...registered] : toolConfig.allowList;
    const permitted = new Set(source.filter((name) => registered.has(name)));
    if (!canSpawn) {
      permitted.delete(SUBAGENT_TOOL_NAMES.spawn);
      permitted.delete(SUBAGENT_TOOL_NAMES.status);
    }
    return permitted;
  }

  private reject(call: ToolCall): Message {
    const { scope, observer } = this.opts;
    observer?.onSecurityEvent({
      type: 'permission_denied',
      details: {
        tool: call.name,
        executionId: scope.executionId,
        channelType: scope.channelType,
        userId: scope.userId,
      },
      timestamp: new Date(),
    });
    return {
      role: 'tool',
      name: call.name,
      toolCallId: call.id,
      content: `Permission denied: the tool "${call.name}" is not available to you in this conversation.`,
    };
  }

  private async invoke(
    call: ToolCall,
    registers: IRegisterStore,
    subagents: SubAgentControl | undefined,
  ): Promise<ToolResult> {
    const { scope, tracker, observer } = this.opts;
    const context: ToolContext = {
      executionId: scope.executionId,
      taskId: scope.taskId,
      channelType: scope.channelType,
      userId: scope.userId,
      depth: scope.depth,
      registers,
      abortSignal: this.signal,
      onProgress: (update) => {
        tracker.updateTask(scope.taskId, { activeForm: update });
      },
      ...(subagents ? { subagents } : {}),
    };

    const started = Date.now();
    let result: ToolResult;
    try {
      result = await this.opts.tools.invoke(call.name, call.args, context);
    } catch (err) {
      result = { success: false, output: '', error: toError(err).message };
    }

    observer?.onToolInvocation({
      executionId: scope.executionId,
      taskId: scope.taskId,
      tool: call.name,
      args: call.args,
      success: result.success,
      duration: Date.now() - started,
      ...(result.error !== undefined ? { error: result.error } : {}),
    });
    return result;
  }

  private think(activeForm: string): void {
    const { scope, tracker } = this.opts;
    if (scope.taskId === scope.executionId) {
      tracker.thinking(scope.executionId, activeForm);
    } else {
      tracker.updateTask(scope.taskId, { activeForm });
    }
  }

  private report(toolsCount: number, tokensUsed: number): void {
    this.opts.tracker.updateTask(this.opts.scope.taskId, { toolsCount, tokensUsed });
  }
}
