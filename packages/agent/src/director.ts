/**
 * Director — spawns sub-agents and waits for all of them.
 *
 * Each task becomes a child node (kind "subagent") under the caller's node
 * and runs its own ToolLoop with a fresh RegisterStore. The child's tools are
 * those its capability domain grants, intersected with the caller's allow
 * list, so delegation never widens permissions.
 *
 * Children run concurrently, bounded by a semaphore, and are collected with
 * Promise.allSettled: one result per task, in input order, whatever happens
 * to the siblings. A spawn may carry a deadline; children still running
 * when it expires are aborted and reported as cancelled.
 *
 * Nesting is bounded by `maxDepth`. The top-level loop runs at depth 0; a
 * spawn whose children would sit deeper than `maxDepth` is rejected with a
 * SubAgentDepthError before anything is created.
 */

import type {
  ICapabilityResolver,
  IModelInvoker,
  IObserver,
  IToolInvoker,
  SubAgentControl,
  SubAgentOutcome,
  SubAgentResult,
  SubAgentStatus,
  SubAgentTask,
  SpawnOptions,
  ToolConfig,
} from '@switchboard/core';
import { SubAgentDepthError, toError } from '@switchboard/core';
import { RegisterStore } from './register-store.js';
import type { ExecutionTracker } from './task-tracker.js';
import { ToolLoop } from './tool-loop.js';
import type { LoopScope, SubAgentSpawner, ToolLoopStatus } from './tool-loop.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DirectorOpts {
  model: IModelInvoker;
  tools: IToolInvoker;
  tracker: ExecutionTracker;
  capabilities: ICapabilityResolver;
  observer?: IObserver;
  /** Nesting levels below the top-level loop. Default: 1. */
  maxDepth?: number;
  /** Children running at once per spawn call. Default: 3. */
  maxConcurrency?: number;
  /** Iteration cap for each child loop. Default: 10. */
  maxIterations?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  /** System prompt for child loops. */
  systemPrompt?: string;
}

/** The spawning loop's position plus the permissions children inherit. */
export interface SpawnScope extends LoopScope {
  toolConfig: ToolConfig;
  signal?: AbortSignal;
}

interface SubAgentHandle {
  taskId: string;
  executionId: string;
  label: string;
  state: SubAgentStatus['state'];
  cancelRequested: boolean;
  loop?: ToolLoop;
}

const DEFAULT_SUBAGENT_PROMPT =
  'You are a focused sub-agent. Complete the task you are given with the tools available ' +
  'and reply with a concise result for the agent that delegated it.';

// ---------------------------------------------------------------------------
// Concurrency semaphore
// ---------------------------------------------------------------------------

class Semaphore {
  private count: number;
  private readonly queue: Array<() => void> = [];

  constructor(limit: number) {
    this.count = limit;
  }

  async acquire(): Promise<void> {
    if (this.count > 0) {
      this.count--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.count++;
    }
  }
}

/** Abort `controller` when `parent` aborts. Returns the unlink function. */
function followSignal(parent: AbortSignal | undefined, controller: AbortController): () => void {
  if (!parent) return () => {};
  if (parent.aborted) {
    controller.abort();
    return () => {};
  }
  const onAbort = () => controller.abort();
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}

/** True when `ms` elapses before `work` settles. */
async function expiresFirst(work: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<true>((resolve) => {
    timer = setTimeout(() => resolve(true), ms);
  });
  try {
    return await Promise.race([work.then(() => false), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function outcomeOf(status: ToolLoopStatus): SubAgentOutcome {
  return status === 'model_error' ? 'error' : status;
}

// ---------------------------------------------------------------------------
// Director
// ---------------------------------------------------------------------------

export class Director implements SubAgentSpawner {
  readonly maxDepth: number;
  private readonly opts: DirectorOpts;
  private readonly maxConcurrency: number;
  private readonly handles = new Map<string, SubAgentHandle>();

  constructor(opts: DirectorOpts) {
    this.opts = opts;
    this.maxDepth = opts.maxDepth ?? 1;
    this.maxConcurrency = Math.max(1, opts.maxConcurrency ?? 3);
  }

  /** Sub-agent controls bound to one loop, handed to its tools. */
  controlFor(scope: LoopScope, toolConfig: ToolConfig, signal?: AbortSignal): SubAgentControl {
    return {
      spawn: (tasks, opts) => this.spawn({ ...scope, toolConfig, signal }, tasks, opts),
      cancel: (taskId) => this.cancel(taskId),
      status: (taskId) => this.status(taskId, scope.executionId),
    };
  }

  /**
   * Run every task as a child of `scope.taskId` and resolve once all are
   * terminal, or once `opts.timeoutMs` expires. Children still running at
   * the deadline are aborted and reported as cancelled. Results keep the
   * input order.
   */
  async spawn(scope: SpawnScope, tasks: SubAgentTask[], opts: SpawnOptions = {}): Promise<SubAgentResult[]> {
    const childDepth = scope.depth + 1;
    if (childDepth > this.maxDepth) {
      throw new SubAgentDepthError(childDepth, this.maxDepth);
    }

    // Create every node up front so siblings appear in input order.
    const nodes = tasks.map((task) => this.opts.tracker.startTask(scope.taskId, task.label, 'subagent'));
    const semaphore = new Semaphore(this.maxConcurrency);
    const controller = new AbortController();
    const unlink = followSignal(scope.signal, controller);
    const childScope: SpawnScope = { ...scope, signal: controller.signal };
    const startedAt = Date.now();

    const results: Array<SubAgentResult | undefined> = tasks.map(() => undefined);
    const settled = Promise.allSettled(
      tasks.map((task, index) =>
        this.runChild(childScope, task, nodes[index] ?? null, childDepth, semaphore).then(
          (result) => {
            results[index] = result;
          },
          (err: unknown) => {
            results[index] = {
              taskId: nodes[index] ?? '',
              label: task.label,
              status: 'error',
              output: '',
              error: toError(err).message,
              toolsUsed: [],
              tokensUsed: 0,
              durationMs: Date.now() - startedAt,
            };
          },
        ),
      ),
    );

    try {
      if (opts.timeoutMs === undefined) {
        await settled;
      } else if (await expiresFirst(settled, opts.timeoutMs)) {
        controller.abort();
        this.opts.observer?.onWarning(`Sub-agent spawn timed out after ${opts.timeoutMs}ms`, {
          executionId: scope.executionId,
          taskId: scope.taskId,
        });
      }
    } finally {
      unlink();
    }

    return tasks.map((task, index) => {
      const done = results[index];
      if (done) return done;
      const taskId = nodes[index] ?? '';
      const error = `Timed out after ${opts.timeoutMs ?? 0}ms`;
      this.stopHandle(taskId, error);
      return {
        taskId,
        label: task.label,
        status: 'cancelled',
        output: '',
        error,
        toolsUsed: [],
        tokensUsed: 0,
        durationMs: Date.now() - startedAt,
      };
    });
  }

  /**
   * Ask a running child to stop. Its current tool call finishes; the loop
   * stops before its next model call. Returns false for unknown or finished
   * children.
   */
  cancel(taskId: string): boolean {
    const handle = this.handles.get(taskId);
    if (!handle || handle.state !== 'running') return false;
    handle.cancelRequested = true;
    handle.loop?.cancel();
    return true;
  }

  /** Handles for one task, or every handle (optionally of one execution). */
  status(taskId?: string, executionId?: string): SubAgentStatus[] {
    const view = (h: SubAgentHandle): SubAgentStatus => ({
      taskId: h.taskId,
      label: h.label,
      state: h.state,
      cancelRequested: h.cancelRequested,
    });

    if (taskId !== undefined) {
      const handle = this.handles.get(taskId);
      if (!handle || (executionId !== undefined && handle.executionId !== executionId)) return [];
      return [view(handle)];
    }

    const all = [...this.handles.values()];
    return (executionId === undefined ? all : all.filter((h) => h.executionId === executionId)).map(view);
  }

  /** Forget the handles of a finished execution. */
  release(executionId: string): void {
    for (const [taskId, handle] of this.handles) {
      if (handle.executionId === executionId) this.handles.delete(taskId);
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private async runChild(
    scope: SpawnScope,
    task: SubAgentTask,
    nodeId: string | null,
    depth: number,
    semaphore: Semaphore,
  ): Promise<SubAgentResult> {
    const { tracker, observer } = this.opts;
    const startedAt = Date.now();

    const result = (
      status: SubAgentOutcome,
      output: string,
      extra: Partial<SubAgentResult> = {},
    ): SubAgentResult => ({
      taskId: nodeId ?? '',
      label: task.label,
      status,
      output,
      toolsUsed: [],
      tokensUsed: 0,
      durationMs: Date.now() - startedAt,
      ...extra,
    });

    if (nodeId === null) {
      return result('error', '', { error: 'The delegating task is no longer active' });
    }

    const handle: SubAgentHandle = {
      taskId: nodeId,
      executionId: scope.executionId,
      label: task.label,
      state: 'running',
      cancelRequested: false,
    };
    this.handles.set(nodeId, handle);

    await semaphore.acquire();
    try {
      if (handle.state !== 'running') {
        return result(handle.state, '');
      }
      if (handle.cancelRequested || scope.signal?.aborted) {
        this.settle(handle, 'cancelled');
        return result('cancelled', '');
      }

      const domainTools = await this.opts.capabilities.resolve(task.domain ?? task.label);
      const parentAllowed = new Set(
        scope.toolConfig.unrestricted ? this.opts.tools.names() : scope.toolConfig.allowList,
      );
      const childConfig: ToolConfig = {
        ...scope.toolConfig,
        allowList: domainTools.filter((name) => parentAllowed.has(name)),
        unrestricted: false,
      };

      const loop = new ToolLoop({
        model: this.opts.model,
        tools: this.opts.tools,
        tracker,
        observer,
        scope: {
          executionId: scope.executionId,
          taskId: nodeId,
          channelType: scope.channelType,
          userId: scope.userId,
          depth,
        },
        maxIterations: this.opts.maxIterations,
        maxRetries: this.opts.maxRetries,
        retryBaseMs: this.opts.retryBaseMs,
        systemPrompt: this.opts.systemPrompt ?? DEFAULT_SUBAGENT_PROMPT,
        spawner: this,
        signal: scope.signal,
      });
      handle.loop = loop;
      // cancel() may have landed while the capability lookup was pending
      if (handle.cancelRequested) loop.cancel();

      const registers = new RegisterStore({ observer });
      const run = await loop.run([{ role: 'user', content: task.description }], childConfig, registers);
      registers.clear();

      const outcome = outcomeOf(run.status);
      this.settle(handle, outcome, outcome === 'error' ? (run.error ?? 'model unavailable') : undefined);

      return result(outcome, run.finalText, {
        toolsUsed: run.toolsUsed,
        tokensUsed: run.tokensUsed,
        ...(run.error !== undefined ? { error: run.error } : {}),
      });
    } catch (err) {
      const error = toError(err);
      observer?.onError(error, { phase: 'subagent', taskId: nodeId, label: task.label });
      this.settle(handle, 'error', error.message);
      return result('error', '', { error: error.message });
    } finally {
      handle.loop = undefined;
      semaphore.release();
    }
  }

  /** Record a child's terminal state once; later outcomes are ignored. */
  private settle(handle: SubAgentHandle, outcome: SubAgentOutcome, error?: string): void {
    if (handle.state !== 'running') return;
    handle.state = outcome;
    const { tracker } = this.opts;
    if (outcome === 'completed' || outcome === 'iteration_cap') {
      tracker.completeTask(handle.taskId);
    } else {
      tracker.failTask(handle.taskId, outcome === 'cancelled' ? 'cancelled' : (error ?? 'error'));
    }
  }

  /** Stop a child the spawn no longer waits for. */
  private stopHandle(taskId: string, reason: string): void {
    const handle = this.handles.get(taskId);
    if (!handle || handle.state !== 'running') return;
    handle.cancelRequested = true;
    handle.loop?.cancel();
    handle.state = 'cancelled';
    this.opts.tracker.failTask(taskId, reason);
  }
}
