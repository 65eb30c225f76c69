/**
 * ExecutionTracker — hierarchical record of in-flight and completed work.
 *
 * One root node per dispatch (kind "execution"); tool loops and sub-agents
 * hang task nodes beneath it. Every mutation publishes an immutable
 * ExecutionEvent to the configured sink, numbered per execution id so
 * consumers can detect reordering or duplicates.
 *
 * Mutations are synchronous: within one process the tracker is the single
 * writer of its tree, so concurrently running sub-agents cannot interleave a
 * half-applied update.
 *
 * Operating on an unknown or already-terminal node is reported to the caller
 * (false / null) and to the observer, and otherwise ignored.
 */

import type {
  ExecutionEvent,
  ExecutionEventPayload,
  ExecutionNode,
  ExecutionNodeKind,
  IObserver,
} from '@switchboard/core';
import { generateId, toError } from '@switchboard/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExecutionEventSink {
  publish(event: ExecutionEvent): void;
}

export interface ExecutionTrackerOpts {
  sink?: ExecutionEventSink;
  observer?: IObserver;
  now?: () => number;
}

export interface TaskUpdate {
  toolsCount?: number;
  tokensUsed?: number;
  activeForm?: string;
}

export interface ExecutionTreeView {
  node: ExecutionNode;
  children: ExecutionTreeView[];
}

function isTerminal(node: ExecutionNode): boolean {
  return node.status === 'completed' || node.status === 'error';
}

// ---------------------------------------------------------------------------
// ExecutionTracker
// ---------------------------------------------------------------------------

export class ExecutionTracker {
  private readonly nodes = new Map<string, ExecutionNode>();
  private readonly childIds = new Map<string, string[]>();
  private readonly sequence = new Map<string, number>();
  private readonly sink?: ExecutionEventSink;
  private readonly observer?: IObserver;
  private readonly now: () => number;

  constructor(opts: ExecutionTrackerOpts = {}) {
    this.sink = opts.sink;
    this.observer = opts.observer;
    this.now = opts.now ?? Date.now;
  }

  // -----------------------------------------------------------------------
  // Mutations
  // -----------------------------------------------------------------------

  /** Create the root node of a new execution and return its id. */
  startExecution(label = 'execute'): string {
    const id = generateId(16);
    this.nodes.set(id, {
      id,
      parentId: null,
      executionId: id,
      kind: 'execution',
      status: 'in_progress',
      label,
      startedAt: new Date(this.now()),
      toolsCount: 0,
      tokensUsed: 0,
    });
    this.childIds.set(id, []);
    this.emit(id, { type: 'execution.started', label });
    return id;
  }

  /** Publish what the execution is doing right now ("Searching the web"). */
  thinking(executionId: string, activeForm: string): boolean {
    const root = this.live(executionId, 'thinking');
    if (!root) return false;
    root.activeForm = activeForm;
    this.emit(executionId, { type: 'execution.thinking', activeForm });
    return true;
  }

  /**
   * Create a child under `parentId`. Returns null when the parent is unknown
   * or already terminal.
   */
  startTask(parentId: string, label: string, kind: ExecutionNodeKind = 'task'): string | null {
    const parent = this.live(parentId, 'startTask');
    if (!parent) return null;

    const id = generateId(16);
    this.nodes.set(id, {
      id,
      parentId,
      executionId: parent.executionId,
      kind,
      status: 'in_progress',
      label,
      startedAt: new Date(this.now()),
      toolsCount: 0,
      tokensUsed: 0,
    });
    this.childIds.set(id, []);
    this.childIds.get(parentId)?.push(id);
    this.emit(parent.executionId, { type: 'task.started', id, parentId, label, kind });
    return id;
  }

  /** Partial update of counters and the active form. */
  updateTask(id: string, fields: TaskUpdate): boolean {
    const node = this.live(id, 'updateTask');
    if (!node) return false;

    if (fields.toolsCount !== undefined) node.toolsCount = fields.toolsCount;
    if (fields.tokensUsed !== undefined) node.tokensUsed = fields.tokensUsed;
    if (fields.activeForm !== undefined) node.activeForm = fields.activeForm;

    this.emit(node.executionId, { type: 'task.updated', id, ...fields });
    return true;
  }

  completeTask(id: string): boolean {
    const node = this.live(id, 'completeTask');
    if (!node) return false;

    const duration = this.finish(node, 'completed');
    this.emit(node.executionId, { type: 'task.completed', id, duration });
    return true;
  }

  failTask(id: string, error: string): boolean {
    const node = this.live(id, 'failTask');
    if (!node) return false;

    node.error = error;
    this.finish(node, 'error');
    this.emit(node.executionId, { type: 'task.error', id, error });
    return true;
  }

  /** Close the root node and publish the final text. */
  completeExecution(executionId: string, finalText: string): boolean {
    const root = this.live(executionId, 'completeExecution');
    if (!root) return false;

    const duration = this.finish(root, 'completed');
    this.emit(executionId, { type: 'execution.completed', duration, finalText });
    return true;
  }

  /** Close the root as failed. Publishes `task.error` for the root; no `execution.completed` follows. */
  failExecution(executionId: string, error: string): boolean {
    return this.failTask(executionId, error);
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  getNode(id: string): ExecutionNode | undefined {
    const node = this.nodes.get(id);
    return node ? { ...node } : undefined;
  }

  /** Children of a node in creation order. */
  getChildren(id: string): ExecutionNode[] {
    const ids = this.childIds.get(id) ?? [];
    const children: ExecutionNode[] = [];
    for (const childId of ids) {
      const child = this.getNode(childId);
      if (child) children.push(child);
    }
    return children;
  }

  getTree(id: string): ExecutionTreeView | undefined {
    const node = this.getNode(id);
    if (!node) return undefined;
    const children: ExecutionTreeView[] = [];
    for (const childId of this.childIds.get(id) ?? []) {
      const view = this.getTree(childId);
      if (view) children.push(view);
    }
    return { node, children };
  }

  /** Forget every node of an execution. Returns the number removed. */
  dispose(executionId: string): number {
    let removed = 0;
    for (const [id, node] of this.nodes) {
      if (node.executionId === executionId) {
        this.nodes.delete(id);
        this.childIds.delete(id);
        removed++;
      }
    }
    this.sequence.delete(executionId);
    return removed;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private live(id: string, operation: string): ExecutionNode | undefined {
    const node = this.nodes.get(id);
    if (!node) {
      this.observer?.onWarning(`Task tree: ${operation} on unknown node ignored`, { nodeId: id });
      return undefined;
    }
    if (isTerminal(node)) {
      this.observer?.onWarning(`Task tree: ${operation} on terminal node ignored`, {
        nodeId: id,
        status: node.status,
      });
      return undefined;
    }
    return node;
  }

  private finish(node: ExecutionNode, status: 'completed' | 'error'): number {
    const endedAt = this.now();
    node.status = status;
    node.endedAt = new Date(endedAt);
    return endedAt - node.startedAt.getTime();
  }

  private emit(executionId: string, payload: ExecutionEventPayload): void {
    const seq = (this.sequence.get(executionId) ?? 0) + 1;
    this.sequence.set(executionId, seq);
    if (!this.sink) return;

    const event: ExecutionEvent = Object.freeze({
      ...payload,
      executionId,
      seq,
      timestamp: new Date(this.now()),
    });

    try {
      this.sink.publish(event);
    } catch (err) {
      this.observer?.onError(toError(err), {
        phase: 'event_publish',
        executionId,
      });
    }
  }
}
