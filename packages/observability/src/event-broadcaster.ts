/**
 * EventBroadcaster — fan-out of execution-tree events.
 *
 * The tracker publishes synchronously from inside the dispatch; delivery to
 * subscribers is queued and drained on a microtask so that a slow or
 * throwing subscriber never runs inside tracker mutations. Events are
 * delivered in publish order, which keeps them ordered per execution id.
 *
 * Subscribers either listen globally or to a single execution. A subscriber
 * that throws (or rejects) is reported through the observer and keeps its
 * subscription; the other subscribers still receive the event.
 */

import type { ExecutionEvent, IObserver } from '@switchboard/core';
import { toError } from '@switchboard/core';

export type ExecutionEventListener = (event: ExecutionEvent) => void | Promise<void>;

export interface EventBroadcasterOpts {
  observer?: IObserver;
}

export class EventBroadcaster {
  private readonly global = new Set<ExecutionEventListener>();
  private readonly scoped = new Map<string, Set<ExecutionEventListener>>();
  private queue: ExecutionEvent[] = [];
  private scheduled = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly opts: EventBroadcasterOpts = {}) {}

  /** Enqueue an event for delivery. Never throws. */
  publish(event: ExecutionEvent): void {
    this.queue.push(event);
    if (this.scheduled) return;
    this.scheduled = true;
    queueMicrotask(() => this.drain());
  }

  /**
   * Listen to every event, or only to those of `executionId`.
   * Returns the unsubscribe function.
   */
  subscribe(listener: ExecutionEventListener, executionId?: string): () => void {
    if (executionId === undefined) {
      this.global.add(listener);
      return () => {
        this.global.delete(listener);
      };
    }

    let listeners = this.scoped.get(executionId);
    if (!listeners) {
      listeners = new Set();
      this.scoped.set(executionId, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.scoped.get(executionId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.scoped.delete(executionId);
    };
  }

  subscriberCount(executionId?: string): number {
    if (executionId === undefined) return this.global.size;
    return this.scoped.get(executionId)?.size ?? 0;
  }

  /** Resolves once every event published so far has been delivered. */
  idle(): Promise<void> {
    if (!this.scheduled) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  // ---- internal -----------------------------------------------------------

  private drain(): void {
    while (this.queue.length > 0) {
      const batch = this.queue;
      this.queue = [];
      for (const event of batch) this.deliver(event);
    }

    this.scheduled = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private deliver(event: ExecutionEvent): void {
    const listeners = [...this.global, ...(this.scoped.get(event.executionId) ?? [])];
    for (const listener of listeners) {
      try {
        const pending = listener(event);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => this.report(err, event));
        }
      } catch (err) {
        this.report(err, event);
      }
    }
  }

  private report(err: unknown, event: ExecutionEvent): void {
    this.opts.observer?.onError(toError(err), {
      phase: 'event_delivery',
      executionId: event.executionId,
      eventType: event.type,
      seq: event.seq,
    });
  }
}
