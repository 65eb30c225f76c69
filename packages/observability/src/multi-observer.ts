/**
 * MultiObserver fans every call out to a list of observers. One observer
 * throwing does not keep the others from seeing the event.
 */

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

export class MultiObserver implements IObserver {
  constructor(private readonly observers: IObserver[]) {}

  private each(fn: (observer: IObserver) => void): void {
    for (const observer of this.observers) {
      try {
        fn(observer);
      } catch (err) {
        console.error(`[switchboard] observer failed: ${toError(err).message}`);
      }
    }
  }

  onExecutionStart(meta: ExecutionMeta): void {
    this.each((o) => o.onExecutionStart(meta));
  }

  onExecutionEnd(meta: ExecutionMeta, stats: ExecutionStats): void {
    this.each((o) => o.onExecutionEnd(meta, stats));
  }

  onPermissionsResolved(meta: { channelType: string; userId: string }, config: ToolConfig): void {
    this.each((o) => o.onPermissionsResolved?.(meta, config));
  }

  onToolInvocation(event: ToolInvocationEvent): void {
    this.each((o) => o.onToolInvocation(event));
  }

  onModelCall(event: ModelCallEvent): void {
    this.each((o) => o.onModelCall(event));
  }

  onChannelMessage(event: ChannelMessageEvent): void {
    this.each((o) => o.onChannelMessage(event));
  }

  onSecurityEvent(event: SecurityEvent): void {
    this.each((o) => o.onSecurityEvent(event));
  }

  onWarning(message: string, context?: Record<string, unknown>): void {
    this.each((o) => o.onWarning(message, context));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.each((o) => o.onError(error, context));
  }

  async flush(): Promise<void> {
    await Promise.all(this.observers.map((o) => o.flush?.()));
  }
}

/** Observer that discards everything. */
export class NoopObserver implements IObserver {
  onExecutionStart(): void {}
  onExecutionEnd(): void {}
  onToolInvocation(): void {}
  onModelCall(): void {}
  onChannelMessage(): void {}
  onSecurityEvent(): void {}
  onWarning(): void {}
  onError(): void {}
}
