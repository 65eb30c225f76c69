/**
 * ChannelBinding — connects one IChannel to the dispatcher.
 *
 * Inbound channel messages are normalized and dispatched; the reply (or a
 * short error when the dispatch could not start) is sent back to the
 * sender through the same channel.
 */

import type {
  ChannelConfig,
  IChannel,
  IObserver,
  InboundMessage,
  NormalizedMessage,
  Recipient,
} from '@switchboard/core';
import { ChannelError, toError } from '@switchboard/core';
import type { DispatchResult } from './dispatcher.js';

export interface MessageDispatcher {
  dispatch(message: NormalizedMessage): Promise<DispatchResult>;
}

export interface ChannelBindingOpts {
  channel: IChannel;
  dispatcher: MessageDispatcher;
  observer?: IObserver;
  /** Treat every sender on this channel as non-admin. */
  forceSafeMode?: boolean;
}

/** Map a channel's inbound message onto the dispatcher's input. */
export function normalizeInbound(
  channelType: string,
  msg: InboundMessage,
  forceSafeMode = false,
): NormalizedMessage {
  const userId = msg.from.userId ?? 'anonymous';
  return {
    channelType,
    channelId: msg.channelId,
    userId,
    username: msg.from.name ?? userId,
    content: msg.text,
    receivedAt: msg.timestamp,
    messageId: msg.id,
    ...(forceSafeMode ? { forceSafeMode } : {}),
  };
}

export function errorReply(result: Extract<DispatchResult, { success: false }>): string {
  return `Sorry, I could not process that message (${result.error.code}).`;
}

export class ChannelBinding {
  private readonly opts: ChannelBindingOpts;
  private readonly pending = new Set<Promise<void>>();

  constructor(opts: ChannelBindingOpts) {
    this.opts = opts;
  }

  async start(config: ChannelConfig = {}): Promise<void> {
    this.opts.channel.onMessage((msg) => {
      const task = this.handle(msg);
      this.pending.add(task);
      void task.finally(() => this.pending.delete(task));
    });
    await this.opts.channel.start(config);
  }

  async stop(): Promise<void> {
    await this.idle();
    await this.opts.channel.stop();
  }

  /** Resolves once every message received so far has been answered. */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  /** Dispatch one message and send the reply. Never rejects. */
  async handle(msg: InboundMessage): Promise<void> {
    const { channel, dispatcher, observer } = this.opts;

    let result: DispatchResult;
    try {
      result = await dispatcher.dispatch(normalizeInbound(channel.name, msg, this.opts.forceSafeMode));
    } catch (err) {
      observer?.onError(toError(err), { phase: 'dispatch', channel: channel.name, messageId: msg.id });
      result = { success: false, error: { code: 'DISPATCH_ERROR', message: toError(err).message } };
    }

    const recipient: Recipient = { ...msg.from };
    const text = result.success ? result.text : errorReply(result);
    try {
      const sent = await channel.send(recipient, { text, replyTo: msg.id });
      if (!sent.success) {
        throw new ChannelError(sent.error ?? 'Send failed', channel.name, { messageId: msg.id });
      }
    } catch (err) {
      observer?.onError(toError(err), { phase: 'channel_send', channel: channel.name, messageId: msg.id });
    }
  }
}
