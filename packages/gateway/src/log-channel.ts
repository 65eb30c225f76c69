/**
 * LogChannel — an in-process IChannel without an external service.
 *
 * Scripts, scheduled triggers and tests inject messages with
 * `injectMessage()`; replies are kept in `sent` and handed to the optional
 * `onResponse` callback instead of going over a wire.
 */

import type {
  ChannelConfig,
  IChannel,
  InboundMessage,
  OutboundMessage,
  Recipient,
  SendResult,
} from '@switchboard/core';
import { ChannelError } from '@switchboard/core';

export interface LogChannelOptions {
  /** Channel type reported to the dispatcher. Default: "log". */
  name?: string;
  /** Called with every reply. */
  onResponse?: (recipient: Recipient, msg: OutboundMessage) => void;
}

export interface SentMessage {
  to: Recipient;
  message: OutboundMessage;
}

export class LogChannel implements IChannel {
  readonly id: string;
  readonly name: string;
  readonly sent: SentMessage[] = [];
  private messageHandler: ((msg: InboundMessage) => void) | null = null;
  private running = false;
  private readonly onResponse: LogChannelOptions['onResponse'];

  constructor(opts: LogChannelOptions = {}) {
    this.name = opts.name ?? 'log';
    this.id = `${this.name}-channel`;
    this.onResponse = opts.onResponse;
  }

  async start(_config: ChannelConfig): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
    this.messageHandler = null;
  }

  onMessage(handler: (msg: InboundMessage) => void): void {
    this.messageHandler = handler;
  }

  async send(to: Recipient, message: OutboundMessage): Promise<SendResult> {
    if (!this.running) {
      return { success: false, error: `Channel ${this.name} is not running` };
    }
    this.sent.push({ to, message });
    this.onResponse?.(to, message);
    return { success: true, messageId: `${this.id}-${this.sent.length}` };
  }

  async isHealthy(): Promise<boolean> {
    return this.running;
  }

  /** Deliver a synthetic inbound message to the registered handler. */
  injectMessage(msg: InboundMessage): void {
    if (!this.messageHandler) {
      throw new ChannelError('No message handler registered', this.name, { messageId: msg.id });
    }
    this.messageHandler(msg);
  }
}
