/**
 * IChannel — messaging channel contract
 *
 * Telegram, Discord, Slack and web chat adapters implement this outside the
 * core. The gateway binds a channel to the dispatcher: inbound messages are
 * normalized and dispatched, replies are sent back through `send()`.
 */

export interface ChannelConfig {
  [key: string]: unknown;
}

export interface Recipient {
  channelId: string;
  userId?: string;
  groupId?: string;
  threadId?: string;
}

export interface InboundMessage {
  id: string;
  channelId: string;
  from: Recipient & { name?: string };
  text: string;
  replyTo?: string;
  timestamp: Date;
  raw?: unknown;
}

export interface OutboundMessage {
  text: string;
  replyTo?: string;
  format?: 'text' | 'markdown' | 'html';
}

export interface SendResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface IChannel {
  readonly id: string;
  /** Channel type used for identity and permission lookups, e.g. "telegram". */
  readonly name: string;

  start(config: ChannelConfig): Promise<void>;
  stop(): Promise<void>;
  send(to: Recipient, message: OutboundMessage): Promise<SendResult>;
  onMessage(handler: (msg: InboundMessage) => void): void;
  isHealthy(): Promise<boolean>;
}
