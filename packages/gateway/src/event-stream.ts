/**
 * EventStreamBridge — forwards execution-tree events to a WebSocket client.
 *
 * Responsibilities:
 *   1. Accept client frames: subscribe / unsubscribe (all executions or one)
 *      and ping
 *   2. Serialize every event of a subscribed execution as a JSON frame
 *   3. Drop all subscriptions when the socket closes or errors
 *
 * One bridge instance per connected WebSocket. `attachEventStream` creates
 * them for every connection a WebSocketServer accepts.
 */

import type { RawData, WebSocket, WebSocketServer } from 'ws';
import type { ExecutionEvent, IObserver } from '@switchboard/core';
import { toError } from '@switchboard/core';
import type { ExecutionEventListener } from '@switchboard/observability';

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

export type EventStreamClientFrame =
  | { type: 'subscribe'; executionId?: string }
  | { type: 'unsubscribe'; executionId?: string }
  | { type: 'ping' };

export type EventStreamServerFrame =
  | { type: 'event'; event: ExecutionEvent }
  | { type: 'subscribed'; executionId: string | null }
  | { type: 'unsubscribed'; executionId: string | null }
  | { type: 'pong'; timestamp: string }
  | { type: 'error'; code: 'PARSE_ERROR' | 'UNKNOWN_FRAME'; message: string };

/** Where the bridge takes events from; the EventBroadcaster fits. */
export interface EventSource {
  subscribe(listener: ExecutionEventListener, executionId?: string): () => void;
}

function decode(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

/** Validate a parsed frame; null for anything the bridge does not speak. */
export function parseClientFrame(value: unknown): EventStreamClientFrame | null {
  if (value === null || typeof value !== 'object') return null;
  const type: unknown = Reflect.get(value, 'type');
  const executionId: unknown = Reflect.get(value, 'executionId');
  if (executionId !== undefined && typeof executionId !== 'string') return null;

  switch (type) {
    case 'ping':
      return { type: 'ping' };
    case 'subscribe':
      return executionId === undefined ? { type: 'subscribe' } : { type: 'subscribe', executionId };
    case 'unsubscribe':
      return executionId === undefined ? { type: 'unsubscribe' } : { type: 'unsubscribe', executionId };
    default:
      return null;
  }
}

// ---------------------------------------------------------------------------
// EventStreamBridge
// ---------------------------------------------------------------------------

const ALL = '*';
const WS_OPEN = 1;

export class EventStreamBridge {
  private alive = false;
  /** Subscription key ("*" for all executions) → unsubscribe. */
  private readonly subscriptions = new Map<string, () => void>();
  private messageHandler: ((data: RawData) => void) | null = null;
  private closeHandler: (() => void) | null = null;
  private errorHandler: (() => void) | null = null;

  constructor(
    private readonly ws: WebSocket,
    private readonly source: EventSource,
    private readonly observer?: IObserver,
  ) {}

  /** Start handling client frames. */
  start(): void {
    if (this.alive) return;
    this.alive = true;

    this.messageHandler = (data: RawData) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(decode(data));
      } catch {
        this.send({ type: 'error', code: 'PARSE_ERROR', message: 'Invalid message format' });
        return;
      }

      const frame = parseClientFrame(parsed);
      if (!frame) {
        this.send({ type: 'error', code: 'UNKNOWN_FRAME', message: 'Unsupported frame' });
        return;
      }
      this.handleFrame(frame);
    };
    this.closeHandler = () => this.stop();
    this.errorHandler = () => this.stop();

    this.ws.on('message', this.messageHandler);
    this.ws.on('close', this.closeHandler);
    this.ws.on('error', this.errorHandler);
  }

  /** Stop forwarding, drop every subscription and remove WS listeners. */
  stop(): void {
    if (!this.alive) return;
    this.alive = false;
    for (const unsubscribe of this.subscriptions.values()) unsubscribe();
    this.subscriptions.clear();
    if (this.messageHandler) { this.ws.off('message', this.messageHandler); this.messageHandler = null; }
    if (this.closeHandler) { this.ws.off('close', this.closeHandler); this.closeHandler = null; }
    if (this.errorHandler) { this.ws.off('error', this.errorHandler); this.errorHandler = null; }
  }

  isAlive(): boolean {
    return this.alive;
  }

  /** Execution ids this client follows; "*" means all. */
  subscribedTo(): string[] {
    return [...this.subscriptions.keys()];
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private handleFrame(frame: EventStreamClientFrame): void {
    switch (frame.type) {
      case 'ping':
        this.send({ type: 'pong', timestamp: new Date().toISOString() });
        break;

      case 'subscribe': {
        const key = frame.executionId ?? ALL;
        if (!this.subscriptions.has(key)) {
          const forward = (event: ExecutionEvent) => this.send({ type: 'event', event });
          this.subscriptions.set(key, this.source.subscribe(forward, frame.executionId));
        }
        this.send({ type: 'subscribed', executionId: frame.executionId ?? null });
        break;
      }

      case 'unsubscribe': {
        const key = frame.executionId ?? ALL;
        this.subscriptions.get(key)?.();
        this.subscriptions.delete(key);
        this.send({ type: 'unsubscribed', executionId: frame.executionId ?? null });
        break;
      }
    }
  }

  private send(frame: EventStreamServerFrame): void {
    if (!this.alive || this.ws.readyState !== WS_OPEN) return;
    try {
      this.ws.send(JSON.stringify(frame));
    } catch (err) {
      this.observer?.onError(toError(err), {
        phase: 'event_stream_send',
        frame: frame.type,
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Server wiring
// ---------------------------------------------------------------------------

/**
 * Bridge every connection of `wss` to `source`. Returns a function that
 * stops listening for new connections and closes the open bridges.
 */
export function attachEventStream(
  wss: WebSocketServer,
  source: EventSource,
  observer?: IObserver,
): () => void {
  const bridges = new Set<EventStreamBridge>();

  const onConnection = (ws: WebSocket) => {
    const bridge = new EventStreamBridge(ws, source, observer);
    bridges.add(bridge);
    ws.once('close', () => bridges.delete(bridge));
    bridge.start();
  };

  wss.on('connection', onConnection);

  return () => {
    wss.off('connection', onConnection);
    for (const bridge of bridges) bridge.stop();
    bridges.clear();
  };
}
