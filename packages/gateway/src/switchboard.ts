/**
 * createSwitchboard — assembles a running engine from a configuration.
 *
 * Wires the observer chain, the event broadcaster, the execution tracker,
 * the permission resolver, the sub-agent director and the dispatcher. Stores
 * default to the in-memory implementations; pass persistent ones to replace
 * them.
 */

import { once } from 'node:events';
import { WebSocketServer } from 'ws';
import type {
  IChannel,
  IIdentityStore,
  IMemoryStore,
  IModelInvoker,
  IObserver,
  IRoleStore,
  ISessionStore,
  ISkillCatalog,
  SwitchboardConfig,
} from '@switchboard/core';
import { SUBAGENT_TOOL_NAMES } from '@switchboard/core';
import { Director, ExecutionTracker, StaticCapabilityResolver } from '@switchboard/agent';
import { createObserver, EventBroadcaster } from '@switchboard/observability';
import { InMemoryRoleStore, ToolPermissionResolver } from '@switchboard/security';
import { SpawnSubagentsTool, SubagentStatusTool, ToolRegistry } from '@switchboard/tools';
import { ChannelBinding } from './channel-binding.js';
import { Dispatcher } from './dispatcher.js';
import { attachEventStream } from './event-stream.js';
import { InMemoryIdentityStore } from './identity-store.js';
import { InMemoryMemoryStore } from './memory-store.js';
import { InMemorySessionStore } from './session-store.js';

export interface SwitchboardOpts {
  config: SwitchboardConfig;
  model: IModelInvoker;
  /** Capability tools. The sub-agent tools are added when sub-agents are enabled. */
  tools?: ToolRegistry;
  roles?: IRoleStore;
  skills?: ISkillCatalog;
  identities?: IIdentityStore;
  sessions?: ISessionStore;
  memory?: IMemoryStore;
  /** Replaces the observers built from `config.observability`. */
  observer?: IObserver;
  retryBaseMs?: number;
}

export interface Switchboard {
  readonly dispatcher: Dispatcher;
  readonly broadcaster: EventBroadcaster;
  readonly tracker: ExecutionTracker;
  readonly tools: ToolRegistry;
  readonly observer: IObserver;
  readonly director: Director | null;
  /** Bind a channel and start it. */
  bindChannel(channel: IChannel, opts?: { forceSafeMode?: boolean }): Promise<ChannelBinding>;
  /** Serve execution events to WebSocket clients. */
  serveEventStream(opts: EventStreamServerOpts): Promise<EventStreamServer>;
  /** Stop every bound channel and event stream server, then flush the observers. */
  shutdown(): Promise<void>;
}

export interface EventStreamServerOpts {
  /** 0 picks a free port. */
  port: number;
  host?: string;
}

export interface EventStreamServer {
  readonly port: number;
  close(): Promise<void>;
}

export function createSwitchboard(opts: SwitchboardOpts): Switchboard {
  const { config, model } = opts;
  const observer = opts.observer ?? createObserver(config.observability);
  const broadcaster = new EventBroadcaster({ observer });
  const tracker = new ExecutionTracker({ sink: broadcaster, observer });
  const tools = opts.tools ?? new ToolRegistry();

  let director: Director | null = null;
  if (config.subagents.enabled) {
    if (!tools.has(SUBAGENT_TOOL_NAMES.spawn)) tools.register(new SpawnSubagentsTool());
    if (!tools.has(SUBAGENT_TOOL_NAMES.status)) tools.register(new SubagentStatusTool());
    director = new Director({
      model,
      tools,
      tracker,
      observer,
      capabilities: new StaticCapabilityResolver(config.subagents.domains, config.subagents.defaultTools),
      maxDepth: config.subagents.maxDepth,
      maxConcurrency: config.subagents.maxConcurrency,
      maxIterations: config.subagents.maxIterations,
      maxRetries: config.agent.maxRetries,
      retryBaseMs: opts.retryBaseMs,
    });
  }

  const permissions = new ToolPermissionResolver({
    safeModeTools: config.permissions.safeModeTools,
    registry: tools,
    roles: opts.roles ?? new InMemoryRoleStore(),
    skills: opts.skills,
    observer,
  });

  const dispatcher = new Dispatcher({
    config,
    model,
    tools,
    permissions,
    tracker,
    observer,
    identities: opts.identities ?? new InMemoryIdentityStore(),
    sessions: opts.sessions ?? new InMemorySessionStore(),
    memory: opts.memory ?? new InMemoryMemoryStore(),
    spawner: director ?? undefined,
    retryBaseMs: opts.retryBaseMs,
  });

  const bindings: ChannelBinding[] = [];
  const servers: EventStreamServer[] = [];

  return {
    dispatcher,
    broadcaster,
    tracker,
    tools,
    observer,
    director,

    async bindChannel(channel, bindOpts = {}) {
      const binding = new ChannelBinding({
        channel,
        dispatcher,
        observer,
        forceSafeMode: bindOpts.forceSafeMode,
      });
      await binding.start();
      bindings.push(binding);
      return binding;
    },

    async serveEventStream({ port, host = '127.0.0.1' }) {
      const wss = new WebSocketServer({ port, host });
      await once(wss, 'listening');
      const detach = attachEventStream(wss, broadcaster, observer);
      const address = wss.address();

      const server: EventStreamServer = {
        port: typeof address === 'string' ? port : address.port,
        close: async () => {
          detach();
          for (const client of wss.clients) client.terminate();
          await new Promise<void>((resolve, reject) => {
            wss.close((err) => (err ? reject(err) : resolve()));
          });
        },
      };
      servers.push(server);
      return server;
    },

    async shutdown() {
      await Promise.allSettled(bindings.map((b) => b.stop()));
      bindings.length = 0;
      await Promise.allSettled(servers.map((s) => s.close()));
      servers.length = 0;
      await broadcaster.idle();
      await observer.flush?.();
    },
  };
}
