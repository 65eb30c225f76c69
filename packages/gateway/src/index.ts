/**
 * @switchboard/gateway — configuration, stores, the dispatcher, channel
 * bindings and the execution event stream.
 */

export { createSwitchboard } from './switchboard.js';
export type { EventStreamServer, EventStreamServerOpts, Switchboard, SwitchboardOpts } from './switchboard.js';

export { Dispatcher, RESET_REPLY, MEMORY_ONLY_REPLY } from './dispatcher.js';
export type {
  DispatcherOpts,
  DispatchResult,
  DispatchStatus,
  DispatchUsage,
  PermissionSource,
} from './dispatcher.js';

export { getConfigPath, getDefaultConfig, getHomeDir, loadConfig, parseConfig, resolveEnvVars } from './config.js';

export { InMemorySessionStore } from './session-store.js';
export { InMemoryIdentityStore } from './identity-store.js';
export { InMemoryMemoryStore } from './memory-store.js';
export { KeyedQueue } from './session-queue.js';
export { extractMemoryDirectives } from './memory-directives.js';
export type { ExtractedDirectives } from './memory-directives.js';

export { ChannelBinding, normalizeInbound } from './channel-binding.js';
export type { ChannelBindingOpts, MessageDispatcher } from './channel-binding.js';
export { LogChannel } from './log-channel.js';
export type { LogChannelOptions, SentMessage } from './log-channel.js';

export { EventStreamBridge, attachEventStream, parseClientFrame } from './event-stream.js';
export type { EventSource, EventStreamClientFrame, EventStreamServerFrame } from './event-stream.js';
