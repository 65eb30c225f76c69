/**
 * @switchboard/observability — observers and the execution event fan-out.
 */

export { ConsoleObserver } from './console-observer.js';
export { FileObserver, expandHome } from './file-observer.js';
export type { FileObserverOptions } from './file-observer.js';
export { MultiObserver, NoopObserver } from './multi-observer.js';
export { createObserver } from './create-observer.js';
export type { ObservabilityConfig } from './create-observer.js';
export { EventBroadcaster } from './event-broadcaster.js';
export type { EventBroadcasterOpts, ExecutionEventListener } from './event-broadcaster.js';
