/**
 * @switchboard/agent — execution runtime.
 *
 * Register store, execution tracker, the bounded tool loop and the
 * sub-agent director.
 */

export { RegisterStore, toDisplayString } from './register-store.js';
export type { RegisterEntry, RegisterStoreOpts } from './register-store.js';

export { ExecutionTracker } from './task-tracker.js';
export type {
  ExecutionEventSink,
  ExecutionTrackerOpts,
  ExecutionTreeView,
  TaskUpdate,
} from './task-tracker.js';

export {
  ToolLoop,
  ITERATION_CAP_NOTICE,
  MODEL_UNAVAILABLE_NOTICE,
  CANCELLED_NOTICE,
  NO_ANSWER_NOTICE,
} from './tool-loop.js';
export type {
  LoopScope,
  SubAgentSpawner,
  ToolLoopOpts,
  ToolLoopResult,
  ToolLoopStatus,
} from './tool-loop.js';

export { Director } from './director.js';
export type { DirectorOpts, SpawnScope } from './director.js';

export { StaticCapabilityResolver } from './capability-resolver.js';
