/**
 * @switchboard/tools — the tool registry and the sub-agent tools.
 *
 * The registry is the tool invoker the loop calls. Concrete capability tools
 * (search, shell, payments) register into it from outside; this package
 * ships only the tools that drive the sub-agent director.
 */

export { ToolRegistry } from './registry.js';

export {
  SpawnSubagentsTool,
  DEFAULT_SPAWN_TIMEOUT_S,
  MAX_SPAWN_TIMEOUT_S,
  MAX_TASKS_PER_SPAWN,
  formatResults,
  parseTasks,
  parseTimeout,
} from './spawn-subagents.js';
export { SubagentStatusTool } from './subagent-status.js';
