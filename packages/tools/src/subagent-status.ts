/**
 * subagent_status — inspect or cancel the sub-agents of this execution.
 */

import type { ITool, SubAgentStatus, ToolContext, ToolResult, ValidationResult } from '@switchboard/core';
import { SUBAGENT_TOOL_NAMES } from '@switchboard/core';

interface StatusArgs {
  action: 'list' | 'cancel';
  taskId?: string;
}

function parseArgs(args: unknown): StatusArgs | string {
  if (args === undefined || args === null) return { action: 'list' };
  if (typeof args !== 'object' || Array.isArray(args)) return 'Arguments must be an object.';

  const action: unknown = Reflect.get(args, 'action') ?? 'list';
  const taskId: unknown = Reflect.get(args, 'taskId');
  if (action !== 'list' && action !== 'cancel') return 'action must be "list" or "cancel".';
  if (taskId !== undefined && typeof taskId !== 'string') return 'taskId must be a string.';
  if (action === 'cancel' && !taskId) return 'taskId is required to cancel a sub-agent.';
  return taskId === undefined ? { action } : { action, taskId };
}

function formatStatus(status: SubAgentStatus): string {
  const flag = status.cancelRequested && status.state === 'running' ? ' (cancelling)' : '';
  return `${status.taskId}  ${status.state}${flag}  ${status.label}`;
}

export class SubagentStatusTool implements ITool {
  readonly name = SUBAGENT_TOOL_NAMES.status;
  readonly description =
    'List the sub-agents spawned in this conversation turn, or cancel one by task id. ' +
    'A cancelled sub-agent finishes its current tool call and then stops.';

  readonly parameters: Record<string, unknown> = {
    type: 'object',
    properties: {
      action: { type: 'string', enum: ['list', 'cancel'], description: 'Default: list.' },
      taskId: { type: 'string', description: 'Sub-agent task id (required for cancel).' },
    },
    additionalProperties: false,
  };

  validate(args: unknown): ValidationResult {
    const parsed = parseArgs(args);
    return typeof parsed === 'string' ? { valid: false, errors: [parsed] } : { valid: true };
  }

  async execute(args: unknown, context: ToolContext): Promise<ToolResult> {
    const parsed = parseArgs(args);
    if (typeof parsed === 'string') {
      return { success: false, output: '', error: `Invalid arguments: ${parsed}` };
    }
    if (!context.subagents) {
      return { success: false, output: '', error: 'Sub-agents are not available at this nesting depth.' };
    }

    if (parsed.action === 'cancel') {
      const taskId = parsed.taskId ?? '';
      if (!context.subagents.cancel(taskId)) {
        return { success: false, output: '', error: `No running sub-agent with id "${taskId}".` };
      }
      return { success: true, output: `Cancellation requested for ${taskId}.` };
    }

    const statuses = context.subagents.status(parsed.taskId);
    if (statuses.length === 0) {
      return { success: true, output: 'No sub-agents.' };
    }
    return {
      success: true,
      output: statuses.map(formatStatus).join('\n'),
      metadata: { statuses },
    };
  }
}
