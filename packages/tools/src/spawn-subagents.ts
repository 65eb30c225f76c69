/**
 * spawn_subagents — delegate independent pieces of work to sub-agents.
 *
 * Each task runs as its own tool loop under the calling task's node, with
 * the tools of its capability domain (never more than the caller holds).
 * The call blocks until every sub-agent is done and reports one entry per
 * task, in order:
 *
 *   - Multiple tasks in a single invocation
 *   - Partial failure tolerance (every task gets a result)
 *   - Structured result aggregation
 *   - An overall timeout (default 600s) after which unfinished sub-agents
 *     are stopped and reported as cancelled
 *
 * Available only where the loop hands the tool a sub-agent control, i.e.
 * above the nesting limit.
 */

import type {
  ITool,
  SubAgentResult,
  SubAgentTask,
  ToolContext,
  ToolResult,
  ValidationResult,
} from '@switchboard/core';
import { SUBAGENT_TOOL_NAMES, SubAgentDepthError } from '@switchboard/core';

export const MAX_TASKS_PER_SPAWN = 10;
/** Seconds a spawn may run before unfinished sub-agents are stopped. */
export const DEFAULT_SPAWN_TIMEOUT_S = 600;
export const MAX_SPAWN_TIMEOUT_S = 3600;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse tool arguments into tasks, collecting every problem. */
export function parseTasks(args: unknown): { tasks: SubAgentTask[]; errors: string[] } {
  const errors: string[] = [];
  const tasks: SubAgentTask[] = [];

  if (!isRecord(args)) {
    return { tasks, errors: ['Arguments must be an object.'] };
  }

  const raw = args['tasks'];
  if (!Array.isArray(raw) || raw.length === 0) {
    return { tasks, errors: ['tasks must be a non-empty array.'] };
  }
  if (raw.length > MAX_TASKS_PER_SPAWN) {
    errors.push(`At most ${MAX_TASKS_PER_SPAWN} tasks can be spawned at once.`);
  }

  raw.forEach((item: unknown, i) => {
    if (!isRecord(item)) {
      errors.push(`tasks[${i}] must be an object.`);
      return;
    }
    const { description, label, domain } = item;
    if (typeof description !== 'string' || description.trim().length === 0) {
      errors.push(`tasks[${i}].description must be a non-empty string.`);
    }
    if (typeof label !== 'string' || label.trim().length === 0) {
      errors.push(`tasks[${i}].label must be a non-empty string.`);
    }
    if (domain !== undefined && typeof domain !== 'string') {
      errors.push(`tasks[${i}].domain must be a string.`);
    }
    if (typeof description === 'string' && typeof label === 'string') {
      tasks.push({
        description: description.trim(),
        label: label.trim(),
        ...(typeof domain === 'string' ? { domain } : {}),
      });
    }
  });

  return { tasks, errors };
}

/** The optional `timeout` argument in milliseconds, or an error message. */
export function parseTimeout(args: unknown): { timeoutMs: number } | { error: string } {
  const raw = isRecord(args) ? args['timeout'] : undefined;
  if (raw === undefined) return { timeoutMs: DEFAULT_SPAWN_TIMEOUT_S * 1000 };
  if (typeof raw !== 'number' || !Number.isFinite(raw) || raw < 1 || raw > MAX_SPAWN_TIMEOUT_S) {
    return { error: `timeout must be a number of seconds between 1 and ${MAX_SPAWN_TIMEOUT_S}.` };
  }
  return { timeoutMs: Math.round(raw * 1000) };
}

/** Render results the way the model reads them back. */
export function formatResults(results: SubAgentResult[]): string {
  const finished = results.filter((r) => r.status === 'completed').length;
  const summary = `${finished}/${results.length} sub-agents completed` +
    (finished < results.length ? ` (${results.length - finished} did not)` : '');

  const blocks = results.map((r, i) => {
    const header = `[${r.status}] Task ${i + 1}: ${r.label}`;
    const stats = `    Tools: ${r.toolsUsed.length}, tokens: ${r.tokensUsed} (${r.durationMs}ms)`;
    let body: string;
    if (r.status === 'error') {
      body = `    Error: ${r.error ?? 'unknown error'}`;
    } else if (!r.output && r.error) {
      body = `    Stopped: ${r.error}`;
    } else {
      body = r.output.split('\n').map((l) => `    ${l}`).join('\n');
    }
    return `${header}\n${stats}\n${body}`;
  });

  return `${summary}\n\n${blocks.join('\n\n')}`;
}

export class SpawnSubagentsTool implements ITool {
  readonly name = SUBAGENT_TOOL_NAMES.spawn;
  readonly description =
    'Delegate independent tasks to sub-agents that run in parallel. Each task needs a ' +
    'self-contained description and a short label; the label (or the optional domain) ' +
    'selects the tools the sub-agent may use. Returns one result per task.';

  readonly parameters: Record<string, unknown> = {
    type: 'object',
    properties: {
      tasks: {
        type: 'array',
        minItems: 1,
        maxItems: MAX_TASKS_PER_SPAWN,
        items: {
          type: 'object',
          properties: {
            description: { type: 'string', description: 'What the sub-agent should do.', minLength: 1 },
            label: { type: 'string', description: 'Short name shown in the task tree.', minLength: 1 },
            domain: { type: 'string', description: 'Capability domain (defaults to the label).' },
          },
          required: ['description', 'label'],
          additionalProperties: false,
        },
      },
      timeout: {
        type: 'number',
        description: `Seconds to wait for all sub-agents (default ${DEFAULT_SPAWN_TIMEOUT_S}, max ${MAX_SPAWN_TIMEOUT_S}). ` +
          'Sub-agents still running then are stopped.',
      },
    },
    required: ['tasks'],
    additionalProperties: false,
  };

  validate(args: unknown): ValidationResult {
    const errors = this.problems(args);
    return errors.length > 0 ? { valid: false, errors } : { valid: true };
  }

  async execute(args: unknown, context: ToolContext): Promise<ToolResult> {
    const { tasks } = parseTasks(args);
    const timeout = parseTimeout(args);
    const errors = this.problems(args);
    if (errors.length > 0 || 'error' in timeout) {
      return { success: false, output: '', error: `Invalid arguments: ${errors.join(' ')}` };
    }

    if (!context.subagents) {
      return { success: false, output: '', error: 'Sub-agents are not available at this nesting depth.' };
    }

    if (context.abortSignal.aborted) {
      return { success: false, output: '', error: 'Sub-agent spawn aborted before start.' };
    }

    context.onProgress(`Spawning ${tasks.length} sub-agent(s)`);

    let results: SubAgentResult[];
    try {
      results = await context.subagents.spawn(tasks, { timeoutMs: timeout.timeoutMs });
    } catch (err) {
      if (err instanceof SubAgentDepthError) {
        return { success: false, output: '', error: err.message };
      }
      throw err;
    }

    const failed = results.filter((r) => r.status === 'error').length;
    return {
      success: failed < results.length,
      output: formatResults(results),
      metadata: {
        total: results.length,
        failed,
        results: results.map((r) => ({
          taskId: r.taskId,
          label: r.label,
          status: r.status,
          durationMs: r.durationMs,
          error: r.error,
        })),
      },
    };
  }

  private problems(args: unknown): string[] {
    const { errors } = parseTasks(args);
    const timeout = parseTimeout(args);
    return 'error' in timeout ? [...errors, timeout.error] : errors;
  }
}
