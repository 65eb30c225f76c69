/**
 * Tool registry — name-indexed tools and the invoker the tool loop calls.
 *
 * The registry maps tool names to ITool instances and converts them to
 * ToolDefinition[] for the model. `invoke()` is the only path through which
 * a tool runs: it validates the arguments, executes the tool and turns every
 * failure (unknown name, invalid arguments, a throw) into a failed
 * ToolResult carrying the error message.
 */

import type {
  ITool,
  IToolInvoker,
  ToolContext,
  ToolDefinition,
  ToolResult,
  ValidationResult,
} from '@switchboard/core';
import { ToolError, toError } from '@switchboard/core';

export class ToolRegistry implements IToolInvoker {
  private readonly tools = new Map<string, ITool>();

  /**
   * Register a tool. Throws if a tool with the same name is already registered.
   */
  register(tool: ITool): void {
    if (this.tools.has(tool.name)) {
      throw new ToolError(
        `Tool "${tool.name}" is already registered.`,
        tool.name,
      );
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ITool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ITool[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Unregister a tool by name. Returns true if removed, false if not found.
   */
  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  /**
   * Convert registered tools to ToolDefinition[] for the model, optionally
   * limited to the given names. Registration order is kept.
   */
  getToolDefinitions(filterNames?: string[]): ToolDefinition[] {
    const tools = filterNames
      ? this.list().filter((t) => filterNames.includes(t.name))
      : this.list();

    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
  }

  async invoke(name: string, args: unknown, context: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { success: false, output: '', error: `Tool "${name}" not found.` };
    }

    const validation = validateArgs(tool, args);
    if (!validation.valid) {
      return {
        success: false,
        output: '',
        error: `Invalid arguments for tool "${name}": ${(validation.errors ?? ['validation failed']).join(' ')}`,
      };
    }

    try {
      return await tool.execute(args, context);
    } catch (err) {
      return { success: false, output: '', error: toError(err).message };
    }
  }

  get size(): number {
    return this.tools.size;
  }
}

/**
 * The tool's own validate() when it has one; otherwise arguments must be an
 * object (or absent, for tools without parameters).
 */
function validateArgs(tool: ITool, args: unknown): ValidationResult {
  if (tool.validate) return tool.validate(args);
  if (args === undefined || args === null) return { valid: true };
  if (typeof args !== 'object' || Array.isArray(args)) {
    return { valid: false, errors: ['Arguments must be an object.'] };
  }
  return { valid: true };
}
