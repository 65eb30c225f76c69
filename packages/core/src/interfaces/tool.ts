/**
 * ITool / IToolInvoker — tool capability contracts.
 *
 * Tools are capabilities stored in a name-indexed registry. The invoker is the
 * only path through which the core runs a tool, so every tool result the loop
 * records comes from an actual invocation.
 */

import type {
  SubAgentResult,
  SubAgentStatus,
  SubAgentTask,
  ToolDefinition,
} from '../types/index.js';
import type { IRegisterStore } from './registers.js';

export interface ToolResult {
  success: boolean;
  output: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export interface SpawnOptions {
  /**
   * Overall bound for one spawn. Children still running when it expires are
   * stopped and reported as cancelled.
   */
  timeoutMs?: number;
}

/** Sub-agent controls exposed to tools while nesting depth allows it. */
export interface SubAgentControl {
  spawn(tasks: SubAgentTask[], opts?: SpawnOptions): Promise<SubAgentResult[]>;
  cancel(taskId: string): boolean;
  status(taskId?: string): SubAgentStatus[];
}

export interface ToolContext {
  executionId: string;
  /** Execution-tree node of the loop that issued the call. */
  taskId: string;
  channelType: string;
  userId: string;
  depth: number;
  registers: IRegisterStore;
  abortSignal: AbortSignal;
  onProgress(update: string): void;
  subagents?: SubAgentControl;
}

export interface ITool {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
  validate?(args: unknown): ValidationResult;
  execute(args: unknown, context: ToolContext): Promise<ToolResult>;
}

export interface IToolInvoker {
  /** Names of every registered tool. */
  names(): string[];
  getToolDefinitions(filterNames?: string[]): ToolDefinition[];
  invoke(name: string, args: unknown, context: ToolContext): Promise<ToolResult>;
}
