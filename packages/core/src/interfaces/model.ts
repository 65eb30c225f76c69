/**
 * IModelInvoker — AI provider contract.
 *
 * A provider receives the conversation and the tools the caller may use, and
 * answers with either final text or a batch of tool calls. HTTP clients for
 * concrete providers implement this outside the core.
 */

import type { Message, TokenUsage, ToolCall, ToolDefinition } from '../types/index.js';

export interface ModelRequest {
  messages: Message[];
  tools: ToolDefinition[];
  systemPrompt?: string;
}

export type ModelResponse =
  | { type: 'text'; text: string; usage?: TokenUsage }
  | { type: 'tool_calls'; toolCalls: ToolCall[]; text?: string; usage?: TokenUsage };

export interface ModelInvokeOpts {
  signal?: AbortSignal;
}

export interface IModelInvoker {
  readonly id: string;
  invoke(request: ModelRequest, opts?: ModelInvokeOpts): Promise<ModelResponse>;
}
