/**
 * IObserver — logging and telemetry contract.
 *
 * Every component reports through an observer instead of writing to the
 * console directly. Implementations live in @switchboard/observability.
 */

import type { ToolConfig, TokenUsage } from '../types/index.js';

export interface ExecutionMeta {
  executionId: string;
  channelType: string;
  channelId: string;
  userId: string;
  startedAt: Date;
}

export interface ExecutionStats {
  duration: number;
  iterations: number;
  toolsUsed: number;
  tokensUsed: number;
  status: string;
}

export interface ToolInvocationEvent {
  executionId: string;
  taskId: string;
  tool: string;
  args: unknown;
  success: boolean;
  duration: number;
  error?: string;
}

export interface ModelCallEvent {
  executionId: string;
  taskId: string;
  model: string;
  iteration: number;
  duration: number;
  usage?: TokenUsage;
  outcome: 'text' | 'tool_calls' | 'error';
}

export interface ChannelMessageEvent {
  channelType: string;
  channelId: string;
  direction: 'inbound' | 'outbound';
  userId?: string;
  messageLength: number;
  timestamp: Date;
}

export interface SecurityEvent {
  type: 'permission_denied' | 'role_enrichment' | 'grant_dropped';
  details: Record<string, unknown>;
  timestamp: Date;
}

export interface IObserver {
  onExecutionStart(meta: ExecutionMeta): void;
  onExecutionEnd(meta: ExecutionMeta, stats: ExecutionStats): void;
  onPermissionsResolved?(meta: { channelType: string; userId: string }, config: ToolConfig): void;
  onToolInvocation(event: ToolInvocationEvent): void;
  onModelCall(event: ModelCallEvent): void;
  onChannelMessage(event: ChannelMessageEvent): void;
  onSecurityEvent(event: SecurityEvent): void;
  /** Recoverable anomalies: unresolved templates, tree inconsistencies, lookup failures. */
  onWarning(message: string, context?: Record<string, unknown>): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
