/**
 * Shared types used across all switchboard packages.
 */

// === JSON ===

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// === Model messages ===

export type MessageRole = 'user' | 'assistant' | 'system' | 'tool';

export interface Message {
  role: MessageRole;
  content: string;
  name?: string;
  toolCallId?: string;
  toolCalls?: ToolCall[];
}

export interface ToolCall {
  id: string;
  name: string;
  args: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

// === Inbound messages ===

/** A channel message after normalization. Consumed once by the dispatcher. */
export interface NormalizedMessage {
  readonly channelType: string;
  readonly channelId: string;
  readonly userId: string;
  readonly username: string;
  readonly content: string;
  readonly receivedAt: Date;
  readonly messageId?: string;
  /** Treat the sender as non-admin regardless of configuration. */
  readonly forceSafeMode?: boolean;
}

// === Identity & sessions ===

export interface IdentityLink {
  channelType: string;
  userId: string;
}

export interface Identity {
  identityId: string;
  displayName?: string;
  links: IdentityLink[];
  createdAt: Date;
}

export type SessionEntryRole = 'user' | 'assistant' | 'tool_call' | 'tool_result';

export interface SessionEntry {
  role: SessionEntryRole;
  content: string;
  toolName?: string;
  toolCallId?: string;
  userId?: string;
  timestamp: Date;
}

export interface Session {
  sessionId: string;
  channelType: string;
  channelId: string;
  createdAt: Date;
  entries: readonly SessionEntry[];
}

// === Memory ===

export type MemoryKind = 'daily_log' | 'long_term';

export interface MemoryDirective {
  kind: MemoryKind;
  content: string;
  /** 1-10; higher is more important. */
  importance: number;
}

export interface MemoryRecord extends MemoryDirective {
  id: string;
  identityId: string;
  sessionId?: string;
  channelType?: string;
  createdAt: Date;
}

// === Permissions ===

export interface SpecialRole {
  name: string;
  allowedTools: string[];
  allowedSkills: string[];
  description?: string;
}

export interface SpecialRoleAssignment {
  channelType: string;
  userId: string;
  roleName: string;
}

/** Resolved permission set for one dispatch. Never persisted. */
export interface ToolConfig {
  allowList: string[];
  isSafeMode: boolean;
  /** True for admins: every registered tool is allowed. */
  unrestricted: boolean;
  extraSkills: string[];
  roleNames: string[];
}

// === Execution tree ===

export type ExecutionNodeKind = 'execution' | 'task' | 'subagent';
export type ExecutionNodeStatus = 'pending' | 'in_progress' | 'completed' | 'error';

export interface ExecutionNode {
  id: string;
  parentId: string | null;
  executionId: string;
  kind: ExecutionNodeKind;
  status: ExecutionNodeStatus;
  label: string;
  activeForm?: string;
  startedAt: Date;
  endedAt?: Date;
  toolsCount: number;
  tokensUsed: number;
  error?: string;
}

export type ExecutionEventPayload =
  | { type: 'execution.started'; label: string }
  | { type: 'execution.thinking'; activeForm: string }
  | { type: 'task.started'; id: string; parentId: string | null; label: string; kind: ExecutionNodeKind }
  | { type: 'task.updated'; id: string; toolsCount?: number; tokensUsed?: number; activeForm?: string }
  | { type: 'task.completed'; id: string; duration: number }
  | { type: 'task.error'; id: string; error: string }
  | { type: 'execution.completed'; duration: number; finalText: string };

export type ExecutionEventType = ExecutionEventPayload['type'];

export type ExecutionEvent = Readonly<ExecutionEventPayload & {
  executionId: string;
  /** Monotonic per execution id. */
  seq: number;
  timestamp: Date;
}>;

// === Sub-agents ===

export interface SubAgentTask {
  description: string;
  label: string;
  /** Capability domain; defaults to the label. */
  domain?: string;
}

export type SubAgentOutcome = 'completed' | 'iteration_cap' | 'cancelled' | 'error';

export interface SubAgentResult {
  taskId: string;
  label: string;
  status: SubAgentOutcome;
  output: string;
  error?: string;
  toolsUsed: string[];
  tokensUsed: number;
  durationMs: number;
}

/** Tools that drive the Director; hidden from loops that may not spawn. */
export const SUBAGENT_TOOL_NAMES = {
  spawn: 'spawn_subagents',
  status: 'subagent_status',
} as const;

export interface SubAgentStatus {
  taskId: string;
  label: string;
  state: 'running' | SubAgentOutcome;
  cancelRequested: boolean;
}

// === Configuration ===

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SwitchboardConfig {
  agent: {
    /** Model-call rounds before a forced stop. Default: 10. */
    maxIterations: number;
    /** Consecutive model failures tolerated before a degraded answer. Default: 3. */
    maxRetries: number;
    /** Session entries replayed into the model context. Default: 20. */
    historyLimit: number;
    systemPrompt?: string;
    /** Wall-clock bound for one dispatch. Unset means no timeout. */
    timeoutMs?: number;
  };
  permissions: {
    /** Tools every non-admin user may call. */
    safeModeTools: string[];
    /** "channelType:userId" entries treated as administrators. */
    admins: string[];
  };
  subagents: {
    enabled: boolean;
    /** Nesting levels below the top-level loop. Default: 1. */
    maxDepth: number;
    maxConcurrency: number;
    maxIterations: number;
    /** Capability domain → tool names. */
    domains: Record<string, string[]>;
    /** Tools for domains that are not listed. */
    defaultTools: string[];
  };
  memory: {
    enabled: boolean;
    recallLimit: number;
  };
  observability: {
    observers: Array<'console' | 'file'>;
    logLevel: LogLevel;
    /** JSONL path for the file observer. Supports ~/ expansion. */
    logFile?: string;
  };
}
