/**
 * Structured error types for switchboard.
 */

export class SwitchboardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'SwitchboardError';
  }
}

/** A tool was requested that is not in the caller's allow list. */
export class PermissionDeniedError extends SwitchboardError {
  constructor(message: string, public readonly tool: string, context?: Record<string, unknown>) {
    super(message, 'PERMISSION_DENIED', { ...context, tool });
    this.name = 'PermissionDeniedError';
  }
}

export class ToolError extends SwitchboardError {
  constructor(message: string, public readonly tool: string, context?: Record<string, unknown>) {
    super(message, 'TOOL_ERROR', { ...context, tool });
    this.name = 'ToolError';
  }
}

export class ModelError extends SwitchboardError {
  public readonly retryable: boolean;

  constructor(
    message: string,
    public readonly model: string,
    context?: Record<string, unknown>,
    retryable = true,
  ) {
    super(message, 'MODEL_ERROR', { ...context, model });
    this.name = 'ModelError';
    this.retryable = retryable;
  }
}

/** A register or permission lookup could not be completed. Never fatal. */
export class LookupError extends SwitchboardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LOOKUP_ERROR', context);
    this.name = 'LookupError';
  }
}

export class TaskTreeError extends SwitchboardError {
  constructor(message: string, public readonly nodeId: string, context?: Record<string, unknown>) {
    super(message, 'TASK_TREE_ERROR', { ...context, nodeId });
    this.name = 'TaskTreeError';
  }
}

export class SubAgentDepthError extends SwitchboardError {
  constructor(public readonly depth: number, public readonly maxDepth: number) {
    super(
      `Sub-agent nesting depth ${depth} exceeds the maximum of ${maxDepth}`,
      'SUBAGENT_DEPTH_EXCEEDED',
      { depth, maxDepth },
    );
    this.name = 'SubAgentDepthError';
  }
}

/** Identity or session resolution failed; the dispatch is aborted. */
export class DispatchError extends SwitchboardError {
  constructor(
    message: string,
    public readonly stage: 'identity' | 'session' | 'permissions',
    context?: Record<string, unknown>,
  ) {
    super(message, 'DISPATCH_ERROR', { ...context, stage });
    this.name = 'DispatchError';
  }
}

export class ChannelError extends SwitchboardError {
  constructor(message: string, public readonly channel: string, context?: Record<string, unknown>) {
    super(message, 'CHANNEL_ERROR', { ...context, channel });
    this.name = 'ChannelError';
  }
}

export class ConfigError extends SwitchboardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Normalise an unknown thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
