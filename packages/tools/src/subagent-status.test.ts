/**
 * SubagentStatusTool unit tests.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { SubAgentControl, ToolContext } from '@switchboard/core';
import { SubagentStatusTool } from './subagent-status.js';

function createContext(subagents?: SubAgentControl): ToolContext {
  return {
    executionId: 'exec-1',
    taskId: 'exec-1',
    channelType: 'cli',
    userId: 'u1',
    depth: 0,
    registers: {
      set: vi.fn(),
      get: vi.fn(),
      getField: vi.fn(),
      has: vi.fn(() => false),
      expandTemplates: (text: string) => text,
    },
    abortSignal: new AbortController().signal,
    onProgress: vi.fn(),
    ...(subagents ? { subagents } : {}),
  };
}

describe('SubagentStatusTool', () => {
  const tool = new SubagentStatusTool();
  let control: SubAgentControl;

  beforeEach(() => {
    control = {
      spawn: vi.fn(async () => []),
      cancel: vi.fn((taskId: string) => taskId === 'task-1'),
      status: vi.fn(() => [
        { taskId: 'task-1', label: 'prices', state: 'running' as const, cancelRequested: true },
        { taskId: 'task-2', label: 'news', state: 'completed' as const, cancelRequested: false },
      ]),
    };
  });

  it('lists sub-agents by default', async () => {
    const res = await tool.execute({}, createContext(control));

    expect(res.output).toBe('task-1  running (cancelling)  prices\ntask-2  completed  news');
    expect(control.status).toHaveBeenCalledWith(undefined);
  });

  it('cancels a running sub-agent', async () => {
    const res = await tool.execute({ action: 'cancel', taskId: 'task-1' }, createContext(control));
    expect(res).toEqual({ success: true, output: 'Cancellation requested for task-1.' });
  });

  it('reports an unknown task id', async () => {
    const res = await tool.execute({ action: 'cancel', taskId: 'task-9' }, createContext(control));
    expect(res.error).toBe('No running sub-agent with id "task-9".');
  });

  it('validates arguments', () => {
    expect(tool.validate({ action: 'cancel' })).toEqual({
      valid: false,
      errors: ['taskId is required to cancel a sub-agent.'],
    });
    expect(tool.validate({ action: 'explode' }).valid).toBe(false);
    expect(tool.validate(undefined)).toEqual({ valid: true });
  });

  it('is unavailable without a sub-agent control', async () => {
    const res = await tool.execute({}, createContext());
    expect(res.success).toBe(false);
  });
});
