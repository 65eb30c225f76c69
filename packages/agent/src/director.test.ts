/**
 * Director unit tests.
 *
 * Covers sub-agent fan-out, narrowed tools, the depth limit, cancellation,
 * the spawn deadline, the concurrency bound and status reporting.
 */

import { describe, it, expect } from 'vitest';
import type {
  ICapabilityResolver,
  IModelInvoker,
  IToolInvoker,
  ModelRequest,
  ModelResponse,
  ToolConfig,
  ToolContext,
  ToolResult,
} from '@switchboard/core';
import { ModelError, SubAgentDepthError } from '@switchboard/core';
import { StaticCapabilityResolver } from './capability-resolver.js';
import { Director } from './director.js';
import type { DirectorOpts, SpawnScope } from './director.js';
import { ExecutionTracker } from './task-tracker.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type ToolHandler = (args: unknown, ctx: ToolContext) => Promise<ToolResult>;

function createTools(handlers: Record<string, ToolHandler>): IToolInvoker {
  return {
    names: () => Object.keys(handlers),
    getToolDefinitions: (filter) =>
      Object.keys(handlers)
        .filter((name) => !filter || filter.includes(name))
        .map((name) => ({ name, description: name, parameters: { type: 'object' } })),
    invoke: async (name, args, ctx) => {
      const handler = handlers[name];
      if (!handler) return { success: false, output: '', error: `Unknown tool: ${name}` };
      return handler(args, ctx);
    },
  };
}

/** Model whose answer depends on the task description (the first message). */
function modelByTask(answer: (task: string, request: ModelRequest) => Promise<ModelResponse>): IModelInvoker {
  return {
    id: 'test-model',
    invoke: (request) => answer(request.messages[0]?.content ?? '', request),
  };
}

function allow(allowList: string[]): ToolConfig {
  return { allowList, isSafeMode: true, unrestricted: false, extraSkills: [], roleNames: [] };
}

function setup(opts: Partial<DirectorOpts> & Pick<DirectorOpts, 'model' | 'tools'>) {
  const tracker = new ExecutionTracker();
  const root = tracker.startExecution();
  const director = new Director({
    tracker,
    capabilities: new StaticCapabilityResolver({ research: ['step', 'web_search'] }, ['step']),
    retryBaseMs: 1,
    ...opts,
  });
  const scope = (toolConfig: ToolConfig, depth = 0): SpawnScope => ({
    executionId: root,
    taskId: root,
    channelType: 'slack',
    userId: 'U1',
    depth,
    toolConfig,
  });
  return { tracker, root, director, scope };
}

const text = (value: string): ModelResponse => ({ type: 'text', text: value });
const step: ModelResponse = { type: 'tool_calls', toolCalls: [{ id: 'c', name: 'step', args: {} }] };

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Director', () => {
  it('returns one result per task when a child hits the iteration cap', async () => {
    const model = modelByTask(async (task) => (task === 'loop forever' ? step : text('B done')));
    const tools = createTools({ step: async () => ({ success: true, output: 'step output' }) });
    const { director, tracker, root, scope } = setup({ model, tools, maxIterations: 3 });

    const results = await director.spawn(scope(allow(['step'])), [
      { description: 'loop forever', label: 'A' },
      { description: 'finish quickly', label: 'B' },
    ]);

    expect(results.map((r) => [r.label, r.status])).toEqual([['A', 'iteration_cap'], ['B', 'completed']]);
    expect(results[0]?.output).toBe('step output');
    expect(results[1]?.output).toBe('B done');
    expect(tracker.getChildren(root).map((n) => [n.label, n.kind, n.status])).toEqual([
      ['A', 'subagent', 'completed'],
      ['B', 'subagent', 'completed'],
    ]);
  });

  it('never drops a result when a sibling fails', async () => {
    const model = modelByTask(async (task) => {
      if (task === 'explode') throw new ModelError('provider rejected the request', 'test-model', {}, false);
      return text(`done: ${task}`);
    });
    const { director, tracker, root, scope } = setup({ model, tools: createTools({}) });

    const results = await director.spawn(scope(allow([])), [
      { description: 'one', label: 'first' },
      { description: 'explode', label: 'second' },
      { description: 'three', label: 'third' },
    ]);

    expect(results).toHaveLength(3);
    expect(results.map((r) => r.status)).toEqual(['completed', 'error', 'completed']);
    expect(results[1]?.error).toBe('provider rejected the request');
    expect(results[2]?.output).toBe('done: three');
    expect(tracker.getChildren(root).map((n) => n.status)).toEqual(['completed', 'error', 'completed']);
  });

  it('reports a capability lookup failure as that task\'s error', async () => {
    const capabilities: ICapabilityResolver = {
      resolve: async (domain) => {
        if (domain === 'broken') throw new Error('capability service offline');
        return [];
      },
    };
    const model = modelByTask(async () => text('fine'));
    const { director, scope } = setup({ model, tools: createTools({}), capabilities });

    const results = await director.spawn(scope(allow([])), [
      { description: 'a', label: 'ok' },
      { description: 'b', label: 'bad', domain: 'broken' },
    ]);

    expect(results.map((r) => r.status)).toEqual(['completed', 'error']);
    expect(results[1]?.error).toBe('capability service offline');
  });

  it('limits child tools to the domain tools the caller also holds', async () => {
    const offered: string[][] = [];
    const model = modelByTask(async (_task, request) => {
      offered.push(request.tools.map((t) => t.name));
      return text('ok');
    });
    const tools = createTools({
      step: async () => ({ success: true, output: '' }),
      web_search: async () => ({ success: true, output: '' }),
      twitter_post: async () => ({ success: true, output: '' }),
    });
    const { director, scope } = setup({ model, tools });

    await director.spawn(scope(allow(['web_search', 'twitter_post'])), [
      { description: 'look it up', label: 'Research' },
    ]);

    expect(offered).toEqual([['web_search']]);
  });

  it('rejects spawns beyond the nesting limit before creating nodes', async () => {
    const model = modelByTask(async () => text('ok'));
    const { director, tracker, root, scope } = setup({ model, tools: createTools({}), maxDepth: 1 });

    await expect(director.spawn(scope(allow([]), 1), [{ description: 'x', label: 'x' }]))
      .rejects.toBeInstanceOf(SubAgentDepthError);
    expect(tracker.getChildren(root)).toEqual([]);
  });

  it('cancels a child after its current tool call', async () => {
    let director: Director | undefined;
    const model = modelByTask(async () => step);
    const tools = createTools({
      step: async (_args, ctx) => {
        director?.cancel(ctx.taskId);
        return { success: true, output: 'partial findings' };
      },
    });
    const env = setup({ model, tools });
    director = env.director;

    const [result] = await env.director.spawn(env.scope(allow(['step'])), [
      { description: 'long job', label: 'job' },
    ]);

    expect(result?.status).toBe('cancelled');
    expect(result?.output).toBe('partial findings');
    expect(env.tracker.getNode(result?.taskId ?? '')).toMatchObject({ status: 'error', error: 'cancelled' });
    expect(env.director.status(result?.taskId)).toEqual([
      { taskId: result?.taskId, label: 'job', state: 'cancelled', cancelRequested: true },
    ]);
    expect(env.director.cancel(result?.taskId ?? '')).toBe(false);
  });

  it('honours a cancel that arrives while the capability lookup is pending', async () => {
    let grant: (tools: string[]) => void = () => {};
    let lookupStarted: () => void = () => {};
    const started = new Promise<void>((resolve) => {
      lookupStarted = resolve;
    });
    const capabilities: ICapabilityResolver = {
      resolve: () => {
        lookupStarted();
        return new Promise<string[]>((resolve) => {
          grant = resolve;
        });
      },
    };
    let modelCalls = 0;
    const model = modelByTask(async () => {
      modelCalls++;
      return step;
    });
    const tools = createTools({ step: async () => ({ success: true, output: 'step output' }) });
    const { director, tracker, scope } = setup({ model, tools, capabilities, maxIterations: 5 });

    const spawning = director.spawn(scope(allow(['step'])), [{ description: 'slow lookup', label: 'job' }]);
    await started;
    const [pending] = director.status();
    expect(director.cancel(pending?.taskId ?? '')).toBe(true);
    grant(['step']);

    const [result] = await spawning;
    expect(result?.status).toBe('cancelled');
    expect(modelCalls).toBe(0);
    expect(tracker.getNode(result?.taskId ?? '')).toMatchObject({ status: 'error', error: 'cancelled' });
  });

  it('stops children still running when the spawn deadline expires', async () => {
    const model = modelByTask(async (task) => {
      if (task === 'slow') await new Promise((resolve) => setTimeout(resolve, 50));
      return text(`${task} done`);
    });
    const { director, tracker, scope } = setup({ model, tools: createTools({}) });

    const results = await director.spawn(
      scope(allow([])),
      [{ description: 'quick', label: 'quick' }, { description: 'slow', label: 'slow' }],
      { timeoutMs: 10 },
    );

    expect(results.map((r) => [r.label, r.status, r.output])).toEqual([
      ['quick', 'completed', 'quick done'],
      ['slow', 'cancelled', ''],
    ]);
    expect(results[1]?.error).toBe('Timed out after 10ms');
    const slowId = results[1]?.taskId ?? '';
    expect(tracker.getNode(slowId)).toMatchObject({ status: 'error', error: 'Timed out after 10ms' });

    // The late answer does not overwrite the timed-out state.
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(director.status(slowId)).toEqual([
      { taskId: slowId, label: 'slow', state: 'cancelled', cancelRequested: true },
    ]);
    expect(tracker.getNode(slowId)).toMatchObject({ status: 'error', error: 'Timed out after 10ms' });
  });

  it('aborts children when the spawning loop is aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    let modelCalls = 0;
    const model = modelByTask(async () => {
      modelCalls++;
      return text('never');
    });
    const { director, scope } = setup({ model, tools: createTools({}) });

    const [result] = await director.spawn(
      { ...scope(allow([])), signal: parent.signal },
      [{ description: 'x', label: 'x' }],
    );

    expect(result?.status).toBe('cancelled');
    expect(modelCalls).toBe(0);
  });

  it('bounds the number of children running at once', async () => {
    let active = 0;
    let peak = 0;
    const model = modelByTask(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return text('ok');
    });
    const { director, scope } = setup({ model, tools: createTools({}), maxConcurrency: 2 });

    const results = await director.spawn(
      scope(allow([])),
      ['a', 'b', 'c', 'd'].map((label) => ({ description: label, label })),
    );

    expect(results).toHaveLength(4);
    expect(peak).toBe(2);
  });

  it('exposes spawn, status and release through a loop-bound control', async () => {
    const model = modelByTask(async () => text('ok'));
    const { director, root } = setup({ model, tools: createTools({}) });
    const control = director.controlFor(
      { executionId: root, taskId: root, channelType: 'slack', userId: 'U1', depth: 0 },
      allow([]),
    );

    const [result] = await control.spawn([{ description: 'x', label: 'only' }]);

    expect(control.status()).toEqual([
      { taskId: result?.taskId, label: 'only', state: 'completed', cancelRequested: false },
    ]);
    director.release(root);
    expect(director.status()).toEqual([]);
  });

  it('reports children whose parent already finished', async () => {
    const model = modelByTask(async () => text('ok'));
    const { director, tracker, root, scope } = setup({ model, tools: createTools({}) });
    tracker.completeExecution(root, 'done');

    const results = await director.spawn(scope(allow([])), [{ description: 'late', label: 'late' }]);

    expect(results).toEqual([expect.objectContaining({
      status: 'error',
      error: 'The delegating task is no longer active',
    })]);
  });
});

describe('StaticCapabilityResolver', () => {
  it('maps domains case-insensitively with a default', async () => {
    const resolver = new StaticCapabilityResolver({ Research: ['web_search'] }, ['say_to_user']);

    await expect(resolver.resolve(' research ')).resolves.toEqual(['web_search']);
    await expect(resolver.resolve('finance')).resolves.toEqual(['say_to_user']);
  });
});
