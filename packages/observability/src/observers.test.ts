/**
 * Observer unit tests.
 *
 * Covers the console, JSONL file, multi and noop observers and the
 * factory that builds them from config.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { ExecutionMeta } from '@switchboard/core';
import { ConsoleObserver } from './console-observer.js';
import { createObserver } from './create-observer.js';
import { FileObserver } from './file-observer.js';
import { MultiObserver, NoopObserver } from './multi-observer.js';

const meta: ExecutionMeta = {
  executionId: 'exec-1',
  channelType: 'slack',
  channelId: 'C1',
  userId: 'U1',
  startedAt: new Date('2026-01-01T00:00:00.000Z'),
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

describe('ConsoleObserver', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes prefixed info lines to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new ConsoleObserver('info').onExecutionStart(meta);

    expect(log).toHaveBeenCalledWith('[switchboard] INFO execution exec-1 started (slack:U1)');
  });

  it('drops lines below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const observer = new ConsoleObserver('warn');
    observer.onExecutionStart(meta);
    observer.onModelCall({
      executionId: 'exec-1',
      taskId: 'exec-1',
      model: 'm',
      iteration: 1,
      duration: 3,
      outcome: 'text',
    });

    expect(log).not.toHaveBeenCalled();
  });

  it('sends warnings and errors to stderr', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const observer = new ConsoleObserver('info');

    observer.onWarning('Unresolved register', { key: 'tx' });
    observer.onError(new Error('boom'), { phase: 'dispatch' });

    expect(warn).toHaveBeenCalledWith('[switchboard] WARN Unresolved register {"key":"tx"}');
    expect(error).toHaveBeenCalledWith('[switchboard] ERROR boom {"phase":"dispatch"}');
  });

  it('logs denied tools as warnings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    new ConsoleObserver('info').onSecurityEvent({
      type: 'permission_denied',
      details: { tool: 'bash' },
      timestamp: new Date(0),
    });

    expect(warn).toHaveBeenCalledWith('[switchboard] WARN security permission_denied {"tool":"bash"}');
  });
});

// ---------------------------------------------------------------------------
// FileObserver
// ---------------------------------------------------------------------------

describe('FileObserver', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'switchboard-obs-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function readLines(path: string): Array<Record<string, unknown>> {
    return readFileSync(path, 'utf-8')
      .trim()
      .split('\n')
      .map((line): Record<string, unknown> => JSON.parse(line));
  }

  it('writes one JSON line per event on flush', async () => {
    const filePath = join(dir, 'logs', 'switchboard.jsonl');
    const observer = new FileObserver({ filePath });

    observer.onExecutionStart(meta);
    observer.onExecutionEnd(meta, { duration: 12, iterations: 2, toolsUsed: 1, tokensUsed: 30, status: 'completed' });
    observer.onWarning('careful', { key: 'x' });
    await observer.flush();

    const lines = readLines(filePath);
    expect(lines.map((l) => l.type)).toEqual(['execution_start', 'execution_end', 'warning']);
    expect(lines[0]).toMatchObject({ executionId: 'exec-1', startedAt: '2026-01-01T00:00:00.000Z' });
    expect(lines[1]).toMatchObject({ status: 'completed', duration: 12, tokensUsed: 30 });
    expect(lines[2]).toMatchObject({ message: 'careful', context: { key: 'x' } });
  });

  it('serializes errors and security events', async () => {
    const filePath = join(dir, 'app.jsonl');
    const observer = new FileObserver({ filePath });

    observer.onError(new Error('disk gone'), { phase: 'save' });
    observer.onSecurityEvent({ type: 'grant_dropped', details: { tool: 'ghost' }, timestamp: new Date(0) });
    await observer.flush();

    const [error, security] = readLines(filePath);
    expect(error).toMatchObject({ type: 'error', error: { name: 'Error', message: 'disk gone' }, context: { phase: 'save' } });
    expect(security).toMatchObject({ type: 'security_event', securityType: 'grant_dropped', details: { tool: 'ghost' } });
  });

  it('rotates the file once it reaches the size limit', async () => {
    const filePath = join(dir, 'app.jsonl');
    writeFileSync(filePath, 'x'.repeat(64));
    const observer = new FileObserver({ filePath, maxBytes: 32 });

    observer.onWarning('after rotation');
    await observer.flush();

    expect(readFileSync(`${filePath}.1`, 'utf-8')).toBe('x'.repeat(64));
    expect(readLines(filePath).map((l) => l.message)).toEqual(['after rotation']);
  });

  it('writes nothing when there is nothing buffered', async () => {
    const filePath = join(dir, 'empty.jsonl');
    await new FileObserver({ filePath }).flush();
    expect(existsSync(filePath)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// MultiObserver / createObserver
// ---------------------------------------------------------------------------

describe('MultiObserver', () => {
  it('keeps notifying the rest when one observer throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    class BrokenObserver extends NoopObserver {
      onWarning(): void {
        throw new Error('broken observer');
      }
    }
    const broken = new BrokenObserver();
    const healthy = new NoopObserver();
    const onWarning = vi.spyOn(healthy, 'onWarning');

    new MultiObserver([broken, healthy]).onWarning('hello');

    expect(onWarning).toHaveBeenCalledWith('hello', undefined);
    vi.restoreAllMocks();
  });
});

describe('createObserver', () => {
  it('returns a no-op observer when none are configured', () => {
    expect(createObserver({ observers: [], logLevel: 'info' })).toBeInstanceOf(NoopObserver);
  });

  it('returns the single configured observer', () => {
    expect(createObserver({ observers: ['console'], logLevel: 'debug' })).toBeInstanceOf(ConsoleObserver);
  });

  it('combines several observers', () => {
    const dir = mkdtempSync(join(tmpdir(), 'switchboard-obs-'));
    try {
      const observer = createObserver({
        observers: ['console', 'file'],
        logLevel: 'info',
        logFile: join(dir, 'out.jsonl'),
      });
      expect(observer).toBeInstanceOf(MultiObserver);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
