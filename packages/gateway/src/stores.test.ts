/**
 * Tests for the in-memory stores and the per-session queue.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { SessionEntry } from '@switchboard/core';
import { LookupError, SwitchboardError } from '@switchboard/core';
import { InMemoryIdentityStore } from './identity-store.js';
import { InMemoryMemoryStore } from './memory-store.js';
import { KeyedQueue } from './session-queue.js';
import { InMemorySessionStore } from './session-store.js';

const at = new Date('2026-04-01T12:00:00.000Z');

function entry(role: SessionEntry['role'], content: string): SessionEntry {
  return { role, content, timestamp: at };
}

// ===========================================================================
// InMemorySessionStore
// ===========================================================================

describe('InMemorySessionStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the same session for the same channel', async () => {
    const store = new InMemorySessionStore();
    const a = await store.getOrCreate('slack', 'C1');
    const b = await store.getOrCreate('slack', 'C1');
    const c = await store.getOrCreate('discord', 'C1');

    expect(b.sessionId).toBe(a.sessionId);
    expect(c.sessionId).not.toBe(a.sessionId);
    expect(store.size).toBe(2);
  });

  it('reads the most recent entries oldest first', async () => {
    const store = new InMemorySessionStore();
    const { sessionId } = await store.getOrCreate('slack', 'C1');
    await store.append(sessionId, [entry('user', 'one'), entry('assistant', 'two')]);
    await store.append(sessionId, [entry('user', 'three')]);

    expect((await store.read(sessionId, 2)).map((e) => e.content)).toEqual(['two', 'three']);
    expect(await store.read(sessionId)).toHaveLength(3);
    expect(await store.read(sessionId, 0)).toEqual([]);
  });

  it('keeps stored entries apart from the caller\'s objects', async () => {
    const store = new InMemorySessionStore();
    const { sessionId } = await store.getOrCreate('slack', 'C1');
    const original = entry('user', 'hello');
    await store.append(sessionId, [original]);
    original.content = 'changed';

    const [read] = await store.read(sessionId);
    expect(read?.content).toBe('hello');
  });

  it('drops every entry on reset', async () => {
    const store = new InMemorySessionStore();
    const { sessionId } = await store.getOrCreate('slack', 'C1');
    await store.append(sessionId, [entry('user', 'hello')]);
    await store.reset(sessionId);

    expect(await store.read(sessionId)).toEqual([]);
    expect((await store.getOrCreate('slack', 'C1')).sessionId).toBe(sessionId);
  });

  it('rejects unknown sessions', async () => {
    const store = new InMemorySessionStore();
    await expect(store.append('missing', [])).rejects.toBeInstanceOf(LookupError);
    await expect(store.read('missing')).rejects.toThrow('Session "missing" does not exist');
  });

  it('evicts idle sessions', async () => {
    vi.useFakeTimers({ now: at });
    const store = new InMemorySessionStore();
    const idle = await store.getOrCreate('slack', 'idle');
    vi.setSystemTime(new Date(at.getTime() + 60_000));
    await store.getOrCreate('slack', 'busy');

    expect(store.evictIdle(30_000)).toBe(1);
    expect(store.size).toBe(1);
    expect((await store.getOrCreate('slack', 'idle')).sessionId).not.toBe(idle.sessionId);
  });
});

// ===========================================================================
// InMemoryIdentityStore
// ===========================================================================

describe('InMemoryIdentityStore', () => {
  it('creates one identity per account', async () => {
    const store = new InMemoryIdentityStore();
    const first = await store.getOrCreate('slack', 'U1', 'ana');
    const again = await store.getOrCreate('slack', 'U1');

    expect(again.identityId).toBe(first.identityId);
    expect(again.displayName).toBe('ana');
    expect(again.links).toEqual([{ channelType: 'slack', userId: 'U1' }]);
  });

  it('links a second account to the same identity', async () => {
    const store = new InMemoryIdentityStore();
    const { identityId } = await store.getOrCreate('slack', 'U1');
    await store.linkIdentity(identityId, { channelType: 'telegram', userId: '42' });

    expect((await store.getOrCreate('telegram', '42')).identityId).toBe(identityId);
    expect((await store.get(identityId))?.links).toHaveLength(2);
  });

  it('treats relinking the same account as a no-op', async () => {
    const store = new InMemoryIdentityStore();
    const { identityId } = await store.getOrCreate('slack', 'U1');
    const linked = await store.linkIdentity(identityId, { channelType: 'slack', userId: 'U1' });
    expect(linked.links).toHaveLength(1);
  });

  it('refuses to move an account between identities', async () => {
    const store = new InMemoryIdentityStore();
    await store.getOrCreate('slack', 'U1');
    const other = await store.getOrCreate('slack', 'U2');

    const attempt = store.linkIdentity(other.identityId, { channelType: 'slack', userId: 'U1' });
    await expect(attempt).rejects.toBeInstanceOf(SwitchboardError);
    await expect(attempt).rejects.toMatchObject({ code: 'IDENTITY_CONFLICT' });
  });

  it('rejects linking to an unknown identity', async () => {
    const store = new InMemoryIdentityStore();
    await expect(
      store.linkIdentity('nobody', { channelType: 'slack', userId: 'U1' }),
    ).rejects.toBeInstanceOf(LookupError);
    expect(await store.get('nobody')).toBeUndefined();
  });
});

// ===========================================================================
// InMemoryMemoryStore
// ===========================================================================

describe('InMemoryMemoryStore', () => {
  it('recalls by importance, newest first among equals', async () => {
    const store = new InMemoryMemoryStore();
    const scope = { identityId: 'id-1' };
    await store.save({ kind: 'daily_log', content: 'had lunch', importance: 5 }, scope);
    await store.save({ kind: 'long_term', content: 'likes tea', importance: 7 }, scope);
    await store.save({ kind: 'long_term', content: 'allergic to nuts', importance: 9 }, scope);
    await store.save({ kind: 'long_term', content: 'lives in Lyon', importance: 7 }, scope);

    const recalled = await store.recall('id-1', 3);
    expect(recalled.map((m) => m.content)).toEqual(['allergic to nuts', 'lives in Lyon', 'likes tea']);
    expect(store.size).toBe(4);
  });

  it('keeps identities apart', async () => {
    const store = new InMemoryMemoryStore();
    await store.save(
      { kind: 'long_term', content: 'likes tea', importance: 7 },
      { identityId: 'id-1', sessionId: 's1', channelType: 'slack' },
    );

    expect(await store.recall('id-2', 10)).toEqual([]);
    expect(await store.recall('id-1', 10)).toEqual([
      expect.objectContaining({ sessionId: 's1', channelType: 'slack', identityId: 'id-1' }),
    ]);
  });
});

// ===========================================================================
// KeyedQueue
// ===========================================================================

describe('KeyedQueue', () => {
  it('runs tasks of one key in order', async () => {
    const queue = new KeyedQueue();
    const order: string[] = [];
    const slow = queue.run('a', async () => {
      await new Promise((r) => setTimeout(r, 20));
      order.push('first');
    });
    const fast = queue.run('a', async () => {
      order.push('second');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['first', 'second']);
  });

  it('runs different keys in parallel', async () => {
    const queue = new KeyedQueue();
    const order: string[] = [];
    const a = queue.run('a', async () => {
      await new Promise((r) => setTimeout(r, 20));
      order.push('a');
    });
    const b = queue.run('b', async () => {
      order.push('b');
    });

    await Promise.all([a, b]);
    expect(order).toEqual(['b', 'a']);
  });

  it('keeps going after a failed task', async () => {
    const queue = new KeyedQueue();
    const failed = queue.run('a', async () => {
      throw new Error('boom');
    });
    const next = queue.run('a', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('forgets keys once drained', async () => {
    const queue = new KeyedQueue();
    await queue.run('a', async () => 1);
    await new Promise((r) => setTimeout(r, 0));
    expect(queue.activeKeys).toBe(0);
  });
});
