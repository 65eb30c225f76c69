/**
 * InMemorySessionStore -- append-only conversation sessions.
 *
 * One session per (channelType, channelId). Entries are only ever appended;
 * the explicit `/new` and `/reset` commands drop them through `reset()`.
 * The store keeps `lastActiveAt` timestamps so idle sessions can be evicted.
 */

import type { ISessionStore, Session, SessionEntry } from '@switchboard/core';
import { LookupError, generateId } from '@switchboard/core';

interface SessionState {
  sessionId: string;
  channelType: string;
  channelId: string;
  createdAt: Date;
  lastActiveAt: Date;
  entries: SessionEntry[];
}

function sessionKey(channelType: string, channelId: string): string {
  return `${channelType}:${channelId}`;
}

function snapshot(state: SessionState): Session {
  return {
    sessionId: state.sessionId,
    channelType: state.channelType,
    channelId: state.channelId,
    createdAt: state.createdAt,
    entries: state.entries.map((entry) => ({ ...entry })),
  };
}

export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, SessionState>();
  /** "channelType:channelId" → session id. */
  private readonly routes = new Map<string, string>();

  async getOrCreate(channelType: string, channelId: string): Promise<Session> {
    const key = sessionKey(channelType, channelId);
    const existingId = this.routes.get(key);
    const existing = existingId ? this.sessions.get(existingId) : undefined;
    if (existing) {
      existing.lastActiveAt = new Date();
      return snapshot(existing);
    }

    const now = new Date();
    const state: SessionState = {
      sessionId: generateId(),
      channelType,
      channelId,
      createdAt: now,
      lastActiveAt: now,
      entries: [],
    };
    this.sessions.set(state.sessionId, state);
    this.routes.set(key, state.sessionId);
    return snapshot(state);
  }

  async append(sessionId: string, entries: SessionEntry[]): Promise<void> {
    const state = this.require(sessionId);
    state.entries.push(...entries.map((entry) => ({ ...entry })));
    state.lastActiveAt = new Date();
  }

  /** The last `limit` entries, oldest first; every entry without a limit. */
  async read(sessionId: string, limit?: number): Promise<SessionEntry[]> {
    const { entries } = this.require(sessionId);
    const start = limit === undefined ? 0 : Math.max(0, entries.length - limit);
    return entries.slice(start).map((entry) => ({ ...entry }));
  }

  async reset(sessionId: string): Promise<void> {
    const state = this.require(sessionId);
    state.entries = [];
    state.lastActiveAt = new Date();
  }

  /** Number of tracked sessions. */
  get size(): number {
    return this.sessions.size;
  }

  /**
   * Evict sessions that have been idle longer than `maxIdleMs`.
   * Returns the number of sessions evicted.
   */
  evictIdle(maxIdleMs: number): number {
    const cutoff = Date.now() - maxIdleMs;
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (session.lastActiveAt.getTime() < cutoff) {
        this.sessions.delete(id);
        this.routes.delete(sessionKey(session.channelType, session.channelId));
        evicted++;
      }
    }
    return evicted;
  }

  private require(sessionId: string): SessionState {
    const state = this.sessions.get(sessionId);
    if (!state) throw new LookupError(`Session "${sessionId}" does not exist`, { sessionId });
    return state;
  }
}
