/**
 * Persistence and lookup collaborators consumed by the dispatcher, the
 * permission resolver and the sub-agent director.
 */

import type {
  Identity,
  MemoryDirective,
  MemoryRecord,
  Session,
  SessionEntry,
  SpecialRole,
} from '../types/index.js';

export interface IIdentityStore {
  /** Resolve the identity linked to (channelType, userId), creating it on first contact. */
  getOrCreate(channelType: string, userId: string, displayName?: string): Promise<Identity>;
}

export interface ISessionStore {
  getOrCreate(channelType: string, channelId: string): Promise<Session>;
  append(sessionId: string, entries: SessionEntry[]): Promise<void>;
  read(sessionId: string, limit?: number): Promise<SessionEntry[]>;
  /** Drop every entry of the session. */
  reset(sessionId: string): Promise<void>;
}

export interface MemoryScope {
  identityId: string;
  sessionId?: string;
  channelType?: string;
}

export interface IMemoryStore {
  save(directive: MemoryDirective, scope: MemoryScope): Promise<void>;
  recall(identityId: string, limit: number): Promise<MemoryRecord[]>;
}

export interface IRoleStore {
  /** Every role assigned to (channelType, userId), in one indexed lookup. */
  getGrants(channelType: string, userId: string): Promise<SpecialRole[]>;
}

export interface ISkillCatalog {
  /** Tools a skill needs, or null when the skill is unknown or disabled. */
  getRequiredTools(skillName: string): Promise<string[] | null>;
}

export interface ICapabilityResolver {
  /** Tool names permitted for a sub-agent working in `domain`. */
  resolve(domain: string): Promise<string[]>;
}
