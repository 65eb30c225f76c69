/**
 * InMemoryIdentityStore -- maps channel accounts to stable identities.
 *
 * An identity is created on first contact from a (channelType, userId) pair
 * and never deleted. `linkIdentity` attaches further accounts, so the same
 * person reaching the assistant from two channels shares one memory.
 */

import type { IIdentityStore, Identity, IdentityLink } from '@switchboard/core';
import { LookupError, SwitchboardError, generateId } from '@switchboard/core';

function linkKey(channelType: string, userId: string): string {
  return `${channelType}:${userId}`;
}

function copyIdentity(identity: Identity): Identity {
  return {
    ...identity,
    links: identity.links.map((link) => ({ ...link })),
  };
}

export class InMemoryIdentityStore implements IIdentityStore {
  private readonly identities = new Map<string, Identity>();
  private readonly byLink = new Map<string, string>();

  async getOrCreate(channelType: string, userId: string, displayName?: string): Promise<Identity> {
    const existingId = this.byLink.get(linkKey(channelType, userId));
    const existing = existingId ? this.identities.get(existingId) : undefined;
    if (existing) {
      if (displayName && !existing.displayName) existing.displayName = displayName;
      return copyIdentity(existing);
    }

    const identity: Identity = {
      identityId: generateId(),
      links: [{ channelType, userId }],
      createdAt: new Date(),
      ...(displayName ? { displayName } : {}),
    };
    this.identities.set(identity.identityId, identity);
    this.byLink.set(linkKey(channelType, userId), identity.identityId);
    return copyIdentity(identity);
  }

  /**
   * Attach (channelType, userId) to an existing identity. Linking an account
   * already attached to the same identity is a no-op; an account attached
   * elsewhere is a conflict.
   */
  async linkIdentity(identityId: string, link: IdentityLink): Promise<Identity> {
    const identity = this.identities.get(identityId);
    if (!identity) {
      throw new LookupError(`Identity "${identityId}" does not exist`, { identityId });
    }

    const key = linkKey(link.channelType, link.userId);
    const owner = this.byLink.get(key);
    if (owner === identityId) return copyIdentity(identity);
    if (owner !== undefined) {
      throw new SwitchboardError(
        `${key} is already linked to another identity`,
        'IDENTITY_CONFLICT',
        { identityId, owner, ...link },
      );
    }

    identity.links.push({ ...link });
    this.byLink.set(key, identityId);
    return copyIdentity(identity);
  }

  async get(identityId: string): Promise<Identity | undefined> {
    const identity = this.identities.get(identityId);
    return identity ? copyIdentity(identity) : undefined;
  }
}
