/**
 * InMemoryRoleStore -- special roles and their assignments.
 *
 * A special role is a named bundle of extra tool and skill grants. Roles are
 * assigned to (channelType, userId) pairs; the permission resolver reads them
 * back with a single lookup keyed by that pair.
 *
 * Role names are unique, and so is each (channelType, userId, roleName)
 * triple. Deleting a role removes its assignments.
 */

import type { IRoleStore, SpecialRole, SpecialRoleAssignment } from '@switchboard/core';
import { SwitchboardError } from '@switchboard/core';

export interface RoleAssignmentFilter {
  channelType?: string;
  userId?: string;
  roleName?: string;
}

export type RolePatch = Partial<Omit<SpecialRole, 'name'>>;

export class RoleStoreError extends SwitchboardError {
  constructor(message: string, code: 'ROLE_CONFLICT' | 'ROLE_NOT_FOUND' | 'ROLE_INVALID', context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'RoleStoreError';
  }
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter((v) => v.length > 0))];
}

function copyRole(role: SpecialRole): SpecialRole {
  return {
    name: role.name,
    allowedTools: [...role.allowedTools],
    allowedSkills: [...role.allowedSkills],
    ...(role.description !== undefined ? { description: role.description } : {}),
  };
}

function subjectKey(channelType: string, userId: string): string {
  return `${channelType}\u0000${userId}`;
}

export class InMemoryRoleStore implements IRoleStore {
  private readonly roles = new Map<string, SpecialRole>();
  /** (channelType, userId) → role names, in assignment order. */
  private readonly bySubject = new Map<string, Set<string>>();

  // -----------------------------------------------------------------------
  // Roles
  // -----------------------------------------------------------------------

  createRole(role: SpecialRole): SpecialRole {
    const name = role.name.trim();
    if (!name) {
      throw new RoleStoreError('Role name must not be empty', 'ROLE_INVALID');
    }
    if (this.roles.has(name)) {
      throw new RoleStoreError(`Role "${name}" already exists`, 'ROLE_CONFLICT', { role: name });
    }

    const stored: SpecialRole = {
      name,
      allowedTools: unique(role.allowedTools),
      allowedSkills: unique(role.allowedSkills),
      ...(role.description !== undefined ? { description: role.description } : {}),
    };
    this.roles.set(name, stored);
    return copyRole(stored);
  }

  updateRole(name: string, patch: RolePatch): SpecialRole {
    const current = this.roles.get(name);
    if (!current) {
      throw new RoleStoreError(`Role "${name}" does not exist`, 'ROLE_NOT_FOUND', { role: name });
    }

    const updated: SpecialRole = {
      name,
      allowedTools: unique(patch.allowedTools ?? current.allowedTools),
      allowedSkills: unique(patch.allowedSkills ?? current.allowedSkills),
    };
    const description = patch.description ?? current.description;
    if (description !== undefined) updated.description = description;

    this.roles.set(name, updated);
    return copyRole(updated);
  }

  /** Delete a role and every assignment of it. */
  deleteRole(name: string): boolean {
    if (!this.roles.delete(name)) return false;
    for (const [key, names] of this.bySubject) {
      names.delete(name);
      if (names.size === 0) this.bySubject.delete(key);
    }
    return true;
  }

  getRole(name: string): SpecialRole | undefined {
    const role = this.roles.get(name);
    return role ? copyRole(role) : undefined;
  }

  listRoles(): SpecialRole[] {
    return [...this.roles.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(copyRole);
  }

  // -----------------------------------------------------------------------
  // Assignments
  // -----------------------------------------------------------------------

  assign(channelType: string, userId: string, roleName: string): SpecialRoleAssignment {
    if (!this.roles.has(roleName)) {
      throw new RoleStoreError(`Role "${roleName}" does not exist`, 'ROLE_NOT_FOUND', { role: roleName });
    }

    const key = subjectKey(channelType, userId);
    const names = this.bySubject.get(key) ?? new Set<string>();
    if (names.has(roleName)) {
      throw new RoleStoreError(
        `Role "${roleName}" is already assigned to ${channelType}:${userId}`,
        'ROLE_CONFLICT',
        { channelType, userId, role: roleName },
      );
    }

    names.add(roleName);
    this.bySubject.set(key, names);
    return { channelType, userId, roleName };
  }

  unassign(channelType: string, userId: string, roleName: string): boolean {
    const key = subjectKey(channelType, userId);
    const names = this.bySubject.get(key);
    if (!names?.delete(roleName)) return false;
    if (names.size === 0) this.bySubject.delete(key);
    return true;
  }

  listAssignments(filter: RoleAssignmentFilter = {}): SpecialRoleAssignment[] {
    const result: SpecialRoleAssignment[] = [];
    for (const [key, names] of this.bySubject) {
      const [channelType = '', userId = ''] = key.split('\u0000');
      if (filter.channelType !== undefined && filter.channelType !== channelType) continue;
      if (filter.userId !== undefined && filter.userId !== userId) continue;
      for (const roleName of names) {
        if (filter.roleName !== undefined && filter.roleName !== roleName) continue;
        result.push({ channelType, userId, roleName });
      }
    }
    return result;
  }

  // -----------------------------------------------------------------------
  // IRoleStore
  // -----------------------------------------------------------------------

  async getGrants(channelType: string, userId: string): Promise<SpecialRole[]> {
    const names = this.bySubject.get(subjectKey(channelType, userId));
    if (!names) return [];

    const grants: SpecialRole[] = [];
    for (const name of names) {
      const role = this.roles.get(name);
      if (role) grants.push(copyRole(role));
    }
    return grants;
  }
}
