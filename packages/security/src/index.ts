/**
 * @switchboard/security -- tool permissions.
 *
 * Safe-mode tool sets with special-role enrichment, and the role store the
 * resolver reads.
 */

export { ToolPermissionResolver, USE_SKILL_TOOL } from './tool-permissions.js';
export type { ToolPermissionResolverOpts } from './tool-permissions.js';

export { InMemoryRoleStore, RoleStoreError } from './role-store.js';
export type { RoleAssignmentFilter, RolePatch } from './role-store.js';
