/**
 * ToolPermissionResolver -- computes the tool set for one dispatch.
 *
 * Admins get every registered tool. Everyone else starts from the static
 * safe-mode list and is enriched with the grants of their special roles:
 *
 *   allowList = base ∪ role.allowedTools ∪ tools required by granted skills
 *
 * plus `use_skill` whenever any skill is granted. The result is recomputed
 * for every dispatch and never stored, so revoking a role takes effect on
 * the next message.
 *
 * A failed role lookup never blocks a dispatch: it is reported as a warning
 * and the caller keeps the plain safe-mode list.
 */

import type {
  IObserver,
  IRoleStore,
  ISkillCatalog,
  IToolInvoker,
  SpecialRole,
  ToolConfig,
} from '@switchboard/core';
import { ConfigError, toError } from '@switchboard/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ToolPermissionResolverOpts {
  /** Tools every non-admin user may call. */
  safeModeTools: string[];
  /** Source of truth for which tool names exist. */
  registry: Pick<IToolInvoker, 'names'>;
  roles: IRoleStore;
  /** Expands granted skills into the tools they need. */
  skills?: ISkillCatalog;
  observer?: IObserver;
}

/** Tool that runs a skill; granted alongside any skill. */
export const USE_SKILL_TOOL = 'use_skill';

// ---------------------------------------------------------------------------
// ToolPermissionResolver
// ---------------------------------------------------------------------------

export class ToolPermissionResolver {
  private readonly base: readonly string[];
  private readonly opts: ToolPermissionResolverOpts;

  constructor(opts: ToolPermissionResolverOpts) {
    const registered = new Set(opts.registry.names());
    const missing = opts.safeModeTools.filter((name) => !registered.has(name));
    if (missing.length > 0) {
      throw new ConfigError(
        `Safe-mode tools are not registered: ${missing.join(', ')}`,
        { missing },
      );
    }

    this.base = [...new Set(opts.safeModeTools)];
    this.opts = opts;
  }

  /** The static safe-mode list. */
  baseTools(): string[] {
    return [...this.base];
  }

  async resolve(channelType: string, userId: string, isAdmin: boolean): Promise<ToolConfig> {
    const config = isAdmin
      ? this.unrestricted()
      : await this.enriched(channelType, userId);
    this.opts.observer?.onPermissionsResolved?.({ channelType, userId }, config);
    return config;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private unrestricted(): ToolConfig {
    return {
      allowList: this.opts.registry.names(),
      isSafeMode: false,
      unrestricted: true,
      extraSkills: [],
      roleNames: [],
    };
  }

  private safeMode(): ToolConfig {
    return {
      allowList: [...this.base],
      isSafeMode: true,
      unrestricted: false,
      extraSkills: [],
      roleNames: [],
    };
  }

  private async enriched(channelType: string, userId: string): Promise<ToolConfig> {
    const { observer } = this.opts;

    let grants: SpecialRole[];
    try {
      grants = await this.opts.roles.getGrants(channelType, userId);
    } catch (err) {
      observer?.onWarning('Special role lookup failed; using safe-mode tools only', {
        channelType,
        userId,
        error: toError(err).message,
      });
      return this.safeMode();
    }
    if (grants.length === 0) return this.safeMode();

    const registered = new Set(this.opts.registry.names());
    const allow = new Set(this.base);
    const skills = new Set<string>();
    const roleNames = new Set<string>();

    const grant = (tool: string, source: Record<string, string>): void => {
      if (registered.has(tool)) {
        allow.add(tool);
        return;
      }
      observer?.onSecurityEvent({
        type: 'grant_dropped',
        details: { channelType, userId, tool, ...source },
        timestamp: new Date(),
      });
      observer?.onWarning(`Granted tool "${tool}" is not registered; ignoring it`, { tool, ...source });
    };

    for (const role of grants) {
      roleNames.add(role.name);
      for (const tool of role.allowedTools) grant(tool, { role: role.name });
      for (const skill of role.allowedSkills) skills.add(skill);
    }

    const extraSkills: string[] = [];
    for (const skill of skills) {
      const required = await this.requiredTools(skill, channelType, userId);
      if (required === null) continue;
      extraSkills.push(skill);
      for (const tool of required) grant(tool, { skill });
    }
    if (extraSkills.length > 0 && registered.has(USE_SKILL_TOOL)) {
      allow.add(USE_SKILL_TOOL);
    }

    const added = [...allow].filter((tool) => !this.base.includes(tool));
    observer?.onSecurityEvent({
      type: 'role_enrichment',
      details: { channelType, userId, roles: [...roleNames], addedTools: added, skills: extraSkills },
      timestamp: new Date(),
    });

    return {
      allowList: [...allow],
      isSafeMode: true,
      unrestricted: false,
      extraSkills,
      roleNames: [...roleNames],
    };
  }

  /**
   * Tools a granted skill needs. Without a catalog every skill is taken as
   * needing none; a skill the catalog does not know is skipped.
   */
  private async requiredTools(skill: string, channelType: string, userId: string): Promise<string[] | null> {
    const catalog = this.opts.skills;
    if (!catalog) return [];

    try {
      const required = await catalog.getRequiredTools(skill);
      if (required === null) {
        this.opts.observer?.onWarning(`Granted skill "${skill}" is unknown or disabled; ignoring it`, {
          skill,
          channelType,
          userId,
        });
      }
      return required;
    } catch (err) {
      this.opts.observer?.onWarning(`Skill lookup failed for "${skill}"; ignoring it`, {
        skill,
        error: toError(err).message,
      });
      return null;
    }
  }
}
