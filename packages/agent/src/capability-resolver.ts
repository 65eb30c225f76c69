/**
 * StaticCapabilityResolver — maps a sub-agent's domain label to its tools
 * from a fixed table (the `subagents.domains` config section).
 */

import type { ICapabilityResolver } from '@switchboard/core';

export class StaticCapabilityResolver implements ICapabilityResolver {
  private readonly domains: Map<string, string[]>;
  private readonly defaultTools: string[];

  constructor(domains: Record<string, string[]>, defaultTools: string[] = []) {
    this.domains = new Map(
      Object.entries(domains).map(([domain, tools]) => [domain.toLowerCase(), [...tools]]),
    );
    this.defaultTools = [...defaultTools];
  }

  /** Domain lookup is case-insensitive; unknown domains get the default tools. */
  async resolve(domain: string): Promise<string[]> {
    return [...(this.domains.get(domain.trim().toLowerCase()) ?? this.defaultTools)];
  }
}
