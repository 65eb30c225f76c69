/**
 * Configuration loading, validation, and directory management.
 *
 * Loads user config from ~/.switchboard/config.json (or an explicit path),
 * merges it over the bundled defaults, resolves ${VAR_NAME} environment
 * variable references, and validates every field. Zero external dependencies.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { LogLevel, SwitchboardConfig } from '@switchboard/core';
import { ConfigError, toError } from '@switchboard/core';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const HOME_DIR_NAME = '.switchboard';
const CONFIG_FILE_NAME = 'config.json';
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const OBSERVER_KINDS = ['console', 'file'] as const;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Resolve the switchboard home directory (~/.switchboard). */
export function getHomeDir(): string {
  return resolve(homedir(), HOME_DIR_NAME);
}

/** Resolve the path to the user config file. */
export function getConfigPath(): string {
  return join(getHomeDir(), CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// Default config
// ---------------------------------------------------------------------------

export function getDefaultConfig(): SwitchboardConfig {
  return {
    agent: {
      maxIterations: 10,
      maxRetries: 3,
      historyLimit: 20,
    },
    permissions: {
      safeModeTools: [],
      admins: [],
    },
    subagents: {
      enabled: true,
      maxDepth: 1,
      maxConcurrency: 3,
      maxIterations: 10,
      domains: {},
      defaultTools: [],
    },
    memory: {
      enabled: true,
      recallLimit: 10,
    },
    observability: {
      observers: ['console'],
      logLevel: 'info',
    },
  };
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively resolve ${VAR_NAME} references in string values.
 * Missing env vars resolve to the empty string and are collected in
 * `missing` so the caller can warn once per variable.
 */
export function resolveEnvVars(value: unknown, missing?: Set<string>): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
      const resolved = process.env[varName];
      if (resolved === undefined) missing?.add(varName);
      return resolved ?? '';
    });
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, missing));
  }

  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvVars(item, missing);
    }
    return result;
  }

  return value;
}

// ---------------------------------------------------------------------------
// Merge + validation
// ---------------------------------------------------------------------------

interface ValidationError {
  field: string;
  message: string;
}

/**
 * Reads one config section from the user's JSON, falling back to the
 * default for every field the user left out. Invalid values are recorded
 * and the default is kept so that all problems are reported together.
 */
class SectionReader {
  private readonly raw: Record<string, unknown>;

  constructor(
    private readonly section: string,
    raw: unknown,
    private readonly errors: ValidationError[],
  ) {
    if (raw !== undefined && !isRecord(raw)) {
      errors.push({ field: section, message: 'Must be an object' });
    }
    this.raw = isRecord(raw) ? raw : {};
  }

  private fail(key: string, message: string): void {
    this.errors.push({ field: `${this.section}.${key}`, message });
  }

  int(key: string, fallback: number, min: number): number {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
      this.fail(key, `Must be an integer of at least ${min}`);
      return fallback;
    }
    return value;
  }

  optionalInt(key: string, fallback: number | undefined, min: number): number | undefined {
    if (this.raw[key] === undefined) return fallback;
    return this.int(key, fallback ?? min, min);
  }

  bool(key: string, fallback: boolean): boolean {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      this.fail(key, 'Must be true or false');
      return fallback;
    }
    return value;
  }

  optionalString(key: string, fallback: string | undefined): string | undefined {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string') {
      this.fail(key, 'Must be a string');
      return fallback;
    }
    return value;
  }

  stringList(key: string, fallback: string[]): string[] {
    const value = this.raw[key];
    if (value === undefined) return [...fallback];
    if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
      this.fail(key, 'Must be a list of strings');
      return [...fallback];
    }
    return value.filter((item): item is string => typeof item === 'string');
  }

  oneOf<T extends string>(key: string, fallback: T, allowed: readonly T[]): T {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    const match = allowed.find((option) => option === value);
    if (match === undefined) {
      this.fail(key, `Must be one of: ${allowed.join(', ')}`);
      return fallback;
    }
    return match;
  }

  listOf<T extends string>(key: string, fallback: T[], allowed: readonly T[]): T[] {
    const value = this.raw[key];
    if (value === undefined) return [...fallback];
    if (!Array.isArray(value)) {
      this.fail(key, `Must be a list of: ${allowed.join(', ')}`);
      return [...fallback];
    }
    const result: T[] = [];
    for (const item of value) {
      const match = allowed.find((option) => option === item);
      if (match === undefined) {
        this.fail(key, `Unknown entry "${String(item)}"; expected one of: ${allowed.join(', ')}`);
        continue;
      }
      result.push(match);
    }
    return result;
  }

  /** Map of name → list of strings. Replaces the default map wholesale. */
  listMap(key: string, fallback: Record<string, string[]>): Record<string, string[]> {
    const value = this.raw[key];
    if (value === undefined) return { ...fallback };
    if (!isRecord(value)) {
      this.fail(key, 'Must be an object of string lists');
      return { ...fallback };
    }
    const result: Record<string, string[]> = {};
    for (const [name, list] of Object.entries(value)) {
      if (!Array.isArray(list) || !list.every((item) => typeof item === 'string')) {
        this.fail(`${key}.${name}`, 'Must be a list of strings');
        continue;
      }
      result[name] = list.filter((item): item is string => typeof item === 'string');
    }
    return result;
  }
}

const ADMIN_ENTRY = /^[^:\s]+:.+$/;

function buildConfig(user: Record<string, unknown>, errors: ValidationError[]): SwitchboardConfig {
  const defaults = getDefaultConfig();

  const agent = new SectionReader('agent', user.agent, errors);
  const permissions = new SectionReader('permissions', user.permissions, errors);
  const subagents = new SectionReader('subagents', user.subagents, errors);
  const memory = new SectionReader('memory', user.memory, errors);
  const observability = new SectionReader('observability', user.observability, errors);

  const config: SwitchboardConfig = {
    agent: {
      maxIterations: agent.int('maxIterations', defaults.agent.maxIterations, 1),
      maxRetries: agent.int('maxRetries', defaults.agent.maxRetries, 1),
      historyLimit: agent.int('historyLimit', defaults.agent.historyLimit, 0),
    },
    permissions: {
      safeModeTools: permissions.stringList('safeModeTools', defaults.permissions.safeModeTools),
      admins: permissions.stringList('admins', defaults.permissions.admins),
    },
    subagents: {
      enabled: subagents.bool('enabled', defaults.subagents.enabled),
      maxDepth: subagents.int('maxDepth', defaults.subagents.maxDepth, 0),
      maxConcurrency: subagents.int('maxConcurrency', defaults.subagents.maxConcurrency, 1),
      maxIterations: subagents.int('maxIterations', defaults.subagents.maxIterations, 1),
      domains: subagents.listMap('domains', defaults.subagents.domains),
      defaultTools: subagents.stringList('defaultTools', defaults.subagents.defaultTools),
    },
    memory: {
      enabled: memory.bool('enabled', defaults.memory.enabled),
      recallLimit: memory.int('recallLimit', defaults.memory.recallLimit, 0),
    },
    observability: {
      observers: observability.listOf('observers', defaults.observability.observers, OBSERVER_KINDS),
      logLevel: observability.oneOf('logLevel', defaults.observability.logLevel, LOG_LEVELS),
    },
  };

  const systemPrompt = agent.optionalString('systemPrompt', defaults.agent.systemPrompt);
  if (systemPrompt !== undefined) config.agent.systemPrompt = systemPrompt;

  const timeoutMs = agent.optionalInt('timeoutMs', defaults.agent.timeoutMs, 1000);
  if (timeoutMs !== undefined) config.agent.timeoutMs = timeoutMs;

  const logFile = observability.optionalString('logFile', defaults.observability.logFile);
  if (logFile !== undefined) config.observability.logFile = logFile;

  for (const entry of config.permissions.admins) {
    if (!ADMIN_ENTRY.test(entry)) {
      errors.push({ field: 'permissions.admins', message: `"${entry}" must look like channelType:userId` });
    }
  }

  return config;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate a parsed config object and merge it over the defaults.
 * Throws ConfigError listing every invalid field.
 */
export function parseConfig(raw: unknown): SwitchboardConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  const errors: ValidationError[] = [];
  const config = buildConfig(raw, errors);
  if (errors.length > 0) {
    const details = errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigError(`Configuration validation failed:\n${details}`, { errors });
  }
  return config;
}

/**
 * Load and return a fully resolved, validated SwitchboardConfig.
 *
 * 1. Reads `path`, or ~/.switchboard/config.json when no path is given.
 *    A missing default file yields the defaults; a missing explicit file
 *    is an error.
 * 2. Resolves ${VAR_NAME} environment variable references.
 * 3. Validates and merges over the defaults.
 */
export function loadConfig(path?: string): SwitchboardConfig {
  const configPath = path ? resolve(path) : getConfigPath();

  if (!existsSync(configPath)) {
    if (path) throw new ConfigError(`Config file not found: ${configPath}`, { path: configPath });
    return getDefaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}: ${toError(err).message}`, { path: configPath });
  }

  const missingVars = new Set<string>();
  const resolved = resolveEnvVars(raw, missingVars);

  for (const varName of missingVars) {
    console.warn(`[switchboard] Config references \${${varName}} but it is not set in environment.`);
  }

  return parseConfig(resolved);
}
