/**
 * RegisterStore — per-execution scratch store for exact values.
 *
 * Tools cache values that must reach the user byte-for-byte (content hashes,
 * payment URLs, calldata) under a register name. The reply then references
 * them as `{{name}}` or `{{name.field}}` and `expandTemplates()` substitutes
 * the stored value, so the model never re-types it.
 *
 * Expansion is single-pass: text produced by a substitution is not scanned
 * again, even when it contains `{{`.
 */

import type { IObserver, IRegisterStore, JsonValue } from '@switchboard/core';
import { stableStringify } from '@switchboard/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RegisterEntry {
  value: JsonValue;
  /** Tool that wrote the entry, or "system". */
  sourceTool: string;
  createdAt: number;
}

export interface RegisterStoreOpts {
  /** Receives a warning for every unresolved placeholder. */
  observer?: IObserver;
  /** Clock override for tests. */
  now?: () => number;
}

// Compiled once; replace() resets lastIndex, so sharing it is safe.
const TEMPLATE_PATTERN = /\{\{([a-zA-Z_][a-zA-Z0-9_]*(?:\.[a-zA-Z_][a-zA-Z0-9_]*)*)\}\}/g;

/**
 * Display form of a register value: strings verbatim, everything else as
 * compact JSON with sorted keys.
 */
export function toDisplayString(value: JsonValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (value === null) return 'null';
  return stableStringify(value);
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// RegisterStore
// ---------------------------------------------------------------------------

export class RegisterStore implements IRegisterStore {
  private readonly entries = new Map<string, RegisterEntry>();
  private readonly unresolved: string[] = [];
  private readonly observer?: IObserver;
  private readonly now: () => number;

  constructor(opts: RegisterStoreOpts = {}) {
    this.observer = opts.observer;
    this.now = opts.now ?? Date.now;
  }

  /** Write a register, replacing any previous value. */
  set(key: string, value: JsonValue, sourceTool = 'system'): void {
    this.entries.set(key, { value, sourceTool, createdAt: this.now() });
  }

  get(key: string): JsonValue | undefined {
    return this.entries.get(key)?.value;
  }

  getEntry(key: string): RegisterEntry | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  /**
   * Read a nested field by dotted path ("transaction.data"). Returns
   * undefined as soon as a segment is missing or its parent is not an object.
   */
  getField(key: string, path: string): JsonValue | undefined {
    let current = this.get(key);
    if (current === undefined) return undefined;

    for (const segment of path.split('.')) {
      if (current === undefined || !isJsonObject(current) || !Object.hasOwn(current, segment)) {
        return undefined;
      }
      current = current[segment];
    }
    return current;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  remove(key: string): JsonValue | undefined {
    const entry = this.entries.get(key);
    this.entries.delete(key);
    return entry?.value;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /** Drop every register and every recorded diagnostic. Called when the execution ends. */
  clear(): void {
    this.entries.clear();
    this.unresolved.length = 0;
  }

  ageMs(key: string): number | undefined {
    const entry = this.entries.get(key);
    return entry ? this.now() - entry.createdAt : undefined;
  }

  /** Missing registers count as stale. */
  isStale(key: string, maxAgeMs: number): boolean {
    const age = this.ageMs(key);
    return age === undefined || age > maxAgeMs;
  }

  /** Placeholders that could not be resolved so far, in encounter order. */
  diagnostics(): readonly string[] {
    return [...this.unresolved];
  }

  /**
   * Replace `{{name}}` / `{{name.field.sub}}` placeholders with register
   * values. Unresolved placeholders are left exactly as written.
   */
  expandTemplates(text: string): string {
    if (!text.includes('{{')) return text;

    return text.replace(TEMPLATE_PATTERN, (match: string, ref: string) => {
      const dot = ref.indexOf('.');
      const resolved = dot === -1
        ? this.get(ref)
        : this.getField(ref.slice(0, dot), ref.slice(dot + 1));

      if (resolved === undefined) {
        this.unresolved.push(ref);
        this.observer?.onWarning(`Register template "${match}" not found, left as-is`, { ref });
        return match;
      }
      return toDisplayString(resolved);
    });
  }
}
