/**
 * IRegisterStore — per-execution scratch store handed to tools.
 */

import type { JsonValue } from '../types/index.js';

export interface IRegisterStore {
  set(key: string, value: JsonValue, sourceTool?: string): void;
  get(key: string): JsonValue | undefined;
  getField(key: string, path: string): JsonValue | undefined;
  has(key: string): boolean;
  expandTemplates(text: string): string;
}
