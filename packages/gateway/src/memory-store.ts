/**
 * InMemoryMemoryStore -- per-identity memories saved from reply directives.
 *
 * Recall returns the most important memories first, newest first among
 * equals.
 */

import type { IMemoryStore, MemoryDirective, MemoryRecord, MemoryScope } from '@switchboard/core';
import { generateId } from '@switchboard/core';

export class InMemoryMemoryStore implements IMemoryStore {
  private readonly records = new Map<string, MemoryRecord[]>();
  private counter = 0;

  async save(directive: MemoryDirective, scope: MemoryScope): Promise<void> {
    const record: MemoryRecord = {
      id: generateId(),
      kind: directive.kind,
      content: directive.content,
      importance: directive.importance,
      identityId: scope.identityId,
      createdAt: new Date(),
      ...(scope.sessionId !== undefined ? { sessionId: scope.sessionId } : {}),
      ...(scope.channelType !== undefined ? { channelType: scope.channelType } : {}),
    };
    const list = this.records.get(scope.identityId) ?? [];
    list.push(record);
    this.records.set(scope.identityId, list);
    this.counter++;
  }

  async recall(identityId: string, limit: number): Promise<MemoryRecord[]> {
    const list = this.records.get(identityId) ?? [];
    return list
      .map((record, index) => ({ record, index }))
      .sort((a, b) => b.record.importance - a.record.importance || b.index - a.index)
      .slice(0, Math.max(0, limit))
      .map(({ record }) => ({ ...record }));
  }

  /** Total memories saved across all identities. */
  get size(): number {
    return this.counter;
  }
}
