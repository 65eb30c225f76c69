/**
 * Memory directives embedded in model replies.
 *
 *   [DAILY_LOG: ...]           daily log entry, importance 5
 *   [REMEMBER: ...]            long-term memory, importance 7
 *   [REMEMBER_IMPORTANT: ...]  long-term memory, importance 9
 *
 * Directives are saved by the dispatcher and removed from the text the
 * user sees.
 */

import type { MemoryDirective } from '@switchboard/core';

interface DirectivePattern {
  pattern: RegExp;
  kind: MemoryDirective['kind'];
  importance: number;
}

const DIRECTIVES: readonly DirectivePattern[] = [
  { pattern: /\[DAILY_LOG:\s*(.+?)\]/g, kind: 'daily_log', importance: 5 },
  { pattern: /\[REMEMBER:\s*(.+?)\]/g, kind: 'long_term', importance: 7 },
  { pattern: /\[REMEMBER_IMPORTANT:\s*(.+?)\]/g, kind: 'long_term', importance: 9 },
];

export interface ExtractedDirectives {
  directives: MemoryDirective[];
  /** Reply with every directive removed. */
  text: string;
}

const ANY_DIRECTIVE = /\[(?:DAILY_LOG|REMEMBER|REMEMBER_IMPORTANT):\s*.+?\]/g;

/**
 * Remove each directive with the one gap it leaves: its whole line when it
 * stands alone on one, otherwise a single neighbouring space. Every other
 * character of the reply is kept as written.
 */
function strip(reply: string): string {
  let out = '';
  let cursor = 0;

  for (const match of reply.matchAll(ANY_DIRECTIVE)) {
    let start = match.index ?? 0;
    let end = start + match[0].length;
    const before = start === 0 ? '\n' : reply[start - 1];
    const after = end === reply.length ? '\n' : reply[end];

    if (before === '\n' && after === '\n') {
      if (end < reply.length) end += 1;
      else if (start > cursor) start -= 1;
    } else if (before === ' ' && start > cursor && (after === ' ' || after === '\n')) {
      start -= 1;
    } else if (before === '\n' && after === ' ') {
      end += 1;
    }

    out += reply.slice(cursor, start);
    cursor = end;
  }

  return out + reply.slice(cursor);
}

/**
 * Collect directives grouped by kind (daily logs, then memories, then
 * important memories), each group in order of appearance. Directives
 * with blank content are dropped.
 */
export function extractMemoryDirectives(reply: string): ExtractedDirectives {
  const directives: MemoryDirective[] = [];

  for (const { pattern, kind, importance } of DIRECTIVES) {
    for (const match of reply.matchAll(pattern)) {
      const content = (match[1] ?? '').trim();
      if (content) directives.push({ kind, content, importance });
    }
  }

  return { directives, text: strip(reply) };
}
