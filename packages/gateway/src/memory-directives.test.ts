/**
 * Memory directive unit tests.
 *
 * Covers extraction order, importance levels, and that stripping touches
 * nothing but the directive and the gap it leaves.
 */

import { describe, it, expect } from 'vitest';
import { extractMemoryDirectives } from './memory-directives.js';

describe('extractMemoryDirectives', () => {
  it('extracts every directive with its importance and strips it', () => {
    const result = extractMemoryDirectives(
      'Sure, noted. [REMEMBER: likes tea] See you! [DAILY_LOG: asked about tea] [REMEMBER_IMPORTANT: allergic to nuts]',
    );

    expect(result.directives).toEqual([
      { kind: 'daily_log', content: 'asked about tea', importance: 5 },
      { kind: 'long_term', content: 'likes tea', importance: 7 },
      { kind: 'long_term', content: 'allergic to nuts', importance: 9 },
    ]);
    expect(result.text).toBe('Sure, noted. See you!');
  });

  it('removes a directive that sits on its own line together with the line', () => {
    const result = extractMemoryDirectives('Line one\n[REMEMBER: x]\nLine two');
    expect(result.text).toBe('Line one\nLine two');
  });

  it('removes a trailing directive line without leaving a newline', () => {
    expect(extractMemoryDirectives('Answer.\n[DAILY_LOG: asked]').text).toBe('Answer.');
  });

  it('removes the space after a directive that opens a line', () => {
    expect(extractMemoryDirectives('[REMEMBER: x] Hello  there').text).toBe('Hello  there');
  });

  it('keeps spacing and indentation of the surrounding reply byte for byte', () => {
    const calldata = 'fn(a,  b)\n    0xdead  beef';
    const result = extractMemoryDirectives(`[REMEMBER: likes hex]\n\`\`\`\n${calldata}\n\`\`\``);

    expect(result.directives).toEqual([{ kind: 'long_term', content: 'likes hex', importance: 7 }]);
    expect(result.text).toBe('```\nfn(a,  b)\n    0xdead  beef\n```');
  });

  it('keeps blank lines that were already in the reply', () => {
    const result = extractMemoryDirectives('Para one.\n\n\n  Para two. [DAILY_LOG: read]\n');
    expect(result.text).toBe('Para one.\n\n\n  Para two.\n');
  });

  it('leaves text without directives untouched', () => {
    const reply = '  Indented   reply\n\n\n\nwith gaps  ';
    expect(extractMemoryDirectives(reply)).toEqual({ directives: [], text: reply });
  });

  it('drops blank directives but still removes them', () => {
    const result = extractMemoryDirectives('Done. [REMEMBER:   ]');
    expect(result).toEqual({ directives: [], text: 'Done.' });
  });

  it('does not read an important memory as a plain one', () => {
    const result = extractMemoryDirectives('[REMEMBER_IMPORTANT: wallet is cold storage]');
    expect(result.directives).toEqual([
      { kind: 'long_term', content: 'wallet is cold storage', importance: 9 },
    ]);
    expect(result.text).toBe('');
  });
});
