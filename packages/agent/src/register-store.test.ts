/**
 * RegisterStore unit tests.
 *
 * Covers reads and writes, field paths, staleness, template expansion and
 * its diagnostics.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { IObserver } from '@switchboard/core';
import { RegisterStore, toDisplayString } from './register-store.js';

function createMockObserver(): IObserver {
  return {
    onExecutionStart: vi.fn(),
    onExecutionEnd: vi.fn(),
    onToolInvocation: vi.fn(),
    onModelCall: vi.fn(),
    onChannelMessage: vi.fn(),
    onSecurityEvent: vi.fn(),
    onWarning: vi.fn(),
    onError: vi.fn(),
  };
}

const HASH = 'a3f1c9e07b52d4886e1f0c2b9a7d3e5f41c8b6a2d09e7f3c5b1a4d8e2f6c0b97';

describe('RegisterStore', () => {
  let store: RegisterStore;

  beforeEach(() => {
    store = new RegisterStore();
  });

  describe('set / get', () => {
    it('returns the latest write', () => {
      store.set('quote', { to: '0x123' }, 'swap_quote');
      store.set('quote', { to: '0x456' }, 'swap_quote');
      expect(store.get('quote')).toEqual({ to: '0x456' });
    });

    it('records the source tool and creation time', () => {
      let now = 1_000;
      const timed = new RegisterStore({ now: () => now });
      timed.set('k', 'v', 'my_tool');
      now = 1_250;

      expect(timed.getEntry('k')).toEqual({ value: 'v', sourceTool: 'my_tool', createdAt: 1_000 });
      expect(timed.ageMs('k')).toBe(250);
      expect(timed.isStale('k', 100)).toBe(true);
      expect(timed.isStale('k', 500)).toBe(false);
      expect(timed.isStale('missing', 500)).toBe(true);
    });

    it('supports remove, keys and clear', () => {
      store.set('a', 1);
      store.set('b', 2);
      expect(store.keys()).toEqual(['a', 'b']);
      expect(store.remove('a')).toBe(1);
      expect(store.has('a')).toBe(false);
      store.clear();
      expect(store.keys()).toEqual([]);
    });

    it('forgets unresolved placeholders on clear', () => {
      expect(store.expandTemplates('{{gone}}')).toBe('{{gone}}');
      const before = store.diagnostics();
      store.clear();

      expect(store.diagnostics()).toEqual([]);
      expect(before).toEqual(['gone']);
    });
  });

  describe('getField', () => {
    beforeEach(() => {
      store.set('quote', { transaction: { to: '0xabc', data: '0x1234' }, buyAmount: '5000', legs: [1, 2] });
    });

    it('traverses nested objects', () => {
      expect(store.getField('quote', 'transaction.to')).toBe('0xabc');
      expect(store.getField('quote', 'buyAmount')).toBe('5000');
    });

    it('is absent on a missing segment', () => {
      expect(store.getField('quote', 'transaction.value')).toBeUndefined();
      expect(store.getField('missing', 'to')).toBeUndefined();
    });

    it('is absent when a segment is not an object', () => {
      expect(store.getField('quote', 'buyAmount.length')).toBeUndefined();
      expect(store.getField('quote', 'legs.0')).toBeUndefined();
    });
  });

  describe('expandTemplates', () => {
    it('returns text without "{{" unchanged', () => {
      const text = 'No templates here, just } and {';
      expect(store.expandTemplates(text)).toBe(text);
      expect(store.diagnostics()).toEqual([]);
    });

    it('substitutes a dotted reference verbatim', () => {
      const url = `https://x/${HASH}`;
      store.set('x402_result', { url });
      expect(store.expandTemplates('Here: {{x402_result.url}}')).toBe(`Here: ${url}`);
    });

    it('substitutes several references in one pass', () => {
      store.set('result', { url: 'https://example.com/img.png', type: 'image' });
      expect(store.expandTemplates('Type: {{result.type}}, URL: {{result.url}}'))
        .toBe('Type: image, URL: https://example.com/img.png');
    });

    it('renders non-string values', () => {
      store.set('data', { count: 42, active: true, ratio: 0.5, none: null });
      expect(store.expandTemplates('{{data.count}} {{data.active}} {{data.ratio}} {{data.none}}'))
        .toBe('42 true 0.5 null');
    });

    it('renders whole objects as compact JSON with sorted keys', () => {
      store.set('simple', { b: [1, 'x'], a: 1 });
      expect(store.expandTemplates('Data: {{simple}}')).toBe('Data: {"a":1,"b":[1,"x"]}');
    });

    it('does not re-expand substituted text', () => {
      store.set('inner', 'value');
      store.set('outer', '{{inner}}');
      expect(store.expandTemplates('{{outer}}')).toBe('{{inner}}');
    });

    it('leaves unresolved placeholders verbatim and records a diagnostic', () => {
      const observer = createMockObserver();
      const watched = new RegisterStore({ observer });
      watched.set('known', 'ok');

      expect(watched.expandTemplates('a {{missing.field}} b {{known}} c')).toBe('a {{missing.field}} b ok c');
      expect(watched.diagnostics()).toEqual(['missing.field']);
      expect(observer.onWarning).toHaveBeenCalledWith(
        'Register template "{{missing.field}}" not found, left as-is',
        { ref: 'missing.field' },
      );
    });

    it('ignores placeholders that are not ASCII identifiers', () => {
      store.set('a', 'x');
      expect(store.expandTemplates('{{ a }} {{1a}} {{a-b}}')).toBe('{{ a }} {{1a}} {{a-b}}');
      expect(store.diagnostics()).toEqual([]);
    });

    it('is case-sensitive', () => {
      store.set('Name', 'upper');
      expect(store.expandTemplates('{{name}}/{{Name}}')).toBe('{{name}}/upper');
    });
  });
});

describe('toDisplayString', () => {
  it('formats each JSON kind', () => {
    expect(toDisplayString('hello')).toBe('hello');
    expect(toDisplayString(42)).toBe('42');
    expect(toDisplayString(true)).toBe('true');
    expect(toDisplayString(false)).toBe('false');
    expect(toDisplayString(null)).toBe('null');
    expect(toDisplayString([1, { b: 2, a: 1 }])).toBe('[1,{"a":1,"b":2}]');
  });
});
