import { describe, it, expect } from 'vitest';
import {
  estimateTokens, extractHtml, extractJson, formatError, mergeToolResults, truncateForLogging,
} from '../src/utils/text.js';

describe('extractJson', () => {
  it('parses a bare object', () => {
    expect(extractJson(' {"a": 1} ')).toEqual({ a: 1 });
  });

  it('reads a fenced block', () => {
    expect(extractJson('Here you go:\n```json\n{"b": 2}\n```\nAnything else?')).toEqual({ b: 2 });
  });

  it('finds an embedded object, ignoring braces inside strings', () => {
    expect(extractJson('result: {"c": {"d": "}"}} done')).toEqual({ c: { d: '}' } });
  });

  it('skips spans that do not parse', () => {
    expect(extractJson('first {bad} then {"ok": true}')).toEqual({ ok: true });
  });

  it('returns undefined when there is no object', () => {
    expect(extractJson('')).toBeUndefined();
    expect(extractJson('[1, 2]')).toBeUndefined();
    expect(extractJson('no json here')).toBeUndefined();
  });
});

describe('extractHtml', () => {
  it('returns a bare document', () => {
    expect(extractHtml('  <html><body>x</body></html>\n')).toBe('<html><body>x</body></html>');
  });

  it('reads a fenced document', () => {
    expect(extractHtml('Sure:\n```html\n<!DOCTYPE html><html></html>\n```')).toBe('<!DOCTYPE html><html></html>');
  });

  it('returns undefined without markup', () => {
    expect(extractHtml('plain text')).toBeUndefined();
  });
});

describe('helpers', () => {
  it('truncateForLogging', () => {
    expect(truncateForLogging('abcdef', 3)).toBe('abc...');
    expect(truncateForLogging('abc', 3)).toBe('abc');
  });

  it('estimateTokens', () => {
    expect(estimateTokens('abcdefghi')).toBe(2);
    expect(estimateTokens('')).toBe(0);
  });

  it('formatError', () => {
    expect(formatError(new TypeError('bad input'))).toBe('TypeError: bad input');
    expect(formatError('oops')).toBe('Error: oops');
  });

  it('mergeToolResults', () => {
    const merged = mergeToolResults([
      { tool: 'add', arguments: { a: 1, b: 1 }, success: true, result: 2 },
      { tool: 'fetch', arguments: {}, success: false, error: 'timeout' },
      { tool: 'add', arguments: { a: 2, b: 2 }, success: true, result: 4 },
    ]);
    expect(merged.toolsCalled).toEqual(['add', 'fetch', 'add']);
    expect(merged.successes).toBe(2);
    expect(merged.failures).toBe(1);
    expect(merged.results.add.result).toBe(4);
    expect(merged.results.fetch.error).toBe('timeout');
  });
});
