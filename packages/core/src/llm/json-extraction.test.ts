import { describe, it, expect } from 'vitest';
import {
  bareFenceStrategy,
  braceSpanStrategy,
  extractJsonObject,
  jsonFenceStrategy,
  rawTextStrategy,
} from './json-extraction.js';

describe('extraction strategies', () => {
  it('jsonFenceStrategy should return the content of a json fence', () => {
    expect(jsonFenceStrategy.candidate('Result:\n```json\n{"a": 1}\n```\nDone')).toBe('{"a": 1}');
    expect(jsonFenceStrategy.candidate('no fence')).toBeUndefined();
  });

  it('bareFenceStrategy should return the content of the first fence', () => {
    expect(bareFenceStrategy.candidate('```\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(bareFenceStrategy.candidate('```unterminated')).toBeUndefined();
  });

  it('braceSpanStrategy should span from the first { to the last }', () => {
    expect(braceSpanStrategy.candidate('x {"a": {"b": 2}} y')).toBe('{"a": {"b": 2}}');
    expect(braceSpanStrategy.candidate('} before {')).toBeUndefined();
  });

  it('rawTextStrategy should return the trimmed text', () => {
    expect(rawTextStrategy.candidate('  {"a": 1}  ')).toBe('{"a": 1}');
  });
});

describe('extractJsonObject', () => {
  it('should parse clean JSON through the brace span strategy', () => {
    const result = extractJsonObject('{"is_news": true, "reason": "event report"}');
    expect(result).toEqual({
      ok: true,
      value: { is_news: true, reason: 'event report' },
      strategy: 'brace-span',
    });
  });

  it('should extract JSON from a json code fence', () => {
    const input = 'Here is my assessment:\n```json\n{"is_misinformation": true, "confidence": 0.9}\n```';
    const result = extractJsonObject(input);
    expect(result).toEqual({
      ok: true,
      value: { is_misinformation: true, confidence: 0.9 },
      strategy: 'json-fence',
    });
  });

  it('should extract JSON from a bare code fence', () => {
    const result = extractJsonObject('```\n{"key": "value"}\n```');
    expect(result).toEqual({ ok: true, value: { key: 'value' }, strategy: 'bare-fence' });
  });

  it('should extract JSON embedded in prose', () => {
    const input = 'After searching, I conclude {"summary": "a {nested} brace", "evidence": []} overall.';
    const result = extractJsonObject(input);
    expect(result).toEqual({
      ok: true,
      value: { summary: 'a {nested} brace', evidence: [] },
      strategy: 'brace-span',
    });
  });

  it('should fall through a fence that does not contain JSON', () => {
    const input = '```\nnot json\n```\n{"ok": true}';
    const result = extractJsonObject(input);
    expect(result).toEqual({ ok: true, value: { ok: true }, strategy: 'brace-span' });
  });

  it('should signal failure for an empty string', () => {
    const result = extractJsonObject('');
    expect(result).toEqual({
      ok: false,
      failure: { reason: 'Model output was empty', excerpt: '' },
    });
  });

  it('should signal failure for prose without JSON', () => {
    const result = extractJsonObject('I could not reach a conclusion.');
    expect(result).toEqual({
      ok: false,
      failure: {
        reason: 'No JSON object found in model output',
        excerpt: 'I could not reach a conclusion.',
      },
    });
  });

  it('should not accept JSON arrays or scalars as the result object', () => {
    expect(extractJsonObject('[1, 2, 3]').ok).toBe(false);
    expect(extractJsonObject('42').ok).toBe(false);
  });

  it('should cap the failure excerpt at 500 characters', () => {
    const raw = 'x'.repeat(800);
    const result = extractJsonObject(raw);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.excerpt).toHaveLength(500);
    }
  });

  it('should signal failure for malformed JSON instead of throwing', () => {
    expect(() => extractJsonObject('{"is_misinformation": tru')).not.toThrow();
    expect(extractJsonObject('{"is_misinformation": tru').ok).toBe(false);
  });
});
