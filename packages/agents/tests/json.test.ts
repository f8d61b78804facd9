// Tests for lenient JSON recovery from model replies

import { describe, it, expect } from 'vitest';
import { extractFirstJsonObject, tryParseFirstJsonObject } from '../utils/json.js';

describe('extractFirstJsonObject', () => {
  it('strips code fences and surrounding prose', () => {
    expect(extractFirstJsonObject('Here you go:\n```json\n{"a": {"b": 1}}\n```')).toBe('{"a": {"b": 1}}');
  });

  it('ignores braces inside strings', () => {
    expect(extractFirstJsonObject('Result: {"text": "use } carefully", "n": 2} trailing')).toBe(
      '{"text": "use } carefully", "n": 2}',
    );
  });

  it('handles escaped quotes inside strings', () => {
    const text = '{"q": "say \\"hi\\" {"}';
    expect(extractFirstJsonObject(text)).toBe(text);
  });

  it('returns null without a balanced object', () => {
    expect(extractFirstJsonObject('no json')).toBeNull();
    expect(extractFirstJsonObject('{"a": 1')).toBeNull();
  });
});

describe('tryParseFirstJsonObject', () => {
  it('parses the first object', () => {
    expect(tryParseFirstJsonObject('```\n{"action": "BUY"} {"action": "SELL"}\n```')).toEqual({ action: 'BUY' });
  });

  it('returns null for invalid JSON', () => {
    expect(tryParseFirstJsonObject('{action: BUY}')).toBeNull();
  });
});
