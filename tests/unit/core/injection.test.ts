/**
 * Unit tests for core/injection.ts
 */

import { describe, it, expect } from 'vitest';
import { extractPath, tokenizePath } from '@core/injection';
import { ExtractionError } from '@core/errors';
import { jsonResponse } from '../../helpers/fixtures';

describe('tokenizePath', () => {
  it('should split fields and bracketed indexes', () => {
    expect(tokenizePath('result.content[0].text.id')).toEqual([
      { type: 'field', name: 'result' },
      { type: 'field', name: 'content' },
      { type: 'index', index: 0 },
      { type: 'field', name: 'text' },
      { type: 'field', name: 'id' },
    ]);
  });

  it('should return no tokens for an empty path', () => {
    expect(tokenizePath('')).toEqual([]);
  });

  it('should read multi-digit indexes', () => {
    expect(tokenizePath('items[12]')).toEqual([
      { type: 'field', name: 'items' },
      { type: 'index', index: 12 },
    ]);
  });
});

describe('extractPath', () => {
  const response = jsonResponse({ id: 'abc123', steps: ['s-1', 's-2'], nested: { count: 3 } });

  it('should parse JSON text before looking up a field', () => {
    expect(extractPath(response, 'result.content[0].text.id')).toBe('abc123');
  });

  it('should follow indexes into parsed JSON', () => {
    expect(extractPath(response, 'result.content[0].text.steps[1]')).toBe('s-2');
  });

  it('should return non-string values as they are', () => {
    expect(extractPath(response, 'result.content[0].text.nested')).toEqual({ count: 3 });
  });

  it('should return the root for an empty path', () => {
    expect(extractPath(response, '')).toBe(response);
  });

  it('should reject an index on a non-list', () => {
    expect(() => extractPath({ a: { b: 1 } }, 'a[0]')).toThrow(
      new ExtractionError('Expected list at [0], got object')
    );
  });

  it('should reject an index out of range', () => {
    expect(() => extractPath({ a: ['x'] }, 'a[2]')).toThrow(
      'Index [2] out of range for list of length 1'
    );
  });

  it('should reject a string that is not JSON', () => {
    expect(() => extractPath({ a: 'not json' }, 'a.id')).toThrow(
      "Expected JSON string at 'id' but failed to parse."
    );
  });

  it('should reject a missing key', () => {
    expect(() => extractPath({ a: 1 }, 'missing')).toThrow(`Cannot find key 'missing' in {"a":1}`);
  });

  it('should reject a field lookup on a scalar', () => {
    expect(() => extractPath({ a: 5 }, 'a.b')).toThrow(ExtractionError);
  });

  it('should reject a field lookup on a list', () => {
    expect(() => extractPath({ a: [1] }, 'a.b')).toThrow("Cannot find key 'b' in [1]");
  });
});
