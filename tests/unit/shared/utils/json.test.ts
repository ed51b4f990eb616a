import { describeType, firstContentText, isRecord, preview, tryParseJson } from '@shared/utils/json';
import { textResponse } from '../../../helpers/fixtures';

describe('json helpers', () => {
  it('isRecord accepts plain objects only', () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });

  it('tryParseJson returns undefined for invalid input', () => {
    expect(tryParseJson('{"job_name":"etl"}')).toEqual({ job_name: 'etl' });
    expect(tryParseJson('not json')).toBeUndefined();
  });

  it('firstContentText reads the first content item', () => {
    expect(firstContentText(textResponse('hello'))).toBe('hello');
    expect(firstContentText({ result: { content: [] } })).toBeUndefined();
    expect(firstContentText(undefined)).toBeUndefined();
  });

  it('preview truncates long values', () => {
    expect(preview('abcdef', 3)).toBe('abc...');
    expect(preview({ a: 1 })).toBe('{"a":1}');
    expect(preview(undefined)).toBe('undefined');
  });

  it('describeType distinguishes null and arrays', () => {
    expect(describeType(null)).toBe('null');
    expect(describeType([1])).toBe('array');
    expect(describeType({})).toBe('object');
    expect(describeType(1)).toBe('number');
  });
});
