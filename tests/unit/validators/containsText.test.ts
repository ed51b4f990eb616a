/**
 * Unit tests for validators/containsText.ts
 */

import { describe, it, expect } from 'vitest';
import { ContainsTextValidator } from '@/validators/containsText';
import { jsonResponse, textResponse } from '../../helpers/fixtures';

describe('ContainsTextValidator', () => {
  it('should be a response validator', () => {
    const validator = new ContainsTextValidator('created');

    expect(validator.kind).toBe('response');
    expect(validator.name).toBe('contains-text:created');
  });

  it('should fail when the response has no content', async () => {
    const result = await new ContainsTextValidator('x').validate({ result: { content: [] } });

    expect(result).toEqual({ success: false, message: 'No content in response' });
  });

  it('should fail when the response is a JSON-RPC error', async () => {
    const result = await new ContainsTextValidator('x').validate({
      error: { code: -32602, message: 'Invalid params' },
    });

    expect(result).toEqual({ success: false, message: 'No content in response' });
  });

  it('should pass when plain text contains the expected string', async () => {
    const result = await new ContainsTextValidator('Field required').validate(
      textResponse('1 validation error: job_name Field required', true)
    );

    expect(result).toEqual({ success: true, message: 'Error message contains expected string' });
  });

  it('should fail when plain text lacks the expected string', async () => {
    const result = await new ContainsTextValidator('Field required').validate(
      textResponse('Internal error')
    );

    expect(result).toEqual({
      success: false,
      message: "Expected string 'Field required' not found, and not valid JSON",
    });
  });

  it('should search the embedded content text of a JSON response', async () => {
    const response = jsonResponse({
      content: [{ type: 'text', text: 'Successfully created Glue job test-job' }],
      job_name: 'test-job',
    });

    expect(await new ContainsTextValidator('Successfully created').validate(response)).toEqual({
      success: true,
      message: 'Text and count match',
    });
    expect(await new ContainsTextValidator('Deleted').validate(response)).toEqual({
      success: false,
      message: "Expected string 'Deleted' not found in response",
    });
  });

  it('should not look at fields other than the embedded text', async () => {
    const response = jsonResponse({ content: [], message: 'Successfully created' });

    const result = await new ContainsTextValidator('Successfully created').validate(response);

    expect(result.success).toBe(false);
  });

  it('should compare count and bucket_count', async () => {
    const response = jsonResponse({
      content: [{ type: 'text', text: 'Listed buckets' }],
      count: 2,
      bucket_count: 5,
    });

    expect(
      await new ContainsTextValidator('Listed', { expectedCount: 2, bucketCount: 5 }).validate(response)
    ).toEqual({ success: true, message: 'Text and count match' });
    expect(await new ContainsTextValidator('Listed', { expectedCount: 3 }).validate(response)).toEqual({
      success: false,
      message: 'Count mismatch: expected 3, got 2',
    });
    expect(await new ContainsTextValidator('Listed', { bucketCount: 1 }).validate(response)).toEqual({
      success: false,
      message: 'Bucket count mismatch: expected 1, got 5',
    });
  });

  it('should report a missing count field', async () => {
    const response = jsonResponse({ content: [{ type: 'text', text: 'Listed' }] });

    expect(await new ContainsTextValidator('Listed', { expectedCount: 0 }).validate(response)).toEqual({
      success: false,
      message: 'Count mismatch: expected 0, got undefined',
    });
  });
});
