/**
 * Response validator that looks for an expected string in the tool output.
 */

import type { ResponseValidator, ToolResponse, ValidationResult } from '@shared/types';
import { firstContentText, isRecord, tryParseJson } from '@shared/utils/json';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('dataprocessing-tests:validator.contains-text');

export interface ContainsTextOptions {
  /** Expected value of the top-level `count` field */
  expectedCount?: number;
  /** Expected value of the top-level `bucket_count` field */
  bucketCount?: number;
}

/**
 * Passes when the response text contains `expected`.
 *
 * Plain text responses (typically error messages) are searched directly.
 * JSON responses are searched in their embedded `content[0].text`, and may
 * additionally be checked for `count` and `bucket_count`.
 */
export class ContainsTextValidator implements ResponseValidator {
  readonly kind = 'response' as const;
  readonly name: string;

  constructor(
    private readonly expected: string,
    private readonly options: ContainsTextOptions = {}
  ) {
    this.name = `contains-text:${expected}`;
  }

  async validate(response: ToolResponse): Promise<ValidationResult> {
    logger.debug({ expected: this.expected, response }, 'Validating response text');

    if (!response.result?.content?.length) {
      return { success: false, message: 'No content in response' };
    }

    const text = firstContentText(response) ?? '';
    const parsed = tryParseJson(text);

    if (!isRecord(parsed)) {
      if (text.includes(this.expected)) {
        return { success: true, message: 'Error message contains expected string' };
      }
      return {
        success: false,
        message: `Expected string '${this.expected}' not found, and not valid JSON`,
      };
    }

    const embedded = embeddedText(parsed);
    if (!embedded.includes(this.expected)) {
      return {
        success: false,
        message: `Expected string '${this.expected}' not found in response`,
      };
    }

    const { expectedCount, bucketCount } = this.options;
    if (expectedCount !== undefined && parsed.count !== expectedCount) {
      return {
        success: false,
        message: `Count mismatch: expected ${expectedCount}, got ${String(parsed.count)}`,
      };
    }
    if (bucketCount !== undefined && parsed.bucket_count !== bucketCount) {
      return {
        success: false,
        message: `Bucket count mismatch: expected ${bucketCount}, got ${String(parsed.bucket_count)}`,
      };
    }

    return { success: true, message: 'Text and count match' };
  }
}

function embeddedText(document: Record<string, unknown>): string {
  const content = document.content;
  if (!Array.isArray(content)) return '';

  const first: unknown = content[0];
  if (!isRecord(first) || typeof first.text !== 'string') return '';
  return first.text;
}
