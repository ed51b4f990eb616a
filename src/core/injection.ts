/**
 * Path evaluator for the `{{test.path}}` template language.
 *
 * A path is a sequence of field names and bracketed indexes, e.g.
 * `result.content[0].text.cluster_id`. When a field lookup meets a string the
 * string is parsed as JSON first, which lets templates reach into the JSON
 * text that MCP tools return.
 */

import { ExtractionError } from './errors';
import { describeType, isRecord, preview } from '@shared/utils/json';

export type PathToken = { type: 'field'; name: string } | { type: 'index'; index: number };

const TOKEN_PATTERN = /\w+|\[\d+\]/g;
const INDEX_PATTERN = /^\[(\d+)\]$/;

/**
 * Split a path into field and index tokens. Separators are implied.
 *
 * @example
 * tokenizePath('content[0].text') // field content, index 0, field text
 */
export function tokenizePath(path: string): PathToken[] {
  const raw = path.match(TOKEN_PATTERN) ?? [];

  return raw.map((token): PathToken => {
    const indexMatch = INDEX_PATTERN.exec(token);
    if (indexMatch) {
      return { type: 'index', index: Number(indexMatch[1]) };
    }
    return { type: 'field', name: token };
  });
}

/**
 * Follow a path through a value.
 *
 * @param value - Root value (typically a captured tool response)
 * @param path - Path such as `result.content[0].text.id`; empty returns the root
 * @returns The value found at the end of the path
 * @throws {ExtractionError} On a wrong container kind, a missing key, an
 *   out-of-range index or a string that is not valid JSON
 */
export function extractPath(value: unknown, path: string): unknown {
  let current: unknown = value;

  for (const token of tokenizePath(path)) {
    if (token.type === 'index') {
      if (!Array.isArray(current)) {
        throw new ExtractionError(`Expected list at [${token.index}], got ${describeType(current)}`);
      }
      if (token.index >= current.length) {
        throw new ExtractionError(
          `Index [${token.index}] out of range for list of length ${current.length}`
        );
      }
      current = current[token.index];
      continue;
    }

    if (typeof current === 'string') {
      try {
        current = JSON.parse(current);
      } catch (error) {
        throw new ExtractionError(`Expected JSON string at '${token.name}' but failed to parse.`, {
          cause: error,
        });
      }
    }

    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, token.name)) {
      throw new ExtractionError(`Cannot find key '${token.name}' in ${preview(current)}`);
    }
    current = current[token.name];
  }

  return current;
}
