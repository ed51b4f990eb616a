/**
 * Rewrites test-case input parameters, substituting `{{testName.path}}` tokens
 * with values taken from responses captured earlier in the run.
 */

import type { JsonObject, JsonValue, ResponseMap } from '@shared/types';
import { MissingDependencyResponseError } from './errors';
import { extractPath } from './injection';

const TEMPLATE_PATTERN = /\{\{(.+?)\}\}/g;
const LEADING_TEMPLATE_PATTERN = /^\{\{(.+?)\}\}/;

export interface TemplateReference {
  dependency: string;
  path: string;
}

/**
 * Split `dep.result.content[0].text` into the dependency name and the path
 * that follows the first dot.
 */
export function parseReference(reference: string): TemplateReference {
  const dot = reference.indexOf('.');
  if (dot === -1) {
    return { dependency: reference, path: '' };
  }
  return { dependency: reference.slice(0, dot), path: reference.slice(dot + 1) };
}

/**
 * Inner reference of a value that starts with a template token, or null.
 */
export function leadingReference(value: string): string | null {
  const match = LEADING_TEMPLATE_PATTERN.exec(value);
  return match ? (match[1] ?? null) : null;
}

/**
 * Look up a reference in the response map without stringifying the result.
 *
 * @throws {MissingDependencyResponseError} When the dependency has no response
 * @throws {ExtractionError} When the path cannot be followed
 */
export function resolveReference(reference: string, responses: ResponseMap): unknown {
  const { dependency, path } = parseReference(reference);
  const response = responses.get(dependency);
  if (response === undefined) {
    throw new MissingDependencyResponseError(dependency);
  }
  return extractPath(response, path);
}

function stringifyValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Replace every token of a string in one left-to-right pass. Substituted text
 * is never rescanned.
 */
export function resolveTemplateString(template: string, responses: ResponseMap): string {
  return template.replace(TEMPLATE_PATTERN, (_token: string, reference: string) =>
    stringifyValue(resolveReference(reference, responses))
  );
}

function resolveValue(value: JsonValue, responses: ResponseMap): JsonValue {
  if (typeof value === 'string') {
    return resolveTemplateString(value, responses);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveValue(item, responses));
  }
  if (value !== null && typeof value === 'object') {
    return resolveParams(value, responses);
  }
  return value;
}

/**
 * Resolve all templates inside a parameter object. Returns a new object; the
 * input is left untouched. Keys are never templated.
 */
export function resolveParams(params: JsonObject, responses: ResponseMap): JsonObject {
  const resolved: JsonObject = {};
  for (const [key, value] of Object.entries(params)) {
    resolved[key] = resolveValue(value, responses);
  }
  return resolved;
}
