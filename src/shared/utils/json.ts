/**
 * Helpers for walking loosely typed JSON values and tool responses.
 */

import type { ToolResponse } from '@shared/types';

/**
 * Type guard for plain (non-array) objects.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON string, returning undefined instead of throwing.
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Text of the first content item of a tool response, if any.
 */
export function firstContentText(response: ToolResponse | undefined): string | undefined {
  const first = response?.result?.content?.[0];
  return typeof first?.text === 'string' ? first.text : undefined;
}

/**
 * Short, single-line rendering of a value for error messages.
 */
export function preview(value: unknown, maxLength: number = 200): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
  }
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Human readable type name of a JSON value.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
