/**
 * Test fixtures shared by the unit tests.
 */

import type {
  CleanupAction,
  JsonObject,
  LiveStateValidator,
  ResponseValidator,
  TestCase,
  ToolInvoker,
  ToolResponse,
  ValidationResult,
} from '@shared/types';

/**
 * Tool response whose first content item carries the given text.
 */
export function textResponse(text: string, isError: boolean = false): ToolResponse {
  return { result: { content: [{ type: 'text', text }], isError } };
}

/**
 * Tool response carrying a JSON document as text, as the server returns it.
 */
export function jsonResponse(body: unknown): ToolResponse {
  return textResponse(JSON.stringify(body));
}

type ToolHandler = (params: JsonObject) => ToolResponse | Promise<ToolResponse>;

/**
 * In-process ToolInvoker that records every call.
 */
export class FakeToolInvoker implements ToolInvoker {
  readonly calls: Array<{ toolName: string; params: JsonObject }> = [];
  private readonly handlers = new Map<string, ToolHandler>();

  on(toolName: string, handler: ToolHandler): this {
    this.handlers.set(toolName, handler);
    return this;
  }

  async callTool(toolName: string, params: JsonObject): Promise<ToolResponse> {
    this.calls.push({ toolName, params });
    const handler = this.handlers.get(toolName);
    if (handler === undefined) {
      return textResponse(`ok:${toolName}`);
    }
    return handler(params);
  }

  callsTo(toolName: string): JsonObject[] {
    return this.calls.filter((c) => c.toolName === toolName).map((c) => c.params);
  }
}

export function passingValidator(name: string = 'pass'): ResponseValidator {
  return {
    kind: 'response',
    name,
    validate: async () => ({ success: true, message: 'ok' }),
  };
}

export function failingValidator(name: string = 'fail'): ResponseValidator {
  return {
    kind: 'response',
    name,
    validate: async () => ({ success: false, message: 'nope' }),
  };
}

export function liveStateValidator(
  validate: (params: JsonObject) => Promise<ValidationResult>
): LiveStateValidator {
  return { kind: 'live-state', name: 'live', validate };
}

/**
 * Cleanup that appends its label to a shared log.
 */
export function recordingCleanup(log: string[], label: string): CleanupAction {
  return {
    name: label,
    cleanUp: async () => {
      log.push(label);
    },
  };
}

export function testCase(name: string, overrides: Partial<TestCase> = {}): TestCase {
  return {
    name,
    toolName: `tool_${name}`,
    inputParams: {},
    ...overrides,
  };
}
