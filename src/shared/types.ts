/**
 * Core type definitions for the data-processing MCP integration tests.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * JSON value model used for tool parameters and captured responses.
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * One item of a tool result's content list.
 */
export interface ToolContent {
  type: string;
  text?: string;
  [key: string]: unknown;
}

/**
 * Tool result as returned by `tools/call`.
 */
export interface ToolResult {
  content: ToolContent[];
  isError?: boolean;
  [key: string]: unknown;
}

/**
 * JSON-RPC error payload.
 */
export interface ToolError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * Captured response of a tool call, shaped like the JSON-RPC envelope so that
 * templates can address it as `{{test.result.content[0].text...}}`.
 */
export interface ToolResponse {
  result?: ToolResult;
  error?: ToolError;
}

/**
 * Anything that can invoke an MCP tool.
 */
export interface ToolInvoker {
  callTool(toolName: string, params: JsonObject): Promise<ToolResponse>;
}

/**
 * Responses captured so far in a run, keyed by test case name.
 */
export type ResponseMap = ReadonlyMap<string, ToolResponse>;

/**
 * Outcome of a single validator.
 */
export interface ValidationResult {
  success: boolean;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Validator that inspects the tool response only.
 */
export interface ResponseValidator {
  readonly kind: 'response';
  readonly name: string;
  validate(response: ToolResponse): Promise<ValidationResult>;
}

/**
 * Validator that queries live external state. Receives the (resolved) tool
 * parameters and the response map for cross-test parameter injection.
 */
export interface LiveStateValidator {
  readonly kind: 'live-state';
  readonly name: string;
  validate(toolParams: JsonObject, responses: ResponseMap): Promise<ValidationResult>;
}

export type Validator = ResponseValidator | LiveStateValidator;

/**
 * Best-effort teardown of whatever a test case created.
 *
 * Implementations must not throw; the executor still guards every call.
 */
export interface CleanupAction {
  readonly name: string;
  cleanUp(toolParams: JsonObject, response: ToolResponse | undefined): Promise<void>;
}

/**
 * Argument-less preparation run before the tool call (e.g. upload a script).
 */
export type SetupAction = () => Promise<unknown>;

/**
 * A unit of work: one tool call, its validators and its cleanups.
 */
export interface TestCase {
  name: string;
  toolName: string;
  inputParams: JsonObject;
  dependencies?: string[];
  validators?: Validator[];
  cleanups?: CleanupAction[];
  setup?: SetupAction[];
}

/**
 * Per test case result of a run.
 */
export interface ExecutionResult {
  name: string;
  toolName: string;
  success: boolean;
  skipped: boolean;
  validations: ValidationResult[];
  error?: string;
  inputParams: JsonObject;
  response?: ToolResponse;
  durationMs: number;
}

/**
 * Aggregate counts of a run.
 */
export interface ExecutionSummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  /** passed / total * 100, or null when nothing ran */
  successRate: number | null;
}

/**
 * Return value of {@link Executor.execute}.
 */
export interface ExecutionReport {
  successMap: Record<string, boolean>;
  results: ExecutionResult[];
  summary: ExecutionSummary;
}

/**
 * Report formats supported by the report generator.
 */
export type ReportFormat = 'markdown' | 'json' | 'html';

/**
 * Harness configuration.
 */
export interface Config {
  aws: {
    region: string;
    profile?: string;
  };
  server: {
    command: string;
    args: string[];
    cwd?: string;
    env?: Record<string, string>;
    allowWrite: boolean;
    callTimeoutMs: number;
  };
  reports: {
    directory: string;
    formats: ReportFormat[];
  };
  groups?: string[];
  cleanup: CleanupTiming;
}

/**
 * Polling and settling delays used by cleanups that wait on AWS state.
 */
export interface CleanupTiming {
  pollIntervalMs: number;
  maxPollAttempts: number;
  sessionSettleMs: number;
  jobRunSettleMs: number;
}
