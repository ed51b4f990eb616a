/**
 * Test executor.
 *
 * Runs test cases one at a time in dependency order. Each tool is called at
 * most once per run, failures upstream turn into skips downstream, and every
 * case's cleanups run exactly once, after the cleanups of all of its
 * dependents. A single failing case never interrupts the run.
 */

import type {
  ExecutionReport,
  ExecutionResult,
  ExecutionSummary,
  JsonObject,
  TestCase,
  ToolInvoker,
  ToolResponse,
  ValidationResult,
  Validator,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { DependencyGraph } from './dependencyGraph';
import { DependencyFailedError, MissingDependencyResponseError } from './errors';
import { resolveParams } from './parameterResolver';

const logger = setupLogger('dataprocessing-tests:executor');

/**
 * Mutable state of a single `execute()` call.
 */
interface RunState {
  graph: DependencyGraph;
  responses: Map<string, ToolResponse>;
  successes: Map<string, boolean>;
  invoked: Set<string>;
  resolvedParams: Map<string, JsonObject>;
  skipped: Set<string>;
  concluded: Set<string>;
  cleanedUp: Set<string>;
}

/**
 * Summarize a list of results. `failed` counts executed cases that did not
 * succeed; skipped cases are counted separately.
 */
export function summarize(results: readonly ExecutionResult[]): ExecutionSummary {
  const total = results.length;
  const passed = results.filter((r) => r.success).length;
  const skipped = results.filter((r) => r.skipped).length;

  return {
    total,
    passed,
    failed: total - passed - skipped,
    skipped,
    successRate: total === 0 ? null : (passed / total) * 100,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Executor {
  private readonly toolInvoker: ToolInvoker;

  constructor(toolInvoker: ToolInvoker) {
    this.toolInvoker = toolInvoker;
  }

  /**
   * Execute test cases in dependency order.
   *
   * @param testCases - Test cases of this run; names must be unique
   * @returns Success per test case, the ordered results and a summary
   *
   * @throws {DuplicateTestCaseError} Before any call, on a repeated name
   * @throws {UndefinedDependencyError} Before any call, on an unknown dependency
   * @throws {CycleDetectedError} Before any call, when dependencies form a cycle
   */
  async execute(testCases: readonly TestCase[]): Promise<ExecutionReport> {
    const graph = new DependencyGraph(testCases);
    const order = graph.topologicalOrder();

    logger.info({ total: order.length, order }, 'Starting test execution');

    const state: RunState = {
      graph,
      responses: new Map(),
      successes: new Map(),
      invoked: new Set(),
      resolvedParams: new Map(),
      skipped: new Set(),
      concluded: new Set(),
      cleanedUp: new Set(),
    };
    const results: ExecutionResult[] = [];

    for (const name of order) {
      const testCase = graph.get(name);
      if (testCase === undefined) continue;

      results.push(await this.runTestCase(testCase, state));
      state.concluded.add(name);
      await this.releaseCleanups(name, state);
    }

    const summary = summarize(results);
    logger.info(summary, 'Test execution completed');

    return {
      successMap: Object.fromEntries(state.successes),
      results,
      summary,
    };
  }

  private async runTestCase(testCase: TestCase, state: RunState): Promise<ExecutionResult> {
    const failedDependency = this.findFailedDependency(testCase.name, state, new Map());
    if (failedDependency !== null) {
      const reason = new DependencyFailedError(failedDependency);
      logger.warn(
        { test: testCase.name, dependency: failedDependency },
        'Skipping test case because a dependency failed'
      );
      state.successes.set(testCase.name, false);
      state.skipped.add(testCase.name);

      return {
        name: testCase.name,
        toolName: testCase.toolName,
        success: false,
        skipped: true,
        validations: [{ success: false, message: reason.message }],
        inputParams: testCase.inputParams,
        durationMs: 0,
      };
    }

    logger.info({ test: testCase.name, tool: testCase.toolName }, 'Running test case');
    const startedAt = Date.now();
    const validations: ValidationResult[] = [];

    try {
      const response = await this.invoke(testCase.name, state);
      const params = state.resolvedParams.get(testCase.name) ?? testCase.inputParams;

      for (const validator of testCase.validators ?? []) {
        const validation = await this.runValidator(validator, response, params, state);
        logger.debug(
          { test: testCase.name, validator: validator.name, ...validation },
          'Validator finished'
        );
        validations.push(validation);
      }

      const success = validations.every((v) => v.success);
      state.successes.set(testCase.name, success);

      if (success) {
        logger.info({ test: testCase.name }, 'Test case passed');
      } else {
        logger.warn(
          { test: testCase.name, failures: validations.filter((v) => !v.success) },
          'Test case failed validation'
        );
      }

      return {
        name: testCase.name,
        toolName: testCase.toolName,
        success,
        skipped: false,
        validations,
        inputParams: params,
        response,
        durationMs: Date.now() - startedAt,
      };
    } catch (error) {
      logger.error({ test: testCase.name, error }, 'Test case raised an error');
      state.successes.set(testCase.name, false);

      return {
        name: testCase.name,
        toolName: testCase.toolName,
        success: false,
        skipped: false,
        validations,
        error: errorMessage(error),
        inputParams: state.resolvedParams.get(testCase.name) ?? testCase.inputParams,
        response: state.responses.get(testCase.name),
        durationMs: Date.now() - startedAt,
      };
    }
  }

  /**
   * Depth-first search for the first failed test case among `name` and its
   * transitive dependencies. `visited` memoizes nodes already found healthy.
   */
  private findFailedDependency(
    name: string,
    state: RunState,
    visited: Map<string, string | null>
  ): string | null {
    const memo = visited.get(name);
    if (memo !== undefined) {
      return memo;
    }

    let failed: string | null = state.successes.get(name) === false ? name : null;
    for (const dependency of state.graph.dependenciesOf(name)) {
      if (failed !== null) break;
      failed = this.findFailedDependency(dependency, state, visited);
    }

    visited.set(name, failed);
    return failed;
  }

  /**
   * Call the tool of a test case once, invoking its dependencies first.
   */
  private async invoke(name: string, state: RunState): Promise<ToolResponse | undefined> {
    if (state.invoked.has(name)) {
      return state.responses.get(name);
    }
    state.invoked.add(name);

    const testCase = state.graph.get(name);
    if (testCase === undefined) {
      return undefined;
    }

    for (const dependency of testCase.dependencies ?? []) {
      await this.invoke(dependency, state);
      if (!state.responses.has(dependency)) {
        throw new MissingDependencyResponseError(dependency);
      }
    }

    for (const action of testCase.setup ?? []) {
      await action();
    }

    const params = resolveParams(testCase.inputParams, state.responses);
    state.resolvedParams.set(name, params);

    logger.debug({ test: name, tool: testCase.toolName, params }, 'Calling tool');
    const response = await this.toolInvoker.callTool(testCase.toolName, params);
    state.responses.set(name, response);

    return response;
  }

  private async runValidator(
    validator: Validator,
    response: ToolResponse | undefined,
    params: JsonObject,
    state: RunState
  ): Promise<ValidationResult> {
    switch (validator.kind) {
      case 'response':
        if (response === undefined) {
          return { success: false, message: 'No response captured' };
        }
        return validator.validate(response);
      case 'live-state':
        return validator.validate(params, state.responses);
    }
  }

  /**
   * Run the cleanups of `name` once it has concluded and all of its dependents
   * have been cleaned up, then walk its dependencies in reverse declaration
   * order.
   */
  private async releaseCleanups(name: string, state: RunState): Promise<void> {
    if (state.cleanedUp.has(name) || !state.concluded.has(name)) {
      return;
    }
    if (state.graph.dependentsOf(name).some((dependent) => !state.cleanedUp.has(dependent))) {
      return;
    }
    state.cleanedUp.add(name);

    if (!state.skipped.has(name)) {
      await this.runCleanups(name, state);
    }

    const dependencies = [...state.graph.dependenciesOf(name)].reverse();
    for (const dependency of dependencies) {
      await this.releaseCleanups(dependency, state);
    }
  }

  private async runCleanups(name: string, state: RunState): Promise<void> {
    const testCase = state.graph.get(name);
    if (testCase === undefined) return;

    const params = state.resolvedParams.get(name) ?? testCase.inputParams;
    const response = state.responses.get(name);

    for (const cleanup of testCase.cleanups ?? []) {
      try {
        logger.debug({ test: name, cleanup: cleanup.name }, 'Running cleanup');
        await cleanup.cleanUp(params, response);
      } catch (error) {
        logger.error({ test: name, cleanup: cleanup.name, error }, 'Cleanup failed');
      }
    }
  }
}
