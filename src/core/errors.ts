/**
 * Error taxonomy of the test-execution engine.
 */

/**
 * Base class for all harness errors.
 */
export class HarnessError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HarnessError';
  }
}

/**
 * The declared dependencies contain a cycle. Raised before anything runs.
 */
export class CycleDetectedError extends HarnessError {
  readonly remaining: string[];

  constructor(remaining: string[]) {
    super(`Cycle detected in test dependencies among: ${remaining.join(', ')}`);
    this.name = 'CycleDetectedError';
    this.remaining = remaining;
  }
}

/**
 * A test case depends on a name that is not part of the run.
 */
export class UndefinedDependencyError extends HarnessError {
  constructor(
    readonly testName: string,
    readonly dependency: string
  ) {
    super(`Test case '${testName}' depends on undefined test case '${dependency}'`);
    this.name = 'UndefinedDependencyError';
  }
}

/**
 * Two test cases of one run share a name.
 */
export class DuplicateTestCaseError extends HarnessError {
  constructor(readonly testName: string) {
    super(`Duplicate test case name: ${testName}`);
    this.name = 'DuplicateTestCaseError';
  }
}

/**
 * A template references a dependency that has no captured response.
 */
export class MissingDependencyResponseError extends HarnessError {
  constructor(readonly dependency: string) {
    super(`Missing response for dependency: ${dependency}`);
    this.name = 'MissingDependencyResponseError';
  }
}

/**
 * A path could not be followed through a response.
 */
export class ExtractionError extends HarnessError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

/**
 * A (transitive) dependency of a test case did not succeed.
 */
export class DependencyFailedError extends HarnessError {
  constructor(readonly dependency: string) {
    super(`Dependency ${dependency} failed`);
    this.name = 'DependencyFailedError';
  }
}
