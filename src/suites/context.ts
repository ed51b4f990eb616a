/**
 * Shared inputs and small builders for the test-case catalogs.
 */

import type { AwsClients } from '@/aws/clients';
import {
  AwsResourceCleanup,
  type AwsResourceCleanupOptions,
} from '@/cleanups/awsResourceCleanup';
import { AwsStateValidator, type AwsStateValidatorOptions } from '@/validators/awsState';
import { ContainsTextValidator, type ContainsTextOptions } from '@/validators/containsText';
import type { CleanupTiming, TestCase } from '@shared/types';

export interface SuiteContext {
  clients: AwsClients;
  /** Standard integration test bucket */
  bucket: string;
  glueRoleArn: string;
  timing: CleanupTiming;
}

export type SuiteBuilder = (ctx: SuiteContext) => TestCase[];

export function containsText(expected: string, options?: ContainsTextOptions): ContainsTextValidator {
  return new ContainsTextValidator(expected, options);
}

export function awsState(ctx: SuiteContext, options: AwsStateValidatorOptions): AwsStateValidator {
  return new AwsStateValidator(ctx.clients, options);
}

export function awsCleanup(
  ctx: SuiteContext,
  options: Omit<AwsResourceCleanupOptions, 'timing'>
): AwsResourceCleanup {
  return new AwsResourceCleanup(ctx.clients, { ...options, timing: ctx.timing });
}

/**
 * Template reading a field of a test case's JSON text output.
 */
export function outputOf(testName: string, field: string): string {
  return `{{${testName}.result.content[0].text.${field}}}`;
}

/**
 * Make one case of a catalog wait for extra cases, typically from another
 * catalog that shares its resource.
 */
export function withDependencies(
  testCases: TestCase[],
  name: string,
  dependencies: readonly string[]
): TestCase[] {
  return testCases.map((testCase) =>
    testCase.name === name
      ? { ...testCase, dependencies: [...new Set([...(testCase.dependencies ?? []), ...dependencies])] }
      : testCase
  );
}

/**
 * Names of the cases that depend on anything, i.e. the ones touching shared resources.
 */
export function dependentCaseNames(testCases: readonly TestCase[]): string[] {
  return testCases.filter((testCase) => (testCase.dependencies ?? []).length > 0).map((testCase) => testCase.name);
}
