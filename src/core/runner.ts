/**
 * Runs test-case groups against the server and writes the reports.
 *
 * Each group gets a fresh executor, so responses never leak between groups.
 */

import type {
  ExecutionReport,
  ExecutionResult,
  ExecutionSummary,
  ReportFormat,
  TestCase,
  ToolInvoker,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { Executor, summarize } from './executor';
import { ReportGenerator } from './reporting';

const logger = setupLogger('dataprocessing-tests:runner');

export interface GroupReport {
  group: string;
  report: ExecutionReport;
}

export interface RunResult {
  groups: GroupReport[];
  results: ExecutionResult[];
  summary: ExecutionSummary;
}

/**
 * Execute groups one after another.
 *
 * @throws The executor's graph errors, before the offending group calls anything
 */
export async function runGroups(
  groups: ReadonlyArray<readonly [string, readonly TestCase[]]>,
  invoker: ToolInvoker
): Promise<RunResult> {
  const reports: GroupReport[] = [];

  for (const [group, testCases] of groups) {
    logger.info({ group, testCases: testCases.length }, 'Running test group');
    const report = await new Executor(invoker).execute(testCases);
    logger.info({ group, ...report.summary }, 'Test group completed');
    reports.push({ group, report });
  }

  const results = reports.flatMap(({ report }) => report.results);
  return { groups: reports, results, summary: summarize(results) };
}

/**
 * A run passes only when nothing failed and nothing was skipped.
 */
export function runPassed(summary: ExecutionSummary): boolean {
  return summary.failed === 0 && summary.skipped === 0;
}

export async function writeReports(
  results: readonly ExecutionResult[],
  directory: string,
  formats: readonly string[]
): Promise<Partial<Record<ReportFormat, string>>> {
  const paths = await new ReportGenerator(directory).generateReport(results, formats);
  logger.info({ reports: paths }, 'Reports written');
  return paths;
}
