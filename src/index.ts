#!/usr/bin/env node
/**
 * Command line entry point of the data-processing MCP integration tests.
 */

import { Command, Option } from 'commander';
import { createAwsClients } from '@/aws/clients';
import { createS3BucketIfNotExists, getOrCreateGlueRole } from '@/aws/setup';
import { DEFAULT_CLEANUP_TIMING } from '@/cleanups/awsResourceCleanup';
import { McpToolClient } from '@/mcp/client';
import { loadTestCaseGroups, SUITES, type SuiteContext } from '@/suites';
import { loadConfig } from '@core/config';
import { runGroups, runPassed, writeReports } from '@core/runner';
import type { Config } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('dataprocessing-tests:cli');

const REPORT_FORMATS = ['markdown', 'json', 'html'];

interface RunOptions {
  config?: string;
  group?: string[];
  format?: string[];
  reportDir?: string;
}

async function run(options: RunOptions): Promise<void> {
  const config: Config = await loadConfig(options.config);
  const groupNames = options.group ?? config.groups;
  const formats = options.format ?? config.reports.formats;
  const reportDir = options.reportDir ?? config.reports.directory;

  const clients = createAwsClients(config.aws);
  const bucket = await createS3BucketIfNotExists(clients);
  const glueRoleArn = await getOrCreateGlueRole(clients);
  const ctx: SuiteContext = { clients, bucket, glueRoleArn, timing: config.cleanup };
  const groups = loadTestCaseGroups(ctx, groupNames);

  const client = new McpToolClient(config);
  await client.connect();

  const outcome = await runGroups(groups, client).finally(() => client.close());
  await writeReports(outcome.results, reportDir, formats);

  const { summary } = outcome;
  if (runPassed(summary)) {
    logger.info(summary, 'All integration tests passed');
  } else {
    logger.error(summary, 'Integration tests failed');
    process.exitCode = 1;
  }
}

function list(): void {
  // Listing never touches AWS; builders only need placeholders.
  const ctx: SuiteContext = {
    clients: createAwsClients({ region: 'us-east-1' }),
    bucket: '<bucket>',
    glueRoleArn: '<glue-role-arn>',
    timing: DEFAULT_CLEANUP_TIMING,
  };

  for (const [group, build] of SUITES) {
    const testCases = build(ctx);
    process.stdout.write(`${group} (${testCases.length})\n`);
    for (const testCase of testCases) {
      const dependencies = testCase.dependencies?.length ? ` <- ${testCase.dependencies.join(', ')}` : '';
      process.stdout.write(`  ${testCase.name} [${testCase.toolName}]${dependencies}\n`);
    }
  }
}

const program = new Command();

program
  .name('dataprocessing-mcp-tests')
  .description('Dependency-aware integration tests for the data-processing MCP server')
  .version('0.1.0');

program
  .command('run')
  .description('Run test groups against a live server and AWS account')
  .option('-c, --config <path>', 'YAML configuration file')
  .option('-g, --group <name...>', 'only run these groups')
  .addOption(new Option('-f, --format <format...>', 'report formats').choices(REPORT_FORMATS))
  .option('-o, --report-dir <dir>', 'directory for report files')
  .action(async (options: RunOptions) => {
    try {
      await run(options);
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Test run aborted');
      process.exitCode = 1;
    }
  });

program
  .command('list')
  .description('List test groups and their test cases')
  .action(list);

await program.parseAsync(process.argv);
