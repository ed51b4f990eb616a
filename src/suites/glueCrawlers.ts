import type { JsonObject, TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const CRAWLER_TOOL = 'manage_aws_glue_crawlers';
const MANAGEMENT_TOOL = 'manage_aws_glue_crawler_management';
const CRAWLER = 'mcp_test_crawler';
const SECOND_CRAWLER = 'mcp_test_crawler_second';
const SCHEDULED_CRAWLER = 'mcp_test_crawler_with_schedule';

function crawlerDefinition(ctx: SuiteContext, overrides: JsonObject = {}): JsonObject {
  return {
    Role: ctx.glueRoleArn,
    DatabaseName: 'mcp_test_database',
    Targets: { S3Targets: [{ Path: `s3://${ctx.bucket}/crawlers/` }] },
    TablePrefix: 'mcp_',
    Description: 'Test crawler created by MCP',
    ...overrides,
  };
}

function crawlerCases(ctx: SuiteContext): TestCase[] {
  const crawlerState = (name: string, expectedKeys: string[] = ['DatabaseName', 'TablePrefix', 'Description']) =>
    awsState(ctx, { operation: 'get_crawler', operationParams: { Name: name }, expectedKeys });
  const deleteCrawler = (name: string) =>
    awsCleanup(ctx, { service: 'glue', operation: 'delete_crawler', params: { Name: name } });
  const updatedDefinition = crawlerDefinition(ctx, {
    DatabaseName: 'mcp_test_database_updated',
    Targets: { S3Targets: [{ Path: `s3://${ctx.bucket}/crawlers-updated/` }] },
    TablePrefix: 'mcp_updated_',
    Description: 'Updated test crawler created by MCP',
  });

  return [
    {
      name: 'create_glue_crawler_basic',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'create-crawler', crawler_name: CRAWLER, crawler_definition: crawlerDefinition(ctx) },
      validators: [containsText('Successfully created Glue crawler'), crawlerState(CRAWLER)],
      cleanups: [deleteCrawler(CRAWLER)],
    },
    {
      name: 'get_glue_crawler_basic',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'get-crawler', crawler_name: CRAWLER },
      dependencies: ['create_glue_crawler_basic'],
      validators: [containsText('Successfully retrieved crawler')],
    },
    {
      name: 'create_glue_crawler_missing_name',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'create-crawler', crawler_definition: crawlerDefinition(ctx) },
      validators: [containsText('crawler_name and crawler_definition are required for create-crawler operation')],
    },
    {
      name: 'create_glue_crawler_second',
      toolName: CRAWLER_TOOL,
      inputParams: {
        operation: 'create-crawler',
        crawler_name: SECOND_CRAWLER,
        crawler_definition: crawlerDefinition(ctx),
      },
      validators: [containsText('Successfully created Glue crawler'), crawlerState(SECOND_CRAWLER)],
      cleanups: [deleteCrawler(SECOND_CRAWLER)],
    },
    {
      name: 'get_glue_crawlers',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'get-crawlers', max_results: 10 },
      validators: [containsText('Successfully retrieved')],
    },
    {
      name: 'batch_get_glue_crawlers',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'batch-get-crawlers', crawler_names: [CRAWLER, SECOND_CRAWLER] },
      dependencies: ['create_glue_crawler_basic', 'create_glue_crawler_second'],
      validators: [containsText('Successfully retrieved')],
    },
    {
      name: 'start_glue_crawler',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'start-crawler', crawler_name: CRAWLER },
      dependencies: ['create_glue_crawler_basic'],
      validators: [containsText('Successfully started crawler'), crawlerState(CRAWLER, [])],
    },
    {
      name: 'start_glue_crawler_missing_name',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'start-crawler' },
      validators: [containsText('crawler_name is required for start-crawler operation')],
    },
    {
      name: 'stop_glue_crawler',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'stop-crawler', crawler_name: CRAWLER },
      dependencies: ['create_glue_crawler_basic', 'start_glue_crawler'],
      validators: [containsText('Successfully stopped crawler'), crawlerState(CRAWLER, [])],
    },
    {
      name: 'stop_glue_crawler_missing_name',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'stop-crawler' },
      validators: [containsText('crawler_name is required for stop-crawler operation')],
    },
    {
      name: 'delete_glue_crawler',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'delete-crawler', crawler_name: SECOND_CRAWLER },
      dependencies: ['create_glue_crawler_second', 'batch_get_glue_crawlers'],
      validators: [
        containsText('Successfully deleted MCP-managed Glue crawler'),
        awsState(ctx, { operation: 'get_crawler', operationParams: { Name: SECOND_CRAWLER }, validateAbsence: true }),
      ],
    },
    {
      name: 'delete_glue_crawler_not_exist',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'delete-crawler', crawler_name: 'non_existent_crawler' },
      validators: [containsText('Cannot delete crawler non_existent_crawler')],
    },
    {
      name: 'delete_glue_crawler_missing_name',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'delete-crawler' },
      validators: [containsText('crawler_name is required for delete-crawler operation')],
    },
    {
      name: 'update_glue_crawler',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'update-crawler', crawler_name: CRAWLER, crawler_definition: updatedDefinition },
      // A running crawler rejects updates.
      dependencies: ['create_glue_crawler_basic', 'stop_glue_crawler'],
      validators: [containsText('Successfully updated crawler'), crawlerState(CRAWLER)],
    },
    {
      name: 'update_glue_crawler_missing_name',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'update-crawler', crawler_definition: updatedDefinition },
      validators: [containsText('crawler_name and crawler_definition are required for update-crawler operation')],
    },
    {
      name: 'list_glue_crawlers',
      toolName: CRAWLER_TOOL,
      inputParams: { operation: 'list-crawlers', max_results: 10 },
      validators: [containsText('Successfully listed crawlers')],
    },
    {
      name: 'create_crawler_with_schedule',
      toolName: CRAWLER_TOOL,
      inputParams: {
        operation: 'create-crawler',
        crawler_name: SCHEDULED_CRAWLER,
        crawler_definition: crawlerDefinition(ctx, {
          Description: 'Test crawler with schedule created by MCP',
          Schedule: 'cron(0 12 * * ? *)',
        }),
      },
      validators: [containsText('Successfully created Glue crawler'), crawlerState(SCHEDULED_CRAWLER)],
      cleanups: [deleteCrawler(SCHEDULED_CRAWLER)],
    },
  ];
}

function crawlerManagementCases(ctx: SuiteContext): TestCase[] {
  const scheduledCrawlerState = awsState(ctx, {
    operation: 'get_crawler',
    operationParams: { Name: SCHEDULED_CRAWLER },
  });

  return [
    {
      name: 'get_crawler_metrics',
      toolName: MANAGEMENT_TOOL,
      inputParams: { operation: 'get-crawler-metrics', crawler_name: CRAWLER },
      dependencies: ['create_glue_crawler_basic'],
      validators: [containsText('Successfully retrieved crawler metrics')],
    },
    {
      name: 'start_crawler_schedule',
      toolName: MANAGEMENT_TOOL,
      inputParams: { operation: 'start-crawler-schedule', crawler_name: SCHEDULED_CRAWLER },
      dependencies: ['create_crawler_with_schedule'],
      validators: [containsText('Successfully started schedule'), scheduledCrawlerState],
    },
    {
      name: 'start_crawler_schedule_missing_name',
      toolName: MANAGEMENT_TOOL,
      inputParams: { operation: 'start-crawler-schedule' },
      validators: [containsText('crawler_name is required for start-crawler-schedule operation')],
    },
    {
      name: 'stop_crawler_schedule_missing_name',
      toolName: MANAGEMENT_TOOL,
      inputParams: { operation: 'stop-crawler-schedule' },
      validators: [containsText('crawler_name is required for stop-crawler-schedule operation')],
    },
    {
      name: 'update_crawler_schedule',
      toolName: MANAGEMENT_TOOL,
      inputParams: {
        operation: 'update-crawler-schedule',
        crawler_name: SCHEDULED_CRAWLER,
        schedule: 'cron(0 18 * * ? *)',
      },
      dependencies: ['create_crawler_with_schedule'],
      validators: [containsText('Successfully updated schedule for crawler'), scheduledCrawlerState],
    },
    {
      name: 'update_crawler_schedule_missing_name',
      toolName: MANAGEMENT_TOOL,
      inputParams: { operation: 'update-crawler-schedule', schedule: 'cron(0 18 * * ? *)' },
      validators: [containsText('crawler_name and schedule are required for update-crawler-schedule operation')],
    },
  ];
}

export function glueCrawlerTestCases(ctx: SuiteContext): TestCase[] {
  return [...crawlerCases(ctx), ...crawlerManagementCases(ctx)];
}
