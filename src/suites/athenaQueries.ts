import type { TestCase } from '@shared/types';
import { awsCleanup, containsText, outputOf, type SuiteContext } from './context';

const NAMED_QUERY_TOOL = 'manage_aws_athena_named_queries';
const EXECUTION_TOOL = 'manage_aws_athena_query_executions';
const NAMED_QUERY_ID = outputOf('create_athena_query', 'named_query_id');
const QUERY_EXECUTION_ID = outputOf('start_athena_query_execution', 'query_execution_id');

function namedQueryCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'create_athena_query',
      toolName: NAMED_QUERY_TOOL,
      inputParams: {
        operation: 'create-named-query',
        name: 'mcp_test_named_query',
        description: 'This is a test named query for MCP validation.',
        database: 'mcp_test_database',
        query_string: 'SELECT 1',
        work_group: 'primary',
      },
      validators: [containsText('Successfully created named')],
      cleanups: [
        awsCleanup(ctx, {
          service: 'athena',
          operation: 'delete_named_query',
          resourceField: 'named_query_id',
          targetParamKey: 'NamedQueryId',
        }),
      ],
    },
    {
      name: 'get_athena_queries',
      toolName: NAMED_QUERY_TOOL,
      inputParams: { operation: 'list-named-queries', max_results: 10 },
      dependencies: ['create_athena_query'],
      validators: [containsText('Successfully listed named queries')],
    },
    {
      name: 'batch_get_athena_named_queries',
      toolName: NAMED_QUERY_TOOL,
      inputParams: { operation: 'batch-get-named-query', named_query_ids: [NAMED_QUERY_ID] },
      dependencies: ['create_athena_query'],
      validators: [containsText('Successfully retrieved named queries')],
    },
    {
      name: 'get_athena_named_query',
      toolName: NAMED_QUERY_TOOL,
      inputParams: { operation: 'get-named-query', named_query_id: NAMED_QUERY_ID },
      dependencies: ['create_athena_query'],
      validators: [containsText('Successfully retrieved named query')],
    },
    {
      name: 'get_athena_named_query_missing_id',
      toolName: NAMED_QUERY_TOOL,
      inputParams: { operation: 'get-named-query' },
      validators: [containsText('named_query_id is required for get-named-query operation')],
    },
    {
      name: 'update_athena_named_query',
      toolName: NAMED_QUERY_TOOL,
      inputParams: {
        operation: 'update-named-query',
        named_query_id: NAMED_QUERY_ID,
        name: 'mcp_test_named_query_updated',
        description: 'This is an updated test named query for MCP validation.',
        query_string: 'SELECT 2',
        work_group: 'primary',
      },
      dependencies: ['create_athena_query'],
      validators: [containsText('Successfully updated named query')],
    },
    {
      name: 'update_athena_named_query_missing_id',
      toolName: NAMED_QUERY_TOOL,
      inputParams: {
        operation: 'update-named-query',
        name: 'mcp_test_named_query_updated',
        query_string: 'SELECT 2',
        work_group: 'primary',
      },
      validators: [containsText('named_query_id is required for update-named-query operation')],
    },
    {
      name: 'delete_athena_named_query',
      toolName: NAMED_QUERY_TOOL,
      inputParams: { operation: 'delete-named-query', named_query_id: NAMED_QUERY_ID },
      dependencies: [
        'create_athena_query',
        'get_athena_queries',
        'batch_get_athena_named_queries',
        'get_athena_named_query',
        'update_athena_named_query',
        'start_athena_query_execution',
      ],
      validators: [containsText('Successfully deleted named query')],
    },
    {
      name: 'delete_athena_named_query_missing_id',
      toolName: NAMED_QUERY_TOOL,
      inputParams: { operation: 'delete-named-query' },
      validators: [containsText('named_query_id is required for delete-named-query operation')],
    },
  ];
}

function queryExecutionCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'start_athena_query_execution',
      toolName: EXECUTION_TOOL,
      inputParams: {
        operation: 'start-query-execution',
        query_string: 'SELECT 1',
        work_group: 'primary',
        result_configuration: { OutputLocation: `s3://${ctx.bucket}/athena-results/` },
      },
      dependencies: ['create_athena_query'],
      validators: [containsText('Successfully started query execution')],
      cleanups: [
        awsCleanup(ctx, {
          service: 'athena',
          operation: 'stop_query_execution',
          resourceField: 'query_execution_id',
          targetParamKey: 'QueryExecutionId',
        }),
      ],
    },
    {
      name: 'batch_get_athena_query_execution',
      toolName: EXECUTION_TOOL,
      inputParams: { operation: 'batch-get-query-execution', query_execution_ids: [QUERY_EXECUTION_ID] },
      dependencies: ['start_athena_query_execution'],
      validators: [containsText('Successfully retrieved query executions')],
    },
    {
      name: 'get_athena_query_execution',
      toolName: EXECUTION_TOOL,
      inputParams: { operation: 'get-query-execution', query_execution_id: QUERY_EXECUTION_ID },
      dependencies: ['start_athena_query_execution'],
      validators: [containsText('Successfully retrieved query execution')],
    },
    {
      name: 'get_athena_query_execution_missing_id',
      toolName: EXECUTION_TOOL,
      inputParams: { operation: 'get-query-execution' },
      validators: [containsText('query_execution_id is required for get-query-execution operation')],
    },
    {
      name: 'get_athena_query_results_missing_id',
      toolName: EXECUTION_TOOL,
      inputParams: { operation: 'get-query-results' },
      validators: [containsText('query_execution_id is required for get-query-results operation')],
    },
    {
      name: 'get_athena_query_runtime_statistics_missing_id',
      toolName: EXECUTION_TOOL,
      inputParams: { operation: 'get-query-runtime-statistics' },
      validators: [
        containsText('query_execution_id is required for get-query-runtime-statistics operation'),
      ],
    },
    {
      name: 'list_athena_query_executions',
      toolName: EXECUTION_TOOL,
      inputParams: { operation: 'list-query-executions', max_results: 10 },
      dependencies: ['start_athena_query_execution'],
      validators: [containsText('Successfully listed query executions')],
    },
    {
      name: 'stop_athena_query_execution',
      toolName: EXECUTION_TOOL,
      inputParams: { operation: 'stop-query-execution', query_execution_id: QUERY_EXECUTION_ID },
      dependencies: [
        'start_athena_query_execution',
        'batch_get_athena_query_execution',
        'get_athena_query_execution',
        'list_athena_query_executions',
      ],
      validators: [containsText('Successfully stopped query execution')],
    },
    {
      name: 'stop_athena_query_execution_missing_id',
      toolName: EXECUTION_TOOL,
      inputParams: { operation: 'stop-query-execution' },
      validators: [containsText('query_execution_id is required for stop-query-execution operation')],
    },
  ];
}

export function athenaQueryTestCases(ctx: SuiteContext): TestCase[] {
  return [...namedQueryCases(ctx), ...queryExecutionCases(ctx)];
}
