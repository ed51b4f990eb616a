import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_databases';
const DATABASE = 'mcp_test_database';
const DATABASE_WITH_LOCATION = 'mcp_test_database_with_definition';
const MISSING_DATABASE = 'non_existent_database';

export function glueDatabaseTestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'create_database_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-database',
        database_name: DATABASE,
        description: 'Test database created by MCP server',
      },
      validators: [
        containsText('Successfully created database'),
        awsState(ctx, {
          operation: 'get_database',
          operationParams: { Name: DATABASE },
          expectedKeys: ['description'],
        }),
      ],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_database', params: { Name: DATABASE } })],
    },
    {
      name: 'get_database_basic',
      toolName: TOOL,
      inputParams: { operation: 'get-database', database_name: DATABASE },
      dependencies: ['create_database_basic'],
      validators: [containsText('Successfully retrieved database')],
    },
    {
      name: 'create_database_already_exists',
      toolName: TOOL,
      inputParams: {
        operation: 'create-database',
        database_name: DATABASE,
        description: 'Test database created by MCP server',
      },
      dependencies: ['create_database_basic'],
      validators: [containsText('already exists')],
    },
    {
      name: 'create_database_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'create-database', description: 'Test database created by MCP server' },
      validators: [containsText('database_name is required for create-database operation')],
    },
    {
      name: 'create_database_with_definition',
      toolName: TOOL,
      inputParams: {
        operation: 'create-database',
        database_name: DATABASE_WITH_LOCATION,
        description: 'Test database with definition created by MCP server',
        location_uri: `s3://${ctx.bucket}/glue_database_location/${DATABASE_WITH_LOCATION}/`,
      },
      validators: [
        containsText('Successfully created database'),
        awsState(ctx, {
          operation: 'get_database',
          operationParams: { Name: DATABASE_WITH_LOCATION },
          expectedKeys: ['description', 'location_uri'],
        }),
      ],
      cleanups: [
        awsCleanup(ctx, { service: 'glue', operation: 'delete_database', params: { Name: DATABASE_WITH_LOCATION } }),
      ],
    },
    {
      name: 'get_database_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-database', database_name: MISSING_DATABASE },
      validators: [containsText('not found')],
    },
    {
      name: 'get_databases_all',
      toolName: TOOL,
      inputParams: { operation: 'list-databases', max_results: 10 },
      dependencies: ['create_database_basic', 'create_database_with_definition'],
      validators: [containsText('Successfully listed', { expectedCount: 2 })],
    },
    {
      name: 'update_database_description',
      toolName: TOOL,
      inputParams: {
        operation: 'update-database',
        database_name: DATABASE,
        description: 'Updated description for MCP test database',
      },
      dependencies: ['create_database_basic'],
      validators: [
        containsText('Successfully updated database'),
        awsState(ctx, {
          operation: 'get_database',
          operationParams: { Name: DATABASE },
          expectedKeys: ['description'],
        }),
      ],
    },
    {
      name: 'update_database_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'update-database', description: 'Updated description for MCP test database' },
      validators: [containsText('database_name is required for update-database operation')],
    },
    {
      name: 'update_database_not_exist',
      toolName: TOOL,
      inputParams: {
        operation: 'update-database',
        database_name: MISSING_DATABASE,
        description: 'Updated description for MCP test database',
      },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_database_basic',
      toolName: TOOL,
      inputParams: { operation: 'delete-database', database_name: DATABASE },
      // Last user of the database.
      dependencies: [
        'create_database_basic',
        'get_database_basic',
        'create_database_already_exists',
        'get_databases_all',
        'update_database_description',
      ],
      validators: [
        containsText('Successfully deleted database'),
        awsState(ctx, { operation: 'get_database', operationParams: { Name: DATABASE }, validateAbsence: true }),
      ],
    },
    {
      name: 'delete_database_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-database', database_name: MISSING_DATABASE },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_database_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'delete-database' },
      validators: [containsText('database_name is required for delete-database operation')],
    },
  ];
}
