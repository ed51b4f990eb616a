import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';
import { textStorageDescriptor } from './glueTables';

const TOOL = 'manage_aws_athena_databases_and_tables';
const DATABASE = 'mcp_test_database';
const TABLE = 'mcp_test_table';
const CATALOG = 'AwsDataCatalog';

// Athena reads a database and table created through the Glue tools.
export function athenaDatabaseTableTestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'create_database_basic',
      toolName: 'manage_aws_glue_databases',
      inputParams: {
        operation: 'create-database',
        database_name: DATABASE,
        description: 'Test database created by MCP server',
      },
      validators: [
        containsText('Successfully created database'),
        awsState(ctx, { operation: 'get_database', operationParams: { Name: DATABASE }, expectedKeys: ['description'] }),
      ],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_database', params: { Name: DATABASE } })],
    },
    {
      name: 'create_table_basic',
      toolName: 'manage_aws_glue_tables',
      inputParams: {
        operation: 'create-table',
        database_name: DATABASE,
        table_name: TABLE,
        table_input: { Description: 'Test table', StorageDescriptor: textStorageDescriptor(`s3://${ctx.bucket}/`) },
      },
      dependencies: ['create_database_basic'],
      validators: [
        containsText('Successfully created table'),
        awsState(ctx, {
          operation: 'get_table',
          operationParams: { database_name: DATABASE, table_name: TABLE },
          expectedKeys: ['Description'],
        }),
      ],
    },
    {
      name: 'get_athena_database',
      toolName: TOOL,
      inputParams: { operation: 'get-database', database_name: DATABASE, catalog_name: CATALOG },
      dependencies: ['create_database_basic'],
      validators: [containsText('Successfully retrieved database')],
    },
    {
      name: 'get_athena_database_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'get-database' },
      validators: [containsText('Field required')],
    },
    {
      name: 'get_table_metadata',
      toolName: TOOL,
      inputParams: { operation: 'get-table-metadata', database_name: DATABASE, table_name: TABLE, catalog_name: CATALOG },
      dependencies: ['create_table_basic'],
      validators: [containsText('Successfully retrieved metadata')],
    },
    {
      name: 'get_table_metadata_missing_params',
      toolName: TOOL,
      inputParams: { operation: 'get-table-metadata' },
      validators: [containsText('Field required')],
    },
    {
      name: 'list_athena_databases',
      toolName: TOOL,
      inputParams: { operation: 'list-databases', catalog_name: CATALOG, max_results: 10 },
      validators: [containsText('Successfully listed databases')],
    },
    {
      name: 'list_athena_table_metadata',
      toolName: TOOL,
      inputParams: { operation: 'list-table-metadata', database_name: DATABASE, max_results: 10, catalog_name: CATALOG },
      dependencies: ['create_database_basic'],
      validators: [containsText('Successfully listed table metadata')],
    },
    {
      name: 'list_athena_table_metadata_missing_params',
      toolName: TOOL,
      inputParams: { operation: 'list-table-metadata' },
      validators: [containsText('Field required')],
    },
  ];
}
