import type { JsonObject, TestCase } from '@shared/types';
import { awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_tables';
const DATABASE = 'mcp_test_database';
const TABLE = 'mcp_test_table';
const TABLE_WITH_PARTITION_KEYS = 'mcp_test_table_with_partition_keys';
const TABLE_WITH_DESCRIPTION = 'mcp_test_table_with_description';
const MISSING_TABLE = 'non_existent_table';

/**
 * Text-file storage descriptor rooted at `location`.
 */
export function textStorageDescriptor(location: string): JsonObject {
  return {
    Columns: [{ Name: 'id', Type: 'int' }],
    Location: location,
    InputFormat: 'org.apache.hadoop.mapred.TextInputFormat',
    OutputFormat: 'org.apache.hadoop.hive.ql.io.HiveIgnoreKeyTextOutputFormat',
    SerdeInfo: {
      SerializationLibrary: 'org.apache.hadoop.hive.serde2.lazy.LazySimpleSerDe',
      Parameters: { 'serialization.format': '1' },
    },
  };
}

// Tables live in the database of the database catalog and are dropped with it.
export function glueTableTestCases(ctx: SuiteContext): TestCase[] {
  const tableState = (table: string, expectedKeys: string[]) =>
    awsState(ctx, {
      operation: 'get_table',
      operationParams: { database_name: DATABASE, table_name: table },
      expectedKeys,
    });

  return [
    {
      name: 'create_table_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-table',
        database_name: DATABASE,
        table_name: TABLE,
        table_input: { Description: 'Test table', StorageDescriptor: textStorageDescriptor(`s3://${ctx.bucket}/`) },
      },
      dependencies: ['create_database_basic'],
      validators: [
        containsText('Successfully created table'),
        tableState(TABLE, [
          'Description',
          'StorageDescriptor.Columns',
          'StorageDescriptor.Location',
          'StorageDescriptor.InputFormat',
          'StorageDescriptor.OutputFormat',
          'StorageDescriptor.SerdeInfo',
        ]),
      ],
    },
    {
      name: 'get_table_basic',
      toolName: TOOL,
      inputParams: { operation: 'get-table', database_name: DATABASE, table_name: TABLE },
      dependencies: ['create_table_basic'],
      validators: [containsText('Successfully retrieved table')],
    },
    {
      name: 'create_table_with_partition_keys',
      toolName: TOOL,
      inputParams: {
        operation: 'create-table',
        database_name: DATABASE,
        table_name: TABLE_WITH_PARTITION_KEYS,
        table_input: {
          Description: 'Test table',
          PartitionKeys: [{ Name: 'event_date', Type: 'string' }],
          StorageDescriptor: textStorageDescriptor(`s3://${ctx.bucket}/`),
        },
      },
      dependencies: ['create_database_basic'],
      validators: [containsText('Successfully created table'), tableState(TABLE_WITH_PARTITION_KEYS, ['PartitionKeys'])],
    },
    {
      name: 'create_table_with_description',
      toolName: TOOL,
      inputParams: {
        operation: 'create-table',
        database_name: DATABASE,
        table_name: TABLE_WITH_DESCRIPTION,
        table_input: { Description: 'Test table with description' },
      },
      dependencies: ['create_database_basic'],
      validators: [containsText('Successfully created table'), tableState(TABLE_WITH_DESCRIPTION, ['Description'])],
    },
    {
      name: 'get_table_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-table', database_name: DATABASE, table_name: MISSING_TABLE },
      validators: [containsText('Entity Not Found')],
    },
    {
      name: 'create_table_missing_database',
      toolName: TOOL,
      inputParams: { operation: 'create-table', table_name: 'mcp_test_table_missing_db' },
      validators: [containsText('Field required')],
    },
    {
      name: 'create_table_missing_table_name',
      toolName: TOOL,
      inputParams: { operation: 'create-table', database_name: DATABASE },
      dependencies: ['create_database_basic'],
      validators: [containsText('database_name, table_input and table_name are required for create-table operation')],
    },
    {
      name: 'update_table_description',
      toolName: TOOL,
      inputParams: {
        operation: 'update-table',
        database_name: DATABASE,
        table_name: TABLE,
        table_input: { Description: 'Updated table description' },
      },
      dependencies: ['create_table_basic'],
      validators: [containsText('Successfully updated table'), tableState(TABLE, ['Description'])],
    },
    {
      name: 'update_table_not_exist',
      toolName: TOOL,
      inputParams: {
        operation: 'update-table',
        database_name: DATABASE,
        table_name: MISSING_TABLE,
        table_input: { Description: 'This table does not exist' },
      },
      validators: [containsText('not found')],
    },
    {
      name: 'update_table_missing_database',
      toolName: TOOL,
      inputParams: { operation: 'update-table', table_name: 'mcp_test_table_missing_db' },
      validators: [containsText('Field required')],
    },
    {
      name: 'list_tables_in_db',
      toolName: TOOL,
      inputParams: { operation: 'list-tables', database_name: DATABASE, max_results: 10 },
      // Every table of the catalog exists at this point.
      dependencies: ['create_table_basic', 'create_table_with_partition_keys', 'create_table_with_description'],
      validators: [containsText(`Successfully listed 3 tables in database ${DATABASE}`, { expectedCount: 3 })],
    },
    {
      name: 'delete_table_basic',
      toolName: TOOL,
      inputParams: { operation: 'delete-table', database_name: DATABASE, table_name: TABLE },
      dependencies: ['create_table_basic', 'get_table_basic', 'update_table_description', 'list_tables_in_db'],
      validators: [
        containsText('Successfully deleted table'),
        awsState(ctx, {
          operation: 'get_table',
          operationParams: { database_name: DATABASE, table_name: TABLE },
          validateAbsence: true,
        }),
      ],
    },
    {
      name: 'delete_table_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-table', database_name: DATABASE, table_name: MISSING_TABLE },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_table_missing_database',
      toolName: TOOL,
      inputParams: { operation: 'delete-table', table_name: 'mcp_test_table_missing_db' },
      validators: [containsText('Field required')],
    },
    {
      name: 'search_table_for_databases',
      toolName: TOOL,
      inputParams: { operation: 'search-tables', database_name: DATABASE, search_text: TABLE_WITH_DESCRIPTION },
      dependencies: ['create_table_with_description'],
      validators: [containsText('Search found', { expectedCount: 1 })],
    },
  ];
}
