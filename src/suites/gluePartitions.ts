import type { JsonObject, TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';
import { textStorageDescriptor } from './glueTables';

const TOOL = 'manage_aws_glue_partitions';
const DATABASE = 'mcp_test_database';
const TABLE = 'mcp_test_table_with_partition_keys';
const PARTITION_VALUES = ['2023-10-01'];
const MISSING_PARTITION_VALUES = ['2023-10-02'];

export function gluePartitionTestCases(ctx: SuiteContext): TestCase[] {
  const partitionInput: JsonObject = {
    StorageDescriptor: textStorageDescriptor(`s3://${ctx.bucket}/partitions/2023-10-01/`),
  };
  const partitionState = awsState(ctx, {
    operation: 'get_partition',
    operationParams: { DatabaseName: DATABASE, TableName: TABLE, PartitionValues: PARTITION_VALUES },
    expectedKeys: ['StorageDescriptor.Location', 'StorageDescriptor.InputFormat'],
  });

  return [
    {
      name: 'create_partition_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-partition',
        database_name: DATABASE,
        table_name: TABLE,
        partition_values: PARTITION_VALUES,
        partition_input: partitionInput,
      },
      dependencies: ['create_table_with_partition_keys'],
      validators: [containsText('Successfully created partition'), partitionState],
      cleanups: [
        awsCleanup(ctx, {
          service: 'glue',
          operation: 'delete_partition',
          params: { DatabaseName: DATABASE, TableName: TABLE, PartitionValues: PARTITION_VALUES },
        }),
      ],
    },
    {
      name: 'get_partition_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'get-partition',
        database_name: DATABASE,
        table_name: TABLE,
        partition_values: PARTITION_VALUES,
      },
      dependencies: ['create_partition_basic'],
      validators: [containsText('Successfully retrieved partition')],
    },
    {
      name: 'create_partition_missing_database',
      toolName: TOOL,
      inputParams: {
        operation: 'create-partition',
        table_name: TABLE,
        partition_values: PARTITION_VALUES,
        partition_input: partitionInput,
      },
      validators: [containsText('Field required ')],
    },
    {
      name: 'create_partition_missing_table',
      toolName: TOOL,
      inputParams: {
        operation: 'create-partition',
        database_name: DATABASE,
        partition_values: PARTITION_VALUES,
        partition_input: partitionInput,
      },
      validators: [containsText('Field required ')],
    },
    {
      name: 'create_partition_missing_values',
      toolName: TOOL,
      inputParams: {
        operation: 'create-partition',
        database_name: DATABASE,
        table_name: TABLE,
        partition_input: partitionInput,
      },
      validators: [
        containsText('partition_values and partition_input are required for create-partition operation'),
      ],
    },
    {
      name: 'get_partition_not_exist',
      toolName: TOOL,
      inputParams: {
        operation: 'get-partition',
        database_name: DATABASE,
        table_name: TABLE,
        partition_values: MISSING_PARTITION_VALUES,
      },
      validators: [containsText('not found')],
    },
    {
      name: 'list_partitions_basic',
      toolName: TOOL,
      inputParams: { operation: 'list-partitions', database_name: DATABASE, table_name: TABLE, max_results: 10 },
      dependencies: ['create_partition_basic'],
      validators: [containsText('Successfully listed', { expectedCount: 1 })],
    },
    {
      name: 'update_partition_description',
      toolName: TOOL,
      inputParams: {
        operation: 'update-partition',
        database_name: DATABASE,
        table_name: TABLE,
        partition_values: PARTITION_VALUES,
        partition_input: partitionInput,
      },
      dependencies: ['create_partition_basic'],
      validators: [containsText('Successfully updated partition'), partitionState],
    },
    {
      name: 'update_partition_missing_database',
      toolName: TOOL,
      inputParams: {
        operation: 'update-partition',
        table_name: TABLE,
        partition_values: PARTITION_VALUES,
        partition_input: partitionInput,
      },
      validators: [containsText('Field required ')],
    },
    {
      name: 'update_partition_missing_table',
      toolName: TOOL,
      inputParams: {
        operation: 'update-partition',
        database_name: DATABASE,
        partition_values: PARTITION_VALUES,
        partition_input: partitionInput,
      },
      validators: [containsText('Field required ')],
    },
    {
      name: 'update_partition_missing_values',
      toolName: TOOL,
      inputParams: {
        operation: 'update-partition',
        database_name: DATABASE,
        table_name: TABLE,
        partition_input: partitionInput,
      },
      validators: [
        containsText('partition_values and partition_input are required for update-partition operation'),
      ],
    },
    {
      name: 'delete_partition_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'delete-partition',
        database_name: DATABASE,
        table_name: TABLE,
        partition_values: PARTITION_VALUES,
      },
      dependencies: [
        'create_partition_basic',
        'get_partition_basic',
        'list_partitions_basic',
        'update_partition_description',
      ],
      validators: [
        containsText('Successfully deleted partition'),
        awsState(ctx, {
          operation: 'get_partition',
          operationParams: { DatabaseName: DATABASE, TableName: TABLE, PartitionValues: PARTITION_VALUES },
          validateAbsence: true,
        }),
      ],
    },
    {
      name: 'delete_partition_not_exist',
      toolName: TOOL,
      inputParams: {
        operation: 'delete-partition',
        database_name: DATABASE,
        table_name: TABLE,
        partition_values: MISSING_PARTITION_VALUES,
      },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_partition_missing_database',
      toolName: TOOL,
      inputParams: { operation: 'delete-partition', table_name: TABLE, partition_values: PARTITION_VALUES },
      validators: [containsText('Field required ')],
    },
    {
      name: 'delete_partition_missing_table',
      toolName: TOOL,
      inputParams: { operation: 'delete-partition', database_name: DATABASE, partition_values: PARTITION_VALUES },
      validators: [containsText('Field required ')],
    },
  ];
}
