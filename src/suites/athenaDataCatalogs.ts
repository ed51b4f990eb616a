import type { JsonObject, TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_athena_data_catalogs';
const DATA_CATALOG = 'mcp_test_data_catalog';
const LAMBDA_ARN = 'arn:aws:lambda:us-west-2:123456789012:function:mcp_test_lambda_function';
const UPDATED_LAMBDA_ARN = `${LAMBDA_ARN}_updated`;

function lambdaParameters(functionArn: string): JsonObject {
  return { 'metadata-function': functionArn, 'record-function': functionArn };
}

export function athenaDataCatalogTestCases(ctx: SuiteContext): TestCase[] {
  const catalogState = awsState(ctx, {
    operation: 'get_data_catalog',
    operationParams: { Name: DATA_CATALOG },
    expectedKeys: ['Name', 'Description'],
  });

  return [
    {
      name: 'create_athena_data_catalog',
      toolName: TOOL,
      inputParams: {
        operation: 'create-data-catalog',
        name: DATA_CATALOG,
        description: 'This is a test data catalog for MCP validation.',
        type: 'LAMBDA',
        parameters: lambdaParameters(LAMBDA_ARN),
      },
      validators: [containsText('Successfully created data catalog'), catalogState],
      cleanups: [
        awsCleanup(ctx, {
          service: 'athena',
          operation: 'delete_data_catalog',
          resourceField: 'name',
          targetParamKey: 'Name',
        }),
      ],
    },
    {
      name: 'get_athena_data_catalog',
      toolName: TOOL,
      inputParams: { operation: 'get-data-catalog', name: DATA_CATALOG, type: 'LAMBDA' },
      dependencies: ['create_athena_data_catalog'],
      validators: [containsText('Successfully retrieved data catalog')],
    },
    {
      name: 'get_athena_data_catalog_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'get-data-catalog' },
      validators: [containsText('name is required for get-data-catalog operation')],
    },
    {
      name: 'list_athena_data_catalogs',
      toolName: TOOL,
      inputParams: { operation: 'list-data-catalogs', max_results: 10 },
      // The account's Glue catalog and the Lambda catalog.
      dependencies: ['create_athena_data_catalog'],
      validators: [containsText('Successfully listed data catalogs', { expectedCount: 2 })],
    },
    {
      name: 'update_athena_data_catalog',
      toolName: TOOL,
      inputParams: {
        operation: 'update-data-catalog',
        name: DATA_CATALOG,
        type: 'LAMBDA',
        description: 'This is an updated test data catalog for MCP validation.',
        parameters: lambdaParameters(UPDATED_LAMBDA_ARN),
      },
      dependencies: ['create_athena_data_catalog'],
      validators: [containsText('Successfully updated data catalog'), catalogState],
    },
    {
      name: 'update_athena_data_catalog_missing_name',
      toolName: TOOL,
      inputParams: {
        operation: 'update-data-catalog',
        description: 'This is an updated test data catalog for MCP validation.',
        parameters: lambdaParameters(UPDATED_LAMBDA_ARN),
      },
      validators: [containsText('name is required for update-data-catalog operation')],
    },
    {
      name: 'delete_athena_data_catalog',
      toolName: TOOL,
      inputParams: { operation: 'delete-data-catalog', name: DATA_CATALOG },
      dependencies: [
        'create_athena_data_catalog',
        'get_athena_data_catalog',
        'list_athena_data_catalogs',
        'update_athena_data_catalog',
      ],
      validators: [containsText('Successfully deleted data catalog')],
    },
    {
      name: 'delete_athena_data_catalog_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'delete-data-catalog' },
      validators: [containsText('name is required for delete-data-catalog operation')],
    },
  ];
}
