import type { JsonObject, TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_connections';
const CONNECTION = 'mcp_test_connection';
const CONNECTION_WITH_DESCRIPTION = 'mcp_test_connection_with_description';
const MISSING_CONNECTION = 'non_existent_connection';

const JDBC_PROPERTIES: JsonObject = {
  JDBC_CONNECTION_URL: 'jdbc:mysql://example.com:3306/testdb',
  USERNAME: 'test-user',
  PASSWORD: 'test-password',
};

export function glueConnectionTestCases(ctx: SuiteContext): TestCase[] {
  const connectionState = (name: string, expectedKeys: string[]) =>
    awsState(ctx, { operation: 'get_connection', operationParams: { Name: name }, expectedKeys });
  const deleteConnection = (name: string) =>
    awsCleanup(ctx, { service: 'glue', operation: 'delete_connection', params: { connection_name: name } });

  return [
    {
      name: 'create_connection_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-connection',
        connection_name: CONNECTION,
        connection_input: { ConnectionType: 'JDBC', ConnectionProperties: JDBC_PROPERTIES },
      },
      validators: [
        containsText('Successfully created connection'),
        connectionState(CONNECTION, ['ConnectionType', 'ConnectionProperties.JDBC_CONNECTION_URL']),
      ],
      cleanups: [deleteConnection(CONNECTION)],
    },
    {
      name: 'get_connection_basic',
      toolName: TOOL,
      inputParams: { operation: 'get-connection', connection_name: CONNECTION },
      dependencies: ['create_connection_basic'],
      validators: [containsText('Successfully retrieved connection')],
    },
    {
      name: 'create_connection_missing_name',
      toolName: TOOL,
      inputParams: {
        operation: 'create-connection',
        connection_input: { ConnectionType: 'JDBC', ConnectionProperties: JDBC_PROPERTIES },
      },
      validators: [containsText('connection_name and connection_input are required for create operation')],
    },
    {
      name: 'create_connection_with_description',
      toolName: TOOL,
      inputParams: {
        operation: 'create-connection',
        connection_name: CONNECTION_WITH_DESCRIPTION,
        connection_input: {
          ConnectionType: 'JDBC',
          ConnectionProperties: JDBC_PROPERTIES,
          Description: 'Test connection with description',
        },
      },
      validators: [
        containsText('Successfully created connection'),
        connectionState(CONNECTION_WITH_DESCRIPTION, [
          'ConnectionType',
          'ConnectionProperties.JDBC_CONNECTION_URL',
          'Description',
        ]),
      ],
      cleanups: [deleteConnection(CONNECTION_WITH_DESCRIPTION)],
    },
    {
      name: 'get_connection_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-connection', connection_name: MISSING_CONNECTION },
      validators: [containsText('not found')],
    },
    {
      name: 'get_connections_all',
      toolName: TOOL,
      inputParams: { operation: 'list-connections', max_results: 10 },
      dependencies: ['create_connection_basic', 'create_connection_with_description'],
      validators: [containsText('Successfully listed 2 connections', { expectedCount: 2 })],
    },
    {
      name: 'update_connection_description',
      toolName: TOOL,
      inputParams: {
        operation: 'update-connection',
        connection_name: CONNECTION,
        connection_input: {
          Description: 'Updated description for MCP test connection',
          ConnectionType: 'JDBC',
          ConnectionProperties: JDBC_PROPERTIES,
        },
      },
      dependencies: ['create_connection_basic'],
      validators: [containsText('Successfully updated connection'), connectionState(CONNECTION, ['Description'])],
    },
    {
      name: 'update_connection_missing_name',
      toolName: TOOL,
      inputParams: {
        operation: 'update-connection',
        connection_input: { Description: 'Updated description for MCP test connection' },
      },
      validators: [containsText('connection_name and connection_input are required for update operation')],
    },
    {
      name: 'update_connection_not_exist',
      toolName: TOOL,
      inputParams: {
        operation: 'update-connection',
        connection_name: MISSING_CONNECTION,
        connection_input: {
          Description: 'Updated description for MCP test connection',
          ConnectionType: 'JDBC',
          ConnectionProperties: JDBC_PROPERTIES,
        },
      },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_connection_basic',
      toolName: TOOL,
      inputParams: { operation: 'delete-connection', connection_name: CONNECTION },
      dependencies: [
        'create_connection_basic',
        'get_connection_basic',
        'get_connections_all',
        'update_connection_description',
      ],
      validators: [
        containsText('Successfully deleted connection'),
        awsState(ctx, { operation: 'get_connection', operationParams: { Name: CONNECTION }, validateAbsence: true }),
      ],
    },
    {
      name: 'delete_connection_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-connection', connection_name: MISSING_CONNECTION },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_connection_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'delete-connection' },
      validators: [containsText('connection_name is required for delete operation')],
    },
  ];
}
