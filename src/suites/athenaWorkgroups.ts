import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_athena_workgroups';
const WORKGROUP = 'mcp_test_workgroup';

export function athenaWorkgroupTestCases(ctx: SuiteContext): TestCase[] {
  const resultLocation = `s3://${ctx.bucket}/athena-results/`;
  const workgroupState = awsState(ctx, {
    operation: 'get_work_group',
    operationParams: { WorkGroup: WORKGROUP },
    expectedKeys: ['Name', 'Description'],
  });

  return [
    {
      name: 'create_athena_workgroup',
      toolName: TOOL,
      inputParams: {
        operation: 'create-work-group',
        name: WORKGROUP,
        description: 'This is a test workgroup for MCP validation.',
        configuration: { ResultConfiguration: { OutputLocation: resultLocation } },
      },
      validators: [containsText('Successfully created Athena workgroup'), workgroupState],
      cleanups: [
        awsCleanup(ctx, { service: 'athena', operation: 'delete_work_group', params: { WorkGroup: WORKGROUP } }),
      ],
    },
    {
      name: 'get_athena_workgroup',
      toolName: TOOL,
      inputParams: { operation: 'get-work-group', name: WORKGROUP },
      dependencies: ['create_athena_workgroup'],
      validators: [containsText('Successfully retrieved workgroup')],
    },
    {
      name: 'get_athena_workgroup_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'get-work-group' },
      validators: [containsText('name is required for get-work-group operation')],
    },
    {
      name: 'list_athena_workgroups',
      toolName: TOOL,
      inputParams: { operation: 'list-work-groups', max_results: 10 },
      dependencies: ['create_athena_workgroup'],
      validators: [containsText('Successfully listed workgroups')],
    },
    {
      name: 'update_athena_workgroup',
      toolName: TOOL,
      inputParams: {
        operation: 'update-work-group',
        name: WORKGROUP,
        description: 'This is an updated test workgroup for MCP validation.',
        configuration: { ResultConfigurationUpdates: { OutputLocation: resultLocation } },
      },
      dependencies: ['create_athena_workgroup'],
      validators: [containsText('Successfully updated workgroup'), workgroupState],
    },
    {
      name: 'update_athena_workgroup_missing_name',
      toolName: TOOL,
      inputParams: {
        operation: 'update-work-group',
        description: 'This is an updated test workgroup for MCP validation.',
        configuration: { ResultConfigurationUpdates: { OutputLocation: resultLocation } },
      },
      validators: [containsText('name is required for update-work-group operation')],
    },
    {
      name: 'delete_athena_workgroup',
      toolName: TOOL,
      inputParams: { operation: 'delete-work-group', name: WORKGROUP },
      dependencies: ['create_athena_workgroup', 'get_athena_workgroup', 'list_athena_workgroups', 'update_athena_workgroup'],
      validators: [containsText('Successfully deleted MCP-managed Athena workgroup')],
    },
    {
      name: 'delete_athena_workgroup_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'delete-work-group' },
      validators: [containsText('name is required for delete-work-group operation')],
    },
  ];
}
