import { GLUE_ROLE_NAME } from '@/aws/setup';
import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const INLINE_POLICY = 'mcp-test-inline-policy';
const DATA_PROCESSING_ROLE = 'mcp-test-data-processing-role';

export function iamTestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'add_inline_policy_to_role',
      toolName: 'add_inline_policy',
      inputParams: {
        policy_name: INLINE_POLICY,
        role_name: GLUE_ROLE_NAME,
        permissions: {
          Effect: 'Allow',
          Action: ['glue:*', 's3:GetObject', 's3:PutObject', 's3:DeleteObject', 's3:ListBucket', 'iam:PassRole'],
          Resource: '*',
        },
      },
      validators: [
        containsText(INLINE_POLICY),
        awsState(ctx, {
          operation: 'list_role_policies',
          operationParams: { RoleName: GLUE_ROLE_NAME },
          expectedKeys: ['policy_name'],
        }),
      ],
      cleanups: [
        awsCleanup(ctx, {
          service: 'iam',
          operation: 'delete_role_policy',
          params: { RoleName: GLUE_ROLE_NAME, PolicyName: INLINE_POLICY },
        }),
      ],
    },
    {
      name: 'add_inline_policy_missing_role',
      toolName: 'add_inline_policy',
      inputParams: {
        policy_name: INLINE_POLICY,
        permissions: { Effect: 'Allow', Action: ['glue:*'], Resource: '*' },
      },
      validators: [containsText('Field required')],
    },
    {
      name: 'get_policies_for_role',
      toolName: 'get_policies_for_role',
      inputParams: { role_name: GLUE_ROLE_NAME },
      dependencies: ['add_inline_policy_to_role'],
      validators: [containsText('Successfully retrieved details for IAM role')],
    },
    {
      name: 'get_policies_for_role_missing_role',
      toolName: 'get_policies_for_role',
      inputParams: {},
      validators: [containsText('Field required')],
    },
    {
      name: 'create_data_processing_role',
      toolName: 'create_data_processing_role',
      inputParams: {
        role_name: DATA_PROCESSING_ROLE,
        description: 'Role for MCP data processing tests',
        service_type: 'glue',
      },
      validators: [
        containsText('Successfully created IAM role'),
        awsState(ctx, {
          operation: 'get_role',
          operationParams: { RoleName: DATA_PROCESSING_ROLE },
          expectedKeys: ['role_name', 'Description'],
        }),
      ],
      cleanups: [
        awsCleanup(ctx, { service: 'iam', operation: 'delete_role', params: { RoleName: DATA_PROCESSING_ROLE } }),
      ],
    },
    {
      name: 'create_data_processing_role_missing_name',
      toolName: 'create_data_processing_role',
      inputParams: { description: 'Role for MCP data processing tests', service_type: 'glue' },
      validators: [containsText('Field required')],
    },
    {
      name: 'get_roles_for_service',
      toolName: 'get_roles_for_service',
      inputParams: { service_type: 'glue' },
      dependencies: ['create_data_processing_role'],
      validators: [containsText('Successfully retrieved')],
    },
    {
      name: 'get_roles_for_service_missing_type',
      toolName: 'get_roles_for_service',
      inputParams: {},
      validators: [containsText('Field required')],
    },
  ];
}
