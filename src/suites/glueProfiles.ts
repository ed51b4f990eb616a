import type { JsonObject, TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_usage_profiles';
const PROFILE = 'mcp_test_profile';
const UNCHECKED_PROFILE = 'mcp_test_profile_no_check';
const MISSING_PROFILE = 'non_existent_profile';

function profileConfiguration(timeout: string, maxRetries: string): JsonObject {
  return {
    SessionConfiguration: { Timeout: { DefaultValue: timeout } },
    JobConfiguration: { MaxRetries: { DefaultValue: maxRetries } },
  };
}

export function glueProfileTestCases(ctx: SuiteContext): TestCase[] {
  const profileState = (name: string, expectedKeys: string[]) =>
    awsState(ctx, { operation: 'get_usage_profile', operationParams: { Name: name }, expectedKeys });
  const deleteProfile = (name: string) =>
    awsCleanup(ctx, { service: 'glue', operation: 'delete_usage_profile', params: { Name: name } });

  return [
    {
      name: 'create_glue_profile_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-profile',
        profile_name: PROFILE,
        configuration: profileConfiguration('300', '3'),
      },
      validators: [
        containsText(`Successfully created usage profile ${PROFILE}`),
        profileState(PROFILE, ['profile_name', 'configuration']),
      ],
      cleanups: [deleteProfile(PROFILE)],
    },
    {
      name: 'create_glue_profile_not_check_configuration',
      toolName: TOOL,
      inputParams: {
        operation: 'create-profile',
        profile_name: UNCHECKED_PROFILE,
        configuration: profileConfiguration('300', '3'),
      },
      validators: [
        containsText(`Successfully created usage profile ${UNCHECKED_PROFILE}`),
        profileState(UNCHECKED_PROFILE, ['profile_name']),
      ],
      cleanups: [deleteProfile(UNCHECKED_PROFILE)],
    },
    {
      name: 'get_glue_profile_not_check_configuration',
      toolName: TOOL,
      inputParams: { operation: 'get-profile', profile_name: UNCHECKED_PROFILE },
      dependencies: ['create_glue_profile_not_check_configuration'],
      validators: [containsText('Successfully retrieved usage profile')],
    },
    {
      name: 'get_glue_profile_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-profile', profile_name: MISSING_PROFILE },
      validators: [containsText(`UsageProfile ${MISSING_PROFILE} does not exists`)],
    },
    {
      name: 'get_glue_profile_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'get-profile' },
      validators: [containsText('Field required')],
    },
    {
      name: 'update_glue_profile_not_check_configuration',
      toolName: TOOL,
      inputParams: {
        operation: 'update-profile',
        profile_name: UNCHECKED_PROFILE,
        configuration: profileConfiguration('600', '5'),
      },
      dependencies: ['create_glue_profile_not_check_configuration'],
      validators: [
        containsText('Successfully updated usage profile'),
        profileState(UNCHECKED_PROFILE, ['profile_name', 'configuration']),
      ],
    },
    {
      name: 'update_glue_profile_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'update-profile', configuration: profileConfiguration('600', '5') },
      validators: [containsText('Field required')],
    },
    {
      name: 'delete_glue_profile_not_check_configuration',
      toolName: TOOL,
      inputParams: { operation: 'delete-profile', profile_name: UNCHECKED_PROFILE },
      dependencies: [
        'create_glue_profile_not_check_configuration',
        'get_glue_profile_not_check_configuration',
        'update_glue_profile_not_check_configuration',
      ],
      validators: [
        containsText('Successfully deleted usage profile'),
        awsState(ctx, {
          operation: 'get_usage_profile',
          operationParams: { Name: UNCHECKED_PROFILE },
          validateAbsence: true,
        }),
      ],
    },
    {
      name: 'delete_glue_profile_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-profile', profile_name: MISSING_PROFILE },
      validators: [containsText(`Usage profile ${MISSING_PROFILE} not found`)],
    },
    {
      name: 'delete_glue_profile_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'delete-profile' },
      validators: [containsText('Field required')],
    },
  ];
}
