import type { JsonObject, TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_security_configurations';
const CONFIG = 'mcp_test_security_config';
const MISSING_CONFIG = 'non_existent_config';

const ENCRYPTION_CONFIGURATION: JsonObject = {
  S3Encryption: [
    {
      S3EncryptionMode: 'SSE-KMS',
      KmsKeyArn: 'arn:aws:kms:us-west-2:123456789012:key/12345678-1234-1234-1234-123456789012',
    },
  ],
};

export function glueSecurityConfigurationTestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'create_security_configuration_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-security-configuration',
        config_name: CONFIG,
        encryption_configuration: ENCRYPTION_CONFIGURATION,
      },
      validators: [
        containsText('Successfully created security configuration'),
        awsState(ctx, {
          operation: 'get_security_configuration',
          operationParams: { Name: CONFIG },
          expectedKeys: ['config_name', 'EncryptionConfiguration.S3Encryption'],
        }),
      ],
      cleanups: [
        awsCleanup(ctx, { service: 'glue', operation: 'delete_security_configuration', params: { Name: CONFIG } }),
      ],
    },
    {
      name: 'get_security_configuration_basic',
      toolName: TOOL,
      inputParams: { operation: 'get-security-configuration', config_name: CONFIG },
      dependencies: ['create_security_configuration_basic'],
      validators: [containsText('Successfully retrieved security configuration')],
    },
    {
      name: 'create_security_configuration_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'create-security-configuration', encryption_configuration: ENCRYPTION_CONFIGURATION },
      validators: [containsText('Field required')],
    },
    {
      name: 'get_security_configuration_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-security-configuration', config_name: MISSING_CONFIG },
      validators: [containsText('An error occurred (EntityNotFoundException) ')],
    },
    {
      name: 'delete_security_configuration',
      toolName: TOOL,
      inputParams: { operation: 'delete-security-configuration', config_name: CONFIG },
      dependencies: ['create_security_configuration_basic', 'get_security_configuration_basic'],
      validators: [
        containsText('Successfully deleted security configuration'),
        awsState(ctx, {
          operation: 'get_security_configuration',
          operationParams: { Name: CONFIG },
          validateAbsence: true,
        }),
      ],
    },
    {
      name: 'delete_security_configuration_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-security-configuration', config_name: MISSING_CONFIG },
      validators: [containsText(`Security configuration ${MISSING_CONFIG} not found`)],
    },
    {
      name: 'delete_security_configuration_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'delete-security-configuration' },
      validators: [containsText('Field required')],
    },
  ];
}
