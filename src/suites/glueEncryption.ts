import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_encryption';

export function glueEncryptionTestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'put_glue_encryption_settings',
      toolName: TOOL,
      inputParams: {
        operation: 'put-catalog-encryption-settings',
        encryption_at_rest: {
          CatalogEncryptionMode: 'SSE-KMS',
          SseAwsKmsKeyId: 'arn:aws:kms:us-west-2:123456789012:key/12345678-1234-1234-1234-123456789012',
        },
      },
      validators: [
        containsText('Successfully updated Data Catalog encryption settings'),
        awsState(ctx, { operation: 'get_data_catalog_encryption_settings', expectedKeys: ['encryption_at_rest'] }),
      ],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_data_catalog_encryption_settings' })],
    },
    {
      name: 'get_glue_encryption_settings',
      toolName: TOOL,
      inputParams: { operation: 'get-catalog-encryption-settings' },
      dependencies: ['put_glue_encryption_settings'],
      validators: [containsText('Successfully retrieved Data Catalog encryption settings')],
    },
    {
      name: 'put_glue_encryption_settings_missing_params',
      toolName: TOOL,
      inputParams: { operation: 'put-catalog-encryption-settings' },
      validators: [
        containsText(
          'Either encryption_at_rest or connection_password_encryption is required for put-catalog-encryption-settings operation'
        ),
      ],
    },
  ];
}
