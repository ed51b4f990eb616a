import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const UPLOAD_KEY = 'mcp-test-upload-s3.py';
const UPLOAD_CONTENT = "print('Hello from MCP S3 test')";

export function s3TestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'list_s3_buckets_default_region',
      toolName: 'list_s3_buckets',
      inputParams: {},
      validators: [containsText('Looking for S3 buckets')],
    },
    {
      name: 'list_s3_buckets_with_region',
      toolName: 'list_s3_buckets',
      inputParams: { region: ctx.clients.region },
      validators: [containsText('Looking for S3 buckets', { bucketCount: 0 })],
    },
    {
      name: 'list_s3_buckets_with_invalid_region',
      toolName: 'list_s3_buckets',
      inputParams: { region: 'invalid-region' },
      validators: [containsText("The region 'invalid-region' is invalid")],
    },
    {
      name: 'upload_file_to_s3',
      toolName: 'upload_to_s3',
      inputParams: { bucket_name: ctx.bucket, code_content: UPLOAD_CONTENT, s3_key: UPLOAD_KEY },
      validators: [
        containsText('Python code uploaded successfully!'),
        awsState(ctx, {
          operation: 'get_object',
          operationParams: { Bucket: ctx.bucket, Key: UPLOAD_KEY },
          expectedKeys: ['code_content'],
        }),
      ],
      cleanups: [
        awsCleanup(ctx, { service: 's3', operation: 'delete_object', params: { Bucket: ctx.bucket, Key: UPLOAD_KEY } }),
      ],
    },
    {
      name: 'upload_file_to_s3_missing_bucket',
      toolName: 'upload_to_s3',
      inputParams: { code_content: UPLOAD_CONTENT, s3_key: UPLOAD_KEY },
      validators: [containsText('Field required')],
    },
    {
      name: 'analyze_all_s3_usage',
      toolName: 'analyze_s3_usage_for_data_processing',
      inputParams: { bucket_name: null },
      validators: [containsText('Analyzing bucket')],
    },
    {
      name: 'analyze_s3_usage_with_bucket',
      toolName: 'analyze_s3_usage_for_data_processing',
      inputParams: { bucket_name: ctx.bucket },
      dependencies: ['upload_file_to_s3'],
      validators: [containsText('Analyzing bucket')],
    },
  ];
}
