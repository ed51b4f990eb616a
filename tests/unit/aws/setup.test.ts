/**
 * Unit tests for aws/setup.ts
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  CreateBucketCommand,
  HeadBucketCommand,
  NotFound,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import {
  AttachRolePolicyCommand,
  CreateRoleCommand,
  IAMClient,
  ListAttachedRolePoliciesCommand,
  ListRolesCommand,
} from '@aws-sdk/client-iam';
import { CreateJobCommand, GlueClient } from '@aws-sdk/client-glue';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';

vi.mock('@shared/utils/logger', () => ({
  setupLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { createAwsClients, type AwsClients } from '@/aws/clients';
import {
  createNonMcpJob,
  createS3BucketIfNotExists,
  getOrCreateGlueRole,
  getStandardBucketName,
  uploadScript,
} from '@/aws/setup';

const s3Mock = mockClient(S3Client);
const iamMock = mockClient(IAMClient);
const glueMock = mockClient(GlueClient);
const stsMock = mockClient(STSClient);

const ROLE_ARN = 'arn:aws:iam::123456789012:role/test-mcp-glue-role';

function role(name: string, arn: string) {
  return {
    RoleName: name,
    Path: '/',
    RoleId: `AROA-${name}`,
    Arn: arn,
    CreateDate: new Date('2024-01-01T00:00:00Z'),
  };
}

function notFound(): NotFound {
  return new NotFound({ message: 'Not Found', $metadata: { httpStatusCode: 404 } });
}

describe('aws setup helpers', () => {
  let clients: AwsClients;

  beforeEach(() => {
    s3Mock.reset();
    iamMock.reset();
    glueMock.reset();
    stsMock.reset();
    stsMock.on(GetCallerIdentityCommand).resolves({ Account: '123456789012' });
    clients = createAwsClients({ region: 'us-east-1' });
  });

  describe('getStandardBucketName', () => {
    it('should combine account id and region', async () => {
      await expect(getStandardBucketName(clients)).resolves.toBe(
        'dataprocessing-123456789012-us-east-1-integration-test'
      );
    });
  });

  describe('createS3BucketIfNotExists', () => {
    it('should reuse an existing bucket', async () => {
      s3Mock.on(HeadBucketCommand).resolves({});

      const bucket = await createS3BucketIfNotExists(clients);

      expect(bucket).toBe('dataprocessing-123456789012-us-east-1-integration-test');
      expect(s3Mock.commandCalls(CreateBucketCommand)).toHaveLength(0);
    });

    it('should create the bucket without a location constraint in us-east-1', async () => {
      s3Mock.on(HeadBucketCommand).rejects(notFound());
      s3Mock.on(CreateBucketCommand).resolves({});

      await createS3BucketIfNotExists(clients);

      expect(s3Mock.commandCalls(CreateBucketCommand)[0]?.args[0].input).toEqual({
        Bucket: 'dataprocessing-123456789012-us-east-1-integration-test',
      });
    });

    it('should pass the region as location constraint elsewhere', async () => {
      const westClients = createAwsClients({ region: 'us-west-2' });
      s3Mock.on(HeadBucketCommand).rejects(notFound());
      s3Mock.on(CreateBucketCommand).resolves({});

      const bucket = await createS3BucketIfNotExists(westClients);

      expect(bucket).toBe('dataprocessing-123456789012-us-west-2-integration-test');
      expect(s3Mock.commandCalls(CreateBucketCommand)[0]?.args[0].input).toEqual({
        Bucket: 'dataprocessing-123456789012-us-west-2-integration-test',
        CreateBucketConfiguration: { LocationConstraint: 'us-west-2' },
      });
    });

    it('should rethrow errors other than not found', async () => {
      s3Mock.on(HeadBucketCommand).rejects(
        new S3ServiceException({
          name: 'Forbidden',
          $fault: 'client',
          message: 'Forbidden',
          $metadata: { httpStatusCode: 403 },
        })
      );

      await expect(createS3BucketIfNotExists(clients)).rejects.toThrow(
        'Unexpected error when checking bucket dataprocessing-123456789012-us-east-1-integration-test'
      );
      expect(s3Mock.commandCalls(CreateBucketCommand)).toHaveLength(0);
    });
  });

  describe('getOrCreateGlueRole', () => {
    it('should find an existing role on a later page', async () => {
      iamMock
        .on(ListRolesCommand)
        .resolvesOnce({
          Roles: [role('other-role', 'arn:aws:iam::123456789012:role/other-role')],
          IsTruncated: true,
          Marker: 'page-2',
        })
        .resolvesOnce({ Roles: [role('test-mcp-glue-role', ROLE_ARN)], IsTruncated: false });
      iamMock.on(ListAttachedRolePoliciesCommand).resolves({
        AttachedPolicies: [{ PolicyName: 'AWSGlueServiceRole' }],
      });

      await expect(getOrCreateGlueRole(clients)).resolves.toBe(ROLE_ARN);

      expect(iamMock.commandCalls(ListRolesCommand)).toHaveLength(2);
      expect(iamMock.commandCalls(ListRolesCommand)[1]?.args[0].input).toEqual({ Marker: 'page-2' });
      expect(iamMock.commandCalls(CreateRoleCommand)).toHaveLength(0);
    });

    it('should still return an existing role when its policies cannot be listed', async () => {
      iamMock.on(ListRolesCommand).resolves({ Roles: [role('test-mcp-glue-role', ROLE_ARN)] });
      iamMock.on(ListAttachedRolePoliciesCommand).rejects(new Error('denied'));

      await expect(getOrCreateGlueRole(clients)).resolves.toBe(ROLE_ARN);
    });

    it('should create the role and attach the Glue service policy', async () => {
      iamMock.on(ListRolesCommand).resolves({ Roles: [] });
      iamMock.on(CreateRoleCommand).resolves({ Role: role('test-mcp-glue-role', ROLE_ARN) });
      iamMock.on(AttachRolePolicyCommand).resolves({});

      await expect(getOrCreateGlueRole(clients)).resolves.toBe(ROLE_ARN);

      const createInput = iamMock.commandCalls(CreateRoleCommand)[0]?.args[0].input;
      expect(createInput?.RoleName).toBe('test-mcp-glue-role');
      expect(createInput?.Description).toBe('Role for MCP server Glue job testing');
      expect(JSON.parse(createInput?.AssumeRolePolicyDocument ?? '{}')).toEqual({
        Version: '2012-10-17',
        Statement: [
          {
            Effect: 'Allow',
            Principal: { Service: 'glue.amazonaws.com' },
            Action: 'sts:AssumeRole',
          },
        ],
      });
      expect(iamMock.commandCalls(AttachRolePolicyCommand)[0]?.args[0].input).toEqual({
        RoleName: 'test-mcp-glue-role',
        PolicyArn: 'arn:aws:iam::aws:policy/service-role/AWSGlueServiceRole',
      });
    });
  });

  describe('uploadScript', () => {
    it('should upload under the default prefix to the given bucket', async () => {
      s3Mock.on(PutObjectCommand).resolves({});

      const location = await uploadScript(clients, 'mcp-test-script.py', 'my-bucket');

      expect(location).toEqual({ Bucket: 'my-bucket', Key: 'glue_job_script/mcp-test-script.py' });
      const input = s3Mock.commandCalls(PutObjectCommand)[0]?.args[0].input;
      expect(input?.Bucket).toBe('my-bucket');
      expect(input?.Key).toBe('glue_job_script/mcp-test-script.py');
      expect(String(input?.Body)).toContain('job.commit()');
      expect(s3Mock.commandCalls(HeadBucketCommand)).toHaveLength(0);
    });

    it('should add a trailing slash to the prefix', async () => {
      s3Mock.on(PutObjectCommand).resolves({});

      const location = await uploadScript(clients, 'job.py', 'my-bucket', 'scripts');

      expect(location.Key).toBe('scripts/job.py');
    });

    it('should default to the standard bucket', async () => {
      s3Mock.on(HeadBucketCommand).resolves({});
      s3Mock.on(PutObjectCommand).resolves({});

      const location = await uploadScript(clients);

      expect(location.Bucket).toBe('dataprocessing-123456789012-us-east-1-integration-test');
    });

    it('should wrap upload failures', async () => {
      s3Mock.on(PutObjectCommand).rejects(new Error('boom'));

      await expect(uploadScript(clients, 'job.py', 'my-bucket')).rejects.toThrow(
        'Failed to upload script to S3: Error: boom'
      );
    });
  });

  describe('createNonMcpJob', () => {
    it('should create a Glue job without the server managed tags', async () => {
      s3Mock.on(HeadBucketCommand).resolves({});
      s3Mock.on(PutObjectCommand).resolves({});
      iamMock.on(ListRolesCommand).resolves({ Roles: [role('test-mcp-glue-role', ROLE_ARN)] });
      iamMock.on(ListAttachedRolePoliciesCommand).resolves({ AttachedPolicies: [] });
      glueMock.on(CreateJobCommand).resolves({ Name: 'non-mcp-test-job' });

      await createNonMcpJob(clients);

      expect(glueMock.commandCalls(CreateJobCommand)[0]?.args[0].input).toEqual({
        Name: 'non-mcp-test-job',
        Role: ROLE_ARN,
        Command: {
          Name: 'glueetl',
          ScriptLocation:
            's3://dataprocessing-123456789012-us-east-1-integration-test/glue_job_script/non-mcp-script.py',
        },
        GlueVersion: '5.0',
        Tags: { CreatedBy: 'DirectAPI', Purpose: 'NegativeTestCase', ManagedBy: 'DirectAWS' },
      });
    });

    it('should name the job in the error when creation fails', async () => {
      s3Mock.on(HeadBucketCommand).resolves({});
      s3Mock.on(PutObjectCommand).resolves({});
      iamMock.on(ListRolesCommand).resolves({ Roles: [role('test-mcp-glue-role', ROLE_ARN)] });
      iamMock.on(ListAttachedRolePoliciesCommand).resolves({ AttachedPolicies: [] });
      glueMock.on(CreateJobCommand).rejects(new Error('AlreadyExists'));

      await expect(createNonMcpJob(clients, 'dup-job')).rejects.toThrow(
        "Failed to create non-MCP job 'dup-job'"
      );
    });
  });
});
