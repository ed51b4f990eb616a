/**
 * One-off AWS preparation before a run: the shared test bucket, the Glue
 * service role and the job script.
 */

import { CreateJobCommand } from '@aws-sdk/client-glue';
import {
  AttachRolePolicyCommand,
  CreateRoleCommand,
  ListAttachedRolePoliciesCommand,
  paginateListRoles,
} from '@aws-sdk/client-iam';
import {
  BucketLocationConstraint,
  CreateBucketCommand,
  HeadBucketCommand,
  PutObjectCommand,
} from '@aws-sdk/client-s3';
import { setupLogger } from '@shared/utils/logger';
import { getAccountId, isAwsServiceError, type AwsClients } from './clients';

const logger = setupLogger('dataprocessing-tests:setup');

export const GLUE_ROLE_NAME = 'test-mcp-glue-role';
const GLUE_SERVICE_POLICY_ARN = 'arn:aws:iam::aws:policy/service-role/AWSGlueServiceRole';
const GLUE_POLICY_NAMES = new Set(['AWSGlueServiceRole', 'service-role/AWSGlueServiceRole']);

const TEST_SCRIPT = `import sys
from awsglue.transforms import *
from awsglue.utils import getResolvedOptions
from pyspark.context import SparkContext
from awsglue.context import GlueContext
from awsglue.job import Job

print("Test script for MCP server testing")

sc = SparkContext()
glueContext = GlueContext(sc)
spark = glueContext.spark_session
job = Job(glueContext)
job.init("test_job", {})

print("Job completed successfully")
job.commit()
`;

export interface S3Location {
  Bucket: string;
  Key: string;
}

/**
 * Name of the per-account, per-region integration test bucket.
 */
export async function getStandardBucketName(clients: AwsClients): Promise<string> {
  const accountId = await getAccountId(clients);
  return `dataprocessing-${accountId}-${clients.region}-integration-test`.toLowerCase();
}

function locationConstraint(region: string): BucketLocationConstraint | undefined {
  // us-east-1 is the default location and must not be named.
  if (region === 'us-east-1') return undefined;
  return Object.values(BucketLocationConstraint).find((constraint) => constraint === region);
}

/**
 * Create the standard test bucket unless it already exists.
 *
 * @returns The bucket name
 */
export async function createS3BucketIfNotExists(clients: AwsClients): Promise<string> {
  const bucket = await getStandardBucketName(clients);

  try {
    await clients.s3.send(new HeadBucketCommand({ Bucket: bucket }));
    logger.info({ bucket }, 'Bucket already exists');
    return bucket;
  } catch (error) {
    if (!isAwsServiceError(error) || error.$metadata.httpStatusCode !== 404) {
      throw new Error(`Unexpected error when checking bucket ${bucket}: ${String(error)}`, {
        cause: error,
      });
    }
  }

  logger.info({ bucket }, 'Creating bucket');
  const constraint = locationConstraint(clients.region);
  await clients.s3.send(
    new CreateBucketCommand({
      Bucket: bucket,
      CreateBucketConfiguration: constraint ? { LocationConstraint: constraint } : undefined,
    })
  );
  logger.info({ bucket }, 'Created bucket');
  return bucket;
}

/**
 * Reuse the Glue test role if it exists, otherwise create it with the Glue
 * service policy attached.
 *
 * @returns The role ARN
 */
export async function getOrCreateGlueRole(clients: AwsClients): Promise<string> {
  for await (const page of paginateListRoles({ client: clients.iam }, {})) {
    const existingArn = page.Roles?.find((r) => r.RoleName === GLUE_ROLE_NAME)?.Arn;
    if (existingArn === undefined) continue;

    logger.info({ roleArn: existingArn }, 'Reusing existing IAM role');
    try {
      const attached = await clients.iam.send(
        new ListAttachedRolePoliciesCommand({ RoleName: GLUE_ROLE_NAME })
      );
      const hasGluePolicy = (attached.AttachedPolicies ?? []).some(
        (p) => p.PolicyName !== undefined && GLUE_POLICY_NAMES.has(p.PolicyName)
      );
      if (!hasGluePolicy) {
        logger.warn({ roleArn: existingArn }, 'Role may not have required Glue permissions');
      }
    } catch (error) {
      logger.error({ roleArn: existingArn, error }, 'Error checking role policies');
    }
    return existingArn;
  }

  const assumeRolePolicy = {
    Version: '2012-10-17',
    Statement: [
      {
        Effect: 'Allow',
        Principal: { Service: 'glue.amazonaws.com' },
        Action: 'sts:AssumeRole',
      },
    ],
  };

  const response = await clients.iam.send(
    new CreateRoleCommand({
      RoleName: GLUE_ROLE_NAME,
      AssumeRolePolicyDocument: JSON.stringify(assumeRolePolicy),
      Description: 'Role for MCP server Glue job testing',
    })
  );
  const roleArn = response.Role?.Arn;
  if (!roleArn) {
    throw new Error(`CreateRole returned no ARN for ${GLUE_ROLE_NAME}`);
  }

  await clients.iam.send(
    new AttachRolePolicyCommand({ RoleName: GLUE_ROLE_NAME, PolicyArn: GLUE_SERVICE_POLICY_ARN })
  );
  logger.info({ roleArn }, 'Created new IAM role with Glue permissions');
  return roleArn;
}

/**
 * Upload the test Glue script.
 *
 * @param bucket - Target bucket; the standard bucket when omitted
 */
export async function uploadScript(
  clients: AwsClients,
  scriptName: string = 'mcp-test-script.py',
  bucket?: string,
  prefix: string = 'glue_job_script/'
): Promise<S3Location> {
  const targetBucket = bucket ?? (await createS3BucketIfNotExists(clients));
  const normalizedPrefix = prefix && !prefix.endsWith('/') ? `${prefix}/` : prefix;
  const key = `${normalizedPrefix}${scriptName}`;

  try {
    await clients.s3.send(
      new PutObjectCommand({ Bucket: targetBucket, Key: key, Body: TEST_SCRIPT, ContentType: 'text/x-python' })
    );
  } catch (error) {
    throw new Error(`Failed to upload script to S3: ${String(error)}`, { cause: error });
  }

  logger.info({ location: `s3://${targetBucket}/${key}` }, 'Uploaded script');
  return { Bucket: targetBucket, Key: key };
}

/**
 * Create a Glue job directly, without the server's managed tags, so that
 * the server must refuse to modify it.
 */
export async function createNonMcpJob(
  clients: AwsClients,
  jobName: string = 'non-mcp-test-job'
): Promise<void> {
  logger.info({ jobName }, 'Creating Glue job not managed by MCP');

  try {
    const location = await uploadScript(clients, 'non-mcp-script.py');
    const roleArn = await getOrCreateGlueRole(clients);

    await clients.glue.send(
      new CreateJobCommand({
        Name: jobName,
        Role: roleArn,
        Command: { Name: 'glueetl', ScriptLocation: `s3://${location.Bucket}/${location.Key}` },
        GlueVersion: '5.0',
        Tags: {
          CreatedBy: 'DirectAPI',
          Purpose: 'NegativeTestCase',
          ManagedBy: 'DirectAWS',
        },
      })
    );
  } catch (error) {
    throw new Error(`Failed to create non-MCP job '${jobName}': ${String(error)}`, { cause: error });
  }

  logger.info({ jobName }, 'Created non-MCP job');
}
