/**
 * AWS SDK clients shared by validators, cleanups and setup helpers.
 *
 * Clients are built once per run from the `aws` section of the configuration.
 */

import { AthenaClient } from '@aws-sdk/client-athena';
import { EMRClient } from '@aws-sdk/client-emr';
import { GlueClient } from '@aws-sdk/client-glue';
import { IAMClient } from '@aws-sdk/client-iam';
import { S3Client } from '@aws-sdk/client-s3';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { fromIni } from '@aws-sdk/credential-provider-ini';
import type { Config } from '@shared/types';

const USER_AGENT: [string, string] = ['dataprocessing-mcp-integration-tests', '0.1.0'];

export interface AwsClients {
  region: string;
  glue: GlueClient;
  emr: EMRClient;
  athena: AthenaClient;
  s3: S3Client;
  iam: IAMClient;
  sts: STSClient;
}

/**
 * Build every client for one region, with shared-config profile credentials
 * when a profile is configured.
 */
export function createAwsClients(aws: Config['aws']): AwsClients {
  const clientConfig = {
    region: aws.region,
    customUserAgent: [USER_AGENT],
    ...(aws.profile ? { credentials: fromIni({ profile: aws.profile }) } : {}),
  };

  return {
    region: aws.region,
    glue: new GlueClient(clientConfig),
    emr: new EMRClient(clientConfig),
    athena: new AthenaClient(clientConfig),
    s3: new S3Client(clientConfig),
    iam: new IAMClient(clientConfig),
    sts: new STSClient(clientConfig),
  };
}

const accountIds = new WeakMap<AwsClients, Promise<string>>();

/**
 * Account id of the caller, looked up once per client set.
 */
export function getAccountId(clients: AwsClients): Promise<string> {
  let accountId = accountIds.get(clients);
  if (accountId === undefined) {
    accountId = clients.sts.send(new GetCallerIdentityCommand({})).then((identity) => {
      if (!identity.Account) {
        throw new Error('GetCallerIdentity returned no account id');
      }
      return identity.Account;
    });
    accountIds.set(clients, accountId);
    // Drop a failed lookup so the next caller retries.
    void accountId.catch(() => accountIds.delete(clients));
  }
  return accountId;
}

/**
 * AWS SDK v3 service exceptions carry a `name` (the error code) and `$metadata`.
 */
export type AwsServiceError = Error & { $metadata: { httpStatusCode?: number } };

export function isAwsServiceError(error: unknown): error is AwsServiceError {
  return error instanceof Error && '$metadata' in error;
}
