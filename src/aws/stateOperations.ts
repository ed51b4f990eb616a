/**
 * Read-only AWS operations used by live-state validation.
 *
 * Each entry takes normalized (AWS field name) parameters and returns the raw
 * SDK output.
 */

import {
  GetDataCatalogCommand,
  GetWorkGroupCommand,
  ListTagsForResourceCommand,
} from '@aws-sdk/client-athena';
import {
  DescribeClusterCommand,
  DescribeSecurityConfigurationCommand,
  DescribeStepCommand,
  ListInstanceFleetsCommand,
  ListInstanceGroupsCommand,
} from '@aws-sdk/client-emr';
import {
  GetClassifierCommand,
  GetConnectionCommand,
  GetCrawlerCommand,
  GetDataCatalogEncryptionSettingsCommand,
  GetDatabaseCommand,
  GetJobCommand,
  GetPartitionCommand,
  GetSecurityConfigurationCommand,
  GetSessionCommand,
  GetTableCommand,
  GetTagsCommand,
  GetTriggerCommand,
  GetUsageProfileCommand,
  GetWorkflowCommand,
  GetWorkflowRunCommand,
} from '@aws-sdk/client-glue';
import { GetRoleCommand, ListRolePoliciesCommand } from '@aws-sdk/client-iam';
import { GetObjectCommand } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import type { AwsClients } from './clients';
import { optionalBoolean, optionalString, requireString, requireStringList } from './parameters';

export type AwsService = 'glue' | 'emr' | 'athena' | 'iam' | 's3';

type Params = Record<string, unknown>;

export interface StateOperation {
  service: AwsService;
  query(clients: AwsClients, params: Params): Promise<object>;
}

export const STATE_OPERATIONS: Readonly<Record<string, StateOperation>> = {
  // Glue
  get_job: {
    service: 'glue',
    query: (c, p) => c.glue.send(new GetJobCommand({ JobName: requireString(p, 'JobName') })),
  },
  get_database: {
    service: 'glue',
    query: (c, p) =>
      c.glue.send(
        new GetDatabaseCommand({
          Name: requireString(p, 'Name'),
          CatalogId: optionalString(p, 'CatalogId'),
        })
      ),
  },
  get_table: {
    service: 'glue',
    query: (c, p) =>
      c.glue.send(
        new GetTableCommand({
          DatabaseName: requireString(p, 'DatabaseName'),
          Name: requireString(p, 'Name'),
          CatalogId: optionalString(p, 'CatalogId'),
        })
      ),
  },
  get_partition: {
    service: 'glue',
    query: (c, p) =>
      c.glue.send(
        new GetPartitionCommand({
          DatabaseName: requireString(p, 'DatabaseName'),
          TableName: requireString(p, 'TableName'),
          PartitionValues: requireStringList(p, 'PartitionValues'),
          CatalogId: optionalString(p, 'CatalogId'),
        })
      ),
  },
  get_connection: {
    service: 'glue',
    query: (c, p) =>
      c.glue.send(
        new GetConnectionCommand({
          Name: requireString(p, 'Name'),
          CatalogId: optionalString(p, 'CatalogId'),
          HidePassword: optionalBoolean(p, 'HidePassword'),
        })
      ),
  },
  get_crawler: {
    service: 'glue',
    query: (c, p) => c.glue.send(new GetCrawlerCommand({ Name: requireString(p, 'Name') })),
  },
  get_trigger: {
    service: 'glue',
    query: (c, p) => c.glue.send(new GetTriggerCommand({ Name: requireString(p, 'Name') })),
  },
  get_workflow: {
    service: 'glue',
    query: (c, p) =>
      c.glue.send(
        new GetWorkflowCommand({
          Name: requireString(p, 'Name'),
          IncludeGraph: optionalBoolean(p, 'IncludeGraph'),
        })
      ),
  },
  get_workflow_run: {
    service: 'glue',
    query: (c, p) =>
      c.glue.send(
        new GetWorkflowRunCommand({
          Name: requireString(p, 'Name'),
          RunId: requireString(p, 'RunId'),
          IncludeGraph: optionalBoolean(p, 'IncludeGraph'),
        })
      ),
  },
  get_session: {
    service: 'glue',
    query: (c, p) => c.glue.send(new GetSessionCommand({ Id: requireString(p, 'Id') })),
  },
  get_classifier: {
    service: 'glue',
    query: (c, p) => c.glue.send(new GetClassifierCommand({ Name: requireString(p, 'Name') })),
  },
  get_usage_profile: {
    service: 'glue',
    query: (c, p) => c.glue.send(new GetUsageProfileCommand({ Name: requireString(p, 'Name') })),
  },
  get_security_configuration: {
    service: 'glue',
    query: (c, p) =>
      c.glue.send(new GetSecurityConfigurationCommand({ Name: requireString(p, 'Name') })),
  },
  get_data_catalog_encryption_settings: {
    service: 'glue',
    query: (c, p) =>
      c.glue.send(
        new GetDataCatalogEncryptionSettingsCommand({ CatalogId: optionalString(p, 'CatalogId') })
      ),
  },

  // Athena
  get_work_group: {
    service: 'athena',
    query: (c, p) =>
      c.athena.send(new GetWorkGroupCommand({ WorkGroup: requireString(p, 'WorkGroup') })),
  },
  get_data_catalog: {
    service: 'athena',
    query: (c, p) =>
      c.athena.send(
        new GetDataCatalogCommand({
          Name: requireString(p, 'Name'),
          WorkGroup: optionalString(p, 'WorkGroup'),
        })
      ),
  },

  // EMR
  describe_cluster: {
    service: 'emr',
    query: (c, p) =>
      c.emr.send(new DescribeClusterCommand({ ClusterId: requireString(p, 'ClusterId') })),
  },
  describe_step: {
    service: 'emr',
    query: (c, p) =>
      c.emr.send(
        new DescribeStepCommand({
          ClusterId: requireString(p, 'ClusterId'),
          StepId: requireString(p, 'StepId'),
        })
      ),
  },
  describe_security_configuration: {
    service: 'emr',
    query: (c, p) =>
      c.emr.send(new DescribeSecurityConfigurationCommand({ Name: requireString(p, 'Name') })),
  },
  list_instance_groups: {
    service: 'emr',
    query: (c, p) =>
      c.emr.send(new ListInstanceGroupsCommand({ ClusterId: requireString(p, 'ClusterId') })),
  },
  list_instance_fleets: {
    service: 'emr',
    query: (c, p) =>
      c.emr.send(new ListInstanceFleetsCommand({ ClusterId: requireString(p, 'ClusterId') })),
  },

  // IAM
  get_role: {
    service: 'iam',
    query: (c, p) => c.iam.send(new GetRoleCommand({ RoleName: requireString(p, 'RoleName') })),
  },
  list_role_policies: {
    service: 'iam',
    query: (c, p) =>
      c.iam.send(new ListRolePoliciesCommand({ RoleName: requireString(p, 'RoleName') })),
  },

  // S3
  get_object: {
    service: 's3',
    query: async (c, p) => {
      const { Body, ...rest } = await c.s3.send(
        new GetObjectCommand({ Bucket: requireString(p, 'Bucket'), Key: requireString(p, 'Key') })
      );
      return { ...rest, Body: Body ? await Body.transformToString() : undefined };
    },
  },
};

/**
 * Fetch the tags of a resource through the tagging API of its service.
 * Services without one yield no tags.
 */
export async function fetchTags(
  clients: AwsClients,
  service: AwsService,
  arn: string,
  logger: Logger
): Promise<Record<string, string>> {
  switch (service) {
    case 'glue': {
      const response = await clients.glue.send(new GetTagsCommand({ ResourceArn: arn }));
      return response.Tags ?? {};
    }
    case 'athena': {
      const response = await clients.athena.send(new ListTagsForResourceCommand({ ResourceARN: arn }));
      const tags: Record<string, string> = {};
      for (const tag of response.Tags ?? []) {
        if (tag.Key !== undefined) {
          tags[tag.Key] = tag.Value ?? '';
        }
      }
      return tags;
    }
    default:
      logger.warn({ service, arn }, 'No tag API available for service');
      return {};
  }
}
