/**
 * Delete and stop operations used by resource cleanups, per service.
 */

import {
  DeleteDataCatalogCommand,
  DeleteNamedQueryCommand,
  DeleteWorkGroupCommand,
  StopQueryExecutionCommand,
} from '@aws-sdk/client-athena';
import {
  DeleteSecurityConfigurationCommand as DeleteEmrSecurityConfigurationCommand,
  TerminateJobFlowsCommand,
} from '@aws-sdk/client-emr';
import {
  BatchStopJobRunCommand,
  DeleteCatalogCommand,
  DeleteClassifierCommand,
  DeleteConnectionCommand,
  DeleteCrawlerCommand,
  DeleteDatabaseCommand,
  DeleteJobCommand,
  DeletePartitionCommand,
  DeleteSecurityConfigurationCommand,
  DeleteSessionCommand,
  DeleteTriggerCommand,
  DeleteUsageProfileCommand,
  DeleteWorkflowCommand,
  PutDataCatalogEncryptionSettingsCommand,
  StopWorkflowRunCommand,
} from '@aws-sdk/client-glue';
import { DeleteRoleCommand, DeleteRolePolicyCommand } from '@aws-sdk/client-iam';
import { DeleteObjectCommand } from '@aws-sdk/client-s3';
import type { AwsClients } from './clients';
import { optionalBoolean, optionalString, requireString, requireStringList } from './parameters';
import type { AwsService } from './stateOperations';

type Params = Record<string, unknown>;

export type DeleteOperation = (clients: AwsClients, params: Params) => Promise<unknown>;

const GLUE_DELETE_OPERATIONS: Record<string, DeleteOperation> = {
  delete_job: (c, p) => c.glue.send(new DeleteJobCommand({ JobName: requireString(p, 'JobName') })),
  batch_stop_job_run: (c, p) =>
    c.glue.send(
      new BatchStopJobRunCommand({
        JobName: requireString(p, 'JobName'),
        JobRunIds: requireStringList(p, 'JobRunIds'),
      })
    ),
  delete_database: (c, p) =>
    c.glue.send(
      new DeleteDatabaseCommand({
        Name: requireString(p, 'Name'),
        CatalogId: optionalString(p, 'CatalogId'),
      })
    ),
  delete_partition: (c, p) =>
    c.glue.send(
      new DeletePartitionCommand({
        DatabaseName: requireString(p, 'DatabaseName'),
        TableName: requireString(p, 'TableName'),
        PartitionValues: requireStringList(p, 'PartitionValues'),
        CatalogId: optionalString(p, 'CatalogId'),
      })
    ),
  delete_catalog: (c, p) =>
    c.glue.send(new DeleteCatalogCommand({ CatalogId: requireString(p, 'CatalogId') })),
  delete_connection: (c, p) =>
    c.glue.send(
      new DeleteConnectionCommand({
        ConnectionName: requireString(p, 'ConnectionName'),
        CatalogId: optionalString(p, 'CatalogId'),
      })
    ),
  delete_crawler: (c, p) => c.glue.send(new DeleteCrawlerCommand({ Name: requireString(p, 'Name') })),
  delete_trigger: (c, p) => c.glue.send(new DeleteTriggerCommand({ Name: requireString(p, 'Name') })),
  delete_workflow: (c, p) =>
    c.glue.send(new DeleteWorkflowCommand({ Name: requireString(p, 'Name') })),
  stop_workflow_run: (c, p) =>
    c.glue.send(
      new StopWorkflowRunCommand({ Name: requireString(p, 'Name'), RunId: requireString(p, 'RunId') })
    ),
  delete_session: (c, p) => c.glue.send(new DeleteSessionCommand({ Id: requireString(p, 'Id') })),
  delete_classifier: (c, p) =>
    c.glue.send(new DeleteClassifierCommand({ Name: requireString(p, 'Name') })),
  delete_usage_profile: (c, p) =>
    c.glue.send(new DeleteUsageProfileCommand({ Name: requireString(p, 'Name') })),
  delete_security_configuration: (c, p) =>
    c.glue.send(new DeleteSecurityConfigurationCommand({ Name: requireString(p, 'Name') })),
  // Glue has no delete call for catalog encryption; reset it to disabled instead.
  delete_data_catalog_encryption_settings: (c, p) =>
    c.glue.send(
      new PutDataCatalogEncryptionSettingsCommand({
        CatalogId: optionalString(p, 'CatalogId'),
        DataCatalogEncryptionSettings: {
          EncryptionAtRest: { CatalogEncryptionMode: 'DISABLED' },
          ConnectionPasswordEncryption: { ReturnConnectionPasswordEncrypted: false },
        },
      })
    ),
};

const EMR_DELETE_OPERATIONS: Record<string, DeleteOperation> = {
  terminate_job_flows: (c, p) =>
    c.emr.send(new TerminateJobFlowsCommand({ JobFlowIds: requireStringList(p, 'JobFlowIds') })),
  delete_security_configuration: (c, p) =>
    c.emr.send(new DeleteEmrSecurityConfigurationCommand({ Name: requireString(p, 'Name') })),
};

const ATHENA_DELETE_OPERATIONS: Record<string, DeleteOperation> = {
  delete_work_group: (c, p) =>
    c.athena.send(
      new DeleteWorkGroupCommand({
        WorkGroup: requireString(p, 'WorkGroup'),
        RecursiveDeleteOption: optionalBoolean(p, 'RecursiveDeleteOption'),
      })
    ),
  delete_data_catalog: (c, p) =>
    c.athena.send(new DeleteDataCatalogCommand({ Name: requireString(p, 'Name') })),
  delete_named_query: (c, p) =>
    c.athena.send(new DeleteNamedQueryCommand({ NamedQueryId: requireString(p, 'NamedQueryId') })),
  stop_query_execution: (c, p) =>
    c.athena.send(
      new StopQueryExecutionCommand({ QueryExecutionId: requireString(p, 'QueryExecutionId') })
    ),
};

const IAM_DELETE_OPERATIONS: Record<string, DeleteOperation> = {
  delete_role: (c, p) => c.iam.send(new DeleteRoleCommand({ RoleName: requireString(p, 'RoleName') })),
  delete_role_policy: (c, p) =>
    c.iam.send(
      new DeleteRolePolicyCommand({
        RoleName: requireString(p, 'RoleName'),
        PolicyName: requireString(p, 'PolicyName'),
      })
    ),
};

const S3_DELETE_OPERATIONS: Record<string, DeleteOperation> = {
  delete_object: (c, p) =>
    c.s3.send(new DeleteObjectCommand({ Bucket: requireString(p, 'Bucket'), Key: requireString(p, 'Key') })),
};

export const DELETE_OPERATIONS: Readonly<Record<AwsService, Readonly<Record<string, DeleteOperation>>>> = {
  glue: GLUE_DELETE_OPERATIONS,
  emr: EMR_DELETE_OPERATIONS,
  athena: ATHENA_DELETE_OPERATIONS,
  iam: IAM_DELETE_OPERATIONS,
  s3: S3_DELETE_OPERATIONS,
};
