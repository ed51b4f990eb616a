import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, outputOf, type SuiteContext } from './context';

const TOOL = 'manage_aws_emr_clusters';
const SECURITY_CONFIGURATION = 'mcp-test-security-config';
const RELEASE_LABEL = 'emr-6.3.0';
const APPLICATIONS = [{ Name: 'Hadoop' }, { Name: 'Spark' }];
const BASIC_CLUSTER_ID = outputOf('create_emr_cluster_basic', 'cluster_id');

const SECURITY_CONFIGURATION_JSON = JSON.stringify({
  EncryptionConfiguration: {
    EnableInTransitEncryption: false,
    EnableAtRestEncryption: true,
    AtRestEncryptionConfiguration: {
      S3EncryptionConfiguration: { EncryptionMode: 'SSE-S3' },
    },
  },
});

export function emrClusterTestCases(ctx: SuiteContext): TestCase[] {
  const terminateCluster = awsCleanup(ctx, {
    service: 'emr',
    operation: 'terminate_job_flows',
    resourceField: 'cluster_id',
    targetParamKey: 'JobFlowIds',
    paramIsList: true,
  });

  return [
    {
      name: 'create_emr_cluster_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-cluster',
        name: 'mcp-test-emr-cluster',
        release_label: RELEASE_LABEL,
        applications: APPLICATIONS,
        instances: {
          InstanceGroups: [
            { Name: 'Master', InstanceRole: 'MASTER', InstanceType: 'm5.xlarge', InstanceCount: 1 },
            { Name: 'Core', InstanceRole: 'CORE', InstanceType: 'm5.xlarge', InstanceCount: 2 },
          ],
          KeepJobFlowAliveWhenNoSteps: true,
        },
        service_role: 'EMR_DefaultRole',
        job_flow_role: 'EMR_EC2_DefaultRole',
      },
      validators: [
        containsText('Successfully created EMR cluster'),
        awsState(ctx, {
          operation: 'describe_cluster',
          expectedKeys: ['Name', 'release_label'],
          injectableParams: { cluster_id: BASIC_CLUSTER_ID },
        }),
      ],
      cleanups: [terminateCluster],
    },
    {
      name: 'create_emr_cluster_missing_name',
      toolName: TOOL,
      inputParams: {
        operation: 'create-cluster',
        release_label: RELEASE_LABEL,
        applications: APPLICATIONS,
        instance_type: 'm5.xlarge',
        instance_count: 2,
      },
      validators: [containsText('name, release_label, and instances are required for create-cluster operation')],
    },
    {
      name: 'list_emr_clusters',
      toolName: TOOL,
      inputParams: { operation: 'list-clusters', max_results: 10 },
      dependencies: ['create_emr_cluster_basic'],
      validators: [containsText('Successfully listed EMR clusters')],
    },
    {
      name: 'create_security_configuration',
      toolName: TOOL,
      inputParams: {
        operation: 'create-security-configuration',
        name: SECURITY_CONFIGURATION,
        security_configuration: SECURITY_CONFIGURATION_JSON,
      },
      validators: [
        containsText('Successfully created security configuration'),
        awsState(ctx, {
          operation: 'describe_security_configuration',
          operationParams: { Name: SECURITY_CONFIGURATION },
          expectedKeys: ['EncryptionConfiguration'],
        }),
      ],
      cleanups: [
        awsCleanup(ctx, {
          service: 'emr',
          operation: 'delete_security_configuration',
          params: { Name: SECURITY_CONFIGURATION },
        }),
      ],
    },
    {
      name: 'describe_emr_cluster',
      toolName: TOOL,
      inputParams: { operation: 'describe-cluster', cluster_id: BASIC_CLUSTER_ID },
      dependencies: ['create_emr_cluster_basic'],
      validators: [containsText('Successfully described EMR cluster')],
    },
    {
      name: 'describe_emr_cluster_missing_id',
      toolName: TOOL,
      inputParams: { operation: 'describe-cluster' },
      validators: [containsText('cluster_id is required for describe-cluster operation')],
    },
    {
      name: 'modify_emr_cluster',
      toolName: TOOL,
      inputParams: { operation: 'modify-cluster', cluster_id: BASIC_CLUSTER_ID, step_concurrency_level: 1 },
      dependencies: ['create_emr_cluster_basic'],
      validators: [
        containsText('Successfully modified EMR cluster'),
        awsState(ctx, {
          operation: 'describe_cluster',
          expectedKeys: ['step_concurrency_level'],
          injectableParams: { cluster_id: BASIC_CLUSTER_ID },
        }),
      ],
    },
    {
      name: 'modify_emr_cluster_missing_id',
      toolName: TOOL,
      inputParams: { operation: 'modify-cluster', name: 'mcp-test-emr-cluster-modified' },
      validators: [containsText('cluster_id is required for modify-cluster operation')],
    },
    {
      name: 'modify_emr_cluster_attribute',
      toolName: TOOL,
      inputParams: {
        operation: 'modify-cluster-attributes',
        cluster_id: BASIC_CLUSTER_ID,
        termination_protected: false,
      },
      dependencies: ['create_emr_cluster_basic'],
      validators: [
        containsText('Successfully modified attributes for EMR cluster'),
        awsState(ctx, {
          operation: 'describe_cluster',
          expectedKeys: ['termination_protected'],
          injectableParams: { cluster_id: BASIC_CLUSTER_ID },
        }),
      ],
    },
    {
      name: 'terminate_emr_cluster',
      toolName: TOOL,
      inputParams: { operation: 'terminate-clusters', cluster_ids: [BASIC_CLUSTER_ID] },
      // Terminate only once the other cluster cases are done with it.
      dependencies: [
        'create_emr_cluster_basic',
        'list_emr_clusters',
        'describe_emr_cluster',
        'modify_emr_cluster',
        'modify_emr_cluster_attribute',
      ],
      validators: [containsText('Successfully initiated termination for 1 MCP-managed EMR clusters')],
    },
    {
      name: 'terminate_emr_cluster_missing_id',
      toolName: TOOL,
      inputParams: { operation: 'terminate-clusters' },
      validators: [containsText('cluster_ids is required for terminate-clusters operation')],
    },
    {
      name: 'create_cluster_with_fleet',
      toolName: TOOL,
      inputParams: {
        operation: 'create-cluster',
        name: 'mcp-test-emr-cluster-with-fleet',
        release_label: RELEASE_LABEL,
        applications: APPLICATIONS,
        instances: {
          InstanceFleets: [
            {
              Name: 'Master Fleet',
              InstanceFleetType: 'MASTER',
              TargetOnDemandCapacity: 1,
              InstanceTypeConfigs: [{ InstanceType: 'm5.xlarge', WeightedCapacity: 1 }],
            },
            {
              Name: 'Core Fleet',
              InstanceFleetType: 'CORE',
              TargetOnDemandCapacity: 2,
              InstanceTypeConfigs: [{ InstanceType: 'm5.xlarge', WeightedCapacity: 1 }],
            },
          ],
          KeepJobFlowAliveWhenNoSteps: true,
        },
        service_role: 'EMR_DefaultRole',
        job_flow_role: 'EMR_EC2_DefaultRole',
      },
      validators: [
        containsText('Successfully created EMR cluster'),
        awsState(ctx, {
          operation: 'describe_cluster',
          expectedKeys: ['Name', 'release_label'],
          injectableParams: { cluster_id: outputOf('create_cluster_with_fleet', 'cluster_id') },
        }),
      ],
      cleanups: [terminateCluster],
    },
  ];
}
