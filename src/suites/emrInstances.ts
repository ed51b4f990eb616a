import type { JsonObject, TestCase } from '@shared/types';
import { awsState, containsText, outputOf, type SuiteContext } from './context';

const TOOL = 'manage_aws_emr_ec2_instances';
const CLUSTER_ID = outputOf('create_emr_cluster_basic', 'cluster_id');
const FLEET_CLUSTER_ID = outputOf('create_cluster_with_fleet', 'cluster_id');

const SPOT_INSTANCE_TYPES: JsonObject[] = [
  { InstanceType: 'm5.xlarge', WeightedCapacity: 1, BidPriceAsPercentageOfOnDemandPrice: 80 },
];

const TASK_FLEET: JsonObject = {
  InstanceFleetType: 'TASK',
  Name: 'mcp-test-fleet',
  TargetOnDemandCapacity: 1,
  TargetSpotCapacity: 1,
  InstanceTypeConfigs: SPOT_INSTANCE_TYPES,
};

// Instances are added to the two clusters of the cluster catalog, which terminate them.
export function emrInstanceTestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'add_instance_fleet_to_emr_cluster',
      toolName: TOOL,
      inputParams: { operation: 'add-instance-fleet', cluster_id: FLEET_CLUSTER_ID, instance_fleet: TASK_FLEET },
      dependencies: ['create_cluster_with_fleet'],
      validators: [
        containsText('Successfully added instance fleet to EMR cluster'),
        awsState(ctx, { operation: 'list_instance_fleets', injectableParams: { cluster_id: FLEET_CLUSTER_ID } }),
      ],
    },
    {
      name: 'add_instance_fleet_missing_cluster_id',
      toolName: TOOL,
      inputParams: { operation: 'add-instance-fleet', instance_fleet: TASK_FLEET },
      validators: [containsText('cluster_id and instance_fleet are required')],
    },
    {
      name: 'add_instance_group_to_emr_cluster_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'add-instance-groups',
        cluster_id: CLUSTER_ID,
        instance_groups: [{ Name: 'TestCoreGroup', InstanceRole: 'TASK', InstanceType: 'm1.small', InstanceCount: 2 }],
      },
      dependencies: ['create_emr_cluster_basic'],
      validators: [
        containsText('Successfully added instance groups to EMR cluster'),
        awsState(ctx, { operation: 'list_instance_groups', injectableParams: { cluster_id: CLUSTER_ID } }),
      ],
    },
    {
      name: 'modify_instance_fleet_missing_ids',
      toolName: TOOL,
      inputParams: {
        operation: 'modify-instance-fleet',
        instance_fleet: {
          Name: 'mcp-test-fleet-modified',
          TargetOnDemandCapacity: 2,
          TargetSpotCapacity: 2,
          InstanceTypeConfigs: SPOT_INSTANCE_TYPES,
        },
      },
      validators: [containsText('cluster_id, instance_fleet_id, and instance_fleet_config are required')],
    },
    {
      name: 'modify_instance_group_missing_ids',
      toolName: TOOL,
      inputParams: {
        operation: 'modify-instance-groups',
        instance_group: { InstanceCount: 3, InstanceType: 'm5.xlarge' },
      },
      validators: [containsText('instance_group_configs is required for modify-instance-groups operation')],
    },
    {
      name: 'list_instance_fleets',
      toolName: TOOL,
      inputParams: { operation: 'list-instance-fleets', cluster_id: FLEET_CLUSTER_ID, max_results: 10 },
      // Master, core and the added task fleet.
      dependencies: ['create_cluster_with_fleet', 'add_instance_fleet_to_emr_cluster'],
      validators: [containsText('Successfully listed instance fleets for EMR cluster', { expectedCount: 3 })],
    },
    {
      name: 'list_instance_groups',
      toolName: TOOL,
      inputParams: { operation: 'list-instances', cluster_id: CLUSTER_ID, max_results: 10 },
      dependencies: ['create_emr_cluster_basic', 'add_instance_group_to_emr_cluster_basic'],
      validators: [containsText('uccessfully listed instances for EMR cluster ')],
    },
    {
      name: 'list_supported_instance_types',
      toolName: TOOL,
      inputParams: { operation: 'list-supported-instance-types', release_label: 'emr-6.3.0' },
      validators: [containsText('Successfully listed supported instance types for EMR')],
    },
  ];
}
