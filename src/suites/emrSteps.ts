import type { JsonObject, TestCase } from '@shared/types';
import { awsState, containsText, outputOf, type SuiteContext } from './context';

const TOOL = 'manage_aws_emr_ec2_steps';
const CLUSTER_ID = outputOf('create_emr_cluster_basic', 'cluster_id');
const STEP_ID = outputOf('add_step_to_emr_cluster', 'step_ids[0]');

// Steps run on the basic cluster of the cluster catalog.
export function emrStepTestCases(ctx: SuiteContext): TestCase[] {
  const sparkStep: JsonObject = {
    Name: 'SparkExampleStep',
    ActionOnFailure: 'CONTINUE',
    HadoopJarStep: {
      Jar: 'command-runner.jar',
      Args: ['spark-submit', '--deploy-mode', 'cluster', `s3://${ctx.bucket}/app.jar`, '--arg1', 'val1'],
    },
  };

  return [
    {
      name: 'add_step_to_emr_cluster',
      toolName: TOOL,
      inputParams: { operation: 'add-steps', cluster_id: CLUSTER_ID, steps: [sparkStep] },
      dependencies: ['create_emr_cluster_basic'],
      validators: [
        containsText('Successfully added 1 steps to EMR cluster'),
        awsState(ctx, {
          operation: 'describe_step',
          injectableParams: { cluster_id: CLUSTER_ID, step_id: STEP_ID },
        }),
      ],
    },
    {
      name: 'add_step_missing_cluster_id',
      toolName: TOOL,
      inputParams: {
        operation: 'add-step',
        steps: {
          Name: 'MCP Test Step',
          ActionOnFailure: 'CONTINUE',
          HadoopJarStep: {
            Jar: 'command-runner.jar',
            Args: ['spark-submit', '--deploy-mode', 'cluster', 'script.py'],
          },
        },
      },
      validators: [containsText('Field required')],
    },
    {
      name: 'describe_emr_step',
      toolName: TOOL,
      inputParams: { operation: 'describe-step', cluster_id: CLUSTER_ID, step_id: STEP_ID },
      dependencies: ['create_emr_cluster_basic', 'add_step_to_emr_cluster'],
      validators: [containsText('Successfully described step')],
    },
    {
      name: 'describe_emr_step_missing_ids',
      toolName: TOOL,
      inputParams: { operation: 'describe-step' },
      validators: [containsText('Field required')],
    },
    {
      name: 'list_emr_steps',
      toolName: TOOL,
      inputParams: { operation: 'list-steps', cluster_id: CLUSTER_ID, max_results: 10 },
      dependencies: ['create_emr_cluster_basic', 'add_step_to_emr_cluster'],
      validators: [containsText('Successfully listed steps for EMR cluster', { expectedCount: 1 })],
    },
    {
      name: 'list_emr_steps_missing_cluster_id',
      toolName: TOOL,
      inputParams: { operation: 'list-steps', max_results: 10 },
      validators: [containsText('Field required')],
    },
    {
      name: 'cancel_emr_step',
      toolName: TOOL,
      inputParams: { operation: 'cancel-steps', cluster_id: CLUSTER_ID, step_ids: [STEP_ID] },
      dependencies: ['create_emr_cluster_basic', 'add_step_to_emr_cluster', 'describe_emr_step', 'list_emr_steps'],
      validators: [containsText('Successfully initiated cancellation for 1 steps')],
    },
    {
      name: 'cancel_emr_step_missing_ids',
      toolName: TOOL,
      inputParams: { operation: 'cancel-steps' },
      validators: [containsText('Field required')],
    },
  ];
}
