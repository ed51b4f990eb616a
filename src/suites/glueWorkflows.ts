import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, outputOf, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_workflows';
const WORKFLOW = 'mcp_test_workflow';
const MISSING_WORKFLOW = 'non_existent_workflow';

export function glueWorkflowTestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'create_glue_workflow_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-workflow',
        workflow_name: WORKFLOW,
        workflow_definition: {
          Description: 'Test workflow created by MCP',
          DefaultRunProperties: { env: 'test', team: 'dataprocessing' },
        },
      },
      validators: [
        containsText('Successfully created workflow'),
        awsState(ctx, {
          operation: 'get_workflow',
          operationParams: { Name: WORKFLOW },
          expectedKeys: ['Description', 'DefaultRunProperties'],
        }),
      ],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_workflow', params: { Name: WORKFLOW } })],
    },
    {
      name: 'get_glue_workflow_basic',
      toolName: TOOL,
      inputParams: { operation: 'get-workflow', workflow_name: WORKFLOW },
      dependencies: ['create_glue_workflow_basic'],
      validators: [containsText('Successfully retrieved workflow')],
    },
    {
      name: 'create_glue_workflow_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'create-workflow', workflow_definition: { Description: 'Test workflow created by MCP' } },
      validators: [containsText('workflow_name and workflow_definition are required for create-workflow operation')],
    },
    {
      name: 'list_glue_workflows',
      toolName: TOOL,
      inputParams: { operation: 'list-workflows', max_results: 10 },
      validators: [containsText('Successfully retrieved workflows')],
    },
    {
      name: 'get_glue_workflow_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-workflow', workflow_name: MISSING_WORKFLOW },
      validators: [containsText('not found')],
    },
    {
      name: 'start_glue_workflow_run',
      toolName: TOOL,
      inputParams: { operation: 'start-workflow-run', workflow_name: WORKFLOW },
      dependencies: ['create_glue_workflow_basic', 'create_glue_trigger_basic'],
      validators: [
        containsText('Successfully started workflow run'),
        awsState(ctx, {
          operation: 'get_workflow_run',
          operationParams: { Name: WORKFLOW },
          injectableParams: { RunId: outputOf('start_glue_workflow_run', 'run_id') },
          expectedKeys: ['workflow_name'],
        }),
      ],
      cleanups: [
        awsCleanup(ctx, {
          service: 'glue',
          operation: 'stop_workflow_run',
          params: { Name: WORKFLOW },
          resourceField: 'run_id',
          targetParamKey: 'RunId',
        }),
      ],
    },
    {
      name: 'start_glue_workflow_run_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'start-workflow-run' },
      validators: [containsText('workflow_name is required for start-workflow-run operation')],
    },
    {
      name: 'delete_glue_workflow',
      toolName: TOOL,
      inputParams: { operation: 'delete-workflow', workflow_name: WORKFLOW },
      dependencies: ['create_glue_workflow_basic', 'get_glue_workflow_basic', 'start_glue_workflow_run'],
      validators: [
        containsText('Successfully deleted workflow'),
        awsState(ctx, { operation: 'get_workflow', operationParams: { Name: WORKFLOW }, validateAbsence: true }),
      ],
    },
    {
      name: 'delete_glue_workflow_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-workflow', workflow_name: MISSING_WORKFLOW },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_glue_workflow_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'delete-workflow' },
      validators: [containsText('workflow_name is required for delete-workflow operation')],
    },
  ];
}
