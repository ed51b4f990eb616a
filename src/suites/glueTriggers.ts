import type { JsonObject, TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_triggers';
const TRIGGER = 'mcp_test_trigger';
const TRIGGER_WITHOUT_WORKFLOW = 'mcp_test_trigger_no_workflow';
const MISSING_TRIGGER = 'non_existent_trigger';
const JOB_ACTIONS: JsonObject[] = [{ JobName: 'mcp-test-job-basic', Arguments: { '--key1': 'value1' } }];

// Triggers start the basic job of the job catalog and join its workflow.
export function glueTriggerTestCases(ctx: SuiteContext): TestCase[] {
  const triggerState = (name: string, expectedKeys: string[]) =>
    awsState(ctx, { operation: 'get_trigger', operationParams: { Name: name }, expectedKeys });
  const deleteTrigger = (name: string) =>
    awsCleanup(ctx, { service: 'glue', operation: 'delete_trigger', params: { Name: name } });

  return [
    {
      name: 'create_glue_trigger_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-trigger',
        trigger_name: TRIGGER,
        trigger_definition: {
          Type: 'ON_DEMAND',
          Description: 'Test trigger created by MCP',
          Actions: JOB_ACTIONS,
          WorkflowName: 'mcp_test_workflow',
        },
      },
      dependencies: ['create_glue_job_basic', 'create_glue_workflow_basic'],
      validators: [containsText('Successfully created trigger'), triggerState(TRIGGER, ['Type', 'Description'])],
      cleanups: [deleteTrigger(TRIGGER)],
    },
    {
      name: 'create_glue_trigger_no_workflow',
      toolName: TOOL,
      inputParams: {
        operation: 'create-trigger',
        trigger_name: TRIGGER_WITHOUT_WORKFLOW,
        trigger_definition: { Type: 'ON_DEMAND', Description: 'Test trigger without workflow', Actions: JOB_ACTIONS },
      },
      dependencies: ['create_glue_job_basic'],
      validators: [
        containsText('Successfully created trigger'),
        triggerState(TRIGGER_WITHOUT_WORKFLOW, ['Type', 'Description']),
      ],
      cleanups: [deleteTrigger(TRIGGER_WITHOUT_WORKFLOW)],
    },
    {
      name: 'get_glue_trigger_basic',
      toolName: TOOL,
      inputParams: { operation: 'get-trigger', trigger_name: TRIGGER },
      dependencies: ['create_glue_trigger_basic'],
      validators: [containsText('Successfully retrieved trigger')],
    },
    {
      name: 'create_glue_trigger_missing_name',
      toolName: TOOL,
      inputParams: {
        operation: 'create-trigger',
        trigger_definition: { Type: 'ON_DEMAND', Description: 'Test trigger created by MCP' },
      },
      validators: [containsText('trigger_name and trigger_definition are required for create-trigger operation')],
    },
    {
      name: 'get_glue_trigger_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-trigger', trigger_name: MISSING_TRIGGER },
      validators: [containsText('not found')],
    },
    {
      name: 'start_glue_trigger_run',
      toolName: TOOL,
      inputParams: { operation: 'start-trigger', trigger_name: TRIGGER },
      dependencies: ['create_glue_trigger_basic'],
      validators: [containsText('Successfully started trigger'), triggerState(TRIGGER, [])],
    },
    {
      name: 'start_glue_trigger_run_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'start-trigger' },
      validators: [containsText('trigger_name is required for start-trigger operation')],
    },
    {
      name: 'stop_glue_trigger_run_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'stop-trigger', trigger_name: MISSING_TRIGGER },
      validators: [containsText('not found')],
    },
    {
      name: 'stop_glue_trigger_run_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'stop-trigger' },
      validators: [containsText('trigger_name is required for stop-trigger operation')],
    },
    {
      name: 'delete_glue_trigger',
      toolName: TOOL,
      inputParams: { operation: 'delete-trigger', trigger_name: TRIGGER_WITHOUT_WORKFLOW },
      dependencies: ['create_glue_trigger_no_workflow'],
      validators: [
        containsText('Successfully deleted trigger'),
        awsState(ctx, {
          operation: 'get_trigger',
          operationParams: { Name: TRIGGER_WITHOUT_WORKFLOW },
          validateAbsence: true,
        }),
      ],
    },
    {
      name: 'delete_glue_trigger_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-trigger', trigger_name: MISSING_TRIGGER },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_glue_trigger_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'delete-trigger' },
      validators: [containsText('trigger_name is required for delete-trigger operation')],
    },
  ];
}
