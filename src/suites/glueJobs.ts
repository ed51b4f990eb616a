import { createNonMcpJob, uploadScript } from '@/aws/setup';
import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, outputOf, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_jobs';
const BASIC_JOB = 'mcp-test-job-basic';
const WORKER_JOB = 'mcp-test-job-with-worker-config';
const NON_MCP_JOB = 'non-mcp-test-job';
const MISSING_JOB = 'job-name-does-not-exist';

export function glueJobTestCases(ctx: SuiteContext): TestCase[] {
  const scriptLocation = `s3://${ctx.bucket}/glue_job_script/mcp-test-script.py`;
  const uploadJobScript = () => uploadScript(ctx.clients, 'mcp-test-script.py', ctx.bucket, 'glue_job_script/');
  const createUnmanagedJob = () => createNonMcpJob(ctx.clients, NON_MCP_JOB);

  return [
    {
      name: 'create_glue_job_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-job',
        job_name: BASIC_JOB,
        job_definition: {
          Command: { Name: 'glueetl', ScriptLocation: scriptLocation },
          Role: ctx.glueRoleArn,
          GlueVersion: '5.0',
          MaxCapacity: 2,
          Description: 'Basic test job created by MCP server',
        },
      },
      setup: [uploadJobScript],
      validators: [
        containsText('Successfully created Glue job'),
        awsState(ctx, {
          operation: 'get_job',
          operationParams: { job_name: BASIC_JOB },
          expectedKeys: [
            'job_definition.Command.Name',
            'job_definition.Command.ScriptLocation',
            'job_definition.Role',
            'job_definition.GlueVersion',
            'job_definition.MaxCapacity',
          ],
        }),
      ],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_job', params: { job_name: BASIC_JOB } })],
    },
    {
      name: 'create_glue_job_with_worker_config',
      toolName: TOOL,
      inputParams: {
        operation: 'create-job',
        job_name: WORKER_JOB,
        job_definition: {
          Command: { Name: 'glueetl', ScriptLocation: scriptLocation },
          Role: ctx.glueRoleArn,
          GlueVersion: '5.0',
          WorkerType: 'G.1X',
          NumberOfWorkers: 2,
          Description: 'Test job with worker config created by MCP server',
        },
      },
      setup: [uploadJobScript],
      validators: [
        containsText('Successfully created Glue job'),
        awsState(ctx, {
          operation: 'get_job',
          operationParams: { job_name: WORKER_JOB },
          expectedKeys: ['job_definition.WorkerType', 'job_definition.NumberOfWorkers'],
        }),
      ],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_job', params: { job_name: WORKER_JOB } })],
    },
    {
      name: 'update_glue_job_definition',
      toolName: TOOL,
      inputParams: {
        operation: 'update-job',
        job_name: BASIC_JOB,
        job_definition: {
          Command: { Name: 'glueetl', ScriptLocation: scriptLocation },
          Role: ctx.glueRoleArn,
          GlueVersion: '5.0',
          WorkerType: 'G.1X',
          NumberOfWorkers: 4,
          Description: 'UPDATED: Basic test job created by MCP server',
        },
      },
      dependencies: ['create_glue_job_basic'],
      validators: [
        containsText('Successfully updated MCP-managed job'),
        awsState(ctx, {
          operation: 'get_job',
          operationParams: { job_name: BASIC_JOB },
          expectedKeys: ['job_definition.Description'],
        }),
      ],
    },
    {
      name: 'update_non_mcp_job',
      toolName: TOOL,
      inputParams: {
        operation: 'update-job',
        job_name: NON_MCP_JOB,
        job_definition: { Role: ctx.glueRoleArn, Description: 'UPDATED Should Fail' },
      },
      setup: [createUnmanagedJob],
      validators: [containsText('missing required tags')],
    },
    {
      name: 'delete_glue_job',
      toolName: TOOL,
      inputParams: { operation: 'delete-job', job_name: BASIC_JOB },
      // Runs after every other case that uses the basic job.
      dependencies: [
        'create_glue_job_basic',
        'update_glue_job_definition',
        'get_job_basic',
        'get_jobs_all',
        'get_job_runs_all',
        'get_job_run_not_exist',
        'stop_job_run_basic',
        'batch_stop_job_run',
      ],
      validators: [
        containsText('Successfully deleted MCP-managed Glue job'),
        awsState(ctx, { operation: 'get_job', operationParams: { job_name: BASIC_JOB }, validateAbsence: true }),
      ],
    },
    {
      name: 'delete_non_mcp_job',
      toolName: TOOL,
      inputParams: { operation: 'delete-job', job_name: NON_MCP_JOB },
      setup: [createUnmanagedJob],
      validators: [containsText('missing required tags')],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_job', params: { job_name: NON_MCP_JOB } })],
    },
    {
      name: 'delete_mcp_job_does_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-job', job_name: MISSING_JOB },
      validators: [containsText('not found')],
    },
    {
      name: 'get_job_basic',
      toolName: TOOL,
      inputParams: { operation: 'get-job', job_name: BASIC_JOB },
      dependencies: ['create_glue_job_basic'],
      validators: [containsText('Successfully retrieved job')],
    },
    {
      name: 'get_job_missing_job_name',
      toolName: TOOL,
      inputParams: { operation: 'get-job' },
      validators: [
        containsText(`Error executing tool ${TOOL}: job_name is required for get-job operation`),
      ],
    },
    {
      name: 'get_job_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-job', job_name: MISSING_JOB },
      validators: [containsText('not found')],
    },
    {
      name: 'get_jobs_all',
      toolName: TOOL,
      inputParams: { operation: 'get-jobs', max_results: 10 },
      dependencies: ['create_glue_job_basic', 'create_glue_job_with_worker_config'],
      validators: [containsText('Successfully retrieved jobs', { expectedCount: 2 })],
    },
    {
      name: 'start_job_run_basic',
      toolName: TOOL,
      inputParams: { operation: 'start-job-run', job_name: BASIC_JOB },
      dependencies: ['create_glue_job_basic'],
      validators: [containsText('Successfully started job run')],
      cleanups: [
        awsCleanup(ctx, {
          service: 'glue',
          operation: 'batch_stop_job_run',
          params: { JobName: BASIC_JOB },
          resourceField: 'job_run_id',
          targetParamKey: 'JobRunIds',
          paramIsList: true,
        }),
      ],
    },
    {
      name: 'start_job_run_missing_job_name',
      toolName: TOOL,
      inputParams: { operation: 'start-job-run' },
      validators: [containsText(`Error executing tool ${TOOL}: job_name is required`)],
    },
    {
      name: 'start_job_run_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'start-job-run', job_name: MISSING_JOB },
      validators: [containsText('not found')],
    },
    {
      name: 'get_job_run_missing_job_name',
      toolName: TOOL,
      inputParams: { operation: 'get-job-run', job_run_id: 'some-job-run-id' },
      validators: [
        containsText(
          `Error executing tool ${TOOL}: job_name and job_run_id are required for get-job-run operation`
        ),
      ],
    },
    {
      name: 'get_job_run_missing_job_run_id',
      toolName: TOOL,
      inputParams: { operation: 'get-job-run', job_name: BASIC_JOB },
      validators: [
        containsText(
          `Error executing tool ${TOOL}: job_name and job_run_id are required for get-job-run operation`
        ),
      ],
    },
    {
      name: 'get_job_runs_all',
      toolName: TOOL,
      inputParams: { operation: 'get-job-runs', job_name: BASIC_JOB },
      dependencies: ['start_job_run_basic'],
      validators: [containsText('Successfully retrieved job runs')],
    },
    {
      name: 'get_job_run_not_exist',
      toolName: TOOL,
      inputParams: {
        operation: 'get-job-run',
        job_name: BASIC_JOB,
        job_run_id: 'job-run-id-does-not-exist',
      },
      dependencies: ['create_glue_job_basic'],
      validators: [containsText('not found')],
    },
    {
      name: 'stop_job_run_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'stop-job-run',
        job_name: BASIC_JOB,
        job_run_id: outputOf('start_job_run_basic', 'job_run_id'),
      },
      dependencies: ['start_job_run_basic'],
      validators: [containsText('Successfully stopped job run')],
    },
    {
      name: 'stop_job_run_missing_job_name',
      toolName: TOOL,
      inputParams: { operation: 'stop-job-run', job_run_id: 'job-run-id-does-not-exist' },
      validators: [
        containsText(
          `Error executing tool ${TOOL}: job_name and job_run_id are required for stop-job-run operation`
        ),
      ],
    },
    {
      name: 'stop_job_run_missing_job_run_id',
      toolName: TOOL,
      inputParams: { operation: 'stop-job-run', job_name: BASIC_JOB },
      validators: [
        containsText(
          `Error executing tool ${TOOL}: job_name and job_run_id are required for stop-job-run operation`
        ),
      ],
    },
    {
      name: 'batch_stop_job_run',
      toolName: TOOL,
      inputParams: {
        operation: 'batch-stop-job-run',
        job_name: BASIC_JOB,
        job_run_ids: [outputOf('start_job_run_basic', 'job_run_id')],
      },
      dependencies: ['start_job_run_basic'],
      validators: [containsText('Successfully processed batch stop job run request')],
    },
  ];
}
