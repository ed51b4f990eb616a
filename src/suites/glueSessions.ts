import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_sessions';
const SESSION_ID = 'mcp_test_glue_session';
const MISSING_SESSION = 'non_existent_session';

export function glueSessionTestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'create_glue_session_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-session',
        session_id: SESSION_ID,
        description: 'Test session created by MCP',
        role: ctx.glueRoleArn,
        command: { Name: 'glueetl' },
      },
      validators: [
        containsText('Successfully created session'),
        awsState(ctx, {
          operation: 'get_session',
          operationParams: { session_id: SESSION_ID },
          expectedKeys: ['description', 'command'],
        }),
      ],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_session', params: { Id: SESSION_ID } })],
    },
    {
      name: 'get_glue_session_basic',
      toolName: TOOL,
      inputParams: { operation: 'get-session', session_id: SESSION_ID },
      dependencies: ['create_glue_session_basic'],
      validators: [containsText('Successfully retrieved session')],
    },
    {
      name: 'create_glue_session_missing_id',
      toolName: TOOL,
      inputParams: {
        operation: 'create-session',
        description: 'Test session created by MCP',
        role: ctx.glueRoleArn,
        command: { Name: 'glueetl' },
      },
      validators: [containsText('role and command are required for create-session operation')],
    },
    {
      name: 'create_glue_session_missing_role',
      toolName: TOOL,
      inputParams: {
        operation: 'create-session',
        session_id: SESSION_ID,
        description: 'Test session created by MCP',
        command: { Name: 'glueetl' },
      },
      validators: [containsText('role and command are required for create-session operation')],
    },
    {
      name: 'list_glue_sessions',
      toolName: TOOL,
      inputParams: { operation: 'list-sessions', max_results: 10 },
      validators: [containsText('Successfully listed sessions')],
    },
    {
      name: 'get_glue_session_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-session', session_id: MISSING_SESSION },
      validators: [containsText('not found')],
    },
    {
      name: 'stop_glue_session_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'stop-session', session_id: MISSING_SESSION },
      validators: [containsText('not found')],
    },
    {
      name: 'stop_glue_session_missing_id',
      toolName: TOOL,
      inputParams: { operation: 'stop-session' },
      validators: [containsText('session_id is required for stop-session operation')],
    },
    {
      name: 'delete_glue_session_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-session', session_id: MISSING_SESSION },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_glue_session_missing_id',
      toolName: TOOL,
      inputParams: { operation: 'delete-session' },
      validators: [containsText('session_id is required for delete-session operation')],
    },
  ];
}
