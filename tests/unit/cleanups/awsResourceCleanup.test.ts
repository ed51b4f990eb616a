/**
 * Unit tests for cleanups/awsResourceCleanup.ts
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  BatchStopJobRunCommand,
  DeleteJobCommand,
  DeleteSessionCommand,
  GetJobRunCommand,
  GetSessionCommand,
  GlueClient,
  PutDataCatalogEncryptionSettingsCommand,
} from '@aws-sdk/client-glue';
import { EMRClient, TerminateJobFlowsCommand } from '@aws-sdk/client-emr';
import { AthenaClient, DeleteNamedQueryCommand } from '@aws-sdk/client-athena';

vi.mock('@shared/utils/logger', () => ({
  setupLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { createAwsClients, type AwsClients } from '@/aws/clients';
import { AwsResourceCleanup, CallbackCleanup, toAwsKeys } from '@/cleanups/awsResourceCleanup';
import { jsonResponse, textResponse } from '../../helpers/fixtures';

const glueMock = mockClient(GlueClient);
const emrMock = mockClient(EMRClient);
const athenaMock = mockClient(AthenaClient);

const NO_WAIT = { pollIntervalMs: 0, sessionSettleMs: 0, jobRunSettleMs: 0 };

describe('AwsResourceCleanup', () => {
  let clients: AwsClients;

  beforeEach(() => {
    glueMock.reset();
    emrMock.reset();
    athenaMock.reset();
    clients = createAwsClients({ region: 'us-east-1' });
  });

  it('should convert snake_case params and call the delete operation', async () => {
    glueMock.on(DeleteJobCommand).resolves({ JobName: 'test-job' });

    await new AwsResourceCleanup(clients, {
      service: 'glue',
      operation: 'delete_job',
      params: { job_name: 'test-job' },
    }).cleanUp({}, undefined);

    expect(glueMock.commandCalls(DeleteJobCommand)[0]?.args[0].input).toEqual({ JobName: 'test-job' });
  });

  it('should take the resource id from the tool response as a list', async () => {
    emrMock.on(TerminateJobFlowsCommand).resolves({});

    await new AwsResourceCleanup(clients, {
      service: 'emr',
      operation: 'terminate_job_flows',
      resourceField: 'cluster_id',
      targetParamKey: 'JobFlowIds',
      paramIsList: true,
    }).cleanUp({}, jsonResponse({ cluster_id: 'j-123' }));

    expect(emrMock.commandCalls(TerminateJobFlowsCommand)[0]?.args[0].input).toEqual({
      JobFlowIds: ['j-123'],
    });
  });

  it('should take the resource id from the tool response as a scalar', async () => {
    athenaMock.on(DeleteNamedQueryCommand).resolves({});

    await new AwsResourceCleanup(clients, {
      service: 'athena',
      operation: 'delete_named_query',
      resourceField: 'named_query_id',
      targetParamKey: 'NamedQueryId',
    }).cleanUp({}, jsonResponse({ named_query_id: 'nq-1' }));

    expect(athenaMock.commandCalls(DeleteNamedQueryCommand)[0]?.args[0].input).toEqual({
      NamedQueryId: 'nq-1',
    });
  });

  it('should not throw when the id cannot be extracted', async () => {
    const cleanup = new AwsResourceCleanup(clients, {
      service: 'athena',
      operation: 'delete_named_query',
      resourceField: 'named_query_id',
      targetParamKey: 'NamedQueryId',
    });

    await expect(cleanup.cleanUp({}, textResponse('Query not created'))).resolves.toBeUndefined();
    expect(athenaMock.commandCalls(DeleteNamedQueryCommand)).toHaveLength(0);
  });

  it('should not throw when the delete call fails', async () => {
    glueMock.on(DeleteJobCommand).rejects(new Error('access denied'));

    await expect(
      new AwsResourceCleanup(clients, {
        service: 'glue',
        operation: 'delete_job',
        params: { JobName: 'test-job' },
      }).cleanUp({}, undefined)
    ).resolves.toBeUndefined();
  });

  it('should ignore unsupported operations', async () => {
    await new AwsResourceCleanup(clients, { service: 's3', operation: 'delete_bucket' }).cleanUp(
      {},
      undefined
    );

    expect(glueMock.calls()).toHaveLength(0);
  });

  it('should wait for a session to become deletable', async () => {
    glueMock
      .on(GetSessionCommand)
      .resolvesOnce({ Session: { Id: 'test-session', Status: 'PROVISIONING' } })
      .resolves({ Session: { Id: 'test-session', Status: 'READY' } });
    glueMock.on(DeleteSessionCommand).resolves({ Id: 'test-session' });

    await new AwsResourceCleanup(clients, {
      service: 'glue',
      operation: 'delete_session',
      params: { Id: 'test-session' },
      timing: NO_WAIT,
    }).cleanUp({}, undefined);

    expect(glueMock.commandCalls(GetSessionCommand)).toHaveLength(2);
    expect(glueMock.commandCalls(DeleteSessionCommand)[0]?.args[0].input).toEqual({ Id: 'test-session' });
  });

  it('should give up polling after the configured attempts', async () => {
    glueMock.on(GetSessionCommand).resolves({ Session: { Id: 'test-session', Status: 'PROVISIONING' } });
    glueMock.on(DeleteSessionCommand).resolves({});

    await new AwsResourceCleanup(clients, {
      service: 'glue',
      operation: 'delete_session',
      params: { Id: 'test-session' },
      timing: { ...NO_WAIT, maxPollAttempts: 3 },
    }).cleanUp({}, undefined);

    expect(glueMock.commandCalls(GetSessionCommand)).toHaveLength(3);
    expect(glueMock.commandCalls(DeleteSessionCommand)).toHaveLength(1);
  });

  it('should wait for stopped job runs to reach a final state', async () => {
    glueMock.on(BatchStopJobRunCommand).resolves({ SuccessfulSubmissions: [] });
    glueMock
      .on(GetJobRunCommand)
      .resolvesOnce({ JobRun: { Id: 'jr_1', JobRunState: 'STOPPING' } })
      .resolves({ JobRun: { Id: 'jr_1', JobRunState: 'STOPPED' } });

    await new AwsResourceCleanup(clients, {
      service: 'glue',
      operation: 'batch_stop_job_run',
      params: { job_name: 'test-job' },
      resourceField: 'job_run_id',
      targetParamKey: 'JobRunIds',
      paramIsList: true,
      timing: NO_WAIT,
    }).cleanUp({}, jsonResponse({ job_run_id: 'jr_1' }));

    expect(glueMock.commandCalls(BatchStopJobRunCommand)[0]?.args[0].input).toEqual({
      JobName: 'test-job',
      JobRunIds: ['jr_1'],
    });
    expect(glueMock.commandCalls(GetJobRunCommand)).toHaveLength(2);
    expect(glueMock.commandCalls(GetJobRunCommand)[0]?.args[0].input).toEqual({
      JobName: 'test-job',
      RunId: 'jr_1',
    });
  });

  it('should reset catalog encryption settings to disabled', async () => {
    glueMock.on(PutDataCatalogEncryptionSettingsCommand).resolves({});

    await new AwsResourceCleanup(clients, {
      service: 'glue',
      operation: 'delete_data_catalog_encryption_settings',
    }).cleanUp({}, undefined);

    expect(glueMock.commandCalls(PutDataCatalogEncryptionSettingsCommand)[0]?.args[0].input).toEqual({
      DataCatalogEncryptionSettings: {
        EncryptionAtRest: { CatalogEncryptionMode: 'DISABLED' },
        ConnectionPasswordEncryption: { ReturnConnectionPasswordEncrypted: false },
      },
    });
  });

  it('should be named after service and operation', () => {
    expect(new AwsResourceCleanup(clients, { service: 'glue', operation: 'delete_job' }).name).toBe(
      'glue:delete_job'
    );
  });
});

describe('CallbackCleanup', () => {
  it('should pass params and response to the callback', async () => {
    const callback = vi.fn(async () => undefined);
    const response = textResponse('done');

    await new CallbackCleanup('callback', callback).cleanUp({ id: 'x' }, response);

    expect(callback).toHaveBeenCalledWith({ id: 'x' }, response);
  });

  it('should swallow callback errors', async () => {
    const cleanup = new CallbackCleanup('broken', async () => {
      throw new Error('nope');
    });

    await expect(cleanup.cleanUp({}, undefined)).resolves.toBeUndefined();
  });
});

describe('toAwsKeys', () => {
  it('should convert only lower snake_case keys', () => {
    expect(toAwsKeys({ database_name: 'db', Name: 'n', Id: 'x', mixed_Case: 'm', plain: 1 })).toEqual({
      DatabaseName: 'db',
      Name: 'n',
      Id: 'x',
      mixed_Case: 'm',
      plain: 1,
    });
  });
});
