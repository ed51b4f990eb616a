/**
 * Cleanups that delete whatever a test case created.
 *
 * Cleanups are best effort: every failure is logged and the run goes on.
 */

import { GetJobRunCommand, GetSessionCommand } from '@aws-sdk/client-glue';
import { setTimeout } from 'timers/promises';
import type { CleanupAction, CleanupTiming, JsonObject, ToolResponse } from '@shared/types';
import { firstContentText, isRecord } from '@shared/utils/json';
import { setupLogger } from '@shared/utils/logger';
import type { AwsClients } from '@/aws/clients';
import { DELETE_OPERATIONS, type DeleteOperation } from '@/aws/deleteOperations';
import { snakeToPascal } from '@/aws/parameters';
import type { AwsService } from '@/aws/stateOperations';

const logger = setupLogger('dataprocessing-tests:cleanup');

export const DEFAULT_CLEANUP_TIMING: CleanupTiming = {
  pollIntervalMs: 1_000,
  maxPollAttempts: 60,
  sessionSettleMs: 5_000,
  jobRunSettleMs: 30_000,
};

const SESSION_DELETABLE_STATES = new Set(['READY', 'FAILED', 'TIMEOUT', 'STOPPED']);
const JOB_RUN_FINAL_STATES = new Set(['STOPPED', 'FAILED', 'SUCCEEDED', 'TIMEOUT']);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isSnakeCase(key: string): boolean {
  return key.includes('_') && key.toLowerCase() === key;
}

/**
 * Convert snake_case keys to the PascalCase the AWS API expects. Other keys
 * are kept as written.
 */
export function toAwsKeys(params: Record<string, unknown>): Record<string, unknown> {
  const converted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    converted[isSnakeCase(key) ? snakeToPascal(key) : key] = value;
  }
  return converted;
}

export interface AwsResourceCleanupOptions {
  service: AwsService;
  /** Delete or stop operation, e.g. `delete_job` or `terminate_job_flows` */
  operation: string;
  params?: JsonObject;
  /** Field of the tool's JSON output holding the resource id */
  resourceField?: string;
  /** Operation parameter that receives the extracted id */
  targetParamKey?: string;
  /** Pass the extracted id as a one-element list */
  paramIsList?: boolean;
  timing?: Partial<CleanupTiming>;
}

export class AwsResourceCleanup implements CleanupAction {
  readonly name: string;
  private readonly options: AwsResourceCleanupOptions;
  private readonly timing: CleanupTiming;

  constructor(
    private readonly clients: AwsClients,
    options: AwsResourceCleanupOptions
  ) {
    this.options = options;
    this.timing = { ...DEFAULT_CLEANUP_TIMING, ...options.timing };
    this.name = `${options.service}:${options.operation}`;
  }

  async cleanUp(_toolParams: JsonObject, response: ToolResponse | undefined): Promise<void> {
    const { service, operation } = this.options;
    const deleteOperation: DeleteOperation | undefined = DELETE_OPERATIONS[service][operation];
    if (deleteOperation === undefined) {
      logger.error({ service, operation }, 'AWS client does not support cleanup operation');
      return;
    }

    const params: Record<string, unknown> = { ...this.options.params };
    this.injectResourceId(params, response);
    const awsParams = toAwsKeys(params);

    try {
      if (operation === 'delete_session') {
        await this.waitForSession(awsParams.Id);
      }
      await deleteOperation(this.clients, awsParams);
      logger.info({ service, operation, params: awsParams }, 'Cleanup call succeeded');
    } catch (error) {
      logger.error({ service, operation, error: errorMessage(error) }, 'Failed to call cleanup operation');
      return;
    }

    if (operation === 'batch_stop_job_run') {
      await this.waitForJobRuns(awsParams.JobName, awsParams.JobRunIds);
    }
  }

  /**
   * Copy the resource id from the tool's JSON output into the params.
   * A missing id only produces a warning.
   */
  private injectResourceId(params: Record<string, unknown>, response: ToolResponse | undefined): void {
    const { resourceField, targetParamKey, paramIsList } = this.options;
    if (!resourceField || !targetParamKey) return;

    try {
      const text = firstContentText(response);
      if (text === undefined) {
        throw new Error('Response has no text content');
      }
      const parsed: unknown = JSON.parse(text);
      const resourceId = isRecord(parsed) ? parsed[resourceField] : undefined;
      if (resourceId === undefined || resourceId === null || resourceId === '') {
        throw new Error(`Cannot extract ${resourceField} from response`);
      }

      params[targetParamKey] = paramIsList ? [resourceId] : resourceId;
      logger.info({ resourceId, targetParamKey }, 'Parsed resource id for cleanup');
    } catch (error) {
      logger.warn({ resourceField, error: errorMessage(error) }, 'Failed to parse resource id');
    }
  }

  /**
   * Poll a Glue session until it can be deleted, then let it settle.
   */
  private async waitForSession(sessionId: unknown): Promise<void> {
    if (typeof sessionId !== 'string' || sessionId === '') return;

    for (let attempt = 0; attempt < this.timing.maxPollAttempts; attempt++) {
      try {
        const response = await this.clients.glue.send(new GetSessionCommand({ Id: sessionId }));
        const status = response.Session?.Status;
        if (status !== undefined && SESSION_DELETABLE_STATES.has(status)) {
          await setTimeout(this.timing.sessionSettleMs);
          return;
        }
      } catch (error) {
        logger.warn({ sessionId, error: errorMessage(error) }, 'Error checking session status');
        return;
      }
      await setTimeout(this.timing.pollIntervalMs);
    }

    logger.warn({ sessionId }, 'Timeout waiting for session to be deletable');
  }

  /**
   * Poll each stopped job run until it reaches a final state, then let the
   * job settle.
   */
  private async waitForJobRuns(jobName: unknown, runIds: unknown): Promise<void> {
    if (typeof jobName !== 'string' || !Array.isArray(runIds) || runIds.length === 0) return;

    for (const runId of runIds) {
      if (typeof runId !== 'string') continue;
      logger.info({ jobName, runId }, 'Waiting for job run to stop');

      for (let attempt = 0; attempt < this.timing.maxPollAttempts; attempt++) {
        try {
          const response = await this.clients.glue.send(
            new GetJobRunCommand({ JobName: jobName, RunId: runId })
          );
          const state = response.JobRun?.JobRunState;
          if (state !== undefined && JOB_RUN_FINAL_STATES.has(state)) {
            logger.info({ runId, state }, 'Job run has stopped');
            break;
          }
        } catch (error) {
          logger.warn({ runId, error: errorMessage(error) }, 'Error while checking job run status');
          break;
        }
        await setTimeout(this.timing.pollIntervalMs);
      }
    }

    logger.info({ settleMs: this.timing.jobRunSettleMs }, 'Waiting for job run state transitions');
    await setTimeout(this.timing.jobRunSettleMs);
  }
}

/**
 * Cleanup around an arbitrary async function, with the same failure tolerance.
 */
export class CallbackCleanup implements CleanupAction {
  constructor(
    readonly name: string,
    private readonly callback: (toolParams: JsonObject, response: ToolResponse | undefined) => Promise<void>
  ) {}

  async cleanUp(toolParams: JsonObject, response: ToolResponse | undefined): Promise<void> {
    try {
      await this.callback(toolParams, response);
    } catch (error) {
      logger.error({ cleanup: this.name, error: errorMessage(error) }, 'Cleanup callback failed');
    }
  }
}
