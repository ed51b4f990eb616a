/**
 * Live-state validator that checks a resource directly through the AWS API.
 */

import type { JsonObject, JsonValue, LiveStateValidator, ResponseMap, ValidationResult } from '@shared/types';
import { isRecord } from '@shared/utils/json';
import { setupLogger } from '@shared/utils/logger';
import { leadingReference, parseReference, resolveReference } from '@core/parameterResolver';
import { getAccountId, isAwsServiceError, type AwsClients } from '@/aws/clients';
import {
  MANAGED_BY_VALUE,
  NOT_FOUND_ERROR_CODES,
  OPERATION_ARN_MAP,
  OPERATION_PREFIX_MAP,
  PARAMETER_MAPPING,
  REQUIRED_TAGS,
  SKIP_TAG_CHECK_OPERATIONS,
  normalizeParams,
} from '@/aws/parameters';
import { fetchTags, STATE_OPERATIONS, type AwsService } from '@/aws/stateOperations';

const logger = setupLogger('dataprocessing-tests:validator.aws-state');

export interface AwsStateValidatorOptions {
  /** Read operation to call, e.g. `get_job` or `describe_cluster` */
  operation: string;
  /** Operation parameters; known snake_case names are renamed to AWS field names */
  operationParams?: JsonObject;
  /** Keys compared between the tool input and the AWS response */
  expectedKeys?: string[];
  /** Expect the resource to be gone */
  validateAbsence?: boolean;
  /** Operation parameters taken from earlier responses, as `{{test.path}}` */
  injectableParams?: Record<string, string>;
}

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/_/g, '');
}

/**
 * Follow a dot-separated key path. Keys match exactly first, then ignoring
 * case and underscores.
 */
export function getNestedValue(data: unknown, keyPath: string): unknown {
  let current = data;
  for (const key of keyPath.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    if (Object.prototype.hasOwnProperty.call(current, key)) {
      current = current[key];
      continue;
    }
    const match = Object.keys(current).find((k) => normalizeKey(k) === normalizeKey(key));
    if (match === undefined) {
      return undefined;
    }
    current = current[match];
  }
  return current;
}

/**
 * Structural equality where object keys compare like {@link getNestedValue}
 * matches them, and null equals undefined.
 */
export function valuesMatch(expected: unknown, actual: unknown): boolean {
  if (expected === null || expected === undefined || actual === null || actual === undefined) {
    return (expected ?? undefined) === (actual ?? undefined);
  }
  if (Array.isArray(expected) || Array.isArray(actual)) {
    return (
      Array.isArray(expected) &&
      Array.isArray(actual) &&
      expected.length === actual.length &&
      expected.every((item, i) => valuesMatch(item, actual[i]))
    );
  }
  if (isRecord(expected) && isRecord(actual)) {
    const expectedKeys = Object.keys(expected);
    if (expectedKeys.length !== Object.keys(actual).length) {
      return false;
    }
    return expectedKeys.every((key) => valuesMatch(expected[key], getNestedValue(actual, key)));
  }
  return expected === actual;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function tagListToRecord(tags: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (!Array.isArray(tags)) return record;

  for (const tag of tags) {
    if (isRecord(tag) && typeof tag.Key === 'string') {
      record[tag.Key] = typeof tag.Value === 'string' ? tag.Value : '';
    }
  }
  return record;
}

export class AwsStateValidator implements LiveStateValidator {
  readonly kind = 'live-state' as const;
  readonly name: string;

  private readonly operation: string;
  private readonly operationParams: Record<string, unknown>;
  private readonly expectedKeys: string[];
  private readonly validateAbsence: boolean;
  private readonly injectableParams: Record<string, string>;

  constructor(
    private readonly clients: AwsClients,
    options: AwsStateValidatorOptions
  ) {
    this.operation = options.operation;
    this.operationParams = normalizeParams(options.operationParams ?? {});
    this.expectedKeys = options.expectedKeys ?? [];
    this.validateAbsence = options.validateAbsence ?? false;
    this.injectableParams = options.injectableParams ?? {};
    this.name = `aws-state:${options.operation}`;
  }

  /**
   * Query the resource and compare it with the tool input.
   *
   * @param toolParams - Resolved parameters the tool was called with
   * @param responses - Responses captured so far, for injectable params
   */
  async validate(toolParams: JsonObject, responses: ResponseMap): Promise<ValidationResult> {
    const stateOperation = STATE_OPERATIONS[this.operation];
    if (stateOperation === undefined) {
      return { success: false, message: `Operation '${this.operation}' not found in AWS client` };
    }

    const params = { ...this.operationParams };
    for (const [key, template] of Object.entries(this.injectableParams)) {
      const reference = leadingReference(template);
      if (reference === null) continue;

      const { dependency } = parseReference(reference);
      if (!responses.has(dependency)) {
        return { success: false, message: `Missing response for dependency: ${dependency}` };
      }
      try {
        const value = resolveReference(reference, responses);
        delete params[key];
        params[PARAMETER_MAPPING[key] ?? key] = value;
      } catch (error) {
        return { success: false, message: `Failed to inject param '${key}': ${errorMessage(error)}` };
      }
    }

    logger.debug({ operation: this.operation, params }, 'Querying AWS state');

    let response: object;
    try {
      response = await stateOperation.query(this.clients, params);
    } catch (error) {
      if (!isAwsServiceError(error)) {
        throw error;
      }
      if (this.validateAbsence && NOT_FOUND_ERROR_CODES.has(error.name)) {
        return { success: true, message: `Resource correctly not found: ${error.name}` };
      }
      return {
        success: false,
        message: `ClientError during validation: ${error.name} - ${error.message}`,
      };
    }

    if (this.validateAbsence) {
      if (this.operation === 'get_trigger' && getNestedValue(response, 'Trigger.State') === 'DELETING') {
        return { success: true, message: 'Trigger is in DELETING state, considered as deleted' };
      }
      return { success: false, message: 'Expected resource to NOT exist, but it does' };
    }

    const mismatches = this.compareExpectedKeys(toolParams, response);

    if (SKIP_TAG_CHECK_OPERATIONS.has(this.operation)) {
      logger.debug({ operation: this.operation }, 'Skipping tag validation');
    } else {
      const tags = await this.collectTags(stateOperation.service, toolParams, response);
      mismatches.push(...this.checkTags(tags));
    }

    if (mismatches.length > 0) {
      return { success: false, message: `Validation failed: ${mismatches.join('; ')}` };
    }
    return { success: true, message: `Validation successful for operation '${this.operation}'` };
  }

  private compareExpectedKeys(toolParams: JsonObject, response: object): string[] {
    const prefix = OPERATION_PREFIX_MAP[this.operation];
    const inputRoot: unknown = prefix?.input ? getNestedValue(toolParams, prefix.input) : toolParams;
    const responseRoot: unknown = prefix?.response
      ? getNestedValue(response, prefix.response)
      : response;

    const mismatches: string[] = [];
    for (const keyPath of this.expectedKeys) {
      const mappedKey = PARAMETER_MAPPING[keyPath] ?? keyPath;
      const expected = getNestedValue(inputRoot, mappedKey) ?? getNestedValue(inputRoot, keyPath);
      const actual = getNestedValue(responseRoot, keyPath) ?? getNestedValue(responseRoot, mappedKey);

      if (valuesMatch(expected, actual)) continue;

      if (Array.isArray(actual)) {
        if (!actual.some((item) => valuesMatch(expected, item))) {
          mismatches.push(
            `Expected '${formatValue(expected)}' in list at '${keyPath}', but got ${JSON.stringify(actual)}`
          );
        }
      } else {
        mismatches.push(
          `Mismatch for '${keyPath}': expected '${formatValue(expected)}', got '${formatValue(actual)}'`
        );
      }
    }
    return mismatches;
  }

  private async collectTags(
    service: AwsService,
    toolParams: JsonObject,
    response: object
  ): Promise<Record<string, string>> {
    if (this.operation === 'describe_cluster') {
      return tagListToRecord(getNestedValue(response, 'Cluster.Tags'));
    }

    try {
      const arn = await this.constructArn(service, toolParams);
      return await fetchTags(this.clients, service, arn, logger);
    } catch (error) {
      logger.warn({ operation: this.operation, error }, 'Failed to get tags');
      return {};
    }
  }

  private async constructArn(service: AwsService, toolParams: JsonObject): Promise<string> {
    const arnFormat = OPERATION_ARN_MAP[this.operation];
    if (arnFormat === undefined) {
      throw new Error(`Unsupported operation '${this.operation}' for ARN construction`);
    }

    const values = arnFormat.paramKeys.map((key) => {
      const value: JsonValue | undefined = toolParams[key];
      if (value === undefined || value === null) {
        throw new Error(`Missing resource identifier '${key}' for operation '${this.operation}'`);
      }
      return Array.isArray(value) ? value.map(formatValue).join('/') : formatValue(value);
    });

    const accountId = await getAccountId(this.clients);
    return `arn:aws:${service}:${this.clients.region}:${accountId}:${arnFormat.resourceType}/${values.join('/')}`;
  }

  private checkTags(tags: Record<string, string>): string[] {
    const mismatches: string[] = [];
    for (const tag of REQUIRED_TAGS) {
      if (tags[tag] === undefined) {
        mismatches.push(`Missing tag: ${tag}`);
      }
    }
    const managedBy = tags.ManagedBy;
    if (managedBy !== MANAGED_BY_VALUE) {
      mismatches.push(`ManagedBy should be '${MANAGED_BY_VALUE}', got '${String(managedBy)}'`);
    }
    return mismatches;
  }
}
