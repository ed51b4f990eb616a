/**
 * Lookup tables tying server tool parameters to AWS API operations.
 */

/**
 * snake_case tool parameter names to the AWS API field they correspond to.
 */
export const PARAMETER_MAPPING: Readonly<Record<string, string>> = {
  job_name: 'JobName',
  database_name: 'DatabaseName',
  job_definition: 'JobDefinition',
  table_name: 'Name',
  cluster_id: 'ClusterId',
  step_id: 'StepId',
  policy_name: 'PolicyName',
  location_uri: 'LocationUri',
  role_name: 'RoleName',
  release_label: 'ReleaseLabel',
  step_concurrency_level: 'StepConcurrencyLevel',
  termination_protected: 'TerminationProtected',
  encryption_at_rest: 'EncryptionAtRest',
  code_content: 'Body',
  crawler_name: 'Name',
  trigger_name: 'Name',
  session_id: 'Id',
  description: 'Description',
  command: 'Command',
  classifier_name: 'Name',
  profile_name: 'Name',
  configuration: 'Configuration',
  workflow_name: 'Name',
  config_name: 'Name',
};

export interface ArnSpec {
  resourceType: string;
  /** Tool parameter names joined with "/" to form the resource id */
  paramKeys: string[];
}

/**
 * How to build the ARN of the resource a read operation returns, for tag lookups.
 */
export const OPERATION_ARN_MAP: Readonly<Record<string, ArnSpec>> = {
  get_job: { resourceType: 'job', paramKeys: ['job_name'] },
  get_database: { resourceType: 'database', paramKeys: ['database_name'] },
  get_table: { resourceType: 'table', paramKeys: ['database_name', 'table_name'] },
  get_connection: { resourceType: 'connection', paramKeys: ['connection_name'] },
  get_work_group: { resourceType: 'workgroup', paramKeys: ['name'] },
  get_data_catalog: { resourceType: 'datacatalog', paramKeys: ['name'] },
  get_partition: {
    resourceType: 'partition',
    paramKeys: ['database_name', 'table_name', 'partition_values'],
  },
  get_session: { resourceType: 'session', paramKeys: ['session_id'] },
  get_crawler: { resourceType: 'crawler', paramKeys: ['crawler_name'] },
  get_trigger: { resourceType: 'trigger', paramKeys: ['trigger_name'] },
  get_workflow: { resourceType: 'workflow', paramKeys: ['workflow_name'] },
  get_classifier: { resourceType: 'classifier', paramKeys: ['classifier_name'] },
  get_usage_profile: { resourceType: 'usage-profile', paramKeys: ['profile_name'] },
};

export interface PrefixSpec {
  /** Tool parameter holding the expected values; empty for the parameter root */
  input: string;
  /** Response field holding the actual values; empty for the response root */
  response: string;
}

/**
 * Where expected and actual values live for an operation.
 */
export const OPERATION_PREFIX_MAP: Readonly<Record<string, PrefixSpec>> = {
  get_job: { input: 'job_definition', response: 'Job' },
  get_database: { input: '', response: 'Database' },
  get_table: { input: 'table_input', response: 'Table' },
  list_role_policies: { input: '', response: '' },
  get_role: { input: '', response: 'Role' },
  describe_cluster: { input: '', response: 'Cluster' },
  get_data_catalog_encryption_settings: { input: '', response: 'DataCatalogEncryptionSettings' },
  get_object: { input: '', response: '' },
  get_crawler: { input: 'crawler_definition', response: 'Crawler' },
  get_data_catalog: { input: '', response: 'DataCatalog' },
  get_work_group: { input: '', response: 'WorkGroup' },
  get_session: { input: '', response: 'Session' },
  get_classifier: { input: 'classifier_definition', response: 'Classifier' },
  get_usage_profile: { input: '', response: 'UsageProfile' },
  get_connection: { input: 'connection_input', response: 'Connection' },
  get_partition: { input: 'partition_input', response: 'Partition' },
  get_trigger: { input: 'trigger_definition', response: 'Trigger' },
  get_workflow: { input: 'workflow_definition', response: 'Workflow' },
  get_workflow_run: { input: '', response: 'Run' },
  get_security_configuration: { input: '', response: 'SecurityConfiguration' },
};

/**
 * Operations whose resources carry no managed-resource tags worth checking.
 */
export const SKIP_TAG_CHECK_OPERATIONS: ReadonlySet<string> = new Set([
  'describe_step',
  'describe_security_configuration',
  'list_role_policies',
  'get_role',
  'get_partition',
  'list_instance_groups',
  'list_instance_fleets',
  'get_data_catalog_encryption_settings',
  'get_object',
  'get_workflow_run',
  'get_classifier',
  'get_usage_profile',
  'get_security_configuration',
]);

/**
 * Tags the server puts on every resource it creates.
 */
export const REQUIRED_TAGS = ['CreatedAt', 'ManagedBy', 'ResourceType'] as const;
export const MANAGED_BY_VALUE = 'DataprocessingMcpServer';

/**
 * Error codes that mean "the resource does not exist".
 */
export const NOT_FOUND_ERROR_CODES: ReadonlySet<string> = new Set([
  'EntityNotFoundException',
  'InvalidRequestException',
  'ResourceNotFoundException',
  'NoSuchEntity',
  'NotFound',
  'NoSuchKey',
]);

/**
 * Rename known snake_case keys to their AWS field names; other keys are kept.
 */
export function normalizeParams(params: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    normalized[PARAMETER_MAPPING[key] ?? key] = value;
  }
  return normalized;
}

/**
 * `database_name` -> `DatabaseName`. Keys without underscores only get their
 * first letter raised.
 */
export function snakeToPascal(key: string): string {
  return key
    .split('_')
    .map((part) => (part ? part.charAt(0).toUpperCase() + part.slice(1) : part))
    .join('');
}

/**
 * Read a parameter as a non-empty string.
 *
 * @throws {Error} When it is absent or not a string
 */
export function requireString(params: Record<string, unknown>, key: string): string {
  const value = params[key];
  if (typeof value !== 'string' || value === '') {
    throw new Error(`Missing required parameter '${key}'`);
  }
  return value;
}

export function optionalString(params: Record<string, unknown>, key: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' ? value : undefined;
}

export function optionalBoolean(params: Record<string, unknown>, key: string): boolean | undefined {
  const value = params[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Read a parameter as a list of strings. A single string is taken as a
 * one-element list.
 */
export function requireStringList(params: Record<string, unknown>, key: string): string[] {
  const value = params[key];
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw new Error(`Missing required parameter '${key}'`);
}
