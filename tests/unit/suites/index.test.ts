import { describe, it, expect, vi } from 'vitest';

vi.mock('@shared/utils/logger', () => ({
  setupLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { createAwsClients } from '@/aws/clients';
import { DEFAULT_CLEANUP_TIMING } from '@/cleanups/awsResourceCleanup';
import { DependencyGraph } from '@core/dependencyGraph';
import { loadTestCaseGroups, SUITE_NAMES, UnknownGroupError, type SuiteContext } from '@/suites';

const ctx: SuiteContext = {
  clients: createAwsClients({ region: 'us-east-1' }),
  bucket: 'dataprocessing-123456789012-us-east-1-integration-test',
  glueRoleArn: 'arn:aws:iam::123456789012:role/test-mcp-glue-role',
  timing: DEFAULT_CLEANUP_TIMING,
};

const groups = loadTestCaseGroups(ctx);

describe('loadTestCaseGroups', () => {
  it('should return every group in registry order', () => {
    expect(groups.map(([name]) => name)).toEqual([
      'glue_jobs',
      'glue_database_table',
      'glue_connections',
      'glue_catalogs',
      'glue_crawlers',
      'glue_encryption',
      'glue_sessions',
      'glue_classifiers',
      'glue_profiles',
      'glue_security_configurations',
      'iam',
      's3',
      'emr',
      'athena_query',
      'athena_data_catalog_db_table',
      'athena_workgroup',
    ]);
    expect(SUITE_NAMES).toEqual(groups.map(([name]) => name));
  });

  it('should keep registry order for a selection', () => {
    expect(loadTestCaseGroups(ctx, ['emr', 'glue_jobs', 's3']).map(([name]) => name)).toEqual([
      'glue_jobs',
      's3',
      'emr',
    ]);
  });

  it('should treat an empty selection as all groups', () => {
    expect(loadTestCaseGroups(ctx, [])).toHaveLength(16);
  });

  it('should reject unknown group names', () => {
    expect(() => loadTestCaseGroups(ctx, ['s3', 'redshift'])).toThrow(UnknownGroupError);
    expect(() => loadTestCaseGroups(ctx, ['redshift'])).toThrow(
      'Unknown test group(s): redshift. Available: glue_jobs, glue_database_table, glue_connections, glue_catalogs, ' +
        'glue_crawlers, glue_encryption, glue_sessions, glue_classifiers, glue_profiles, glue_security_configurations, ' +
        'iam, s3, emr, athena_query, athena_data_catalog_db_table, athena_workgroup'
    );
  });
});

describe.each(groups)('%s group', (_name, testCases) => {
  it('should have unique test names', () => {
    const names = testCases.map((testCase) => testCase.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('should form an acyclic graph with defined dependencies', () => {
    expect(() => new DependencyGraph(testCases)).not.toThrow();
  });

  it('should only template responses of declared dependencies', () => {
    for (const testCase of testCases) {
      const referenced = [...JSON.stringify(testCase.inputParams).matchAll(/\{\{(\w+)\./g)].map(
        (match) => match[1]
      );
      for (const dependency of referenced) {
        expect(testCase.dependencies ?? []).toContain(dependency);
      }
    }
  });
});

describe('catalog contents', () => {
  function find(group: string, name: string) {
    const testCases = groups.find(([groupName]) => groupName === group)?.[1] ?? [];
    return testCases.find((testCase) => testCase.name === name);
  }

  it('should template the job run id into stop_job_run_basic', () => {
    expect(find('glue_jobs', 'stop_job_run_basic')?.inputParams.job_run_id).toBe(
      '{{start_job_run_basic.result.content[0].text.job_run_id}}'
    );
  });

  it('should point job scripts at the context bucket', () => {
    expect(find('glue_jobs', 'create_glue_job_basic')?.inputParams.job_definition).toMatchObject({
      Command: {
        Name: 'glueetl',
        ScriptLocation: 's3://dataprocessing-123456789012-us-east-1-integration-test/glue_job_script/mcp-test-script.py',
      },
      Role: 'arn:aws:iam::123456789012:role/test-mcp-glue-role',
    });
  });

  function orderOf(group: string): readonly string[] {
    return new DependencyGraph(groups.find(([name]) => name === group)?.[1] ?? []).topologicalOrder();
  }

  it('should delete the basic database only after the cases that read it', () => {
    const order = orderOf('glue_database_table');

    expect(order.indexOf('delete_database_basic')).toBeGreaterThan(order.indexOf('get_databases_all'));
    expect(order.indexOf('delete_database_basic')).toBeGreaterThan(order.indexOf('update_database_description'));
  });

  it('should delete the basic database after the table and partition cases', () => {
    const order = orderOf('glue_database_table');

    expect(order.indexOf('delete_database_basic')).toBeGreaterThan(order.indexOf('list_tables_in_db'));
    expect(order.indexOf('delete_database_basic')).toBeGreaterThan(order.indexOf('search_table_for_databases'));
    expect(order.indexOf('delete_database_basic')).toBeGreaterThan(order.indexOf('delete_partition_basic'));
  });

  it('should leave negative table cases free of the database', () => {
    expect(find('glue_database_table', 'get_table_not_exist')?.dependencies).toBeUndefined();
    expect(find('glue_database_table', 'delete_database_basic')?.dependencies).not.toContain('get_table_not_exist');
  });

  it('should delete the basic job after the trigger and workflow cases', () => {
    const order = orderOf('glue_jobs');

    expect(order.indexOf('delete_glue_job')).toBeGreaterThan(order.indexOf('start_glue_trigger_run'));
    expect(order.indexOf('delete_glue_job')).toBeGreaterThan(order.indexOf('start_glue_workflow_run'));
    expect(order.indexOf('create_glue_trigger_basic')).toBeGreaterThan(order.indexOf('create_glue_workflow_basic'));
  });

  it('should terminate the basic cluster after the step and instance cases', () => {
    const order = orderOf('emr');

    expect(order.indexOf('terminate_emr_cluster')).toBeGreaterThan(order.indexOf('cancel_emr_step'));
    expect(order.indexOf('terminate_emr_cluster')).toBeGreaterThan(order.indexOf('list_instance_groups'));
  });

  it('should template the first step id into the step cases', () => {
    expect(find('emr', 'describe_emr_step')?.inputParams).toEqual({
      operation: 'describe-step',
      cluster_id: '{{create_emr_cluster_basic.result.content[0].text.cluster_id}}',
      step_id: '{{add_step_to_emr_cluster.result.content[0].text.step_ids[0]}}',
    });
  });

  it('should stop the workflow run it started', () => {
    expect(find('glue_jobs', 'start_glue_workflow_run')?.cleanups?.map((c) => c.name)).toEqual([
      'glue:stop_workflow_run',
    ]);
  });

  it('should keep workgroup cases out of the query group', () => {
    const queryNames = (groups.find(([name]) => name === 'athena_query')?.[1] ?? []).map((c) => c.name);

    expect(queryNames).not.toContain('create_athena_workgroup');
    expect(find('athena_workgroup', 'update_athena_workgroup_missing_name')?.inputParams.operation).toBe(
      'update-work-group'
    );
  });

  it('should attach cleanups to resource-creating cases', () => {
    expect(find('emr', 'create_emr_cluster_basic')?.cleanups?.map((c) => c.name)).toEqual([
      'emr:terminate_job_flows',
    ]);
    expect(find('s3', 'upload_file_to_s3')?.cleanups?.map((c) => c.name)).toEqual(['s3:delete_object']);
    expect(find('glue_catalogs', 'create_glue_catalog_basic')?.cleanups?.map((c) => c.name)).toEqual([
      'glue:delete_catalog',
    ]);
    expect(find('glue_database_table', 'create_partition_basic')?.cleanups?.map((c) => c.name)).toEqual([
      'glue:delete_partition',
    ]);
  });
});
