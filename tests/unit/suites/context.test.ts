import { describe, it, expect } from 'vitest';
import type { TestCase } from '@shared/types';
import { dependentCaseNames, outputOf, withDependencies } from '@/suites/context';

function testCase(name: string, dependencies?: string[]): TestCase {
  return { name, toolName: 'manage_aws_glue_databases', inputParams: { operation: 'get-database' }, dependencies };
}

describe('withDependencies', () => {
  it('should append dependencies to the named case only', () => {
    const cases = [testCase('create_database_basic'), testCase('delete_database_basic', ['create_database_basic'])];

    const result = withDependencies(cases, 'delete_database_basic', ['create_table_basic', 'list_tables_in_db']);

    expect(result.map((c) => c.dependencies)).toEqual([
      undefined,
      ['create_database_basic', 'create_table_basic', 'list_tables_in_db'],
    ]);
  });

  it('should not repeat a dependency the case already has', () => {
    const cases = [testCase('delete_glue_job', ['create_glue_job_basic'])];

    const result = withDependencies(cases, 'delete_glue_job', ['create_glue_job_basic', 'start_glue_trigger_run']);

    expect(result[0].dependencies).toEqual(['create_glue_job_basic', 'start_glue_trigger_run']);
  });

  it('should leave the given cases untouched', () => {
    const original = testCase('terminate_emr_cluster', ['create_emr_cluster_basic']);

    withDependencies([original], 'terminate_emr_cluster', ['cancel_emr_step']);

    expect(original.dependencies).toEqual(['create_emr_cluster_basic']);
  });

  it('should add dependencies to a case that had none', () => {
    const result = withDependencies([testCase('list_glue_catalogs')], 'list_glue_catalogs', ['create_glue_catalog_basic']);

    expect(result[0].dependencies).toEqual(['create_glue_catalog_basic']);
  });
});

describe('dependentCaseNames', () => {
  it('should list only cases with dependencies', () => {
    const cases = [
      testCase('create_table_basic', ['create_database_basic']),
      testCase('get_table_not_exist'),
      testCase('create_table_missing_database', []),
      testCase('list_tables_in_db', ['create_table_basic']),
    ];

    expect(dependentCaseNames(cases)).toEqual(['create_table_basic', 'list_tables_in_db']);
  });
});

describe('outputOf', () => {
  it('should build a template on the first text content', () => {
    expect(outputOf('add_step_to_emr_cluster', 'step_ids[0]')).toBe(
      '{{add_step_to_emr_cluster.result.content[0].text.step_ids[0]}}'
    );
  });
});
