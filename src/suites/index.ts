/**
 * Registry of test-case groups. Each group runs with its own executor.
 */

import type { TestCase } from '@shared/types';
import { athenaDataCatalogTestCases } from './athenaDataCatalogs';
import { athenaDatabaseTableTestCases } from './athenaDatabaseTables';
import { athenaQueryTestCases } from './athenaQueries';
import { athenaWorkgroupTestCases } from './athenaWorkgroups';
import { dependentCaseNames, withDependencies, type SuiteBuilder, type SuiteContext } from './context';
import { emrClusterTestCases } from './emrClusters';
import { emrInstanceTestCases } from './emrInstances';
import { emrStepTestCases } from './emrSteps';
import { glueCatalogTestCases } from './glueCatalogs';
import { glueClassifierTestCases } from './glueClassifiers';
import { glueConnectionTestCases } from './glueConnections';
import { glueCrawlerTestCases } from './glueCrawlers';
import { glueDatabaseTestCases } from './glueDatabases';
import { glueEncryptionTestCases } from './glueEncryption';
import { glueJobTestCases } from './glueJobs';
import { gluePartitionTestCases } from './gluePartitions';
import { glueProfileTestCases } from './glueProfiles';
import { glueSecurityConfigurationTestCases } from './glueSecurityConfigurations';
import { glueSessionTestCases } from './glueSessions';
import { glueTableTestCases } from './glueTables';
import { glueTriggerTestCases } from './glueTriggers';
import { glueWorkflowTestCases } from './glueWorkflows';
import { iamTestCases } from './iam';
import { s3TestCases } from './s3';

export type { SuiteBuilder, SuiteContext } from './context';

/**
 * Catalogs that share a resource run as one group. The case removing the
 * shared resource waits for every dependent case of the other catalogs.
 */
function combined(owner: SuiteBuilder, removedBy: string, ...users: SuiteBuilder[]): SuiteBuilder {
  return (ctx) => {
    const userCases = users.flatMap((build) => build(ctx));
    return [...withDependencies(owner(ctx), removedBy, dependentCaseNames(userCases)), ...userCases];
  };
}

function concatenated(...builders: SuiteBuilder[]): SuiteBuilder {
  return (ctx) => builders.flatMap((build) => build(ctx));
}

export const SUITES: ReadonlyArray<readonly [string, SuiteBuilder]> = [
  ['glue_jobs', combined(glueJobTestCases, 'delete_glue_job', glueTriggerTestCases, glueWorkflowTestCases)],
  [
    'glue_database_table',
    combined(glueDatabaseTestCases, 'delete_database_basic', glueTableTestCases, gluePartitionTestCases),
  ],
  ['glue_connections', glueConnectionTestCases],
  ['glue_catalogs', glueCatalogTestCases],
  ['glue_crawlers', glueCrawlerTestCases],
  ['glue_encryption', glueEncryptionTestCases],
  ['glue_sessions', glueSessionTestCases],
  ['glue_classifiers', glueClassifierTestCases],
  ['glue_profiles', glueProfileTestCases],
  ['glue_security_configurations', glueSecurityConfigurationTestCases],
  ['iam', iamTestCases],
  ['s3', s3TestCases],
  ['emr', combined(emrClusterTestCases, 'terminate_emr_cluster', emrStepTestCases, emrInstanceTestCases)],
  ['athena_query', athenaQueryTestCases],
  ['athena_data_catalog_db_table', concatenated(athenaDataCatalogTestCases, athenaDatabaseTableTestCases)],
  ['athena_workgroup', athenaWorkgroupTestCases],
];

export const SUITE_NAMES: readonly string[] = SUITES.map(([name]) => name);

export class UnknownGroupError extends Error {
  constructor(readonly groups: string[]) {
    super(`Unknown test group(s): ${groups.join(', ')}. Available: ${SUITE_NAMES.join(', ')}`);
    this.name = 'UnknownGroupError';
  }
}

/**
 * Build the requested groups in registry order.
 *
 * @param only - Group names to keep; all groups when empty or omitted
 */
export function loadTestCaseGroups(
  ctx: SuiteContext,
  only?: readonly string[]
): Array<[string, TestCase[]]> {
  if (only && only.length > 0) {
    const unknown = only.filter((name) => !SUITE_NAMES.includes(name));
    if (unknown.length > 0) {
      throw new UnknownGroupError(unknown);
    }
  }

  const selected = only && only.length > 0 ? SUITES.filter(([name]) => only.includes(name)) : SUITES;
  return selected.map(([name, build]) => [name, build(ctx)]);
}
