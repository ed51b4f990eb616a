import type { TestCase } from '@shared/types';
import { awsCleanup, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_catalog';
const CATALOG = 'mcp-test-catalog';

export function glueCatalogTestCases(ctx: SuiteContext): TestCase[] {
  return [
    {
      name: 'create_glue_catalog_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-catalog',
        catalog_id: CATALOG,
        catalog_input: {
          Description: 'Test catalog created by MCP',
          Parameters: { env: 'test', team: 'dataprocessing' },
        },
      },
      validators: [containsText('Successfully created catalog')],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_catalog', params: { CatalogId: CATALOG } })],
    },
    {
      name: 'list_glue_catalogs',
      toolName: TOOL,
      inputParams: { operation: 'list-catalogs', max_results: 10 },
      validators: [containsText('Successfully listed')],
    },
  ];
}
