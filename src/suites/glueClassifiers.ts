import type { TestCase } from '@shared/types';
import { awsCleanup, awsState, containsText, type SuiteContext } from './context';

const TOOL = 'manage_aws_glue_classifiers';
const CLASSIFIER = 'mcp_test_grok_classifier';
const MISSING_CLASSIFIER = 'non_existent_classifier';
const GROK_PATTERN = '%{COMBINEDAPACHELOG}';

export function glueClassifierTestCases(ctx: SuiteContext): TestCase[] {
  const classifierState = awsState(ctx, {
    operation: 'get_classifier',
    operationParams: { classifier_name: CLASSIFIER },
    expectedKeys: ['GrokClassifier.Name', 'GrokClassifier.GrokPattern', 'GrokClassifier.Classification'],
  });

  return [
    {
      name: 'create_glue_classifier_basic',
      toolName: TOOL,
      inputParams: {
        operation: 'create-classifier',
        classifier_name: 'mcp_test_classifier',
        classifier_definition: {
          GrokClassifier: { Name: CLASSIFIER, GrokPattern: GROK_PATTERN, Classification: 'apache_log' },
        },
      },
      validators: [containsText('Successfully created classifier'), classifierState],
      cleanups: [awsCleanup(ctx, { service: 'glue', operation: 'delete_classifier', params: { Name: CLASSIFIER } })],
    },
    {
      name: 'get_glue_classifier_basic',
      toolName: TOOL,
      inputParams: { operation: 'get-classifier', classifier_name: CLASSIFIER },
      dependencies: ['create_glue_classifier_basic'],
      validators: [containsText('Successfully retrieved classifier')],
    },
    {
      name: 'create_glue_classifier_missing_name',
      toolName: TOOL,
      inputParams: {
        operation: 'create-classifier',
        classifier_definition: { GrokClassifier: { GrokPattern: GROK_PATTERN, Classification: 'apache_log' } },
      },
      validators: [containsText('Missing required parameter')],
    },
    {
      name: 'get_glue_classifiers',
      toolName: TOOL,
      inputParams: { operation: 'get-classifiers', max_results: 10 },
      validators: [containsText('Successfully retrieved classifiers')],
    },
    {
      name: 'get_glue_classifier_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'get-classifier', classifier_name: MISSING_CLASSIFIER },
      validators: [containsText('not found')],
    },
    {
      name: 'update_glue_classifier',
      toolName: TOOL,
      inputParams: {
        operation: 'update-classifier',
        classifier_name: CLASSIFIER,
        classifier_definition: {
          GrokClassifier: { Name: CLASSIFIER, GrokPattern: GROK_PATTERN, Classification: 'apache_log_updated' },
        },
      },
      dependencies: ['create_glue_classifier_basic'],
      validators: [containsText('Successfully updated classifier'), classifierState],
    },
    {
      name: 'update_glue_classifier_missing_name',
      toolName: TOOL,
      inputParams: {
        operation: 'update-classifier',
        classifier_definition: { GrokClassifier: { GrokPattern: GROK_PATTERN, Classification: 'apache_log_updated' } },
      },
      validators: [containsText('Missing required parameter ')],
    },
    {
      name: 'delete_glue_classifier',
      toolName: TOOL,
      inputParams: { operation: 'delete-classifier', classifier_name: CLASSIFIER },
      dependencies: ['create_glue_classifier_basic', 'get_glue_classifier_basic', 'update_glue_classifier'],
      validators: [
        containsText('Successfully deleted classifier'),
        awsState(ctx, {
          operation: 'get_classifier',
          operationParams: { classifier_name: CLASSIFIER },
          validateAbsence: true,
        }),
      ],
    },
    {
      name: 'delete_glue_classifier_not_exist',
      toolName: TOOL,
      inputParams: { operation: 'delete-classifier', classifier_name: MISSING_CLASSIFIER },
      validators: [containsText('not found')],
    },
    {
      name: 'delete_glue_classifier_missing_name',
      toolName: TOOL,
      inputParams: { operation: 'delete-classifier' },
      validators: [containsText('classifier_name is required for delete-classifier operation')],
    },
  ];
}
