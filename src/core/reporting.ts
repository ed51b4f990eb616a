/**
 * Report writer for execution results (Markdown, JSON, HTML).
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { ExecutionResult, ExecutionSummary, ReportFormat } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { summarize } from './executor';

const logger = setupLogger('dataprocessing-tests:reporting');

const EXTENSIONS: Record<ReportFormat, string> = {
  markdown: 'md',
  json: 'json',
  html: 'html',
};

export const DEPENDENCY_FAILURES = 'Dependency Failures';
export const VALIDATION_FAILURES = 'Validation Failures';

export interface ErrorGroupEntry {
  name: string;
  message: string;
}

const REPORT_FORMATS: readonly ReportFormat[] = ['markdown', 'json', 'html'];

function toReportFormat(format: string): ReportFormat | undefined {
  return REPORT_FORMATS.find((known) => known === format);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYYMMDD_HHMMSS` in local time, used in report file names.
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function displayTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function formatRate(summary: ExecutionSummary): string {
  return summary.successRate === null ? 'N/A' : `${summary.successRate.toFixed(1)}%`;
}

function formatSeconds(durationMs: number): string {
  return `${(durationMs / 1000).toFixed(2)}s`;
}

function statusLabel(result: ExecutionResult): 'PASS' | 'FAIL' | 'SKIP' {
  if (result.skipped) return 'SKIP';
  return result.success ? 'PASS' : 'FAIL';
}

/**
 * Category of an error message, by keyword.
 */
export function classifyError(message: string): string {
  const lower = message.toLowerCase();
  if (lower.includes('permission') || lower.includes('access denied')) return 'Permission Errors';
  if (lower.includes('not found') || lower.includes("doesn't exist")) return 'Resource Not Found Errors';
  if (lower.includes('timeout') || lower.includes('timed out')) return 'Timeout Errors';
  if (lower.includes('validation')) return 'Validation Errors';
  if (lower.includes('parameter')) return 'Parameter Errors';
  if (lower.includes('connection') || lower.includes('network')) return 'Connection Errors';

  const words = message.split(/\s+/).filter(Boolean);
  return words.length >= 2 ? `${words[0]} ${words[1]} Errors` : 'Other Errors';
}

/**
 * Short hint for common AWS failure messages.
 */
export function fixRecommendation(error: string): string | undefined {
  const lower = error.toLowerCase();

  if (lower.includes('access denied') || lower.includes('not authorized')) {
    return 'Check IAM permissions. The role may need additional permissions to access the requested resource.';
  }
  if (lower.includes('invalid parameter') || lower.includes('validation error')) {
    const param = /parameter ['"]?([a-z0-9_]+)['"]?/.exec(lower)?.[1];
    return param
      ? `Check the value provided for parameter '${param}'. It may be invalid or improperly formatted.`
      : 'Check input parameters. One or more parameters may be invalid.';
  }
  if (lower.includes('not found') || lower.includes("doesn't exist")) {
    const resource = /resource ['"]?([a-z0-9_]+)['"]?/.exec(lower)?.[1];
    return resource
      ? `The resource '${resource}' does not exist. Check if it was created properly or if the identifier is correct.`
      : 'The requested resource does not exist. Verify the resource identifier and ensure it was created correctly.';
  }
  if (lower.includes('invalid s3 uri')) {
    return "Check the S3 URI format. It should be in the format 's3://bucket-name/path/to/object'.";
  }
  return undefined;
}

/**
 * Failed and skipped cases grouped by kind: skips under
 * {@link DEPENDENCY_FAILURES}, errors by {@link classifyError}, and failed
 * validations without an error under {@link VALIDATION_FAILURES}.
 */
export function groupErrors(results: readonly ExecutionResult[]): Map<string, ErrorGroupEntry[]> {
  const groups = new Map<string, ErrorGroupEntry[]>();
  const add = (kind: string, entry: ErrorGroupEntry): void => {
    const entries = groups.get(kind) ?? [];
    entries.push(entry);
    groups.set(kind, entries);
  };

  for (const result of results) {
    if (result.success) continue;

    if (result.skipped) {
      add(DEPENDENCY_FAILURES, { name: result.name, message: result.validations[0]?.message ?? 'skipped' });
    } else if (result.error !== undefined) {
      add(classifyError(result.error), { name: result.name, message: result.error });
    } else {
      const failed = result.validations.find((v) => !v.success);
      add(VALIDATION_FAILURES, { name: result.name, message: failed?.message ?? 'validation failed' });
    }
  }
  return groups;
}

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export class ReportGenerator {
  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Write one report per requested format.
   *
   * @returns Written file path per format; unknown formats are skipped
   */
  async generateReport(
    results: readonly ExecutionResult[],
    formats: readonly string[] = ['markdown', 'json']
  ): Promise<Partial<Record<ReportFormat, string>>> {
    await mkdir(this.outputDir, { recursive: true });

    const generatedAt = this.now();
    const stamp = fileTimestamp(generatedAt);
    const paths: Partial<Record<ReportFormat, string>> = {};

    for (const requested of formats) {
      const format = toReportFormat(requested);
      if (format === undefined) {
        logger.warn({ format: requested }, 'Unsupported report format');
        continue;
      }

      const filePath = path.join(this.outputDir, `test_report_${stamp}.${EXTENSIONS[format]}`);
      await writeFile(filePath, this.render(format, results, generatedAt), 'utf-8');
      paths[format] = filePath;
      logger.info({ format, filePath }, 'Generated report');
    }

    return paths;
  }

  render(format: ReportFormat, results: readonly ExecutionResult[], generatedAt: Date): string {
    switch (format) {
      case 'markdown':
        return this.renderMarkdown(results, generatedAt);
      case 'json':
        return this.renderJson(results, generatedAt);
      case 'html':
        return this.renderHtml(results, generatedAt);
    }
  }

  private renderMarkdown(results: readonly ExecutionResult[], generatedAt: Date): string {
    const summary = summarize(results);
    const lines = [
      '# Test Execution Report',
      `Generated: ${displayTimestamp(generatedAt)}`,
      '',
      '## Summary',
      '',
      `- **Total Tests:** ${summary.total}`,
      `- **Passed:** ${summary.passed}`,
      `- **Failed:** ${summary.failed}`,
      `- **Skipped:** ${summary.skipped}`,
      `- **Success Rate:** ${formatRate(summary)}`,
      '',
      '## Test Results',
      '',
    ];

    results.forEach((result, index) => {
      lines.push(`### ${index + 1}. ${result.name} (${statusLabel(result)})`, '');
      lines.push(`- **Tool:** \`${result.toolName}\``);
      lines.push(`- **Execution Time:** ${formatSeconds(result.durationMs)}`);
      lines.push('- **Input Parameters:**', '```json', pretty(result.inputParams), '```');

      if (result.response) {
        lines.push('- **Response:**', '```json', pretty(result.response), '```');
      }

      if (result.validations.length > 0) {
        lines.push('- **Validations:**');
        result.validations.forEach((validation, i) => {
          lines.push(`  ${i + 1}. ${validation.success ? 'PASS' : 'FAIL'} ${validation.message}`);
        });
      }

      if (result.error !== undefined) {
        lines.push('- **Error:**', '```', result.error, '```');
        const fix = fixRecommendation(result.error);
        if (fix) {
          lines.push(`- **Fix Recommendation:** ${fix}`);
        }
      }
      lines.push('');
    });

    const groups = groupErrors(results);
    if (groups.size > 0) {
      lines.push('## Error Summary', '');
      for (const [kind, entries] of groups) {
        lines.push(`### ${kind}`, '');
        for (const entry of entries) {
          lines.push(`- **${entry.name}**: ${entry.message}`);
        }
        lines.push('');
      }
    }

    return lines.join('\n');
  }

  private renderJson(results: readonly ExecutionResult[], generatedAt: Date): string {
    const summary = summarize(results);
    const report = {
      meta: {
        generatedAt: generatedAt.toISOString(),
        ...summary,
        successRate: summary.successRate === null ? null : Math.round(summary.successRate * 10) / 10,
      },
      results: results.map((result) => ({
        name: result.name,
        toolName: result.toolName,
        status: statusLabel(result),
        success: result.success,
        skipped: result.skipped,
        durationMs: result.durationMs,
        inputParams: result.inputParams,
        response: result.response,
        validations: result.validations,
        error: result.error,
        fixRecommendation: result.error === undefined ? undefined : fixRecommendation(result.error),
      })),
      errorSummary: Object.fromEntries(groupErrors(results)),
    };
    return JSON.stringify(report, null, 2);
  }

  private renderHtml(results: readonly ExecutionResult[], generatedAt: Date): string {
    const summary = summarize(results);
    const html = [
      '<!DOCTYPE html>',
      '<html>',
      '<head>',
      "  <meta charset='UTF-8'>",
      '  <title>Test Execution Report</title>',
      '  <style>',
      '    body { font-family: Arial, sans-serif; line-height: 1.6; margin: 0; padding: 20px; color: #333; }',
      '    .test-case { border: 1px solid #ddd; border-radius: 4px; padding: 15px; margin-bottom: 15px; }',
      '    .pass { color: #28a745; }',
      '    .fail { color: #dc3545; }',
      '    .skip { color: #6c757d; }',
      '    pre { background-color: #f8f9fa; padding: 10px; overflow: auto; }',
      '  </style>',
      '</head>',
      '<body>',
      '  <h1>Test Execution Report</h1>',
      `  <p>Generated: ${displayTimestamp(generatedAt)}</p>`,
      "  <div class='summary'>",
      `    <div><strong>Total Tests:</strong> ${summary.total}</div>`,
      `    <div><strong>Passed:</strong> <span class='pass'>${summary.passed}</span></div>`,
      `    <div><strong>Failed:</strong> <span class='fail'>${summary.failed}</span></div>`,
      `    <div><strong>Skipped:</strong> <span class='skip'>${summary.skipped}</span></div>`,
      `    <div><strong>Success Rate:</strong> ${formatRate(summary)}</div>`,
      '  </div>',
      '  <h2>Test Results</h2>',
    ];

    results.forEach((result, index) => {
      const status = statusLabel(result);
      html.push(
        "  <div class='test-case'>",
        `    <h3>${index + 1}. ${escapeHtml(result.name)} <span class='${status.toLowerCase()}'>(${status})</span></h3>`,
        `    <div><strong>Tool:</strong> ${escapeHtml(result.toolName)}</div>`,
        `    <div><strong>Execution Time:</strong> ${formatSeconds(result.durationMs)}</div>`,
        `    <pre>${escapeHtml(pretty(result.inputParams))}</pre>`
      );
      if (result.response) {
        html.push(`    <pre>${escapeHtml(pretty(result.response))}</pre>`);
      }
      for (const validation of result.validations) {
        const cls = validation.success ? 'pass' : 'fail';
        html.push(`    <div class='${cls}'>${escapeHtml(validation.message)}</div>`);
      }
      if (result.error !== undefined) {
        html.push(`    <pre class='fail'>${escapeHtml(result.error)}</pre>`);
      }
      html.push('  </div>');
    });

    const groups = groupErrors(results);
    if (groups.size > 0) {
      html.push('  <h2>Error Summary</h2>');
      for (const [kind, entries] of groups) {
        html.push(`  <h3>${escapeHtml(kind)}</h3>`, '  <ul>');
        for (const entry of entries) {
          html.push(`    <li><strong>${escapeHtml(entry.name)}</strong>: ${escapeHtml(entry.message)}</li>`);
        }
        html.push('  </ul>');
      }
    }

    html.push('</body>', '</html>');
    return html.join('\n');
  }
}
