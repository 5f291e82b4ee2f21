import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException } from '@/lib/errors/error';
import {
  RECONCILED_COLUMNS,
  SERVER_COLUMNS,
  WORKLOAD_COLUMNS,
  buildCsv,
} from '@/lib/exports/reconciliation-export-v1';
import { getHealthIssues, getNotDeployed, getShadowIt } from '@/lib/reconcile/filters';
import { formatReportIssues, validateReconciliationReportV1 } from '@/lib/schema/validate';

import { buildReportDocument } from './sink';

import type { OutputConfig } from '@/lib/config/config';
import type { CsvRow } from '@/lib/exports/reconciliation-export-v1';
import type { Logger } from '@/lib/logging/logger';
import type { ReportArtifacts, ReportInput, ReportSink } from './sink';

/** Local calendar date as `dd-mm-yyyy`. */
export function formatDateStamp(d: Date): string {
  const dd = String(d.getDate()).padStart(2, '0');
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const yyyy = String(d.getFullYear()).padStart(4, '0');
  return `${dd}-${mm}-${yyyy}`;
}

export function resolveOutputDirs(
  output: OutputConfig,
  at: Date,
  cwd: string = process.cwd(),
): { extractsDir: string; reportsDir: string } {
  const base = path.resolve(cwd, output.base_path);
  const dated = (dir: string) => (output.create_date_subfolder ? path.join(dir, formatDateStamp(at)) : dir);
  return {
    extractsDir: dated(path.join(base, output.extracts_folder)),
    reportsDir: dated(path.join(base, output.reports_folder)),
  };
}

/**
 * Writes CSV extracts and the `reconciliation-report-v1` JSON document. Extracts with no rows
 * are skipped; the JSON document is validated before it is written.
 */
export function createFileReportSink(input: { output: OutputConfig; logger: Logger; cwd?: string }): ReportSink {
  const { output, logger } = input;

  async function write(report: ReportInput): Promise<ReportArtifacts> {
    const { extractsDir, reportsDir } = resolveOutputDirs(output, report.generatedAt, input.cwd);
    await mkdir(extractsDir, { recursive: true });
    await mkdir(reportsDir, { recursive: true });

    const stamp = formatDateStamp(report.generatedAt);
    const fileName = (name: string, ext: 'csv' | 'json') => `${output.file_prefix}_${name}_${stamp}.${ext}`;
    const files: string[] = [];

    async function extract(name: string, rows: readonly CsvRow[], columns: readonly string[]) {
      if (rows.length === 0) return;
      const file = path.join(extractsDir, fileName(name, 'csv'));
      await writeFile(file, buildCsv(rows, columns), 'utf8');
      files.push(file);
      logger.info('report.extract_written', { file, rows: rows.length });
    }

    const { records } = report.result;
    await extract('illumio_workloads', report.workloads, WORKLOAD_COLUMNS);
    if (report.servers) await extract('servicenow_servers', report.servers, SERVER_COLUMNS);
    await extract('reconciliation_full', records, RECONCILED_COLUMNS);
    await extract('gap_not_deployed', getNotDeployed(records), RECONCILED_COLUMNS);
    await extract('shadow_it', getShadowIt(records), RECONCILED_COLUMNS);
    await extract('health_issues', getHealthIssues(records), RECONCILED_COLUMNS);

    const document = buildReportDocument(report);
    const validation = validateReconciliationReportV1(document);
    if (!validation.ok) {
      throw new AppErrorException({
        code: ErrorCode.SCHEMA_VALIDATION_FAILED,
        category: 'schema',
        message: 'report document failed schema validation',
        retryable: false,
        redacted_context: { issues: formatReportIssues(validation.issues) },
      });
    }

    const reportFile = path.join(reportsDir, fileName('report', 'json'));
    await writeFile(reportFile, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
    files.push(reportFile);
    logger.info('report.done', { extracts_dir: extractsDir, reports_dir: reportsDir, files: files.length });

    return { extractsDir, reportsDir, files };
  }

  return { write };
}
