import { ErrorCode } from '@/lib/errors/error-codes';
import { toAppError } from '@/lib/errors/error';
import { reconcile } from '@/lib/reconcile/reconcile';
import { withSourceFetcher } from '@/lib/sources/source-fetcher';

import type { AppError } from '@/lib/errors/error';
import type { ErrorCodeType } from '@/lib/errors/error-codes';
import type { FetchStats } from '@/lib/http/fetch-stats';
import type { Logger } from '@/lib/logging/logger';
import type { ReconcileMode, ReconcileResult, ServerInput } from '@/lib/reconcile/types';
import type { ReportArtifacts, ReportSink, ReportWorkload } from '@/lib/report/sink';
import type { SourceFetcher, SourceName } from '@/lib/sources/source-fetcher';

type SourceOutcome<T> =
  | { kind: 'ok'; records: T[]; errors: AppError[]; seconds: number; stats: Readonly<FetchStats> }
  | { kind: 'unavailable'; error: AppError; seconds: number; stats: Readonly<FetchStats> };

export type RunTimings = {
  illumio_fetch_seconds: number;
  servicenow_fetch_seconds: number;
  reconciliation_seconds: number;
  report_seconds: number;
};

export type RunSummary = {
  ok: boolean;
  mode: ReconcileMode | null;
  started_at: string;
  finished_at: string;
  duration_seconds: number;
  timings: RunTimings;
  workloads: number;
  servers: number;
  records: number;
  coverage_rate: number;
  fetch_stats: Record<SourceName, Readonly<FetchStats>>;
  artifacts: ReportArtifacts | null;
  errors: AppError[];
};

export type RunReconciliationInput<W extends ReportWorkload, S extends ServerInput> = {
  illumio: SourceFetcher<W>;
  servicenow: SourceFetcher<S>;
  sink: ReportSink;
  logger: Logger;
  now?: () => Date;
};

const FETCH_FAILED: Record<SourceName, ErrorCodeType> = {
  illumio: ErrorCode.ILLUMIO_FETCH_FAILED,
  servicenow: ErrorCode.SERVICENOW_FETCH_FAILED,
};

function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}

async function fetchSource<T>(fetcher: SourceFetcher<T>, now: () => Date): Promise<SourceOutcome<T>> {
  const started = now();
  const outcome = await withSourceFetcher(fetcher, async (f) => {
    const connection = await f.testConnection();
    if (!connection.ok) return { kind: 'unavailable' as const, error: connection.error };
    try {
      const result = await f.fetchAll();
      return { kind: 'ok' as const, records: result.records, errors: result.errors };
    } catch (err) {
      return {
        kind: 'unavailable' as const,
        error: toAppError(err, { code: FETCH_FAILED[f.source], redacted_context: { source: f.source } }),
      };
    }
  });
  // Stats are read after close so duration_seconds is final.
  return { ...outcome, seconds: secondsBetween(started, now()), stats: fetcher.getStats() };
}

/**
 * Fetches both sources concurrently, reconciles and hands the result to the sink.
 *
 * The workload source is required: if it cannot be reached or fetched the run stops before
 * reconciling. A CMDB failure switches to `illumio_only` mode. Sink failures are recorded but do
 * not fail the reconciliation. `ok` is true only when no error was recorded.
 */
export async function runReconciliation<W extends ReportWorkload, S extends ServerInput>(
  input: RunReconciliationInput<W, S>,
): Promise<RunSummary> {
  const now = input.now ?? (() => new Date());
  const logger = input.logger;
  const startedAt = now();
  const errors: AppError[] = [];
  const timings: RunTimings = {
    illumio_fetch_seconds: 0,
    servicenow_fetch_seconds: 0,
    reconciliation_seconds: 0,
    report_seconds: 0,
  };

  logger.info('run.start', { started_at: startedAt.toISOString() });

  const [illumio, servicenow] = await Promise.all([
    fetchSource(input.illumio, now),
    fetchSource(input.servicenow, now),
  ]);
  timings.illumio_fetch_seconds = illumio.seconds;
  timings.servicenow_fetch_seconds = servicenow.seconds;

  let workloads: W[] = [];
  if (illumio.kind === 'ok') {
    workloads = illumio.records;
    errors.push(...illumio.errors);
    logger.info('run.illumio_fetched', { workloads: workloads.length, seconds: illumio.seconds, stats: illumio.stats });
  } else {
    errors.push(illumio.error);
    logger.error('run.illumio_unavailable', { code: illumio.error.code, message: illumio.error.message });
  }

  let servers: S[] | null = null;
  if (servicenow.kind === 'ok') {
    servers = servicenow.records;
    errors.push(...servicenow.errors);
    logger.info('run.servicenow_fetched', {
      servers: servers.length,
      seconds: servicenow.seconds,
      stats: servicenow.stats,
    });
  } else {
    errors.push(servicenow.error);
    logger.warn('run.cmdb_unavailable', {
      code: servicenow.error.code,
      message: `${servicenow.error.message}; continuing with workload-only analysis`,
    });
  }

  let result: ReconcileResult | null = null;
  let artifacts: ReportArtifacts | null = null;

  if (illumio.kind === 'ok') {
    const reconcileStarted = now();
    try {
      result = reconcile(workloads, servers, { logger: logger.child('reconcile') });
    } catch (err) {
      const error = toAppError(err, { code: ErrorCode.RECONCILIATION_FAILED });
      errors.push(error);
      logger.error('run.reconciliation_failed', { code: error.code, message: error.message });
    }
    timings.reconciliation_seconds = secondsBetween(reconcileStarted, now());
  }

  if (result) {
    const reportStarted = now();
    try {
      artifacts = await input.sink.write({
        generatedAt: startedAt,
        workloads,
        servers,
        result,
        errors: [...errors],
      });
    } catch (err) {
      const error = toAppError(err, { code: ErrorCode.REPORT_WRITE_FAILED, category: 'io' });
      errors.push(error);
      logger.error('run.report_failed', { code: error.code, message: error.message });
    }
    timings.report_seconds = secondsBetween(reportStarted, now());
  }

  const finishedAt = now();
  const summary: RunSummary = {
    ok: errors.length === 0,
    mode: result?.stats.mode ?? null,
    started_at: startedAt.toISOString(),
    finished_at: finishedAt.toISOString(),
    duration_seconds: secondsBetween(startedAt, finishedAt),
    timings,
    workloads: workloads.length,
    servers: servers?.length ?? 0,
    records: result?.records.length ?? 0,
    coverage_rate: result?.stats.coverage_rate ?? 0,
    fetch_stats: { illumio: illumio.stats, servicenow: servicenow.stats },
    artifacts,
    errors,
  };

  logger.info('run.summary', {
    ok: summary.ok,
    mode: summary.mode,
    duration_seconds: summary.duration_seconds,
    timings,
    workloads: summary.workloads,
    servers: summary.servers,
    records: summary.records,
    coverage_rate: summary.coverage_rate,
    extracts_dir: artifacts?.extractsDir ?? null,
    reports_dir: artifacts?.reportsDir ?? null,
    errors: errors.length,
  });
  for (const error of errors) logger.warn('run.error', { code: error.code, category: error.category, message: error.message });

  return summary;
}
