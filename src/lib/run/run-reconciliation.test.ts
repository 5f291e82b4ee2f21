import { describe, expect, it } from 'vitest';

import { AppErrorException } from '@/lib/errors/error';
import { normalizeHostname } from '@/lib/hostname/normalize';
import { silentLogger } from '@/lib/logging/logger';

import { runReconciliation } from './run-reconciliation';

import type { AppError } from '@/lib/errors/error';
import type { FetchStats } from '@/lib/http/fetch-stats';
import type { ServerInput } from '@/lib/reconcile/types';
import type { ReportInput, ReportSink, ReportWorkload } from '@/lib/report/sink';
import type { ConnectionTestResult, SourceFetcher, SourceName } from '@/lib/sources/source-fetcher';

const STATS: FetchStats = {
  requests_made: 1,
  requests_successful: 1,
  requests_failed: 0,
  retries: 0,
  start_time: '2026-03-04T10:00:00.000Z',
  end_time: '2026-03-04T10:00:01.000Z',
  duration_seconds: 1,
};

function workload(hostname: string): ReportWorkload {
  return {
    href: `/orgs/1/workloads/${hostname}`,
    name: hostname,
    hostname,
    hostname_normalized: normalizeHostname(hostname),
    primary_ip: '',
    online: true,
    managed: true,
    ven_status: 'active',
    ven_version: '',
    enforcement_mode: '',
    visibility_level: '',
    os_type: '',
    agent_last_heartbeat: '',
    label_app: '',
    label_env: '',
    label_role: '',
    label_loc: '',
  };
}

function server(hostname: string): ServerInput {
  return {
    sys_id: `sys-${hostname}`,
    name: hostname,
    hostname,
    hostname_normalized: normalizeHostname(hostname),
    ip_address: '',
    operating_entity: '',
    environment: '',
    application: '',
    os: '',
    operational_status: '',
    location: '',
    assigned_to: '',
  };
}

type FakeFetcher<T> = SourceFetcher<T> & { closed: () => number; fetched: () => number };

function fakeFetcher<T>(
  source: SourceName,
  behavior: { connection?: ConnectionTestResult; records?: T[]; errors?: AppError[]; throws?: unknown },
): FakeFetcher<T> {
  let closed = 0;
  let fetched = 0;
  return {
    source,
    testConnection: async () => behavior.connection ?? { ok: true },
    fetchAll: async () => {
      fetched += 1;
      if (behavior.throws !== undefined) throw behavior.throws;
      const errors = behavior.errors ?? [];
      return { records: behavior.records ?? [], complete: errors.length === 0, errors };
    },
    getStats: () => STATS,
    close: async () => {
      closed += 1;
    },
    closed: () => closed,
    fetched: () => fetched,
  };
}

function recordingSink(): ReportSink & { calls: ReportInput[] } {
  const calls: ReportInput[] = [];
  return {
    calls,
    write: async (input) => {
      calls.push(input);
      return { extractsDir: '/out/extracts', reportsDir: '/out/reports', files: ['/out/reports/report.json'] };
    },
  };
}

const fixedNow = () => new Date('2026-03-04T10:00:00.000Z');

const AUTH_ERROR: AppError = {
  code: 'SERVICENOW_AUTH_FAILED',
  category: 'auth',
  message: 'authentication failed',
  retryable: false,
};

describe('runReconciliation', () => {
  it('reconciles both sources and hands the result to the sink', async () => {
    const illumio = fakeFetcher('illumio', { records: [workload('web01')] });
    const servicenow = fakeFetcher('servicenow', { records: [server('WEB01'), server('DB01')] });
    const sink = recordingSink();

    const summary = await runReconciliation({ illumio, servicenow, sink, logger: silentLogger, now: fixedNow });

    expect(summary).toMatchObject({
      ok: true,
      mode: 'full',
      workloads: 1,
      servers: 2,
      records: 2,
      coverage_rate: 50,
      errors: [],
      artifacts: { extractsDir: '/out/extracts', reportsDir: '/out/reports', files: ['/out/reports/report.json'] },
      fetch_stats: { illumio: STATS, servicenow: STATS },
    });
    expect(illumio.closed()).toBe(1);
    expect(servicenow.closed()).toBe(1);
    expect(sink.calls).toHaveLength(1);
    expect(sink.calls[0]?.servers).toHaveLength(2);
    expect(sink.calls[0]?.generatedAt.toISOString()).toBe('2026-03-04T10:00:00.000Z');
  });

  it('reports per-phase timings', async () => {
    let tick = 0;
    const now = () => new Date(Date.UTC(2026, 2, 4, 10, 0, tick++));

    const summary = await runReconciliation({
      illumio: fakeFetcher('illumio', { records: [workload('web01')] }),
      servicenow: fakeFetcher('servicenow', { records: [server('web01')] }),
      sink: recordingSink(),
      logger: silentLogger,
      now,
    });

    expect(summary.duration_seconds).toBe(9);
    expect(summary.timings.reconciliation_seconds).toBe(1);
    expect(summary.timings.report_seconds).toBe(1);
    expect(summary.timings.illumio_fetch_seconds + summary.timings.servicenow_fetch_seconds).toBe(4);
  });

  it('continues without the CMDB when its connection test fails', async () => {
    const servicenow = fakeFetcher<ServerInput>('servicenow', { connection: { ok: false, error: AUTH_ERROR } });
    const sink = recordingSink();

    const summary = await runReconciliation({
      illumio: fakeFetcher('illumio', { records: [workload('web01'), workload('db01')] }),
      servicenow,
      sink,
      logger: silentLogger,
      now: fixedNow,
    });

    expect(summary).toMatchObject({ ok: false, mode: 'illumio_only', workloads: 2, servers: 0, records: 2 });
    expect(summary.errors).toEqual([AUTH_ERROR]);
    expect(servicenow.fetched()).toBe(0);
    expect(servicenow.closed()).toBe(1);
    expect(sink.calls[0]?.servers).toBeNull();
    expect(sink.calls[0]?.errors).toEqual([AUTH_ERROR]);
  });

  it('continues without the CMDB when fetching it throws', async () => {
    const summary = await runReconciliation({
      illumio: fakeFetcher('illumio', { records: [workload('web01')] }),
      servicenow: fakeFetcher<ServerInput>('servicenow', { throws: new Error('socket hang up') }),
      sink: recordingSink(),
      logger: silentLogger,
      now: fixedNow,
    });

    expect(summary.mode).toBe('illumio_only');
    expect(summary.errors).toEqual([
      {
        code: 'SERVICENOW_FETCH_FAILED',
        category: 'unknown',
        message: 'socket hang up',
        retryable: false,
        redacted_context: { source: 'servicenow' },
      },
    ]);
  });

  it('stops before reconciling when the workload source fails', async () => {
    const illumioError: AppError = {
      code: 'ILLUMIO_AUTH_FAILED',
      category: 'auth',
      message: 'authentication failed',
      retryable: false,
    };
    const servicenow = fakeFetcher('servicenow', { records: [server('web01')] });
    const sink = recordingSink();

    const summary = await runReconciliation({
      illumio: fakeFetcher<ReportWorkload>('illumio', { throws: new AppErrorException(illumioError) }),
      servicenow,
      sink,
      logger: silentLogger,
      now: fixedNow,
    });

    expect(summary).toMatchObject({ ok: false, mode: null, workloads: 0, servers: 1, records: 0, artifacts: null });
    expect(summary.errors).toEqual([illumioError]);
    expect(sink.calls).toHaveLength(0);
    expect(servicenow.closed()).toBe(1);
  });

  it('records a sink failure without discarding the reconciliation', async () => {
    const summary = await runReconciliation({
      illumio: fakeFetcher('illumio', { records: [workload('web01')] }),
      servicenow: fakeFetcher('servicenow', { records: [server('web01')] }),
      sink: {
        write: async () => {
          throw new Error('disk full');
        },
      },
      logger: silentLogger,
      now: fixedNow,
    });

    expect(summary).toMatchObject({ ok: false, mode: 'full', records: 1, coverage_rate: 100, artifacts: null });
    expect(summary.errors).toEqual([
      { code: 'REPORT_WRITE_FAILED', category: 'io', message: 'disk full', retryable: false },
    ]);
  });

  it('marks the run failed when a source returned partial results', async () => {
    const pageError: AppError = {
      code: 'ILLUMIO_FETCH_FAILED',
      category: 'network',
      message: '1 of 4 workloads pages failed',
      retryable: true,
    };
    const sink = recordingSink();

    const summary = await runReconciliation({
      illumio: fakeFetcher('illumio', { records: [workload('web01')], errors: [pageError] }),
      servicenow: fakeFetcher('servicenow', { records: [server('web01')] }),
      sink,
      logger: silentLogger,
      now: fixedNow,
    });

    expect(summary).toMatchObject({ ok: false, mode: 'full', records: 1 });
    expect(summary.errors).toEqual([pageError]);
    expect(sink.calls[0]?.errors).toEqual([pageError]);
  });
});
