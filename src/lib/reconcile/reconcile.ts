import { silentLogger } from '@/lib/logging/logger';

import { buildRecord } from './records';
import { createStatsAccumulator } from './stats';
import { classifyWorkload } from './status';

import type { Logger } from '@/lib/logging/logger';
import type { ReconcileResult, ReconciledRecord, ServerInput, WorkloadInput } from './types';

/**
 * Joins workloads and CMDB servers on `hostname_normalized`.
 *
 * With `servers === null` (CMDB unavailable) every workload is classified on its own and tagged
 * `illumio_only`. Otherwise each server yields one record (`hostname` match or `not_deployed`),
 * followed by one `not_in_cmdb` record per unconsumed workload. Workloads without a hostname are
 * never matched but are still emitted. On duplicate hostnames the last workload wins; duplicate
 * servers each get their own `hostname` record against that workload.
 */
export function reconcile(
  workloads: readonly WorkloadInput[],
  servers: readonly ServerInput[] | null,
  options: { logger?: Logger } = {},
): ReconcileResult {
  const logger = options.logger ?? silentLogger;
  const acc = createStatsAccumulator();
  const records: ReconciledRecord[] = [];
  const emit = (record: ReconciledRecord) => {
    records.push(record);
    acc.add(record);
  };

  const byHostname = new Map<string, WorkloadInput>();
  const unidentified: WorkloadInput[] = [];
  let duplicates = 0;
  for (const workload of workloads) {
    const key = workload.hostname_normalized;
    if (!key) {
      unidentified.push(workload);
      continue;
    }
    if (byHostname.has(key)) duplicates += 1;
    byHostname.set(key, workload);
  }
  if (duplicates > 0) logger.warn('reconcile.duplicate_hostnames', { duplicates });

  let matched = 0;

  if (servers === null) {
    logger.info('reconcile.illumio_only', { workloads: workloads.length });
    for (const workload of workloads) {
      emit(buildRecord({ workload, status: classifyWorkload(workload), matchType: 'illumio_only' }));
    }
  } else {
    const consumed = new Set<string>();
    for (const server of servers) {
      const key = server.hostname_normalized;
      const workload = key ? byHostname.get(key) : undefined;
      if (workload) {
        consumed.add(key);
        matched += 1;
        emit(buildRecord({ server, workload, status: classifyWorkload(workload), matchType: 'hostname' }));
      } else {
        emit(buildRecord({ server, status: 'not_deployed', matchType: 'none' }));
      }
    }

    for (const [key, workload] of byHostname) {
      if (consumed.has(key)) continue;
      emit(buildRecord({ workload, status: 'not_in_cmdb', matchType: 'none' }));
    }
    for (const workload of unidentified) {
      emit(buildRecord({ workload, status: 'not_in_cmdb', matchType: 'none' }));
    }
  }

  const stats = acc.finish({
    mode: servers === null ? 'illumio_only' : 'full',
    totalCmdbServers: servers?.length ?? 0,
    totalIllumioWorkloads: workloads.length,
    matchedByHostname: matched,
    duplicateWorkloadHostnames: duplicates,
    unidentifiedWorkloads: unidentified.length,
  });

  logger.info('reconcile.done', {
    mode: stats.mode,
    records: stats.total_records,
    matched_by_hostname: stats.matched_by_hostname,
    coverage_rate: stats.coverage_rate,
  });

  return Object.freeze({ records: Object.freeze(records), stats });
}
