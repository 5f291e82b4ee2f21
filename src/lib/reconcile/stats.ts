import { isDeployed } from './status';
import { RECONCILIATION_STATUSES } from './types';

import type {
  FlatBreakdown,
  NestedBreakdown,
  ReconcileMode,
  ReconciledRecord,
  ReconciliationStats,
  ReconciliationStatus,
} from './types';

const UNKNOWN = 'Unknown';
const NOT_APPLICABLE = 'N/A';

type Nested = Map<string, Map<ReconciliationStatus, number>>;

function bumpNested(table: Nested, key: string, status: ReconciliationStatus) {
  let row = table.get(key);
  if (!row) {
    row = new Map();
    table.set(key, row);
  }
  row.set(status, (row.get(status) ?? 0) + 1);
}

function bumpFlat(table: Map<string, number>, key: string) {
  table.set(key, (table.get(key) ?? 0) + 1);
}

function nestedToObject(table: Nested): NestedBreakdown {
  return Object.freeze(
    Object.fromEntries([...table].map(([key, row]) => [key, Object.freeze(Object.fromEntries(row))])),
  );
}

function flatToObject(table: Map<string, number>): FlatBreakdown {
  return Object.freeze(Object.fromEntries(table));
}

function percent(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

export type StatsTotals = {
  mode: ReconcileMode;
  totalCmdbServers: number;
  totalIllumioWorkloads: number;
  matchedByHostname: number;
  duplicateWorkloadHostnames: number;
  unidentifiedWorkloads: number;
};

export type StatsAccumulator = {
  add: (record: ReconciledRecord) => void;
  finish: (totals: StatsTotals) => ReconciliationStats;
};

/** Collects per-status counts and the six breakdown tables as records are produced. */
export function createStatsAccumulator(): StatsAccumulator {
  const counts = new Map<ReconciliationStatus, number>(
    RECONCILIATION_STATUSES.map((s): [ReconciliationStatus, number] => [s, 0]),
  );
  const byEnvironment: Nested = new Map();
  const byApplication: Nested = new Map();
  const byOperatingEntity: Nested = new Map();
  const byVenStatus = new Map<string, number>();
  const byEnforcementMode = new Map<string, number>();
  const byVenVersion = new Map<string, number>();
  let records = 0;
  let deployedAny = 0;

  const add = (record: ReconciledRecord) => {
    const status = record.reconciliation_status;
    records += 1;
    counts.set(status, (counts.get(status) ?? 0) + 1);
    if (isDeployed(status)) deployedAny += 1;

    bumpNested(byEnvironment, record.cmdb_environment || record.illumio_label_env || UNKNOWN, status);
    bumpNested(byApplication, record.cmdb_application || record.illumio_label_app || UNKNOWN, status);
    bumpNested(byOperatingEntity, record.cmdb_operating_entity || UNKNOWN, status);

    bumpFlat(byVenStatus, record.illumio_ven_status || NOT_APPLICABLE);
    bumpFlat(byEnforcementMode, record.illumio_enforcement_mode || NOT_APPLICABLE);
    bumpFlat(byVenVersion, record.illumio_ven_version || NOT_APPLICABLE);
  };

  const finish = (totals: StatsTotals): ReconciliationStats => {
    const count = (s: ReconciliationStatus) => counts.get(s) ?? 0;
    const currentlyDeployed = count('deployed_active') + count('deployed_offline') + count('deployed_suspended');
    // Counts enforced workloads across every record, including not_in_cmdb ones, so this can exceed 100.
    const enforced = (byEnforcementMode.get('full') ?? 0) + (byEnforcementMode.get('selective') ?? 0);

    return Object.freeze({
      mode: totals.mode,
      total_cmdb_servers: totals.totalCmdbServers,
      total_illumio_workloads: totals.totalIllumioWorkloads,
      total_records: records,
      by_status: Object.freeze({
        deployed_active: count('deployed_active'),
        deployed_offline: count('deployed_offline'),
        deployed_suspended: count('deployed_suspended'),
        deployed_uninstalled: count('deployed_uninstalled'),
        not_deployed: count('not_deployed'),
        not_in_cmdb: count('not_in_cmdb'),
      }),

      matched_by_hostname: totals.matchedByHostname,
      duplicate_workload_hostnames: totals.duplicateWorkloadHostnames,
      unidentified_workloads: totals.unidentifiedWorkloads,

      coverage_rate: percent(deployedAny, totals.totalCmdbServers),
      active_rate: percent(count('deployed_active'), totals.totalCmdbServers),
      enforcement_rate: percent(enforced, currentlyDeployed),

      by_environment: nestedToObject(byEnvironment),
      by_application: nestedToObject(byApplication),
      by_operating_entity: nestedToObject(byOperatingEntity),
      by_ven_status: flatToObject(byVenStatus),
      by_enforcement_mode: flatToObject(byEnforcementMode),
      by_ven_version: flatToObject(byVenVersion),
    });
  };

  return { add, finish };
}
