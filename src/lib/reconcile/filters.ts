import type { ReconciledRecord, ReconciliationStatus } from './types';

function byStatus(status: ReconciliationStatus) {
  return (records: readonly ReconciledRecord[]) => records.filter((r) => r.reconciliation_status === status);
}

/** CMDB servers with no matching workload (gap analysis). */
export const getNotDeployed = byStatus('not_deployed');

/** Workloads with no CMDB entry. */
export const getShadowIt = byStatus('not_in_cmdb');

export const getOfflineAgents = byStatus('deployed_offline');

export const getSuspendedAgents = byStatus('deployed_suspended');

/** Offline followed by suspended agents. */
export function getHealthIssues(records: readonly ReconciledRecord[]): ReconciledRecord[] {
  return [...getOfflineAgents(records), ...getSuspendedAgents(records)];
}
