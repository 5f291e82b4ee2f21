import type { DeployedStatus, ReconciliationStatus, WorkloadInput } from './types';

/** Status of a workload judged on its own fields; used for matches and in illumio-only mode. */
export function classifyWorkload(workload: Pick<WorkloadInput, 'managed' | 'online' | 'ven_status'>): DeployedStatus {
  if (!workload.managed) return 'deployed_uninstalled';

  switch (workload.ven_status) {
    case 'suspended':
      return 'deployed_suspended';
    case 'uninstalled':
      return 'deployed_uninstalled';
    case 'active':
    case 'offline':
    case 'unmanaged':
    case 'unknown':
      return workload.online ? 'deployed_active' : 'deployed_offline';
  }
}

export function isDeployed(status: ReconciliationStatus): status is DeployedStatus {
  switch (status) {
    case 'deployed_active':
    case 'deployed_offline':
    case 'deployed_suspended':
    case 'deployed_uninstalled':
      return true;
    case 'not_deployed':
    case 'not_in_cmdb':
      return false;
  }
}
