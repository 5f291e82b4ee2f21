export type VenStatus = 'active' | 'offline' | 'suspended' | 'uninstalled' | 'unmanaged' | 'unknown';

export type DeployedStatus = 'deployed_active' | 'deployed_offline' | 'deployed_suspended' | 'deployed_uninstalled';

export type ReconciliationStatus = DeployedStatus | 'not_deployed' | 'not_in_cmdb';

export const RECONCILIATION_STATUSES = [
  'deployed_active',
  'deployed_offline',
  'deployed_suspended',
  'deployed_uninstalled',
  'not_deployed',
  'not_in_cmdb',
] as const satisfies readonly ReconciliationStatus[];

export type MatchType = 'hostname' | 'none' | 'illumio_only';

export type ReconcileMode = 'full' | 'illumio_only';

/** Workload fields the reconciler reads. */
export type WorkloadInput = Readonly<{
  href: string;
  name: string;
  hostname: string;
  hostname_normalized: string;
  primary_ip: string;
  online: boolean;
  managed: boolean;
  ven_status: VenStatus;
  ven_version: string;
  enforcement_mode: string;
  visibility_level: string;
  os_type: string;
  agent_last_heartbeat: string;
  label_app: string;
  label_env: string;
  label_role: string;
  label_loc: string;
}>;

/** Server fields the reconciler reads. */
export type ServerInput = Readonly<{
  sys_id: string;
  name: string;
  hostname: string;
  hostname_normalized: string;
  ip_address: string;
  operating_entity: string;
  environment: string;
  application: string;
  os: string;
  operational_status: string;
  location: string;
  assigned_to: string;
}>;

export type YesNo = 'Yes' | 'No';

export type ReconciledRecord = Readonly<{
  cmdb_sys_id: string;
  cmdb_name: string;
  cmdb_hostname: string;
  cmdb_ip_address: string;
  cmdb_operating_entity: string;
  cmdb_environment: string;
  cmdb_application: string;
  cmdb_os: string;
  cmdb_operational_status: string;
  cmdb_location: string;
  cmdb_assigned_to: string;

  illumio_href: string;
  illumio_hostname: string;
  illumio_name: string;
  illumio_primary_ip: string;
  illumio_online: YesNo | '';
  illumio_managed: YesNo | '';
  illumio_ven_status: VenStatus | '';
  illumio_ven_version: string;
  illumio_enforcement_mode: string;
  illumio_visibility_level: string;
  illumio_os_type: string;
  illumio_label_app: string;
  illumio_label_env: string;
  illumio_label_role: string;
  illumio_label_loc: string;
  illumio_last_heartbeat: string;

  hostname_normalized: string;
  reconciliation_status: ReconciliationStatus;
  match_type: MatchType;
}>;

export type StatusCounts = Readonly<Record<ReconciliationStatus, number>>;

/** dimension value → status → count */
export type NestedBreakdown = Readonly<Record<string, Readonly<Partial<Record<ReconciliationStatus, number>>>>>;

export type FlatBreakdown = Readonly<Record<string, number>>;

export type ReconciliationStats = Readonly<{
  mode: ReconcileMode;
  total_cmdb_servers: number;
  total_illumio_workloads: number;
  total_records: number;
  by_status: StatusCounts;

  matched_by_hostname: number;
  duplicate_workload_hostnames: number;
  unidentified_workloads: number;

  coverage_rate: number;
  active_rate: number;
  enforcement_rate: number;

  by_environment: NestedBreakdown;
  by_application: NestedBreakdown;
  by_operating_entity: NestedBreakdown;
  by_ven_status: FlatBreakdown;
  by_enforcement_mode: FlatBreakdown;
  by_ven_version: FlatBreakdown;
}>;

export type ReconcileResult = Readonly<{
  records: readonly ReconciledRecord[];
  stats: ReconciliationStats;
}>;
