import type { MatchType, ReconciledRecord, ReconciliationStatus, ServerInput, WorkloadInput } from './types';

const EMPTY_CMDB = {
  cmdb_sys_id: '',
  cmdb_name: '',
  cmdb_hostname: '',
  cmdb_ip_address: '',
  cmdb_operating_entity: '',
  cmdb_environment: '',
  cmdb_application: '',
  cmdb_os: '',
  cmdb_operational_status: '',
  cmdb_location: '',
  cmdb_assigned_to: '',
} as const;

const EMPTY_ILLUMIO = {
  illumio_href: '',
  illumio_hostname: '',
  illumio_name: '',
  illumio_primary_ip: '',
  illumio_online: '',
  illumio_managed: '',
  illumio_ven_status: '',
  illumio_ven_version: '',
  illumio_enforcement_mode: '',
  illumio_visibility_level: '',
  illumio_os_type: '',
  illumio_label_app: '',
  illumio_label_env: '',
  illumio_label_role: '',
  illumio_label_loc: '',
  illumio_last_heartbeat: '',
} as const;

function cmdbColumns(server: ServerInput) {
  return {
    cmdb_sys_id: server.sys_id,
    cmdb_name: server.name,
    cmdb_hostname: server.hostname,
    cmdb_ip_address: server.ip_address,
    cmdb_operating_entity: server.operating_entity,
    cmdb_environment: server.environment,
    cmdb_application: server.application,
    cmdb_os: server.os,
    cmdb_operational_status: server.operational_status,
    cmdb_location: server.location,
    cmdb_assigned_to: server.assigned_to,
  };
}

function illumioColumns(workload: WorkloadInput) {
  return {
    illumio_href: workload.href,
    illumio_hostname: workload.hostname,
    illumio_name: workload.name,
    illumio_primary_ip: workload.primary_ip,
    illumio_online: workload.online ? 'Yes' : 'No',
    illumio_managed: workload.managed ? 'Yes' : 'No',
    illumio_ven_status: workload.ven_status,
    illumio_ven_version: workload.ven_version,
    illumio_enforcement_mode: workload.enforcement_mode,
    illumio_visibility_level: workload.visibility_level,
    illumio_os_type: workload.os_type,
    illumio_label_app: workload.label_app,
    illumio_label_env: workload.label_env,
    illumio_label_role: workload.label_role,
    illumio_label_loc: workload.label_loc,
    illumio_last_heartbeat: workload.agent_last_heartbeat,
  } as const;
}

export function buildRecord(input: {
  server?: ServerInput;
  workload?: WorkloadInput;
  status: ReconciliationStatus;
  matchType: MatchType;
}): ReconciledRecord {
  const { server, workload } = input;
  return Object.freeze({
    ...(server ? cmdbColumns(server) : EMPTY_CMDB),
    ...(workload ? illumioColumns(workload) : EMPTY_ILLUMIO),
    hostname_normalized: workload?.hostname_normalized || server?.hostname_normalized || '',
    reconciliation_status: input.status,
    match_type: input.matchType,
  });
}
