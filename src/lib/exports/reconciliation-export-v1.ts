import type { ReconciledRecord } from '@/lib/reconcile/types';

// Leading columns; any other field a row carries follows in first-seen order.
export const WORKLOAD_COLUMNS = [
  'hostname',
  'hostname_normalized',
  'name',
  'primary_ip',
  'all_ips',
  'online',
  'managed',
  'ven_status',
  'ven_version',
  'enforcement_mode',
  'visibility_level',
  'label_app',
  'label_env',
  'label_role',
  'label_loc',
  'os_type',
  'os_detail',
  'agent_status',
  'agent_last_heartbeat',
  'data_center',
  'data_center_zone',
  'created_at',
  'updated_at',
  'href',
] as const;

export const SERVER_COLUMNS = [
  'hostname',
  'hostname_normalized',
  'name',
  'ip_address',
  'operating_entity',
  'environment',
  'application',
  'os',
  'os_version',
  'operational_status',
  'install_status',
  'location',
  'assigned_to',
  'managed_by',
  'sys_id',
  'sys_created_on',
  'sys_updated_on',
] as const;

export const RECONCILED_COLUMNS = [
  'hostname_normalized',
  'reconciliation_status',
  'match_type',
  'cmdb_sys_id',
  'cmdb_name',
  'cmdb_hostname',
  'cmdb_ip_address',
  'cmdb_operating_entity',
  'cmdb_environment',
  'cmdb_application',
  'cmdb_os',
  'cmdb_operational_status',
  'cmdb_location',
  'cmdb_assigned_to',
  'illumio_href',
  'illumio_hostname',
  'illumio_name',
  'illumio_primary_ip',
  'illumio_online',
  'illumio_managed',
  'illumio_ven_status',
  'illumio_ven_version',
  'illumio_enforcement_mode',
  'illumio_visibility_level',
  'illumio_os_type',
  'illumio_label_app',
  'illumio_label_env',
  'illumio_label_role',
  'illumio_label_loc',
  'illumio_last_heartbeat',
] as const satisfies readonly (keyof ReconciledRecord)[];

export type CsvRow = Readonly<Record<string, unknown>>;

export function escapeCsvField(value: string): string {
  // RFC 4180: quote fields containing comma, quote or line break; double embedded quotes.
  if (value.includes('"')) value = value.replaceAll('"', '""');
  if (value.includes(',') || value.includes('\n') || value.includes('\r') || value.includes('"')) return `"${value}"`;
  return value;
}

export function toCsvLine(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',');
}

/**
 * Scalars become their string form; nested string maps (workload labels, CMDB custom fields)
 * become `key=value` pairs joined with `; `.
 */
export function formatCsvCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return value.map(formatCsvCell).join('; ');
  if (typeof value === 'object') {
    return Object.entries(value)
      .map(([k, v]) => `${k}=${formatCsvCell(v)}`)
      .join('; ');
  }
  return String(value);
}

export function orderColumns(rows: readonly CsvRow[], preferred: readonly string[]): string[] {
  const present = new Set<string>();
  const rest: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (present.has(key)) continue;
      present.add(key);
      if (!preferred.includes(key)) rest.push(key);
    }
  }
  return [...preferred.filter((key) => present.has(key)), ...rest];
}

/** Header plus one line per row, newline-terminated. An empty row list yields an empty string. */
export function buildCsv(rows: readonly CsvRow[], preferred: readonly string[]): string {
  if (rows.length === 0) return '';
  const columns = orderColumns(rows, preferred);
  const lines = [toCsvLine(columns)];
  for (const row of rows) {
    lines.push(toCsvLine(columns.map((key) => formatCsvCell(row[key]))));
  }
  return `${lines.join('\n')}\n`;
}
