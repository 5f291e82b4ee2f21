import { normalizeHostname, normalizeIp } from '@/lib/hostname/normalize';

import type { HostnameCase } from '@/lib/hostname/normalize';
import type { LabelDictionary, LabelEntry, VenStatus, WorkloadRecord } from './types';

type Raw = Record<string, unknown>;

function isRaw(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asObject(value: unknown): Raw {
  return isRaw(value) ? value : {};
}

function asString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

const KNOWN_VEN_STATUSES: ReadonlySet<string> = new Set<VenStatus>([
  'active',
  'offline',
  'suspended',
  'uninstalled',
  'unmanaged',
]);

function isVenStatus(value: string): value is VenStatus {
  return KNOWN_VEN_STATUSES.has(value);
}

export function buildLabelDictionary(rawLabels: Raw[]): LabelDictionary {
  const out = new Map<string, LabelEntry>();
  for (const label of rawLabels) {
    const href = asString(label.href);
    if (!href) continue;
    out.set(href, { key: asString(label.key), value: asString(label.value) });
  }
  return out;
}

/**
 * unmanaged → "unmanaged"; otherwise the agent-reported status (lowercased) when present;
 * otherwise "active"/"offline" from the workload's online flag.
 */
export function deriveVenStatus(raw: Raw): VenStatus {
  if (raw.managed !== true) return 'unmanaged';

  const reported = asString(asObject(asObject(raw.agent).status).status).trim().toLowerCase();
  if (reported) return isVenStatus(reported) ? reported : 'unknown';

  return raw.online === true ? 'active' : 'offline';
}

export function resolveLabels(rawRefs: unknown, dictionary: LabelDictionary): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const ref of asArray(rawRefs)) {
    const entry = dictionary.get(asString(asObject(ref).href));
    if (!entry || !entry.key) continue;
    resolved[entry.key] = entry.value;
  }
  return resolved;
}

export function normalizeWorkload(raw: Raw, dictionary: LabelDictionary, fold: HostnameCase): WorkloadRecord {
  const labels = resolveLabels(raw.labels, dictionary);

  const interfaces = asArray(raw.interfaces);
  const ips = interfaces.map((iface) => asString(asObject(iface).address)).filter((ip) => ip.length > 0);
  const primaryIp = ips[0] ?? '';

  const agent = asObject(raw.agent);
  const agentStatus = asObject(agent.status);
  const agentConfig = asObject(agent.config);
  const hostname = asString(raw.hostname);
  const agentVersion = asString(agentStatus.agent_version);

  return Object.freeze({
    href: asString(raw.href),
    name: asString(raw.name),
    hostname,
    hostname_normalized: normalizeHostname(hostname, fold),
    description: asString(raw.description),
    distinguished_name: asString(raw.distinguished_name),

    primary_ip: primaryIp,
    primary_ip_normalized: normalizeIp(primaryIp),
    all_ips: ips.join(', '),
    public_ip: asString(raw.public_ip),
    interfaces_count: interfaces.length,

    online: raw.online === true,
    managed: raw.managed === true,
    enforcement_mode: asString(raw.enforcement_mode),
    visibility_level: asString(raw.visibility_level),

    agent_href: asString(agent.href),
    agent_status: asString(agentStatus.status),
    agent_version: agentVersion,
    agent_last_heartbeat: asString(agentStatus.last_heartbeat_on),
    agent_mode: asString(agentConfig.mode),

    ven_version: agentVersion,
    ven_status: deriveVenStatus(raw),

    os_type: asString(raw.os_type),
    os_id: asString(raw.os_id),
    os_detail: asString(raw.os_detail),

    data_center: asString(raw.data_center),
    data_center_zone: asString(raw.data_center_zone),

    created_at: asString(raw.created_at),
    updated_at: asString(raw.updated_at),
    deleted: raw.deleted === true,

    labels: Object.freeze(labels),
    label_role: labels.role ?? '',
    label_app: labels.app ?? '',
    label_env: labels.env ?? '',
    label_loc: labels.loc ?? '',
  });
}
