import { normalizeHostname, normalizeIp } from '@/lib/hostname/normalize';

import type { HostnameCase } from '@/lib/hostname/normalize';
import type { FieldDiscovery, ServerRecord } from './types';

type Raw = Record<string, unknown>;

/** `u_*` fields that already feed a named column. */
const MAPPED_CUSTOM_FIELDS: ReadonlySet<string> = new Set([
  'u_operating_entity',
  'u_environment',
  'u_application',
  'u_criticality',
]);

function isRaw(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalar(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/** Reference fields arrive either as a scalar or as `{ display_value, value, link }`. */
export function displayValue(value: unknown): string {
  if (isRaw(value)) return 'display_value' in value ? scalar(value.display_value) : scalar(value.value);
  return scalar(value);
}

function firstNonEmpty(raw: Raw, keys: string[]): string {
  for (const key of keys) {
    const v = displayValue(raw[key]);
    if (v) return v;
  }
  return '';
}

function isCustomField(key: string) {
  return key.startsWith('u_') && !MAPPED_CUSTOM_FIELDS.has(key);
}

export function discoverFields(sample: Raw | undefined): Pick<FieldDiscovery, 'discovered_fields' | 'custom_fields'> {
  const discovered = sample ? Object.keys(sample) : [];
  return { discovered_fields: discovered, custom_fields: discovered.filter(isCustomField) };
}

/** Custom fields on `raw` that the first record did not have. */
export function extraCustomFields(raw: Raw, known: ReadonlySet<string>): string[] {
  return Object.keys(raw).filter((key) => isCustomField(key) && !known.has(key));
}

export function normalizeServer(raw: Raw, customFields: readonly string[], fold: HostnameCase): ServerRecord {
  const get = (key: string) => displayValue(raw[key]);
  const hostname = firstNonEmpty(raw, ['name', 'host_name']);
  const ip = get('ip_address');

  const custom: Record<string, string> = {};
  for (const key of customFields) custom[key] = get(key);

  return Object.freeze({
    sys_id: get('sys_id'),
    name: get('name'),
    hostname,
    hostname_normalized: normalizeHostname(hostname, fold),
    asset_tag: get('asset_tag'),
    serial_number: get('serial_number'),
    fqdn: get('fqdn'),
    dns_domain: get('dns_domain'),

    ip_address: ip,
    ip_normalized: normalizeIp(ip),
    mac_address: get('mac_address'),

    sys_class_name: get('sys_class_name'),
    category: get('category'),
    subcategory: get('subcategory'),
    classification: get('classification'),

    operating_entity: firstNonEmpty(raw, ['u_operating_entity', 'operating_entity']),
    company: get('company'),
    department: get('department'),
    location: get('location'),
    cost_center: get('cost_center'),
    business_unit: get('business_unit'),

    os: get('os'),
    os_version: get('os_version'),
    os_domain: get('os_domain'),
    cpu_count: get('cpu_count'),
    cpu_type: get('cpu_type'),
    cpu_speed: get('cpu_speed'),
    ram: get('ram'),
    disk_space: get('disk_space'),
    virtual: get('virtual'),

    operational_status: get('operational_status'),
    install_status: get('install_status'),

    assigned_to: get('assigned_to'),
    managed_by: get('managed_by'),
    owned_by: get('owned_by'),
    supported_by: get('supported_by'),
    support_group: get('support_group'),

    environment: firstNonEmpty(raw, ['u_environment', 'environment']),
    application: get('u_application'),
    criticality: firstNonEmpty(raw, ['u_criticality', 'criticality']),

    sys_created_on: get('sys_created_on'),
    sys_updated_on: get('sys_updated_on'),
    sys_created_by: get('sys_created_by'),
    sys_updated_by: get('sys_updated_by'),
    discovery_source: get('discovery_source'),
    last_discovered: get('last_discovered'),

    custom_fields: Object.freeze(custom),
  });
}
