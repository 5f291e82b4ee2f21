import type { VenStatus } from '@/lib/reconcile/types';

export type { VenStatus };

export type IllumioConfig = {
  pce_url: string;
  org_id: string;
  api_user: string;
  api_secret: string;
  port: number;
  tls_verify: boolean;
  page_size: number;
  max_concurrent_requests: number;
  timeout_seconds: number;
};


export type LabelEntry = { key: string; value: string };

/** Label href → key/value, fetched once per run before workloads. */
export type LabelDictionary = ReadonlyMap<string, LabelEntry>;

export type WorkloadRecord = Readonly<{
  href: string;
  name: string;
  hostname: string;
  hostname_normalized: string;
  description: string;
  distinguished_name: string;

  primary_ip: string;
  primary_ip_normalized: string;
  all_ips: string;
  public_ip: string;
  interfaces_count: number;

  online: boolean;
  managed: boolean;
  enforcement_mode: string;
  visibility_level: string;

  agent_href: string;
  agent_status: string;
  agent_version: string;
  agent_last_heartbeat: string;
  agent_mode: string;

  ven_version: string;
  ven_status: VenStatus;

  os_type: string;
  os_id: string;
  os_detail: string;

  data_center: string;
  data_center_zone: string;

  created_at: string;
  updated_at: string;
  deleted: boolean;

  /** Every resolved label in workload order, keyed by label key. */
  labels: Readonly<Record<string, string>>;
  label_role: string;
  label_app: string;
  label_env: string;
  label_loc: string;
}>;
