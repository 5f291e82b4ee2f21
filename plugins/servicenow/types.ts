export type ServiceNowConfig = {
  instance_url: string;
  api_user: string;
  api_key: string;
  table: string;
  tls_verify: boolean;
  page_size: number;
  max_concurrent_requests: number;
  timeout_seconds: number;
};

export type ServerRecord = Readonly<{
  sys_id: string;
  name: string;
  hostname: string;
  hostname_normalized: string;
  asset_tag: string;
  serial_number: string;
  fqdn: string;
  dns_domain: string;

  ip_address: string;
  ip_normalized: string;
  mac_address: string;

  sys_class_name: string;
  category: string;
  subcategory: string;
  classification: string;

  operating_entity: string;
  company: string;
  department: string;
  location: string;
  cost_center: string;
  business_unit: string;

  os: string;
  os_version: string;
  os_domain: string;
  cpu_count: string;
  cpu_type: string;
  cpu_speed: string;
  ram: string;
  disk_space: string;
  virtual: string;

  operational_status: string;
  install_status: string;

  assigned_to: string;
  managed_by: string;
  owned_by: string;
  supported_by: string;
  support_group: string;

  environment: string;
  application: string;
  criticality: string;

  sys_created_on: string;
  sys_updated_on: string;
  sys_created_by: string;
  sys_updated_by: string;
  discovery_source: string;
  last_discovered: string;

  /** Unmapped `u_*` fields found on the first record, in that record's order. */
  custom_fields: Readonly<Record<string, string>>;
}>;

export type FieldDiscovery = {
  discovered_fields: string[];
  custom_fields: string[];
  /** `u_*` field name → number of records carrying it, for fields absent from the first record. */
  extra_fields_seen: Record<string, number>;
};
