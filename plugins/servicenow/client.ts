import { encodeBasicAuth, joinUrl } from '@/lib/http/url';

import type { PageRequest } from '@/lib/http/paginator';
import type { ServiceNowConfig } from './types';

const BEARER_KEY_MIN_LENGTH = 100;

export type ServiceNowAuthScheme = 'basic' | 'bearer';

/** Interactive users get Basic auth; e-mail style integration users and long keys are treated as tokens. */
export function chooseAuthScheme(config: Pick<ServiceNowConfig, 'api_user' | 'api_key'>): ServiceNowAuthScheme {
  return !config.api_user.includes('@') && config.api_key.length < BEARER_KEY_MIN_LENGTH ? 'basic' : 'bearer';
}

export function servicenowHeaders(config: Pick<ServiceNowConfig, 'api_user' | 'api_key'>): Record<string, string> {
  const authorization =
    chooseAuthScheme(config) === 'basic'
      ? `Basic ${encodeBasicAuth(config.api_user, config.api_key)}`
      : `Bearer ${config.api_key}`;
  return { accept: 'application/json', authorization };
}

export function tableUrl(config: Pick<ServiceNowConfig, 'instance_url' | 'table'>): string {
  return joinUrl(config.instance_url, `/api/now/table/${encodeURIComponent(config.table)}`);
}

/** Table API pages are `{ result: [...] }`; the last page can be full, so a short round ends the fetch. */
export function tablePageRequest(url: string, pageSize: number, query: string | null): PageRequest {
  return {
    url,
    pageSize,
    params: query ? { sysparm_query: query } : {},
    offsetParam: 'sysparm_offset',
    limitParam: 'sysparm_limit',
    shape: { kind: 'field', dataKey: 'result' },
    stopOnShortBatch: true,
  };
}
