import { encodeBasicAuth, joinUrl } from '@/lib/http/url';

import type { PageRequest } from '@/lib/http/paginator';
import type { IllumioConfig } from './types';

export function illumioBaseUrl(config: Pick<IllumioConfig, 'pce_url' | 'port' | 'org_id'>): string {
  return `${config.pce_url.replace(/\/+$/, '')}:${config.port}/api/v2/orgs/${encodeURIComponent(config.org_id)}`;
}

export function illumioHeaders(config: Pick<IllumioConfig, 'api_user' | 'api_secret'>): Record<string, string> {
  return {
    accept: 'application/json',
    authorization: `Basic ${encodeBasicAuth(config.api_user, config.api_secret)}`,
  };
}

/** PCE collections return a bare JSON array and no total count. */
export function illumioPageRequest(baseUrl: string, path: '/labels' | '/workloads', pageSize: number): PageRequest {
  return {
    url: joinUrl(baseUrl, path),
    pageSize,
    offsetParam: 'offset',
    limitParam: 'max_results',
    shape: { kind: 'array' },
  };
}
