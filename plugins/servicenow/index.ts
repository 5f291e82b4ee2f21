import { AppErrorException } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';
import { connectionError, outcomeToAppError, paginationErrors } from '@/lib/errors/outcome-error';
import { openHttpSession } from '@/lib/http/session';

import { chooseAuthScheme, servicenowHeaders, tablePageRequest, tableUrl } from './client';
import { discoverFields, extraCustomFields, normalizeServer } from './normalize';
import { buildOperatingEntityQuery } from './query';

import type { HostnameCase } from '@/lib/hostname/normalize';
import type { RetryPolicy, Sleep } from '@/lib/http/retrying-client';
import type { HttpTransport } from '@/lib/http/transport';
import type { Logger } from '@/lib/logging/logger';
import type { ConnectionTestResult, FetchResult, SourceFetcher } from '@/lib/sources/source-fetcher';
import type { FieldDiscovery, ServerRecord, ServiceNowConfig } from './types';

export type { FieldDiscovery, ServerRecord, ServiceNowConfig } from './types';

export type ServiceNowFetcherOptions = {
  config: ServiceNowConfig;
  operatingEntityFilter?: string;
  retry: RetryPolicy;
  hostnameCase: HostnameCase;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
  transport?: HttpTransport;
};

export type ServiceNowFetcher = SourceFetcher<ServerRecord>;

export function createServiceNowFetcher(options: ServiceNowFetcherOptions): ServiceNowFetcher {
  const { config } = options;
  const logger = options.logger.child('servicenow');
  const url = tableUrl(config);
  const query = buildOperatingEntityQuery(options.operatingEntityFilter);
  const session = openHttpSession({
    headers: servicenowHeaders(config),
    maxConcurrent: config.max_concurrent_requests,
    timeoutMs: config.timeout_seconds * 1000,
    tlsVerify: config.tls_verify,
    retry: options.retry,
    logger,
    sleep: options.sleep,
    now: options.now,
    transport: options.transport,
  });

  const testConnection = async (): Promise<ConnectionTestResult> => {
    const outcome = await session.client.execute('GET', url, { sysparm_limit: 1 });
    if (outcome.kind !== 'success') {
      const error = connectionError(outcome, 'servicenow');
      logger.error('servicenow.connection_failed', { table: config.table, code: error.code, message: error.message });
      return { ok: false, error };
    }

    const payload = outcome.payload;
    if (!payload || typeof payload !== 'object' || !('result' in payload)) {
      logger.error('servicenow.connection_failed', { table: config.table, reason: 'missing result field' });
      return {
        ok: false,
        error: {
          code: ErrorCode.SERVICENOW_CONNECTION_FAILED,
          category: 'parse',
          message: 'connection test failed: response has no result field',
          retryable: false,
          redacted_context: { source: 'servicenow', stage: 'connection_test', table: config.table },
        },
      };
    }

    logger.info('servicenow.connection_ok', { table: config.table, auth_scheme: chooseAuthScheme(config) });
    return { ok: true };
  };

  const fetchAll = async (): Promise<FetchResult<ServerRecord>> => {
    logger.info('servicenow.fetch_start', {
      table: config.table,
      ...(options.operatingEntityFilter ? { operating_entity_filter: options.operatingEntityFilter } : {}),
    });

    const result = await session.paginator.fetchAll(tablePageRequest(url, config.page_size, query));
    if (result.failure) {
      throw new AppErrorException(outcomeToAppError(result.failure, { source: 'servicenow', stage: 'servers' }));
    }

    const found = discoverFields(result.items[0]);
    const known = new Set(found.custom_fields);
    const extra: Record<string, number> = {};
    for (const raw of result.items) {
      for (const key of extraCustomFields(raw, known)) extra[key] = (extra[key] ?? 0) + 1;
    }
    const discovery: FieldDiscovery = { ...found, extra_fields_seen: extra };
    logger.info('servicenow.fields_discovered', discovery);
    if (Object.keys(extra).length > 0) {
      logger.warn('servicenow.extra_fields_seen', { fields: extra });
    }

    const records = result.items.map((raw) => normalizeServer(raw, found.custom_fields, options.hostnameCase));
    const errors = paginationErrors(result, { source: 'servicenow', stage: 'servers' });
    logger.info('servicenow.servers_fetched', {
      servers: records.length,
      pages: result.pagesRequested,
      pages_failed: result.pagesFailed,
    });

    return { records, complete: errors.length === 0, errors };
  };

  return {
    source: 'servicenow',
    testConnection,
    fetchAll,
    getStats: session.stats,
    close: session.close,
  };
}
