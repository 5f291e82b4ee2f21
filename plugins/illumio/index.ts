import { AppErrorException } from '@/lib/errors/error';
import { connectionError, outcomeToAppError, paginationErrors } from '@/lib/errors/outcome-error';
import { openHttpSession } from '@/lib/http/session';
import { joinUrl } from '@/lib/http/url';

import { illumioBaseUrl, illumioHeaders, illumioPageRequest } from './client';
import { buildLabelDictionary, normalizeWorkload } from './normalize';

import type { AppError } from '@/lib/errors/error';
import type { HostnameCase } from '@/lib/hostname/normalize';
import type { RetryPolicy, Sleep } from '@/lib/http/retrying-client';
import type { HttpTransport } from '@/lib/http/transport';
import type { Logger } from '@/lib/logging/logger';
import type { ConnectionTestResult, SourceFetcher } from '@/lib/sources/source-fetcher';
import type { IllumioConfig, LabelDictionary, WorkloadRecord } from './types';

export type { IllumioConfig, LabelDictionary, VenStatus, WorkloadRecord } from './types';

export type IllumioFetcherOptions = {
  config: IllumioConfig;
  retry: RetryPolicy;
  hostnameCase: HostnameCase;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
  transport?: HttpTransport;
};

export type IllumioFetcher = SourceFetcher<WorkloadRecord> & {
  fetchLabels: () => Promise<{ labels: LabelDictionary; errors: AppError[] }>;
};

export function createIllumioFetcher(options: IllumioFetcherOptions): IllumioFetcher {
  const { config } = options;
  const logger = options.logger.child('illumio');
  const baseUrl = illumioBaseUrl(config);
  const session = openHttpSession({
    headers: illumioHeaders(config),
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
    const outcome = await session.client.execute('GET', joinUrl(baseUrl, '/workloads'), { max_results: 1 });
    if (outcome.kind === 'success') {
      logger.info('illumio.connection_ok', { base_url: baseUrl });
      return { ok: true };
    }
    const error = connectionError(outcome, 'illumio');
    logger.error('illumio.connection_failed', { base_url: baseUrl, code: error.code, message: error.message });
    return { ok: false, error };
  };

  const fetchLabels = async () => {
    const result = await session.paginator.fetchAll(illumioPageRequest(baseUrl, '/labels', config.page_size));
    if (result.failure?.kind === 'auth_failed') {
      throw new AppErrorException(outcomeToAppError(result.failure, { source: 'illumio', stage: 'labels' }));
    }
    const labels = buildLabelDictionary(result.items);
    logger.info('illumio.labels_fetched', { labels: labels.size, pages: result.pagesRequested });
    return { labels, errors: paginationErrors(result, { source: 'illumio', stage: 'labels' }) };
  };

  const fetchAll = async () => {
    const { labels, errors } = await fetchLabels();
    if (errors.length > 0) logger.warn('illumio.labels_incomplete', { errors: errors.map((e) => e.code) });

    const result = await session.paginator.fetchAll(illumioPageRequest(baseUrl, '/workloads', config.page_size));
    if (result.failure) {
      throw new AppErrorException(outcomeToAppError(result.failure, { source: 'illumio', stage: 'workloads' }));
    }

    const records = result.items.map((raw) => normalizeWorkload(raw, labels, options.hostnameCase));
    errors.push(...paginationErrors(result, { source: 'illumio', stage: 'workloads' }));
    logger.info('illumio.workloads_fetched', {
      workloads: records.length,
      pages: result.pagesRequested,
      pages_failed: result.pagesFailed,
    });

    return { records, complete: errors.length === 0, errors };
  };

  return {
    source: 'illumio',
    testConnection,
    fetchLabels,
    fetchAll,
    getStats: session.stats,
    close: session.close,
  };
}
