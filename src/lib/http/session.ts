import { createConcurrencyGate } from '@/lib/http/concurrency-gate';
import { createFetchStatsRecorder } from '@/lib/http/fetch-stats';
import { createPaginator } from '@/lib/http/paginator';
import { createRetryingClient } from '@/lib/http/retrying-client';
import { createUndiciTransport } from '@/lib/http/transport';

import type { FetchStats } from '@/lib/http/fetch-stats';
import type { Paginator } from '@/lib/http/paginator';
import type { RetryPolicy, RetryingClient, Sleep } from '@/lib/http/retrying-client';
import type { HttpTransport } from '@/lib/http/transport';
import type { Logger } from '@/lib/logging/logger';

export type HttpSessionOptions = {
  headers: Record<string, string>;
  maxConcurrent: number;
  timeoutMs: number;
  tlsVerify: boolean;
  retry: RetryPolicy;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
  transport?: HttpTransport;
};

export type HttpSession = {
  client: RetryingClient;
  paginator: Paginator;
  stats: () => Readonly<FetchStats>;
  close: () => Promise<void>;
};

/**
 * One connection pool, one concurrency gate and one stats recorder for a connector's lifetime.
 * Callers must `close()` on every exit path; requests after that are refused without being sent.
 */
export function openHttpSession(options: HttpSessionOptions): HttpSession {
  const transport =
    options.transport ?? createUndiciTransport({ connections: options.maxConcurrent, tlsVerify: options.tlsVerify });
  const gate = createConcurrencyGate(options.maxConcurrent);
  const recorder = createFetchStatsRecorder(options.now);
  recorder.begin();

  let closed = false;
  const retrying = createRetryingClient({
    transport,
    headers: options.headers,
    timeoutMs: options.timeoutMs,
    retry: options.retry,
    gate,
    stats: recorder,
    logger: options.logger,
    sleep: options.sleep,
  });
  const client: RetryingClient = {
    execute: async (method, url, query) => {
      if (closed) return { kind: 'transport_error', detail: 'session closed' };
      return retrying.execute(method, url, query);
    },
  };
  const paginator = createPaginator({ client, maxConcurrent: gate.limit, logger: options.logger });

  const close = async () => {
    if (closed) return;
    closed = true;
    recorder.end();
    await transport.close();
  };

  return { client, paginator, stats: () => recorder.snapshot(), close };
}
