import { withQuery } from '@/lib/http/url';

import type { ConcurrencyGate } from '@/lib/http/concurrency-gate';
import type { FetchStatsRecorder } from '@/lib/http/fetch-stats';
import type { HttpTransport, TransportResult } from '@/lib/http/transport';
import type { QueryParams } from '@/lib/http/url';
import type { Logger } from '@/lib/logging/logger';

export type RequestOutcome =
  | { kind: 'success'; status: number; payload: unknown }
  | { kind: 'rate_limited'; retryAfterSeconds: number }
  | { kind: 'auth_failed'; status: 401 | 403 }
  | { kind: 'server_error'; status: number }
  | { kind: 'client_error'; status: number; bodyText: string }
  | { kind: 'timeout' }
  | { kind: 'transport_error'; detail: string };

export type FailedOutcome = Exclude<RequestOutcome, { kind: 'success' }>;

export type RetryPolicy = {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
};

export type Sleep = (ms: number) => Promise<void>;

export type RetryingClient = {
  execute: (method: string, url: string, query?: QueryParams) => Promise<RequestOutcome>;
};

export const DEFAULT_RETRY_AFTER_SECONDS = 60;
const BODY_EXCERPT_LIMIT = 200;

// setTimeout fires after 1 ms for any delay above this.
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Waits the full duration, in chunks the timer can hold. */
export const sleep: Sleep = async (ms) => {
  let remaining = ms;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  }
};

export function nextBackoffDelay(currentMs: number, policy: RetryPolicy): number {
  return Math.min(currentMs * policy.backoffMultiplier, policy.maxDelayMs);
}

export function parseRetryAfterSeconds(value: string | null): number {
  if (value === null) return DEFAULT_RETRY_AFTER_SECONDS;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return DEFAULT_RETRY_AFTER_SECONDS;
  return Number(trimmed);
}

export function classifyResponse(result: TransportResult): RequestOutcome {
  if (!result.ok) {
    return result.reason === 'timeout' ? { kind: 'timeout' } : { kind: 'transport_error', detail: result.detail };
  }

  const { status } = result;
  if (status >= 200 && status < 300) {
    try {
      return { kind: 'success', status, payload: JSON.parse(result.bodyText) as unknown };
    } catch (err) {
      return {
        kind: 'transport_error',
        detail: `invalid json body: ${err instanceof Error ? err.message : String(err)}`,
      };
    }
  }
  if (status === 429) return { kind: 'rate_limited', retryAfterSeconds: parseRetryAfterSeconds(result.retryAfter) };
  if (status === 401 || status === 403) return { kind: 'auth_failed', status };
  if (status >= 500) return { kind: 'server_error', status };
  return { kind: 'client_error', status, bodyText: result.bodyText };
}

function redactUrl(url: string): string {
  const u = new URL(url);
  return `${u.origin}${u.pathname}`;
}

/**
 * Issues one logical request with bounded retries.
 *
 * - 2xx: success.
 * - 429: waits out `Retry-After` while holding the slot; counts as an attempt but leaves the
 *   backoff delay where it was.
 * - 401/403 and other 4xx: returned at once.
 * - 5xx, timeouts, socket errors: exponential backoff between attempts.
 */
export function createRetryingClient(input: {
  transport: HttpTransport;
  headers: Record<string, string>;
  timeoutMs: number;
  retry: RetryPolicy;
  gate: ConcurrencyGate;
  stats: FetchStatsRecorder;
  logger: Logger;
  sleep?: Sleep;
}): RetryingClient {
  const wait = input.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(input.retry.maxAttempts));
  const { logger, stats } = input;

  const attemptOnce = (method: string, url: string) =>
    input.gate.run(async () => {
      stats.attempt();
      const result = await input.transport.send({ method, url, headers: input.headers, timeoutMs: input.timeoutMs });
      const outcome = classifyResponse(result);
      if (outcome.kind === 'rate_limited') {
        logger.warn('http.rate_limited', { url: redactUrl(url), retry_after_seconds: outcome.retryAfterSeconds });
        await wait(outcome.retryAfterSeconds * 1000);
      }
      return outcome;
    });

  const execute = async (method: string, url: string, query: QueryParams = {}): Promise<RequestOutcome> => {
    const fullUrl = withQuery(url, query);
    let delayMs = input.retry.initialDelayMs;
    let last: RequestOutcome = { kind: 'transport_error', detail: 'no attempt made' };

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const outcome = await attemptOnce(method, fullUrl);
      last = outcome;

      switch (outcome.kind) {
        case 'success':
          stats.success();
          return outcome;
        case 'rate_limited':
          stats.retry();
          continue;
        case 'auth_failed':
          logger.error('http.auth_failed', { url: redactUrl(fullUrl), status: outcome.status });
          stats.failure();
          return outcome;
        case 'client_error':
          logger.error('http.client_error', {
            url: redactUrl(fullUrl),
            status: outcome.status,
            body_excerpt: outcome.bodyText.slice(0, BODY_EXCERPT_LIMIT),
          });
          stats.failure();
          return outcome;
        case 'server_error':
        case 'timeout':
        case 'transport_error':
          logger.warn('http.retryable_failure', {
            url: redactUrl(fullUrl),
            outcome: outcome.kind,
            ...(outcome.kind === 'server_error' ? { status: outcome.status } : {}),
            ...(outcome.kind === 'transport_error' ? { cause: outcome.detail } : {}),
            attempt: attempt + 1,
            max_attempts: maxAttempts,
          });
          stats.retry();
          break;
      }

      if (attempt < maxAttempts - 1) {
        await wait(delayMs);
        delayMs = nextBackoffDelay(delayMs, input.retry);
      }
    }

    stats.failure();
    logger.error('http.attempts_exhausted', { url: redactUrl(fullUrl), max_attempts: maxAttempts, outcome: last.kind });
    return last;
  };

  return { execute };
}
