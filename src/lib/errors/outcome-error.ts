import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError } from '@/lib/errors/error';
import type { PaginatedResult } from '@/lib/http/paginator';
import type { FailedOutcome } from '@/lib/http/retrying-client';
import type { SourceName } from '@/lib/sources/source-fetcher';

const EXCERPT_LIMIT = 500;

const authCodes = {
  illumio: { 401: ErrorCode.ILLUMIO_AUTH_FAILED, 403: ErrorCode.ILLUMIO_PERMISSION_DENIED },
  servicenow: { 401: ErrorCode.SERVICENOW_AUTH_FAILED, 403: ErrorCode.SERVICENOW_PERMISSION_DENIED },
} as const;

const connectionCodes = {
  illumio: ErrorCode.ILLUMIO_CONNECTION_FAILED,
  servicenow: ErrorCode.SERVICENOW_CONNECTION_FAILED,
} as const;

const fetchCodes = {
  illumio: ErrorCode.ILLUMIO_FETCH_FAILED,
  servicenow: ErrorCode.SERVICENOW_FETCH_FAILED,
} as const;

export function outcomeToAppError(outcome: FailedOutcome, ctx: { source: SourceName; stage: string }): AppError {
  const base = { source: ctx.source, stage: ctx.stage };

  switch (outcome.kind) {
    case 'auth_failed':
      return {
        code: authCodes[ctx.source][outcome.status],
        category: outcome.status === 401 ? 'auth' : 'permission',
        message: outcome.status === 401 ? 'authentication failed' : 'permission denied',
        retryable: false,
        redacted_context: { ...base, status: outcome.status },
      };
    case 'rate_limited':
      return {
        code: ErrorCode.HTTP_RATE_LIMITED,
        category: 'rate_limit',
        message: `rate limited (retry after ${outcome.retryAfterSeconds}s)`,
        retryable: true,
        redacted_context: { ...base, retry_after_seconds: outcome.retryAfterSeconds },
      };
    case 'server_error':
      return {
        code: ErrorCode.HTTP_SERVER_ERROR,
        category: 'network',
        message: `server error (HTTP ${outcome.status})`,
        retryable: true,
        redacted_context: { ...base, status: outcome.status },
      };
    case 'client_error':
      return {
        code: ErrorCode.HTTP_CLIENT_ERROR,
        category: 'network',
        message: `request rejected (HTTP ${outcome.status})`,
        retryable: false,
        redacted_context: { ...base, status: outcome.status, body_excerpt: outcome.bodyText.slice(0, EXCERPT_LIMIT) },
      };
    case 'timeout':
      return {
        code: ErrorCode.HTTP_TIMEOUT,
        category: 'network',
        message: 'request timed out',
        retryable: true,
        redacted_context: base,
      };
    case 'transport_error':
      return {
        code: ErrorCode.HTTP_NETWORK_ERROR,
        category: 'network',
        message: outcome.detail,
        retryable: true,
        redacted_context: base,
      };
  }
}

/** Connection-test failure: auth keeps its own code, everything else is `<SOURCE>_CONNECTION_FAILED`. */
export function connectionError(outcome: FailedOutcome, source: SourceName): AppError {
  const mapped = outcomeToAppError(outcome, { source, stage: 'connection_test' });
  if (outcome.kind === 'auth_failed') return mapped;
  return { ...mapped, code: connectionCodes[source], message: `connection test failed: ${mapped.message}` };
}

/** Errors to report for one paginated collection that still produced a usable result. */
export function paginationErrors(result: PaginatedResult, ctx: { source: SourceName; stage: string }): AppError[] {
  if (result.failure) return [outcomeToAppError(result.failure, ctx)];
  if (result.pagesFailed === 0) return [];
  return [
    {
      code: fetchCodes[ctx.source],
      category: 'network',
      message: `${result.pagesFailed} of ${result.pagesRequested} ${ctx.stage} pages failed`,
      retryable: true,
      redacted_context: {
        source: ctx.source,
        stage: ctx.stage,
        pages_failed: result.pagesFailed,
        pages_requested: result.pagesRequested,
      },
    },
  ];
}
