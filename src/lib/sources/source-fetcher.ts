import type { AppError } from '@/lib/errors/error';
import type { FetchStats } from '@/lib/http/fetch-stats';

export type SourceName = 'illumio' | 'servicenow';

export type ConnectionTestResult = { ok: true } | { ok: false; error: AppError };

export type FetchResult<T> = {
  records: T[];
  complete: boolean;
  errors: AppError[];
};

/** What each inventory source implements. One instance owns one HTTP session. */
export type SourceFetcher<T> = {
  readonly source: SourceName;
  testConnection: () => Promise<ConnectionTestResult>;
  fetchAll: () => Promise<FetchResult<T>>;
  getStats: () => Readonly<FetchStats>;
  close: () => Promise<void>;
};

/** Runs `fn` and releases the fetcher's connections whatever the outcome. */
export async function withSourceFetcher<T, R>(fetcher: SourceFetcher<T>, fn: (f: SourceFetcher<T>) => Promise<R>) {
  try {
    return await fn(fetcher);
  } finally {
    await fetcher.close();
  }
}
