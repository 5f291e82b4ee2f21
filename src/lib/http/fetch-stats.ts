export type FetchStats = {
  requests_made: number;
  requests_successful: number;
  requests_failed: number;
  retries: number;
  start_time: string | null;
  end_time: string | null;
  duration_seconds: number | null;
};

export type FetchStatsRecorder = {
  begin: () => void;
  end: () => void;
  attempt: () => void;
  success: () => void;
  failure: () => void;
  retry: () => void;
  isClosed: () => boolean;
  snapshot: () => Readonly<FetchStats>;
};

/**
 * Counters owned by one connector session. Once `end()` has been called the
 * counters no longer change, so snapshots taken afterwards are final.
 */
export function createFetchStatsRecorder(now: () => Date = () => new Date()): FetchStatsRecorder {
  let startedAt: Date | null = null;
  let endedAt: Date | null = null;
  const counts = { requests_made: 0, requests_successful: 0, requests_failed: 0, retries: 0 };

  function bump(key: keyof typeof counts) {
    if (endedAt) return;
    counts[key] += 1;
  }

  return {
    begin: () => {
      if (!startedAt) startedAt = now();
    },
    end: () => {
      if (!endedAt) endedAt = now();
    },
    attempt: () => bump('requests_made'),
    success: () => bump('requests_successful'),
    failure: () => bump('requests_failed'),
    retry: () => bump('retries'),
    isClosed: () => endedAt !== null,
    snapshot: () =>
      Object.freeze({
        ...counts,
        start_time: startedAt ? startedAt.toISOString() : null,
        end_time: endedAt ? endedAt.toISOString() : null,
        duration_seconds:
          startedAt && endedAt ? (endedAt.getTime() - startedAt.getTime()) / 1000 : null,
      }),
  };
}
