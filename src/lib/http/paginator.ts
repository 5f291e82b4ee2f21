import type { QueryParams } from '@/lib/http/url';
import type { FailedOutcome, RetryingClient } from '@/lib/http/retrying-client';
import type { Logger } from '@/lib/logging/logger';

export type RawItem = Record<string, unknown>;

/** Where the item array lives in a page response. */
export type PageShape = { kind: 'array' } | { kind: 'field'; dataKey: string; totalKey?: string };

export type PageRequest = {
  url: string;
  pageSize: number;
  params?: QueryParams;
  offsetParam: string;
  limitParam: string;
  shape: PageShape;
  /** End when a round returns less than a full round of items, for endpoints whose last page may be full. */
  stopOnShortBatch?: boolean;
};

export type PaginatedResult = {
  items: RawItem[];
  pagesRequested: number;
  pagesFailed: number;
  complete: boolean;
  /** Outcome that ended pagination early: a failed first page or an auth failure. */
  failure: FailedOutcome | null;
};

export type Paginator = {
  fetchAll: (request: PageRequest) => Promise<PaginatedResult>;
};

export type UnwrappedPage = { items: RawItem[]; received: number; total: number | null };

function isRecord(value: unknown): value is RawItem {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function toTotal(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

export function unwrapPage(payload: unknown, shape: PageShape): UnwrappedPage {
  let raw: unknown = payload;
  let total: number | null = null;
  if (shape.kind === 'field') {
    raw = isRecord(payload) ? payload[shape.dataKey] : undefined;
    if (shape.totalKey && isRecord(payload)) total = toTotal(payload[shape.totalKey]);
  }
  if (!Array.isArray(raw)) return { items: [], received: 0, total };
  return { items: raw.filter(isRecord), received: raw.length, total };
}

/**
 * Offset pagination with a fan-out window of `maxConcurrent` pages per round.
 * Page 0 is fetched alone; later rounds run in parallel and arrive in any order.
 */
export function createPaginator(input: { client: RetryingClient; maxConcurrent: number; logger: Logger }): Paginator {
  const window = Math.max(1, Math.floor(input.maxConcurrent));
  const { client, logger } = input;

  const fetchAll = async (request: PageRequest): Promise<PaginatedResult> => {
    const pageSize = Math.max(1, Math.floor(request.pageSize));
    const fetchPage = (offset: number) =>
      client.execute('GET', request.url, {
        ...request.params,
        [request.limitParam]: pageSize,
        [request.offsetParam]: offset,
      });

    const first = await fetchPage(0);
    if (first.kind !== 'success') {
      logger.error('pagination.first_page_failed', { url: request.url, outcome: first.kind });
      return { items: [], pagesRequested: 1, pagesFailed: 1, complete: false, failure: first };
    }

    const firstPage = unwrapPage(first.payload, request.shape);
    const items = [...firstPage.items];
    let total = firstPage.total;
    let pagesRequested = 1;
    let pagesFailed = 0;
    let failure: FailedOutcome | null = null;

    if (firstPage.received < pageSize) {
      return { items, pagesRequested, pagesFailed, complete: true, failure };
    }

    let nextOffset = pageSize;
    for (;;) {
      const offsets: number[] = [];
      for (let i = 0; i < window; i += 1) {
        const offset = nextOffset + i * pageSize;
        if (total !== null && offset >= total) break;
        offsets.push(offset);
      }
      if (offsets.length === 0) break;
      nextOffset += offsets.length * pageSize;
      pagesRequested += offsets.length;

      const outcomes = await Promise.all(offsets.map((offset) => fetchPage(offset)));

      let received = 0;
      for (const [i, outcome] of outcomes.entries()) {
        if (outcome.kind === 'success') {
          const page = unwrapPage(outcome.payload, request.shape);
          items.push(...page.items);
          received += page.received;
          if (page.total !== null) total = page.total;
          continue;
        }
        pagesFailed += 1;
        logger.warn('pagination.page_failed', { url: request.url, offset: offsets[i], outcome: outcome.kind });
        if (outcome.kind === 'auth_failed' && !failure) failure = outcome;
      }

      logger.debug('pagination.round', {
        url: request.url,
        pages: offsets.length,
        received,
        total_items: items.length,
      });

      if (failure) break;
      if (received === 0) break;
      if (request.stopOnShortBatch && received < offsets.length * pageSize) break;
    }

    return { items, pagesRequested, pagesFailed, complete: pagesFailed === 0 && !failure, failure };
  };

  return { fetchAll };
}
