import { describe, expect, it } from 'vitest';

import { createPaginator, unwrapPage } from '@/lib/http/paginator';
import { silentLogger } from '@/lib/logging/logger';

import type { PageRequest } from '@/lib/http/paginator';
import type { RequestOutcome, RetryingClient } from '@/lib/http/retrying-client';
import type { QueryParams } from '@/lib/http/url';

type Wrap = (items: Array<{ id: number }>) => unknown;

function fakeClient(
  count: number,
  wrap: Wrap,
  overrides: Record<number, RequestOutcome> = {},
  params = { offset: 'offset', limit: 'max_results' },
) {
  const data = Array.from({ length: count }, (_, id) => ({ id }));
  const offsets: number[] = [];
  const client: RetryingClient = {
    execute: async (_method: string, _url: string, query: QueryParams = {}) => {
      const offset = Number(query[params.offset]);
      const limit = Number(query[params.limit]);
      offsets.push(offset);
      const override = overrides[offset];
      if (override) return override;
      return { kind: 'success', status: 200, payload: wrap(data.slice(offset, offset + limit)) };
    },
  };
  return { client, offsets };
}

const arrayRequest: PageRequest = {
  url: 'https://pce.example.test/api/v2/orgs/1/workloads',
  pageSize: 2,
  offsetParam: 'offset',
  limitParam: 'max_results',
  shape: { kind: 'array' },
};

function ids(items: Array<Record<string, unknown>>) {
  return items.map((i) => Number(i.id)).sort((a, b) => a - b);
}

describe('createPaginator', () => {
  it('drains an array endpoint until a round yields nothing', async () => {
    const { client, offsets } = fakeClient(5, (items) => items);
    const paginator = createPaginator({ client, maxConcurrent: 2, logger: silentLogger });

    const result = await paginator.fetchAll(arrayRequest);

    expect(ids(result.items)).toEqual([0, 1, 2, 3, 4]);
    expect(offsets).toEqual([0, 2, 4, 6, 8]);
    expect(result).toMatchObject({ pagesRequested: 5, pagesFailed: 0, complete: true, failure: null });
  });

  it('returns a short first page without fanning out', async () => {
    const { client, offsets } = fakeClient(1, (items) => items);
    const paginator = createPaginator({ client, maxConcurrent: 4, logger: silentLogger });

    const result = await paginator.fetchAll(arrayRequest);

    expect(ids(result.items)).toEqual([0]);
    expect(offsets).toEqual([0]);
  });

  it('stops on a short round when asked to', async () => {
    const { client, offsets } = fakeClient(5, (items) => ({ result: items }), {}, {
      offset: 'sysparm_offset',
      limit: 'sysparm_limit',
    });
    const paginator = createPaginator({ client, maxConcurrent: 3, logger: silentLogger });

    const result = await paginator.fetchAll({
      url: 'https://cmdb.example.test/api/now/table/cmdb_ci_server',
      pageSize: 2,
      params: { sysparm_query: 'companyLIKEAcme' },
      offsetParam: 'sysparm_offset',
      limitParam: 'sysparm_limit',
      shape: { kind: 'field', dataKey: 'result' },
      stopOnShortBatch: true,
    });

    expect(ids(result.items)).toEqual([0, 1, 2, 3, 4]);
    expect(offsets).toEqual([0, 2, 4, 6]);
    expect(result.pagesRequested).toBe(4);
  });

  it('does not request offsets beyond a reported total', async () => {
    const { client, offsets } = fakeClient(5, (items) => ({ data: items, total: 5 }));
    const paginator = createPaginator({ client, maxConcurrent: 3, logger: silentLogger });

    const result = await paginator.fetchAll({
      ...arrayRequest,
      shape: { kind: 'field', dataKey: 'data', totalKey: 'total' },
    });

    expect(ids(result.items)).toEqual([0, 1, 2, 3, 4]);
    expect(offsets).toEqual([0, 2, 4]);
  });

  it('returns nothing when the first page fails', async () => {
    const { client } = fakeClient(5, (items) => items, { 0: { kind: 'server_error', status: 503 } });
    const paginator = createPaginator({ client, maxConcurrent: 2, logger: silentLogger });

    const result = await paginator.fetchAll(arrayRequest);

    expect(result).toEqual({
      items: [],
      pagesRequested: 1,
      pagesFailed: 1,
      complete: false,
      failure: { kind: 'server_error', status: 503 },
    });
  });

  it('skips a failed page inside a round and keeps going', async () => {
    const { client, offsets } = fakeClient(7, (items) => items, { 2: { kind: 'timeout' } });
    const paginator = createPaginator({ client, maxConcurrent: 2, logger: silentLogger });

    const result = await paginator.fetchAll(arrayRequest);

    expect(ids(result.items)).toEqual([0, 1, 4, 5, 6]);
    expect(offsets).toEqual([0, 2, 4, 6, 8, 10, 12]);
    expect(result).toMatchObject({ pagesFailed: 1, complete: false, failure: null });
  });

  it('stops after a round with an auth failure', async () => {
    const { client, offsets } = fakeClient(9, (items) => items, { 4: { kind: 'auth_failed', status: 401 } });
    const paginator = createPaginator({ client, maxConcurrent: 2, logger: silentLogger });

    const result = await paginator.fetchAll(arrayRequest);

    expect(ids(result.items)).toEqual([0, 1, 2, 3]);
    expect(offsets).toEqual([0, 2, 4]);
    expect(result.failure).toEqual({ kind: 'auth_failed', status: 401 });
  });

  it('never returns duplicates for any page size', async () => {
    for (const pageSize of [1, 2, 3, 7, 50]) {
      const { client } = fakeClient(23, (items) => items);
      const paginator = createPaginator({ client, maxConcurrent: 3, logger: silentLogger });
      const result = await paginator.fetchAll({ ...arrayRequest, pageSize });
      expect(ids(result.items)).toEqual(Array.from({ length: 23 }, (_, i) => i));
    }
  });
});

describe('unwrapPage', () => {
  it('counts raw entries but keeps only objects', () => {
    expect(unwrapPage({ result: [{ a: 1 }, 'x', null] }, { kind: 'field', dataKey: 'result' })).toEqual({
      items: [{ a: 1 }],
      received: 3,
      total: null,
    });
  });

  it('treats a missing data field as an empty page', () => {
    expect(unwrapPage({ error: 'x' }, { kind: 'field', dataKey: 'result' })).toEqual({
      items: [],
      received: 0,
      total: null,
    });
  });
});
