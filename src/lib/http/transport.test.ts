import { afterEach, describe, expect, it } from 'vitest';

import { createUndiciTransport } from '@/lib/http/transport';
import { sendJson, startMockServer } from '@/test/mock-server';

import type { HttpTransport } from '@/lib/http/transport';
import type { MockServer } from '@/test/mock-server';

describe('createUndiciTransport', () => {
  let server: MockServer | null = null;
  let transport: HttpTransport | null = null;
  const timers: NodeJS.Timeout[] = [];

  afterEach(async () => {
    for (const t of timers.splice(0)) clearTimeout(t);
    await transport?.close();
    transport = null;
    await server?.close();
    server = null;
  });

  it('returns status, Retry-After and the raw body', async () => {
    server = await startMockServer((req, res) => {
      sendJson(res, 429, { method: req.method }, { 'Retry-After': '7' });
    });
    transport = createUndiciTransport({ connections: 2, tlsVerify: true });

    const result = await transport.send({
      method: 'GET',
      url: `${server.origin}/api/v2/orgs/1/workloads`,
      headers: { accept: 'application/json' },
      timeoutMs: 5000,
    });

    expect(result).toMatchObject({ ok: true, status: 429, retryAfter: '7', bodyText: '{"method":"GET"}' });
  });

  it('reports a response slower than timeoutMs as a timeout', async () => {
    server = await startMockServer((_req, res) => {
      timers.push(setTimeout(() => sendJson(res, 200, { late: true }), 1000));
    });
    transport = createUndiciTransport({ connections: 1, tlsVerify: true });

    const result = await transport.send({
      method: 'GET',
      url: `${server.origin}/slow`,
      headers: {},
      timeoutMs: 50,
    });

    expect(result).toMatchObject({ ok: false, reason: 'timeout', detail: 'timed out after 50ms' });
  });

  it('reports a refused connection as a transport error carrying the socket code', async () => {
    const closed = await startMockServer((_req, res) => sendJson(res, 200, {}));
    const origin = closed.origin;
    await closed.close();
    transport = createUndiciTransport({ connections: 1, tlsVerify: true });

    const result = await transport.send({ method: 'GET', url: `${origin}/`, headers: {}, timeoutMs: 5000 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason).toBe('transport');
    expect(result.detail).toMatch(/^fetch failed \(ECONNREFUSED: /);
  });
});
