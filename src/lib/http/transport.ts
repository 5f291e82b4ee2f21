import { Agent, fetch } from 'undici';

export type TransportRequest = {
  method: string;
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
};

export type TransportResult =
  | { ok: true; status: number; retryAfter: string | null; bodyText: string; durationMs: number }
  | { ok: false; reason: 'timeout' | 'transport'; detail: string; durationMs: number };

export type HttpTransport = {
  send: (request: TransportRequest) => Promise<TransportResult>;
  close: () => Promise<void>;
};

/**
 * One connection pool per connector session. `connections` caps sockets per origin,
 * `tlsVerify: false` accepts self-signed PCE/CMDB certificates.
 */
export function createUndiciTransport(input: { connections: number; tlsVerify: boolean }): HttpTransport {
  const agent = new Agent({
    connections: Math.max(1, input.connections),
    connect: { rejectUnauthorized: input.tlsVerify },
  });

  const send = async (request: TransportRequest): Promise<TransportResult> => {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);
    const start = Date.now();

    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        signal: controller.signal,
        dispatcher: agent,
      });
      const bodyText = await res.text();
      return {
        ok: true,
        status: res.status,
        retryAfter: res.headers.get('retry-after'),
        bodyText,
        durationMs: Date.now() - start,
      };
    } catch (err) {
      const durationMs = Date.now() - start;
      if (timedOut) return { ok: false, reason: 'timeout', detail: `timed out after ${request.timeoutMs}ms`, durationMs };
      return { ok: false, reason: 'transport', detail: describeFetchError(err), durationMs };
    } finally {
      clearTimeout(timeout);
    }
  };

  const close = async () => {
    await agent.close();
  };

  return { send, close };
}

function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // undici wraps socket errors as `TypeError: fetch failed` with the real reason in `cause`.
  const cause: unknown = err.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? `${cause.code}: ` : '';
    return `${err.message} (${code}${cause.message})`;
  }
  return err.message;
}
