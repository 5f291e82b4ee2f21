import { mkdtempSync, readFileSync, readdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, formatLocalDate, logEvent, parseLogLevel } from '@/lib/logging/logger';

describe('logEvent', () => {
  it('emits a single JSON line and truncates *_excerpt fields', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logEvent({
      level: 'info',
      service: 'servicenow',
      event_type: 'http.response',
      status: 500,
      body_excerpt: 'x'.repeat(3000),
    });

    expect(spy).toHaveBeenCalledTimes(1);
    const line = spy.mock.calls[0]?.[0];
    expect(typeof line).toBe('string');

    const obj = JSON.parse(String(line)) as Record<string, unknown>;
    expect(obj.event_type).toBe('http.response');
    expect(obj.status).toBe(500);
    expect(typeof obj.ts).toBe('string');
    expect(String(obj.body_excerpt).length).toBe(2000);

    spy.mockRestore();
  });
});

describe('createLogger', () => {
  it('drops events below the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger({ service: 'cli', level: 'warn', write: (l) => lines.push(l) });

    logger.debug('run.debug');
    logger.info('run.info');
    logger.warn('run.warn', { attempt: 2 });
    logger.error('run.error');

    expect(lines.map((l) => (JSON.parse(l) as { event_type: string }).event_type)).toEqual(['run.warn', 'run.error']);
  });

  it('keeps level and service from the logger, not from fields', () => {
    const lines: string[] = [];
    const logger = createLogger({ service: 'cli', write: (l) => lines.push(l) }).child('illumio');

    logger.info('fetch.start', { level: 'error', service: 'report', endpoint: '/workloads' });

    const obj = JSON.parse(lines[0] ?? '{}') as Record<string, unknown>;
    expect(obj.level).toBe('info');
    expect(obj.service).toBe('illumio');
    expect(obj.endpoint).toBe('/workloads');
  });

  it('mirrors events to a daily jsonl file when a dir is set', () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'reconcile-log-'));
    const fixed = new Date(2026, 2, 4, 10, 0, 0);
    const logger = createLogger({ service: 'reconcile', dir, now: () => fixed, write: () => {} });

    logger.info('reconcile.done', { records: 3 });

    const files = readdirSync(dir);
    expect(files).toEqual([`reconcile-${formatLocalDate(fixed)}.jsonl`]);
    const content = readFileSync(path.join(dir, files[0] ?? ''), 'utf8').trim();
    expect(JSON.parse(content)).toMatchObject({ event_type: 'reconcile.done', records: 3, level: 'info' });
  });
});

describe('parseLogLevel', () => {
  it('accepts upper-case names and the WARNING alias', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('WARNING')).toBe('warn');
    expect(parseLogLevel('verbose')).toBeNull();
  });
});

describe('buildLogEvent env', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('takes env from the validated server environment', async () => {
    vi.stubEnv('NODE_ENV', 'production');
    vi.resetModules();
    const { buildLogEvent } = await import('@/lib/logging/logger');

    const event = buildLogEvent({ event_type: 'run.start', level: 'info', service: 'cli' });
    expect(event.env).toBe('production');
  });

  it('falls back to development for an unknown NODE_ENV', async () => {
    vi.stubEnv('NODE_ENV', 'staging');
    vi.resetModules();
    const { buildLogEvent } = await import('@/lib/logging/logger');

    expect(buildLogEvent({ event_type: 'run.start', level: 'info', service: 'cli' }).env).toBe('development');
  });
});
