import { mkdirSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { serverEnv } from '@/lib/env/server';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type ServiceName = 'cli' | 'illumio' | 'servicenow' | 'reconcile' | 'report';

export type LogEventInput = {
  event_type: string;
  level: LogLevel;
  service: ServiceName;
  message?: string;
} & Record<string, unknown>;

export type LogFields = Record<string, unknown>;

export type Logger = {
  debug: (eventType: string, fields?: LogFields) => void;
  info: (eventType: string, fields?: LogFields) => void;
  warn: (eventType: string, fields?: LogFields) => void;
  error: (eventType: string, fields?: LogFields) => void;
  child: (service: ServiceName) => Logger;
};

export type LoggerOptions = {
  service: ServiceName;
  level?: LogLevel;
  dir?: string;
  retainDays?: number;
  now?: () => Date;
  write?: (line: string) => void;
};

const EXCERPT_LIMIT = 2000;
const LOG_FILE_PREFIX = 'reconcile-';
const LOG_FILE_SUFFIX = '.jsonl';

function getEnv() {
  // Unvalidated when SKIP_ENV_VALIDATION is set.
  const env: string | undefined = serverEnv.NODE_ENV;
  if (env === 'production' || env === 'test' || env === 'development') return env;
  return 'development';
}

function getVersion() {
  return process.env.GIT_SHA ?? 'unknown';
}

export function levelRank(level: LogLevel): number {
  if (level === 'debug') return 10;
  if (level === 'info') return 20;
  if (level === 'warn') return 30;
  return 40;
}

export function parseLogLevel(value: unknown): LogLevel | null {
  if (typeof value !== 'string') return null;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return null;
}

function truncateExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => truncateExcerptsDeep(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (key.endsWith('_excerpt') && typeof value === 'string') {
      out[key] = value.length > EXCERPT_LIMIT ? value.slice(0, EXCERPT_LIMIT) : value;
      continue;
    }
    out[key] = truncateExcerptsDeep(value);
  }
  return out;
}

function safeJsonLine(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return JSON.stringify({ ts: new Date().toISOString(), level: 'error', message: 'log serialization failed' });
  }
}

export function formatLocalDate(d: Date): string {
  const yyyy = String(d.getFullYear()).padStart(4, '0');
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

export function buildLogEvent(input: LogEventInput, now: Date = new Date()): Record<string, unknown> {
  const base = {
    ts: now.toISOString(),
    env: getEnv(),
    version: getVersion(),
    ...input,
  };
  const event = truncateExcerptsDeep(base);
  return event && typeof event === 'object' && !Array.isArray(event) ? { ...event } : base;
}

export function logEvent(input: LogEventInput) {
  console.log(safeJsonLine(buildLogEvent(input)));
}

function cleanupOldLogs(logDir: string, retainDays: number, nowMs: number) {
  if (!Number.isFinite(retainDays) || retainDays <= 0) return;

  const cutoffMs = nowMs - retainDays * 24 * 60 * 60 * 1000;
  try {
    for (const entry of readdirSync(logDir, { withFileTypes: true })) {
      if (!entry.isFile()) continue;
      if (!entry.name.startsWith(LOG_FILE_PREFIX) || !entry.name.endsWith(LOG_FILE_SUFFIX)) continue;

      const full = path.join(logDir, entry.name);
      try {
        if (statSync(full).mtimeMs < cutoffMs) rmSync(full, { force: true });
      } catch {
        // a file removed concurrently is fine
      }
    }
  } catch {
    // unreadable log dir: keep logging to stdout only
  }
}

function ensureDir(dir: string): boolean {
  try {
    mkdirSync(dir, { recursive: true });
    return true;
  } catch {
    return false;
  }
}

export function createLogger(options: LoggerOptions): Logger {
  const now = options.now ?? (() => new Date());
  const write = options.write ?? ((line: string) => console.log(line));
  const minRank = levelRank(options.level ?? 'info');

  let logDir = options.dir ?? '';
  if (logDir && !ensureDir(logDir)) {
    console.error(`[reconcile] log dir not writable, file logging disabled: ${logDir}`);
    logDir = '';
  }
  if (logDir) cleanupOldLogs(logDir, options.retainDays ?? 14, now().getTime());

  function emit(service: ServiceName, level: LogLevel, eventType: string, fields?: LogFields) {
    if (levelRank(level) < minRank) return;

    const at = now();
    const line = safeJsonLine(buildLogEvent({ ...fields, event_type: eventType, level, service }, at));
    write(line);

    if (!logDir) return;
    const file = path.join(logDir, `${LOG_FILE_PREFIX}${formatLocalDate(at)}${LOG_FILE_SUFFIX}`);
    try {
      writeFileSync(file, `${line}\n`, { encoding: 'utf8', flag: 'a' });
    } catch {
      // Never fail a run because of logging.
    }
  }

  function forService(service: ServiceName): Logger {
    return {
      debug: (eventType, fields) => emit(service, 'debug', eventType, fields),
      info: (eventType, fields) => emit(service, 'info', eventType, fields),
      warn: (eventType, fields) => emit(service, 'warn', eventType, fields),
      error: (eventType, fields) => emit(service, 'error', eventType, fields),
      child: (next) => forService(next),
    };
  }

  return forService(options.service);
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
