import { afterEach, describe, expect, it, vi } from 'vitest';

const touched = ['RECONCILE_LOG_LEVEL', 'RECONCILE_CONFIG_PATH'] as const;
const saved = Object.fromEntries(touched.map((key) => [key, process.env[key]]));

async function loadEnv(values: Partial<Record<(typeof touched)[number], string>>) {
  vi.resetModules();

  for (const key of touched) {
    const value = values[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }

  // Test env disables validation globally; override here to verify parsing behavior.
  const prevSkip = process.env.SKIP_ENV_VALIDATION;
  process.env.SKIP_ENV_VALIDATION = '';
  try {
    const { serverEnv } = await import('@/lib/env/server');
    return { level: serverEnv.RECONCILE_LOG_LEVEL, configPath: serverEnv.RECONCILE_CONFIG_PATH };
  } finally {
    if (prevSkip === undefined) delete process.env.SKIP_ENV_VALIDATION;
    else process.env.SKIP_ENV_VALIDATION = prevSkip;
  }
}

afterEach(() => {
  for (const key of touched) {
    const value = saved[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

describe('serverEnv', () => {
  it('reads the log level and config path overrides', async () => {
    await expect(loadEnv({ RECONCILE_LOG_LEVEL: 'debug', RECONCILE_CONFIG_PATH: '/etc/reconcile.json' })).resolves.toEqual({
      level: 'debug',
      configPath: '/etc/reconcile.json',
    });
  });

  it('treats empty strings as unset', async () => {
    await expect(loadEnv({ RECONCILE_LOG_LEVEL: '', RECONCILE_CONFIG_PATH: '' })).resolves.toEqual({
      level: undefined,
      configPath: undefined,
    });
  });

  it('rejects an unknown log level', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    await expect(loadEnv({ RECONCILE_LOG_LEVEL: 'verbose' })).rejects.toThrow();
    spy.mockRestore();
  });
});
