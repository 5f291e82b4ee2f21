import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, errorMessage } from '@/lib/errors/error';
import { parseLogLevel } from '@/lib/logging/logger';

import type { HostnameCase } from '@/lib/hostname/normalize';
import type { RetryPolicy } from '@/lib/http/retrying-client';

export const DEFAULT_CONFIG_PATH = path.join('config', 'config.json');

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

const HttpUrl = z
  .string()
  .trim()
  .regex(/^https?:\/\/[^/\s]+/i, 'must be an http(s) URL')
  .transform(stripTrailingSlashes);

const NonEmpty = z.string().trim().min(1);
const PositiveInt = z.number().int().positive();

const IllumioSection = z.object({
  pce_url: HttpUrl,
  org_id: z.union([NonEmpty, PositiveInt]).transform(String),
  api_user: NonEmpty,
  api_secret: NonEmpty,
  port: PositiveInt.max(65535).default(8443),
  tls_verify: z.boolean().default(true),
  page_size: PositiveInt.default(500),
  max_concurrent_requests: PositiveInt.default(15),
  timeout_seconds: z.number().positive().default(30),
});

const ServiceNowSection = z.object({
  instance_url: HttpUrl,
  api_user: NonEmpty,
  api_key: NonEmpty,
  table: NonEmpty.default('cmdb_ci_server'),
  tls_verify: z.boolean().default(true),
  page_size: PositiveInt.default(10_000),
  max_concurrent_requests: PositiveInt.default(10),
  timeout_seconds: z.number().positive().default(60),
});

const RetrySection = z.object({
  max_attempts: PositiveInt.default(3),
  initial_delay_seconds: z.number().nonnegative().default(1),
  backoff_multiplier: z.number().min(1).default(2),
  max_delay_seconds: z.number().nonnegative().default(60),
});

const OutputSection = z.object({
  base_path: NonEmpty.default('./outputs'),
  extracts_folder: NonEmpty.default('extracts'),
  reports_folder: NonEmpty.default('reports'),
  create_date_subfolder: z.boolean().default(true),
  file_prefix: NonEmpty.default('pce_cmdb_reconcile'),
});

const LoggingSection = z.object({
  level: z
    .string()
    .default('info')
    .transform((value, ctx) => {
      const level = parseLogLevel(value);
      if (level) return level;
      ctx.addIssue({ code: 'custom', message: "must be one of 'debug' | 'info' | 'warn' | 'error'" });
      return z.NEVER;
    }),
  dir: NonEmpty.optional(),
  retain_days: z.number().int().nonnegative().default(14),
});

export const ReconcileConfigSchema = z.object({
  illumio: IllumioSection,
  servicenow: ServiceNowSection,
  filtering: z.object({ operating_entity_contains: NonEmpty.optional() }).prefault({}),
  normalization: z.object({ hostname_uppercase: z.boolean().default(true) }).prefault({}),
  retry: RetrySection.prefault({}),
  output: OutputSection.prefault({}),
  logging: LoggingSection.prefault({}),
});

export type ReconcileConfig = z.output<typeof ReconcileConfigSchema>;
export type OutputConfig = ReconcileConfig['output'];

export type LoadedReconcileConfig = {
  configPath: string;
  config: ReconcileConfig;
};

/** Reads `--config <path>` / `-c <path>`; the last occurrence wins. */
export function parseConfigPathFromArgv(argv: readonly string[]): string | null {
  const idx = Math.max(argv.lastIndexOf('--config'), argv.lastIndexOf('-c'));
  if (idx === -1) return null;
  const candidate = argv[idx + 1]?.trim();
  if (!candidate || candidate.startsWith('-')) {
    throw new AppErrorException({
      code: ErrorCode.CONFIG_INVALID,
      category: 'config',
      message: `${argv[idx]} requires a path`,
      retryable: false,
    });
  }
  return candidate;
}

/**
 * Replaces `${NAME}` and `$NAME` in every string of a parsed JSON document. Unset variables are
 * collected and reported together.
 */
export function substituteEnvVars(input: unknown, env: Readonly<Record<string, string | undefined>>): unknown {
  const missing = new Set<string>();

  const walk = (value: unknown): unknown => {
    if (typeof value === 'string') {
      return value.replace(ENV_REFERENCE, (match: string, braced?: string, bare?: string) => {
        const name = braced ?? bare ?? '';
        const resolved = env[name];
        if (resolved === undefined) {
          missing.add(name);
          return match;
        }
        return resolved;
      });
    }
    if (Array.isArray(value)) return value.map(walk);
    if (value && typeof value === 'object') {
      return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, walk(v)]));
    }
    return value;
  };

  const out = walk(input);
  if (missing.size > 0) {
    const names = [...missing].sort();
    throw new AppErrorException({
      code: ErrorCode.CONFIG_ENV_MISSING,
      category: 'config',
      message: `environment variable not set: ${names.join(', ')}`,
      retryable: false,
      redacted_context: { variables: names },
    });
  }
  return out;
}

export function formatConfigIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.map(String).join('.');
    return `${where || '(root)'}: ${issue.message}`;
  });
}

export function parseConfig(raw: unknown, env: Readonly<Record<string, string | undefined>> = process.env): ReconcileConfig {
  const parsed = ReconcileConfigSchema.safeParse(substituteEnvVars(raw, env));
  if (parsed.success) return parsed.data;

  const issues = formatConfigIssues(parsed.error);
  throw new AppErrorException({
    code: ErrorCode.CONFIG_INVALID,
    category: 'config',
    message: `invalid configuration: ${issues.join('; ')}`,
    retryable: false,
    redacted_context: { issues },
  });
}

/**
 * Resolves the configuration file (argv, then `envPath`, then `config/config.json` under `cwd`),
 * substitutes environment references and validates the result.
 */
export function loadConfig(args: {
  argv: readonly string[];
  envPath?: string;
  cwd?: string;
  env?: Readonly<Record<string, string | undefined>>;
}): LoadedReconcileConfig {
  const cwd = args.cwd ?? process.cwd();
  const chosen = parseConfigPathFromArgv(args.argv) ?? args.envPath ?? DEFAULT_CONFIG_PATH;
  const configPath = path.resolve(cwd, chosen);

  if (!existsSync(configPath)) {
    throw new AppErrorException({
      code: ErrorCode.CONFIG_FILE_NOT_FOUND,
      category: 'config',
      message: `config file not found: ${configPath}`,
      retryable: false,
      redacted_context: { config_path: configPath },
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new AppErrorException({
      code: ErrorCode.CONFIG_INVALID,
      category: 'config',
      message: `config file is not valid JSON: ${errorMessage(err)}`,
      retryable: false,
      redacted_context: { config_path: configPath },
    });
  }

  return { configPath, config: parseConfig(raw, args.env ?? process.env) };
}

export function retryPolicyFromConfig(retry: ReconcileConfig['retry']): RetryPolicy {
  return {
    maxAttempts: retry.max_attempts,
    initialDelayMs: retry.initial_delay_seconds * 1000,
    backoffMultiplier: retry.backoff_multiplier,
    maxDelayMs: retry.max_delay_seconds * 1000,
  };
}

export function hostnameCaseFromConfig(normalization: ReconcileConfig['normalization']): HostnameCase {
  return normalization.hostname_uppercase ? 'upper' : 'lower';
}
