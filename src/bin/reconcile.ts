#!/usr/bin/env -S node --import tsx
import { hostnameCaseFromConfig, loadConfig, retryPolicyFromConfig } from '@/lib/config/config';
import { serverEnv } from '@/lib/env/server';
import { ErrorCode } from '@/lib/errors/error-codes';
import { errorMessage, toAppError } from '@/lib/errors/error';
import { createLogger, logEvent } from '@/lib/logging/logger';
import { redactJsonSecrets } from '@/lib/redaction/redact-json';
import { createFileReportSink } from '@/lib/report/file-sink';
import { runReconciliation } from '@/lib/run/run-reconciliation';

import { createIllumioFetcher } from '../../plugins/illumio/index';
import { createServiceNowFetcher } from '../../plugins/servicenow/index';

import type { LoadedReconcileConfig } from '@/lib/config/config';

async function main(): Promise<number> {
  let loaded: LoadedReconcileConfig;
  try {
    loaded = loadConfig({ argv: process.argv, envPath: serverEnv.RECONCILE_CONFIG_PATH });
  } catch (err) {
    const error = toAppError(err, { code: ErrorCode.CONFIG_INVALID, category: 'config' });
    console.error(`[reconcile] config error: ${error.message}`);
    console.error('[reconcile] expected config file: config/config.json (or pass --config <path>)');
    return 1;
  }

  const { config } = loaded;
  const logger = createLogger({
    service: 'cli',
    level: serverEnv.RECONCILE_LOG_LEVEL ?? config.logging.level,
    dir: config.logging.dir,
    retainDays: config.logging.retain_days,
  });
  logger.info('cli.start', { config_path: loaded.configPath, config: redactJsonSecrets(config) });

  const retry = retryPolicyFromConfig(config.retry);
  const hostnameCase = hostnameCaseFromConfig(config.normalization);

  const summary = await runReconciliation({
    illumio: createIllumioFetcher({ config: config.illumio, retry, hostnameCase, logger }),
    servicenow: createServiceNowFetcher({
      config: config.servicenow,
      operatingEntityFilter: config.filtering.operating_entity_contains,
      retry,
      hostnameCase,
      logger,
    }),
    sink: createFileReportSink({ output: config.output, logger: logger.child('report') }),
    logger,
  });

  if (summary.artifacts) {
    console.log(`[reconcile] extracts: ${summary.artifacts.extractsDir}`);
    console.log(`[reconcile] reports: ${summary.artifacts.reportsDir}`);
  }
  return summary.ok ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logEvent({ event_type: 'cli.fatal', level: 'error', service: 'cli', message: errorMessage(err) });
    process.exitCode = 1;
  },
);
