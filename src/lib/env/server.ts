import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

export const serverEnv = createEnv({
  server: {
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    // Overrides the default config/config.json; `--config` still wins.
    RECONCILE_CONFIG_PATH: z.string().min(1).optional(),
    // Overrides logging.level from the configuration file.
    RECONCILE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  },
  runtimeEnv: process.env,
  skipValidation: !!process.env.SKIP_ENV_VALIDATION,
  emptyStringAsUndefined: true,
});
