process.env.SKIP_ENV_VALIDATION = 'true';
