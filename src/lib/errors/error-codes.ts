export const ErrorCode = {
  CONFIG_FILE_NOT_FOUND: 'CONFIG_FILE_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_ENV_MISSING: 'CONFIG_ENV_MISSING',

  ILLUMIO_AUTH_FAILED: 'ILLUMIO_AUTH_FAILED',
  ILLUMIO_PERMISSION_DENIED: 'ILLUMIO_PERMISSION_DENIED',
  ILLUMIO_CONNECTION_FAILED: 'ILLUMIO_CONNECTION_FAILED',
  ILLUMIO_FETCH_FAILED: 'ILLUMIO_FETCH_FAILED',

  SERVICENOW_AUTH_FAILED: 'SERVICENOW_AUTH_FAILED',
  SERVICENOW_PERMISSION_DENIED: 'SERVICENOW_PERMISSION_DENIED',
  SERVICENOW_CONNECTION_FAILED: 'SERVICENOW_CONNECTION_FAILED',
  SERVICENOW_FETCH_FAILED: 'SERVICENOW_FETCH_FAILED',

  HTTP_RATE_LIMITED: 'HTTP_RATE_LIMITED',
  HTTP_SERVER_ERROR: 'HTTP_SERVER_ERROR',
  HTTP_CLIENT_ERROR: 'HTTP_CLIENT_ERROR',
  HTTP_TIMEOUT: 'HTTP_TIMEOUT',
  HTTP_NETWORK_ERROR: 'HTTP_NETWORK_ERROR',

  RECONCILIATION_FAILED: 'RECONCILIATION_FAILED',
  REPORT_WRITE_FAILED: 'REPORT_WRITE_FAILED',
  SCHEMA_VALIDATION_FAILED: 'SCHEMA_VALIDATION_FAILED',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
