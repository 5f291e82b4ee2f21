import type { ErrorCodeType } from '@/lib/errors/error-codes';

export type JsonValue = string | number | boolean | null | { [key: string]: JsonValue } | JsonValue[];

export type ErrorCategory =
  | 'auth'
  | 'permission'
  | 'config'
  | 'network'
  | 'rate_limit'
  | 'parse'
  | 'schema'
  | 'io'
  | 'unknown';

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, JsonValue>;
};

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  // Structural check only; codes are not validated against ErrorCode here.
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    typeof err.code === 'string' &&
    typeof err.category === 'string' &&
    typeof err.message === 'string' &&
    typeof err.retryable === 'boolean'
  );
}

/**
 * Thrown wrapper for an {@link AppError}, for code paths that must unwind the stack
 * (config loading, report writing). Catch sites read `.error` back out.
 */
export class AppErrorException extends Error {
  readonly error: AppError;

  constructor(error: AppError) {
    super(error.message);
    this.name = 'AppErrorException';
    this.error = error;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toAppError(
  err: unknown,
  fallback: { code: ErrorCodeType; category?: ErrorCategory; redacted_context?: Record<string, JsonValue> },
): AppError {
  if (err instanceof AppErrorException) return err.error;
  if (isAppError(err)) return err;
  return {
    code: fallback.code,
    category: fallback.category ?? 'unknown',
    message: errorMessage(err),
    retryable: false,
    ...(fallback.redacted_context ? { redacted_context: fallback.redacted_context } : {}),
  };
}
