/**
 * Error taxonomy
 *
 * CONFIGURATION_ERROR is fatal at startup only. LOOKUP_UNAVAILABLE and
 * TIMEOUT are recovered where they occur (base curve fallback).
 * APPLY_FAILURE is logged by the scheduler and the tick becomes a no-op.
 */

export type AppErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'LOOKUP_UNAVAILABLE'
  | 'APPLY_FAILURE'
  | 'TIMEOUT';

export class AppError extends Error {
  readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
  }
}

export class ConfigurationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class LookupUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOOKUP_UNAVAILABLE', message, options);
    this.name = 'LookupUnavailableError';
  }
}

export class ApplyFailureError extends AppError {
  readonly target: number;

  constructor(target: number, message: string, options?: { cause?: unknown }) {
    super('APPLY_FAILURE', message, options);
    this.name = 'ApplyFailureError';
    this.target = target;
  }
}

export class TimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function errorMessage(err: unknown): string {
  return toError(err).message;
}
