/**
 * Error codes surfaced to the invoker. Nothing is retried: every error ends
 * the run, and the CLI maps the code to an exit status.
 */

export const ErrorCodes = {
  CONFIG_ERROR: 'CONFIG_ERROR',
  CREDENTIAL_ERROR: 'CREDENTIAL_ERROR',
  RANGE_ERROR: 'RANGE_ERROR',
  USAGE_ERROR: 'USAGE_ERROR',
  AUTH_ERROR: 'AUTH_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  API_ERROR: 'API_ERROR',
  NETWORK_ERROR: 'NETWORK_ERROR',
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class WeeklyListError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WeeklyListError';
    this.code = code;
  }
}

export class TrelloApiError extends WeeklyListError {
  /** HTTP status, absent for transport failures. */
  readonly status?: number;

  constructor(
    code: ErrorCode,
    message: string,
    status?: number,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = 'TrelloApiError';
    this.status = status;
  }
}

/** Usage errors (bad flags, week or position out of range). */
export function isUsageError(err: unknown): err is WeeklyListError {
  return (
    err instanceof WeeklyListError &&
    (err.code === ErrorCodes.RANGE_ERROR || err.code === ErrorCodes.USAGE_ERROR)
  );
}
