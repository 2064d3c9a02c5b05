/**
 * Error raised by a connector when the SCM provider's API answers with a
 * non-success status.
 */
export class ScmApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ScmApiError';
  }
}

export class ConnectorConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectorConfigError';
  }
}

// 203 is used by at least one provider to signal a rejected credential
const AUTH_FAILURE_STATUSES: ReadonlySet<number> = new Set([401, 403, 203]);

export function isAuthFailureStatus(statusCode: number): boolean {
  return AUTH_FAILURE_STATUSES.has(statusCode);
}

export function isAuthFailure(error: unknown): error is ScmApiError {
  return error instanceof ScmApiError && isAuthFailureStatus(error.statusCode);
}
