export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(400, message);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'user not authenticated') {
    super(401, message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'forbidden') {
    super(403, message);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(404, id ? `${resource} not found: ${id}` : `${resource} not found`);
  }
}

export const RECONNECT_MESSAGE =
  'OAuth token is invalid or has been revoked; please reconnect to this SCM provider';

/**
 * The SCM provider rejected the stored credential and it could not be renewed.
 * The upstream detail is not included in the message.
 */
export class UpstreamAuthError extends AppError {
  constructor() {
    super(401, RECONNECT_MESSAGE);
  }
}

export class UpstreamError extends AppError {
  constructor(action: string, cause: unknown) {
    super(500, `${action}: ${cause instanceof Error ? cause.message : String(cause)}`);
  }
}

/** Raised when sealing or opening secret material fails. Never carries the secret. */
export class EncryptionError extends AppError {
  constructor(message: string) {
    super(500, message);
  }
}
