export const ErrorCodes = {
  INVALID_CONFIG: 'INVALID_CONFIG',
  INVALID_FILE: 'INVALID_FILE',
  INVALID_REQUEST: 'INVALID_REQUEST',
  INVALID_DATA: 'INVALID_DATA',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  SERVER_ERROR: 'SERVER_ERROR',
  UPLOAD_FAILED: 'UPLOAD_FAILED',
  REQUEST_FAILED: 'REQUEST_FAILED',
  TIMEOUT: 'TIMEOUT',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface AuthenticityErrorOptions {
  status?: number;
  cause?: unknown;
}

export class AuthenticityError extends Error {
  public readonly code: ErrorCode;
  public readonly status?: number;

  constructor(code: ErrorCode, message: string, options: AuthenticityErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AuthenticityError';
    this.code = code;
    this.status = options.status;
  }
}

export class ConfigurationError extends AuthenticityError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_CONFIG, `Invalid configuration: ${message}`);
    this.name = 'ConfigurationError';
  }
}

export class InvalidFileError extends AuthenticityError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.INVALID_FILE, message, { cause });
    this.name = 'InvalidFileError';
  }
}

export class InvalidRequestError extends AuthenticityError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_REQUEST, message);
    this.name = 'InvalidRequestError';
  }
}

export class InvalidDataError extends AuthenticityError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.INVALID_DATA, message, { cause });
    this.name = 'InvalidDataError';
  }
}

export class UnauthorizedError extends AuthenticityError {
  constructor(status: number) {
    super(ErrorCodes.UNAUTHORIZED, 'Authentication failed: invalid API key', { status });
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends AuthenticityError {
  constructor(message: string) {
    super(ErrorCodes.NOT_FOUND, message, { status: 404 });
    this.name = 'NotFoundError';
  }
}

export class ServerError extends AuthenticityError {
  constructor(message: string, status: number) {
    super(ErrorCodes.SERVER_ERROR, message, { status });
    this.name = 'ServerError';
  }
}

export class UploadFailedError extends AuthenticityError {
  constructor(message: string, status?: number) {
    super(ErrorCodes.UPLOAD_FAILED, message, { status });
    this.name = 'UploadFailedError';
  }
}

export class RequestError extends AuthenticityError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.REQUEST_FAILED, message, { cause });
    this.name = 'RequestError';
  }
}

export class UnknownApiError extends AuthenticityError {
  constructor(message: string, status: number) {
    super(ErrorCodes.UNKNOWN, message, { status });
    this.name = 'UnknownApiError';
  }
}

/** Raised when a polling budget runs out while the analysis is still in progress. */
export class TimeoutError extends AuthenticityError {
  public readonly elapsedMs: number;
  public readonly attempts: number;

  constructor(message: string, elapsedMs: number, attempts: number) {
    super(ErrorCodes.TIMEOUT, message);
    this.name = 'TimeoutError';
    this.elapsedMs = elapsedMs;
    this.attempts = attempts;
  }
}

export const isAuthenticityError = (error: unknown): error is AuthenticityError =>
  error instanceof AuthenticityError;

export const describeError = (error: unknown): string => {
  if (isAuthenticityError(error)) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
};
