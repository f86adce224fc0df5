export type UploaderErrorKind =
  | 'io'
  | 'validation'
  | 'network'
  | 'auth'
  | 'config'
  | 'api'
  | 'rate_limit'
  | 'unknown';

export class UploaderError extends Error {
  readonly kind: UploaderErrorKind;

  constructor(kind: UploaderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UploaderError';
    this.kind = kind;
  }
}

export class IoError extends UploaderError {
  readonly path?: string;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super('io', message, options);
    this.name = 'IoError';
    this.path = path;
  }
}

/** Structural problems with an input file (missing columns and the like). */
export class ValidationError extends UploaderError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('validation', message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export class ConfigError extends UploaderError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('config', `Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class NetworkError extends UploaderError {
  readonly timedOut: boolean;

  constructor(message: string, timedOut = false, options?: { cause?: unknown }) {
    super('network', message, options);
    this.name = 'NetworkError';
    this.timedOut = timedOut;
  }
}

export class AuthError extends UploaderError {
  readonly status: number;

  constructor(message: string, status: number) {
    super('auth', message);
    this.name = 'AuthError';
    this.status = status;
  }
}

/** The remote API answered, but refused the request. */
export class ApiError extends UploaderError {
  readonly status: number;
  readonly code?: string;

  constructor(message: string, status: number, code?: string) {
    super('api', message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }
}

export class RateLimitError extends UploaderError {
  readonly retryAfterSeconds?: number;

  constructor(message: string, retryAfterSeconds?: number) {
    super('rate_limit', message);
    this.name = 'RateLimitError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
