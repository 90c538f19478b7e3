/**
 * Reasons a command can end in the failed state, plus the concurrency
 * rejection that callers receive directly.
 */
export type AuthErrorKind =
  | 'ValidationError'
  | 'UnauthorizedError'
  | 'NetworkError'
  | 'ServerError'
  | 'MalformedDataError'
  | 'ConcurrentOperationError';

export abstract class AuthError extends Error {
  abstract readonly kind: AuthErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AuthError {
  readonly kind = 'ValidationError';

  constructor(
    message = 'Invalid input',
    public readonly issues: readonly string[] = []
  ) {
    super(message);
  }
}

export class UnauthorizedError extends AuthError {
  readonly kind = 'UnauthorizedError';

  constructor(message = 'Invalid credentials') {
    super(message);
  }
}

export class NetworkError extends AuthError {
  readonly kind = 'NetworkError';

  constructor(message = 'Network error', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ServerError extends AuthError {
  readonly kind = 'ServerError';

  constructor(
    message = 'Server error',
    public readonly status?: number
  ) {
    super(message);
  }
}

export class MalformedDataError extends AuthError {
  readonly kind = 'MalformedDataError';

  constructor(message = 'Malformed data') {
    super(message);
  }
}

export class ConcurrentOperationError extends AuthError {
  readonly kind = 'ConcurrentOperationError';

  constructor(message = 'Another authentication operation is in progress') {
    super(message);
  }
}
