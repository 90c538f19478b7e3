import { AuthError, AuthErrorKind } from '../../domain/auth/errors.js';

export interface ClassifiedFailure {
  kind: AuthErrorKind;
  message: string;
}

const DEFAULT_MESSAGES: Record<AuthErrorKind, string> = {
  ValidationError: 'Invalid input. Please check your data.',
  UnauthorizedError: 'Authentication failed. Please check your credentials.',
  NetworkError: 'Network error. Please check your connection and try again.',
  ServerError: 'Server error. Please try again later.',
  MalformedDataError: 'Received an unexpected response from the server.',
  ConcurrentOperationError: 'Another sign-in is already in progress.',
};

const NETWORK_PATTERN = /timed? ?out|network|fetch failed|ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN/i;
const UNAUTHORIZED_PATTERN = /unauthori[sz]ed|invalid credentials|invalid email or password|forbidden/i;

export function defaultMessage(kind: AuthErrorKind): string {
  return DEFAULT_MESSAGES[kind];
}

/**
 * Map anything thrown during an authentication attempt to a failure kind
 * and a message fit for display.
 */
export function classifyFailure(error: unknown): ClassifiedFailure {
  if (error instanceof AuthError) {
    return {
      kind: error.kind,
      message: error.message || DEFAULT_MESSAGES[error.kind],
    };
  }

  const message = error instanceof Error ? error.message : typeof error === 'string' ? error : '';

  // Unclassified errors from third-party transports: fall back to message patterns
  if (NETWORK_PATTERN.test(message)) {
    return { kind: 'NetworkError', message };
  }
  if (UNAUTHORIZED_PATTERN.test(message)) {
    return { kind: 'UnauthorizedError', message };
  }

  return {
    kind: 'ServerError',
    message: message || DEFAULT_MESSAGES.ServerError,
  };
}
