import { Session } from './user.js';
import { AuthErrorKind } from './errors.js';

/**
 * Authentication state. Exactly one variant is current at a time and only
 * the state machine moves between them.
 */
export type AuthState =
  | UnknownState
  | AuthenticatingState
  | AuthenticatedState
  | UnauthenticatedState
  | FailedState;

export interface UnknownState {
  readonly status: 'unknown';
}

export interface AuthenticatingState {
  readonly status: 'authenticating';
}

export interface AuthenticatedState {
  readonly status: 'authenticated';
  readonly session: Session;
}

export interface UnauthenticatedState {
  readonly status: 'unauthenticated';
}

export interface FailedState {
  readonly status: 'failed';
  readonly errorKind: AuthErrorKind;
  readonly message: string;
}

export type AuthStatus = AuthState['status'];

/**
 * Requests to change the authentication state.
 */
export type AuthCommand =
  | LoginCommand
  | RegisterCommand
  | LogoutCommand
  | RestoreSessionCommand;

export interface LoginCommand {
  readonly type: 'Login';
  readonly email: string;
  readonly password: string;
}

export interface RegisterCommand {
  readonly type: 'Register';
  readonly name: string;
  readonly email: string;
  readonly password: string;
}

export interface LogoutCommand {
  readonly type: 'Logout';
}

export interface RestoreSessionCommand {
  readonly type: 'RestoreSession';
}

export const AuthStates = {
  unknown: (): UnknownState => ({ status: 'unknown' }),
  authenticating: (): AuthenticatingState => ({ status: 'authenticating' }),
  authenticated: (session: Session): AuthenticatedState => ({
    status: 'authenticated',
    session,
  }),
  unauthenticated: (): UnauthenticatedState => ({ status: 'unauthenticated' }),
  failed: (errorKind: AuthErrorKind, message: string): FailedState => ({
    status: 'failed',
    errorKind,
    message,
  }),
} as const;

export function isAuthenticated(state: AuthState): state is AuthenticatedState {
  return state.status === 'authenticated';
}
