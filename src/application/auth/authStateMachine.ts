import { Session } from '../../domain/auth/user.js';
import { AuthCommand, AuthState, AuthStates, AuthStatus } from '../../domain/auth/state.js';
import { ConcurrentOperationError } from '../../domain/auth/errors.js';
import {
  DEFAULT_PASSWORD_MIN_LENGTH,
  validateLogin,
  validateRegister,
} from '../../domain/auth/validation.js';
import { toSession } from '../../infra/mappers/userMapper.js';
import { isTokenExpired } from '../../infra/token/tokenExpiry.js';
import { createLogger, Logger } from '../../infra/logging/logger.js';
import { InvalidTransitionError } from '../errors.js';
import { classifyFailure } from './classifyFailure.js';
import { CredentialService, RawSessionPayload, SessionStore } from './ports.js';

export type AuthStateListener = (state: AuthState, previous: AuthState) => void;

/**
 * Read side of the state machine, all a route guard needs.
 */
export interface AuthStateSource {
  currentState(): AuthState;
  onChange(listener: AuthStateListener): () => void;
}

/**
 * Storage side effects whose failure does not change the outcome of a command.
 */
export type NonFatalOperation = 'logout' | 'save' | 'discardStale';

export interface AuthStateMachineOptions {
  credentialService: CredentialService;
  sessionStore: SessionStore;
  passwordMinLength?: number;
  isTokenExpired?: (token: string, now: Date) => boolean;
  clock?: () => Date;
  logger?: Logger;
  onNonFatalError?: (error: unknown, operation: NonFatalOperation) => void;
}

// States from which a login or registration may start
const AUTHENTICATION_SOURCES: ReadonlySet<AuthStatus> = new Set<AuthStatus>([
  'unknown',
  'unauthenticated',
  'failed',
]);

/**
 * Single owner of the authentication state.
 *
 * At most one login, registration or restore runs at a time; a second one is
 * rejected with ConcurrentOperationError rather than queued, as is any of them
 * while a logout is still clearing the store. Logout is always accepted: it
 * clears the store and moves to unauthenticated. An attempt still in flight
 * completes without persisting or transitioning.
 */
export class AuthStateMachine implements AuthStateSource {
  private state: AuthState = AuthStates.unknown();
  private readonly listeners = new Set<AuthStateListener>();
  private pending = false;
  // Logouts whose clear has not settled yet
  private logoutsInFlight = 0;
  // Bumped by every logout so in-flight attempts can tell they were superseded
  private epoch = 0;

  private readonly credentialService: CredentialService;
  private readonly sessionStore: SessionStore;
  private readonly passwordMinLength: number;
  private readonly isTokenExpired: (token: string, now: Date) => boolean;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly onNonFatalError?: (error: unknown, operation: NonFatalOperation) => void;

  constructor(options: AuthStateMachineOptions) {
    this.credentialService = options.credentialService;
    this.sessionStore = options.sessionStore;
    this.passwordMinLength = options.passwordMinLength ?? DEFAULT_PASSWORD_MIN_LENGTH;
    this.isTokenExpired = options.isTokenExpired ?? isTokenExpired;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('auth-state-machine');
    this.onNonFatalError = options.onNonFatalError;
  }

  currentState(): AuthState {
    return this.state;
  }

  onChange(listener: AuthStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Whether a login, registration, restore or logout is still running.
   */
  isBusy(): boolean {
    return this.pending || this.logoutsInFlight > 0;
  }

  dispatch(command: AuthCommand): Promise<AuthState> {
    switch (command.type) {
      case 'Login':
        return this.login(command.email, command.password);
      case 'Register':
        return this.register(command.name, command.email, command.password);
      case 'Logout':
        return this.logout();
      case 'RestoreSession':
        return this.restoreSession();
    }
  }

  /**
   * Restore a persisted session. Only acts from the initial state; later calls
   * resolve to the current state unchanged.
   */
  async restoreSession(): Promise<AuthState> {
    this.assertIdle('RestoreSession');
    if (this.state.status !== 'unknown') {
      this.logger.debug('Restore skipped', { status: this.state.status });
      return this.state;
    }

    this.pending = true;
    const epoch = this.epoch;
    this.transition(AuthStates.authenticating());

    try {
      const session = await this.readPersistedSession();
      if (epoch === this.epoch) {
        if (session) {
          this.logger.info('Session restored', { userId: session.user.id });
          this.transition(AuthStates.authenticated(session));
        } else {
          this.logger.info('No session to restore');
          this.transition(AuthStates.unauthenticated());
        }
      }
    } catch (error) {
      // Never fail open to authenticated
      this.logger.warn('Session restore failed', { reason: reasonOf(error) });
      if (epoch === this.epoch) {
        this.transition(AuthStates.unauthenticated());
      }
    } finally {
      this.pending = false;
    }

    return this.state;
  }

  async login(email: string, password: string): Promise<AuthState> {
    this.assertIdle('Login');
    this.assertCanAuthenticate('Login');

    let input: { email: string; password: string };
    try {
      input = validateLogin({ email, password });
    } catch (error) {
      return this.fail(error);
    }

    this.logger.info('Login requested', { email: input.email });
    return this.authenticate(() => this.credentialService.login(input.email, input.password));
  }

  async register(name: string, email: string, password: string): Promise<AuthState> {
    this.assertIdle('Register');
    this.assertCanAuthenticate('Register');

    let input: { name: string; email: string; password: string };
    try {
      input = validateRegister({ name, email, password }, this.passwordMinLength);
    } catch (error) {
      return this.fail(error);
    }

    this.logger.info('Registration requested', { email: input.email });
    return this.authenticate(() =>
      this.credentialService.register(input.name, input.email, input.password)
    );
  }

  /**
   * Always ends unauthenticated. A store that fails to clear is reported,
   * not surfaced as a failed state.
   */
  async logout(): Promise<AuthState> {
    this.epoch += 1;
    this.logoutsInFlight += 1;

    try {
      await this.sessionStore.clear();
    } catch (error) {
      this.reportNonFatal(error, 'logout');
    } finally {
      this.logoutsInFlight -= 1;
    }

    this.transition(AuthStates.unauthenticated());
    this.logger.info('Logged out');
    return this.state;
  }

  private async authenticate(call: () => Promise<RawSessionPayload>): Promise<AuthState> {
    this.pending = true;
    const epoch = this.epoch;
    this.transition(AuthStates.authenticating());

    try {
      const payload = await call();
      const session = toSession(payload, { now: this.clock() });

      if (epoch !== this.epoch) {
        this.logger.info('Authentication superseded by logout', { userId: session.user.id });
        return this.state;
      }

      await this.persist(session);

      if (epoch !== this.epoch) {
        // Logout ran while saving; make sure the saved copy does not outlive it
        await this.discard();
        return this.state;
      }

      this.logger.info('Authenticated', { userId: session.user.id });
      this.transition(AuthStates.authenticated(session));
      return this.state;
    } catch (error) {
      if (epoch !== this.epoch) {
        this.logger.info('Failed attempt superseded by logout', { reason: reasonOf(error) });
        return this.state;
      }
      return this.fail(error);
    } finally {
      this.pending = false;
    }
  }

  private async readPersistedSession(): Promise<Session | null> {
    if (!(await this.sessionStore.isPresent())) {
      return null;
    }

    const stored = await this.sessionStore.load();
    if (!stored) {
      return null;
    }

    let session: Session;
    try {
      session = toSession(stored, { now: this.clock() });
    } catch (error) {
      this.logger.warn('Persisted session is malformed', { reason: reasonOf(error) });
      await this.discard();
      return null;
    }

    if (this.isTokenExpired(session.token, this.clock())) {
      this.logger.info('Persisted session has expired', { userId: session.user.id });
      await this.discard();
      return null;
    }

    return session;
  }

  private async persist(session: Session): Promise<void> {
    try {
      await this.sessionStore.save(session);
    } catch (error) {
      // The session stays usable for this run; it just won't survive a restart
      this.reportNonFatal(error, 'save');
    }
  }

  private async discard(): Promise<void> {
    try {
      await this.sessionStore.clear();
    } catch (error) {
      this.reportNonFatal(error, 'discardStale');
    }
  }

  private fail(error: unknown): AuthState {
    const failure = classifyFailure(error);
    this.logger.warn('Authentication failed', { kind: failure.kind, message: failure.message });
    this.transition(AuthStates.failed(failure.kind, failure.message));
    return this.state;
  }

  private assertIdle(command: string): void {
    if (this.isBusy()) {
      this.logger.debug('Command rejected while busy', { command });
      throw new ConcurrentOperationError();
    }
  }

  private assertCanAuthenticate(command: string): void {
    if (!AUTHENTICATION_SOURCES.has(this.state.status)) {
      throw new InvalidTransitionError(command, this.state.status);
    }
  }

  private reportNonFatal(error: unknown, operation: NonFatalOperation): void {
    this.logger.warn('Session store operation failed', { operation, reason: reasonOf(error) });
    if (!this.onNonFatalError) {
      return;
    }
    try {
      this.onNonFatalError(error, operation);
    } catch (callbackError) {
      this.logger.error('Non-fatal error handler threw', callbackError);
    }
  }

  private transition(next: AuthState): void {
    const previous = this.state;
    this.state = next;
    for (const listener of [...this.listeners]) {
      try {
        listener(next, previous);
      } catch (error) {
        this.logger.error('State listener threw', error);
      }
    }
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
