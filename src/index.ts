import { AppConfig, loadConfig } from './config.js';
import { AuthStateMachine, AuthStateMachineOptions } from './application/auth/authStateMachine.js';
import { RouteGuard, RouteGuardOptions } from './application/auth/routeGuard.js';
import { CredentialService, SessionStore } from './application/auth/ports.js';
import { HttpCredentialService } from './infra/http/httpCredentialService.js';
import { FileSessionStore } from './infra/storage/fileSessionStore.js';
import { getLogger } from './infra/logging/logger.js';

export * from './domain/auth/user.js';
export * from './domain/auth/state.js';
export * from './domain/auth/errors.js';
export { validateLogin, validateRegister } from './domain/auth/validation.js';
export { InvalidTransitionError } from './application/errors.js';
export * from './application/auth/ports.js';
export * from './application/auth/authStateMachine.js';
export * from './application/auth/routeGuard.js';
export { classifyFailure } from './application/auth/classifyFailure.js';
export { toUser, toSession, toStoredSession } from './infra/mappers/userMapper.js';
export { HttpCredentialService } from './infra/http/httpCredentialService.js';
export { FileSessionStore } from './infra/storage/fileSessionStore.js';
export { InMemorySessionStore } from './infra/storage/memorySessionStore.js';
export { isTokenExpired } from './infra/token/tokenExpiry.js';
export { createLogger } from './infra/logging/logger.js';
export type { Logger, LogLevel } from './infra/logging/logger.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';

export interface SessionManagerOverrides {
  credentialService?: CredentialService;
  sessionStore?: SessionStore;
  guard?: RouteGuardOptions;
  onNonFatalError?: AuthStateMachineOptions['onNonFatalError'];
}

export interface SessionManager {
  machine: AuthStateMachine;
  guard: RouteGuard;
}

/**
 * Wire the state machine to the HTTP credential service and the file-backed
 * session store. Call `machine.restoreSession()` once at startup.
 */
export function createSessionManager(
  config: AppConfig = loadConfig(),
  overrides: SessionManagerOverrides = {}
): SessionManager {
  // First call fixes the root logger's level for the process
  getLogger(config.logLevel);

  const machine = new AuthStateMachine({
    credentialService:
      overrides.credentialService ??
      new HttpCredentialService({
        baseUrl: config.apiBaseUrl,
        timeoutMs: config.requestTimeoutMs,
      }),
    sessionStore: overrides.sessionStore ?? new FileSessionStore(config.sessionFile),
    passwordMinLength: config.passwordMinLength,
    onNonFatalError: overrides.onNonFatalError,
  });

  return { machine, guard: new RouteGuard(machine, overrides.guard) };
}
