import { AuthStatus } from '../domain/auth/state.js';

/**
 * Application-level errors returned to callers of the state machine.
 * These never become a failed state.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly command: string,
    public readonly from: AuthStatus
  ) {
    super(`${command} is not allowed while ${from}`);
    this.name = 'InvalidTransitionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
