/**
 * Authenticated user as the rest of the client sees it.
 * Built only by the user mapper from remote or persisted data.
 */
export interface User {
  readonly id: string;
  readonly email: string;
  readonly name: string;
  readonly avatar?: string;
  readonly createdAt: Date;
  readonly updatedAt?: Date;
}

/**
 * A user plus the access token issued for them.
 * Exists only while the state machine is authenticated.
 */
export interface Session {
  readonly user: User;
  readonly token: string;
}
