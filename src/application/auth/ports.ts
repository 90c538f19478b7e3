import { Session } from '../../domain/auth/user.js';

/**
 * Whatever the credential service returns on success. Shape is only known
 * to the user mapper.
 */
export type RawSessionPayload = unknown;

export interface CredentialService {
  login(email: string, password: string): Promise<RawSessionPayload>;
  register(name: string, email: string, password: string): Promise<RawSessionPayload>;
}

/**
 * Persisted session layout. Dates are ISO-8601 strings; the user record is
 * re-mapped on every restore, so older layouts keep loading.
 */
export interface StoredSession {
  user: Record<string, unknown>;
  token: string;
}

export interface SessionStore {
  save(session: Session): Promise<void>;
  load(): Promise<StoredSession | null>;
  clear(): Promise<void>;
  isPresent(): Promise<boolean>;
}
