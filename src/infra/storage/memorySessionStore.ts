import { Session } from '../../domain/auth/user.js';
import { SessionStore, StoredSession } from '../../application/auth/ports.js';
import { toStoredSession } from '../mappers/userMapper.js';

/**
 * Process-local session store. Holds the persisted layout, not the live
 * object, so restores go through the same mapping as on-disk sessions.
 */
export class InMemorySessionStore implements SessionStore {
  private stored: StoredSession | null;

  constructor(initial: StoredSession | null = null) {
    this.stored = initial;
  }

  async save(session: Session): Promise<void> {
    this.stored = toStoredSession(session);
  }

  async load(): Promise<StoredSession | null> {
    return this.stored ? { user: { ...this.stored.user }, token: this.stored.token } : null;
  }

  async clear(): Promise<void> {
    this.stored = null;
  }

  async isPresent(): Promise<boolean> {
    return this.stored !== null;
  }
}
