import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { Session } from '../../domain/auth/user.js';
import { SessionStore, StoredSession } from '../../application/auth/ports.js';
import { storedSessionSchema, toStoredSession } from '../mappers/userMapper.js';
import { createLogger, Logger } from '../logging/logger.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Session store backed by a single JSON file.
 * Writes go to a temp file unique to the call and are renamed into place.
 */
export class FileSessionStore implements SessionStore {
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('file-session-store');
  }

  async save(session: Session): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(toStoredSession(session), null, 2), {
        encoding: 'utf-8',
        mode: 0o600,
      });
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
    this.logger.debug('Session saved', { file: this.filePath });
  }

  /**
   * Returns null when no file exists. A file that is not valid JSON or not a
   * session layout is an error.
   */
  async load(): Promise<StoredSession | null> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const parsed = storedSessionSchema.safeParse(JSON.parse(contents));
    if (!parsed.success) {
      throw new Error(`Session file ${this.filePath} has an unexpected layout`);
    }
    return parsed.data;
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
    this.logger.debug('Session cleared', { file: this.filePath });
  }

  async isPresent(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }
}
