import { z } from 'zod';
import { Session, User } from '../../domain/auth/user.js';
import { MalformedDataError } from '../../domain/auth/errors.js';
import { StoredSession } from '../../application/auth/ports.js';

export interface MapperOptions {
  /**
   * Fallback for a missing or unparseable createdAt. Defaults to the epoch so
   * the mapping stays deterministic.
   */
  now?: Date;
}

const idLike = z.union([z.string(), z.number()]).transform((v) => String(v).trim());
const text = z.union([z.string(), z.number()]).transform((v) => String(v).trim());
const timestamp = z.union([z.string(), z.number(), z.date()]);

// Field names differ between API versions and older persisted sessions.
const rawUserSchema = z.object({
  id: idLike.nullish(),
  _id: idLike.nullish(),
  email: text.nullish(),
  name: text.nullish(),
  username: text.nullish(),
  avatar: z.string().nullish(),
  profile_image_url: z.string().nullish(),
  profileImageUrl: z.string().nullish(),
  createdAt: timestamp.nullish(),
  created_at: timestamp.nullish(),
  updatedAt: timestamp.nullish(),
  updated_at: timestamp.nullish(),
});

export const storedSessionSchema = z.object({
  user: z.record(z.unknown()),
  token: z.string(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstNonEmpty(...values: (string | null | undefined)[]): string | undefined {
  for (const value of values) {
    if (value !== null && value !== undefined && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

function toDate(value: string | number | Date | null | undefined): Date | undefined {
  if (value === null || value === undefined || value === '') {
    return undefined;
  }
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Convert a raw user record into a User.
 * Coerces types only; throws MalformedDataError when id or email is absent.
 */
export function toUser(raw: unknown, options: MapperOptions = {}): User {
  if (!isRecord(raw)) {
    throw new MalformedDataError('User payload must be an object');
  }

  const parsed = rawUserSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.errors.map((e) => e.path.join('.')).join(', ');
    throw new MalformedDataError(`User payload has invalid fields: ${fields}`);
  }
  const data = parsed.data;

  const id = firstNonEmpty(data.id, data._id);
  if (!id) {
    throw new MalformedDataError('User payload is missing an id');
  }

  const email = firstNonEmpty(data.email);
  if (!email) {
    throw new MalformedDataError('User payload is missing an email');
  }

  return {
    id,
    email,
    name: firstNonEmpty(data.name, data.username) ?? '',
    avatar: firstNonEmpty(data.avatar, data.profileImageUrl, data.profile_image_url),
    createdAt:
      toDate(data.createdAt ?? data.created_at) ?? new Date((options.now ?? new Date(0)).getTime()),
    updatedAt: toDate(data.updatedAt ?? data.updated_at),
  };
}

/**
 * Convert a credential service response or a stored session into a Session.
 *
 * Accepts `{ user, token }`, `{ data: { user, token } }` and the flat
 * envelope `{ data: { id, email, ..., access_token } }`.
 */
export function toSession(raw: unknown, options: MapperOptions = {}): Session {
  if (!isRecord(raw)) {
    throw new MalformedDataError('Session payload must be an object');
  }

  const body = isRecord(raw.data) ? raw.data : raw;
  const tokenValue = body.token ?? body.access_token ?? body.accessToken;
  const token = typeof tokenValue === 'string' ? tokenValue.trim() : '';
  if (token === '') {
    throw new MalformedDataError('Session payload is missing a token');
  }

  const user = toUser(isRecord(body.user) ? body.user : body, options);
  return { user, token };
}

/**
 * Persisted form of a session, readable by toSession.
 */
export function toStoredSession(session: Session): StoredSession {
  const { user } = session;
  const stored: Record<string, unknown> = {
    id: user.id,
    email: user.email,
    name: user.name,
    createdAt: user.createdAt.toISOString(),
  };
  if (user.avatar !== undefined) {
    stored.avatar = user.avatar;
  }
  if (user.updatedAt !== undefined) {
    stored.updatedAt = user.updatedAt.toISOString();
  }
  return { user: stored, token: session.token };
}
