import jwt from 'jsonwebtoken';

/**
 * True when the token is a JWT whose exp claim has passed.
 * Opaque (non-JWT) tokens and JWTs without exp never expire here; the
 * credential service stays the authority on those.
 */
export function isTokenExpired(token: string, now: Date = new Date()): boolean {
  const decoded = jwt.decode(token, { json: true });
  if (!decoded || typeof decoded.exp !== 'number') {
    return false;
  }
  return decoded.exp * 1000 <= now.getTime();
}
