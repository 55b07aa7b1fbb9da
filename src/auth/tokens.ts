/**
 * Single-use, time-limited email verification tokens.
 *
 * Token values carry 256 bits of randomness. Redemption is one conditional
 * UPDATE (compare-and-set on `consumed`), so of any number of concurrent
 * attempts on the same value exactly one changes a row.
 */

import type { Db } from '../db.js';
import { AuthError } from '../errors.js';
import { randomToken } from '../utils.js';

export interface VerificationToken {
  token: string;
  user_id: string;
  /** Unix ms */
  expires_at: number;
  consumed: boolean;
}

interface TokenRow {
  token: string;
  user_id: string;
  expires_at: number;
  consumed: number;
}

export function issueToken(db: Db, userId: string, ttlMs: number, now: number = Date.now()): VerificationToken {
  const token = randomToken(32);
  const expiresAt = now + ttlMs;
  db.prepare(`
    INSERT INTO verification_tokens (token, user_id, expires_at, consumed)
    VALUES (?, ?, ?, 0)
  `).run(token, userId, expiresAt);
  return { token, user_id: userId, expires_at: expiresAt, consumed: false };
}

/**
 * Consume a token and return its owner's id.
 *
 * Throws `TokenNotFound`, `TokenAlreadyConsumed` or `TokenExpired`. A token
 * that is both consumed and past expiry reports `TokenAlreadyConsumed`.
 */
export function redeemToken(db: Db, token: string, now: number = Date.now()): string {
  const claimed = db.prepare(`
    UPDATE verification_tokens SET consumed = 1, consumed_at = ?
    WHERE token = ? AND consumed = 0 AND expires_at > ?
    RETURNING user_id
  `).get(now, token, now) as { user_id: string } | undefined;

  if (claimed) return claimed.user_id;

  const row = db.prepare('SELECT * FROM verification_tokens WHERE token = ?').get(token) as TokenRow | undefined;
  if (!row) throw new AuthError('TokenNotFound', 'Verification token not found');
  if (row.consumed === 1) throw new AuthError('TokenAlreadyConsumed', 'Verification token already used');
  throw new AuthError('TokenExpired', 'Verification token expired');
}

export function getToken(db: Db, token: string): VerificationToken | null {
  const row = db.prepare('SELECT * FROM verification_tokens WHERE token = ?').get(token) as TokenRow | undefined;
  if (!row) return null;
  return { token: row.token, user_id: row.user_id, expires_at: row.expires_at, consumed: row.consumed === 1 };
}

/** Delete tokens that can never be redeemed again. Returns the number removed. */
export function purgeExpiredTokens(db: Db, now: number = Date.now()): number {
  return db.prepare('DELETE FROM verification_tokens WHERE consumed = 1 OR expires_at <= ?').run(now).changes;
}
