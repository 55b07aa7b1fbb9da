/**
 * Credential store.
 *
 * Users and their linked OAuth identities live in the SQLite database.
 * A user has a password hash, at least one linked identity, or both.
 * Users are never deleted here.
 */

import type { Db } from '../db.js';
import { isUniqueViolation } from '../db.js';
import { AuthError } from '../errors.js';
import type { OAuthProviderName } from '../config.js';
import { generateUserId, log } from '../utils.js';

// ─── Types ───────────────────────────────────────────────

export interface User {
  id: string;
  email: string;
  username: string;
  password_hash: string | null;
  is_verified: boolean;
  created_at: string;
  updated_at: string;
  last_login_at: string | null;
}

export interface OAuthIdentity {
  user_id: string;
  provider: OAuthProviderName;
  subject_id: string;
  provider_email: string;
  display_name: string;
  created_at: string;
}

export interface OAuthLinkResult {
  user: User;
  /** A new user row was inserted */
  created: boolean;
  /** The identity was attached to an existing user found by email */
  linked: boolean;
}

interface UserRow extends Omit<User, 'is_verified'> {
  is_verified: number;
}

// ─── Helpers ─────────────────────────────────────────────

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function toUser(row: UserRow | undefined): User | null {
  if (!row) return null;
  return { ...row, is_verified: row.is_verified === 1 };
}

function requireUser(db: Db, userId: string): User {
  const user = findById(db, userId);
  if (!user) throw new Error(`User not found: ${userId}`);
  return user;
}

function usernameBase(hint: string): string {
  const base = hint
    .toLowerCase()
    .replace(/[^a-z0-9_.-]+/g, '-')
    .replace(/^[-.]+|[-.]+$/g, '')
    .slice(0, 32);
  return base || 'user';
}

/** First free username of `base`, `base-2`, `base-3`, … */
function availableUsername(db: Db, hint: string): string {
  const base = usernameBase(hint);
  const taken = db.prepare('SELECT 1 FROM users WHERE username = ?');
  if (!taken.get(base)) return base;
  for (let n = 2; ; n++) {
    const candidate = `${base}-${n}`;
    if (!taken.get(candidate)) return candidate;
  }
}

// ─── Queries ─────────────────────────────────────────────

export function findById(db: Db, userId: string): User | null {
  return toUser(db.prepare('SELECT * FROM users WHERE id = ?').get(userId) as UserRow | undefined);
}

/** Case-insensitive lookup */
export function findByEmail(db: Db, email: string): User | null {
  return toUser(
    db.prepare('SELECT * FROM users WHERE email = ?').get(normalizeEmail(email)) as UserRow | undefined,
  );
}

export function findByUsername(db: Db, username: string): User | null {
  return toUser(
    db.prepare('SELECT * FROM users WHERE username = ?').get(username.trim()) as UserRow | undefined,
  );
}

export function findByIdentity(db: Db, provider: OAuthProviderName, subjectId: string): User | null {
  return toUser(
    db.prepare(`
      SELECT u.* FROM users u
      JOIN oauth_accounts a ON a.user_id = u.id
      WHERE a.provider = ? AND a.subject_id = ?
    `).get(provider, subjectId) as UserRow | undefined,
  );
}

export function getIdentities(db: Db, userId: string): OAuthIdentity[] {
  return db.prepare(`
    SELECT user_id, provider, subject_id, provider_email, display_name, created_at
    FROM oauth_accounts WHERE user_id = ? ORDER BY provider
  `).all(userId) as OAuthIdentity[];
}

export function listUsers(db: Db): User[] {
  const rows = db.prepare('SELECT * FROM users ORDER BY created_at, rowid').all() as UserRow[];
  return rows.map((row) => ({ ...row, is_verified: row.is_verified === 1 }));
}

// ─── Mutations ───────────────────────────────────────────

/**
 * Insert a local (password) account in the unverified state.
 *
 * Duplicate email is reported before duplicate username. The pre-checks give
 * the precise kind; the UNIQUE constraints close the check-then-insert race.
 */
export function createLocalUser(db: Db, email: string, username: string, passwordHash: string): User {
  const normalized = normalizeEmail(email);
  const name = username.trim();

  if (findByEmail(db, normalized)) {
    throw new AuthError('DuplicateEmail', `Email already registered: ${normalized}`);
  }
  if (findByUsername(db, name)) {
    throw new AuthError('DuplicateUsername', `Username already taken: ${name}`);
  }

  const id = generateUserId();
  try {
    db.prepare(`
      INSERT INTO users (id, email, username, password_hash, is_verified)
      VALUES (?, ?, ?, ?, 0)
    `).run(id, normalized, name, passwordHash);
  } catch (err: unknown) {
    if (isUniqueViolation(err)) {
      if (err.message.includes('users.email')) {
        throw new AuthError('DuplicateEmail', `Email already registered: ${normalized}`, { cause: err });
      }
      if (err.message.includes('users.username')) {
        throw new AuthError('DuplicateUsername', `Username already taken: ${name}`, { cause: err });
      }
    }
    throw err;
  }

  return requireUser(db, id);
}

/**
 * Resolve a federated login to a user.
 *
 * Matching strategy:
 *   1. Existing identity (same provider + subject) → that user
 *   2. Existing user with the same email → link the identity to it
 *   3. No match → create a verified user with a derived username
 *
 * Runs as one IMMEDIATE transaction so concurrent first logins cannot both insert.
 */
export function createOrLinkOAuthUser(
  db: Db,
  provider: OAuthProviderName,
  subjectId: string,
  email: string,
  displayName: string,
  usernameHint?: string,
): OAuthLinkResult {
  const normalized = normalizeEmail(email);

  const resolve = db.transaction((): OAuthLinkResult => {
    const existing = findByIdentity(db, provider, subjectId);
    if (existing) {
      db.prepare(`
        UPDATE oauth_accounts SET provider_email = ?, display_name = ?, updated_at = datetime('now')
        WHERE provider = ? AND subject_id = ?
      `).run(normalized, displayName, provider, subjectId);
      return { user: existing, created: false, linked: false };
    }

    const byEmail = findByEmail(db, normalized);
    if (byEmail) {
      const clash = db.prepare(
        'SELECT subject_id FROM oauth_accounts WHERE user_id = ? AND provider = ?',
      ).get(byEmail.id, provider) as { subject_id: string } | undefined;
      if (clash) {
        throw new AuthError(
          'ProviderAlreadyLinked',
          `User ${byEmail.id} is already linked to a different ${provider} account`,
        );
      }

      insertIdentity(db, byEmail.id, provider, subjectId, normalized, displayName);

      if (!byEmail.is_verified) {
        // The provider has proven ownership of the address; an unverified
        // password was chosen by whoever registered it, so it is dropped.
        db.prepare(`
          UPDATE users SET is_verified = 1, password_hash = NULL, updated_at = datetime('now')
          WHERE id = ?
        `).run(byEmail.id);
        log.warn('unverified_account_claimed_by_oauth', { userId: byEmail.id, provider });
      }

      return { user: requireUser(db, byEmail.id), created: false, linked: true };
    }

    const id = generateUserId();
    const username = availableUsername(db, usernameHint || normalized.split('@')[0]);
    db.prepare(`
      INSERT INTO users (id, email, username, password_hash, is_verified)
      VALUES (?, ?, ?, NULL, 1)
    `).run(id, normalized, username);
    insertIdentity(db, id, provider, subjectId, normalized, displayName);

    return { user: requireUser(db, id), created: true, linked: false };
  });

  return resolve.immediate();
}

/** Flip `is_verified` to true. No-op for an already verified user. */
export function markVerified(db: Db, userId: string): void {
  const result = db.prepare(`
    UPDATE users SET is_verified = 1, updated_at = datetime('now')
    WHERE id = ? AND is_verified = 0
  `).run(userId);
  if (result.changes === 0) requireUser(db, userId);
}

export function setPasswordHash(db: Db, userId: string, hash: string): void {
  const result = db.prepare(`
    UPDATE users SET password_hash = ?, updated_at = datetime('now') WHERE id = ?
  `).run(hash, userId);
  if (result.changes === 0) throw new Error(`User not found: ${userId}`);
}

export function touchLastLogin(db: Db, userId: string): void {
  db.prepare(`
    UPDATE users SET last_login_at = datetime('now'), updated_at = datetime('now') WHERE id = ?
  `).run(userId);
}

// ─── Internal Helpers ────────────────────────────────────

function insertIdentity(
  db: Db,
  userId: string,
  provider: OAuthProviderName,
  subjectId: string,
  email: string,
  displayName: string,
): void {
  db.prepare(`
    INSERT INTO oauth_accounts (user_id, provider, subject_id, provider_email, display_name)
    VALUES (?, ?, ?, ?, ?)
  `).run(userId, provider, subjectId, email, displayName);
}
