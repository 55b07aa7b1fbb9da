/**
 * Auth orchestrator.
 *
 * Ties the credential store, token issuer, mailer, OAuth client and session
 * store together behind one method per entry point. Local accounts move
 * Unregistered → PendingVerification → Verified; there is no other state.
 *
 * Every method resolves to an `AuthResult`; expected failures never throw.
 */

import type { AuthConfig, OAuthProviderName } from '../config.js';
import { getConfiguredProviders, isOAuthProviderName } from '../config.js';
import type { Db } from '../db.js';
import { AuthError, ERROR_MESSAGES, fail, isAuthError, ok } from '../errors.js';
import type { AuthResult } from '../errors.js';
import { log, randomToken } from '../utils.js';
import { buildVerificationLink } from './mailer.js';
import type { Mailer } from './mailer.js';
import { generateState } from './oauth.js';
import type { OAuthClientAdapter } from './oauth.js';
import { hashPassword, validatePassword, verifyPassword } from './password.js';
import type { Session, SessionStore } from './session.js';
import { issueToken, redeemToken } from './tokens.js';
import {
  createLocalUser,
  createOrLinkOAuthUser,
  findByEmail,
  findById,
  markVerified,
  normalizeEmail,
  touchLastLogin,
} from './user-store.js';
import type { User } from './user-store.js';

// ─── Types ───────────────────────────────────────────────

export interface AuthServiceDeps {
  db: Db;
  config: AuthConfig;
  sessions: SessionStore;
  mailer: Mailer;
  oauth: OAuthClientAdapter;
  /** Clock for token expiry; defaults to Date.now */
  now?: () => number;
}

export interface DeliveryOutcome {
  emailSent: boolean;
  /** Present when the verification email could not be sent */
  deliveryError?: string;
}

export interface RegisterOutcome extends DeliveryOutcome {
  user: User;
}

export interface ResendOutcome {
  requested: true;
}

export interface LoginOutcome {
  user: User;
  session: Session;
}

export interface OAuthStart {
  provider: OAuthProviderName;
  url: string;
  state: string;
}

export interface OAuthLoginOutcome extends LoginOutcome {
  /** First login with this identity created the account */
  created: boolean;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{1,80}$/;

function validateEmail(email: string): string {
  const normalized = normalizeEmail(email);
  if (normalized.length > 254 || !EMAIL_PATTERN.test(normalized)) {
    throw new AuthError('InvalidInput', 'A valid email address is required');
  }
  return normalized;
}

function validateUsername(username: string): string {
  const trimmed = username.trim();
  if (!USERNAME_PATTERN.test(trimmed)) {
    throw new AuthError('InvalidInput', 'Username must be 1-80 letters, digits, dots, dashes or underscores');
  }
  return trimmed;
}

// ─── Service ─────────────────────────────────────────────

export class AuthService {
  private readonly db: Db;
  private readonly config: AuthConfig;
  private readonly sessions: SessionStore;
  private readonly mailer: Mailer;
  private readonly oauth: OAuthClientAdapter;
  private readonly now: () => number;
  private placeholder?: Promise<string>;

  constructor(deps: AuthServiceDeps) {
    this.db = deps.db;
    this.config = deps.config;
    this.sessions = deps.sessions;
    this.mailer = deps.mailer;
    this.oauth = deps.oauth;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Create a local account in PendingVerification and send its verification
   * email. Mail failure is reported in the outcome; the account stays.
   */
  register(email: string, username: string, password: string): Promise<AuthResult<RegisterOutcome>> {
    return this.run('register', async () => {
      const normalized = validateEmail(email);
      const name = validateUsername(username);
      validatePassword(password);

      const passwordHash = await hashPassword(password, this.config.bcryptRounds);
      const create = this.db.transaction(() => {
        const user = createLocalUser(this.db, normalized, name, passwordHash);
        const token = issueToken(this.db, user.id, this.config.verificationTokenTtlMs, this.now());
        return { user, token };
      });
      const { user, token } = create();
      log.info('user_registered', { userId: user.id });

      const delivery = await this.deliver(user.email, token.token);
      return { user, ...delivery };
    });
  }

  /**
   * Issue and mail a fresh token to an unverified local account. Unknown,
   * verified and OAuth-only addresses get the same answer without a mail, so
   * the endpoint does not reveal which accounts exist.
   */
  resendVerification(email: string): Promise<AuthResult<ResendOutcome>> {
    return this.run<ResendOutcome>('resend_verification', async () => {
      const user = findByEmail(this.db, email);
      const skip = !user ? 'unknown_email' : !user.password_hash ? 'no_password' : user.is_verified ? 'already_verified' : null;
      if (!user || skip) {
        log.info('verification_resend_skipped', { reason: skip });
        return { requested: true };
      }
      const token = issueToken(this.db, user.id, this.config.verificationTokenTtlMs, this.now());
      await this.mailer.sendVerificationEmail(user.email, buildVerificationLink(this.config.appUrl, token.token));
      return { requested: true };
    });
  }

  /**
   * Redeem a verification token and mark its owner verified, in one
   * transaction. Token failures leave the user untouched.
   */
  verifyEmail(token: string): Promise<AuthResult<{ userId: string }>> {
    return this.run('verify_email', async () => {
      if (!token) throw new AuthError('TokenNotFound', 'Missing verification token');
      const verify = this.db.transaction((value: string) => {
        const userId = redeemToken(this.db, value, this.now());
        markVerified(this.db, userId);
        return userId;
      });
      const userId = verify(token);
      log.info('email_verified', { userId });
      return { userId };
    });
  }

  /**
   * Password login. Absent user, missing local credential and wrong password
   * all report `InvalidCredentials`; a correct password on an unverified
   * account reports `NotVerified`.
   */
  login(email: string, password: string, previousSessionId?: string): Promise<AuthResult<LoginOutcome>> {
    return this.run('login', async () => {
      const user = findByEmail(this.db, email);
      // Always pay for one bcrypt comparison so timing does not reveal whether the account exists
      const hash = user?.password_hash ?? (await this.placeholderHash());
      const matches = await verifyPassword(password, hash);
      if (!user || !user.password_hash || !password || !matches) {
        throw new AuthError('InvalidCredentials', 'Invalid email or password');
      }
      if (!user.is_verified) {
        throw new AuthError('NotVerified', 'Email address not verified');
      }
      return this.startSession(user, previousSessionId);
    });
  }

  /** Authorization URL plus the state value the caller must keep for the callback. */
  beginOAuth(provider: string): Promise<AuthResult<OAuthStart>> {
    return this.run('oauth_begin', async () => {
      const name = this.requireProvider(provider);
      const state = generateState();
      return { provider: name, state, url: this.oauth.buildAuthorizationUrl(name, state) };
    });
  }

  /**
   * Complete a federated login. On any adapter or linking failure no user
   * and no session is created.
   */
  oauthCallback(
    provider: string,
    code: string | undefined,
    state: string | undefined,
    expectedState: string | undefined,
    previousSessionId?: string,
  ): Promise<AuthResult<OAuthLoginOutcome>> {
    return this.run('oauth_callback', async () => {
      const name = this.requireProvider(provider);
      const identity = await this.oauth.exchangeCodeForIdentity(name, code ?? '', state, expectedState);
      const { user, created, linked } = createOrLinkOAuthUser(
        this.db,
        name,
        identity.subjectId,
        identity.email,
        identity.displayName,
        identity.usernameHint,
      );
      if (created) log.info('user_created_via_oauth', { userId: user.id, provider: name });
      if (linked) log.info('oauth_identity_linked', { userId: user.id, provider: name });

      const outcome = this.startSession(user, previousSessionId);
      return { ...outcome, created };
    });
  }

  /** Always succeeds; destroying an absent session is a no-op. */
  logout(sessionId: string | undefined): Promise<AuthResult<void>> {
    return this.run('logout', async () => {
      this.sessions.destroy(sessionId);
    });
  }

  currentUser(sessionId: string | undefined): Promise<AuthResult<User>> {
    return this.run('current_user', async () => {
      const userId = this.sessions.validate(sessionId);
      const user = findById(this.db, userId);
      if (!user) {
        this.sessions.destroy(sessionId);
        throw new AuthError('NoSession', 'Session user no longer exists');
      }
      return user;
    });
  }

  /** Providers that can be offered on the login page */
  enabledProviders(): OAuthProviderName[] {
    return getConfiguredProviders(this.config).filter((name) => this.oauth.isConfigured(name));
  }

  // ─── Internal Helpers ──────────────────────────────────

  private requireProvider(provider: string): OAuthProviderName {
    if (!isOAuthProviderName(provider) || !this.oauth.isConfigured(provider)) {
      throw new AuthError('UnknownProvider', `Unknown or unconfigured provider: ${provider}`);
    }
    return provider;
  }

  /** Hash of a random throwaway password, at the configured cost */
  private placeholderHash(): Promise<string> {
    if (!this.placeholder) {
      this.placeholder = hashPassword(randomToken(16), this.config.bcryptRounds);
    }
    return this.placeholder;
  }

  private startSession(user: User, previousSessionId?: string): LoginOutcome {
    const session = this.sessions.establish(user.id, previousSessionId);
    touchLastLogin(this.db, user.id);
    log.info('session_established', { userId: user.id });
    return { user, session };
  }

  private async deliver(email: string, token: string): Promise<DeliveryOutcome> {
    const link = buildVerificationLink(this.config.appUrl, token);
    try {
      await this.mailer.sendVerificationEmail(email, link);
      return { emailSent: true };
    } catch (err: unknown) {
      if (isAuthError(err) && err.kind === 'DeliveryError') {
        return { emailSent: false, deliveryError: ERROR_MESSAGES.DeliveryError };
      }
      throw err;
    }
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<AuthResult<T>> {
    try {
      return ok(await fn());
    } catch (err: unknown) {
      if (!isAuthError(err)) throw err;
      log.info('auth_failure', { operation, kind: err.kind });
      const message = err.kind === 'InvalidInput' ? err.message : ERROR_MESSAGES[err.kind];
      return fail(err.kind, message);
    }
  }
}
