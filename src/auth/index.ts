/**
 * Auth module — public API.
 */

export { AuthService } from './service.js';
export type {
  AuthServiceDeps,
  DeliveryOutcome,
  LoginOutcome,
  OAuthLoginOutcome,
  OAuthStart,
  RegisterOutcome,
  ResendOutcome,
} from './service.js';

export { OAuthClient, generateState, validateState } from './oauth.js';
export type { OAuthClientAdapter, ProviderIdentity } from './oauth.js';
export { PROVIDERS } from './providers.js';
export type { OAuthProvider, ProviderProfile } from './providers.js';

export { SqliteSessionStore, MemorySessionStore } from './session.js';
export type { Session, SessionStore, SessionStoreOptions } from './session.js';

export { ConsoleMailer, SmtpMailer, buildVerificationLink, verificationMessage } from './mailer.js';
export type { Mailer, SmtpMailerOptions } from './mailer.js';

export { issueToken, redeemToken, getToken, purgeExpiredTokens } from './tokens.js';
export type { VerificationToken } from './tokens.js';

export { hashPassword, verifyPassword, validatePassword, MAX_PASSWORD_BYTES } from './password.js';

export {
  createLocalUser,
  createOrLinkOAuthUser,
  findByEmail,
  findById,
  findByIdentity,
  findByUsername,
  getIdentities,
  listUsers,
  markVerified,
  normalizeEmail,
  setPasswordHash,
  touchLastLogin,
} from './user-store.js';
export type { OAuthIdentity, OAuthLinkResult, User } from './user-store.js';
