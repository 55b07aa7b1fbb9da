export * from './auth/index.js';
export { AuthError, ConfigError, ERROR_MESSAGES, fail, isAuthError, ok } from './errors.js';
export type { AuthErrorKind, AuthResult } from './errors.js';
export {
  CONFIG_VARIABLES,
  OAUTH_PROVIDERS,
  getCallbackUrl,
  getConfiguredProviders,
  isOAuthProviderName,
  loadConfig,
  resolveDatabasePath,
} from './config.js';
export type { AuthConfig, OAuthCredentials, OAuthProviderName, SmtpConfig } from './config.js';
export { openDb, ensureSchema } from './db.js';
export type { Db } from './db.js';
export { createApp, startServer, buildMailer, SESSION_COOKIE, STATE_COOKIE } from './server.js';
export type { AppOptions, RunningServer } from './server.js';
