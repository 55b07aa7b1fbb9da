/**
 * Configuration for trainlog-auth.
 *
 * Everything is read once from the environment into an `AuthConfig` value that
 * is passed explicitly to the services that need it.
 */

import { ConfigError } from './errors.js';

export const DEFAULT_DATABASE_PATH = '.trainlog/auth.db';

export type OAuthProviderName = 'google' | 'github';

export const OAUTH_PROVIDERS: readonly OAuthProviderName[] = ['google', 'github'];

export interface OAuthCredentials {
  clientId: string;
  clientSecret: string;
}

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
}

export interface AuthConfig {
  /** Public base URL; OAuth redirect URIs and verification links hang off it */
  appUrl: string;
  port: number;
  databasePath: string;
  /** Signs session and OAuth state cookies */
  secretKey: string;
  providers: Partial<Record<OAuthProviderName, OAuthCredentials>>;
  smtp: SmtpConfig | null;
  verificationTokenTtlMs: number;
  sessionTtlMs: number;
  oauthTimeoutMs: number;
  bcryptRounds: number;
  cookieSecure: boolean;
}

type Env = Record<string, string | undefined>;

/** Every variable `loadConfig` understands, in display order for `config check`. */
export const CONFIG_VARIABLES: readonly { name: string; required: boolean; secret: boolean }[] = [
  { name: 'SECRET_KEY', required: true, secret: true },
  { name: 'APP_URL', required: false, secret: false },
  { name: 'PORT', required: false, secret: false },
  { name: 'DATABASE_PATH', required: false, secret: false },
  { name: 'GOOGLE_CLIENT_ID', required: false, secret: false },
  { name: 'GOOGLE_CLIENT_SECRET', required: false, secret: true },
  { name: 'GITHUB_CLIENT_ID', required: false, secret: false },
  { name: 'GITHUB_CLIENT_SECRET', required: false, secret: true },
  { name: 'SMTP_HOST', required: false, secret: false },
  { name: 'SMTP_PORT', required: false, secret: false },
  { name: 'SMTP_SECURE', required: false, secret: false },
  { name: 'SMTP_USER', required: false, secret: false },
  { name: 'SMTP_PASSWORD', required: false, secret: true },
  { name: 'MAIL_FROM', required: false, secret: false },
  { name: 'VERIFICATION_TOKEN_TTL_MINUTES', required: false, secret: false },
  { name: 'SESSION_TTL_HOURS', required: false, secret: false },
  { name: 'OAUTH_TIMEOUT_MS', required: false, secret: false },
  { name: 'BCRYPT_ROUNDS', required: false, secret: false },
  { name: 'COOKIE_SECURE', required: false, secret: false },
];

function value(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function required(env: Env, key: string): string {
  const val = value(env, key);
  if (!val) throw new ConfigError(key, `Missing env var: ${key}`);
  return val;
}

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = value(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || parsed <= 0) {
    throw new ConfigError(key, `${key} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

function flag(env: Env, key: string, fallback: boolean): boolean {
  const raw = value(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (['true', '1', 'yes', 'on'].includes(raw)) return true;
  if (['false', '0', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(key, `${key} must be a boolean, got "${raw}"`);
}

function providerCredentials(env: Env, prefix: string): OAuthCredentials | undefined {
  const clientId = value(env, `${prefix}_CLIENT_ID`);
  const clientSecret = value(env, `${prefix}_CLIENT_SECRET`);
  if (!clientId || !clientSecret) return undefined;
  return { clientId, clientSecret };
}

function smtpConfig(env: Env): SmtpConfig | null {
  const host = value(env, 'SMTP_HOST');
  if (!host) return null;
  const user = value(env, 'SMTP_USER');
  return {
    host,
    port: positiveInt(env, 'SMTP_PORT', 587),
    secure: flag(env, 'SMTP_SECURE', false),
    user,
    password: value(env, 'SMTP_PASSWORD'),
    from: value(env, 'MAIL_FROM') ?? user ?? `no-reply@${host}`,
  };
}

/**
 * Build the configuration from environment variables.
 * Throws `ConfigError` for a missing SECRET_KEY or a malformed number/flag.
 */
export function loadConfig(env: Env = process.env): AuthConfig {
  const appUrl = (value(env, 'APP_URL') ?? 'http://localhost:3000').replace(/\/+$/, '');
  try {
    new URL(appUrl);
  } catch {
    throw new ConfigError('APP_URL', `APP_URL is not a valid URL: "${appUrl}"`);
  }

  const providers: AuthConfig['providers'] = {};
  const google = providerCredentials(env, 'GOOGLE');
  if (google) providers.google = google;
  const github = providerCredentials(env, 'GITHUB');
  if (github) providers.github = github;

  return {
    appUrl,
    port: positiveInt(env, 'PORT', 3000),
    databasePath: resolveDatabasePath(undefined, env),
    secretKey: required(env, 'SECRET_KEY'),
    providers,
    smtp: smtpConfig(env),
    verificationTokenTtlMs: positiveInt(env, 'VERIFICATION_TOKEN_TTL_MINUTES', 24 * 60) * 60_000,
    sessionTtlMs: positiveInt(env, 'SESSION_TTL_HOURS', 7 * 24) * 3_600_000,
    oauthTimeoutMs: positiveInt(env, 'OAUTH_TIMEOUT_MS', 10_000),
    bcryptRounds: positiveInt(env, 'BCRYPT_ROUNDS', 12),
    cookieSecure: flag(env, 'COOKIE_SECURE', appUrl.startsWith('https://')),
  };
}

/** Explicit path, else DATABASE_PATH, else the default location */
export function resolveDatabasePath(explicit?: string, env: Env = process.env): string {
  return explicit || value(env, 'DATABASE_PATH') || DEFAULT_DATABASE_PATH;
}

export function getCallbackUrl(config: AuthConfig, provider: OAuthProviderName): string {
  return `${config.appUrl}/callback/${provider}`;
}

/** Providers with both a client id and secret configured */
export function getConfiguredProviders(config: AuthConfig): OAuthProviderName[] {
  return OAUTH_PROVIDERS.filter((name) => config.providers[name] !== undefined);
}

export function isOAuthProviderName(name: string): name is OAuthProviderName {
  return OAUTH_PROVIDERS.some((provider) => provider === name);
}
