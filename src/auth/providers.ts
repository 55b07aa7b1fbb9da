/**
 * Supported OAuth identity providers.
 *
 * Each variant carries its endpoints, scopes and the mapping from the
 * provider's profile payload to a `ProviderProfile`. Adding a provider means
 * adding an entry here and to `OAuthProviderName`.
 */

import type { OAuthProviderName } from '../config.js';

export interface ProviderProfile {
  /** Stable provider-issued user id */
  subjectId: string;
  email: string | null;
  displayName: string;
  /** Suggested local username (e.g. the GitHub login) */
  usernameHint?: string;
}

export interface OAuthProvider {
  name: OAuthProviderName;
  authorizeUrl: string;
  tokenUrl: string;
  userInfoUrl: string;
  scopes: string[];
  extraAuthorizeParams: Record<string, string>;
  mapProfile(raw: Record<string, unknown>): ProviderProfile;
}

function str(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export const PROVIDERS: Record<OAuthProviderName, OAuthProvider> = {
  google: {
    name: 'google',
    authorizeUrl: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenUrl: 'https://oauth2.googleapis.com/token',
    userInfoUrl: 'https://www.googleapis.com/oauth2/v2/userinfo',
    scopes: ['openid', 'email', 'profile'],
    extraAuthorizeParams: { prompt: 'select_account' },
    mapProfile(raw) {
      const email = str(raw.email) ?? null;
      return {
        subjectId: str(raw.id) ?? str(raw.sub) ?? '',
        email,
        displayName: str(raw.name) ?? email ?? '',
      };
    },
  },
  github: {
    name: 'github',
    authorizeUrl: 'https://github.com/login/oauth/authorize',
    tokenUrl: 'https://github.com/login/oauth/access_token',
    userInfoUrl: 'https://api.github.com/user',
    scopes: ['read:user', 'user:email'],
    extraAuthorizeParams: { allow_signup: 'true' },
    mapProfile(raw) {
      const login = str(raw.login);
      return {
        subjectId: str(raw.id) ?? '',
        // null when the user keeps their email private
        email: str(raw.email) ?? null,
        displayName: str(raw.name) ?? login ?? '',
        usernameHint: login,
      };
    },
  },
};
