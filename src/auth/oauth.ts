/**
 * OAuth 2.0 authorization-code client for the supported providers.
 *
 * Flow:
 *   1. `buildAuthorizationUrl` with a fresh `generateState()` value; the caller
 *      keeps that state in the browser's pre-auth context (a signed cookie)
 *   2. Provider redirects back to /callback/:provider with `code` and `state`
 *   3. `exchangeCodeForIdentity` checks the state, trades the code for an
 *      access token and reads the profile (two round-trips, each bounded by
 *      `oauthTimeoutMs`)
 */

import { randomBytes, timingSafeEqual } from 'crypto';
import type { AuthConfig, OAuthProviderName } from '../config.js';
import { getCallbackUrl } from '../config.js';
import { AuthError } from '../errors.js';
import { log } from '../utils.js';
import { PROVIDERS } from './providers.js';
import type { OAuthProvider } from './providers.js';

// ─── Types ───────────────────────────────────────────────

export interface ProviderIdentity {
  provider: OAuthProviderName;
  subjectId: string;
  email: string;
  displayName: string;
  usernameHint?: string;
}

export interface OAuthClientAdapter {
  /** Whether client credentials exist for `provider` */
  isConfigured(provider: OAuthProviderName): boolean;
  buildAuthorizationUrl(provider: OAuthProviderName, state: string): string;
  /**
   * Throws `InvalidState`, `CodeExchangeFailed`, `ProfileFetchFailed`,
   * `MissingEmailClaim` or `UnknownProvider`.
   */
  exchangeCodeForIdentity(
    provider: OAuthProviderName,
    code: string,
    state: string | undefined,
    expectedState: string | undefined,
  ): Promise<ProviderIdentity>;
}

interface TokenResponse {
  access_token: string;
  token_type?: string;
  scope?: string;
}

// ─── State ───────────────────────────────────────────────

/** Generate a cryptographically random state parameter for CSRF protection. */
export function generateState(): string {
  return randomBytes(32).toString('hex');
}

/**
 * Constant-time state comparison. Missing values never match.
 */
export function validateState(receivedState: string | undefined, expectedState: string | undefined): boolean {
  if (!receivedState || !expectedState) return false;
  const received = Buffer.from(receivedState);
  const expected = Buffer.from(expectedState);
  if (received.length !== expected.length) return false;
  return timingSafeEqual(received, expected);
}

// ─── Client ──────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(err: unknown): string {
  if (err instanceof Error && err.name === 'TimeoutError') return 'request timed out';
  return err instanceof Error ? err.message : String(err);
}

export class OAuthClient implements OAuthClientAdapter {
  constructor(private readonly config: AuthConfig) {}

  isConfigured(provider: OAuthProviderName): boolean {
    return this.config.providers[provider] !== undefined;
  }

  buildAuthorizationUrl(provider: OAuthProviderName, state: string): string {
    const { preset, clientId } = this.resolve(provider);
    const params = new URLSearchParams({
      client_id: clientId,
      redirect_uri: getCallbackUrl(this.config, provider),
      scope: preset.scopes.join(' '),
      state,
      response_type: 'code',
      ...preset.extraAuthorizeParams,
    });
    return `${preset.authorizeUrl}?${params.toString()}`;
  }

  async exchangeCodeForIdentity(
    provider: OAuthProviderName,
    code: string,
    state: string | undefined,
    expectedState: string | undefined,
  ): Promise<ProviderIdentity> {
    // CSRF check comes first: nothing reaches the provider with a bad state
    if (!validateState(state, expectedState)) {
      throw new AuthError('InvalidState', 'OAuth state is missing or does not match');
    }
    if (!code) {
      throw new AuthError('CodeExchangeFailed', 'Missing authorization code');
    }

    const resolved = this.resolve(provider);
    const token = await this.exchangeCodeForToken(resolved, code);
    const profile = await this.fetchProfile(resolved.preset, token.access_token);

    const mapped = resolved.preset.mapProfile(profile);
    if (!mapped.subjectId) {
      throw new AuthError('ProfileFetchFailed', `${provider} profile has no user id`);
    }
    if (!mapped.email) {
      throw new AuthError('MissingEmailClaim', `${provider} did not return an email address`);
    }

    return {
      provider,
      subjectId: mapped.subjectId,
      email: mapped.email,
      displayName: mapped.displayName,
      usernameHint: mapped.usernameHint,
    };
  }

  private resolve(provider: OAuthProviderName): { preset: OAuthProvider; clientId: string; clientSecret: string } {
    const credentials = this.config.providers[provider];
    if (!credentials) {
      throw new AuthError('UnknownProvider', `OAuth provider not configured: ${provider}`);
    }
    return { preset: PROVIDERS[provider], ...credentials };
  }

  private async exchangeCodeForToken(
    provider: { preset: OAuthProvider; clientId: string; clientSecret: string },
    code: string,
  ): Promise<TokenResponse> {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: getCallbackUrl(this.config, provider.preset.name),
      client_id: provider.clientId,
      client_secret: provider.clientSecret,
    });

    let data: unknown;
    try {
      const resp = await fetch(provider.preset.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
        signal: AbortSignal.timeout(this.config.oauthTimeoutMs),
      });
      if (!resp.ok) {
        throw new Error(`HTTP ${resp.status}`);
      }
      data = await resp.json();
    } catch (err: unknown) {
      log.warn('oauth_code_exchange_failed', { provider: provider.preset.name, reason: describe(err) });
      throw new AuthError('CodeExchangeFailed', `Token exchange failed: ${describe(err)}`, { cause: err });
    }

    // GitHub answers 200 with an error body for a bad or reused code
    if (!isRecord(data) || typeof data.access_token !== 'string' || data.access_token === '') {
      const reason = isRecord(data) && typeof data.error === 'string'
        ? String(data.error_description ?? data.error)
        : 'no access_token in response';
      log.warn('oauth_code_exchange_failed', { provider: provider.preset.name, reason });
      throw new AuthError('CodeExchangeFailed', `Token exchange failed: ${reason}`);
    }

    return {
      access_token: data.access_token,
      token_type: typeof data.token_type === 'string' ? data.token_type : undefined,
      scope: typeof data.scope === 'string' ? data.scope : undefined,
    };
  }

  private async fetchProfile(provider: OAuthProvider, accessToken: string): Promise<Record<string, unknown>> {
    let data: unknown;
    try {
      const resp = await fetch(provider.userInfoUrl, {
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
          'User-Agent': 'trainlog-auth',
        },
        signal: AbortSignal.timeout(this.config.oauthTimeoutMs),
      });
      if (!resp.ok) {
        throw new Error(`HTTP ${resp.status}`);
      }
      data = await resp.json();
    } catch (err: unknown) {
      log.warn('oauth_profile_fetch_failed', { provider: provider.name, reason: describe(err) });
      throw new AuthError('ProfileFetchFailed', `User info fetch failed: ${describe(err)}`, { cause: err });
    }

    if (!isRecord(data)) {
      throw new AuthError('ProfileFetchFailed', 'User info response is not an object');
    }
    return data;
  }
}
