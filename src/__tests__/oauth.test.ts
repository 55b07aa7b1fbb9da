import { describe, it, expect, vi, beforeEach } from 'vitest';
import { generateState, OAuthClient, validateState } from '../auth/oauth.js';
import { PROVIDERS } from '../auth/providers.js';
import { AuthError } from '../errors.js';
import { testConfig } from './helpers.js';

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function jsonResponse(body: unknown, status = 200) {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

async function failure(promise: Promise<unknown>): Promise<AuthError> {
  const err = await promise.then(() => undefined, (e: unknown) => e);
  if (!(err instanceof AuthError)) throw new Error(`expected AuthError, got ${String(err)}`);
  return err;
}

describe('validateState', () => {
  it('returns true for matching states', () => {
    expect(validateState('abc123', 'abc123')).toBe(true);
  });

  it('returns false for mismatched states', () => {
    expect(validateState('abc123', 'xyz789')).toBe(false);
  });

  it('returns false for missing values', () => {
    expect(validateState(undefined, 'abc')).toBe(false);
    expect(validateState('abc', undefined)).toBe(false);
    expect(validateState('', '')).toBe(false);
  });

  it('returns false for different lengths', () => {
    expect(validateState('short', 'muchlonger')).toBe(false);
  });
});

describe('generateState', () => {
  it('returns a 64-char hex string', () => {
    expect(generateState()).toMatch(/^[0-9a-f]{64}$/);
  });

  it('generates unique values', () => {
    expect(generateState()).not.toBe(generateState());
  });
});

describe('PROVIDERS.mapProfile', () => {
  it('maps a google profile', () => {
    expect(PROVIDERS.google.mapProfile({ id: '98765', email: 'user@example.com', name: 'Test User' })).toEqual({
      subjectId: '98765',
      email: 'user@example.com',
      displayName: 'Test User',
    });
  });

  it('maps a github profile with a numeric id', () => {
    expect(PROVIDERS.github.mapProfile({ id: 12345, login: 'octo', name: null, email: null })).toEqual({
      subjectId: '12345',
      email: null,
      displayName: 'octo',
      usernameHint: 'octo',
    });
  });
});

describe('OAuthClient.buildAuthorizationUrl', () => {
  const client = new OAuthClient(testConfig());

  it('builds the github URL', () => {
    const url = new URL(client.buildAuthorizationUrl('github', 'state-1'));
    expect(`${url.origin}${url.pathname}`).toBe('https://github.com/login/oauth/authorize');
    expect(url.searchParams.get('client_id')).toBe('github-client');
    expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:3000/callback/github');
    expect(url.searchParams.get('scope')).toBe('read:user user:email');
    expect(url.searchParams.get('state')).toBe('state-1');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('allow_signup')).toBe('true');
  });

  it('builds the google URL', () => {
    const url = new URL(client.buildAuthorizationUrl('google', 'state-2'));
    expect(`${url.origin}${url.pathname}`).toBe('https://accounts.google.com/o/oauth2/v2/auth');
    expect(url.searchParams.get('scope')).toBe('openid email profile');
    expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:3000/callback/google');
    expect(url.searchParams.get('prompt')).toBe('select_account');
  });

  it('rejects an unconfigured provider', () => {
    const bare = new OAuthClient(testConfig({ providers: {} }));
    expect(bare.isConfigured('github')).toBe(false);
    expect(() => bare.buildAuthorizationUrl('github', 's')).toThrow('OAuth provider not configured: github');
  });
});

describe('OAuthClient.exchangeCodeForIdentity', () => {
  const client = new OAuthClient(testConfig());

  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('completes a GitHub login', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 'gho_test', token_type: 'bearer' }));
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: 12345, login: 'octo', name: 'The Octo', email: 'octo@example.com' }));

    const identity = await client.exchangeCodeForIdentity('github', 'code-1', 'st', 'st');
    expect(identity).toEqual({
      provider: 'github',
      subjectId: '12345',
      email: 'octo@example.com',
      displayName: 'The Octo',
      usernameHint: 'octo',
    });

    expect(mockFetch).toHaveBeenCalledTimes(2);
    const [tokenUrl, tokenInit] = mockFetch.mock.calls[0];
    expect(tokenUrl).toBe('https://github.com/login/oauth/access_token');
    expect(tokenInit.method).toBe('POST');
    const form = new URLSearchParams(tokenInit.body);
    expect(form.get('code')).toBe('code-1');
    expect(form.get('grant_type')).toBe('authorization_code');
    expect(form.get('client_secret')).toBe('github-secret');
    expect(form.get('redirect_uri')).toBe('http://localhost:3000/callback/github');

    const [profileUrl, profileInit] = mockFetch.mock.calls[1];
    expect(profileUrl).toBe('https://api.github.com/user');
    expect(profileInit.headers.Authorization).toBe('Bearer gho_test');
  });

  it('completes a Google login', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 'ya29.test', token_type: 'Bearer' }));
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: '98765', email: 'user@example.com', name: 'Test User' }));

    const identity = await client.exchangeCodeForIdentity('google', 'code-2', 'st', 'st');
    expect(identity.subjectId).toBe('98765');
    expect(identity.email).toBe('user@example.com');
    expect(mockFetch.mock.calls[0][0]).toBe('https://oauth2.googleapis.com/token');
  });

  it('rejects a state mismatch before any network call', async () => {
    const err = await failure(client.exchangeCodeForIdentity('github', 'code', 'wrong', 'expected'));
    expect(err.kind).toBe('InvalidState');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('rejects a missing expected state', async () => {
    const err = await failure(client.exchangeCodeForIdentity('github', 'code', 'st', undefined));
    expect(err.kind).toBe('InvalidState');
  });

  it('rejects a missing code', async () => {
    const err = await failure(client.exchangeCodeForIdentity('github', '', 'st', 'st'));
    expect(err.kind).toBe('CodeExchangeFailed');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('reports a token endpoint HTTP error', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, 400));
    const err = await failure(client.exchangeCodeForIdentity('google', 'code', 'st', 'st'));
    expect(err.kind).toBe('CodeExchangeFailed');
    expect(err.message).toBe('Token exchange failed: HTTP 400');
  });

  it('reports an error body from a 200 token response', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({
      error: 'bad_verification_code',
      error_description: 'The code passed is incorrect or expired.',
    }));
    const err = await failure(client.exchangeCodeForIdentity('github', 'code', 'st', 'st'));
    expect(err.kind).toBe('CodeExchangeFailed');
    expect(err.message).toBe('Token exchange failed: The code passed is incorrect or expired.');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('reports a timeout', async () => {
    mockFetch.mockRejectedValueOnce(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));
    const err = await failure(client.exchangeCodeForIdentity('github', 'code', 'st', 'st'));
    expect(err.kind).toBe('CodeExchangeFailed');
    expect(err.message).toBe('Token exchange failed: request timed out');
  });

  it('passes an abort signal to every request', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 't' }));
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: 1, email: 'a@example.com' }));
    await client.exchangeCodeForIdentity('github', 'code', 'st', 'st');
    expect(mockFetch.mock.calls[0][1].signal).toBeInstanceOf(AbortSignal);
    expect(mockFetch.mock.calls[1][1].signal).toBeInstanceOf(AbortSignal);
  });

  it('reports a profile fetch failure', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 't' }));
    mockFetch.mockResolvedValueOnce(jsonResponse({ message: 'Bad credentials' }, 401));
    const err = await failure(client.exchangeCodeForIdentity('github', 'code', 'st', 'st'));
    expect(err.kind).toBe('ProfileFetchFailed');
    expect(err.message).toBe('User info fetch failed: HTTP 401');
  });

  it('reports a profile without a user id', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 't' }));
    mockFetch.mockResolvedValueOnce(jsonResponse({ email: 'a@example.com' }));
    const err = await failure(client.exchangeCodeForIdentity('google', 'code', 'st', 'st'));
    expect(err.kind).toBe('ProfileFetchFailed');
  });

  it('reports a GitHub account with a private email', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 't' }));
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: 7, login: 'quiet', email: null }));
    const err = await failure(client.exchangeCodeForIdentity('github', 'code', 'st', 'st'));
    expect(err.kind).toBe('MissingEmailClaim');
  });

  it('rejects an unconfigured provider', async () => {
    const bare = new OAuthClient(testConfig({ providers: {} }));
    const err = await failure(bare.exchangeCodeForIdentity('google', 'code', 'st', 'st'));
    expect(err.kind).toBe('UnknownProvider');
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
