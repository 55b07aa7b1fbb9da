import type { AuthConfig } from '../config.js';
import { openDb } from '../db.js';
import type { Db } from '../db.js';
import type { Mailer } from '../auth/mailer.js';
import type { OAuthClientAdapter, ProviderIdentity } from '../auth/oauth.js';
import type { OAuthProviderName } from '../config.js';
import { AuthError } from '../errors.js';

export const SECRET = 'test-secret';

export function makeDb(): Db {
  return openDb(':memory:');
}

export function testConfig(overrides: Partial<AuthConfig> = {}): AuthConfig {
  return {
    appUrl: 'http://localhost:3000',
    port: 0,
    databasePath: ':memory:',
    secretKey: SECRET,
    providers: {
      google: { clientId: 'google-client', clientSecret: 'google-secret' },
      github: { clientId: 'github-client', clientSecret: 'github-secret' },
    },
    smtp: null,
    verificationTokenTtlMs: 60 * 60 * 1000,
    sessionTtlMs: 24 * 60 * 60 * 1000,
    oauthTimeoutMs: 1000,
    bcryptRounds: 4,
    cookieSecure: false,
    ...overrides,
  };
}

/** Records every message instead of sending it; `failNext` makes the next send throw. */
export class RecordingMailer implements Mailer {
  readonly sent: { to: string; link: string }[] = [];
  failNext = false;

  async sendVerificationEmail(toAddress: string, verificationLink: string): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new AuthError('DeliveryError', 'relay refused');
    }
    this.sent.push({ to: toAddress, link: verificationLink });
  }

  lastToken(): string {
    const last = this.sent[this.sent.length - 1];
    if (!last) throw new Error('no mail sent');
    const token = new URL(last.link).searchParams.get('token');
    if (!token) throw new Error('link has no token');
    return token;
  }
}

/**
 * OAuth adapter that accepts code "good-code" and answers with `identity`.
 * State is checked exactly like the real client.
 */
export class FakeOAuth implements OAuthClientAdapter {
  identity: Omit<ProviderIdentity, 'provider'> = {
    subjectId: 'subject-1',
    email: 'oauth@example.com',
    displayName: 'OAuth User',
  };
  failWith: AuthError | null = null;
  calls = 0;

  isConfigured(_provider: OAuthProviderName): boolean {
    return true;
  }

  buildAuthorizationUrl(provider: OAuthProviderName, state: string): string {
    return `https://${provider}.example.test/authorize?state=${state}`;
  }

  async exchangeCodeForIdentity(
    provider: OAuthProviderName,
    code: string,
    state: string | undefined,
    expectedState: string | undefined,
  ): Promise<ProviderIdentity> {
    this.calls++;
    if (!state || state !== expectedState) throw new AuthError('InvalidState', 'bad state');
    if (this.failWith) throw this.failWith;
    if (code !== 'good-code') throw new AuthError('CodeExchangeFailed', 'bad code');
    return { provider, ...this.identity };
  }
}
