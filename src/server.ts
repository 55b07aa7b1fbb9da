/**
 * HTTP surface for trainlog-auth.
 *
 *   POST /register            email, username, password[, confirm_password]
 *   POST /verify/resend       email
 *   GET  /verify?token=…
 *   POST /login               email, password
 *   GET  /auth/:provider      → 302 to the provider
 *   GET  /callback/:provider  ?code=…&state=…
 *   POST /logout
 *   GET  /me, GET /           session required (303 → /login otherwise)
 *   GET  /login, GET /providers
 *
 * Bodies may be JSON or form-encoded. Responses are JSON.
 */

import type { Server } from 'http';
import express from 'express';
import type { CookieOptions, ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import cookieParser from 'cookie-parser';
import morgan from 'morgan';
import type { AuthConfig } from './config.js';
import { openDb } from './db.js';
import type { Db } from './db.js';
import { ERROR_MESSAGES } from './errors.js';
import type { AuthErrorKind } from './errors.js';
import { ConsoleMailer, SmtpMailer } from './auth/mailer.js';
import type { Mailer } from './auth/mailer.js';
import { OAuthClient } from './auth/oauth.js';
import { AuthService } from './auth/service.js';
import { SqliteSessionStore } from './auth/session.js';
import type { User } from './auth/user-store.js';
import { getIdentities } from './auth/user-store.js';
import { c, log } from './utils.js';

export const SESSION_COOKIE = 'trainlog_session';
export const STATE_COOKIE = 'trainlog_oauth_state';
const STATE_MAX_AGE_MS = 10 * 60 * 1000;
const RESEND_MESSAGE = 'If that address belongs to an unverified account, a new verification link is on its way.';

const STATUS_BY_KIND: Record<AuthErrorKind, number> = {
  DuplicateEmail: 409,
  DuplicateUsername: 409,
  ProviderAlreadyLinked: 409,
  InvalidCredentials: 401,
  NotVerified: 403,
  TokenNotFound: 404,
  TokenExpired: 410,
  TokenAlreadyConsumed: 410,
  InvalidState: 400,
  CodeExchangeFailed: 502,
  ProfileFetchFailed: 502,
  MissingEmailClaim: 422,
  UnknownProvider: 404,
  DeliveryError: 502,
  NoSession: 401,
  SessionExpired: 401,
  InvalidInput: 400,
};

export interface AppOptions {
  /** morgan access log; on by default */
  accessLog?: boolean;
}

// ─── Request helpers ─────────────────────────────────────

function field(req: Request, name: string): string {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) return '';
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : '';
}

function queryParam(req: Request, name: string): string | undefined {
  const value: unknown = req.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** Value of a signed cookie; undefined when absent or tampered with */
function signedCookie(req: Request, name: string): string | undefined {
  const jar: unknown = req.signedCookies;
  if (typeof jar !== 'object' || jar === null) return undefined;
  const value: unknown = Reflect.get(jar, name);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function publicUser(user: User, db?: Db): Record<string, unknown> {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    isVerified: user.is_verified,
    hasPassword: user.password_hash !== null,
    ...(db ? { providers: getIdentities(db, user.id).map((i) => i.provider) } : {}),
  };
}

function sendFailure(res: Response, error: AuthErrorKind, message: string): void {
  res.status(STATUS_BY_KIND[error]).json({ ok: false, error, message });
}

function clientErrorStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !('status' in err)) return undefined;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function handle(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

// ─── App ─────────────────────────────────────────────────

export function createApp(service: AuthService, config: AuthConfig, db?: Db, options: AppOptions = {}): express.Express {
  const app = express();
  app.disable('x-powered-by');

  if (options.accessLog ?? true) {
    app.use(morgan('tiny'));
  }
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser(config.secretKey));

  // Clearing must use the same scope but an unsigned empty value
  const cookieScope: CookieOptions = {
    httpOnly: true,
    sameSite: 'lax',
    secure: config.cookieSecure,
    path: '/',
  };
  const baseCookie: CookieOptions = { ...cookieScope, signed: true };
  const sessionCookie: CookieOptions = { ...baseCookie, maxAge: config.sessionTtlMs };
  const stateCookie: CookieOptions = { ...baseCookie, maxAge: STATE_MAX_AGE_MS };

  // Filled by requireSession for the lifetime of one request
  const sessionUsers = new WeakMap<Request, User>();

  const requireSession: RequestHandler = handle(async (req, res, next) => {
    const result = await service.currentUser(signedCookie(req, SESSION_COOKIE));
    if (!result.ok) {
      res.clearCookie(SESSION_COOKIE, cookieScope);
      res.redirect(303, '/login');
      return;
    }
    sessionUsers.set(req, result.value);
    next();
  });

  function sessionUser(req: Request): User {
    const user = sessionUsers.get(req);
    if (!user) throw new Error('requireSession did not run before this handler');
    return user;
  }

  app.post('/register', handle(async (req, res) => {
    const password = field(req, 'password');
    const confirm = field(req, 'confirm_password');
    if (confirm && confirm !== password) {
      sendFailure(res, 'InvalidInput', 'Passwords do not match.');
      return;
    }

    const result = await service.register(field(req, 'email'), field(req, 'username'), password);
    if (!result.ok) {
      sendFailure(res, result.error, result.message);
      return;
    }

    const { user, emailSent } = result.value;
    res.status(201).json({
      ok: true,
      status: 'pending_verification',
      user: publicUser(user),
      emailSent,
      message: emailSent
        ? 'Account created. Check your inbox to verify your email address.'
        : 'Account created, but the verification email could not be sent. Use "resend verification" to try again.',
    });
  }));

  app.post('/verify/resend', handle(async (req, res) => {
    const result = await service.resendVerification(field(req, 'email'));
    if (!result.ok) {
      sendFailure(res, result.error, result.message);
      return;
    }
    res.json({ ok: true, message: RESEND_MESSAGE });
  }));

  app.get('/verify', handle(async (req, res) => {
    const result = await service.verifyEmail(queryParam(req, 'token') ?? '');
    if (!result.ok) {
      sendFailure(res, result.error, result.message);
      return;
    }
    res.json({ ok: true, status: 'verified', userId: result.value.userId });
  }));

  app.get('/login', (_req, res) => {
    res.json({ ok: true, message: 'Log in with email and password or a provider.', providers: service.enabledProviders() });
  });

  app.post('/login', handle(async (req, res) => {
    const result = await service.login(field(req, 'email'), field(req, 'password'), signedCookie(req, SESSION_COOKIE));
    if (!result.ok) {
      sendFailure(res, result.error, result.message);
      return;
    }
    res.cookie(SESSION_COOKIE, result.value.session.id, sessionCookie);
    res.json({ ok: true, user: publicUser(result.value.user) });
  }));

  app.get('/providers', (_req, res) => {
    res.json({ ok: true, providers: service.enabledProviders() });
  });

  app.get('/auth/:provider', handle(async (req, res) => {
    const result = await service.beginOAuth(req.params.provider);
    if (!result.ok) {
      sendFailure(res, result.error, result.message);
      return;
    }
    res.cookie(STATE_COOKIE, `${result.value.provider}:${result.value.state}`, stateCookie);
    res.redirect(302, result.value.url);
  }));

  app.get('/callback/:provider', handle(async (req, res) => {
    const provider = req.params.provider;
    const stored = signedCookie(req, STATE_COOKIE);
    // The state is single-use whatever the outcome
    res.clearCookie(STATE_COOKIE, cookieScope);

    let expectedState: string | undefined;
    if (stored) {
      const sep = stored.indexOf(':');
      if (stored.slice(0, sep) === provider) expectedState = stored.slice(sep + 1);
    }

    const providerError = queryParam(req, 'error');
    if (providerError) {
      log.warn('oauth_provider_error', { provider, error: providerError });
    }

    const result = await service.oauthCallback(
      provider,
      queryParam(req, 'code'),
      queryParam(req, 'state'),
      expectedState,
      signedCookie(req, SESSION_COOKIE),
    );
    if (!result.ok) {
      sendFailure(res, result.error, result.message);
      return;
    }
    res.cookie(SESSION_COOKIE, result.value.session.id, sessionCookie);
    res.redirect(302, '/');
  }));

  app.post('/logout', handle(async (req, res) => {
    await service.logout(signedCookie(req, SESSION_COOKIE));
    res.clearCookie(SESSION_COOKIE, cookieScope);
    res.json({ ok: true, message: 'You have been logged out.' });
  }));

  app.get('/me', requireSession, (req, res) => {
    res.json({ ok: true, user: publicUser(sessionUser(req), db) });
  });

  app.get('/', requireSession, (req, res) => {
    const user = sessionUser(req);
    res.json({ ok: true, message: `Welcome back, ${user.username}!` });
  });

  const onError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    // body-parser rejects malformed or oversized bodies with a 4xx status
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      log.warn('request_rejected', {
        method: req.method,
        path: req.path,
        status,
        reason: err instanceof Error ? err.message : String(err),
      });
      if (res.headersSent) return;
      res.status(status).json({ ok: false, error: 'InvalidInput', message: ERROR_MESSAGES.InvalidInput });
      return;
    }

    log.error('request_failed', {
      method: req.method,
      path: req.path,
      reason: err instanceof Error ? err.message : String(err),
    });
    if (res.headersSent) return;
    res.status(500).json({ ok: false, error: 'InternalError', message: 'Something went wrong.' });
  };
  app.use(onError);

  return app;
}

// ─── Wiring ──────────────────────────────────────────────

export interface RunningServer {
  server: Server;
  db: Db;
  close(): Promise<void>;
}

export function buildMailer(config: AuthConfig): Mailer {
  if (config.smtp) return new SmtpMailer({ smtp: config.smtp });
  log.warn('smtp_not_configured', { fallback: 'console' });
  return new ConsoleMailer();
}

/** Open the database, wire the real collaborators and listen on `config.port`. */
export function startServer(config: AuthConfig): Promise<RunningServer> {
  const db = openDb(config.databasePath);
  const sessions = new SqliteSessionStore(db, { ttlMs: config.sessionTtlMs });
  const service = new AuthService({
    db,
    config,
    sessions,
    mailer: buildMailer(config),
    oauth: new OAuthClient(config),
  });
  const app = createApp(service, config, db);

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port);
    server.once('error', (err) => {
      db.close();
      reject(err);
    });
    server.once('listening', () => {
      console.log(`${c.green}✓${c.reset} trainlog-auth listening on ${c.bold}${config.appUrl}${c.reset} (port ${config.port})`);
      const providers = service.enabledProviders();
      console.log(`  ${c.dim}providers: ${providers.length ? providers.join(', ') : 'none'}${c.reset}`);
      resolve({
        server,
        db,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => {
              db.close();
              if (err) fail(err);
              else done();
            });
          }),
      });
    });
  });
}
