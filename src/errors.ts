/**
 * Failure taxonomy for the auth subsystem.
 *
 * Stores and adapters throw `AuthError`; the orchestrator turns it into an
 * `AuthResult` so callers branch on `kind` instead of catching.
 */

export type AuthErrorKind =
  | 'DuplicateEmail'
  | 'DuplicateUsername'
  | 'InvalidCredentials'
  | 'NotVerified'
  | 'TokenNotFound'
  | 'TokenExpired'
  | 'TokenAlreadyConsumed'
  | 'InvalidState'
  | 'CodeExchangeFailed'
  | 'ProfileFetchFailed'
  | 'MissingEmailClaim'
  | 'ProviderAlreadyLinked'
  | 'UnknownProvider'
  | 'DeliveryError'
  | 'NoSession'
  | 'SessionExpired'
  | 'InvalidInput';

export class AuthError extends Error {
  readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
    this.kind = kind;
  }
}

export function isAuthError(err: unknown): err is AuthError {
  return err instanceof AuthError;
}

/** Outcome of an orchestrator operation */
export type AuthResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AuthErrorKind; message: string };

export function ok<T>(value: T): AuthResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: AuthErrorKind, message: string): AuthResult<T> {
  return { ok: false, error, message };
}

/** Raised while building `AuthConfig`; names the offending variable. */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

// User-facing text for each failure kind. Kept short; the HTTP layer returns it as `message`.
export const ERROR_MESSAGES: Record<AuthErrorKind, string> = {
  DuplicateEmail: 'Email already registered.',
  DuplicateUsername: 'Username already taken.',
  InvalidCredentials: 'Invalid email or password.',
  NotVerified: 'Please verify your email address before logging in.',
  TokenNotFound: 'This verification link is not valid.',
  TokenExpired: 'This verification link has expired. Request a new one.',
  TokenAlreadyConsumed: 'This verification link has already been used.',
  InvalidState: 'Login request could not be verified. Please try again.',
  CodeExchangeFailed: 'Could not complete login with the provider. Please try again.',
  ProfileFetchFailed: 'Could not read your profile from the provider. Please try again.',
  MissingEmailClaim: 'Your provider account has no public email. Make your email public or use another login method.',
  ProviderAlreadyLinked: 'This account is already linked to a different login for that provider.',
  UnknownProvider: 'This login provider is not available.',
  DeliveryError: 'We could not send the verification email.',
  NoSession: 'Please log in to continue.',
  SessionExpired: 'Your session has expired. Please log in again.',
  InvalidInput: 'Please check the submitted fields.',
};
