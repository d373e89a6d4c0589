/**
 * Error taxonomy for openid-session
 *
 * Every verification failure is one of a closed set of error classes. Each
 * carries a literal `kind` so callers branch on the kind, never on message
 * text, plus the structured context of the failure (field name, expected vs
 * actual value, underlying cause).
 *
 * Responses sent to browsers use the OAuth 2.1 error body shape
 * (RFC 6749 Section 5.2):
 *
 *   {
 *     error: 'access_denied'
 *     error_description?: string  // Human-readable diagnostic
 *     kind?: string               // Which check failed
 *   }
 */

// ============================================================================
// Error Kinds (machine-readable, snake_case)
// ============================================================================

export const ErrorKind = {
  // ── Setup ───────────────────────────────────────────────────────────────
  Config: 'config_error',

  // ── Indirect (OpenID 2.0) assertion ─────────────────────────────────────
  UnsignedField: 'unsigned_field',
  VerificationRequest: 'verification_request_failed',
  AssertionRejected: 'assertion_rejected',
  ReturnURLMismatch: 'return_url_mismatch',
  Nonce: 'invalid_nonce',

  // ── Anti-CSRF binding ───────────────────────────────────────────────────
  NonceMismatch: 'nonce_mismatch',

  // ── ID token ────────────────────────────────────────────────────────────
  InvalidToken: 'invalid_token',
  Claims: 'invalid_claims',
  UnverifiedEmail: 'unverified_email',

  // ── Session cookie ──────────────────────────────────────────────────────
  NoSession: 'no_session',
  InvalidSession: 'invalid_session',
} as const

export type ErrorKindValue = (typeof ErrorKind)[keyof typeof ErrorKind]

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base class of every error this library throws.
 */
export abstract class AuthError extends Error {
  abstract readonly kind: ErrorKindValue

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Bad configuration input (URLs, provider metadata). Fatal at setup. */
export class ConfigError extends AuthError {
  readonly kind = ErrorKind.Config
}

export class UnsignedFieldError extends AuthError {
  readonly kind = ErrorKind.UnsignedField

  constructor(readonly field: string) {
    super(`${field} must be signed but isn't`)
  }
}

/**
 * The check_authentication round trip could not be completed: network
 * failure, abort, non-2xx status, or a reply that is not key-value form.
 */
export class VerificationRequestError extends AuthError {
  readonly kind = ErrorKind.VerificationRequest

  constructor(
    message: string,
    readonly endpoint: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** The provider answered check_authentication and did not confirm the assertion. */
export class AssertionRejectedError extends AuthError {
  readonly kind = ErrorKind.AssertionRejected

  constructor(
    readonly isValid: boolean,
    readonly namespaceValid: boolean,
  ) {
    super('could not verify assertion')
  }
}

export class ReturnURLMismatchError extends AuthError {
  readonly kind = ErrorKind.ReturnURLMismatch

  constructor(
    message: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(message)
  }
}

export type NonceFailure = 'malformed' | 'stale'

export class NonceError extends AuthError {
  readonly kind = ErrorKind.Nonce

  constructor(
    message: string,
    readonly reason: NonceFailure,
    readonly nonce: string,
  ) {
    super(message)
  }
}

/** The nonce echoed by the provider does not match the nonce cookie (login CSRF). */
export class NonceMismatchError extends AuthError {
  readonly kind = ErrorKind.NonceMismatch

  constructor(readonly cookiePresent: boolean) {
    super(cookiePresent ? 'Invalid nonce' : 'Invalid nonce: no nonce cookie')
  }
}

/** Signature, issuer, audience or expiry check of the ID token failed. */
export class InvalidTokenError extends AuthError {
  readonly kind = ErrorKind.InvalidToken
}

export class ClaimsError extends AuthError {
  readonly kind = ErrorKind.Claims

  constructor(
    message: string,
    readonly claim: string,
  ) {
    super(`claims: ${message}`)
  }
}

export class UnverifiedEmailError extends AuthError {
  readonly kind = ErrorKind.UnverifiedEmail

  constructor(readonly email: string) {
    super(`email not verified: ${email}`)
  }
}

export class NoSessionError extends AuthError {
  readonly kind = ErrorKind.NoSession

  constructor() {
    super('no auth token cookie')
  }
}

export class InvalidSessionError extends AuthError {
  readonly kind = ErrorKind.InvalidSession

  constructor(readonly reason: AuthError) {
    super(`invalid ID token: ${reason.message}`, { cause: reason })
  }
}

export type OpenIDError =
  | ConfigError
  | UnsignedFieldError
  | VerificationRequestError
  | AssertionRejectedError
  | ReturnURLMismatchError
  | NonceError
  | NonceMismatchError
  | InvalidTokenError
  | ClaimsError
  | UnverifiedEmailError
  | NoSessionError
  | InvalidSessionError

export function isOpenIDError(err: unknown): err is OpenIDError {
  return err instanceof AuthError
}

/**
 * Session errors are the normal trigger for a new login, not failures.
 */
export function isSessionError(err: unknown): err is NoSessionError | InvalidSessionError {
  return err instanceof NoSessionError || err instanceof InvalidSessionError
}

// ============================================================================
// Error Response Helpers
// ============================================================================

export interface ErrorResponse {
  /** Machine-readable error code (snake_case) */
  error: string
  /** Human-readable description of the error */
  error_description?: string
  /** Which check failed */
  kind?: ErrorKindValue
}

/**
 * HTTP status for a verification failure: 502 when the provider could not be
 * reached, 500 for setup faults, 403 for anything the client supplied.
 */
export function statusFor(err: unknown): 403 | 500 | 502 {
  if (err instanceof VerificationRequestError) return 502
  if (err instanceof ConfigError) return 500
  if (err instanceof AuthError) return 403
  return 500
}

/**
 * Build the generic "access denied" response for a failed verification.
 *
 * Errors that are not part of the taxonomy get no description so internal
 * detail never reaches the browser.
 *
 * @example
 * ```ts
 * try {
 *   await auth.verify(c.req.raw)
 * } catch (err) {
 *   return accessDenied(err)
 * }
 * ```
 */
export function accessDenied(err: unknown): Response {
  const body: ErrorResponse = { error: 'access_denied' }
  if (err instanceof AuthError) {
    body.error_description = err.message
    body.kind = err.kind
  }
  return Response.json(body, { status: statusFor(err) })
}
