/**
 * Shared types for openid-session
 */

/**
 * Identity produced by a successful verification. Verification is
 * all-or-nothing: this value only exists when every check passed.
 */
export interface VerifiedIdentity {
  /** Provider-chosen subject identifier (OpenID 2.0 claimed_id, or the ID token `sub`) */
  subject: string
  /** Provider-verified email address (token flow only) */
  email?: string
  /** When the assertion or token was verified */
  verifiedAt: Date
  /** ID token expiry (token flow only) */
  expiresAt?: Date
}

/** The `fetch` signature injected wherever an outbound request is made */
export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>
