/**
 * Nonces for openid-session
 *
 * Two kinds of nonce appear in a login:
 *
 *   1. The request nonce we generate: 20 random bytes, hex encoded, bound to
 *      one login attempt and echoed back by the provider (ID token `nonce`
 *      claim, or a query parameter of the OpenID 2.0 return_to URL). A copy
 *      lives in a short-lived cookie so the callback can detect login CSRF.
 *   2. The OpenID 2.0 response nonce the provider generates:
 *      `<YYYY-MM-DDTHH:MM:SSZ><opaque suffix>`. Only its freshness is checked.
 */

import { randomBytes, timingSafeEqual } from 'node:crypto'
import { NonceError } from '../errors'

// ============================================================================
// Constants
// ============================================================================

/** Random bytes per request nonce */
export const NONCE_BYTES = 20

/** Maximum age of an OpenID 2.0 response nonce: 60 seconds */
export const RESPONSE_NONCE_MAX_AGE_MS = 60 * 1000

const RESPONSE_NONCE_MIN_LENGTH = 20
const RESPONSE_NONCE_MAX_LENGTH = 256
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/

// ============================================================================
// Request Nonces
// ============================================================================

/**
 * Generate a cryptographically random nonce, hex encoded.
 */
export function generateNonce(byteLength: number = NONCE_BYTES): string {
  return randomBytes(byteLength).toString('hex')
}

/**
 * Constant-time comparison of two nonces. A missing value never matches.
 */
export function noncesEqual(a: string | null | undefined, b: string | null | undefined): boolean {
  if (!a || !b) return false
  const left = Buffer.from(a)
  const right = Buffer.from(b)
  if (left.length !== right.length) return false
  return timingSafeEqual(left, right)
}

// ============================================================================
// OpenID 2.0 Response Nonces
// ============================================================================

/**
 * Parse the timestamp prefix of an OpenID 2.0 response nonce.
 *
 * @throws NonceError with reason `malformed`
 */
export function parseResponseNonce(nonce: string): Date {
  if (nonce.length < RESPONSE_NONCE_MIN_LENGTH || nonce.length > RESPONSE_NONCE_MAX_LENGTH) {
    throw new NonceError('invalid nonce', 'malformed', nonce)
  }
  const stamp = nonce.slice(0, RESPONSE_NONCE_MIN_LENGTH)
  const ms = TIMESTAMP_PATTERN.test(stamp) ? Date.parse(stamp) : Number.NaN
  // Date.parse rolls impossible dates over (Feb 30, hour 24); require a round trip
  if (Number.isNaN(ms) || new Date(ms).toISOString().slice(0, 19) + 'Z' !== stamp) {
    throw new NonceError(`invalid nonce timestamp: ${stamp}`, 'malformed', nonce)
  }
  return new Date(ms)
}

/**
 * Require that a response nonce is at most 60 seconds old.
 *
 * Reuse of a nonce inside that window is not tracked: that would need shared
 * storage, and a replay only works while the return URL itself has leaked.
 *
 * @returns the nonce timestamp
 * @throws NonceError with reason `malformed` or `stale`
 */
export function checkResponseNonce(nonce: string, now: number = Date.now()): Date {
  const issuedAt = parseResponseNonce(nonce)
  if (issuedAt.getTime() + RESPONSE_NONCE_MAX_AGE_MS < now) {
    throw new NonceError(`nonce too old: ${issuedAt.toISOString()}`, 'stale', nonce)
  }
  return issuedAt
}
