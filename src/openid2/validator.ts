/**
 * OpenID 2.0 positive assertion verification
 *
 * The provider redirects back to return_to with signed `openid.*` query
 * parameters. verifyAssertion() runs four gates in order and throws on the
 * first failure:
 *
 *   1. Signed fields:  the security-relevant fields are listed in openid.signed
 *   2. Signature:      the provider confirms the assertion (check_authentication)
 *   3. Return URL:     the assertion was issued for the URL the browser hit
 *   4. Nonce:          openid.response_nonce is at most 60 seconds old
 *
 * Deliberate simplifications:
 *   - Discovery on the claimed identifier is not performed; only
 *     openid.claimed_id is used, and check_authentication goes to the
 *     openid.op_endpoint named in the response itself.
 *   - Nonce reuse inside the 60 second window is not tracked.
 */

import {
  AssertionRejectedError,
  ReturnURLMismatchError,
  UnsignedFieldError,
  VerificationRequestError,
} from '../errors'
import { checkResponseNonce } from '../nonce'
import { OPENID2_NS } from '../request'
import type { FetchLike, VerifiedIdentity } from '../types'

// ============================================================================
// Types
// ============================================================================

export interface VerifyAssertionOptions {
  /** fetch used for check_authentication (default: global fetch) */
  fetch?: FetchLike
  /** Cancels the check_authentication request */
  signal?: AbortSignal
  /** Current time in milliseconds (default: Date.now()) */
  now?: number
}

// ============================================================================
// Constants
// ============================================================================

/** Fields that must always be covered by the signature */
export const REQUIRED_SIGNED_FIELDS = ['op_endpoint', 'return_to', 'response_nonce', 'assoc_handle'] as const

/** Fields that must be covered by the signature when present */
export const CONDITIONAL_SIGNED_FIELDS = ['claimed_id', 'identity'] as const

const CHECK_AUTHENTICATION = 'check_authentication'

// ============================================================================
// Gate 1: Signed Fields
// ============================================================================

export function verifySignedFields(params: URLSearchParams): void {
  const signed = new Set((params.get('openid.signed') ?? '').split(','))

  for (const field of REQUIRED_SIGNED_FIELDS) {
    if (!signed.has(field)) throw new UnsignedFieldError(field)
  }
  for (const field of CONDITIONAL_SIGNED_FIELDS) {
    if (params.get(`openid.${field}`) && !signed.has(field)) throw new UnsignedFieldError(field)
  }
}

// ============================================================================
// Gate 2: Signature (check_authentication)
// ============================================================================

/**
 * Parse a key-value form reply (`key:value` per line). The first occurrence of
 * a key wins.
 */
export function parseKeyValueForm(body: string): Map<string, string> {
  const fields = new Map<string, string>()
  for (const raw of body.split('\n')) {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw
    const colon = line.indexOf(':')
    if (colon <= 0) continue
    const key = line.slice(0, colon)
    if (!fields.has(key)) fields.set(key, line.slice(colon + 1))
  }
  return fields
}

/**
 * Ask the provider to confirm the assertion.
 *
 * Every response parameter is posted back unchanged except openid.mode,
 * which becomes check_authentication. The reply must contain both
 * `is_valid:true` and `ns:http://specs.openid.net/auth/2.0` as lines; a
 * repeated key does not hide either line.
 */
export async function verifySignature(params: URLSearchParams, options: VerifyAssertionOptions = {}): Promise<void> {
  const endpoint = params.get('openid.op_endpoint') ?? ''
  let target: URL
  try {
    target = new URL(endpoint)
  } catch {
    throw new VerificationRequestError(`invalid op_endpoint: ${endpoint}`, endpoint)
  }
  if (target.protocol !== 'https:' && target.protocol !== 'http:') {
    throw new VerificationRequestError(`invalid op_endpoint: ${endpoint}`, endpoint)
  }

  const body = new URLSearchParams()
  body.append('openid.mode', CHECK_AUTHENTICATION)
  for (const [key, value] of params) {
    if (key === 'openid.mode') continue
    body.append(key, value)
  }

  const fetchImpl = options.fetch ?? fetch
  let reply: string
  try {
    const response = await fetchImpl(target, {
      method: 'POST',
      body,
      ...(options.signal && { signal: options.signal }),
    })
    if (!response.ok) {
      throw new VerificationRequestError(`check_authentication returned ${response.status}`, endpoint)
    }
    reply = await response.text()
  } catch (err) {
    if (err instanceof VerificationRequestError) throw err
    const reason = err instanceof Error ? err.message : 'unknown error'
    throw new VerificationRequestError(`check_authentication failed: ${reason}`, endpoint, { cause: err })
  }

  if (parseKeyValueForm(reply).size === 0) {
    throw new VerificationRequestError('check_authentication reply is not key-value form', endpoint)
  }
  // Each confirmation must appear as an exact line; other lines are ignored
  const lines = new Set(reply.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line)))
  const isValid = lines.has('is_valid:true')
  const namespaceValid = lines.has(`ns:${OPENID2_NS}`)
  if (!isValid || !namespaceValid) {
    throw new AssertionRejectedError(isValid, namespaceValid)
  }
}

// ============================================================================
// Gate 3: Return URL
// ============================================================================

/**
 * Require that the URL the browser hit matches openid.return_to: same
 * scheme, host and path, and every return_to query parameter present with the
 * same value. A valid assertion for one return URL cannot be replayed
 * against another.
 */
export function verifyReturnTo(currentURL: URL, params: URLSearchParams): void {
  const asserted = params.get('openid.return_to') ?? ''
  let returnTo: URL
  try {
    returnTo = new URL(asserted)
  } catch {
    throw new ReturnURLMismatchError(`invalid return_to URL: ${asserted}`, asserted, currentURL.toString())
  }

  if (
    currentURL.protocol !== returnTo.protocol ||
    currentURL.host !== returnTo.host ||
    currentURL.pathname !== returnTo.pathname
  ) {
    throw new ReturnURLMismatchError(
      "scheme, host or path doesn't match return_to URL",
      `${returnTo.protocol}//${returnTo.host}${returnTo.pathname}`,
      `${currentURL.protocol}//${currentURL.host}${currentURL.pathname}`,
    )
  }

  for (const key of new Set(returnTo.searchParams.keys())) {
    const want = returnTo.searchParams.get(key) ?? ''
    const got = params.get(key)
    if (got !== want) {
      throw new ReturnURLMismatchError(`URL query param mismatch: ${key}`, want, got ?? '')
    }
  }
}

// ============================================================================
// Gate 4: Nonce
// ============================================================================

export function verifyNonce(params: URLSearchParams, now: number = Date.now()): Date {
  return checkResponseNonce(params.get('openid.response_nonce') ?? '', now)
}

// ============================================================================
// Composite
// ============================================================================

/**
 * Verify an OpenID 2.0 positive assertion.
 *
 * @param currentURL - the URL the browser requested: realm + observed path and query
 * @param params - the callback query parameters
 * @returns the identity, with `subject` set to openid.claimed_id
 */
export async function verifyAssertion(
  currentURL: string,
  params: URLSearchParams,
  options: VerifyAssertionOptions = {},
): Promise<VerifiedIdentity> {
  verifySignedFields(params)
  await verifySignature(params, options)

  let current: URL
  try {
    current = new URL(currentURL)
  } catch {
    throw new ReturnURLMismatchError(`invalid request URL: ${currentURL}`, params.get('openid.return_to') ?? '', currentURL)
  }
  verifyReturnTo(current, params)

  const now = options.now ?? Date.now()
  verifyNonce(params, now)

  return {
    subject: params.get('openid.claimed_id') ?? '',
    verifiedAt: new Date(now),
  }
}
