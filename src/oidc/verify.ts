/**
 * ID token claim checks
 */

import { ClaimsError, UnverifiedEmailError } from '../errors'
import type { VerifiedIdentity } from '../types'
import type { TokenVerifier } from './token-verifier'

export interface IDTokenResult {
  identity: VerifiedIdentity
  /** `nonce` claim, for the caller to compare with the nonce cookie */
  nonce: string | undefined
}

/**
 * Verify an ID token and extract the verified email.
 *
 * `skipExpiry` is false at the login callback and true when re-reading the
 * session cookie: expiry is enforced once at login, after which the cookie
 * lifetime bounds the session.
 *
 * A token whose `email_verified` is not true never authenticates, even with a
 * valid signature.
 *
 * @throws InvalidTokenError, ClaimsError or UnverifiedEmailError
 */
export async function verifyIDToken(
  verifier: TokenVerifier,
  token: string,
  audience: string,
  skipExpiry: boolean,
): Promise<IDTokenResult> {
  const claims = await verifier.verify(token, { audience, skipExpiry })

  const email = claims['email']
  if (typeof email !== 'string') {
    throw new ClaimsError('email must be a string', 'email')
  }
  const emailVerified = claims['email_verified']
  if (emailVerified !== undefined && typeof emailVerified !== 'boolean') {
    throw new ClaimsError('email_verified must be a boolean', 'email_verified')
  }
  const nonce = claims['nonce']
  if (nonce !== undefined && typeof nonce !== 'string') {
    throw new ClaimsError('nonce must be a string', 'nonce')
  }
  if (emailVerified !== true) {
    throw new UnverifiedEmailError(email)
  }

  return {
    identity: {
      subject: claims.sub ?? email,
      email,
      verifiedAt: new Date(),
      ...(claims.exp !== undefined && { expiresAt: new Date(claims.exp * 1000) }),
    },
    nonce,
  }
}
