/**
 * Session cookie codec
 *
 * The session is the raw provider-issued ID token, stored as-is in the
 * `__Host-AuthToken` cookie. No server-side state: the cookie is the whole
 * source of truth and is re-verified on every read.
 */

import type { Context } from 'hono'
import { TOKEN_COOKIE, TOKEN_COOKIE_MAX_AGE, readCookie, removeCookie, writeCookie } from '../cookies'
import { AuthError, InvalidSessionError, InvalidTokenError, NoSessionError } from '../errors'
import type { TokenVerifier } from '../oidc/token-verifier'
import { verifyIDToken } from '../oidc/verify'
import type { VerifiedIdentity } from '../types'

export interface SessionCodecOptions {
  verifier: TokenVerifier
  /** Expected ID token audience (the OAuth client ID) */
  audience: string
  /** Cookie lifetime in seconds (default: 1 year) */
  maxAge?: number
}

export class SessionCodec {
  private readonly verifier: TokenVerifier
  private readonly audience: string
  private readonly maxAge: number

  constructor(options: SessionCodecOptions) {
    this.verifier = options.verifier
    this.audience = options.audience
    this.maxAge = options.maxAge ?? TOKEN_COOKIE_MAX_AGE
  }

  /**
   * Write a token that has already been verified at login.
   */
  store(c: Context, token: string): void {
    writeCookie(c, TOKEN_COOKIE, token, this.maxAge)
  }

  /**
   * Read and re-verify the session. Expiry is not checked again.
   *
   * @throws NoSessionError when there is no session cookie
   * @throws InvalidSessionError wrapping the verification failure
   */
  async load(c: Context): Promise<VerifiedIdentity> {
    const token = readCookie(c, TOKEN_COOKIE)
    if (!token) {
      throw new NoSessionError()
    }
    try {
      const { identity } = await verifyIDToken(this.verifier, token, this.audience, true)
      return identity
    } catch (err) {
      const reason = err instanceof AuthError ? err : new InvalidTokenError('session verification failed', { cause: err })
      throw new InvalidSessionError(reason)
    }
  }

  clear(c: Context): void {
    removeCookie(c, TOKEN_COOKIE)
  }
}
