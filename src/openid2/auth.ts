/**
 * OpenID 2.0 login
 *
 * OpenID 2.0 is obsolete and replaced by OpenID Connect, but some providers
 * still use it (e.g. Steam). Verification returns the claimed identifier on
 * every callback; no session is persisted by this flow.
 *
 * Login CSRF: with `csrfProtection` (the default) the login route sets a nonce
 * cookie and binds the same nonce into return_to. The return URL check
 * guarantees the nonce comes back unchanged, and the callback compares it
 * with the cookie.
 *
 * @example
 * ```typescript
 * const auth = new OpenID2Auth({
 *   endpoint: 'https://steamcommunity.com/openid/login',
 *   returnTo: 'https://example.com/auth',
 * })
 * app.route('/', auth.routes())
 * ```
 */

import { Hono } from 'hono'
import type { Context } from 'hono'
import { DEFAULT_VERIFY_TIMEOUT_MS } from '../config'
import { NONCE_COOKIE, NONCE_COOKIE_MAX_AGE, readCookie, removeCookie, writeCookie } from '../cookies'
import { NonceMismatchError, accessDenied, isOpenIDError } from '../errors'
import { generateNonce, noncesEqual } from '../nonce'
import { RETURN_TO_NONCE_PARAM, buildOpenID2Request, openID2RedirectURL, realmOf } from '../request'
import type { FetchLike, VerifiedIdentity } from '../types'
import { verifyAssertion } from './validator'

// ============================================================================
// Types
// ============================================================================

export interface OpenID2Config {
  /** Provider endpoint, e.g. https://steamcommunity.com/openid/login */
  endpoint: string
  /** Absolute URL the provider returns to; its path is the callback route */
  returnTo: string
  /** Login entry point (default: /login) */
  loginPath?: string
  /** Bind a nonce cookie to each login (default: true) */
  csrfProtection?: boolean
  /** Timeout for check_authentication in ms (default: 10000) */
  verifyTimeoutMs?: number
  /** Response for a verified callback (default: the identity as JSON) */
  onVerified?: (c: Context, identity: VerifiedIdentity) => Response | Promise<Response>
  /** fetch used for check_authentication */
  fetch?: FetchLike
  /** Clock in milliseconds, for nonce freshness */
  now?: () => number
  /** Enable debug logging */
  debug?: boolean
}

export interface VerifyOptions {
  /** Cancels check_authentication; combined with the configured timeout */
  signal?: AbortSignal
}

export const DEFAULT_OPENID2_LOGIN_PATH = '/login'

// ============================================================================
// OpenID2Auth
// ============================================================================

export class OpenID2Auth {
  readonly endpoint: string
  readonly returnTo: string
  readonly realm: string
  readonly loginPath: string
  readonly callbackPath: string
  readonly csrfProtection: boolean

  private readonly verifyTimeoutMs: number
  private readonly onVerified: OpenID2Config['onVerified']
  private readonly fetchImpl: FetchLike | undefined
  private readonly now: () => number
  private readonly debug: boolean

  /**
   * @throws ConfigError when the endpoint or return URL is malformed
   */
  constructor(config: OpenID2Config) {
    buildOpenID2Request(config.endpoint, config.returnTo)
    this.endpoint = config.endpoint
    this.returnTo = config.returnTo
    this.realm = realmOf(config.returnTo)
    this.loginPath = config.loginPath ?? DEFAULT_OPENID2_LOGIN_PATH
    this.callbackPath = new URL(config.returnTo).pathname
    this.csrfProtection = config.csrfProtection ?? true
    this.verifyTimeoutMs = config.verifyTimeoutMs ?? DEFAULT_VERIFY_TIMEOUT_MS
    this.onVerified = config.onVerified
    this.fetchImpl = config.fetch
    this.now = config.now ?? Date.now
    this.debug = config.debug ?? false
  }

  /**
   * URL that sends the browser to the provider. When a nonce is given it is
   * bound into return_to.
   */
  redirectURL(nonce?: string): string {
    const request = buildOpenID2Request(
      this.endpoint,
      this.returnTo,
      nonce === undefined ? {} : { nonce, bindNonce: true },
    )
    return openID2RedirectURL(request)
  }

  /**
   * Verify the callback request and return the claimed identifier.
   *
   * The URL the browser hit is rebuilt from the configured realm and the
   * request's path and query, so the check holds behind a proxy.
   */
  async verify(request: Request, options: VerifyOptions = {}): Promise<VerifiedIdentity> {
    const observed = new URL(request.url)
    const timeout = AbortSignal.timeout(this.verifyTimeoutMs)
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout

    return verifyAssertion(this.realm + observed.pathname + observed.search, observed.searchParams, {
      signal,
      now: this.now(),
      ...(this.fetchImpl && { fetch: this.fetchImpl }),
    })
  }

  /**
   * Start a login: 303 to the provider.
   */
  login(c: Context): Response {
    let url: string
    if (this.csrfProtection) {
      const nonce = generateNonce()
      writeCookie(c, NONCE_COOKIE, nonce, NONCE_COOKIE_MAX_AGE)
      url = this.redirectURL(nonce)
    } else {
      url = this.redirectURL()
    }
    if (this.debug) console.log('[OpenID2] Redirecting to provider:', url)
    return c.redirect(url, 303)
  }

  async callback(c: Context): Promise<Response> {
    try {
      const identity = await this.verify(c.req.raw, { signal: c.req.raw.signal })

      if (this.csrfProtection) {
        const cookieNonce = readCookie(c, NONCE_COOKIE)
        const returned = new URL(c.req.url).searchParams.get(RETURN_TO_NONCE_PARAM)
        if (!noncesEqual(returned, cookieNonce)) {
          throw new NonceMismatchError(cookieNonce !== undefined)
        }
        removeCookie(c, NONCE_COOKIE)
      }

      if (this.debug) console.log('[OpenID2] Verified:', identity.subject)
      if (this.onVerified) return await this.onVerified(c, identity)
      return c.json({ subject: identity.subject, verifiedAt: identity.verifiedAt.toISOString() })
    } catch (err) {
      if (!isOpenIDError(err)) {
        console.error('[OpenID2] Callback error:', err)
      } else if (this.debug) {
        console.log('[OpenID2] Callback rejected:', err.kind, err.message)
      }
      return accessDenied(err)
    }
  }

  routes(): Hono {
    const app = new Hono()
    app.get(this.loginPath, (c) => this.login(c))
    app.get(this.callbackPath, (c) => this.callback(c))
    return app
  }
}
