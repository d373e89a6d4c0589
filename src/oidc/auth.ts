/**
 * OpenID Connect login with the implicit ID token flow
 *
 * The ID token is requested directly (`response_type=id_token`): it carries
 * the verified email, so no further requests to the provider are needed.
 *
 *   1. redirect():   delete any old session, set the nonce cookie, 302 to the provider
 *   2. GET callback: the token is in the URL fragment; a relay page POSTs it back
 *   3. POST callback: verify the token (expiry included), compare its nonce with
 *      the nonce cookie (login CSRF), store the raw token as the session (1 year)
 *   4. user():        re-verify the session cookie on every request, expiry skipped
 *
 * Nothing is registered globally: the host mounts routes() wherever it wants.
 *
 * @example
 * ```typescript
 * const auth = await OpenIDConnectAuth.discover({
 *   issuer: 'https://accounts.google.com',
 *   clientId: 'xxx.apps.googleusercontent.com',
 * })
 * const app = new Hono()
 * app.route('/', auth.routes())
 * app.get('/', auth.requireUser(), (c) => c.text(`Hello ${c.get('user').email}`))
 * ```
 */

import { Hono } from 'hono'
import type { Context, MiddlewareHandler } from 'hono'
import { NONCE_COOKIE, NONCE_COOKIE_MAX_AGE, TOKEN_COOKIE, readCookie, removeCookie, writeCookie } from '../cookies'
import { DEFAULT_CALLBACK_PATH, DEFAULT_HOME_PATH } from '../config'
import { InvalidTokenError, NonceMismatchError, accessDenied, isOpenIDError, isSessionError } from '../errors'
import { generateNonce, noncesEqual } from '../nonce'
import { oidcRedirectURL } from '../request'
import { SessionCodec } from '../session'
import type { FetchLike, VerifiedIdentity } from '../types'
import { discoverProvider, type Provider } from './provider'
import { renderRelayPage } from './relay'
import { JoseTokenVerifier, type TokenVerifier } from './token-verifier'
import { verifyIDToken } from './verify'

// ============================================================================
// Types
// ============================================================================

export interface OpenIDConnectConfig {
  /** Provider metadata, from discoverProvider() */
  provider: Provider
  /** OAuth client ID; the expected ID token audience */
  clientId: string
  /** Token verifier (default: JoseTokenVerifier over the provider's JWKS) */
  verifier?: TokenVerifier
  /** Callback path registered at the provider (default: /auth/callback) */
  callbackPath?: string
  /** Login entry point (default: /auth/login) */
  loginPath?: string
  /** Logout path (default: /auth/logout) */
  logoutPath?: string
  /** Where to send the browser after login and logout (default: /) */
  homePath?: string
  /** Absolute redirect URI (default: https://<request host><callbackPath>) */
  redirectUri?: string
  /** Requested scopes (default: openid email) */
  scopes?: string[]
  /** Enable debug logging */
  debug?: boolean
}

export interface DiscoverConfig extends Omit<OpenIDConnectConfig, 'provider'> {
  /** Provider issuer URL */
  issuer: string
  /** fetch used for discovery */
  fetch?: FetchLike
}

/** Hono environment of routes behind requireUser() */
export type AuthEnv = {
  Variables: {
    user: VerifiedIdentity
  }
}

export const DEFAULT_LOGIN_PATH = '/auth/login'
export const DEFAULT_LOGOUT_PATH = '/auth/logout'

// ============================================================================
// OpenIDConnectAuth
// ============================================================================

export class OpenIDConnectAuth {
  readonly provider: Provider
  readonly clientId: string
  readonly session: SessionCodec
  readonly callbackPath: string
  readonly loginPath: string
  readonly logoutPath: string
  readonly homePath: string

  private readonly verifier: TokenVerifier
  private readonly redirectUri: string | undefined
  private readonly scopes: string[] | undefined
  private readonly debug: boolean

  constructor(config: OpenIDConnectConfig) {
    this.provider = config.provider
    this.clientId = config.clientId
    this.verifier = config.verifier ?? JoseTokenVerifier.forProvider(config.provider)
    this.session = new SessionCodec({ verifier: this.verifier, audience: config.clientId })
    this.callbackPath = config.callbackPath ?? DEFAULT_CALLBACK_PATH
    this.loginPath = config.loginPath ?? DEFAULT_LOGIN_PATH
    this.logoutPath = config.logoutPath ?? DEFAULT_LOGOUT_PATH
    this.homePath = config.homePath ?? DEFAULT_HOME_PATH
    this.redirectUri = config.redirectUri
    this.scopes = config.scopes
    this.debug = config.debug ?? false
  }

  /**
   * Discover the provider, then construct. Fails with ConfigError when the
   * provider metadata cannot be loaded.
   */
  static async discover(config: DiscoverConfig): Promise<OpenIDConnectAuth> {
    const { issuer, fetch, ...rest } = config
    const provider = await discoverProvider(issuer, fetch ? { fetch } : {})
    return new OpenIDConnectAuth({ ...rest, provider })
  }

  /**
   * Start a login: 302 to the provider's authorization endpoint.
   */
  redirect(c: Context): Response {
    removeCookie(c, TOKEN_COOKIE)
    const nonce = generateNonce()
    writeCookie(c, NONCE_COOKIE, nonce, NONCE_COOKIE_MAX_AGE)

    const url = oidcRedirectURL({
      authorizationEndpoint: this.provider.authorizationEndpoint,
      clientId: this.clientId,
      redirectUri: this.redirectUri ?? `https://${new URL(c.req.url).host}${this.callbackPath}`,
      nonce,
      ...(this.scopes && { scopes: this.scopes }),
    })
    if (this.debug) console.log('[OpenID] Redirecting to provider:', url)
    return c.redirect(url, 302)
  }

  /**
   * The verified identity of the current session.
   *
   * @throws NoSessionError or InvalidSessionError
   */
  user(c: Context): Promise<VerifiedIdentity> {
    return this.session.load(c)
  }

  /**
   * POST callback: verify the ID token posted by the relay page and start the session.
   */
  async callback(c: Context): Promise<Response> {
    try {
      const body = await c.req.parseBody()
      const token = body['id_token']
      if (typeof token !== 'string' || token === '') {
        throw new InvalidTokenError('id_token is missing')
      }

      const { identity, nonce } = await verifyIDToken(this.verifier, token, this.clientId, false)
      const cookieNonce = readCookie(c, NONCE_COOKIE)
      if (!noncesEqual(nonce, cookieNonce)) {
        throw new NonceMismatchError(cookieNonce !== undefined)
      }

      removeCookie(c, NONCE_COOKIE)
      this.session.store(c, token)
      if (this.debug) console.log('[OpenID] Login successful:', identity.email)
      return c.redirect(this.homePath, 302)
    } catch (err) {
      if (!isOpenIDError(err)) {
        console.error('[OpenID] Callback error:', err)
      } else if (this.debug) {
        console.log('[OpenID] Callback rejected:', err.kind, err.message)
      }
      return accessDenied(err)
    }
  }

  logout(c: Context): Response {
    this.session.clear(c)
    return c.redirect(this.homePath, 302)
  }

  /**
   * Login, callback and logout routes, to be mounted by the host app.
   */
  routes(): Hono {
    const app = new Hono()
    app.get(this.loginPath, (c) => this.redirect(c))
    app.get(this.callbackPath, (c) => c.html(renderRelayPage(this.callbackPath)))
    app.post(this.callbackPath, (c) => this.callback(c))
    app.post(this.logoutPath, (c) => this.logout(c))
    return app
  }

  /**
   * Middleware that loads the session into `c.get('user')`, or starts a
   * login when there is no valid session.
   */
  requireUser(): MiddlewareHandler<AuthEnv> {
    return async (c, next) => {
      let identity: VerifiedIdentity
      try {
        identity = await this.user(c)
      } catch (err) {
        if (!isSessionError(err)) throw err
        if (this.debug) console.log('[OpenID] No valid session:', err.message)
        return this.redirect(c)
      }
      c.set('user', identity)
      await next()
    }
  }
}
