/**
 * Authentication request builder
 *
 * Builds the redirect URL that sends the browser to the identity provider.
 * Stateless: the only per-request value is the nonce, which the caller
 * receives back in the AuthRequest so it can be put in a cookie.
 */

import { ConfigError } from '../errors'
import { generateNonce } from '../nonce'

// ============================================================================
// Types
// ============================================================================

/**
 * One login attempt. Immutable; discarded once the redirect is issued.
 */
export interface AuthRequest {
  /** Provider endpoint the browser is sent to */
  readonly endpoint: string
  /** URL the provider returns the browser to */
  readonly returnTo: string
  /** scheme://host of the return URL */
  readonly realm: string
  /** Anti-replay nonce bound to this attempt */
  readonly nonce: string
}

export interface OIDCRequestParams {
  authorizationEndpoint: string
  clientId: string
  redirectUri: string
  nonce: string
  /** Requested scopes (default: openid email) */
  scopes?: string[]
}

// ============================================================================
// Constants
// ============================================================================

export const OPENID2_NS = 'http://specs.openid.net/auth/2.0'
export const OPENID2_IDENTIFIER_SELECT = 'http://specs.openid.net/auth/2.0/identifier_select'
export const OPENID2_SREG_NS = 'http://openid.net/extensions/sreg/1.1'

/** Query parameter carrying the request nonce inside an OpenID 2.0 return_to URL */
export const RETURN_TO_NONCE_PARAM = 'auth_nonce'

export const DEFAULT_SCOPES = ['openid', 'email']

// ============================================================================
// URL Helpers
// ============================================================================

export function requireHttpURL(value: string, what: string): URL {
  let url: URL
  try {
    url = new URL(value)
  } catch {
    throw new ConfigError(`invalid ${what}: ${value}`)
  }
  if ((url.protocol !== 'https:' && url.protocol !== 'http:') || !url.host) {
    throw new ConfigError(`invalid ${what}: ${value} (expected an absolute http(s) URL)`)
  }
  return url
}

/**
 * scheme://host of a URL, path and query stripped.
 *
 * @throws ConfigError when the URL is malformed
 */
export function realmOf(returnURL: string): string {
  const url = requireHttpURL(returnURL, 'return URL')
  return `${url.protocol}//${url.host}`
}

/**
 * Append encoded parameters to an endpoint that may already carry a query.
 */
export function appendQuery(endpoint: string, params: URLSearchParams): string {
  const separator = endpoint.includes('?') ? '&' : '?'
  return endpoint + separator + params.toString()
}

// ============================================================================
// OpenID 2.0
// ============================================================================

/**
 * Create an OpenID 2.0 login attempt.
 *
 * With `bindNonce`, the nonce is added to the return URL as
 * `auth_nonce`. The provider signs return_to, and the return-URL check
 * requires every return_to parameter to come back unchanged, so the callback
 * can compare it with the nonce cookie.
 *
 * @throws ConfigError when the endpoint or return URL is malformed
 */
export function buildOpenID2Request(
  endpoint: string,
  returnURL: string,
  options: { nonce?: string; bindNonce?: boolean } = {},
): AuthRequest {
  requireHttpURL(endpoint, 'provider endpoint')
  const realm = realmOf(returnURL)
  const nonce = options.nonce ?? generateNonce()

  let returnTo = returnURL
  if (options.bindNonce) {
    const url = new URL(returnURL)
    url.searchParams.set(RETURN_TO_NONCE_PARAM, nonce)
    returnTo = url.toString()
  }

  return { endpoint, returnTo, realm, nonce }
}

export function openID2RedirectURL(request: AuthRequest): string {
  const params = new URLSearchParams()
  params.set('openid.ns', OPENID2_NS)
  params.set('openid.mode', 'checkid_setup')
  params.set('openid.return_to', request.returnTo)
  params.set('openid.realm', request.realm)
  params.set('openid.claimed_id', OPENID2_IDENTIFIER_SELECT)
  params.set('openid.identity', OPENID2_IDENTIFIER_SELECT)
  params.set('openid.ns.sreg', OPENID2_SREG_NS)
  return appendQuery(request.endpoint, params)
}

// ============================================================================
// OpenID Connect (implicit ID token)
// ============================================================================

export function oidcRedirectURL(params: OIDCRequestParams): string {
  const query = new URLSearchParams()
  query.set('response_type', 'id_token')
  query.set('client_id', params.clientId)
  query.set('redirect_uri', params.redirectUri)
  query.set('scope', (params.scopes ?? DEFAULT_SCOPES).join(' '))
  query.set('nonce', params.nonce)
  return appendQuery(params.authorizationEndpoint, query)
}
