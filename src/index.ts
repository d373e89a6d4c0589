/**
 * openid-session: stateless relying-party login for Hono apps
 *
 * Delegates identity verification to an identity provider and keeps the
 * session in a browser cookie, with no server-side state and no passwords:
 *   - OpenID Connect: implicit ID token flow, the raw token is the session
 *   - OpenID 2.0: signed redirect, re-verified with the provider per callback
 *
 * @example
 * ```typescript
 * import { OpenIDConnectAuth } from 'openid-session'
 * import { OpenID2Auth } from 'openid-session/openid2'
 * ```
 */

// OpenID Connect
export * from './oidc'

// OpenID 2.0
export * from './openid2'

// Session cookie
export { SessionCodec } from './session'
export type { SessionCodecOptions } from './session'

// Request building
export * from './request'

// Nonces
export * from './nonce'

// Cookies
export * from './cookies'

// Configuration
export * from './config'

// Errors
export * from './errors'

export type { VerifiedIdentity, FetchLike } from './types'
