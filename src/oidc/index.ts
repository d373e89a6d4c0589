/**
 * OpenID Connect implicit ID token flow
 */

export { OpenIDConnectAuth, DEFAULT_LOGIN_PATH, DEFAULT_LOGOUT_PATH } from './auth'
export type { OpenIDConnectConfig, DiscoverConfig, AuthEnv } from './auth'
export { discoverProvider, discoveryURL } from './provider'
export type { Provider, DiscoveryOptions } from './provider'
export { JoseTokenVerifier } from './token-verifier'
export type { TokenVerifier, TokenVerifyOptions, JoseTokenVerifierOptions } from './token-verifier'
export { verifyIDToken } from './verify'
export type { IDTokenResult } from './verify'
export { renderRelayPage } from './relay'
