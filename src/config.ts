/**
 * Environment configuration
 *
 * Reads the settings of both login flows from environment variables. A flow
 * is configured when its variables are present; a half-configured flow, a
 * malformed URL or a bad number is a ConfigError at startup.
 *
 *   OPENID_ISSUER              OIDC provider issuer URL
 *   OPENID_CLIENT_ID           OAuth client ID (ID token audience)
 *   OPENID_CALLBACK_PATH       default /auth/callback
 *   OPENID_HOME_PATH           default /
 *   OPENID2_ENDPOINT           OpenID 2.0 provider endpoint
 *   OPENID2_RETURN_TO          OpenID 2.0 return URL
 *   OPENID2_CSRF               "false" disables the login CSRF nonce (default on)
 *   OPENID_VERIFY_TIMEOUT_MS   check_authentication timeout (default 10000)
 *   OPENID_DEBUG               "true" enables debug logging
 */

import { ConfigError } from './errors'
import { requireHttpURL } from './request'

export type Env = Record<string, string | undefined>

export interface OIDCEnvConfig {
  issuer: string
  clientId: string
  callbackPath: string
  homePath: string
}

export interface OpenID2EnvConfig {
  endpoint: string
  returnTo: string
  csrfProtection: boolean
  verifyTimeoutMs: number
}

export interface EnvConfig {
  oidc?: OIDCEnvConfig
  openid2?: OpenID2EnvConfig
  debug: boolean
}

export const DEFAULT_CALLBACK_PATH = '/auth/callback'
export const DEFAULT_HOME_PATH = '/'
export const DEFAULT_VERIFY_TIMEOUT_MS = 10_000

function parseBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name]?.trim().toLowerCase()
  if (value === undefined || value === '') return fallback
  if (value === 'true' || value === '1') return true
  if (value === 'false' || value === '0') return false
  throw new ConfigError(`${name} must be true or false, got ${env[name]}`)
}

function parsePositiveInt(env: Env, name: string, fallback: number): number {
  const value = env[name]?.trim()
  if (value === undefined || value === '') return fallback
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`)
  }
  return parsed
}

function parsePath(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim()
  if (value === undefined || value === '') return fallback
  if (!value.startsWith('/') || value.startsWith('//')) {
    throw new ConfigError(`${name} must be an absolute path, got ${value}`)
  }
  return value
}

/**
 * Both or neither of a pair of variables must be set.
 */
function pair(env: Env, a: string, b: string): [string, string] | undefined {
  const first = env[a]?.trim()
  const second = env[b]?.trim()
  if (!first && !second) return undefined
  if (!first || !second) {
    throw new ConfigError(`${a} and ${b} must be set together`)
  }
  return [first, second]
}

export function loadConfig(env: Env = process.env): EnvConfig {
  const config: EnvConfig = { debug: parseBoolean(env, 'OPENID_DEBUG', false) }

  const oidc = pair(env, 'OPENID_ISSUER', 'OPENID_CLIENT_ID')
  if (oidc) {
    const [issuer, clientId] = oidc
    requireHttpURL(issuer, 'OPENID_ISSUER')
    config.oidc = {
      issuer,
      clientId,
      callbackPath: parsePath(env, 'OPENID_CALLBACK_PATH', DEFAULT_CALLBACK_PATH),
      homePath: parsePath(env, 'OPENID_HOME_PATH', DEFAULT_HOME_PATH),
    }
  }

  const openid2 = pair(env, 'OPENID2_ENDPOINT', 'OPENID2_RETURN_TO')
  if (openid2) {
    const [endpoint, returnTo] = openid2
    requireHttpURL(endpoint, 'OPENID2_ENDPOINT')
    requireHttpURL(returnTo, 'OPENID2_RETURN_TO')
    config.openid2 = {
      endpoint,
      returnTo,
      csrfProtection: parseBoolean(env, 'OPENID2_CSRF', true),
      verifyTimeoutMs: parsePositiveInt(env, 'OPENID_VERIFY_TIMEOUT_MS', DEFAULT_VERIFY_TIMEOUT_MS),
    }
  }

  return config
}
