/**
 * OpenID Connect provider metadata
 *
 * A Provider is an explicit, caller-owned value: it is loaded once at
 * startup with discoverProvider() (or built from known endpoints) and then
 * injected into OpenIDConnectAuth. Discovery failures are ConfigError so a
 * misconfigured application fails fast instead of on the first login.
 */

import { ConfigError } from '../errors'
import type { FetchLike } from '../types'

// ============================================================================
// Types
// ============================================================================

export interface Provider {
  /** Issuer identifier; must equal the `iss` claim of every ID token */
  issuer: string
  /** Where the browser is sent to authenticate */
  authorizationEndpoint: string
  /** JWKS with the provider's token signing keys */
  jwksUri: string
}

export interface DiscoveryOptions {
  fetch?: FetchLike
  signal?: AbortSignal
}

// ============================================================================
// Runtime Guards
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isURL(value: unknown): value is string {
  if (typeof value !== 'string') return false
  try {
    new URL(value)
    return true
  } catch {
    return false
  }
}

function requireURL(metadata: Record<string, unknown>, field: string): string {
  const value = metadata[field]
  if (!isURL(value)) {
    throw new ConfigError(`provider metadata: ${field} is missing or not a URL`)
  }
  return value
}

// ============================================================================
// Discovery
// ============================================================================

export function discoveryURL(issuer: string): string {
  return `${issuer.replace(/\/+$/, '')}/.well-known/openid-configuration`
}

/**
 * Load provider metadata from `<issuer>/.well-known/openid-configuration`.
 *
 * @example
 * ```typescript
 * const provider = await discoverProvider('https://accounts.google.com')
 * const auth = new OpenIDConnectAuth({ provider, clientId: 'xxx.apps.googleusercontent.com' })
 * ```
 */
export async function discoverProvider(issuer: string, options: DiscoveryOptions = {}): Promise<Provider> {
  const fetchImpl = options.fetch ?? fetch
  const url = discoveryURL(issuer)

  let response: Response
  try {
    response = await fetchImpl(url, {
      headers: { Accept: 'application/json' },
      ...(options.signal && { signal: options.signal }),
    })
  } catch (err) {
    throw new ConfigError(`provider discovery failed: ${url}`, { cause: err })
  }
  if (!response.ok) {
    throw new ConfigError(`provider discovery failed: ${url} returned ${response.status}`)
  }

  let metadata: unknown
  try {
    metadata = await response.json()
  } catch (err) {
    throw new ConfigError(`provider discovery failed: ${url} did not return JSON`, { cause: err })
  }
  if (!isObject(metadata)) {
    throw new ConfigError(`provider discovery failed: ${url} did not return an object`)
  }

  // Same rule as the iss claim check: the document must describe the issuer we asked for
  if (metadata['issuer'] !== issuer) {
    throw new ConfigError(`provider issuer did not match: expected ${issuer}, got ${String(metadata['issuer'])}`)
  }

  return {
    issuer,
    authorizationEndpoint: requireURL(metadata, 'authorization_endpoint'),
    jwksUri: requireURL(metadata, 'jwks_uri'),
  }
}
