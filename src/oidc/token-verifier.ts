/**
 * ID token signature verification
 *
 * TokenVerifier is the seam between the login flow and the signed-token
 * library: it checks signature, issuer, audience and (optionally) expiry and
 * returns the claims. JoseTokenVerifier is the implementation backed by jose.
 */

import * as jose from 'jose'
import { InvalidTokenError } from '../errors'
import type { Provider } from './provider'

// ============================================================================
// Types
// ============================================================================

export interface TokenVerifyOptions {
  /** Expected `aud` (the OAuth client ID) */
  audience: string
  /** Accept a token whose `exp` has passed */
  skipExpiry: boolean
}

export interface TokenVerifier {
  /**
   * @returns the verified claims
   * @throws InvalidTokenError when the token is not valid for this issuer and audience
   */
  verify(token: string, options: TokenVerifyOptions): Promise<jose.JWTPayload>
}

export interface JoseTokenVerifierOptions {
  /** Expected `iss` */
  issuer: string
  /** Key source, e.g. jose.createRemoteJWKSet(new URL(provider.jwksUri)) */
  keys: jose.JWTVerifyGetKey
  /** Accepted signing algorithms (default: any the key supports) */
  algorithms?: string[]
  /** Clock tolerance in seconds for exp/nbf/iat (default: 0) */
  clockTolerance?: number
}

// ============================================================================
// Helpers
// ============================================================================

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'unknown error'
}

function audienceMatches(payload: jose.JWTPayload, audience: string): boolean {
  const aud = Array.isArray(payload.aud) ? payload.aud : payload.aud ? [payload.aud] : []
  return aud.includes(audience)
}

// ============================================================================
// JoseTokenVerifier
// ============================================================================

export class JoseTokenVerifier implements TokenVerifier {
  private readonly issuer: string
  private readonly keys: jose.JWTVerifyGetKey
  private readonly algorithms: string[] | undefined
  private readonly clockTolerance: number

  constructor(options: JoseTokenVerifierOptions) {
    this.issuer = options.issuer
    this.keys = options.keys
    this.algorithms = options.algorithms
    this.clockTolerance = options.clockTolerance ?? 0
  }

  /**
   * Verifier for a discovered provider; keys are fetched from its JWKS URI
   * and cached by jose.
   */
  static forProvider(provider: Provider, options: Pick<JoseTokenVerifierOptions, 'algorithms' | 'clockTolerance'> = {}): JoseTokenVerifier {
    return new JoseTokenVerifier({
      ...options,
      issuer: provider.issuer,
      keys: jose.createRemoteJWKSet(new URL(provider.jwksUri)),
    })
  }

  async verify(token: string, options: TokenVerifyOptions): Promise<jose.JWTPayload> {
    const verifyOptions: jose.JWTVerifyOptions = {
      issuer: this.issuer,
      audience: options.audience,
      clockTolerance: this.clockTolerance,
      ...(this.algorithms && { algorithms: this.algorithms }),
    }

    try {
      const { payload } = await jose.jwtVerify(token, this.keys, verifyOptions)
      return payload
    } catch (err) {
      // jose raises JWTExpired only after signature, iss and aud passed; the
      // iss/aud checks below repeat them and are not the primary ones
      if (options.skipExpiry && err instanceof jose.errors.JWTExpired) {
        const payload = err.payload
        if (payload.iss !== this.issuer) {
          throw new InvalidTokenError(`unexpected "iss" claim value: ${String(payload.iss)}`)
        }
        if (!audienceMatches(payload, options.audience)) {
          throw new InvalidTokenError('unexpected "aud" claim value')
        }
        return payload
      }
      throw new InvalidTokenError(`invalid ID token: ${errorMessage(err)}`, { cause: err })
    }
  }
}
