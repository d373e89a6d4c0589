/**
 * Environment Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import { loadConfig, DEFAULT_VERIFY_TIMEOUT_MS } from '../src/config'
import { ConfigError } from '../src/errors'

const OIDC_ENV = {
  OPENID_ISSUER: 'https://issuer.example',
  OPENID_CLIENT_ID: 'client-test',
}

const OPENID2_ENV = {
  OPENID2_ENDPOINT: 'https://provider.example/openid/login',
  OPENID2_RETURN_TO: 'https://app.example/cb',
}

// ── Defaults ──────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  it('configures nothing from an empty environment', () => {
    expect(loadConfig({})).toEqual({ debug: false })
  })

  it('reads the OpenID Connect settings with defaults', () => {
    expect(loadConfig(OIDC_ENV)).toEqual({
      debug: false,
      oidc: {
        issuer: 'https://issuer.example',
        clientId: 'client-test',
        callbackPath: '/auth/callback',
        homePath: '/',
      },
    })
  })

  it('reads the OpenID 2.0 settings with defaults', () => {
    expect(loadConfig(OPENID2_ENV).openid2).toEqual({
      endpoint: 'https://provider.example/openid/login',
      returnTo: 'https://app.example/cb',
      csrfProtection: true,
      verifyTimeoutMs: DEFAULT_VERIFY_TIMEOUT_MS,
    })
  })

  it('reads overrides', () => {
    const config = loadConfig({
      ...OIDC_ENV,
      ...OPENID2_ENV,
      OPENID_CALLBACK_PATH: '/oidc/return',
      OPENID_HOME_PATH: '/app',
      OPENID2_CSRF: 'false',
      OPENID_VERIFY_TIMEOUT_MS: '2500',
      OPENID_DEBUG: 'TRUE',
    })
    expect(config.debug).toBe(true)
    expect(config.oidc?.callbackPath).toBe('/oidc/return')
    expect(config.oidc?.homePath).toBe('/app')
    expect(config.openid2?.csrfProtection).toBe(false)
    expect(config.openid2?.verifyTimeoutMs).toBe(2500)
  })

  it('treats empty values as unset', () => {
    expect(loadConfig({ OPENID_ISSUER: '', OPENID_CLIENT_ID: '  ', OPENID_DEBUG: '' })).toEqual({ debug: false })
  })

  // ── Validation ──────────────────────────────────────────────────────────

  it('requires both OpenID Connect variables', () => {
    expect(() => loadConfig({ OPENID_ISSUER: 'https://issuer.example' })).toThrow(
      'OPENID_ISSUER and OPENID_CLIENT_ID must be set together',
    )
  })

  it('requires both OpenID 2.0 variables', () => {
    expect(() => loadConfig({ OPENID2_RETURN_TO: 'https://app.example/cb' })).toThrow(
      'OPENID2_ENDPOINT and OPENID2_RETURN_TO must be set together',
    )
  })

  it('rejects a malformed issuer', () => {
    expect(() => loadConfig({ ...OIDC_ENV, OPENID_ISSUER: 'issuer.example' })).toThrow(
      'invalid OPENID_ISSUER: issuer.example',
    )
  })

  it('rejects a return URL that is not http(s)', () => {
    expect(() => loadConfig({ ...OPENID2_ENV, OPENID2_RETURN_TO: 'ftp://app.example/cb' })).toThrow(
      'invalid OPENID2_RETURN_TO: ftp://app.example/cb (expected an absolute http(s) URL)',
    )
  })

  it('rejects a relative callback path', () => {
    expect(() => loadConfig({ ...OIDC_ENV, OPENID_CALLBACK_PATH: 'auth/callback' })).toThrow(
      'OPENID_CALLBACK_PATH must be an absolute path, got auth/callback',
    )
  })

  it('rejects a protocol-relative home path', () => {
    expect(() => loadConfig({ ...OIDC_ENV, OPENID_HOME_PATH: '//evil.example' })).toThrow(ConfigError)
  })

  it('rejects a timeout that is not a positive integer', () => {
    expect(() => loadConfig({ ...OPENID2_ENV, OPENID_VERIFY_TIMEOUT_MS: '0' })).toThrow(
      'OPENID_VERIFY_TIMEOUT_MS must be a positive integer, got 0',
    )
    expect(() => loadConfig({ ...OPENID2_ENV, OPENID_VERIFY_TIMEOUT_MS: '1.5' })).toThrow(ConfigError)
  })

  it('rejects a boolean it cannot read', () => {
    expect(() => loadConfig({ OPENID_DEBUG: 'yes' })).toThrow('OPENID_DEBUG must be true or false, got yes')
  })
})
