/**
 * OpenID 2.0 Login Route Tests
 *
 * Drives the Hono routes of OpenID2Auth with app.request(): the login
 * redirect, the nonce cookie, and callback verification against a stub
 * provider.
 */

import { describe, it, expect, vi } from 'vitest'
import type { Context } from 'hono'
import { OpenID2Auth, type OpenID2Config } from '../src/openid2'
import { ConfigError } from '../src/errors'
import { OPENID2_NS } from '../src/request'
import type { VerifiedIdentity } from '../src/types'
import { assertion, stubProvider, CLAIMED_ID, ISSUED, OP_ENDPOINT, RETURN_TO } from './helpers/assertion'

const NOW = ISSUED + 30_000

function createAuth(overrides: Partial<OpenID2Config> = {}) {
  return new OpenID2Auth({
    endpoint: OP_ENDPOINT,
    returnTo: RETURN_TO,
    fetch: stubProvider(),
    now: () => NOW,
    ...overrides,
  })
}

/** Assertion for a login whose return_to carries `nonce` */
function boundAssertion(nonce: string, overrides: Record<string, string | null> = {}): URLSearchParams {
  return assertion({ 'openid.return_to': `${RETURN_TO}?auth_nonce=${nonce}`, auth_nonce: nonce, ...overrides })
}

// ── Construction ──────────────────────────────────────────────────────────

describe('OpenID2Auth construction', () => {
  it('derives realm and callback path from the return URL', () => {
    const auth = createAuth()
    expect(auth.realm).toBe('https://app.example')
    expect(auth.callbackPath).toBe('/cb')
    expect(auth.loginPath).toBe('/login')
    expect(auth.csrfProtection).toBe(true)
  })

  it('rejects a malformed return URL', () => {
    expect(() => createAuth({ returnTo: 'cb' })).toThrow(ConfigError)
  })

  it('rejects a malformed endpoint', () => {
    expect(() => createAuth({ endpoint: 'provider' })).toThrow('invalid provider endpoint: provider')
  })
})

// ── Login ─────────────────────────────────────────────────────────────────

describe('GET /login', () => {
  it('redirects to the provider with the return URL', async () => {
    const app = createAuth().routes()
    const res = await app.request('/login')

    expect(res.status).toBe(303)
    const location = res.headers.get('Location') ?? ''
    expect(location.startsWith(`${OP_ENDPOINT}?`)).toBe(true)
    expect(location).toContain('openid.return_to=https%3A%2F%2Fapp.example%2Fcb')
    expect(location).toContain('openid.mode=checkid_setup')
    expect(location).toContain('openid.realm=https%3A%2F%2Fapp.example')
  })

  it('sets a nonce cookie bound into return_to', async () => {
    const app = createAuth().routes()
    const res = await app.request('/login')

    const cookies = res.headers.getSetCookie()
    expect(cookies).toHaveLength(1)
    const cookie = cookies[0]!
    expect(cookie).toMatch(/^__Host-AuthNonce=[0-9a-f]{40};/)
    expect(cookie).toContain('Max-Age=3600')
    expect(cookie).toContain('Path=/')
    expect(cookie).toContain('HttpOnly')
    expect(cookie).toContain('Secure')
    expect(cookie).toContain('SameSite=Strict')
    expect(cookie).not.toContain('Domain')

    const nonce = cookie.slice('__Host-AuthNonce='.length, cookie.indexOf(';'))
    const returnTo = new URL(res.headers.get('Location') ?? '').searchParams.get('openid.return_to')
    expect(returnTo).toBe(`${RETURN_TO}?auth_nonce=${nonce}`)
  })

  it('uses a fresh nonce per login', async () => {
    const app = createAuth().routes()
    const first = (await app.request('/login')).headers.getSetCookie()[0]
    const second = (await app.request('/login')).headers.getSetCookie()[0]
    expect(first).not.toBe(second)
  })

  it('sends the bare return URL without CSRF protection', async () => {
    const app = createAuth({ csrfProtection: false }).routes()
    const res = await app.request('/login')

    expect(res.headers.getSetCookie()).toHaveLength(0)
    expect(new URL(res.headers.get('Location') ?? '').searchParams.get('openid.return_to')).toBe(RETURN_TO)
  })

  it('honours a custom login path', async () => {
    const app = createAuth({ loginPath: '/auth/steam' }).routes()
    expect((await app.request('/auth/steam')).status).toBe(303)
    expect((await app.request('/login')).status).toBe(404)
  })
})

// ── Callback ──────────────────────────────────────────────────────────────

describe('GET callback', () => {
  it('returns the verified identity and clears the nonce cookie', async () => {
    const app = createAuth().routes()
    const params = boundAssertion('abc123')
    const res = await app.request(`/cb?${params}`, { headers: { Cookie: '__Host-AuthNonce=abc123' } })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ subject: CLAIMED_ID, verifiedAt: '2024-05-01T12:00:30.000Z' })

    const cookies = res.headers.getSetCookie()
    expect(cookies).toHaveLength(1)
    expect(cookies[0]).toMatch(/^__Host-AuthNonce=; Max-Age=0;/)
  })

  it('denies a forged assertion with an unsigned nonce', async () => {
    const fetch = stubProvider()
    const app = createAuth({ fetch, csrfProtection: false }).routes()
    const params = assertion({ 'openid.signed': 'op_endpoint,claimed_id,identity,return_to,assoc_handle' })
    const res = await app.request(`/cb?${params}`)

    expect(res.status).toBe(403)
    expect(await res.json()).toEqual({
      error: 'access_denied',
      error_description: "response_nonce must be signed but isn't",
      kind: 'unsigned_field',
    })
    expect(fetch).not.toHaveBeenCalled()
  })

  it('denies a nonce that does not match the cookie', async () => {
    const app = createAuth().routes()
    const params = boundAssertion('abc123')
    const res = await app.request(`/cb?${params}`, { headers: { Cookie: '__Host-AuthNonce=def456' } })

    expect(res.status).toBe(403)
    expect(await res.json()).toEqual({
      error: 'access_denied',
      error_description: 'Invalid nonce',
      kind: 'nonce_mismatch',
    })
  })

  it('denies a callback without a nonce cookie', async () => {
    const app = createAuth().routes()
    const res = await app.request(`/cb?${boundAssertion('abc123')}`)

    expect(res.status).toBe(403)
    const body = await res.json()
    expect(body).toMatchObject({ kind: 'nonce_mismatch', error_description: 'Invalid nonce: no nonce cookie' })
  })

  it('denies an assertion the provider rejects', async () => {
    const app = createAuth({ fetch: stubProvider(`ns:${OPENID2_NS}\nis_valid:false\n`) }).routes()
    const res = await app.request(`/cb?${boundAssertion('abc123')}`, { headers: { Cookie: '__Host-AuthNonce=abc123' } })

    expect(res.status).toBe(403)
    expect(await res.json()).toMatchObject({ kind: 'assertion_rejected' })
  })

  it('answers 502 when the provider is unreachable', async () => {
    const fetch = vi.fn(async () => {
      throw new TypeError('fetch failed')
    })
    const app = createAuth({ fetch }).routes()
    const res = await app.request(`/cb?${boundAssertion('abc123')}`, { headers: { Cookie: '__Host-AuthNonce=abc123' } })

    expect(res.status).toBe(502)
    expect(await res.json()).toMatchObject({ kind: 'verification_request_failed' })
  })

  it('denies a stale assertion', async () => {
    const app = createAuth({ now: () => ISSUED + 61_000 }).routes()
    const res = await app.request(`/cb?${boundAssertion('abc123')}`, { headers: { Cookie: '__Host-AuthNonce=abc123' } })

    expect(res.status).toBe(403)
    expect(await res.json()).toEqual({
      error: 'access_denied',
      error_description: 'nonce too old: 2024-05-01T12:00:00.000Z',
      kind: 'invalid_nonce',
    })
  })

  it('hands the identity to onVerified', async () => {
    const onVerified = vi.fn((c: Context, identity: VerifiedIdentity) => c.text(`welcome ${identity.subject}`))
    const app = createAuth({ onVerified, csrfProtection: false }).routes()
    const res = await app.request(`/cb?${assertion()}`)

    expect(res.status).toBe(200)
    expect(await res.text()).toBe(`welcome ${CLAIMED_ID}`)
    expect(onVerified).toHaveBeenCalledTimes(1)
  })
})

// ── verify() ──────────────────────────────────────────────────────────────

describe('OpenID2Auth.verify', () => {
  it('checks the path of the request against return_to', async () => {
    const auth = createAuth()
    const params = assertion()
    await expect(auth.verify(new Request(`http://internal:8080/elsewhere?${params}`))).rejects.toThrow(
      "scheme, host or path doesn't match return_to URL",
    )
  })

  it('uses the configured realm rather than the request host', async () => {
    const auth = createAuth()
    const params = assertion()
    const identity = await auth.verify(new Request(`http://internal:8080/cb?${params}`))
    expect(identity.subject).toBe(CLAIMED_ID)
  })

  it('passes a signal to check_authentication', async () => {
    const fetch = stubProvider()
    const auth = createAuth({ fetch })
    const params = assertion()
    await auth.verify(new Request(`${RETURN_TO}?${params}`))
    expect(fetch.mock.calls[0]![1]?.signal).toBeInstanceOf(AbortSignal)
  })

  it('fails when the caller cancels', async () => {
    const controller = new AbortController()
    controller.abort()
    const auth = createAuth()
    const params = assertion()
    await expect(auth.verify(new Request(`${RETURN_TO}?${params}`), { signal: controller.signal })).rejects.toMatchObject(
      { kind: 'verification_request_failed' },
    )
  })
})
