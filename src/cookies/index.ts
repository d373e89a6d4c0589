/**
 * Cookies used by the login flows
 *
 * Both cookies are `__Host-` prefixed, so the browser only accepts them with
 * `Secure`, `Path=/` and no `Domain`. Both are HttpOnly and SameSite=Strict.
 *
 *   __Host-AuthNonce  request nonce of the login in progress (1 hour)
 *   __Host-AuthToken  raw ID token of the session (1 year)
 */

import type { Context } from 'hono'
import { deleteCookie, getCookie, setCookie } from 'hono/cookie'

// ============================================================================
// Constants
// ============================================================================

export const NONCE_COOKIE = 'AuthNonce'
export const TOKEN_COOKIE = 'AuthToken'

/** Nonce cookie lifetime in seconds: 1 hour */
export const NONCE_COOKIE_MAX_AGE = 60 * 60

/** Session cookie lifetime in seconds: 1 year */
export const TOKEN_COOKIE_MAX_AGE = 365 * 24 * 60 * 60

// ============================================================================
// Helpers
// ============================================================================

export function writeCookie(c: Context, name: string, value: string, maxAge: number): void {
  setCookie(c, name, value, {
    prefix: 'host',
    path: '/',
    secure: true,
    httpOnly: true,
    sameSite: 'Strict',
    maxAge,
  })
}

export function readCookie(c: Context, name: string): string | undefined {
  return getCookie(c, name, 'host')
}

/**
 * Overwrite the cookie with an empty value and Max-Age=0 so the browser drops
 * it immediately.
 */
export function removeCookie(c: Context, name: string): void {
  deleteCookie(c, name, {
    prefix: 'host',
    path: '/',
    secure: true,
    httpOnly: true,
    sameSite: 'Strict',
  })
}
