/**
 * OpenID 2.0 indirect (signed redirect) flow
 */

export { OpenID2Auth, DEFAULT_OPENID2_LOGIN_PATH } from './auth'
export type { OpenID2Config, VerifyOptions } from './auth'
export {
  verifyAssertion,
  verifySignedFields,
  verifySignature,
  verifyReturnTo,
  verifyNonce,
  parseKeyValueForm,
  REQUIRED_SIGNED_FIELDS,
  CONDITIONAL_SIGNED_FIELDS,
} from './validator'
export type { VerifyAssertionOptions } from './validator'
