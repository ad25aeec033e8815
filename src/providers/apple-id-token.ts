import type { NonceManager } from '../auth/nonce.ts'
import { coerceBoolean } from '../plumbing/coerce-boolean.ts'
import {
  isSupportedAlgorithm,
  parseJwt,
  verifyJwtSignature,
} from '../tokens/jwt.ts'
import {
  AppleAuthError,
  ClaimError,
  ConfigurationError,
  KeyFetchError,
  SignatureError,
  TokenFormatError,
  type ValidatedClaim,
} from './apple-errors.ts'
import type { AppleKeyStore, SigningKey } from './apple-jwks.ts'
import type { AppleIdTokenClaims } from './types/apple-claims.ts'

export type ClaimValidationResult =
  | { ok: true }
  | { ok: false; claim: ValidatedClaim; reason: string }

export interface ClaimValidationContext {
  issuer: string
  /** Configured client id plus every authorized client id */
  audiences: readonly string[]
  /** Seconds since epoch */
  now: number
  nonce: NonceManager
}

export interface VerifyIdTokenOptions {
  issuer: string
  audiences: readonly string[]
  keyStore: AppleKeyStore
  nonce: NonceManager
  now?: number
}

interface DecodedIdToken {
  alg: string
  claims: AppleIdTokenClaims
}

const requireString = (
  payload: Record<string, unknown>,
  claim: string,
): string => {
  const value = payload[claim]
  if (typeof value !== 'string' || value.length === 0) {
    throw new TokenFormatError(`id_token missing or malformed claim: ${claim}`)
  }
  return value
}

const requireNumber = (
  payload: Record<string, unknown>,
  claim: string,
): number => {
  const value = payload[claim]
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new TokenFormatError(`id_token missing or malformed claim: ${claim}`)
  }
  return value
}

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined

/**
 * Structural decode. Nothing here is trusted yet; a failure means the token
 * is not a well-formed Apple identity token at all.
 */
export const decodeIdToken = (token: string): DecodedIdToken => {
  let parsed: ReturnType<typeof parseJwt>
  try {
    parsed = parseJwt(token)
  } catch (error) {
    throw new TokenFormatError(
      error instanceof Error ? error.message : 'Invalid JWT format',
      error,
    )
  }
  const { header, payload } = parsed

  if (typeof header.kid !== 'string' || !header.kid) {
    throw new TokenFormatError('id_token missing kid in header')
  }
  if (typeof header.alg !== 'string' || !header.alg) {
    throw new TokenFormatError('id_token missing alg in header')
  }

  return {
    alg: header.alg,
    claims: {
      kid: header.kid,
      sub: requireString(payload, 'sub'),
      iss: requireString(payload, 'iss'),
      aud: requireString(payload, 'aud'),
      iat: requireNumber(payload, 'iat'),
      exp: requireNumber(payload, 'exp'),
      nonce: optionalString(payload.nonce),
      nonceSupported: coerceBoolean(payload.nonce_supported),
      email: optionalString(payload.email),
      emailVerified: coerceBoolean(payload.email_verified),
      isPrivateEmail: coerceBoolean(payload.is_private_email),
      raw: Object.freeze({ ...payload }),
    },
  }
}

type ClaimCheck = (
  claims: AppleIdTokenClaims,
  context: ClaimValidationContext,
) => ClaimValidationResult

const VALID: ClaimValidationResult = { ok: true }

const invalid = (
  claim: ValidatedClaim,
  reason: string,
): ClaimValidationResult => ({ ok: false, claim, reason })

const checkIssuer: ClaimCheck = (claims, { issuer }) =>
  claims.iss === issuer
    ? VALID
    : invalid('iss', `unexpected issuer ${claims.iss}`)

const checkAudience: ClaimCheck = (claims, { audiences }) =>
  audiences.includes(claims.aud)
    ? VALID
    : invalid('aud', `audience ${claims.aud} is not an authorized client id`)

const checkIssuedAt: ClaimCheck = (claims, { now }) =>
  claims.iat <= now ? VALID : invalid('iat', 'issued in the future')

const checkExpiry: ClaimCheck = (claims, { now }) =>
  claims.exp >= now ? VALID : invalid('exp', 'token has expired')

const checkNonce: ClaimCheck = (claims, { nonce }) => {
  if (!claims.nonceSupported) {
    return VALID
  }
  const expected = nonce.retrieveForVerification()
  if (!expected.required) {
    throw new ConfigurationError(
      'id_token requires nonce verification but the nonce mode is ignore',
    )
  }
  if (!claims.nonce || !expected.nonce) {
    return invalid('nonce', 'nonce missing')
  }
  return claims.nonce === expected.nonce
    ? VALID
    : invalid('nonce', 'nonce mismatch')
}

// Order is part of the contract: the first failing claim is reported
const CLAIM_CHECKS: readonly ClaimCheck[] = [
  checkIssuer,
  checkAudience,
  checkIssuedAt,
  checkExpiry,
  checkNonce,
]

/**
 * Run the claim checks in order and stop at the first failure. Throws only
 * for a configuration fault (nonce demanded while the mode is ignore).
 */
export const validateClaims = (
  claims: AppleIdTokenClaims,
  context: ClaimValidationContext,
): ClaimValidationResult => {
  for (const check of CLAIM_CHECKS) {
    const result = check(claims, context)
    if (!result.ok) {
      return result
    }
  }
  return VALID
}

/**
 * Verify an Apple identity token: decode, resolve the signing key, check the
 * signature, then validate claims. A malformed token never reaches the key
 * store and a forged one never reaches claim validation.
 */
export const verifyIdToken = async (
  token: string,
  options: VerifyIdTokenOptions,
): Promise<AppleIdTokenClaims> => {
  const { alg, claims } = decodeIdToken(token)

  let signingKey: SigningKey
  try {
    signingKey = await options.keyStore.getKey(claims.kid)
  } catch (error) {
    throw error instanceof AppleAuthError
      ? error
      : new KeyFetchError('Apple signing key lookup failed', error)
  }

  try {
    if (!isSupportedAlgorithm(alg)) {
      throw new Error(`Unsupported id_token algorithm: ${alg}`)
    }
    if (signingKey.alg && signingKey.alg !== alg) {
      throw new Error(
        `id_token uses ${alg} but key ${signingKey.kid} is for ${signingKey.alg}`,
      )
    }
    verifyJwtSignature(token, signingKey.key, alg)
  } catch (error) {
    throw new SignatureError(error)
  }

  const result = validateClaims(claims, {
    issuer: options.issuer,
    audiences: options.audiences,
    now: options.now ?? Math.floor(Date.now() / 1000),
    nonce: options.nonce,
  })
  if (!result.ok) {
    throw new ClaimError(result.claim, result.reason)
  }

  return claims
}
