import crypto from 'node:crypto'
import { isRecord } from '../plumbing/is-record.ts'
import type { JwtHeader } from './types/jwt-header.ts'

export type JwtAlgorithm = 'RS256' | 'ES256'

export const isSupportedAlgorithm = (value: unknown): value is JwtAlgorithm =>
  value === 'RS256' || value === 'ES256'

/**
 * Encodes a Buffer to Base64URL format
 * Base64URL is Base64 with URL-safe characters and no padding
 */
export const base64UrlEncode = (buffer: Buffer): string => {
  return buffer
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '')
}

/**
 * Decodes a Base64URL string to a Buffer
 * Handles padding restoration for proper Base64 decoding
 */
export const base64UrlDecode = (str: string): Buffer => {
  let base64 = str.replace(/-/g, '+').replace(/_/g, '/')
  while (base64.length % 4) {
    base64 += '='
  }
  return Buffer.from(base64, 'base64')
}

export const createJwtHeader = (
  algorithm: JwtAlgorithm,
  kid?: string,
): JwtHeader => {
  const header: JwtHeader = {
    alg: algorithm,
    typ: 'JWT',
  }
  if (kid) {
    header.kid = kid
  }
  return header
}

const toKeyObject = (
  key: string | Buffer | crypto.KeyObject,
  type: 'private' | 'public',
): crypto.KeyObject => {
  if (typeof key !== 'string' && !Buffer.isBuffer(key)) {
    return key
  }
  return type === 'private'
    ? crypto.createPrivateKey(key)
    : crypto.createPublicKey(key)
}

// Node.js crypto uses 'RSA-SHA256' for RS256 and 'SHA256' for ES256 (ECDSA)
const digestFor = (algorithm: JwtAlgorithm): string =>
  algorithm === 'RS256' ? 'RSA-SHA256' : 'SHA256'

/**
 * Signs a JWT using RS256 (RSA with SHA-256) or ES256 (ECDSA P-256 with SHA-256)
 */
export const signJwt = (
  payload: Record<string, unknown>,
  privateKey: string | Buffer | crypto.KeyObject,
  algorithm: JwtAlgorithm = 'RS256',
  kid?: string,
): string => {
  const header = createJwtHeader(algorithm, kid)

  const encodedHeader = base64UrlEncode(Buffer.from(JSON.stringify(header)))
  const encodedPayload = base64UrlEncode(Buffer.from(JSON.stringify(payload)))
  const signatureInput = `${encodedHeader}.${encodedPayload}`

  const sign = crypto.createSign(digestFor(algorithm))
  sign.update(signatureInput)
  sign.end()

  const keyObject = toKeyObject(privateKey, 'private')

  // ES256 signatures are IEEE P1363 (r || s) per RFC 7518, not DER
  const signOptions =
    algorithm === 'ES256'
      ? { key: keyObject, dsaEncoding: 'ieee-p1363' as const }
      : keyObject
  const signature = sign.sign(signOptions)

  return `${signatureInput}.${base64UrlEncode(signature)}`
}

const decodeJsonSegment = (segment: string): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(base64UrlDecode(segment).toString('utf-8'))
  if (!isRecord(parsed)) {
    throw new Error('segment is not a JSON object')
  }
  return parsed
}

/**
 * Parses a compact JWT into its parts without checking the signature.
 */
export const parseJwt = (
  token: string,
): {
  header: Record<string, unknown>
  payload: Record<string, unknown>
  signature: string
  signingInput: string
} => {
  const parts = token.split('.')
  if (parts.length !== 3) {
    throw new Error('Invalid JWT format: token must have three parts')
  }

  const [encodedHeader, encodedPayload, encodedSignature] = parts
  if (!encodedHeader || !encodedPayload || !encodedSignature) {
    throw new Error('Invalid JWT format: empty token part')
  }

  try {
    return {
      header: decodeJsonSegment(encodedHeader),
      payload: decodeJsonSegment(encodedPayload),
      signature: encodedSignature,
      signingInput: `${encodedHeader}.${encodedPayload}`,
    }
  } catch (error) {
    throw new Error(
      `Invalid JWT format: failed to parse token parts - ${error instanceof Error ? error.message : String(error)}`,
    )
  }
}

/**
 * Checks a JWT signature only. Claims (exp, nbf, ...) are left to the caller.
 * Throws 'Invalid JWT signature' when the signature does not verify.
 */
export const verifyJwtSignature = (
  token: string,
  publicKey: string | Buffer | crypto.KeyObject,
  algorithm: JwtAlgorithm,
): void => {
  const { header, signature, signingInput } = parseJwt(token)

  if (header.alg !== algorithm) {
    throw new Error(
      `JWT algorithm mismatch: token uses ${String(header.alg)} but verification requested ${algorithm}`,
    )
  }

  const verify = crypto.createVerify(digestFor(algorithm))
  verify.update(signingInput)
  verify.end()

  const keyObject = toKeyObject(publicKey, 'public')
  const verifyOptions =
    algorithm === 'ES256'
      ? { key: keyObject, dsaEncoding: 'ieee-p1363' as const }
      : keyObject

  let isValid: boolean
  try {
    isValid = verify.verify(verifyOptions, base64UrlDecode(signature))
  } catch (error) {
    // wrong key type for the algorithm, malformed signature bytes
    throw new Error('Invalid JWT signature', { cause: error })
  }
  if (!isValid) {
    throw new Error('Invalid JWT signature')
  }
}
