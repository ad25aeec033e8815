import crypto from 'node:crypto'
import { log } from '../plumbing/logger.ts'
import { isRecord } from '../plumbing/is-record.ts'
import { isSupportedAlgorithm, type JwtAlgorithm } from '../tokens/jwt.ts'
import type { PublicJWK } from '../tokens/types/jwk.ts'
import { APPLE_JWKS_URL, DEFAULT_HTTP_TIMEOUT_MS } from './apple-config.ts'
import { KeyFetchError } from './apple-errors.ts'

export interface SigningKey {
  kid: string
  /** Declared algorithm; absent when the key set does not pin one */
  alg?: JwtAlgorithm
  key: crypto.KeyObject
}

export interface AppleKeyStoreOptions {
  jwksUrl?: string
  fetch?: typeof fetch
  timeoutMs?: number
}

export interface AppleKeyStore {
  /** Cached key for `kid`; a miss refetches the whole key set. */
  getKey: (kid: string) => Promise<SigningKey>
  /** kids currently cached */
  cachedKids: () => string[]
}

const EC_CURVES = ['P-256', 'P-384', 'P-521'] as const

const parseJwk = (value: unknown): PublicJWK | null => {
  if (!isRecord(value) || typeof value.kid !== 'string' || !value.kid) {
    return null
  }
  const { kid } = value
  const alg = typeof value.alg === 'string' ? value.alg : undefined
  const use = value.use === 'sig' || value.use === 'enc' ? value.use : undefined

  if (
    value.kty === 'RSA' &&
    typeof value.n === 'string' &&
    typeof value.e === 'string'
  ) {
    return { kty: 'RSA', kid, alg, use, n: value.n, e: value.e }
  }

  const crv = EC_CURVES.find((curve) => curve === value.crv)
  if (
    value.kty === 'EC' &&
    crv &&
    typeof value.x === 'string' &&
    typeof value.y === 'string'
  ) {
    return { kty: 'EC', kid, alg, use, crv, x: value.x, y: value.y }
  }

  return null
}

const jwkToSigningKey = (jwk: PublicJWK): SigningKey => {
  let alg: JwtAlgorithm | undefined
  if (jwk.alg !== undefined) {
    if (!isSupportedAlgorithm(jwk.alg)) {
      throw new Error(`Unsupported JWK algorithm: ${jwk.alg}`)
    }
    alg = jwk.alg
  }
  const material =
    jwk.kty === 'RSA'
      ? { kty: jwk.kty, n: jwk.n, e: jwk.e }
      : { kty: jwk.kty, crv: jwk.crv, x: jwk.x, y: jwk.y }

  return {
    kid: jwk.kid,
    alg,
    key: crypto.createPublicKey({ key: material, format: 'jwk' }),
  }
}

/**
 * Key store for Apple's identity-token signing keys. Entries never expire;
 * an unknown kid (Apple rotated) triggers a refetch of the full set. Each
 * refetch builds a new map and swaps it in whole, so concurrent callers
 * only ever see a complete set. Two callers missing the same kid may both
 * fetch.
 */
export const createAppleKeyStore = (
  options: AppleKeyStoreOptions = {},
): AppleKeyStore => {
  const jwksUrl = options.jwksUrl ?? APPLE_JWKS_URL
  const fetchImpl = options.fetch ?? fetch
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS

  let cachedKeys: ReadonlyMap<string, SigningKey> = new Map()

  const fetchJwks = async (): Promise<unknown[]> => {
    const response = await fetchImpl(jwksUrl, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    })
    if (!response.ok) {
      throw new Error(
        `Failed to fetch Apple JWKS: ${response.status} ${response.statusText}`,
      )
    }
    const data: unknown = await response.json()
    if (!isRecord(data) || !Array.isArray(data.keys)) {
      throw new Error('Invalid Apple JWKS response: missing keys array')
    }
    return data.keys
  }

  const refresh = async (): Promise<ReadonlyMap<string, SigningKey>> => {
    const keys = new Map<string, SigningKey>()

    for (const entry of await fetchJwks()) {
      const jwk = parseJwk(entry)
      if (!jwk) {
        log({ message: 'Skipping malformed Apple JWK' })
        continue
      }
      try {
        keys.set(jwk.kid, jwkToSigningKey(jwk))
      } catch (error) {
        log({
          message: 'Skipping unusable Apple JWK',
          kid: jwk.kid,
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }

    cachedKeys = keys
    return keys
  }

  const getKey = async (kid: string): Promise<SigningKey> => {
    const cached = cachedKeys.get(kid)
    if (cached) {
      return cached
    }

    let keys: ReadonlyMap<string, SigningKey>
    try {
      keys = await refresh()
    } catch (error) {
      throw new KeyFetchError(
        `Apple JWKS could not be retrieved: ${error instanceof Error ? error.message : String(error)}`,
        error,
      )
    }

    const key = keys.get(kid)
    if (!key) {
      throw new KeyFetchError(`Apple public key not found for kid: ${kid}`)
    }
    return key
  }

  return {
    getKey,
    cachedKids: () => [...cachedKeys.keys()],
  }
}
