import crypto from 'node:crypto'
import { describe, expect, it } from 'vitest'
import { createNonceManager, NONCE_SESSION_KEY } from '../../auth/nonce.ts'
import { base64UrlEncode, signJwt } from '../../tokens/jwt.ts'
import { APPLE_ISSUER } from '../apple-config.ts'
import {
  ClaimError,
  ConfigurationError,
  KeyFetchError,
  SignatureError,
  TokenFormatError,
} from '../apple-errors.ts'
import {
  decodeIdToken,
  validateClaims,
  verifyIdToken,
} from '../apple-id-token.ts'
import type { AppleKeyStore } from '../apple-jwks.ts'
import {
  APPLE_KID,
  CLIENT_ID,
  NATIVE_CLIENT_ID,
  appleSigningKey,
  createIdToken,
  createMemorySession,
  createRequestContext,
  createStaticKeyStore,
} from './apple-fixtures.ts'

const NOW = 1_700_000_000

const tokenAt = (overrides: Record<string, unknown> = {}) =>
  createIdToken({ iat: NOW - 10, exp: NOW + 600, ...overrides })

const verify = (
  token: string,
  options: {
    keyStore?: AppleKeyStore
    nonceMode?: string
    session?: Record<string, string>
    params?: Record<string, string>
  } = {},
) =>
  verifyIdToken(token, {
    issuer: APPLE_ISSUER,
    audiences: [CLIENT_ID, NATIVE_CLIENT_ID],
    keyStore: options.keyStore ?? createStaticKeyStore(),
    nonce: createNonceManager(
      options.nonceMode ?? 'session',
      createRequestContext({
        session: createMemorySession(options.session),
        params: options.params,
      }),
    ),
    now: NOW,
  })

const replaceSegment = (token: string, index: number, value: string) => {
  const parts = token.split('.')
  parts[index] = value
  return parts.join('.')
}

describe('decodeIdToken', () => {
  it('should extract typed claims', () => {
    const { alg, claims } = decodeIdToken(tokenAt({ nonce: 'n-1' }))

    expect(alg).toBe('RS256')
    expect(claims).toMatchObject({
      kid: APPLE_KID,
      sub: '001234.abcdef0123456789.1234',
      iss: APPLE_ISSUER,
      aud: CLIENT_ID,
      iat: NOW - 10,
      exp: NOW + 600,
      nonce: 'n-1',
      nonceSupported: false,
      email: 'ada@example.com',
      emailVerified: true,
      isPrivateEmail: false,
    })
    expect(claims.raw.email_verified).toBe('true')
    expect(Object.isFrozen(claims.raw)).toBe(true)
  })

  it('should accept boolean flags in string or boolean form', () => {
    const { claims } = decodeIdToken(
      tokenAt({
        email_verified: true,
        is_private_email: 'true',
        nonce_supported: 'false',
      }),
    )

    expect(claims.emailVerified).toBe(true)
    expect(claims.isPrivateEmail).toBe(true)
    expect(claims.nonceSupported).toBe(false)
  })

  it('should reject a token without three parts', () => {
    expect(() => decodeIdToken('abc.def')).toThrow(TokenFormatError)
    expect(() => decodeIdToken('abc.def')).toThrow(
      'Invalid JWT format: token must have three parts',
    )
  })

  it('should reject a header without kid', () => {
    const token = signJwt(
      { iss: APPLE_ISSUER, aud: CLIENT_ID, sub: 'u', iat: NOW, exp: NOW },
      appleSigningKey.privateKey,
      'RS256',
    )

    expect(() => decodeIdToken(token)).toThrow('id_token missing kid in header')
  })

  it('should reject missing or mistyped required claims', () => {
    expect(() => decodeIdToken(tokenAt({ sub: undefined }))).toThrow(
      'id_token missing or malformed claim: sub',
    )
    expect(() => decodeIdToken(tokenAt({ exp: String(NOW) }))).toThrow(
      'id_token missing or malformed claim: exp',
    )
    expect(() => decodeIdToken(tokenAt({ aud: [CLIENT_ID] }))).toThrow(
      'id_token missing or malformed claim: aud',
    )
  })
})

describe('validateClaims', () => {
  const context = {
    issuer: APPLE_ISSUER,
    audiences: [CLIENT_ID],
    now: NOW,
    nonce: createNonceManager('ignore', createRequestContext()),
  }

  it('should report the first failing claim in order', () => {
    const { claims } = decodeIdToken(
      tokenAt({ iss: 'https://issuer.example.com', exp: NOW - 1 }),
    )

    expect(validateClaims(claims, context)).toEqual({
      ok: false,
      claim: 'iss',
      reason: 'unexpected issuer https://issuer.example.com',
    })
  })

  it('should accept boundary timestamps', () => {
    const { claims } = decodeIdToken(tokenAt({ iat: NOW, exp: NOW }))

    expect(validateClaims(claims, context)).toEqual({ ok: true })
  })
})

describe('verifyIdToken', () => {
  it('should verify a valid token', async () => {
    const keyStore = createStaticKeyStore()

    const claims = await verify(tokenAt(), { keyStore })

    expect(claims.sub).toBe('001234.abcdef0123456789.1234')
    expect(keyStore.lookups).toEqual([APPLE_KID])
  })

  it('should accept any authorized client id as audience', async () => {
    const claims = await verify(tokenAt({ aud: NATIVE_CLIENT_ID }))

    expect(claims.aud).toBe(NATIVE_CLIENT_ID)
  })

  it.each([
    ['iss', { iss: 'https://issuer.example.com' }, 'iss invalid: unexpected issuer https://issuer.example.com'],
    ['aud', { aud: 'com.example.other' }, 'aud invalid: audience com.example.other is not an authorized client id'],
    ['iat', { iat: NOW + 1 }, 'iat invalid: issued in the future'],
    ['exp', { exp: NOW - 1 }, 'exp invalid: token has expired'],
  ])('should reject an invalid %s claim', async (claim, overrides, message) => {
    const error = await verify(tokenAt(overrides)).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ClaimError)
    expect(error).toMatchObject({
      kind: 'id_token_claims_invalid',
      claim,
      message,
    })
  })

  it('should reject a tampered signature', async () => {
    const token = tokenAt()
    const signature = token.split('.')[2]
    const tampered = replaceSegment(
      token,
      2,
      (signature.startsWith('A') ? 'B' : 'A') + signature.slice(1),
    )

    await expect(verify(tampered)).rejects.toBeInstanceOf(SignatureError)
  })

  it('should reject a tampered payload before checking claims', async () => {
    const token = tokenAt()
    const forged = replaceSegment(
      token,
      1,
      base64UrlEncode(
        Buffer.from(
          JSON.stringify({
            iss: APPLE_ISSUER,
            aud: CLIENT_ID,
            sub: 'someone-else',
            iat: NOW,
            exp: NOW - 1,
          }),
        ),
      ),
    )

    const error = await verify(forged).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(SignatureError)
    expect(error).toMatchObject({
      kind: 'id_token_signature_invalid',
      message: 'id_token signature invalid',
    })
  })

  it('should reject a token signed by another key', async () => {
    const { privateKey } = crypto.generateKeyPairSync('rsa', {
      modulusLength: 2048,
    })

    await expect(
      verify(createIdToken({ iat: NOW, exp: NOW + 60 }, { privateKey })),
    ).rejects.toBeInstanceOf(SignatureError)
  })

  it('should reject an algorithm the key is not published for', async () => {
    const keyStore = createStaticKeyStore([
      { kid: APPLE_KID, alg: 'ES256', key: appleSigningKey.publicKey },
    ])

    await expect(verify(tokenAt(), { keyStore })).rejects.toBeInstanceOf(
      SignatureError,
    )
  })

  it('should reject unsupported algorithms', async () => {
    const encode = (value: object) =>
      base64UrlEncode(Buffer.from(JSON.stringify(value)))
    const token = [
      encode({ alg: 'HS256', kid: APPLE_KID }),
      encode({ iss: APPLE_ISSUER, aud: CLIENT_ID, sub: 'u', iat: NOW, exp: NOW }),
      'c2lnbmF0dXJl',
    ].join('.')

    await expect(verify(token)).rejects.toBeInstanceOf(SignatureError)
  })

  it('should not consult the key store for a malformed token', async () => {
    const keyStore = createStaticKeyStore()

    await expect(verify('not-a-jwt', { keyStore })).rejects.toBeInstanceOf(
      TokenFormatError,
    )
    expect(keyStore.lookups).toEqual([])
  })

  it('should pass key fetch failures through', async () => {
    const error = await verify(tokenAt(), {
      keyStore: createStaticKeyStore([]),
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(KeyFetchError)
    expect(error).toMatchObject({
      message: `Apple public key not found for kid: ${APPLE_KID}`,
    })
  })

  it('should wrap unexpected key store failures', async () => {
    const cause = new Error('boom')
    const keyStore: AppleKeyStore = {
      getKey: async () => {
        throw cause
      },
      cachedKids: () => [],
    }

    const error = await verify(tokenAt(), { keyStore }).catch(
      (e: unknown) => e,
    )

    expect(error).toBeInstanceOf(KeyFetchError)
    expect(error).toMatchObject({
      message: 'Apple signing key lookup failed',
      cause,
    })
  })

  describe('nonce', () => {
    const nonceToken = (nonce?: string) =>
      tokenAt({ nonce_supported: true, nonce })

    it('should skip the nonce check when the token does not support it', async () => {
      const claims = await verify(tokenAt({ nonce: 'unexpected' }))

      expect(claims.nonce).toBe('unexpected')
    })

    it('should match and consume the session nonce', async () => {
      const session = createMemorySession({ [NONCE_SESSION_KEY]: 'n-1' })
      const nonce = createNonceManager(
        'session',
        createRequestContext({ session }),
      )

      const claims = await verifyIdToken(nonceToken('n-1'), {
        issuer: APPLE_ISSUER,
        audiences: [CLIENT_ID],
        keyStore: createStaticKeyStore(),
        nonce,
        now: NOW,
      })

      expect(claims.nonce).toBe('n-1')
      expect(session.values.has(NONCE_SESSION_KEY)).toBe(false)
    })

    it('should match the nonce request parameter in param mode', async () => {
      const claims = await verify(nonceToken('n-2'), {
        nonceMode: 'param',
        params: { nonce: 'n-2' },
      })

      expect(claims.nonce).toBe('n-2')
    })

    it('should reject a mismatched nonce', async () => {
      const error = await verify(nonceToken('n-1'), {
        session: { [NONCE_SESSION_KEY]: 'n-other' },
      }).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ClaimError)
      expect(error).toMatchObject({
        claim: 'nonce',
        message: 'nonce invalid: nonce mismatch',
      })
    })

    it('should reject when no nonce was stored', async () => {
      await expect(verify(nonceToken('n-1'))).rejects.toThrow(
        'nonce invalid: nonce missing',
      )
    })

    it('should reject a token missing its nonce', async () => {
      await expect(
        verify(nonceToken(), { session: { [NONCE_SESSION_KEY]: 'n-1' } }),
      ).rejects.toThrow('nonce invalid: nonce missing')
    })

    it('should treat a nonce-bearing token in ignore mode as misconfiguration', async () => {
      const error = await verify(nonceToken('n-1'), {
        nonceMode: 'ignore',
      }).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ConfigurationError)
      expect(error).toMatchObject({ kind: 'configuration_invalid' })
    })
  })
})
