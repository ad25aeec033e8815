import crypto from 'node:crypto'
import { parseNumber } from '../plumbing/parse-number.ts'
import { ConfigurationError } from './apple-errors.ts'
import type {
  AdapterConfig,
  AdapterConfigInput,
  AuthScheme,
  NonceMode,
} from './types/adapter-config.ts'

export const APPLE_ISSUER = 'https://appleid.apple.com'
export const APPLE_JWKS_URL = `${APPLE_ISSUER}/auth/keys`
export const APPLE_AUTHORIZE_PATH = '/auth/authorize'
export const APPLE_TOKEN_PATH = '/auth/token'

export const APPLE_DEFAULT_SCOPE = 'email name'
export const APPLE_CALLBACK_PATH = '/auth/apple/callback'
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000

const NONCE_MODES: readonly NonceMode[] = ['session', 'param', 'ignore']
const AUTH_SCHEMES: readonly AuthScheme[] = ['request_body', 'basic_auth']

export const isNonceMode = (value: unknown): value is NonceMode =>
  NONCE_MODES.some((mode) => mode === value)

const isAuthScheme = (value: unknown): value is AuthScheme =>
  AUTH_SCHEMES.some((scheme) => scheme === value)

const parseList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

const optional = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/** Keys pasted into .env files usually carry literal "\n" sequences. */
export const normalizePem = (pem: string): string =>
  pem.replace(/\\n/g, '\n').trim()

const checkSigningKey = (pem: string): string | null => {
  let key: crypto.KeyObject
  try {
    key = crypto.createPrivateKey(pem)
  } catch (error) {
    return `Apple private key could not be parsed: ${error instanceof Error ? error.message : String(error)}`
  }
  if (
    key.asymmetricKeyType !== 'ec' ||
    key.asymmetricKeyDetails?.namedCurve !== 'prime256v1'
  ) {
    return 'Apple private key must be an EC P-256 key (ES256)'
  }
  return null
}

/**
 * Validate adapter options and freeze them. Collects every problem before
 * failing so a misconfigured deployment reports all of them at once.
 */
export const createAdapterConfig = (input: AdapterConfigInput): AdapterConfig => {
  const errors: string[] = []

  const clientId = input.clientId.trim()
  const teamId = input.teamId.trim()
  const keyId = input.keyId.trim()
  const privateKey = normalizePem(input.privateKey)

  if (!clientId) errors.push('Apple client_id must be set')
  if (!teamId) errors.push('Apple team_id must be set')
  if (!keyId) errors.push('Apple key_id must be set')

  if (!privateKey) {
    errors.push('Apple private key must be set')
  } else {
    const keyProblem = checkSigningKey(privateKey)
    if (keyProblem) errors.push(keyProblem)
  }

  const nonceMode = input.nonceMode ?? 'session'
  if (!isNonceMode(nonceMode)) {
    errors.push(
      `Invalid nonce option: ${nonceMode}. Must be session, param, or ignore`,
    )
  }

  const authScheme = input.clientOptions?.authScheme ?? 'request_body'
  if (!isAuthScheme(authScheme)) {
    errors.push(`Invalid auth scheme: ${String(authScheme)}`)
  }

  const httpTimeoutMs = input.httpTimeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS
  if (!Number.isFinite(httpTimeoutMs) || httpTimeoutMs <= 0) {
    errors.push('HTTP timeout must be a positive number of milliseconds')
  }

  const site = input.clientOptions?.site ?? APPLE_ISSUER
  if (!site.match(/^https?:\/\//)) {
    errors.push('Apple client site must be a valid URL (http:// or https://)')
  }

  if (errors.length > 0 || !isNonceMode(nonceMode)) {
    throw new ConfigurationError(
      `Apple adapter configuration validation failed:\n${errors.join('\n')}`,
    )
  }

  return Object.freeze({
    clientId,
    teamId,
    keyId,
    privateKey,
    authorizedClientIds: Object.freeze(
      (input.authorizedClientIds ?? []).filter((id) => id.length > 0),
    ),
    nonceMode,
    issuer: APPLE_ISSUER,
    redirectUri: optional(input.redirectUri),
    clientOptions: Object.freeze({
      site,
      authorizeUrl: input.clientOptions?.authorizeUrl ?? APPLE_AUTHORIZE_PATH,
      tokenUrl: input.clientOptions?.tokenUrl ?? APPLE_TOKEN_PATH,
      authScheme,
    }),
    authorizeParams: Object.freeze({
      response_mode: 'form_post',
      scope: APPLE_DEFAULT_SCOPE,
      ...input.authorizeParams,
    }),
    callbackPath: input.callbackPath ?? APPLE_CALLBACK_PATH,
    httpTimeoutMs,
  })
}

/**
 * Read Apple settings from the environment. `isConfigured` is false until
 * client id, team id, key id and private key are all present.
 */
export const getAppleConfig = (): {
  input: AdapterConfigInput
  isConfigured: boolean
} => {
  const input: AdapterConfigInput = {
    clientId: process.env.APPLE_CLIENT_ID?.trim() ?? '',
    teamId: process.env.APPLE_TEAM_ID?.trim() ?? '',
    keyId: process.env.APPLE_KEY_ID?.trim() ?? '',
    privateKey: process.env.APPLE_PRIVATE_KEY ?? '',
    authorizedClientIds: parseList(process.env.APPLE_AUTHORIZED_CLIENT_IDS),
    nonceMode: optional(process.env.APPLE_NONCE_MODE),
    redirectUri: optional(process.env.APPLE_REDIRECT_URI),
    authorizeParams: {
      scope: optional(process.env.APPLE_SCOPE) ?? APPLE_DEFAULT_SCOPE,
    },
    httpTimeoutMs: parseNumber(
      process.env.APPLE_HTTP_TIMEOUT_MS,
      DEFAULT_HTTP_TIMEOUT_MS,
    ),
  }
  const authScheme = optional(process.env.APPLE_AUTH_SCHEME)
  if (isAuthScheme(authScheme)) {
    input.clientOptions = { authScheme }
  }

  return {
    input,
    isConfigured:
      input.clientId.length > 0 &&
      input.teamId.length > 0 &&
      input.keyId.length > 0 &&
      input.privateKey.trim().length > 0,
  }
}
