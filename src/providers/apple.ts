import { nanoid } from 'nanoid'
import {
  normalizeCallback,
  resolveCallbackUrl,
} from '../auth/callback-normalizer.ts'
import { createNonceManager, type NonceManager } from '../auth/nonce.ts'
import type { RequestContext } from '../auth/types/request-context.ts'
import { describeError, log } from '../plumbing/logger.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import { issueClientSecret } from '../tokens/client-secret.ts'
import {
  AppleAuthError,
  CallbackError,
  ClaimError,
  TokenFormatError,
} from './apple-errors.ts'
import { verifyIdToken } from './apple-id-token.ts'
import { createAppleKeyStore, type AppleKeyStore } from './apple-jwks.ts'
import { assembleProfile, type AppleProfile } from './apple-profile.ts'
import {
  createOAuth2Client,
  type OAuth2Client,
  type TokenResponse,
} from './oauth2-client.ts'
import type { AdapterConfig } from './types/adapter-config.ts'
import type { AppleIdTokenClaims } from './types/apple-claims.ts'

export const STATE_SESSION_KEY = 'apple.state'

export interface AppleAuthAdapterOptions {
  config: AdapterConfig
  /** Share one store between adapters to share the key cache */
  keyStore?: AppleKeyStore
  oauth2Client?: OAuth2Client
  /** Seconds since epoch; overridable for tests */
  now?: () => number
}

export interface AuthorizationRequest {
  params: Record<string, string>
  url: URL
}

export interface AppleCredentials {
  token: string
  refresh_token?: string
  /** Seconds since epoch */
  expires_at?: number
  expires: boolean
}

export type CallbackOutcome =
  | { type: 'redirect'; location: string; dropSession: true }
  | {
      type: 'success'
      /** Apple's stable user id (the `sub` claim) */
      uid: string
      info: AppleProfile
      extra: Record<string, unknown>
      credentials: AppleCredentials
      /** Client id the token was issued to and the exchange ran as */
      clientId: string
    }
  | { type: 'failure'; error: AppleAuthError }

export interface AppleAuthAdapter {
  readonly config: AdapterConfig
  buildAuthorizationRequest: (
    request: RequestContext,
    overrides?: Readonly<Record<string, string>>,
  ) => AuthorizationRequest
  handleCallback: (request: RequestContext) => Promise<CallbackOutcome>
}

const toCredentials = (
  tokenResponse: TokenResponse,
  now: number,
): AppleCredentials => ({
  token: tokenResponse.access_token,
  refresh_token: tokenResponse.refresh_token,
  expires_at:
    tokenResponse.expires_in === undefined
      ? undefined
      : now + tokenResponse.expires_in,
  expires: tokenResponse.expires_in !== undefined,
})

export const createAppleAuthAdapter = ({
  config,
  keyStore = createAppleKeyStore({ timeoutMs: config.httpTimeoutMs }),
  oauth2Client = createOAuth2Client(config.clientOptions, {
    timeoutMs: config.httpTimeoutMs,
  }),
  now = () => Math.floor(Date.now() / 1000),
}: AppleAuthAdapterOptions): AppleAuthAdapter => {
  const audiences: readonly string[] = [
    config.clientId,
    ...config.authorizedClientIds,
  ]

  const buildAuthorizationRequest = (
    request: RequestContext,
    overrides: Readonly<Record<string, string>> = {},
  ): AuthorizationRequest => {
    const nonce = createNonceManager(config.nonceMode, request)
    const state = nanoid(32)
    request.session.set(STATE_SESSION_KEY, state)

    const params: Record<string, string> = {
      ...config.authorizeParams,
      ...overrides,
      client_id: config.clientId,
      redirect_uri: resolveCallbackUrl(request, config.redirectUri),
      state,
      nonce: nonce.issue(),
    }

    return { params, url: oauth2Client.buildAuthorizeURL(params) }
  }

  const verify = (
    idToken: string,
    nonce: NonceManager,
  ): Promise<AppleIdTokenClaims> =>
    verifyIdToken(idToken, {
      issuer: config.issuer,
      audiences,
      keyStore,
      nonce,
      now: now(),
    })

  const completeCallback = async (
    request: RequestContext,
  ): Promise<CallbackOutcome> => {
    const providerError = request.params.get('error')
    if (providerError) {
      throw new CallbackError(
        'provider_error',
        request.params.get('error_description') ?? providerError,
        { providerError },
      )
    }

    const expectedState = request.session.delete(STATE_SESSION_KEY)
    const state = request.params.get('state')
    if (!state || !expectedState || state !== expectedState) {
      throw new CallbackError('csrf_detected', 'state does not match session')
    }

    const code = request.params.get('code')
    if (!code) {
      throw new CallbackError('invalid_request', 'missing authorization code')
    }

    const nonce = createNonceManager(config.nonceMode, request)

    // A token posted alongside the code is verified before the exchange so
    // the exchange can run as the audience it was issued to.
    const requestIdToken = request.params.get('id_token')
    let claims = requestIdToken
      ? await verify(requestIdToken, nonce)
      : undefined
    const clientId = claims?.aud ?? config.clientId

    let tokenResponse: TokenResponse
    try {
      tokenResponse = await oauth2Client.exchangeCode(code, {
        clientId,
        clientSecret: issueClientSecret(config, { clientId }),
        redirectUri: resolveCallbackUrl(request, config.redirectUri),
      })
    } catch (error) {
      throw new CallbackError(
        'token_exchange_failed',
        `Apple token exchange failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      )
    }

    const idToken = requestIdToken ?? tokenResponse.id_token
    if (!idToken) {
      throw new TokenFormatError(
        'id_token missing from callback and token response',
      )
    }
    claims ??= await verify(idToken, nonce)

    const userParam = request.params.get('user')
    const { info, extra } = assembleProfile(claims, userParam, idToken)

    logSecurityEvent({
      event: 'auth_success',
      provider: 'apple',
      user_id: claims.sub,
      client_id: claims.aud,
      first_authorization: userParam !== undefined,
    })

    return {
      type: 'success',
      uid: claims.sub,
      info,
      extra,
      credentials: toCredentials(tokenResponse, now()),
      clientId,
    }
  }

  const handleCallback = async (
    request: RequestContext,
  ): Promise<CallbackOutcome> => {
    const normalized = normalizeCallback(request, {
      redirectUri: config.redirectUri,
    })
    if (normalized.action === 'redirect') {
      logSecurityEvent({
        event: 'callback_redirected',
        provider: 'apple',
        forwarded: normalized.forwarded,
      })
      return {
        type: 'redirect',
        location: normalized.location,
        dropSession: normalized.dropSession,
      }
    }

    try {
      return await completeCallback(request)
    } catch (error) {
      if (!(error instanceof AppleAuthError)) {
        throw error
      }
      log({ message: 'Apple auth failed', ...describeError(error) })
      logSecurityEvent({
        event: 'auth_failure',
        provider: 'apple',
        reason: error.kind,
        ...(error instanceof ClaimError && { claim: error.claim }),
      })
      return { type: 'failure', error }
    }
  }

  return { config, buildAuthorizationRequest, handleCallback }
}
