/**
 * Failure taxonomy for the Apple callback. Every error carries a stable
 * `kind` that the HTTP layer forwards as the login error code, and the
 * original `cause` for logging.
 */

export type AppleAuthErrorKind =
  | 'configuration_invalid'
  | 'jwks_fetching_failed'
  | 'id_token_signature_invalid'
  | 'id_token_claims_invalid'
  | 'id_token_format_invalid'
  | 'csrf_detected'
  | 'invalid_request'
  | 'token_exchange_failed'
  | 'provider_error'

export type ValidatedClaim = 'iss' | 'aud' | 'iat' | 'exp' | 'nonce'

export class AppleAuthError extends Error {
  readonly kind: AppleAuthErrorKind

  constructor(kind: AppleAuthErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'AppleAuthError'
    this.kind = kind
  }
}

export class ConfigurationError extends AppleAuthError {
  constructor(message: string) {
    super('configuration_invalid', message)
    this.name = 'ConfigurationError'
  }
}

export class KeyFetchError extends AppleAuthError {
  constructor(message: string, cause?: unknown) {
    super('jwks_fetching_failed', message, cause)
    this.name = 'KeyFetchError'
  }
}

export class SignatureError extends AppleAuthError {
  constructor(cause?: unknown) {
    super('id_token_signature_invalid', 'id_token signature invalid', cause)
    this.name = 'SignatureError'
  }
}

export class ClaimError extends AppleAuthError {
  readonly claim: ValidatedClaim

  constructor(claim: ValidatedClaim, reason: string) {
    super('id_token_claims_invalid', `${claim} invalid: ${reason}`)
    this.name = 'ClaimError'
    this.claim = claim
  }
}

export class TokenFormatError extends AppleAuthError {
  constructor(message: string, cause?: unknown) {
    super('id_token_format_invalid', message, cause)
    this.name = 'TokenFormatError'
  }
}

type CallbackErrorKind = Extract<
  AppleAuthErrorKind,
  'csrf_detected' | 'invalid_request' | 'token_exchange_failed' | 'provider_error'
>

/** Callback failures outside identity-token verification. */
export class CallbackError extends AppleAuthError {
  /** Raw `error` value Apple sent back, when the failure came from Apple. */
  readonly providerError?: string

  constructor(
    kind: CallbackErrorKind,
    message: string,
    options: { cause?: unknown; providerError?: string } = {},
  ) {
    super(kind, message, options.cause)
    this.name = 'CallbackError'
    this.providerError = options.providerError
  }
}
