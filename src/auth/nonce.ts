import crypto from 'node:crypto'
import { isNonceMode } from '../providers/apple-config.ts'
import { ConfigurationError } from '../providers/apple-errors.ts'
import type { NonceMode } from '../providers/types/adapter-config.ts'
import type { RequestContext } from './types/request-context.ts'

export const NONCE_SESSION_KEY = 'apple.nonce'

/** 16 random bytes, base64url (22 characters, no padding) */
export const generateNonce = (): string =>
  crypto.randomBytes(16).toString('base64url')

export type NonceExpectation =
  | { required: false }
  | { required: true; nonce: string | undefined }

export interface NonceManager {
  readonly mode: NonceMode
  /** Fresh nonce for the authorize request; stored in session mode */
  issue: () => string
  /**
   * The nonce the identity token must carry. Session mode consumes it, so a
   * second call answers `nonce: undefined`.
   */
  retrieveForVerification: () => NonceExpectation
}

export const createNonceManager = (
  configuredMode: string,
  request: RequestContext,
): NonceManager => {
  if (!isNonceMode(configuredMode)) {
    throw new ConfigurationError(
      `Invalid nonce option: ${configuredMode}. Must be session, param, or ignore`,
    )
  }
  const mode: NonceMode = configuredMode

  const issue = (): string => {
    const nonce = generateNonce()
    if (mode === 'session') {
      request.session.set(NONCE_SESSION_KEY, nonce)
    }
    return nonce
  }

  const retrieveForVerification = (): NonceExpectation => {
    switch (mode) {
      case 'session':
        return {
          required: true,
          nonce: request.session.delete(NONCE_SESSION_KEY),
        }
      case 'param':
        return { required: true, nonce: request.params.get('nonce') }
      case 'ignore':
        return { required: false }
    }
  }

  return { mode, issue, retrieveForVerification }
}
