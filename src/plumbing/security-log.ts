/**
 * Security and audit logging for Sign in with Apple.
 * Never logs identity tokens, client secrets, nonces or key material.
 */

import { log } from './logger.ts'

export interface AuthSuccessEvent {
  event: 'auth_success'
  provider: 'apple'
  user_id: string
  /** Audience the identity token was issued for */
  client_id: string
  first_authorization: boolean
}

export interface AuthFailureEvent {
  event: 'auth_failure'
  provider: 'apple'
  reason: string
  claim?: string
}

export interface CallbackRedirectedEvent {
  event: 'callback_redirected'
  provider: 'apple'
  /** Whether code and state were forwarded to the GET leg */
  forwarded: boolean
}

export type SecurityEvent =
  | AuthSuccessEvent
  | AuthFailureEvent
  | CallbackRedirectedEvent

export const logSecurityEvent = (event: SecurityEvent): void => {
  log({
    message: 'Security event',
    security_event: event,
  })
}
