import type { Context } from 'hono'
import { Hono } from 'hono'
import { deleteCookie, getCookie, setCookie } from 'hono/cookie'
import type { AppleAuthAdapter, CallbackOutcome } from '../providers/apple.ts'
import { APPLE_CALLBACK_PATH } from '../providers/apple-config.ts'
import {
  collectParams,
  getRequestOrigin,
  isSecureRequest,
  sanitizeReturnTo,
} from './auth-utils.ts'
import {
  SESSION_COOKIE_NAME,
  SESSION_TTL_MS,
  type RequestSession,
  type SessionStore,
} from './session-store.ts'
import type { RequestContext } from './types/request-context.ts'

export const RETURN_TO_SESSION_KEY = 'apple.return_to'

export type AuthenticatedResult = Extract<CallbackOutcome, { type: 'success' }>

export type OnAuthenticated = (
  c: Context,
  result: AuthenticatedResult,
  returnTo: string,
) => Response | Promise<Response>

export interface AppleRoutesOptions {
  /** Absent when Apple is not configured; the routes then answer 503 */
  adapter: AppleAuthAdapter | null
  sessionStore: SessionStore
  onAuthenticated?: OnAuthenticated
  loginPath?: string
}

const respondWithProfile: OnAuthenticated = (c, result, returnTo) =>
  c.json({
    uid: result.uid,
    info: result.info,
    extra: result.extra,
    credentials: result.credentials,
    return_to: returnTo,
  })

const writeSessionCookie = (c: Context, session: RequestSession): void => {
  const hadCookie = session.id !== undefined
  const id = session.commit()
  if (id) {
    setCookie(c, SESSION_COOKIE_NAME, id, {
      path: '/',
      httpOnly: true,
      secure: isSecureRequest(c),
      sameSite: 'Lax',
      maxAge: SESSION_TTL_MS / 1000,
    })
  } else if (hadCookie) {
    deleteCookie(c, SESSION_COOKIE_NAME, { path: '/' })
  }
}

export const createAppleRoutes = ({
  adapter,
  sessionStore,
  onAuthenticated = respondWithProfile,
  loginPath = '/login',
}: AppleRoutesOptions): Hono => {
  const routes = new Hono()

  const buildRequestContext = async (
    c: Context,
    appleAdapter: AppleAuthAdapter,
  ): Promise<{ request: RequestContext; session: RequestSession }> => {
    const session = sessionStore.open(getCookie(c, SESSION_COOKIE_NAME))
    const request: RequestContext = {
      method: c.req.method,
      params: await collectParams(c),
      session,
      defaultCallbackUrl: `${getRequestOrigin(c)}${appleAdapter.config.callbackPath}`,
    }
    return { request, session }
  }

  /**
   * GET /auth/apple
   * Redirect to Apple's authorize endpoint with state and nonce.
   */
  routes.get('/auth/apple', async (c) => {
    if (!adapter) {
      return c.json(
        {
          error:
            'Apple sign-in is not configured. Set APPLE_CLIENT_ID, APPLE_TEAM_ID, APPLE_KEY_ID and APPLE_PRIVATE_KEY.',
        },
        503,
      )
    }

    const { request, session } = await buildRequestContext(c, adapter)
    session.set(
      RETURN_TO_SESSION_KEY,
      sanitizeReturnTo(c.req.query('return_to')),
    )
    const { url } = adapter.buildAuthorizationRequest(request)
    writeSessionCookie(c, session)
    return c.redirect(url.toString(), 302)
  })

  /**
   * POST|GET /auth/apple/callback
   * Apple form-posts here; the POST is bounced to a GET carrying code,
   * state and user, which then completes the exchange.
   */
  const handleCallback = async (c: Context) => {
    if (!adapter) {
      return c.redirect(`${loginPath}?error=apple_not_configured`, 302)
    }

    const { request, session } = await buildRequestContext(c, adapter)
    const outcome = await adapter.handleCallback(request)

    switch (outcome.type) {
      case 'redirect':
        if (!outcome.dropSession) {
          writeSessionCookie(c, session)
        }
        return c.redirect(outcome.location, 302)
      case 'failure': {
        const returnTo = session.delete(RETURN_TO_SESSION_KEY) ?? '/'
        writeSessionCookie(c, session)
        return c.redirect(
          `${loginPath}?return_to=${encodeURIComponent(returnTo)}&error=${encodeURIComponent(`apple_${outcome.error.kind}`)}`,
          302,
        )
      }
      case 'success': {
        const returnTo = session.delete(RETURN_TO_SESSION_KEY) ?? '/'
        writeSessionCookie(c, session)
        return onAuthenticated(c, outcome, returnTo)
      }
    }
  }

  const callbackPath = adapter?.config.callbackPath ?? APPLE_CALLBACK_PATH
  routes.post(callbackPath, handleCallback)
  routes.get(callbackPath, handleCallback)

  return routes
}
