import type { RequestContext } from './types/request-context.ts'

export type NormalizedCallback =
  | {
      action: 'redirect'
      location: string
      /** Do not issue a session cookie on this response */
      dropSession: true
      /** Whether code and state were carried over to the GET leg */
      forwarded: boolean
    }
  | { action: 'continue' }

/**
 * Explicit redirect_uri parameter, else the configured override, else the
 * adapter's own callback route.
 */
export const resolveCallbackUrl = (
  request: RequestContext,
  redirectUri?: string,
): string =>
  request.params.get('redirect_uri') ??
  redirectUri ??
  request.defaultCallbackUrl

/**
 * Apple posts the authorization response (response_mode=form_post). Turn
 * that POST into a redirect to the same callback with code, state and the
 * one-time user payload in the query, so the GET leg runs the ordinary
 * code exchange. The POST leg is a stateless hop: Apple's cross-site POST
 * carries no session cookie and must not be given a new one.
 */
export const normalizeCallback = (
  request: RequestContext,
  options: { redirectUri?: string } = {},
): NormalizedCallback => {
  if (request.method.toUpperCase() !== 'POST') {
    return { action: 'continue' }
  }

  let location = resolveCallbackUrl(request, options.redirectUri)

  const code = request.params.get('code')
  const state = request.params.get('state')
  const forwarded = Boolean(code && state)
  if (code && state) {
    const query = new URLSearchParams({ code, state })
    const user = request.params.get('user')
    if (user) {
      query.set('user', user)
    }
    location += `${location.includes('?') ? '&' : '?'}${query.toString()}`
  }

  return { action: 'redirect', location, dropSession: true, forwarded }
}
