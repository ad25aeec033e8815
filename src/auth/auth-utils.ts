import type { Context } from 'hono'

const isValidReturnTo = (value: string): boolean => {
  const normalized = value.replace(/\\/g, '/')
  return normalized.startsWith('/') && !normalized.startsWith('//')
}

/** Only relative paths; protocol-relative (//evil.com) falls back to "/". */
export const sanitizeReturnTo = (value: string | undefined): string => {
  const trimmed = value?.trim() ?? '/'
  const normalized = trimmed.replace(/\\/g, '/')
  return isValidReturnTo(normalized) ? normalized : '/'
}

export const isSecureRequest = (c: Context): boolean => {
  if (new URL(c.req.url).protocol === 'https:') {
    return true
  }
  return c.req.header('x-forwarded-proto') === 'https'
}

/** Origin as the browser saw it, honouring a TLS-terminating proxy. */
export const getRequestOrigin = (c: Context): string => {
  const url = new URL(c.req.url)
  const forwardedHost = c.req.header('x-forwarded-host')
  const protocol = isSecureRequest(c) ? 'https:' : url.protocol
  return `${protocol}//${forwardedHost ?? url.host}`
}

/**
 * Query and form parameters merged into one map; form fields win, as
 * Apple's form_post callback puts everything in the body.
 */
export const collectParams = async (
  c: Context,
): Promise<Map<string, string>> => {
  const params = new Map(Object.entries(c.req.query()))
  const contentType = c.req.header('content-type') ?? ''
  if (
    c.req.method === 'POST' &&
    (contentType.startsWith('application/x-www-form-urlencoded') ||
      contentType.startsWith('multipart/form-data'))
  ) {
    const body = await c.req.parseBody()
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === 'string') {
        params.set(key, value)
      }
    }
  }
  return params
}
