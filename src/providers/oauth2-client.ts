import { isRecord } from '../plumbing/is-record.ts'
import type { ClientOptions } from './types/adapter-config.ts'

export interface TokenResponse {
  access_token: string
  token_type?: string
  expires_in?: number
  refresh_token?: string
  id_token?: string
}

export interface ExchangeCredentials {
  clientId: string
  clientSecret: string
  redirectUri: string
}

/**
 * The generic authorization-code half of OAuth2: build the authorize URL
 * and trade a code for tokens. Provider quirks stay out of here.
 */
export interface OAuth2Client {
  buildAuthorizeURL: (params: Readonly<Record<string, string>>) => URL
  exchangeCode: (
    code: string,
    credentials: ExchangeCredentials,
  ) => Promise<TokenResponse>
}

export interface OAuth2ClientOptions {
  fetch?: typeof fetch
  timeoutMs?: number
}

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined

const parseTokenResponse = (data: unknown): TokenResponse => {
  if (!isRecord(data)) {
    throw new Error('Token response is not a JSON object')
  }
  if (typeof data.error === 'string') {
    throw new Error(
      typeof data.error_description === 'string'
        ? `${data.error}: ${data.error_description}`
        : data.error,
    )
  }
  if (typeof data.access_token !== 'string' || !data.access_token) {
    throw new Error('No access_token in response')
  }
  return {
    access_token: data.access_token,
    token_type: optionalString(data.token_type),
    expires_in:
      typeof data.expires_in === 'number' ? data.expires_in : undefined,
    refresh_token: optionalString(data.refresh_token),
    id_token: optionalString(data.id_token),
  }
}

export const createOAuth2Client = (
  clientOptions: Readonly<ClientOptions>,
  options: OAuth2ClientOptions = {},
): OAuth2Client => {
  const fetchImpl = options.fetch ?? fetch
  const timeoutMs = options.timeoutMs ?? 10_000
  const authorizeEndpoint = new URL(clientOptions.authorizeUrl, clientOptions.site)
  const tokenEndpoint = new URL(clientOptions.tokenUrl, clientOptions.site)

  const buildAuthorizeURL = (params: Readonly<Record<string, string>>): URL => {
    const url = new URL(authorizeEndpoint)
    url.searchParams.set('response_type', 'code')
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value)
    }
    return url
  }

  const exchangeCode = async (
    code: string,
    { clientId, clientSecret, redirectUri }: ExchangeCredentials,
  ): Promise<TokenResponse> => {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri,
    })
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    }

    if (clientOptions.authScheme === 'basic_auth') {
      const credentials = Buffer.from(
        `${encodeURIComponent(clientId)}:${encodeURIComponent(clientSecret)}`,
        'utf8',
      ).toString('base64')
      headers.Authorization = `Basic ${credentials}`
    } else {
      body.set('client_id', clientId)
      body.set('client_secret', clientSecret)
    }

    const response = await fetchImpl(tokenEndpoint, {
      method: 'POST',
      headers,
      body: body.toString(),
      signal: AbortSignal.timeout(timeoutMs),
    })

    if (!response.ok) {
      const errText = await response.text()
      throw new Error(`Token exchange failed: ${response.status} ${errText}`)
    }

    return parseTokenResponse(await response.json())
  }

  return { buildAuthorizeURL, exchangeCode }
}
