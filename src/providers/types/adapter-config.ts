export type NonceMode = 'session' | 'param' | 'ignore'

/** Where client credentials go on the token request. */
export type AuthScheme = 'request_body' | 'basic_auth'

export interface ClientOptions {
  site: string
  authorizeUrl: string
  tokenUrl: string
  authScheme: AuthScheme
}

/**
 * Validated, frozen adapter configuration. Built once per adapter with
 * createAdapterConfig() and never mutated afterwards.
 */
export interface AdapterConfig {
  readonly clientId: string
  readonly teamId: string
  readonly keyId: string
  /** PEM text of the EC P-256 key registered with Apple */
  readonly privateKey: string
  /** Audiences accepted in addition to clientId (e.g. native app bundle ids) */
  readonly authorizedClientIds: readonly string[]
  readonly nonceMode: NonceMode
  readonly issuer: string
  readonly redirectUri?: string
  readonly clientOptions: Readonly<ClientOptions>
  readonly authorizeParams: Readonly<Record<string, string>>
  readonly callbackPath: string
  readonly httpTimeoutMs: number
}

export interface AdapterConfigInput {
  clientId: string
  teamId: string
  keyId: string
  privateKey: string
  authorizedClientIds?: readonly string[]
  /** Unvalidated; usually straight from the environment */
  nonceMode?: string
  redirectUri?: string
  clientOptions?: Partial<ClientOptions>
  authorizeParams?: Record<string, string>
  callbackPath?: string
  httpTimeoutMs?: number
}
