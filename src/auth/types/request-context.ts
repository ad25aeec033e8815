/**
 * Per-request key/value session. Scoped to one request/session pair.
 */
export interface Session {
  get: (key: string) => string | undefined
  set: (key: string, value: string) => void
  /** Removes the key and returns the value it held */
  delete: (key: string) => string | undefined
}

/**
 * What the adapter needs from the HTTP layer: merged query and form
 * parameters, the method, the session, and where its own callback lives.
 */
export interface RequestContext {
  method: string
  params: ReadonlyMap<string, string>
  session: Session
  /** Origin of the incoming request joined with the configured callback path */
  defaultCallbackUrl: string
}
