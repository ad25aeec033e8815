/**
 * Claims of an Apple identity token. Only ever constructed by
 * verifyIdToken() after signature and claim checks pass.
 */
export interface AppleIdTokenClaims {
  /** Signing key id, from the token header */
  kid: string
  /** Apple's stable user identifier */
  sub: string
  iss: string
  /** The client id (service id or bundle id) the token was issued to */
  aud: string
  iat: number
  exp: number
  nonce?: string
  nonceSupported: boolean
  email?: string
  emailVerified: boolean
  /** True for Hide My Email relay addresses */
  isPrivateEmail: boolean
  /** Full verified payload as Apple sent it */
  raw: Readonly<Record<string, unknown>>
}
