/**
 * Public JSON Web Key (RFC 7517) as published in a provider's key set.
 */
export interface JWK {
  /** Key type - identifies the cryptographic algorithm family */
  kty: 'RSA' | 'EC'
  /** Key ID - matched against the `kid` header of a token */
  kid: string
  use?: 'sig' | 'enc'
  /** Algorithm the provider intends this key for */
  alg?: string
}

/** RSA public key parameters (RFC 7518 Section 6.3) */
export interface RSAJWK extends JWK {
  kty: 'RSA'
  /** Modulus, Base64URL-encoded */
  n: string
  /** Public exponent, Base64URL-encoded */
  e: string
}

/** ECDSA public key parameters (RFC 7518 Section 6.2) */
export interface ECJWK extends JWK {
  kty: 'EC'
  crv: 'P-256' | 'P-384' | 'P-521'
  x: string
  y: string
}

export type PublicJWK = RSAJWK | ECJWK

