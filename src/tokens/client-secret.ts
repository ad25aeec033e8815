import type { AdapterConfig } from '../providers/types/adapter-config.ts'
import { signJwt } from './jwt.ts'

/** Apple accepts client secrets valid for up to six months; we mint per exchange. */
export const CLIENT_SECRET_TTL_SECONDS = 60

type ClientSecretConfig = Pick<
  AdapterConfig,
  'clientId' | 'teamId' | 'keyId' | 'privateKey' | 'issuer'
>

/**
 * Sign the ES256 assertion Apple's token endpoint takes as client_secret.
 * Never cached: every code exchange gets a fresh one.
 */
export const issueClientSecret = (
  config: ClientSecretConfig,
  options: { clientId?: string; now?: number } = {},
): string => {
  const now = options.now ?? Math.floor(Date.now() / 1000)
  return signJwt(
    {
      iss: config.teamId,
      aud: config.issuer,
      sub: options.clientId ?? config.clientId,
      iat: now,
      exp: now + CLIENT_SECRET_TTL_SECONDS,
    },
    config.privateKey,
    'ES256',
    config.keyId,
  )
}
