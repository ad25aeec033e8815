import { log } from '../plumbing/logger.ts'
import { isRecord } from '../plumbing/is-record.ts'
import type { AppleIdTokenClaims } from './types/apple-claims.ts'

/** Normalized profile handed to the application; empty fields are omitted. */
export type AppleProfile = {
  sub?: string
  email?: string
  first_name?: string
  last_name?: string
  name?: string
  email_verified?: boolean
  is_private_email?: boolean
}

export interface AssembledProfile {
  info: AppleProfile
  /** `{ raw_info: { id_info, user_info, id_token } }`, pruned */
  extra: Record<string, unknown>
}

const isEmptyValue = (value: unknown): boolean =>
  value === null ||
  value === undefined ||
  value === '' ||
  (Array.isArray(value) && value.length === 0) ||
  (isRecord(value) && Object.keys(value).length === 0)

/**
 * Drop null, undefined and empty entries, descending into nested objects.
 * An object left empty after pruning is dropped as well.
 */
export const pruneEmpty = (
  record: Record<string, unknown>,
): Record<string, unknown> => {
  const pruned: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(record)) {
    const next = isRecord(value) ? pruneEmpty(value) : value
    if (!isEmptyValue(next)) {
      pruned[key] = next
    }
  }
  return pruned
}

/**
 * The `user` parameter Apple sends on the first authorization only:
 * `{"name":{"firstName":"...","lastName":"..."},"email":"..."}`.
 * Anything unparseable degrades to no name data.
 */
export const parseUserInfo = (
  raw: string | undefined,
): Record<string, unknown> => {
  if (raw === undefined) {
    return {}
  }
  try {
    const parsed: unknown = JSON.parse(raw)
    return isRecord(parsed) ? parsed : {}
  } catch (error) {
    log({
      message: 'Ignoring unparseable Apple user payload',
      error: error instanceof Error ? error.message : String(error),
    })
    return {}
  }
}

const namePart = (
  userInfo: Record<string, unknown>,
  part: 'firstName' | 'lastName',
): string | undefined => {
  const name = userInfo.name
  if (!isRecord(name)) {
    return undefined
  }
  const value = name[part]
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

export const assembleProfile = (
  claims: AppleIdTokenClaims,
  userParam: string | undefined,
  idToken: string,
): AssembledProfile => {
  const userInfo = parseUserInfo(userParam)
  const firstName = namePart(userInfo, 'firstName')
  const lastName = namePart(userInfo, 'lastName')
  const nameParts = [firstName, lastName].filter(
    (part): part is string => part !== undefined,
  )

  const info: AppleProfile = {}
  const set = <K extends keyof AppleProfile>(
    key: K,
    value: AppleProfile[K],
  ): void => {
    if (value !== undefined && !isEmptyValue(value)) {
      info[key] = value
    }
  }

  set('sub', claims.sub)
  set('email', claims.email)
  set('first_name', firstName)
  set('last_name', lastName)
  set('name', nameParts.length > 0 ? nameParts.join(' ') : claims.email)
  set('email_verified', claims.emailVerified)
  set('is_private_email', claims.isPrivateEmail)

  return {
    info,
    extra: pruneEmpty({
      raw_info: {
        id_info: claims.raw,
        user_info: userInfo,
        id_token: idToken,
      },
    }),
  }
}
