/**
 * Parse an environment value as a number. Empty, non-numeric and non-finite
 * input falls back.
 */
export const parseNumber = (
  value: string | undefined,
  fallback: number,
): number => {
  const trimmed = value?.trim()
  if (!trimmed) {
    return fallback
  }

  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : fallback
}
