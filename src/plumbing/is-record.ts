/**
 * Narrow an unknown value (typically JSON.parse output) to a plain object.
 */
export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)
