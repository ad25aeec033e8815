/**
 * Apple sends some flags as JSON booleans and some as the strings "true" /
 * "false", depending on the flow. Only `true` and `"true"` count as true.
 */
export const coerceBoolean = (value: unknown): boolean =>
  value === true || value === 'true'
