import info from '../../package.json' with { type: 'json' }

const { name, version } = info

interface LogFields {
  message: string
  [key: string]: string | number | boolean | object
}

export const log = (message: string | LogFields) => {
  const fields: LogFields = typeof message === 'string' ? { message } : message
  console.log({
    ...fields,
    app: name,
    version,
  })
}

/**
 * Flatten an error (and its cause chain) into loggable fields. Error kinds
 * from the Apple adapter are kept so failures can be grouped.
 */
export const describeError = (error: unknown): Record<string, string> => {
  if (!(error instanceof Error)) {
    return { error: String(error) }
  }
  const fields: Record<string, string> = {
    error: error.message,
    error_name: error.name,
  }
  if ('kind' in error && typeof error.kind === 'string') {
    fields.error_kind = error.kind
  }
  if (error.cause !== undefined) {
    fields.cause =
      error.cause instanceof Error ? error.cause.message : String(error.cause)
  }
  return fields
}
