export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function parseString(value: unknown): string | null {
  if (typeof value === 'string' && value.length > 0) return value
  return null
}

export function truncateString(text: string, limit: number, suffix = '...'): string {
  if (text.length <= limit) return text
  return text.substring(0, limit) + suffix
}

/** Split `KEY=VALUE`; the value may itself contain `=`. */
export function parseKeyValue(pair: string): [string, string] | null {
  const index = pair.indexOf('=')
  if (index <= 0) return null
  return [pair.substring(0, index), pair.substring(index + 1)]
}
