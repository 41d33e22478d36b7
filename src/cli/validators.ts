import { logger } from '../logger'
import { parseKeyValue } from '../utils'

export function collectRepeatable(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}

/** Parse repeated `KEY=VALUE` options; a later KEY wins. */
export function parseKeyValuePairsOrExit(pairs: string[] | undefined, name: string): Record<string, string> | undefined {
  if (!pairs || pairs.length === 0) return undefined
  const result: Record<string, string> = {}
  for (const pair of pairs) {
    const parsed = parseKeyValue(pair)
    if (!parsed) {
      logger.error(`Invalid --${name} value: ${pair}. Expected KEY=VALUE`)
      process.exit(1)
    }
    const [key, value] = parsed
    result[key] = value
  }
  return result
}
