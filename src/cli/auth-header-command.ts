import type { Command } from 'commander'

import { loadAuthConfig } from '../docker/auth-config'
import { encodeRegistryConfig } from '../docker/registry-config'
import { logger } from '../logger'
import type { AuthConfigSet } from '../types'
import { truncateString } from '../utils'

const PREVIEW_LENGTH = 12

export function formatAuthHeader(authConfigs: AuthConfigSet, raw: boolean): string {
  const encoded = encodeRegistryConfig(authConfigs)
  const lines: string[] = [
    '',
    `  Registries (${Object.keys(authConfigs).length}):`,
    ...Object.keys(authConfigs).map((registry) => `    - ${registry}`),
    '',
    `  X-Registry-Config: ${raw ? encoded : truncateString(encoded, PREVIEW_LENGTH, '****')}`,
    '',
  ]
  return lines.join('\n')
}

export function registerAuthHeaderCommand(program: Command): void {
  program
    .command('auth-header')
    .description('Show the registry config header built from the client config')
    .option('--raw', 'Print the full encoded value')
    .action((opts: { raw?: boolean }) => {
      const authConfigs = loadAuthConfig()
      if (!authConfigs || Object.keys(authConfigs).length === 0) {
        logger.warn('No registry credentials found')
        return
      }
      console.log(formatAuthHeader(authConfigs, opts.raw === true))
    })
}
