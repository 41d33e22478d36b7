#!/usr/bin/env node

import { Command } from 'commander'

import { registerAuthHeaderCommand } from './cli/auth-header-command'
import { registerBuildCommand } from './cli/build-command'
import { registerResolveCommand } from './cli/resolve-command'
import { CLIENT_VERSION } from './constants'
import { logger } from './logger'
import { captureException, flushSentry, initSentry } from './sentry'
import { getErrorMessage } from './utils'

const program = new Command()

program
  .name('container-build')
  .description('Submit image builds to a container daemon')
  .version(CLIENT_VERSION)

registerBuildCommand(program)
registerResolveCommand(program)
registerAuthHeaderCommand(program)

async function main(): Promise<void> {
  await initSentry()
  try {
    await program.parseAsync()
  } catch (error) {
    logger.error(getErrorMessage(error))
    captureException(error)
    await flushSentry()
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
