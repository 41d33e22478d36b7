import type { Command } from 'commander'
import type { Readable } from 'stream'

import { BuildApiClient } from '../api-client'
import { loadAuthConfig } from '../docker/auth-config'
import { logger } from '../logger'
import type { BuildOptions } from '../types'
import { collectRepeatable, parseKeyValuePairsOrExit } from './validators'

export interface BuildCommandOptions {
  file?: string
  tag?: string
  buildArg?: string[]
  label?: string[]
  target?: string
  platform?: string
  pull?: boolean
  cache?: boolean
  rm?: boolean
  forceRm?: boolean
  quiet?: boolean
  verbose?: boolean
  host?: string
}

export function toBuildOptions(contextPath: string, opts: BuildCommandOptions): BuildOptions {
  return {
    path: contextPath,
    dockerfile: opts.file,
    tag: opts.tag,
    buildArgs: parseKeyValuePairsOrExit(opts.buildArg, 'build-arg'),
    labels: parseKeyValuePairsOrExit(opts.label, 'label'),
    target: opts.target,
    platform: opts.platform,
    pull: opts.pull === true,
    noCache: opts.cache === false,
    rm: opts.rm !== false,
    forceRm: opts.forceRm === true,
    quiet: opts.quiet === true,
  }
}

function pipeToStdout(stream: Readable): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.on('error', reject)
    stream.on('end', resolve)
    stream.pipe(process.stdout, { end: false })
  })
}

export async function runBuild(contextPath: string, opts: BuildCommandOptions): Promise<void> {
  logger.setVerbose(opts.verbose === true)
  const buildOptions = toBuildOptions(contextPath, opts)
  const client = new BuildApiClient({ host: opts.host, authConfigs: loadAuthConfig() })
  const output = await client.build(buildOptions)
  await pipeToStdout(output)
  logger.success(opts.tag ? `Built ${opts.tag}` : 'Build finished')
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build an image from a context directory or remote URL')
    .argument('<path>', 'Context directory, or a remote context URL')
    .option('-f, --file <dockerfile>', 'Dockerfile path, relative to the context or absolute')
    .option('-t, --tag <tag>', 'Name and optional tag for the image')
    .option('--build-arg <KEY=VALUE>', 'Build-time variable (repeatable)', collectRepeatable)
    .option('--label <KEY=VALUE>', 'Image label (repeatable)', collectRepeatable)
    .option('--target <stage>', 'Build stage to stop at')
    .option('--platform <platform>', 'Target platform')
    .option('--pull', 'Always pull newer base images')
    .option('--no-cache', 'Do not use the build cache')
    .option('--no-rm', 'Keep intermediate containers')
    .option('--force-rm', 'Always remove intermediate containers')
    .option('-q, --quiet', 'Suppress build output')
    .option('--host <host>', 'Daemon host (defaults to DOCKER_HOST)')
    .option('--verbose', 'Enable debug logging')
    .action(async (contextPath: string, opts: BuildCommandOptions) => {
      await runBuild(contextPath, opts)
    })
}
