import type { Command } from 'commander'

import { normalizeContextRoot, resolveDockerfile } from '../docker/dockerfile-path'
import type { ResolvedDockerfile } from '../types'

export function formatResolution(contextRoot: string, resolved: ResolvedDockerfile): string {
  return JSON.stringify({ contextRoot, ...resolved }, null, 2)
}

export function registerResolveCommand(program: Command): void {
  program
    .command('resolve-dockerfile')
    .description('Show where the daemon will read the Dockerfile from')
    .argument('<context>', 'Build context directory')
    .argument('[dockerfile]', 'Dockerfile path, relative to the context or absolute')
    .action((context: string, dockerfile: string | undefined) => {
      const contextRoot = normalizeContextRoot(context)
      console.log(formatResolution(contextRoot, resolveDockerfile(dockerfile, contextRoot)))
    })
}
