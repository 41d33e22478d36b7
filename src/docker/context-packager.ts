import { spawn } from 'child_process'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { PassThrough, type Readable } from 'stream'

import { ContextError } from '../errors'
import { logger } from '../logger'
import type { ContextPackager, PackContextRequest } from '../types'
import { getErrorMessage } from '../utils'

/**
 * Copy a Dockerfile that lives outside the context into a fresh staging
 * directory under its placeholder name. The context itself is never written.
 */
export async function stageRelocatedDockerfile(sourcePath: string, placeholder: string): Promise<string> {
  const stagingDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'container-build-'))
  try {
    await fs.promises.copyFile(sourcePath, path.join(stagingDir, placeholder))
  } catch (error) {
    fs.rmSync(stagingDir, { recursive: true, force: true })
    throw new ContextError(`Cannot relocate Dockerfile ${sourcePath}: ${getErrorMessage(error)}`, { cause: error })
  }
  return stagingDir
}

export function buildTarArgs(contextRoot: string, stagingDir: string | null, placeholder: string | null): string[] {
  const args = ['-c', '-f', '-', '-C', contextRoot, '.']
  if (stagingDir && placeholder) {
    args.push('-C', stagingDir, placeholder)
  }
  return args
}

/** Packs a context directory by streaming it through the system `tar`. */
export class TarContextPackager implements ContextPackager {
  constructor(private readonly tarCommand = 'tar') {}

  async pack({ contextRoot, resolved }: PackContextRequest): Promise<Readable> {
    const { relocationSourcePath, contextRelativePath } = resolved
    let stagingDir: string | null = null
    if (relocationSourcePath && contextRelativePath) {
      stagingDir = await stageRelocatedDockerfile(relocationSourcePath, contextRelativePath)
      logger.debug(`Dockerfile ${relocationSourcePath} is outside the context, adding it as ${contextRelativePath}`)
    }

    const args = buildTarArgs(contextRoot, stagingDir, contextRelativePath)
    logger.debug(`Packing build context ${contextRoot}`)
    const child = spawn(this.tarCommand, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    const output = new PassThrough()
    let stderr = ''
    let exited = false

    const cleanup = (): void => {
      if (stagingDir) {
        fs.rmSync(stagingDir, { recursive: true, force: true })
        stagingDir = null
      }
    }

    child.stdout.pipe(output, { end: false })
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    child.on('error', (err) => {
      exited = true
      cleanup()
      output.destroy(new ContextError(`Failed to start ${this.tarCommand}: ${err.message}`, { cause: err }))
    })

    child.on('close', (code) => {
      exited = true
      cleanup()
      if (output.destroyed) return
      if (code === 0) {
        output.end()
      } else {
        output.destroy(new ContextError(`${this.tarCommand} exited with code ${code}: ${stderr.trim()}`))
      }
    })

    // Consumer abandoned the archive before tar exited
    output.on('close', () => {
      if (!exited) {
        logger.debug(`Build context stream closed early, stopping ${this.tarCommand}`)
        child.kill()
      }
      cleanup()
    })

    return output
  }
}
