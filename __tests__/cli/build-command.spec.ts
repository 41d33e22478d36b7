import { Command } from 'commander'
import { Readable } from 'stream'

jest.mock('../../src/api-client', () => ({
  BuildApiClient: jest.fn(),
}))
jest.mock('../../src/docker/auth-config', () => ({
  loadAuthConfig: jest.fn(),
}))
jest.mock('../../src/logger')

import { BuildApiClient } from '../../src/api-client'
import { registerBuildCommand, toBuildOptions } from '../../src/cli/build-command'
import { loadAuthConfig } from '../../src/docker/auth-config'
import { logger } from '../../src/logger'
import type { AuthConfigSet } from '../../src/types'

const MockBuildApiClient = BuildApiClient as jest.MockedClass<typeof BuildApiClient>
const mockLoadAuthConfig = loadAuthConfig as jest.MockedFunction<typeof loadAuthConfig>

describe('cli/build-command', () => {
  describe('toBuildOptions', () => {
    it('should apply CLI defaults', () => {
      expect(toBuildOptions('.', {})).toEqual({
        path: '.',
        pull: false,
        noCache: false,
        rm: true,
        forceRm: false,
        quiet: false,
      })
    })

    it('should map flags and KEY=VALUE options', () => {
      expect(
        toBuildOptions('/srv/app', {
          file: 'docker/Dockerfile',
          tag: 'app:1.0',
          buildArg: ['VERSION=1.2'],
          label: ['team=build'],
          target: 'runtime',
          platform: 'linux/arm64',
          pull: true,
          cache: false,
          rm: false,
          forceRm: true,
          quiet: true,
        }),
      ).toEqual({
        path: '/srv/app',
        dockerfile: 'docker/Dockerfile',
        tag: 'app:1.0',
        buildArgs: { VERSION: '1.2' },
        labels: { team: 'build' },
        target: 'runtime',
        platform: 'linux/arm64',
        pull: true,
        noCache: true,
        rm: false,
        forceRm: true,
        quiet: true,
      })
    })
  })

  describe('registerBuildCommand', () => {
    const authConfigs: AuthConfigSet = { 'registry.example.com': { identitytoken: 'test-token' } }
    const build = jest.fn()
    let writeSpy: jest.SpiedFunction<typeof process.stdout.write>

    beforeEach(() => {
      jest.clearAllMocks()
      mockLoadAuthConfig.mockReturnValue(authConfigs)
      build.mockResolvedValue(Readable.from(['{"stream":"Step 1/1 : FROM busybox"}\n']))
      MockBuildApiClient.mockImplementation(() => ({ build }) as unknown as BuildApiClient)
      writeSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true)
    })

    afterEach(() => {
      writeSpy.mockRestore()
    })

    it('should submit the build with the loaded credentials and stream the output', async () => {
      const program = new Command()
      registerBuildCommand(program)
      await program.parseAsync([
        'node', 'container-build', 'build', '/srv/app',
        '-f', 'docker/Dockerfile', '-t', 'app:1.0', '--build-arg', 'A=1', '--build-arg', 'B=2', '--no-cache',
        '--host', 'tcp://127.0.0.1:2375',
      ])

      expect(MockBuildApiClient).toHaveBeenCalledWith({ host: 'tcp://127.0.0.1:2375', authConfigs })
      expect(build).toHaveBeenCalledWith({
        path: '/srv/app',
        dockerfile: 'docker/Dockerfile',
        tag: 'app:1.0',
        buildArgs: { A: '1', B: '2' },
        pull: false,
        noCache: true,
        rm: true,
        forceRm: false,
        quiet: false,
      })
      expect(writeSpy).toHaveBeenCalled()
      expect(String(writeSpy.mock.calls[0][0])).toBe('{"stream":"Step 1/1 : FROM busybox"}\n')
      expect(logger.success).toHaveBeenCalledWith('Built app:1.0')
    })

    it('should propagate build failures', async () => {
      build.mockRejectedValue(new Error("invalid tag 'UPPER': invalid reference format"))
      const program = new Command()
      registerBuildCommand(program)
      await expect(
        program.parseAsync(['node', 'container-build', 'build', '.', '-t', 'UPPER']),
      ).rejects.toThrow("invalid tag 'UPPER': invalid reference format")
      expect(logger.success).not.toHaveBeenCalled()
    })
  })
})
