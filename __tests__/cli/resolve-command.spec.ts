import { Command } from 'commander'

import { formatResolution, registerResolveCommand } from '../../src/cli/resolve-command'
import { relocatedDockerfileName } from '../../src/docker/dockerfile-path'

describe('cli/resolve-command', () => {
  let logSpy: jest.Spied<typeof console.log>

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation()
  })

  afterEach(() => {
    logSpy.mockRestore()
  })

  it('should format the resolution as JSON', () => {
    expect(JSON.parse(formatResolution('/ctx', { contextRelativePath: 'Dockerfile', relocationSourcePath: null }))).toEqual({
      contextRoot: '/ctx',
      contextRelativePath: 'Dockerfile',
      relocationSourcePath: null,
    })
  })

  it('should print the resolution of a Dockerfile outside the context', async () => {
    const program = new Command()
    registerResolveCommand(program)
    await program.parseAsync(['node', 'container-build', 'resolve-dockerfile', '/srv/app/sub', '../Dockerfile'])

    expect(JSON.parse(logSpy.mock.calls[0][0])).toEqual({
      contextRoot: '/srv/app/sub',
      contextRelativePath: relocatedDockerfileName('/srv/app/Dockerfile'),
      relocationSourcePath: '/srv/app/Dockerfile',
    })
  })

  it('should print nulls when no Dockerfile is given', async () => {
    const program = new Command()
    registerResolveCommand(program)
    await program.parseAsync(['node', 'container-build', 'resolve-dockerfile', '/srv/app'])

    expect(JSON.parse(logSpy.mock.calls[0][0])).toEqual({
      contextRoot: '/srv/app',
      contextRelativePath: null,
      relocationSourcePath: null,
    })
  })
})
