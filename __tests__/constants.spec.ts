import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'

describe('constants', () => {
  const originalEnv = { ...process.env }

  afterEach(() => {
    process.env = { ...originalEnv }
    jest.restoreAllMocks()
    jest.resetModules()
  })

  it('should export CLIENT_VERSION from package.json', () => {
    const constants = require('../src/constants')
    const pkg = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'))
    expect(constants.CLIENT_VERSION).toBe(pkg.version)
  })

  it('should return 0.0.0 when package.json cannot be read', () => {
    jest.doMock('fs', () => {
      return {
        ...jest.requireActual<typeof import('fs')>('fs'),
        readFileSync: () => {
          throw new Error('File not found')
        },
      }
    })

    const constants = require('../src/constants')
    expect(constants.CLIENT_VERSION).toBe('0.0.0')
  })

  it('should default the daemon host to the local socket', () => {
    delete process.env.DOCKER_HOST
    const constants = require('../src/constants')
    expect(constants.DOCKER_HOST).toBe('unix:///var/run/docker.sock')
  })

  it('should read the daemon host from DOCKER_HOST', () => {
    process.env.DOCKER_HOST = 'tcp://10.0.0.5:2375'
    const constants = require('../src/constants')
    expect(constants.DOCKER_HOST).toBe('tcp://10.0.0.5:2375')
  })

  it('should default the client config dir to ~/.docker', () => {
    delete process.env.DOCKER_CONFIG
    const constants = require('../src/constants')
    expect(constants.DOCKER_CONFIG_DIR).toBe(path.join(os.homedir(), '.docker'))
  })

  it('should expand ~ in DOCKER_CONFIG', () => {
    process.env.DOCKER_CONFIG = '~/custom-docker'
    const constants = require('../src/constants')
    expect(constants.DOCKER_CONFIG_DIR).toBe(`${os.homedir()}/custom-docker`)
  })

  it('should hold the long-path prefix as four characters', () => {
    const { WINDOWS_LONGPATH_PREFIX } = require('../src/constants')
    expect(WINDOWS_LONGPATH_PREFIX).toBe('\\\\?\\')
    expect(WINDOWS_LONGPATH_PREFIX).toHaveLength(4)
  })
})
