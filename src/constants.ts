import { readFileSync } from 'fs'
import * as os from 'os'
import { join } from 'path'

function getPackageVersion(): string {
  try {
    const pkg = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'))
    return pkg.version ?? '0.0.0'
  } catch {
    return '0.0.0'
  }
}

export const CLIENT_VERSION = getPackageVersion()

export const DEFAULT_DOCKER_HOST = 'unix:///var/run/docker.sock'
export const DOCKER_HOST = process.env.DOCKER_HOST || DEFAULT_DOCKER_HOST
export const DEFAULT_API_VERSION = '1.41'

// Client config (registry credentials)
export const DOCKER_CONFIG_DIR = (() => {
  const envDir = process.env.DOCKER_CONFIG
  if (!envDir) return join(os.homedir(), '.docker')
  return envDir.replace(/^~(?=$|\/)/, os.homedir())
})()
export const DOCKER_CONFIG_FILE = 'config.json'
export const LEGACY_DOCKER_CONFIG_FILE = '.dockercfg'

// Build request
export const REGISTRY_CONFIG_HEADER = 'X-Registry-Config'
// Standard or URL-safe alphabet
export const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/
export const BUILD_CONTENT_TYPE = 'application/tar'
export const RELOCATED_DOCKERFILE_PREFIX = '.dockerfile.'
export const WINDOWS_LONGPATH_PREFIX = '\\\\?\\'
export const CONTAINER_LIMITS_KEYS = ['memory', 'memswap', 'cpushares', 'cpusetcpus'] as const
export const REMOTE_CONTEXT_PREFIXES = ['http://', 'https://', 'git://', 'github.com/', 'git@'] as const

// API client constants
export const API_MAX_RETRIES = 3
export const API_BASE_DELAY_MS = 500
export const API_REQUEST_TIMEOUT = 10_000

// API endpoint paths (relative to the versioned prefix)
export const API_ENDPOINTS = {
  PING: '/_ping',
  BUILD: '/build',
} as const
