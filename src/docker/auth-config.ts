import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'

import { BASE64_PATTERN, DOCKER_CONFIG_DIR, DOCKER_CONFIG_FILE, LEGACY_DOCKER_CONFIG_FILE } from '../constants'
import { EncodingError } from '../errors'
import { logger } from '../logger'
import type { AuthConfigSet, RegistryAuth } from '../types'
import { getErrorMessage, parseString } from '../utils'

export interface LoadAuthConfigOptions {
  configDir?: string
  homeDir?: string
}

/** Registry entry as stored in the client config file */
interface StoredRegistryEntry {
  auth?: unknown
  username?: unknown
  password?: unknown
  email?: unknown
  identitytoken?: unknown
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Decode a stored `auth` value: base64 of `username:password`.
 * The password may itself contain `:`.
 */
export function decodeAuth(auth: string): { username: string; password: string } {
  if (!BASE64_PATTERN.test(auth)) {
    throw new EncodingError('Stored registry auth is not base64')
  }
  const decoded = Buffer.from(auth, 'base64').toString('utf-8')
  const separator = decoded.indexOf(':')
  if (separator < 0) {
    throw new EncodingError('Stored registry auth is not in username:password form')
  }
  return {
    username: decoded.substring(0, separator),
    password: decoded.substring(separator + 1),
  }
}

function parseRegistryEntry(registry: string, entry: StoredRegistryEntry): RegistryAuth {
  const identitytoken = parseString(entry.identitytoken)
  if (identitytoken) {
    return { identitytoken, serveraddress: registry }
  }

  const email = parseString(entry.email)
  const auth = parseString(entry.auth)
  if (auth) {
    const { username, password } = decodeAuth(auth)
    return { username, password, email, serveraddress: registry }
  }

  const username = parseString(entry.username)
  const password = parseString(entry.password)
  if (username && password) {
    return { username, password, email, serveraddress: registry }
  }

  logger.debug(`No usable credentials stored for registry ${registry}`)
  return {}
}

/**
 * Turn a parsed client config file into an auth config set. `config.json`
 * keeps registries under `auths`; the legacy `.dockercfg` is flat.
 */
export function parseAuthConfigFile(raw: unknown, legacy = false): AuthConfigSet {
  if (!isRecord(raw)) {
    throw new EncodingError('Client config must be a JSON object')
  }

  if (raw.credsStore !== undefined || raw.credHelpers !== undefined) {
    logger.warn('Credential helpers are configured but not supported; only stored credentials are sent')
  }

  const auths = legacy ? raw : raw.auths ?? {}
  if (!isRecord(auths)) {
    throw new EncodingError('"auths" in client config must be an object')
  }

  const result: AuthConfigSet = {}
  for (const [registry, entry] of Object.entries(auths)) {
    if (!isRecord(entry)) {
      if (legacy) continue // legacy layout mixes in non-registry keys
      throw new EncodingError(`Registry entry for ${registry} must be an object`)
    }
    result[registry] = parseRegistryEntry(registry, entry)
  }
  return result
}

export function getAuthConfigPaths(options: LoadAuthConfigOptions = {}): string[] {
  const configDir = options.configDir ?? DOCKER_CONFIG_DIR
  const homeDir = options.homeDir ?? os.homedir()
  return [
    path.join(configDir, DOCKER_CONFIG_FILE),
    path.join(homeDir, LEGACY_DOCKER_CONFIG_FILE),
  ]
}

/**
 * Load registry credentials from the first client config file that exists.
 * Returns null when there is none or it cannot be read.
 */
export function loadAuthConfig(options: LoadAuthConfigOptions = {}): AuthConfigSet | null {
  const configPath = getAuthConfigPaths(options).find((candidate) => fs.existsSync(candidate))
  if (!configPath) {
    logger.debug('No registry client config found')
    return null
  }

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'))
  } catch (error) {
    logger.warn(`Failed to read registry client config ${configPath}: ${getErrorMessage(error)}`)
    return null
  }

  const authConfigs = parseAuthConfigFile(raw, path.basename(configPath) === LEGACY_DOCKER_CONFIG_FILE)
  logger.debug(`Loaded credentials for ${Object.keys(authConfigs).length} registries from ${configPath}`)
  return authConfigs
}
