import type { Readable } from 'stream'

import type { CONTAINER_LIMITS_KEYS } from './constants'

export type PathPlatform = 'posix' | 'win32'

export interface ResolvedDockerfile {
  /** Forward-slash path the daemon reads the Dockerfile from, `null` for daemon default discovery */
  contextRelativePath: string | null
  /** Absolute path of a Dockerfile outside the context that must be copied in under `contextRelativePath` */
  relocationSourcePath: string | null
}

export interface ResolveDockerfileOptions {
  platform?: PathPlatform
  cwd?: string
}

/** Credential record for one registry, as the daemon reads it */
export interface RegistryAuth {
  username?: string | null
  password?: string | null
  email?: string | null
  serveraddress?: string | null
  identitytoken?: string | null
}

/** Registry key to credentials; key order is preserved on the wire */
export type AuthConfigSet = Record<string, RegistryAuth>

export type HeaderMap = Record<string, string>

export type ContainerLimitKey = (typeof CONTAINER_LIMITS_KEYS)[number]

export type ContainerLimits = Partial<Record<ContainerLimitKey, number | string>>

export type ContextEncoding = 'gzip' | 'bzip2' | 'xz' | 'identity'

export interface BuildOptions {
  /** Local context directory or remote context URL */
  path?: string
  /** Pre-built context archive; takes precedence over `path` */
  fileobj?: Buffer | Readable
  encoding?: ContextEncoding
  dockerfile?: string
  tag?: string
  quiet?: boolean
  noCache?: boolean
  rm?: boolean
  forceRm?: boolean
  pull?: boolean
  buildArgs?: Record<string, string>
  labels?: Record<string, string>
  target?: string
  platform?: string
  networkMode?: string
  shmSize?: number
  cacheFrom?: string[]
  containerLimits?: ContainerLimits
  authConfigs?: AuthConfigSet
}

/** Query parameters of a build request */
export interface BuildParams {
  t: string | null
  q: boolean
  dockerfile: string | null
  rm: boolean
  nocache: boolean
  pull: boolean
  forcerm: boolean
  remote: string | null
  buildargs?: string
  labels?: string
  target?: string
  platform?: string
  networkmode?: string
  shmsize?: number
  cachefrom?: string
  memory?: number | string
  memswap?: number | string
  cpushares?: number | string
  cpusetcpus?: number | string
}

export interface PackContextRequest {
  contextRoot: string
  resolved: ResolvedDockerfile
}

/** Turns a context directory into the archive stream sent as the request body */
export interface ContextPackager {
  pack(request: PackContextRequest): Promise<Readable>
}
