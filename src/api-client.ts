import axios, { type AxiosInstance } from 'axios'
import type { Readable } from 'stream'

import {
  API_BASE_DELAY_MS,
  API_ENDPOINTS,
  API_MAX_RETRIES,
  API_REQUEST_TIMEOUT,
  BUILD_CONTENT_TYPE,
  CLIENT_VERSION,
  DEFAULT_API_VERSION,
  DOCKER_HOST,
} from './constants'
import { TarContextPackager } from './docker/context-packager'
import { buildQueryParams, isRemoteContext } from './docker/build-params'
import { normalizeContextRoot, resolveDockerfile } from './docker/dockerfile-path'
import { attachRegistryConfig } from './docker/registry-config'
import { BuildParamError } from './errors'
import { logger } from './logger'
import { RetryStrategy } from './retry-strategy'
import type {
  AuthConfigSet,
  BuildOptions,
  BuildParams,
  ContextPackager,
  HeaderMap,
  ResolvedDockerfile,
} from './types'

export interface DaemonEndpoint {
  baseURL: string
  socketPath?: string
}

export interface BuildApiClientOptions {
  host?: string
  apiVersion?: string
  authConfigs?: AuthConfigSet | null
  packager?: ContextPackager
  timeout?: number
}

export interface PreparedBuild {
  params: BuildParams
  headers: HeaderMap
  body: Buffer | Readable | undefined
}

export function parseDaemonHost(host: string): DaemonEndpoint {
  if (host.startsWith('unix://')) {
    return { baseURL: 'http://localhost', socketPath: host.substring('unix://'.length) }
  }
  if (host.startsWith('tcp://')) {
    return { baseURL: `http://${host.substring('tcp://'.length).replace(/\/+$/, '')}` }
  }
  if (host.startsWith('http://') || host.startsWith('https://')) {
    return { baseURL: host.replace(/\/+$/, '') }
  }
  throw new Error(`Unsupported daemon host: ${host}`)
}

export class BuildApiClient {
  private readonly client: AxiosInstance
  private readonly retry = new RetryStrategy({ maxRetries: API_MAX_RETRIES, baseDelayMs: API_BASE_DELAY_MS })
  private readonly authConfigs: AuthConfigSet | null
  private readonly packager: ContextPackager

  constructor(options: BuildApiClientOptions = {}) {
    const endpoint = parseDaemonHost(options.host ?? DOCKER_HOST)
    if (endpoint.baseURL.startsWith('http://') && !endpoint.socketPath) {
      const { hostname } = new URL(endpoint.baseURL)
      if (hostname !== '127.0.0.1' && hostname !== 'localhost' && options.authConfigs) {
        logger.warn('Daemon URL uses HTTP (not HTTPS). Registry credentials may be transmitted in plain text.')
      }
    }

    this.client = axios.create({
      baseURL: `${endpoint.baseURL}/v${options.apiVersion ?? DEFAULT_API_VERSION}`,
      socketPath: endpoint.socketPath,
      headers: {
        'User-Agent': `container-build-client/${CLIENT_VERSION}`,
      },
      timeout: options.timeout ?? API_REQUEST_TIMEOUT,
    })
    this.authConfigs = options.authConfigs ?? null
    this.packager = options.packager ?? new TarContextPackager()
  }

  async ping(): Promise<boolean> {
    logger.debug('Pinging daemon')
    return this.retry.withRetry(async () => {
      const { data } = await this.client.get<string>(API_ENDPOINTS.PING, { responseType: 'text' })
      return data === 'OK'
    })
  }

  /**
   * Everything that can fail on caller input (options, Dockerfile location,
   * credentials) is checked before the context is packaged, so a bad request
   * never starts `tar` or touches the network.
   */
  async prepareBuild(options: BuildOptions): Promise<PreparedBuild> {
    if (!options.path && !options.fileobj) {
      throw new BuildParamError('Either path or fileobj must be provided')
    }

    const remote = !options.fileobj && options.path && isRemoteContext(options.path) ? options.path : null
    const contextRoot = !options.fileobj && !remote && options.path ? normalizeContextRoot(options.path) : null

    let resolved: ResolvedDockerfile = {
      contextRelativePath: options.dockerfile ?? null,
      relocationSourcePath: null,
    }
    if (contextRoot) {
      resolved = resolveDockerfile(options.dockerfile, contextRoot)
    }

    const params = buildQueryParams(options, resolved.contextRelativePath, remote)
    const headers = attachRegistryConfig({}, options.authConfigs ?? this.authConfigs)

    if (remote) {
      logger.debug(`Building from remote context ${remote}`)
      return { params, headers, body: undefined }
    }

    headers['Content-Type'] = BUILD_CONTENT_TYPE
    if (options.fileobj) {
      if (options.encoding && options.encoding !== 'identity') {
        headers['Content-Encoding'] = options.encoding
      }
      return { params, headers, body: options.fileobj }
    }

    if (!contextRoot) {
      throw new BuildParamError('Build context path is empty')
    }
    const body = await this.packager.pack({ contextRoot, resolved })
    return { params, headers, body }
  }

  /** Submit a build and return the daemon's raw progress stream. Never retried. */
  async build(options: BuildOptions): Promise<Readable> {
    const { params, headers, body } = await this.prepareBuild(options)
    logger.debug(`Submitting build (tag: ${params.t ?? 'none'}, dockerfile: ${params.dockerfile ?? 'default'})`)
    const { data } = await this.client.post<Readable>(API_ENDPOINTS.BUILD, body, {
      params,
      headers,
      responseType: 'stream',
      timeout: 0,
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    })
    return data
  }
}
