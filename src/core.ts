export { BuildApiClient, parseDaemonHost } from './api-client'
export type { BuildApiClientOptions, DaemonEndpoint, PreparedBuild } from './api-client'
export { decodeAuth, loadAuthConfig, parseAuthConfigFile } from './docker/auth-config'
export { buildQueryParams, isRemoteContext, isValidTag } from './docker/build-params'
export { TarContextPackager } from './docker/context-packager'
export { normalizeContextRoot, relocatedDockerfileName, resolveDockerfile } from './docker/dockerfile-path'
export {
  attachRegistryConfig,
  authConfigSetFromEntries,
  decodeRegistryConfig,
  encodeRegistryConfig,
} from './docker/registry-config'
export {
  BuildClientError,
  BuildParamError,
  ContextError,
  EncodingError,
  InvalidDockerfileSpecError,
} from './errors'
export type * from './types'
