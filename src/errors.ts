export type BuildClientErrorCode =
  | 'INVALID_DOCKERFILE_SPEC'
  | 'ENCODING_ERROR'
  | 'INVALID_BUILD_PARAM'
  | 'CONTEXT_ERROR'

/**
 * Base class for failures raised before a build request leaves the client.
 * None of these are transient, so nothing retries on them.
 */
export class BuildClientError extends Error {
  constructor(
    readonly code: BuildClientErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

export class InvalidDockerfileSpecError extends BuildClientError {
  constructor(message: string) {
    super('INVALID_DOCKERFILE_SPEC', message)
  }
}

export class EncodingError extends BuildClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ENCODING_ERROR', message, options)
  }
}

export class BuildParamError extends BuildClientError {
  constructor(message: string) {
    super('INVALID_BUILD_PARAM', message)
  }
}

export class ContextError extends BuildClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONTEXT_ERROR', message, options)
  }
}
