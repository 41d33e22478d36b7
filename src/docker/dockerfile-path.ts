import { createHash } from 'crypto'
import * as path from 'path'

import { RELOCATED_DOCKERFILE_PREFIX, WINDOWS_LONGPATH_PREFIX } from '../constants'
import type { PathPlatform, ResolveDockerfileOptions, ResolvedDockerfile } from '../types'

type PathApi = typeof path.posix

function hostPlatform(): PathPlatform {
  return process.platform === 'win32' ? 'win32' : 'posix'
}

function pathApiFor(platform: PathPlatform): PathApi {
  return platform === 'win32' ? path.win32 : path.posix
}

function stripLongPathPrefix(value: string, platform: PathPlatform): string {
  if (platform === 'win32' && value.startsWith(WINDOWS_LONGPATH_PREFIX)) {
    return value.substring(WINDOWS_LONGPATH_PREFIX.length)
  }
  return value
}

function toForwardSlashes(value: string, platform: PathPlatform): string {
  return platform === 'win32' ? value.replace(/\\/g, '/') : value
}

/**
 * A relative path leaves its base when its first segment is `..`.
 * On win32 a path on another drive comes back absolute from `relative()`.
 */
function escapesBase(relative: string, api: PathApi): boolean {
  if (api.isAbsolute(relative)) return true
  const [first] = relative.split(api.sep)
  return first === '..'
}

/**
 * Context-root name a relocated Dockerfile is copied to. Derived from the
 * source path so the same request always produces the same name.
 */
export function relocatedDockerfileName(sourcePath: string): string {
  return RELOCATED_DOCKERFILE_PREFIX + createHash('sha1').update(sourcePath).digest('hex')
}

/**
 * Make the context root absolute and lexically normalized, with any
 * long-path prefix removed.
 */
export function normalizeContextRoot(contextRoot: string, options: ResolveDockerfileOptions = {}): string {
  const platform = options.platform ?? hostPlatform()
  const api = pathApiFor(platform)
  const root = stripLongPathPrefix(contextRoot, platform)
  if (api.isAbsolute(root)) {
    return api.normalize(root)
  }
  return api.join(options.cwd ?? process.cwd(), root)
}

/**
 * Resolve a user-supplied Dockerfile location against the build context.
 *
 * Resolution is lexical only: nothing is read from disk and symlinks are
 * not followed. A Dockerfile whose net location is inside the context is
 * returned as a context-relative path (a relative spec keeps its textual
 * form, so `../baz/Dockerfile` from `ctx/baz` stays as given). One outside
 * the context is reported through `relocationSourcePath` and gets a
 * placeholder name the packager must copy it to.
 */
export function resolveDockerfile(
  dockerfile: string | null | undefined,
  contextRoot: string,
  options: ResolveDockerfileOptions = {},
): ResolvedDockerfile {
  if (dockerfile === null || dockerfile === undefined) {
    return { contextRelativePath: null, relocationSourcePath: null }
  }

  const platform = options.platform ?? hostPlatform()
  const api = pathApiFor(platform)
  const longPathRoot = platform === 'win32' && contextRoot.startsWith(WINDOWS_LONGPATH_PREFIX)
  const root = normalizeContextRoot(contextRoot, { ...options, platform })

  const spec = stripLongPathPrefix(dockerfile, platform)
  const specIsAbsolute = api.isAbsolute(spec)
  const absolute = specIsAbsolute ? api.normalize(spec) : api.join(root, spec)
  const relative = api.relative(root, absolute)

  if (escapesBase(relative, api)) {
    return {
      contextRelativePath: relocatedDockerfileName(absolute),
      relocationSourcePath: longPathRoot ? WINDOWS_LONGPATH_PREFIX + absolute : absolute,
    }
  }

  return {
    contextRelativePath: toForwardSlashes(specIsAbsolute ? relative : spec, platform),
    relocationSourcePath: null,
  }
}
