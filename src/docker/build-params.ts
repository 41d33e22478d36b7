import { z } from 'zod'

import { CONTAINER_LIMITS_KEYS, REMOTE_CONTEXT_PREFIXES } from '../constants'
import { BuildParamError, InvalidDockerfileSpecError } from '../errors'
import type { BuildOptions, BuildParams, ContainerLimits } from '../types'

// name components, optional registry port, optional tag
const TAG_PATTERN = new RegExp(
  '^[a-z0-9]+(?:(?:\\.|_|__|-+)[a-z0-9]+)*' +
  '(?::[0-9]+)?' +
  '(?:/[a-z0-9]+(?:(?:\\.|_|__|-+)[a-z0-9]+)*)*' +
  '(?::[a-zA-Z0-9_][a-zA-Z0-9._-]{0,127})?$',
)

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(tag)
}

export function isRemoteContext(contextPath: string): boolean {
  return REMOTE_CONTEXT_PREFIXES.some((prefix) => contextPath.startsWith(prefix))
}

const limitValue = z.union([z.number().int().nonnegative(), z.string().min(1)])

const containerLimitsSchema = z.record(z.string(), limitValue).superRefine((limits, ctx) => {
  const allowed: readonly string[] = CONTAINER_LIMITS_KEYS
  for (const key of Object.keys(limits)) {
    if (!allowed.includes(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `unknown container limit, expected one of: ${CONTAINER_LIMITS_KEYS.join(', ')}`,
      })
    }
  }
})

const stringMap = z.record(z.string(), z.string())

const buildOptionsSchema = z.object({
  tag: z.string().optional(),
  quiet: z.boolean().optional(),
  noCache: z.boolean().optional(),
  rm: z.boolean().optional(),
  forceRm: z.boolean().optional(),
  pull: z.boolean().optional(),
  buildArgs: stringMap.optional(),
  labels: stringMap.optional(),
  target: z.string().min(1).optional(),
  platform: z.string().min(1).optional(),
  networkMode: z.string().min(1).optional(),
  shmSize: z.number().int().positive().optional(),
  cacheFrom: z.array(z.string().min(1)).optional(),
  containerLimits: containerLimitsSchema.optional(),
})

function validateDockerfileSpec(dockerfile: string | undefined): void {
  if (dockerfile === undefined) return
  if (dockerfile.length === 0) {
    throw new InvalidDockerfileSpecError('Dockerfile path must not be empty')
  }
  if (dockerfile.includes('\0')) {
    throw new InvalidDockerfileSpecError('Dockerfile path must not contain NUL characters')
  }
}

function pickContainerLimits(limits: ContainerLimits | undefined): ContainerLimits {
  const picked: ContainerLimits = {}
  if (!limits) return picked
  for (const key of CONTAINER_LIMITS_KEYS) {
    const value = limits[key]
    if (value !== undefined) picked[key] = value
  }
  return picked
}

/**
 * Validate build options and turn them into daemon query parameters.
 * `dockerfile` is the already-resolved context-relative path and `remote`
 * the remote context URL, if any.
 */
export function buildQueryParams(
  options: BuildOptions,
  dockerfile: string | null,
  remote: string | null,
): BuildParams {
  validateDockerfileSpec(options.dockerfile)

  const parsed = buildOptionsSchema.safeParse(options)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new BuildParamError(`Invalid build option ${issue.path.join('.')}: ${issue.message}`)
  }
  const opts = parsed.data

  if (opts.tag !== undefined && !isValidTag(opts.tag)) {
    throw new BuildParamError(`invalid tag '${opts.tag}': invalid reference format`)
  }

  const params: BuildParams = {
    t: opts.tag ?? null,
    q: opts.quiet ?? false,
    dockerfile,
    rm: opts.rm ?? false,
    nocache: opts.noCache ?? false,
    pull: opts.pull ?? false,
    forcerm: opts.forceRm ?? false,
    remote,
    ...pickContainerLimits(opts.containerLimits),
  }

  if (opts.buildArgs && Object.keys(opts.buildArgs).length > 0) {
    params.buildargs = JSON.stringify(opts.buildArgs)
  }
  if (opts.labels && Object.keys(opts.labels).length > 0) {
    params.labels = JSON.stringify(opts.labels)
  }
  if (opts.cacheFrom && opts.cacheFrom.length > 0) {
    params.cachefrom = JSON.stringify(opts.cacheFrom)
  }
  if (opts.target) params.target = opts.target
  if (opts.platform) params.platform = opts.platform
  if (opts.networkMode) params.networkmode = opts.networkMode
  if (opts.shmSize !== undefined) params.shmsize = opts.shmSize

  return params
}
