import { z } from 'zod'

import { BASE64_PATTERN, REGISTRY_CONFIG_HEADER } from '../constants'
import { EncodingError } from '../errors'
import type { AuthConfigSet, HeaderMap, RegistryAuth } from '../types'

const credentialField = z.string().nullable().optional()

const registryAuthSchema = z.object({
  username: credentialField,
  password: credentialField,
  email: credentialField,
  serveraddress: credentialField,
  identitytoken: credentialField,
})

const authConfigSetSchema = z.record(z.string(), registryAuthSchema)

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')
}

function parseAuthConfigSet(value: unknown): AuthConfigSet {
  const result = authConfigSetSchema.safeParse(value)
  if (!result.success) {
    throw new EncodingError(`Invalid registry auth config: ${describeIssues(result.error)}`)
  }
  return result.data
}

/**
 * Build an auth config set from `[registry, credentials]` pairs. A registry
 * listed twice keeps its last credentials, at the position it was first seen.
 */
export function authConfigSetFromEntries(
  entries: Iterable<readonly [string, RegistryAuth]>,
): AuthConfigSet {
  const set: AuthConfigSet = {}
  for (const [registry, auth] of entries) {
    set[registry] = auth
  }
  return set
}

/**
 * Serialize every registry's credentials into one header-safe value:
 * JSON in the given key order, then URL-safe base64 with padding.
 */
export function encodeRegistryConfig(authConfigs: AuthConfigSet): string {
  const validated = parseAuthConfigSet(authConfigs)
  // zod rebuilds objects, so serialize the caller's own key order
  const ordered = authConfigSetFromEntries(
    Object.keys(authConfigs).map((registry) => [registry, validated[registry]] as const),
  )
  return Buffer.from(JSON.stringify(ordered), 'utf-8')
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
}

export function decodeRegistryConfig(value: string): AuthConfigSet {
  if (!BASE64_PATTERN.test(value)) {
    throw new EncodingError('Registry config header is not base64')
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(Buffer.from(value, 'base64').toString('utf-8'))
  } catch (error) {
    throw new EncodingError('Registry config header does not contain JSON', { cause: error })
  }
  return parseAuthConfigSet(parsed)
}

/**
 * Set the registry config header on `headers` (in place) and return it.
 * Other keys are never touched, and the map is left as it was when the
 * credentials cannot be encoded.
 */
export function attachRegistryConfig(
  headers: HeaderMap,
  authConfigs: AuthConfigSet | null | undefined,
): HeaderMap {
  if (!authConfigs || Object.keys(authConfigs).length === 0) {
    return headers
  }
  const encoded = encodeRegistryConfig(authConfigs)
  headers[REGISTRY_CONFIG_HEADER] = encoded
  return headers
}
