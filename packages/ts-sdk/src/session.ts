import { z } from 'zod'
import { ApiVersionSchema } from './config'
import { ConfigurationError } from './errors'

/**
 * Everything a query needs to address and authorize its requests. Produced
 * once by `authenticate` (or from a stored token) and never changed.
 */
export interface SessionContext {
  /** Bearer access token. */
  readonly credential: string
  /** Instance origin, always ending in "/". */
  readonly baseURL: string
  readonly apiVersion: string
}

const SessionSchema = z.object({
  credential: z.string().min(1, 'credential is required'),
  baseURL: z.string().url(),
  apiVersion: ApiVersionSchema,
})

export function createSession(
  credential: string,
  baseURL: string,
  apiVersion: string
): SessionContext {
  const result = SessionSchema.safeParse({ credential, baseURL, apiVersion })
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid session - ${details}`)
  }

  return Object.freeze({
    credential,
    baseURL: `${baseURL.replace(/\/+$/, '')}/`,
    apiVersion,
  })
}
