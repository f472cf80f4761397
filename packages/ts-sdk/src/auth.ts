import { z } from 'zod'
import {
  type ClientOptions,
  type LoginOptions,
  resolveClientOptions,
  resolveLoginOptions,
} from './config'
import { AuthenticationError } from './errors'
import { sendRequest } from './http'
import { createLogger, LogLevel } from './logger'
import { createSession, type SessionContext } from './session'

const logger = createLogger('Authentication')
const debugLogger = createLogger('Authentication', { minLevel: LogLevel.DEBUG })

const TokenResponseSchema = z
  .object({
    access_token: z.string().optional(),
    instance_url: z.string().optional(),
    error: z.string().optional(),
    error_description: z.string().optional(),
  })
  .passthrough()

function parseTokenResponse(body: string): z.infer<typeof TokenResponseSchema> {
  let data: unknown
  try {
    data = JSON.parse(body)
  } catch {
    return {}
  }
  const result = TokenResponseSchema.safeParse(data)
  return result.success ? result.data : {}
}

/**
 * Exchanges user credentials for an access token with the OAuth password
 * grant and returns the session bound to the user's instance.
 */
export async function authenticate(
  loginOptions: LoginOptions,
  clientOptions: ClientOptions = {}
): Promise<SessionContext> {
  const login = resolveLoginOptions(loginOptions)
  const settings = resolveClientOptions(clientOptions)
  const url = `${login.loginUrl.replace(/\/+$/, '')}/services/oauth2/token`

  const response = await sendRequest(
    url,
    {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: new URLSearchParams({
        grant_type: login.grantType,
        client_id: login.clientId,
        client_secret: login.clientSecret,
        username: login.username,
        password: login.password,
      }),
    },
    // the response body carries the access token
    { ...settings, debug: false },
    settings.debug ? debugLogger : logger
  )

  const data = parseTokenResponse(response.body)

  if (data.error_description || data.error) {
    logger.error('Login rejected', { status: response.status, error: data.error })
    throw new AuthenticationError(
      data.error_description || data.error || 'Login failed',
      data.error,
      response.status
    )
  }
  if (!response.ok) {
    throw new AuthenticationError(
      `Login failed with HTTP ${response.status}: ${response.statusText}`,
      'HTTP_ERROR',
      response.status
    )
  }
  if (!data.access_token || !data.instance_url) {
    throw new AuthenticationError('Token response is missing access_token or instance_url')
  }

  if (settings.debug) {
    debugLogger.debug(`Signed in at ${url}`, { instanceUrl: data.instance_url })
  }

  return createSession(data.access_token, data.instance_url, login.apiVersion)
}
