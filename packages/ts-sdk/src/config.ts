import { z } from 'zod'
import { ConfigurationError } from './errors'
import type { EncodingWarningHandler, FieldCodec } from './transcode'

export const DEFAULT_LOGIN_URL = 'https://login.salesforce.com'
export const DEFAULT_API_VERSION = '35.0'
export const MIN_API_VERSION = 20

export const ApiVersionSchema = z
  .string()
  .regex(/^\d+\.\d+$/, 'API version must look like "35.0"')
  .refine((version) => Number(version) >= MIN_API_VERSION, {
    message: `The earliest supported API version is ${MIN_API_VERSION}.0`,
  })

export const LoginOptionsSchema = z.object({
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
  grantType: z.string().min(1).default('password'),
  loginUrl: z.string().url().default(DEFAULT_LOGIN_URL),
  apiVersion: ApiVersionSchema.default(DEFAULT_API_VERSION),
})

export type LoginOptions = z.input<typeof LoginOptionsSchema>
export type ResolvedLoginOptions = z.output<typeof LoginOptionsSchema>

const ClientSettingsSchema = z.object({
  debug: z.boolean().default(false),
  rejectUnauthorized: z.boolean().default(true),
  timeout: z.number().int().positive().optional(),
})

export type ClientOptions = z.input<typeof ClientSettingsSchema> & {
  /** Applied to every field value; defaults to Unicode normalization. */
  fieldCodec?: FieldCodec
  onEncodingWarning?: EncodingWarningHandler
}

export type ResolvedClientOptions = z.output<typeof ClientSettingsSchema> & {
  fieldCodec?: FieldCodec
  onEncodingWarning?: EncodingWarningHandler
}

/** Maps each login option to the environment variable it is read from. */
export const LOGIN_ENV_VARS = {
  username: 'FORCE_USERNAME',
  password: 'FORCE_PASSWORD',
  clientId: 'FORCE_CLIENT_ID',
  clientSecret: 'FORCE_CLIENT_SECRET',
  loginUrl: 'FORCE_LOGIN_URL',
  apiVersion: 'FORCE_API_VERSION',
} as const

function formatIssues(issues: z.ZodIssue[], rename: (key: string) => string): string {
  return issues
    .map((issue) => {
      const key = issue.path.join('.')
      return `${key ? rename(key) : 'options'}: ${issue.message}`
    })
    .join('; ')
}

export function resolveLoginOptions(options: LoginOptions): ResolvedLoginOptions {
  const result = LoginOptionsSchema.safeParse(options)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid login options - ${formatIssues(result.error.issues, (key) => key)}`
    )
  }
  return result.data
}

export function resolveClientOptions(options: ClientOptions = {}): ResolvedClientOptions {
  const { fieldCodec, onEncodingWarning, ...settings } = options
  const result = ClientSettingsSchema.safeParse(settings)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid client options - ${formatIssues(result.error.issues, (key) => key)}`
    )
  }
  return { ...result.data, fieldCodec, onEncodingWarning }
}

function isLoginEnvKey(key: string): key is keyof typeof LOGIN_ENV_VARS {
  return key in LOGIN_ENV_VARS
}

/**
 * Reads login options from FORCE_* environment variables. Empty variables
 * count as unset, so defaults still apply.
 */
export function loadLoginOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<LoginOptions> = {}
): ResolvedLoginOptions {
  const read = (name: string) => env[name] || undefined

  const raw = {
    username: read(LOGIN_ENV_VARS.username),
    password: read(LOGIN_ENV_VARS.password),
    clientId: read(LOGIN_ENV_VARS.clientId),
    clientSecret: read(LOGIN_ENV_VARS.clientSecret),
    loginUrl: read(LOGIN_ENV_VARS.loginUrl),
    apiVersion: read(LOGIN_ENV_VARS.apiVersion),
    ...Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined)),
  }

  const result = LoginOptionsSchema.safeParse(raw)
  if (!result.success) {
    const message = formatIssues(result.error.issues, (key) =>
      isLoginEnvKey(key) ? LOGIN_ENV_VARS[key] : key
    )
    throw new ConfigurationError(`Invalid environment - ${message}`)
  }
  return result.data
}
