export { authenticate } from './auth'
export { ForceClient } from './client'
export {
  type ClientOptions,
  DEFAULT_API_VERSION,
  DEFAULT_LOGIN_URL,
  LOGIN_ENV_VARS,
  type LoginOptions,
  loadLoginOptionsFromEnv,
  type ResolvedClientOptions,
  type ResolvedLoginOptions,
  resolveClientOptions,
  resolveLoginOptions,
} from './config'
export { type DecodedPage, decodePage, type ForceRecord, type ServiceErrorPayload } from './decode'
export {
  AuthenticationError,
  ConfigurationError,
  DecodeError,
  ForceError,
  ServiceError,
  TransportError,
} from './errors'
export { createLogger, Logger, LogLevel } from './logger'
export { buildSoqlPath, fetchPage, joinUrl, normalizeContinuation } from './query'
export { createSession, type SessionContext } from './session'
export { columnsOf, toRows } from './table'
export {
  type EncodingWarning,
  type EncodingWarningHandler,
  type FieldCodec,
  normalizeUnicode,
  transcodeField,
} from './transcode'

export { ForceClient as default } from './client'
