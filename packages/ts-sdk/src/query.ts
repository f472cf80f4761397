import { type ClientOptions, type ResolvedClientOptions, resolveClientOptions } from './config'
import { type DecodedPage, type ForceRecord, decodePage } from './decode'
import { ConfigurationError, DecodeError, ServiceError, TransportError } from './errors'
import { sendRequest } from './http'
import { createLogger, LogLevel } from './logger'
import type { SessionContext } from './session'

const logger = createLogger('QueryEngine')
const debugLogger = createLogger('QueryEngine', { minLevel: LogLevel.DEBUG })

/**
 * Continuation references arrive as "/services/data/...". Base URLs end in
 * "/", so one leading separator is dropped before joining.
 */
export function normalizeContinuation(reference: string): string {
  return reference.replace(/^\//, '')
}

export function joinUrl(baseURL: string, path: string): string {
  return `${baseURL}${normalizeContinuation(path)}`
}

export function buildSoqlPath(apiVersion: string, soql: string): string {
  return `services/data/v${apiVersion}/query/?q=${encodeURIComponent(soql)}`
}

async function fetchOnePage(
  session: SessionContext,
  url: string,
  settings: ResolvedClientOptions
): Promise<DecodedPage> {
  const log = settings.debug ? debugLogger : logger
  const response = await sendRequest(
    url,
    {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${session.credential}`,
        Accept: 'application/xml',
      },
    },
    settings,
    log
  )

  let page: DecodedPage
  try {
    page = decodePage(response.body, {
      fieldCodec: settings.fieldCodec,
      onEncodingWarning: (warning) => {
        log.warn(`Kept raw value for field ${warning.field}: ${warning.reason}`)
        settings.onEncodingWarning?.(warning)
      },
    })
  } catch (error) {
    if (!response.ok && error instanceof DecodeError) {
      throw new TransportError(
        `HTTP ${response.status}: ${response.statusText}`,
        'HTTP_ERROR',
        response.status
      )
    }
    throw error
  }

  if (page.error) {
    log.error('Query rejected by service', { url, code: page.error.code })
    throw new ServiceError(page.error.code, page.error.message, response.status)
  }

  if (!response.ok) {
    throw new TransportError(
      `HTTP ${response.status}: ${response.statusText}`,
      'HTTP_ERROR',
      response.status
    )
  }

  return page
}

/**
 * Fetches `continuation` and every page after it, in order. Each page's
 * records are appended after the previous page's. The first failure on any
 * page rejects the whole call; records already read are discarded.
 */
export async function fetchPage(
  session: SessionContext,
  continuation: string,
  options: ClientOptions = {}
): Promise<ForceRecord[]> {
  if (!continuation || normalizeContinuation(continuation) === '') {
    throw new ConfigurationError('A query path or nextRecordsUrl is required')
  }

  const settings = resolveClientOptions(options)
  const records: ForceRecord[] = []
  let next: string | undefined = continuation
  let pages = 0

  while (next) {
    const page = await fetchOnePage(session, joinUrl(session.baseURL, next), settings)
    pages++
    for (const record of page.records) {
      records.push(record)
    }
    next = page.nextRecordsUrl
  }

  logger.debug(`Fetched ${records.length} records in ${pages} page(s)`)
  return records
}
