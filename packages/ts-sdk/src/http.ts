import { Agent } from 'https'
import fetch, { type RequestInit } from 'node-fetch'
import { TransportError } from './errors'
import type { Logger } from './logger'

export interface HttpSettings {
  debug: boolean
  rejectUnauthorized: boolean
  timeout?: number
}

export interface HttpResult {
  ok: boolean
  status: number
  statusText: string
  body: string
}

const insecureAgent = new Agent({ rejectUnauthorized: false })

function agentFor(settings: HttpSettings): RequestInit['agent'] {
  if (settings.rejectUnauthorized) return undefined
  return (parsedUrl: URL) => (parsedUrl.protocol === 'https:' ? insecureAgent : undefined)
}

function redact(headers: Record<string, string>): Record<string, string> {
  return headers.Authorization ? { ...headers, Authorization: 'Bearer ***redacted***' } : headers
}

/**
 * Sends one request and reads the whole body as text. Connection failures and
 * timeouts become TransportError; HTTP error statuses are returned to the
 * caller, which knows whether the body explains them.
 */
export async function sendRequest(
  url: string,
  init: { method: 'GET' | 'POST'; headers: Record<string, string>; body?: URLSearchParams },
  settings: HttpSettings,
  logger: Logger
): Promise<HttpResult> {
  if (settings.debug) {
    logger.debug(`→ ${init.method} ${url}`, { headers: redact(init.headers) })
  }

  const abortController = new AbortController()
  const timeoutId = settings.timeout
    ? setTimeout(() => abortController.abort(), settings.timeout)
    : undefined

  try {
    const response = await fetch(url, {
      method: init.method,
      headers: init.headers,
      body: init.body,
      agent: agentFor(settings),
      signal: abortController.signal,
    })
    const body = await response.text()

    if (settings.debug) {
      logger.debug(`← ${response.status} ${url}`, body)
    }

    return {
      ok: response.ok,
      status: response.status,
      statusText: response.statusText,
      body,
    }
  } catch (error: unknown) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TransportError(`Request timed out after ${settings.timeout}ms: ${url}`, 'TIMEOUT')
    }
    const reason = error instanceof Error ? error.message : String(error)
    throw new TransportError(`Request to ${url} failed: ${reason}`, 'NETWORK_ERROR')
  } finally {
    clearTimeout(timeoutId)
  }
}
