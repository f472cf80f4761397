import type { Response } from 'node-fetch'

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  400: 'Bad Request',
  401: 'Unauthorized',
  500: 'Internal Server Error',
}

/**
 * Minimal stand-in for a node-fetch Response: the client only reads
 * ok, status, statusText and text().
 */
export function mockResponse(body: string, status = 200): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: STATUS_TEXT[status] ?? '',
    text: async () => body,
  } as unknown as Response
}

export function jsonResponse(data: unknown, status = 200): Response {
  return mockResponse(JSON.stringify(data), status)
}

export function recordXml(fields: Record<string, string>, type = 'Account'): string {
  const body = Object.entries(fields)
    .map(([name, value]) => `<${name}>${value}</${name}>`)
    .join('')
  return `<records type="${type}" url="/services/data/v35.0/sobjects/${type}/x">${body}</records>`
}

export function queryResultXml(
  records: Array<Record<string, string>>,
  nextRecordsUrl?: string
): string {
  const next = nextRecordsUrl ? `<nextRecordsUrl>${nextRecordsUrl}</nextRecordsUrl>` : ''
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<QueryResult><done>${nextRecordsUrl ? 'false' : 'true'}</done>${next}` +
    `${records.map((record) => recordXml(record)).join('')}` +
    `<totalSize>${records.length}</totalSize></QueryResult>`
  )
}

export function errorXml(errorCode: string, message: string): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<Errors><Error><errorCode>${errorCode}</errorCode><message>${message}</message></Error></Errors>`
  )
}
