import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { DecodeError } from './errors'
import { type EncodingWarningHandler, type FieldCodec, transcodeField } from './transcode'

/** One result row: field name to its text value. */
export type ForceRecord = Record<string, string>

export interface ServiceErrorPayload {
  code: string
  message: string
}

/**
 * A single response, decoded once. `error` and usable `records` never
 * come together: a page with an error is not read further.
 */
export interface DecodedPage {
  records: ForceRecord[]
  nextRecordsUrl?: string
  error?: ServiceErrorPayload
  totalSize?: number
  done?: boolean
}

export interface DecodeOptions {
  fieldCodec?: FieldCodec
  onEncodingWarning?: EncodingWarningHandler
}

export interface XmlElement {
  name: string
  attributes: Record<string, string>
  children: XmlNode[]
}

export type XmlNode = XmlElement | string

const TEXT_KEY = '#text'
const ATTRIBUTES_KEY = ':@'
const ATTRIBUTE_PREFIX = '@_'

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // numeric character references (&#233;, &#xD;) are only decoded with this on
  htmlEntities: true,
})

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toAttributes(value: unknown): Record<string, string> {
  if (!isObject(value)) return {}
  const attributes: Record<string, string> = {}
  for (const [key, attr] of Object.entries(value)) {
    attributes[key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key] =
      String(attr)
  }
  return attributes
}

// Parser output in preserveOrder mode is an array of single-key objects,
// with attributes kept beside the element under ":@".
function toNodes(value: unknown): XmlNode[] {
  if (!Array.isArray(value)) return []
  const nodes: XmlNode[] = []
  for (const entry of value) {
    if (!isObject(entry)) continue
    for (const [key, content] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue
      if (key === TEXT_KEY) {
        nodes.push(String(content))
        continue
      }
      nodes.push({
        name: key,
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children: toNodes(content),
      })
    }
  }
  return nodes
}

function elementsOf(nodes: XmlNode[]): XmlElement[] {
  return nodes.filter((node): node is XmlElement => typeof node !== 'string')
}

/** Every element named `name` at any depth below `element`, in document order. */
function descendants(element: XmlElement, name: string): XmlElement[] {
  const found: XmlElement[] = []
  for (const node of elementsOf(element.children)) {
    if (node.name === name) found.push(node)
    found.push(...descendants(node, name))
  }
  return found
}

function child(element: XmlElement, name: string): XmlElement | undefined {
  return elementsOf(element.children).find((node) => node.name === name)
}

/** Concatenated text of the element and all of its descendants. */
export function textContent(element: XmlElement): string {
  return element.children
    .map((node) => (typeof node === 'string' ? node : textContent(node)))
    .join('')
}

function childText(element: XmlElement | undefined, name: string): string | undefined {
  if (!element) return undefined
  const found = child(element, name)
  return found ? textContent(found) : undefined
}

function isNil(element: XmlElement): boolean {
  return element.attributes['xsi:nil'] === 'true'
}

function decodeRecord(element: XmlElement, options: DecodeOptions): ForceRecord {
  const record: ForceRecord = {}
  for (const field of elementsOf(element.children)) {
    const raw = isNil(field) ? '' : textContent(field)
    record[field.name] = transcodeField(
      field.name,
      raw,
      options.fieldCodec,
      options.onEncodingWarning
    )
  }
  return record
}

export function parseXml(body: string): XmlElement {
  const validation = XMLValidator.validate(body)
  if (validation !== true) {
    const { msg, line } = validation.err
    throw new DecodeError(`Malformed XML response: ${msg} (line ${line})`)
  }

  let parsed: unknown
  try {
    parsed = parser.parse(body)
  } catch (error) {
    throw new DecodeError(
      `Malformed XML response: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  const root = elementsOf(toNodes(parsed))[0]
  if (!root) {
    throw new DecodeError('Malformed XML response: no root element')
  }
  return root
}

/**
 * Decodes one query response. The error node is read first; when both its
 * code and message are non-empty the page is reported as an error and no
 * records are decoded.
 */
export function decodePage(body: string, options: DecodeOptions = {}): DecodedPage {
  const root = parseXml(body)

  const errorNode = child(root, 'Error')
  const code = childText(errorNode, 'errorCode')
  const message = childText(errorNode, 'message')
  if (code && message) {
    return { records: [], error: { code, message } }
  }

  const records = descendants(root, 'records').map((node) => decodeRecord(node, options))

  const page: DecodedPage = { records }

  const nextRecordsUrl = childText(root, 'nextRecordsUrl')
  if (nextRecordsUrl) {
    page.nextRecordsUrl = nextRecordsUrl
  }

  const totalSize = childText(root, 'totalSize')
  if (totalSize && /^\d+$/.test(totalSize)) {
    page.totalSize = Number(totalSize)
  }

  const done = childText(root, 'done')
  if (done === 'true' || done === 'false') {
    page.done = done === 'true'
  }

  return page
}
