import { describe, expect, it } from 'vitest'
import { decodePage, parseXml, textContent } from './decode'
import { DecodeError } from './errors'
import { normalizeUnicode, transcodeField } from './transcode'

describe('decodePage', () => {
  it('should read records, paging fields and ignore record attributes', () => {
    const page = decodePage(`<?xml version="1.0" encoding="UTF-8"?>
<QueryResult>
  <done>false</done>
  <nextRecordsUrl>/services/data/v35.0/query/01gD0000002HU6KIAW-2000</nextRecordsUrl>
  <records type="Contact" url="/services/data/v35.0/sobjects/Contact/003A">
    <Id>003A</Id>
    <LastName>Nguyen</LastName>
  </records>
  <totalSize>2500</totalSize>
</QueryResult>`)

    expect(page).toEqual({
      records: [{ Id: '003A', LastName: 'Nguyen' }],
      nextRecordsUrl: '/services/data/v35.0/query/01gD0000002HU6KIAW-2000',
      totalSize: 2500,
      done: false,
    })
  })

  it('should flatten relationship fields to their text content', () => {
    const page = decodePage(
      '<QueryResult><records><Id>001A</Id>' +
        '<Owner type="User" url="/services/data/v35.0/sobjects/User/005A"><Name>Jane</Name><Alias>jd</Alias></Owner>' +
        '</records></QueryResult>'
    )

    expect(page.records).toEqual([{ Id: '001A', Owner: 'Janejd' }])
  })

  it('should decode nil and empty fields as empty strings', () => {
    const page = decodePage(
      '<QueryResult xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">' +
        '<records><Id>001A</Id><Phone xsi:nil="true"/><Fax></Fax></records></QueryResult>'
    )

    expect(page.records).toEqual([{ Id: '001A', Phone: '', Fax: '' }])
  })

  it('should unescape entities in field values', () => {
    const page = decodePage('<QueryResult><records><Name>AT&amp;T &lt;HQ&gt;</Name></records></QueryResult>')

    expect(page.records).toEqual([{ Name: 'AT&T <HQ>' }])
  })

  it('should decode numeric character references in field values', () => {
    const page = decodePage(
      '<QueryResult><records><Name>Caf&#233; &#x2019;s&#xD;</Name><Notes>a&#10;b</Notes></records></QueryResult>'
    )

    expect(page.records).toEqual([{ Name: 'Caf\u00e9 \u2019s\r', Notes: 'a\nb' }])
  })

  it('should report a service error and skip the records', () => {
    const page = decodePage(
      '<Errors><Error><errorCode>MALFORMED_QUERY</errorCode><message>unexpected token: FORM</message></Error></Errors>'
    )

    expect(page).toEqual({
      records: [],
      error: { code: 'MALFORMED_QUERY', message: 'unexpected token: FORM' },
    })
  })

  it('should read subquery records after their parent, in document order', () => {
    const page = decodePage(
      '<QueryResult><records><Id>001A</Id><Contacts><records><Id>003A</Id></records>' +
        '<records><Id>003B</Id></records></Contacts></records>' +
        '<records><Id>001B</Id></records></QueryResult>'
    )

    expect(page.records).toEqual([
      { Id: '001A', Contacts: '003A003B' },
      { Id: '003A' },
      { Id: '003B' },
      { Id: '001B' },
    ])
  })

  it('should leave totalSize and done unset when absent', () => {
    expect(decodePage('<QueryResult></QueryResult>')).toEqual({ records: [] })
  })

  it('should throw a DecodeError for malformed XML', () => {
    expect(() => decodePage('<QueryResult><records>')).toThrow(DecodeError)
    expect(() => decodePage('')).toThrow(DecodeError)
    expect(() => decodePage('{"records": []}')).toThrow(DecodeError)
  })
})

describe('parseXml', () => {
  it('should keep child order and attributes', () => {
    const root = parseXml('<a x="1"><b>one</b>text<c>two</c></a>')

    expect(root.name).toBe('a')
    expect(root.attributes).toEqual({ x: '1' })
    expect(textContent(root)).toBe('onetexttwo')
  })
})

describe('transcodeField', () => {
  it('should normalize to NFC by default', () => {
    expect(transcodeField('Name', 'Cafe\u0301')).toBe('Caf\u00e9')
  })

  it('should reject unpaired surrogates in the default codec', () => {
    expect(() => normalizeUnicode('a\uD800b')).toThrow('value contains an unpaired surrogate')
    expect(normalizeUnicode('\uD83D\uDE00')).toBe('\uD83D\uDE00')
  })

  it('should return the raw value and report the failure', () => {
    const warnings: Array<{ field: string; value: string; reason: string }> = []

    const value = transcodeField('Name', 'a\uD800b', normalizeUnicode, (warning) =>
      warnings.push(warning)
    )

    expect(value).toBe('a\uD800b')
    expect(warnings).toEqual([
      { field: 'Name', value: 'a\uD800b', reason: 'value contains an unpaired surrogate' },
    ])
  })
})
