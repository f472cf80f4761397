import type { ForceRecord } from './decode'

/** Field names across all records, in the order they are first seen. */
export function columnsOf(records: ForceRecord[]): string[] {
  const seen = new Set<string>()
  for (const record of records) {
    for (const field of Object.keys(record)) {
      seen.add(field)
    }
  }
  return [...seen]
}

/**
 * Lays records out as rows over `columns`. Fields a record lacks become "".
 */
export function toRows(records: ForceRecord[], columns: string[] = columnsOf(records)): string[][] {
  return records.map((record) => columns.map((column) => record[column] ?? ''))
}
