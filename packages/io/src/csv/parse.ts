/**
 * CSV Parsing
 *
 * RFC 4180 records: comma separated, double-quoted fields with doubled quotes
 * inside, LF or CRLF line endings.
 */

import { LoadError } from '../errors'

export interface CsvTable {
  header: string[]
  rows: Array<Record<string, string>>
}

/**
 * Split CSV text into records of raw fields. Blank lines are dropped.
 * @throws LoadError on an unterminated quoted field
 */
export function parseCsvRecords(text: string): string[][] {
  const source = text.startsWith('\uFEFF') ? text.slice(1) : text
  const records: string[][] = []
  let record: string[] = []
  let field = ''
  let quoted = false
  let fieldStarted = false

  const endField = () => {
    record.push(field)
    field = ''
    fieldStarted = false
  }
  const endRecord = () => {
    endField()
    if (!(record.length === 1 && record[0] === '')) records.push(record)
    record = []
  }

  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i)

    if (quoted) {
      if (ch === '"' && source.charAt(i + 1) === '"') {
        field += '"'
        i++
      } else if (ch === '"') {
        quoted = false
      } else {
        field += ch
      }
      continue
    }

    if (ch === '"' && !fieldStarted) {
      quoted = true
      fieldStarted = true
    } else if (ch === ',') {
      endField()
    } else if (ch === '\n') {
      endRecord()
    } else if (ch === '\r') {
      if (source.charAt(i + 1) === '\n') i++
      endRecord()
    } else {
      field += ch
      fieldStarted = true
    }
  }

  if (quoted) {
    throw new LoadError('Unterminated quoted field in CSV input')
  }
  if (fieldStarted || record.length > 0) {
    endRecord()
  }
  return records
}

/**
 * Parse CSV text whose first record is the header.
 * Missing trailing cells read as empty strings; extra cells are ignored.
 */
export function parseCsv(text: string): CsvTable {
  const [header = [], ...records] = parseCsvRecords(text)
  const rows = records.map((record) => {
    const row: Record<string, string> = {}
    header.forEach((column, i) => {
      row[column] = record[i] ?? ''
    })
    return row
  })
  return { header, rows }
}

/**
 * Quote a cell when it contains a delimiter, a quote or a line break.
 */
export function escapeCsvCell(value: unknown, delimiter = ','): string {
  const str = value === null || value === undefined ? '' : String(value)
  if (str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }
  return str
}

/**
 * Join cells into one CSV line.
 */
export function formatCsvRow(cells: readonly unknown[], delimiter = ','): string {
  return cells.map((cell) => escapeCsvCell(cell, delimiter)).join(delimiter)
}
