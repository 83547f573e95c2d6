/**
 * CSV Module
 */

export { parseCsv, parseCsvRecords, escapeCsvCell, formatCsvRow } from './parse'
export type { CsvTable } from './parse'
