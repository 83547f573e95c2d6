/**
 * vertexmap IO
 *
 * Loading mapping CSVs into graphs, rendering graphs as DOT and CSV, and
 * the `vertexmap` command line.
 *
 * @packageDocumentation
 */

export { LoadError } from './errors'
export { parseCsv, parseCsvRecords, escapeCsvCell, formatCsvRow } from './csv'
export type { CsvTable } from './csv'
export { loadGraph, loadGraphFile, mappingRowSchema, parseFlag, REQUIRED_COLUMNS } from './load'
export type { LoadOptions, LoadResult, MappingRow } from './load'
export { renderDot, renderCsv, quoteDot, writeGraph, EXPORT_COLUMNS } from './render'
export type { DotOptions, WriteOptions, WrittenFiles } from './render'
export { createProgram, describeGraph } from './cli'
export type { CliDeps } from './cli'
