/**
 * Load Module
 */

export { loadGraph, loadGraphFile } from './loader'
export type { LoadOptions, LoadResult } from './loader'
export { mappingRowSchema, parseFlag, REQUIRED_COLUMNS } from './schema'
export type { MappingRow } from './schema'
