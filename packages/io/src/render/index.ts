/**
 * Render Module
 */

export { renderDot, quoteDot } from './dot'
export type { DotOptions } from './dot'
export { renderCsv, EXPORT_COLUMNS } from './csv'
export { writeGraph } from './write'
export type { WriteOptions, WrittenFiles } from './write'
