/**
 * Store Module
 */

export { EdgeCollection } from './edge-collection'
export type { EdgeQuery, EdgeCollectionOptions } from './types'
