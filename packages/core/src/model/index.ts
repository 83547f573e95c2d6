/**
 * Model Module
 */

export { Entity, identityOf } from './entity'
export { VertexType } from './vertex-type'
export type { VertexTypeInit } from './vertex-type'
export { Edge, pairKey } from './edge'
export type { EdgeInit } from './edge'
