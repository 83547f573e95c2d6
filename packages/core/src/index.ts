/**
 * vertexmap core
 *
 * Typed collections of named entities ("vertex types") and an indexed,
 * deduplicating store of edges between them.
 *
 * @example
 * ```typescript
 * import { createGraph, VertexType } from '@vertexmap/core'
 *
 * const city = new VertexType({ id: 'city', central: true, values: ['NYC', 'LA'] })
 * const person = new VertexType({ id: 'person', values: ['Alice'] })
 * const graph = createGraph({ vertexTypes: [city, person] })
 *
 * graph.addEdgesCentral([person.entities, city.entities], city, { type: 'lives-in' })
 * graph.getEdges({ type: 'lives-in' }) // Alice -> NYC, Alice -> LA
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// MODEL
// =============================================================================

export { Entity, VertexType, Edge, identityOf, pairKey } from './model'
export type { VertexTypeInit, EdgeInit } from './model'

// =============================================================================
// STORE
// =============================================================================

export { EdgeCollection } from './store'
export type { EdgeQuery, EdgeCollectionOptions } from './store'

// =============================================================================
// GRAPH
// =============================================================================

export {
  Graph,
  createGraph,
  allPairsCandidates,
  centralCandidates,
  crossEdges,
  groupVertexType,
  orderedGroupPairs,
} from './graph'
export type { GraphConfig, LinkOptions } from './graph'

// =============================================================================
// DISPLAY
// =============================================================================

export {
  EDGE_LISTING_KEY,
  edgeListing,
  entitiesWithoutEdges,
  groupSelections,
  vertexTypeListing,
} from './display'
export type { DisplayCollection } from './display'

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphError,
  InvalidEntityError,
  MissingEndpointError,
  HeterogeneousGroupError,
  EdgeIdConflictError,
  ValidationError,
} from './errors'

// =============================================================================
// UTILITIES
// =============================================================================

export { ConsoleLogger, createLogger, silentLogger, defaultIdGenerator, sequentialIdGenerator } from './utils'
export type { IdGenerator, Logger, LoggerOptions, LogLevel } from './utils'
