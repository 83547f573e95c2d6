/**
 * Graph Module
 */

export { Graph, createGraph } from './graph'
export type { GraphConfig } from './graph'
export {
  allPairsCandidates,
  centralCandidates,
  crossEdges,
  groupVertexType,
  orderedGroupPairs,
} from './linking'
export type { LinkOptions } from './linking'
