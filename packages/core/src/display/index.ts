/**
 * Display Module
 */

export {
  EDGE_LISTING_KEY,
  edgeListing,
  entitiesWithoutEdges,
  groupSelections,
  vertexTypeListing,
} from './listing'
export type { DisplayCollection } from './listing'
