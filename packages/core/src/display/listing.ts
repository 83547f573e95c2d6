/**
 * Display Listings
 *
 * List-based UIs show vertex types and the edge list side by side. Both are
 * exposed through the same "named collection of displayable items" shape.
 */

import type { Edge, Entity, VertexType } from '../model'
import type { EdgeCollection } from '../store'

export interface DisplayCollection<T> {
  /** Stable key of the listing */
  readonly key: string
  /** Heading shown above the items */
  readonly name: string
  /** Current items, in display order */
  items(): readonly T[]
  /** Text shown for an item */
  label(item: T): string
}

export const EDGE_LISTING_KEY = 'edges'

/**
 * Listing of a vertex type's entities.
 */
export function vertexTypeListing(vertexType: VertexType): DisplayCollection<Entity> {
  return {
    key: vertexType.id,
    name: vertexType.name,
    items: () => vertexType.entities,
    label: (entity) => entity.value,
  }
}

/**
 * Listing of the stored edges. Items are read on every call, so the listing
 * follows additions and deletions.
 */
export function edgeListing(collection: EdgeCollection): DisplayCollection<Edge> {
  return {
    key: EDGE_LISTING_KEY,
    name: 'edges',
    items: () => collection.edges,
    label: (edge) => edge.toString(),
  }
}

/**
 * Entities of a vertex type that appear in no edge.
 */
export function entitiesWithoutEdges(vertexType: VertexType, collection: EdgeCollection): Entity[] {
  const linked = new Set<string>()
  for (const entities of collection.edgesByVertex.values()) {
    for (const entity of entities) linked.add(entity.identity)
  }
  return vertexType.entities.filter((entity) => !linked.has(entity.identity))
}

/**
 * Drop empty selections, leaving the groups bulk linking expects.
 */
export function groupSelections(selections: readonly (readonly Entity[] | undefined)[]): Entity[][] {
  const groups: Entity[][] = []
  for (const selection of selections) {
    if (selection && selection.length > 0) groups.push([...selection])
  }
  return groups
}
