/**
 * Bulk Linking
 *
 * Candidate edge builders for the graph's bulk operations. They only build
 * edges; committing them to a collection is the caller's job, which keeps
 * every bulk operation all-or-nothing.
 */

import { HeterogeneousGroupError } from '../errors'
import { Edge, type Entity, type VertexType } from '../model'

/**
 * Options shared by bulk-link operations.
 */
export interface LinkOptions {
  /** Type label for every created edge */
  type?: string
}

/**
 * Every ordered pair of distinct groups (i != j), in index order.
 */
export function orderedGroupPairs<T>(groups: readonly T[]): Array<[T, T]> {
  const pairs: Array<[T, T]> = []
  groups.forEach((group, i) => {
    groups.forEach((other, j) => {
      if (i !== j) pairs.push([group, other])
    })
  })
  return pairs
}

/**
 * One edge from every entity of `from` to every entity of `to`, skipping
 * an entity paired with itself.
 */
export function crossEdges(
  from: readonly Entity[],
  to: readonly Entity[],
  init: { type?: string; directed?: boolean } = {},
): Edge[] {
  const edges: Edge[] = []
  for (const f of from) {
    for (const t of to) {
      if (f.equals(t)) continue
      edges.push(new Edge(f, t, init))
    }
  }
  return edges
}

/**
 * The single vertex type of a group.
 * @throws HeterogeneousGroupError when the group spans several vertex types
 */
export function groupVertexType(group: readonly Entity[]): VertexType | undefined {
  const [first] = group
  if (!first) return undefined
  const ids = new Set(group.map((entity) => entity.vertexTypeId))
  if (ids.size > 1) {
    throw new HeterogeneousGroupError(Array.from(ids))
  }
  return first.vertexType
}

/**
 * Candidates for plain all-pairs linking: every ordered pair of groups,
 * cross-linked. Both traversal orders are produced; undirected dedup
 * collapses them on insertion.
 */
export function allPairsCandidates(groups: readonly (readonly Entity[])[], options: LinkOptions = {}): Edge[] {
  return orderedGroupPairs(groups).flatMap(([from, to]) => crossEdges(from, to, { type: options.type }))
}

/**
 * Candidates for centrality-biased linking.
 *
 * A group's vertex type is read from its first entity. Only pairs where
 * exactly one side is the central vertex type are kept; edges run from the
 * non-central entity to the central one. Both sides of a kept pair must hold
 * a single vertex type; groups that only appear in dropped pairs are not
 * checked.
 * @throws HeterogeneousGroupError
 */
export function centralCandidates(
  groups: readonly (readonly Entity[])[],
  central: VertexType,
  options: LinkOptions = {},
): Edge[] {
  const nonEmpty = groups.filter((group) => group.length > 0)
  const isCentral = (group: readonly Entity[]) => central.equals(group[0]?.vertexType)

  const edges: Edge[] = []
  for (const [x, y] of orderedGroupPairs(nonEmpty)) {
    const xCentral = isCentral(x)
    if (xCentral === isCentral(y)) continue

    groupVertexType(x)
    groupVertexType(y)

    const [centralSide, otherSide] = xCentral ? [x, y] : [y, x]
    for (const c of centralSide) {
      for (const n of otherSide) {
        if (c.equals(n)) continue
        edges.push(new Edge(n, c, { type: options.type }))
      }
    }
  }
  return edges
}
