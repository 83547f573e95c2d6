/**
 * Edge Collection
 *
 * Ordered list of edges plus a multi-key index over it:
 * - from / to endpoint
 * - either endpoint
 * - unordered endpoint pair
 * - type label
 * - id
 *
 * Index buckets hold positions in the list. Deletions rebuild the index from
 * the surviving edges, which keep their ids. Ids are never reissued: the
 * ledger of issued ids is never pruned.
 */

import { EdgeIdConflictError } from '../errors'
import type { Edge, Entity, VertexType } from '../model'
import { silentLogger, type Logger } from '../utils'
import { indexKey } from './keys'
import type { EdgeCollectionOptions, EdgeQuery } from './types'

export class EdgeCollection implements Iterable<Edge> {
  /** Strict undirected dedup policy, see EdgeCollectionOptions */
  sumhashSensitive: boolean

  /** All edges in insertion order */
  private list: Edge[] = []

  /** Index key -> positions in `list` */
  private index = new Map<string, number[]>()

  /** Every id ever issued or registered, in order */
  private readonly idLedger: number[] = []

  /** Highest id in the ledger */
  private highestId = -1

  private readonly logger: Logger

  constructor(edges: Iterable<Edge> = [], options: EdgeCollectionOptions = {}) {
    this.sumhashSensitive = options.sumhashSensitive ?? false
    this.logger = options.logger ?? silentLogger
    this.add(...edges)
  }

  // ===========================================================================
  // INSERTION
  // ===========================================================================

  /**
   * Add edges in order. Edges without an id get the next unused one.
   * An edge equal to a stored one is skipped.
   * @returns the full edge list after insertion
   * @throws EdgeIdConflictError when an explicit id is held by another edge
   */
  add(...edges: Edge[]): readonly Edge[] {
    for (const candidate of edges) {
      this.insert(candidate)
    }
    return this.edges
  }

  /**
   * Id the next edge without one will receive.
   */
  nextId(): number {
    return this.highestId + 1
  }

  private insert(candidate: Edge): boolean {
    if (this.findEqual(candidate) !== undefined) {
      this.logger.debug('Skipping duplicate edge', { edge: candidate.toString() })
      return false
    }
    if (this.sumhashSensitive && !candidate.directed && this.bucket(indexKey.pair(candidate.pairKey)).length > 0) {
      this.logger.debug('Skipping edge between already linked entities', { edge: candidate.toString() })
      return false
    }
    if (candidate.id !== undefined && this.bucket(indexKey.id(candidate.id)).length > 0) {
      throw new EdgeIdConflictError(candidate.id)
    }

    const id = candidate.id ?? this.nextId()
    const edge = candidate.id === id ? candidate : candidate.withId(id)
    this.recordId(id)
    this.list.push(edge)
    this.register(edge, this.list.length - 1)
    return true
  }

  private findEqual(edge: Edge): Edge | undefined {
    for (const position of this.bucket(indexKey.match(edge.matchKey))) {
      const stored = this.list[position]
      if (stored?.equals(edge)) return stored
    }
    return undefined
  }

  private recordId(id: number): void {
    this.idLedger.push(id)
    if (id > this.highestId) this.highestId = id
  }

  private register(edge: Edge, position: number): void {
    const keys = new Set<string>([
      indexKey.from(edge.from),
      indexKey.to(edge.to),
      indexKey.endpoint(edge.from),
      indexKey.endpoint(edge.to),
      indexKey.pair(edge.pairKey),
      indexKey.match(edge.matchKey),
    ])
    if (edge.type !== undefined) keys.add(indexKey.type(edge.type))
    if (edge.id !== undefined) keys.add(indexKey.id(edge.id))

    for (const key of keys) {
      const positions = this.index.get(key)
      if (positions) {
        positions.push(position)
      } else {
        this.index.set(key, [position])
      }
    }
  }

  private bucket(key: string): readonly number[] {
    return this.index.get(key) ?? []
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Edges matching every supplied attribute. An empty query matches nothing.
   */
  getForAttrs(query: EdgeQuery): Edge[] {
    return this.positionsFor(query).map((position) => this.at(position))
  }

  /**
   * Get an edge by id.
   */
  fetch(id: number): Edge | undefined {
    const [position] = this.bucket(indexKey.id(id))
    return position === undefined ? undefined : this.list[position]
  }

  /**
   * Vertex type -> endpoints of every edge, both sides, in edge order.
   * Vertex types are grouped by id; the key is the first instance seen.
   */
  get edgesByVertex(): Map<VertexType, Entity[]> {
    const byId = new Map<string, Entity[]>()
    const byVertex = new Map<VertexType, Entity[]>()
    const append = (entity: Entity) => {
      const entities = byId.get(entity.vertexTypeId)
      if (entities) {
        entities.push(entity)
      } else {
        const created = [entity]
        byId.set(entity.vertexTypeId, created)
        byVertex.set(entity.vertexType, created)
      }
    }
    for (const edge of this.list) {
      append(edge.from)
      append(edge.to)
    }
    return byVertex
  }

  /**
   * Snapshot of the stored edges in insertion order.
   */
  get edges(): readonly Edge[] {
    return this.list.slice()
  }

  get size(): number {
    return this.list.length
  }

  /**
   * Every id ever issued, including those of deleted edges.
   */
  get issuedIds(): readonly number[] {
    return this.idLedger.slice()
  }

  private positionsFor(query: EdgeQuery): number[] {
    const buckets: Array<readonly number[]> = []
    if (query.from) buckets.push(this.bucket(indexKey.from(query.from)))
    if (query.to) buckets.push(this.bucket(indexKey.to(query.to)))
    if (query.endpoint) buckets.push(this.bucket(indexKey.endpoint(query.endpoint)))
    if (query.type) buckets.push(this.bucket(indexKey.type(query.type)))

    const [first, ...rest] = buckets
    if (!first) return []

    let intersection = new Set(first)
    for (const bucket of rest) {
      const next = new Set(bucket)
      intersection = new Set(Array.from(intersection).filter((position) => next.has(position)))
    }
    return Array.from(intersection).sort((a, b) => a - b)
  }

  private at(position: number): Edge {
    const edge = this.list[position]
    if (!edge) {
      throw new Error(`Edge index out of sync at position ${position}`)
    }
    return edge
  }

  // ===========================================================================
  // DELETION
  // ===========================================================================

  /**
   * Remove the edges matching every supplied attribute.
   * @returns number of edges removed
   */
  deleteByAttrs(query: EdgeQuery): number {
    return this.removePositions(this.positionsFor(query))
  }

  /**
   * Remove edges by id. Unknown ids are ignored.
   * @returns number of edges removed
   */
  deleteById(...ids: number[]): number {
    return this.removePositions(ids.flatMap((id) => this.bucket(indexKey.id(id))))
  }

  /**
   * Remove edges whose `from` and `to` are the same entity.
   */
  deleteSelfRef(): number {
    const positions: number[] = []
    this.list.forEach((edge, position) => {
      if (edge.selfReferencing) positions.push(position)
    })
    return this.removePositions(positions)
  }

  /**
   * Remove every edge. Issued ids stay in the ledger.
   */
  clear(): void {
    this.list = []
    this.index = new Map()
  }

  private removePositions(positions: Iterable<number>): number {
    const doomed = new Set(positions)
    if (doomed.size === 0) return 0

    const survivors = this.list.filter((_, position) => !doomed.has(position))
    const removed = this.list.length - survivors.length

    // Rebuild the index from scratch; survivors keep their ids.
    this.clear()
    for (const edge of survivors) {
      this.list.push(edge)
      this.register(edge, this.list.length - 1)
    }

    this.logger.debug('Removed edges', { removed, remaining: this.list.length })
    return removed
  }

  // ===========================================================================
  // ITERATION
  // ===========================================================================

  [Symbol.iterator](): Iterator<Edge> {
    return this.list.slice()[Symbol.iterator]()
  }
}
