/**
 * Graph
 *
 * Owns a list of vertex types and one edge collection, and exposes the
 * bulk-linking operations on top of them.
 */

import { Edge, type Entity, type VertexType } from '../model'
import { EdgeCollection, type EdgeQuery } from '../store'
import { defaultIdGenerator, silentLogger, type IdGenerator, type Logger } from '../utils'
import { allPairsCandidates, centralCandidates, crossEdges, type LinkOptions } from './linking'

/**
 * Configuration for a graph.
 */
export interface GraphConfig {
  /** Initial vertex types */
  vertexTypes?: VertexType[]
  /** Initial undirected, untyped edges */
  pairs?: Array<[Entity, Entity]>
  /** Pre-populated collection the graph takes ownership of */
  edges?: EdgeCollection
  /** Source of the graph uid (defaults to UUID) */
  idGenerator?: IdGenerator
  logger?: Logger
  /** Strict undirected dedup policy for a collection created here */
  sumhashSensitive?: boolean
}

export class Graph {
  readonly uid: string
  readonly edges: EdgeCollection

  private readonly types: VertexType[] = []
  private readonly logger: Logger

  constructor(config: GraphConfig = {}) {
    const idGenerator = config.idGenerator ?? defaultIdGenerator
    this.logger = config.logger ?? silentLogger
    this.uid = idGenerator.generate('m')
    this.edges =
      config.edges ??
      new EdgeCollection([], {
        sumhashSensitive: config.sumhashSensitive,
        logger: this.logger.child('edges'),
      })

    for (const vertexType of config.vertexTypes ?? []) {
      this.addVertexType(vertexType)
    }
    if (config.pairs) {
      this.edges.add(...config.pairs.map(([from, to]) => new Edge(from, to)))
    }
  }

  // ===========================================================================
  // VERTEX TYPES
  // ===========================================================================

  get vertexTypes(): readonly VertexType[] {
    return this.types.slice()
  }

  /**
   * Register a vertex type. A type with an already-registered id is ignored.
   */
  addVertexType(vertexType: VertexType): void {
    if (this.vertexType(vertexType.id)) return
    this.types.push(vertexType)
  }

  vertexType(id: string): VertexType | undefined {
    return this.types.find((vertexType) => vertexType.id === id)
  }

  /**
   * First vertex type flagged central.
   */
  get centralVertexType(): VertexType | undefined {
    return this.types.find((vertexType) => vertexType.central)
  }

  // ===========================================================================
  // BULK LINKING
  // ===========================================================================

  /**
   * Link every entity of each group to every entity of every other group.
   * The whole batch is built before anything is stored.
   */
  addEdges(groups: readonly (readonly Entity[])[], options: LinkOptions = {}): void {
    this.commit('addEdges', allPairsCandidates(groups, options))
  }

  /**
   * Link groups toward the central vertex type only: edges run from
   * non-central entities to central ones; pairs of groups where neither or
   * both sides are central are ignored.
   * @throws HeterogeneousGroupError before any edge is stored
   */
  addEdgesCentral(
    groups: readonly (readonly Entity[])[],
    central: VertexType,
    options: LinkOptions = {},
  ): void {
    this.commit('addEdgesCentral', centralCandidates(groups, central, options))
  }

  /**
   * Directed edges from every entity of `from` to every entity of `to`.
   */
  addEdgesDirected(from: readonly Entity[], to: readonly Entity[], options: LinkOptions = {}): void {
    this.commit('addEdgesDirected', crossEdges(from, to, { type: options.type, directed: true }))
  }

  removeEdge(...ids: number[]): void {
    this.edges.deleteById(...ids)
  }

  // ===========================================================================
  // DELEGATES
  // ===========================================================================

  getEdges(query: EdgeQuery): Edge[] {
    return this.edges.getForAttrs(query)
  }

  deleteEdges(query: EdgeQuery): number {
    return this.edges.deleteByAttrs(query)
  }

  deleteSelfReferences(): number {
    return this.edges.deleteSelfRef()
  }

  fetchEdge(id: number): Edge | undefined {
    return this.edges.fetch(id)
  }

  private commit(operation: string, candidates: Edge[]): void {
    const before = this.edges.size
    this.edges.add(...candidates)
    this.logger.debug(`${operation} stored edges`, {
      candidates: candidates.length,
      stored: this.edges.size - before,
    })
  }
}

/**
 * Create a graph.
 */
export function createGraph(config: GraphConfig = {}): Graph {
  return new Graph(config)
}
