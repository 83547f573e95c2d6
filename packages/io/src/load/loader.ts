/**
 * Graph Loader
 *
 * Builds vertex types, entities and edges from a mapping CSV. Each row names
 * an entity of a vertex type and, optionally, a second entity it is linked to.
 */

import { readFile } from 'node:fs/promises'
import {
  Edge,
  EdgeCollection,
  Graph,
  VertexType,
  defaultIdGenerator,
  silentLogger,
  type Entity,
  type IdGenerator,
  type Logger,
} from '@vertexmap/core'
import { parseCsv } from '../csv'
import { LoadError } from '../errors'
import { REQUIRED_COLUMNS, mappingRowSchema } from './schema'

/**
 * Options for loading a graph.
 */
export interface LoadOptions {
  /** Source of the graph uid */
  idGenerator?: IdGenerator
  logger?: Logger
  /** Strict undirected dedup policy for the loaded edges */
  sumhashSensitive?: boolean
}

export interface LoadResult {
  graph: Graph
  /** The vertex type designated central by the input, if any */
  central?: VertexType
}

/**
 * Load a graph from mapping CSV text.
 * @throws LoadError on missing headers or an empty entity value
 */
export function loadGraph(text: string, options: LoadOptions = {}): LoadResult {
  const logger = options.logger ?? silentLogger
  const { header, rows } = parseCsv(text)

  for (const column of REQUIRED_COLUMNS) {
    if (!header.includes(column)) {
      throw new LoadError(`Input CSV must have at least 'entity' and 'vertex_id' headers (missing '${column}')`)
    }
  }

  const vertexTypes = new Map<string, VertexType>()
  const ensureVertexType = (id: string, name?: string): VertexType => {
    const existing = vertexTypes.get(id)
    if (existing) return existing
    const created = new VertexType({ id, name })
    vertexTypes.set(id, created)
    return created
  }

  let centralId: string | undefined
  const edges: Edge[] = []

  rows.forEach((raw, i) => {
    const rowNumber = i + 1
    const parsed = mappingRowSchema.safeParse(raw)
    if (!parsed.success) {
      const issue = parsed.error.errors[0]
      throw new LoadError(`Invalid row ${rowNumber}: ${issue?.message ?? 'validation failed'}`, rowNumber)
    }
    const row = parsed.data

    if (!row.vertex_id) {
      logger.error('Empty vertex_id, skipping row', { row: rowNumber })
      return
    }
    if (centralId === undefined && (row.vertex_name === 'CENTRAL' || row.vertex_central)) {
      centralId = row.vertex_id
    }

    const entity = addEntity(ensureVertexType(row.vertex_id, row.vertex_name), row.entity, rowNumber)

    if (row.entity2 && row.vertex_id2) {
      const other = addEntity(ensureVertexType(row.vertex_id2, row.vertex_name2), row.entity2, rowNumber)
      edges.push(new Edge(entity, other, { type: row.edge_type, directed: row.directed }))
    }
  })

  // A vertex type may be created before the row that marks it central.
  if (centralId !== undefined) {
    for (const vertexType of vertexTypes.values()) {
      vertexType.central = vertexType.id === centralId
    }
  }

  const collection = new EdgeCollection(edges, {
    sumhashSensitive: options.sumhashSensitive,
    logger: logger.child('edges'),
  })
  const graph = new Graph({
    vertexTypes: Array.from(vertexTypes.values()),
    edges: collection,
    idGenerator: options.idGenerator ?? defaultIdGenerator,
    logger,
  })

  logger.info('Loaded graph', { vertexTypes: vertexTypes.size, edges: collection.size })
  return { graph, central: centralId === undefined ? undefined : vertexTypes.get(centralId) }
}

/**
 * Load a graph from a `.csv` file.
 * @throws LoadError for any other extension
 */
export async function loadGraphFile(path: string, options: LoadOptions = {}): Promise<LoadResult> {
  if (!path.endsWith('.csv')) {
    throw new LoadError(`Must input a CSV (text) filename; got '${path}'`)
  }
  const text = await readFile(path, 'utf8')
  return loadGraph(text, options)
}

function addEntity(vertexType: VertexType, value: string, rowNumber: number): Entity {
  try {
    return vertexType.add(value)
  } catch (error) {
    throw new LoadError(
      `Invalid entity on row ${rowNumber} for vertex type '${vertexType.id}'`,
      rowNumber,
      error instanceof Error ? error : undefined,
    )
  }
}
