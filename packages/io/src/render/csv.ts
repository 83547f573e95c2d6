/**
 * CSV Renderer
 *
 * One row per entity of every vertex type, followed by one row per edge
 * touching those entities. The columns are the loader's, so the output loads
 * back into an equivalent graph.
 */

import type { Edge, Graph, VertexType } from '@vertexmap/core'
import { formatCsvRow } from '../csv'

export const EXPORT_COLUMNS = [
  'entity',
  'vertex_name',
  'vertex_id',
  'vertex_central',
  'edge_type',
  'directed',
  'entity2',
  'vertex_name2',
  'vertex_id2',
] as const

/**
 * Render the entity and edge listing of a graph.
 * `vertex_central` on an edge row tells whether its `from` side is central.
 */
export function renderCsv(graph: Graph, central: VertexType | undefined = graph.centralVertexType): string {
  const isCentral = (vertexType: VertexType) => central?.equals(vertexType) ?? false
  const lines: string[] = [EXPORT_COLUMNS.join(',')]
  const edges = new Map<number, Edge>()

  for (const vertexType of graph.vertexTypes) {
    for (const entity of vertexType.entities) {
      for (const edge of graph.getEdges({ endpoint: entity })) {
        if (edge.id !== undefined) edges.set(edge.id, edge)
      }
      lines.push(formatCsvRow([entity.value, vertexType.name, vertexType.id, isCentral(vertexType), '', '', '', '', '']))
    }
  }

  const ordered = Array.from(edges.values()).sort((a, b) => (a.id ?? 0) - (b.id ?? 0))
  for (const edge of ordered) {
    const { from, to } = edge
    lines.push(
      formatCsvRow([
        from.value,
        from.vertexType.name,
        from.vertexTypeId,
        isCentral(from.vertexType),
        edge.type ?? '',
        edge.directed,
        to.value,
        to.vertexType.name,
        to.vertexTypeId,
      ]),
    )
  }

  return `${lines.join('\n')}\n`
}
