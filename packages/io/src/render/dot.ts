/**
 * DOT Renderer
 *
 * Renders a graph as an undirected Graphviz document: vertex types as
 * headline nodes, each linked entity attached to its vertex type, then one
 * DOT edge per stored edge.
 */

import type { Entity, Graph } from '@vertexmap/core'

export interface DotOptions {
  /** Graph name in the `graph "<name>" { ... }` header */
  name?: string
}

const VERTEX_TYPE_STYLE = { color: 'dodgerblue', fontcolor: 'dodgerblue3' }
const ENTITY_STYLE = { color: 'gray28', fontcolor: 'gray14' }
const EDGE_STYLE = { color: 'gray', fontcolor: 'gray' }

/**
 * Quote a DOT identifier or attribute value.
 */
export function quoteDot(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

function attributes(attrs: Record<string, string | undefined>): string {
  const parts = Object.entries(attrs)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${quoteDot(value)}`)
  return parts.length > 0 ? ` [${parts.join(', ')}]` : ''
}

export function renderDot(graph: Graph, options: DotOptions = {}): string {
  const lines: string[] = [`graph ${quoteDot(options.name ?? 'Graph')} {`]

  for (const vertexType of graph.vertexTypes) {
    lines.push(`  ${quoteDot(vertexType.id)}${attributes({ label: vertexType.name.toUpperCase(), ...VERTEX_TYPE_STYLE })};`)
  }

  const emitted = new Set<string>()
  const emitEntity = (entity: Entity) => {
    if (emitted.has(entity.identity)) return
    emitted.add(entity.identity)
    lines.push(`  ${quoteDot(entity.key)}${attributes({ label: entity.value, ...ENTITY_STYLE })};`)
    lines.push(`  ${quoteDot(entity.vertexTypeId)} -- ${quoteDot(entity.key)}${attributes({ color: 'dodgerblue' })};`)
  }

  for (const edge of graph.edges) {
    emitEntity(edge.from)
    emitEntity(edge.to)
    lines.push(
      `  ${quoteDot(edge.from.key)} -- ${quoteDot(edge.to.key)}${attributes({
        label: edge.type,
        r_id: edge.id === undefined ? undefined : String(edge.id),
        dir: edge.directed ? 'forward' : 'none',
        ...EDGE_STYLE,
      })};`,
    )
  }

  lines.push('}')
  return `${lines.join('\n')}\n`
}
