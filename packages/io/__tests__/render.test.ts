/**
 * Tests for the DOT and CSV renderers and the export writer
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { VertexType, createGraph, sequentialIdGenerator, type Graph } from '@vertexmap/core'
import { loadGraph, quoteDot, renderCsv, renderDot, writeGraph } from '../src'
import { recordingLogger } from './fixtures/mapping'

function sampleGraph(): Graph {
  const city = new VertexType({ id: 'city', name: 'City', central: true })
  const person = new VertexType({ id: 'person', name: 'Person' })
  const nyc = city.add('NYC')
  const la = city.add('LA')
  const alice = person.add('Alice')
  person.add('Bob')

  const graph = createGraph({ vertexTypes: [city, person], idGenerator: sequentialIdGenerator() })
  graph.addEdgesCentral([[alice], [nyc]], city, { type: 'lives-in' })
  graph.addEdgesDirected([alice], [la])
  return graph
}

describe('renderDot', () => {
  it('renders vertex types, linked entities and edges', () => {
    expect(renderDot(sampleGraph()).split('\n')).toEqual([
      'graph "Graph" {',
      '  "city" [label="CITY", color="dodgerblue", fontcolor="dodgerblue3"];',
      '  "person" [label="PERSON", color="dodgerblue", fontcolor="dodgerblue3"];',
      '  "Alice.person" [label="Alice", color="gray28", fontcolor="gray14"];',
      '  "person" -- "Alice.person" [color="dodgerblue"];',
      '  "NYC.city" [label="NYC", color="gray28", fontcolor="gray14"];',
      '  "city" -- "NYC.city" [color="dodgerblue"];',
      '  "Alice.person" -- "NYC.city" [label="lives-in", r_id="0", dir="none", color="gray", fontcolor="gray"];',
      '  "LA.city" [label="LA", color="gray28", fontcolor="gray14"];',
      '  "city" -- "LA.city" [color="dodgerblue"];',
      '  "Alice.person" -- "LA.city" [r_id="1", dir="forward", color="gray", fontcolor="gray"];',
      '}',
      '',
    ])
  })

  it('takes a graph name', () => {
    expect(renderDot(createGraph(), { name: 'mapping' })).toBe('graph "mapping" {\n}\n')
  })

  it('escapes quotes and backslashes', () => {
    expect(quoteDot('say "hi" \\')).toBe('"say \\"hi\\" \\\\"')
  })
})

describe('renderCsv', () => {
  it('lists entities then edges', () => {
    expect(renderCsv(sampleGraph())).toBe(
      [
        'entity,vertex_name,vertex_id,vertex_central,edge_type,directed,entity2,vertex_name2,vertex_id2',
        'NYC,City,city,true,,,,,',
        'LA,City,city,true,,,,,',
        'Alice,Person,person,false,,,,,',
        'Bob,Person,person,false,,,,,',
        'Alice,Person,person,false,lives-in,false,NYC,City,city',
        'Alice,Person,person,false,,true,LA,City,city',
        '',
      ].join('\n'),
    )
  })

  it('marks central entities against an explicit central type', () => {
    const graph = sampleGraph()
    const lines = renderCsv(graph, graph.vertexType('person')).split('\n')

    expect(lines[1]).toBe('NYC,City,city,false,,,,,')
    expect(lines[3]).toBe('Alice,Person,person,true,,,,,')
  })

  it('loads back into an equivalent graph', () => {
    const graph = sampleGraph()
    const { graph: loaded, central } = loadGraph(renderCsv(graph))

    expect(central?.id).toBe('city')
    expect(loaded.vertexTypes.map((vt) => vt.toString())).toEqual(['City (city)', 'Person (person)'])
    expect(loaded.vertexType('person')?.entities.map((e) => e.value)).toEqual(['Alice', 'Bob'])
    expect(loaded.edges.edges.map((edge) => edge.toString())).toEqual(graph.edges.edges.map((edge) => edge.toString()))
  })
})

describe('writeGraph', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vertexmap-write-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes both renderings named after the graph uid', async () => {
    const graph = sampleGraph()
    const { logger, entries } = recordingLogger()
    const outDir = join(dir, 'nested', 'out')

    const files = await writeGraph(graph, { outDir, logger })

    expect(files).toEqual({
      dot: join(outDir, 'm-1-graph-mapping.gv'),
      csv: join(outDir, 'm-1-all_entities.gv.csv'),
    })
    expect(await readFile(files.dot, 'utf8')).toBe(renderDot(graph))
    expect(await readFile(files.csv, 'utf8')).toBe(renderCsv(graph))
    expect(entries).toEqual([
      { level: 'info', message: 'Wrote graph', data: { path: files.dot } },
      { level: 'info', message: 'Wrote entity listing', data: { path: files.csv } },
    ])
  })
})
