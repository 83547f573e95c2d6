/**
 * Export Writer
 *
 * Writes the DOT and CSV renderings of a graph next to each other, named
 * after the graph uid.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { silentLogger, type Graph, type Logger, type VertexType } from '@vertexmap/core'
import { renderCsv } from './csv'
import { renderDot } from './dot'

export interface WriteOptions {
  /** Output directory, created when missing. Default `out` */
  outDir?: string
  /** Central vertex type for the CSV; defaults to the graph's */
  central?: VertexType
  logger?: Logger
}

export interface WrittenFiles {
  dot: string
  csv: string
}

export async function writeGraph(graph: Graph, options: WriteOptions = {}): Promise<WrittenFiles> {
  const outDir = options.outDir ?? 'out'
  const logger = options.logger ?? silentLogger

  await mkdir(outDir, { recursive: true })

  const files: WrittenFiles = {
    dot: join(outDir, `${graph.uid}-graph-mapping.gv`),
    csv: join(outDir, `${graph.uid}-all_entities.gv.csv`),
  }

  await writeFile(files.dot, renderDot(graph), 'utf8')
  logger.info('Wrote graph', { path: files.dot })

  await writeFile(files.csv, renderCsv(graph, options.central ?? graph.centralVertexType), 'utf8')
  logger.info('Wrote entity listing', { path: files.csv })

  return files
}
