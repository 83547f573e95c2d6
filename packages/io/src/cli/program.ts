/**
 * vertexmap CLI
 *
 * Commands:
 *   vertexmap inspect <file>   - List vertex types and edges of a mapping CSV
 *   vertexmap link <file>      - Link groups of entities and export the result
 *   vertexmap unlink <file>    - Remove edges by id and export the result
 */

import { Command } from 'commander'
import {
  ValidationError,
  createLogger,
  groupSelections,
  type Graph,
  type IdGenerator,
  type Logger,
} from '@vertexmap/core'
import { loadGraphFile } from '../load'
import { writeGraph, type WrittenFiles } from '../render'
import { linkOptionsSchema, parseOptions, resolveGroups, unlinkOptionsSchema } from './options'

export interface CliDeps {
  logger: Logger
  /** Plain output line */
  print: (line: string) => void
  idGenerator?: IdGenerator
}

const pkg = {
  name: 'vertexmap',
  version: '0.1.0',
  description: 'Map entities of typed vertex collections to each other',
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function describeGraph(graph: Graph): string[] {
  const lines = graph.vertexTypes.map(
    (vertexType) =>
      `${vertexType.toString()}${vertexType.central ? ' [central]' : ''}: ${vertexType.size} entities`,
  )
  lines.push(`edges: ${graph.edges.size}`)
  for (const edge of graph.edges) {
    lines.push(`  ${edge.toString()}`)
  }
  return lines
}

export function createProgram(
  deps: CliDeps = {
    logger: createLogger('vertexmap'),
    print: (line) => console.log(line),
  },
): Command {
  const { logger, print } = deps
  const load = (file: string, sumhashSensitive = false) =>
    loadGraphFile(file, { logger, idGenerator: deps.idGenerator, sumhashSensitive })
  const report = (files: WrittenFiles) => {
    print(`wrote ${files.dot}`)
    print(`wrote ${files.csv}`)
  }

  const program = new Command()
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'Show version number')
    .exitOverride()

  program
    .command('inspect')
    .description('List vertex types and edges of a mapping CSV')
    .argument('<file>', 'mapping CSV')
    .action(async (file: string) => {
      const { graph } = await load(file)
      describeGraph(graph).forEach((line) => print(line))
    })

  program
    .command('link')
    .description('Link groups of entities, then export the graph')
    .argument('<file>', 'mapping CSV')
    .option('-g, --group <spec>', 'group as <vertexTypeId>=<value>[,<value>...] (repeatable)', collect, [])
    .option('-t, --type <type>', 'edge type label')
    .option('--central', 'only link toward the central vertex type', false)
    .option('--directed', 'create directed edges from the first group to the second', false)
    .option('--strict', 'skip undirected edges between already linked entities', false)
    .option('-o, --out <dir>', 'output directory', 'out')
    .action(async (file: string, raw: unknown) => {
      const options = parseOptions(linkOptionsSchema, raw)
      const { graph, central } = await load(file, options.strict)
      const groups = groupSelections(resolveGroups(graph, options.group))
      const before = graph.edges.size

      if (options.directed) {
        const [from, to] = groups
        if (groups.length !== 2 || !from || !to) {
          throw new ValidationError('--directed needs exactly two non-empty groups', 'group')
        }
        graph.addEdgesDirected(from, to, { type: options.type })
      } else if (options.central) {
        const centralType = central ?? graph.centralVertexType
        if (!centralType) {
          throw new ValidationError('--central needs a central vertex type in the input', 'central')
        }
        graph.addEdgesCentral(groups, centralType, { type: options.type })
      } else {
        graph.addEdges(groups, { type: options.type })
      }

      print(`stored ${graph.edges.size - before} new edges`)
      report(await writeGraph(graph, { outDir: options.out, central, logger }))
    })

  program
    .command('unlink')
    .description('Remove edges by id, then export the graph')
    .argument('<file>', 'mapping CSV')
    .option('-i, --id <id>', 'edge id (repeatable)', collect, [])
    .option('-o, --out <dir>', 'output directory', 'out')
    .action(async (file: string, raw: unknown) => {
      const options = parseOptions(unlinkOptionsSchema, raw)
      const { graph, central } = await load(file)
      const before = graph.edges.size
      graph.removeEdge(...options.id)

      print(`removed ${before - graph.edges.size} edges`)
      report(await writeGraph(graph, { outDir: options.out, central, logger }))
    })

  return program
}
