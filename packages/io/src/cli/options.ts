/**
 * CLI Option Schemas
 *
 * Commander hands actions untyped option bags; every command validates its
 * own before touching the graph.
 */

import { z } from 'zod'
import { ValidationError, type Entity, type Graph } from '@vertexmap/core'

/** `<vertexTypeId>=<value>[,<value>...]` */
export const groupSpecSchema = z
  .string()
  .regex(/^[^=]+=.+$/, 'Expected <vertexTypeId>=<value>[,<value>...]')
  .transform((spec) => {
    const separator = spec.indexOf('=')
    return {
      vertexTypeId: spec.slice(0, separator),
      values: spec
        .slice(separator + 1)
        .split(',')
        .filter((value) => value.length > 0),
    }
  })

export type GroupSpec = z.output<typeof groupSpecSchema>

export const linkOptionsSchema = z.object({
  group: z.array(groupSpecSchema).min(1, 'At least one --group is required'),
  type: z.string().min(1).optional(),
  central: z.boolean().default(false),
  directed: z.boolean().default(false),
  strict: z.boolean().default(false),
  out: z.string().min(1).default('out'),
})

export type LinkCommandOptions = z.output<typeof linkOptionsSchema>

export const unlinkOptionsSchema = z.object({
  id: z.array(z.coerce.number().int().nonnegative()).min(1, 'At least one --id is required'),
  out: z.string().min(1).default('out'),
})

export type UnlinkCommandOptions = z.output<typeof unlinkOptionsSchema>

/**
 * Validate an option bag.
 * @throws ValidationError with the first issue
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.errors[0]
    const field = issue?.path.join('.')
    throw new ValidationError(
      `Invalid option${field ? ` --${field}` : ''}: ${issue?.message ?? 'validation failed'}`,
      field,
    )
  }
  return result.data
}

/**
 * Resolve group specs against the graph's vertex types.
 * @throws ValidationError for an unknown vertex type or value
 */
export function resolveGroups(graph: Graph, specs: readonly GroupSpec[]): Entity[][] {
  return specs.map((spec) => {
    const vertexType = graph.vertexType(spec.vertexTypeId)
    if (!vertexType) {
      throw new ValidationError(`Unknown vertex type: ${spec.vertexTypeId}`, 'group', 'known vertex type id', spec.vertexTypeId)
    }
    return spec.values.map((value) => {
      const entity = vertexType.lookup(value)
      if (!entity) {
        throw new ValidationError(`Vertex type '${vertexType.id}' has no entity '${value}'`, 'group', 'known entity', value)
      }
      return entity
    })
  })
}
