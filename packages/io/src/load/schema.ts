/**
 * Input Row Schema
 *
 * Columns of the mapping CSV. Only `entity` and `vertex_id` are required.
 */

import { z } from 'zod'

export const REQUIRED_COLUMNS = ['entity', 'vertex_id'] as const

const TRUTHY = new Set(['true', '1', 'yes', 'y'])

/**
 * Parse a CSV flag cell: `true`, `1`, `yes` or `y` (any case) are true.
 */
export function parseFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase())
}

const optionalCell = z
  .string()
  .optional()
  .transform((value) => value || undefined)

const flagCell = z.string().optional().transform(parseFlag)

export const mappingRowSchema = z.object({
  entity: z.string(),
  vertex_id: z.string(),
  vertex_name: optionalCell,
  vertex_central: flagCell,
  entity2: optionalCell,
  vertex_id2: optionalCell,
  vertex_name2: optionalCell,
  edge_type: optionalCell,
  directed: flagCell,
})

export type MappingRow = z.infer<typeof mappingRowSchema>
