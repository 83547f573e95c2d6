/**
 * ID Generation
 *
 * Vertex type ids and graph uids are drawn from an injected generator so
 * that tests can run against predictable values.
 */

import { randomUUID } from 'node:crypto'

/**
 * Custom ID generator interface.
 */
export interface IdGenerator {
  /** Generate a unique ID for the given prefix (e.g. "vtx", "m") */
  generate(prefix: string): string
}

/**
 * Default ID generator using randomUUID.
 */
export const defaultIdGenerator: IdGenerator = {
  generate: (prefix: string) => `${prefix}_${randomUUID()}`,
}

/**
 * Deterministic generator: `<prefix>-1`, `<prefix>-2`, ... counted per prefix.
 */
export function sequentialIdGenerator(): IdGenerator {
  const counters = new Map<string, number>()
  return {
    generate(prefix: string): string {
      const next = (counters.get(prefix) ?? 0) + 1
      counters.set(prefix, next)
      return `${prefix}-${next}`
    },
  }
}
