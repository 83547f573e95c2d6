/**
 * Index Keys
 *
 * Every bucket of the edge index lives in one map; the prefix keeps the
 * attribute families apart.
 */

import type { Entity } from '../model'

export const indexKey = {
  /** Stored `from` endpoint */
  from: (entity: Entity): string => `from::${entity.identity}`,
  /** Stored `to` endpoint */
  to: (entity: Entity): string => `to::${entity.identity}`,
  /** Either endpoint */
  endpoint: (entity: Entity): string => `at::${entity.identity}`,
  /** Unordered endpoint pair */
  pair: (pairKey: string): string => `pair::${pairKey}`,
  /** Type label plus unordered endpoint pair (equality candidates) */
  match: (matchKey: string): string => `match::${matchKey}`,
  type: (type: string): string => `type::${type}`,
  id: (id: number): string => `id::${id}`,
}
