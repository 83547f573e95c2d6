/**
 * Edge
 *
 * Relation between two entities, optionally typed and optionally directed.
 *
 * Equality:
 * - undirected: same type and the same unordered pair of endpoints
 * - directed: same type, same `from`, same `to`
 * When only one of the two edges is directed, the undirected rule applies so
 * that equality stays symmetric.
 */

import { MissingEndpointError } from '../errors'
import type { Entity } from './entity'

/**
 * Optional edge attributes.
 */
export interface EdgeInit {
  /** Stable handle; assigned by the collection when absent */
  id?: number
  /** Type label; empty strings count as no type */
  type?: string | null
  /** Default false */
  directed?: boolean
}

/**
 * Direction-independent key for a pair of entities.
 */
export function pairKey(a: Entity, b: Entity): string {
  const [first, second] = a.identity <= b.identity ? [a, b] : [b, a]
  return JSON.stringify([first.identity, second.identity])
}

export class Edge {
  readonly from: Entity
  readonly to: Entity
  readonly id: number | undefined
  readonly type: string | undefined
  readonly directed: boolean

  constructor(from: Entity | null | undefined, to: Entity | null | undefined, init: EdgeInit = {}) {
    if (!from || !to) {
      throw new MissingEndpointError(!from && !to ? 'both' : !from ? 'from' : 'to')
    }
    this.from = from
    this.to = to
    this.id = init.id
    this.type = init.type || undefined
    this.directed = init.directed ?? false
  }

  /**
   * Symmetric pair key of the endpoints.
   */
  get pairKey(): string {
    return pairKey(this.from, this.to)
  }

  /**
   * Key shared by every edge this one can be equal to (type + endpoint pair).
   */
  get matchKey(): string {
    return JSON.stringify([this.type ?? null, this.pairKey])
  }

  get selfReferencing(): boolean {
    return this.from.equals(this.to)
  }

  /**
   * Copy of this edge carrying the given id.
   */
  withId(id: number): Edge {
    return new Edge(this.from, this.to, { id, type: this.type, directed: this.directed })
  }

  equals(other: Edge | null | undefined): boolean {
    if (!other) return false
    if (this.type !== other.type) return false
    if (!this.directed || !other.directed) {
      return this.pairKey === other.pairKey
    }
    return this.from.equals(other.from) && this.to.equals(other.to)
  }

  toString(): string {
    let arrow = this.type !== undefined ? `--.${this.type}.--` : '---'
    if (this.directed) arrow += '>>'
    const body = `[${this.from.key}] ${arrow} [${this.to.key}]`
    return this.id !== undefined ? `(${this.id}) ${body}` : body
  }
}
