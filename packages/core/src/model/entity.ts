/**
 * Entity
 *
 * A single named value belonging to exactly one vertex type.
 */

import { InvalidEntityError } from '../errors'
import type { VertexType } from './vertex-type'

/**
 * Identity key of an entity: unambiguous encoding of (vertexTypeId, value).
 */
export function identityOf(vertexTypeId: string, value: string): string {
  return JSON.stringify([vertexTypeId, value])
}

export class Entity {
  /** Identity key used by every index */
  readonly identity: string

  constructor(
    readonly vertexType: VertexType,
    readonly value: string,
  ) {
    if (!vertexType.has(value)) {
      throw new InvalidEntityError(
        `Vertex type '${vertexType.id}' does not have entity '${value}'`,
        value,
        vertexType.id,
      )
    }
    this.identity = identityOf(vertexType.id, value)
  }

  /** Id of the owning vertex type */
  get vertexTypeId(): string {
    return this.vertexType.id
  }

  /**
   * Human-readable key: `value.vertexTypeId`.
   */
  get key(): string {
    return `${this.value}.${this.vertexType.id}`
  }

  equals(other: Entity | null | undefined): boolean {
    return other != null && other.identity === this.identity
  }

  toString(): string {
    return this.value
  }
}
