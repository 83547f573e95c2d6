/**
 * Vertex Type
 *
 * Named, deduplicated container of entities. Entity values are unique within
 * a vertex type; the set only grows.
 */

import { InvalidEntityError } from '../errors'
import { defaultIdGenerator, type IdGenerator } from '../utils'
import { Entity } from './entity'

/**
 * Construction options for a vertex type.
 */
export interface VertexTypeInit {
  /** Stable id; generated when absent */
  id?: string
  /** Display name; falls back to the id */
  name?: string
  /** Whether this is the central vertex type */
  central?: boolean
  /** Initial entity values (empty strings are ignored) */
  values?: string[]
}

export class VertexType implements Iterable<Entity> {
  readonly id: string
  readonly name: string
  /** External annotation; the loader and callers decide which type is central */
  central: boolean

  private readonly entitiesByValue = new Map<string, Entity>()
  private readonly values = new Set<string>()

  constructor(init: VertexTypeInit = {}, idGenerator: IdGenerator = defaultIdGenerator) {
    this.id = init.id || idGenerator.generate('vtx')
    this.name = init.name || this.id
    this.central = init.central ?? false
    for (const value of init.values ?? []) {
      if (value) this.add(value)
    }
  }

  /**
   * Add an entity value and return its Entity.
   * Re-adding an existing value maps a fresh Entity over it.
   * @throws InvalidEntityError for an empty value
   */
  add(value: string | null | undefined): Entity {
    if (!value) {
      throw new InvalidEntityError(
        `Cannot add an empty entity to vertex type '${this.id}'`,
        value,
        this.id,
      )
    }
    this.values.add(value)
    const entity = new Entity(this, value)
    this.entitiesByValue.set(value, entity)
    return entity
  }

  /**
   * Get an entity by value.
   */
  lookup(value: string): Entity | undefined {
    return this.entitiesByValue.get(value)
  }

  has(value: string): boolean {
    return this.values.has(value)
  }

  /**
   * Entities in insertion order.
   */
  get entities(): Entity[] {
    return Array.from(this.entitiesByValue.values())
  }

  get size(): number {
    return this.entitiesByValue.size
  }

  equals(other: VertexType | null | undefined): boolean {
    return other != null && other.id === this.id
  }

  [Symbol.iterator](): Iterator<Entity> {
    return this.entitiesByValue.values()
  }

  toString(): string {
    return `${this.name} (${this.id})`
  }
}
