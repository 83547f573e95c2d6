/**
 * Edge Store Types
 */

import type { Entity } from '../model'
import type { Logger } from '../utils'

/**
 * Attribute filter for querying or deleting edges.
 * Supplied attributes are intersected; an empty query matches nothing.
 */
export interface EdgeQuery {
  /** Stored `from` endpoint */
  from?: Entity
  /** Stored `to` endpoint */
  to?: Entity
  /** Either endpoint */
  endpoint?: Entity
  /** Type label */
  type?: string
}

/**
 * Edge collection options.
 */
export interface EdgeCollectionOptions {
  /**
   * Reject an undirected edge when any stored edge already links the same
   * pair of entities, whatever its type. Default false.
   */
  sumhashSensitive?: boolean
  logger?: Logger
}
