/**
 * IO Error Types
 */

import { GraphError } from '@vertexmap/core'

/**
 * Error when input cannot be loaded into a graph.
 */
export class LoadError extends GraphError {
  constructor(
    message: string,
    /** 1-based data row number, when the problem is on a row */
    public readonly row?: number,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'LoadError'
  }
}
