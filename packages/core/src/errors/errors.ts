/**
 * Custom Error Classes
 */

/**
 * Base error for everything raised by the graph core.
 */
export class GraphError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'GraphError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Invalid entity error.
 * Thrown for an empty entity value, or for an entity whose value is not
 * held by the vertex type it claims.
 */
export class InvalidEntityError extends GraphError {
  constructor(
    message: string,
    public readonly value?: string | null,
    public readonly vertexTypeId?: string,
  ) {
    super(message)
    this.name = 'InvalidEntityError'
  }
}

/**
 * Missing endpoint error.
 * Thrown when an edge is built without both endpoints.
 */
export class MissingEndpointError extends GraphError {
  constructor(public readonly missing: 'from' | 'to' | 'both') {
    super(`Edge requires both endpoints (missing: ${missing})`)
    this.name = 'MissingEndpointError'
  }
}

/**
 * Heterogeneous group error.
 * Thrown when a bulk-link group mixes entities of several vertex types.
 */
export class HeterogeneousGroupError extends GraphError {
  constructor(public readonly vertexTypeIds: string[]) {
    super(`Group must contain a single vertex type, got: ${vertexTypeIds.join(', ')}`)
    this.name = 'HeterogeneousGroupError'
  }
}

/**
 * Edge id conflict error.
 * Thrown when an edge arrives with an explicit id already held by a different stored edge.
 */
export class EdgeIdConflictError extends GraphError {
  constructor(public readonly edgeId: number) {
    super(`Edge id already in use: ${edgeId}`)
    this.name = 'EdgeIdConflictError'
  }
}

/**
 * Validation error.
 * Thrown when options or input records don't match their schema.
 */
export class ValidationError extends GraphError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly expected?: string,
    public readonly received?: unknown,
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}
