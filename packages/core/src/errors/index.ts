/**
 * Errors Module
 */

export {
  GraphError,
  InvalidEntityError,
  MissingEndpointError,
  HeterogeneousGroupError,
  EdgeIdConflictError,
  ValidationError,
} from './errors'
