/**
 * MCP Server Error Handling
 *
 * Structured errors for tool handlers and the graph engine. Lookups that
 * miss are not errors: they degrade to empty results inside the services.
 * What remains here is malformed input, integrity violations and state
 * preconditions.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Graph state errors
  | 'GRAPH_NOT_LOADED'
  | 'NODE_TYPE_CONFLICT'
  | 'REFERENTIAL_INTEGRITY'

  // Persistence errors
  | 'PERSISTENCE_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for tool and engine failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const category: ErrorCategory =
        error.name === 'ValidationError' ? 'VALIDATION_ERROR' : defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function graphNotLoadedError(): MCPError {
  return new MCPError(
    'GRAPH_NOT_LOADED',
    'No knowledge graph is open. Start the server with a database path or call openGraph first.'
  );
}

/**
 * Raised when an upsert would change the type of an existing node
 */
export function nodeTypeConflictError(
  nodeId: string,
  existingType: string,
  requestedType: string
): MCPError {
  return new MCPError(
    'NODE_TYPE_CONFLICT',
    `Node "${nodeId}" already exists with type "${existingType}", refusing upsert as "${requestedType}"`,
    { nodeId, existingType, requestedType }
  );
}

export function referentialIntegrityError(
  sourceId: string,
  targetId: string,
  missing: string[]
): MCPError {
  return new MCPError(
    'REFERENTIAL_INTEGRITY',
    `Edge ${sourceId} -> ${targetId} references unknown node(s): ${missing.join(', ')}`,
    { sourceId, targetId, missing }
  );
}

export function persistenceError(operation: string, cause: unknown): MCPError {
  return new MCPError(
    'PERSISTENCE_ERROR',
    `Persistence ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    { operation }
  );
}
