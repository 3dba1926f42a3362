/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Tool handlers convert them into structured responses with a recovery hint.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Storage errors
  | 'DATABASE_ERROR'
  | 'SUMMARY_NOT_FOUND'

  // Batch pipeline errors
  | 'LISTING_FAILED'
  | 'READ_FAILED'
  | 'DOCUMENT_NOT_FOUND'
  | 'SUMMARIZATION_FAILED'
  | 'SUMMARY_INVALID'
  | 'PERSISTENCE_FAILED'
  | 'RUN_CANCELLED'

  // Summarizer backend
  | 'SUMMARIZER_API_ERROR'

  // Remote collaborator transport
  | 'COLLABORATOR_ERROR'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PATH_NOT_DIRECTORY'
  | 'PATH_NOT_FILE'
  | 'PERMISSION_DENIED'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

/**
 * Recovery hint for AI agents to self-correct after errors.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

/**
 * Recovery hints for every error category.
 * Doubles as the runtime list of valid categories.
 */
const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'health_check', hint: 'Check parameter types and required fields' },
  DATABASE_ERROR: {
    tool: 'health_check',
    hint: 'Check DIRECTORY_SUMMARIZER_DB_PATH points to a writable location',
  },
  SUMMARY_NOT_FOUND: {
    tool: 'summary_list',
    hint: 'Use summary_list to browse stored summaries',
  },
  LISTING_FAILED: {
    tool: 'list_directory',
    hint: 'Verify the directory exists and is readable, then rerun the batch',
  },
  READ_FAILED: {
    tool: 'read_document_chunk',
    hint: 'Read the document directly to inspect the failure',
  },
  DOCUMENT_NOT_FOUND: {
    tool: 'list_directory',
    hint: 'The document disappeared after listing; list the directory again',
  },
  SUMMARIZATION_FAILED: {
    tool: 'health_check',
    hint: 'Check OLLAMA_BASE_URL and that OLLAMA_MODEL is pulled',
  },
  SUMMARY_INVALID: {
    tool: 'save_summary_to_db',
    hint: 'Fix the listed fields; completed records need domain and key_arguments, failed records need failure_reason only',
  },
  PERSISTENCE_FAILED: {
    tool: 'health_check',
    hint: 'Check database connectivity; unresolved documents must be summarized again',
  },
  RUN_CANCELLED: {
    tool: 'summarize_directory',
    hint: 'Rerun the batch; documents without a stored summary are processed again',
  },
  SUMMARIZER_API_ERROR: {
    tool: 'health_check',
    hint: 'Check that the Ollama server is running and reachable',
  },
  COLLABORATOR_ERROR: {
    tool: 'health_check',
    hint: 'Check the remote MCP server is running and exposes the collaborator tools',
  },
  PATH_NOT_FOUND: { tool: 'list_directory', hint: 'Verify the path exists on the filesystem' },
  PATH_NOT_DIRECTORY: { tool: 'list_directory', hint: 'Provide a directory path, not a file path' },
  PATH_NOT_FILE: { tool: 'list_directory', hint: 'Provide a file path, not a directory path' },
  PERMISSION_DENIED: { tool: 'health_check', hint: 'Check filesystem permissions on the target path' },
  CONFIGURATION_ERROR: {
    tool: 'health_check',
    hint: 'Check environment variable configuration (DIRECTORY_SUMMARIZER_*, OLLAMA_*)',
  },
  INTERNAL_ERROR: { tool: 'health_check', hint: 'Run health_check for diagnostics' },
};

/**
 * Check if a string is a valid ErrorCategory
 */
export function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(RECOVERY_HINTS, value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 * Errors that carry their own `.category` (the batch errors) take precedence.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  SqliteError: 'DATABASE_ERROR',
  SummaryStoreError: 'DATABASE_ERROR',
  ListingError: 'LISTING_FAILED',
  ReadError: 'READ_FAILED',
  SummarizationError: 'SUMMARIZATION_FAILED',
  SummaryValidationError: 'SUMMARY_INVALID',
  PersistenceError: 'PERSISTENCE_FAILED',
  RunCancelledError: 'RUN_CANCELLED',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const ownCategory: unknown = Reflect.get(error, 'category');
      const category = isErrorCategory(ownCategory)
        ? ownCategory
        : (ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory);

      const ownDetails: unknown = Reflect.get(error, 'details');
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(isRecord(ownDetails) && { errorDetails: ownDetails }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export interface ErrorResponse {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
}

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): ErrorResponse {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
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

export function summaryNotFoundError(documentId: string): MCPError {
  return new MCPError(
    'SUMMARY_NOT_FOUND',
    `Summary not found: ${documentId}. Use summary_list to browse stored summaries.`,
    { documentId }
  );
}

export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, { path });
}

export function pathNotDirectoryError(path: string): MCPError {
  return new MCPError('PATH_NOT_DIRECTORY', `Path is not a directory: ${path}`, { path });
}

export function pathNotFileError(path: string): MCPError {
  return new MCPError('PATH_NOT_FILE', `Path is not a file: ${path}`, { path });
}

export function permissionDeniedError(path: string): MCPError {
  return new MCPError('PERMISSION_DENIED', `Permission denied: ${path}`, { path });
}
