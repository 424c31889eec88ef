/**
 * MCP Server Error Handling
 *
 * Core services throw typed errors; tool handlers convert them to MCPError
 * responses with a category and a recovery hint.
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

  // Store errors
  | 'SEARCH_BACKEND_ERROR'
  | 'DOCUMENT_NOT_FOUND'

  // Remote model errors
  | 'EMBEDDING_FAILED'
  | 'METADATA_EXTRACTION_FAILED'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories so clients can tell
 * a bad request from a store outage from an embedding failure.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  SearchBackendError: 'SEARCH_BACKEND_ERROR',
  ContractNotFoundError: 'DOCUMENT_NOT_FOUND',
  EmbeddingError: 'EMBEDDING_FAILED',
  MetadataExtractionError: 'METADATA_EXTRACTION_FAILED',
};

/**
 * Read the `code` and `details` diagnostic fields custom error classes carry
 */
function diagnosticFields(error: Error): { code?: string; details?: Record<string, unknown> } {
  const fields: { code?: string; details?: Record<string, unknown> } = {};
  if ('code' in error && typeof error.code === 'string') {
    fields.code = error.code;
  }
  if ('details' in error && isRecord(error.details)) {
    fields.details = error.details;
  }
  return fields;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

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
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const { code, details } = diagnosticFields(error);
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code !== undefined && { errorCode: code }),
        ...(details !== undefined && { errorDetails: details }),
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for agents to self-correct after errors
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: {
    tool: 'contract_search',
    hint: 'Check parameter ranges: top_k 1-50, weights 0-10, dates YYYY-MM-DD, min <= max',
  },
  SEARCH_BACKEND_ERROR: {
    tool: 'contract_health_check',
    hint: 'Check CONTRACT_DB_PATH and that the sqlite-vec extension loads on this platform',
  },
  DOCUMENT_NOT_FOUND: {
    tool: 'contract_document_list',
    hint: 'Use contract_document_list to see indexed contract names',
  },
  EMBEDDING_FAILED: {
    tool: 'contract_health_check',
    hint: 'Check EMBEDDING_API_URL, EMBEDDING_MODEL and that EMBEDDING_DIM matches the model',
  },
  METADATA_EXTRACTION_FAILED: {
    tool: 'contract_metadata_save',
    hint: 'Check LLM_API_URL and LLM_API_KEY, or save metadata manually with contract_metadata_save',
  },
  CONFIGURATION_ERROR: {
    tool: 'contract_health_check',
    hint: 'Check environment variables (see .env.example). Set CONTRACT_SEARCH_ENV_FILE to load a specific file.',
  },
  INTERNAL_ERROR: { tool: 'contract_health_check', hint: 'Run contract_health_check for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response.
 * The recovery field tells agents which tool to call next.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: getRecoveryHint(error.category),
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create document not found error
 */
export function documentNotFoundError(contractName: string): MCPError {
  return new MCPError(
    'DOCUMENT_NOT_FOUND',
    `Contract not found: ${contractName}. Use contract_document_list to browse indexed contracts.`,
    { contractName }
  );
}

/**
 * Create configuration error for missing environment variables or setup issues
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
