/**
 * MCP Server Error Handling
 *
 * Every failure reaching a tool handler becomes an MCPError with a category
 * and a recovery hint naming the tool to call next.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // File system errors
  | 'PATH_NOT_FOUND'

  // Document errors
  | 'DOCUMENT_NOT_FOUND'
  | 'DOCUMENT_BUSY'

  // Pipeline errors
  | 'EXTRACTION_FAILED'
  | 'EMBEDDING_FAILED'
  | 'INDEX_UNAVAILABLE'
  | 'INDEX_ERROR'
  | 'PROVIDER_ERROR'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default category per error class name
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',

  ExtractionError: 'EXTRACTION_FAILED',
  EmbeddingError: 'EMBEDDING_FAILED',

  IndexUnavailableError: 'INDEX_UNAVAILABLE',
  VectorIndexError: 'INDEX_ERROR',
  DatabaseError: 'INDEX_ERROR',

  ProviderError: 'PROVIDER_ERROR',
  CircuitBreakerOpenError: 'PROVIDER_ERROR',

  ConfigurationError: 'CONFIGURATION_ERROR',

  DocumentStoreError: 'INTERNAL_ERROR',
  IngestionError: 'INTERNAL_ERROR',
};

/**
 * Categories for specific `name:code` pairs, checked before the name map
 */
const ERROR_CODE_TO_CATEGORY: Record<string, ErrorCategory> = {
  'DocumentStoreError:DOCUMENT_NOT_FOUND': 'DOCUMENT_NOT_FOUND',
  'DocumentStoreError:INVALID_TRANSITION': 'DOCUMENT_BUSY',
  'IngestionError:JOB_ALREADY_RUNNING': 'DOCUMENT_BUSY',
  'IngestionError:INVALID_REQUEST': 'VALIDATION_ERROR',
  'IngestionError:UNSUPPORTED_FILE_TYPE': 'VALIDATION_ERROR',
  'IngestionError:FILE_TOO_LARGE': 'VALIDATION_ERROR',
  'IngestionError:INGESTION_TIMEOUT': 'EXTRACTION_FAILED',
};

/** Node file system codes meaning the path is missing or unreadable */
const PATH_ERROR_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'EACCES']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;
    Error.captureStackTrace?.(this, MCPError);
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const code = errorCode(error);
      const category =
        (code !== undefined ? ERROR_CODE_TO_CATEGORY[`${error.name}:${code}`] : undefined) ??
        (code !== undefined && PATH_ERROR_CODES.has(code) ? 'PATH_NOT_FOUND' : undefined) ??
        ERROR_NAME_TO_CATEGORY[error.name] ??
        defaultCategory;

      const customDetails = 'details' in error && isRecord(error.details) ? error.details : undefined;
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        ...(customDetails && { errorDetails: customDetails }),
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'manual_document_list', hint: 'Check parameter types and required fields' },
  PATH_NOT_FOUND: { tool: 'manual_ingest', hint: 'Verify the file path exists and is readable' },
  DOCUMENT_NOT_FOUND: {
    tool: 'manual_document_list',
    hint: 'Use manual_document_list to browse available documents',
  },
  DOCUMENT_BUSY: {
    tool: 'manual_document_get',
    hint: 'Wait until manual_document_get reports INDEXED or FAILED, then retry',
  },
  EXTRACTION_FAILED: {
    tool: 'manual_ingest',
    hint: 'Check that the file is a readable, unencrypted PDF or UTF-8 text file',
  },
  EMBEDDING_FAILED: {
    tool: 'manual_document_get',
    hint: 'Check the Python embedding worker (sentence-transformers) and EMBEDDING_MODEL',
  },
  INDEX_UNAVAILABLE: { tool: 'manual_query', hint: 'The vector index is busy or closed; retry shortly' },
  INDEX_ERROR: { tool: 'manual_document_list', hint: 'Check VECTOR_DB_PATH and the sqlite-vec installation' },
  PROVIDER_ERROR: {
    tool: 'manual_query',
    hint: 'Check LLM_PROVIDER settings (Ollama running, or GEMINI_API_KEY) and retry',
  },
  CONFIGURATION_ERROR: {
    tool: 'manual_device_list',
    hint: 'Check environment variable configuration (see .env.example)',
  },
  INTERNAL_ERROR: { tool: 'manual_document_list', hint: 'Inspect server logs on stderr for details' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
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
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
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

export function documentNotFoundError(documentId: string): MCPError {
  return new MCPError(
    'DOCUMENT_NOT_FOUND',
    `Document not found: ${documentId}. Use manual_document_list to browse available documents.`,
    { documentId }
  );
}

export function deviceNotFoundError(deviceType: string): MCPError {
  return new MCPError(
    'DOCUMENT_NOT_FOUND',
    `No manuals indexed for device type "${deviceType}". Use manual_device_list to see known devices.`,
    { deviceType }
  );
}

export function pathNotFoundError(filePath: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${filePath}`, { path: filePath });
}
