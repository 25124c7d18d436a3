/**
 * Error Classes for semantic-sort
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_TARGET_NOT_FOUND = "E1001",

  // Filesystem errors (2xxx)
  FS_SCAN_FAILED = "E2000",
  FS_NOT_A_DIRECTORY = "E2001",
  FS_MOVE_FAILED = "E2002",
  FS_DESTINATION_EXISTS = "E2003",
  FS_MKDIR_FAILED = "E2004",

  // Inference errors (3xxx)
  INFERENCE_CONNECTION_FAILED = "E3000",
  INFERENCE_TIMEOUT = "E3001",
  INFERENCE_HTTP_ERROR = "E3002",
  INFERENCE_INVALID_RESPONSE = "E3003",
  INFERENCE_EMPTY_RESPONSE = "E3004",
  INFERENCE_CANCELLED = "E3005",

  // Reconciliation errors (4xxx)
  RECONCILE_UNPARSEABLE = "E4000",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all semantic-sort errors
 */
export class SemanticSortError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SemanticSortError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid flags or unusable target directory. Always fatal.
 */
export class ConfigurationError extends SemanticSortError {
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.issues = context?.issues ?? [];
  }
}

/**
 * Filesystem errors (scan, mkdir, move)
 */
export class FileSystemError extends SemanticSortError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.FS_SCAN_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "FileSystemError";
    this.filePath = context?.filePath;
  }

  override toString(): string {
    const location = this.filePath ? ` (${this.filePath})` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Errors talking to the inference endpoint
 */
export class InferenceError extends SemanticSortError {
  public readonly batchId?: string;
  public readonly status?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INFERENCE_CONNECTION_FAILED,
    context?: Record<string, unknown> & { batchId?: string; status?: number }
  ) {
    super(message, code, context);
    this.name = "InferenceError";
    this.batchId = context?.batchId;
    this.status = context?.status;
  }
}

/**
 * Completion text that could not be turned into classification records
 */
export class ReconciliationError extends SemanticSortError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RECONCILE_UNPARSEABLE,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ReconciliationError";
  }
}

/**
 * Check if an error is a SemanticSortError
 */
export function isSemanticSortError(error: unknown): error is SemanticSortError {
  return error instanceof SemanticSortError;
}

/**
 * Wrap an unknown error in a SemanticSortError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): SemanticSortError {
  if (isSemanticSortError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SemanticSortError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new SemanticSortError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}

/**
 * Extract a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
