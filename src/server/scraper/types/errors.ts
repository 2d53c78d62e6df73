// ============================================================================
// EXTRACTION ERROR TYPES
// ============================================================================
// Categorized errors for handling, retry and run-level reporting

/**
 * Categories of extraction errors with different handling strategies
 */
export enum EngineErrorType {
  /** Every locator strategy exhausted - usually an absent optional feature */
  NOT_FOUND = 'not_found',
  /** Element invalidated by a re-render - re-resolve, do not fail */
  STALE_HANDLE = 'stale_handle',
  /** A single row could not yield a usable record */
  EXTRACTION_SKIP = 'extraction_skip',
  /** Load loop hit its iteration budget or stagnated */
  CONVERGENCE_INCOMPLETE = 'convergence_incomplete',
  /** The page handle itself is unusable - aborts the run */
  FATAL_IO = 'fatal_io',
  /** A page operation exceeded its timeout */
  TIMEOUT = 'timeout',
  /** Invalid configuration or locator table */
  CONFIG = 'config',
  UNKNOWN = 'unknown',
}

/**
 * Structured error with metadata for handling decisions
 */
export interface EngineError {
  type: EngineErrorType;
  message: string;
  /** Whether this error type can be retried */
  retriable: boolean;
  /** Original error if wrapped */
  cause?: Error;
  /** Logical UI target being resolved (if applicable) */
  target?: string;
  /** Row position being extracted (if applicable) */
  rowIndex?: number;
  /** Page number where the error occurred */
  pageNumber?: number;
  timestamp: number;
}

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Delay before the first retry in ms */
  retryDelay: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Maximum delay cap in ms */
  maxDelay: number;
  /** Which error types to retry */
  retriableTypes: EngineErrorType[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  retryDelay: 200,
  backoffMultiplier: 2,
  maxDelay: 2000,
  retriableTypes: [EngineErrorType.STALE_HANDLE, EngineErrorType.TIMEOUT],
};

// ============================================================================
// THROWN ERRORS
// ============================================================================
// Only conditions that must propagate are thrown. Everything else is a result variant.

/**
 * The element went away between resolution and use
 */
export class StaleHandleError extends Error {
  readonly handleId: string;

  constructor(handleId: string, message = `Element handle ${handleId} is no longer attached`) {
    super(message);
    this.name = 'StaleHandleError';
    this.handleId = handleId;
  }
}

/**
 * A page operation did not finish within its timeout
 */
export class OperationTimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The page or session is gone; the run cannot continue
 */
export class FatalIOError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalIOError';
  }
}

export function isFatalIOError(error: unknown): error is FatalIOError {
  return error instanceof FatalIOError;
}

export function isStaleHandleError(error: unknown): error is StaleHandleError {
  return error instanceof StaleHandleError;
}

/**
 * Check if an error type is retriable based on config
 */
export function isRetriable(errorType: EngineErrorType, config: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
  return config.retriableTypes.includes(errorType);
}

/**
 * Calculate delay for retry attempt with exponential backoff
 */
export function calculateRetryDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const delay = config.retryDelay * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(delay, config.maxDelay);
}

/**
 * Create an EngineError from an unknown error
 */
export function createEngineError(
  error: unknown,
  type: EngineErrorType = EngineErrorType.UNKNOWN,
  context?: Partial<Omit<EngineError, 'type' | 'message' | 'retriable' | 'timestamp'>>
): EngineError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return {
    type,
    message,
    retriable: isRetriable(type),
    cause,
    timestamp: Date.now(),
    ...context,
  };
}

/**
 * Classify an error into an EngineErrorType based on its class or message
 */
export function classifyError(error: unknown): EngineErrorType {
  if (error instanceof FatalIOError) return EngineErrorType.FATAL_IO;
  if (error instanceof StaleHandleError) return EngineErrorType.STALE_HANDLE;
  if (error instanceof OperationTimeoutError) return EngineErrorType.TIMEOUT;

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  // Session / page loss
  if (
    message.includes('target closed') ||
    message.includes('target page, context or browser has been closed') ||
    message.includes('session closed') ||
    message.includes('browser has been closed') ||
    message.includes('connection closed')
  ) {
    return EngineErrorType.FATAL_IO;
  }

  // Re-rendered elements
  if (
    message.includes('not attached') ||
    message.includes('detached') ||
    message.includes('stale') ||
    message.includes('no longer attached')
  ) {
    return EngineErrorType.STALE_HANDLE;
  }

  if (message.includes('timeout') || message.includes('timed out') || message.includes('exceeded')) {
    return EngineErrorType.TIMEOUT;
  }

  if (
    message.includes('element not found') ||
    message.includes('no element') ||
    message.includes('not found')
  ) {
    return EngineErrorType.NOT_FOUND;
  }

  if (message.includes('extract') || message.includes('parse') || message.includes('title')) {
    return EngineErrorType.EXTRACTION_SKIP;
  }

  if (message.includes('config') || message.includes('invalid') || message.includes('locator table')) {
    return EngineErrorType.CONFIG;
  }

  return EngineErrorType.UNKNOWN;
}

/**
 * Create an EngineError with automatic classification
 */
export function wrapError(
  error: unknown,
  context?: Partial<Omit<EngineError, 'type' | 'message' | 'retriable' | 'timestamp'>>
): EngineError {
  const type = classifyError(error);
  return createEngineError(error, type, context);
}
