/**
 * Error Utilities
 *
 * Error types shared by the pipeline stages, the store writers and the worker.
 */

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class PipelineError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
    this.timestamp = Date.now();

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// SPECIFIC ERROR TYPES
// =============================================================================

/**
 * Missing or inconsistent configuration
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation errors
 */
export class ValidationError extends PipelineError {
  public readonly field?: string;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, { ...details, field });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * External service errors
 */
export class ExternalServiceError extends PipelineError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(
    service: string,
    message: string,
    originalError?: Error,
    details?: Record<string, unknown>
  ) {
    super('EXTERNAL_SERVICE_ERROR', `${service}: ${message}`, {
      ...details,
      service,
      originalMessage: originalError?.message,
    });
    this.name = 'ExternalServiceError';
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * A graph statement failed. Carries the leading text of the Cypher so the log
 * line identifies the mutation without dumping the whole query.
 */
export class GraphWriteError extends PipelineError {
  public readonly queryPrefix: string;

  constructor(cypher: string, message: string, details?: Record<string, unknown>) {
    const queryPrefix = cypher.replace(/\s+/g, ' ').trim().slice(0, 100);
    super('GRAPH_WRITE_ERROR', `Graph write failed (${queryPrefix}...): ${message}`, {
      ...details,
      queryPrefix,
    });
    this.name = 'GraphWriteError';
    this.queryPrefix = queryPrefix;
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends PipelineError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', `Operation '${operation}' timed out after ${timeoutMs}ms`, {
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Retry an async operation with exponential backoff
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    retryOn?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 100,
    maxDelayMs = 10000,
    retryOn = () => true,
    onRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !retryOn(error)) {
        throw error;
      }

      const delay = Math.min(initialDelayMs * Math.pow(2, attempt), maxDelayMs);
      onRetry?.(error, attempt + 1, delay);

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

/**
 * Timeout wrapper for async operations
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  operationName: string = 'operation'
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operationName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(), timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
