/**
 * Standardized error handling utilities for coursegraph
 *
 * Provides consistent error logging, categorization, retry and recovery
 * patterns across the ingestion and retrieval pipelines.
 */

/**
 * Error categories for better classification and handling
 */
export enum ErrorCategory {
  STORAGE = 'storage',
  EXTRACTION = 'extraction',
  RETRIEVAL = 'retrieval',
  CONFIGURATION = 'configuration',
  VALIDATION = 'validation',
  NETWORK = 'network',
  PROCESSING = 'processing'
}

/**
 * Error severity levels for prioritization
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  originalError?: Error;
  context?: Record<string, unknown>;
  timestamp: Date;
  recoveryHint?: string;
}

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts?: number;
  /** Delay before the second attempt; doubles on every further attempt */
  baseDelayMs?: number;
  signal?: AbortSignal;
  context?: Record<string, unknown>;
}

/**
 * The external text extraction collaborator produced no usable text
 */
export class TextExtractionError extends Error {
  constructor(message = 'Text extraction failed') {
    super(message);
    this.name = 'TextExtractionError';
  }
}

/**
 * A graph store operation failed
 */
export class StoreError extends Error {
  constructor(message: string, readonly operation: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  // Errors thrown in another realm fail instanceof but keep their message
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return new Error(error.message, { cause: error });
  }
  return new Error(String(error));
}

/**
 * Standard error handler with categorization and recovery hints
 */
export class ErrorHandler {
  private static errorCounts = new Map<string, number>();
  private static maxAttempts = 3;
  private static baseDelayMs = 1000;

  /**
   * Handle an error with proper categorization and logging
   */
  static handle(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    recoveryHint?: string
  ): ErrorInfo {
    const errorInfo: ErrorInfo = {
      category,
      severity,
      message,
      originalError,
      context,
      timestamp: new Date(),
      recoveryHint
    };

    this.logError(errorInfo);
    this.trackErrorFrequency(category, message);

    return errorInfo;
  }

  /**
   * Run an idempotent operation with exponential backoff.
   *
   * Throws the last error once every attempt has failed, after logging it.
   * An aborted signal stops retrying immediately.
   */
  static async withRetry<T>(
    operation: () => Promise<T>,
    category: ErrorCategory,
    operationName: string,
    options: RetryOptions = {}
  ): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? this.baseDelayMs;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      options.signal?.throwIfAborted();

      try {
        const result = await operation();

        if (attempt > 1) {
          console.log(`✅ ${operationName} succeeded on attempt ${attempt}/${maxAttempts}`);
        }

        return result;
      } catch (error) {
        lastError = toError(error);
        if (options.signal?.aborted) {
          throw lastError;
        }

        if (attempt < maxAttempts) {
          console.warn(`⚠️ ${operationName} failed (attempt ${attempt}/${maxAttempts}), retrying...`);
          await this.sleep(Math.pow(2, attempt - 1) * baseDelayMs, options.signal);
        }
      }
    }

    const failure = lastError ?? new Error(`Failed to ${operationName}`);
    this.handle(
      category,
      ErrorSeverity.HIGH,
      `Failed to ${operationName} after ${maxAttempts} attempts`,
      failure,
      { ...options.context, attempts: maxAttempts },
      `Check ${category} configuration, network connectivity, and system resources`
    );
    throw failure;
  }

  private static logError(errorInfo: ErrorInfo): void {
    const emoji = this.getSeverityEmoji(errorInfo.severity);
    const timestamp = errorInfo.timestamp.toISOString();

    const logMessage = [
      `${emoji} [${errorInfo.category.toUpperCase()}] ${errorInfo.message}`,
      `   Severity: ${errorInfo.severity}`,
      `   Time: ${timestamp}`,
      errorInfo.context ? `   Context: ${JSON.stringify(errorInfo.context)}` : '',
      errorInfo.recoveryHint ? `   💡 Hint: ${errorInfo.recoveryHint}` : '',
      errorInfo.originalError ? `   Original: ${errorInfo.originalError.message}` : ''
    ].filter(Boolean).join('\n');

    if (errorInfo.severity === ErrorSeverity.CRITICAL) {
      console.error(logMessage);
    } else if (errorInfo.severity === ErrorSeverity.HIGH) {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }
  }

  private static trackErrorFrequency(category: ErrorCategory, message: string): void {
    const key = `${category}:${message}`;
    const currentCount = this.errorCounts.get(key) ?? 0;
    this.errorCounts.set(key, currentCount + 1);

    if (currentCount > 5) {
      console.warn(`🔔 Frequent error detected: ${key} (${currentCount + 1} times)`);
    }
  }

  private static getSeverityEmoji(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.CRITICAL: return '🚨';
      case ErrorSeverity.HIGH: return '⚠️';
      case ErrorSeverity.MEDIUM: return '⚡';
      case ErrorSeverity.LOW: return 'ℹ️';
      default: return '❓';
    }
  }

  /**
   * Resolves after `ms`, or rejects with the signal's reason as soon as it aborts
   */
  private static sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Get error statistics for monitoring
   */
  static getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts.entries());
  }

  static resetErrorStats(): void {
    this.errorCounts.clear();
  }
}
