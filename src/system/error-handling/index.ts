/**
 * Error Handling Module
 *
 * Retries failing async operations with backoff, then degrades.
 */

import { AppError, errorMessage } from '../../utils/error-handler';
import { AppLogger, defaultLogger, toError } from '../../utils/logger';

export interface ErrorContext {
  operation: string;
  module: string;
  data?: Record<string, unknown>;
}

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxRetries: number;
  retryDelay: number; // milliseconds
  backoffFactor?: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  retryDelay: 500,
  backoffFactor: 2
};

export abstract class BaseErrorHandler<T> {
  protected context: ErrorContext;
  protected logger: AppLogger;

  constructor(context: ErrorContext, logger?: AppLogger) {
    this.context = context;
    this.logger = logger || defaultLogger.createSubLogger(context.module);
  }

  /**
   * Run an operation, retrying on failure and degrading after the last attempt
   */
  async handle(operation: () => Promise<T>, retryOptions: RetryOptions = DEFAULT_RETRY_OPTIONS): Promise<T> {
    const attempts = Math.max(1, retryOptions.maxRetries);
    let lastError = new Error(`${this.context.operation} was not attempted`);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = toError(error);
        this.logError(attempt, lastError);

        if (attempt < attempts) {
          const delay = retryOptions.retryDelay * (retryOptions.backoffFactor || 1) ** (attempt - 1);
          await this.wait(delay);
        }
      }
    }

    return this.degrade(lastError);
  }

  protected logError(attempt: number, error: Error): void {
    this.logger.warn(
      `${this.context.operation} failed (attempt ${attempt}): ${error.message}`,
      this.context.data,
      this.context.operation
    );
  }

  /**
   * Apply graceful degradation
   */
  protected abstract degrade(error: Error): Promise<T>;

  protected wait(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

/**
 * Degrades to a fallback value derived from the last error
 */
export class FallbackErrorHandler<T> extends BaseErrorHandler<T> {
  constructor(
    context: ErrorContext,
    private readonly fallback: (error: Error) => T,
    logger?: AppLogger
  ) {
    super(context, logger);
  }

  protected async degrade(error: Error): Promise<T> {
    this.logger.warn(`Degrading ${this.context.operation}: ${error.message}`, undefined, this.context.operation);
    return this.fallback(error);
  }
}

/**
 * Rethrows as a database error once retries are exhausted
 */
export class DatabaseErrorHandler<T> extends BaseErrorHandler<T> {
  protected async degrade(error: Error): Promise<T> {
    throw AppError.database(
      `Database operation failed after retries: ${errorMessage(error)}`,
      this.context.operation
    );
  }
}
