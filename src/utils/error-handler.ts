/**
 * Application error types
 */

export enum AppErrorType {
  /** Bad input from a client or the assistant */
  VALIDATION_ERROR = 'validation_error',

  /** Missing or invalid credentials / login link */
  AUTHENTICATION_ERROR = 'authentication_error',

  NOT_FOUND = 'not_found',

  CONFIGURATION_ERROR = 'configuration_error',

  DATABASE_ERROR = 'database_error',

  /** An upstream service (LLM, arXiv, calendar, SMTP) failed */
  EXTERNAL_SERVICE_ERROR = 'external_service_error',

  UNKNOWN_ERROR = 'unknown_error'
}

const STATUS_CODES: Record<AppErrorType, number> = {
  [AppErrorType.VALIDATION_ERROR]: 400,
  [AppErrorType.AUTHENTICATION_ERROR]: 401,
  [AppErrorType.NOT_FOUND]: 404,
  [AppErrorType.CONFIGURATION_ERROR]: 500,
  [AppErrorType.DATABASE_ERROR]: 500,
  [AppErrorType.EXTERNAL_SERVICE_ERROR]: 502,
  [AppErrorType.UNKNOWN_ERROR]: 500
};

export interface AppErrorContext {
  errorType: AppErrorType;

  /** Operation that failed */
  operation?: string;

  timestamp: Date;

  details?: Record<string, unknown>;
}

export class AppError extends Error {
  public readonly context: AppErrorContext;

  constructor(
    message: string,
    errorType: AppErrorType,
    operation?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    this.context = {
      errorType,
      operation,
      timestamp: new Date(),
      details
    };
  }

  get errorType(): AppErrorType {
    return this.context.errorType;
  }

  /**
   * HTTP status for this error
   */
  get statusCode(): number {
    return STATUS_CODES[this.context.errorType];
  }

  toString(): string {
    return `[${this.context.errorType}] ${this.message} (Operation: ${this.context.operation || 'unknown'})`;
  }

  static validation(message: string, operation?: string, details?: Record<string, unknown>): AppError {
    return new AppError(message, AppErrorType.VALIDATION_ERROR, operation, details);
  }

  static authentication(message: string, operation?: string): AppError {
    return new AppError(message, AppErrorType.AUTHENTICATION_ERROR, operation);
  }

  static notFound(message: string, operation?: string): AppError {
    return new AppError(message, AppErrorType.NOT_FOUND, operation);
  }

  static configuration(message: string, operation?: string): AppError {
    return new AppError(message, AppErrorType.CONFIGURATION_ERROR, operation);
  }

  static database(message: string, operation?: string, details?: Record<string, unknown>): AppError {
    return new AppError(message, AppErrorType.DATABASE_ERROR, operation, details);
  }

  static externalService(message: string, operation?: string, details?: Record<string, unknown>): AppError {
    return new AppError(message, AppErrorType.EXTERNAL_SERVICE_ERROR, operation, details);
  }
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
