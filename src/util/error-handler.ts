/**
 * Error Handler Utility
 *
 * Error categorization, logging and the typed errors of the scheduler
 * (data unavailable, infeasible plan, degraded model, invalid config).
 */

import { Logger } from './logger';

/**
 * Error categories for better error handling
 */
export enum ErrorCategory {
  NETWORK = 'NETWORK',
  VALIDATION = 'VALIDATION',
  API = 'API',
  DATA = 'DATA',
  DATA_UNAVAILABLE = 'DATA_UNAVAILABLE',
  INFEASIBLE_PLAN = 'INFEASIBLE_PLAN',
  MODEL_DEGRADED = 'MODEL_DEGRADED',
  CONFIG_INVALID = 'CONFIG_INVALID',
  CANCELLED = 'CANCELLED',
  INTERNAL = 'INTERNAL',
  UNKNOWN = 'UNKNOWN'
}

/**
 * Extended Error class with additional properties
 */
export class AppError extends Error {
  category: ErrorCategory;
  originalError?: Error | unknown;
  context?: Record<string, unknown>;
  recoverable: boolean;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    originalError?: Error | unknown,
    context?: Record<string, unknown>,
    recoverable: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.category = category;
    this.originalError = originalError;
    this.context = context;
    this.recoverable = recoverable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Price or sensor data could not be fetched and no usable fallback exists.
 */
export class DataUnavailableError extends AppError {
  constructor(message: string, originalError?: Error | unknown, context?: Record<string, unknown>) {
    super(message, ErrorCategory.DATA_UNAVAILABLE, originalError, context, true);
    this.name = 'DataUnavailableError';
  }
}

export class InfeasiblePlanError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.INFEASIBLE_PLAN, undefined, context, true);
    this.name = 'InfeasiblePlanError';
  }
}

export class ModelDegradedError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.MODEL_DEGRADED, undefined, context, true);
    this.name = 'ModelDegradedError';
  }
}

/**
 * Zone definition is malformed. The only error that blocks zone activation.
 */
export class ConfigInvalidError extends AppError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCategory.CONFIG_INVALID, undefined, { ...context, problems }, false);
    this.name = 'ConfigInvalidError';
    this.problems = problems;
  }
}

export class PlanCancelledError extends AppError {
  constructor(message: string = 'Planning cancelled', context?: Record<string, unknown>) {
    super(message, ErrorCategory.CANCELLED, undefined, context, true);
    this.name = 'PlanCancelledError';
  }
}

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

/**
 * Error handler utility class
 */
export class ErrorHandler {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Categorize an error based on its class or message
   */
  categorizeError(error: unknown): ErrorCategory {
    if (isAppError(error)) {
      return error.category;
    }

    if (!isError(error)) {
      return ErrorCategory.UNKNOWN;
    }

    const errorMessage = error.message.toLowerCase();

    if (
      errorMessage.includes('network') ||
      errorMessage.includes('timeout') ||
      errorMessage.includes('connection') ||
      errorMessage.includes('enotfound') ||
      errorMessage.includes('etimedout') ||
      errorMessage.includes('socket') ||
      errorMessage.includes('dns')
    ) {
      return ErrorCategory.NETWORK;
    }

    if (
      errorMessage.includes('validation') ||
      errorMessage.includes('invalid') ||
      errorMessage.includes('required') ||
      errorMessage.includes('missing')
    ) {
      return ErrorCategory.VALIDATION;
    }

    if (
      errorMessage.includes('api') ||
      errorMessage.includes('http') ||
      errorMessage.includes('status') ||
      errorMessage.includes('response')
    ) {
      return ErrorCategory.API;
    }

    if (
      errorMessage.includes('data') ||
      errorMessage.includes('parse') ||
      errorMessage.includes('json') ||
      errorMessage.includes('format')
    ) {
      return ErrorCategory.DATA;
    }

    return ErrorCategory.INTERNAL;
  }

  /**
   * Create a standardized AppError from any error
   */
  createAppError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    if (isAppError(error)) {
      if (context) {
        error.context = { ...error.context, ...context };
      }
      return error;
    }

    const category = this.categorizeError(error);
    const errorMessage = isError(error)
      ? message || error.message
      : message || String(error);

    return new AppError(errorMessage, category, error, context, true);
  }

  /**
   * Log an error with standardized format
   * @returns The AppError that was logged
   */
  logError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    const appError = this.createAppError(error, context, message);

    const logContext = {
      category: appError.category,
      recoverable: appError.recoverable,
      ...(appError.context || {})
    };

    switch (appError.category) {
      case ErrorCategory.NETWORK:
        this.logger.warn(`Network Error: ${appError.message}`, logContext);
        break;
      case ErrorCategory.VALIDATION:
      case ErrorCategory.CONFIG_INVALID:
        this.logger.warn(`Validation Error: ${appError.message}`, logContext);
        break;
      case ErrorCategory.DATA_UNAVAILABLE:
      case ErrorCategory.MODEL_DEGRADED:
      case ErrorCategory.INFEASIBLE_PLAN:
        this.logger.warn(`${appError.category}: ${appError.message}`, logContext);
        break;
      case ErrorCategory.CANCELLED:
        this.logger.debug(`Cancelled: ${appError.message}`);
        break;
      default:
        this.logger.error(`${appError.category} Error: ${appError.message}`, appError.originalError ?? appError, logContext);
    }

    return appError;
  }
}
