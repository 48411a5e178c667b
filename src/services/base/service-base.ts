import { Logger } from '../../util/logger';
import { CircuitBreaker, CircuitBreakerOptions } from '../../util/circuit-breaker';
import { AppError, ErrorCategory, isError } from '../../util/error-handler';

export interface RetryOptions {
  maxRetries: number;
  delayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  delayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 10000
};

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export abstract class ServiceBase {
  protected readonly logger: Logger;
  protected readonly circuitBreaker: CircuitBreaker;
  protected readonly sleep: Sleep;

  constructor(
    logger: Logger,
    circuitBreakerOptions: Partial<CircuitBreakerOptions> = {},
    sleep: Sleep = defaultSleep
  ) {
    this.logger = logger;
    this.sleep = sleep;
    this.circuitBreaker = new CircuitBreaker(this.constructor.name, logger, circuitBreakerOptions);
  }

  protected async executeWithRetry<T>(
    operation: () => Promise<T>,
    options: RetryOptions = DEFAULT_RETRY_OPTIONS
  ): Promise<T> {
    return this.circuitBreaker.execute(async () => {
      return this.retryableRequest(operation, options);
    });
  }

  private async retryableRequest<T>(
    operation: () => Promise<T>,
    options: RetryOptions
  ): Promise<T> {
    let lastError: unknown = new Error('Unknown error');

    for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        if (attempt === options.maxRetries) {
          break;
        }

        const delay = Math.min(
          options.delayMs * Math.pow(options.backoffMultiplier, attempt),
          options.maxDelayMs
        );

        this.logger.warn(`Operation failed (attempt ${attempt + 1}), retrying in ${delay}ms`, {
          error: isError(error) ? error.message : String(error),
          attempt: attempt + 1,
          maxRetries: options.maxRetries
        });

        await this.sleep(delay);
      }
    }

    throw new AppError(
      `Operation failed after ${options.maxRetries + 1} attempts`,
      ErrorCategory.NETWORK,
      lastError,
      { lastError: isError(lastError) ? lastError.message : String(lastError) }
    );
  }
}
