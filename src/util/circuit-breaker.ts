/**
 * Circuit Breaker with exponential backoff for calls to external data sources
 * (price feeds). Opening is time based; no timers are left running.
 */

import { Logger } from './logger';

export enum CircuitState {
  CLOSED = 'CLOSED',       // Normal operation, requests pass through
  OPEN = 'OPEN',           // Requests fail fast
  HALF_OPEN = 'HALF_OPEN'  // Testing if the service is back
}

export interface CircuitBreakerOptions {
  failureThreshold: number;         // Failures before opening the circuit
  resetTimeout: number;             // Base ms to wait before half-open
  halfOpenSuccessThreshold: number; // Successes in half-open needed to close
  timeout?: number;                 // Per-request timeout in ms (0 disables)
  maxResetTimeout?: number;         // Cap for exponential backoff
  backoffMultiplier?: number;
}

const DEFAULT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  resetTimeout: 120000,
  halfOpenSuccessThreshold: 2,
  timeout: 30000,
  maxResetTimeout: 1800000,
  backoffMultiplier: 2
};

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Service unavailable (circuit ${name} is open)`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures: number = 0;
  private successes: number = 0;
  private openedAt: number = 0;
  private consecutiveOpens: number = 0;
  private currentResetTimeout: number;
  private readonly options: CircuitBreakerOptions;

  constructor(
    private readonly name: string,
    private readonly logger: Logger,
    options: Partial<CircuitBreakerOptions> = {},
    private readonly now: () => number = Date.now
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.currentResetTimeout = this.options.resetTimeout;
  }

  /**
   * Execute a function with circuit breaker protection
   * @throws CircuitOpenError if the circuit is open, or the function's error
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (this.now() - this.openedAt >= this.currentResetTimeout) {
        this.halfOpen();
      } else {
        this.logger.warn(`Circuit ${this.name} is OPEN - failing fast`);
        throw new CircuitOpenError(this.name);
      }
    }

    try {
      const result = await this.executeWithTimeout(fn);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure(error);
      throw error;
    }
  }

  private async executeWithTimeout<T>(fn: () => Promise<T>): Promise<T> {
    const timeoutMs = this.options.timeout;
    if (!timeoutMs) {
      return fn();
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        fn(),
        new Promise<T>((_, reject) => {
          timer = setTimeout(() => {
            reject(new Error(`Request timeout after ${timeoutMs}ms`));
          }, timeoutMs);
        })
      ]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  private onSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successes++;
      this.logger.debug(`Circuit ${this.name} success in HALF_OPEN state (${this.successes}/${this.options.halfOpenSuccessThreshold})`);
      if (this.successes >= this.options.halfOpenSuccessThreshold) {
        this.close();
      }
    } else {
      this.failures = 0;
      this.consecutiveOpens = 0;
      this.currentResetTimeout = this.options.resetTimeout;
    }
  }

  private onFailure(error: unknown): void {
    this.failures++;
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.logger.warn(`Circuit ${this.name} failure: ${errorMessage} (${this.failures}/${this.options.failureThreshold})`);

    if (this.state === CircuitState.HALF_OPEN || this.failures >= this.options.failureThreshold) {
      this.open();
    }
  }

  private open(): void {
    if (this.consecutiveOpens > 0) {
      this.currentResetTimeout = Math.min(
        this.currentResetTimeout * (this.options.backoffMultiplier || 2),
        this.options.maxResetTimeout || 1800000
      );
    }
    this.state = CircuitState.OPEN;
    this.failures = 0;
    this.successes = 0;
    this.openedAt = this.now();
    this.consecutiveOpens++;
    this.logger.warn(`Circuit ${this.name} OPENED (attempt ${this.consecutiveOpens}, reset in ${this.currentResetTimeout}ms)`);
  }

  private halfOpen(): void {
    this.state = CircuitState.HALF_OPEN;
    this.failures = 0;
    this.successes = 0;
    this.logger.info(`Circuit ${this.name} HALF-OPEN - testing service availability`);
  }

  private close(): void {
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.successes = 0;
    this.consecutiveOpens = 0;
    this.currentResetTimeout = this.options.resetTimeout;
    this.logger.info(`Circuit ${this.name} CLOSED - service is operational`);
  }

  getState(): CircuitState {
    return this.state;
  }

  getResetTimeout(): number {
    return this.currentResetTimeout;
  }
}
