import { RetryOptions, ServiceBase, Sleep } from '../../src/services/base/service-base';
import { CircuitOpenError } from '../../src/util/circuit-breaker';
import { AppError, ErrorCategory } from '../../src/util/error-handler';
import { Logger } from '../../src/util/logger';
import { createMockLogger, MockLogger } from '../mocks';

class RetryingService extends ServiceBase {
  constructor(logger: Logger, sleep: Sleep, failureThreshold = 5) {
    super(logger, { failureThreshold, timeout: 0 }, sleep);
  }

  run<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T> {
    return this.executeWithRetry(operation, options);
  }
}

describe('ServiceBase', () => {
  let logger: MockLogger;
  let delays: number[];
  const sleep: Sleep = async (ms) => {
    delays.push(ms);
  };

  beforeEach(() => {
    logger = createMockLogger();
    delays = [];
  });

  it('retries with exponential backoff until the operation succeeds', async () => {
    const operation = jest.fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('down'))
      .mockRejectedValueOnce(new Error('down'))
      .mockResolvedValue('ok');

    await expect(new RetryingService(logger, sleep).run(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'Operation failed (attempt 1), retrying in 1000ms', {
      error: 'down',
      attempt: 1,
      maxRetries: 3
    });
  });

  it('caps the delay and gives up after the last attempt', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('down'));
    const options: RetryOptions = { maxRetries: 2, delayMs: 100, backoffMultiplier: 3, maxDelayMs: 250 };

    const failure = new RetryingService(logger, sleep).run(operation, options);

    await expect(failure).rejects.toBeInstanceOf(AppError);
    await expect(failure).rejects.toMatchObject({
      message: 'Operation failed after 3 attempts',
      category: ErrorCategory.NETWORK,
      context: { lastError: 'down' }
    });
    expect(delays).toEqual([100, 250]);
  });

  it('fails fast once the circuit opens', async () => {
    const service = new RetryingService(logger, sleep, 1);
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('down'));
    const once: RetryOptions = { maxRetries: 0, delayMs: 100, backoffMultiplier: 2, maxDelayMs: 1000 };

    await expect(service.run(operation, once)).rejects.toBeInstanceOf(AppError);
    await expect(service.run(operation, once)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
