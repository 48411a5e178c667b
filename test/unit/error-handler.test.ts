import {
  AppError,
  ConfigInvalidError,
  DataUnavailableError,
  ErrorCategory,
  ErrorHandler,
  ModelDegradedError,
  PlanCancelledError
} from '../../src/util/error-handler';
import { createMockLogger, MockLogger } from '../mocks';

describe('ErrorHandler', () => {
  let logger: MockLogger;
  let handler: ErrorHandler;

  beforeEach(() => {
    logger = createMockLogger();
    handler = new ErrorHandler(logger);
  });

  describe('categorizeError', () => {
    it.each([
      ['connection reset by peer', ErrorCategory.NETWORK],
      ['Invalid value for area', ErrorCategory.VALIDATION],
      ['HTTP 500', ErrorCategory.API],
      ['Unexpected token in JSON', ErrorCategory.DATA],
      ['boom', ErrorCategory.INTERNAL]
    ])('maps "%s" to %s', (message, category) => {
      expect(handler.categorizeError(new Error(message))).toBe(category);
    });

    it('keeps the category of typed errors', () => {
      expect(handler.categorizeError(new DataUnavailableError('no prices'))).toBe(ErrorCategory.DATA_UNAVAILABLE);
      expect(handler.categorizeError('not an error')).toBe(ErrorCategory.UNKNOWN);
    });
  });

  describe('createAppError', () => {
    it('returns an AppError as is with the context merged', () => {
      const error = new ModelDegradedError('few samples', { zoneId: 'zone-a' });
      const created = handler.createAppError(error, { reason: 'startup' });

      expect(created).toBe(error);
      expect(created.context).toEqual({ zoneId: 'zone-a', reason: 'startup' });
    });

    it('wraps other errors under the given message', () => {
      const original = new Error('socket timeout');
      const created = handler.createAppError(original, { zoneId: 'zone-a' }, 'Planning failed');

      expect(created.message).toBe('Planning failed');
      expect(created.category).toBe(ErrorCategory.NETWORK);
      expect(created.originalError).toBe(original);
      expect(created.context).toEqual({ zoneId: 'zone-a' });
    });
  });

  describe('logError', () => {
    it('warns about unavailable data', () => {
      handler.logError(new DataUnavailableError('no prices'));
      expect(logger.warn).toHaveBeenCalledWith('DATA_UNAVAILABLE: no prices', {
        category: ErrorCategory.DATA_UNAVAILABLE,
        recoverable: true
      });
    });

    it('warns about invalid configuration with its problems', () => {
      handler.logError(new ConfigInvalidError('bad zone', ['zoneId: required']));
      expect(logger.warn).toHaveBeenCalledWith('Validation Error: bad zone', {
        category: ErrorCategory.CONFIG_INVALID,
        recoverable: false,
        problems: ['zoneId: required']
      });
    });

    it('logs cancellations at debug level', () => {
      handler.logError(new PlanCancelledError());
      expect(logger.debug).toHaveBeenCalledWith('Cancelled: Planning cancelled');
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('logs unexpected errors with the original error', () => {
      const original = new Error('boom');
      const logged = handler.logError(original);

      expect(logged).toBeInstanceOf(AppError);
      expect(logger.error).toHaveBeenCalledWith('INTERNAL Error: boom', original, {
        category: ErrorCategory.INTERNAL,
        recoverable: true
      });
    });
  });

  it('names the typed errors', () => {
    const error = new ConfigInvalidError('bad zone', ['minTemp: must be a number']);
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('ConfigInvalidError');
    expect(error.problems).toEqual(['minTemp: must be a number']);
    expect(error.recoverable).toBe(false);
  });
});
