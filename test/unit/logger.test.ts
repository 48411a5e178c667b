import { AppLogger, createFallbackLogger, formatValue, LogCategory, LoggerConfig, LogLevel } from '../../src/util/logger';

describe('AppLogger', () => {
  let sink: { log: jest.Mock; error: jest.Mock };

  const createLogger = (overrides: LoggerConfig = {}) =>
    new AppLogger({
      level: LogLevel.DEBUG,
      prefix: 'TEST',
      includeTimestamps: false,
      verboseMode: true,
      sink,
      ...overrides
    });

  beforeEach(() => {
    sink = { log: jest.fn(), error: jest.fn() };
  });

  it('prefixes messages with the source module', () => {
    createLogger().log('hello');
    expect(sink.log).toHaveBeenCalledWith('[TEST] hello');
  });

  it('formats warning context as JSON', () => {
    createLogger().warn('careful', { a: 1 });
    expect(sink.log).toHaveBeenCalledWith('WARN: [TEST] careful', '{\n  "a": 1\n}');
  });

  it('drops debug output unless verbose', () => {
    createLogger({ verboseMode: false }).debug('hidden');
    expect(sink.log).not.toHaveBeenCalled();
  });

  it('respects the log level', () => {
    const logger = createLogger({ level: LogLevel.WARN });
    logger.log('info line');
    logger.warn('warn line');
    expect(sink.log).toHaveBeenCalledTimes(1);
    expect(sink.log).toHaveBeenCalledWith('WARN: [TEST] warn line');
  });

  it('filters by category', () => {
    const logger = createLogger();
    logger.disableCategory(LogCategory.PRICE);
    sink.log.mockClear();

    logger.price('price line');
    logger.optimization('plan line');

    expect(logger.isCategoryEnabled(LogCategory.PRICE)).toBe(false);
    expect(sink.log).toHaveBeenCalledTimes(1);
    expect(sink.log).toHaveBeenCalledWith('OPTIMIZATION: [TEST] plan line');
  });

  it('creates child loggers with a nested prefix', () => {
    createLogger().child('Zone:living').log('x');
    expect(sink.log).toHaveBeenCalledWith('[TEST:Zone:living] x');
  });

  it('logs errors with the error object', () => {
    const error = new Error('boom');
    createLogger().error('failed', error);
    expect(sink.error).toHaveBeenCalledWith('ERROR: [TEST] failed', error);
  });

  it('forwards notifications to the notifier', async () => {
    const notifier = jest.fn().mockResolvedValue(undefined);
    await createLogger({ notifier }).notify('plan relaxed');
    expect(sink.log).toHaveBeenCalledWith('[TEST] NOTIFICATION: plan relaxed');
    expect(notifier).toHaveBeenCalledWith('plan relaxed');
  });

  it('logs a failing notifier instead of throwing', async () => {
    const failure = new Error('offline');
    const notifier = jest.fn().mockRejectedValue(failure);
    await expect(createLogger({ notifier }).notify('msg')).resolves.toBeUndefined();
    expect(sink.error).toHaveBeenCalledWith('ERROR: [TEST] Failed to send notification: msg', failure);
  });

  it('suppresses the level-change message when raising the level above info', () => {
    const logger = createLogger();
    logger.setLogLevel(LogLevel.ERROR);
    expect(logger.getLogLevel()).toBe(LogLevel.ERROR);
    expect(sink.log).not.toHaveBeenCalled();
  });
});

describe('formatValue', () => {
  it('formats primitives, dates and nullish values', () => {
    expect(formatValue(null)).toBe('null');
    expect(formatValue(undefined)).toBe('undefined');
    expect(formatValue(3.5)).toBe('3.5');
    expect(formatValue(new Date('2024-01-01T00:00:00Z'))).toBe('2024-01-01T00:00:00.000Z');
  });

  it('abbreviates long arrays', () => {
    const values = Array.from({ length: 12 }, (_, i) => i);
    expect(formatValue(values)).toBe('Array(12) [0, 1, 2, ... 6 more ..., 9, 10, 11]');
  });

  it('formats short arrays in full', () => {
    expect(formatValue([1, 'a'])).toBe('[1, a]');
  });
});

describe('createFallbackLogger', () => {
  it('writes to the console with the prefix', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    createFallbackLogger('Fallback').log('hello');
    expect(spy).toHaveBeenCalledWith('[Fallback] hello');
    spy.mockRestore();
  });
});
