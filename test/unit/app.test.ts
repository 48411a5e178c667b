import { HeatingApp, HeatingAppOptions } from '../../src/app';
import { ConfigurationService, LoadedConfig } from '../../src/services/configuration-service';
import { LogCategory } from '../../src/util/logger';
import { MemorySettingsStore } from '../../src/util/settings-store';
import {
  createMockLogger,
  FakeActuator,
  FakeOutdoor,
  FakePriceSource,
  FakeSensor,
  hourlyPrices,
  MockLogger
} from '../mocks';

const START = '2024-01-01T00:00:00.000Z';

describe('HeatingApp', () => {
  let logger: MockLogger;
  let loaded: LoadedConfig;

  beforeEach(() => {
    logger = createMockLogger();
    loaded = new ConfigurationService().parseAppConfig({
      timeZone: 'UTC',
      scheduler: { horizonHours: 4 },
      zones: [
        {
          zoneId: 'living',
          sensorRef: 'sensor-living',
          actuatorRef: 'actuator-living',
          defaultComfort: { minTemp: 17, maxTemp: 23 },
          minDwellMinutes: 90,
          actionLevels: [0, 1]
        },
        { zoneId: 'broken' }
      ]
    });
  });

  const createOptions = (overrides: Partial<HeatingAppOptions> = {}): HeatingAppOptions => ({
    adapters: () => {
      const actuator = new FakeActuator([0, 1]);
      return { sensor: new FakeSensor(() => new Date(), 20), actuator, capability: actuator };
    },
    outdoor: new FakeOutdoor(hourlyPrices(START, [0, 0, 0, 0])
      .map((point) => ({ time: point.time, temperature: point.price }))),
    priceSource: new FakePriceSource(hourlyPrices(START, [1, 1, 10, 10])),
    store: new MemorySettingsStore(),
    logger,
    ...overrides
  });

  it('logs configuration warnings and rejected zones', () => {
    const app = new HeatingApp(loaded, createOptions());

    expect(logger.warn).toHaveBeenCalledWith(
      'Configuration: living: minDwellMinutes 90 is rounded up to 120 (whole 60-minute steps)'
    );
    expect(logger.error).toHaveBeenCalledWith('Zone broken not activated', undefined, {
      problems: expect.any(Array)
    });
    expect(app.getZone('living')?.zoneId).toBe('living');
    expect(app.getZone('broken')).toBeUndefined();
  });

  it('warns when no price source is configured', () => {
    new HeatingApp(loaded, createOptions({ priceSource: undefined }));
    expect(logger.warn).toHaveBeenCalledWith('No price source configured; zones cannot plan until one is set');
  });

  it('enables exactly the requested debug categories', () => {
    const app = new HeatingApp(loaded, createOptions());
    app.setDebugCategories([LogCategory.PRICE]);

    expect(logger.enableCategory).toHaveBeenCalledTimes(1);
    expect(logger.enableCategory).toHaveBeenCalledWith(LogCategory.PRICE);
    expect(logger.disableCategory).toHaveBeenCalledTimes(Object.values(LogCategory).length - 1);
  });

  describe('lifecycle', () => {
    beforeEach(() => {
      jest.useFakeTimers({ now: new Date(START), doNotFake: ['setImmediate'] });
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('plans every zone on start and tears down on stop', async () => {
      const app = new HeatingApp(loaded, createOptions());

      await app.start();
      expect(logger.log).toHaveBeenCalledWith('Running 1 zone(s)');
      expect(app.getStatus().zones.map((z) => z.planId)).toEqual([`plan-living-${Date.parse(START)}`]);
      expect(app.getManager().getSchedule().getStatus().tick?.running).toBe(true);

      app.stop();
      expect(logger.marker).toHaveBeenLastCalledWith('Heating scheduler stopped');
      expect(app.getStatus().zones).toEqual([]);
      expect(app.getManager().getSchedule().getStatus().tick?.running).toBe(false);
    });
  });
});
