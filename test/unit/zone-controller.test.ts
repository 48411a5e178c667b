import { ComfortPolicy } from '../../src/services/comfort-policy';
import { ConfigurationService, DEFAULT_SCHEDULER_CONFIG, SchedulerConfig } from '../../src/services/configuration-service';
import { CachedPriceProvider } from '../../src/services/price-provider';
import { SavingsTracker } from '../../src/services/savings-tracker';
import { StateManager } from '../../src/services/state-manager';
import { ThermalModelService } from '../../src/services/thermal-model';
import { PlanPriceProvider, ZoneController } from '../../src/services/zone-controller';
import { ActionPlan, HeatingLevel, ReplanReason } from '../../src/types';
import { DataUnavailableError } from '../../src/util/error-handler';
import { MemorySettingsStore } from '../../src/util/settings-store';
import {
  createMockLogger,
  FakeActuator,
  FakeClock,
  FakeOutdoor,
  FakePriceSource,
  FakeSensor,
  hourlyPrices,
  MockLogger
} from '../mocks';

const START = '2024-01-01T00:00:00.000Z';
const START_MS = Date.parse(START);

interface HarnessOptions {
  scheduler?: Partial<SchedulerConfig>;
  prices?: PlanPriceProvider;
  ownsModel?: boolean;
  actuatorLevels?: HeatingLevel[];
  minDwellMinutes?: number;
}

function createHarness(options: HarnessOptions = {}) {
  const clock = new FakeClock(START);
  const logger: MockLogger = createMockLogger();
  const store = new MemorySettingsStore();
  const source = new FakePriceSource(hourlyPrices(START, [1, 1, 10, 10]));
  const sensor = new FakeSensor(clock.now, 20);
  const actuator = new FakeActuator(options.actuatorLevels ?? [0, 1]);
  const outdoor = new FakeOutdoor(hourlyPrices(START, [0, 0, 0, 0])
    .map((point) => ({ time: point.time, temperature: point.price })));
  const scheduler: SchedulerConfig = {
    ...DEFAULT_SCHEDULER_CONFIG,
    horizonHours: 4,
    replanCadenceMinutes: 600,
    ...options.scheduler
  };
  const zone = new ConfigurationService().parseZone({
    zoneId: 'zone-a',
    sensorRef: 'sensor-a',
    actuatorRef: 'actuator-a',
    defaultComfort: { minTemp: 17, maxTemp: 23 },
    minDwellMinutes: options.minDwellMinutes ?? 0,
    actionLevels: [0, 1]
  }, scheduler);

  const thermal = new ThermalModelService('zone-a', store, logger, { clock: clock.now });
  const comfort = new ComfortPolicy({ timeZone: 'Europe/Stockholm', defaultComfort: zone.defaultComfort, clock: clock.now });
  const state = new StateManager(logger, store);
  const savings = new SavingsTracker(logger, {
    zoneId: 'zone-a',
    parameters: () => thermal.getModel().getParameters(),
    levels: [0, 1],
    ratedPowerKw: zone.ratedPowerKw,
    defaultOutdoorTemp: scheduler.defaultOutdoorTemp,
    timeZone: 'Europe/Stockholm',
    store,
    clock: clock.now
  });

  const controller = new ZoneController({
    zone,
    scheduler,
    sensor,
    actuator,
    capability: actuator,
    prices: options.prices ?? new CachedPriceProvider(source, logger, { store, clock: clock.now }),
    outdoor,
    thermal,
    ownsModel: options.ownsModel,
    comfort,
    savings,
    state,
    logger,
    clock: clock.now
  });

  return { controller, clock, logger, source, sensor, actuator, comfort, state, thermal, savings };
}

type Harness = ReturnType<typeof createHarness>;

function committedPlan(harness: Harness): ActionPlan {
  const plan = harness.controller.getCommittedPlan();
  if (!plan) {
    throw new Error('No committed plan');
  }
  return plan;
}

/** Move the clock and make the sensor read what the plan expects */
function followPlan(harness: Harness, at: string): void {
  harness.clock.set(at);
  const expected = harness.controller.expectedTemperature(committedPlan(harness), harness.clock.now());
  if (expected !== null) {
    harness.sensor.value = expected;
  }
}

function commitReasons(controller: ZoneController): ReplanReason[] {
  const reasons: ReplanReason[] = [];
  controller.on('planCommitted', ({ reason }) => reasons.push(reason));
  return reasons;
}

describe('ZoneController', () => {
  describe('planning', () => {
    it('commits a plan on start and reports the default thermal model', async () => {
      const harness = createHarness();
      const reasons = commitReasons(harness.controller);
      const reports: string[] = [];
      harness.controller.on('planReported', ({ message }) => reports.push(message));

      const plan = await harness.controller.start();

      expect(plan?.actions.map((a) => a.level)).toEqual([1, 1, 0, 0]);
      expect(plan?.id).toBe(`plan-zone-a-${START_MS}`);
      expect(harness.controller.getState()).toBe('committed');
      expect(reasons).toEqual(['startup']);
      expect(reports).toEqual(['Zone zone-a: thermal model degraded (insufficient-history)']);
      expect(harness.logger.notify).toHaveBeenCalledWith('Zone zone-a: thermal model degraded (insufficient-history)');
    });

    it('coalesces triggers and lets a higher priority cancel the one in flight', async () => {
      const harness = createHarness();
      const reasons = commitReasons(harness.controller);
      const failures: string[] = [];
      harness.controller.on('planFailed', ({ error }) => failures.push(error));

      const first = harness.controller.requestReplan('cadence');
      const second = harness.controller.requestReplan('drift');
      const third = harness.controller.requestReplan('cadence');

      expect(second).toBe(first);
      expect(third).toBe(first);
      await first;

      expect(reasons).toEqual(['drift']);
      expect(failures).toEqual([]);
      expect(harness.controller.isPlanning()).toBe(false);
    });

    it('reports a failure and stays idle without a committed plan', async () => {
      const prices: PlanPriceProvider = {
        getPrices: () => Promise.reject(new DataUnavailableError('Price source down'))
      };
      const harness = createHarness({ prices });
      const failures: Array<{ reason: ReplanReason; error: string }> = [];
      harness.controller.on('planFailed', (failure) => failures.push(failure));

      await expect(harness.controller.start()).resolves.toBeNull();

      expect(failures).toEqual([{ reason: 'startup', error: 'Price source down' }]);
      expect(harness.controller.getState()).toBe('idle');
      const status = harness.controller.getStatus();
      expect(status.status).toBe('error');
      expect(status.lastError).toBe('Price source down');
    });

    it('keeps planning on the cached curve when the price source fails', async () => {
      const harness = createHarness();
      await harness.controller.start();
      const reports: string[] = [];
      harness.controller.on('planReported', ({ message }) => reports.push(message));

      harness.source.failWith = new Error('timeout');
      const plan = await harness.controller.requestReplan('cadence');

      expect(plan?.actions.map((a) => a.level)).toEqual([1, 1, 0, 0]);
      expect(reports).toEqual(['Zone zone-a: thermal model degraded (insufficient-history); price data stale']);
    });

    it('replans when a comfort override is set', async () => {
      const harness = createHarness();
      await harness.controller.start();

      const committed = new Promise<ReplanReason>((resolve) => {
        harness.controller.on('planCommitted', ({ reason }) => resolve(reason));
      });
      harness.comfort.setOverride({ minTemp: 21, maxTemp: 23, durationMinutes: 120 });

      await expect(committed).resolves.toBe('override');
    });

    it('keeps the level until the minimum dwell has passed when replanning mid-step', async () => {
      const harness = createHarness({ scheduler: { stepMinutes: 30 }, minDwellMinutes: 60 });
      const switchedOn = Date.parse('2024-01-01T00:40:00.000Z');
      harness.source.prices = hourlyPrices(START, [1, 10, 1, 1, 1, 1]);
      harness.state.recordChange('zone-a', 1, switchedOn);
      harness.clock.set('2024-01-01T01:25:00.000Z');

      const plan = await harness.controller.requestReplan('manual');
      const actions = plan?.actions ?? [];

      expect(actions[0].start).toBe('2024-01-01T01:00:00.000Z');
      expect(actions[0].level).toBe(1);
      expect(actions[1].level).toBe(1);
      const firstOff = actions.findIndex((a) => a.level === 0);
      expect(firstOff).toBeGreaterThanOrEqual(2);
      expect(Date.parse(actions[firstOff].start) - switchedOn).toBeGreaterThanOrEqual(60 * 60_000);
    });

    it('plans with the configured levels only', async () => {
      const harness = createHarness({ actuatorLevels: [0, 0.25, 0.5, 0.75, 1] });
      const plan = await harness.controller.start();

      expect(plan?.actions).toHaveLength(4);
      for (const action of plan?.actions ?? []) {
        expect([0, 1]).toContain(action.level);
      }
    });

    it('replans when the optimisation mode changes', async () => {
      const harness = createHarness();
      harness.source.prices = hourlyPrices(START, [0.01, 0.01, 0.1, 0.1]);
      const first = await harness.controller.start();
      expect(first?.actions.map((a) => a.level)).toEqual([1, 1, 0, 0]);
      const reasons = commitReasons(harness.controller);

      const plan = await harness.controller.setMode('comfort');

      expect(reasons).toEqual(['comfort-change']);
      expect(plan?.actions.map((a) => a.level)).toEqual([1, 1, 1, 0]);
      expect(harness.controller.getMode()).toBe('comfort');
      expect(harness.controller.getStatus().mode).toBe('comfort');

      await expect(harness.controller.setMode('comfort')).resolves.toBe(plan);
      expect(reasons).toEqual(['comfort-change']);
    });
  });

  describe('tick', () => {
    it('emits the due action once per step', async () => {
      const harness = createHarness();
      await harness.controller.start();

      const result = await harness.controller.tick();
      expect(result.replanned).toBeNull();
      expect(result.emitted?.level).toBe(1);
      expect(result.settledPeriods).toBe(0);
      expect(harness.actuator.commands).toEqual([
        { zoneId: 'zone-a', level: 1, effectiveFrom: '2024-01-01T00:00:00.000Z' }
      ]);
      expect(harness.controller.getState()).toBe('executing');
      expect(harness.state.getLastChange('zone-a')).toEqual({ level: 1, timestamp: START_MS });

      followPlan(harness, '2024-01-01T00:30:00.000Z');
      const again = await harness.controller.tick();
      expect(again.emitted).toBeNull();
      expect(harness.actuator.commands).toHaveLength(1);
    });

    it('records what ran and settles each completed period', async () => {
      const harness = createHarness();
      await harness.controller.start();
      await harness.controller.tick();

      followPlan(harness, '2024-01-01T01:00:00.000Z');
      const atOne = await harness.controller.tick();
      expect(atOne.replanned).toBeNull();
      expect(atOne.settledPeriods).toBe(1);

      followPlan(harness, '2024-01-01T02:00:00.000Z');
      const atTwo = await harness.controller.tick();
      expect(atTwo.emitted?.level).toBe(0);
      expect(atTwo.settledPeriods).toBe(1);

      const ledger = harness.savings.ledger();
      expect(ledger.map((r) => r.periodStart)).toEqual([
        '2024-01-01T00:00:00.000Z',
        '2024-01-01T01:00:00.000Z'
      ]);
      expect(ledger[0].realizedEnergyKwh).toBe(2);
      expect(ledger[0].realizedCost).toBe(2);
      expect(harness.state.getLastChange('zone-a')).toEqual({
        level: 0,
        timestamp: Date.parse('2024-01-01T02:00:00.000Z')
      });
    });

    it('replans when the measured temperature drifts from the plan', async () => {
      const harness = createHarness();
      const reasons = commitReasons(harness.controller);
      await harness.controller.start();
      await harness.controller.tick();

      harness.clock.set('2024-01-01T00:30:00.000Z');
      harness.sensor.value = 23;
      const result = await harness.controller.tick();

      expect(result.replanned).toBe('drift');
      expect(reasons).toEqual(['startup', 'drift']);
      expect(committedPlan(harness).id).toBe(`plan-zone-a-${Date.parse('2024-01-01T00:30:00.000Z')}`);
    });

    it('replans on the cadence', async () => {
      const harness = createHarness({ scheduler: { replanCadenceMinutes: 30 } });
      await harness.controller.start();
      await harness.controller.tick();

      followPlan(harness, '2024-01-01T00:30:00.000Z');
      const result = await harness.controller.tick();

      expect(result.replanned).toBe('cadence');
    });

    it('replans once the plan runs out', async () => {
      const harness = createHarness();
      await harness.controller.start();

      harness.clock.set('2024-01-01T04:00:00.000Z');
      harness.source.prices = hourlyPrices('2024-01-01T04:00:00.000Z', [1, 1, 1, 1]);
      const result = await harness.controller.tick();

      expect(result.replanned).toBe('plan-exhausted');
      expect(committedPlan(harness).horizonEnd).toBe('2024-01-01T08:00:00.000Z');
    });

    it('plans without commanding in manual mode', async () => {
      const harness = createHarness();
      await harness.controller.start();
      harness.controller.setAutoControl(false);

      const result = await harness.controller.tick();

      expect(result.emitted).toBeNull();
      expect(harness.actuator.commands).toEqual([]);
      expect(harness.controller.getStatus().status).toBe('manual');
    });

    it('holds the previous level while the minimum dwell is still running', async () => {
      const harness = createHarness({ minDwellMinutes: 60 });
      await harness.controller.start();
      harness.state.recordChange('zone-a', 0, Date.parse('2023-12-31T23:30:00.000Z'));

      const held = await harness.controller.tick();
      expect(held.emitted).toBeNull();
      expect(harness.actuator.commands).toEqual([]);
      expect(harness.logger.warn).toHaveBeenCalledWith('Zone zone-a keeps level 0 for 30 more minutes of minimum dwell');

      followPlan(harness, '2024-01-01T00:30:00.000Z');
      const released = await harness.controller.tick();
      expect(released.emitted?.level).toBe(1);
      expect(harness.actuator.commands).toEqual([
        { zoneId: 'zone-a', level: 1, effectiveFrom: '2024-01-01T00:30:00.000Z' }
      ]);
      expect(harness.state.getLastChange('zone-a')).toEqual({
        level: 1,
        timestamp: Date.parse('2024-01-01T00:30:00.000Z')
      });
    });

    it('feeds the thermal model only when it owns it', async () => {
      const owner = createHarness();
      await owner.controller.start();
      await owner.controller.tick();
      expect(owner.thermal.getStatus().observationCount).toBe(1);

      const member = createHarness({ ownsModel: false });
      await member.controller.start();
      await member.controller.tick();
      expect(member.thermal.getStatus().observationCount).toBe(0);
    });
  });

  describe('status', () => {
    it('describes the running plan and the next change', async () => {
      const harness = createHarness();
      await harness.controller.start();
      await harness.controller.tick();

      const status = harness.controller.getStatus();
      expect(status.state).toBe('executing');
      expect(status.status).toBe('collecting');
      expect(status.planId).toBe(`plan-zone-a-${START_MS}`);
      expect(status.currentLevel).toBe(1);
      expect(status.lastTemperature).toBe(20);
      expect(status.modelConfidence).toBe(0);
      expect(status.todaySavings).toBe(0);
      expect(status.nextChange).toEqual({
        time: '2024-01-01T02:00:00.000Z',
        level: 0,
        reason: 'coasting through higher price'
      });
    });
  });

  it('stops planning and ticking once disposed', async () => {
    const harness = createHarness();
    await harness.controller.start();
    harness.controller.dispose();

    expect(harness.controller.getState()).toBe('removed');
    await expect(harness.controller.requestReplan('manual')).resolves.toBeNull();
    await expect(harness.controller.tick()).resolves.toEqual({ replanned: null, emitted: null, settledPeriods: 0 });
  });
});
