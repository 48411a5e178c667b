import { DefaultSchedulerOptions, planSchedule, planScheduleAsync, SchedulerInput } from '../../optimization/scheduler';
import { createDefaultParameters, ThermalModel } from '../../src/services/thermal-model';
import { ComfortBounds, HeatingLevel, InfeasiblePlanIssue, OptimizationMode, PlanIssue } from '../../src/types';
import { AppError, DataUnavailableError, PlanCancelledError } from '../../src/util/error-handler';
import { hourlyPrices, levelsCapability } from '../mocks';

const START = '2024-01-01T00:00:00.000Z';

const band = (min: number, max: number) => ({
  boundsAt: (): ComfortBounds => ({ min, max, windowId: 'day', source: 'window' })
});

const model = new ThermalModel({
  ...createDefaultParameters(START),
  lossRate: 0.1,
  heatingRate: 3,
  confidence: 0.8,
  usingDefaults: false
});

function createInput(prices: number[], overrides: Partial<SchedulerInput> = {}): SchedulerInput {
  const hours = prices.length;
  return {
    zoneId: 'zone-a',
    prices: hourlyPrices(START, prices),
    horizonStart: new Date(START),
    horizonEnd: new Date(Date.parse(START) + hours * 3_600_000),
    stepMinutes: 60,
    currentTemp: 20,
    currentLevel: 0,
    servedDwellMinutes: null,
    comfort: band(17, 23),
    model,
    capability: levelsCapability([0, 1]),
    outdoorForecast: hourlyPrices(START, new Array<number>(hours).fill(0))
      .map((point) => ({ time: point.time, temperature: point.price })),
    defaultOutdoorTemp: 0,
    options: { ...DefaultSchedulerOptions, minDwellMinutes: 0 },
    createdAt: new Date(START),
    ...overrides
  };
}

const levelsOf = (input: SchedulerInput): HeatingLevel[] => planSchedule(input).actions.map((a) => a.level);

function infeasibleIssue(issues: readonly PlanIssue[]): InfeasiblePlanIssue | undefined {
  return issues.find((issue): issue is InfeasiblePlanIssue => issue.kind === 'InfeasiblePlan');
}

describe('planSchedule', () => {
  describe('cost', () => {
    it('heats in the cheapest hours that keep the band', () => {
      const plan = planSchedule(createInput([1, 1, 10, 10]));
      expect(plan.actions.map((a) => a.level)).toEqual([1, 1, 0, 0]);
      expect(plan.totalCost).toBe(4);
      expect(plan.totalEnergyKwh).toBe(4);
      expect(plan.issues).toEqual([]);
    });

    it('moves heating later when the early hours are expensive', () => {
      const plan = planSchedule(createInput([10, 10, 1, 1]));
      expect(plan.actions.map((a) => a.level)).toEqual([0, 1, 1, 0]);
      expect(plan.totalCost).toBe(22);
    });

    it('coasts through a price spike and reheats after it', () => {
      const outdoor = hourlyPrices(START, new Array<number>(8).fill(15))
        .map((point) => ({ time: point.time, temperature: point.price }));
      const plan = planSchedule(createInput([1, 1, 100, 100, 1, 1, 1, 1], {
        currentTemp: 21,
        comfort: band(18, 22),
        outdoorForecast: outdoor
      }));
      const levels = plan.actions.map((a) => a.level);

      expect(levels.slice(0, 4)).toEqual([0, 0, 0, 0]);
      expect(levels.slice(4).some((level) => level > 0)).toBe(true);
      for (const action of plan.actions) {
        expect(action.predictedTemp).toBeGreaterThanOrEqual(18);
        expect(action.predictedTemp).toBeLessThanOrEqual(22);
      }
      expect(infeasibleIssue(plan.issues)).toBeUndefined();
    });

    it.each<OptimizationMode>(['economy', 'balanced', 'comfort'])(
      'never uses more energy when every price rises by the same amount (%s)',
      (mode) => {
        const prices = [0.05, 0.1, 0.3, 0.1, 0.05, 0.2, 0.4, 0.1];
        const options = { ...DefaultSchedulerOptions, minDwellMinutes: 0, temperatureBinC: 0.001, mode };
        const base = planSchedule(createInput(prices, { options }));
        const shifted = planSchedule(createInput(prices.map((p) => p + 0.5), { options }));
        expect(shifted.totalEnergyKwh).toBeLessThanOrEqual(base.totalEnergyKwh + 1e-9);
      }
    );

    it('scales cost with prices without changing the levels', () => {
      const prices = [3, 1, 4, 1, 5, 9];
      const base = planSchedule(createInput(prices));
      const doubled = planSchedule(createInput(prices.map((p) => p * 2)));
      expect(doubled.actions.map((a) => a.level)).toEqual(base.actions.map((a) => a.level));
      expect(doubled.totalCost).toBe(base.totalCost * 2);
    });
  });

  describe('plan shape', () => {
    it('is deterministic for the same input', () => {
      const input = createInput([5, 2, 8, 1, 3, 7]);
      expect(planSchedule(input)).toEqual(planSchedule(input));
    });

    it('returns a frozen plan with one action per step', () => {
      const plan = planSchedule(createInput([1, 2, 3]));
      expect(plan.id).toBe(`plan-zone-a-${Date.parse(START)}`);
      expect(plan.horizonEnd).toBe('2024-01-01T03:00:00.000Z');
      expect(plan.actions.map((a) => a.start)).toEqual([
        '2024-01-01T00:00:00.000Z',
        '2024-01-01T01:00:00.000Z',
        '2024-01-01T02:00:00.000Z'
      ]);
      expect(plan.confidence).toBe(0.8);
      expect(Object.isFrozen(plan)).toBe(true);
      expect(Object.isFrozen(plan.actions[0])).toBe(true);
    });

    it('rejects a horizon without a whole step', () => {
      expect(() => planSchedule(createInput([1], { horizonEnd: new Date(START) }))).toThrow(AppError);
    });
  });

  describe('constraints', () => {
    it('keeps every predicted temperature inside the band', () => {
      const plan = planSchedule(createInput([5, 2, 8, 1, 3, 7, 2, 2]));
      for (const action of plan.actions) {
        expect(action.predictedTemp).toBeGreaterThanOrEqual(17);
        expect(action.predictedTemp).toBeLessThanOrEqual(23);
      }
    });

    it('never plans below the freeze floor', () => {
      const outdoor = hourlyPrices(START, new Array<number>(6).fill(-10))
        .map((point) => ({ time: point.time, temperature: point.price }));
      const plan = planSchedule(createInput([1, 1, 1, 1, 1, 1], {
        currentTemp: 6,
        comfort: band(0, 30),
        outdoorForecast: outdoor
      }));
      expect(plan.actions[0].level).toBe(1);
      for (const action of plan.actions) {
        expect(action.predictedTemp).toBeGreaterThanOrEqual(5);
      }
    });

    it('holds each level for the minimum dwell', () => {
      const input = createInput([1, 10, 1, 10, 1, 10, 1, 10], {
        options: { ...DefaultSchedulerOptions, minDwellMinutes: 120 }
      });
      const levels = levelsOf(input);
      const switches = levels
        .map((level, i) => (level !== (i === 0 ? input.currentLevel : levels[i - 1]) ? i : -1))
        .filter((i) => i >= 0);
      for (let k = 1; k < switches.length; k++) {
        expect(switches[k] - switches[k - 1]).toBeGreaterThanOrEqual(2);
      }
    });

    it('counts a switch made partway through the first step against the dwell', () => {
      const options = { ...DefaultSchedulerOptions, minDwellMinutes: 60 };
      const atStepStart = createInput([1, 10, 1, 1], { currentTemp: 17, comfort: band(16, 23), options });
      expect(levelsOf(atStepStart)).toEqual([1, 0, 1, 0]);

      // switched on at 00:30, the level must hold until 01:30
      const midStep = { ...atStepStart, switchOffsetMinutes: 30 };
      expect(levelsOf(midStep)).toEqual([1, 1, 1, 0]);
    });

    it('plans only the levels the zone allows', () => {
      const levels = levelsOf(createInput([5, 2, 8, 1, 3, 7], {
        capability: levelsCapability([0, 0.25, 0.5, 0.75, 1]),
        allowedLevels: [0, 1]
      }));
      for (const level of levels) {
        expect([0, 1]).toContain(level);
      }
    });

    it('rejects allowed levels the actuator cannot run', () => {
      expect(() => planSchedule(createInput([1, 1], { allowedLevels: [0.5] }))).toThrow(AppError);
    });

    it('ramps at full power from below the band and reports the shortfall', () => {
      const plan = planSchedule(createInput([1, 1, 1, 1], {
        currentTemp: 18,
        comfort: band(20, 22),
        capability: levelsCapability([0, 0.25, 0.5, 0.75, 1])
      }));
      expect(plan.actions[0].level).toBe(1);
      expect(plan.actions[1].level).toBe(1);
      for (const action of plan.actions.slice(1)) {
        expect(action.predictedTemp).toBeGreaterThanOrEqual(20);
      }

      const issue = infeasibleIssue(plan.issues);
      expect(issue?.reason).toBe('unreachable-from-current-state');
      expect(issue?.relaxationC).toBe(0.858);
      expect(issue?.windows).toEqual([{
        windowId: 'day',
        from: '2024-01-01T00:00:00.000Z',
        to: '2024-01-01T01:00:00.000Z',
        belowMinC: 0.858,
        aboveMaxC: 0
      }]);
    });

    it('widens a band that no level sequence can meet', () => {
      const plan = planSchedule(createInput([1, 1, 1], {
        currentTemp: 20.2,
        comfort: band(20, 20.3)
      }));
      const issue = infeasibleIssue(plan.issues);
      expect(issue?.reason).toBe('bounds-widened');
      expect(issue?.detail).toBe('Comfort band widened by 1°C');
      expect(plan.actions.map((a) => a.level)).toEqual([1, 0, 1]);
    });

    it('drops the upper bound as a last resort', () => {
      const plan = planSchedule(createInput([1, 1, 1], {
        currentTemp: 20.2,
        comfort: band(20, 20.3),
        options: { ...DefaultSchedulerOptions, minDwellMinutes: 0, maxRelaxationC: 0 }
      }));
      expect(infeasibleIssue(plan.issues)?.reason).toBe('upper-bound-dropped');
      expect(plan.actions.map((a) => a.level)).toEqual([1, 1, 1]);
    });
  });

  describe('missing data', () => {
    it('fills missing prices and reports them', () => {
      const input = createInput([1, 2, 3, 4]);
      const plan = planSchedule({ ...input, prices: input.prices.slice(0, 2) });

      expect(plan.actions.map((a) => a.price)).toEqual([1, 2, 2, 2]);
      expect(plan.issues).toContainEqual({
        kind: 'DataUnavailable',
        source: 'price',
        affectedSteps: 2,
        stale: false,
        detail: '2 of 4 steps lacked prices (0 from cache, 2 from last known price)'
      });
      expect(plan.confidence).toBeCloseTo(0.6, 10);
    });

    it('reports a missing outdoor forecast', () => {
      const plan = planSchedule(createInput([1, 1], { outdoorForecast: [] }));
      expect(plan.issues).toContainEqual({
        kind: 'ModelDegraded',
        reason: 'missing-exogenous',
        confidence: 0.8,
        detail: 'Outdoor temperature missing for 2 of 2 steps; carried forward'
      });
    });

    it('fails without any price', () => {
      expect(() => planSchedule(createInput([1, 1], { prices: [] }))).toThrow(DataUnavailableError);
    });
  });

  describe('cancellation', () => {
    it('stops when asked to abort', () => {
      expect(() => planSchedule(createInput([1, 1], { shouldAbort: () => true }))).toThrow(PlanCancelledError);
    });

    it('plans the same schedule when run asynchronously', async () => {
      const input = createInput([5, 2, 8, 1, 3, 7]);
      await expect(planScheduleAsync(input, 1)).resolves.toEqual(planSchedule(input));
    });

    it('stops between steps once the abort flag is raised', async () => {
      let aborted = false;
      const planning = planScheduleAsync(createInput(new Array<number>(24).fill(1), {
        shouldAbort: () => aborted
      }), 1);
      setImmediate(() => {
        aborted = true;
      });
      await expect(planning).rejects.toThrow(PlanCancelledError);
    });
  });
});
