/**
 * Heating Scheduler (pure, DI-friendly)
 *
 * Finds the least-cost heating-level sequence over a planning horizon that
 * keeps the predicted temperature inside the comfort band, by forward
 * dynamic programming over (temperature bin, level, dwell counter).
 *
 * It performs no I/O. Callers inject prices, the comfort policy, the thermal
 * model and the actuator capability, and receive a frozen ActionPlan. When
 * the band cannot be met the bounds are relaxed step by step (never the
 * freeze-protection floor) and the relaxation is reported in the plan.
 *
 * The search yields after every DP step. `planSchedule` runs it to the end
 * in one go; `planScheduleAsync` hands the event loop back between steps so
 * a cancellation can land while the search is running.
 */

import {
  ActionPlan,
  ActuatorCapability,
  ComfortBounds,
  DataUnavailableIssue,
  HeatingLevel,
  InfeasiblePlanIssue,
  OptimizationMode,
  OutdoorForecastPoint,
  PlanIssue,
  PlannedAction,
  PricePoint,
  RelaxedWindow
} from '../src/types';
import { AppError, DataUnavailableError, ErrorCategory, PlanCancelledError } from '../src/util/error-handler';
import { stepTemperature, ThermalModel } from '../src/services/thermal-model/thermal-model';
import {
  dwellAfterSwitch,
  dwellSteps,
  intersectLevels,
  nearestLevelIndex,
  normalizeLevels,
  servedDwellSteps
} from './dwell-constraints';
import { resamplePrices } from './price-curve';

// ----- Types -----

export interface ComfortBoundsProvider {
  boundsAt(timestamp: Date | string): ComfortBounds;
}

export type ThermalPredictor = Pick<ThermalModel, 'predict' | 'getParameters'>;

export interface SchedulerOptions {
  ratedPowerKw: number;
  minDwellMinutes: number;
  freezeFloorC: number;
  temperatureBinC: number;
  relaxationStepC: number;
  maxRelaxationC: number;
  mode: OptimizationMode;
  /** Money a degree-hour below the band midpoint is worth at mode weight 1 */
  comfortValuePerDegreeHour: number;
}

export interface SchedulerInput {
  zoneId: string;
  prices: readonly PricePoint[];
  /** Last good curve, used for steps the current curve lacks */
  cachedPrices?: readonly PricePoint[];
  /** The price curve itself came from cache because the source failed */
  pricesStale?: boolean;
  horizonStart: Date;
  horizonEnd: Date;
  stepMinutes: number;
  currentTemp: number;
  currentLevel: HeatingLevel;
  /**
   * Minutes the current level had been held at the horizon start; negative
   * when it was switched after it, null when unknown
   */
  servedDwellMinutes: number | null;
  /** Minutes into the first step at which a change of level takes effect */
  switchOffsetMinutes?: number;
  comfort: ComfortBoundsProvider;
  model: ThermalPredictor;
  capability: ActuatorCapability;
  /** Levels the zone may use; planning uses those the actuator also supports */
  allowedLevels?: readonly HeatingLevel[];
  outdoorForecast: readonly OutdoorForecastPoint[];
  defaultOutdoorTemp: number;
  options: SchedulerOptions;
  /** Issues found upstream (e.g. a degraded model) carried into the plan */
  issues?: readonly PlanIssue[];
  /** Checked after every DP step */
  shouldAbort?: () => boolean;
  createdAt?: Date;
}

export const DefaultSchedulerOptions: SchedulerOptions = {
  ratedPowerKw: 2,
  minDwellMinutes: 30,
  freezeFloorC: 5,
  temperatureBinC: 0.1,
  relaxationStepC: 0.5,
  maxRelaxationC: 3,
  mode: 'economy',
  comfortValuePerDegreeHour: 0.2
};

/**
 * Multiplier of `comfortValuePerDegreeHour` per optimisation mode. The
 * penalty does not move with prices, so a uniform price rise never buys
 * more heating.
 */
export const ComfortPenaltyWeights: Record<OptimizationMode, number> = {
  economy: 0,
  balanced: 0.25,
  comfort: 1
};

// Penalty per °C·h outside the original band once it has been relaxed
const RELAXED_BAND_PENALTY = 1000;

const EPS = 1e-9;

// DP steps between two hand-backs to the event loop
const DEFAULT_YIELD_EVERY_STEPS = 4;

// ----- Helpers -----

interface StepContext {
  startMs: number;
  endMs: number;
  price: number;
  outdoor: number;
  bounds: ComfortBounds;
}

interface Node {
  temp: number;
  levelIndex: number;
  dwell: number;
  money: number;
  objective: number;
  energy: number;
  sumLevel: number;
  sumLevelSq: number;
  switches: number;
  parent: Node | null;
}

interface Stage {
  relaxationC: number;
  dropUpper: boolean;
}

function nearlyEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= EPS * Math.max(1, Math.abs(a), Math.abs(b));
}

/**
 * Strict preference between two partial paths of the same length.
 */
function isBetter(a: Node, b: Node, steps: number): boolean {
  if (!nearlyEqual(a.objective, b.objective)) {
    return a.objective < b.objective;
  }
  const varianceA = a.sumLevelSq / steps - (a.sumLevel / steps) ** 2;
  const varianceB = b.sumLevelSq / steps - (b.sumLevel / steps) ** 2;
  if (!nearlyEqual(varianceA, varianceB)) {
    return varianceA < varianceB;
  }
  if (a.switches !== b.switches) {
    return a.switches < b.switches;
  }
  if (!nearlyEqual(a.sumLevel, b.sumLevel)) {
    return a.sumLevel < b.sumLevel;
  }
  return false;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function resampleOutdoor(
  forecast: readonly OutdoorForecastPoint[],
  startMs: number,
  stepMs: number,
  steps: number
): (number | undefined)[] {
  const points = forecast
    .map((p) => ({ ms: Date.parse(p.time), value: p.temperature }))
    .filter((p) => Number.isFinite(p.ms) && Number.isFinite(p.value))
    .sort((a, b) => a.ms - b.ms);
  if (points.length === 0) {
    return new Array<number | undefined>(steps).fill(undefined);
  }
  let spacing = Infinity;
  for (let i = 1; i < points.length; i++) {
    spacing = Math.min(spacing, points[i].ms - points[i - 1].ms);
  }
  const coverMs = Number.isFinite(spacing) && spacing > 0 ? spacing : Math.max(stepMs, 3_600_000);

  const result: (number | undefined)[] = [];
  let index = 0;
  for (let i = 0; i < steps; i++) {
    const ms = startMs + i * stepMs;
    while (index + 1 < points.length && points[index + 1].ms <= ms) {
      index++;
    }
    const point = points[index];
    result.push(point.ms <= ms && ms < point.ms + coverMs ? point.value : undefined);
  }
  return result;
}

// ----- Planning -----

function checkAbort(input: SchedulerInput, step: number): void {
  if (input.shouldAbort && input.shouldAbort()) {
    throw new PlanCancelledError(`Planning for zone ${input.zoneId} cancelled after step ${step}`);
  }
}

export function planSchedule(input: SchedulerInput): ActionPlan {
  const search = searchPlan(input);
  let result = search.next();
  while (!result.done) {
    checkAbort(input, result.value);
    result = search.next();
  }
  return result.value;
}

/**
 * Same plan as `planSchedule`, handing the event loop back every
 * `yieldEverySteps` DP steps so triggers can cancel the search.
 */
export async function planScheduleAsync(
  input: SchedulerInput,
  yieldEverySteps: number = DEFAULT_YIELD_EVERY_STEPS
): Promise<ActionPlan> {
  const every = Math.max(1, Math.floor(yieldEverySteps));
  const search = searchPlan(input);
  let count = 0;
  let result = search.next();
  while (!result.done) {
    count++;
    if (count % every === 0) {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
    checkAbort(input, result.value);
    result = search.next();
  }
  return result.value;
}

function* searchPlan(input: SchedulerInput): Generator<number, ActionPlan, undefined> {
  const options = input.options;
  const stepMs = input.stepMinutes * 60000;
  const startMs = input.horizonStart.getTime();
  const steps = Math.round((input.horizonEnd.getTime() - startMs) / stepMs);

  if (!(input.stepMinutes > 0) || !Number.isFinite(steps) || steps < 1) {
    throw new AppError(
      `Horizon ${input.horizonStart.toISOString()}..${input.horizonEnd.toISOString()} holds no ${input.stepMinutes}-minute step`,
      ErrorCategory.VALIDATION
    );
  }

  const supported = input.capability.supportsLevels();
  const levels = input.allowedLevels ? intersectLevels(supported, input.allowedLevels) : normalizeLevels(supported);
  if (levels.length === 0) {
    throw new AppError(`No usable heating levels for zone ${input.zoneId}`, ErrorCategory.VALIDATION);
  }

  const issues: PlanIssue[] = [...(input.issues ?? [])];

  // Prices on the step grid
  const resampled = resamplePrices(input.prices, { startMs, stepMinutes: input.stepMinutes, steps }, input.cachedPrices);
  if (!resampled) {
    throw new DataUnavailableError(`No price data available for zone ${input.zoneId}`);
  }
  if (resampled.missingSteps > 0 || input.pricesStale) {
    const issue: DataUnavailableIssue = {
      kind: 'DataUnavailable',
      source: 'price',
      affectedSteps: input.pricesStale ? steps : resampled.missingSteps,
      stale: input.pricesStale === true,
      detail: input.pricesStale
        ? 'Price source unavailable; planning on the cached curve'
        : `${resampled.missingSteps} of ${steps} steps lacked prices ` +
          `(${resampled.filledFromCache} from cache, ${resampled.filledFromLastKnown} from last known price)`
    };
    issues.push(issue);
  }

  // Outdoor temperature per step, carried forward where missing
  const outdoorRaw = resampleOutdoor(input.outdoorForecast, startMs, stepMs, steps);
  const outdoorPrediction = input.model.predict(input.currentTemp, new Array<number>(steps).fill(0), {
    stepMinutes: input.stepMinutes,
    outdoor: outdoorRaw,
    defaultOutdoor: input.defaultOutdoorTemp
  });
  const parameters = input.model.getParameters();
  if (outdoorPrediction.degraded) {
    issues.push({
      kind: 'ModelDegraded',
      reason: 'missing-exogenous',
      confidence: parameters.confidence,
      detail: `Outdoor temperature missing for ${outdoorPrediction.missingSteps} of ${steps} steps; carried forward`
    });
  }

  const context: StepContext[] = [];
  for (let i = 0; i < steps; i++) {
    const stepStart = startMs + i * stepMs;
    const stepEnd = stepStart + stepMs;
    context.push({
      startMs: stepStart,
      endMs: stepEnd,
      price: resampled.prices[i],
      outdoor: outdoorPrediction.outdoorUsed[i],
      // The band applies to the temperature reached at the end of the step
      bounds: input.comfort.boundsAt(new Date(stepEnd))
    });
  }

  const hours = input.stepMinutes / 60;
  const requiredDwell = dwellSteps(options.minDwellMinutes, input.stepMinutes);
  const initialLevelIndex = nearestLevelIndex(input.currentLevel, levels);
  const initialDwell = servedDwellSteps(input.servedDwellMinutes, input.stepMinutes, options.minDwellMinutes);
  const firstSwitchDwell = dwellAfterSwitch(input.switchOffsetMinutes ?? 0, input.stepMinutes, options.minDwellMinutes);

  // Extreme trajectories bound what any sequence can reach
  const maxTrajectory = extremeTrajectory(levels.length - 1);
  const minTrajectory = extremeTrajectory(0);

  function extremeTrajectory(targetIndex: number): number[] {
    const temps: number[] = [];
    let temp = input.currentTemp;
    const forcedHold = targetIndex === initialLevelIndex ? 0 : Math.max(0, requiredDwell - initialDwell);
    for (let i = 0; i < steps; i++) {
      const levelIndex = i < forcedHold ? initialLevelIndex : targetIndex;
      temp = stepTemperature(parameters, temp, levels[levelIndex], context[i].outdoor, hours);
      temps.push(temp);
    }
    return temps;
  }

  const meanPrice = resampled.prices.reduce((sum, p) => sum + Math.abs(p), 0) / steps;
  const comfortWeight = ComfortPenaltyWeights[options.mode] * options.comfortValuePerDegreeHour;
  const relaxedPenalty = RELAXED_BAND_PENALTY * Math.max(meanPrice, EPS) * options.ratedPowerKw;

  const stages: Stage[] = [];
  const relaxStep = options.relaxationStepC > 0 ? options.relaxationStepC : options.maxRelaxationC;
  for (let r = 0; r <= options.maxRelaxationC + EPS; r += relaxStep) {
    stages.push({ relaxationC: Math.min(r, options.maxRelaxationC), dropUpper: false });
    if (relaxStep <= 0) {
      break;
    }
  }
  stages.push({ relaxationC: options.maxRelaxationC, dropUpper: true });

  let best: Node | null = null;
  let usedStage: Stage = stages[0];
  for (const stage of stages) {
    best = yield* runStage(stage);
    if (best) {
      usedStage = stage;
      break;
    }
  }

  // Binning can, in principle, discard the max-heat path; fall back to it
  const path: number[] = best ? reconstruct(best) : maxHeatPath();
  if (!best) {
    usedStage = stages[stages.length - 1];
  }

  function lowerBound(i: number, stage: Stage): number {
    const relaxed = Math.max(options.freezeFloorC, context[i].bounds.min - stage.relaxationC);
    return Math.min(maxTrajectory[i], relaxed);
  }

  function upperBound(i: number, stage: Stage): number {
    if (stage.dropUpper) {
      return Infinity;
    }
    return Math.max(minTrajectory[i], context[i].bounds.max + stage.relaxationC);
  }

  function* runStage(stage: Stage): Generator<number, Node | null, undefined> {
    let frontier: Node[] = [{
      temp: input.currentTemp,
      levelIndex: initialLevelIndex,
      dwell: initialDwell,
      money: 0,
      objective: 0,
      energy: 0,
      sumLevel: 0,
      sumLevelSq: 0,
      switches: 0,
      parent: null
    }];

    for (let i = 0; i < steps; i++) {
      const step = context[i];
      const lower = lowerBound(i, stage);
      const upper = upperBound(i, stage);
      const midpoint = (step.bounds.min + step.bounds.max) / 2;
      const next = new Map<string, Node>();

      for (const node of frontier) {
        for (let li = 0; li < levels.length; li++) {
          const switching = li !== node.levelIndex;
          if (switching && node.dwell < requiredDwell) {
            continue;
          }

          const level = levels[li];
          const temp = stepTemperature(parameters, node.temp, level, step.outdoor, hours);
          const atMax = li === levels.length - 1;

          // Freeze floor holds unless the step already runs flat out
          if (temp < options.freezeFloorC - EPS && !atMax) {
            continue;
          }
          if (temp < lower - EPS || temp > upper + EPS) {
            continue;
          }

          const energy = level * options.ratedPowerKw * hours;
          const money = step.price * energy;
          const outside = Math.max(0, step.bounds.min - temp) + Math.max(0, temp - step.bounds.max);
          const objective = money
            + comfortWeight * Math.max(0, midpoint - temp) * hours
            + relaxedPenalty * outside * hours;

          const candidate: Node = {
            temp,
            levelIndex: li,
            dwell: switching ? (i === 0 ? firstSwitchDwell : 1) : Math.min(node.dwell + 1, Math.max(requiredDwell, 1)),
            money: node.money + money,
            objective: node.objective + objective,
            energy: node.energy + energy,
            sumLevel: node.sumLevel + level,
            sumLevelSq: node.sumLevelSq + level * level,
            switches: node.switches + (switching ? 1 : 0),
            parent: node
          };

          const key = `${Math.round(temp / options.temperatureBinC)}|${li}|${candidate.dwell}`;
          const existing = next.get(key);
          if (!existing || isBetter(candidate, existing, i + 1)) {
            next.set(key, candidate);
          }
        }
      }

      if (next.size === 0) {
        return null;
      }
      frontier = [...next.values()];
      yield i;
    }

    let winner: Node | null = null;
    for (const node of frontier) {
      if (!winner || isBetter(node, winner, steps)) {
        winner = node;
      }
    }
    return winner;
  }

  function reconstruct(node: Node): number[] {
    const indices: number[] = [];
    let cursor: Node | null = node;
    while (cursor && cursor.parent) {
      indices.push(cursor.levelIndex);
      cursor = cursor.parent;
    }
    return indices.reverse();
  }

  function maxHeatPath(): number[] {
    const forcedHold = levels.length - 1 === initialLevelIndex ? 0 : Math.max(0, requiredDwell - initialDwell);
    return context.map((_, i) => (i < forcedHold ? initialLevelIndex : levels.length - 1));
  }

  // ----- Build the plan -----

  const actions: PlannedAction[] = [];
  let temp = input.currentTemp;
  let totalCost = 0;
  let totalEnergy = 0;
  for (let i = 0; i < steps; i++) {
    const step = context[i];
    const level = levels[path[i]];
    temp = stepTemperature(parameters, temp, level, step.outdoor, hours);
    const energyKwh = level * options.ratedPowerKw * hours;
    const cost = step.price * energyKwh;
    totalCost += cost;
    totalEnergy += energyKwh;
    actions.push({
      start: new Date(step.startMs).toISOString(),
      end: new Date(step.endMs).toISOString(),
      level,
      predictedTemp: temp,
      minTemp: step.bounds.min,
      maxTemp: step.bounds.max,
      windowId: step.bounds.windowId,
      price: step.price,
      energyKwh,
      cost
    });
  }

  const relaxedWindows = collectRelaxedWindows(actions);
  if (relaxedWindows.length > 0 || usedStage.relaxationC > 0 || usedStage.dropUpper) {
    const magnitude = relaxedWindows.reduce((max, w) => Math.max(max, w.belowMinC, w.aboveMaxC), 0);
    const reason: InfeasiblePlanIssue['reason'] = usedStage.dropUpper
      ? 'upper-bound-dropped'
      : usedStage.relaxationC > 0 ? 'bounds-widened' : 'unreachable-from-current-state';
    issues.push({
      kind: 'InfeasiblePlan',
      reason,
      relaxationC: Number(magnitude.toFixed(3)),
      windows: relaxedWindows,
      detail: usedStage.dropUpper
        ? `Comfort band infeasible even widened by ${options.maxRelaxationC}°C; upper bound dropped`
        : usedStage.relaxationC > 0
          ? `Comfort band widened by ${usedStage.relaxationC}°C`
          : `Comfort band not reachable from ${input.currentTemp.toFixed(1)}°C; following the best reachable trajectory`
    });
  }

  const missingFraction = resampled.missingSteps / steps;
  const createdAt = input.createdAt ?? input.horizonStart;

  const plan: ActionPlan = {
    id: `plan-${input.zoneId}-${createdAt.getTime()}`,
    zoneId: input.zoneId,
    createdAt: createdAt.toISOString(),
    horizonStart: new Date(startMs).toISOString(),
    horizonEnd: new Date(startMs + steps * stepMs).toISOString(),
    stepMinutes: input.stepMinutes,
    startTemp: input.currentTemp,
    actions,
    totalCost,
    totalEnergyKwh: totalEnergy,
    confidence: parameters.confidence * (1 - 0.5 * missingFraction),
    issues
  };

  return deepFreeze(plan);
}

/**
 * Group steps predicted outside their original band into per-window runs.
 */
export function collectRelaxedWindows(actions: readonly PlannedAction[]): RelaxedWindow[] {
  const windows: RelaxedWindow[] = [];
  let current: RelaxedWindow | null = null;

  for (const action of actions) {
    const below = Math.max(0, action.minTemp - action.predictedTemp);
    const above = Math.max(0, action.predictedTemp - action.maxTemp);
    const outside = below > 1e-6 || above > 1e-6;

    if (!outside) {
      current = null;
      continue;
    }

    if (current && current.windowId === action.windowId && current.to === action.start) {
      current.to = action.end;
      current.belowMinC = Math.max(current.belowMinC, below);
      current.aboveMaxC = Math.max(current.aboveMaxC, above);
    } else {
      current = {
        windowId: action.windowId,
        from: action.start,
        to: action.end,
        belowMinC: below,
        aboveMaxC: above
      };
      windows.push(current);
    }
  }

  return windows.map((w) => ({
    ...w,
    belowMinC: Number(w.belowMinC.toFixed(3)),
    aboveMaxC: Number(w.aboveMaxC.toFixed(3))
  }));
}

/**
 * Index of the first step whose level differs from `fromLevel`, or -1.
 */
export function findNextChange(plan: ActionPlan, fromIndex: number, fromLevel: HeatingLevel): number {
  for (let i = Math.max(0, fromIndex); i < plan.actions.length; i++) {
    if (Math.abs(plan.actions[i].level - fromLevel) > 1e-9) {
      return i;
    }
  }
  return -1;
}
