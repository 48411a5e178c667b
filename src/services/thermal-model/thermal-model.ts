/**
 * Thermal Model
 *
 * First-order model of a zone: indoor temperature decays exponentially
 * toward an equilibrium set by the outdoor temperature and the heating level.
 *
 *   dT/dt = lossRate * (T_out - T) + heatingRate * level
 *
 * `predict` is a pure function of the current parameters. `update` refits
 * the parameters by weighted least squares over the retained history, with
 * weights halving every `halfLifeHours` so recent behaviour dominates.
 */

import { Clock, HeatingLevel, ThermalState } from '../../types';

export interface ThermalParameters {
  // Heat loss rate toward outdoor temperature (1/h)
  lossRate: number;

  // Temperature rise rate at full heating level (°C/h)
  heatingRate: number;

  // Confidence in the model (0-1)
  confidence: number;

  // Weighted coefficient of determination of the last fit (0-1)
  rSquared: number;

  // Mean absolute one-step prediction error of the last fit (°C)
  meanAbsError: number | null;

  sampleCount: number;
  usingDefaults: boolean;
  lastUpdated: string;
}

export type FitStatus = 'fitted' | 'insufficient-history' | 'degenerate-data';

export interface FitResult {
  status: FitStatus;
  parameters: ThermalParameters;
  sampleCount: number;
  detail: string;
}

export interface ExogenousInputs {
  stepMinutes: number;
  /** Outdoor temperature per step; undefined entries are carried forward */
  outdoor: ReadonlyArray<number | undefined>;
  /** Used when no outdoor value has been seen yet */
  defaultOutdoor: number;
}

export interface TrajectoryPrediction {
  /** Temperature at the end of each step */
  temperatures: number[];
  /** Outdoor temperature actually used for each step */
  outdoorUsed: number[];
  degraded: boolean;
  missingSteps: number;
}

export interface ThermalModelOptions {
  minSamples?: number;
  halfLifeHours?: number;
  smoothing?: number;
  fullConfidenceSamples?: number;
  clock?: Clock;
}

// Conservative defaults used until enough history exists
export const DEFAULT_LOSS_RATE = 0.1;
export const DEFAULT_HEATING_RATE = 3.0;
export const DEFAULT_MIN_SAMPLES = 24;
export const DEFAULT_HALF_LIFE_HOURS = 72;
export const DEFAULT_SMOOTHING = 0.8;
export const FULL_CONFIDENCE_SAMPLES = 168; // one week of hourly data

const MIN_SAMPLE_GAP_HOURS = 0.1;
const MAX_SAMPLE_GAP_HOURS = 3;
const LOSS_RATE_RANGE: [number, number] = [0.005, 2];
const HEATING_RATE_RANGE: [number, number] = [0.05, 20];

interface Sample {
  atMs: number;
  indoor: number;
  nextIndoor: number;
  outdoor: number;
  level: HeatingLevel;
  hours: number;
}

export function createDefaultParameters(now: string = new Date().toISOString()): ThermalParameters {
  return {
    lossRate: DEFAULT_LOSS_RATE,
    heatingRate: DEFAULT_HEATING_RATE,
    confidence: 0,
    rSquared: 0,
    meanAbsError: null,
    sampleCount: 0,
    usingDefaults: true,
    lastUpdated: now
  };
}

export function isThermalParameters(value: unknown): value is ThermalParameters {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: Partial<Record<keyof ThermalParameters, unknown>> = value;
  return typeof candidate.lossRate === 'number'
    && typeof candidate.heatingRate === 'number'
    && typeof candidate.confidence === 'number'
    && typeof candidate.sampleCount === 'number'
    && typeof candidate.usingDefaults === 'boolean'
    && typeof candidate.lastUpdated === 'string';
}

/**
 * Temperature after `hours` at a constant level and outdoor temperature.
 */
export function stepTemperature(
  parameters: Pick<ThermalParameters, 'lossRate' | 'heatingRate'>,
  temperature: number,
  level: HeatingLevel,
  outdoor: number,
  hours: number
): number {
  const equilibrium = outdoor + (parameters.heatingRate / parameters.lossRate) * level;
  return equilibrium + (temperature - equilibrium) * Math.exp(-parameters.lossRate * hours);
}

export class ThermalModel {
  private parameters: ThermalParameters;
  private readonly minSamples: number;
  private readonly halfLifeHours: number;
  private readonly smoothing: number;
  private readonly fullConfidenceSamples: number;
  private readonly clock: Clock;

  constructor(initial?: ThermalParameters, options: ThermalModelOptions = {}) {
    this.parameters = initial ? { ...initial } : createDefaultParameters();
    this.minSamples = options.minSamples ?? DEFAULT_MIN_SAMPLES;
    this.halfLifeHours = options.halfLifeHours ?? DEFAULT_HALF_LIFE_HOURS;
    this.smoothing = options.smoothing ?? DEFAULT_SMOOTHING;
    this.fullConfidenceSamples = options.fullConfidenceSamples ?? FULL_CONFIDENCE_SAMPLES;
    this.clock = options.clock ?? (() => new Date());
  }

  public getParameters(): ThermalParameters {
    return { ...this.parameters };
  }

  public getMinSamples(): number {
    return this.minSamples;
  }

  /**
   * Predict the temperature trajectory for a sequence of heating levels.
   */
  public predict(
    currentTemp: number,
    levels: ReadonlyArray<HeatingLevel>,
    exogenous: ExogenousInputs
  ): TrajectoryPrediction {
    const hours = exogenous.stepMinutes / 60;
    const temperatures: number[] = [];
    const outdoorUsed: number[] = [];
    let missingSteps = 0;
    let lastOutdoor: number | undefined;
    let temperature = currentTemp;

    for (let i = 0; i < levels.length; i++) {
      const provided = exogenous.outdoor[i];
      let outdoor: number;
      if (provided !== undefined && Number.isFinite(provided)) {
        outdoor = provided;
        lastOutdoor = provided;
      } else {
        missingSteps++;
        outdoor = lastOutdoor ?? exogenous.defaultOutdoor;
      }
      temperature = stepTemperature(this.parameters, temperature, levels[i], outdoor, hours);
      temperatures.push(temperature);
      outdoorUsed.push(outdoor);
    }

    return { temperatures, outdoorUsed, degraded: missingSteps > 0, missingSteps };
  }

  /**
   * Refit parameters from observed history. Never throws: degenerate data
   * keeps the previous parameters and lowers confidence.
   */
  public update(history: ReadonlyArray<ThermalState>): FitResult {
    const samples = this.buildSamples(history);

    if (samples.length < this.minSamples) {
      this.parameters = {
        ...createDefaultParameters(this.clock().toISOString()),
        sampleCount: samples.length
      };
      return {
        status: 'insufficient-history',
        parameters: this.getParameters(),
        sampleCount: samples.length,
        detail: `Have ${samples.length} usable samples, need ${this.minSamples}; using default parameters`
      };
    }

    const newestMs = samples[samples.length - 1].atMs;
    let s11 = 0;
    let s12 = 0;
    let s22 = 0;
    let s1y = 0;
    let s2y = 0;
    let sw = 0;
    let swy = 0;

    const weighted = samples.map((sample) => {
      const ageHours = (newestMs - sample.atMs) / 3_600_000;
      const weight = Math.pow(0.5, ageHours / this.halfLifeHours);
      const x1 = sample.outdoor - sample.indoor;
      const x2 = sample.level;
      const y = (sample.nextIndoor - sample.indoor) / sample.hours;
      s11 += weight * x1 * x1;
      s12 += weight * x1 * x2;
      s22 += weight * x2 * x2;
      s1y += weight * x1 * y;
      s2y += weight * x2 * y;
      sw += weight;
      swy += weight * y;
      return { weight, x1, x2, y };
    });

    const det = s11 * s22 - s12 * s12;
    if (s11 <= 0 || s22 <= 0 || Math.abs(det) <= 1e-9 * s11 * s22) {
      return this.degenerate(samples.length, 'Inputs have no usable variance (singular normal equations)');
    }

    const lossRate = (s1y * s22 - s2y * s12) / det;
    const heatingRate = (s2y * s11 - s1y * s12) / det;

    if (!Number.isFinite(lossRate) || !Number.isFinite(heatingRate)
      || lossRate < LOSS_RATE_RANGE[0] || lossRate > LOSS_RATE_RANGE[1]
      || heatingRate < HEATING_RATE_RANGE[0] || heatingRate > HEATING_RATE_RANGE[1]) {
      return this.degenerate(
        samples.length,
        `Fitted parameters are not physical (lossRate=${lossRate.toFixed(4)}, heatingRate=${heatingRate.toFixed(4)})`
      );
    }

    const meanY = swy / sw;
    let ssRes = 0;
    let ssTot = 0;
    for (const point of weighted) {
      const residual = point.y - (lossRate * point.x1 + heatingRate * point.x2);
      ssRes += point.weight * residual * residual;
      ssTot += point.weight * (point.y - meanY) * (point.y - meanY);
    }
    const rSquared = ssTot > 0 ? Math.max(0, Math.min(1, 1 - ssRes / ssTot)) : 0;

    // Blend with a previous fit for stability; a first fit replaces the defaults
    const blend = this.parameters.usingDefaults ? 1 : this.smoothing;
    const blendedLoss = blend * lossRate + (1 - blend) * this.parameters.lossRate;
    const blendedHeating = blend * heatingRate + (1 - blend) * this.parameters.heatingRate;

    const fitted = { lossRate: blendedLoss, heatingRate: blendedHeating };
    let absErrorSum = 0;
    for (const sample of samples) {
      const predicted = stepTemperature(fitted, sample.indoor, sample.level, sample.outdoor, sample.hours);
      absErrorSum += Math.abs(predicted - sample.nextIndoor);
    }

    this.parameters = {
      lossRate: blendedLoss,
      heatingRate: blendedHeating,
      confidence: Math.min(1, samples.length / this.fullConfidenceSamples) * (0.5 + 0.5 * rSquared),
      rSquared,
      meanAbsError: absErrorSum / samples.length,
      sampleCount: samples.length,
      usingDefaults: false,
      lastUpdated: this.clock().toISOString()
    };

    return {
      status: 'fitted',
      parameters: this.getParameters(),
      sampleCount: samples.length,
      detail: `Fitted from ${samples.length} samples (R²=${rSquared.toFixed(3)})`
    };
  }

  private degenerate(sampleCount: number, detail: string): FitResult {
    this.parameters = {
      ...this.parameters,
      confidence: Math.min(this.parameters.confidence, 0.1),
      lastUpdated: this.clock().toISOString()
    };
    return {
      status: 'degenerate-data',
      parameters: this.getParameters(),
      sampleCount,
      detail
    };
  }

  /**
   * Turn observations into (state, later state) samples. Each observation is
   * paired with the first later one at least MIN_SAMPLE_GAP_HOURS away, so
   * history recorded faster than that still yields samples. The level is the
   * time-weighted mean over the pair; outdoor temperature is carried forward
   * when an observation lacks it.
   */
  private buildSamples(history: ReadonlyArray<ThermalState>): Sample[] {
    const sorted = [...history]
      .map((state) => ({ state, atMs: Date.parse(state.timestamp) }))
      .filter((entry) => Number.isFinite(entry.atMs) && Number.isFinite(entry.state.indoorTemperature))
      .sort((a, b) => a.atMs - b.atMs);

    const minGapMs = MIN_SAMPLE_GAP_HOURS * 3_600_000;
    const samples: Sample[] = [];
    let lastOutdoor: number | undefined;
    let next = 1;

    for (let i = 0; i < sorted.length - 1; i++) {
      const previous = sorted[i];
      if (previous.state.outdoorTemperature !== undefined && Number.isFinite(previous.state.outdoorTemperature)) {
        lastOutdoor = previous.state.outdoorTemperature;
      }
      next = Math.max(next, i + 1);
      while (next < sorted.length && sorted[next].atMs - previous.atMs < minGapMs) {
        next++;
      }
      if (next >= sorted.length) {
        break;
      }
      const current = sorted[next];
      const hours = (current.atMs - previous.atMs) / 3_600_000;
      if (hours > MAX_SAMPLE_GAP_HOURS || lastOutdoor === undefined) {
        continue;
      }
      let levelHours = 0;
      for (let k = i; k < next; k++) {
        levelHours += sorted[k].state.heatingLevel * (sorted[k + 1].atMs - sorted[k].atMs) / 3_600_000;
      }
      samples.push({
        atMs: previous.atMs,
        indoor: previous.state.indoorTemperature,
        nextIndoor: current.state.indoorTemperature,
        outdoor: lastOutdoor,
        level: levelHours / hours,
        hours
      });
    }

    return samples;
  }
}
