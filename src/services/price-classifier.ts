import { PricePoint } from '../types';

export type PriceLevel =
  | 'VERY_CHEAP'
  | 'CHEAP'
  | 'NORMAL'
  | 'EXPENSIVE'
  | 'VERY_EXPENSIVE';

export interface PriceClassificationOptions {
  /**
   * Cheap percentile threshold. Accepts 0–100 or 0–1 ranges. Defaults to 25%.
   */
  cheapPercentile?: number;
  /**
   * Multiplier applied to cheap percentile to derive very-cheap threshold.
   * Defaults to 0.4 (e.g. 25% * 0.4 = 10%).
   */
  veryCheapMultiplier?: number;
  /**
   * Expensive percentile. Defaults to symmetrical mirror of cheap percentile (100 - cheap).
   */
  expensivePercentile?: number;
  /**
   * Historical average price for absolute context. A price far below it is
   * never labelled expensive, one far above it never cheap.
   */
  historicalAvgPrice?: number;
}

export interface PriceThresholds {
  veryCheap: number;
  cheap: number;
  expensive: number;
  veryExpensive: number;
}

export interface PriceClassificationStats {
  label: PriceLevel;
  percentile: number;
  normalized: number;
  min: number;
  max: number;
  avg: number;
  thresholds: PriceThresholds;
  /** Label before the historical-average floor was applied */
  originalLabel?: PriceLevel;
  floorReason?: string;
}

const DEFAULT_CHEAP_PERCENTILE = 25;
const DEFAULT_VERY_CHEAP_MULTIPLIER = 0.4;

function normalizePercentileInput(value: number | undefined, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  if (value <= 1 && value >= 0) {
    return Math.min(Math.max(value * 100, 0), 100);
  }
  return Math.min(Math.max(value, 0), 100);
}

function normalizeMultiplier(value: number | undefined, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(Math.max(value, 0), 1);
}

export function resolvePriceThresholds(options?: PriceClassificationOptions): PriceThresholds {
  const cheapPercentile = normalizePercentileInput(options?.cheapPercentile, DEFAULT_CHEAP_PERCENTILE);
  const veryCheapMultiplier = normalizeMultiplier(options?.veryCheapMultiplier, DEFAULT_VERY_CHEAP_MULTIPLIER);
  const veryCheapThreshold = cheapPercentile * veryCheapMultiplier;
  const expensiveThreshold = normalizePercentileInput(options?.expensivePercentile, 100 - cheapPercentile);

  return {
    veryCheap: veryCheapThreshold,
    cheap: cheapPercentile,
    expensive: expensiveThreshold,
    veryExpensive: 100 - veryCheapThreshold
  };
}

/**
 * Classify a price against the distribution of a curve by percentile rank.
 */
export function classifyPrice(
  prices: readonly PricePoint[],
  currentPriceInput: number,
  options?: PriceClassificationOptions
): PriceClassificationStats {
  const safeCurrent = Number.isFinite(currentPriceInput) ? currentPriceInput : 0;
  const thresholds = resolvePriceThresholds(options);

  const sortedValues = prices
    .map((point) => point.price)
    .filter((value) => Number.isFinite(value))
    .sort((a, b) => a - b);

  if (sortedValues.length === 0) {
    return {
      label: 'NORMAL',
      percentile: 50,
      normalized: 0.5,
      min: safeCurrent,
      max: safeCurrent,
      avg: safeCurrent,
      thresholds
    };
  }

  const min = sortedValues[0];
  const max = sortedValues[sortedValues.length - 1];
  const avg = sortedValues.reduce((sum, value) => sum + value, 0) / sortedValues.length;

  const lessOrEqualCount = sortedValues.filter(value => value <= safeCurrent).length;
  const percentile = (lessOrEqualCount / sortedValues.length) * 100;

  const range = max - min;
  const normalized = range <= 1e-9
    ? 0.5
    : Math.min(Math.max((safeCurrent - min) / range, 0), 1);

  let label: PriceLevel = 'NORMAL';
  if (percentile <= thresholds.veryCheap) {
    label = 'VERY_CHEAP';
  } else if (percentile <= thresholds.cheap) {
    label = 'CHEAP';
  } else if (percentile >= thresholds.veryExpensive) {
    label = 'VERY_EXPENSIVE';
  } else if (percentile >= thresholds.expensive) {
    label = 'EXPENSIVE';
  }

  const historicalAvg = options?.historicalAvgPrice;
  if (historicalAvg !== undefined && Number.isFinite(historicalAvg) && historicalAvg > 0) {
    // Below 70% of the historical average the period is cheap in absolute terms
    if (safeCurrent < historicalAvg * 0.7 && (label === 'EXPENSIVE' || label === 'VERY_EXPENSIVE')) {
      return {
        label: 'NORMAL', percentile, normalized, min, max, avg, thresholds,
        originalLabel: label,
        floorReason: `Price ${safeCurrent.toFixed(3)} is ${((safeCurrent / historicalAvg) * 100).toFixed(0)}% of historical avg ${historicalAvg.toFixed(3)}`
      };
    }
    if (safeCurrent > historicalAvg * 1.3 && (label === 'CHEAP' || label === 'VERY_CHEAP')) {
      return {
        label: 'NORMAL', percentile, normalized, min, max, avg, thresholds,
        originalLabel: label,
        floorReason: `Price ${safeCurrent.toFixed(3)} is ${((safeCurrent / historicalAvg) * 100).toFixed(0)}% of historical avg ${historicalAvg.toFixed(3)}`
      };
    }
  }

  return { label, percentile, normalized, min, max, avg, thresholds };
}

export function isCheapLabel(label: PriceLevel): boolean {
  return label === 'CHEAP' || label === 'VERY_CHEAP';
}

/**
 * Price in effect at `at`: the latest point at or before it.
 */
export function priceAt(prices: readonly PricePoint[], at: Date): PricePoint | undefined {
  const ms = at.getTime();
  let found: PricePoint | undefined;
  let foundMs = -Infinity;
  for (const point of prices) {
    const pointMs = Date.parse(point.time);
    if (pointMs <= ms && pointMs > foundMs) {
      found = point;
      foundMs = pointMs;
    }
  }
  return found;
}
