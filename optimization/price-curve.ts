/**
 * Price curve normalisation (pure)
 *
 * Maps an arbitrary list of price points onto the planning step grid. Each
 * point covers `[time, time + resolution)` where the resolution is the
 * smallest spacing in the curve. Steps not covered are gaps; they are filled
 * from a cached curve, else the last known price, and counted.
 */

import { PricePoint } from '../src/types';

export interface StepGrid {
  startMs: number;
  stepMinutes: number;
  steps: number;
}

export type PriceFillSource = 'curve' | 'cache' | 'last-known' | 'next-known';

export interface ResampledPrices {
  prices: number[];
  sources: PriceFillSource[];
  /** Steps not covered by the primary curve */
  missingSteps: number;
  filledFromCache: number;
  filledFromLastKnown: number;
}

interface NormalizedCurve {
  points: { ms: number; price: number }[];
  resolutionMs: number;
}

const DEFAULT_RESOLUTION_MINUTES = 60;

/**
 * Sorted, de-duplicated (last value wins) points with finite prices.
 */
export function normalizeCurve(points: readonly PricePoint[]): PricePoint[] {
  const byTime = new Map<number, number>();
  for (const point of points) {
    const ms = Date.parse(point.time);
    if (Number.isFinite(ms) && Number.isFinite(point.price)) {
      byTime.set(ms, point.price);
    }
  }
  return [...byTime.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([ms, price]) => ({ time: new Date(ms).toISOString(), price }));
}

/**
 * Smallest positive spacing between points, in minutes.
 */
export function inferResolutionMinutes(points: readonly PricePoint[]): number {
  const times = normalizeCurve(points).map((p) => Date.parse(p.time));
  let smallest = Infinity;
  for (let i = 1; i < times.length; i++) {
    smallest = Math.min(smallest, times[i] - times[i - 1]);
  }
  return Number.isFinite(smallest) ? smallest / 60000 : DEFAULT_RESOLUTION_MINUTES;
}

function prepare(points: readonly PricePoint[]): NormalizedCurve {
  const normalized = normalizeCurve(points);
  return {
    points: normalized.map((p) => ({ ms: Date.parse(p.time), price: p.price })),
    resolutionMs: inferResolutionMinutes(normalized) * 60000
  };
}

function lookup(curve: NormalizedCurve, ms: number): number | undefined {
  // Latest point at or before ms
  let lo = 0;
  let hi = curve.points.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (curve.points[mid].ms <= ms) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  if (found < 0) {
    return undefined;
  }
  const point = curve.points[found];
  return ms < point.ms + curve.resolutionMs ? point.price : undefined;
}

/**
 * Price at the start of each grid step. Returns null when neither curve
 * holds a single usable price.
 */
export function resamplePrices(
  primary: readonly PricePoint[],
  grid: StepGrid,
  cached: readonly PricePoint[] = []
): ResampledPrices | null {
  const main = prepare(primary);
  const fallback = prepare(cached);
  if (main.points.length === 0 && fallback.points.length === 0) {
    return null;
  }

  const stepMs = grid.stepMinutes * 60000;
  const prices: (number | undefined)[] = [];
  const sources: PriceFillSource[] = [];
  let missingSteps = 0;
  let filledFromCache = 0;

  for (let i = 0; i < grid.steps; i++) {
    const ms = grid.startMs + i * stepMs;
    const fromMain = lookup(main, ms);
    if (fromMain !== undefined) {
      prices.push(fromMain);
      sources.push('curve');
      continue;
    }
    missingSteps++;
    const fromCache = lookup(fallback, ms);
    if (fromCache !== undefined) {
      prices.push(fromCache);
      sources.push('cache');
      filledFromCache++;
      continue;
    }
    prices.push(undefined);
    sources.push('last-known');
  }

  // Carry the last known price forward; a leading gap takes the first known price
  let filledFromLastKnown = 0;
  let lastKnown: number | undefined;
  for (let i = 0; i < prices.length; i++) {
    const value = prices[i];
    if (value !== undefined) {
      lastKnown = value;
    } else if (lastKnown !== undefined) {
      prices[i] = lastKnown;
      filledFromLastKnown++;
    }
  }

  const firstKnown = prices.find((value): value is number => value !== undefined)
    ?? lastKnownPrice(main, grid.startMs)
    ?? lastKnownPrice(fallback, grid.startMs);
  if (firstKnown === undefined) {
    return null;
  }

  const filled = prices.map((value, i) => {
    if (value !== undefined) {
      return value;
    }
    sources[i] = 'next-known';
    filledFromLastKnown++;
    return firstKnown;
  });

  return { prices: filled, sources, missingSteps, filledFromCache, filledFromLastKnown };
}

/**
 * The most recent price at or before `ms`, or the earliest one after it.
 */
function lastKnownPrice(curve: NormalizedCurve, ms: number): number | undefined {
  if (curve.points.length === 0) {
    return undefined;
  }
  let candidate: number | undefined;
  for (const point of curve.points) {
    if (point.ms <= ms) {
      candidate = point.price;
    }
  }
  return candidate ?? curve.points[0].price;
}
