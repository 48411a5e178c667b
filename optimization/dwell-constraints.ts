/** Helpers for enforcing minimum dwell between heating-level switches in one place. */

import { HeatingLevel } from '../src/types';

const EPS = 1e-9;

/**
 * Number of steps a level must be held before it may change.
 * 0 means switching is unrestricted.
 */
export function dwellSteps(minDwellMinutes: number, stepMinutes: number): number {
  if (!(minDwellMinutes > 0) || !(stepMinutes > 0)) {
    return 0;
  }
  return Math.ceil(minDwellMinutes / stepMinutes - EPS);
}

/**
 * Dwell counter at the horizon start: `requiredSteps` minus the steps the
 * current level must still be held. Negative when the level was switched
 * after the horizon start, so more than `requiredSteps` steps remain.
 * `null` means the level has been held for longer than anyone remembers.
 */
export function servedDwellSteps(servedMinutes: number | null, stepMinutes: number, minDwellMinutes: number): number {
  const requiredSteps = dwellSteps(minDwellMinutes, stepMinutes);
  if (servedMinutes === null || !Number.isFinite(servedMinutes)) {
    return requiredSteps;
  }
  return requiredSteps - dwellSteps(minDwellMinutes - servedMinutes, stepMinutes);
}

/**
 * Dwell counter after a switch that takes effect `offsetMinutes` into its
 * step. 1 for a switch on the step boundary.
 */
export function dwellAfterSwitch(offsetMinutes: number, stepMinutes: number, minDwellMinutes: number): number {
  const offset = Math.max(0, offsetMinutes);
  return dwellSteps(minDwellMinutes, stepMinutes) - dwellSteps(offset + Math.max(0, minDwellMinutes), stepMinutes) + 1;
}

/**
 * Minutes until the current level may change again.
 */
export function remainingDwellMinutes(lastChangeMs: number | null, nowMs: number, minDwellMinutes: number): number {
  if (lastChangeMs === null || minDwellMinutes <= 0) {
    return 0;
  }
  const sinceMinutes = (nowMs - lastChangeMs) / 60000;
  return Math.max(0, minDwellMinutes - sinceMinutes);
}

/**
 * Sorted, de-duplicated levels in [0, 1].
 */
export function normalizeLevels(levels: readonly HeatingLevel[]): HeatingLevel[] {
  const unique: HeatingLevel[] = [];
  for (const level of [...levels].filter((l) => Number.isFinite(l) && l >= 0 && l <= 1).sort((a, b) => a - b)) {
    if (unique.length === 0 || Math.abs(unique[unique.length - 1] - level) > EPS) {
      unique.push(level);
    }
  }
  return unique;
}

/**
 * Normalised levels of `supported` that `allowed` also names.
 */
export function intersectLevels(supported: readonly HeatingLevel[], allowed: readonly HeatingLevel[]): HeatingLevel[] {
  return normalizeLevels(supported).filter((level) => allowed.some((a) => Math.abs(a - level) <= EPS));
}

/**
 * Index of the allowed level nearest to `level` (lower wins a tie).
 */
export function nearestLevelIndex(level: HeatingLevel, allowed: readonly HeatingLevel[]): number {
  let best = 0;
  for (let i = 1; i < allowed.length; i++) {
    if (Math.abs(allowed[i] - level) < Math.abs(allowed[best] - level) - EPS) {
      best = i;
    }
  }
  return best;
}
