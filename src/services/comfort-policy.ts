/**
 * Comfort Policy
 *
 * Resolves the acceptable temperature band for any instant. Precedence:
 * active override (boost), then vacation, then the highest-priority
 * scheduled window, then the default window. Equal priorities resolve to
 * the window declared last.
 */

import { DateTime } from 'luxon';
import {
  Clock,
  ComfortBounds,
  ComfortOverride,
  ComfortWindow,
  VacationPeriod
} from '../types';
import { AppError, ErrorCategory } from '../util/error-handler';

export const DEFAULT_WINDOW_ID = 'default';
export const VACATION_WINDOW_ID = 'vacation';

export interface DefaultComfort {
  minTemp: number;
  maxTemp: number;
}

export interface ComfortPolicyOptions {
  timeZone: string;
  defaultComfort: DefaultComfort;
  windows?: ComfortWindow[];
  clock?: Clock;
}

export interface OverrideRequest {
  minTemp: number;
  maxTemp: number;
  durationMinutes?: number;
  until?: string;
  reason?: string;
}

export type ComfortChange =
  | { type: 'override-set'; override: ComfortOverride }
  | { type: 'override-cleared'; override: ComfortOverride }
  | { type: 'override-expired'; override: ComfortOverride }
  | { type: 'vacation-set'; vacation: VacationPeriod }
  | { type: 'vacation-cleared' }
  | { type: 'windows-changed' };

export type ComfortChangeListener = (change: ComfortChange) => void;

const MINUTES_PER_DAY = 24 * 60;

/**
 * Parse "HH:mm" into minutes after midnight, or null when malformed.
 */
export function parseTimeOfDay(value: string): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 24 || minutes > 59 || (hours === 24 && minutes !== 0)) {
    return null;
  }
  return hours * 60 + minutes;
}

export class ComfortPolicy {
  private windows: ComfortWindow[];
  private override: ComfortOverride | null = null;
  private vacation: VacationPeriod | null = null;
  private readonly listeners: ComfortChangeListener[] = [];
  private readonly timeZone: string;
  private readonly defaultComfort: DefaultComfort;
  private readonly clock: Clock;

  constructor(options: ComfortPolicyOptions) {
    this.timeZone = options.timeZone;
    this.defaultComfort = { ...options.defaultComfort };
    this.windows = (options.windows ?? []).map((window) => ({ ...window }));
    this.clock = options.clock ?? (() => new Date());
  }

  public getTimeZone(): string {
    return this.timeZone;
  }

  /**
   * Effective bounds at an instant. Total: every instant resolves to
   * exactly one window.
   */
  public boundsAt(timestamp: Date | string): ComfortBounds {
    const ms = typeof timestamp === 'string' ? Date.parse(timestamp) : timestamp.getTime();

    if (Number.isFinite(ms)) {
      if (this.override && this.isOverrideActive(this.override, ms)) {
        return {
          min: this.override.minTemp,
          max: this.override.maxTemp,
          windowId: this.override.id,
          source: 'override'
        };
      }

      if (this.vacation && this.isVacationActive(this.vacation, ms)) {
        return {
          min: this.vacation.minTemp,
          max: this.vacation.maxTemp,
          windowId: VACATION_WINDOW_ID,
          source: 'vacation'
        };
      }

      const window = this.resolveWindow(ms);
      if (window) {
        return { min: window.minTemp, max: window.maxTemp, windowId: window.id, source: 'window' };
      }
    }

    return {
      min: this.defaultComfort.minTemp,
      max: this.defaultComfort.maxTemp,
      windowId: DEFAULT_WINDOW_ID,
      source: 'default'
    };
  }

  /**
   * Start a temporary override (boost). Replaces any existing override.
   */
  public setOverride(request: OverrideRequest): ComfortOverride {
    if (!Number.isFinite(request.minTemp) || !Number.isFinite(request.maxTemp) || request.minTemp > request.maxTemp) {
      throw new AppError(
        `Invalid override bounds [${request.minTemp}, ${request.maxTemp}]`,
        ErrorCategory.VALIDATION
      );
    }

    const now = this.clock();
    let untilMs: number;
    if (request.until !== undefined) {
      untilMs = Date.parse(request.until);
    } else if (request.durationMinutes !== undefined) {
      untilMs = now.getTime() + request.durationMinutes * 60_000;
    } else {
      throw new AppError('Override needs durationMinutes or until', ErrorCategory.VALIDATION);
    }

    if (!Number.isFinite(untilMs) || untilMs <= now.getTime()) {
      throw new AppError('Override expiry must be in the future', ErrorCategory.VALIDATION);
    }

    const override: ComfortOverride = {
      id: `override-${now.getTime()}`,
      minTemp: request.minTemp,
      maxTemp: request.maxTemp,
      start: now.toISOString(),
      until: new Date(untilMs).toISOString(),
      reason: request.reason ?? 'boost'
    };
    this.override = override;
    this.emit({ type: 'override-set', override });
    return { ...override };
  }

  public clearOverride(): boolean {
    const current = this.override;
    if (!current) {
      return false;
    }
    this.override = null;
    this.emit({ type: 'override-cleared', override: current });
    return true;
  }

  public getOverride(): ComfortOverride | null {
    return this.override ? { ...this.override } : null;
  }

  /**
   * Drop overrides that have expired by `now` and report them.
   */
  public pruneExpired(now: Date = this.clock()): ComfortOverride[] {
    const current = this.override;
    if (!current || Date.parse(current.until) > now.getTime()) {
      return [];
    }
    this.override = null;
    this.emit({ type: 'override-expired', override: current });
    return [current];
  }

  public setVacation(period: VacationPeriod): void {
    const start = Date.parse(period.start);
    const end = Date.parse(period.end);
    if (!Number.isFinite(start) || !Number.isFinite(end) || end <= start) {
      throw new AppError('Vacation end must be after its start', ErrorCategory.VALIDATION);
    }
    if (period.minTemp > period.maxTemp || period.preheatHours < 0) {
      throw new AppError('Invalid vacation bounds or preheat hours', ErrorCategory.VALIDATION);
    }
    this.vacation = { ...period };
    this.emit({ type: 'vacation-set', vacation: { ...period } });
  }

  public clearVacation(): boolean {
    if (!this.vacation) {
      return false;
    }
    this.vacation = null;
    this.emit({ type: 'vacation-cleared' });
    return true;
  }

  public getVacation(): VacationPeriod | null {
    return this.vacation ? { ...this.vacation } : null;
  }

  public setWindows(windows: ComfortWindow[]): void {
    this.windows = windows.map((window) => ({ ...window }));
    this.emit({ type: 'windows-changed' });
  }

  public getWindows(): ComfortWindow[] {
    return this.windows.map((window) => ({ ...window }));
  }

  /**
   * Subscribe to override and vacation changes. Returns an unsubscribe function.
   */
  public onChange(listener: ComfortChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  private emit(change: ComfortChange): void {
    for (const listener of [...this.listeners]) {
      listener(change);
    }
  }

  private isOverrideActive(override: ComfortOverride, ms: number): boolean {
    return ms >= Date.parse(override.start) && ms < Date.parse(override.until);
  }

  private isVacationActive(vacation: VacationPeriod, ms: number): boolean {
    const start = Date.parse(vacation.start);
    const end = Date.parse(vacation.end) - vacation.preheatHours * 3_600_000;
    return ms >= start && ms < end;
  }

  private resolveWindow(ms: number): ComfortWindow | null {
    let best: ComfortWindow | null = null;
    const local = DateTime.fromMillis(ms, { zone: this.timeZone });

    for (const window of this.windows) {
      if (!this.windowContains(window, ms, local)) {
        continue;
      }
      // >= so that a later declaration wins a tie
      if (best === null || window.priority >= best.priority) {
        best = window;
      }
    }

    return best;
  }

  private windowContains(window: ComfortWindow, ms: number, local: DateTime): boolean {
    if (window.start !== undefined && window.end !== undefined) {
      return ms >= Date.parse(window.start) && ms < Date.parse(window.end);
    }

    if (window.startTime === undefined || window.endTime === undefined || !local.isValid) {
      return false;
    }

    const start = parseTimeOfDay(window.startTime);
    const end = parseTimeOfDay(window.endTime);
    if (start === null || end === null) {
      return false;
    }

    const minuteOfDay = local.hour * 60 + local.minute;
    const weekday = local.weekday;

    if (start === end) {
      return this.dayAllowed(window, weekday);
    }

    if (start < end) {
      return minuteOfDay >= start && minuteOfDay < end && this.dayAllowed(window, weekday);
    }

    // Wraps over midnight: the part after midnight belongs to the previous day
    if (minuteOfDay >= start) {
      return this.dayAllowed(window, weekday);
    }
    if (minuteOfDay < end % MINUTES_PER_DAY) {
      return this.dayAllowed(window, weekday === 1 ? 7 : weekday - 1);
    }
    return false;
  }

  private dayAllowed(window: ComfortWindow, weekday: number): boolean {
    return window.days === undefined || window.days.length === 0 || window.days.some((day) => day === weekday);
  }
}
