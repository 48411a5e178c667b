/**
 * Savings Tracker
 *
 * Compares what a zone actually paid against a thermostat that holds the
 * comfort-band midpoint. The baseline runs the same thermal model from the
 * same start temperature and outdoor data, priced with the realised prices.
 *
 * The ledger is append-only: a price correction adds a new record that
 * points at the one it supersedes.
 *
 * @module services/savings-tracker
 */

import { DateTime } from 'luxon';
import { Clock, HeatingLevel, PricePoint, RealizedStep, SavingsRecord } from '../types';
import { Logger } from '../util/logger';
import { SettingsStore } from '../util/settings-store';
import { SettingsAccessor } from '../util/settings-accessor';
import { isRecord } from '../util/validation';
import { normalizeLevels } from '../../optimization/dwell-constraints';
import { stepTemperature, ThermalParameters } from './thermal-model/thermal-model';
import { priceAt } from './price-classifier';

const LEDGER_KEY_PREFIX = 'savings_ledger_';
const PENDING_KEY_PREFIX = 'savings_pending_';
const ARCHIVE_KEY_PREFIX = 'savings_archive_';
const DEFAULT_ARCHIVE_HOURS = 7 * 24;

export interface SavingsTotals {
  realizedCost: number;
  baselineCost: number;
  delta: number;
  realizedEnergyKwh: number;
  baselineEnergyKwh: number;
  periods: number;
}

export interface BaselineStep {
  level: HeatingLevel;
  temperature: number;
  energyKwh: number;
  cost: number;
}

export interface SavingsTrackerOptions {
  zoneId: string;
  /** Parameters of the model the baseline thermostat is simulated with */
  parameters: () => Pick<ThermalParameters, 'lossRate' | 'heatingRate'>;
  levels: readonly HeatingLevel[];
  ratedPowerKw: number;
  defaultOutdoorTemp: number;
  timeZone: string;
  store?: SettingsStore;
  archiveHours?: number;
  clock?: Clock;
}

export function isRealizedStep(value: unknown): value is RealizedStep {
  return isRecord(value)
    && typeof value.start === 'string'
    && typeof value.end === 'string'
    && typeof value.level === 'number'
    && typeof value.price === 'number'
    && typeof value.energyKwh === 'number'
    && typeof value.startTemp === 'number'
    && typeof value.minTemp === 'number'
    && typeof value.maxTemp === 'number'
    && (value.outdoorTemperature === undefined || typeof value.outdoorTemperature === 'number');
}

export function isSavingsRecord(value: unknown): value is SavingsRecord {
  return isRecord(value)
    && typeof value.id === 'string'
    && typeof value.zoneId === 'string'
    && typeof value.periodStart === 'string'
    && typeof value.periodEnd === 'string'
    && typeof value.realizedCost === 'number'
    && typeof value.baselineCost === 'number'
    && typeof value.delta === 'number'
    && typeof value.realizedEnergyKwh === 'number'
    && typeof value.baselineEnergyKwh === 'number'
    && typeof value.createdAt === 'string'
    && (value.correctionOf === undefined || typeof value.correctionOf === 'string');
}

function stepHours(step: RealizedStep): number {
  return Math.max(0, (Date.parse(step.end) - Date.parse(step.start)) / 3_600_000);
}

function round(value: number, decimals: number = 6): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export class SavingsTracker {
  private readonly zoneId: string;
  private readonly settings: SettingsAccessor | null;
  private readonly levels: HeatingLevel[];
  private readonly archiveMs: number;
  private readonly clock: Clock;
  private records: SavingsRecord[] = [];
  private pending: RealizedStep[] = [];
  private archive: RealizedStep[] = [];

  constructor(
    private readonly logger: Logger,
    private readonly options: SavingsTrackerOptions
  ) {
    this.zoneId = options.zoneId;
    this.settings = options.store ? new SettingsAccessor(options.store, logger) : null;
    const levels = normalizeLevels(options.levels);
    this.levels = levels.length > 0 ? levels : [0];
    this.archiveMs = (options.archiveHours ?? DEFAULT_ARCHIVE_HOURS) * 3_600_000;
    this.clock = options.clock ?? (() => new Date());

    if (this.settings) {
      this.records = this.settings.getArray(`${LEDGER_KEY_PREFIX}${this.zoneId}`, isSavingsRecord);
      this.pending = this.settings.getArray(`${PENDING_KEY_PREFIX}${this.zoneId}`, isRealizedStep);
      this.archive = this.settings.getArray(`${ARCHIVE_KEY_PREFIX}${this.zoneId}`, isRealizedStep);
    }
  }

  /**
   * Record an executed step. A step with the same start replaces the
   * pending one.
   */
  public recordStep(step: RealizedStep): void {
    if (this.records.some((r) => !r.correctionOf && this.contains(r.periodStart, r.periodEnd, step))) {
      this.logger.debug(`Step ${step.start} of zone ${this.zoneId} falls in a settled period, ignored`);
      return;
    }
    this.pending = [...this.pending.filter((s) => s.start !== step.start), { ...step }]
      .sort((a, b) => Date.parse(a.start) - Date.parse(b.start));
    this.persistSteps();
  }

  public getPendingSteps(): RealizedStep[] {
    return this.pending.map((s) => ({ ...s }));
  }

  /**
   * Settle the pending steps inside [periodStart, periodEnd). Returns null
   * when there is nothing to settle or the period already has a record.
   */
  public settle(periodStart: Date, periodEnd: Date): SavingsRecord | null {
    const startIso = periodStart.toISOString();
    const endIso = periodEnd.toISOString();
    if (this.records.some((r) => r.periodStart === startIso)) {
      this.logger.debug(`Savings period ${startIso} of zone ${this.zoneId} already settled`);
      return null;
    }

    const steps = this.pending.filter((s) => this.contains(startIso, endIso, s));
    if (steps.length === 0) {
      return null;
    }

    const record = this.buildRecord(`savings-${this.zoneId}-${periodStart.getTime()}`, startIso, endIso, steps);
    this.records.push(record);
    this.pending = this.pending.filter((s) => !steps.includes(s));
    this.archive = [...this.archive, ...steps];
    this.pruneArchive();
    this.persistLedger();
    this.persistSteps();

    this.logger.optimization(`Savings settled for zone ${this.zoneId}`, {
      periodStart: startIso,
      realizedCost: record.realizedCost,
      baselineCost: record.baselineCost,
      delta: record.delta
    });
    return record;
  }

  /**
   * Settle every aligned period that ended at or before `now`.
   */
  public settleCompleted(now: Date, periodMinutes: number): SavingsRecord[] {
    const periodMs = periodMinutes * 60_000;
    const starts = new Set<number>();
    for (const step of this.pending) {
      starts.add(Math.floor(Date.parse(step.start) / periodMs) * periodMs);
    }

    const settled: SavingsRecord[] = [];
    for (const startMs of [...starts].sort((a, b) => a - b)) {
      if (startMs + periodMs > now.getTime()) {
        continue;
      }
      const record = this.settle(new Date(startMs), new Date(startMs + periodMs));
      if (record) {
        settled.push(record);
      }
    }
    return settled;
  }

  /**
   * Re-price a settled period. Appends a record superseding the latest one
   * for the period; returns null when the period was never settled or its
   * steps have left the archive.
   */
  public recordCorrection(periodStart: Date, revisedPrices: readonly PricePoint[]): SavingsRecord | null {
    const startIso = periodStart.toISOString();
    const latest = this.latestFor(startIso);
    if (!latest) {
      this.logger.warn(`No settled savings period ${startIso} for zone ${this.zoneId}`);
      return null;
    }

    const steps = this.archive.filter((s) => this.contains(latest.periodStart, latest.periodEnd, s));
    if (steps.length === 0) {
      this.logger.warn(`Steps for savings period ${startIso} are no longer archived`);
      return null;
    }

    const repriced = steps.map((step) => {
      const point = priceAt(revisedPrices, new Date(step.start));
      return point ? { ...step, price: point.price } : step;
    });
    const corrections = this.records.filter((r) => r.periodStart === startIso).length;
    const record: SavingsRecord = {
      ...this.buildRecord(`${latest.id}-c${corrections}`, latest.periodStart, latest.periodEnd, repriced),
      correctionOf: latest.id
    };
    this.records.push(record);
    this.persistLedger();

    this.logger.optimization(`Savings corrected for zone ${this.zoneId}`, {
      periodStart: startIso,
      previousDelta: latest.delta,
      delta: record.delta
    });
    return record;
  }

  /**
   * Simulate the thermostat baseline over a run of steps.
   */
  public simulateBaseline(steps: readonly RealizedStep[]): BaselineStep[] {
    if (steps.length === 0) {
      return [];
    }
    const parameters = this.options.parameters();
    const result: BaselineStep[] = [];
    let temperature = steps[0].startTemp;
    let outdoor = this.options.defaultOutdoorTemp;

    for (const step of steps) {
      if (step.outdoorTemperature !== undefined) {
        outdoor = step.outdoorTemperature;
      }
      const hours = stepHours(step);
      const target = (step.minTemp + step.maxTemp) / 2;

      let bestLevel = this.levels[0];
      let bestTemp = stepTemperature(parameters, temperature, bestLevel, outdoor, hours);
      for (const level of this.levels.slice(1)) {
        const predicted = stepTemperature(parameters, temperature, level, outdoor, hours);
        // Strictly closer only: the lower level wins a tie
        if (Math.abs(predicted - target) < Math.abs(bestTemp - target) - 1e-12) {
          bestLevel = level;
          bestTemp = predicted;
        }
      }

      const energyKwh = bestLevel * this.options.ratedPowerKw * hours;
      result.push({ level: bestLevel, temperature: bestTemp, energyKwh, cost: energyKwh * step.price });
      temperature = bestTemp;
    }
    return result;
  }

  public ledger(): SavingsRecord[] {
    return this.records.map((r) => ({ ...r }));
  }

  /**
   * The latest record of each period, in period order.
   */
  public effectiveRecords(): SavingsRecord[] {
    const latest = new Map<string, SavingsRecord>();
    for (const record of this.records) {
      latest.set(record.periodStart, record);
    }
    return [...latest.values()]
      .sort((a, b) => Date.parse(a.periodStart) - Date.parse(b.periodStart))
      .map((r) => ({ ...r }));
  }

  public totals(records: readonly SavingsRecord[] = this.effectiveRecords()): SavingsTotals {
    const totals = records.reduce<SavingsTotals>((acc, r) => ({
      realizedCost: acc.realizedCost + r.realizedCost,
      baselineCost: acc.baselineCost + r.baselineCost,
      delta: acc.delta + r.delta,
      realizedEnergyKwh: acc.realizedEnergyKwh + r.realizedEnergyKwh,
      baselineEnergyKwh: acc.baselineEnergyKwh + r.baselineEnergyKwh,
      periods: acc.periods + 1
    }), { realizedCost: 0, baselineCost: 0, delta: 0, realizedEnergyKwh: 0, baselineEnergyKwh: 0, periods: 0 });

    return {
      realizedCost: round(totals.realizedCost),
      baselineCost: round(totals.baselineCost),
      delta: round(totals.delta),
      realizedEnergyKwh: round(totals.realizedEnergyKwh),
      baselineEnergyKwh: round(totals.baselineEnergyKwh),
      periods: totals.periods
    };
  }

  /**
   * Savings of periods that started on the local calendar day of `now`.
   */
  public todaySavings(now: Date = this.clock()): number {
    const local = DateTime.fromMillis(now.getTime(), { zone: this.options.timeZone });
    const dayStart = local.startOf('day').toMillis();
    const dayEnd = local.plus({ days: 1 }).startOf('day').toMillis();
    const today = this.effectiveRecords().filter((r) => {
      const ms = Date.parse(r.periodStart);
      return ms >= dayStart && ms < dayEnd;
    });
    return this.totals(today).delta;
  }

  /**
   * Drop everything stored for the zone
   */
  public clear(): void {
    this.records = [];
    this.pending = [];
    this.archive = [];
    this.settings?.unset(`${LEDGER_KEY_PREFIX}${this.zoneId}`);
    this.settings?.unset(`${PENDING_KEY_PREFIX}${this.zoneId}`);
    this.settings?.unset(`${ARCHIVE_KEY_PREFIX}${this.zoneId}`);
  }

  private buildRecord(id: string, periodStart: string, periodEnd: string, steps: readonly RealizedStep[]): SavingsRecord {
    const realizedCost = steps.reduce((sum, s) => sum + s.price * s.energyKwh, 0);
    const realizedEnergyKwh = steps.reduce((sum, s) => sum + s.energyKwh, 0);
    const baseline = this.simulateBaseline(steps);
    const baselineCost = baseline.reduce((sum, b) => sum + b.cost, 0);
    const baselineEnergyKwh = baseline.reduce((sum, b) => sum + b.energyKwh, 0);

    return {
      id,
      zoneId: this.zoneId,
      periodStart,
      periodEnd,
      realizedCost: round(realizedCost),
      baselineCost: round(baselineCost),
      delta: round(baselineCost - realizedCost),
      realizedEnergyKwh: round(realizedEnergyKwh),
      baselineEnergyKwh: round(baselineEnergyKwh),
      createdAt: this.clock().toISOString()
    };
  }

  private latestFor(periodStart: string): SavingsRecord | undefined {
    const matching = this.records.filter((r) => r.periodStart === periodStart);
    return matching[matching.length - 1];
  }

  private contains(periodStart: string, periodEnd: string, step: RealizedStep): boolean {
    const ms = Date.parse(step.start);
    return ms >= Date.parse(periodStart) && ms < Date.parse(periodEnd);
  }

  private pruneArchive(): void {
    const cutoff = this.clock().getTime() - this.archiveMs;
    this.archive = this.archive.filter((s) => Date.parse(s.end) >= cutoff);
  }

  private persistLedger(): void {
    this.settings?.set(`${LEDGER_KEY_PREFIX}${this.zoneId}`, this.records);
  }

  private persistSteps(): void {
    this.settings?.set(`${PENDING_KEY_PREFIX}${this.zoneId}`, this.pending);
    this.settings?.set(`${ARCHIVE_KEY_PREFIX}${this.zoneId}`, this.archive);
  }
}
