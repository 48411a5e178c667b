/**
 * Thermal Data Collector
 *
 * Append-only log of observed thermal states for one zone or thermal group.
 * The log is persisted in the settings store and trimmed by a retention
 * window (days) and a hard cap on the number of entries.
 */

import { DateTime } from 'luxon';
import { Clock, ThermalState } from '../../types';
import { Logger } from '../../util/logger';
import { isRecord } from '../../util/validation';
import { SettingsStore } from '../../util/settings-store';

const THERMAL_DATA_KEY_PREFIX = 'thermal_history_';

export const DEFAULT_RETENTION_DAYS = 60;
const MIN_RETENTION_DAYS = 1;
const MAX_RETENTION_DAYS = 365;

export const DEFAULT_MAX_POINTS = 10000;
const MIN_MAX_POINTS = 100;
const MAX_MAX_POINTS = 50000;

// Plausible physical ranges; readings outside are sensor faults
const INDOOR_RANGE: [number, number] = [-10, 45];
const OUTDOOR_RANGE: [number, number] = [-50, 50];

export interface DataCollectorOptions {
  retentionDays?: number;
  maxPoints?: number;
  clock?: Clock;
}

export interface DataStatistics {
  dataPointCount: number;
  avgIndoorTemp: number;
  avgOutdoorTemp: number | null;
  avgHeatingLevel: number;
  oldestDataPoint: string | null;
  newestDataPoint: string | null;
  dataCollectionRate: number; // points per day
}

export function isThermalState(value: unknown): value is ThermalState {
  if (!isRecord(value)) {
    return false;
  }
  return typeof value.timestamp === 'string'
    && typeof value.indoorTemperature === 'number'
    && typeof value.heatingLevel === 'number'
    && (value.outdoorTemperature === undefined || typeof value.outdoorTemperature === 'number');
}

export class ThermalDataCollector {
  private dataPoints: ThermalState[] = [];
  private readonly retentionDays: number;
  private readonly maxPoints: number;
  private readonly clock: Clock;
  private readonly storageKey: string;

  constructor(
    private readonly ownerId: string,
    private readonly store: SettingsStore,
    private readonly logger: Logger,
    options: DataCollectorOptions = {}
  ) {
    this.retentionDays = clamp(options.retentionDays ?? DEFAULT_RETENTION_DAYS, MIN_RETENTION_DAYS, MAX_RETENTION_DAYS);
    this.maxPoints = clamp(options.maxPoints ?? DEFAULT_MAX_POINTS, MIN_MAX_POINTS, MAX_MAX_POINTS);
    this.clock = options.clock ?? (() => new Date());
    this.storageKey = `${THERMAL_DATA_KEY_PREFIX}${ownerId}`;
    this.loadStoredData();
  }

  /**
   * Load previously stored history. Invalid entries are dropped.
   */
  private loadStoredData(): void {
    const stored = this.store.get(this.storageKey);
    if (stored === undefined || stored === null) {
      this.logger.log(`No stored thermal data for ${this.ownerId}, starting fresh collection`);
      this.dataPoints = [];
      return;
    }

    if (!Array.isArray(stored)) {
      this.logger.warn(`Stored thermal data for ${this.ownerId} is not a list; discarding`);
      this.dataPoints = [];
      return;
    }

    const valid = stored.filter(isThermalState).filter((point) => this.validateDataPoint(point));
    if (valid.length !== stored.length) {
      this.logger.warn(`Dropped ${stored.length - valid.length} invalid thermal data points for ${this.ownerId}`);
    }

    this.dataPoints = valid.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
    this.logger.log(`Loaded ${this.dataPoints.length} thermal data points for ${this.ownerId}`);
    this.applyRetentionPolicy();
  }

  /**
   * Append an observation. Returns false when the point was rejected.
   */
  public addDataPoint(dataPoint: ThermalState): boolean {
    if (!this.validateDataPoint(dataPoint)) {
      this.logger.warn(`Invalid thermal data point for ${this.ownerId}, skipping`, {
        timestamp: dataPoint.timestamp,
        indoorTemperature: dataPoint.indoorTemperature
      });
      return false;
    }

    const last = this.dataPoints[this.dataPoints.length - 1];
    if (last && Date.parse(dataPoint.timestamp) <= Date.parse(last.timestamp)) {
      this.logger.debug(`Ignoring out-of-order thermal data point at ${dataPoint.timestamp}`);
      return false;
    }

    this.dataPoints.push({ ...dataPoint });
    this.applyRetentionPolicy();
    this.saveData();
    return true;
  }

  /**
   * Explicitly run retention maintenance (scheduled daily)
   */
  public runRetentionMaintenance(): number {
    const before = this.dataPoints.length;
    this.applyRetentionPolicy();
    const removed = before - this.dataPoints.length;
    if (removed > 0) {
      this.logger.log(`ThermalRetention: removed ${removed} points for ${this.ownerId}`);
      this.saveData();
    }
    return removed;
  }

  private applyRetentionPolicy(): void {
    const cutoff = this.clock().getTime() - this.retentionDays * 24 * 3_600_000;
    let firstKept = 0;
    while (firstKept < this.dataPoints.length && Date.parse(this.dataPoints[firstKept].timestamp) < cutoff) {
      firstKept++;
    }
    if (this.dataPoints.length - firstKept > this.maxPoints) {
      firstKept = this.dataPoints.length - this.maxPoints;
    }
    if (firstKept > 0) {
      this.dataPoints = this.dataPoints.slice(firstKept);
    }
  }

  private validateDataPoint(dataPoint: ThermalState): boolean {
    if (!Number.isFinite(dataPoint.indoorTemperature)
      || dataPoint.indoorTemperature < INDOOR_RANGE[0]
      || dataPoint.indoorTemperature > INDOOR_RANGE[1]) {
      return false;
    }

    if (dataPoint.outdoorTemperature !== undefined
      && (!Number.isFinite(dataPoint.outdoorTemperature)
        || dataPoint.outdoorTemperature < OUTDOOR_RANGE[0]
        || dataPoint.outdoorTemperature > OUTDOOR_RANGE[1])) {
      return false;
    }

    if (!Number.isFinite(dataPoint.heatingLevel) || dataPoint.heatingLevel < 0 || dataPoint.heatingLevel > 1) {
      return false;
    }

    const timestamp = DateTime.fromISO(dataPoint.timestamp);
    if (!timestamp.isValid) {
      return false;
    }

    // Small allowance for sensor clock skew
    return timestamp.toMillis() <= this.clock().getTime() + 60_000;
  }

  private saveData(): void {
    try {
      this.store.set(this.storageKey, this.dataPoints);
    } catch (error) {
      this.logger.error(`Failed to persist thermal data for ${this.ownerId}`, error);
    }
  }

  public getAllDataPoints(): readonly ThermalState[] {
    return this.dataPoints;
  }

  public getDataPointCount(): number {
    return this.dataPoints.length;
  }

  /**
   * Get data points from the last N hours
   */
  public getRecentDataPoints(hours: number): ThermalState[] {
    const cutoff = this.clock().getTime() - hours * 3_600_000;
    return this.dataPoints.filter((point) => Date.parse(point.timestamp) >= cutoff);
  }

  public getDataStatistics(days: number = 7): DataStatistics {
    const recent = this.getRecentDataPoints(days * 24);
    if (recent.length === 0) {
      return {
        dataPointCount: 0,
        avgIndoorTemp: 0,
        avgOutdoorTemp: null,
        avgHeatingLevel: 0,
        oldestDataPoint: null,
        newestDataPoint: null,
        dataCollectionRate: 0
      };
    }

    const withOutdoor = recent.filter((point) => point.outdoorTemperature !== undefined);
    const outdoorSum = withOutdoor.reduce((sum, point) => sum + (point.outdoorTemperature ?? 0), 0);

    return {
      dataPointCount: recent.length,
      avgIndoorTemp: recent.reduce((sum, point) => sum + point.indoorTemperature, 0) / recent.length,
      avgOutdoorTemp: withOutdoor.length > 0 ? outdoorSum / withOutdoor.length : null,
      avgHeatingLevel: recent.reduce((sum, point) => sum + point.heatingLevel, 0) / recent.length,
      oldestDataPoint: recent[0].timestamp,
      newestDataPoint: recent[recent.length - 1].timestamp,
      dataCollectionRate: recent.length / days
    };
  }

  public clearData(): void {
    this.dataPoints = [];
    this.store.unset(this.storageKey);
    this.logger.log(`Cleared thermal data for ${this.ownerId}`);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
