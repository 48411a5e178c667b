import { Clock, PricePoint, PriceSource } from '../types';
import { Logger } from '../util/logger';
import { DataUnavailableError, isError } from '../util/error-handler';
import { SettingsStore } from '../util/settings-store';
import { SettingsAccessor } from '../util/settings-accessor';
import { isRecord } from '../util/validation';
import { normalizeCurve } from '../../optimization/price-curve';

const DEFAULT_STORAGE_KEY = 'price_cache';
const DEFAULT_RETENTION_HOURS = 48;

export interface PriceSnapshot {
  /** Curve to plan on: the fresh one, or the cached one when stale */
  prices: PricePoint[];
  /** Everything known, fresh points taking precedence */
  cached: PricePoint[];
  stale: boolean;
  fetchedAt: string;
  error?: string;
}

export interface PriceUpdate {
  changedPoints: number;
  firstChange: string;
}

export type PriceUpdateListener = (update: PriceUpdate) => void;

export interface CachedPriceProviderOptions {
  store?: SettingsStore;
  storageKey?: string;
  retentionHours?: number;
  clock?: Clock;
}

function isPricePoint(value: unknown): value is PricePoint {
  return isRecord(value) && typeof value.time === 'string' && typeof value.price === 'number';
}

/**
 * Wraps a PriceSource and keeps the last good curve. When the source fails
 * the cached curve is returned flagged stale; only an empty cache is fatal.
 */
export class CachedPriceProvider {
  private lastCurve: PricePoint[] = [];
  private readonly listeners: PriceUpdateListener[] = [];
  private readonly settings: SettingsAccessor | null;
  private readonly storageKey: string;
  private readonly retentionMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly source: PriceSource,
    private readonly logger: Logger,
    options: CachedPriceProviderOptions = {}
  ) {
    this.settings = options.store ? new SettingsAccessor(options.store, logger) : null;
    this.storageKey = options.storageKey ?? DEFAULT_STORAGE_KEY;
    this.retentionMs = (options.retentionHours ?? DEFAULT_RETENTION_HOURS) * 3_600_000;
    this.clock = options.clock ?? (() => new Date());

    if (this.settings) {
      this.lastCurve = normalizeCurve(this.settings.getArray(this.storageKey, isPricePoint));
      if (this.lastCurve.length > 0) {
        this.logger.price(`Restored ${this.lastCurve.length} cached price points`);
      }
    }
  }

  public async getPrices(horizonStart: Date, horizonEnd: Date): Promise<PriceSnapshot> {
    const fetchedAt = this.clock().toISOString();
    try {
      const fresh = normalizeCurve(await this.source.fetchPrices(horizonStart, horizonEnd));
      const update = this.merge(fresh);
      if (update) {
        this.logger.price(`Price curve updated: ${update.changedPoints} points changed from ${update.firstChange}`);
        for (const listener of [...this.listeners]) {
          listener(update);
        }
      }
      return { prices: fresh, cached: [...this.lastCurve], stale: false, fetchedAt };
    } catch (error) {
      const message = isError(error) ? error.message : String(error);
      if (this.lastCurve.length === 0) {
        throw new DataUnavailableError(`Price source failed and no cached curve exists: ${message}`, error);
      }
      this.logger.warn(`Price source failed, using cached curve (${this.lastCurve.length} points)`, { error: message });
      return {
        prices: [...this.lastCurve],
        cached: [...this.lastCurve],
        stale: true,
        fetchedAt,
        error: message
      };
    }
  }

  public getLastCurve(): PricePoint[] {
    return [...this.lastCurve];
  }

  public onUpdate(listener: PriceUpdateListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /**
   * Merge fresh points into the cache. Returns what changed, or null when
   * the fresh curve only repeats known prices.
   */
  private merge(fresh: PricePoint[]): PriceUpdate | null {
    const known = new Map(this.lastCurve.map((point) => [point.time, point.price]));
    const hadCache = this.lastCurve.length > 0;
    let changedPoints = 0;
    let firstChange: string | null = null;

    for (const point of fresh) {
      const previous = known.get(point.time);
      if (previous === undefined || Math.abs(previous - point.price) > 1e-9) {
        changedPoints++;
        if (firstChange === null || point.time < firstChange) {
          firstChange = point.time;
        }
      }
      known.set(point.time, point.price);
    }

    const cutoff = this.clock().getTime() - this.retentionMs;
    this.lastCurve = normalizeCurve(
      [...known.entries()].map(([time, price]) => ({ time, price }))
    ).filter((point) => Date.parse(point.time) >= cutoff);

    if (changedPoints > 0) {
      this.settings?.set(this.storageKey, this.lastCurve);
    }

    // The first curve ever seen is not an update
    return hadCache && firstChange !== null ? { changedPoints, firstChange } : null;
  }
}
