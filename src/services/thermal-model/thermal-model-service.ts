/**
 * Thermal Model Service
 *
 * Owns one thermal model and its observation log for a zone or a thermal
 * group. Learning runs on demand (before planning) once enough new
 * observations have arrived; fitted parameters are persisted so a restart
 * keeps what was learned.
 */

import { Clock, ModelDegradedIssue, ThermalState } from '../../types';
import { Logger } from '../../util/logger';
import { SettingsStore } from '../../util/settings-store';
import { SettingsAccessor } from '../../util/settings-accessor';
import { DataCollectorOptions, DataStatistics, ThermalDataCollector } from './data-collector';
import {
  FitResult,
  FitStatus,
  isThermalParameters,
  ThermalModel,
  ThermalModelOptions,
  ThermalParameters
} from './thermal-model';

const PARAMETERS_KEY_PREFIX = 'thermal_params_';
const DEFAULT_RELEARN_EVERY = 12;

export interface ThermalModelServiceOptions {
  model?: ThermalModelOptions;
  collector?: DataCollectorOptions;
  /** Refit after this many new observations */
  relearnEvery?: number;
  clock?: Clock;
}

export interface ThermalModelStatus {
  parameters: ThermalParameters;
  observationCount: number;
  /** Mean absolute one-step prediction error (°C), null until fitted */
  accuracy: number | null;
  lastFitStatus: FitStatus | null;
  lastFitDetail: string | null;
  /** Observations over the last week */
  recentData: DataStatistics;
}

export class ThermalModelService {
  private readonly model: ThermalModel;
  private readonly collector: ThermalDataCollector;
  private readonly settings: SettingsAccessor;
  private readonly parametersKey: string;
  private readonly relearnEvery: number;
  private samplesSinceLearn = 0;
  private lastFit: FitResult | null = null;

  constructor(
    private readonly ownerId: string,
    private readonly store: SettingsStore,
    private readonly logger: Logger,
    options: ThermalModelServiceOptions = {}
  ) {
    const clock = options.clock;
    this.settings = new SettingsAccessor(store, logger);
    this.parametersKey = `${PARAMETERS_KEY_PREFIX}${ownerId}`;
    this.relearnEvery = Math.max(1, options.relearnEvery ?? DEFAULT_RELEARN_EVERY);

    const stored = this.settings.getObject<ThermalParameters | null>(
      this.parametersKey,
      null,
      (value): value is ThermalParameters | null => value === null || isThermalParameters(value)
    );
    this.model = new ThermalModel(stored ?? undefined, { ...options.model, clock });
    this.collector = new ThermalDataCollector(ownerId, store, logger, { ...options.collector, clock });

    if (stored) {
      this.logger.log(`Restored thermal parameters for ${ownerId}`, {
        lossRate: stored.lossRate,
        heatingRate: stored.heatingRate,
        confidence: stored.confidence
      });
    }

    // Anything collected since the last persisted fit counts toward the next one
    this.samplesSinceLearn = stored ? 0 : this.collector.getDataPointCount();
  }

  public getOwnerId(): string {
    return this.ownerId;
  }

  public getModel(): ThermalModel {
    return this.model;
  }

  public getCollector(): ThermalDataCollector {
    return this.collector;
  }

  /**
   * Record an observation. Returns false when the collector rejected it.
   */
  public observe(state: ThermalState): boolean {
    const accepted = this.collector.addDataPoint(state);
    if (accepted) {
      this.samplesSinceLearn++;
    }
    return accepted;
  }

  /**
   * Refit the model from the retained history and persist the result.
   */
  public learn(): FitResult {
    const history = this.collector.getAllDataPoints();
    const result = this.model.update(history);
    this.lastFit = result;
    this.samplesSinceLearn = 0;

    switch (result.status) {
      case 'fitted':
        this.logger.log(`Thermal model updated for ${this.ownerId}: ${result.detail}`, {
          lossRate: Number(result.parameters.lossRate.toFixed(4)),
          heatingRate: Number(result.parameters.heatingRate.toFixed(3)),
          confidence: Number(result.parameters.confidence.toFixed(2))
        });
        this.settings.set(this.parametersKey, result.parameters);
        break;
      case 'insufficient-history':
        this.logger.log(`Thermal model for ${this.ownerId} on defaults: ${result.detail}`);
        break;
      case 'degenerate-data':
        this.logger.warn(`Thermal model for ${this.ownerId} kept previous parameters: ${result.detail}`);
        break;
    }

    return result;
  }

  /**
   * Learn when no fit has run yet or enough new observations arrived.
   */
  public learnIfDue(): FitResult | null {
    if (this.lastFit === null || this.samplesSinceLearn >= this.relearnEvery) {
      return this.learn();
    }
    return null;
  }

  /**
   * The ModelDegraded issue to attach to plans, if any.
   */
  public degradedIssue(): ModelDegradedIssue | null {
    const parameters = this.model.getParameters();
    if (this.lastFit?.status === 'degenerate-data') {
      return {
        kind: 'ModelDegraded',
        reason: 'degenerate-data',
        confidence: parameters.confidence,
        detail: this.lastFit.detail
      };
    }
    if (parameters.usingDefaults) {
      return {
        kind: 'ModelDegraded',
        reason: 'insufficient-history',
        confidence: parameters.confidence,
        detail: this.lastFit?.detail
          ?? `Using default thermal parameters (${this.collector.getDataPointCount()} observations)`
      };
    }
    return null;
  }

  public getStatus(): ThermalModelStatus {
    const parameters = this.model.getParameters();
    return {
      parameters,
      observationCount: this.collector.getDataPointCount(),
      accuracy: parameters.usingDefaults ? null : parameters.meanAbsError,
      lastFitStatus: this.lastFit?.status ?? null,
      lastFitDetail: this.lastFit?.detail ?? null,
      recentData: this.collector.getDataStatistics()
    };
  }

  public runRetentionMaintenance(): number {
    return this.collector.runRetentionMaintenance();
  }

  /**
   * Forget everything learned for this owner.
   */
  public reset(): void {
    this.collector.clearData();
    this.store.unset(this.parametersKey);
    this.lastFit = null;
    this.samplesSinceLearn = 0;
    this.logger.log(`Thermal model reset for ${this.ownerId}`);
  }
}
