/**
 * Zone Controller
 *
 * Runs the plan/execute/learn cycle of one zone. Planning is serialised:
 * while a plan is being computed further triggers are coalesced into one
 * pending trigger, and a trigger of higher priority cancels the in-flight
 * computation. A failed or cancelled plan leaves the committed plan active.
 */

import { EventEmitter } from 'events';
import {
  ActionPlan,
  ActuatorCapability,
  Clock,
  DataUnavailableIssue,
  HeatingActuator,
  HeatingLevel,
  OptimizationMode,
  OutdoorForecastPoint,
  OutdoorForecastSource,
  PlanIssue,
  PlannedAction,
  ReplanReason,
  TemperatureReading,
  TemperatureSensor
} from '../types';
import { Logger } from '../util/logger';
import {
  DataUnavailableError,
  ErrorHandler,
  InfeasiblePlanError,
  isError,
  ModelDegradedError,
  PlanCancelledError
} from '../util/error-handler';
import { findNextChange, planScheduleAsync } from '../../optimization/scheduler';
import { ComfortChange, ComfortPolicy } from './comfort-policy';
import { SchedulerConfig, ZoneConfig } from './configuration-service';
import { CachedPriceProvider } from './price-provider';
import { classifyPrice, isCheapLabel, PriceLevel } from './price-classifier';
import { SavingsTracker } from './savings-tracker';
import { StateManager } from './state-manager';
import { ThermalModelService } from './thermal-model/thermal-model-service';

export type ControllerState = 'idle' | 'planning' | 'committed' | 'executing' | 'replanning' | 'removed';

export type ZoneStatus = 'initializing' | 'collecting' | 'learning' | 'optimizing' | 'manual' | 'error';

/** Higher wins when triggers are coalesced or compete with planning in flight. */
export const TRIGGER_PRIORITY: Record<ReplanReason, number> = {
  'cadence': 1,
  'plan-exhausted': 1,
  'startup': 2,
  'price-update': 2,
  'drift': 3,
  'comfort-change': 4,
  'override': 5,
  'manual': 5
};

// Model confidence from which the zone counts as optimising
const OPTIMIZING_CONFIDENCE = 0.5;

export interface NextChange {
  time: string;
  level: HeatingLevel;
  reason: string;
}

export interface ZoneControllerStatus {
  zoneId: string;
  state: ControllerState;
  status: ZoneStatus;
  autoControl: boolean;
  mode: OptimizationMode;
  planId: string | null;
  currentLevel: HeatingLevel | null;
  lastTemperature: number | null;
  priceLevel: PriceLevel | null;
  cheapPeriod: boolean;
  nextChange: NextChange | null;
  issues: readonly PlanIssue[];
  lastError: string | null;
  modelConfidence: number;
  todaySavings: number;
}

export interface TickResult {
  replanned: ReplanReason | null;
  emitted: PlannedAction | null;
  settledPeriods: number;
}

export interface ZoneControllerEvents {
  stateChange: { from: ControllerState; to: ControllerState };
  planCommitted: { plan: ActionPlan; reason: ReplanReason };
  planFailed: { reason: ReplanReason; error: string };
  planReported: { plan: ActionPlan; message: string };
  actionEmitted: { action: PlannedAction; effectiveFrom: string };
}

export type PlanPriceProvider = Pick<CachedPriceProvider, 'getPrices'>;

export interface ZoneControllerDeps {
  zone: ZoneConfig;
  scheduler: SchedulerConfig;
  sensor: TemperatureSensor;
  actuator: HeatingActuator;
  capability: ActuatorCapability;
  prices: PlanPriceProvider;
  outdoor?: OutdoorForecastSource;
  thermal: ThermalModelService;
  /** False for group members other than the one feeding the shared model; see setOwnsModel */
  ownsModel?: boolean;
  comfort: ComfortPolicy;
  savings: SavingsTracker;
  state: StateManager;
  logger: Logger;
  clock?: Clock;
}

interface InFlight {
  reason: ReplanReason;
  priority: number;
  aborted: boolean;
}

interface Segment {
  stepStart: string;
  start: Date;
  level: HeatingLevel;
  action: PlannedAction;
  startTemp: number;
  outdoor?: number;
}

export class ZoneController {
  public readonly zoneId: string;
  private readonly events = new EventEmitter();
  private readonly errorHandler: ErrorHandler;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private controllerState: ControllerState = 'idle';
  private autoControl: boolean;
  private mode: OptimizationMode;
  private ownsModel: boolean;
  private committed: ActionPlan | null = null;
  private committedAt: number | null = null;
  private inFlight: InFlight | null = null;
  private pending: ReplanReason | null = null;
  private cycle: Promise<ActionPlan | null> | null = null;
  private lastReading: TemperatureReading | null = null;
  private lastOutdoor: OutdoorForecastPoint[] = [];
  private segment: Segment | null = null;
  private lastError: string | null = null;
  private readonly unsubscribe: Array<() => void> = [];

  constructor(private readonly deps: ZoneControllerDeps) {
    this.zoneId = deps.zone.zoneId;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
    this.errorHandler = new ErrorHandler(deps.logger);
    this.autoControl = deps.zone.autoControl;
    this.mode = deps.zone.mode;
    this.ownsModel = deps.ownsModel ?? true;

    this.deps.state.load(this.zoneId);
    this.unsubscribe.push(deps.comfort.onChange((change) => this.onComfortChange(change)));
  }

  // ----- Events -----

  public on<K extends keyof ZoneControllerEvents>(event: K, listener: (payload: ZoneControllerEvents[K]) => void): this {
    this.events.on(event, listener);
    return this;
  }

  public off<K extends keyof ZoneControllerEvents>(event: K, listener: (payload: ZoneControllerEvents[K]) => void): this {
    this.events.off(event, listener);
    return this;
  }

  private emit<K extends keyof ZoneControllerEvents>(event: K, payload: ZoneControllerEvents[K]): void {
    this.events.emit(event, payload);
  }

  // ----- Accessors -----

  public getState(): ControllerState {
    return this.controllerState;
  }

  public getCommittedPlan(): ActionPlan | null {
    return this.committed;
  }

  public getComfortPolicy(): ComfortPolicy {
    return this.deps.comfort;
  }

  public getSavings(): SavingsTracker {
    return this.deps.savings;
  }

  public getThermalService(): ThermalModelService {
    return this.deps.thermal;
  }

  public isPlanning(): boolean {
    return this.inFlight !== null;
  }

  public isAutoControl(): boolean {
    return this.autoControl;
  }

  /**
   * Switch between automatic and manual mode. Plans keep being produced in
   * manual mode; only commands stop.
   */
  public setAutoControl(enabled: boolean): void {
    if (this.autoControl === enabled) {
      return;
    }
    this.autoControl = enabled;
    if (!enabled) {
      this.closeSegment(this.clock());
    }
    this.logger.log(`Zone ${this.zoneId} switched to ${enabled ? 'automatic' : 'manual'} control`);
  }

  public getMode(): OptimizationMode {
    return this.mode;
  }

  /**
   * Change the optimisation mode and replan with it.
   */
  public setMode(mode: OptimizationMode): Promise<ActionPlan | null> {
    if (this.mode === mode) {
      return Promise.resolve(this.committed);
    }
    this.logger.log(`Zone ${this.zoneId} optimisation mode ${this.mode} -> ${mode}`);
    this.mode = mode;
    return this.requestReplan('comfort-change');
  }

  public ownsThermalModel(): boolean {
    return this.ownsModel;
  }

  /**
   * Whether this zone feeds and refits the (possibly shared) thermal model.
   */
  public setOwnsModel(owns: boolean): void {
    if (this.ownsModel === owns) {
      return;
    }
    this.ownsModel = owns;
    this.logger.log(`Zone ${this.zoneId} ${owns ? 'now feeds' : 'no longer feeds'} thermal model ${this.deps.thermal.getOwnerId()}`);
  }

  // ----- Planning -----

  /**
   * Ask for a new plan. Resolves with the committed plan once every
   * coalesced trigger has been handled.
   */
  public requestReplan(reason: ReplanReason): Promise<ActionPlan | null> {
    if (this.controllerState === 'removed') {
      return Promise.resolve(null);
    }

    const priority = TRIGGER_PRIORITY[reason];
    if (this.inFlight && this.cycle) {
      if (this.pending === null || priority > TRIGGER_PRIORITY[this.pending]) {
        this.pending = reason;
      }
      if (priority > this.inFlight.priority && !this.inFlight.aborted) {
        this.logger.log(`Zone ${this.zoneId}: ${reason} cancels in-flight ${this.inFlight.reason} planning`);
        this.inFlight.aborted = true;
      }
      return this.cycle;
    }

    const cycle = this.runCycles(reason).finally(() => {
      this.cycle = null;
    });
    this.cycle = cycle;
    return cycle;
  }

  private async runCycles(first: ReplanReason): Promise<ActionPlan | null> {
    let reason: ReplanReason | null = first;
    while (reason !== null && this.controllerState !== 'removed') {
      this.pending = null;
      await this.planOnce(reason);
      reason = this.pending;
    }
    return this.committed;
  }

  private async planOnce(reason: ReplanReason): Promise<void> {
    const flight: InFlight = { reason, priority: TRIGGER_PRIORITY[reason], aborted: false };
    this.inFlight = flight;
    this.setState(this.committed ? 'replanning' : 'planning');

    try {
      const now = this.clock();
      const { horizonStart, horizonEnd } = this.horizon(now);
      const issues: PlanIssue[] = [];

      const reading = await this.readTemperature(now, issues);
      const snapshot = await this.deps.prices.getPrices(horizonStart, horizonEnd);
      const outdoor = await this.readOutdoor(horizonStart, horizonEnd);

      if (flight.aborted) {
        throw new PlanCancelledError(`Planning for zone ${this.zoneId} superseded`);
      }

      const fit = this.ownsModel ? this.deps.thermal.learnIfDue() : null;
      if (fit) {
        this.logger.debug(`Zone ${this.zoneId} model refit before planning: ${fit.status}`);
      }
      const degraded = this.deps.thermal.degradedIssue();
      if (degraded) {
        issues.push(degraded);
      }

      const last = this.deps.state.getLastChange(this.zoneId);
      // Dwell is counted from the horizon start; a switch in the step already
      // running takes effect now, not at its start
      const offsetMinutes = (now.getTime() - horizonStart.getTime()) / 60_000;
      const servedNow = this.deps.state.getServedMinutes(this.zoneId, now.getTime());
      const stepRunning = this.segment !== null && Date.parse(this.segment.stepStart) === horizonStart.getTime();
      const plan = await planScheduleAsync({
        zoneId: this.zoneId,
        prices: snapshot.prices,
        cachedPrices: snapshot.cached,
        pricesStale: snapshot.stale,
        horizonStart,
        horizonEnd,
        stepMinutes: this.deps.scheduler.stepMinutes,
        currentTemp: reading.value,
        currentLevel: last.level ?? 0,
        servedDwellMinutes: servedNow === null ? null : servedNow - offsetMinutes,
        switchOffsetMinutes: stepRunning ? offsetMinutes : 0,
        comfort: this.deps.comfort,
        model: this.deps.thermal.getModel(),
        capability: this.deps.capability,
        allowedLevels: this.deps.zone.actionLevels,
        outdoorForecast: outdoor,
        defaultOutdoorTemp: this.deps.scheduler.defaultOutdoorTemp,
        options: {
          ratedPowerKw: this.deps.zone.ratedPowerKw,
          minDwellMinutes: this.deps.zone.minDwellMinutes,
          freezeFloorC: this.deps.zone.freezeFloorC,
          temperatureBinC: this.deps.scheduler.temperatureBinC,
          relaxationStepC: this.deps.scheduler.relaxationStepC,
          maxRelaxationC: this.deps.scheduler.maxRelaxationC,
          mode: this.mode,
          comfortValuePerDegreeHour: this.deps.scheduler.comfortValuePerDegreeHour
        },
        issues,
        shouldAbort: () => flight.aborted || this.controllerState === 'removed',
        createdAt: now
      });

      this.commit(plan, reason, now);
      await this.report(plan);
    } catch (error) {
      this.restoreState();
      if (error instanceof PlanCancelledError) {
        this.errorHandler.logError(error, { zoneId: this.zoneId, reason });
        return;
      }
      const appError = this.errorHandler.logError(error, { zoneId: this.zoneId, reason }, `Planning failed for zone ${this.zoneId}`);
      this.lastError = appError.message;
      this.emit('planFailed', { reason, error: appError.message });
    } finally {
      if (this.inFlight === flight) {
        this.inFlight = null;
      }
    }
  }

  private commit(plan: ActionPlan, reason: ReplanReason, now: Date): void {
    if (this.controllerState === 'removed') {
      return;
    }
    this.committed = plan;
    this.committedAt = now.getTime();
    this.lastError = null;
    this.setState('committed');
    this.logger.optimization(`Plan committed for zone ${this.zoneId}`, {
      planId: plan.id,
      reason,
      steps: plan.actions.length,
      totalCost: Number(plan.totalCost.toFixed(4)),
      totalEnergyKwh: Number(plan.totalEnergyKwh.toFixed(3)),
      confidence: Number(plan.confidence.toFixed(2)),
      issues: plan.issues.map((issue) => issue.kind)
    });
    this.emit('planCommitted', { plan, reason });
  }

  /**
   * Relaxed or degraded plans are reported through the notification hook.
   */
  private async report(plan: ActionPlan): Promise<void> {
    const messages: string[] = [];
    for (const issue of plan.issues) {
      if (issue.kind === 'InfeasiblePlan') {
        this.errorHandler.logError(new InfeasiblePlanError(issue.detail, {
          zoneId: this.zoneId,
          reason: issue.reason,
          relaxationC: issue.relaxationC,
          windows: issue.windows.map((w) => w.windowId)
        }));
        messages.push(`comfort band relaxed by ${issue.relaxationC.toFixed(1)}°C (${issue.reason})`);
      } else if (issue.kind === 'ModelDegraded') {
        this.errorHandler.logError(new ModelDegradedError(issue.detail, { zoneId: this.zoneId, reason: issue.reason }));
        messages.push(`thermal model degraded (${issue.reason})`);
      } else if (issue.stale || issue.source === 'sensor') {
        messages.push(`${issue.source} data stale`);
      }
    }
    if (messages.length === 0) {
      return;
    }

    const message = `Zone ${this.deps.zone.name}: ${messages.join('; ')}`;
    this.emit('planReported', { plan, message });
    try {
      await this.logger.notify(message);
    } catch (error) {
      this.logger.error(`Failed to send plan report for zone ${this.zoneId}`, error);
    }
  }

  private horizon(now: Date): { horizonStart: Date; horizonEnd: Date } {
    const stepMs = this.deps.scheduler.stepMinutes * 60_000;
    const startMs = Math.floor(now.getTime() / stepMs) * stepMs;
    return {
      horizonStart: new Date(startMs),
      horizonEnd: new Date(startMs + this.deps.scheduler.horizonHours * 3_600_000)
    };
  }

  private async readTemperature(now: Date, issues: PlanIssue[]): Promise<TemperatureReading> {
    const staleMs = this.deps.scheduler.sensorStaleMinutes * 60_000;
    let reading: TemperatureReading | null = null;
    try {
      reading = await this.deps.sensor.currentTemperature(this.zoneId);
      this.lastReading = reading;
    } catch (error) {
      this.logger.warn(`Temperature sensor failed for zone ${this.zoneId}`, {
        error: isError(error) ? error.message : String(error)
      });
    }

    const usable = reading ?? this.lastReading;
    if (!usable) {
      throw new DataUnavailableError(`No temperature reading for zone ${this.zoneId}`);
    }
    const age = now.getTime() - Date.parse(usable.timestamp);
    if (reading === null || age > staleMs) {
      const issue: DataUnavailableIssue = {
        kind: 'DataUnavailable',
        source: 'sensor',
        affectedSteps: 0,
        stale: true,
        detail: `Planning from a reading taken ${Math.round(age / 60_000)} minutes ago`
      };
      issues.push(issue);
    }
    return usable;
  }

  private async readOutdoor(horizonStart: Date, horizonEnd: Date): Promise<OutdoorForecastPoint[]> {
    if (!this.deps.outdoor) {
      return [];
    }
    try {
      this.lastOutdoor = await this.deps.outdoor.outdoorForecast(horizonStart, horizonEnd);
    } catch (error) {
      this.logger.warn(`Outdoor forecast failed for zone ${this.zoneId}; using last known`, {
        error: isError(error) ? error.message : String(error)
      });
    }
    return this.lastOutdoor;
  }

  private onComfortChange(change: ComfortChange): void {
    const reason: ReplanReason = change.type.startsWith('override') ? 'override' : 'comfort-change';
    this.requestReplan(reason).catch((error: unknown) => {
      this.logger.error(`Replan after ${change.type} failed for zone ${this.zoneId}`, error);
    });
  }

  /**
   * The shared price curve changed.
   */
  public notifyPriceUpdate(): Promise<ActionPlan | null> {
    return this.requestReplan('price-update');
  }

  // ----- Execution -----

  public start(): Promise<ActionPlan | null> {
    this.logger.log(`Zone ${this.zoneId} starting`);
    return this.requestReplan('startup');
  }

  /**
   * One control cycle: observe, check triggers, emit the due action,
   * record what ran and settle savings.
   */
  public async tick(now: Date = this.clock()): Promise<TickResult> {
    if (this.controllerState === 'removed') {
      return { replanned: null, emitted: null, settledPeriods: 0 };
    }

    const measured = await this.observe(now);
    this.deps.comfort.pruneExpired(now);

    const reason = this.dueTrigger(now, measured);
    if (reason) {
      await this.requestReplan(reason);
    }

    const emitted = await this.emitDueAction(now, measured);
    const settled = this.deps.savings.settleCompleted(now, this.deps.scheduler.savingsPeriodMinutes);
    return { replanned: reason, emitted, settledPeriods: settled.length };
  }

  private async observe(now: Date): Promise<number | null> {
    try {
      const reading = await this.deps.sensor.currentTemperature(this.zoneId);
      this.lastReading = reading;
      const age = now.getTime() - Date.parse(reading.timestamp);
      if (age > this.deps.scheduler.sensorStaleMinutes * 60_000) {
        this.logger.warn(`Stale temperature for zone ${this.zoneId}`, { ageMinutes: Math.round(age / 60_000) });
        return null;
      }
      if (this.ownsModel) {
        const level = this.deps.state.getLastChange(this.zoneId).level;
        this.deps.thermal.observe({
          timestamp: reading.timestamp,
          indoorTemperature: reading.value,
          heatingLevel: level ?? 0,
          outdoorTemperature: this.outdoorAt(now)
        });
      }
      return reading.value;
    } catch (error) {
      this.logger.warn(`Temperature sensor failed for zone ${this.zoneId}`, {
        error: isError(error) ? error.message : String(error)
      });
      return null;
    }
  }

  private dueTrigger(now: Date, measured: number | null): ReplanReason | null {
    const plan = this.committed;
    if (!plan || this.committedAt === null) {
      return this.cycle ? null : 'startup';
    }
    if (now.getTime() >= Date.parse(plan.horizonEnd)) {
      return 'plan-exhausted';
    }
    if (measured !== null) {
      const expected = this.expectedTemperature(plan, now);
      if (expected !== null && Math.abs(measured - expected) > this.deps.scheduler.driftThresholdC) {
        this.logger.log(`Zone ${this.zoneId} drifted from plan`, {
          measured,
          expected: Number(expected.toFixed(2))
        });
        return 'drift';
      }
    }
    if (now.getTime() - this.committedAt >= this.deps.scheduler.replanCadenceMinutes * 60_000) {
      return 'cadence';
    }
    return null;
  }

  /**
   * Planned temperature at `now`, interpolated within the current step.
   */
  public expectedTemperature(plan: ActionPlan, now: Date): number | null {
    const ms = now.getTime();
    for (let i = 0; i < plan.actions.length; i++) {
      const action = plan.actions[i];
      const start = Date.parse(action.start);
      const end = Date.parse(action.end);
      if (ms >= start && ms < end) {
        const from = i === 0 ? plan.startTemp : plan.actions[i - 1].predictedTemp;
        const fraction = (ms - start) / (end - start);
        return from + (action.predictedTemp - from) * fraction;
      }
    }
    return null;
  }

  private currentAction(now: Date): { action: PlannedAction; index: number } | null {
    const plan = this.committed;
    if (!plan) {
      return null;
    }
    const ms = now.getTime();
    const index = plan.actions.findIndex((a) => ms >= Date.parse(a.start) && ms < Date.parse(a.end));
    return index >= 0 ? { action: plan.actions[index], index } : null;
  }

  private async emitDueAction(now: Date, measured: number | null): Promise<PlannedAction | null> {
    const due = this.currentAction(now);
    if (!due) {
      this.closeSegment(now);
      if (this.committed) {
        this.setState('idle');
      }
      return null;
    }

    const { action } = due;
    const segment = this.segment;
    const sameStep = segment !== null && segment.stepStart === action.start;
    if (sameStep && Math.abs(segment.level - action.level) < 1e-9) {
      return null;
    }
    if (!this.autoControl) {
      return null;
    }

    const effectiveFrom = sameStep ? now : new Date(action.start);
    const previous = this.deps.state.getLastChange(this.zoneId).level;
    const changing = previous === null || Math.abs(previous - action.level) > 1e-9;
    if (changing && previous !== null
      && this.deps.state.isLockedOut(this.zoneId, this.deps.zone.minDwellMinutes, effectiveFrom.getTime())) {
      if (!sameStep) {
        const remaining = this.deps.state.getLockoutRemaining(this.zoneId, this.deps.zone.minDwellMinutes, effectiveFrom.getTime());
        this.logger.warn(`Zone ${this.zoneId} keeps level ${previous} for ${Math.ceil(remaining)} more minutes of minimum dwell`);
        this.closeSegment(effectiveFrom);
        this.openSegment(action, previous, effectiveFrom, measured);
        this.setState('executing');
      }
      return null;
    }

    try {
      await this.deps.actuator.setHeatingLevel(this.zoneId, action.level, effectiveFrom);
    } catch (error) {
      this.errorHandler.logError(error, { zoneId: this.zoneId, level: action.level },
        `Failed to set heating level for zone ${this.zoneId}`);
      return null;
    }

    this.closeSegment(effectiveFrom);
    if (changing) {
      this.deps.state.recordChange(this.zoneId, action.level, effectiveFrom.getTime());
    }

    this.openSegment(action, action.level, effectiveFrom, measured);
    this.setState('executing');
    this.emit('actionEmitted', { action, effectiveFrom: effectiveFrom.toISOString() });
    this.logger.log(`Zone ${this.zoneId} heating level ${action.level} from ${effectiveFrom.toISOString()}`, {
      price: action.price,
      predictedTemp: Number(action.predictedTemp.toFixed(2))
    });
    return action;
  }

  private openSegment(action: PlannedAction, level: HeatingLevel, start: Date, measured: number | null): void {
    this.segment = {
      stepStart: action.start,
      start,
      level,
      action,
      startTemp: measured ?? this.lastReading?.value ?? action.predictedTemp,
      outdoor: this.outdoorAt(start)
    };
  }

  /**
   * Hand the running segment to the savings tracker, ending it at `at` or
   * at its step end, whichever is first.
   */
  private closeSegment(at: Date): void {
    const segment = this.segment;
    if (!segment) {
      return;
    }
    this.segment = null;
    const endMs = Math.min(at.getTime(), Date.parse(segment.action.end));
    if (endMs <= segment.start.getTime()) {
      return;
    }
    const hours = (endMs - segment.start.getTime()) / 3_600_000;
    this.deps.savings.recordStep({
      start: segment.start.toISOString(),
      end: new Date(endMs).toISOString(),
      level: segment.level,
      price: segment.action.price,
      energyKwh: segment.level * this.deps.zone.ratedPowerKw * hours,
      startTemp: segment.startTemp,
      minTemp: segment.action.minTemp,
      maxTemp: segment.action.maxTemp,
      outdoorTemperature: segment.outdoor
    });
  }

  private outdoorAt(at: Date): number | undefined {
    const ms = at.getTime();
    let found: number | undefined;
    for (const point of this.lastOutdoor) {
      if (Date.parse(point.time) <= ms) {
        found = point.temperature;
      }
    }
    return found;
  }

  // ----- Status -----

  public getNextChange(now: Date = this.clock()): NextChange | null {
    const plan = this.committed;
    const due = this.currentAction(now);
    if (!plan || !due) {
      return null;
    }
    const index = findNextChange(plan, due.index + 1, due.action.level);
    if (index < 0) {
      return null;
    }
    const next = plan.actions[index];
    const before = plan.actions[index - 1];
    let reason: string;
    if (next.windowId !== before.windowId && next.level > before.level) {
      reason = `preheating for ${next.windowId}`;
    } else if (next.price < before.price) {
      reason = next.level > before.level ? 'cheaper price' : 'price drop';
    } else if (next.price > before.price) {
      reason = next.level < before.level ? 'coasting through higher price' : 'price rise';
    } else {
      reason = next.level > before.level ? 'keeping temperature in band' : 'temperature reached';
    }
    return { time: next.start, level: next.level, reason };
  }

  public getStatus(now: Date = this.clock()): ZoneControllerStatus {
    const thermal = this.deps.thermal.getStatus();
    const due = this.currentAction(now);
    const plan = this.committed;
    const classification = due && plan
      ? classifyPrice(plan.actions.map((a) => ({ time: a.start, price: a.price })), due.action.price)
      : null;

    return {
      zoneId: this.zoneId,
      state: this.controllerState,
      status: this.deriveStatus(thermal.parameters.confidence, thermal.parameters.usingDefaults, thermal.observationCount),
      autoControl: this.autoControl,
      mode: this.mode,
      planId: plan?.id ?? null,
      currentLevel: this.deps.state.getLastChange(this.zoneId).level,
      lastTemperature: this.lastReading?.value ?? null,
      priceLevel: classification?.label ?? null,
      cheapPeriod: classification ? isCheapLabel(classification.label) : false,
      nextChange: this.getNextChange(now),
      issues: plan?.issues ?? [],
      lastError: this.lastError,
      modelConfidence: thermal.parameters.confidence,
      todaySavings: this.deps.savings.todaySavings(now)
    };
  }

  private deriveStatus(confidence: number, usingDefaults: boolean, observations: number): ZoneStatus {
    if (this.lastError !== null && !this.committed) {
      return 'error';
    }
    if (!this.committed) {
      return 'initializing';
    }
    if (!this.autoControl) {
      return 'manual';
    }
    if (usingDefaults && observations < this.deps.thermal.getModel().getMinSamples()) {
      return 'collecting';
    }
    return confidence >= OPTIMIZING_CONFIDENCE ? 'optimizing' : 'learning';
  }

  // ----- Lifecycle -----

  private setState(next: ControllerState): void {
    if (this.controllerState === next || this.controllerState === 'removed') {
      return;
    }
    const from = this.controllerState;
    this.controllerState = next;
    this.logger.debug(`Zone ${this.zoneId} state ${from} -> ${next}`);
    this.emit('stateChange', { from, to: next });
  }

  private restoreState(): void {
    if (!this.committed) {
      this.setState('idle');
    } else {
      this.setState(this.segment ? 'executing' : 'committed');
    }
  }

  /**
   * Stop the controller. Cancels planning in flight; persisted state stays.
   */
  public dispose(): void {
    if (this.inFlight) {
      this.inFlight.aborted = true;
    }
    this.closeSegment(this.clock());
    this.setState('removed');
    for (const unsubscribe of this.unsubscribe.splice(0)) {
      unsubscribe();
    }
    this.events.removeAllListeners();
  }
}
