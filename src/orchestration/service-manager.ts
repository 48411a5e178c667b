import {
  ActuatorCapability,
  Clock,
  ComfortOverride,
  HeatingActuator,
  OutdoorForecastSource,
  PriceSource,
  ReplanReason,
  TemperatureSensor
} from '../types';
import { Logger } from '../util/logger';
import { ConfigInvalidError, DataUnavailableError, isError } from '../util/error-handler';
import { SettingsStore } from '../util/settings-store';
import { ComfortPolicy, OverrideRequest } from '../services/comfort-policy';
import { AppConfig, ConfigurationService, ThermalGroupConfig, ZoneConfig } from '../services/configuration-service';
import { CachedPriceProvider } from '../services/price-provider';
import { SavingsTracker } from '../services/savings-tracker';
import { ScheduleManagementService } from '../services/schedule-management-service';
import { StateManager } from '../services/state-manager';
import { ThermalModelService } from '../services/thermal-model/thermal-model-service';
import { PlanPriceProvider, TickResult, ZoneController, ZoneControllerStatus } from '../services/zone-controller';
import { intersectLevels } from '../../optimization/dwell-constraints';

/**
 * Device bindings of a zone, resolved from its sensorRef/actuatorRef.
 */
export interface ZoneAdapters {
  sensor: TemperatureSensor;
  actuator: HeatingActuator;
  capability: ActuatorCapability;
}

export type AdapterResolver = (zone: ZoneConfig) => ZoneAdapters;

export interface ZoneManagerDeps {
  config: AppConfig;
  store: SettingsStore;
  logger: Logger;
  priceSource: PriceSource | null;
  adapters: AdapterResolver;
  outdoor?: OutdoorForecastSource;
  schedule?: ScheduleManagementService;
  clock?: Clock;
}

export interface ZoneManagerStatus {
  zones: ZoneControllerStatus[];
  groups: Array<{ groupId: string; members: string[]; owner: string | null }>;
}

interface GroupState {
  config: ThermalGroupConfig;
  thermal: ThermalModelService;
  owner: string | null;
}

const unavailablePrices: PlanPriceProvider = {
  getPrices: () => Promise.reject(new DataUnavailableError('No price source configured'))
};

/**
 * Creates and owns the zone controllers. Zones can be added and removed at
 * run time; zones in a thermal group share one thermal model, fed by one
 * active member at a time.
 */
export class ZoneManager {
  private readonly zones = new Map<string, ZoneController>();
  private readonly groups = new Map<string, GroupState>();
  private readonly configuration = new ConfigurationService();
  private readonly stateManager: StateManager;
  private readonly prices: PlanPriceProvider;
  private readonly provider: CachedPriceProvider | null;
  private readonly schedule: ScheduleManagementService;
  private readonly clock: Clock;
  private unsubscribePrices: (() => void) | null = null;
  private started = false;

  constructor(private readonly deps: ZoneManagerDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.stateManager = new StateManager(deps.logger.child('State'), deps.store);
    this.schedule = deps.schedule ?? new ScheduleManagementService(deps.logger.child('Schedule'), deps.config.timeZone);

    if (deps.priceSource) {
      this.provider = new CachedPriceProvider(deps.priceSource, deps.logger.child('Prices'), {
        store: deps.store,
        clock: this.clock
      });
      this.prices = this.provider;
      this.unsubscribePrices = this.provider.onUpdate(() => this.onPriceUpdate());
    } else {
      this.provider = null;
      this.prices = unavailablePrices;
    }

    for (const group of deps.config.thermalGroups) {
      this.groups.set(group.groupId, {
        config: group,
        thermal: this.createThermalService(group.groupId),
        owner: null
      });
    }

    for (const zone of deps.config.zones) {
      try {
        this.addZone(zone);
      } catch (error) {
        if (!(error instanceof ConfigInvalidError)) {
          throw error;
        }
        deps.logger.error(`Zone ${zone.zoneId} not activated`, undefined, { problems: error.problems });
      }
    }

    this.schedule.register('tick', () => this.tickAll());
    this.schedule.register('cadence', () => this.replanAll('cadence'));
    this.schedule.register('retention', async () => this.runRetention());
  }

  getPriceProvider(): CachedPriceProvider | null {
    return this.provider;
  }

  getSchedule(): ScheduleManagementService {
    return this.schedule;
  }

  getZone(zoneId: string): ZoneController | undefined {
    return this.zones.get(zoneId);
  }

  listZones(): ZoneController[] {
    return [...this.zones.values()];
  }

  /**
   * Validate and activate a zone. Starts planning right away when the
   * manager is running.
   * @throws ConfigInvalidError when the definition is malformed, the id is
   * taken or the actuator supports none of the zone's action levels
   */
  addZone(raw: unknown): ZoneController {
    const zone = this.configuration.parseZone(raw, this.deps.config.scheduler);
    if (this.zones.has(zone.zoneId)) {
      throw new ConfigInvalidError(`Zone ${zone.zoneId} already exists`, ['Duplicate zoneId'], { zoneId: zone.zoneId });
    }

    const logger = this.deps.logger.child(`Zone:${zone.zoneId}`);
    const adapters = this.deps.adapters(zone);
    const supported = adapters.capability.supportsLevels();
    const levels = intersectLevels(supported, zone.actionLevels);
    if (levels.length === 0) {
      throw new ConfigInvalidError(`Zone ${zone.zoneId} has no heating level its actuator supports`, [
        `actionLevels [${zone.actionLevels.join(', ')}] share no level with the actuator [${supported.join(', ')}]`
      ], { zoneId: zone.zoneId });
    }

    const group = this.groupOf(zone.zoneId);
    let thermal: ThermalModelService;
    let ownsModel = true;
    if (group) {
      thermal = group.thermal;
      ownsModel = group.owner === null;
      if (ownsModel) {
        group.owner = zone.zoneId;
      }
    } else {
      thermal = this.createThermalService(zone.zoneId);
    }

    const comfort = new ComfortPolicy({
      timeZone: this.deps.config.timeZone,
      defaultComfort: zone.defaultComfort,
      windows: zone.comfortWindows,
      clock: this.clock
    });
    if (zone.vacation) {
      comfort.setVacation(zone.vacation);
    }

    const savings = new SavingsTracker(logger, {
      zoneId: zone.zoneId,
      parameters: () => thermal.getModel().getParameters(),
      levels,
      ratedPowerKw: zone.ratedPowerKw,
      defaultOutdoorTemp: this.deps.config.scheduler.defaultOutdoorTemp,
      timeZone: this.deps.config.timeZone,
      store: this.deps.store,
      clock: this.clock
    });

    const controller = new ZoneController({
      zone,
      scheduler: this.deps.config.scheduler,
      sensor: adapters.sensor,
      actuator: adapters.actuator,
      capability: adapters.capability,
      prices: this.prices,
      outdoor: this.deps.outdoor,
      thermal,
      ownsModel,
      comfort,
      savings,
      state: this.stateManager,
      logger,
      clock: this.clock
    });
    this.zones.set(zone.zoneId, controller);
    this.deps.logger.log(`Zone ${zone.zoneId} activated`, {
      group: group?.config.groupId ?? null,
      ownsModel,
      autoControl: zone.autoControl
    });

    if (this.started) {
      controller.start().catch((error: unknown) => {
        this.deps.logger.error(`Zone ${zone.zoneId} failed to start`, error);
      });
    }
    return controller;
  }

  /**
   * Tear a zone down. Persisted history and ledger stay in the store.
   */
  removeZone(zoneId: string): boolean {
    const controller = this.zones.get(zoneId);
    if (!controller) {
      return false;
    }
    controller.dispose();
    this.zones.delete(zoneId);

    const group = this.groupOf(zoneId);
    if (group && group.owner === zoneId) {
      const successor = group.config.memberZoneIds.find((id) => this.zones.has(id)) ?? null;
      group.owner = successor;
      if (successor) {
        this.zones.get(successor)?.setOwnsModel(true);
        this.deps.logger.log(`Zone ${successor} now feeds thermal group ${group.config.groupId}`);
      }
    }
    this.deps.logger.log(`Zone ${zoneId} removed`);
    return true;
  }

  /**
   * Put the same comfort override on every active zone.
   */
  boostAll(request: OverrideRequest): ComfortOverride[] {
    const overrides = this.listZones().map((zone) => zone.getComfortPolicy().setOverride(request));
    this.deps.logger.log(`Boosted ${overrides.length} zone(s) to ${request.minTemp}-${request.maxTemp}°C`);
    return overrides;
  }

  /**
   * Plan every zone, then start the cron jobs.
   */
  async start(): Promise<void> {
    this.started = true;
    await Promise.all(this.listZones().map((zone) => zone.start()));
    this.schedule.start();
  }

  stop(): void {
    this.started = false;
    this.schedule.stop();
    for (const zoneId of [...this.zones.keys()]) {
      this.removeZone(zoneId);
    }
    this.unsubscribePrices?.();
    this.unsubscribePrices = null;
  }

  /**
   * Tick every zone. One zone failing does not stop the others.
   */
  async tickAll(now: Date = this.clock()): Promise<Map<string, TickResult>> {
    const zones = this.listZones();
    const outcomes = await Promise.allSettled(zones.map((zone) => zone.tick(now)));
    const results = new Map<string, TickResult>();
    outcomes.forEach((outcome, i) => {
      const zoneId = zones[i].zoneId;
      if (outcome.status === 'fulfilled') {
        results.set(zoneId, outcome.value);
      } else {
        this.deps.logger.error(`Tick failed for zone ${zoneId}`, outcome.reason);
      }
    });
    return results;
  }

  async replanAll(reason: ReplanReason): Promise<void> {
    await Promise.all(this.listZones().map((zone) => zone.requestReplan(reason)));
  }

  /**
   * Prune thermal histories of every zone and group.
   */
  runRetention(): number {
    const services = new Set<ThermalModelService>();
    for (const zone of this.zones.values()) {
      services.add(zone.getThermalService());
    }
    for (const group of this.groups.values()) {
      services.add(group.thermal);
    }
    let removed = 0;
    for (const service of services) {
      try {
        removed += service.runRetentionMaintenance();
      } catch (error) {
        this.deps.logger.error(`Retention failed for ${service.getOwnerId()}`, error);
      }
    }
    this.deps.logger.log(`Retention maintenance removed ${removed} observations`);
    return removed;
  }

  getStatus(now: Date = this.clock()): ZoneManagerStatus {
    return {
      zones: this.listZones().map((zone) => zone.getStatus(now)),
      groups: [...this.groups.values()].map((group) => ({
        groupId: group.config.groupId,
        members: group.config.memberZoneIds.filter((id) => this.zones.has(id)),
        owner: group.owner
      }))
    };
  }

  private onPriceUpdate(): void {
    for (const zone of this.zones.values()) {
      if (zone.isPlanning()) {
        continue;
      }
      zone.notifyPriceUpdate().catch((error: unknown) => {
        this.deps.logger.error(`Price-update replan failed for zone ${zone.zoneId}`,
          isError(error) ? error : new Error(String(error)));
      });
    }
  }

  private groupOf(zoneId: string): GroupState | undefined {
    for (const group of this.groups.values()) {
      if (group.config.memberZoneIds.includes(zoneId)) {
        return group;
      }
    }
    return undefined;
  }

  private createThermalService(ownerId: string): ThermalModelService {
    const model = this.deps.config.thermalModel;
    return new ThermalModelService(ownerId, this.deps.store, this.deps.logger.child(`Thermal:${ownerId}`), {
      model: { minSamples: model.minSamples, halfLifeHours: model.halfLifeHours },
      collector: { retentionDays: model.retentionDays, maxPoints: model.maxPoints },
      relearnEvery: model.relearnEvery,
      clock: this.clock
    });
  }
}
