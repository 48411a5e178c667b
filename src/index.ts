export * from './types';
export { HeatingApp, HeatingAppOptions } from './app';
export { ZoneManager, ZoneAdapters, AdapterResolver, ZoneManagerStatus } from './orchestration/service-manager';
export {
  ZoneController,
  ControllerState,
  ZoneStatus,
  ZoneControllerStatus,
  NextChange,
  TickResult,
  TRIGGER_PRIORITY
} from './services/zone-controller';
export { ComfortPolicy, OverrideRequest, ComfortChange } from './services/comfort-policy';
export {
  ConfigurationService,
  AppConfig,
  ZoneConfig,
  SchedulerConfig,
  ThermalGroupConfig,
  LoadedConfig,
  DEFAULT_SCHEDULER_CONFIG
} from './services/configuration-service';
export { CachedPriceProvider, PriceSnapshot } from './services/price-provider';
export { EntsoePriceSource, EntsoePriceSourceOptions, resolveAreaToEic } from './services/entsoe-price-source';
export { SavingsTracker, SavingsTotals } from './services/savings-tracker';
export { ThermalModel, ThermalParameters, FitResult } from './services/thermal-model/thermal-model';
export { ThermalModelService, ThermalModelStatus } from './services/thermal-model/thermal-model-service';
export { ThermalDataCollector, DataStatistics } from './services/thermal-model/data-collector';
export {
  planSchedule,
  planScheduleAsync,
  SchedulerInput,
  SchedulerOptions,
  DefaultSchedulerOptions
} from '../optimization/scheduler';
export { AppLogger, Logger, LogLevel, LogCategory, createFallbackLogger } from './util/logger';
export {
  AppError,
  ErrorCategory,
  DataUnavailableError,
  InfeasiblePlanError,
  ModelDegradedError,
  ConfigInvalidError,
  PlanCancelledError
} from './util/error-handler';
export { SettingsStore, MemorySettingsStore, JsonFileSettingsStore } from './util/settings-store';
