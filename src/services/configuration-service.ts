import * as fs from 'fs';
import { IANAZone } from 'luxon';
import {
  ComfortWindow,
  HeatingLevel,
  OptimizationMode,
  VacationPeriod,
  Weekday
} from '../types';
import { ConfigInvalidError, isError } from '../util/error-handler';
import { LogLevel } from '../util/logger';
import {
  isRecord,
  validateArray,
  validateBoolean,
  validateEnum,
  validateNumber,
  validateString,
  validateTimestamp
} from '../util/validation';
import { parseTimeOfDay } from './comfort-policy';

export interface DefaultComfortConfig {
  minTemp: number;
  maxTemp: number;
}

export interface ZoneConfig {
  zoneId: string;
  name: string;
  sensorRef: string;
  actuatorRef: string;
  comfortWindows: ComfortWindow[];
  defaultComfort: DefaultComfortConfig;
  minDwellMinutes: number;
  actionLevels: HeatingLevel[];
  ratedPowerKw: number;
  freezeFloorC: number;
  mode: OptimizationMode;
  autoControl: boolean;
  vacation?: VacationPeriod;
}

export interface ThermalGroupConfig {
  groupId: string;
  memberZoneIds: string[];
}

export interface SchedulerConfig {
  horizonHours: number;
  stepMinutes: number;
  replanCadenceMinutes: number;
  driftThresholdC: number;
  relaxationStepC: number;
  maxRelaxationC: number;
  temperatureBinC: number;
  sensorStaleMinutes: number;
  defaultOutdoorTemp: number;
  savingsPeriodMinutes: number;
  comfortValuePerDegreeHour: number;
}

export interface ThermalModelConfig {
  minSamples: number;
  halfLifeHours: number;
  retentionDays: number;
  maxPoints: number;
  relearnEvery: number;
}

export type PriceSourceConfig =
  | { type: 'entsoe'; area: string; ttlMinutes: number }
  | { type: 'none' };

export interface LoggingConfig {
  level: LogLevel;
  verbose: boolean;
}

export interface AppConfig {
  timeZone: string;
  settingsFile?: string;
  zones: ZoneConfig[];
  thermalGroups: ThermalGroupConfig[];
  scheduler: SchedulerConfig;
  thermalModel: ThermalModelConfig;
  priceSource: PriceSourceConfig;
  logging: LoggingConfig;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface RejectedZone {
  zoneId: string;
  problems: string[];
}

export interface LoadedConfig {
  config: AppConfig;
  rejectedZones: RejectedZone[];
  warnings: string[];
}

export const DEFAULT_ACTION_LEVELS: HeatingLevel[] = [0, 0.25, 0.5, 0.75, 1];

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  horizonHours: 24,
  stepMinutes: 60,
  replanCadenceMinutes: 60,
  driftThresholdC: 1.0,
  relaxationStepC: 0.5,
  maxRelaxationC: 3,
  temperatureBinC: 0.1,
  sensorStaleMinutes: 30,
  defaultOutdoorTemp: 5,
  savingsPeriodMinutes: 60,
  comfortValuePerDegreeHour: 0.2
};

export const DEFAULT_THERMAL_MODEL_CONFIG: ThermalModelConfig = {
  minSamples: 24,
  halfLifeHours: 72,
  retentionDays: 60,
  maxPoints: 10000,
  relearnEvery: 12
};

const OPTIMIZATION_MODES: readonly OptimizationMode[] = ['economy', 'balanced', 'comfort'];
const STEP_MINUTES: readonly number[] = [15, 30, 60];
const ZONE_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Collects problems instead of stopping at the first one.
 */
class ProblemCollector {
  readonly errors: string[] = [];
  readonly warnings: string[] = [];

  read<T>(fn: () => T, fallback: T): T {
    try {
      return fn();
    } catch (error) {
      this.errors.push(isError(error) ? error.message : String(error));
      return fallback;
    }
  }

  optional<T>(source: Record<string, unknown>, key: string, fn: (value: unknown) => T, fallback: T): T {
    const value = source[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    return this.read(() => fn(value), fallback);
  }
}

function section(source: Record<string, unknown>, key: string, problems: ProblemCollector): Record<string, unknown> {
  const value = source[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    problems.errors.push(`Invalid ${key}: must be an object`);
    return {};
  }
  return value;
}

export function isValidTimeZone(timeZone: string): boolean {
  return IANAZone.isValidZone(timeZone);
}

/**
 * Validates configuration and fills in defaults.
 */
export class ConfigurationService {
  /**
   * Validate a zone definition.
   * @throws ConfigInvalidError listing every problem found
   */
  parseZone(raw: unknown, scheduler: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG): ZoneConfig {
    const { zone, result } = this.validateZone(raw, scheduler);
    if (!zone || !result.isValid) {
      const zoneId = isRecord(raw) && typeof raw.zoneId === 'string' ? raw.zoneId : '<unknown>';
      throw new ConfigInvalidError(`Zone ${zoneId} is invalid: ${result.errors.join('; ')}`, result.errors, { zoneId });
    }
    return zone;
  }

  validateZone(raw: unknown, scheduler: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG): { zone: ZoneConfig | null; result: ValidationResult } {
    const problems = new ProblemCollector();
    if (!isRecord(raw)) {
      problems.errors.push('Zone definition must be an object');
      return { zone: null, result: { isValid: false, errors: problems.errors, warnings: [] } };
    }

    const zoneId = problems.read(() => validateString(raw.zoneId, 'zoneId', { minLength: 1, pattern: ZONE_ID_PATTERN }), '');
    const sensorRef = problems.read(() => validateString(raw.sensorRef, 'sensorRef', { minLength: 1 }), '');
    const actuatorRef = problems.read(() => validateString(raw.actuatorRef, 'actuatorRef', { minLength: 1 }), '');
    const name = problems.optional(raw, 'name', (v) => validateString(v, 'name'), zoneId);

    const defaultSection = section(raw, 'defaultComfort', problems);
    const defaultComfort: DefaultComfortConfig = {
      minTemp: problems.optional(defaultSection, 'minTemp', (v) => validateNumber(v, 'defaultComfort.minTemp', { min: 0, max: 35 }), 19),
      maxTemp: problems.optional(defaultSection, 'maxTemp', (v) => validateNumber(v, 'defaultComfort.maxTemp', { min: 0, max: 35 }), 23)
    };
    if (defaultComfort.minTemp > defaultComfort.maxTemp) {
      problems.errors.push('Invalid defaultComfort: minTemp must not exceed maxTemp');
    }

    const minDwellMinutes = problems.optional(raw, 'minDwellMinutes',
      (v) => validateNumber(v, 'minDwellMinutes', { min: 0, max: 24 * 60 }), 30);
    const actionLevels = problems.optional(raw, 'actionLevels', (v) => {
      const list = validateArray(v, 'actionLevels', {
        minLength: 1,
        elementValidator: (item) => typeof item === 'number' && item >= 0 && item <= 1
      });
      return list.filter((item): item is number => typeof item === 'number');
    }, DEFAULT_ACTION_LEVELS);
    const ratedPowerKw = problems.optional(raw, 'ratedPowerKw',
      (v) => validateNumber(v, 'ratedPowerKw', { min: 0.01, max: 100 }), 2);
    const freezeFloorC = problems.optional(raw, 'freezeFloorC',
      (v) => validateNumber(v, 'freezeFloorC', { min: -10, max: 15 }), 5);
    const mode = problems.optional(raw, 'mode', (v) => validateEnum(v, 'mode', OPTIMIZATION_MODES), 'economy');
    const autoControl = problems.optional(raw, 'autoControl', (v) => validateBoolean(v, 'autoControl'), true);

    const comfortWindows = problems.optional<(ComfortWindow | null)[]>(raw, 'comfortWindows', (v) => {
      const list = validateArray(v, 'comfortWindows');
      return list.map((item, i) => this.parseWindow(item, i, problems));
    }, []).filter((w): w is ComfortWindow => w !== null);

    const ids = new Set<string>();
    for (const window of comfortWindows) {
      if (ids.has(window.id)) {
        problems.errors.push(`Duplicate comfort window id ${window.id}`);
      }
      ids.add(window.id);
      if (window.minTemp < freezeFloorC) {
        problems.warnings.push(`Window ${window.id} minTemp ${window.minTemp} is below the freeze floor ${freezeFloorC}`);
      }
    }

    if (!actionLevels.some((l) => l === 0)) {
      problems.warnings.push('actionLevels has no off level (0); the zone can never coast');
    }
    if (minDwellMinutes > scheduler.stepMinutes && minDwellMinutes % scheduler.stepMinutes !== 0) {
      const rounded = Math.ceil(minDwellMinutes / scheduler.stepMinutes) * scheduler.stepMinutes;
      problems.warnings.push(`minDwellMinutes ${minDwellMinutes} is rounded up to ${rounded} (whole ${scheduler.stepMinutes}-minute steps)`);
    }

    const vacation = problems.optional<VacationPeriod | undefined>(raw, 'vacation', (v) => this.parseVacation(v), undefined);

    const result: ValidationResult = {
      isValid: problems.errors.length === 0,
      errors: problems.errors,
      warnings: problems.warnings
    };

    return {
      zone: {
        zoneId,
        name,
        sensorRef,
        actuatorRef,
        comfortWindows,
        defaultComfort,
        minDwellMinutes,
        actionLevels,
        ratedPowerKw,
        freezeFloorC,
        mode,
        autoControl,
        vacation
      },
      result
    };
  }

  /**
   * Validate a whole configuration. Invalid zones are rejected one by one;
   * global problems are fatal.
   * @throws ConfigInvalidError for problems outside zone definitions
   */
  parseAppConfig(raw: unknown): LoadedConfig {
    const problems = new ProblemCollector();
    if (!isRecord(raw)) {
      throw new ConfigInvalidError('Configuration must be an object', ['root: must be an object']);
    }

    const timeZone = problems.optional(raw, 'timeZone', (v) => validateString(v, 'timeZone', { minLength: 1 }), 'UTC');
    if (!isValidTimeZone(timeZone)) {
      problems.errors.push(`Invalid timeZone: ${timeZone} is not an IANA time zone`);
    }
    const settingsFile = problems.optional<string | undefined>(raw, 'settingsFile',
      (v) => validateString(v, 'settingsFile', { minLength: 1 }), undefined);

    const scheduler = this.parseScheduler(section(raw, 'scheduler', problems), problems);
    const thermalModel = this.parseThermalModel(section(raw, 'thermalModel', problems), problems);
    const priceSource = this.parsePriceSource(section(raw, 'priceSource', problems), problems);
    const logging = this.parseLogging(section(raw, 'logging', problems), problems);

    const rawZones = problems.optional(raw, 'zones', (v) => validateArray(v, 'zones'), []);
    const zones: ZoneConfig[] = [];
    const rejectedZones: RejectedZone[] = [];
    const warnings: string[] = [];
    for (const rawZone of rawZones) {
      const { zone, result } = this.validateZone(rawZone, scheduler);
      warnings.push(...result.warnings.map((w) => `${zone?.zoneId ?? '<unknown>'}: ${w}`));
      if (zone && result.isValid) {
        if (zones.some((z) => z.zoneId === zone.zoneId)) {
          rejectedZones.push({ zoneId: zone.zoneId, problems: ['Duplicate zoneId'] });
        } else {
          zones.push(zone);
        }
      } else {
        rejectedZones.push({ zoneId: zone?.zoneId || '<unknown>', problems: result.errors });
      }
    }

    const thermalGroups = problems.optional(raw, 'thermalGroups', (v) => validateArray(v, 'thermalGroups'), [])
      .map((item, i) => this.parseGroup(item, i, problems))
      .filter((g): g is ThermalGroupConfig => g !== null);

    const grouped = new Set<string>();
    for (const group of thermalGroups) {
      for (const member of group.memberZoneIds) {
        if (grouped.has(member)) {
          problems.errors.push(`Zone ${member} belongs to more than one thermal group`);
        }
        grouped.add(member);
      }
    }

    if (problems.errors.length > 0) {
      throw new ConfigInvalidError(`Configuration is invalid: ${problems.errors.join('; ')}`, problems.errors);
    }

    return {
      config: { timeZone, settingsFile, zones, thermalGroups, scheduler, thermalModel, priceSource, logging },
      rejectedZones,
      warnings: [...problems.warnings, ...warnings]
    };
  }

  /**
   * Read and validate a JSON configuration file.
   */
  loadFile(filePath: string): LoadedConfig {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      const message = isError(error) ? error.message : String(error);
      throw new ConfigInvalidError(`Cannot read configuration ${filePath}: ${message}`, [message]);
    }
    return this.parseAppConfig(parsed);
  }

  private parseWindow(raw: unknown, index: number, problems: ProblemCollector): ComfortWindow | null {
    const label = `comfortWindows[${index}]`;
    if (!isRecord(raw)) {
      problems.errors.push(`Invalid ${label}: must be an object`);
      return null;
    }

    const errorsBefore = problems.errors.length;
    const id = problems.optional(raw, 'id', (v) => validateString(v, `${label}.id`, { minLength: 1 }), `window-${index}`);
    const minTemp = problems.read(() => validateNumber(raw.minTemp, `${label}.minTemp`, { min: 0, max: 35 }), 0);
    const maxTemp = problems.read(() => validateNumber(raw.maxTemp, `${label}.maxTemp`, { min: 0, max: 35 }), 0);
    const priority = problems.optional(raw, 'priority', (v) => validateNumber(v, `${label}.priority`), 0);
    if (minTemp > maxTemp) {
      problems.errors.push(`Invalid ${label}: minTemp must not exceed maxTemp`);
    }

    const window: ComfortWindow = { id, minTemp, maxTemp, priority };
    const daily = raw.startTime !== undefined || raw.endTime !== undefined;
    const absolute = raw.start !== undefined || raw.end !== undefined;

    if (daily === absolute) {
      problems.errors.push(`Invalid ${label}: give either startTime/endTime or start/end`);
    } else if (daily) {
      window.startTime = problems.read(() => this.timeOfDay(raw.startTime, `${label}.startTime`), '00:00');
      window.endTime = problems.read(() => this.timeOfDay(raw.endTime, `${label}.endTime`), '00:00');
      const days = problems.optional(raw, 'days', (v) => validateArray(v, `${label}.days`, {
        elementValidator: isWeekday
      }), []);
      const weekdays = days.filter(isWeekday);
      if (weekdays.length > 0) {
        window.days = weekdays;
      }
    } else {
      window.start = problems.read(() => validateTimestamp(raw.start, `${label}.start`), '');
      window.end = problems.read(() => validateTimestamp(raw.end, `${label}.end`), '');
      if (window.start && window.end && Date.parse(window.end) <= Date.parse(window.start)) {
        problems.errors.push(`Invalid ${label}: end must be after start`);
      }
    }

    return problems.errors.length === errorsBefore ? window : null;
  }

  private timeOfDay(value: unknown, name: string): string {
    const text = validateString(value, name);
    if (parseTimeOfDay(text) === null) {
      throw new Error(`Invalid ${name}: must be HH:mm`);
    }
    return text;
  }

  private parseVacation(raw: unknown): VacationPeriod {
    if (!isRecord(raw)) {
      throw new Error('Invalid vacation: must be an object');
    }
    const start = validateTimestamp(raw.start, 'vacation.start');
    const end = validateTimestamp(raw.end, 'vacation.end');
    if (Date.parse(end) <= Date.parse(start)) {
      throw new Error('Invalid vacation: end must be after start');
    }
    const minTemp = validateNumber(raw.minTemp, 'vacation.minTemp', { min: 0, max: 35 });
    const maxTemp = validateNumber(raw.maxTemp, 'vacation.maxTemp', { min: 0, max: 35 });
    if (minTemp > maxTemp) {
      throw new Error('Invalid vacation: minTemp must not exceed maxTemp');
    }
    const preheatHours = raw.preheatHours === undefined
      ? 6
      : validateNumber(raw.preheatHours, 'vacation.preheatHours', { min: 0, max: 72 });
    return { start, end, minTemp, maxTemp, preheatHours };
  }

  private parseGroup(raw: unknown, index: number, problems: ProblemCollector): ThermalGroupConfig | null {
    if (!isRecord(raw)) {
      problems.errors.push(`Invalid thermalGroups[${index}]: must be an object`);
      return null;
    }
    const groupId = problems.read(() => validateString(raw.groupId, `thermalGroups[${index}].groupId`, { minLength: 1, pattern: ZONE_ID_PATTERN }), '');
    const members = problems.read(() => validateArray(raw.memberZoneIds, `thermalGroups[${index}].memberZoneIds`, {
      minLength: 1,
      elementValidator: (item) => typeof item === 'string' && item.length > 0
    }), []);
    const memberZoneIds = members.filter((m): m is string => typeof m === 'string');
    return groupId && memberZoneIds.length > 0 ? { groupId, memberZoneIds } : null;
  }

  private parseScheduler(raw: Record<string, unknown>, problems: ProblemCollector): SchedulerConfig {
    const d = DEFAULT_SCHEDULER_CONFIG;
    const stepMinutes = problems.optional(raw, 'stepMinutes', (v) => validateNumber(v, 'scheduler.stepMinutes'), d.stepMinutes);
    if (!STEP_MINUTES.includes(stepMinutes)) {
      problems.errors.push(`Invalid scheduler.stepMinutes: must be one of ${STEP_MINUTES.join(', ')}`);
    }
    const config: SchedulerConfig = {
      horizonHours: problems.optional(raw, 'horizonHours', (v) => validateNumber(v, 'scheduler.horizonHours', { min: 1, max: 72 }), d.horizonHours),
      stepMinutes,
      replanCadenceMinutes: problems.optional(raw, 'replanCadenceMinutes', (v) => validateNumber(v, 'scheduler.replanCadenceMinutes', { min: 5, max: 24 * 60 }), d.replanCadenceMinutes),
      driftThresholdC: problems.optional(raw, 'driftThresholdC', (v) => validateNumber(v, 'scheduler.driftThresholdC', { min: 0.1, max: 10 }), d.driftThresholdC),
      relaxationStepC: problems.optional(raw, 'relaxationStepC', (v) => validateNumber(v, 'scheduler.relaxationStepC', { min: 0.1, max: 5 }), d.relaxationStepC),
      maxRelaxationC: problems.optional(raw, 'maxRelaxationC', (v) => validateNumber(v, 'scheduler.maxRelaxationC', { min: 0, max: 10 }), d.maxRelaxationC),
      temperatureBinC: problems.optional(raw, 'temperatureBinC', (v) => validateNumber(v, 'scheduler.temperatureBinC', { min: 0.01, max: 1 }), d.temperatureBinC),
      sensorStaleMinutes: problems.optional(raw, 'sensorStaleMinutes', (v) => validateNumber(v, 'scheduler.sensorStaleMinutes', { min: 1, max: 24 * 60 }), d.sensorStaleMinutes),
      defaultOutdoorTemp: problems.optional(raw, 'defaultOutdoorTemp', (v) => validateNumber(v, 'scheduler.defaultOutdoorTemp', { min: -50, max: 50 }), d.defaultOutdoorTemp),
      savingsPeriodMinutes: problems.optional(raw, 'savingsPeriodMinutes', (v) => validateNumber(v, 'scheduler.savingsPeriodMinutes', { min: 15, max: 24 * 60 }), d.savingsPeriodMinutes),
      comfortValuePerDegreeHour: problems.optional(raw, 'comfortValuePerDegreeHour', (v) => validateNumber(v, 'scheduler.comfortValuePerDegreeHour', { min: 0, max: 100 }), d.comfortValuePerDegreeHour)
    };
    if (config.horizonHours * 60 < config.stepMinutes) {
      problems.errors.push('Invalid scheduler.horizonHours: shorter than one step');
    }
    return config;
  }

  private parseThermalModel(raw: Record<string, unknown>, problems: ProblemCollector): ThermalModelConfig {
    const d = DEFAULT_THERMAL_MODEL_CONFIG;
    return {
      minSamples: problems.optional(raw, 'minSamples', (v) => validateNumber(v, 'thermalModel.minSamples', { min: 3, integer: true }), d.minSamples),
      halfLifeHours: problems.optional(raw, 'halfLifeHours', (v) => validateNumber(v, 'thermalModel.halfLifeHours', { min: 1 }), d.halfLifeHours),
      retentionDays: problems.optional(raw, 'retentionDays', (v) => validateNumber(v, 'thermalModel.retentionDays', { min: 1, max: 365 }), d.retentionDays),
      maxPoints: problems.optional(raw, 'maxPoints', (v) => validateNumber(v, 'thermalModel.maxPoints', { min: 100, max: 50000, integer: true }), d.maxPoints),
      relearnEvery: problems.optional(raw, 'relearnEvery', (v) => validateNumber(v, 'thermalModel.relearnEvery', { min: 1, integer: true }), d.relearnEvery)
    };
  }

  private parsePriceSource(raw: Record<string, unknown>, problems: ProblemCollector): PriceSourceConfig {
    const type = problems.optional(raw, 'type', (v) => validateEnum(v, 'priceSource.type', ['entsoe', 'none'] as const), 'none');
    if (type === 'none') {
      return { type };
    }
    return {
      type,
      area: problems.optional(raw, 'area', (v) => validateString(v, 'priceSource.area', { minLength: 1 }), 'SE3'),
      ttlMinutes: problems.optional(raw, 'ttlMinutes', (v) => validateNumber(v, 'priceSource.ttlMinutes', { min: 1 }), 360)
    };
  }

  private parseLogging(raw: Record<string, unknown>, problems: ProblemCollector): LoggingConfig {
    const levelName = problems.optional(raw, 'level',
      (v) => validateEnum(v, 'logging.level', ['debug', 'info', 'warn', 'error'] as const), 'info');
    const levels: Record<typeof levelName, LogLevel> = {
      debug: LogLevel.DEBUG,
      info: LogLevel.INFO,
      warn: LogLevel.WARN,
      error: LogLevel.ERROR
    };
    return {
      level: levels[levelName],
      verbose: problems.optional(raw, 'verbose', (v) => validateBoolean(v, 'logging.verbose'), false)
    };
  }
}

function isWeekday(value: unknown): value is Weekday {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 7;
}
