// Shared domain types for the heating scheduler

/** Price of one kWh starting at `time` (ISO 8601) until the next point. */
export interface PricePoint {
  time: string;
  price: number;
}

/** Normalised heating level: 0 = off, 1 = full rated power. */
export type HeatingLevel = number;

export interface TemperatureReading {
  value: number;
  timestamp: string;
}

/** One observation in a zone's thermal history. */
export interface ThermalState {
  timestamp: string;
  indoorTemperature: number;
  heatingLevel: HeatingLevel;
  outdoorTemperature?: number;
}

export interface OutdoorForecastPoint {
  time: string;
  temperature: number;
}

export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * Comfort window. Either daily (`startTime`/`endTime` as HH:mm, optionally
 * limited to ISO weekdays) or absolute (`start`/`end` as ISO timestamps).
 * A daily window whose end is before its start wraps over midnight.
 */
export interface ComfortWindow {
  id: string;
  minTemp: number;
  maxTemp: number;
  priority: number;
  startTime?: string;
  endTime?: string;
  days?: Weekday[];
  start?: string;
  end?: string;
}

export interface ComfortOverride {
  id: string;
  minTemp: number;
  maxTemp: number;
  start: string;
  until: string;
  reason: string;
}

export interface VacationPeriod {
  start: string;
  end: string;
  minTemp: number;
  maxTemp: number;
  preheatHours: number;
}

export type ComfortSource = 'override' | 'vacation' | 'window' | 'default';

export interface ComfortBounds {
  min: number;
  max: number;
  windowId: string;
  source: ComfortSource;
}

export type OptimizationMode = 'economy' | 'balanced' | 'comfort';

export type IssueSource = 'price' | 'sensor' | 'outdoor';

export interface DataUnavailableIssue {
  kind: 'DataUnavailable';
  source: IssueSource;
  /** Number of horizon steps filled from cache or defaults */
  affectedSteps: number;
  stale: boolean;
  detail: string;
}

export interface ModelDegradedIssue {
  kind: 'ModelDegraded';
  reason: 'insufficient-history' | 'degenerate-data' | 'missing-exogenous';
  confidence: number;
  detail: string;
}

export interface RelaxedWindow {
  windowId: string;
  from: string;
  to: string;
  /** Largest predicted deviation below the original minimum (°C) */
  belowMinC: number;
  /** Largest predicted deviation above the original maximum (°C) */
  aboveMaxC: number;
}

export interface InfeasiblePlanIssue {
  kind: 'InfeasiblePlan';
  reason: 'unreachable-from-current-state' | 'bounds-widened' | 'upper-bound-dropped';
  relaxationC: number;
  windows: RelaxedWindow[];
  detail: string;
}

export type PlanIssue = DataUnavailableIssue | ModelDegradedIssue | InfeasiblePlanIssue;

export interface PlannedAction {
  start: string;
  end: string;
  level: HeatingLevel;
  predictedTemp: number;
  minTemp: number;
  maxTemp: number;
  windowId: string;
  price: number;
  energyKwh: number;
  cost: number;
}

export interface ActionPlan {
  id: string;
  zoneId: string;
  createdAt: string;
  horizonStart: string;
  horizonEnd: string;
  stepMinutes: number;
  startTemp: number;
  actions: readonly PlannedAction[];
  totalCost: number;
  totalEnergyKwh: number;
  confidence: number;
  issues: readonly PlanIssue[];
}

export type ReplanReason =
  | 'startup'
  | 'cadence'
  | 'price-update'
  | 'comfort-change'
  | 'override'
  | 'drift'
  | 'plan-exhausted'
  | 'manual';

export interface SavingsRecord {
  id: string;
  zoneId: string;
  periodStart: string;
  periodEnd: string;
  realizedCost: number;
  baselineCost: number;
  /** baselineCost - realizedCost; positive means money saved */
  delta: number;
  realizedEnergyKwh: number;
  baselineEnergyKwh: number;
  createdAt: string;
  correctionOf?: string;
}

/** A step that was actually executed, used for savings settlement. */
export interface RealizedStep {
  start: string;
  end: string;
  level: HeatingLevel;
  price: number;
  energyKwh: number;
  startTemp: number;
  minTemp: number;
  maxTemp: number;
  outdoorTemperature?: number;
}

// Boundary interfaces

export interface PriceSource {
  fetchPrices(horizonStart: Date, horizonEnd: Date): Promise<PricePoint[]>;
}

export interface TemperatureSensor {
  currentTemperature(zoneId: string): Promise<TemperatureReading>;
}

export interface HeatingActuator {
  setHeatingLevel(zoneId: string, level: HeatingLevel, effectiveFrom: Date): Promise<void>;
}

/** Capability of an actuator: the discrete levels it accepts. */
export interface ActuatorCapability {
  supportsLevels(): readonly HeatingLevel[];
}

export interface OutdoorForecastSource {
  outdoorForecast(horizonStart: Date, horizonEnd: Date): Promise<OutdoorForecastPoint[]>;
}

export type Clock = () => Date;
