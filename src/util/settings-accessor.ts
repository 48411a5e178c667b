import { Logger } from './logger';
import { SettingsStore } from './settings-store';

/**
 * Type-safe settings accessor with validation and defaults.
 */
export class SettingsAccessor {
  constructor(
    private readonly store: SettingsStore,
    private readonly logger?: Pick<Logger, 'warn' | 'log'>
  ) { }

  /**
   * Get number setting with optional range validation and type coercion.
   */
  getNumber(
    key: string,
    defaultValue: number,
    options?: { min?: number; max?: number }
  ): number {
    const rawValue = this.store.get(key);

    if (rawValue === null || rawValue === undefined) {
      return defaultValue;
    }

    if (typeof rawValue === 'number') {
      return this.validateNumberRange(rawValue, defaultValue, options, key);
    }

    // Coerce strings to numbers
    if (typeof rawValue === 'string') {
      const parsed = Number(rawValue);
      if (Number.isFinite(parsed)) {
        this.logInfo(`Setting '${key}' coerced from string "${rawValue}" to number ${parsed}`);
        return this.validateNumberRange(parsed, defaultValue, options, key);
      }
    }

    this.logWarning(
      `Setting '${key}' has invalid type: expected number, got ${typeof rawValue}. Using default.`
    );
    return defaultValue;
  }

  /**
   * Get string setting.
   */
  getString(key: string, defaultValue: string): string {
    const value = this.store.get(key);
    return typeof value === 'string' && value.length > 0 ? value : defaultValue;
  }

  /**
   * Get object setting with a type guard.
   */
  getObject<T>(key: string, defaultValue: T, validator: (obj: unknown) => obj is T): T {
    const value = this.store.get(key);

    if (value === null || value === undefined) {
      return defaultValue;
    }

    if (!validator(value)) {
      this.logWarning(`Setting '${key}' failed validation. Using default.`);
      return defaultValue;
    }

    return value;
  }

  /**
   * Get an array setting, dropping entries that fail the element guard.
   */
  getArray<T>(key: string, isElement: (item: unknown) => item is T): T[] {
    const value = this.store.get(key);
    if (!Array.isArray(value)) {
      if (value !== undefined && value !== null) {
        this.logWarning(`Setting '${key}' is not an array. Using empty list.`);
      }
      return [];
    }

    const valid = value.filter(isElement);
    if (valid.length !== value.length) {
      this.logWarning(`Setting '${key}' contained ${value.length - valid.length} invalid entries; they were dropped.`);
    }
    return valid;
  }

  set(key: string, value: unknown): void {
    try {
      this.store.set(key, value);
    } catch (error) {
      this.logWarning(`Failed to persist setting '${key}': ${String(error)}`);
    }
  }

  unset(key: string): void {
    try {
      this.store.unset(key);
    } catch (error) {
      this.logWarning(`Failed to remove setting '${key}': ${String(error)}`);
    }
  }

  private validateNumberRange(
    value: number,
    defaultValue: number,
    options: { min?: number; max?: number } | undefined,
    key: string
  ): number {
    if (!Number.isFinite(value)) {
      return defaultValue;
    }

    if (options) {
      if (options.min !== undefined && value < options.min) {
        this.logWarning(
          `Setting '${key}' value ${value} below minimum (${options.min}); using default ${defaultValue}.`
        );
        return defaultValue;
      }
      if (options.max !== undefined && value > options.max) {
        this.logWarning(
          `Setting '${key}' value ${value} above maximum (${options.max}); using default ${defaultValue}.`
        );
        return defaultValue;
      }
    }

    return value;
  }

  private logInfo(message: string): void {
    this.logger?.log(message);
  }

  private logWarning(message: string): void {
    this.logger?.warn(message);
  }
}
