export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 99
}

/**
 * Log categories for filtering logs
 */
export enum LogCategory {
  GENERAL = 'general',
  PRICE = 'price',
  OPTIMIZATION = 'optimization',
  THERMAL_MODEL = 'thermal_model',
  CONTROLLER = 'controller',
  SAVINGS = 'savings',
  SYSTEM = 'system'
}

/**
 * Where formatted log lines end up. `console` satisfies this.
 */
export interface LogSink {
  log(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Receives user-visible reports (relaxed or degraded plans).
 */
export type Notifier = (message: string) => Promise<void> | void;

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level?: LogLevel;
  prefix?: string;
  enabledCategories?: LogCategory[];
  includeTimestamps?: boolean;
  includeSourceModule?: boolean;
  verboseMode?: boolean;
  sink?: LogSink;
  notifier?: Notifier;
}

/**
 * Logger interface for standardized logging across the application
 */
export interface Logger {
  log(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void;
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, context?: Record<string, unknown>): void;
  price(message: string, context?: Record<string, unknown>): void;
  optimization(message: string, context?: Record<string, unknown>): void;
  notify(message: string): Promise<void>;
  marker(message: string): void;
  setLogLevel(level: LogLevel): void;
  getLogLevel(): LogLevel;
  enableCategory(category: LogCategory): void;
  disableCategory(category: LogCategory): void;
  isCategoryEnabled(category: LogCategory): boolean;
  formatValue(value: unknown): string;
  child(prefix: string): Logger;
}

/**
 * Detect if running in development mode
 */
export function isRunningInDevMode(): boolean {
  return process.env.NODE_ENV === 'development' || process.env.HEATING_DEBUG === '1';
}

function getFormattedTimestamp(): string {
  const now = new Date();
  return now.toISOString().replace('T', ' ').substring(0, 23);
}

/**
 * Format a value for logging based on its type
 */
export function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';

  if (typeof value === 'object') {
    if (value instanceof Error) {
      return `Error: ${value.message}${value.stack ? `\n${value.stack}` : ''}`;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      if (value.length > 10) {
        return `Array(${value.length}) [${value.slice(0, 3).map(formatValue).join(', ')}, ... ${value.length - 6} more ..., ${value.slice(-3).map(formatValue).join(', ')}]`;
      }
      return `[${value.map(formatValue).join(', ')}]`;
    }
    try {
      return JSON.stringify(value, null, 2);
    } catch (e) {
      return `[Object: circular or too complex to stringify]`;
    }
  }

  return String(value);
}

export class AppLogger implements Logger {
  private readonly sink: LogSink;
  private readonly notifier?: Notifier;
  private readonly options: LoggerConfig;
  private logLevel: LogLevel;
  private enabledCategories: Set<LogCategory>;
  private includeTimestamps: boolean;
  private includeSourceModule: boolean;
  private verboseMode: boolean;
  private sourceModule: string;

  constructor(options: LoggerConfig = {}) {
    this.options = options;
    this.sink = options.sink ?? console;
    this.notifier = options.notifier;
    this.logLevel = options.level ?? LogLevel.INFO;
    this.sourceModule = options.prefix || 'App';
    this.includeTimestamps = options.includeTimestamps ?? true;
    this.includeSourceModule = options.includeSourceModule ?? true;
    this.verboseMode = options.verboseMode ?? isRunningInDevMode();
    this.enabledCategories = new Set<LogCategory>(
      options.enabledCategories || Object.values(LogCategory)
    );
  }

  private getLogPrefix(): string {
    let prefix = '';

    if (this.includeTimestamps) {
      prefix += `[${getFormattedTimestamp()}] `;
    }

    if (this.includeSourceModule) {
      prefix += `[${this.sourceModule}] `;
    }

    return prefix;
  }

  public formatValue(value: unknown): string {
    return formatValue(value);
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    this.info(`Log level set to ${LogLevel[level]}`);
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public enableCategory(category: LogCategory): void {
    this.enabledCategories.add(category);
    this.debug(`Enabled log category: ${category}`);
  }

  public disableCategory(category: LogCategory): void {
    this.enabledCategories.delete(category);
    this.debug(`Disabled log category: ${category}`);
  }

  public isCategoryEnabled(category: LogCategory): boolean {
    return this.enabledCategories.has(category);
  }

  /**
   * Create a logger sharing this one's settings with an extra prefix,
   * e.g. one per zone.
   */
  public child(prefix: string): Logger {
    return new AppLogger({
      ...this.options,
      level: this.logLevel,
      enabledCategories: [...this.enabledCategories],
      verboseMode: this.verboseMode,
      prefix: this.options.prefix ? `${this.options.prefix}:${prefix}` : prefix
    });
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG && this.isCategoryEnabled(LogCategory.GENERAL)) {
      // Debug output only in verbose mode
      if (this.verboseMode) {
        this.sink.log(`DEBUG: ${this.getLogPrefix()}${message}`, ...args);
      }
    }
  }

  public log(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`${this.getLogPrefix()}${message}`, ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.log(`INFO: ${this.getLogPrefix()}${message}`, ...args);
    }
  }

  /**
   * Log a price-related message
   */
  public price(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.PRICE)) {
      const contextStr = context ? this.formatValue(context) : '';
      this.sink.log(`PRICE: ${this.getLogPrefix()}${message}${contextStr ? ' ' + contextStr : ''}`);
    }
  }

  /**
   * Log an optimization-related message
   */
  public optimization(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.OPTIMIZATION)) {
      const contextStr = context ? this.formatValue(context) : '';
      this.sink.log(`OPTIMIZATION: ${this.getLogPrefix()}${message}${contextStr ? ' ' + contextStr : ''}`);
    }
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.WARN && this.isCategoryEnabled(LogCategory.GENERAL)) {
      if (context) {
        this.sink.log(`WARN: ${this.getLogPrefix()}${message}`, this.formatValue(context));
      } else {
        this.sink.log(`WARN: ${this.getLogPrefix()}${message}`);
      }
    }
  }

  /**
   * Log an error message
   * @param error Optional error object
   * @param context Optional context object
   */
  public error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.ERROR && this.isCategoryEnabled(LogCategory.GENERAL)) {
      if (error instanceof Error) {
        if (context) {
          this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, error, this.formatValue(context));
        } else {
          this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, error);
        }
      } else if (context) {
        this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, this.formatValue(context));
      } else if (error !== undefined) {
        this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`, this.formatValue(error));
      } else {
        this.sink.error(`ERROR: ${this.getLogPrefix()}${message}`);
      }
    }
  }

  /**
   * Send a notification to the user
   */
  public async notify(message: string): Promise<void> {
    try {
      this.sink.log(`${this.getLogPrefix()}NOTIFICATION: ${message}`);
      if (this.notifier) {
        await this.notifier(message);
      }
    } catch (err) {
      this.error(`Failed to send notification: ${message}`, err);
    }
  }

  public marker(message: string): void {
    this.sink.log(`${this.getLogPrefix()}===== ${message} =====`);
  }
}

/**
 * Create a fallback logger that writes straight to the console
 */
export function createFallbackLogger(prefix: string = 'Heating'): Logger {
  let currentLogLevel = LogLevel.INFO;
  const enabledCategories = new Set<LogCategory>(Object.values(LogCategory));

  const fallbackLogger: Logger = {
    log: (message: string, ...args: unknown[]) => console.log(`[${prefix}] ${message}`, ...args),
    info: (message: string, ...args: unknown[]) => console.log(`[${prefix}] INFO: ${message}`, ...args),
    error: (message: string, error?: Error | unknown, context?: Record<string, unknown>) => {
      console.error(`[${prefix}] ERROR: ${message}`, error, context);
    },
    debug: (message: string, ...args: unknown[]) => {
      if (currentLogLevel <= LogLevel.DEBUG) {
        console.log(`[${prefix}] DEBUG: ${message}`, ...args);
      }
    },
    warn: (message: string, context?: Record<string, unknown>) => console.warn(`[${prefix}] WARN: ${message}`, context),
    price: (message: string, context?: Record<string, unknown>) => console.log(`[${prefix}] PRICE: ${message}`, context),
    optimization: (message: string, context?: Record<string, unknown>) => console.log(`[${prefix}] OPT: ${message}`, context),
    notify: async (message: string) => { console.log(`[${prefix}] NOTIFY: ${message}`); },
    marker: (message: string) => console.log(`[${prefix}] MARKER: ${message}`),
    setLogLevel: (level: LogLevel) => {
      currentLogLevel = level;
      console.log(`[${prefix}] Log level set to ${LogLevel[level]}`);
    },
    getLogLevel: () => currentLogLevel,
    enableCategory: (category: LogCategory) => {
      enabledCategories.add(category);
    },
    disableCategory: (category: LogCategory) => {
      enabledCategories.delete(category);
    },
    isCategoryEnabled: (category: LogCategory) => enabledCategories.has(category),
    formatValue: (value: unknown) => formatValue(value),
    child: (childPrefix: string) => createFallbackLogger(`${prefix}:${childPrefix}`)
  };

  return fallbackLogger;
}
