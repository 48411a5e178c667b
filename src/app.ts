import { OutdoorForecastSource, PriceSource } from './types';
import { AppLogger, Logger, LogCategory, Notifier } from './util/logger';
import { isError } from './util/error-handler';
import { JsonFileSettingsStore, MemorySettingsStore, SettingsStore } from './util/settings-store';
import { AppConfig, ConfigurationService, LoadedConfig } from './services/configuration-service';
import { EntsoePriceSource } from './services/entsoe-price-source';
import { AdapterResolver, ZoneManager, ZoneManagerStatus } from './orchestration/service-manager';
import { ZoneController } from './services/zone-controller';

export interface HeatingAppOptions {
  adapters: AdapterResolver;
  outdoor?: OutdoorForecastSource;
  /** Replaces the source the configuration names */
  priceSource?: PriceSource | null;
  store?: SettingsStore;
  logger?: Logger;
  notifier?: Notifier;
}

/**
 * Heating Scheduler App
 *
 * Wires configuration, persistence, the price source and the zone manager
 * together and runs them until stopped.
 */
export class HeatingApp {
  public readonly logger: Logger;
  public readonly config: AppConfig;
  private readonly manager: ZoneManager;
  private running = false;

  constructor(loaded: LoadedConfig, options: HeatingAppOptions) {
    this.config = loaded.config;
    this.logger = options.logger ?? new AppLogger({
      level: loaded.config.logging.level,
      verboseMode: loaded.config.logging.verbose,
      prefix: 'App',
      includeTimestamps: true,
      includeSourceModule: true,
      notifier: options.notifier
    });

    for (const warning of loaded.warnings) {
      this.logger.warn(`Configuration: ${warning}`);
    }
    for (const rejected of loaded.rejectedZones) {
      this.logger.error(`Zone ${rejected.zoneId} not activated`, undefined, { problems: rejected.problems });
    }

    const store = options.store ?? (loaded.config.settingsFile
      ? new JsonFileSettingsStore(loaded.config.settingsFile)
      : new MemorySettingsStore());

    this.manager = new ZoneManager({
      config: loaded.config,
      store,
      logger: this.logger,
      priceSource: options.priceSource !== undefined ? options.priceSource : this.createPriceSource(),
      adapters: options.adapters,
      outdoor: options.outdoor
    });
  }

  /**
   * Load and validate a configuration file, then build the app.
   */
  static fromFile(configPath: string, options: HeatingAppOptions): HeatingApp {
    return new HeatingApp(new ConfigurationService().loadFile(configPath), options);
  }

  private createPriceSource(): PriceSource | null {
    const source = this.config.priceSource;
    if (source.type === 'none') {
      this.logger.warn('No price source configured; zones cannot plan until one is set');
      return null;
    }
    return new EntsoePriceSource(this.logger.child('ENTSO-E'), {
      area: source.area,
      ttlMs: source.ttlMinutes * 60_000
    });
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.marker('Heating scheduler starting');
    try {
      await this.manager.start();
      this.logger.log(`Running ${this.manager.listZones().length} zone(s)`);
    } catch (error) {
      this.running = false;
      this.logger.error('Startup failed', isError(error) ? error : new Error(String(error)));
      throw error;
    }
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.manager.stop();
    this.running = false;
    this.logger.marker('Heating scheduler stopped');
  }

  getManager(): ZoneManager {
    return this.manager;
  }

  getZone(zoneId: string): ZoneController | undefined {
    return this.manager.getZone(zoneId);
  }

  getStatus(): ZoneManagerStatus {
    return this.manager.getStatus();
  }

  setDebugCategories(categories: LogCategory[]): void {
    for (const category of Object.values(LogCategory)) {
      if (categories.includes(category)) {
        this.logger.enableCategory(category);
      } else {
        this.logger.disableCategory(category);
      }
    }
  }
}
