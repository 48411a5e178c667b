import { Logger } from '../util/logger';
import { SettingsStore } from '../util/settings-store';
import { remainingDwellMinutes } from '../../optimization/dwell-constraints';
import { HeatingLevel } from '../types';
import { isRecord } from '../util/validation';

/**
 * Last level change record for a zone
 */
export interface LevelChangeRecord {
    level: HeatingLevel | null;
    timestamp: number | null;
}

const STATE_KEY_PREFIX = 'actuator_state_';

function isLevelChangeRecord(value: unknown): value is LevelChangeRecord {
    return isRecord(value)
        && (value.level === null || typeof value.level === 'number')
        && (value.timestamp === null || typeof value.timestamp === 'number');
}

/**
 * StateManager Service
 *
 * Tracks the last commanded heating level and when it changed, per zone,
 * so dwell survives restarts. State is persisted in the settings store.
 */
export class StateManager {
    private readonly records = new Map<string, LevelChangeRecord>();

    constructor(
        private readonly logger: Logger,
        private readonly store?: SettingsStore
    ) { }

    /**
     * Record a level change
     * @param timestamp Timestamp in milliseconds
     */
    recordChange(zoneId: string, level: HeatingLevel, timestamp: number = Date.now()): void {
        this.records.set(zoneId, { level, timestamp });
        this.logger.log(`Zone ${zoneId} level change recorded: ${level} at ${new Date(timestamp).toISOString()}`);
        this.save(zoneId);
    }

    getLastChange(zoneId: string): LevelChangeRecord {
        const record = this.records.get(zoneId);
        return record ? { ...record } : { level: null, timestamp: null };
    }

    /**
     * Minutes the current level has been held, or null when unknown
     */
    getServedMinutes(zoneId: string, nowMs: number = Date.now()): number | null {
        const record = this.records.get(zoneId);
        if (!record || record.timestamp === null) {
            return null;
        }
        return Math.max(0, (nowMs - record.timestamp) / 60000);
    }

    isLockedOut(zoneId: string, minDwellMinutes: number, nowMs: number = Date.now()): boolean {
        return this.getLockoutRemaining(zoneId, minDwellMinutes, nowMs) > 0;
    }

    /**
     * Minutes remaining before the level may change again, 0 when free
     */
    getLockoutRemaining(zoneId: string, minDwellMinutes: number, nowMs: number = Date.now()): number {
        return remainingDwellMinutes(this.records.get(zoneId)?.timestamp ?? null, nowMs, minDwellMinutes);
    }

    /**
     * Load a zone's state from the settings store
     */
    load(zoneId: string): LevelChangeRecord {
        if (!this.store) {
            return this.getLastChange(zoneId);
        }
        try {
            const stored = this.store.get(`${STATE_KEY_PREFIX}${zoneId}`);
            if (isLevelChangeRecord(stored)) {
                this.records.set(zoneId, { ...stored });
                this.logger.log(`State loaded for zone ${zoneId}`, {
                    level: stored.level,
                    lastChange: stored.timestamp ? new Date(stored.timestamp).toISOString() : 'none'
                });
            }
        } catch (error) {
            this.logger.error(`Failed to load state for zone ${zoneId}:`, error);
        }
        return this.getLastChange(zoneId);
    }

    private save(zoneId: string): void {
        if (!this.store) {
            return;
        }
        try {
            this.store.set(`${STATE_KEY_PREFIX}${zoneId}`, this.getLastChange(zoneId));
        } catch (error) {
            this.logger.error(`Failed to save state for zone ${zoneId}:`, error);
        }
    }

    /**
     * Forget a zone (on removal)
     */
    clear(zoneId: string): void {
        this.records.delete(zoneId);
        this.store?.unset(`${STATE_KEY_PREFIX}${zoneId}`);
    }
}
