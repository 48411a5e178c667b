import { StateManager } from '../../src/services/state-manager';
import { MemorySettingsStore } from '../../src/util/settings-store';
import { createMockLogger } from '../mocks';

describe('StateManager', () => {
    const t0 = Date.parse('2024-01-10T08:00:00Z');
    let store: MemorySettingsStore;
    let stateManager: StateManager;

    beforeEach(() => {
        store = new MemorySettingsStore();
        stateManager = new StateManager(createMockLogger(), store);
    });

    test('initializes with no previous changes', () => {
        const record = stateManager.getLastChange('living');
        expect(record.level).toBeNull();
        expect(record.timestamp).toBeNull();
        expect(stateManager.getServedMinutes('living', t0)).toBeNull();
    });

    test('records a level change', () => {
        stateManager.recordChange('living', 0.5, t0);
        expect(stateManager.getLastChange('living')).toEqual({ level: 0.5, timestamp: t0 });
        expect(stateManager.getServedMinutes('living', t0 + 20 * 60000)).toBe(20);
    });

    test('keeps zones apart', () => {
        stateManager.recordChange('living', 1, t0);
        expect(stateManager.getLastChange('bedroom').level).toBeNull();
    });

    test('reports the dwell lockout', () => {
        stateManager.recordChange('living', 1, t0);
        expect(stateManager.isLockedOut('living', 30, t0 + 10 * 60000)).toBe(true);
        expect(stateManager.getLockoutRemaining('living', 30, t0 + 10 * 60000)).toBe(20);
        expect(stateManager.isLockedOut('living', 30, t0 + 30 * 60000)).toBe(false);
    });

    test('a zone that never changed is not locked out', () => {
        expect(stateManager.isLockedOut('living', 30, t0)).toBe(false);
    });

    test('state survives a restart through the store', () => {
        stateManager.recordChange('living', 0.75, t0);

        const restarted = new StateManager(createMockLogger(), store);
        expect(restarted.load('living')).toEqual({ level: 0.75, timestamp: t0 });
    });

    test('ignores malformed stored state', () => {
        store.set('actuator_state_living', { level: 'high', timestamp: t0 });
        expect(stateManager.load('living').level).toBeNull();
    });

    test('clear forgets the zone', () => {
        stateManager.recordChange('living', 1, t0);
        stateManager.clear('living');
        expect(stateManager.getLastChange('living').level).toBeNull();
        expect(store.get('actuator_state_living')).toBeUndefined();
    });
});
