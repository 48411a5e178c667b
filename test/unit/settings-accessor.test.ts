import { SettingsAccessor } from '../../src/util/settings-accessor';
import { MemorySettingsStore } from '../../src/util/settings-store';
import { createMockLogger } from '../mocks';

describe('SettingsAccessor', () => {
  let store: MemorySettingsStore;
  let accessor: SettingsAccessor;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    store = new MemorySettingsStore();
    logger = createMockLogger();
    accessor = new SettingsAccessor(store, logger);
  });

  it('returns default for missing settings', () => {
    expect(accessor.getNumber('missing', 42)).toBe(42);
  });

  it('validates number ranges', () => {
    store.set('range', 200);
    expect(accessor.getNumber('range', 10, { max: 100 })).toBe(10);
    expect(logger.warn).toHaveBeenCalledWith("Setting 'range' value 200 above maximum (100); using default 10.");
  });

  it('falls back for empty strings', () => {
    store.set('name', '');
    expect(accessor.getString('name', 'default')).toBe('default');
  });

  it('validates objects with a type guard', () => {
    const defaultValue = { value: 0 };
    const guard = (obj: unknown): obj is { value: number } =>
      typeof obj === 'object' && obj !== null && 'value' in obj && typeof obj.value === 'number';

    store.set('obj', { value: 5 });
    expect(accessor.getObject('obj', defaultValue, guard)).toEqual({ value: 5 });

    store.set('obj', { value: 'nope' });
    expect(accessor.getObject('obj', defaultValue, guard)).toEqual(defaultValue);
  });

  it('drops invalid array entries', () => {
    store.set('list', [1, 'two', 3]);
    const isNumber = (value: unknown): value is number => typeof value === 'number';
    expect(accessor.getArray('list', isNumber)).toEqual([1, 3]);
    expect(logger.warn).toHaveBeenCalledWith("Setting 'list' contained 1 invalid entries; they were dropped.");
  });

  it('writes and removes values', () => {
    accessor.set('example', 123);
    expect(store.get('example')).toBe(123);
    accessor.unset('example');
    expect(store.get('example')).toBeUndefined();
  });

  describe('Type Coercion', () => {
    it('coerces numeric strings to numbers', () => {
      store.set('temp', '21.5');
      expect(accessor.getNumber('temp', 20)).toBe(21.5);
    });

    it('handles invalid numeric strings', () => {
      store.set('temp', 'warm');
      expect(accessor.getNumber('temp', 20)).toBe(20);
    });
  });
});
