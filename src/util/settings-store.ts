import * as fs from 'fs';
import * as path from 'path';

/**
 * Key/value store for persisted state. Values must be JSON serialisable.
 */
export interface SettingsStore {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  unset(key: string): void;
  keys(): string[];
}

export class MemorySettingsStore implements SettingsStore {
  private readonly values = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  get(key: string): unknown {
    const value = this.values.get(key);
    // Hand out copies so callers cannot mutate stored state
    return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
  }

  set(key: string, value: unknown): void {
    this.values.set(key, JSON.parse(JSON.stringify(value)));
  }

  unset(key: string): void {
    this.values.delete(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }
}

/**
 * Settings persisted to a single JSON file. Writes go to a temp file first
 * and are renamed into place.
 */
export class JsonFileSettingsStore implements SettingsStore {
  private readonly memory: MemorySettingsStore;

  constructor(private readonly filePath: string) {
    this.memory = new MemorySettingsStore(JsonFileSettingsStore.readFile(filePath));
  }

  private static readFile(filePath: string): Record<string, unknown> {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    const raw = fs.readFileSync(filePath, 'utf8');
    if (raw.trim().length === 0) {
      return {};
    }
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Settings file ${filePath} does not contain a JSON object`);
    }
    return { ...parsed };
  }

  get(key: string): unknown {
    return this.memory.get(key);
  }

  set(key: string, value: unknown): void {
    this.memory.set(key, value);
    this.flush();
  }

  unset(key: string): void {
    this.memory.unset(key);
    this.flush();
  }

  keys(): string[] {
    return this.memory.keys();
  }

  private flush(): void {
    const snapshot: Record<string, unknown> = {};
    for (const key of this.memory.keys()) {
      snapshot[key] = this.memory.get(key);
    }
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(snapshot, null, 2), 'utf8');
    fs.renameSync(tmpPath, this.filePath);
  }
}
