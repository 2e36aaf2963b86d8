import { EventEmitter } from 'events';

import type { Settings } from '../logic/settings/settings';
import { DEFAULT_SETTINGS } from '../logic/settings/settings';

/**
 * In-memory settings store.
 * Each `set` replaces the settings record as a whole and emits `set` with the changed key,
 * so readers holding a previous snapshot never see it change.
 */
export class SettingsStore extends EventEmitter {
  private values: Readonly<Settings>;

  constructor(initial: Partial<Settings> = {}) {
    super();
    this.values = Object.freeze({ ...DEFAULT_SETTINGS, ...initial });
  }

  get<K extends keyof Settings>(key: K): Settings[K] {
    return this.values[key];
  }

  set<K extends keyof Settings>(key: K, value: Settings[K]): void {
    if (this.values[key] === value) {
      return;
    }
    this.values = Object.freeze({ ...this.values, [key]: value });
    this.emit('set', key);
  }

  /**
   * Current settings record, safe to pass into the search
   */
  snapshot(): Readonly<Settings> {
    return this.values;
  }
}
