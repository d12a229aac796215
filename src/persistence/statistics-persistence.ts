import type { StorageAdapter, StateMetadata } from '@hamicek/noex';
import type { RunStatistics } from '../types/index.js';
import { isObject, isFiniteNumber } from '../validation/types.js';

export interface StatisticsPersistenceOptions {
  /** Klíč pro uložení (výchozí: 'rule-statistics') */
  key?: string;
  schemaVersion?: number;
}

/**
 * Persistence kumulativních statistik běhů.
 */
export class StatisticsPersistence {
  private readonly key: string;
  private readonly schemaVersion: number;

  constructor(private readonly adapter: StorageAdapter, options?: StatisticsPersistenceOptions) {
    this.key = options?.key ?? 'rule-statistics';
    this.schemaVersion = options?.schemaVersion ?? 1;
  }

  async save(statistics: RunStatistics): Promise<void> {
    const metadata: StateMetadata = {
      persistedAt: Date.now(),
      serverId: 'rule-engine',
      schemaVersion: this.schemaVersion,
    };

    await this.adapter.save(this.key, { state: statistics, metadata });
  }

  /**
   * Načte statistiky; `undefined` pokud nejsou uloženy nebo nesedí verze.
   *
   * @throws {Error} Pokud uložená data nemají tvar statistik
   */
  async load(): Promise<RunStatistics | undefined> {
    const result = await this.adapter.load<unknown>(this.key);
    if (!result || result.metadata.schemaVersion !== this.schemaVersion) {
      return undefined;
    }

    return decodeStatistics(result.state);
  }

  async clear(): Promise<boolean> {
    return this.adapter.delete(this.key);
  }

  getKey(): string {
    return this.key;
  }
}

function decodeStatistics(state: unknown): RunStatistics {
  if (!isObject(state)) {
    throw new Error('Persisted statistics are not an object');
  }

  const read = (field: keyof RunStatistics): number => {
    const value = state[field];
    if (!isFiniteNumber(value)) {
      throw new Error(`Persisted statistics field "${field}" is not a number`);
    }
    return value;
  };

  const statistics: RunStatistics = {
    totalRules: read('totalRules'),
    enabledRules: read('enabledRules'),
    totalExecutions: read('totalExecutions'),
    successfulExecutions: read('successfulExecutions'),
    failedExecutions: read('failedExecutions'),
    avgExecutionTimeMs: read('avgExecutionTimeMs'),
    totalExecutionTimeMs: read('totalExecutionTimeMs'),
  };

  const lastRunAt = state['lastRunAt'];
  if (isFiniteNumber(lastRunAt)) {
    statistics.lastRunAt = lastRunAt;
  }

  return statistics;
}
