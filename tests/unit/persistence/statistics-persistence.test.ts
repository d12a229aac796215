import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryAdapter } from '@hamicek/noex';
import { StatisticsPersistence } from '../../../src/persistence/statistics-persistence.js';
import type { RunStatistics } from '../../../src/types/index.js';

const stats: RunStatistics = {
  totalRules: 3,
  enabledRules: 2,
  totalExecutions: 10,
  successfulExecutions: 9,
  failedExecutions: 1,
  lastRunAt: 5_000,
  avgExecutionTimeMs: 1.5,
  totalExecutionTimeMs: 15,
};

describe('StatisticsPersistence', () => {
  let adapter: MemoryAdapter;
  let persistence: StatisticsPersistence;

  beforeEach(() => {
    adapter = new MemoryAdapter();
    persistence = new StatisticsPersistence(adapter);
  });

  it('round-trips statistics under its own key', async () => {
    await persistence.save(stats);

    expect(await persistence.load()).toEqual(stats);
    expect(await adapter.exists('rule-statistics')).toBe(true);
    expect(persistence.getKey()).toBe('rule-statistics');
  });

  it('omits lastRunAt when it was never set', async () => {
    const { lastRunAt: _lastRunAt, ...neverRun } = stats;
    await persistence.save(neverRun);

    const loaded = await persistence.load();
    expect(loaded).toEqual(neverRun);
    expect(loaded !== undefined && 'lastRunAt' in loaded).toBe(false);
  });

  it('ignores a different schema version', async () => {
    await new StatisticsPersistence(adapter, { schemaVersion: 2 }).save(stats);

    expect(await persistence.load()).toBeUndefined();
  });

  it('rejects stored data with a missing counter', async () => {
    await adapter.save('rule-statistics', {
      state: { ...stats, failedExecutions: 'many' },
      metadata: { persistedAt: 0, serverId: 'test', schemaVersion: 1 },
    });

    await expect(persistence.load()).rejects.toThrow('Persisted statistics field "failedExecutions" is not a number');
  });

  it('clears stored statistics', async () => {
    await persistence.save(stats);

    expect(await persistence.clear()).toBe(true);
    expect(await persistence.load()).toBeUndefined();
  });
});
