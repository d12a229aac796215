import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryAdapter } from '@hamicek/noex';
import { RuleEngine } from '../../src/core/rule-engine.js';
import { StatisticsPersistence } from '../../src/persistence/statistics-persistence.js';
import type { RuleEngineConfig, Logger } from '../../src/types/index.js';
import type { MessageRecord } from '../../src/types/message.js';
import { Rule } from '../../src/dsl/builder/rule-builder.js';
import { categoryIs, senderDomain } from '../../src/dsl/conditions/index.js';
import { addTag, setPriority } from '../../src/dsl/actions/index.js';

const NOW = new Date(2024, 5, 15, 12, 0).getTime();

const createMessage = (id: string, overrides: Partial<MessageRecord> = {}): MessageRecord => ({
  id,
  externalId: `ext-${id}`,
  sender: 'Acme Billing',
  senderEmail: 'billing@acme.com',
  subject: 'Invoice',
  receivedAt: NOW,
  isRead: false,
  category: 'bills',
  isSnoozed: false,
  actionItems: [],
  ...overrides,
});

const createLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('RuleEngine persistence', () => {
  let adapter: MemoryAdapter;
  let logger: Logger;
  const engines: RuleEngine[] = [];

  const startEngine = async (overrides: Partial<RuleEngineConfig> = {}): Promise<RuleEngine> => {
    const engine = await RuleEngine.start({
      name: 'persisted-engine',
      clock: () => NOW,
      logger,
      persistence: { adapter },
      ...overrides,
    });
    engines.push(engine);
    return engine;
  };

  beforeEach(() => {
    adapter = new MemoryAdapter();
    logger = createLogger();
  });

  afterEach(async () => {
    for (const engine of engines.splice(0)) {
      if (engine.isRunning) {
        await engine.stop();
      }
    }
  });

  it('restores rules after restart', async () => {
    const first = await startEngine();
    first.addRule(
      Rule.create('acme')
        .name('Tag Acme')
        .priority(70)
        .if(senderDomain('acme.com'))
        .then(addTag('acme'))
        .build(),
    );
    first.addRule(Rule.create('bills').priority(90).if(categoryIs('bills')).then(setPriority(9)).build());
    await first.stop();

    const second = await startEngine();

    expect(second.getRules().map(rule => rule.id)).toEqual(['bills', 'acme']);
    expect(second.getRule('acme')).toMatchObject({
      name: 'Tag Acme',
      priority: 70,
      createdAt: NOW,
      actions: [{ type: 'add_tag', tag: 'acme' }],
    });
    expect(logger.info).toHaveBeenCalledWith('[persisted-engine] Started with 2 rules (2 restored)');
  });

  it('persists execution counters and statistics after a run', async () => {
    const first = await startEngine();
    first.addRule(Rule.create('bills').if(categoryIs('bills')).then(setPriority(9)).build());
    first.addRule(Rule.create('work').if(categoryIs('work')).then(addTag('work')).build());

    await first.run([createMessage('m1'), createMessage('m2')]);
    await first.stop();

    const second = await startEngine();

    expect(second.getRule('bills')?.executionCount).toBe(1);
    expect(second.getRule('work')?.executionCount).toBe(0);
    expect(second.getStatistics()).toMatchObject({
      totalRules: 2,
      enabledRules: 2,
      totalExecutions: 2,
      successfulExecutions: 2,
      failedExecutions: 0,
      lastRunAt: NOW,
      successRate: 1,
    });
  });

  it('saves rule counts to statistics storage on every rule change', async () => {
    const engine = await startEngine();
    const stored = new StatisticsPersistence(adapter);

    engine.addRule(Rule.create('bills').if(categoryIs('bills')).then(setPriority(9)).build());
    engine.addRule(Rule.create('work').if(categoryIs('work')).then(addTag('work')).build());

    await vi.waitFor(async () => {
      expect(await stored.load()).toMatchObject({ totalRules: 2, enabledRules: 2 });
    });

    engine.toggleRule('work');

    await vi.waitFor(async () => {
      expect(await stored.load()).toMatchObject({ totalRules: 2, enabledRules: 1 });
    });
  });

  it('keeps the disabled flag across restarts', async () => {
    const first = await startEngine();
    first.addRule(Rule.create('bills').if(categoryIs('bills')).then(setPriority(9)).build());
    first.toggleRule('bills');
    await first.stop();

    const second = await startEngine();

    expect(second.getRule('bills')?.enabled).toBe(false);
    expect(second.getStatistics().enabledRules).toBe(0);
  });

  it('persists a statistics reset', async () => {
    const first = await startEngine();
    first.addRule(Rule.create('bills').if(categoryIs('bills')).then(setPriority(9)).build());
    await first.run([createMessage('m1')]);
    await first.resetStatistics();
    await first.stop();

    const second = await startEngine();

    expect(second.getStatistics().totalExecutions).toBe(0);
    expect(second.getRule('bills')?.executionCount).toBe(1);
  });

  it('seeds default rules into empty storage', async () => {
    const engine = await startEngine({ seedDefaultRules: true });

    expect(engine.getRules().map(rule => rule.name)).toEqual([
      'Prioritize bills',
      'Auto-delete old marketing',
      'Mark newsletters as read',
    ]);
  });

  it('falls back to defaults when stored rules are invalid', async () => {
    await adapter.save('rules', {
      state: { rules: [{ name: '', conditions: [], actions: [] }] },
      metadata: { persistedAt: NOW, serverId: 'rule-engine', schemaVersion: 1 },
    });

    const engine = await startEngine({ seedDefaultRules: true });

    expect(engine.getRules()).toHaveLength(3);
    expect(logger.warn).toHaveBeenCalledWith(
      '[persisted-engine] Failed to load rules, falling back to defaults: Invalid rule collection',
    );
  });

  it('ignores rules stored under another schema version', async () => {
    const first = await startEngine();
    first.addRule(Rule.create('bills').if(categoryIs('bills')).then(setPriority(9)).build());
    await first.stop();

    const second = await startEngine({ persistence: { adapter, schemaVersion: 2 } });

    expect(second.getRules()).toEqual([]);
  });

  it('stores rules and statistics under custom keys', async () => {
    const first = await startEngine({
      persistence: { adapter, key: 'inbox-rules', statisticsKey: 'inbox-stats' },
    });
    first.addRule(Rule.create('bills').if(categoryIs('bills')).then(setPriority(9)).build());
    await first.stop();

    expect(await adapter.exists('inbox-rules')).toBe(true);
    expect(await adapter.exists('inbox-stats')).toBe(true);
    expect(await adapter.exists('rules')).toBe(false);
  });

  it('replaces stored rules on import', async () => {
    const first = await startEngine();
    first.addRule(Rule.create('bills').if(categoryIs('bills')).then(setPriority(9)).build());
    const imported = first.importRulesFromYAML(`
      rules:
        - id: work
          name: Tag work
          conditions:
            - type: category_is
              category: work
          actions:
            - type: add_tag
              tag: work
    `);
    await first.stop();

    const second = await startEngine();

    expect(imported).toBe(true);
    expect(second.getRules().map(rule => rule.id)).toEqual(['work']);
  });
});
