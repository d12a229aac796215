import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { RuleEngine } from '../../src/core/rule-engine.js';
import type { Logger } from '../../src/types/index.js';
import type { MessageRecord } from '../../src/types/message.js';
import type { MailStoreRequest, MutationResult } from '../../src/types/side-effect.js';
import { Rule } from '../../src/dsl/builder/rule-builder.js';
import {
  categoryIs,
  isUnread,
  olderThan,
  priorityAbove,
  senderDomain,
} from '../../src/dsl/conditions/index.js';
import {
  addTag,
  deleteMessage,
  markRead,
  notify,
  setPriority,
  stopProcessing,
} from '../../src/dsl/actions/index.js';

const NOW = new Date(2024, 5, 15, 12, 0).getTime();
const DAY = 24 * 60 * 60 * 1000;

const createMessage = (id: string, overrides: Partial<MessageRecord> = {}): MessageRecord => ({
  id,
  externalId: `ext-${id}`,
  sender: 'Acme Deals',
  senderEmail: 'deals@acme.com',
  subject: 'Summer sale',
  receivedAt: NOW - 8 * DAY,
  isRead: false,
  category: 'marketing',
  priority: 5,
  isSnoozed: false,
  actionItems: [],
  ...overrides,
});

const oldMarketingRule = () =>
  Rule.create('old-marketing')
    .name('Delete old marketing')
    .priority(90)
    .if(categoryIs('marketing'), olderThan(7))
    .then(deleteMessage())
    .build();

describe('Inbox scenarios', () => {
  let engine: RuleEngine;
  let logger: Logger;
  let execute: Mock<(request: MailStoreRequest) => Promise<MutationResult>>;
  let deliver: Mock<(notification: { title: string; body: string }) => void>;

  beforeEach(async () => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    execute = vi.fn(async (_request: MailStoreRequest): Promise<MutationResult> => ({ success: true }));
    deliver = vi.fn();
    engine = await RuleEngine.start({
      name: 'scenario-engine',
      clock: () => NOW,
      logger,
      mailStore: { execute },
      notifier: { notify: deliver },
    });
  });

  afterEach(async () => {
    await engine.stop();
  });

  describe('old marketing clean-up', () => {
    it('deletes marketing older than a week', async () => {
      engine.addRule(oldMarketingRule());

      const { results, sideEffects } = await engine.run([createMessage('m1')]);
      const request = {
        ruleId: 'old-marketing',
        messageId: 'm1',
        externalId: 'ext-m1',
        type: 'delete',
      };

      expect(results[0]).toMatchObject({ matched: true, matchedCount: 1, errors: [], success: true });
      expect(sideEffects).toEqual([request]);
      expect(execute).toHaveBeenCalledWith(request);
    });

    it('leaves other categories alone', async () => {
      engine.addRule(oldMarketingRule());
      const batch = [createMessage('m1', { category: 'work' })];

      const { messages, results, sideEffects } = await engine.run(batch);

      expect(results[0]?.matched).toBe(false);
      expect(messages).toEqual(batch);
      expect(sideEffects).toEqual([]);
      expect(execute).not.toHaveBeenCalled();
    });

    it('reports a rejected delete without stopping the remaining actions', async () => {
      execute.mockImplementation(
        async (request: MailStoreRequest): Promise<MutationResult> =>
          request.type === 'delete' ? { success: false, error: 'Mailbox locked' } : { success: true },
      );
      engine.addRule(
        Rule.create('old-marketing')
          .name('Delete old marketing')
          .if(categoryIs('marketing'))
          .then(deleteMessage(), addTag('tried'))
          .build(),
      );

      const { results, sideEffects } = await engine.run([createMessage('m1')]);

      expect(results[0]).toMatchObject({
        matched: true,
        actionsExecuted: 1,
        errors: ['Action "delete" failed: Mailbox locked'],
        success: false,
      });
      expect(sideEffects).toEqual([
        { ruleId: 'old-marketing', messageId: 'm1', externalId: 'ext-m1', type: 'add_tag', tag: 'tried' },
      ]);
      expect(engine.getStatistics()).toMatchObject({ failedExecutions: 1, successRate: 0 });
      expect(logger.warn).toHaveBeenCalledWith(
        '[scenario-engine] Rule "Delete old marketing" finished with 1 action errors',
      );
    });
  });

  describe('match modes', () => {
    it('matches ANY when only the second condition holds', async () => {
      engine.addRule(
        Rule.create('attention')
          .matchAny()
          .if(isUnread(), priorityAbove(8))
          .then(addTag('attention'))
          .build(),
      );

      const { results } = await engine.run([createMessage('m1', { isRead: true, priority: 9 })]);

      expect(results[0]?.matched).toBe(true);
    });

    it('never matches a rule without conditions', async () => {
      engine.addRule({ id: 'empty', name: 'Empty', matchMode: 'any', conditions: [], actions: [{ type: 'archive' }] });

      const { results } = await engine.run([createMessage('m1')]);

      expect(results[0]?.matched).toBe(false);
      expect(engine.testRule({ enabled: true, matchMode: 'any', conditions: [] }, [createMessage('m1')]))
        .toEqual({ matches: 0, total: 1 });
    });
  });

  describe('ordering', () => {
    it('lets a higher priority rule feed a lower priority one regardless of declaration order', async () => {
      engine.addRule(
        Rule.create('urgent-notify').priority(50).if(priorityAbove(8)).then(notify('Urgent bill')).build(),
      );
      engine.addRule(
        Rule.create('bills-priority').priority(95).if(categoryIs('bills')).then(setPriority(9)).build(),
      );

      const { messages, results, sideEffects } = await engine.run([
        createMessage('m1', { category: 'bills', subject: 'Invoice', receivedAt: NOW }),
      ]);

      expect(results.map(result => result.ruleId)).toEqual(['bills-priority', 'urgent-notify']);
      expect(messages[0]?.priority).toBe(9);
      expect(sideEffects).toEqual([
        {
          ruleId: 'urgent-notify',
          messageId: 'm1',
          externalId: 'ext-m1',
          type: 'notify',
          title: 'Rule: Invoice',
          body: 'Urgent bill',
        },
      ]);
      expect(deliver).toHaveBeenCalledWith({ title: 'Rule: Invoice', body: 'Urgent bill' });
    });

    it('stops only the current rule for the current message', async () => {
      engine.addRule(
        Rule.create('read-and-stop')
          .priority(90)
          .if(isUnread())
          .then(markRead(), stopProcessing(), addTag('skipped'))
          .build(),
      );
      engine.addRule(Rule.create('tag-acme').priority(10).if(senderDomain('acme.com')).then(addTag('acme')).build());

      const { messages, results, sideEffects } = await engine.run([createMessage('m1'), createMessage('m2')]);

      expect(results[0]).toMatchObject({ ruleId: 'read-and-stop', matchedCount: 2, actionsExecuted: 4 });
      expect(messages.every(message => message.isRead)).toBe(true);
      expect(sideEffects.map(effect => `${effect.ruleId}:${effect.messageId}:${effect.type}`)).toEqual([
        'read-and-stop:m1:mark_read',
        'read-and-stop:m2:mark_read',
        'tag-acme:m1:add_tag',
        'tag-acme:m2:add_tag',
      ]);
    });
  });

  describe('purity', () => {
    it('produces identical output for identical input', async () => {
      engine.addRule(oldMarketingRule());
      engine.addRule(Rule.create('tag-acme').priority(10).if(senderDomain('acme.com')).then(addTag('acme')).build());
      const batch = [createMessage('m1'), createMessage('m2', { category: 'work' })];

      const first = await engine.run(batch);
      const second = await engine.run(batch);

      expect(second.messages).toEqual(first.messages);
      expect(second.sideEffects).toEqual(first.sideEffects);
    });

    it('never changes the caller records', async () => {
      engine.addRule(Rule.create('demote').if(categoryIs('marketing')).then(setPriority(1), markRead()).build());
      const batch = [createMessage('m1')];
      const before = structuredClone(batch);

      const { messages } = await engine.run(batch);

      expect(batch).toEqual(before);
      expect(messages[0]).toMatchObject({ priority: 1, isRead: true });
    });

    it('keeps testRule free of side effects', () => {
      const rule = engine.addRule(oldMarketingRule());
      const batch = [createMessage('m1'), createMessage('m2', { receivedAt: NOW })];
      const before = structuredClone(batch);
      const statsBefore = engine.getStatistics();

      const result = engine.testRule(rule, batch);

      expect(result).toEqual({ matches: 1, total: 2 });
      expect(batch).toEqual(before);
      expect(engine.getStatistics()).toEqual(statsBefore);
      expect(execute).not.toHaveBeenCalled();
    });
  });
});
