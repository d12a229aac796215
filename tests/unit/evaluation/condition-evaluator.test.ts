import { describe, it, expect, beforeEach } from 'vitest';
import { ConditionEvaluator, type EvaluationContext } from '../../../src/evaluation/condition-evaluator.js';
import type { MessageRecord } from '../../../src/types/message.js';
import type { RuleCondition } from '../../../src/types/condition.js';

const NOW = new Date(2024, 5, 15, 12, 0).getTime();
const DAY = 24 * 60 * 60 * 1000;

const createMessage = (overrides: Partial<MessageRecord> = {}): MessageRecord => ({
  id: 'msg-1',
  externalId: 'ext-1',
  sender: 'Acme Billing',
  senderEmail: 'billing@acme.com',
  subject: 'Your invoice for June',
  body: 'Amount due: 42 EUR',
  receivedAt: NOW - 2 * DAY,
  isRead: false,
  category: 'bills',
  priority: 5,
  isSnoozed: false,
  actionItems: [],
  ...overrides
});

describe('ConditionEvaluator', () => {
  let evaluator: ConditionEvaluator;
  let context: EvaluationContext;

  beforeEach(() => {
    evaluator = new ConditionEvaluator();
    context = { now: NOW };
  });

  const check = (condition: RuleCondition, message: MessageRecord = createMessage()): boolean =>
    evaluator.evaluate(condition, message, context);

  describe('sender conditions', () => {
    it('sender_contains looks at display name and address', () => {
      expect(check({ type: 'sender_contains', value: 'BILLING' })).toBe(true);
      expect(check({ type: 'sender_contains', value: 'acme.com' })).toBe(true);
      expect(check({ type: 'sender_contains', value: 'Globex' })).toBe(false);
    });

    it('sender_is compares the full address case-insensitively', () => {
      expect(check({ type: 'sender_is', value: 'Billing@Acme.com' })).toBe(true);
      expect(check({ type: 'sender_is', value: 'acme.com' })).toBe(false);
    });

    it('sender_domain requires the @ boundary', () => {
      expect(check({ type: 'sender_domain', value: 'acme.com' })).toBe(true);
      expect(check({ type: 'sender_domain', value: 'me.com' })).toBe(false);
    });
  });

  describe('content conditions', () => {
    it('subject_contains is case-insensitive', () => {
      expect(check({ type: 'subject_contains', value: 'INVOICE' })).toBe(true);
      expect(check({ type: 'subject_contains', value: 'receipt' })).toBe(false);
    });

    it('body_contains is false when the body is absent', () => {
      expect(check({ type: 'body_contains', value: 'amount' })).toBe(true);
      expect(check({ type: 'body_contains', value: 'amount' }, createMessage({ body: undefined }))).toBe(false);
    });

    it('category_is compares the assigned category', () => {
      expect(check({ type: 'category_is', category: 'bills' })).toBe(true);
      expect(check({ type: 'category_is', category: 'work' })).toBe(false);
      expect(check({ type: 'category_is', category: 'bills' }, createMessage({ category: undefined }))).toBe(false);
    });
  });

  describe('priority conditions', () => {
    it('compares strictly', () => {
      expect(check({ type: 'priority_greater_than', value: 4 })).toBe(true);
      expect(check({ type: 'priority_greater_than', value: 5 })).toBe(false);
      expect(check({ type: 'priority_less_than', value: 6 })).toBe(true);
      expect(check({ type: 'priority_less_than', value: 5 })).toBe(false);
    });

    it('never matches a message without priority', () => {
      const message = createMessage({ priority: undefined });
      expect(check({ type: 'priority_greater_than', value: 0 }, message)).toBe(false);
      expect(check({ type: 'priority_less_than', value: 100 }, message)).toBe(false);
    });
  });

  describe('age conditions', () => {
    it('age_greater_than 0 excludes messages received today', () => {
      const today = createMessage({ receivedAt: NOW - 60 * 60 * 1000 });
      const yesterday = createMessage({ receivedAt: NOW - DAY });

      expect(check({ type: 'age_greater_than', days: 0 }, today)).toBe(false);
      expect(check({ type: 'age_greater_than', days: 0 }, yesterday)).toBe(true);
    });

    it('counts calendar days rather than elapsed hours', () => {
      const lateYesterday = createMessage({ receivedAt: new Date(2024, 5, 14, 23, 30).getTime() });
      const earlyToday = { now: new Date(2024, 5, 15, 0, 15).getTime() };

      expect(evaluator.evaluate({ type: 'age_greater_than', days: 0 }, lateYesterday, earlyToday)).toBe(true);
    });

    it('uses strict comparison on both sides', () => {
      const message = createMessage({ receivedAt: NOW - 7 * DAY });

      expect(check({ type: 'age_greater_than', days: 7 }, message)).toBe(false);
      expect(check({ type: 'age_greater_than', days: 6 }, message)).toBe(true);
      expect(check({ type: 'age_less_than', days: 7 }, message)).toBe(false);
      expect(check({ type: 'age_less_than', days: 8 }, message)).toBe(true);
    });
  });

  describe('state conditions', () => {
    it('is_unread and is_read follow the read flag', () => {
      expect(check({ type: 'is_unread' })).toBe(true);
      expect(check({ type: 'is_read' })).toBe(false);
      expect(check({ type: 'is_read' }, createMessage({ isRead: true }))).toBe(true);
    });

    it('has_action_items checks for at least one item', () => {
      expect(check({ type: 'has_action_items' })).toBe(false);
      expect(check(
        { type: 'has_action_items' },
        createMessage({ actionItems: [{ type: 'deadline', text: 'Pay by Friday' }] })
      )).toBe(true);
    });

    it('has_attachment and sender_is_vip never match', () => {
      expect(check({ type: 'has_attachment' })).toBe(false);
      expect(check({ type: 'sender_is_vip' }, createMessage({ senderReputation: 1 }))).toBe(false);
    });
  });

  describe('evaluateAll()', () => {
    const matching: RuleCondition = { type: 'category_is', category: 'bills' };
    const failing: RuleCondition = { type: 'is_read' };

    it('never matches an empty condition list', () => {
      expect(evaluator.evaluateAll([], 'all', createMessage(), context)).toBe(false);
      expect(evaluator.evaluateAll([], 'any', createMessage(), context)).toBe(false);
    });

    it('all mode requires every condition', () => {
      expect(evaluator.evaluateAll([matching, matching], 'all', createMessage(), context)).toBe(true);
      expect(evaluator.evaluateAll([matching, failing], 'all', createMessage(), context)).toBe(false);
    });

    it('any mode requires one condition', () => {
      expect(evaluator.evaluateAll([failing, matching], 'any', createMessage(), context)).toBe(true);
      expect(evaluator.evaluateAll([failing, failing], 'any', createMessage(), context)).toBe(false);
    });
  });
});
