/**
 * Převod mezi uloženou (JSON) podobou pravidel a typovanými objekty.
 *
 * Formát je plochý: každá podmínka a akce nese diskriminátor `type`
 * a pojmenovaná pole payloadu (`value`, `days`, `category`, `mailbox`,
 * `until`, `tag`, `message`). Vstup se vždy nejdřív validuje přes
 * {@link RuleInputValidator}; dekodéry pak typy jen zužují.
 *
 * @module
 */

import type { Rule, RuleInput } from '../types/rule.js';
import type { RuleCondition, MatchMode } from '../types/condition.js';
import type { RuleAction } from '../types/action.js';
import type { EmailCategory } from '../types/message.js';
import { RuleInputValidator } from '../validation/rule-validator.js';
import { RuleValidationError } from '../validation/rule-validation-error.js';
import { isObject } from '../validation/types.js';
import {
  DEFAULT_RULE_PRIORITY,
  EMAIL_CATEGORIES,
  MATCH_MODES,
  includesValue,
} from '../validation/constants.js';
import { generateId } from '../utils/id-generator.js';

const validator = new RuleInputValidator();

/**
 * Validuje pole pravidel a vrátí jejich typovanou authoring podobu.
 *
 * @throws {RuleValidationError} Pokud kterékoli pravidlo není validní
 */
export function decodeRuleInputs(raw: unknown): RuleInput[] {
  const result = validator.validateMany(raw);
  if (!result.valid || !Array.isArray(raw)) {
    throw new RuleValidationError('Invalid rule collection', result.errors);
  }

  return raw.map(item => toRuleInput(expectObject(item, 'rule')));
}

/**
 * Validuje pole pravidel a doplní metadata (id, časy, počítadlo), která
 * v uložených datech chybí.
 *
 * @throws {RuleValidationError} Pokud kterékoli pravidlo není validní
 */
export function decodeRules(raw: unknown, now: number = Date.now()): Rule[] {
  const inputs = decodeRuleInputs(raw);
  const records = Array.isArray(raw) ? raw : [];

  return inputs.map((input, index) => {
    const record = expectObject(records[index], 'rule');
    return materializeRule(input, {
      createdAt: readOptionalNumber(record, 'createdAt') ?? now,
      updatedAt: readOptionalNumber(record, 'updatedAt') ?? now,
      executionCount: readOptionalNumber(record, 'executionCount') ?? 0,
    });
  });
}

/**
 * Doplní authoring vstup na plné pravidlo.
 */
export function materializeRule(
  input: RuleInput,
  meta: Pick<Rule, 'createdAt' | 'updatedAt' | 'executionCount'>
): Rule {
  const rule: Rule = {
    id: input.id ?? generateId(),
    name: input.name,
    priority: input.priority ?? DEFAULT_RULE_PRIORITY,
    enabled: input.enabled ?? true,
    matchMode: input.matchMode ?? 'all',
    conditions: input.conditions.map(condition => ({ ...condition })),
    actions: input.actions.map(action => ({ ...action })),
    ...meta,
  };

  if (input.description !== undefined) {
    rule.description = input.description;
  }

  return rule;
}

/**
 * Serializuje pravidla do JSON exportu.
 */
export function encodeRules(rules: readonly Rule[]): string {
  return JSON.stringify(rules, null, 2);
}

// ---------------------------------------------------------------------------
// Dekodéry jednotlivých částí (vstup je již validovaný)
// ---------------------------------------------------------------------------

function toRuleInput(record: Record<string, unknown>): RuleInput {
  const input: RuleInput = {
    name: readString(record, 'name'),
    conditions: expectArray(record['conditions'], 'conditions').map(item =>
      toCondition(expectObject(item, 'condition'))
    ),
    actions: expectArray(record['actions'], 'actions').map(item =>
      toAction(expectObject(item, 'action'))
    ),
  };

  if (typeof record['id'] === 'string') input.id = record['id'];
  if (typeof record['description'] === 'string') input.description = record['description'];
  if (typeof record['priority'] === 'number') input.priority = record['priority'];
  if (typeof record['enabled'] === 'boolean') input.enabled = record['enabled'];
  if (record['matchMode'] !== undefined) input.matchMode = readMatchMode(record);

  return input;
}

export function toCondition(record: Record<string, unknown>): RuleCondition {
  const type = readString(record, 'type');

  switch (type) {
    case 'sender_contains':
    case 'sender_is':
    case 'sender_domain':
    case 'subject_contains':
    case 'body_contains':
      return { type, value: readString(record, 'value') };
    case 'category_is':
      return { type, category: readCategory(record) };
    case 'priority_greater_than':
    case 'priority_less_than':
      return { type, value: readNumber(record, 'value') };
    case 'age_greater_than':
    case 'age_less_than':
      return { type, days: readNumber(record, 'days') };
    case 'has_attachment':
    case 'is_unread':
    case 'is_read':
    case 'has_action_items':
    case 'sender_is_vip':
      return { type };
    default:
      throw new TypeError(`Unknown condition type: ${type}`);
  }
}

export function toAction(record: Record<string, unknown>): RuleAction {
  const type = readString(record, 'type');

  switch (type) {
    case 'set_category':
      return { type, category: readCategory(record) };
    case 'set_priority':
      return { type, value: readNumber(record, 'value') };
    case 'move_to_mailbox':
      return { type, mailbox: readString(record, 'mailbox') };
    case 'snooze':
      return { type, until: readNumber(record, 'until') };
    case 'add_tag':
      return { type, tag: readString(record, 'tag') };
    case 'notify':
      return { type, message: readString(record, 'message') };
    case 'delete':
    case 'archive':
    case 'mark_read':
    case 'mark_unread':
    case 'stop_processing':
      return { type };
    default:
      throw new TypeError(`Unknown action type: ${type}`);
  }
}

function expectObject(value: unknown, what: string): Record<string, unknown> {
  if (!isObject(value)) throw new TypeError(`Expected ${what} to be an object`);
  return value;
}

function expectArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) throw new TypeError(`Expected ${what} to be an array`);
  return value;
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== 'string') throw new TypeError(`Expected "${key}" to be a string`);
  return value;
}

function readNumber(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  if (typeof value !== 'number') throw new TypeError(`Expected "${key}" to be a number`);
  return value;
}

function readOptionalNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}

function readCategory(record: Record<string, unknown>): EmailCategory {
  const value = readString(record, 'category');
  if (!includesValue(EMAIL_CATEGORIES, value)) throw new TypeError(`Unknown category: ${value}`);
  return value;
}

function readMatchMode(record: Record<string, unknown>): MatchMode {
  const value = readString(record, 'matchMode');
  if (!includesValue(MATCH_MODES, value)) throw new TypeError(`Unknown match mode: ${value}`);
  return value;
}
