/**
 * Shared validation constants.
 *
 * Single source of truth for allowed condition types, action types, match
 * modes and categories.  Used by the rule validator, the codec and the YAML
 * loader.
 *
 * @module
 */

import type { ConditionType, MatchMode } from '../types/condition.js';
import type { ActionType } from '../types/action.js';
import type { EmailCategory } from '../types/message.js';

export const CONDITION_TYPES = [
  'sender_contains', 'sender_is', 'sender_domain',
  'subject_contains', 'body_contains',
  'category_is',
  'priority_greater_than', 'priority_less_than',
  'age_greater_than', 'age_less_than',
  'has_attachment', 'is_unread', 'is_read', 'has_action_items', 'sender_is_vip',
] as const satisfies readonly ConditionType[];

/** Conditions whose payload is a text `value`. */
export const TEXT_CONDITION_TYPES = [
  'sender_contains', 'sender_is', 'sender_domain', 'subject_contains', 'body_contains',
] as const satisfies readonly ConditionType[];

/** Conditions whose payload is a numeric `value`. */
export const PRIORITY_CONDITION_TYPES = [
  'priority_greater_than', 'priority_less_than',
] as const satisfies readonly ConditionType[];

/** Conditions whose payload is `days`. */
export const AGE_CONDITION_TYPES = [
  'age_greater_than', 'age_less_than',
] as const satisfies readonly ConditionType[];

/** Conditions that have no data source yet and never match. */
export const UNSUPPORTED_CONDITION_TYPES = [
  'has_attachment', 'sender_is_vip',
] as const satisfies readonly ConditionType[];

export const ACTION_TYPES = [
  'set_category', 'set_priority',
  'delete', 'archive', 'mark_read', 'mark_unread',
  'move_to_mailbox', 'snooze', 'add_tag', 'notify', 'stop_processing',
] as const satisfies readonly ActionType[];

/** Actions that remove the message from the inbox for good. */
export const DESTRUCTIVE_ACTION_TYPES = ['delete'] as const satisfies readonly ActionType[];

export const MATCH_MODES = ['all', 'any'] as const satisfies readonly MatchMode[];

export const EMAIL_CATEGORIES = [
  'bills', 'orders', 'work', 'personal', 'marketing',
  'newsletters', 'social', 'spam', 'other',
] as const satisfies readonly EmailCategory[];

export const DEFAULT_RULE_PRIORITY = 50;

/** Priority range a message can carry; `set_priority` is clamped into it. */
export const PRIORITY_RANGE = { min: 1, max: 10 } as const;

export function includesValue<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(candidate => candidate === value);
}
