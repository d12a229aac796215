/**
 * Helpery pro podmínky pravidel.
 *
 * Každý helper validuje vstup hned při volání a vrací hotový
 * `RuleCondition` objekt.
 *
 * @example
 * ```typescript
 * Rule.create('acme-invoices')
 *   .if(senderDomain('acme.com'), subjectContains('invoice'))
 *   .then(setCategory('bills'))
 *   .build();
 * ```
 *
 * @module
 */

import type { RuleCondition } from '../../types/condition.js';
import type { EmailCategory } from '../../types/message.js';
import { EMAIL_CATEGORIES, includesValue } from '../../validation/constants.js';
import { DslValidationError } from '../helpers/errors.js';
import {
  requireFiniteNumber,
  requireNonEmptyString,
  requireNonNegativeInteger,
} from '../helpers/validators.js';

/** Jméno nebo adresa odesílatele obsahuje text (bez ohledu na velikost písmen). */
export function senderContains(text: string): RuleCondition {
  requireNonEmptyString(text, 'senderContains() text');
  return { type: 'sender_contains', value: text };
}

/** Adresa odesílatele se přesně shoduje. */
export function senderIs(email: string): RuleCondition {
  requireNonEmptyString(email, 'senderIs() email');
  return { type: 'sender_is', value: email };
}

/** Adresa odesílatele končí na `@domain`. */
export function senderDomain(domain: string): RuleCondition {
  requireNonEmptyString(domain, 'senderDomain() domain');
  return { type: 'sender_domain', value: domain.replace(/^@/, '') };
}

export function subjectContains(text: string): RuleCondition {
  requireNonEmptyString(text, 'subjectContains() text');
  return { type: 'subject_contains', value: text };
}

export function bodyContains(text: string): RuleCondition {
  requireNonEmptyString(text, 'bodyContains() text');
  return { type: 'body_contains', value: text };
}

export function categoryIs(category: EmailCategory): RuleCondition {
  requireCategory(category, 'categoryIs()');
  return { type: 'category_is', category };
}

export function priorityAbove(value: number): RuleCondition {
  requireFiniteNumber(value, 'priorityAbove() value');
  return { type: 'priority_greater_than', value };
}

export function priorityBelow(value: number): RuleCondition {
  requireFiniteNumber(value, 'priorityBelow() value');
  return { type: 'priority_less_than', value };
}

/**
 * Zpráva je starší než `days` kalendářních dní.
 */
export function olderThan(days: number): RuleCondition {
  requireNonNegativeInteger(days, 'olderThan() days');
  return { type: 'age_greater_than', days };
}

export function newerThan(days: number): RuleCondition {
  requireNonNegativeInteger(days, 'newerThan() days');
  return { type: 'age_less_than', days };
}

export function hasAttachment(): RuleCondition {
  return { type: 'has_attachment' };
}

export function isUnread(): RuleCondition {
  return { type: 'is_unread' };
}

export function isRead(): RuleCondition {
  return { type: 'is_read' };
}

export function hasActionItems(): RuleCondition {
  return { type: 'has_action_items' };
}

export function senderIsVip(): RuleCondition {
  return { type: 'sender_is_vip' };
}

/**
 * @throws {DslValidationError} Pro neznámou kategorii (např. z netypovaného vstupu)
 */
export function requireCategory(value: string, label: string): asserts value is EmailCategory {
  if (!includesValue(EMAIL_CATEGORIES, value)) {
    throw new DslValidationError(
      `${label} category must be one of ${EMAIL_CATEGORIES.join(', ')}, got "${value}"`,
    );
  }
}
