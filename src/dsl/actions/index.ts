/**
 * Helpery pro akce pravidel.
 *
 * @module
 */

import type { RuleAction } from '../../types/action.js';
import type { EmailCategory } from '../../types/message.js';
import { addDuration } from '../../utils/duration-parser.js';
import { requireCategory } from '../conditions/index.js';
import { DslValidationError } from '../helpers/errors.js';
import {
  requireDuration,
  requireFiniteNumber,
  requireNonEmptyString,
} from '../helpers/validators.js';

export function setCategory(category: EmailCategory): RuleAction {
  requireCategory(category, 'setCategory()');
  return { type: 'set_category', category };
}

/**
 * Nastaví prioritu; engine ji ořízne do rozsahu 1-10.
 */
export function setPriority(value: number): RuleAction {
  requireFiniteNumber(value, 'setPriority() value');
  return { type: 'set_priority', value };
}

/** Smaže zprávu v mail store (destruktivní). */
export function deleteMessage(): RuleAction {
  return { type: 'delete' };
}

export function archive(): RuleAction {
  return { type: 'archive' };
}

export function markRead(): RuleAction {
  return { type: 'mark_read' };
}

export function markUnread(): RuleAction {
  return { type: 'mark_unread' };
}

export function moveTo(mailbox: string): RuleAction {
  requireNonEmptyString(mailbox, 'moveTo() mailbox');
  return { type: 'move_to_mailbox', mailbox };
}

/**
 * Odloží zprávu do pevného okamžiku.
 */
export function snoozeUntil(until: Date | number): RuleAction {
  const timestamp = until instanceof Date ? until.getTime() : until;
  if (!Number.isFinite(timestamp)) {
    throw new DslValidationError('snoozeUntil() requires a valid date or timestamp');
  }
  return { type: 'snooze', until: timestamp };
}

/**
 * Odloží zprávu o danou dobu od `from` (výchozí: teď).
 *
 * @example
 * snoozeFor('2d')
 */
export function snoozeFor(duration: string | number, from: number = Date.now()): RuleAction {
  requireDuration(duration, 'snoozeFor() duration');
  return { type: 'snooze', until: addDuration(from, duration) };
}

export function addTag(tag: string): RuleAction {
  requireNonEmptyString(tag, 'addTag() tag');
  return { type: 'add_tag', tag };
}

export function notify(message: string): RuleAction {
  requireNonEmptyString(message, 'notify() message');
  return { type: 'notify', message };
}

/** Ukončí zbývající akce pravidla pro tuto zprávu. */
export function stopProcessing(): RuleAction {
  return { type: 'stop_processing' };
}
