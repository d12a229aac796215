/**
 * Action validation.
 *
 * @module
 */

import { ACTION_TYPES, PRIORITY_RANGE, includesValue } from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject, hasProperty, isFiniteNumber } from '../types.js';
import { validateCategory } from './condition.js';

export function validateActions(
  actions: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!Array.isArray(actions)) {
    collector.addError(path, 'Actions must be an array');
    return;
  }

  if (actions.length === 0) {
    collector.addWarning(path, 'Rule has no actions');
  }

  for (let i = 0; i < actions.length; i++) {
    validateAction(actions[i], `${path}[${i}]`, collector);
  }
}

export function validateAction(
  action: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(action)) {
    collector.addError(path, 'Action must be an object');
    return;
  }

  if (!hasProperty(action, 'type')) {
    collector.addError(`${path}.type`, 'Action must have a "type" field');
    return;
  }

  const type = action['type'];
  if (typeof type !== 'string') {
    collector.addError(`${path}.type`, 'Action type must be a string');
    return;
  }

  if (!includesValue(ACTION_TYPES, type)) {
    collector.addError(
      `${path}.type`,
      `Invalid action type: ${type}. Valid types: ${ACTION_TYPES.join(', ')}`,
    );
    return;
  }

  switch (type) {
    case 'set_category':
      validateCategory(action, path, collector);
      break;
    case 'set_priority':
      validateSetPriorityAction(action, path, collector);
      break;
    case 'move_to_mailbox':
      requireText(action, 'mailbox', type, path, collector);
      break;
    case 'add_tag':
      requireText(action, 'tag', type, path, collector);
      break;
    case 'notify':
      requireText(action, 'message', type, path, collector);
      break;
    case 'snooze':
      validateSnoozeAction(action, path, collector);
      break;
    case 'delete':
    case 'archive':
    case 'mark_read':
    case 'mark_unread':
    case 'stop_processing':
      break;
  }
}

// ---------------------------------------------------------------------------
// Individual action validators
// ---------------------------------------------------------------------------

function validateSetPriorityAction(
  action: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
): void {
  const value = action['value'];
  if (!hasProperty(action, 'value')) {
    collector.addError(`${path}.value`, 'set_priority action must have a "value" field');
  } else if (!isFiniteNumber(value)) {
    collector.addError(`${path}.value`, 'set_priority action value must be a number');
  } else if (value < PRIORITY_RANGE.min || value > PRIORITY_RANGE.max) {
    collector.addWarning(
      `${path}.value`,
      `Priority ${value} is outside ${PRIORITY_RANGE.min}-${PRIORITY_RANGE.max} and will be clamped`,
    );
  }
}

function validateSnoozeAction(
  action: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
): void {
  if (!hasProperty(action, 'until')) {
    collector.addError(`${path}.until`, 'snooze action must have an "until" field');
  } else if (!isFiniteNumber(action['until'])) {
    collector.addError(`${path}.until`, 'snooze action until must be a timestamp in milliseconds');
  }
}

function requireText(
  action: Record<string, unknown>,
  field: string,
  type: string,
  path: string,
  collector: IssueCollector,
): void {
  if (!hasProperty(action, field)) {
    collector.addError(`${path}.${field}`, `${type} action must have a "${field}" field`);
    return;
  }

  const value = action[field];
  if (typeof value !== 'string') {
    collector.addError(`${path}.${field}`, `${type} action ${field} must be a string`);
  } else if (value.trim() === '') {
    collector.addError(`${path}.${field}`, `${type} action ${field} cannot be empty`);
  }
}
