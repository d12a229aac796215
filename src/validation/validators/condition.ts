/**
 * Condition validation.
 *
 * @module
 */

import {
  CONDITION_TYPES,
  TEXT_CONDITION_TYPES,
  PRIORITY_CONDITION_TYPES,
  AGE_CONDITION_TYPES,
  UNSUPPORTED_CONDITION_TYPES,
  EMAIL_CATEGORIES,
  includesValue,
} from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject, hasProperty, isFiniteNumber } from '../types.js';

export function validateConditions(
  conditions: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!Array.isArray(conditions)) {
    collector.addError(path, 'Conditions must be an array');
    return;
  }

  if (conditions.length === 0) {
    collector.addWarning(path, 'Rule has no conditions and will never match');
  }

  for (let i = 0; i < conditions.length; i++) {
    validateCondition(conditions[i], `${path}[${i}]`, collector);
  }
}

export function validateCondition(
  condition: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(condition)) {
    collector.addError(path, 'Condition must be an object');
    return;
  }

  if (!hasProperty(condition, 'type')) {
    collector.addError(`${path}.type`, 'Condition must have a "type" field');
    return;
  }

  const type = condition['type'];
  if (typeof type !== 'string') {
    collector.addError(`${path}.type`, 'Condition type must be a string');
    return;
  }

  if (!includesValue(CONDITION_TYPES, type)) {
    collector.addError(
      `${path}.type`,
      `Invalid condition type: ${type}. Valid types: ${CONDITION_TYPES.join(', ')}`,
    );
    return;
  }

  if (includesValue(TEXT_CONDITION_TYPES, type)) {
    validateTextValue(condition, type, path, collector);
  } else if (includesValue(PRIORITY_CONDITION_TYPES, type)) {
    if (!hasProperty(condition, 'value')) {
      collector.addError(`${path}.value`, `${type} condition must have a "value" field`);
    } else if (!isFiniteNumber(condition['value'])) {
      collector.addError(`${path}.value`, `${type} condition value must be a number`);
    }
  } else if (includesValue(AGE_CONDITION_TYPES, type)) {
    const days = condition['days'];
    if (!hasProperty(condition, 'days')) {
      collector.addError(`${path}.days`, `${type} condition must have a "days" field`);
    } else if (!isFiniteNumber(days) || !Number.isInteger(days)) {
      collector.addError(`${path}.days`, `${type} condition days must be an integer`);
    } else if (days < 0) {
      collector.addError(`${path}.days`, `${type} condition days cannot be negative`);
    }
  } else if (type === 'category_is') {
    validateCategory(condition, path, collector);
  } else if (includesValue(UNSUPPORTED_CONDITION_TYPES, type)) {
    collector.addWarning(
      `${path}.type`,
      `${type} has no data source yet and never matches`,
    );
  }
}

function validateTextValue(
  condition: Record<string, unknown>,
  type: string,
  path: string,
  collector: IssueCollector,
): void {
  if (!hasProperty(condition, 'value')) {
    collector.addError(`${path}.value`, `${type} condition must have a "value" field`);
    return;
  }

  const value = condition['value'];
  if (typeof value !== 'string') {
    collector.addError(`${path}.value`, `${type} condition value must be a string`);
  } else if (value.trim() === '') {
    collector.addError(`${path}.value`, `${type} condition value cannot be empty`);
  }
}

export function validateCategory(
  obj: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
): void {
  if (!hasProperty(obj, 'category')) {
    collector.addError(`${path}.category`, 'Field "category" is missing');
    return;
  }

  const category = obj['category'];
  if (typeof category !== 'string' || !includesValue(EMAIL_CATEGORIES, category)) {
    collector.addError(
      `${path}.category`,
      `Invalid category: ${String(category)}. Valid categories: ${EMAIL_CATEGORIES.join(', ')}`,
    );
  }
}
