/**
 * Main rule input validator.
 *
 * Validates one or many rule inputs and returns all issues (errors + warnings)
 * rather than throwing on the first problem.
 *
 * @module
 */

import { IssueCollector, isObject, hasProperty, isFiniteNumber } from './types.js';
import type { ValidationResult } from './types.js';
import { MATCH_MODES, includesValue } from './constants.js';
import { validateConditions } from './validators/condition.js';
import { validateActions } from './validators/action.js';

/** Options for {@link RuleInputValidator}. */
export interface ValidatorOptions {
  /** When true, a missing `id` is an error instead of being generated later. */
  requireId?: boolean;
}

type RuleRecord = Record<string, unknown>;

/**
 * Validates rule inputs against the expected schema.
 *
 * ```ts
 * const v = new RuleInputValidator();
 * const result = v.validate(unknownInput);
 * if (!result.valid) { … }
 * ```
 */
export class RuleInputValidator {
  private readonly requireId: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.requireId = options.requireId ?? false;
  }

  /** Validates a single rule input. */
  validate(input: unknown): ValidationResult {
    const collector = new IssueCollector();

    if (!isObject(input)) {
      collector.addError('', 'Rule must be an object');
      return collector.toResult();
    }

    this.validateRule(input, '', collector);
    return collector.toResult();
  }

  /** Validates an array of rule inputs, including duplicate-ID detection. */
  validateMany(inputs: unknown): ValidationResult {
    const collector = new IssueCollector();

    if (!Array.isArray(inputs)) {
      collector.addError('', 'Input must be an array of rules');
      return collector.toResult();
    }

    const ids = new Set<string>();

    for (let i = 0; i < inputs.length; i++) {
      const rule = inputs[i];
      const prefix = `[${i}]`;

      if (!isObject(rule)) {
        collector.addError(prefix, 'Rule must be an object');
        continue;
      }

      if (typeof rule['id'] === 'string') {
        const id = rule['id'];
        if (ids.has(id)) {
          collector.addError(`${prefix}.id`, `Duplicate rule ID: ${id}`);
        } else {
          ids.add(id);
        }
      }

      this.validateRule(rule, prefix, collector);
    }

    return collector.toResult();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private validateRule(rule: RuleRecord, prefix: string, collector: IssueCollector): void {
    this.validateRequiredFields(rule, prefix, collector);
    this.validateOptionalFields(rule, prefix, collector);

    if (hasProperty(rule, 'conditions')) {
      validateConditions(rule['conditions'], this.fieldPath(prefix, 'conditions'), collector);
    }

    if (hasProperty(rule, 'actions')) {
      validateActions(rule['actions'], this.fieldPath(prefix, 'actions'), collector);
    }
  }

  private validateRequiredFields(
    rule: RuleRecord,
    prefix: string,
    collector: IssueCollector,
  ): void {
    if (rule['id'] === undefined) {
      if (this.requireId) {
        collector.addError(this.fieldPath(prefix, 'id'), 'Required field "id" is missing');
      }
    } else if (typeof rule['id'] !== 'string') {
      collector.addError(this.fieldPath(prefix, 'id'), 'Field "id" must be a string');
    } else if (rule['id'].trim() === '') {
      collector.addError(this.fieldPath(prefix, 'id'), 'Field "id" cannot be empty');
    }

    if (!hasProperty(rule, 'name')) {
      collector.addError(this.fieldPath(prefix, 'name'), 'Required field "name" is missing');
    } else if (typeof rule['name'] !== 'string') {
      collector.addError(this.fieldPath(prefix, 'name'), 'Field "name" must be a string');
    } else if (rule['name'].trim() === '') {
      collector.addError(this.fieldPath(prefix, 'name'), 'Field "name" cannot be empty');
    }

    if (!hasProperty(rule, 'conditions')) {
      collector.addError(this.fieldPath(prefix, 'conditions'), 'Required field "conditions" is missing');
    }

    if (!hasProperty(rule, 'actions')) {
      collector.addError(this.fieldPath(prefix, 'actions'), 'Required field "actions" is missing');
    }
  }

  /** Pole s hodnotou `undefined` se berou jako nevyplněná. */
  private validateOptionalFields(
    rule: RuleRecord,
    prefix: string,
    collector: IssueCollector,
  ): void {
    if (rule['description'] !== undefined && typeof rule['description'] !== 'string') {
      collector.addError(
        this.fieldPath(prefix, 'description'),
        'Field "description" must be a string',
      );
    }

    if (rule['priority'] !== undefined) {
      if (!isFiniteNumber(rule['priority'])) {
        collector.addError(
          this.fieldPath(prefix, 'priority'),
          'Field "priority" must be a number',
        );
      } else if (!Number.isInteger(rule['priority'])) {
        collector.addWarning(
          this.fieldPath(prefix, 'priority'),
          'Field "priority" should be an integer',
        );
      }
    }

    if (rule['enabled'] !== undefined && typeof rule['enabled'] !== 'boolean') {
      collector.addError(
        this.fieldPath(prefix, 'enabled'),
        'Field "enabled" must be a boolean',
      );
    }

    if (rule['matchMode'] !== undefined) {
      const mode = rule['matchMode'];
      if (typeof mode !== 'string' || !includesValue(MATCH_MODES, mode)) {
        collector.addError(
          this.fieldPath(prefix, 'matchMode'),
          `Invalid match mode: ${String(mode)}. Valid modes: ${MATCH_MODES.join(', ')}`,
        );
      }
    }

    for (const field of ['createdAt', 'updatedAt', 'executionCount']) {
      if (rule[field] !== undefined && !isFiniteNumber(rule[field])) {
        collector.addError(this.fieldPath(prefix, field), `Field "${field}" must be a number`);
      }
    }
  }

  private fieldPath(prefix: string, field: string): string {
    return prefix ? `${prefix}.${field}` : field;
  }
}
