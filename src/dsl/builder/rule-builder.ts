import type { RuleCondition } from '../../types/condition.js';
import type { RuleAction } from '../../types/action.js';
import type { RuleBuildContext, BuiltRule } from '../types.js';
import { DslValidationError } from '../helpers/errors.js';
import { requireFiniteNumber } from '../helpers/validators.js';

/**
 * Fluent builder for assembling rule definitions.
 *
 * Use the static {@link RuleBuilder.create} method (also exported as `Rule`)
 * as the entry point, then chain configuration methods and finish with
 * {@link RuleBuilder.build}.
 *
 * @example
 * ```typescript
 * Rule.create('bills-first')
 *   .name('Prioritize bills')
 *   .priority(95)
 *   .matchAny()
 *   .if(categoryIs('bills'), subjectContains('invoice'))
 *   .then(setPriority(9))
 *   .build();
 * ```
 */
export class RuleBuilder {
  private ctx: RuleBuildContext;

  private constructor(id: string) {
    this.ctx = {
      id,
      conditions: [],
      actions: [],
    };
  }

  /**
   * Creates a new rule builder with the given unique identifier.
   *
   * @throws {DslValidationError} If `id` is empty or not a string.
   */
  static create(id: string): RuleBuilder {
    if (!id || typeof id !== 'string') {
      throw new DslValidationError('Rule ID must be a non-empty string');
    }
    return new RuleBuilder(id);
  }

  /**
   * Sets a human-readable name for the rule (defaults to the rule ID).
   */
  name(value: string): this {
    this.ctx.name = value;
    return this;
  }

  description(value: string): this {
    this.ctx.description = value;
    return this;
  }

  /**
   * Sets the evaluation priority (higher value = evaluated sooner).
   *
   * @throws {DslValidationError} If `value` is not a finite number.
   */
  priority(value: number): this {
    requireFiniteNumber(value, 'Priority');
    this.ctx.priority = value;
    return this;
  }

  enabled(value: boolean): this {
    this.ctx.enabled = value;
    return this;
  }

  /** All conditions must hold (default). */
  matchAll(): this {
    this.ctx.matchMode = 'all';
    return this;
  }

  /** At least one condition must hold. */
  matchAny(): this {
    this.ctx.matchMode = 'any';
    return this;
  }

  /**
   * Adds one or more conditions, combined according to the match mode.
   */
  if(...conditions: RuleCondition[]): this {
    this.ctx.conditions.push(...conditions);
    return this;
  }

  /**
   * Alias for {@link RuleBuilder.if}.
   */
  and(...conditions: RuleCondition[]): this {
    return this.if(...conditions);
  }

  /**
   * Adds actions, executed in declaration order when the rule matches.
   */
  then(...actions: RuleAction[]): this {
    this.ctx.actions.push(...actions);
    return this;
  }

  /**
   * Alias for {@link RuleBuilder.then}.
   */
  also(...actions: RuleAction[]): this {
    return this.then(...actions);
  }

  /**
   * Validates the accumulated state and returns the final rule definition.
   *
   * @throws {DslValidationError} If conditions or actions are missing.
   */
  build(): BuiltRule {
    if (this.ctx.conditions.length === 0) {
      throw new DslValidationError(`Rule "${this.ctx.id}": at least one condition is required. Use .if()`);
    }

    if (this.ctx.actions.length === 0) {
      throw new DslValidationError(`Rule "${this.ctx.id}": at least one action is required. Use .then()`);
    }

    const rule: BuiltRule = {
      id: this.ctx.id,
      name: this.ctx.name ?? this.ctx.id,
      enabled: this.ctx.enabled ?? true,
      matchMode: this.ctx.matchMode ?? 'all',
      conditions: [...this.ctx.conditions],
      actions: [...this.ctx.actions],
    };

    if (this.ctx.priority !== undefined) {
      rule.priority = this.ctx.priority;
    }

    if (this.ctx.description) {
      rule.description = this.ctx.description;
    }

    return rule;
  }
}

/**
 * Entry-point alias for {@link RuleBuilder}.
 */
export const Rule = RuleBuilder;
