import type { Rule } from '../types/rule.js';
import type { MessageRecord } from '../types/message.js';
import { ConditionEvaluator, type EvaluationContext } from './condition-evaluator.js';

/** Část pravidla, kterou matcher potřebuje */
export type MatchableRule = Pick<Rule, 'enabled' | 'conditions' | 'matchMode'>;

/**
 * Rozhoduje, zda pravidlo zachytí zprávu.
 */
export class RuleMatcher {
  constructor(private readonly evaluator: ConditionEvaluator = new ConditionEvaluator()) {}

  /**
   * Vypnuté pravidlo ani pravidlo bez podmínek nic nezachytí.
   */
  matches(rule: MatchableRule, message: MessageRecord, context: EvaluationContext): boolean {
    if (!rule.enabled) return false;
    if (rule.conditions.length === 0) return false;

    return this.evaluator.evaluateAll(rule.conditions, rule.matchMode, message, context);
  }
}
