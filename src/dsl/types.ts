import type { RuleCondition, MatchMode } from '../types/condition.js';
import type { RuleAction } from '../types/action.js';
import type { RuleInput } from '../types/rule.js';

/**
 * Internal state accumulated by {@link RuleBuilder} during the build process.
 */
export interface RuleBuildContext {
  id: string;
  name?: string;
  description?: string;
  priority?: number;
  enabled?: boolean;
  matchMode?: MatchMode;
  conditions: RuleCondition[];
  actions: RuleAction[];
}

/**
 * The output of {@link RuleBuilder.build}, an alias for the core `RuleInput` type.
 */
export type BuiltRule = RuleInput;
