export { ConditionEvaluator, type EvaluationContext } from './condition-evaluator.js';
export { RuleMatcher, type MatchableRule } from './rule-matcher.js';
export {
  ActionExecutor,
  ActionExecutionError,
  DEFAULT_SIDE_EFFECT_TIMEOUT_MS,
  clampPriority,
  type ExecutionContext,
  type ActionChainResult,
} from './action-executor.js';
