export { RuleEngine } from './rule-engine.js';
export { RuleManager, REORDER_BASE_PRIORITY, type RuleManagerOptions } from './rule-manager.js';
export { StatisticsRecorder, emptyStatistics } from './statistics-recorder.js';
export { EngineBusyError, EngineNotRunningError } from './errors.js';
export { createDefaultRules } from './default-rules.js';
export {
  describeCondition,
  describeAction,
  describeRule,
  isRuleComplete,
  isDestructiveAction,
} from './describe.js';
