/**
 * Shared rule validation module.
 *
 * @module
 */

// Types
export type { ValidationIssue, ValidationResult } from './types.js';

// Constants
export {
  CONDITION_TYPES,
  TEXT_CONDITION_TYPES,
  PRIORITY_CONDITION_TYPES,
  AGE_CONDITION_TYPES,
  UNSUPPORTED_CONDITION_TYPES,
  ACTION_TYPES,
  DESTRUCTIVE_ACTION_TYPES,
  MATCH_MODES,
  EMAIL_CATEGORIES,
  DEFAULT_RULE_PRIORITY,
  PRIORITY_RANGE,
} from './constants.js';

// Validator
export { RuleInputValidator } from './rule-validator.js';
export type { ValidatorOptions } from './rule-validator.js';

// Error
export { RuleValidationError } from './rule-validation-error.js';
