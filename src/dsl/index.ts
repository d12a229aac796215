/**
 * DSL pro definici pravidel.
 *
 * Dvě cesty k pravidlu:
 *
 * 1. **Fluent Builder API**: typově bezpečné, s helpery pro každou podmínku a akci.
 * 2. **YAML Loader**: pravidla v externích konfiguračních souborech.
 *
 * @example
 * ```typescript
 * import { Rule, categoryIs, olderThan, deleteMessage } from 'inbox-rules/dsl';
 *
 * const rule = Rule.create('old-marketing')
 *   .name('Auto-delete old marketing')
 *   .priority(90)
 *   .if(categoryIs('marketing'), olderThan(7))
 *   .then(deleteMessage())
 *   .build();
 * ```
 *
 * @module dsl
 */

// Builder
export { Rule, RuleBuilder } from './builder/rule-builder.js';

// Conditions
export {
  senderContains,
  senderIs,
  senderDomain,
  subjectContains,
  bodyContains,
  categoryIs,
  priorityAbove,
  priorityBelow,
  olderThan,
  newerThan,
  hasAttachment,
  isUnread,
  isRead,
  hasActionItems,
  senderIsVip,
} from './conditions/index.js';

// Actions
export {
  setCategory,
  setPriority,
  deleteMessage,
  archive,
  markRead,
  markUnread,
  moveTo,
  snoozeUntil,
  snoozeFor,
  addTag,
  notify,
  stopProcessing,
} from './actions/index.js';

// YAML
export {
  loadRulesFromYAML,
  loadRulesFromFile,
  parseRuleDocuments,
  exportRulesToYAML,
  YamlLoadError,
  YamlValidationError,
} from './yaml/index.js';

// Errors
export { DslError, DslValidationError } from './helpers/errors.js';

// Types
export type { BuiltRule, RuleBuildContext } from './types.js';
