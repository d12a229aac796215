import type { RuleCondition } from '../types/condition.js';
import type { RuleAction } from '../types/action.js';
import type { Rule, RuleInput } from '../types/rule.js';
import { DESTRUCTIVE_ACTION_TYPES, includesValue } from '../validation/constants.js';

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? '' : 's'}`;

/**
 * Lidsky čitelný popis podmínky, např. `Sender contains 'acme'`.
 */
export function describeCondition(condition: RuleCondition): string {
  switch (condition.type) {
    case 'sender_contains': return `Sender contains '${condition.value}'`;
    case 'sender_is': return `Sender is '${condition.value}'`;
    case 'sender_domain': return `Sender domain is '${condition.value}'`;
    case 'subject_contains': return `Subject contains '${condition.value}'`;
    case 'body_contains': return `Body contains '${condition.value}'`;
    case 'category_is': return `Category is ${condition.category}`;
    case 'priority_greater_than': return `Priority > ${condition.value}`;
    case 'priority_less_than': return `Priority < ${condition.value}`;
    case 'age_greater_than': return `Older than ${plural(condition.days, 'day')}`;
    case 'age_less_than': return `Newer than ${plural(condition.days, 'day')}`;
    case 'has_attachment': return 'Has attachment';
    case 'is_unread': return 'Is unread';
    case 'is_read': return 'Is read';
    case 'has_action_items': return 'Has action items';
    case 'sender_is_vip': return 'Sender is VIP';
  }
}

export function describeAction(action: RuleAction): string {
  switch (action.type) {
    case 'set_category': return `Categorize as ${action.category}`;
    case 'set_priority': return `Set priority to ${action.value}`;
    case 'delete': return 'Delete';
    case 'archive': return 'Archive';
    case 'mark_read': return 'Mark as read';
    case 'mark_unread': return 'Mark as unread';
    case 'move_to_mailbox': return `Move to '${action.mailbox}'`;
    case 'snooze': return `Snooze until ${new Date(action.until).toISOString()}`;
    case 'add_tag': return `Add tag '${action.tag}'`;
    case 'notify': return `Notify: ${action.message}`;
    case 'stop_processing': return 'Stop processing rules';
  }
}

/**
 * Krátké shrnutí pravidla: "2 conditions, 1 action".
 */
export function describeRule(rule: Pick<Rule, 'conditions' | 'actions'>): string {
  return `${plural(rule.conditions.length, 'condition')}, ${plural(rule.actions.length, 'action')}`;
}

/** Pravidlo má jméno, aspoň jednu podmínku a aspoň jednu akci. */
export function isRuleComplete(rule: Pick<RuleInput, 'name' | 'conditions' | 'actions'>): boolean {
  return rule.name.trim().length > 0 && rule.conditions.length > 0 && rule.actions.length > 0;
}

export function isDestructiveAction(action: RuleAction): boolean {
  return includesValue(DESTRUCTIVE_ACTION_TYPES, action.type);
}
