import type { RuleCondition, MatchMode } from '../types/condition.js';
import type { MessageRecord } from '../types/message.js';
import { calendarDaysBetween } from '../utils/calendar.js';
import { containsIgnoreCase, equalsIgnoreCase, hasDomain } from '../utils/text-match.js';

export interface EvaluationContext {
  /** Okamžik vyhodnocení (epoch ms), od kterého se počítá stáří zprávy */
  now: number;
}

/**
 * Vyhodnocuje podmínky pravidel nad zprávou.
 *
 * Všechny kontroly jsou čisté funkce nad záznamem; chybějící volitelné pole
 * (priorita, tělo) podmínku nesplní.
 */
export class ConditionEvaluator {
  /**
   * Vyhodnotí podmínky podle režimu: 'all' skončí na prvním false,
   * 'any' na prvním true. Prázdný seznam nikdy neplatí.
   */
  evaluateAll(
    conditions: readonly RuleCondition[],
    mode: MatchMode,
    message: MessageRecord,
    context: EvaluationContext
  ): boolean {
    if (conditions.length === 0) {
      return false;
    }

    if (mode === 'any') {
      return conditions.some(condition => this.evaluate(condition, message, context));
    }

    return conditions.every(condition => this.evaluate(condition, message, context));
  }

  /**
   * Vyhodnotí jednu podmínku.
   */
  evaluate(condition: RuleCondition, message: MessageRecord, context: EvaluationContext): boolean {
    switch (condition.type) {
      case 'sender_contains':
        return containsIgnoreCase(message.sender, condition.value) ||
          containsIgnoreCase(message.senderEmail, condition.value);

      case 'sender_is':
        return equalsIgnoreCase(message.senderEmail, condition.value);

      case 'sender_domain':
        return hasDomain(message.senderEmail, condition.value);

      case 'subject_contains':
        return containsIgnoreCase(message.subject, condition.value);

      case 'body_contains':
        return message.body !== undefined && containsIgnoreCase(message.body, condition.value);

      case 'category_is':
        return message.category === condition.category;

      case 'priority_greater_than':
        return message.priority !== undefined && message.priority > condition.value;

      case 'priority_less_than':
        return message.priority !== undefined && message.priority < condition.value;

      case 'age_greater_than':
        return calendarDaysBetween(message.receivedAt, context.now) > condition.days;

      case 'age_less_than':
        return calendarDaysBetween(message.receivedAt, context.now) < condition.days;

      case 'has_attachment':
        // Mail store zatím nedodává data o přílohách
        return false;

      case 'is_unread':
        return !message.isRead;

      case 'is_read':
        return message.isRead;

      case 'has_action_items':
        return message.actionItems.length > 0;

      case 'sender_is_vip':
        // Dokud není napojen VIP registr
        return false;
    }
  }
}
