import type { EmailCategory, MessageRecord } from './message.js';
import type { SideEffectRequest } from './side-effect.js';

/** Akce pravidla */
export type RuleAction =
  | { type: 'set_category'; category: EmailCategory }
  | { type: 'set_priority'; value: number }             // Ořízne se na 1-10
  | { type: 'delete' }
  | { type: 'archive' }
  | { type: 'mark_read' }
  | { type: 'mark_unread' }
  | { type: 'move_to_mailbox'; mailbox: string }
  | { type: 'snooze'; until: number }                   // Epoch ms
  | { type: 'add_tag'; tag: string }
  | { type: 'notify'; message: string }
  | { type: 'stop_processing' };                        // Žádné další akce tohoto pravidla pro zprávu

export type ActionType = RuleAction['type'];

/** Výsledek jedné akce nad zprávou */
export interface ActionOutcome {
  message: MessageRecord;
  stop: boolean;
  sideEffect?: SideEffectRequest | undefined;
}
