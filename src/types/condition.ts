import type { EmailCategory } from './message.js';

/** Podmínka pravidla - jedna kontrola nad zprávou */
export type RuleCondition =
  | { type: 'sender_contains'; value: string }          // Jméno nebo adresa obsahuje text
  | { type: 'sender_is'; value: string }                // Adresa se přesně shoduje
  | { type: 'sender_domain'; value: string }            // Doména adresy: "example.com"
  | { type: 'subject_contains'; value: string }
  | { type: 'body_contains'; value: string }
  | { type: 'category_is'; category: EmailCategory }
  | { type: 'priority_greater_than'; value: number }
  | { type: 'priority_less_than'; value: number }
  | { type: 'age_greater_than'; days: number }          // Stáří v kalendářních dnech
  | { type: 'age_less_than'; days: number }
  | { type: 'has_attachment' }                          // Bez dat o přílohách, vždy false
  | { type: 'is_unread' }
  | { type: 'is_read' }
  | { type: 'has_action_items' }
  | { type: 'sender_is_vip' };                          // Bez VIP registru, vždy false

export type ConditionType = RuleCondition['type'];

/** Způsob kombinace podmínek */
export type MatchMode = 'all' | 'any';
