/** Kategorie zprávy přiřazená klasifikací nebo pravidlem */
export type EmailCategory =
  | 'bills'
  | 'orders'
  | 'work'
  | 'personal'
  | 'marketing'
  | 'newsletters'
  | 'social'
  | 'spam'
  | 'other';

/** Úkol extrahovaný z obsahu zprávy */
export interface ActionItem {
  type: 'deadline' | 'meeting' | 'task' | 'reminder';
  text: string;
  dueAt?: number | undefined;
}

/**
 * Jedna zpráva z poštovní schránky.
 *
 * Engine s ní zachází jako s hodnotou: každá změna vytvoří nový objekt,
 * záznamy volajícího zůstávají beze změny.
 */
export interface MessageRecord {
  id: string;                         // Unikátní ID záznamu
  externalId: string;                 // Reference do mail store (pro re-fetch a mutace)
  sender: string;                     // Zobrazované jméno odesílatele
  senderEmail: string;                // Adresa odesílatele
  subject: string;
  body?: string | undefined;
  receivedAt: number;                 // Kdy zpráva dorazila (epoch ms)
  isRead: boolean;
  category?: EmailCategory | undefined;
  priority?: number | undefined;      // 1-10
  isSnoozed: boolean;
  snoozeUntil?: number | undefined;
  actionItems: ActionItem[];
  senderReputation?: number | undefined;  // 0-1
}
