/** Identifikace zprávy a pravidla, ze kterého požadavek vzešel */
export interface SideEffectTarget {
  ruleId: string;
  messageId: string;
  externalId: string;
}

/** Požadavek na mutaci v mail store (vykonává externí mutator) */
export type MailStoreRequest = SideEffectTarget & (
  | { type: 'delete' }
  | { type: 'archive' }
  | { type: 'mark_read' }
  | { type: 'mark_unread' }
  | { type: 'move'; mailbox: string }
  | { type: 'add_tag'; tag: string }
);

/** Systémová notifikace */
export type NotificationRequest = SideEffectTarget & {
  type: 'notify';
  title: string;
  body: string;
};

/** Záměr vedlejšího efektu - engine ho sám nevykonává */
export type SideEffectRequest = MailStoreRequest | NotificationRequest;

/** Potvrzení mutace od mail store */
export interface MutationResult {
  success: boolean;
  error?: string | undefined;
}

/**
 * Kolaborant, který provádí změny v poštovní schránce.
 *
 * Požadavky mají být idempotentní; engine je nikdy neopakuje.
 */
export interface MailStoreMutator {
  execute(request: MailStoreRequest): Promise<MutationResult>;
}

/** Fire-and-forget doručení notifikace */
export interface Notifier {
  notify(notification: { title: string; body: string }): void | Promise<void>;
}
