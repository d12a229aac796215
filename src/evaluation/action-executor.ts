import type { RuleAction, ActionOutcome } from '../types/action.js';
import type { MessageRecord } from '../types/message.js';
import type {
  MailStoreMutator,
  MailStoreRequest,
  NotificationRequest,
  Notifier,
  SideEffectRequest,
  SideEffectTarget
} from '../types/side-effect.js';
import type { Logger } from '../types/index.js';
import { PRIORITY_RANGE } from '../validation/constants.js';

/** Jak dlouho se čeká na potvrzení od mail store nebo notifieru */
export const DEFAULT_SIDE_EFFECT_TIMEOUT_MS = 5000;

export interface ExecutionContext {
  ruleId: string;
}

/** Výsledek všech akcí jednoho pravidla nad jednou zprávou */
export interface ActionChainResult {
  message: MessageRecord;
  actionsExecuted: number;
  errors: string[];
  sideEffects: SideEffectRequest[];
  stopped: boolean;
}

/**
 * Thrown when a collaborator rejects a side-effect request.
 */
export class ActionExecutionError extends Error {
  constructor(message: string, readonly request?: SideEffectRequest) {
    super(message);
    this.name = 'ActionExecutionError';
  }
}

/**
 * Spouštění akcí nad zprávou.
 *
 * Sám mění jen pole, za která odpovídá (kategorie, priorita, přečteno,
 * snooze). Vše ostatní předá jako požadavek mail store nebo notifieru.
 */
export class ActionExecutor {
  constructor(
    private readonly mailStore: MailStoreMutator | null,
    private readonly notifier: Notifier | null,
    private readonly logger: Logger = console,
    private readonly sideEffectTimeoutMs: number = DEFAULT_SIDE_EFFECT_TIMEOUT_MS
  ) {}

  /**
   * Spustí akce v deklarovaném pořadí.
   *
   * Chyba akce se zaznamená a pokračuje se další akcí; `stop_processing`
   * ukončí smyčku jen pro tuto zprávu.
   */
  async execute(
    actions: readonly RuleAction[],
    message: MessageRecord,
    context: ExecutionContext
  ): Promise<ActionChainResult> {
    const result: ActionChainResult = {
      message,
      actionsExecuted: 0,
      errors: [],
      sideEffects: [],
      stopped: false
    };

    for (const action of actions) {
      try {
        const outcome = await this.apply(action, result.message, context);
        result.message = outcome.message;
        result.actionsExecuted++;
        if (outcome.sideEffect) {
          result.sideEffects.push(outcome.sideEffect);
        }
        if (outcome.stop) {
          result.stopped = true;
          break;
        }
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        result.errors.push(`Action "${action.type}" failed: ${reason}`);
      }
    }

    return result;
  }

  /**
   * Aplikuje jednu akci a vrátí (případně změněnou) kopii zprávy.
   */
  async apply(action: RuleAction, message: MessageRecord, context: ExecutionContext): Promise<ActionOutcome> {
    const target: SideEffectTarget = {
      ruleId: context.ruleId,
      messageId: message.id,
      externalId: message.externalId
    };

    switch (action.type) {
      case 'set_category':
        return { message: { ...message, category: action.category }, stop: false };

      case 'set_priority':
        return { message: { ...message, priority: clampPriority(action.value) }, stop: false };

      case 'delete':
        return this.forward(message, { ...target, type: 'delete' });

      case 'archive':
        return this.forward(message, { ...target, type: 'archive' });

      case 'mark_read':
        return this.forward({ ...message, isRead: true }, { ...target, type: 'mark_read' });

      case 'mark_unread':
        return this.forward({ ...message, isRead: false }, { ...target, type: 'mark_unread' });

      case 'move_to_mailbox':
        return this.forward(message, { ...target, type: 'move', mailbox: action.mailbox });

      case 'snooze':
        return {
          message: { ...message, isSnoozed: true, snoozeUntil: action.until },
          stop: false
        };

      case 'add_tag':
        return this.forward(message, { ...target, type: 'add_tag', tag: action.tag });

      case 'notify': {
        const request: NotificationRequest = {
          ...target,
          type: 'notify',
          title: `Rule: ${message.subject}`,
          body: action.message
        };
        await this.sendNotification(request.title, request.body);
        return { message, stop: false, sideEffect: request };
      }

      case 'stop_processing':
        return { message, stop: true };
    }
  }

  /**
   * Předá požadavek mail store a počká na potvrzení. Bez mutatoru se
   * požadavek jen vrátí volajícímu.
   */
  private async forward(message: MessageRecord, request: MailStoreRequest): Promise<ActionOutcome> {
    if (this.mailStore) {
      const result = await this.withTimeout(
        this.mailStore.execute(request),
        () => new ActionExecutionError(
          `Mail store did not acknowledge ${request.type} for ${request.externalId} within ${this.sideEffectTimeoutMs}ms`,
          request
        )
      );
      if (!result.success) {
        throw new ActionExecutionError(
          result.error ?? `Mail store rejected ${request.type} for ${request.externalId}`,
          request
        );
      }
    }

    return { message, stop: false, sideEffect: request };
  }

  private async sendNotification(title: string, body: string): Promise<void> {
    if (!this.notifier) return;

    try {
      await this.withTimeout(
        this.notifier.notify({ title, body }),
        () => new Error(`no acknowledgement within ${this.sideEffectTimeoutMs}ms`)
      );
    } catch (error) {
      // Notifikace je fire-and-forget, běh pravidel kvůli ní neselže
      this.logger.warn(`Notification "${title}" was not delivered:`, error);
    }
  }

  /**
   * Počká na spolupracovníka nejvýše `sideEffectTimeoutMs`, pak odmítne
   * chybou z `onTimeout`.
   */
  private async withTimeout<T>(call: T | Promise<T>, onTimeout: () => Error): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      return await Promise.race([
        Promise.resolve(call),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(onTimeout()), this.sideEffectTimeoutMs);
        })
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Ořízne prioritu na celé číslo v rozsahu 1-10.
 */
export function clampPriority(value: number): number {
  return Math.min(Math.max(Math.round(value), PRIORITY_RANGE.min), PRIORITY_RANGE.max);
}
