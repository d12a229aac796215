import type { StorageAdapter } from '@hamicek/noex';
import type { MessageRecord } from './message.js';
import type { RuleExecutionResult } from './rule.js';
import type { MailStoreMutator, Notifier, SideEffectRequest } from './side-effect.js';

export * from './message.js';
export * from './condition.js';
export * from './action.js';
export * from './side-effect.js';
export * from './rule.js';

/** Kumulativní statistiky enginu přes všechny běhy */
export interface RunStatistics {
  totalRules: number;
  enabledRules: number;
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  lastRunAt?: number | undefined;
  avgExecutionTimeMs: number;
  totalExecutionTimeMs: number;   // Součet všech trvání, průměr = součet / počet
}

/** Statistiky včetně odvozených hodnot */
export interface EngineStats extends RunStatistics {
  successRate: number;
}

/** Výsledek jednoho běhu nad dávkou zpráv */
export interface RunResult {
  messages: MessageRecord[];
  results: RuleExecutionResult[];
  sideEffects: SideEffectRequest[];
}

/** Logger kompatibilní s `console` */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Zdroj aktuálního času (epoch ms) */
export type Clock = () => number;

/** Konfigurace persistence */
export interface PersistenceConfig {
  /** Storage adapter (např. SQLiteAdapter z @hamicek/noex) */
  adapter: StorageAdapter;

  /** Klíč pro uložení pravidel (výchozí: 'rules') */
  key?: string;

  /** Klíč pro uložení statistik (výchozí: 'rule-statistics') */
  statisticsKey?: string;

  /** Verze schématu pro migrace (výchozí: 1) */
  schemaVersion?: number;
}

/** Konfigurace Rule Engine */
export interface RuleEngineConfig {
  name?: string;
  maxConcurrency?: number;        // Počet paralelně zpracovávaných zpráv v rámci jednoho pravidla
  persistence?: PersistenceConfig;
  mailStore?: MailStoreMutator;   // Provádí delete/archive/move/tag
  notifier?: Notifier;            // Doručuje notify akce
  sideEffectTimeoutMs?: number;   // Limit čekání na mail store a notifier (výchozí 5000)
  clock?: Clock;                  // Čas pro vyhodnocení stáří zpráv
  logger?: Logger;
  seedDefaultRules?: boolean;     // Při prázdném nebo nečitelném úložišti založí výchozí pravidla
}
