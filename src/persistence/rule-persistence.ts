import type { StorageAdapter, PersistedState, StateMetadata } from '@hamicek/noex';
import type { Rule } from '../types/rule.js';
import { isObject } from '../validation/types.js';
import { decodeRules } from './rule-codec.js';

/** Konfigurační options pro RulePersistence */
export interface RulePersistenceOptions {
  /** Klíč pro uložení v databázi (výchozí: 'rules') */
  key?: string;
  /** Verze schématu pro migrace (výchozí: 1) */
  schemaVersion?: number;
}

/** Interní struktura uloženého stavu */
interface RulesState {
  rules: Rule[];
}

/**
 * Persistence pravidel pomocí StorageAdapter.
 *
 * Ukládá pravidla jako plochou uspořádanou kolekci a umožňuje jejich
 * obnovení po restartu.
 */
export class RulePersistence {
  private readonly adapter: StorageAdapter;
  private readonly key: string;
  private readonly schemaVersion: number;

  constructor(adapter: StorageAdapter, options?: RulePersistenceOptions) {
    this.adapter = adapter;
    this.key = options?.key ?? 'rules';
    this.schemaVersion = options?.schemaVersion ?? 1;
  }

  /**
   * Uloží pravidla do storage.
   */
  async save(rules: Rule[]): Promise<void> {
    const state: RulesState = { rules };
    const metadata: StateMetadata = {
      persistedAt: Date.now(),
      serverId: 'rule-engine',
      schemaVersion: this.schemaVersion,
    };

    const persisted: PersistedState<RulesState> = {
      state,
      metadata,
    };

    await this.adapter.save(this.key, persisted);
  }

  /**
   * Načte pravidla ze storage.
   *
   * Vrátí `undefined`, pokud nic uloženo není nebo je uloženo pod jinou
   * verzí schématu.
   *
   * @throws {RuleValidationError} Pokud uložená data nejsou validní pravidla
   */
  async load(): Promise<Rule[] | undefined> {
    const result = await this.adapter.load<unknown>(this.key);
    if (!result) {
      return undefined;
    }

    if (result.metadata.schemaVersion !== this.schemaVersion) {
      // V budoucnu zde může být migrace
      return undefined;
    }

    const state = result.state;
    if (!isObject(state)) {
      throw new Error(`Persisted rules under "${this.key}" are not an object`);
    }

    return decodeRules(state['rules']);
  }

  /**
   * Smaže všechna persistovaná pravidla.
   */
  async clear(): Promise<boolean> {
    return this.adapter.delete(this.key);
  }

  /**
   * Zkontroluje, zda existují uložená pravidla.
   */
  async exists(): Promise<boolean> {
    return this.adapter.exists(this.key);
  }

  getKey(): string {
    return this.key;
  }

  getSchemaVersion(): number {
    return this.schemaVersion;
  }
}
