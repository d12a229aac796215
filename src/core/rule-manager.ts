import type { Rule, RuleInput } from '../types/rule.js';
import type { Clock, Logger } from '../types/index.js';
import type { RulePersistence } from '../persistence/rule-persistence.js';
import { materializeRule } from '../persistence/rule-codec.js';
import { describeError } from '../utils/logger.js';
import { createDefaultRules } from './default-rules.js';

export interface RuleManagerOptions {
  clock?: Clock;
  logger?: Logger;
  /** Při prázdném nebo nečitelném úložišti založí výchozí pravidla */
  seedDefaultRules?: boolean;
  persistDebounceMs?: number;
}

/** Nejvyšší priorita přidělovaná ručním přeřazením */
export const REORDER_BASE_PRIORITY = 100;

/**
 * Uspořádaná kolekce pravidel.
 *
 * Pravidla jsou vždy seřazena podle priority sestupně; při shodě rozhoduje
 * pořadí vložení. Uložené objekty se nemění, každá úprava je nahradí kopií.
 */
export class RuleManager {
  private rules: Rule[] = [];
  private persistence: RulePersistence | null = null;
  private persistTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly persistDebounceMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly seedDefaultRules: boolean;

  constructor(options: RuleManagerOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? console;
    this.seedDefaultRules = options.seedDefaultRules ?? false;
    this.persistDebounceMs = options.persistDebounceMs ?? 10;
  }

  static async start(options: RuleManagerOptions = {}): Promise<RuleManager> {
    return new RuleManager(options);
  }

  /**
   * Přidá nové pravidlo. Vstup musí být už validovaný.
   */
  add(input: RuleInput): Rule {
    const now = this.clock();
    const rule = materializeRule(input, { createdAt: now, updatedAt: now, executionCount: 0 });

    this.rules.push(rule);
    this.changed();
    return rule;
  }

  /**
   * Nahradí editovatelná pole pravidla. ID, čas vytvoření a počítadlo běhů
   * zůstávají.
   */
  update(ruleId: string, input: RuleInput): Rule | undefined {
    const index = this.indexOf(ruleId);
    const existing = this.rules[index];
    if (!existing) return undefined;

    const rule = materializeRule(
      {
        ...input,
        id: existing.id,
        priority: input.priority ?? existing.priority,
        enabled: input.enabled ?? existing.enabled,
        matchMode: input.matchMode ?? existing.matchMode
      },
      {
        createdAt: existing.createdAt,
        updatedAt: this.clock(),
        executionCount: existing.executionCount
      }
    );

    this.rules[index] = rule;
    this.changed();
    return rule;
  }

  delete(ruleId: string): boolean {
    const index = this.indexOf(ruleId);
    if (index === -1) return false;

    this.rules.splice(index, 1);
    this.changed();
    return true;
  }

  /**
   * Přepne enabled; vrátí upravené pravidlo.
   */
  toggle(ruleId: string): Rule | undefined {
    const rule = this.get(ruleId);
    if (!rule) return undefined;

    return this.patch(ruleId, { enabled: !rule.enabled });
  }

  setEnabled(ruleId: string, enabled: boolean): boolean {
    return this.patch(ruleId, { enabled }) !== undefined;
  }

  /**
   * Seřadí pravidla podle předaných ID a přidělí priority `100 - index`.
   * Pravidla, která v seznamu chybí, následují v dosavadním pořadí.
   * Neznámá ID se ignorují.
   */
  reorder(orderedIds: readonly string[]): Rule[] {
    const listed: Rule[] = [];
    const seen = new Set<string>();
    for (const id of orderedIds) {
      const rule = this.get(id);
      if (rule && !seen.has(id)) {
        listed.push(rule);
        seen.add(id);
      }
    }
    const rest = this.rules.filter(rule => !seen.has(rule.id));

    this.assignOrder([...listed, ...rest]);
    return this.getAll();
  }

  /**
   * Přesune pravidlo z pozice `from` na pozici `to` (drag & drop) a
   * přidělí priority podle nového pořadí.
   *
   * @throws {RangeError} Pokud je některý index mimo rozsah
   */
  move(from: number, to: number): Rule[] {
    if (!this.isIndex(from) || !this.isIndex(to)) {
      throw new RangeError(`Cannot move rule from ${from} to ${to}: ${this.rules.length} rules`);
    }

    const ordered = [...this.rules];
    const [moved] = ordered.splice(from, 1);
    if (moved) {
      ordered.splice(to, 0, moved);
    }

    this.assignOrder(ordered);
    return this.getAll();
  }

  /**
   * Zvýší počítadlo běhů pravidla. Nepersistuje, o to se stará engine po běhu.
   */
  recordExecution(ruleId: string): void {
    const index = this.indexOf(ruleId);
    const rule = this.rules[index];
    if (!rule) return;

    this.rules[index] = { ...rule, executionCount: rule.executionCount + 1 };
  }

  /**
   * Nahradí celou kolekci (import).
   */
  replaceAll(rules: readonly Rule[]): void {
    this.rules = [...rules];
    this.changed();
  }

  get(ruleId: string): Rule | undefined {
    return this.rules.find(rule => rule.id === ruleId);
  }

  has(ruleId: string): boolean {
    return this.indexOf(ruleId) !== -1;
  }

  /** Všechna pravidla v pořadí vyhodnocení. */
  getAll(): Rule[] {
    return [...this.rules];
  }

  getEnabled(): Rule[] {
    return this.rules.filter(rule => rule.enabled);
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * Nastaví persistence adapter pro ukládání pravidel.
   */
  setPersistence(persistence: RulePersistence): void {
    this.persistence = persistence;
  }

  /**
   * Načte pravidla z persistence storage.
   *
   * Pokud nic uloženo není nebo načtení selže, použije výchozí sadu
   * (je-li zapnuta `seedDefaultRules`), jinak prázdnou kolekci.
   *
   * @returns Počet načtených pravidel
   */
  async restore(): Promise<number> {
    let loaded: Rule[] | undefined;

    if (this.persistence) {
      try {
        loaded = await this.persistence.load();
      } catch (error) {
        this.logger.warn(`Failed to load rules, falling back to defaults: ${describeError(error)}`);
      }
    }

    if (loaded) {
      this.rules = loaded;
      this.sort();
      return loaded.length;
    }

    this.rules = [];
    if (this.seedDefaultRules) {
      for (const input of createDefaultRules()) {
        this.add(input);
      }
    }

    return 0;
  }

  /**
   * Manuálně uloží všechna pravidla do persistence storage.
   */
  async persist(): Promise<void> {
    if (!this.persistence) {
      return;
    }

    // Zruš případný naplánovaný persist
    if (this.persistTimer) {
      clearTimeout(this.persistTimer);
      this.persistTimer = null;
    }

    await this.persistence.save(this.getAll());
  }

  /**
   * Zruší naplánovaný persist (při zastavení enginu).
   */
  cancelScheduledPersist(): void {
    if (this.persistTimer) {
      clearTimeout(this.persistTimer);
      this.persistTimer = null;
    }
  }

  private patch(ruleId: string, changes: Pick<Partial<Rule>, 'enabled' | 'priority'>): Rule | undefined {
    const index = this.indexOf(ruleId);
    const existing = this.rules[index];
    if (!existing) return undefined;

    const rule: Rule = { ...existing, ...changes, updatedAt: this.clock() };
    this.rules[index] = rule;
    this.changed();
    return rule;
  }

  private assignOrder(ordered: readonly Rule[]): void {
    const now = this.clock();
    this.rules = ordered.map((rule, index) => {
      const priority = REORDER_BASE_PRIORITY - index;
      return rule.priority === priority ? rule : { ...rule, priority, updatedAt: now };
    });
    this.changed();
  }

  private changed(): void {
    this.sort();
    this.schedulePersist();
  }

  /** Stabilní řazení: shodné priority drží dosavadní pořadí. */
  private sort(): void {
    this.rules.sort((a, b) => b.priority - a.priority);
  }

  private indexOf(ruleId: string): number {
    return this.rules.findIndex(rule => rule.id === ruleId);
  }

  private isIndex(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < this.rules.length;
  }

  /**
   * Naplánuje debounced persist.
   * Volá se automaticky při změnách pravidel.
   */
  private schedulePersist(): void {
    if (!this.persistence) {
      return;
    }

    if (this.persistTimer) {
      clearTimeout(this.persistTimer);
    }

    this.persistTimer = setTimeout(() => {
      this.persistTimer = null;
      this.persist().catch(error => {
        this.logger.warn(`Failed to persist rules: ${describeError(error)}`);
      });
    }, this.persistDebounceMs);
  }
}
