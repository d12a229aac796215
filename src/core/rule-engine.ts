import type { Rule, RuleInput, RuleExecutionResult, RuleTestResult } from '../types/rule.js';
import type { MessageRecord } from '../types/message.js';
import type { SideEffectRequest } from '../types/side-effect.js';
import type { RuleEngineConfig, EngineStats, RunResult, Clock, Logger } from '../types/index.js';
import { RuleInputValidator, RuleValidationError } from '../validation/index.js';
import type { ValidationResult } from '../validation/index.js';
import { RuleManager } from './rule-manager.js';
import { StatisticsRecorder } from './statistics-recorder.js';
import { EngineBusyError, EngineNotRunningError } from './errors.js';
import { RulePersistence, type RulePersistenceOptions } from '../persistence/rule-persistence.js';
import { StatisticsPersistence, type StatisticsPersistenceOptions } from '../persistence/statistics-persistence.js';
import { decodeRules, encodeRules } from '../persistence/rule-codec.js';
import { ConditionEvaluator, type EvaluationContext } from '../evaluation/condition-evaluator.js';
import { RuleMatcher, type MatchableRule } from '../evaluation/rule-matcher.js';
import {
  ActionExecutor,
  DEFAULT_SIDE_EFFECT_TIMEOUT_MS,
  type ActionChainResult
} from '../evaluation/action-executor.js';
import { parseRuleDocuments, exportRulesToYAML } from '../dsl/yaml/loader.js';
import { createScopedLogger, describeError } from '../utils/logger.js';

interface ResolvedConfig {
  name: string;
  maxConcurrency: number;
}

interface RuleOutcome {
  result: RuleExecutionResult;
  sideEffects: SideEffectRequest[];
}

/**
 * Hlavní orchestrátor rule enginu.
 *
 * Spojuje komponenty a poskytuje API pro:
 * - Běh pravidel nad dávkou zpráv (match → execute → statistiky)
 * - Správu pravidel (add, update, delete, toggle, reorder)
 * - Dry-run test pravidla a validaci
 * - Import/export pravidel (JSON, YAML)
 *
 * Pravidla běží sekvenčně podle priority; běhy se řadí do fronty, takže
 * dva `run()` se nikdy nepřekrývají.
 */
export class RuleEngine {
  private readonly ruleManager: RuleManager;
  private readonly statistics: StatisticsRecorder;
  private readonly statisticsPersistence: StatisticsPersistence | null;
  private readonly matcher: RuleMatcher;
  private readonly actionExecutor: ActionExecutor;
  private readonly validator: RuleInputValidator;
  private readonly config: ResolvedConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private running = false;
  private processing = false;
  private processingQueue: Promise<unknown> = Promise.resolve();
  private pendingStatisticsSave: Promise<void> = Promise.resolve();
  private lastResults: RuleExecutionResult[] = [];

  private constructor(
    ruleManager: RuleManager,
    statistics: StatisticsRecorder,
    statisticsPersistence: StatisticsPersistence | null,
    logger: Logger,
    config: RuleEngineConfig
  ) {
    this.ruleManager = ruleManager;
    this.statistics = statistics;
    this.statisticsPersistence = statisticsPersistence;
    this.logger = logger;

    this.config = {
      name: config.name ?? 'rule-engine',
      maxConcurrency: Math.max(1, Math.floor(config.maxConcurrency ?? 1))
    };

    this.clock = config.clock ?? Date.now;
    this.matcher = new RuleMatcher(new ConditionEvaluator());
    this.validator = new RuleInputValidator();
    this.actionExecutor = new ActionExecutor(
      config.mailStore ?? null,
      config.notifier ?? null,
      this.logger,
      config.sideEffectTimeoutMs ?? DEFAULT_SIDE_EFFECT_TIMEOUT_MS
    );
  }

  /**
   * Vytvoří a spustí novou instanci RuleEngine.
   *
   * Je-li nakonfigurována persistence, načte pravidla a statistiky. Chyba
   * načtení engine nezastaví, jen se zaloguje.
   */
  static async start(config: RuleEngineConfig = {}): Promise<RuleEngine> {
    const logger = createScopedLogger(config.name ?? 'rule-engine', config.logger);
    const ruleManager = await RuleManager.start({
      logger,
      ...(config.clock !== undefined && { clock: config.clock }),
      ...(config.seedDefaultRules !== undefined && { seedDefaultRules: config.seedDefaultRules })
    });
    const statistics = new StatisticsRecorder();
    let statisticsPersistence: StatisticsPersistence | null = null;

    // Nastavení persistence, pokud je nakonfigurována
    if (config.persistence) {
      const options: RulePersistenceOptions = {};
      if (config.persistence.key !== undefined) {
        options.key = config.persistence.key;
      }
      if (config.persistence.schemaVersion !== undefined) {
        options.schemaVersion = config.persistence.schemaVersion;
      }
      ruleManager.setPersistence(new RulePersistence(config.persistence.adapter, options));

      const statsOptions: StatisticsPersistenceOptions = {};
      if (config.persistence.statisticsKey !== undefined) {
        statsOptions.key = config.persistence.statisticsKey;
      }
      if (config.persistence.schemaVersion !== undefined) {
        statsOptions.schemaVersion = config.persistence.schemaVersion;
      }
      statisticsPersistence = new StatisticsPersistence(config.persistence.adapter, statsOptions);

      try {
        const stored = await statisticsPersistence.load();
        if (stored) {
          statistics.restore(stored);
        }
      } catch (error) {
        logger.warn(`Failed to load statistics, starting from zero: ${describeError(error)}`);
      }
    }

    const restored = await ruleManager.restore();
    statistics.refreshRuleCounts(ruleManager.getAll());

    const engine = new RuleEngine(ruleManager, statistics, statisticsPersistence, logger, config);
    engine.running = true;

    logger.info(`Started with ${ruleManager.size} rules (${restored} restored)`);

    return engine;
  }

  // ─── Běh pravidel ───────────────────────────────────────────────────────

  /**
   * Spustí povolená pravidla nad dávkou zpráv.
   *
   * Vstupní záznamy se nemění; výsledek nese upravené kopie ve stejném
   * pořadí, výsledek každého povoleného pravidla a požadavky na vedlejší
   * efekty. Souběžná volání se zpracují postupně.
   */
  async run(messages: readonly MessageRecord[]): Promise<RunResult> {
    this.ensureRunning();

    const job = this.processingQueue.then(() => this.processBatch(messages));
    // Chyba jednoho běhu nesmí zablokovat frontu; volající ji dostane z `job`
    this.processingQueue = job.catch(() => undefined);

    return job;
  }

  /**
   * Dry-run: kolik zpráv by pravidlo zachytilo. Nespouští akce, nemění
   * zprávy ani statistiky.
   */
  testRule(rule: MatchableRule, messages: readonly MessageRecord[]): RuleTestResult {
    const context: EvaluationContext = { now: this.clock() };
    const matches = messages.filter(message => this.matcher.matches(rule, message, context)).length;

    return { matches, total: messages.length };
  }

  /**
   * True, dokud probíhá běh pravidel.
   */
  get isProcessing(): boolean {
    return this.processing;
  }

  // ─── Správa pravidel ────────────────────────────────────────────────────

  /**
   * Validuje pravidlo bez registrace (dry-run).
   */
  validateRule(input: unknown): ValidationResult {
    return this.validator.validate(input);
  }

  /**
   * Přidá nové pravidlo.
   *
   * @throws {RuleValidationError} Pokud vstup není validní nebo ID už existuje
   * @throws {EngineBusyError} Pokud právě probíhá běh
   */
  addRule(input: RuleInput): Rule {
    this.ensureIdle('add a rule');
    this.assertValid(input);

    if (input.id !== undefined && this.ruleManager.has(input.id)) {
      throw new RuleValidationError('Rule validation failed', [
        { path: 'id', message: `Rule "${input.id}" already exists`, severity: 'error' }
      ]);
    }

    const rule = this.ruleManager.add(input);
    this.rulesChanged();
    this.logger.debug(`Rule "${rule.name}" (${rule.id}) added`);
    return rule;
  }

  /**
   * Nahradí definici existujícího pravidla.
   *
   * @returns Upravené pravidlo nebo `undefined`, pokud neexistuje
   * @throws {RuleValidationError} Pokud vstup není validní
   */
  updateRule(ruleId: string, input: RuleInput): Rule | undefined {
    this.ensureIdle('update a rule');
    this.assertValid(input);

    const rule = this.ruleManager.update(ruleId, input);
    if (rule) {
      this.rulesChanged();
    }
    return rule;
  }

  deleteRule(ruleId: string): boolean {
    this.ensureIdle('delete a rule');
    const removed = this.ruleManager.delete(ruleId);
    if (removed) {
      this.rulesChanged();
    }
    return removed;
  }

  /**
   * Přepne enabled flag pravidla.
   */
  toggleRule(ruleId: string): Rule | undefined {
    this.ensureIdle('toggle a rule');
    const rule = this.ruleManager.toggle(ruleId);
    if (rule) {
      this.rulesChanged();
    }
    return rule;
  }

  setRuleEnabled(ruleId: string, enabled: boolean): boolean {
    this.ensureIdle('enable or disable a rule');
    const updated = this.ruleManager.setEnabled(ruleId, enabled);
    if (updated) {
      this.rulesChanged();
    }
    return updated;
  }

  /**
   * Ruční přeřazení: pravidla dostanou prioritu `100 - index` v daném pořadí.
   */
  reorderRules(orderedIds: readonly string[]): Rule[] {
    this.ensureIdle('reorder rules');
    const rules = this.ruleManager.reorder(orderedIds);
    this.rulesChanged();
    return rules;
  }

  /**
   * Přesune pravidlo mezi pozicemi a přepočítá priority jako {@link reorderRules}.
   *
   * @throws {RangeError} Pokud je index mimo rozsah
   */
  moveRule(from: number, to: number): Rule[] {
    this.ensureIdle('move a rule');
    const rules = this.ruleManager.move(from, to);
    this.rulesChanged();
    return rules;
  }

  getRule(ruleId: string): Rule | undefined {
    return this.ruleManager.get(ruleId);
  }

  /**
   * Všechna pravidla v pořadí vyhodnocení.
   */
  getRules(): Rule[] {
    return this.ruleManager.getAll();
  }

  // ─── Import / export ────────────────────────────────────────────────────

  exportRules(): string {
    return encodeRules(this.ruleManager.getAll());
  }

  /**
   * Nahradí pravidla obsahem JSON exportu.
   *
   * @returns `false` pro nevalidní JSON nebo pravidlo; kolekce se pak nemění
   */
  importRules(json: string): boolean {
    this.ensureIdle('import rules');

    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      this.logger.warn(`Rejected rule import, malformed JSON: ${describeError(error)}`);
      return false;
    }

    return this.replaceRules(raw);
  }

  /**
   * Nahradí pravidla obsahem YAML dokumentu (`rules:` seznam, pole nebo
   * jedno pravidlo).
   *
   * @returns `false` pro nevalidní YAML nebo pravidlo; kolekce se pak nemění
   */
  importRulesFromYAML(yamlContent: string): boolean {
    this.ensureIdle('import rules');

    let raw: unknown[];
    try {
      raw = parseRuleDocuments(yamlContent);
    } catch (error) {
      this.logger.warn(`Rejected rule import: ${describeError(error)}`);
      return false;
    }

    return this.replaceRules(raw);
  }

  exportRulesToYAML(): string {
    return exportRulesToYAML(this.ruleManager.getAll());
  }

  // ─── Statistiky ─────────────────────────────────────────────────────────

  getStatistics(): EngineStats {
    return this.statistics.snapshot();
  }

  /**
   * Výsledky posledního dokončeného běhu.
   */
  getLastResults(): RuleExecutionResult[] {
    return [...this.lastResults];
  }

  /**
   * Vynuluje historii běhů. Pravidla ani jejich počítadla se nemění.
   */
  async resetStatistics(): Promise<void> {
    this.ensureIdle('reset statistics');
    this.statistics.reset();
    this.lastResults = [];
    await this.persistStatistics();
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────

  /**
   * Zastaví engine. Počká na rozběhnuté běhy a uloží stav.
   */
  async stop(): Promise<void> {
    this.running = false;

    // Počkat na dokončení zpracování
    await this.processingQueue;

    this.ruleManager.cancelScheduledPersist();
    await this.pendingStatisticsSave;
    await this.persistState();

    this.logger.info('Stopped');
  }

  /**
   * Kontroluje, zda engine běží.
   */
  get isRunning(): boolean {
    return this.running;
  }

  // ─── Interní metody ─────────────────────────────────────────────────────

  private async processBatch(messages: readonly MessageRecord[]): Promise<RunResult> {
    const batch = messages.map(message => ({ ...message }));
    const rules = this.ruleManager.getEnabled();

    if (rules.length === 0) {
      return { messages: batch, results: [], sideEffects: [] };
    }

    this.processing = true;
    try {
      const context: EvaluationContext = { now: this.clock() };
      const results: RuleExecutionResult[] = [];
      const sideEffects: SideEffectRequest[] = [];

      for (const rule of rules) {
        const outcome = await this.evaluateAndExecuteRule(rule, batch, context);
        results.push(outcome.result);
        sideEffects.push(...outcome.sideEffects);
      }

      this.statistics.record(results, context.now);
      this.lastResults = results;

      const matchedRules = results.filter(result => result.matched).length;
      this.logger.debug(
        `Processed ${batch.length} messages with ${rules.length} rules (${matchedRules} matched)`
      );

      await this.persistState();

      return { messages: batch, results, sideEffects };
    } finally {
      this.processing = false;
    }
  }

  private async evaluateAndExecuteRule(
    rule: Rule,
    batch: MessageRecord[],
    context: EvaluationContext
  ): Promise<RuleOutcome> {
    const startTime = performance.now();
    const chains: (ActionChainResult | undefined)[] = new Array<ActionChainResult | undefined>(batch.length);

    await this.processWithConcurrencyLimit(batch.length, async index => {
      const message = batch[index];
      if (!message || !this.matcher.matches(rule, message, context)) {
        return;
      }

      const chain = await this.actionExecutor.execute(rule.actions, message, { ruleId: rule.id });
      batch[index] = chain.message;
      chains[index] = chain;
    });

    // Slučování v pořadí zpráv, nezávisle na pořadí dokončení workerů
    let matchedCount = 0;
    let actionsExecuted = 0;
    const errors: string[] = [];
    const sideEffects: SideEffectRequest[] = [];
    for (const chain of chains) {
      if (!chain) continue;
      matchedCount++;
      actionsExecuted += chain.actionsExecuted;
      errors.push(...chain.errors);
      sideEffects.push(...chain.sideEffects);
    }

    if (matchedCount > 0) {
      this.ruleManager.recordExecution(rule.id);
    }

    if (errors.length > 0) {
      this.logger.warn(`Rule "${rule.name}" finished with ${errors.length} action errors`);
    }

    return {
      result: {
        ruleId: rule.id,
        ruleName: rule.name,
        matched: matchedCount > 0,
        matchedCount,
        actionsExecuted,
        errors,
        durationMs: performance.now() - startTime,
        success: errors.length === 0
      },
      sideEffects
    };
  }

  /**
   * Zpracuje indexy 0..count-1 po dávkách velikosti `maxConcurrency`.
   * Každý index patří právě jednomu workeru.
   */
  private async processWithConcurrencyLimit(
    count: number,
    worker: (index: number) => Promise<void>
  ): Promise<void> {
    const limit = this.config.maxConcurrency;

    for (let start = 0; start < count; start += limit) {
      const chunk: Promise<void>[] = [];
      for (let index = start; index < Math.min(start + limit, count); index++) {
        chunk.push(worker(index));
      }
      await Promise.all(chunk);
    }
  }

  private replaceRules(raw: unknown): boolean {
    let rules: Rule[];
    try {
      rules = decodeRules(raw, this.clock());
    } catch (error) {
      const detail = error instanceof RuleValidationError ? error.summary : describeError(error);
      this.logger.warn(`Rejected rule import: ${detail}`);
      return false;
    }

    this.ruleManager.replaceAll(rules);
    this.rulesChanged();
    this.logger.info(`Imported ${rules.length} rules`);
    return true;
  }

  private assertValid(input: RuleInput): void {
    const result = this.validator.validate(input);
    if (!result.valid) {
      throw new RuleValidationError('Rule validation failed', result.errors);
    }
  }

  /**
   * Přepočítá počty pravidel ve statistikách a uloží je na pozadí. Uložení
   * se řetězí, takže poslední zápis nese aktuální stav.
   */
  private rulesChanged(): void {
    this.statistics.refreshRuleCounts(this.ruleManager.getAll());
    if (this.statisticsPersistence) {
      this.pendingStatisticsSave = this.pendingStatisticsSave.then(() => this.persistStatistics());
    }
  }

  /**
   * Best-effort uložení pravidel a statistik; chyby se jen logují.
   */
  private async persistState(): Promise<void> {
    try {
      await this.ruleManager.persist();
    } catch (error) {
      this.logger.warn(`Failed to persist rules: ${describeError(error)}`);
    }

    await this.persistStatistics();
  }

  private async persistStatistics(): Promise<void> {
    if (!this.statisticsPersistence) return;

    try {
      await this.statisticsPersistence.save(this.statistics.toJSON());
    } catch (error) {
      this.logger.warn(`Failed to persist statistics: ${describeError(error)}`);
    }
  }

  private ensureRunning(): void {
    if (!this.running) {
      throw new EngineNotRunningError(this.config.name);
    }
  }

  private ensureIdle(operation: string): void {
    this.ensureRunning();
    if (this.processing) {
      throw new EngineBusyError(operation);
    }
  }
}
