import type { Rule, RuleExecutionResult } from '../types/rule.js';
import type { RunStatistics, EngineStats } from '../types/index.js';

export function emptyStatistics(): RunStatistics {
  return {
    totalRules: 0,
    enabledRules: 0,
    totalExecutions: 0,
    successfulExecutions: 0,
    failedExecutions: 0,
    avgExecutionTimeMs: 0,
    totalExecutionTimeMs: 0
  };
}

/**
 * Kumulativní statistiky běhů.
 *
 * Průměr se drží jako součet / počet přes všechna historická trvání,
 * takže přežije restart bez uchovávání jednotlivých měření.
 */
export class StatisticsRecorder {
  private stats: RunStatistics = emptyStatistics();

  /**
   * Započítá výsledky jednoho běhu. Pravidlo selhalo, pokud má chyby.
   */
  record(results: readonly RuleExecutionResult[], runAt: number): void {
    if (results.length === 0) return;

    let successful = 0;
    let duration = 0;
    for (const result of results) {
      if (result.errors.length === 0) successful++;
      duration += result.durationMs;
    }

    const totalExecutions = this.stats.totalExecutions + results.length;
    const totalExecutionTimeMs = this.stats.totalExecutionTimeMs + duration;

    this.stats = {
      ...this.stats,
      totalExecutions,
      successfulExecutions: this.stats.successfulExecutions + successful,
      failedExecutions: this.stats.failedExecutions + (results.length - successful),
      lastRunAt: runAt,
      totalExecutionTimeMs,
      avgExecutionTimeMs: totalExecutionTimeMs / totalExecutions
    };
  }

  /**
   * Přepočítá počty pravidel. Počítadla běhů se nemění.
   */
  refreshRuleCounts(rules: readonly Rule[]): void {
    this.stats = {
      ...this.stats,
      totalRules: rules.length,
      enabledRules: rules.filter(rule => rule.enabled).length
    };
  }

  snapshot(): EngineStats {
    const { totalExecutions, successfulExecutions } = this.stats;
    return {
      ...this.stats,
      successRate: totalExecutions > 0 ? successfulExecutions / totalExecutions : 0
    };
  }

  /** Vrátí kopii surových statistik (pro persistenci). */
  toJSON(): RunStatistics {
    return { ...this.stats };
  }

  restore(stats: RunStatistics): void {
    this.stats = { ...stats };
  }

  /**
   * Vynuluje historii běhů; počty pravidel zůstávají.
   */
  reset(): void {
    this.stats = {
      ...emptyStatistics(),
      totalRules: this.stats.totalRules,
      enabledRules: this.stats.enabledRules
    };
  }
}
