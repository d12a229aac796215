import type { RuleCondition, MatchMode } from './condition.js';
import type { RuleAction } from './action.js';

/** Pravidlo pro automatické zpracování pošty */
export interface Rule {
  id: string;
  name: string;
  description?: string | undefined;
  priority: number;         // Vyšší = dříve
  enabled: boolean;
  matchMode: MatchMode;

  // Podmínky (kombinované podle matchMode)
  conditions: RuleCondition[];

  // Akce při splnění (v deklarovaném pořadí)
  actions: RuleAction[];

  // Metadata
  createdAt: number;
  updatedAt: number;
  executionCount: number;   // Počet běhů, ve kterých pravidlo něco zachytilo
}

/** Pravidlo bez auto-generovaných polí (pro registraci) */
export interface RuleInput {
  id?: string | undefined;
  name: string;
  description?: string | undefined;
  priority?: number | undefined;    // Výchozí: 50
  enabled?: boolean | undefined;    // Výchozí: true
  matchMode?: MatchMode | undefined; // Výchozí: 'all'
  conditions: RuleCondition[];
  actions: RuleAction[];
}

/** Výsledek jednoho pravidla v jednom běhu */
export interface RuleExecutionResult {
  ruleId: string;
  ruleName: string;
  matched: boolean;
  matchedCount: number;
  actionsExecuted: number;
  errors: string[];
  durationMs: number;
  success: boolean;
}

/** Výsledek dry-run testu pravidla */
export interface RuleTestResult {
  matches: number;
  total: number;
}
