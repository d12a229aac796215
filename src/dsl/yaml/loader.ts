/**
 * YAML loader pro pravidla.
 *
 * Podporuje tři formáty YAML vstupu:
 * - Jeden objekt pravidla
 * - Pole pravidel (YAML sequence na top-level)
 * - Objekt s klíčem `rules` obsahující pole pravidel
 *
 * @example
 * ```typescript
 * import { loadRulesFromYAML } from 'inbox-rules/dsl';
 *
 * const rules = loadRulesFromYAML(`
 *   name: Archive receipts
 *   matchMode: any
 *   conditions:
 *     - type: subject_contains
 *       value: receipt
 *     - type: category_is
 *       category: orders
 *   actions:
 *     - type: archive
 * `);
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse, stringify } from 'yaml';
import type { Rule, RuleInput } from '../../types/rule.js';
import { decodeRuleInputs } from '../../persistence/rule-codec.js';
import { RuleValidationError } from '../../validation/rule-validation-error.js';
import type { ValidationIssue } from '../../validation/types.js';
import { isObject } from '../../validation/types.js';
import { DslError } from '../helpers/errors.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class YamlLoadError extends DslError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'YamlLoadError';
  }
}

export class YamlValidationError extends DslError {
  constructor(readonly issues: ValidationIssue[]) {
    super(`Invalid rule: ${issues.map(issue => `${issue.path}: ${issue.message}`).join('; ')}`);
    this.name = 'YamlValidationError';
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parsuje YAML a vrátí nevalidovaný seznam pravidel.
 *
 * @throws {YamlLoadError} Při YAML syntaktické chybě nebo prázdném vstupu
 */
export function parseRuleDocuments(yamlContent: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (err) {
    throw new YamlLoadError(
      `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new YamlLoadError('YAML content is empty');
  }

  // Top-level pole pravidel
  if (Array.isArray(parsed)) {
    return parsed;
  }

  if (!isObject(parsed)) {
    throw new YamlLoadError(`Expected YAML object or array, got ${typeof parsed}`);
  }

  // Objekt s klíčem `rules`
  const rulesField = parsed['rules'];
  if (rulesField !== undefined) {
    if (!Array.isArray(rulesField)) {
      throw new YamlLoadError('"rules" must be an array');
    }
    return rulesField;
  }

  // Jeden objekt pravidla
  return [parsed];
}

/**
 * Parsuje YAML řetězec a vrací pole validovaných pravidel.
 *
 * @throws {YamlLoadError} Při YAML syntaktické chybě nebo prázdném vstupu
 * @throws {YamlValidationError} Při validační chybě struktury pravidla
 */
export function loadRulesFromYAML(yamlContent: string): RuleInput[] {
  const documents = parseRuleDocuments(yamlContent);
  if (documents.length === 0) {
    throw new YamlLoadError('YAML contains no rules, expected at least one');
  }

  try {
    return decodeRuleInputs(documents);
  } catch (err) {
    if (err instanceof RuleValidationError) {
      throw new YamlValidationError(err.issues);
    }
    throw err;
  }
}

/**
 * Načte pravidla z YAML souboru.
 *
 * @throws {YamlLoadError} Při chybě čtení souboru, YAML syntaxi nebo prázdném souboru
 * @throws {YamlValidationError} Při validační chybě struktury pravidla
 */
export async function loadRulesFromFile(filePath: string): Promise<RuleInput[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new YamlLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return loadRulesFromYAML(content);
  } catch (err) {
    if (err instanceof YamlLoadError) {
      throw new YamlLoadError(err.message, filePath);
    }
    throw err;
  }
}

/**
 * Serializuje pravidla do YAML dokumentu s klíčem `rules`.
 */
export function exportRulesToYAML(rules: readonly (Rule | RuleInput)[]): string {
  return stringify({ rules });
}
