/**
 * Error thrown when rule validation fails.
 *
 * Carries `statusCode` + `code` so a host can map it onto its own error
 * responses.
 *
 * @module
 */

import type { ValidationIssue } from './types.js';

export class RuleValidationError extends Error {
  readonly statusCode = 400;
  readonly code = 'RULE_VALIDATION_ERROR';
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = 'RuleValidationError';
    this.issues = issues;
  }

  /** Issues joined into one line, e.g. for logs. */
  get summary(): string {
    return this.issues.map(issue => `${issue.path}: ${issue.message}`).join('; ');
  }
}
