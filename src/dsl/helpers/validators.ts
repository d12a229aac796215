/**
 * Validation helpers for DSL builder inputs.
 *
 * These guards enforce a fail-fast approach: invalid input is rejected
 * at the call-site rather than deferred until `build()`.
 *
 * @module
 */

import { DslValidationError } from './errors.js';
import { DURATION_RE } from '../../utils/duration-parser.js';

/**
 * Asserts that `value` is a non-empty string.
 *
 * @param label - A human-readable parameter name used in the error message.
 * @throws {DslValidationError} If `value` is not a string or is empty.
 */
export function requireNonEmptyString(value: unknown, label: string): asserts value is string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new DslValidationError(`${label} must be a non-empty string`);
  }
}

/**
 * @throws {DslValidationError} If `value` is not a finite number.
 */
export function requireFiniteNumber(value: unknown, label: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DslValidationError(`${label} must be a finite number, got ${String(value)}`);
  }
}

/**
 * @throws {DslValidationError} If `value` is not an integer >= 0.
 */
export function requireNonNegativeInteger(value: unknown, label: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new DslValidationError(`${label} must be a non-negative integer, got ${String(value)}`);
  }
}

/**
 * Asserts that `value` is a valid duration.
 *
 * Accepted formats:
 * - A positive finite number interpreted as milliseconds.
 * - A string matching `<digits><unit>` where unit is one of
 *   `ms`, `s`, `m`, `h`, `d`, `w`.
 *
 * @throws {DslValidationError} If `value` is not a valid duration.
 */
export function requireDuration(value: unknown, label: string): asserts value is string | number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) {
      throw new DslValidationError(`${label} must be a positive number (milliseconds), got ${value}`);
    }
    return;
  }

  if (typeof value !== 'string' || !DURATION_RE.test(value)) {
    throw new DslValidationError(
      `${label} must be a duration string (e.g. "30m", "4h", "2d", "1w") or positive number (ms), got ${JSON.stringify(value)}`,
    );
  }
}
