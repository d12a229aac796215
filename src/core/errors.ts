/**
 * Chyby stavu enginu.
 *
 * @module
 */

/**
 * Správa pravidel během probíhajícího běhu.
 */
export class EngineBusyError extends Error {
  readonly code = 'ENGINE_BUSY';

  constructor(readonly operation: string) {
    super(`Cannot ${operation} while a rule run is in progress`);
    this.name = 'EngineBusyError';
  }
}

/**
 * Volání nad zastaveným enginem.
 */
export class EngineNotRunningError extends Error {
  readonly code = 'ENGINE_NOT_RUNNING';

  constructor(readonly engineName: string) {
    super(`RuleEngine "${engineName}" is not running`);
    this.name = 'EngineNotRunningError';
  }
}
