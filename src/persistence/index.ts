export type { StorageAdapter, PersistedState, StateMetadata } from '@hamicek/noex';
export { RulePersistence, type RulePersistenceOptions } from './rule-persistence.js';
export { StatisticsPersistence, type StatisticsPersistenceOptions } from './statistics-persistence.js';
export { decodeRules, decodeRuleInputs, encodeRules, materializeRule } from './rule-codec.js';
