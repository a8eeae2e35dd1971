/**
 * Domain Module
 *
 * Pure game model and the rule oracle contract. Nothing here logs, persists
 * or dispatches.
 */

export * from './game';
export { RuleOracle, RuleVerdict, MoveEffects, LegalMove } from './rules/rule-oracle';
