/**
 * Cellar - Predicate Module
 *
 * Exports the WHERE-clause compiler and evaluator.
 */

export { tokenizeCondition } from './ConditionTokenizer';
export type { ConditionToken, ConditionTokenType } from './ConditionTokenizer';
export { ConditionParser, compileCondition } from './ConditionParser';
export { MATCH_ALL, MATCH_NONE, evaluatePredicate, toRowFilter } from './Predicate';
export type { Predicate } from './Predicate';
