/**
 * Cellar - Compiled Predicates
 *
 * A predicate is a tagged expression tree holding resolved column positions
 * and literal operands only, so it can be stored and reused against any row
 * of the table shape it was compiled for.
 */

import type { Row } from '../types';
import { isNullCell, parseInt32 } from '../constraints/ConstraintEnforcer';

export type Predicate =
    | { kind: 'all' }
    | { kind: 'none' }
    | { kind: 'equals'; index: number; value: string }
    | { kind: 'range'; index: number; op: '>' | '<'; value: number }
    | { kind: 'null'; index: number; negated: boolean }
    | { kind: 'and'; left: Predicate; right: Predicate }
    | { kind: 'or'; left: Predicate; right: Predicate };

export const MATCH_ALL: Predicate = { kind: 'all' };

/** Stands in for a parenthesized group that failed to compile. */
export const MATCH_NONE: Predicate = { kind: 'none' };

export function evaluatePredicate(predicate: Predicate, row: Row): boolean {
    switch (predicate.kind) {
        case 'all':
            return true;
        case 'none':
            return false;
        case 'equals':
            return row[predicate.index] === predicate.value;
        case 'range': {
            const cell = row[predicate.index];
            // NULL has no ordering; other non-numeric cells order as 0.
            if (isNullCell(cell)) {
                return false;
            }
            const value = parseInt32(cell) ?? 0;
            return predicate.op === '>' ? value > predicate.value : value < predicate.value;
        }
        case 'null':
            return isNullCell(row[predicate.index]) !== predicate.negated;
        case 'and':
            return evaluatePredicate(predicate.left, row) && evaluatePredicate(predicate.right, row);
        case 'or':
            return evaluatePredicate(predicate.left, row) || evaluatePredicate(predicate.right, row);
    }
}

/**
 * Wrap a predicate as a plain row filter.
 */
export function toRowFilter(predicate: Predicate): (row: Row) => boolean {
    return row => evaluatePredicate(predicate, row);
}
