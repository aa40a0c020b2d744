/**
 * Cellar - A small in-memory relational store
 *
 * This is the main entry point for the Cellar core package.
 * It exports all public APIs for use by other packages or applications.
 *
 * @packageDocumentation
 */

import { Database } from './storage/Database';
import { QueryExecutor } from './engine/QueryExecutor';

// Types
export * from './types';

// Errors
export * from './errors';

// Storage
export * from './storage';

// Constraints
export {
    buildRow,
    checkPrimaryKey,
    isNullCell,
    normalizeCell,
    parseInt32,
    validateCell,
    validateRow,
} from './constraints/ConstraintEnforcer';

// Predicates
export * from './predicate';

// Parser
export * from './parser';
export { evaluateExpression, formatNumber } from './calculator/Calculator';

// Engine
export { QueryExecutor } from './engine/QueryExecutor';
export { ScriptRunner } from './engine/ScriptRunner';
export type { OutputSink } from './engine/ScriptRunner';
export { resolveSortKeys, sortRows } from './engine/RowSorter';
export type { SortKey } from './engine/RowSorter';
export { formatTable } from './format/TableFormatter';

// REPL
export { REPL, CommandHistory } from './repl';
export type { REPLOptions } from './repl';
export { getConfig, DEFAULT_CONFIG } from './config';
export type { CellarConfig } from './config';

/**
 * Create a new database instance with a query executor.
 * When a snapshot path is given, its contents are loaded first.
 */
export function createDatabase(snapshotPath?: string): { database: Database; executor: QueryExecutor } {
    const database = snapshotPath === undefined ? new Database() : Database.open(snapshotPath);
    const executor = new QueryExecutor(database);

    return { database, executor };
}
