/**
 * Cellar - Core Type Definitions
 *
 * This module defines the fundamental types used throughout the Cellar engine:
 * schema definitions, the positional row model, the structured statements the
 * executor consumes, execution results, and the snapshot document shape.
 */

import type { ErrorCode } from '../errors';

// =============================================================================
// DATA TYPES
// =============================================================================

/**
 * Supported column data types.
 * - INT: 32-bit signed integer. The width is informational only.
 * - VARCHAR: String with a maximum length in characters.
 */
export type DataType =
    | { kind: 'INT'; width: number }
    | { kind: 'VARCHAR'; maxLength: number };

/**
 * A single stored row: one string cell per column, in column order.
 * The empty string is the NULL sentinel.
 */
export type Row = string[];

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Defines a single column in a table schema.
 */
export interface ColumnDefinition {
    name: string;
    dataType: DataType;
    isPrimary: boolean;
    notNull: boolean;
}

/**
 * Complete table schema definition.
 */
export interface TableSchema {
    tableName: string;
    columns: ColumnDefinition[];
}

// =============================================================================
// QUERY TYPES
// =============================================================================

export type StatementType =
    | 'CREATE_TABLE'
    | 'INSERT'
    | 'SELECT'
    | 'UPDATE'
    | 'DELETE'
    | 'DROP'
    | 'CALCULATE';

/**
 * One ORDER BY key.
 */
export interface OrderByItem {
    column: string;
    descending: boolean;
}

/**
 * One `column = value` pair of an UPDATE ... SET list.
 */
export interface Assignment {
    column: string;
    value: string;
}

export interface CreateTableStatement {
    type: 'CREATE_TABLE';
    tableName: string;
    columns: ColumnDefinition[];
}

/**
 * Parsed INSERT statement.
 * `columns` is absent when the statement supplies a value for every column.
 */
export interface InsertStatement {
    type: 'INSERT';
    tableName: string;
    columns?: string[];
    rows: string[][];
}

/**
 * Parsed SELECT statement. `where` is the raw condition text.
 */
export interface SelectStatement {
    type: 'SELECT';
    columns: string[] | '*';
    tableName: string;
    where?: string;
    orderBy?: OrderByItem[];
}

export interface UpdateStatement {
    type: 'UPDATE';
    tableName: string;
    set: Assignment[];
    where?: string;
}

export interface DeleteStatement {
    type: 'DELETE';
    tableName: string;
    where?: string;
}

export interface DropStatement {
    type: 'DROP';
    tableNames: string[];
    ifExists: boolean;
}

/**
 * Scalar arithmetic query such as `SELECT 1 + 2 * 3`.
 */
export interface CalculateStatement {
    type: 'CALCULATE';
    expression: string;
    result: number;
}

/**
 * Union of all possible parsed statements.
 */
export type ParsedStatement =
    | CreateTableStatement
    | InsertStatement
    | SelectStatement
    | UpdateStatement
    | DeleteStatement
    | DropStatement
    | CalculateStatement;

// =============================================================================
// QUERY RESULTS
// =============================================================================

/**
 * Result of a successful query execution.
 */
export interface QueryResult {
    success: true;
    message?: string;
    rows?: Row[];
    rowCount?: number;
    columns?: string[];
}

/**
 * Result of a failed query execution.
 * `rowCount` reports rows already committed before a multi-row insert or
 * update stopped.
 */
export interface QueryError {
    success: false;
    error: string;
    code: ErrorCode;
    rowCount?: number;
}

/**
 * Union type for any query result.
 */
export type ExecutionResult = QueryResult | QueryError;

// =============================================================================
// STORAGE TYPES
// =============================================================================

export type SerializedDataType = { Int: number } | { Varchar: number };

export interface SerializedColumn {
    name: string;
    data_type: SerializedDataType;
    is_primary: boolean;
    not_null: boolean;
}

/**
 * Serializable table data for persistence.
 */
export interface SerializedTable {
    name: string;
    columns: SerializedColumn[];
    data: string[][];
}

/**
 * Serializable database state for persistence.
 */
export interface SerializedDatabase {
    tables: SerializedTable[];
}
