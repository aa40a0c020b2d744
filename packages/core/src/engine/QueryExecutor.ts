/**
 * Cellar - Query Executor
 *
 * Executes structured statements against the database.
 *
 * Design decisions:
 * - Separates parsing from execution; every operation is also callable
 *   directly with already-extracted fields
 * - Every public method returns an ExecutionResult and never throws
 * - Validation runs before each row is appended or assigned. A failure stops
 *   the statement but keeps rows already written by it; the error result
 *   reports how many
 */

import { Database } from '../storage/Database';
import type { Table } from '../storage/Table';
import { formatDataType } from '../storage/DataTypes';
import { Parser } from '../parser/Parser';
import { formatNumber } from '../calculator/Calculator';
import {
    buildRow,
    checkPrimaryKey,
    normalizeCell,
    validateCell,
    validateRow,
} from '../constraints/ConstraintEnforcer';
import { compileCondition } from '../predicate/ConditionParser';
import { MATCH_ALL, type Predicate, evaluatePredicate, toRowFilter } from '../predicate/Predicate';
import { resolveSortKeys, sortRows } from './RowSorter';
import { TableNotFoundError, describeError } from '../errors';
import type {
    Assignment,
    ColumnDefinition,
    ExecutionResult,
    OrderByItem,
    ParsedStatement,
    QueryError,
} from '../types';

export class QueryExecutor {
    private database: Database;

    constructor(database: Database) {
        this.database = database;
    }

    /**
     * The database this executor works on.
     */
    getDatabase(): Database {
        return this.database;
    }

    /**
     * Execute a single SQL statement.
     */
    execute(sql: string): ExecutionResult {
        try {
            const parser = new Parser(sql);
            const statement = parser.parse();
            return this.executeStatement(statement);
        } catch (error) {
            return this.failure(error);
        }
    }

    /**
     * Execute a parsed statement.
     */
    executeStatement(statement: ParsedStatement): ExecutionResult {
        switch (statement.type) {
            case 'CREATE_TABLE':
                return this.createTable(statement.tableName, statement.columns);
            case 'INSERT':
                return this.insert(statement.tableName, statement.rows, statement.columns);
            case 'SELECT':
                return this.select(
                    statement.tableName,
                    statement.columns,
                    statement.where,
                    statement.orderBy
                );
            case 'UPDATE':
                return this.update(statement.tableName, statement.set, statement.where);
            case 'DELETE':
                return this.delete(statement.tableName, statement.where);
            case 'DROP':
                return this.drop(statement.tableNames, statement.ifExists);
            case 'CALCULATE':
                return {
                    success: true,
                    columns: [statement.expression],
                    rows: [[formatNumber(statement.result)]],
                    rowCount: 1,
                };
        }
    }

    /**
     * Execute CREATE TABLE.
     */
    createTable(tableName: string, columns: ColumnDefinition[]): ExecutionResult {
        try {
            this.database.createTable({ tableName, columns });
            return {
                success: true,
                message: `Table '${tableName}' created successfully`,
            };
        } catch (error) {
            return this.failure(error);
        }
    }

    /**
     * Execute INSERT. Rows are validated and appended one at a time.
     */
    insert(tableName: string, rows: string[][], columns?: string[]): ExecutionResult {
        let inserted = 0;
        try {
            const table = this.database.requireTable(tableName);

            for (const values of rows) {
                const row = buildRow(table, values, columns);
                validateRow(table, row);
                table.appendRow(row);
                inserted++;
            }

            return {
                success: true,
                message: `${inserted} row(s) inserted`,
                rowCount: inserted,
            };
        } catch (error) {
            return this.failure(error, inserted);
        }
    }

    /**
     * Execute SELECT: filter, sort on the full rows, then project.
     */
    select(
        tableName: string,
        columns: string[] | '*',
        where?: string,
        orderBy?: OrderByItem[]
    ): ExecutionResult {
        try {
            const table = this.database.requireTable(tableName);
            const indices = table.resolveColumns(columns);
            const predicate = this.compile(where, table);
            const sortKeys = orderBy ? resolveSortKeys(table, orderBy) : [];

            const filtered = table.getRows().filter(toRowFilter(predicate));
            const rows = sortRows(filtered, sortKeys).map(row => indices.map(i => row[i]));
            const tableColumns = table.getColumns();

            return {
                success: true,
                rows,
                rowCount: rows.length,
                columns: indices.map(i => tableColumns[i].name),
            };
        } catch (error) {
            return this.failure(error);
        }
    }

    /**
     * Execute UPDATE.
     */
    update(tableName: string, set: Assignment[], where?: string): ExecutionResult {
        let updated = 0;
        try {
            const table = this.database.requireTable(tableName);
            const columns = table.getColumns();

            const cells = new Map<number, string>();
            for (const assignment of set) {
                cells.set(table.columnIndex(assignment.column), normalizeCell(assignment.value));
            }

            const predicate = this.compile(where, table);
            const matching: number[] = [];
            table.getRows().forEach((row, index) => {
                if (evaluatePredicate(predicate, row)) {
                    matching.push(index);
                }
            });

            // Values are only checked when some row will receive them
            if (matching.length > 0) {
                for (const [index, cell] of cells) {
                    validateCell(columns[index], cell);
                }
            }

            const pkIndex = table.primaryKeyIndex();
            const newKey = pkIndex === -1 ? undefined : cells.get(pkIndex);

            for (const rowIndex of matching) {
                if (newKey !== undefined) {
                    checkPrimaryKey(table, newKey, rowIndex);
                }
                table.assignCells(rowIndex, cells);
                updated++;
            }

            return {
                success: true,
                message: `${updated} row(s) updated`,
                rowCount: updated,
            };
        } catch (error) {
            return this.failure(error, updated);
        }
    }

    /**
     * Execute DELETE.
     */
    delete(tableName: string, where?: string): ExecutionResult {
        try {
            const table = this.database.requireTable(tableName);
            const predicate = this.compile(where, table);
            const deletedCount = table.deleteWhere(toRowFilter(predicate));

            return {
                success: true,
                message: `${deletedCount} row(s) deleted`,
                rowCount: deletedCount,
            };
        } catch (error) {
            return this.failure(error);
        }
    }

    /**
     * Execute DROP TABLE. Without `ifExists`, one missing name drops nothing.
     */
    drop(tableNames: string[], ifExists: boolean = false): ExecutionResult {
        try {
            if (!ifExists) {
                const missing = tableNames.find(name => !this.database.hasTable(name));
                if (missing !== undefined) {
                    throw new TableNotFoundError(missing);
                }
            }

            let dropped = 0;
            for (const name of tableNames) {
                if (this.database.dropTable(name)) {
                    dropped++;
                }
            }

            return {
                success: true,
                message: `${dropped} table(s) dropped`,
                rowCount: dropped,
            };
        } catch (error) {
            return this.failure(error);
        }
    }

    /**
     * List tables with their row counts.
     */
    listTables(): ExecutionResult {
        const stats = this.database.getStats();
        const rows = Object.entries(stats.tables).map(([name, count]) => [name, String(count)]);

        return {
            success: true,
            rows,
            rowCount: rows.length,
            columns: ['table_name', 'rows'],
        };
    }

    /**
     * Describe a table's columns.
     */
    describeTable(tableName: string): ExecutionResult {
        try {
            const table = this.database.requireTable(tableName);
            const rows = table.getColumns().map(column => [
                column.name,
                formatDataType(column.dataType),
                column.isPrimary ? 'PRI' : '',
                column.notNull || column.isPrimary ? 'NO' : 'YES',
            ]);

            return {
                success: true,
                rows,
                rowCount: rows.length,
                columns: ['column_name', 'data_type', 'key', 'nullable'],
            };
        } catch (error) {
            return this.failure(error);
        }
    }

    /**
     * Write the database snapshot.
     */
    save(filePath: string): ExecutionResult {
        try {
            this.database.save(filePath);
            return { success: true, message: `Database saved to ${filePath}` };
        } catch (error) {
            return this.failure(error);
        }
    }

    /**
     * Replace the database contents with a snapshot.
     */
    load(filePath: string): ExecutionResult {
        try {
            this.database.load(filePath);
            return { success: true, message: `Database loaded from ${filePath}` };
        } catch (error) {
            return this.failure(error);
        }
    }

    // ==========================================================================
    // HELPER METHODS
    // ==========================================================================

    private compile(where: string | undefined, table: Table): Predicate {
        if (where === undefined) {
            return MATCH_ALL;
        }
        return compileCondition(where, table);
    }

    private failure(error: unknown, rowCount?: number): QueryError {
        const { message, code } = describeError(error);
        const result: QueryError = { success: false, error: message, code };
        if (rowCount !== undefined) {
            result.rowCount = rowCount;
        }
        return result;
    }
}
