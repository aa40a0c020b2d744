/**
 * Cellar - Table Storage
 *
 * Implements in-memory row storage for a single table.
 *
 * Design decisions:
 * - Rows are positional string arrays aligned with the column list
 * - The table exposes structural lookups only; constraint checks live in
 *   the ConstraintEnforcer and run before any of the mutators below
 * - Column lookup prefers an exact name match, then falls back to a
 *   case-insensitive one
 */

import type { ColumnDefinition, Row, TableSchema, SerializedTable } from '../types';
import { ColumnNotFoundError, SnapshotFormatError } from '../errors';
import { deserializeDataType, serializeDataType } from './DataTypes';

export class Table {
    private schema: TableSchema;
    private rows: Row[];

    constructor(schema: TableSchema, rows: Row[] = []) {
        this.schema = schema;
        this.rows = rows;
    }

    /**
     * Get the table schema.
     */
    getSchema(): TableSchema {
        return this.schema;
    }

    /**
     * Get the table name.
     */
    getName(): string {
        return this.schema.tableName;
    }

    /**
     * Get column definitions.
     */
    getColumns(): ColumnDefinition[] {
        return this.schema.columns;
    }

    getColumnNames(): string[] {
        return this.schema.columns.map(column => column.name);
    }

    /**
     * Find the position of a column, or -1 when there is none.
     */
    findColumnIndex(name: string): number {
        const exact = this.schema.columns.findIndex(column => column.name === name);
        if (exact !== -1) {
            return exact;
        }
        const lowerName = name.toLowerCase();
        return this.schema.columns.findIndex(column => column.name.toLowerCase() === lowerName);
    }

    /**
     * Resolve a column name to its position or throw ColumnNotFoundError.
     */
    columnIndex(name: string): number {
        const index = this.findColumnIndex(name);
        if (index === -1) {
            throw new ColumnNotFoundError(name);
        }
        return index;
    }

    /**
     * Check if a column exists.
     */
    hasColumn(name: string): boolean {
        return this.findColumnIndex(name) !== -1;
    }

    /**
     * Resolve a projection list to column positions.
     * `*` (alone or inside a list) expands to every column in declared order.
     */
    resolveColumns(columns: string[] | '*'): number[] {
        const all = this.schema.columns.map((_, index) => index);
        if (columns === '*') {
            return all;
        }
        return columns.flatMap(name => (name === '*' ? all : [this.columnIndex(name)]));
    }

    /**
     * Position of the primary column, or -1 when the table has none.
     */
    primaryKeyIndex(): number {
        return this.schema.columns.findIndex(column => column.isPrimary);
    }

    /**
     * Get all stored rows in storage order.
     */
    getRows(): readonly Row[] {
        return this.rows;
    }

    /**
     * Get the total number of rows.
     */
    count(): number {
        return this.rows.length;
    }

    /**
     * Append an already validated row.
     */
    appendRow(row: Row): void {
        this.rows.push(row);
    }

    /**
     * Overwrite cells of the row at `rowIndex`.
     */
    assignCells(rowIndex: number, cells: ReadonlyMap<number, string>): void {
        const row = this.rows[rowIndex];
        for (const [columnIndex, value] of cells) {
            row[columnIndex] = value;
        }
    }

    /**
     * Remove every row matching the predicate in one pass.
     */
    deleteWhere(predicate: (row: Row) => boolean): number {
        const before = this.rows.length;
        this.rows = this.rows.filter(row => !predicate(row));
        return before - this.rows.length;
    }

    /**
     * Serialize the table for persistence.
     */
    serialize(): SerializedTable {
        return {
            name: this.schema.tableName,
            columns: this.schema.columns.map(column => ({
                name: column.name,
                data_type: serializeDataType(column.dataType),
                is_primary: column.isPrimary,
                not_null: column.notNull,
            })),
            data: this.rows.map(row => [...row]),
        };
    }

    /**
     * Restore a table from serialized data.
     */
    static deserialize(data: SerializedTable): Table {
        const columns: ColumnDefinition[] = data.columns.map(column => ({
            name: column.name,
            dataType: deserializeDataType(column.data_type),
            isPrimary: column.is_primary,
            notNull: column.not_null,
        }));

        const rows = data.data.map((row, index) => {
            if (row.length !== columns.length) {
                throw new SnapshotFormatError(
                    `Row ${index + 1} of table '${data.name}' has ${row.length} cells, expected ${columns.length}`
                );
            }
            return [...row];
        });

        return new Table({ tableName: data.name, columns }, rows);
    }
}
