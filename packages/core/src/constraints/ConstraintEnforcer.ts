/**
 * Cellar - Constraint Enforcer
 *
 * Validates candidate rows and cell values against column types, NOT NULL
 * and PRIMARY KEY uniqueness. Nothing here mutates a table; the executor
 * calls these checks before it appends or assigns anything.
 */

import type { Table } from '../storage/Table';
import type { ColumnDefinition, Row } from '../types';
import {
    ColumnCountMismatchError,
    DuplicateColumnError,
    DuplicateKeyError,
    MissingValueError,
    TypeMismatchError,
    ValueTooLongError,
} from '../errors';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * A cell is NULL when, trimmed, it is empty or spells `null` in any case.
 */
export function isNullCell(cell: string): boolean {
    const trimmed = cell.trim();
    return trimmed === '' || trimmed.toLowerCase() === 'null';
}

/**
 * Parse a string as a 32-bit signed integer, or undefined when it is not one.
 */
export function parseInt32(text: string): number | undefined {
    const trimmed = text.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
        return undefined;
    }
    const value = Number(trimmed);
    if (value < INT32_MIN || value > INT32_MAX) {
        return undefined;
    }
    return value;
}

/**
 * Turn a caller-supplied value into a stored cell: NULL becomes the empty
 * string, surrounding quotes are removed.
 */
export function normalizeCell(raw: string): string {
    const trimmed = raw.trim();
    if (isNullCell(trimmed)) {
        return '';
    }
    if (trimmed.length >= 2) {
        const first = trimmed[0];
        const last = trimmed[trimmed.length - 1];
        if ((first === "'" || first === '"') && first === last) {
            return trimmed.slice(1, -1);
        }
    }
    return trimmed;
}

/**
 * Build a full positional row from supplied values.
 * With a column list, unlisted columns default to NULL.
 */
export function buildRow(table: Table, values: string[], columnList?: string[]): Row {
    const columnCount = table.getColumns().length;

    if (!columnList) {
        if (values.length !== columnCount) {
            throw new ColumnCountMismatchError(columnCount, values.length);
        }
        return values.map(normalizeCell);
    }

    if (values.length !== columnList.length) {
        throw new ColumnCountMismatchError(columnList.length, values.length);
    }

    const row: Row = new Array<string>(columnCount).fill('');
    const seen = new Set<number>();
    columnList.forEach((name, position) => {
        const index = table.columnIndex(name);
        if (seen.has(index)) {
            throw new DuplicateColumnError(name);
        }
        seen.add(index);
        row[index] = normalizeCell(values[position]);
    });
    return row;
}

/**
 * Check one normalized cell against its column's NOT NULL and type rules.
 */
export function validateCell(column: ColumnDefinition, cell: string): void {
    if (isNullCell(cell)) {
        if (column.notNull || column.isPrimary) {
            throw new MissingValueError(column.name);
        }
        return;
    }

    switch (column.dataType.kind) {
        case 'INT':
            if (parseInt32(cell) === undefined) {
                throw new TypeMismatchError(cell, column.name);
            }
            break;
        case 'VARCHAR':
            if (Array.from(cell).length > column.dataType.maxLength) {
                throw new ValueTooLongError(column.name, column.dataType.maxLength);
            }
            break;
    }
}

/**
 * Reject a primary value already held by another row.
 * `ignoreRowIndex` names the row being updated, so keeping its own key passes.
 */
export function checkPrimaryKey(table: Table, value: string, ignoreRowIndex?: number): void {
    const pkIndex = table.primaryKeyIndex();
    if (pkIndex === -1 || isNullCell(value)) {
        return;
    }

    const rows = table.getRows();
    for (let i = 0; i < rows.length; i++) {
        if (i !== ignoreRowIndex && rows[i][pkIndex] === value) {
            throw new DuplicateKeyError(value);
        }
    }
}

/**
 * Validate a complete candidate row before it is appended.
 */
export function validateRow(table: Table, row: Row): void {
    const columns = table.getColumns();
    if (row.length !== columns.length) {
        throw new ColumnCountMismatchError(columns.length, row.length);
    }

    columns.forEach((column, index) => validateCell(column, row[index]));

    const pkIndex = table.primaryKeyIndex();
    if (pkIndex !== -1) {
        checkPrimaryKey(table, row[pkIndex]);
    }
}
