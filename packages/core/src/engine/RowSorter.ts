/**
 * Cellar - Row Sorting
 *
 * Multi-key ORDER BY over full stored rows. Keys are compared in order and
 * the first key that differs decides; `descending` flips only that key.
 * Array.prototype.sort is stable, so complete ties keep storage order.
 */

import type { Table } from '../storage/Table';
import { ColumnNotFoundError } from '../errors';
import { parseInt32 } from '../constraints/ConstraintEnforcer';
import type { DataType, OrderByItem, Row } from '../types';

export interface SortKey {
    index: number;
    dataType: DataType;
    descending: boolean;
}

/**
 * Resolve ORDER BY items against the table. Sort columns need not be
 * part of the projection.
 */
export function resolveSortKeys(table: Table, orderBy: OrderByItem[]): SortKey[] {
    const columns = table.getColumns();
    return orderBy.map(item => {
        const index = table.findColumnIndex(item.column);
        if (index === -1) {
            throw new ColumnNotFoundError(item.column);
        }
        return { index, dataType: columns[index].dataType, descending: item.descending };
    });
}

function compareCells(a: string, b: string, dataType: DataType): number {
    if (dataType.kind === 'INT') {
        return (parseInt32(a) ?? 0) - (parseInt32(b) ?? 0);
    }
    if (a === b) {
        return 0;
    }
    return a < b ? -1 : 1;
}

export function compareRows(a: Row, b: Row, keys: SortKey[]): number {
    for (const key of keys) {
        const ordering = compareCells(a[key.index], b[key.index], key.dataType);
        if (ordering !== 0) {
            return key.descending ? -ordering : ordering;
        }
    }
    return 0;
}

/**
 * Return a sorted copy of the rows.
 */
export function sortRows(rows: readonly Row[], keys: SortKey[]): Row[] {
    const sorted = [...rows];
    if (keys.length > 0) {
        sorted.sort((a, b) => compareRows(a, b, keys));
    }
    return sorted;
}
