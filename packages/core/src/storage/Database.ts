/**
 * Cellar - Database Storage
 *
 * Main database class that manages multiple tables and provides
 * persistence capabilities.
 *
 * Design decisions:
 * - Tables are stored in a Map keyed by lower-cased name, so lookups and the
 *   create-time collision check are case-insensitive while each table keeps
 *   the name it was created with
 * - Map insertion order is the table order written to snapshots
 * - Persistence goes through the snapshot codec with an explicit path
 */

import { Table } from './Table';
import { readSnapshot, writeSnapshot } from './Snapshot';
import { validateRow } from '../constraints/ConstraintEnforcer';
import type { TableSchema, SerializedDatabase } from '../types';
import {
    DatabaseError,
    DuplicateColumnError,
    ErrorCode,
    MultiplePrimaryKeysError,
    SnapshotFormatError,
    TableExistsError,
    TableNotFoundError,
} from '../errors';

export class Database {
    private tables: Map<string, Table>;

    constructor() {
        this.tables = new Map();
    }

    /**
     * Open the snapshot at `filePath`, or an empty database when the file
     * does not exist yet.
     */
    static open(filePath: string): Database {
        const database = new Database();
        database.load(filePath);
        return database;
    }

    /**
     * Create a new table.
     */
    createTable(schema: TableSchema): Table {
        const key = schema.tableName.toLowerCase();

        if (this.tables.has(key)) {
            throw new TableExistsError(schema.tableName);
        }

        checkSchema(schema);

        const table = new Table({
            tableName: schema.tableName,
            columns: schema.columns.map(column => ({ ...column })),
        });
        this.tables.set(key, table);

        return table;
    }

    /**
     * Get a table by name.
     */
    getTable(name: string): Table | undefined {
        return this.tables.get(name.toLowerCase());
    }

    /**
     * Get a table or throw TableNotFoundError.
     */
    requireTable(name: string): Table {
        const table = this.getTable(name);
        if (!table) {
            throw new TableNotFoundError(name);
        }
        return table;
    }

    /**
     * Check if a table exists.
     */
    hasTable(name: string): boolean {
        return this.tables.has(name.toLowerCase());
    }

    /**
     * Get all table names, as created.
     */
    getTableNames(): string[] {
        return Array.from(this.tables.values(), table => table.getName());
    }

    /**
     * Drop a table.
     */
    dropTable(name: string): boolean {
        return this.tables.delete(name.toLowerCase());
    }

    /**
     * Clear all tables.
     */
    clear(): void {
        this.tables.clear();
    }

    serialize(): SerializedDatabase {
        return {
            tables: Array.from(this.tables.values(), table => table.serialize()),
        };
    }

    /**
     * Replace every table with the contents of a snapshot document.
     * Nothing changes if the document is rejected.
     */
    restore(snapshot: SerializedDatabase): void {
        const restored = new Map<string, Table>();
        for (const tableData of snapshot.tables) {
            const key = tableData.name.toLowerCase();
            if (restored.has(key)) {
                throw new SnapshotFormatError(`Snapshot contains table '${tableData.name}' twice`);
            }
            restored.set(key, restoreTable(Table.deserialize(tableData)));
        }
        this.tables = restored;
    }

    /**
     * Save the database to disk.
     */
    save(filePath: string): void {
        writeSnapshot(filePath, this.serialize());
    }

    /**
     * Load the database from disk. A missing file leaves an empty database.
     */
    load(filePath: string): void {
        const snapshot = readSnapshot(filePath);
        if (snapshot === undefined) {
            this.tables.clear();
            return;
        }
        this.restore(snapshot);
    }

    /**
     * Get database statistics.
     */
    getStats(): { tableCount: number; tables: Record<string, number> } {
        const tables: Record<string, number> = {};
        for (const table of this.tables.values()) {
            tables[table.getName()] = table.count();
        }
        return {
            tableCount: this.tables.size,
            tables,
        };
    }
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Reject an empty column list, duplicate column names and more than one
 * primary column.
 */
function checkSchema(schema: TableSchema): void {
    if (schema.columns.length === 0) {
        throw new DatabaseError('A table must have at least one column', ErrorCode.COLUMN_COUNT_MISMATCH);
    }

    const columnNames = new Set<string>();
    for (const column of schema.columns) {
        const lowerName = column.name.toLowerCase();
        if (columnNames.has(lowerName)) {
            throw new DuplicateColumnError(column.name);
        }
        columnNames.add(lowerName);
    }

    if (schema.columns.filter(c => c.isPrimary).length > 1) {
        throw new MultiplePrimaryKeysError(schema.tableName);
    }
}

/**
 * Rebuild a table read from a snapshot, holding its schema and every row to
 * the same rules as CREATE TABLE and INSERT.
 */
function restoreTable(loaded: Table): Table {
    const name = loaded.getName();
    try {
        checkSchema(loaded.getSchema());
    } catch (error) {
        throw asSnapshotError(error, `Invalid table '${name}' in snapshot`);
    }

    const table = new Table(loaded.getSchema());
    loaded.getRows().forEach((row, index) => {
        try {
            validateRow(table, row);
        } catch (error) {
            throw asSnapshotError(error, `Invalid row ${index + 1} of table '${name}' in snapshot`);
        }
        table.appendRow([...row]);
    });
    return table;
}

function asSnapshotError(error: unknown, context: string): unknown {
    if (error instanceof DatabaseError && !(error instanceof SnapshotFormatError)) {
        return new SnapshotFormatError(`${context}: ${error.message}`);
    }
    return error;
}
