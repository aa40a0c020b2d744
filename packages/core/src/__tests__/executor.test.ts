/**
 * Query Executor tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Database } from '../storage/Database';
import { QueryExecutor } from '../engine/QueryExecutor';
import { intType, varcharType } from '../storage/DataTypes';
import { ErrorCode } from '../errors';
import type { ExecutionResult } from '../types';

function rowsOf(result: ExecutionResult): string[][] {
    if (!result.success) {
        throw new Error(`query failed: ${result.error}`);
    }
    return result.rows ?? [];
}

describe('QueryExecutor', () => {
    let database: Database;
    let executor: QueryExecutor;

    beforeEach(() => {
        database = new Database();
        executor = new QueryExecutor(database);
    });

    describe('INSERT with constraints', () => {
        beforeEach(() => {
            executor.createTable('users', [
                { name: 'id', dataType: intType(), isPrimary: true, notNull: true },
                { name: 'name', dataType: varcharType(5), isPrimary: false, notNull: false },
            ]);
        });

        it('should insert a valid row', () => {
            const result = executor.insert('users', [['1', 'Alice']]);
            expect(result).toEqual({ success: true, message: '1 row(s) inserted', rowCount: 1 });
            expect(database.requireTable('users').getRows()).toEqual([['1', 'Alice']]);
        });

        it('should reject a duplicate primary key', () => {
            executor.insert('users', [['1', 'Alice']]);
            const result = executor.insert('users', [['1', 'Bob']]);
            expect(result).toEqual({
                success: false,
                error: "Duplicate entry '1' for key 'PRIMARY'",
                code: ErrorCode.DUPLICATE_KEY,
                rowCount: 0,
            });
        });

        it('should reject a value longer than the VARCHAR length', () => {
            const result = executor.insert('users', [['2', 'TooLong']]);
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.code).toBe(ErrorCode.VALUE_TOO_LONG);
                expect(result.error).toBe("Value too long for column 'name' (max 5)");
            }
            expect(database.requireTable('users').count()).toBe(0);
        });

        it('should keep rows inserted before a failing row', () => {
            const result = executor.insert('users', [['1', 'A'], ['2', 'B'], ['1', 'C'], ['3', 'D']]);
            expect(result).toMatchObject({ success: false, code: ErrorCode.DUPLICATE_KEY, rowCount: 2 });
            expect(database.requireTable('users').getRows()).toEqual([['1', 'A'], ['2', 'B']]);
        });

        it('should reject a missing primary value', () => {
            const result = executor.insert('users', [['NULL', 'A']]);
            expect(result).toMatchObject({
                success: false,
                error: "Field 'id' doesn't have a default value",
                code: ErrorCode.MISSING_VALUE,
            });
        });

        it('should report a missing table', () => {
            expect(executor.insert('nope', [['1']])).toEqual({
                success: false,
                error: "Table 'nope' doesn't exist",
                code: ErrorCode.TABLE_NOT_FOUND,
                rowCount: 0,
            });
        });
    });

    describe('CREATE TABLE', () => {
        it('should reject an existing table name regardless of case', () => {
            executor.execute('CREATE TABLE users (id INT)');
            expect(executor.execute('CREATE TABLE USERS (id INT)')).toEqual({
                success: false,
                error: "Table 'USERS' already exists",
                code: ErrorCode.TABLE_EXISTS,
            });
        });

        it('should reject duplicate column names', () => {
            const result = executor.execute('CREATE TABLE t (a INT, A VARCHAR(3))');
            expect(result).toMatchObject({ success: false, code: ErrorCode.DUPLICATE_COLUMN });
        });

        it('should reject more than one primary column', () => {
            const result = executor.execute('CREATE TABLE t (a INT PRIMARY KEY, b INT PRIMARY KEY)');
            expect(result).toEqual({
                success: false,
                error: "Multiple primary key defined for table 't'",
                code: ErrorCode.MULTIPLE_PRIMARY_KEYS,
            });
        });
    });

    describe('SELECT', () => {
        beforeEach(() => {
            executor.execute('CREATE TABLE users (id INT PRIMARY KEY, name VARCHAR(20), age INT)');
            executor.execute("INSERT INTO users VALUES (1, 'Alice', 30), (2, 'Bob', 25), (3, 'Charlie', 35)");
        });

        it('should order by an INT column ascending', () => {
            const result = executor.execute('SELECT name FROM users ORDER BY age');
            expect(rowsOf(result)).toEqual([['Bob'], ['Alice'], ['Charlie']]);
        });

        it('should order descending', () => {
            const result = executor.execute('SELECT name FROM users ORDER BY age DESC');
            expect(rowsOf(result)).toEqual([['Charlie'], ['Alice'], ['Bob']]);
        });

        it('should sort on a column left out of the projection and filter first', () => {
            const result = executor.select('users', ['id'], 'age > 26', [{ column: 'name', descending: true }]);
            expect(result).toEqual({ success: true, rows: [['3'], ['1']], rowCount: 2, columns: ['id'] });
        });

        it('should project * in declared order', () => {
            const result = executor.execute('SELECT * FROM users WHERE id = 2');
            expect(result).toEqual({
                success: true,
                rows: [['2', 'Bob', '25']],
                rowCount: 1,
                columns: ['id', 'name', 'age'],
            });
        });

        it('should keep storage order for ties', () => {
            executor.execute("INSERT INTO users VALUES (4, 'Dora', 25)");
            const result = executor.execute('SELECT id FROM users ORDER BY age');
            expect(rowsOf(result)).toEqual([['2'], ['4'], ['1'], ['3']]);
        });

        it('should report an unknown projected column', () => {
            expect(executor.execute('SELECT email FROM users')).toEqual({
                success: false,
                error: "Column 'email' not found",
                code: ErrorCode.COLUMN_NOT_FOUND,
            });
        });

        it('should report an invalid condition', () => {
            expect(executor.execute('SELECT * FROM users WHERE age >= 5')).toEqual({
                success: false,
                error: "Invalid WHERE condition: unsupported operator '>='",
                code: ErrorCode.CONDITION_PARSE_ERROR,
            });
        });

        it('should let a group with an unknown column match nothing', () => {
            const result = executor.execute('SELECT id FROM users WHERE (nope = 1) OR id = 1');
            expect(rowsOf(result)).toEqual([['1']]);
        });

        it('should return NULL cells as empty strings', () => {
            executor.execute("INSERT INTO users (id, name) VALUES (5, 'Eve')");
            expect(rowsOf(executor.execute('SELECT age FROM users WHERE age IS NULL'))).toEqual([['']]);
        });
    });

    describe('UPDATE', () => {
        beforeEach(() => {
            executor.execute('CREATE TABLE users (id INT PRIMARY KEY, name VARCHAR(20), age INT)');
            executor.execute("INSERT INTO users VALUES (1, 'Alice', 30), (2, 'Bob', 25), (3, 'Charlie', 35)");
        });

        it('should update matching rows', () => {
            expect(executor.execute('UPDATE users SET age = 31 WHERE id = 1')).toEqual({
                success: true,
                message: '1 row(s) updated',
                rowCount: 1,
            });
            expect(rowsOf(executor.execute('SELECT age FROM users WHERE id = 1'))).toEqual([['31']]);
        });

        it('should update every row without a condition', () => {
            const result = executor.execute("UPDATE users SET name = 'X'");
            expect(result).toMatchObject({ success: true, rowCount: 3 });
            expect(rowsOf(executor.execute('SELECT name FROM users'))).toEqual([['X'], ['X'], ['X']]);
        });

        it('should allow a row to keep its own key', () => {
            expect(executor.execute('UPDATE users SET id = 1 WHERE id = 1')).toMatchObject({ success: true, rowCount: 1 });
        });

        it('should reject a key taken by another row', () => {
            expect(executor.execute('UPDATE users SET id = 2 WHERE id = 1')).toEqual({
                success: false,
                error: "Duplicate entry '2' for key 'PRIMARY'",
                code: ErrorCode.DUPLICATE_KEY,
                rowCount: 0,
            });
        });

        it('should stop at the second row when one key is assigned to many', () => {
            const result = executor.execute('UPDATE users SET id = 9');
            expect(result).toMatchObject({ success: false, code: ErrorCode.DUPLICATE_KEY, rowCount: 1 });
            expect(rowsOf(executor.execute('SELECT id FROM users'))).toEqual([['9'], ['2'], ['3']]);
        });

        it('should validate new values before touching any row', () => {
            const result = executor.execute("UPDATE users SET age = 'old'");
            expect(result).toMatchObject({ success: false, code: ErrorCode.TYPE_MISMATCH, rowCount: 0 });
            expect(rowsOf(executor.execute('SELECT age FROM users'))).toEqual([['30'], ['25'], ['35']]);
        });

        it('should accept any value when no row matches', () => {
            expect(executor.execute('UPDATE users SET id = NULL WHERE id = 999')).toEqual({
                success: true,
                message: '0 row(s) updated',
                rowCount: 0,
            });
            expect(executor.execute("UPDATE users SET age = 'old' WHERE age > 100")).toEqual({
                success: true,
                message: '0 row(s) updated',
                rowCount: 0,
            });
        });

        it('should still reject a NULL key when a row matches', () => {
            expect(executor.execute('UPDATE users SET id = NULL WHERE id = 1')).toMatchObject({
                success: false,
                code: ErrorCode.MISSING_VALUE,
                rowCount: 0,
            });
        });

        it('should report an unknown column', () => {
            expect(executor.update('users', [{ column: 'email', value: "'a'" }])).toMatchObject({
                success: false,
                code: ErrorCode.COLUMN_NOT_FOUND,
            });
        });
    });

    describe('DELETE', () => {
        beforeEach(() => {
            executor.execute('CREATE TABLE users (id INT PRIMARY KEY, name VARCHAR(20), age INT)');
            executor.execute("INSERT INTO users VALUES (1, 'Alice', 30), (2, 'Bob', 25), (3, 'Charlie', 35)");
        });

        it('should delete matching rows', () => {
            expect(executor.execute('DELETE FROM users WHERE age > 26')).toEqual({
                success: true,
                message: '2 row(s) deleted',
                rowCount: 2,
            });
            expect(rowsOf(executor.execute('SELECT name FROM users'))).toEqual([['Bob']]);
        });

        it('should delete everything without a condition', () => {
            expect(executor.delete('users')).toMatchObject({ success: true, rowCount: 3 });
            expect(database.requireTable('users').count()).toBe(0);
        });

        it('should free a deleted key for reuse', () => {
            executor.execute('DELETE FROM users WHERE id = 1');
            expect(executor.execute("INSERT INTO users VALUES (1, 'Ann', 20)")).toMatchObject({ success: true });
        });
    });

    describe('DROP TABLE', () => {
        beforeEach(() => {
            executor.execute('CREATE TABLE a (id INT)');
            executor.execute('CREATE TABLE b (id INT)');
        });

        it('should drop nothing when one name is missing', () => {
            expect(executor.execute('DROP TABLE a, missing')).toEqual({
                success: false,
                error: "Table 'missing' doesn't exist",
                code: ErrorCode.TABLE_NOT_FOUND,
            });
            expect(database.getTableNames()).toEqual(['a', 'b']);
        });

        it('should skip missing names with IF EXISTS', () => {
            expect(executor.execute('DROP TABLE IF EXISTS a, missing')).toEqual({
                success: true,
                message: '1 table(s) dropped',
                rowCount: 1,
            });
            expect(database.getTableNames()).toEqual(['b']);
        });
    });

    describe('calculations', () => {
        it('should evaluate SELECT without FROM', () => {
            expect(executor.execute('SELECT (1 + 2) * 3;')).toEqual({
                success: true,
                columns: ['(1 + 2) * 3'],
                rows: [['9']],
                rowCount: 1,
            });
        });

        it('should evaluate a bare expression', () => {
            expect(rowsOf(executor.execute('10 / 4'))).toEqual([['2.5']]);
        });

        it('should report division by zero', () => {
            expect(executor.execute('SELECT 1 / 0')).toEqual({
                success: false,
                error: 'Division by zero',
                code: ErrorCode.CALCULATION_ERROR,
            });
        });
    });

    describe('listTables and describeTable', () => {
        beforeEach(() => {
            executor.execute('CREATE TABLE users (id INT PRIMARY KEY, name VARCHAR(20) NOT NULL, age INT)');
            executor.execute("INSERT INTO users VALUES (1, 'Alice', 30)");
        });

        it('should list tables with row counts', () => {
            expect(executor.listTables()).toEqual({
                success: true,
                rows: [['users', '1']],
                rowCount: 1,
                columns: ['table_name', 'rows'],
            });
        });

        it('should describe columns', () => {
            expect(rowsOf(executor.describeTable('users'))).toEqual([
                ['id', 'INT(10)', 'PRI', 'NO'],
                ['name', 'VARCHAR(20)', '', 'NO'],
                ['age', 'INT(10)', '', 'YES'],
            ]);
        });
    });

    it('should report syntax errors with their position', () => {
        expect(executor.execute('SELEC * FROM users')).toEqual({
            success: false,
            error:
                "Syntax error at line 1, column 1: Expected statement, got 'SELEC'. " +
                'Supported: CREATE TABLE, INSERT, SELECT, UPDATE, DELETE, DROP TABLE',
            code: ErrorCode.SQL_SYNTAX_ERROR,
        });
    });
});
