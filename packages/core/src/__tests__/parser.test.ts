/**
 * SQL Parser tests
 */

import { describe, it, expect } from 'vitest';
import { Parser } from '../parser/Parser';
import { Tokenizer } from '../parser/Tokenizer';
import { splitStatements } from '../parser/splitStatements';
import { SqlSyntaxError } from '../errors';

function parse(sql: string) {
    return new Parser(sql).parse();
}

describe('Tokenizer', () => {
    it('should upper-case keywords and keep identifiers as written', () => {
        const tokens = new Tokenizer('select Name from Users').tokenize();
        expect(tokens.map(token => [token.type, token.value])).toEqual([
            ['KEYWORD', 'SELECT'],
            ['IDENTIFIER', 'Name'],
            ['KEYWORD', 'FROM'],
            ['IDENTIFIER', 'Users'],
            ['EOF', ''],
        ]);
    });

    it('should unescape doubled quotes in strings', () => {
        const [token] = new Tokenizer("'O''Brien'").tokenize();
        expect(token).toMatchObject({ type: 'STRING', value: "O'Brien", text: "'O''Brien'", position: 0, end: 10 });
    });

    it('should skip comments', () => {
        const tokens = new Tokenizer('SELECT -- note\n/* block */ 1').tokenize();
        expect(tokens.map(token => token.text)).toEqual(['SELECT', '1', '']);
    });

    it('should track lines and columns', () => {
        const tokens = new Tokenizer('SELECT *\n  FROM t').tokenize();
        expect(tokens[2]).toMatchObject({ value: 'FROM', line: 2, column: 3 });
    });

    it('should reject an unterminated string', () => {
        expect(() => new Tokenizer("SELECT 'abc").tokenize()).toThrow(
            'Syntax error at line 1, column 8: Unterminated string'
        );
    });
});

describe('Parser', () => {
    describe('CREATE TABLE', () => {
        it('should parse column types and constraints', () => {
            expect(parse('CREATE TABLE items (id INTEGER PRIMARY KEY, label VARCHAR NOT NULL, qty INT(4) NULL)')).toEqual({
                type: 'CREATE_TABLE',
                tableName: 'items',
                columns: [
                    { name: 'id', dataType: { kind: 'INT', width: 10 }, isPrimary: true, notNull: true },
                    { name: 'label', dataType: { kind: 'VARCHAR', maxLength: 255 }, isPrimary: false, notNull: true },
                    { name: 'qty', dataType: { kind: 'INT', width: 4 }, isPrimary: false, notNull: false },
                ],
            });
        });

        it('should accept a table-level primary key', () => {
            const statement = parse('CREATE TABLE t (id INT, name VARCHAR(10), PRIMARY KEY (id));');
            expect(statement).toMatchObject({
                type: 'CREATE_TABLE',
                columns: [
                    { name: 'id', isPrimary: true, notNull: true },
                    { name: 'name', dataType: { kind: 'VARCHAR', maxLength: 10 }, isPrimary: false },
                ],
            });
        });

        it('should reject a table-level key on an unknown column', () => {
            expect(() => parse('CREATE TABLE t (a INT, PRIMARY KEY (b))')).toThrow(
                "Syntax error at line 1, column 37: Key column 'b' doesn't exist in table"
            );
        });

        it('should reject unsupported types', () => {
            expect(() => parse('CREATE TABLE t (a TEXT)')).toThrow("Unsupported data type 'TEXT'");
        });
    });

    describe('INSERT', () => {
        it('should parse a column list and several rows', () => {
            expect(parse("INSERT INTO users (id, name) VALUES (1, 'A'), (2, NULL)")).toEqual({
                type: 'INSERT',
                tableName: 'users',
                columns: ['id', 'name'],
                rows: [['1', "'A'"], ['2', 'NULL']],
            });
        });

        it('should omit the column list when none is given', () => {
            expect(parse("INSERT INTO users VALUES (-5, 'x')")).toEqual({
                type: 'INSERT',
                tableName: 'users',
                rows: [['-5', "'x'"]],
            });
        });
    });

    describe('SELECT', () => {
        it('should slice the WHERE text and parse ORDER BY', () => {
            expect(parse("SELECT * FROM users WHERE name = 'a' ORDER BY age DESC, id;")).toEqual({
                type: 'SELECT',
                columns: '*',
                tableName: 'users',
                where: "name = 'a'",
                orderBy: [
                    { column: 'age', descending: true },
                    { column: 'id', descending: false },
                ],
            });
        });

        it('should keep AND, OR and parentheses in the WHERE text', () => {
            expect(parse('SELECT id, name FROM users WHERE (age > 5 OR id = 1) AND name IS NOT NULL')).toEqual({
                type: 'SELECT',
                columns: ['id', 'name'],
                tableName: 'users',
                where: '(age > 5 OR id = 1) AND name IS NOT NULL',
            });
        });

        it('should turn SELECT without FROM into a calculation', () => {
            expect(parse('SELECT 2 * (3 + 4)')).toEqual({
                type: 'CALCULATE',
                expression: '2 * (3 + 4)',
                result: 14,
            });
        });

        it('should reject an empty WHERE', () => {
            expect(() => parse('SELECT * FROM users WHERE ORDER BY id')).toThrow('Expected condition after WHERE');
        });
    });

    describe('UPDATE, DELETE and DROP', () => {
        it('should parse UPDATE', () => {
            expect(parse("UPDATE users SET name = 'Z', age = 40 WHERE id = 1")).toEqual({
                type: 'UPDATE',
                tableName: 'users',
                set: [
                    { column: 'name', value: "'Z'" },
                    { column: 'age', value: '40' },
                ],
                where: 'id = 1',
            });
        });

        it('should parse DELETE without a condition', () => {
            expect(parse('DELETE FROM users')).toEqual({ type: 'DELETE', tableName: 'users' });
        });

        it('should parse DROP TABLE IF EXISTS with several names', () => {
            expect(parse('DROP TABLE IF EXISTS a, b')).toEqual({ type: 'DROP', tableNames: ['a', 'b'], ifExists: true });
        });
    });

    it('should report the position of a missing identifier', () => {
        expect(() => parse('SELECT *\nFROM')).toThrow(SqlSyntaxError);
        expect(() => parse('SELECT *\nFROM')).toThrow("Syntax error at line 2, column 5: Expected identifier, got ''");
    });

    it('should reject trailing tokens', () => {
        expect(() => parse('DELETE FROM users users')).toThrow("Unexpected token: 'users'");
    });
});

describe('splitStatements', () => {
    it('should split on semicolons outside quotes and comments', () => {
        const script = "SELECT 'a;b' FROM t; -- c;\n/* x; */ DELETE FROM t;;";
        expect(splitStatements(script)).toEqual(["SELECT 'a;b' FROM t", 'DELETE FROM t']);
    });

    it('should keep a final statement without a semicolon', () => {
        expect(splitStatements('SELECT 1;\nSELECT 2')).toEqual(['SELECT 1', 'SELECT 2']);
    });

    it('should return nothing for blank input', () => {
        expect(splitStatements('  ;\n-- only a comment\n')).toEqual([]);
    });
});
