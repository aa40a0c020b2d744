/**
 * WHERE condition compiler tests
 */

import { describe, it, expect } from 'vitest';
import { Table } from '../storage/Table';
import { intType, varcharType } from '../storage/DataTypes';
import { compileCondition } from '../predicate/ConditionParser';
import { tokenizeCondition } from '../predicate/ConditionTokenizer';
import { evaluatePredicate, MATCH_ALL } from '../predicate/Predicate';
import { ConditionParseError } from '../errors';
import type { Row } from '../types';

const table = new Table({
    tableName: 'users',
    columns: [
        { name: 'id', dataType: intType(), isPrimary: true, notNull: true },
        { name: 'name', dataType: varcharType(50), isPrimary: false, notNull: false },
        { name: 'age', dataType: intType(), isPrimary: false, notNull: false },
    ],
});

const rows: Row[] = [
    ['1', 'Alice', '30'],
    ['2', 'Bob', '25'],
    ['3', 'Charlie', '35'],
    ['4', 'and or', ''],
];

function matchingIds(condition: string): string[] {
    const predicate = compileCondition(condition, table);
    return rows.filter(row => evaluatePredicate(predicate, row)).map(row => row[0]);
}

describe('tokenizeCondition', () => {
    it('should keep quoted text as one token', () => {
        expect(tokenizeCondition("name = 'a (b) AND c'")).toEqual([
            { type: 'WORD', value: 'name', position: 0 },
            { type: 'OPERATOR', value: '=', position: 5 },
            { type: 'STRING', value: 'a (b) AND c', position: 7 },
        ]);
    });

    it('should split operators without surrounding spaces', () => {
        expect(tokenizeCondition('age>30').map(token => token.value)).toEqual(['age', '>', '30']);
    });

    it('should reject an unterminated string', () => {
        expect(() => tokenizeCondition("name = 'Al")).toThrow(
            'Invalid WHERE condition: unterminated string starting at position 7'
        );
    });
});

describe('compileCondition', () => {
    it('should compare equality as exact text', () => {
        expect(matchingIds("name = 'Bob'")).toEqual(['2']);
        expect(matchingIds('name = bob')).toEqual([]);
        expect(matchingIds('id = 3')).toEqual(['3']);
    });

    it('should compare ranges numerically', () => {
        expect(matchingIds('age > 26')).toEqual(['1', '3']);
        expect(matchingIds('age < 31')).toEqual(['1', '2']);
    });

    it('should never match NULL cells with > or <', () => {
        expect(matchingIds('age < 100')).toEqual(['1', '2', '3']);
        expect(matchingIds('age > -100')).toEqual(['1', '2', '3']);
    });

    it('should test NULL with IS NULL and IS NOT NULL', () => {
        expect(matchingIds('age IS NULL')).toEqual(['4']);
        expect(matchingIds('age is not null')).toEqual(['1', '2', '3']);
    });

    it('should bind AND tighter than OR', () => {
        expect(matchingIds("name = 'Bob' OR age > 32 AND id = 3")).toEqual(['2', '3']);
        expect(matchingIds("(name = 'Bob' OR age > 32) AND id = 3")).toEqual(['3']);
    });

    it('should treat keywords inside quotes as text', () => {
        expect(matchingIds("name = 'and or'")).toEqual(['4']);
    });

    it('should resolve column names case-insensitively', () => {
        expect(matchingIds('AGE > 30')).toEqual(['3']);
    });

    it('should compare a non-numeric range literal as 0', () => {
        expect(matchingIds('age > abc')).toEqual(['1', '2', '3']);
        expect(matchingIds('age < abc')).toEqual([]);
    });

    it('should let a parenthesized group that does not compile match nothing', () => {
        expect(matchingIds('(nope = 1) OR id = 1')).toEqual(['1']);
        expect(matchingIds('id = 2 OR (age > 5 AND)')).toEqual(['2']);
        expect(matchingIds('() OR id = 3')).toEqual(['3']);
        expect(matchingIds('(nope = 1)')).toEqual([]);
    });

    it('should keep nested groups intact', () => {
        expect(matchingIds("((name = 'Bob') OR (id = 1)) AND age < 28")).toEqual(['2']);
    });

    it('should match every row with MATCH_ALL', () => {
        expect(rows.filter(row => evaluatePredicate(MATCH_ALL, row))).toHaveLength(4);
    });

    it.each([
        ['', 'empty condition'],
        ['age >= 5', "unsupported operator '>='"],
        ['nope = 1', "column 'nope' not found"],
        ['age > 5)', "unbalanced ')' at position 7"],
        ['(age > 5', "unbalanced '(' at position 0"],
        ['age 5', "expected 'column operator value', got 'age 5'"],
        ['age > 5 AND', 'expected a comparison, got end of condition'],
        ['(nope = 1', "unbalanced '(' at position 0"],
    ])('should reject %j', (condition, detail) => {
        expect(() => compileCondition(condition, table)).toThrow(ConditionParseError);
        expect(() => compileCondition(condition, table)).toThrow(`Invalid WHERE condition: ${detail}`);
    });
});

describe('compileCondition with keyword-like column names', () => {
    const products = new Table({
        tableName: 'products',
        columns: [
            { name: 'brand', dataType: varcharType(20), isPrimary: false, notNull: false },
            { name: 'origin', dataType: varcharType(20), isPrimary: false, notNull: false },
            { name: 'label', dataType: varcharType(20), isPrimary: false, notNull: false },
        ],
    });

    const stock: Row[] = [
        ['acme', 'oregon', 'a b'],
        ['acme', 'andorra', 'plain'],
        ['orbit', 'oregon', 'a  b'],
    ];

    function matchingLabels(condition: string): string[] {
        const predicate = compileCondition(condition, products);
        return stock.filter(row => evaluatePredicate(predicate, row)).map(row => row[2]);
    }

    it('should not split identifiers that contain AND or OR', () => {
        expect(matchingLabels('brand = acme AND origin = oregon')).toEqual(['a b']);
        expect(matchingLabels('brand = orbit OR origin = andorra')).toEqual(['plain', 'a  b']);
    });

    it('should read double-quoted literals with spaces as one value', () => {
        expect(matchingLabels('label = "a b"')).toEqual(['a b']);
        expect(matchingLabels('label = "a  b" AND brand = orbit')).toEqual(['a  b']);
    });
});
