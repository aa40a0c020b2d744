/**
 * Cellar - SQL Parser
 *
 * Parses tokenized SQL into the structured statements the executor runs.
 * WHERE conditions are not parsed here: their source text is handed to the
 * executor, which compiles it against the target table.
 *
 * Supported grammar (simplified):
 *
 * statement := create_table | insert | select | update | delete | drop | expression
 *
 * create_table := CREATE TABLE identifier '(' table_element (',' table_element)* ')'
 * table_element := column_def | PRIMARY KEY '(' identifier ')'
 * column_def := identifier type (PRIMARY KEY | NOT NULL | NULL)*
 * type := (INT | INTEGER) ('(' number ')')? | VARCHAR ('(' number ')')?
 *
 * insert := INSERT INTO identifier ('(' columns ')')? VALUES tuple (',' tuple)*
 * tuple := '(' value (',' value)* ')'
 *
 * select := SELECT (columns | '*') FROM identifier (WHERE condition)? (order_by)?
 *         | SELECT expression
 * order_by := ORDER BY identifier (ASC | DESC)? (',' identifier (ASC | DESC)?)*
 *
 * update := UPDATE identifier SET assignment (',' assignment)* (WHERE condition)?
 * delete := DELETE FROM identifier (WHERE condition)?
 * drop := DROP TABLE (IF EXISTS)? identifier (',' identifier)*
 */

import { Token, Tokenizer, TokenType } from './Tokenizer';
import { evaluateExpression } from '../calculator/Calculator';
import { DEFAULT_INT_WIDTH, DEFAULT_VARCHAR_LENGTH, intType, varcharType } from '../storage/DataTypes';
import { SqlSyntaxError } from '../errors';
import type {
    ParsedStatement,
    CreateTableStatement,
    InsertStatement,
    SelectStatement,
    UpdateStatement,
    DeleteStatement,
    DropStatement,
    CalculateStatement,
    ColumnDefinition,
    DataType,
    OrderByItem,
    Assignment,
} from '../types';

export class Parser {
    private input: string;
    private tokens: Token[];
    private current: number;

    constructor(input: string) {
        const tokenizer = new Tokenizer(input);
        this.input = input;
        this.tokens = tokenizer.tokenize();
        this.current = 0;
    }

    /**
     * Parse the input and return a parsed statement.
     */
    parse(): ParsedStatement {
        const statement = this.parseStatement();

        // Consume optional semicolon
        if (this.check('PUNCTUATION', ';')) {
            this.advance();
        }

        // Ensure we've consumed all tokens
        if (!this.isAtEnd()) {
            throw this.error(`Unexpected token: '${this.peek().text}'`);
        }

        return statement;
    }

    /**
     * Parse a single statement.
     */
    private parseStatement(): ParsedStatement {
        if (this.check('KEYWORD', 'CREATE')) {
            return this.parseCreateTable();
        }
        if (this.check('KEYWORD', 'INSERT')) {
            return this.parseInsert();
        }
        if (this.check('KEYWORD', 'SELECT')) {
            return this.parseSelect();
        }
        if (this.check('KEYWORD', 'UPDATE')) {
            return this.parseUpdate();
        }
        if (this.check('KEYWORD', 'DELETE')) {
            return this.parseDelete();
        }
        if (this.check('KEYWORD', 'DROP')) {
            return this.parseDrop();
        }
        if (this.check('NUMBER') || this.check('PUNCTUATION', '(') || this.check('OPERATOR', '-')) {
            return this.parseCalculation(this.peek().position);
        }

        throw this.error(
            `Expected statement, got '${this.peek().text}'. ` +
            `Supported: CREATE TABLE, INSERT, SELECT, UPDATE, DELETE, DROP TABLE`
        );
    }

    /**
     * Parse CREATE TABLE statement.
     */
    private parseCreateTable(): CreateTableStatement {
        this.consume('KEYWORD', 'CREATE');
        this.consume('KEYWORD', 'TABLE');

        const tableName = this.consumeIdentifier();

        this.consume('PUNCTUATION', '(');
        const columns: ColumnDefinition[] = [];
        const tablePrimaryKeys: Token[] = [];

        do {
            if (this.check('KEYWORD', 'PRIMARY')) {
                this.advance();
                this.consume('KEYWORD', 'KEY');
                this.consume('PUNCTUATION', '(');
                tablePrimaryKeys.push(this.peek());
                this.consumeIdentifier();
                this.consume('PUNCTUATION', ')');
            } else {
                columns.push(this.parseColumnDefinition());
            }
        } while (this.match('PUNCTUATION', ','));

        this.consume('PUNCTUATION', ')');

        for (const keyToken of tablePrimaryKeys) {
            const name = keyToken.value.toLowerCase();
            const column = columns.find(c => c.name.toLowerCase() === name);
            if (!column) {
                throw new SqlSyntaxError(
                    `Key column '${keyToken.value}' doesn't exist in table`,
                    keyToken.line,
                    keyToken.column
                );
            }
            column.isPrimary = true;
            column.notNull = true;
        }

        return {
            type: 'CREATE_TABLE',
            tableName,
            columns,
        };
    }

    /**
     * Parse a single column definition.
     */
    private parseColumnDefinition(): ColumnDefinition {
        const name = this.consumeIdentifier();
        const dataType = this.parseDataType();
        const column: ColumnDefinition = { name, dataType, isPrimary: false, notNull: false };

        while (true) {
            if (this.match('KEYWORD', 'PRIMARY')) {
                this.consume('KEYWORD', 'KEY');
                column.isPrimary = true;
                column.notNull = true;
            } else if (this.match('KEYWORD', 'NOT')) {
                this.consume('KEYWORD', 'NULL');
                column.notNull = true;
            } else if (this.match('KEYWORD', 'NULL')) {
                // explicit NULL is the default
            } else {
                break;
            }
        }

        return column;
    }

    /**
     * Parse a data type.
     */
    private parseDataType(): DataType {
        const token = this.advance();

        if (token.type === 'KEYWORD' && (token.value === 'INT' || token.value === 'INTEGER')) {
            return intType(this.parseTypeLength() ?? DEFAULT_INT_WIDTH);
        }
        if (token.type === 'KEYWORD' && token.value === 'VARCHAR') {
            return varcharType(this.parseTypeLength() ?? DEFAULT_VARCHAR_LENGTH);
        }

        throw new SqlSyntaxError(
            `Unsupported data type '${token.text}'. Supported: INT, VARCHAR`,
            token.line,
            token.column
        );
    }

    /**
     * Parse an optional `(n)` after a type name.
     */
    private parseTypeLength(): number | undefined {
        if (!this.match('PUNCTUATION', '(')) {
            return undefined;
        }
        const token = this.consume('NUMBER');
        const length = Number(token.value);
        if (!Number.isInteger(length) || length < 0) {
            throw new SqlSyntaxError(`Invalid type length '${token.text}'`, token.line, token.column);
        }
        this.consume('PUNCTUATION', ')');
        return length;
    }

    /**
     * Parse INSERT statement.
     */
    private parseInsert(): InsertStatement {
        this.consume('KEYWORD', 'INSERT');
        this.consume('KEYWORD', 'INTO');

        const tableName = this.consumeIdentifier();

        let columns: string[] | undefined;
        if (this.match('PUNCTUATION', '(')) {
            columns = this.parseIdentifierList();
            this.consume('PUNCTUATION', ')');
        }

        this.consume('KEYWORD', 'VALUES');

        const rows: string[][] = [];
        do {
            this.consume('PUNCTUATION', '(');
            rows.push(this.parseValueList());
            this.consume('PUNCTUATION', ')');
        } while (this.match('PUNCTUATION', ','));

        const statement: InsertStatement = { type: 'INSERT', tableName, rows };
        if (columns) {
            statement.columns = columns;
        }
        return statement;
    }

    /**
     * Parse a list of identifiers.
     */
    private parseIdentifierList(): string[] {
        const identifiers: string[] = [];

        identifiers.push(this.consumeIdentifier());

        while (this.match('PUNCTUATION', ',')) {
            identifiers.push(this.consumeIdentifier());
        }

        return identifiers;
    }

    /**
     * Parse a list of values.
     */
    private parseValueList(): string[] {
        const values: string[] = [];

        values.push(this.parseValue());

        while (this.match('PUNCTUATION', ',')) {
            values.push(this.parseValue());
        }

        return values;
    }

    /**
     * Parse a single value. Strings are handed on quoted so that the
     * constraint layer can tell the literal 'NULL' from the NULL keyword.
     */
    private parseValue(): string {
        const token = this.peek();

        if (token.type === 'NUMBER') {
            this.advance();
            return token.value;
        }

        if (token.type === 'STRING') {
            this.advance();
            return `'${token.value}'`;
        }

        if (token.type === 'KEYWORD' && token.value === 'NULL') {
            this.advance();
            return 'NULL';
        }

        throw this.error(`Expected value, got '${token.text}'`);
    }

    /**
     * Parse SELECT statement.
     */
    private parseSelect(): SelectStatement | CalculateStatement {
        const selectToken = this.consume('KEYWORD', 'SELECT');

        if (!this.tokens.some(token => token.type === 'KEYWORD' && token.value === 'FROM')) {
            return this.parseCalculation(selectToken.end);
        }

        let columns: string[] | '*';
        if (this.match('STAR')) {
            columns = '*';
        } else {
            columns = this.parseColumnList();
        }

        this.consume('KEYWORD', 'FROM');
        const tableName = this.consumeIdentifier();

        const statement: SelectStatement = { type: 'SELECT', columns, tableName };

        const where = this.parseOptionalWhere();
        if (where !== undefined) {
            statement.where = where;
        }

        if (this.match('KEYWORD', 'ORDER')) {
            this.consume('KEYWORD', 'BY');
            statement.orderBy = this.parseOrderBy();
        }

        return statement;
    }

    /**
     * Parse a column list for SELECT.
     */
    private parseColumnList(): string[] {
        const columns: string[] = [];

        do {
            if (this.match('STAR')) {
                columns.push('*');
            } else {
                columns.push(this.consumeIdentifier());
            }
        } while (this.match('PUNCTUATION', ','));

        return columns;
    }

    /**
     * Parse ORDER BY keys.
     */
    private parseOrderBy(): OrderByItem[] {
        const items: OrderByItem[] = [];

        do {
            const column = this.consumeIdentifier();
            let descending = false;
            if (this.match('KEYWORD', 'DESC')) {
                descending = true;
            } else {
                this.match('KEYWORD', 'ASC');
            }
            items.push({ column, descending });
        } while (this.match('PUNCTUATION', ','));

        return items;
    }

    /**
     * Capture the raw text of a WHERE clause, up to ORDER BY, ';' or the end.
     */
    private parseOptionalWhere(): string | undefined {
        if (!this.check('KEYWORD', 'WHERE')) {
            return undefined;
        }
        const whereToken = this.advance();

        while (
            !this.isAtEnd() &&
            !this.check('PUNCTUATION', ';') &&
            !(this.check('KEYWORD', 'ORDER') && this.peekNext().type === 'KEYWORD' && this.peekNext().value === 'BY')
        ) {
            this.advance();
        }

        const condition = this.input.slice(whereToken.end, this.peek().position).trim();
        if (condition === '') {
            throw new SqlSyntaxError('Expected condition after WHERE', whereToken.line, whereToken.column);
        }
        return condition;
    }

    /**
     * Treat the rest of the statement as arithmetic.
     */
    private parseCalculation(start: number): CalculateStatement {
        while (!this.isAtEnd() && !this.check('PUNCTUATION', ';')) {
            this.advance();
        }

        const expression = this.input.slice(start, this.peek().position).trim();
        return {
            type: 'CALCULATE',
            expression,
            result: evaluateExpression(expression),
        };
    }

    /**
     * Parse UPDATE statement.
     */
    private parseUpdate(): UpdateStatement {
        this.consume('KEYWORD', 'UPDATE');

        const tableName = this.consumeIdentifier();

        this.consume('KEYWORD', 'SET');
        const set: Assignment[] = [];
        do {
            set.push(this.parseAssignment());
        } while (this.match('PUNCTUATION', ','));

        const statement: UpdateStatement = { type: 'UPDATE', tableName, set };
        const where = this.parseOptionalWhere();
        if (where !== undefined) {
            statement.where = where;
        }
        return statement;
    }

    /**
     * Parse a single assignment.
     */
    private parseAssignment(): Assignment {
        const column = this.consumeIdentifier();
        this.consume('OPERATOR', '=');
        const value = this.parseValue();
        return { column, value };
    }

    /**
     * Parse DELETE statement.
     */
    private parseDelete(): DeleteStatement {
        this.consume('KEYWORD', 'DELETE');
        this.consume('KEYWORD', 'FROM');

        const tableName = this.consumeIdentifier();

        const statement: DeleteStatement = { type: 'DELETE', tableName };
        const where = this.parseOptionalWhere();
        if (where !== undefined) {
            statement.where = where;
        }
        return statement;
    }

    /**
     * Parse DROP TABLE statement.
     */
    private parseDrop(): DropStatement {
        this.consume('KEYWORD', 'DROP');
        this.consume('KEYWORD', 'TABLE');

        let ifExists = false;
        if (this.match('KEYWORD', 'IF')) {
            this.consume('KEYWORD', 'EXISTS');
            ifExists = true;
        }

        return {
            type: 'DROP',
            tableNames: this.parseIdentifierList(),
            ifExists,
        };
    }

    // ==========================================================================
    // HELPER METHODS
    // ==========================================================================

    /**
     * Get the current token.
     */
    private peek(): Token {
        return this.tokens[this.current];
    }

    private peekNext(): Token {
        return this.tokens[Math.min(this.current + 1, this.tokens.length - 1)];
    }

    /**
     * Check if we've reached the end of tokens.
     */
    private isAtEnd(): boolean {
        return this.peek().type === 'EOF';
    }

    /**
     * Advance to the next token.
     */
    private advance(): Token {
        if (!this.isAtEnd()) {
            this.current++;
        }
        return this.tokens[this.current - 1];
    }

    /**
     * Check if current token matches expected type and value.
     */
    private check(type: TokenType, value?: string): boolean {
        if (this.isAtEnd()) return false;
        const token = this.peek();
        if (token.type !== type) return false;
        if (value !== undefined && token.value !== value) return false;
        return true;
    }

    /**
     * Consume the current token if it matches.
     */
    private match(type: TokenType, value?: string): boolean {
        if (this.check(type, value)) {
            this.advance();
            return true;
        }
        return false;
    }

    /**
     * Consume expected token or throw error.
     */
    private consume(type: TokenType, value?: string): Token {
        if (this.check(type, value)) {
            return this.advance();
        }

        const token = this.peek();
        const expected = value ? `'${value}'` : type;
        const got = token.type === 'EOF' ? 'end of input' : `'${token.text}'`;
        throw this.error(`Expected ${expected}, got ${got}`);
    }

    /**
     * Consume an identifier token.
     */
    private consumeIdentifier(): string {
        const token = this.peek();
        if (token.type === 'IDENTIFIER') {
            this.advance();
            return token.value;
        }
        // Also allow keywords as identifiers (table/column names)
        if (token.type === 'KEYWORD') {
            this.advance();
            return token.text;
        }
        throw this.error(`Expected identifier, got '${token.text}'`);
    }

    /**
     * Create a parse error with position information.
     */
    private error(message: string): SqlSyntaxError {
        const token = this.peek();
        return new SqlSyntaxError(message, token.line, token.column);
    }
}
