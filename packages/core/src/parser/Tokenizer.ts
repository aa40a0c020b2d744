/**
 * Cellar - SQL Tokenizer
 *
 * Converts raw SQL input into a stream of tokens for parsing.
 *
 * Design decisions:
 * - Hand-written scanner for clarity
 * - Single- and double-quoted strings ('' escapes a quote); backticks quote
 *   identifiers
 * - Case-insensitive keywords
 * - Every token keeps its start/end offsets so the parser can slice raw
 *   WHERE and arithmetic text back out of the source
 */

import { SqlSyntaxError } from '../errors';

export type TokenType =
    | 'KEYWORD'
    | 'IDENTIFIER'
    | 'NUMBER'
    | 'STRING'
    | 'OPERATOR'
    | 'PUNCTUATION'
    | 'STAR'
    | 'EOF';

export interface Token {
    type: TokenType;
    /** Upper-cased for keywords, unquoted for strings, raw text otherwise. */
    value: string;
    /** Source text as written. */
    text: string;
    position: number;
    end: number;
    line: number;
    column: number;
}

// SQL keywords we recognize
const KEYWORDS = new Set([
    'CREATE', 'TABLE', 'INSERT', 'INTO', 'VALUES', 'SELECT', 'FROM',
    'WHERE', 'UPDATE', 'SET', 'DELETE', 'DROP', 'IF', 'EXISTS',
    'ORDER', 'BY', 'ASC', 'DESC', 'INT', 'INTEGER', 'VARCHAR',
    'PRIMARY', 'KEY', 'NOT', 'NULL', 'AND', 'OR', 'IS',
]);

// Operators
const OPERATORS = new Set(['=', '<', '>', '<=', '>=', '<>', '!=', '+', '-', '/']);

// Punctuation
const PUNCTUATION = new Set(['(', ')', ',', ';', '.']);

export class Tokenizer {
    private input: string;
    private position: number;
    private line: number;
    private column: number;
    private tokens: Token[];

    constructor(input: string) {
        this.input = input;
        this.position = 0;
        this.line = 1;
        this.column = 1;
        this.tokens = [];
    }

    /**
     * Tokenize the entire input.
     */
    tokenize(): Token[] {
        while (this.position < this.input.length) {
            this.skipWhitespace();

            if (this.position >= this.input.length) {
                break;
            }

            const char = this.input[this.position];

            // Comments (skip)
            if (char === '-' && this.peek(1) === '-') {
                this.skipLineComment();
                continue;
            }
            if (char === '/' && this.peek(1) === '*') {
                this.skipBlockComment();
                continue;
            }

            // String literals
            if (char === "'" || char === '"') {
                this.readString(char);
                continue;
            }

            if (char === '`') {
                this.readQuotedIdentifier();
                continue;
            }

            // Numbers (including negative)
            if (this.isDigit(char) || (char === '-' && this.isDigit(this.peek(1) || ''))) {
                this.readNumber();
                continue;
            }

            // Identifiers and keywords
            if (this.isAlpha(char) || char === '_') {
                this.readIdentifier();
                continue;
            }

            // Star (for SELECT * and multiplication)
            if (char === '*') {
                const start = this.mark();
                this.advance();
                this.addToken('STAR', '*', start);
                continue;
            }

            // Multi-character operators
            if (char === '<' || char === '>' || char === '!') {
                this.readOperator();
                continue;
            }

            // Single-character operators
            if (OPERATORS.has(char)) {
                const start = this.mark();
                this.advance();
                this.addToken('OPERATOR', char, start);
                continue;
            }

            // Punctuation
            if (PUNCTUATION.has(char)) {
                const start = this.mark();
                this.advance();
                this.addToken('PUNCTUATION', char, start);
                continue;
            }

            throw new SqlSyntaxError(`Unexpected character '${char}'`, this.line, this.column);
        }

        this.addToken('EOF', '', this.mark());
        return this.tokens;
    }

    /**
     * Get the next character without advancing.
     */
    private peek(offset: number = 0): string | undefined {
        return this.input[this.position + offset];
    }

    /**
     * Advance the position and update line/column tracking.
     */
    private advance(): string {
        const char = this.input[this.position];
        this.position++;

        if (char === '\n') {
            this.line++;
            this.column = 1;
        } else {
            this.column++;
        }

        return char;
    }

    private mark(): { position: number; line: number; column: number } {
        return { position: this.position, line: this.line, column: this.column };
    }

    /**
     * Add a token spanning from `start` to the current position.
     */
    private addToken(
        type: TokenType,
        value: string,
        start: { position: number; line: number; column: number }
    ): void {
        this.tokens.push({
            type,
            value,
            text: this.input.slice(start.position, this.position),
            position: start.position,
            end: this.position,
            line: start.line,
            column: start.column,
        });
    }

    /**
     * Skip whitespace characters.
     */
    private skipWhitespace(): void {
        while (this.position < this.input.length) {
            const char = this.input[this.position];
            if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
                this.advance();
            } else {
                break;
            }
        }
    }

    /**
     * Skip line comments (-- comment).
     */
    private skipLineComment(): void {
        while (this.position < this.input.length && this.input[this.position] !== '\n') {
            this.advance();
        }
    }

    /**
     * Skip block comments.
     */
    private skipBlockComment(): void {
        const startLine = this.line;
        const startColumn = this.column;
        this.advance();
        this.advance();

        while (this.position < this.input.length) {
            if (this.input[this.position] === '*' && this.peek(1) === '/') {
                this.advance();
                this.advance();
                return;
            }
            this.advance();
        }

        throw new SqlSyntaxError('Unterminated comment', startLine, startColumn);
    }

    /**
     * Check if character is a digit.
     */
    private isDigit(char: string): boolean {
        return char >= '0' && char <= '9';
    }

    /**
     * Check if character is alphabetic.
     */
    private isAlpha(char: string): boolean {
        return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
    }

    /**
     * Check if character is alphanumeric or underscore.
     */
    private isAlphaNumeric(char: string): boolean {
        return this.isAlpha(char) || this.isDigit(char) || char === '_';
    }

    /**
     * Read a string literal.
     */
    private readString(quote: string): void {
        const start = this.mark();

        this.advance(); // consume opening quote

        let value = '';
        while (this.position < this.input.length) {
            const char = this.input[this.position];

            if (char === quote) {
                // A doubled quote is an escaped quote
                if (this.peek(1) === quote) {
                    value += quote;
                    this.advance();
                    this.advance();
                } else {
                    this.advance(); // consume closing quote
                    this.addToken('STRING', value, start);
                    return;
                }
            } else {
                value += this.advance();
            }
        }

        throw new SqlSyntaxError('Unterminated string', start.line, start.column);
    }

    private readQuotedIdentifier(): void {
        const start = this.mark();
        this.advance();

        let value = '';
        while (this.position < this.input.length && this.input[this.position] !== '`') {
            value += this.advance();
        }

        if (this.position >= this.input.length) {
            throw new SqlSyntaxError('Unterminated quoted identifier', start.line, start.column);
        }

        this.advance();
        this.addToken('IDENTIFIER', value, start);
    }

    /**
     * Read a number literal.
     */
    private readNumber(): void {
        const start = this.mark();
        let value = '';

        // Handle negative sign
        if (this.input[this.position] === '-') {
            value += this.advance();
        }

        while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
            value += this.advance();
        }

        if (this.input[this.position] === '.' && this.isDigit(this.peek(1) || '')) {
            value += this.advance();
            while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
                value += this.advance();
            }
        }

        this.addToken('NUMBER', value, start);
    }

    /**
     * Read an identifier or keyword.
     */
    private readIdentifier(): void {
        const start = this.mark();
        let value = '';

        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.input[this.position])
        ) {
            value += this.advance();
        }

        const upperValue = value.toUpperCase();

        if (KEYWORDS.has(upperValue)) {
            this.addToken('KEYWORD', upperValue, start);
        } else {
            this.addToken('IDENTIFIER', value, start);
        }
    }

    /**
     * Read a multi-character operator.
     */
    private readOperator(): void {
        const start = this.mark();
        let value = this.advance();

        const next = this.peek();
        if (next === '=' || (value === '<' && next === '>')) {
            value += this.advance();
        }

        if (OPERATORS.has(value)) {
            this.addToken('OPERATOR', value, start);
        } else {
            throw new SqlSyntaxError(`Unknown operator '${value}'`, start.line, start.column);
        }
    }
}
