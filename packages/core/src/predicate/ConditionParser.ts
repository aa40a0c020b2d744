/**
 * Cellar - Condition Parser
 *
 * Compiles WHERE-clause text into a Predicate for one table.
 *
 * Grammar:
 *
 * condition  := or_expr
 * or_expr    := and_expr (OR and_expr)*
 * and_expr   := term (AND term)*
 * term       := '(' condition ')' | comparison
 * comparison := column ('>' | '<' | '=') value
 *             | column IS NULL
 *             | column IS NOT NULL
 *
 * A parenthesized group is compiled on its own; if it fails, it matches no
 * rows. Errors outside any group are thrown.
 *
 * Keywords are case-insensitive whole words. Column names are resolved to
 * positions here, once; evaluation never looks at names again.
 */

import type { Table } from '../storage/Table';
import { ConditionParseError } from '../errors';
import { parseInt32 } from '../constraints/ConstraintEnforcer';
import { type ConditionToken, tokenizeCondition } from './ConditionTokenizer';
import { MATCH_NONE, type Predicate } from './Predicate';

const SUPPORTED_OPERATORS = new Set(['>', '<', '=']);

export class ConditionParser {
    private tokens: ConditionToken[];
    private current: number;

    constructor(
        private readonly text: string,
        private readonly table: Table,
        tokens: ConditionToken[] = tokenizeCondition(text)
    ) {
        this.tokens = tokens;
        this.current = 0;
    }

    /**
     * Parse the whole condition.
     */
    parse(): Predicate {
        if (this.tokens.length === 0) {
            throw this.error('empty condition');
        }

        const predicate = this.parseOr();

        if (!this.isAtEnd()) {
            const token = this.peek();
            throw this.error(token.type === 'RPAREN'
                ? `unbalanced ')' at position ${token.position}`
                : `unexpected '${token.value}' at position ${token.position}`);
        }

        return predicate;
    }

    private parseOr(): Predicate {
        let left = this.parseAnd();
        while (this.matchKeyword('OR')) {
            const right = this.parseAnd();
            left = { kind: 'or', left, right };
        }
        return left;
    }

    private parseAnd(): Predicate {
        let left = this.parseTerm();
        while (this.matchKeyword('AND')) {
            const right = this.parseTerm();
            left = { kind: 'and', left, right };
        }
        return left;
    }

    private parseTerm(): Predicate {
        if (this.isAtEnd()) {
            throw this.error('expected a comparison, got end of condition');
        }

        if (this.peek().type === 'LPAREN') {
            const open = this.advance();
            const close = this.findClosingParen();
            if (close === -1) {
                throw this.error(`unbalanced '(' at position ${open.position}`);
            }
            const inner = this.tokens.slice(this.current, close);
            this.current = close + 1;
            return this.parseGroup(inner);
        }

        return this.parseComparison();
    }

    /**
     * Compile a parenthesized group on its own. A group that does not
     * compile matches no rows instead of failing the whole condition.
     */
    private parseGroup(tokens: ConditionToken[]): Predicate {
        try {
            return new ConditionParser(this.text, this.table, tokens).parse();
        } catch (error) {
            if (error instanceof ConditionParseError) {
                return MATCH_NONE;
            }
            throw error;
        }
    }

    /**
     * Collect the tokens up to the next AND/OR/')' and check their shape.
     */
    private parseComparison(): Predicate {
        const parts: ConditionToken[] = [];
        while (!this.isAtEnd() && !this.atBoundary()) {
            parts.push(this.advance());
        }

        if (parts.length === 0) {
            throw this.error('expected a comparison');
        }

        const [column, operator] = parts;
        const rendered = parts.map(part => part.value).join(' ');

        if (parts.length === 3 && isKeyword(operator, 'IS') && isKeyword(parts[2], 'NULL')) {
            return { kind: 'null', index: this.resolveColumn(column), negated: false };
        }

        if (parts.length === 4 && isKeyword(operator, 'IS')
            && isKeyword(parts[2], 'NOT') && isKeyword(parts[3], 'NULL')) {
            return { kind: 'null', index: this.resolveColumn(column), negated: true };
        }

        if (parts.length !== 3) {
            throw this.error(`expected 'column operator value', got '${rendered}'`);
        }

        if (operator.type !== 'OPERATOR' || !SUPPORTED_OPERATORS.has(operator.value)) {
            throw this.error(`unsupported operator '${operator.value}'`);
        }

        const index = this.resolveColumn(column);
        const literal = parts[2];
        if (literal.type !== 'WORD' && literal.type !== 'STRING') {
            throw this.error(`expected a value after '${operator.value}', got '${literal.value}'`);
        }

        if (operator.value === '=') {
            return { kind: 'equals', index, value: literal.value };
        }

        // Non-numeric literals compare as 0, like non-numeric cells
        const value = parseInt32(literal.value) ?? 0;
        return { kind: 'range', index, op: operator.value === '>' ? '>' : '<', value };
    }

    private resolveColumn(token: ConditionToken): number {
        if (token.type !== 'WORD') {
            throw this.error(`expected a column name, got '${token.value}'`);
        }
        const index = this.table.findColumnIndex(token.value);
        if (index === -1) {
            throw this.error(`column '${token.value}' not found`);
        }
        return index;
    }

    // ==========================================================================
    // HELPER METHODS
    // ==========================================================================

    /**
     * Index of the ')' closing the group that starts at the current token,
     * or -1 when there is none.
     */
    private findClosingParen(): number {
        let depth = 1;
        for (let i = this.current; i < this.tokens.length; i++) {
            const type = this.tokens[i].type;
            if (type === 'LPAREN') {
                depth++;
            } else if (type === 'RPAREN') {
                depth--;
                if (depth === 0) {
                    return i;
                }
            }
        }
        return -1;
    }

    private atBoundary(): boolean {
        const token = this.peek();
        return token.type === 'RPAREN' || token.type === 'LPAREN'
            || isKeyword(token, 'AND') || isKeyword(token, 'OR');
    }

    private matchKeyword(keyword: string): boolean {
        if (!this.isAtEnd() && isKeyword(this.peek(), keyword)) {
            this.current++;
            return true;
        }
        return false;
    }

    private peek(): ConditionToken {
        return this.tokens[this.current];
    }

    private isAtEnd(): boolean {
        return this.current >= this.tokens.length;
    }

    private advance(): ConditionToken {
        return this.tokens[this.current++];
    }

    private error(detail: string): ConditionParseError {
        return new ConditionParseError(detail, this.text);
    }
}

function isKeyword(token: ConditionToken | undefined, keyword: string): boolean {
    return token !== undefined && token.type === 'WORD' && token.value.toUpperCase() === keyword;
}

/**
 * Compile condition text against a table's column layout.
 */
export function compileCondition(text: string, table: Table): Predicate {
    return new ConditionParser(text, table).parse();
}
