/**
 * Cellar - Calculator
 *
 * Evaluates scalar arithmetic such as `SELECT (1 + 2) * 3`.
 *
 * expression := term (('+' | '-') term)*
 * term       := factor (('*' | '/') factor)*
 * factor     := number | '-' factor | '(' expression ')'
 */

import { CalculationError } from '../errors';

type Operator = '+' | '-' | '*' | '/';

type CalcToken =
    | { type: 'number'; value: number }
    | { type: 'op'; value: Operator }
    | { type: 'lparen' }
    | { type: 'rparen' };

function tokenize(expression: string): CalcToken[] {
    const tokens: CalcToken[] = [];
    let i = 0;

    while (i < expression.length) {
        const char = expression[i];

        if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
            i++;
        } else if ((char >= '0' && char <= '9') || char === '.') {
            const start = i;
            while (i < expression.length && /[0-9.]/.test(expression[i])) {
                i++;
            }
            const text = expression.slice(start, i);
            const value = Number(text);
            if (Number.isNaN(value)) {
                throw new CalculationError(`Invalid number '${text}'`, expression);
            }
            tokens.push({ type: 'number', value });
        } else if (char === '+' || char === '-' || char === '*' || char === '/') {
            tokens.push({ type: 'op', value: char });
            i++;
        } else if (char === '(') {
            tokens.push({ type: 'lparen' });
            i++;
        } else if (char === ')') {
            tokens.push({ type: 'rparen' });
            i++;
        } else {
            throw new CalculationError(`Unknown character '${char}' in expression`, expression);
        }
    }

    return tokens;
}

class ExpressionParser {
    private current = 0;

    constructor(private readonly tokens: CalcToken[], private readonly expression: string) {}

    parse(): number {
        if (this.tokens.length === 0) {
            throw new CalculationError('Empty expression', this.expression);
        }
        const value = this.parseExpression();
        const token = this.peek();
        if (token !== undefined) {
            throw new CalculationError(
                token.type === 'rparen' ? 'Unmatched closing parenthesis' : 'Unexpected token in expression',
                this.expression
            );
        }
        return value;
    }

    private parseExpression(): number {
        let value = this.parseTerm();
        for (let op = this.matchOperator('+', '-'); op !== undefined; op = this.matchOperator('+', '-')) {
            const right = this.parseTerm();
            value = op === '+' ? value + right : value - right;
        }
        return value;
    }

    private parseTerm(): number {
        let value = this.parseFactor();
        for (let op = this.matchOperator('*', '/'); op !== undefined; op = this.matchOperator('*', '/')) {
            const right = this.parseFactor();
            if (op === '/') {
                if (right === 0) {
                    throw new CalculationError('Division by zero', this.expression);
                }
                value = value / right;
            } else {
                value = value * right;
            }
        }
        return value;
    }

    private parseFactor(): number {
        const token = this.peek();
        if (token === undefined) {
            throw new CalculationError('Missing operand', this.expression);
        }
        this.current++;

        switch (token.type) {
            case 'number':
                return token.value;
            case 'op':
                if (token.value === '-') {
                    return -this.parseFactor();
                }
                throw new CalculationError(`Missing operand before '${token.value}'`, this.expression);
            case 'lparen': {
                const value = this.parseExpression();
                if (this.peek()?.type !== 'rparen') {
                    throw new CalculationError('Unmatched opening parenthesis', this.expression);
                }
                this.current++;
                return value;
            }
            case 'rparen':
                throw new CalculationError('Missing operand before \')\'', this.expression);
        }
    }

    /**
     * Consume the next token if it is one of the given operators.
     */
    private matchOperator(...operators: Operator[]): Operator | undefined {
        const token = this.peek();
        if (token !== undefined && token.type === 'op' && operators.includes(token.value)) {
            this.current++;
            return token.value;
        }
        return undefined;
    }

    private peek(): CalcToken | undefined {
        return this.tokens[this.current];
    }
}

/**
 * Evaluate an arithmetic expression.
 */
export function evaluateExpression(expression: string): number {
    return new ExpressionParser(tokenize(expression), expression).parse();
}

/**
 * Render a result the way the shell prints it: integers without a fraction,
 * other values rounded to 10 decimal places.
 */
export function formatNumber(value: number): string {
    if (Number.isInteger(value)) {
        return String(value);
    }
    return String(Number(value.toFixed(10)));
}
