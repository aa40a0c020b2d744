/**
 * Cellar - Condition Tokenizer
 *
 * Splits WHERE-clause text into words, quoted strings, comparison operators
 * and parentheses. Quoted strings keep embedded spaces, parentheses and
 * keywords as plain text.
 */

import { ConditionParseError } from '../errors';

export type ConditionTokenType = 'WORD' | 'STRING' | 'OPERATOR' | 'LPAREN' | 'RPAREN';

export interface ConditionToken {
    type: ConditionTokenType;
    value: string;
    position: number;
}

const OPERATOR_CHARS = new Set(['<', '>', '=', '!']);
const QUOTES = new Set(["'", '"']);

function isWhitespace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

function isWordChar(char: string): boolean {
    return !isWhitespace(char) && !OPERATOR_CHARS.has(char) && !QUOTES.has(char)
        && char !== '(' && char !== ')';
}

export function tokenizeCondition(text: string): ConditionToken[] {
    const tokens: ConditionToken[] = [];
    let position = 0;

    while (position < text.length) {
        const char = text[position];

        if (isWhitespace(char)) {
            position++;
            continue;
        }

        if (char === '(' || char === ')') {
            tokens.push({ type: char === '(' ? 'LPAREN' : 'RPAREN', value: char, position });
            position++;
            continue;
        }

        if (QUOTES.has(char)) {
            const end = text.indexOf(char, position + 1);
            if (end === -1) {
                throw new ConditionParseError(`unterminated string starting at position ${position}`, text);
            }
            tokens.push({ type: 'STRING', value: text.slice(position + 1, end), position });
            position = end + 1;
            continue;
        }

        if (OPERATOR_CHARS.has(char)) {
            const start = position;
            while (position < text.length && OPERATOR_CHARS.has(text[position])) {
                position++;
            }
            tokens.push({ type: 'OPERATOR', value: text.slice(start, position), position: start });
            continue;
        }

        const start = position;
        while (position < text.length && isWordChar(text[position])) {
            position++;
        }
        tokens.push({ type: 'WORD', value: text.slice(start, position), position: start });
    }

    return tokens;
}
