/**
 * Cellar - Parser Module
 *
 * Exports the SQL tokenizer, parser and script splitter.
 */

export { Tokenizer } from './Tokenizer';
export type { Token, TokenType } from './Tokenizer';
export { Parser } from './Parser';
export { splitStatements } from './splitStatements';
