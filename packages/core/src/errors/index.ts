/**
 * Cellar - Error Types
 *
 * Error hierarchy:
 * - DatabaseError: base class carrying a stable `code`
 *   - lookup failures (table/column not found, table exists)
 *   - schema failures (duplicate column, multiple primary keys)
 *   - constraint failures (column count, missing value, type, length, duplicate key)
 *   - ConditionParseError / SqlSyntaxError / CalculationError for text input
 *   - SnapshotIOError / SnapshotFormatError at the persistence boundary
 *
 * The engine throws these internally; QueryExecutor turns them into
 * `{ success: false }` results so callers never see an exception.
 */

export enum ErrorCode {
    TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
    TABLE_EXISTS = 'TABLE_EXISTS',
    COLUMN_NOT_FOUND = 'COLUMN_NOT_FOUND',
    DUPLICATE_COLUMN = 'DUPLICATE_COLUMN',
    MULTIPLE_PRIMARY_KEYS = 'MULTIPLE_PRIMARY_KEYS',
    COLUMN_COUNT_MISMATCH = 'COLUMN_COUNT_MISMATCH',
    MISSING_VALUE = 'MISSING_VALUE',
    TYPE_MISMATCH = 'TYPE_MISMATCH',
    VALUE_TOO_LONG = 'VALUE_TOO_LONG',
    DUPLICATE_KEY = 'DUPLICATE_KEY',
    CONDITION_PARSE_ERROR = 'CONDITION_PARSE_ERROR',
    SQL_SYNTAX_ERROR = 'SQL_SYNTAX_ERROR',
    CALCULATION_ERROR = 'CALCULATION_ERROR',
    SNAPSHOT_IO_ERROR = 'SNAPSHOT_IO_ERROR',
    SNAPSHOT_FORMAT_ERROR = 'SNAPSHOT_FORMAT_ERROR',
    INVALID_CONFIG = 'INVALID_CONFIG',
    INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all Cellar errors.
 */
export class DatabaseError extends Error {
    readonly code: ErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message);
        this.name = 'DatabaseError';
        this.code = code;
        this.details = details;
    }
}

// =============================================================================
// LOOKUP ERRORS
// =============================================================================

export class TableNotFoundError extends DatabaseError {
    constructor(readonly tableName: string) {
        super(`Table '${tableName}' doesn't exist`, ErrorCode.TABLE_NOT_FOUND, { tableName });
        this.name = 'TableNotFoundError';
    }
}

export class TableExistsError extends DatabaseError {
    constructor(readonly tableName: string) {
        super(`Table '${tableName}' already exists`, ErrorCode.TABLE_EXISTS, { tableName });
        this.name = 'TableExistsError';
    }
}

export class ColumnNotFoundError extends DatabaseError {
    constructor(readonly columnName: string) {
        super(`Column '${columnName}' not found`, ErrorCode.COLUMN_NOT_FOUND, { columnName });
        this.name = 'ColumnNotFoundError';
    }
}

// =============================================================================
// SCHEMA ERRORS
// =============================================================================

export class DuplicateColumnError extends DatabaseError {
    constructor(readonly columnName: string) {
        super(`Duplicate column name '${columnName}'`, ErrorCode.DUPLICATE_COLUMN, { columnName });
        this.name = 'DuplicateColumnError';
    }
}

export class MultiplePrimaryKeysError extends DatabaseError {
    constructor(readonly tableName: string) {
        super(
            `Multiple primary key defined for table '${tableName}'`,
            ErrorCode.MULTIPLE_PRIMARY_KEYS,
            { tableName }
        );
        this.name = 'MultiplePrimaryKeysError';
    }
}

// =============================================================================
// CONSTRAINT ERRORS
// =============================================================================

export class ColumnCountMismatchError extends DatabaseError {
    constructor(readonly expected: number, readonly actual: number) {
        super(
            `Column count doesn't match value count (expected ${expected}, got ${actual})`,
            ErrorCode.COLUMN_COUNT_MISMATCH,
            { expected, actual }
        );
        this.name = 'ColumnCountMismatchError';
    }
}

export class MissingValueError extends DatabaseError {
    constructor(readonly columnName: string) {
        super(
            `Field '${columnName}' doesn't have a default value`,
            ErrorCode.MISSING_VALUE,
            { columnName }
        );
        this.name = 'MissingValueError';
    }
}

export class TypeMismatchError extends DatabaseError {
    constructor(readonly value: string, readonly columnName: string) {
        super(
            `Value '${value}' is not INT for column '${columnName}'`,
            ErrorCode.TYPE_MISMATCH,
            { value, columnName }
        );
        this.name = 'TypeMismatchError';
    }
}

export class ValueTooLongError extends DatabaseError {
    constructor(readonly columnName: string, readonly maxLength: number) {
        super(
            `Value too long for column '${columnName}' (max ${maxLength})`,
            ErrorCode.VALUE_TOO_LONG,
            { columnName, maxLength }
        );
        this.name = 'ValueTooLongError';
    }
}

export class DuplicateKeyError extends DatabaseError {
    constructor(readonly value: string) {
        super(`Duplicate entry '${value}' for key 'PRIMARY'`, ErrorCode.DUPLICATE_KEY, { value });
        this.name = 'DuplicateKeyError';
    }
}

// =============================================================================
// TEXT INPUT ERRORS
// =============================================================================

export class ConditionParseError extends DatabaseError {
    constructor(detail: string, readonly condition?: string) {
        super(`Invalid WHERE condition: ${detail}`, ErrorCode.CONDITION_PARSE_ERROR, { condition });
        this.name = 'ConditionParseError';
    }
}

export class SqlSyntaxError extends DatabaseError {
    constructor(message: string, readonly line: number, readonly column: number) {
        super(
            `Syntax error at line ${line}, column ${column}: ${message}`,
            ErrorCode.SQL_SYNTAX_ERROR,
            { line, column }
        );
        this.name = 'SqlSyntaxError';
    }
}

export class CalculationError extends DatabaseError {
    constructor(message: string, readonly expression: string) {
        super(message, ErrorCode.CALCULATION_ERROR, { expression });
        this.name = 'CalculationError';
    }
}

// =============================================================================
// PERSISTENCE ERRORS
// =============================================================================

export class SnapshotIOError extends DatabaseError {
    constructor(message: string, readonly filePath: string) {
        super(message, ErrorCode.SNAPSHOT_IO_ERROR, { filePath });
        this.name = 'SnapshotIOError';
    }
}

export class SnapshotFormatError extends DatabaseError {
    constructor(message: string, readonly filePath?: string) {
        super(message, ErrorCode.SNAPSHOT_FORMAT_ERROR, { filePath });
        this.name = 'SnapshotFormatError';
    }
}

export class ConfigurationError extends DatabaseError {
    constructor(message: string) {
        super(message, ErrorCode.INVALID_CONFIG);
        this.name = 'ConfigurationError';
    }
}

/**
 * Convert anything thrown into a message and error code.
 */
export function describeError(error: unknown): { message: string; code: ErrorCode } {
    if (error instanceof DatabaseError) {
        return { message: error.message, code: error.code };
    }
    return {
        message: error instanceof Error ? error.message : String(error),
        code: ErrorCode.INTERNAL_ERROR,
    };
}
