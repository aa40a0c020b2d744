/**
 * Cellar - Data Type Helpers
 *
 * Conversions between the in-memory DataType union and its snapshot
 * encoding (`{ "Int": 10 }` / `{ "Varchar": 255 }`).
 */

import type { DataType, SerializedDataType } from '../types';

export const DEFAULT_INT_WIDTH = 10;
export const DEFAULT_VARCHAR_LENGTH = 255;

export function intType(width: number = DEFAULT_INT_WIDTH): DataType {
    return { kind: 'INT', width };
}

export function varcharType(maxLength: number = DEFAULT_VARCHAR_LENGTH): DataType {
    return { kind: 'VARCHAR', maxLength };
}

export function serializeDataType(dataType: DataType): SerializedDataType {
    return dataType.kind === 'INT'
        ? { Int: dataType.width }
        : { Varchar: dataType.maxLength };
}

export function deserializeDataType(encoded: SerializedDataType): DataType {
    return 'Int' in encoded ? intType(encoded.Int) : varcharType(encoded.Varchar);
}

/**
 * Render a type the way it is declared, e.g. `INT(10)` or `VARCHAR(100)`.
 */
export function formatDataType(dataType: DataType): string {
    return dataType.kind === 'INT'
        ? `INT(${dataType.width})`
        : `VARCHAR(${dataType.maxLength})`;
}
