/**
 * Cellar - Storage Module
 *
 * Exports all storage-related classes and the snapshot codec.
 */

export { Table } from './Table';
export { Database } from './Database';
export { parseSnapshot, readSnapshot, writeSnapshot, snapshotSchema } from './Snapshot';
export {
    intType,
    varcharType,
    formatDataType,
    serializeDataType,
    deserializeDataType,
    DEFAULT_INT_WIDTH,
    DEFAULT_VARCHAR_LENGTH,
} from './DataTypes';
