/**
 * Cellar - Snapshot Codec
 *
 * Reads and writes the JSON snapshot document holding a whole database.
 * The snapshot location is always passed in by the caller.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { SerializedDatabase } from '../types';
import { SnapshotFormatError, SnapshotIOError } from '../errors';

const dataTypeSchema = z.union([
    z.object({ Int: z.number().int().nonnegative() }).strict(),
    z.object({ Varchar: z.number().int().nonnegative() }).strict(),
]);

const columnSchema = z.object({
    name: z.string().min(1),
    data_type: dataTypeSchema,
    is_primary: z.boolean(),
    not_null: z.boolean(),
});

const tableSchema = z.object({
    name: z.string().min(1),
    columns: z.array(columnSchema),
    data: z.array(z.array(z.string())),
});

export const snapshotSchema = z.object({
    tables: z.array(tableSchema),
});

/**
 * Parse and validate snapshot text.
 */
export function parseSnapshot(json: string, filePath?: string): SerializedDatabase {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (cause) {
        throw new SnapshotFormatError(
            `Snapshot is not valid JSON: ${cause instanceof Error ? cause.message : String(cause)}`,
            filePath
        );
    }

    const result = snapshotSchema.safeParse(parsed);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join(', ');
        throw new SnapshotFormatError(`Snapshot validation failed: ${issues}`, filePath);
    }

    return result.data;
}

/**
 * Read a snapshot file. Returns undefined when the file does not exist.
 */
export function readSnapshot(filePath: string): SerializedDatabase | undefined {
    if (!fs.existsSync(filePath)) {
        return undefined;
    }

    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (cause) {
        throw new SnapshotIOError(
            `Failed to read snapshot ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
            filePath
        );
    }

    return parseSnapshot(content, filePath);
}

/**
 * Write a snapshot file, creating parent directories as needed.
 */
export function writeSnapshot(filePath: string, snapshot: SerializedDatabase): void {
    try {
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2));
    } catch (cause) {
        throw new SnapshotIOError(
            `Failed to save database to ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
            filePath
        );
    }
}
