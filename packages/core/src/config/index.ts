/**
 * Cellar - Configuration
 *
 * Shell settings read from the environment:
 *
 *   CELLAR_DB_PATH        snapshot file (default data/db.json)
 *   CELLAR_HISTORY_SIZE   REPL history entries kept (default 100)
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { DEFAULT_HISTORY_SIZE } from '../repl/CommandHistory';

export interface CellarConfig {
    dbPath: string;
    historySize: number;
}

export const DEFAULT_CONFIG: Readonly<CellarConfig> = {
    dbPath: 'data/db.json',
    historySize: DEFAULT_HISTORY_SIZE,
};

const envSchema = z.object({
    CELLAR_DB_PATH: z.string().trim().min(1, 'must not be empty').optional(),
    CELLAR_HISTORY_SIZE: z.coerce
        .number()
        .int('must be an integer')
        .positive('must be positive')
        .optional(),
});

/**
 * Build the configuration from environment variables, falling back to
 * DEFAULT_CONFIG for anything unset.
 */
export function getConfig(env: Record<string, string | undefined> = process.env): CellarConfig {
    const result = envSchema.safeParse({
        CELLAR_DB_PATH: env.CELLAR_DB_PATH,
        CELLAR_HISTORY_SIZE: emptyToUndefined(env.CELLAR_HISTORY_SIZE),
    });

    if (!result.success) {
        const issue = result.error.issues[0];
        throw new ConfigurationError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
    }

    return {
        dbPath: result.data.CELLAR_DB_PATH ?? DEFAULT_CONFIG.dbPath,
        historySize: result.data.CELLAR_HISTORY_SIZE ?? DEFAULT_CONFIG.historySize,
    };
}

function emptyToUndefined(value: string | undefined): string | undefined {
    return value === undefined || value.trim() === '' ? undefined : value;
}
