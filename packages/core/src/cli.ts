#!/usr/bin/env node
/**
 * Cellar CLI
 *
 * Commands:
 *   cellar                  Start the interactive REPL
 *   cellar <script.sql>     Run a script against the snapshot and exit
 *
 * Options:
 *   --db <path>             Snapshot file (default: CELLAR_DB_PATH or data/db.json)
 *   --no-save               Do not write the snapshot back
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { Database } from './storage/Database';
import { QueryExecutor } from './engine/QueryExecutor';
import { ScriptRunner } from './engine/ScriptRunner';
import { REPL } from './repl';
import { getConfig } from './config';
import { describeError } from './errors';

interface CliOptions {
    db?: string;
    save: boolean;
}

/**
 * Load the snapshot, run the script, and write the snapshot back.
 * Returns the process exit code.
 */
export function runScript(scriptPath: string, dbPath: string, save: boolean): number {
    const fullPath = resolve(process.cwd(), scriptPath);
    if (!existsSync(fullPath)) {
        console.error(`❌ Error: Script file not found: ${fullPath}`);
        return 1;
    }

    const database = Database.open(dbPath);
    const executor = new QueryExecutor(database);
    const ok = new ScriptRunner(executor).run(readFileSync(fullPath, 'utf8'));

    if (save) {
        const result = executor.save(dbPath);
        if (!result.success) {
            console.error(`❌ Error: ${result.error}`);
            return 1;
        }
    }

    return ok ? 0 : 1;
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name('cellar')
        .description('Small in-memory relational store with JSON snapshots')
        .version('0.1.0')
        .argument('[script]', 'SQL script to run instead of starting the REPL')
        .option('--db <path>', 'Snapshot file to load and save')
        .option('--no-save', 'Do not write the snapshot back')
        .action(async (script: string | undefined, options: CliOptions) => {
            const config = getConfig();
            const dbPath = options.db ?? config.dbPath;

            if (script !== undefined) {
                process.exitCode = runScript(script, dbPath, options.save);
                return;
            }

            const repl = new REPL({
                database: Database.open(dbPath),
                persistPath: dbPath,
                autosave: options.save,
                historySize: config.historySize,
            });
            await repl.start();
        });

    return program;
}

if (require.main === module) {
    createProgram()
        .parseAsync()
        .catch((error: unknown) => {
            console.error(`❌ Error: ${describeError(error).message}`);
            process.exitCode = 1;
        });
}
