/**
 * Cellar - Script Runner
 *
 * Runs a multi-statement script through a QueryExecutor and prints each
 * result the way the shell does. The first failing statement stops the run.
 */

import { QueryExecutor } from './QueryExecutor';
import { splitStatements } from '../parser/splitStatements';
import { formatTable } from '../format/TableFormatter';
import type { ExecutionResult } from '../types';

/**
 * Where output goes. `console` satisfies this.
 */
export interface OutputSink {
    log(message: string): void;
    error(message: string): void;
}

export class ScriptRunner {
    private executor: QueryExecutor;
    private output: OutputSink;

    constructor(executor: QueryExecutor, output: OutputSink = console) {
        this.executor = executor;
        this.output = output;
    }

    /**
     * Run every statement in the script. Returns false if one failed.
     */
    run(script: string): boolean {
        for (const statement of splitStatements(script)) {
            const result = this.executor.execute(statement);
            this.print(result);
            if (!result.success) {
                return false;
            }
        }
        return true;
    }

    /**
     * Print query result.
     */
    print(result: ExecutionResult): void {
        if (!result.success) {
            this.output.error(`❌ Error: ${result.error}`);
            return;
        }

        if (result.rows !== undefined) {
            if (result.rows.length === 0) {
                this.output.log('(empty result set)');
                return;
            }
            for (const line of formatTable(result.columns ?? [], result.rows)) {
                this.output.log(line);
            }
            this.output.log(`✓ ${result.rows.length} row(s) returned`);
        } else if (result.message) {
            this.output.log(`✓ ${result.message}`);
        } else {
            this.output.log('✓ Query executed');
        }
    }
}
