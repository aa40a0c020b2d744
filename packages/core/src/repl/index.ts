/**
 * Cellar - Interactive REPL
 *
 * Provides a command-line interface for interacting with the database.
 *
 * Features:
 * - Multi-line SQL input (use semicolon to execute)
 * - Pretty-printed table results
 * - Command history with `!!` and `!N` recall
 * - Special commands: .help, .tables, .describe, .save, .load, .history, .quit
 * - Autosave to the snapshot path after every executed batch
 */

import * as readline from 'readline';
import { Database } from '../storage/Database';
import { QueryExecutor } from '../engine/QueryExecutor';
import { ScriptRunner, type OutputSink } from '../engine/ScriptRunner';
import { CommandHistory, DEFAULT_HISTORY_SIZE } from './CommandHistory';
import type { ExecutionResult } from '../types';

const BANNER = `
╔═══════════════════════════════════════════════════════════════╗
║                                                               ║
║    ██████╗███████╗██╗     ██╗      █████╗ ██████╗             ║
║   ██╔════╝██╔════╝██║     ██║     ██╔══██╗██╔══██╗            ║
║   ██║     █████╗  ██║     ██║     ███████║██████╔╝            ║
║   ██║     ██╔══╝  ██║     ██║     ██╔══██║██╔══██╗            ║
║   ╚██████╗███████╗███████╗███████╗██║  ██║██║  ██║            ║
║    ╚═════╝╚══════╝╚══════╝╚══════╝╚═╝  ╚═╝╚═╝  ╚═╝            ║
║                                                               ║
║   A small in-memory relational store                          ║
║   Type .help for commands, or enter SQL to execute            ║
║                                                               ║
╚═══════════════════════════════════════════════════════════════╝
`;

const HELP_TEXT = `
Cellar REPL Commands:
  .help          Show this help message
  .tables        List all tables
  .describe <t>  Describe table structure
  .save [path]   Save database to file
  .load [path]   Load database from file
  .history       Show command history (!! repeats the last, !N the N-th)
  .clear         Clear the screen
  .quit          Exit the REPL

SQL Commands (end with semicolon):
  CREATE TABLE name (col INT PRIMARY KEY, col2 VARCHAR(50) NOT NULL, ...);
  INSERT INTO name [(col1, ...)] VALUES (val1, ...), (...);
  SELECT col1, ... | * FROM table [WHERE cond] [ORDER BY col [ASC|DESC], ...];
  UPDATE table SET col = val, ... [WHERE cond];
  DELETE FROM table [WHERE cond];
  DROP TABLE [IF EXISTS] name, ...;
  SELECT 1 + 2 * 3;

Data Types: INT, VARCHAR(n)
Constraints: PRIMARY KEY, NOT NULL
Conditions: = > < IS NULL, IS NOT NULL, AND, OR, parentheses

Examples:
  CREATE TABLE users (id INT PRIMARY KEY, name VARCHAR(50), age INT);
  INSERT INTO users VALUES (1, 'Alice', 30);
  SELECT * FROM users WHERE age > 25 ORDER BY name;
`;

export interface REPLOptions {
    database?: Database;
    /** Snapshot used by .save/.load and autosave. Autosave is off without it. */
    persistPath?: string;
    autosave?: boolean;
    historySize?: number;
    input?: NodeJS.ReadableStream;
    promptOutput?: NodeJS.WritableStream;
    output?: OutputSink;
}

export class REPL {
    private database: Database;
    private executor: QueryExecutor;
    private runner: ScriptRunner;
    private history: CommandHistory;
    private output: OutputSink;
    private rl: readline.Interface;
    private buffer: string;
    private persistPath: string | undefined;
    private autosave: boolean;
    private isRunning: boolean;

    constructor(options: REPLOptions = {}) {
        this.database = options.database ?? new Database();
        this.executor = new QueryExecutor(this.database);
        this.output = options.output ?? console;
        this.runner = new ScriptRunner(this.executor, this.output);
        this.history = new CommandHistory(options.historySize ?? DEFAULT_HISTORY_SIZE);
        this.buffer = '';
        this.persistPath = options.persistPath;
        this.autosave = options.autosave ?? true;
        this.isRunning = false;

        this.rl = readline.createInterface({
            input: options.input ?? process.stdin,
            output: options.promptOutput ?? process.stdout,
        });
    }

    /**
     * Start the REPL. Resolves once the input closes or .quit is entered.
     */
    start(): Promise<void> {
        this.isRunning = true;
        this.output.log(BANNER);
        this.prompt();

        this.rl.on('line', (line) => {
            this.handleLine(line);
        });

        return new Promise(resolve => {
            this.rl.on('close', () => {
                this.isRunning = false;
                this.output.log('\nGoodbye! 👋\n');
                resolve();
            });
        });
    }

    /**
     * Get the command history.
     */
    getHistory(): CommandHistory {
        return this.history;
    }

    /**
     * Display the prompt.
     */
    private prompt(): void {
        const promptChar = this.buffer ? '...> ' : 'sql> ';
        this.rl.setPrompt(promptChar);
        this.rl.prompt();
    }

    /**
     * Handle a line of input.
     */
    handleLine(line: string): void {
        const trimmed = line.trim();

        if (!this.buffer && CommandHistory.isHistoryCommand(trimmed)) {
            this.handleHistoryCommand(trimmed);
        } else if (!this.buffer && trimmed.startsWith('.')) {
            // Check for special commands
            this.history.add(trimmed);
            this.handleCommand(trimmed);
        } else {
            // Accumulate SQL
            this.buffer += (this.buffer ? '\n' : '') + line;

            // Check if statement is complete (ends with semicolon)
            if (this.buffer.trim().endsWith(';')) {
                this.executeBuffer();
            }
        }

        if (this.isRunning) {
            this.prompt();
        }
    }

    /**
     * Execute accumulated SQL.
     */
    private executeBuffer(): void {
        const sql = this.buffer.trim();
        this.buffer = '';

        if (!sql || sql === ';') {
            return;
        }

        this.history.add(sql);
        this.runner.run(sql);
        this.saveIfEnabled();
    }

    private handleHistoryCommand(command: string): void {
        const lower = command.toLowerCase();
        if (lower === 'history' || lower === '.history') {
            const lines = this.history.format();
            if (lines.length === 0) {
                this.output.log('(history is empty)');
            }
            for (const line of lines) {
                this.output.log(line);
            }
            return;
        }

        const recalled = this.history.recall(command);
        if (recalled === undefined) {
            this.output.error(`❌ Error: No history entry for '${command}'`);
            return;
        }

        this.output.log(recalled);
        if (recalled.startsWith('.')) {
            this.history.add(recalled);
            this.handleCommand(recalled);
        } else {
            this.buffer = recalled;
            this.executeBuffer();
        }
    }

    /**
     * Handle special commands.
     */
    private handleCommand(command: string): void {
        const parts = command.split(/\s+/);
        const cmd = parts[0].toLowerCase();
        const arg = parts.slice(1).join(' ');

        switch (cmd) {
            case '.help':
                this.output.log(HELP_TEXT);
                break;

            case '.tables':
                this.runner.print(this.executor.listTables());
                break;

            case '.describe':
                if (!arg) {
                    this.output.log('Usage: .describe <table_name>');
                } else {
                    this.runner.print(this.executor.describeTable(arg));
                }
                break;

            case '.save':
                this.runPathCommand(arg, path => this.executor.save(path));
                break;

            case '.load':
                this.runPathCommand(arg, path => this.executor.load(path));
                break;

            case '.clear':
                console.clear();
                break;

            case '.quit':
            case '.exit':
                this.close();
                break;

            default:
                this.output.log(`Unknown command: ${cmd}. Type .help for available commands.`);
        }
    }

    private runPathCommand(arg: string, run: (path: string) => ExecutionResult): void {
        const path = arg || this.persistPath;
        if (path === undefined) {
            this.output.log('Usage: .save <path> / .load <path> (no default snapshot path)');
            return;
        }
        this.runner.print(run(path));
    }

    private saveIfEnabled(): void {
        if (!this.autosave || this.persistPath === undefined) {
            return;
        }
        const result = this.executor.save(this.persistPath);
        if (!result.success) {
            console.warn(`Autosave failed: ${result.error}`);
        }
    }

    /**
     * Quit the REPL.
     */
    close(): void {
        this.isRunning = false;
        this.rl.close();
    }
}

export { CommandHistory } from './CommandHistory';
