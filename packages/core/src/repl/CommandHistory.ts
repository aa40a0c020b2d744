/**
 * Cellar - Command History
 *
 * Bounded list of previously entered commands for the REPL, with `!!` and
 * `!N` recall.
 */

export const DEFAULT_HISTORY_SIZE = 100;

const RECALL_PATTERN = /^!(!|\d+)$/;

export class CommandHistory {
    private entries: string[] = [];
    private maxSize: number;

    constructor(maxSize: number = DEFAULT_HISTORY_SIZE) {
        this.maxSize = maxSize;
    }

    /**
     * Whether the input is a history command rather than something to record.
     */
    static isHistoryCommand(input: string): boolean {
        const trimmed = input.trim();
        const lower = trimmed.toLowerCase();
        return lower === 'history' || lower === '.history' || RECALL_PATTERN.test(trimmed);
    }

    /**
     * Record a command. Returns false when it was skipped.
     */
    add(command: string): boolean {
        let entry = command.trim();
        if (entry === '' || CommandHistory.isHistoryCommand(entry)) {
            return false;
        }
        if (!entry.startsWith('.') && !entry.endsWith(';')) {
            entry += ';';
        }
        if (this.entries[this.entries.length - 1] === entry) {
            return false;
        }

        this.entries.push(entry);
        if (this.entries.length > this.maxSize) {
            this.entries.splice(0, this.entries.length - this.maxSize);
        }
        return true;
    }

    /**
     * Resolve `!!` or `!N` (1-based) to a stored command.
     */
    recall(input: string): string | undefined {
        const match = RECALL_PATTERN.exec(input.trim());
        if (!match) {
            return undefined;
        }
        if (match[1] === '!') {
            return this.entries[this.entries.length - 1];
        }
        const index = Number(match[1]);
        return index >= 1 ? this.entries[index - 1] : undefined;
    }

    getEntries(): readonly string[] {
        return this.entries;
    }

    size(): number {
        return this.entries.length;
    }

    clear(): void {
        this.entries = [];
    }

    /**
     * Numbered lines for display.
     */
    format(): string[] {
        return this.entries.map((entry, i) => `${String(i + 1).padStart(4)}  ${entry}`);
    }
}
