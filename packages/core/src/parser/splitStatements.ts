/**
 * Cellar - Script splitting
 *
 * Splits a script into statements on `;`. Semicolons inside quoted strings,
 * backtick identifiers and comments do not end a statement. Comments are
 * dropped and empty statements are skipped.
 */

export function splitStatements(script: string): string[] {
    const statements: string[] = [];
    let current = '';
    let i = 0;

    const flush = (): void => {
        const statement = current.trim();
        if (statement !== '') {
            statements.push(statement);
        }
        current = '';
    };

    while (i < script.length) {
        const char = script[i];
        const next = script[i + 1];

        if (char === '-' && next === '-') {
            while (i < script.length && script[i] !== '\n') {
                i++;
            }
            continue;
        }

        if (char === '/' && next === '*') {
            const close = script.indexOf('*/', i + 2);
            i = close === -1 ? script.length : close + 2;
            current += ' ';
            continue;
        }

        if (char === "'" || char === '"' || char === '`') {
            const start = i;
            i++;
            while (i < script.length) {
                if (script[i] === char) {
                    // '' inside a string is an escaped quote
                    if (char !== '`' && script[i + 1] === char) {
                        i += 2;
                        continue;
                    }
                    i++;
                    break;
                }
                i++;
            }
            current += script.slice(start, i);
            continue;
        }

        if (char === ';') {
            flush();
            i++;
            continue;
        }

        current += char;
        i++;
    }

    flush();
    return statements;
}
