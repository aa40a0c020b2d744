/**
 * Cellar - Result table formatting
 *
 * Renders result rows as a box-drawing table:
 *
 *   ┌─────┬───────┐
 *   │ id  │ name  │
 *   ├─────┼───────┤
 *   │ 1   │ Alice │
 *   └─────┴───────┘
 */

import { isNullCell } from '../constraints/ConstraintEnforcer';
import type { Row } from '../types';

const MIN_COLUMN_WIDTH = 3;

/**
 * Format a value for display.
 */
function formatCell(cell: string | undefined): string {
    if (cell === undefined || isNullCell(cell)) {
        return 'NULL';
    }
    return cell.trim();
}

/**
 * Format rows under the given headers. Returns the table's lines.
 */
export function formatTable(headers: string[], rows: readonly Row[]): string[] {
    const cells = rows.map(row => headers.map((_, i) => formatCell(row[i])));

    // Calculate column widths
    const widths = headers.map((header, i) =>
        Math.max(MIN_COLUMN_WIDTH, header.length, ...cells.map(row => row[i].length))
    );

    const rule = (left: string, middle: string, right: string): string =>
        left + '─' + widths.map(width => '─'.repeat(width)).join('─' + middle + '─') + '─' + right;
    const line = (values: string[]): string =>
        '│ ' + values.map((value, i) => value.padEnd(widths[i])).join(' │ ') + ' │';

    const lines = [rule('┌', '┬', '┐'), line(headers), rule('├', '┼', '┤')];
    for (const row of cells) {
        lines.push(line(row));
    }
    lines.push(rule('└', '┴', '┘'));

    return lines;
}
