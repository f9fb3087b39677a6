/**
 * Re-entry Probes
 *
 * Every pass that replaces a block or wraps a span checks for its own output
 * before acting, so running the templater on its own output changes nothing.
 */

import { openGuard, type GuardCondition } from './directives.js';
import { splitLines } from '../parser/line-model.js';

export const DEFAULT_LOOKAHEAD = 5;

/**
 * A located replacement: lines `[start, end)` become `replacement`.
 * `start === end` inserts.
 */
export interface BlockEdit {
    start: number;
    end: number;
    replacement: string[];
}

export type BlockLocator = (lines: string[]) => BlockEdit | null;

/**
 * Lines `[start, end + lookahead)`, clipped to the document.
 */
export function probeWindow(
    lines: readonly string[],
    start: number,
    end: number,
    lookahead: number = DEFAULT_LOOKAHEAD
): readonly string[] {
    return lines.slice(start, Math.min(lines.length, end + lookahead));
}

export function hasMarker(
    lines: readonly string[],
    start: number,
    end: number,
    marker: string,
    lookahead: number = DEFAULT_LOOKAHEAD
): boolean {
    return probeWindow(lines, start, end, lookahead).some((line) => line.includes(marker));
}

/**
 * True when the line right above `index` opens a guard on `condition`.
 */
export function isGuardedBy(lines: readonly string[], index: number, condition: GuardCondition): boolean {
    return index > 0 && lines[index - 1].trim() === openGuard(condition);
}

/**
 * Builds a pass from a block locator: the located edit is applied unless the
 * probe window around it already holds `marker`.
 */
export function guardedBlockEdit(
    marker: string,
    locate: BlockLocator,
    lookahead: number = DEFAULT_LOOKAHEAD
): (content: string) => string {
    return (content: string): string => {
        const lines = splitLines(content);
        const edit = locate(lines);
        if (!edit) return content;
        if (hasMarker(lines, edit.start, edit.end, marker, lookahead)) return content;

        return [
            ...lines.slice(0, edit.start),
            ...edit.replacement,
            ...lines.slice(edit.end)
        ].join('\n');
    };
}
