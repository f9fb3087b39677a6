/**
 * Formatting Cleanup
 */

import { CLOSE_GUARD, OPEN_GUARD_MARKER } from '../templater/directives.js';
import { splitLines } from '../parser/line-model.js';

/**
 * Drops one blank line directly after an opening `{{- if ... }}` and a blank
 * line directly before a `{{- end }}`. Other blank lines are kept.
 */
export function collapseBlankLineAfterIf(content: string): string {
    const lines = splitLines(content);
    const output: string[] = [];

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];

        if (line.includes(OPEN_GUARD_MARKER)) {
            output.push(line);
            if (i + 1 < lines.length && lines[i + 1].trim() === '') i++;
            continue;
        }

        if (line.trim() === '' && i + 1 < lines.length && lines[i + 1].includes(CLOSE_GUARD)) {
            continue;
        }

        output.push(line);
    }

    return output.join('\n');
}
