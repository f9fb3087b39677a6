/**
 * Line Model for Indentation-Based YAML Scanning
 *
 * A minimal structural view of a manifest: one record per line carrying its
 * indentation, trimmed content and list-item flag. Every rewrite pass locates
 * keys and block extents through these helpers instead of a full YAML parser.
 */

// ==========================================
// TYPES
// ==========================================

export interface LineRecord {
    /** 0-indexed position in the document */
    index: number;
    /** Original text of the line */
    content: string;
    trimmed: string;
    /** Leading whitespace of the line */
    indentText: string;
    /** Width of the leading whitespace */
    indent: number;
    /** Line starts with a `- ` sequence entry */
    isListItem: boolean;
    /** Mapping key on this line (after the dash for list items) */
    key: string | null;
    value: string | null;
    /** Column where the key (or the list item body) starts */
    keyColumn: number;
}

/**
 * How same-column lines are treated when measuring a block.
 * - `mapping`: any line at the key column is a sibling and ends the block
 * - `sequence`: `-` items at the key column belong to the block
 */
export type BlockMode = 'mapping' | 'sequence';

export interface IndentBlock {
    /** Line of the key itself */
    start: number;
    /** First line after the block (exclusive) */
    end: number;
    keyColumn: number;
    indentText: string;
}

export interface ContainerRange {
    /** Line holding the `- ` that opens the container item */
    start: number;
    end: number;
    /** Column of the container's own keys */
    keyColumn: number;
    /** Line holding `name: <container>` */
    nameLine: number;
}

// ==========================================
// CONSTANTS
// ==========================================

const KEY_PATTERN = /^([A-Za-z0-9_.\/-]+):(?:[ \t]+(.*))?$/;

// ==========================================
// LINE HELPERS
// ==========================================

export function splitLines(content: string): string[] {
    return content.split('\n');
}

export function leadingWhitespace(line: string): string {
    return line.match(/^[ \t]*/)?.[0] ?? '';
}

export function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function toLineRecord(line: string, index: number): LineRecord {
    const indentText = leadingWhitespace(line);
    const trimmed = line.trim();
    const isListItem = trimmed === '-' || trimmed.startsWith('- ');
    const body = isListItem ? trimmed.slice(1).trimStart() : trimmed;
    const keyMatch = body.match(KEY_PATTERN);

    return {
        index,
        content: line,
        trimmed,
        indentText,
        indent: indentText.length,
        isListItem,
        key: keyMatch ? keyMatch[1] : null,
        value: keyMatch?.[2] !== undefined && keyMatch[2] !== '' ? keyMatch[2] : null,
        keyColumn: indentText.length + (trimmed.length - body.length)
    };
}

/**
 * Whitespace that puts a new line at the record's key column. For `- key:`
 * lines the dash is replaced by spaces.
 */
export function keyIndentOf(record: LineRecord): string {
    return record.isListItem ? ' '.repeat(record.keyColumn) : record.indentText;
}

/**
 * Text of the line up to (not including) its key, so `      - env: []`
 * yields `      - `.
 */
export function keyPrefixOf(record: LineRecord): string {
    return record.content.slice(0, record.keyColumn);
}

// ==========================================
// BLOCK LOCATOR
// ==========================================

/**
 * Measures the value block introduced by the key on `keyIndex`.
 *
 * The scan stops at the first blank line, the first line indented less than
 * the key column, or a same-column line that is not part of the value
 * (depending on `mode`). Reaching the end of the document ends the block.
 * A key with no body yields `end === start + 1`.
 */
export function locateBlock(lines: readonly string[], keyIndex: number, mode: BlockMode = 'mapping'): IndentBlock {
    const key = toLineRecord(lines[keyIndex], keyIndex);

    let end = keyIndex + 1;
    for (; end < lines.length; end++) {
        const line = toLineRecord(lines[end], end);
        if (line.trimmed === '') break;
        if (line.indent < key.keyColumn) break;
        if (line.indent === key.keyColumn && (mode === 'mapping' || !line.isListItem)) break;
    }

    return {
        start: keyIndex,
        end,
        keyColumn: key.keyColumn,
        indentText: key.indentText
    };
}

// ==========================================
// CONTAINER LOOKUP
// ==========================================

/**
 * Finds the list item of the container called `name`, whether the name sits
 * on the dash line (`- name: manager`) or among the item's other keys.
 */
export function findContainer(lines: readonly string[], name: string): ContainerRange | null {
    for (let i = 0; i < lines.length; i++) {
        const record = toLineRecord(lines[i], i);
        if (record.key !== 'name' || record.value !== name) continue;

        const start = record.isListItem ? i : findItemStart(lines, i, record.keyColumn);
        if (start === null) continue;

        let end = start + 1;
        for (; end < lines.length; end++) {
            const line = toLineRecord(lines[end], end);
            if (line.trimmed === '' || line.indent < record.keyColumn) break;
        }

        return { start, end, keyColumn: record.keyColumn, nameLine: i };
    }

    return null;
}

function findItemStart(lines: readonly string[], from: number, keyColumn: number): number | null {
    for (let j = from - 1; j >= 0; j--) {
        const line = toLineRecord(lines[j], j);
        if (line.trimmed === '') return null;
        if (line.isListItem && line.keyColumn === keyColumn) return j;
        if (line.indent < keyColumn) return null;
    }
    return null;
}

/**
 * First line inside `range` whose key is `key` at the container's key column.
 */
export function findKeyLine(lines: readonly string[], range: ContainerRange, key: string): number | null {
    for (let i = range.start; i < range.end; i++) {
        const record = toLineRecord(lines[i], i);
        if (record.key === key && record.keyColumn === range.keyColumn) return i;
    }
    return null;
}
