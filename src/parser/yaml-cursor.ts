/**
 * Cursor resolution for YAML syntax definitions.
 *
 * Nesting is recovered from indentation by walking upward from the cursor
 * line, so the rest of the document may be incomplete or invalid.
 */

import { CursorResolution, PartialToken, PathSegment } from './types';
import { scanSelector } from './selector-scan';

/** Structural element found on a line */
export interface LineEntry {
    kind: 'dash' | 'key';
    col: number;
    key?: string;
    /** A scalar or flow value follows the colon on the same line */
    hasValue?: boolean;
    /** The value is a block scalar indicator (`|`, `>-`, ...) */
    blockScalar?: boolean;
}

const KEY_PATTERN = /^("(?:[^"\\]|\\.)*"|'(?:[^']|'')*'|[^\s#:'"\-[\]{},][^:#]*?|-[^\s:#][^:#]*?)\s*:(?=\s|$)/;
const BLOCK_SCALAR = /^[|>][-+0-9]*\s*(#.*)?$/;

/**
 * Split a line into its dash and key entries.
 */
export function parseLineEntries(line: string): LineEntry[] {
    const entries: LineEntry[] = [];
    let i = 0;
    while (i < line.length && line[i] === ' ') i++;
    if (i >= line.length || line[i] === '#' || line.startsWith('---') || line.startsWith('%')) {
        return entries;
    }

    while (line[i] === '-' && (i + 1 === line.length || /\s/.test(line[i + 1]))) {
        entries.push({ kind: 'dash', col: i });
        i++;
        while (i < line.length && /\s/.test(line[i])) i++;
    }

    const keyMatch = KEY_PATTERN.exec(line.substring(i));
    if (keyMatch) {
        const rest = line.substring(i + keyMatch[0].length).trim();
        const hasValue = rest.length > 0 && !rest.startsWith('#');
        entries.push({
            kind: 'key',
            col: i,
            key: unquoteKey(keyMatch[1].trim()),
            hasValue,
            blockScalar: hasValue && BLOCK_SCALAR.test(rest),
        });
    }
    return entries;
}

function unquoteKey(key: string): string {
    if (key.length >= 2 && key.startsWith('"') && key.endsWith('"')) {
        return key.slice(1, -1).replace(/\\(.)/g, '$1');
    }
    if (key.length >= 2 && key.startsWith("'") && key.endsWith("'")) {
        return key.slice(1, -1).replace(/''/g, "'");
    }
    return key;
}

interface Need {
    type: 'map' | 'seq';
    col: number;
}

/**
 * Resolve the structural path and partial token at `offset`.
 */
export function resolveYamlCursor(text: string, offset: number): CursorResolution {
    const lines = text.substring(0, offset).split('\n');
    const cursorLine = lines.length - 1;
    const prefix = lines[cursorLine];
    const lineStart = offset - prefix.length;
    const allLines = text.split('\n');

    const reversed: PathSegment[] = [];
    let malformed = false;

    // Dashes that open sequence items on the cursor line
    let i = 0;
    while (i < prefix.length && prefix[i] === ' ') i++;
    const dashCols: number[] = [];
    while (prefix[i] === '-' && (i + 1 === prefix.length || /\s/.test(prefix[i + 1]))) {
        dashCols.push(i);
        i++;
        while (i < prefix.length && /\s/.test(prefix[i])) i++;
    }
    const contentCol = i;
    const content = prefix.substring(contentCol);

    let token: PartialToken;
    const keyMatch = KEY_PATTERN.exec(content);
    if (keyMatch && !content.trimStart().startsWith('#')) {
        const key = unquoteKey(keyMatch[1].trim());
        const valueText = content.substring(keyMatch[0].length);
        const valueToken = readValueToken(valueText, lineStart + contentCol + keyMatch[0].length);
        if (valueToken.index !== null) {
            reversed.push(valueToken.index);
        }
        reversed.push(key);
        token = valueToken.token;
    } else {
        token = readKeyToken(content, lineStart + contentCol);
        reversed.push(token.text);
    }

    let need: Need = { type: 'map', col: contentCol };
    for (let d = dashCols.length - 1; d >= 0; d--) {
        reversed.push(countPreviousItems(allLines, dashCols[d], cursorLine));
        need = { type: 'seq', col: dashCols[d] };
    }

    let firstAncestor = true;
    for (let l = cursorLine - 1; l >= 0 && need.col > 0; l--) {
        const entries = parseLineEntries(allLines[l]);
        if (entries.length === 0) continue;

        const parent = findParentEntry(entries, need);
        if (!parent) continue;

        if (parent.kind === 'key') {
            if (parent.blockScalar && firstAncestor && need.type === 'map') {
                // The cursor line is text inside a block scalar value
                const trimmed = prefix.trimStart();
                const start = offset - trimmed.length;
                reversed.length = 0;
                token = {
                    text: trimmed,
                    start,
                    end: offset,
                    quote: null,
                    position: 'value',
                    ...scanSelector(trimmed, start),
                };
            } else if (parent.hasValue) {
                malformed = true;
                break;
            }
            reversed.push(parent.key ?? '');
            need = { type: 'map', col: parent.col };
        } else {
            reversed.push(countPreviousItems(allLines, parent.col, l));
            need = { type: 'seq', col: parent.col };
        }
        firstAncestor = false;
    }

    const path = reversed.reverse();
    const siblingKeys = token.position === 'key'
        ? collectSiblingKeys(allLines, cursorLine, contentCol)
        : [];

    return { path, token, siblingKeys, malformed };
}

/**
 * The entry on a line above that owns a mapping or sequence at `need.col`.
 */
function findParentEntry(entries: LineEntry[], need: Need): LineEntry | null {
    let parent: LineEntry | null = null;
    for (const entry of entries) {
        if (entry.col < need.col) {
            parent = entry;
        } else if (
            need.type === 'seq' &&
            entry.col === need.col &&
            entry.kind === 'key' &&
            !entry.hasValue
        ) {
            // Compact notation: `key:` directly followed by `- item` at the same indentation
            parent = entry;
        }
    }
    return parent;
}

/**
 * Count sequence items at column `col` above `line` belonging to the same sequence.
 */
function countPreviousItems(lines: string[], col: number, line: number): number {
    let count = 0;
    for (let l = line - 1; l >= 0; l--) {
        const entries = parseLineEntries(lines[l]);
        if (entries.length === 0) continue;

        if (entries.some(e => e.kind === 'dash' && e.col === col)) {
            count++;
        }
        const closesSequence = entries.some(e => e.col < col) ||
            entries.some(e => e.kind === 'key' && e.col === col);
        if (closesSequence) break;
    }
    return count;
}

function collectSiblingKeys(lines: string[], cursorLine: number, mapCol: number): string[] {
    const keys: string[] = [];
    const visit = (l: number): boolean => {
        const entries = parseLineEntries(lines[l]);
        if (entries.length === 0) return true;
        for (const entry of entries) {
            if (entry.kind === 'key' && entry.col === mapCol && entry.key !== undefined) {
                keys.push(entry.key);
            }
        }
        return !entries.some(e => e.col < mapCol);
    };

    for (let l = cursorLine - 1; l >= 0; l--) {
        if (!visit(l)) break;
    }
    for (let l = cursorLine + 1; l < lines.length; l++) {
        const entries = parseLineEntries(lines[l]);
        if (entries.some(e => e.col < mapCol)) break;
        visit(l);
    }
    return keys;
}

function readKeyToken(content: string, start: number): PartialToken {
    let text = content;
    let tokenStart = start;
    let quote: '"' | "'" | null = null;
    if (text.startsWith('"') || text.startsWith("'")) {
        quote = text[0] === '"' ? '"' : "'";
        text = text.substring(1);
        tokenStart++;
    }
    return {
        text,
        start: tokenStart,
        end: start + content.length,
        quote,
        position: 'key',
        ...scanSelector(text, tokenStart),
    };
}

/**
 * Read the value typed after `key:`. Flow sequences (`[a, b`) add an index.
 */
function readValueToken(valueText: string, valueOffset: number): { token: PartialToken; index: number | null } {
    const end = valueOffset + valueText.length;
    let i = 0;
    while (i < valueText.length && /\s/.test(valueText[i])) i++;

    let index: number | null = null;
    if (valueText[i] === '[') {
        let depth = 0;
        let commas = 0;
        let itemStart = i + 1;
        for (let j = i; j < valueText.length; j++) {
            const char = valueText[j];
            if (char === '[') depth++;
            else if (char === ']') depth--;
            else if (char === ',' && depth === 1) {
                commas++;
                itemStart = j + 1;
            }
        }
        if (depth > 0) {
            index = commas;
            i = itemStart;
            while (i < valueText.length && /\s/.test(valueText[i])) i++;
        }
    }

    let quote: '"' | "'" | null = null;
    if (valueText[i] === '"' || valueText[i] === "'") {
        quote = valueText[i] === '"' ? '"' : "'";
        i++;
    }

    let raw = valueText.substring(i);
    let position: PartialToken['position'] = 'value';
    if (quote === null && /(^|\s)#/.test(raw)) {
        position = 'unknown';
    }
    if (quote !== null && hasClosingQuote(raw, quote)) {
        position = 'unknown';
    }
    if (quote === "'") {
        raw = raw.replace(/''/g, "'");
    } else if (quote === '"') {
        raw = raw.replace(/\\(.)/g, '$1');
    }

    const start = valueOffset + i;
    const rawBeforeCursor = valueText.substring(i);
    return {
        index,
        token: {
            text: raw,
            start,
            end,
            quote,
            position,
            ...scanSelector(rawBeforeCursor, start),
        },
    };
}

function hasClosingQuote(raw: string, quote: '"' | "'"): boolean {
    for (let i = 0; i < raw.length; i++) {
        if (quote === '"' && raw[i] === '\\') {
            i++;
            continue;
        }
        if (raw[i] === quote) {
            if (quote === "'" && raw[i + 1] === "'") {
                i++;
                continue;
            }
            return true;
        }
    }
    return false;
}
