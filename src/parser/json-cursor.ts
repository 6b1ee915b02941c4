/**
 * Cursor resolution for JSON dialects (comments and trailing commas allowed).
 */

import { getLocation, parseTree, findNodeAtLocation, Node as JsonNode } from 'jsonc-parser';
import { CursorResolution, PartialToken, StructuralPath } from './types';
import { scanSelector } from './selector-scan';

const BARE_TOKEN_CHAR = /[\w.$+-]/;

/**
 * Resolve the structural path and partial token at `offset`.
 */
export function resolveJsonCursor(text: string, offset: number): CursorResolution {
    const location = getLocation(text, offset);
    const path: StructuralPath = [...location.path];
    const node = location.previousNode;
    const stringStart = node ? openStringStart(text, node, offset) : -1;

    let position: PartialToken['position'] = location.isAtPropertyKey ? 'key' : 'value';
    if (stringStart === -1 && node && followsClosedString(text, node, offset)) {
        position = 'unknown';
    }

    let token: PartialToken;
    if (stringStart !== -1) {
        const raw = text.substring(stringStart, offset);
        token = {
            text: unescapeJsonString(raw),
            start: stringStart,
            end: offset,
            quote: '"',
            position,
            ...scanSelector(raw, stringStart),
        };
    } else {
        let start = offset;
        while (start > 0 && BARE_TOKEN_CHAR.test(text[start - 1])) {
            start--;
        }
        const raw = text.substring(start, offset);
        token = {
            text: raw,
            start,
            end: offset,
            quote: null,
            position,
            ...scanSelector(raw, start),
        };
    }

    const siblingKeys = position === 'key' ? collectSiblingKeys(text, path.slice(0, -1), offset) : [];

    return { path, token, siblingKeys, malformed: false };
}

/**
 * If the cursor is inside the string literal `node`, return the offset right
 * after its opening quote, otherwise -1.
 */
function openStringStart(text: string, node: JsonNode, offset: number): number {
    if (text[node.offset] !== '"') return -1;
    if (offset <= node.offset) return -1;

    const raw = text.substring(node.offset, node.offset + node.length);
    const nodeEnd = node.offset + node.length;
    if (isClosedString(raw)) {
        return offset < nodeEnd ? node.offset + 1 : -1;
    }
    return offset <= nodeEnd ? node.offset + 1 : -1;
}

/**
 * The cursor is past the closing quote of `node`, with only whitespace between.
 */
function followsClosedString(text: string, node: JsonNode, offset: number): boolean {
    if (text[node.offset] !== '"') return false;
    const nodeEnd = node.offset + node.length;
    if (offset < nodeEnd) return false;
    return isClosedString(text.substring(node.offset, nodeEnd)) && text.substring(nodeEnd, offset).trim() === '';
}

/**
 * Check whether a raw string literal (including its opening quote) is closed.
 */
export function isClosedString(raw: string): boolean {
    if (raw.length < 2) return false;
    let escaped = false;
    for (let i = 1; i < raw.length; i++) {
        const char = raw[i];
        if (escaped) {
            escaped = false;
        } else if (char === '\\') {
            escaped = true;
        } else if (char === '"') {
            return i === raw.length - 1;
        }
    }
    return false;
}

const JSON_ESCAPES: Record<string, string> = {
    n: '\n',
    t: '\t',
    r: '\r',
    b: '\b',
    f: '\f',
};

/**
 * Unescape the body of a (possibly unterminated) JSON string.
 */
export function unescapeJsonString(raw: string): string {
    return raw
        .replace(/\\u([0-9a-fA-F]{4})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)))
        .replace(/\\(.)/g, (_, char: string) => JSON_ESCAPES[char] ?? char)
        .replace(/\\$/, '');
}

function collectSiblingKeys(text: string, parentPath: StructuralPath, offset: number): string[] {
    const tree = parseTree(text);
    if (!tree) return [];
    const container = parentPath.length === 0 ? tree : findNodeAtLocation(tree, [...parentPath]);
    if (!container || container.type !== 'object' || !container.children) return [];

    const keys: string[] = [];
    for (const property of container.children) {
        const keyNode = property.children?.[0];
        if (!keyNode || typeof keyNode.value !== 'string') continue;
        const containsCursor = offset >= keyNode.offset && offset <= keyNode.offset + keyNode.length;
        if (!containsCursor) {
            keys.push(keyNode.value);
        }
    }
    return keys;
}
