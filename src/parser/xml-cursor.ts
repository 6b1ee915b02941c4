/**
 * Cursor resolution for property lists and plain XML documents.
 *
 * The document prefix is streamed through htmlparser2 without ending the
 * parse, so elements that are still open at the cursor stay on the stack.
 */

import { Parser } from 'htmlparser2';
import { CursorResolution, PathSegment, PartialToken } from './types';
import { scanSelector } from './selector-scan';

const PLIST_VALUE_TAGS = new Set(['string', 'integer', 'real', 'date', 'data', 'true', 'false']);

interface ElementFrame {
    name: string;
    /** Segment this element adds to the structural path, if any */
    segment: PathSegment | null;
    keys: string[];
    pendingKey: string | null;
    index: number;
    keyText: string;
}

const XML_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
};

/**
 * Decode the predefined XML entities and numeric character references.
 */
export function decodeXmlText(text: string): string {
    return text.replace(/&(#x[0-9a-fA-F]+|#\d+|\w+);/g, (match, entity: string) => {
        if (entity.startsWith('#x')) return String.fromCodePoint(parseInt(entity.substring(2), 16));
        if (entity.startsWith('#')) return String.fromCodePoint(parseInt(entity.substring(1), 10));
        return XML_ENTITIES[entity] ?? match;
    });
}

/**
 * Resolve the structural path and partial token at `offset`.
 * @param plist - Interpret `<dict>`/`<array>`/`<key>` structure; otherwise element names form the path
 */
export function resolveXmlCursor(text: string, offset: number, plist: boolean): CursorResolution {
    const prefix = text.substring(0, offset);
    const stack: ElementFrame[] = [];
    let malformed = false;

    const parser = new Parser({
        onopentag(name) {
            const parent = stack[stack.length - 1];
            let segment: PathSegment | null = null;
            if (!plist) {
                segment = name;
            } else if (parent?.name === 'dict' && name !== 'key') {
                segment = parent.pendingKey ?? '';
            } else if (parent?.name === 'array') {
                segment = parent.index;
            }
            stack.push({ name, segment, keys: [], pendingKey: null, index: 0, keyText: '' });
        },
        ontext(data) {
            const top = stack[stack.length - 1];
            if (top?.name === 'key') {
                top.keyText += data;
            }
        },
        onclosetag() {
            const closed = stack.pop();
            const parent = stack[stack.length - 1];
            if (!plist || !closed || !parent) return;
            if (parent.name === 'dict') {
                if (closed.name === 'key') {
                    parent.pendingKey = closed.keyText.trim();
                    parent.keys.push(parent.pendingKey);
                } else {
                    parent.pendingKey = null;
                }
            } else if (parent.name === 'array') {
                parent.index++;
            }
        },
    }, { xmlMode: true, decodeEntities: true });

    try {
        parser.write(prefix);
    } catch {
        malformed = true;
    }

    const lastGt = prefix.lastIndexOf('>');
    const lastLt = prefix.lastIndexOf('<');
    const segments = stack.flatMap(f => (f.segment === null ? [] : [f.segment]));
    const top = stack[stack.length - 1];

    const trailingStart = lastGt + 1;
    const trailing = prefix.substring(trailingStart);

    if (lastLt > lastGt || !top) {
        // Inside markup, or outside the document element
        return {
            path: segments,
            token: makeToken('', offset, offset, 'unknown', undefined),
            siblingKeys: [],
            malformed,
        };
    }

    if (plist) {
        if (top.name === 'key') {
            const partial = decodeXmlText(trailing);
            const parent = stack[stack.length - 2];
            const keys = [...(parent?.keys ?? []), ...collectFollowingKeys(text.substring(offset))];
            return {
                path: [...segments, partial],
                token: makeToken(partial, trailingStart, offset, 'key', 'key'),
                siblingKeys: keys,
                malformed,
            };
        }
        if (PLIST_VALUE_TAGS.has(top.name)) {
            return {
                path: segments,
                token: makeToken(decodeXmlText(trailing), trailingStart, offset, 'value', top.name),
                siblingKeys: [],
                malformed,
            };
        }

        const leading = trailing.length - trailing.trimStart().length;
        const partial = trailing.trimStart();
        const start = trailingStart + leading;
        if (top.name === 'dict') {
            const keys = [...top.keys, ...collectFollowingKeys(text.substring(offset))];
            return {
                path: [...segments, partial],
                token: makeToken(partial, start, offset, 'key', undefined),
                siblingKeys: keys,
                malformed,
            };
        }
        if (top.name === 'array') {
            return {
                path: [...segments, top.index],
                token: makeToken(partial, start, offset, 'value', undefined),
                siblingKeys: [],
                malformed,
            };
        }
        return {
            path: segments,
            token: makeToken(partial, start, offset, 'unknown', undefined),
            siblingKeys: [],
            malformed,
        };
    }

    // Plain XML: the document element holds child elements, everything deeper holds text
    if (stack.length === 1) {
        const partial = trailing.trimStart();
        const start = offset - partial.length;
        return {
            path: [...segments, partial],
            token: makeToken(partial, start, offset, 'key', undefined),
            siblingKeys: [],
            malformed,
        };
    }
    return {
        path: segments,
        token: makeToken(decodeXmlText(trailing), trailingStart, offset, 'value', top.name),
        siblingKeys: [],
        malformed,
    };
}

function makeToken(
    text: string,
    start: number,
    end: number,
    position: PartialToken['position'],
    element: string | undefined
): PartialToken {
    return {
        text,
        start,
        end,
        quote: null,
        position,
        element,
        ...scanSelector(text, start),
    };
}

/**
 * Keys of the current dict that appear after the cursor.
 */
function collectFollowingKeys(suffix: string): string[] {
    const keys: string[] = [];
    const tagRegex = /<(\/?)(dict|array|key)\b[^>]*?(\/?)>/g;
    let depth = 0;
    let match;

    while ((match = tagRegex.exec(suffix)) !== null) {
        const [, closing, name, selfClosing] = match;
        if (selfClosing) continue;
        if (name === 'key') {
            if (closing || depth !== 0) continue;
            const end = suffix.indexOf('</key>', tagRegex.lastIndex);
            if (end === -1) break;
            keys.push(decodeXmlText(suffix.substring(tagRegex.lastIndex, end)).trim());
            tagRegex.lastIndex = end;
            continue;
        }
        if (closing) {
            depth--;
            if (depth < 0) break;
        } else {
            depth++;
        }
    }
    return keys;
}
