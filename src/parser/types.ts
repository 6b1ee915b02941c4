/**
 * Shared types for cursor resolution and document trees.
 */

/** Document formats the tokenizer understands */
export type DocumentFormat = 'json' | 'yaml' | 'plist' | 'xml' | 'text';

/** A key name (mapping) or an index (sequence) */
export type PathSegment = string | number;

/**
 * Nesting from the document root down to the slot holding the cursor.
 * When the cursor is on a key, the last segment is the partial key itself.
 */
export type StructuralPath = readonly PathSegment[];

/** Where inside a key/value pair the cursor sits */
export type TokenPosition = 'key' | 'value' | 'unknown';

/**
 * The token being typed, up to the cursor.
 */
export interface PartialToken {
    /** Text between `start` and the cursor, with quotes stripped */
    text: string;
    /** Offset of the first character of the token (after any opening quote) */
    start: number;
    /** Cursor offset */
    end: number;
    /** Opening quote, or null for plain tokens and XML text */
    quote: '"' | "'" | null;
    /** XML element whose text holds the token; unset when the token is bare markup content */
    element?: string;
    position: TokenPosition;
    /** Cursor is inside a parenthesised selector sub-expression */
    inSelector: boolean;
    /** Substring after the last selector combinator */
    selectorWord: string;
    selectorWordStart: number;
}

export interface CursorResolution {
    path: StructuralPath;
    token: PartialToken;
    /** Keys already present in the mapping that holds the cursor */
    siblingKeys: string[];
    /** Nesting could not be determined; callers degrade to free text */
    malformed: boolean;
}

export interface TextRange {
    start: number;
    end: number;
}

export type DocNodeKind = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null' | 'unknown';

/**
 * Format-neutral node of a whole-document tree, used by validation.
 */
export interface DocNode {
    kind: DocNodeKind;
    /** Key under which this node sits in its parent mapping */
    key?: string;
    keyRange?: TextRange;
    range: TextRange;
    /** Scalar value for string/number/boolean nodes */
    value?: string | number | boolean | null;
    children: DocNode[];
}

export interface DocParseError {
    message: string;
    range: TextRange;
}

export interface DocumentTree {
    root: DocNode | null;
    errors: DocParseError[];
}
