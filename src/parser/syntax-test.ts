/**
 * Syntax test files.
 *
 * The first line declares the comment token used by assertion lines and the
 * syntax under test:
 *
 *     // SYNTAX TEST "Packages/Python/Python.sublime-syntax"
 *
 * Assertion lines start with that comment token followed by `^` markers
 * (columns on the tested line) or `<-` (the comment token's own column).
 */

import * as path from 'path';
import { CursorResolution, PartialToken, TextRange } from './types';
import { scanSelector } from './selector-scan';

const HEADER_PATTERN = /^(\S+)\s+SYNTAX TEST\s+"[^"]+"\s*(\S+)?$/;
const MAX_HEADER_LENGTH = 1000;

export interface SyntaxTestTokens {
    /** Comment token that starts assertion lines */
    start: string;
    /** Comment terminator, for languages with block comments only */
    end: string | null;
}

export interface AssertionLineDetails {
    /** Range of the comment token at the start of the line, if any */
    commentMarker: TextRange | null;
    /** Columns covered by the assertion; equal for `<-` */
    assertionColumns: [number, number] | null;
    line: TextRange;
}

/**
 * Parse the first line of a document for syntax test tokens.
 */
export function getSyntaxTestTokens(text: string): SyntaxTestTokens | null {
    const newline = text.indexOf('\n');
    const firstLine = (newline === -1 ? text : text.substring(0, newline)).replace(/\r$/, '');
    if (firstLine.length >= MAX_HEADER_LENGTH) {
        return null;
    }
    const match = HEADER_PATTERN.exec(firstLine);
    if (!match) return null;
    return { start: match[1], end: match[2] ?? null };
}

/**
 * A named file is a syntax test when its name starts with `syntax_test_`;
 * an unsaved buffer is one when its first line is a syntax test header.
 */
export function isSyntaxTestFile(fileName: string | null, text: string): boolean {
    if (fileName !== null) {
        return path.basename(fileName).startsWith('syntax_test_');
    }
    return getSyntaxTestTokens(text) !== null;
}

export function lineRangeAt(text: string, offset: number): TextRange {
    const clamped = Math.max(0, Math.min(offset, text.length));
    const start = text.lastIndexOf('\n', clamped - 1) + 1;
    let end = text.indexOf('\n', clamped);
    if (end === -1) end = text.length;
    return { start, end };
}

function escapeRegex(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Inspect the line containing `offset` for a comment marker and assertion.
 */
export function getAssertionLineDetails(
    text: string,
    offset: number,
    fileName: string | null = null
): AssertionLineDetails {
    const line = lineRangeAt(text, offset);
    const empty = { commentMarker: null, assertionColumns: null, line };
    if (!isSyntaxTestFile(fileName, text)) {
        return empty;
    }
    const tokens = getSyntaxTestTokens(text);
    if (!tokens) {
        return empty;
    }

    const lineText = text.substring(line.start, line.end);
    const markerMatch = new RegExp(`^(\\s*)(${escapeRegex(tokens.start)})`).exec(lineText);
    if (!markerMatch) {
        return empty;
    }

    const markerStart = markerMatch[1].length;
    const markerEnd = markerMatch[0].length;
    const commentMarker = { start: markerStart, end: markerEnd };

    let assertionColumns: [number, number] | null = null;
    const assertion = /^(\s*)(?:(<-)|(\^+))/.exec(lineText.substring(markerEnd));
    if (assertion) {
        if (assertion[2]) {
            assertionColumns = [markerStart, markerStart];
        } else if (assertion[3]) {
            const caretStart = markerEnd + assertion[1].length;
            assertionColumns = [caretStart, caretStart + assertion[3].length];
        }
    }

    return { commentMarker, assertionColumns, line };
}

/**
 * Whether the line at `offset` is an assertion line. With
 * `mustContainAssertion` false, a bare comment marker counts too (the line
 * is still being written).
 */
export function isSyntaxTestLine(
    text: string,
    offset: number,
    mustContainAssertion: boolean,
    fileName: string | null = null
): boolean {
    if (offset < 0) return false;
    const details = getAssertionLineDetails(text, offset, fileName);
    if (details.commentMarker) {
        return !mustContainAssertion || details.assertionColumns !== null;
    }
    return false;
}

export interface TestedLine {
    /** Assertion lines from the cursor upward, nearest first */
    assertions: AssertionLineDetails[];
    /** The line the assertions refer to */
    line: TextRange;
}

/**
 * Starting at `offset`, walk upward over assertion lines to find the line
 * being tested.
 */
export function getLinesBeingTested(
    text: string,
    offset: number,
    fileName: string | null = null
): TestedLine | null {
    if (!isSyntaxTestFile(fileName, text)) {
        return null;
    }

    const assertions: AssertionLineDetails[] = [];
    let pos = offset;
    let firstLine = true;
    let details = getAssertionLineDetails(text, pos, fileName);

    while (pos >= 0) {
        details = getAssertionLineDetails(text, pos, fileName);
        pos = details.line.start - 1;
        if (details.assertionColumns) {
            assertions.push(details);
        } else if (!firstLine || !details.commentMarker) {
            break;
        } else {
            assertions.push(details);
        }
        firstLine = false;
    }

    return { assertions, line: details.line };
}

export interface TextInsertion {
    offset: number;
    text: string;
}

/**
 * Spaces to insert so the cursor sits right after the previous line's last
 * assertion column.
 */
export function alignSyntaxTest(text: string, offset: number, fileName: string | null = null): TextInsertion | null {
    const details = getAssertionLineDetails(text, offset, fileName);
    if (!details.commentMarker || details.line.start === 0) {
        return null;
    }

    const previous = getAssertionLineDetails(text, details.line.start - 1, fileName);
    if (!previous.assertionColumns) {
        return null;
    }

    const column = offset - details.line.start;
    const count = previous.assertionColumns[1] - column;
    if (count <= 0) {
        return null;
    }
    return { offset, text: ' '.repeat(count) };
}

/**
 * Region of the tested line covered by the nearest assertion, for
 * highlighting. A `<-` assertion covers one character.
 */
export function getAssertedRegion(
    text: string,
    selection: TextRange,
    fileName: string | null = null
): TextRange | null {
    const tested = getLinesBeingTested(text, selection.start, fileName);
    const nearest = tested?.assertions[0];
    if (!tested || !nearest?.assertionColumns) {
        return null;
    }

    let [colStart, colEnd] = nearest.assertionColumns;
    const selected = text.substring(selection.start, selection.end);
    if (selection.end > selection.start && /^\^+$/.test(selected)) {
        const lineStart = lineRangeAt(text, selection.start).start;
        colStart = selection.start - lineStart;
        colEnd = selection.end - lineStart;
    } else if (colEnd === colStart) {
        colEnd += 1;
    }

    return { start: tested.line.start + colStart, end: tested.line.start + colEnd };
}

export interface SyntaxTestSuggestion {
    /** Replacement for the original selection */
    edit: TextRange & { text: string };
    /** Selection after the edit: the suggested scope, ready to be extended */
    selection: TextRange;
}

/** A scope stack matches a scope name when one of its scopes equals or extends it */
function stackMatches(stack: string, name: string): boolean {
    return stack.split(/\s+/).some(scope => scope === name || scope.startsWith(`${name}.`));
}

/**
 * Suggest an assertion for the selection on an assertion line: type
 * `character`, extend it over the following columns of the tested line whose
 * scope stays the same, and name the scopes shared with the columns already
 * asserted on the line.
 * @param scopesByColumn - Scope stack at each column of the tested line, one past its end included
 * @param baseScope - Base scope of the syntax under test, left out of the suggestion
 */
export function suggestSyntaxTest(
    text: string,
    selection: TextRange,
    scopesByColumn: readonly string[],
    baseScope: string | null,
    fileName: string | null = null,
    character = '^'
): SyntaxTestSuggestion | null {
    if (!isSyntaxTestFile(fileName, text)) return null;
    const tokens = getSyntaxTestTokens(text);
    if (!tokens) return null;

    const typed = text.substring(0, selection.start) + character + text.substring(selection.end);
    const insertAt = selection.start + character.length;
    const tested = getLinesBeingTested(typed, insertAt, fileName);
    const current = tested?.assertions[0];
    if (!tested || !current?.commentMarker) return null;

    // Add the end token only when the cursor is at the end of the line
    const endToken = tokens.end !== null && insertAt === current.line.end ? ` ${tokens.end}` : '';

    let assertions = tested.assertions;
    let column = insertAt - current.line.start;
    const [colStart, colEnd] = current.assertionColumns ?? [-1, -1];
    const atCommentStart = colStart === colEnd;
    if (atCommentStart) {
        column = colEnd;
        assertions = assertions.slice(1);
    }

    const scopes: string[] = [];
    let length = 0;
    const lineLength = tested.line.end - tested.line.start;
    for (let col = column; col <= lineLength; col++) {
        const scope = scopesByColumn[col];
        if (scope === undefined) break;
        if (scopes.length > 0 && scope !== scopes[0]) break;
        if (scopes.length === 0) scopes.push(scope);
        length++;
        if (atCommentStart) break;
    }
    if (scopes.length === 0) return null;

    const asserted = assertions[0]?.assertionColumns;
    if (asserted && !atCommentStart) {
        for (let col = asserted[0]; col < asserted[1]; col++) {
            const scope = scopesByColumn[col];
            if (scope !== undefined && !scopes.includes(scope)) scopes.push(scope);
        }
    }

    const shared = scopes[0].split(/\s+/).filter(name => name && scopes.every(stack => stackMatches(stack, name)));
    const suggested = (shared[0] === baseScope ? shared.slice(1) : shared).join(' ');

    const tail = ` ${suggested}${endToken}`;
    return {
        edit: {
            start: selection.start,
            end: selection.end,
            text: character + character.repeat(length) + tail,
        },
        selection: { start: insertAt + length, end: insertAt + length + tail.length },
    };
}

export type ContextOperator = 'equal' | 'not_equal';

export type SyntaxTestContextKey =
    | 'line_above_is_a_syntax_test'
    | 'current_line_is_a_syntax_test'
    | 'file_contains_syntax_tests';

/**
 * Answer a key-binding context query. Returns null for unknown keys or
 * operators, so the host falls back to its own handling.
 */
export function querySyntaxTestContext(
    text: string,
    offset: number,
    key: string,
    operator: string,
    operand: unknown,
    fileName: string | null = null
): boolean | null {
    if (operator !== 'equal' && operator !== 'not_equal') {
        return null;
    }

    let value: boolean;
    switch (key) {
        case 'line_above_is_a_syntax_test': {
            const details = getAssertionLineDetails(text, offset, fileName);
            value = details.commentMarker !== null &&
                isSyntaxTestLine(text, details.line.start - 1, true, fileName);
            break;
        }
        case 'current_line_is_a_syntax_test':
            value = isSyntaxTestLine(text, offset, false, fileName);
            break;
        case 'file_contains_syntax_tests':
            value = isSyntaxTestFile(fileName, text);
            break;
        default:
            return null;
    }

    const result = value === Boolean(operand);
    return operator === 'not_equal' ? !result : result;
}

/**
 * Cursor resolution inside a syntax test file: the header's syntax path, or
 * the selector after an assertion.
 */
export function resolveSyntaxTestCursor(text: string, offset: number): CursorResolution {
    const line = lineRangeAt(text, offset);
    const prefix = text.substring(line.start, offset);

    if (line.start === 0) {
        const headerMatch = /^\S+\s+SYNTAX TEST\s+"([^"]*)$/.exec(prefix);
        if (headerMatch) {
            const start = offset - headerMatch[1].length;
            return {
                path: ['header'],
                token: makeToken(headerMatch[1], start, offset, '"'),
                siblingKeys: [],
                malformed: false,
            };
        }
    }

    const details = getAssertionLineDetails(text, offset);
    if (details.commentMarker && details.assertionColumns) {
        const lineText = text.substring(line.start, line.end);
        const afterMarker = lineText.substring(details.commentMarker.end);
        const assertion = /^\s*(?:<-|\^+)/.exec(afterMarker);
        const selectorStart = line.start + details.commentMarker.end + (assertion ? assertion[0].length : 0);
        if (offset >= selectorStart) {
            const raw = text.substring(selectorStart, offset);
            const trimmed = raw.trimStart();
            const start = offset - trimmed.length;
            return {
                path: ['assertion'],
                token: makeToken(trimmed, start, offset, null),
                siblingKeys: [],
                malformed: false,
            };
        }
    }

    return {
        path: [],
        token: makeToken('', offset, offset, null, 'unknown'),
        siblingKeys: [],
        malformed: false,
    };
}

function makeToken(
    text: string,
    start: number,
    end: number,
    quote: PartialToken['quote'],
    position: PartialToken['position'] = 'value'
): PartialToken {
    return { text, start, end, quote, position, ...scanSelector(text, start) };
}
