/**
 * Format tokenizer: structural path and partial token at a cursor offset.
 */

import { CursorResolution } from './types';
import { Dialect, formatOf } from './dialects';
import { resolveJsonCursor } from './json-cursor';
import { resolveYamlCursor } from './yaml-cursor';
import { resolveXmlCursor } from './xml-cursor';
import { resolveSyntaxTestCursor } from './syntax-test';
import { scanSelector } from './selector-scan';

export * from './types';
export * from './dialects';
export { scanSelector, selectorAtoms } from './selector-scan';
export type { SelectorAtom, SelectorScan } from './selector-scan';
export { parseDocumentTree, toPlainValue, childByKey } from './document-tree';
export type { PlainValue } from './document-tree';
export { decodeXmlText } from './xml-cursor';
export {
    getSyntaxTestTokens,
    isSyntaxTestFile,
    getAssertionLineDetails,
    getLinesBeingTested,
    getAssertedRegion,
    alignSyntaxTest,
    suggestSyntaxTest,
    querySyntaxTestContext,
    isSyntaxTestLine,
    lineRangeAt,
} from './syntax-test';
export type {
    SyntaxTestTokens,
    AssertionLineDetails,
    TestedLine,
    TextInsertion,
    SyntaxTestSuggestion,
} from './syntax-test';

/**
 * Resolve the cursor context of a (possibly incomplete) document.
 * Never throws; a failure to determine nesting yields a malformed result.
 */
export function resolve(text: string, offset: number, dialect: Dialect): CursorResolution {
    const clamped = Math.max(0, Math.min(offset, text.length));
    try {
        switch (formatOf(dialect)) {
            case 'json':
                return resolveJsonCursor(text, clamped);
            case 'yaml':
                return resolveYamlCursor(text, clamped);
            case 'plist':
                return resolveXmlCursor(text, clamped, true);
            case 'xml':
                return resolveXmlCursor(text, clamped, false);
            case 'text':
                return resolveSyntaxTestCursor(text, clamped);
        }
    } catch {
        return malformedResolution(clamped);
    }
}

export function malformedResolution(offset: number): CursorResolution {
    return {
        path: [],
        token: { text: '', start: offset, end: offset, quote: null, position: 'unknown', ...scanSelector('', offset) },
        siblingKeys: [],
        malformed: true,
    };
}
