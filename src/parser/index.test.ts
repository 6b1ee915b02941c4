/**
 * Tests for cursor resolution dispatch and dialect lookup.
 */

import { describe, it, expect } from 'vitest';
import { dialectFromFileName, formatOf, isDialect, malformedResolution, resolve } from './index';

describe('resolve', () => {
    it('should clamp the offset to the document', () => {
        expect(resolve('{"', 100, 'color-scheme').token.end).toBe(2);
        expect(resolve('{"', -4, 'color-scheme').token.end).toBe(0);
    });

    it('should use the syntax test resolver for syntax tests', () => {
        const text = '# SYNTAX TEST "Pack';

        expect(resolve(text, text.length, 'syntax-test').path).toEqual(['header']);
    });
});

describe('malformedResolution', () => {
    it('should be an empty unknown token at the offset', () => {
        expect(malformedResolution(5)).toEqual({
            path: [],
            token: {
                text: '',
                start: 5,
                end: 5,
                quote: null,
                position: 'unknown',
                inSelector: false,
                selectorWord: '',
                selectorWordStart: 5,
            },
            siblingKeys: [],
            malformed: true,
        });
    });
});

describe('dialects', () => {
    it('should infer the dialect from the file name', () => {
        expect(dialectFromFileName('/pkg/Python.sublime-syntax')).toBe('sublime-syntax');
        expect(dialectFromFileName('Theme.hidden-tmTheme')).toBe('tmtheme');
        expect(dialectFromFileName('/pkg/syntax_test_python.py')).toBe('syntax-test');
        expect(dialectFromFileName('notes.txt')).toBeNull();
    });

    it('should recognise dialect names only', () => {
        expect(isDialect('keymap')).toBe(true);
        expect(isDialect('toString')).toBe(false);
        expect(isDialect(3)).toBe(false);
    });

    it('should map dialects to formats', () => {
        expect(formatOf('snippet')).toBe('xml');
        expect(formatOf('tmpreferences')).toBe('plist');
    });
});
