/**
 * Tests for insertion text escaping.
 */

import { describe, it, expect } from 'vitest';
import { escapeInsertion, needsYamlQuotes } from './escaping';
import { PartialToken } from '../../../parser';

function token(overrides: Partial<PartialToken> = {}): PartialToken {
    return {
        text: '',
        start: 0,
        end: 0,
        quote: null,
        position: 'value',
        inSelector: false,
        selectorWord: '',
        selectorWordStart: 0,
        ...overrides,
    };
}

const whole = { wholeToken: true, literal: false };
const partial = { wholeToken: false, literal: false };

describe('escapeInsertion', () => {
    describe('json', () => {
        it('should escape inside a string', () => {
            expect(escapeInsertion('a"b\\c', token({ quote: '"' }), 'json', whole)).toBe('a\\"b\\\\c');
        });

        it('should quote a whole bare token', () => {
            expect(escapeInsertion('source.python', token(), 'json', whole)).toBe('"source.python"');
        });

        it('should leave literals and partial words unquoted', () => {
            expect(escapeInsertion('true', token(), 'json', { wholeToken: true, literal: true })).toBe('true');
            expect(escapeInsertion('meta', token(), 'json', partial)).toBe('meta');
        });
    });

    describe('yaml', () => {
        it('should double single quotes inside single-quoted scalars', () => {
            expect(escapeInsertion("it's", token({ quote: "'" }), 'yaml', whole)).toBe("it''s");
        });

        it('should escape inside double-quoted scalars', () => {
            expect(escapeInsertion('a"b', token({ quote: '"' }), 'yaml', whole)).toBe('a\\"b');
        });

        it('should quote plain scalars that would not read back', () => {
            expect(escapeInsertion('#strings', token(), 'yaml', whole)).toBe("'#strings'");
            expect(escapeInsertion('main', token(), 'yaml', whole)).toBe('main');
        });
    });

    describe('plist', () => {
        it('should escape markup inside an element', () => {
            expect(escapeInsertion('a & <b>', token({ element: 'string' }), 'plist', whole)).toBe('a &amp; &lt;b&gt;');
        });

        it('should wrap a bare token in the element it needs', () => {
            expect(escapeInsertion('name', token({ position: 'key' }), 'plist', whole)).toBe('<key>name</key>');
            expect(escapeInsertion('true', token(), 'plist', { wholeToken: true, literal: true })).toBe('<true/>');
            expect(escapeInsertion('source.json', token(), 'plist', whole)).toBe('<string>source.json</string>');
        });
    });

    it('should open and close an element for a bare xml key', () => {
        expect(escapeInsertion('content', token({ position: 'key' }), 'xml', whole)).toBe('<content></content>');
    });

    it('should insert syntax test text unchanged', () => {
        expect(escapeInsertion('a"b', token(), 'text', whole)).toBe('a"b');
    });
});

describe('needsYamlQuotes', () => {
    it('should flag indicators, separators and comments', () => {
        expect(needsYamlQuotes('*alias')).toBe(true);
        expect(needsYamlQuotes('key: value')).toBe(true);
        expect(needsYamlQuotes('a #b')).toBe(true);
        expect(needsYamlQuotes('')).toBe(true);
        expect(needsYamlQuotes('scope:source.python')).toBe(false);
    });
});
