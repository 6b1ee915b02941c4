/**
 * Tests for JSON cursor resolution.
 */

import { describe, it, expect } from 'vitest';
import { resolveJsonCursor, isClosedString, unescapeJsonString } from './json-cursor';
import { parseCursor } from './test-utils';

function resolveAt(textWithCursor: string) {
    const { cleanText, offset } = parseCursor(textWithCursor);
    return { offset, resolution: resolveJsonCursor(cleanText, offset) };
}

describe('resolveJsonCursor', () => {
    it('should resolve a partial string value', () => {
        const { resolution } = resolveAt('{"scope": "string.quoted.dou|');

        expect(resolution.path).toEqual(['scope']);
        expect(resolution.malformed).toBe(false);
        expect(resolution.token).toMatchObject({
            text: 'string.quoted.dou',
            start: 11,
            end: 28,
            quote: '"',
            position: 'value',
            selectorWord: 'string.quoted.dou',
            selectorWordStart: 11,
        });
    });

    it('should resolve an empty key with the keys already present', () => {
        const { offset, resolution } = resolveAt('{"name": "x", "|"}');

        expect(resolution.path).toEqual(['']);
        expect(resolution.token).toMatchObject({ text: '', start: offset, position: 'key' });
        expect(resolution.siblingKeys).toEqual(['name']);
    });

    it('should count array items in the path', () => {
        const { resolution } = resolveAt('{"rules": [{"scope": "a"}, {"foreground": "|"}]}');

        expect(resolution.path).toEqual(['rules', 1, 'foreground']);
        expect(resolution.token.position).toBe('value');
    });

    it('should unescape the typed text', () => {
        const { resolution } = resolveAt('{"name": "a\\"b|');

        expect(resolution.token.text).toBe('a"b');
        expect(resolution.token.start).toBe(10);
    });

    it('should resolve a bare value', () => {
        const { offset, resolution } = resolveAt('{"hidden": tr|');

        expect(resolution.path).toEqual(['hidden']);
        expect(resolution.token).toMatchObject({ text: 'tr', start: offset - 2, quote: null, position: 'value' });
    });

    it('should not resolve a position right after a closed string', () => {
        expect(resolveAt('{"scope": "string.quoted.double.python"|').resolution.token.position).toBe('unknown');
        expect(resolveAt('{"scope": "a" |').resolution.token.position).toBe('unknown');
        expect(resolveAt('{"name"|').resolution.token.position).toBe('unknown');
    });
});

describe('json string helpers', () => {
    it('should tell closed strings from open ones', () => {
        expect(isClosedString('"abc"')).toBe(true);
        expect(isClosedString('"ab\\"')).toBe(false);
        expect(isClosedString('"')).toBe(false);
    });

    it('should unescape a partial string body', () => {
        expect(unescapeJsonString('a\\nb\\u0041\\')).toBe('a\nbA');
    });
});
