/**
 * Tests for scope selector scanning.
 */

import { describe, it, expect } from 'vitest';
import { scanSelector, selectorAtoms } from './selector-scan';

describe('scanSelector', () => {
    it('should take the word after the last combinator', () => {
        expect(scanSelector('source.python meta.fu', 10)).toEqual({
            inSelector: false,
            selectorWord: 'meta.fu',
            selectorWordStart: 24,
        });
    });

    it('should keep dashes inside scope names', () => {
        expect(scanSelector('meta.function-call', 0).selectorWord).toBe('meta.function-call');
    });

    it('should treat a leading dash as the without operator', () => {
        expect(scanSelector('source -comm', 0)).toMatchObject({ selectorWord: 'comm', selectorWordStart: 8 });
    });

    it('should track open parentheses', () => {
        expect(scanSelector('source & (string | comm', 0)).toMatchObject({
            inSelector: true,
            selectorWord: 'comm',
        });
        expect(scanSelector('(string) ', 0).inSelector).toBe(false);
    });
});

describe('selectorAtoms', () => {
    it('should split a selector into scope names with offsets', () => {
        expect(selectorAtoms('source.python - (comment | string.quoted)')).toEqual([
            { name: 'source.python', offset: 0 },
            { name: 'comment', offset: 17 },
            { name: 'string.quoted', offset: 27 },
        ]);
    });

    it('should keep hyphenated names whole', () => {
        expect(selectorAtoms('meta.function-call, -comment')).toEqual([
            { name: 'meta.function-call', offset: 0 },
            { name: 'comment', offset: 21 },
        ]);
    });
});
