/**
 * Tests for candidate matching and ranking.
 */

import { describe, it, expect } from 'vitest';
import { matchTier, rankCandidates } from './ranking';
import { CompletionCandidate } from '../../types';

function candidate(displayText: string, overrides: Partial<CompletionCandidate> = {}): CompletionCandidate {
    return {
        displayText,
        insertText: displayText,
        replaceStart: 0,
        replaceEnd: 0,
        kind: 'scope',
        tier: 'prefix',
        internal: false,
        source: 'registry',
        ...overrides,
    };
}

describe('matchTier', () => {
    it('should match everything as a prefix for an empty word', () => {
        expect(matchTier('source.python', '', true)).toBe('prefix');
    });

    it('should distinguish prefix, substring and fuzzy matches', () => {
        expect(matchTier('string.quoted', 'str', true)).toBe('prefix');
        expect(matchTier('string.quoted', 'quo', true)).toBe('substring');
        expect(matchTier('string.quoted', 'sqd', true)).toBe('fuzzy');
        expect(matchTier('string.quoted', 'xyz', true)).toBeNull();
    });

    it('should respect case sensitivity', () => {
        expect(matchTier('Bold', 'bo', true)).toBeNull();
        expect(matchTier('Bold', 'bo', false)).toBe('prefix');
    });
});

describe('rankCandidates', () => {
    it('should order by tier, then alphabetically', () => {
        const ranked = rankCandidates([
            candidate('b.fuzzy', { tier: 'fuzzy' }),
            candidate('z.prefix'),
            candidate('a.substring', { tier: 'substring' }),
            candidate('a.prefix'),
        ]);

        expect(ranked.map(c => c.displayText)).toEqual(['a.prefix', 'z.prefix', 'a.substring', 'b.fuzzy']);
    });

    it('should order internal candidates after public ones with the same text', () => {
        const ranked = rankCandidates([
            candidate('meta.block', { internal: true, insertText: 'x' }),
            candidate('meta.block', { insertText: 'y' }),
        ]);

        expect(ranked.map(c => c.internal)).toEqual([false, true]);
    });

    it('should keep the best source per insertion text', () => {
        const ranked = rankCandidates([
            candidate('source', { source: 'builtin' }),
            candidate('source', { source: 'registry' }),
        ]);

        expect(ranked).toHaveLength(1);
        expect(ranked[0].source).toBe('registry');
    });

    it('should not change its input', () => {
        const input = [candidate('b'), candidate('a')];
        rankCandidates(input);

        expect(input.map(c => c.displayText)).toEqual(['b', 'a']);
    });
});
