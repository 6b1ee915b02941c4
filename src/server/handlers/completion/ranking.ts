/**
 * Matching, ordering and deduplication of completion candidates.
 */

import { CandidateSource, CompletionCandidate, MatchTier } from '../../types';

const TIER_RANK: Readonly<Record<MatchTier, number>> = {
    prefix: 0,
    substring: 1,
    fuzzy: 2,
};

const SOURCE_RANK: Readonly<Record<CandidateSource, number>> = {
    schema: 0,
    document: 1,
    registry: 2,
    builtin: 3,
};

function isSubsequence(word: string, label: string): boolean {
    let i = 0;
    for (const char of label) {
        if (char === word[i]) i++;
        if (i === word.length) return true;
    }
    return i === word.length;
}

/**
 * How `label` matches the typed `word`, or null when it doesn't.
 * An empty word matches everything as a prefix.
 */
export function matchTier(label: string, word: string, caseSensitive: boolean): MatchTier | null {
    const l = caseSensitive ? label : label.toLowerCase();
    const w = caseSensitive ? word : word.toLowerCase();
    if (l.startsWith(w)) return 'prefix';
    if (l.includes(w)) return 'substring';
    if (isSubsequence(w, l)) return 'fuzzy';
    return null;
}

/**
 * Tier, then alphabetical, then internal last, then source.
 */
export function compareCandidates(a: CompletionCandidate, b: CompletionCandidate): number {
    const tier = TIER_RANK[a.tier] - TIER_RANK[b.tier];
    if (tier !== 0) return tier;
    if (a.displayText !== b.displayText) return a.displayText < b.displayText ? -1 : 1;
    if (a.internal !== b.internal) return a.internal ? 1 : -1;
    return SOURCE_RANK[a.source] - SOURCE_RANK[b.source];
}

/**
 * Sort candidates and keep the best-ranked one per insertion text.
 */
export function rankCandidates(candidates: readonly CompletionCandidate[]): CompletionCandidate[] {
    const sorted = [...candidates].sort(compareCandidates);
    const seen = new Set<string>();
    const result: CompletionCandidate[] = [];
    for (const candidate of sorted) {
        if (seen.has(candidate.insertText)) continue;
        seen.add(candidate.insertText);
        result.push(candidate);
    }
    return result;
}
