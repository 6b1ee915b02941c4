/**
 * Candidate generation: one resolver per context kind, then matching,
 * escaping and ranking.
 */

import { DocumentFormat, PartialToken } from '../../../parser';
import { ScopeRegistry } from '../../registry';
import { CompletionCandidate, CompletionContext } from '../../types';
import { escapeInsertion } from './escaping';
import { keyNameSuggestions } from './key-completions';
import { rankCandidates, matchTier } from './ranking';
import { cssVariableSuggestions, scopeSelectorSuggestions } from './scope-completions';
import { SuggestionSet } from './types';
import { actionNameSuggestions, colorSuggestions, valueEnumSuggestions } from './value-completions';

function suggestionsFor(context: CompletionContext, token: PartialToken, registry: ScopeRegistry): SuggestionSet | null {
    switch (context.kind) {
        case 'key-name':
            return keyNameSuggestions(context, token);
        case 'scope-selector':
            return scopeSelectorSuggestions(context, registry);
        case 'css-variable':
            return cssVariableSuggestions(context);
        case 'action-name':
            return actionNameSuggestions(context, token, registry);
        case 'value-enum':
            return valueEnumSuggestions(context, token);
        case 'color':
            return colorSuggestions(context, token);
        case 'free-text':
            return null;
    }
}

/**
 * Ordered, deduplicated candidates for a classified context. Reads the
 * registry's current snapshot and changes nothing.
 */
export function generate(
    context: CompletionContext,
    token: PartialToken,
    format: DocumentFormat,
    registry: ScopeRegistry
): CompletionCandidate[] {
    const set = suggestionsFor(context, token, registry);
    if (!set) return [];

    const wholeToken = set.wordStart === token.start;
    const candidates: CompletionCandidate[] = [];
    for (const suggestion of set.suggestions) {
        const tier = matchTier(suggestion.label, set.word, set.caseSensitive);
        if (!tier) continue;
        candidates.push({
            displayText: suggestion.label,
            insertText: escapeInsertion(suggestion.value ?? suggestion.label, token, format, {
                wholeToken,
                literal: suggestion.literal === true,
            }),
            replaceStart: set.wordStart,
            replaceEnd: token.end,
            detail: suggestion.detail,
            kind: suggestion.kind,
            tier,
            internal: suggestion.internal === true,
            source: suggestion.source,
        });
    }

    return rankCandidates(candidates);
}
