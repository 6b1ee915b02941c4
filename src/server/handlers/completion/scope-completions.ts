/**
 * Scope selector and CSS variable completions.
 */

import { BUILTIN_SCOPES, INTERNAL_MARKER, MINIHTML_CSS_VARIABLES } from '../../constants';
import { ScopeRegistry } from '../../registry';
import { CompletionContext } from '../../types';
import { Suggestion, SuggestionSet } from './types';

type ScopeSelectorContext = Extract<CompletionContext, { kind: 'scope-selector' }>;
type CssVariableContext = Extract<CompletionContext, { kind: 'css-variable' }>;

/**
 * Registry scopes and the built-in base scopes matching the selector word.
 * A word starting with the internal marker also offers internal scopes; the
 * marker is replaced by the completion.
 */
export function scopeSelectorSuggestions(context: ScopeSelectorContext, registry: ScopeRegistry): SuggestionSet {
    const includeInternal = context.word.startsWith(INTERNAL_MARKER);
    const word = includeInternal ? context.word.substring(INTERNAL_MARKER.length) : context.word;

    const suggestions: Suggestion[] = registry.query(word, { includeInternal }).map(entry => ({
        label: entry.name,
        kind: 'scope',
        source: 'registry',
        internal: entry.internal,
        detail: entry.internal ? `${entry.source} (internal)` : entry.source,
    }));
    for (const scope of BUILTIN_SCOPES) {
        suggestions.push({ label: scope, kind: 'scope', source: 'builtin', detail: 'base scope' });
    }

    return { suggestions, word, wordStart: context.wordStart, caseSensitive: true };
}

/**
 * Variables of the document, plus the minihtml variables once the word
 * starts with `--`.
 */
export function cssVariableSuggestions(context: CssVariableContext): SuggestionSet {
    const suggestions: Suggestion[] = context.variables.map(name => ({
        label: name,
        kind: 'variable',
        source: 'document',
        detail: 'color scheme variable',
    }));
    if (context.word.startsWith('--')) {
        for (const name of MINIHTML_CSS_VARIABLES) {
            suggestions.push({ label: name, kind: 'variable', source: 'builtin', detail: 'minihtml variable' });
        }
    }

    return { suggestions, word: context.word, wordStart: context.wordStart, caseSensitive: true };
}
