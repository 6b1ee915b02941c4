/**
 * Key name completions from the schema of the enclosing mapping.
 */

import { PartialToken } from '../../../parser';
import { CompletionContext } from '../../types';
import { SuggestionSet } from './types';

type KeyNameContext = Extract<CompletionContext, { kind: 'key-name' }>;

/**
 * Known keys of the parent mapping, without the non-repeatable keys that are
 * already present.
 */
export function keyNameSuggestions(context: KeyNameContext, token: PartialToken): SuggestionSet {
    const present = new Set(context.siblingKeys);
    const suggestions = (context.parent.children ?? [])
        .filter(child => child.repeatable === true || !present.has(child.name))
        .map(child => ({
            label: child.name,
            kind: 'key' as const,
            source: 'schema' as const,
            detail: child.description,
        }));

    return { suggestions, word: token.text, wordStart: token.start, caseSensitive: false };
}
