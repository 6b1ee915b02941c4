/**
 * Completions for action references, enumerated values and colors.
 */

import { PartialToken } from '../../../parser';
import { COLOR_FUNCTIONS } from '../../constants';
import cssColors from '../../data/css-colors.json';
import { ScopeRegistry } from '../../registry';
import { CompletionContext } from '../../types';
import { Suggestion, SuggestionSet } from './types';

type ActionNameContext = Extract<CompletionContext, { kind: 'action-name' }>;
type ValueEnumContext = Extract<CompletionContext, { kind: 'value-enum' }>;
type ColorContext = Extract<CompletionContext, { kind: 'color' }>;

/**
 * Context names of the document, the schema's fixed names, and other
 * syntaxes in the form the reference takes.
 */
export function actionNameSuggestions(
    context: ActionNameContext,
    token: PartialToken,
    registry: ScopeRegistry
): SuggestionSet {
    const suggestions: Suggestion[] = [];
    const target = context.node.reference ?? 'context';

    if (target === 'syntax-file') {
        for (const resourcePath of registry.syntaxPaths()) {
            suggestions.push({ label: resourcePath, kind: 'action', source: 'registry', detail: 'syntax' });
        }
    } else {
        for (const name of context.contexts) {
            suggestions.push({ label: name, kind: 'action', source: 'document', detail: 'context' });
        }
        for (const name of context.node.values ?? []) {
            suggestions.push({ label: name, kind: 'action', source: 'schema' });
        }
        for (const scope of registry.baseScopes()) {
            const label = target === 'context' ? `scope:${scope}` : scope;
            suggestions.push({ label, kind: 'action', source: 'registry', detail: 'syntax' });
        }
    }

    return { suggestions, word: token.text, wordStart: token.start, caseSensitive: true };
}

/**
 * Enumerated values of the node, matched against the last word so that
 * space-separated flags (`bold italic`) complete one at a time.
 */
export function valueEnumSuggestions(context: ValueEnumContext, token: PartialToken): SuggestionSet {
    const isBoolean = context.node.kind === 'boolean';
    const values = isBoolean ? ['true', 'false'] : context.node.values ?? [];
    const suggestions: Suggestion[] = values.map(value => ({
        label: value,
        kind: 'value',
        source: 'schema',
        literal: isBoolean,
    }));

    const wordOffset = token.text.search(/\S*$/);
    return {
        suggestions,
        word: token.text.substring(wordOffset),
        wordStart: token.start + wordOffset,
        caseSensitive: false,
    };
}

/**
 * Variable references, color functions and CSS named colors.
 */
export function colorSuggestions(context: ColorContext, token: PartialToken): SuggestionSet {
    const suggestions: Suggestion[] = context.variables.map(name => ({
        label: `var(${name})`,
        kind: 'color',
        source: 'document',
        detail: 'color scheme variable',
    }));
    for (const name of COLOR_FUNCTIONS) {
        suggestions.push({ label: `${name}(`, kind: 'color', source: 'builtin', detail: 'color function' });
    }
    for (const name of cssColors) {
        suggestions.push({ label: name, kind: 'color', source: 'builtin', detail: 'CSS color' });
    }

    return { suggestions, word: token.text, wordStart: token.start, caseSensitive: false };
}
