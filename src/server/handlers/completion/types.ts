/**
 * Type definitions for the completion handler.
 */

import { ScopeRegistry } from '../../registry';
import { CandidateKind, CandidateSource, Logger } from '../../types';

/**
 * Context interface for dependency injection into completion handler.
 */
export interface CompletionHandlerContext {
    registry: ScopeRegistry;
    logger: Logger;
    /** Candidates kept after ranking */
    maxCompletionItems: number;
}

/**
 * A completion before matching, escaping and ranking.
 */
export interface Suggestion {
    /** Shown in the list and matched against the typed word */
    label: string;
    /** Unescaped text to insert; defaults to the label */
    value?: string;
    kind: CandidateKind;
    source: CandidateSource;
    internal?: boolean;
    detail?: string;
    /** Not a string in the document's data model (booleans); inserted unquoted */
    literal?: boolean;
}

/**
 * Suggestions of one resolver and the word they complete.
 */
export interface SuggestionSet {
    suggestions: Suggestion[];
    word: string;
    /** Document offset where the word starts; the replaced range ends at the cursor */
    wordStart: number;
    caseSensitive: boolean;
}
