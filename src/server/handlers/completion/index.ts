/**
 * Completion handler for syntax package files.
 *
 * This module ties together:
 * - classify.ts: what kind of token the cursor is on
 * - key-completions.ts, scope-completions.ts, value-completions.ts: candidates per context kind
 * - generate.ts: matching, escaping and ranking
 */

import { Dialect, formatOf, resolve } from '../../../parser';
import { toError } from '../../errors';
import { CompletionCandidate, CompletionContext } from '../../types';
import { classify } from './classify';
import { extractDocumentInfo } from './document-info';
import { generate } from './generate';
import { CompletionHandlerContext } from './types';

export type { CompletionHandlerContext, Suggestion, SuggestionSet } from './types';
export { classify, varReferenceAt } from './classify';
export { extractDocumentInfo } from './document-info';
export type { DocumentInfo } from './document-info';
export { generate } from './generate';
export { matchTier, compareCandidates, rankCandidates } from './ranking';
export { escapeInsertion, escapeJsonContent, escapeXml, needsYamlQuotes } from './escaping';

/**
 * Classify the cursor of a document.
 */
export function classifyCursor(text: string, offset: number, dialect: Dialect): CompletionContext {
    return classify(resolve(text, offset, dialect), dialect, extractDocumentInfo(text, dialect));
}

/**
 * Handle completion request - main entry point called by the language server.
 * Never throws; a failure is logged and yields no candidates.
 */
export function getCompletions(
    text: string,
    offset: number,
    dialect: Dialect,
    ctx: CompletionHandlerContext
): CompletionCandidate[] {
    try {
        const resolution = resolve(text, offset, dialect);
        const context = classify(resolution, dialect, extractDocumentInfo(text, dialect));
        const candidates = generate(context, resolution.token, formatOf(dialect), ctx.registry);
        ctx.logger.log(`Completion at ${offset}: ${context.kind}, ${candidates.length} candidates`);
        return candidates.slice(0, ctx.maxCompletionItems);
    } catch (error) {
        ctx.logger.error(`Completion failed: ${toError(error).message}`);
        return [];
    }
}
