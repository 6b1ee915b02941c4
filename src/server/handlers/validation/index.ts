/**
 * Document validation handler for syntax package files.
 *
 * This module orchestrates all validation checks. Individual checks are
 * implemented in separate modules and share one parse of the document.
 */

import { Dialect, DocumentTree, formatOf, parseDocumentTree } from '../../../parser';
import { toError } from '../../errors';
import { ScopeRegistry } from '../../registry';
import { rootSchema } from '../../schemas';
import { Finding, Logger, ValidationSettings } from '../../types';
import { checkDuplicateKeys } from './duplicate-keys';
import { checkParseErrors } from './parse-errors';
import { checkSyntaxReferences } from './references';
import { checkScopeSelectors, checkSyntaxTestAssertions } from './scope-selectors';
import { checkUnknownKeys } from './unknown-keys';
import { checkValues } from './values';

export { isKnownScope } from './scope-selectors';
export { isColorValue } from './values';
export { walkDocument } from './walk';
export type { SchemaVisitor } from './walk';

/**
 * Context containing dependencies needed for validation
 */
export interface ValidationContext {
    registry: ScopeRegistry;
    logger: Logger;
    /** Which optional checks run */
    settings: ValidationSettings;
}

function compareFindings(a: Finding, b: Finding): number {
    return a.range.start - b.range.start || a.range.end - b.range.end;
}

/**
 * Validate a document and return findings ordered by position.
 * Never throws; a failing check is logged and contributes nothing.
 */
export function validateDocument(text: string, dialect: Dialect, ctx: ValidationContext): Finding[] {
    const findings: Finding[] = [];
    const run = (name: string, check: () => Finding[]) => {
        try {
            findings.push(...check());
        } catch (error) {
            ctx.logger.error(`Validation check ${name} failed: ${toError(error).message}`);
        }
    };

    if (dialect === 'syntax-test') {
        if (ctx.settings.unknownScopes) {
            run('unknown-scope', () => checkSyntaxTestAssertions(text, ctx.registry));
        }
        return findings.sort(compareFindings);
    }

    let tree: DocumentTree;
    try {
        tree = parseDocumentTree(text, formatOf(dialect));
    } catch (error) {
        ctx.logger.error(`Validation parse failed: ${toError(error).message}`);
        return [];
    }

    const { root, errors } = tree;
    const schema = rootSchema(dialect);
    run('parse-error', () => checkParseErrors(errors));
    if (root) {
        run('duplicate-key', () => checkDuplicateKeys(root, schema));
        if (ctx.settings.unknownKeys) {
            run('unknown-key', () => checkUnknownKeys(root, schema));
        }
        if (ctx.settings.unknownScopes) {
            run('unknown-scope', () => checkScopeSelectors(text, root, schema, ctx.registry));
        }
        if (ctx.settings.invalidValues) {
            run('invalid-value', () => checkValues(root, schema));
            run('syntax-reference', () => checkSyntaxReferences(root, schema, ctx.registry));
        }
    }

    return findings.sort(compareFindings);
}
