/**
 * Unknown scope detection in scope selectors.
 */

import { DocNode, TextRange, getAssertionLineDetails, getSyntaxTestTokens, selectorAtoms } from '../../../parser';
import { BUILTIN_SCOPES } from '../../constants';
import { ScopeRegistry } from '../../registry';
import { Finding, SchemaNode } from '../../types';
import { walkDocument } from './walk';

const BUILTIN: ReadonlySet<string> = new Set(BUILTIN_SCOPES);

/**
 * A scope the registry declares (or a dotted prefix of one), or a base scope.
 */
export function isKnownScope(registry: ScopeRegistry, scope: string): boolean {
    return BUILTIN.has(scope) || registry.hasScope(scope);
}

/**
 * Findings for the unknown atoms of `selector`, located by searching the
 * document text from `searchFrom` onward.
 */
function checkSelector(
    text: string,
    selector: string,
    searchFrom: number,
    fallback: TextRange,
    registry: ScopeRegistry
): Finding[] {
    const findings: Finding[] = [];
    let cursor = searchFrom;
    for (const atom of selectorAtoms(selector)) {
        const found = text.indexOf(atom.name, cursor);
        const range = found === -1 ? fallback : { start: found, end: found + atom.name.length };
        if (found !== -1) cursor = range.end;
        if (isKnownScope(registry, atom.name)) continue;
        findings.push({
            range,
            severity: 'information',
            message: `Unknown scope '${atom.name}'`,
            code: 'unknown-scope',
        });
    }
    return findings;
}

/**
 * Scope selector values of a structured document. Scope names a syntax
 * assigns are declarations and are not checked.
 */
export function checkScopeSelectors(
    text: string,
    root: DocNode,
    schema: SchemaNode,
    registry: ScopeRegistry
): Finding[] {
    if (registry.isEmpty()) return [];
    const findings: Finding[] = [];

    walkDocument(root, schema, (node, nodeSchema) => {
        if (nodeSchema.kind !== 'scope-selector' || typeof node.value !== 'string') return;
        findings.push(...checkSelector(text, node.value, node.range.start, node.range, registry));
    });

    return findings;
}

/**
 * Selectors of the assertion lines of a syntax test, and the syntax named in
 * its header.
 */
export function checkSyntaxTestAssertions(text: string, registry: ScopeRegistry): Finding[] {
    const tokens = getSyntaxTestTokens(text);
    if (!tokens || registry.isEmpty()) return [];
    const findings: Finding[] = [];

    const header = /"([^"]+)"/.exec(text);
    if (header && !registry.hasSyntax(header[1])) {
        const start = header.index + 1;
        findings.push({
            range: { start, end: start + header[1].length },
            severity: 'hint',
            message: `Unknown syntax '${header[1]}'`,
            code: 'invalid-value',
        });
    }

    let lineStart = text.indexOf('\n') + 1;
    while (lineStart > 0 && lineStart <= text.length) {
        const details = getAssertionLineDetails(text, lineStart);
        if (details.commentMarker && details.assertionColumns) {
            const lineText = text.substring(details.line.start, details.line.end);
            const marker = /^\s*(?:<-|\^+)/.exec(lineText.substring(details.commentMarker.end));
            if (marker) {
                const selectorStart = details.commentMarker.end + marker[0].length;
                let selector = lineText.substring(selectorStart);
                if (tokens.end !== null && selector.trimEnd().endsWith(tokens.end)) {
                    selector = selector.trimEnd().slice(0, -tokens.end.length);
                }
                const absoluteStart = details.line.start + selectorStart;
                findings.push(...checkSelector(
                    text,
                    selector,
                    absoluteStart,
                    { start: absoluteStart, end: details.line.end },
                    registry
                ));
            }
        }
        lineStart = details.line.end + 1;
    }

    return findings;
}
