/**
 * Context classification: what kind of token the cursor is on.
 */

import { CursorResolution, Dialect, PartialToken, StructuralPath } from '../../../parser';
import { SELECTOR_KEYS } from '../../constants';
import { acceptsMapping, lookup } from '../../schemas';
import { CompletionContext, SchemaNode } from '../../types';
import { DocumentInfo } from './document-info';

const FREE_TEXT: CompletionContext = { kind: 'free-text' };

const VAR_REFERENCE = /var\(\s*([\w-]*)$/;

/**
 * A `var(` reference being typed at the end of the token.
 */
export function varReferenceAt(token: PartialToken): { word: string; wordStart: number } | null {
    const match = VAR_REFERENCE.exec(token.text);
    if (!match) return null;
    return { word: match[1], wordStart: token.end - match[1].length };
}

/**
 * Classify the cursor.
 *
 * A key position completes the parent's known keys; a parent that holds
 * scalars instead (a YAML sequence item still being typed) classifies the
 * token as that parent's value. Value positions dispatch on the node's kind.
 * Malformed input and unknown paths give free text.
 */
export function classify(resolution: CursorResolution, dialect: Dialect, info: DocumentInfo): CompletionContext {
    const { path, token } = resolution;
    if (resolution.malformed || token.position === 'unknown') {
        return FREE_TEXT;
    }

    if (token.position === 'key') {
        const parentPath = path.slice(0, -1);
        const parent = lookup(dialect, parentPath);
        if (!parent) return FREE_TEXT;
        if (parent.children) {
            return { kind: 'key-name', parent, siblingKeys: resolution.siblingKeys };
        }
        if (acceptsMapping(parent)) return FREE_TEXT;
        return classifyValue(parent, parentPath, token, info);
    }

    return classifyValue(lookup(dialect, path), path, token, info);
}

function classifyValue(
    node: SchemaNode | null,
    path: StructuralPath,
    token: PartialToken,
    info: DocumentInfo
): CompletionContext {
    if (!node) {
        const last = path[path.length - 1];
        if (typeof last === 'string' && SELECTOR_KEYS.has(last)) {
            return scopeSelector(null, token);
        }
        return FREE_TEXT;
    }

    switch (node.kind) {
        case 'scope-selector':
        case 'scope-name':
            return scopeSelector(node, token);
        case 'css-variable': {
            const reference = varReferenceAt(token);
            return reference ? { kind: 'css-variable', ...reference, variables: info.variables } : FREE_TEXT;
        }
        case 'color': {
            const reference = varReferenceAt(token);
            if (reference) return { kind: 'css-variable', ...reference, variables: info.variables };
            return { kind: 'color', node, variables: info.variables };
        }
        case 'action-reference':
            return { kind: 'action-name', node, contexts: info.contexts };
        case 'enum':
        case 'boolean':
            return { kind: 'value-enum', node };
        default:
            return node.values ? { kind: 'value-enum', node } : FREE_TEXT;
    }
}

function scopeSelector(node: SchemaNode | null, token: PartialToken): CompletionContext {
    return {
        kind: 'scope-selector',
        node,
        word: token.selectorWord,
        wordStart: token.selectorWordStart,
        inSelector: token.inSelector,
    };
}
