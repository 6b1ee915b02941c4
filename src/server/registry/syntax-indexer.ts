/**
 * Scope extraction from syntax definitions.
 *
 * Indexing a file yields its own scopes and the other syntaxes it references;
 * references are resolved by the registry against the other indexed files.
 */

import * as path from 'path';
import { DocNode, dialectFromFileName, formatOf, parseDocumentTree, childByKey } from '../../parser';
import { IndexingError } from '../errors';
import { SyntaxFile, SyntaxRecord, SyntaxReference } from '../types';

/** sublime-syntax keys whose value is a scope */
const SUBLIME_SCOPE_KEYS = new Set(['scope', 'meta_scope', 'meta_content_scope', 'embed_scope']);

/** sublime-syntax keys holding `capture group -> scope` mappings */
const SUBLIME_CAPTURE_KEYS = new Set(['captures', 'escape_captures']);

/** sublime-syntax keys that can name another syntax */
const SUBLIME_REFERENCE_KEYS = new Set(['embed', 'include', 'push', 'set', 'extends', 'branch']);

/** tmLanguage keys whose value is a scope (`name` only below the root) */
const TM_SCOPE_KEYS = new Set(['name', 'contentName']);

/**
 * Split a scope value into scope names, dropping names built from
 * substitutions.
 */
export function splitScopes(value: string): string[] {
    return value
        .split(/\s+/)
        .filter(name => name.length > 0 && !name.includes('$') && !name.includes('{{'));
}

/**
 * `scope:source.js#main` or `Packages/JavaScript/JavaScript.sublime-syntax`.
 * Plain context names are local and yield null.
 */
export function parseSublimeReference(value: string): SyntaxReference | null {
    const target = value.split('#')[0].trim();
    if (target.startsWith('scope:')) {
        const scope = target.substring('scope:'.length);
        return scope.length > 0 ? { kind: 'scope', scope } : null;
    }
    if (target.startsWith('Packages/')) {
        return { kind: 'path', path: target };
    }
    return null;
}

/**
 * `source.js#expression` or `source.js`. Repository items and `$self` /
 * `$base` are local and yield null.
 */
export function parseTextMateInclude(value: string): SyntaxReference | null {
    if (value.startsWith('#') || value.startsWith('$')) return null;
    const scope = value.split('#')[0].trim();
    return scope.length > 0 ? { kind: 'scope', scope } : null;
}

function stringValues(node: DocNode): string[] {
    if (node.kind === 'string' && typeof node.value === 'string') return [node.value];
    if (node.kind === 'array') return node.children.flatMap(stringValues);
    return [];
}

/**
 * Parse one syntax file.
 * @throws IndexingError when the file is not a syntax definition or does not parse
 */
export function indexSyntaxFile(file: SyntaxFile): SyntaxRecord {
    const dialect = dialectFromFileName(file.resourcePath);
    if (dialect !== 'sublime-syntax' && dialect !== 'tmlanguage') {
        throw new IndexingError(file.resourcePath, 'not a syntax definition');
    }

    const tree = parseDocumentTree(file.text, formatOf(dialect));
    if (tree.errors.length > 0) {
        throw new IndexingError(file.resourcePath, tree.errors[0].message);
    }
    const root = tree.root;
    if (!root || root.kind !== 'object') {
        throw new IndexingError(file.resourcePath, 'document is not a mapping');
    }

    const scopes = new Set<string>();
    const references: SyntaxReference[] = [];
    let baseScope: string | null;
    let hidden: boolean;

    if (dialect === 'sublime-syntax') {
        baseScope = scalarString(childByKey(root, 'scope'));
        hidden = childByKey(root, 'hidden')?.value === true;
        collectSublime(root, scopes, references);
    } else {
        baseScope = scalarString(childByKey(root, 'scopeName'));
        hidden = childByKey(root, 'hideFromUser')?.value === true
            || path.extname(file.resourcePath).toLowerCase() === '.hidden-tmlanguage';
        collectTextMate(root, scopes, references);
        if (baseScope) scopes.add(baseScope);
    }

    return {
        resourcePath: file.resourcePath,
        packageId: file.packageId,
        baseScope,
        hidden,
        ownScopes: [...scopes].sort(),
        references,
    };
}

function scalarString(node: DocNode | undefined): string | null {
    if (!node || node.kind !== 'string' || typeof node.value !== 'string') return null;
    const value = node.value.trim();
    return value.length > 0 ? value : null;
}

function collectSublime(root: DocNode, scopes: Set<string>, references: SyntaxReference[]): void {
    const stack: DocNode[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (!node) continue;
        for (const child of node.children) {
            const key = node.kind === 'object' ? child.key : undefined;
            if (key === 'variables' && node === root) continue;

            if (key !== undefined && SUBLIME_SCOPE_KEYS.has(key) && child.kind === 'string') {
                stringValues(child).forEach(value => splitScopes(value).forEach(s => scopes.add(s)));
                continue;
            }
            if (key !== undefined && SUBLIME_CAPTURE_KEYS.has(key) && child.kind === 'object') {
                for (const capture of child.children) {
                    stringValues(capture).forEach(value => splitScopes(value).forEach(s => scopes.add(s)));
                }
                continue;
            }
            if (key !== undefined && SUBLIME_REFERENCE_KEYS.has(key)) {
                for (const value of stringValues(child)) {
                    const reference = parseSublimeReference(value);
                    if (reference) references.push(reference);
                }
            }
            stack.push(child);
        }
    }
}

function collectTextMate(root: DocNode, scopes: Set<string>, references: SyntaxReference[]): void {
    const stack: DocNode[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (!node) continue;
        for (const child of node.children) {
            const key = node.kind === 'object' ? child.key : undefined;
            if (key !== undefined && TM_SCOPE_KEYS.has(key) && node !== root && child.kind === 'string') {
                stringValues(child).forEach(value => splitScopes(value).forEach(s => scopes.add(s)));
                continue;
            }
            if (key === 'include' && typeof child.value === 'string') {
                const reference = parseTextMateInclude(child.value);
                if (reference) references.push(reference);
                continue;
            }
            stack.push(child);
        }
    }
}
