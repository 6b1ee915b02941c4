/**
 * Schema catalogs and lookup by structural path.
 */

import { Dialect, StructuralPath } from '../../parser';
import { SchemaNode } from '../types';
import { SUBLIME_SYNTAX_SCHEMA } from './sublime-syntax';
import { TMLANGUAGE_SCHEMA } from './tmlanguage';
import { COLOR_SCHEME_SCHEMA } from './color-scheme';
import { TMTHEME_SCHEMA } from './tmtheme';
import { TMPREFERENCES_SCHEMA } from './tmpreferences';
import { KEYMAP_SCHEMA } from './keymap';
import { BUILD_SYSTEM_SCHEMA } from './build-system';
import { SNIPPET_SCHEMA } from './snippet';
import { SYNTAX_TEST_SCHEMA } from './syntax-test';

const CATALOG: Readonly<Record<Dialect, SchemaNode>> = {
    'sublime-syntax': SUBLIME_SYNTAX_SCHEMA,
    'tmlanguage': TMLANGUAGE_SCHEMA,
    'color-scheme': COLOR_SCHEME_SCHEMA,
    'tmtheme': TMTHEME_SCHEMA,
    'tmpreferences': TMPREFERENCES_SCHEMA,
    'keymap': KEYMAP_SCHEMA,
    'build-system': BUILD_SYSTEM_SCHEMA,
    'snippet': SNIPPET_SCHEMA,
    'syntax-test': SYNTAX_TEST_SCHEMA,
};

export function rootSchema(dialect: Dialect): SchemaNode {
    return CATALOG[dialect];
}

/**
 * Schema node of the named key of a mapping node, falling back to `anyKey`.
 */
export function childSchema(node: SchemaNode, key: string): SchemaNode | null {
    const known = node.children?.find(child => child.name === key);
    return known ?? node.anyKey ?? null;
}

/**
 * Follow a structural path down a schema tree. Sequence indices select
 * `items` whatever their value; an unmatched segment yields null.
 */
export function lookupFrom(root: SchemaNode, path: StructuralPath): SchemaNode | null {
    let node: SchemaNode | null = root;
    for (const segment of path) {
        if (!node) return null;
        node = typeof segment === 'number' ? node.items ?? null : childSchema(node, segment);
    }
    return node;
}

export function lookup(dialect: Dialect, path: StructuralPath): SchemaNode | null {
    return lookupFrom(rootSchema(dialect), path);
}

/** A node that holds a mapping */
export function acceptsMapping(node: SchemaNode): boolean {
    return node.children !== undefined || node.anyKey !== undefined;
}

/** A node that holds a scalar */
export function acceptsScalar(node: SchemaNode): boolean {
    return node.kind !== 'object' && node.kind !== 'array';
}
