/**
 * Builders for declarative schema tables.
 */

import { SchemaNode, ValueKind, ReferenceTarget } from '../types';

export function scalar(name: string, kind: ValueKind, description?: string): SchemaNode {
    return { name, kind, description };
}

export function str(name: string, description?: string): SchemaNode {
    return scalar(name, 'string', description);
}

export function bool(name: string, description?: string): SchemaNode {
    return scalar(name, 'boolean', description);
}

export function regex(name: string, description?: string): SchemaNode {
    return scalar(name, 'regex', description);
}

export function color(name: string, description?: string): SchemaNode {
    return scalar(name, 'color', description);
}

export function enumOf(name: string, values: readonly string[], description?: string): SchemaNode {
    return { name, kind: 'enum', values, description };
}

export function mapping(name: string, children: readonly SchemaNode[], description?: string): SchemaNode {
    return { name, kind: 'object', children, description };
}

/** Mapping whose keys are chosen by the author */
export function dictOf(name: string, anyKey: SchemaNode, description?: string): SchemaNode {
    return { name, kind: 'object', anyKey, description };
}

export function list(name: string, items: SchemaNode, description?: string): SchemaNode {
    return { name, kind: 'array', items, description };
}

export function reference(
    name: string,
    target: ReferenceTarget,
    description?: string,
    values?: readonly string[]
): SchemaNode {
    return { name, kind: 'action-reference', reference: target, description, values };
}

/**
 * Deep-freeze a schema tree. Trees may be cyclic (rules that nest rules).
 */
export function freezeSchema(root: SchemaNode): SchemaNode {
    const seen = new Set<SchemaNode>();
    const stack: SchemaNode[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (!node || seen.has(node)) continue;
        seen.add(node);
        stack.push(...(node.children ?? []));
        if (node.anyKey) stack.push(node.anyKey);
        if (node.items) stack.push(node.items);
        if (node.children) Object.freeze(node.children);
        if (node.values) Object.freeze(node.values);
        Object.freeze(node);
    }
    return root;
}
