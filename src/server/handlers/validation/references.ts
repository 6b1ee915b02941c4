/**
 * References to syntax files that no loaded package provides.
 */

import { DocNode } from '../../../parser';
import { ScopeRegistry } from '../../registry';
import { Finding, SchemaNode } from '../../types';
import { walkDocument } from './walk';

export function checkSyntaxReferences(root: DocNode, schema: SchemaNode, registry: ScopeRegistry): Finding[] {
    if (registry.isEmpty()) return [];
    const findings: Finding[] = [];

    walkDocument(root, schema, (node, nodeSchema) => {
        if (nodeSchema.reference !== 'syntax-file' || typeof node.value !== 'string') return;
        if (!node.value.startsWith('Packages/') || registry.hasSyntax(node.value)) return;
        findings.push({
            range: node.range,
            severity: 'hint',
            message: `Unknown syntax '${node.value}'`,
            code: 'invalid-value',
        });
    });

    return findings;
}
