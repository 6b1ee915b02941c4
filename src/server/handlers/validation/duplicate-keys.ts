/**
 * Duplicate key detection.
 * Reports the second and later occurrences of a key in the same mapping.
 */

import { DocNode } from '../../../parser';
import { childSchema } from '../../schemas';
import { Finding, SchemaNode } from '../../types';
import { walkDocument } from './walk';

export function checkDuplicateKeys(root: DocNode, schema: SchemaNode): Finding[] {
    const findings: Finding[] = [];

    walkDocument(root, schema, (node, nodeSchema) => {
        if (node.kind !== 'object') return;

        const seen = new Set<string>();
        for (const child of node.children) {
            if (child.key === undefined) continue;
            if (childSchema(nodeSchema, child.key)?.repeatable === true) continue;

            if (seen.has(child.key)) {
                findings.push({
                    range: child.keyRange ?? child.range,
                    severity: 'information',
                    message: `Duplicate key '${child.key}'`,
                    code: 'duplicate-key',
                });
            } else {
                seen.add(child.key);
            }
        }
    });

    return findings;
}
