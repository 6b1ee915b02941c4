/**
 * Unknown key detection.
 * Reports keys the dialect's schema does not define at their position.
 */

import { DocNode } from '../../../parser';
import { acceptsMapping, childSchema } from '../../schemas';
import { Finding, SchemaNode } from '../../types';
import { walkDocument } from './walk';

export function checkUnknownKeys(root: DocNode, schema: SchemaNode): Finding[] {
    const findings: Finding[] = [];

    walkDocument(root, schema, (node, nodeSchema) => {
        if (node.kind !== 'object' || !acceptsMapping(nodeSchema)) return;

        for (const child of node.children) {
            if (child.key === undefined || childSchema(nodeSchema, child.key)) continue;
            findings.push({
                range: child.keyRange ?? child.range,
                severity: 'information',
                message: `Unknown key '${child.key}' in ${nodeSchema.name}`,
                code: 'unknown-key',
            });
        }
    });

    return findings;
}
