/**
 * Schema-guided traversal of a document tree.
 */

import { DocNode } from '../../../parser';
import { acceptsMapping, childSchema } from '../../schemas';
import { SchemaNode } from '../../types';

export type SchemaVisitor = (node: DocNode, schema: SchemaNode) => void;

/**
 * Visit every node whose schema is known, parents before children. Nodes
 * under an unknown key are not visited.
 */
export function walkDocument(root: DocNode, schema: SchemaNode, visit: SchemaVisitor): void {
    const stack: { node: DocNode; schema: SchemaNode }[] = [{ node: root, schema }];
    while (stack.length > 0) {
        const frame = stack.pop();
        if (!frame) break;
        visit(frame.node, frame.schema);

        const children: { node: DocNode; schema: SchemaNode }[] = [];
        if (frame.node.kind === 'object' && acceptsMapping(frame.schema)) {
            for (const child of frame.node.children) {
                const childNodeSchema = child.key !== undefined ? childSchema(frame.schema, child.key) : null;
                if (childNodeSchema) children.push({ node: child, schema: childNodeSchema });
            }
        } else if (frame.node.kind === 'array' && frame.schema.items) {
            const items = frame.schema.items;
            for (const child of frame.node.children) {
                children.push({ node: child, schema: items });
            }
        }
        // Reversed so siblings are visited in document order
        stack.push(...children.reverse());
    }
}
