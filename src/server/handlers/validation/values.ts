/**
 * Value checks: enumerated values, booleans, numbers and colors.
 */

import { DocNode } from '../../../parser';
import { COLOR_FUNCTIONS } from '../../constants';
import cssColors from '../../data/css-colors.json';
import { Finding, SchemaNode } from '../../types';
import { walkDocument } from './walk';

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3,4}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;
const VAR_REFERENCE = /^var\(\s*[\w-]+\s*\)$/;
const COLOR_FUNCTION = new RegExp(`^(?:${COLOR_FUNCTIONS.join('|')})\\(.*\\)$`, 's');
const NAMED_COLORS: ReadonlySet<string> = new Set(cssColors);

/**
 * Hex notation, a named CSS color, a variable reference or a color function.
 */
export function isColorValue(value: string): boolean {
    const trimmed = value.trim();
    return HEX_COLOR.test(trimmed)
        || NAMED_COLORS.has(trimmed.toLowerCase())
        || VAR_REFERENCE.test(trimmed)
        || COLOR_FUNCTION.test(trimmed);
}

function invalid(node: DocNode, message: string): Finding {
    return { range: node.range, severity: 'hint', message, code: 'invalid-value' };
}

function checkScalar(node: DocNode, schema: SchemaNode): Finding | null {
    switch (schema.kind) {
        case 'enum': {
            if (node.kind !== 'string' || typeof node.value !== 'string' || !schema.values) return null;
            const allowed = schema.values;
            const unknown = node.value.split(/\s+/).filter(word => word.length > 0 && !allowed.includes(word));
            if (unknown.length === 0) return null;
            return invalid(node, `Invalid value '${unknown[0]}' for ${schema.name}; expected ${allowed.join(', ')}`);
        }
        case 'boolean':
            if (node.kind === 'boolean' || (node.kind === 'number' && (node.value === 0 || node.value === 1))) {
                return null;
            }
            return invalid(node, `Expected a boolean for ${schema.name}`);
        case 'number':
            return node.kind === 'number' ? null : invalid(node, `Expected a number for ${schema.name}`);
        case 'color':
            if (node.kind === 'string' && typeof node.value === 'string' && isColorValue(node.value)) return null;
            return invalid(node, `Invalid color for ${schema.name}`);
        default:
            return null;
    }
}

export function checkValues(root: DocNode, schema: SchemaNode): Finding[] {
    const findings: Finding[] = [];

    walkDocument(root, schema, (node, nodeSchema) => {
        if (node.kind !== 'string' && node.kind !== 'number' && node.kind !== 'boolean') return;
        const finding = checkScalar(node, nodeSchema);
        if (finding) findings.push(finding);
    });

    return findings;
}
