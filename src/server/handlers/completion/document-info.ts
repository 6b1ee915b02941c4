/**
 * Names a document defines for itself: color variables and context names.
 */

import { Dialect, DocNode, childByKey, formatOf, parseDocumentTree } from '../../../parser';

export interface DocumentInfo {
    /** Color scheme `variables` keys */
    variables: string[];
    /** Context names as references write them (`main`, `#strings`) */
    contexts: string[];
}

const EMPTY_INFO: DocumentInfo = { variables: [], contexts: [] };

function keysOf(node: DocNode | undefined): string[] {
    if (!node || node.kind !== 'object') return [];
    const keys: string[] = [];
    for (const child of node.children) {
        if (child.key !== undefined && child.key.length > 0 && !keys.includes(child.key)) {
            keys.push(child.key);
        }
    }
    return keys;
}

/**
 * Collect document-defined names from whatever part of the document parses.
 */
export function extractDocumentInfo(text: string, dialect: Dialect): DocumentInfo {
    if (dialect !== 'color-scheme' && dialect !== 'sublime-syntax' && dialect !== 'tmlanguage') {
        return EMPTY_INFO;
    }

    const { root } = parseDocumentTree(text, formatOf(dialect));
    if (!root) return EMPTY_INFO;

    switch (dialect) {
        case 'color-scheme':
            return { variables: keysOf(childByKey(root, 'variables')), contexts: [] };
        case 'sublime-syntax':
            return { variables: [], contexts: keysOf(childByKey(root, 'contexts')) };
        case 'tmlanguage':
            return { variables: [], contexts: keysOf(childByKey(root, 'repository')).map(key => `#${key}`) };
    }
}
