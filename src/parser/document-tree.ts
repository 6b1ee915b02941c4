/**
 * Whole-document trees for validation and indexing.
 *
 * Each format is parsed by an error-tolerant library and converted into the
 * format-neutral DocNode shape. Parse errors are collected, never thrown.
 */

import { parseTree, printParseErrorCode, ParseError, Node as JsonNode } from 'jsonc-parser';
import { parseDocument as parseYamlDocument, isMap, isSeq, isScalar, isPair, Node as YamlNode } from 'yaml';
import { parseDocument as parseXmlDocument, DomUtils } from 'htmlparser2';
import { Element, isTag } from 'domhandler';
import { DocNode, DocParseError, DocumentFormat, DocumentTree, TextRange } from './types';

/**
 * Parse a complete document of the given format.
 */
export function parseDocumentTree(text: string, format: DocumentFormat): DocumentTree {
    switch (format) {
        case 'json':
            return parseJsonTree(text);
        case 'yaml':
            return parseYamlTree(text);
        case 'plist':
            return parseXmlTree(text, true);
        case 'xml':
            return parseXmlTree(text, false);
        case 'text':
            return { root: null, errors: [] };
    }
}

// ---------------------------------------------------------------------------
// JSON

function parseJsonTree(text: string): DocumentTree {
    const parseErrors: ParseError[] = [];
    const tree = parseTree(text, parseErrors, { allowTrailingComma: true, disallowComments: false });
    const errors = parseErrors.map(e => ({
        message: printParseErrorCode(e.error),
        range: { start: e.offset, end: e.offset + e.length },
    }));
    return { root: tree ? convertJson(tree) : null, errors };
}

function convertJson(node: JsonNode, key?: string, keyRange?: TextRange): DocNode {
    const range = { start: node.offset, end: node.offset + node.length };
    const base = { key, keyRange, range };

    switch (node.type) {
        case 'object': {
            const children: DocNode[] = [];
            for (const property of node.children ?? []) {
                const [keyNode, valueNode] = property.children ?? [];
                if (!keyNode || typeof keyNode.value !== 'string') continue;
                const propertyKeyRange = { start: keyNode.offset, end: keyNode.offset + keyNode.length };
                if (valueNode) {
                    children.push(convertJson(valueNode, keyNode.value, propertyKeyRange));
                } else {
                    children.push({
                        kind: 'unknown',
                        key: keyNode.value,
                        keyRange: propertyKeyRange,
                        range: { start: propertyKeyRange.end, end: propertyKeyRange.end },
                        children: [],
                    });
                }
            }
            return { ...base, kind: 'object', children };
        }
        case 'array':
            return { ...base, kind: 'array', children: (node.children ?? []).map(child => convertJson(child)) };
        case 'string':
            return { ...base, kind: 'string', value: String(node.value), children: [] };
        case 'number':
            return { ...base, kind: 'number', value: Number(node.value), children: [] };
        case 'boolean':
            return { ...base, kind: 'boolean', value: node.value === true, children: [] };
        case 'null':
            return { ...base, kind: 'null', value: null, children: [] };
        default:
            return { ...base, kind: 'unknown', children: [] };
    }
}

// ---------------------------------------------------------------------------
// YAML

function parseYamlTree(text: string): DocumentTree {
    const document = parseYamlDocument(text, { prettyErrors: false, uniqueKeys: false });
    const errors: DocParseError[] = document.errors.map(e => ({
        message: e.message,
        range: { start: e.pos[0], end: e.pos[1] },
    }));
    const contents = document.contents;
    return { root: contents ? convertYaml(contents) : null, errors };
}

function yamlRange(node: YamlNode): TextRange {
    const range = node.range;
    if (!range) return { start: 0, end: 0 };
    return { start: range[0], end: range[1] };
}

function convertYaml(node: YamlNode, key?: string, keyRange?: TextRange): DocNode {
    const base = { key, keyRange, range: yamlRange(node) };

    if (isMap(node)) {
        const children: DocNode[] = [];
        for (const pair of node.items) {
            if (!isPair(pair) || !isScalar(pair.key)) continue;
            const pairKey = String(pair.key.value);
            const pairKeyRange = yamlRange(pair.key);
            if (pair.value && (isMap(pair.value) || isSeq(pair.value) || isScalar(pair.value))) {
                children.push(convertYaml(pair.value, pairKey, pairKeyRange));
            } else {
                children.push({
                    kind: 'null',
                    key: pairKey,
                    keyRange: pairKeyRange,
                    range: { start: pairKeyRange.end, end: pairKeyRange.end },
                    value: null,
                    children: [],
                });
            }
        }
        return { ...base, kind: 'object', children };
    }

    if (isSeq(node)) {
        const children: DocNode[] = [];
        for (const item of node.items) {
            if (isMap(item) || isSeq(item) || isScalar(item)) {
                children.push(convertYaml(item));
            }
        }
        return { ...base, kind: 'array', children };
    }

    if (isScalar(node)) {
        const value = node.value;
        if (typeof value === 'string') return { ...base, kind: 'string', value, children: [] };
        if (typeof value === 'number') return { ...base, kind: 'number', value, children: [] };
        if (typeof value === 'boolean') return { ...base, kind: 'boolean', value, children: [] };
        if (value === null || value === undefined) return { ...base, kind: 'null', value: null, children: [] };
        return { ...base, kind: 'string', value: String(value), children: [] };
    }

    return { ...base, kind: 'unknown', children: [] };
}

// ---------------------------------------------------------------------------
// Property lists and plain XML

function parseXmlTree(text: string, plist: boolean): DocumentTree {
    const document = parseXmlDocument(text, {
        xmlMode: true,
        withStartIndices: true,
        withEndIndices: true,
    });
    const rootElement = document.children.find(isTag);
    if (!rootElement) {
        return { root: null, errors: [] };
    }

    if (!plist) {
        // The document element itself is the single key of the root mapping
        const root: DocNode = {
            kind: 'object',
            range: { start: 0, end: text.length },
            children: [convertXmlElement(rootElement)],
        };
        return { root, errors: [] };
    }

    // <plist><dict>...</dict></plist>; tolerate a bare top-level dict
    const top = rootElement.name === 'plist' ? rootElement.children.find(isTag) : rootElement;
    return { root: top ? convertPlist(top) : null, errors: [] };
}

function elementRange(element: Element): TextRange {
    const start = element.startIndex ?? 0;
    const end = element.endIndex !== null && element.endIndex !== undefined ? element.endIndex + 1 : start;
    return { start, end };
}

function convertPlist(element: Element, key?: string, keyRange?: TextRange): DocNode {
    const base = { key, keyRange, range: elementRange(element) };
    const text = DomUtils.textContent(element);

    switch (element.name) {
        case 'dict': {
            const children: DocNode[] = [];
            let pendingKey: { name: string; range: TextRange } | null = null;
            for (const child of element.children.filter(isTag)) {
                if (child.name === 'key') {
                    pendingKey = { name: DomUtils.textContent(child).trim(), range: elementRange(child) };
                    continue;
                }
                if (pendingKey) {
                    children.push(convertPlist(child, pendingKey.name, pendingKey.range));
                    pendingKey = null;
                }
            }
            if (pendingKey) {
                children.push({
                    kind: 'unknown',
                    key: pendingKey.name,
                    keyRange: pendingKey.range,
                    range: { start: pendingKey.range.end, end: pendingKey.range.end },
                    children: [],
                });
            }
            return { ...base, kind: 'object', children };
        }
        case 'array':
            return { ...base, kind: 'array', children: element.children.filter(isTag).map(child => convertPlist(child)) };
        case 'string':
        case 'date':
        case 'data':
            return { ...base, kind: 'string', value: text, children: [] };
        case 'integer':
        case 'real': {
            const numeric = Number(text.trim());
            return Number.isNaN(numeric) || text.trim() === ''
                ? { ...base, kind: 'string', value: text, children: [] }
                : { ...base, kind: 'number', value: numeric, children: [] };
        }
        case 'true':
        case 'false':
            return { ...base, kind: 'boolean', value: element.name === 'true', children: [] };
        default:
            return { ...base, kind: 'unknown', children: [] };
    }
}

function convertXmlElement(element: Element): DocNode {
    const range = elementRange(element);
    const childElements = element.children.filter(isTag);
    if (childElements.length === 0) {
        return {
            kind: 'string',
            key: element.name,
            keyRange: { start: range.start, end: range.start + element.name.length + 1 },
            range,
            value: DomUtils.textContent(element),
            children: [],
        };
    }
    return {
        kind: 'object',
        key: element.name,
        keyRange: { start: range.start, end: range.start + element.name.length + 1 },
        range,
        children: childElements.map(convertXmlElement),
    };
}

// ---------------------------------------------------------------------------
// Plain values

export type PlainValue = string | number | boolean | null | PlainValue[] | { [key: string]: PlainValue };

/**
 * Convert a DocNode into plain data (last key wins on duplicates).
 */
export function toPlainValue(node: DocNode): PlainValue {
    switch (node.kind) {
        case 'object': {
            const result: { [key: string]: PlainValue } = {};
            for (const child of node.children) {
                if (child.key !== undefined) {
                    result[child.key] = toPlainValue(child);
                }
            }
            return result;
        }
        case 'array':
            return node.children.map(toPlainValue);
        case 'unknown':
            return null;
        default:
            return node.value ?? null;
    }
}

/**
 * Find a direct child of an object node by key.
 */
export function childByKey(node: DocNode | null | undefined, key: string): DocNode | undefined {
    if (!node || node.kind !== 'object') return undefined;
    return node.children.find(c => c.key === key);
}
