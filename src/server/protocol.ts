/**
 * Wire protocol between the language server and its client: custom method
 * names, narrowing of untyped parameters, and conversion of engine results
 * into LSP shapes.
 */

import {
    CompletionItem,
    CompletionItemKind,
    CompletionList,
    Diagnostic,
    DiagnosticSeverity,
    Position,
    Range,
    TextEdit,
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import { Dialect, dialectFromFileName, isDialect, isSyntaxTestFile } from '../parser';
import { DIAGNOSTIC_SOURCE } from './constants';
import { isRecord } from './settings';
import {
    CandidateKind,
    CompletionCandidate,
    Finding,
    FindingSeverity,
    PackageChangeEvent,
    PackageChangeKind,
    SyntaxFile,
} from './types';

/** Client notification: a package's syntax files changed */
export const PACKAGE_CHANGED_NOTIFICATION = 'syntaxDev/packageChanged';
/** Request: spaces that align the cursor with the previous assertion */
export const ALIGN_SYNTAX_TEST_REQUEST = 'syntaxDev/alignSyntaxTest';
/** Request: answer a key binding context query */
export const QUERY_CONTEXT_REQUEST = 'syntaxDev/queryContext';
/** Request: region of the tested line covered by the nearest assertion */
export const ASSERTED_REGION_REQUEST = 'syntaxDev/assertedRegion';
/** Request: assertion for the selection, from the client's scopes of the tested line */
export const SUGGEST_SYNTAX_TEST_REQUEST = 'syntaxDev/suggestSyntaxTest';

export const COMPLETION_TRIGGER_CHARACTERS = ['.', '"', ':', ' ', '(', '<', '-'];

const CHANGE_KINDS: readonly PackageChangeKind[] = ['added', 'updated', 'removed'];

const ITEM_KINDS: Readonly<Record<CandidateKind, CompletionItemKind>> = {
    key: CompletionItemKind.Property,
    scope: CompletionItemKind.EnumMember,
    variable: CompletionItemKind.Variable,
    action: CompletionItemKind.Reference,
    value: CompletionItemKind.Value,
    color: CompletionItemKind.Color,
};

const SEVERITIES: Readonly<Record<FindingSeverity, DiagnosticSeverity>> = {
    error: DiagnosticSeverity.Error,
    warning: DiagnosticSeverity.Warning,
    information: DiagnosticSeverity.Information,
    hint: DiagnosticSeverity.Hint,
};

function isChangeKind(value: unknown): value is PackageChangeKind {
    return CHANGE_KINDS.some(kind => kind === value);
}

function isPosition(value: unknown): value is Position {
    return isRecord(value)
        && typeof value.line === 'number'
        && typeof value.character === 'number';
}

/**
 * Narrow a `syntaxDev/packageChanged` payload. Syntax files are absolute
 * paths or `{ resourcePath, text }` objects; anything else is dropped.
 */
export function parsePackageChangeEvent(value: unknown): PackageChangeEvent | null {
    if (!isRecord(value)) return null;
    const { kind, packageId, packagePath } = value;
    if (!isChangeKind(kind) || typeof packageId !== 'string' || packageId.length === 0) return null;

    const syntaxFiles: Array<string | SyntaxFile> = [];
    for (const file of Array.isArray(value.syntaxFiles) ? value.syntaxFiles : []) {
        if (typeof file === 'string') {
            syntaxFiles.push(file);
        } else if (isRecord(file) && typeof file.resourcePath === 'string' && typeof file.text === 'string') {
            const filePackage = typeof file.packageId === 'string' ? file.packageId : packageId;
            syntaxFiles.push({ resourcePath: file.resourcePath, packageId: filePackage, text: file.text });
        }
    }

    return {
        kind,
        packageId,
        packagePath: typeof packagePath === 'string' ? packagePath : undefined,
        syntaxFiles,
    };
}

export interface DocumentPositionParams {
    uri: string;
    position: Position;
}

/**
 * Narrow `{ textDocument: { uri }, position }` parameters.
 */
export function parseDocumentPosition(value: unknown): DocumentPositionParams | null {
    if (!isRecord(value) || !isRecord(value.textDocument)) return null;
    const { position } = value;
    const uri = value.textDocument.uri;
    return typeof uri === 'string' && isPosition(position) ? { uri, position } : null;
}

export interface QueryContextParams extends DocumentPositionParams {
    key: string;
    operator: string;
    operand: unknown;
}

export function parseQueryContextParams(value: unknown): QueryContextParams | null {
    const base = parseDocumentPosition(value);
    if (!base || !isRecord(value)) return null;
    const { key, operator, operand } = value;
    if (typeof key !== 'string' || typeof operator !== 'string') return null;
    return { ...base, key, operator, operand };
}

export interface AssertedRegionParams {
    uri: string;
    range: Range;
}

export function parseAssertedRegionParams(value: unknown): AssertedRegionParams | null {
    if (!isRecord(value) || !isRecord(value.textDocument) || !isRecord(value.range)) return null;
    const { start, end } = value.range;
    const uri = value.textDocument.uri;
    if (typeof uri !== 'string' || !isPosition(start) || !isPosition(end)) return null;
    return { uri, range: { start, end } };
}

export interface SuggestSyntaxTestParams extends AssertedRegionParams {
    /** Scope stack at each column of the tested line */
    scopes: string[];
    baseScope: string | null;
    character: string;
}

export function parseSuggestSyntaxTestParams(value: unknown): SuggestSyntaxTestParams | null {
    const base = parseAssertedRegionParams(value);
    if (!base || !isRecord(value)) return null;
    const { scopes, baseScope, character } = value;
    if (!Array.isArray(scopes) || !scopes.every((scope): scope is string => typeof scope === 'string')) return null;
    return {
        ...base,
        scopes,
        baseScope: typeof baseScope === 'string' ? baseScope : null,
        character: typeof character === 'string' && character.length > 0 ? character : '^',
    };
}

/**
 * Dialect of a document: the language id when the client uses one of ours,
 * otherwise the file name, otherwise a syntax test header.
 */
export function dialectOf(languageId: string, uri: string, text: string): Dialect | null {
    if (isDialect(languageId)) return languageId;
    const fileName = URI.parse(uri).path;
    return dialectFromFileName(fileName) ?? (isSyntaxTestFile(null, text) ? 'syntax-test' : null);
}

/**
 * File system path of a document, or null for documents that are not saved
 * files (`untitled:` buffers and the like).
 */
export function fileNameOf(uri: string): string | null {
    const parsed = URI.parse(uri);
    return parsed.scheme === 'file' ? parsed.fsPath : null;
}

/**
 * Convert a candidate into a completion item that replaces its range.
 * `sortText` keeps the engine's order.
 */
export function toCompletionItem(candidate: CompletionCandidate, document: TextDocument, index: number): CompletionItem {
    const range = Range.create(document.positionAt(candidate.replaceStart), document.positionAt(candidate.replaceEnd));
    return {
        label: candidate.displayText,
        kind: ITEM_KINDS[candidate.kind],
        detail: candidate.detail,
        sortText: String(index).padStart(5, '0'),
        textEdit: TextEdit.replace(range, candidate.insertText),
    };
}

/**
 * The engine matches and truncates for the word typed so far, so the list is
 * incomplete: the client asks again as the word grows.
 */
export function toCompletionList(candidates: readonly CompletionCandidate[], document: TextDocument): CompletionList {
    return {
        isIncomplete: true,
        items: candidates.map((candidate, index) => toCompletionItem(candidate, document, index)),
    };
}

export function toDiagnostic(finding: Finding, document: TextDocument): Diagnostic {
    return {
        range: Range.create(document.positionAt(finding.range.start), document.positionAt(finding.range.end)),
        severity: SEVERITIES[finding.severity],
        message: finding.message,
        code: finding.code,
        source: DIAGNOSTIC_SOURCE,
    };
}
