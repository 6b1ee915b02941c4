/**
 * Shared types for the syntax package language server.
 */

import { Dialect, TextRange } from '../parser';

// ---------------------------------------------------------------------------
// Schema catalogs

/**
 * What a schema position holds when its value is a scalar.
 * `object` and `array` positions take no scalar at all.
 */
export type ValueKind =
    | 'object'
    | 'array'
    | 'string'
    | 'enum'
    | 'number'
    | 'boolean'
    | 'scope-selector'
    | 'scope-name'
    | 'color'
    | 'css-variable'
    | 'action-reference'
    | 'regex'
    | 'any';

/** What an action reference points at */
export type ReferenceTarget = 'context' | 'include' | 'syntax-file';

/**
 * One key or value position in a dialect's schema.
 *
 * A node describes every shape its value may take: a scalar of `kind`, a
 * mapping (when `children` or `anyKey` is set) or a sequence (when `items` is
 * set).
 */
export interface SchemaNode {
    name: string;
    kind: ValueKind;
    description?: string;
    /** Known keys of a mapping value */
    children?: readonly SchemaNode[];
    /** Schema for keys not listed in `children` (user-named keys) */
    anyKey?: SchemaNode;
    /** Schema of sequence items */
    items?: SchemaNode;
    /** Finite value set of `enum` nodes; static names of `action-reference` nodes */
    values?: readonly string[];
    /** Key may occur more than once in the same mapping */
    repeatable?: boolean;
    reference?: ReferenceTarget;
}

// ---------------------------------------------------------------------------
// Scope registry

/**
 * A scope name and the syntax file that declares it.
 */
export interface ScopeEntry {
    name: string;
    /** Resource path of the declaring syntax, e.g. `Packages/Python/Python.sublime-syntax` */
    source: string;
    packageId: string;
    /** Only reachable from hidden syntaxes */
    internal: boolean;
}

/**
 * Syntax file contents handed to the registry.
 */
export interface SyntaxFile {
    /** Resource path, `Packages/<package>/<relative path>` */
    resourcePath: string;
    packageId: string;
    text: string;
}

export type SyntaxReference =
    | { kind: 'scope'; scope: string }
    | { kind: 'path'; path: string };

/**
 * What indexing one syntax file yields, before references are resolved.
 */
export interface SyntaxRecord {
    resourcePath: string;
    packageId: string;
    /** Top-level scope of the syntax (`scope` / `scopeName`) */
    baseScope: string | null;
    hidden: boolean;
    /** Scopes assigned by the file itself, sorted and unique */
    ownScopes: readonly string[];
    references: readonly SyntaxReference[];
}

export type PackageChangeKind = 'added' | 'updated' | 'removed';

/**
 * Host notification that a package's syntax files changed.
 */
export interface PackageChangeEvent {
    kind: PackageChangeKind;
    packageId: string;
    /** Package directory, used to build resource paths and to read files */
    packagePath?: string;
    /** Contained syntax files: absolute paths, or contents supplied by the host */
    syntaxFiles: ReadonlyArray<string | SyntaxFile>;
}

// ---------------------------------------------------------------------------
// Completion

/**
 * Classification of the token under the cursor. Each variant carries what
 * its resolver needs.
 */
export type CompletionContext =
    | { kind: 'key-name'; parent: SchemaNode; siblingKeys: readonly string[] }
    | { kind: 'scope-selector'; node: SchemaNode | null; word: string; wordStart: number; inSelector: boolean }
    | { kind: 'css-variable'; word: string; wordStart: number; variables: readonly string[] }
    | { kind: 'action-name'; node: SchemaNode; contexts: readonly string[] }
    | { kind: 'value-enum'; node: SchemaNode }
    | { kind: 'color'; node: SchemaNode; variables: readonly string[] }
    | { kind: 'free-text' };

export type CompletionContextKind = CompletionContext['kind'];

/** How a candidate matched the typed word; earlier tiers rank first */
export type MatchTier = 'prefix' | 'substring' | 'fuzzy';

/** Where a candidate came from; earlier sources win ties */
export type CandidateSource = 'schema' | 'document' | 'registry' | 'builtin';

export type CandidateKind = 'key' | 'scope' | 'variable' | 'action' | 'value' | 'color';

export interface CompletionCandidate {
    displayText: string;
    /** Text to insert over `replaceStart..replaceEnd`, already escaped */
    insertText: string;
    replaceStart: number;
    replaceEnd: number;
    detail?: string;
    kind: CandidateKind;
    tier: MatchTier;
    internal: boolean;
    source: CandidateSource;
}

// ---------------------------------------------------------------------------
// Validation

export type FindingSeverity = 'error' | 'warning' | 'information' | 'hint';

export type FindingCode = 'unknown-key' | 'unknown-scope' | 'invalid-value' | 'parse-error' | 'duplicate-key';

export interface Finding {
    range: TextRange;
    severity: FindingSeverity;
    message: string;
    code: FindingCode;
}

// ---------------------------------------------------------------------------
// Ambient

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Log sink. The language server passes `connection.console`.
 */
export interface Logger {
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    log(message: string): void;
}

export interface ValidationSettings {
    unknownKeys: boolean;
    unknownScopes: boolean;
    invalidValues: boolean;
}

export interface Settings {
    /** Directories holding one sub-directory per package */
    packagesPaths: string[];
    logLevel: LogLevel;
    maxCompletionItems: number;
    validation: ValidationSettings;
}

export type { Dialect };
