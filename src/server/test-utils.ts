/**
 * Shared test utilities for the syntax package language server tests.
 * Import these helpers instead of duplicating them in each test file.
 */

import { TextDocument } from 'vscode-languageserver-textdocument';
import { ScopeRegistry } from './registry';
import { Logger, SyntaxFile } from './types';

export { parseCursor } from '../parser/test-utils';

/**
 * Create a TextDocument for testing.
 */
export function createDocument(content: string, uri = 'file:///test.sublime-syntax', languageId = 'sublime-syntax'): TextDocument {
    return TextDocument.create(uri, languageId, 1, content);
}

export interface LogRecord {
    level: 'error' | 'warn' | 'info' | 'log';
    message: string;
}

/**
 * Logger that keeps every message for assertions.
 */
export function createRecordingLogger(): Logger & { records: LogRecord[] } {
    const records: LogRecord[] = [];
    return {
        records,
        error: message => records.push({ level: 'error', message }),
        warn: message => records.push({ level: 'warn', message }),
        info: message => records.push({ level: 'info', message }),
        log: message => records.push({ level: 'log', message }),
    };
}

/**
 * Syntax file whose package is taken from its resource path.
 */
export function syntaxFile(resourcePath: string, text: string): SyntaxFile {
    const packageId = resourcePath.split('/')[1] ?? 'User';
    return { resourcePath, packageId, text };
}

/**
 * Registry loaded with the given files, grouped into packages by resource path.
 */
export function createRegistry(files: Record<string, string>, logger?: Logger): ScopeRegistry {
    const registry = new ScopeRegistry(logger);
    const byPackage = new Map<string, SyntaxFile[]>();
    for (const [resourcePath, text] of Object.entries(files)) {
        const file = syntaxFile(resourcePath, text);
        byPackage.set(file.packageId, [...(byPackage.get(file.packageId) ?? []), file]);
    }
    for (const [packageId, packageFiles] of byPackage) {
        registry.replacePackage(packageId, packageFiles);
    }
    return registry;
}

// ============================================================================
// Fixtures
// ============================================================================

export const PYTHON_SYNTAX = `%YAML 1.2
---
name: Python
scope: source.python
file_extensions: [py]
contexts:
  main:
    - match: '"'
      scope: punctuation.definition.string.begin.python
      push: double-string
    - match: '#.*'
      scope: comment.line.number-sign.python
  double-string:
    - meta_scope: string.quoted.double.python
    - match: '"'
      pop: true
`;

export const JSON_TM_LANGUAGE = `<?xml version="1.0" encoding="UTF-8"?>
<plist version="1.0">
<dict>
    <key>name</key>
    <string>JSON</string>
    <key>scopeName</key>
    <string>source.json</string>
    <key>patterns</key>
    <array>
        <dict>
            <key>match</key>
            <string>\\b(?:true|false)\\b</string>
            <key>name</key>
            <string>constant.language.json</string>
        </dict>
        <dict>
            <key>include</key>
            <string>#strings</string>
        </dict>
    </array>
    <key>repository</key>
    <dict>
        <key>strings</key>
        <dict>
            <key>begin</key>
            <string>"</string>
            <key>end</key>
            <string>"</string>
            <key>name</key>
            <string>string.quoted.double.json</string>
        </dict>
    </dict>
</dict>
</plist>
`;
