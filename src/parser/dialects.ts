/**
 * Document dialects and the format each one is written in.
 */

import * as path from 'path';
import { DocumentFormat } from './types';

export type Dialect =
    | 'sublime-syntax'
    | 'tmlanguage'
    | 'color-scheme'
    | 'tmtheme'
    | 'tmpreferences'
    | 'keymap'
    | 'build-system'
    | 'snippet'
    | 'syntax-test';

export const DIALECT_FORMATS: Readonly<Record<Dialect, DocumentFormat>> = {
    'sublime-syntax': 'yaml',
    'tmlanguage': 'plist',
    'color-scheme': 'json',
    'tmtheme': 'plist',
    'tmpreferences': 'plist',
    'keymap': 'json',
    'build-system': 'json',
    'snippet': 'xml',
    'syntax-test': 'text',
};

const EXTENSION_DIALECTS: Readonly<Record<string, Dialect>> = {
    '.sublime-syntax': 'sublime-syntax',
    '.tmlanguage': 'tmlanguage',
    '.hidden-tmlanguage': 'tmlanguage',
    '.sublime-color-scheme': 'color-scheme',
    '.hidden-color-scheme': 'color-scheme',
    '.tmtheme': 'tmtheme',
    '.hidden-tmtheme': 'tmtheme',
    '.tmpreferences': 'tmpreferences',
    '.sublime-keymap': 'keymap',
    '.sublime-build': 'build-system',
    '.sublime-snippet': 'snippet',
};

export function isDialect(value: unknown): value is Dialect {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(DIALECT_FORMATS, value);
}

/**
 * Infer the dialect from a file name (extension, or the `syntax_test_` prefix).
 */
export function dialectFromFileName(fileName: string): Dialect | null {
    const baseName = path.basename(fileName);
    if (baseName.startsWith('syntax_test_')) {
        return 'syntax-test';
    }
    const extension = path.extname(baseName).toLowerCase();
    return EXTENSION_DIALECTS[extension] ?? null;
}

export function formatOf(dialect: Dialect): DocumentFormat {
    return DIALECT_FORMATS[dialect];
}
