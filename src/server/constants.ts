/**
 * Constants for the syntax package language server.
 */

import { Settings } from './types';

/** Source tag on every diagnostic */
export const DIAGNOSTIC_SOURCE = 'syntax-dev';

/** A selector word starting with this offers internal scopes */
export const INTERNAL_MARKER = '_';

/**
 * Top-level scope names of the scope naming conventions. Always offered in
 * selectors and always known to validation.
 */
export const BUILTIN_SCOPES = [
    'comment',
    'constant',
    'entity',
    'invalid',
    'keyword',
    'markup',
    'meta',
    'punctuation',
    'region',
    'source',
    'storage',
    'string',
    'support',
    'text',
    'variable',
] as const;

/** CSS variables minihtml defines for popups and phantoms */
export const MINIHTML_CSS_VARIABLES = [
    '--background',
    '--foreground',
    '--accent',
    '--redish',
    '--orangish',
    '--yellowish',
    '--greenish',
    '--cyanish',
    '--bluish',
    '--purplish',
    '--pinkish',
] as const;

/** Color functions accepted in color schemes */
export const COLOR_FUNCTIONS = ['color', 'rgb', 'rgba', 'hsl', 'hsla', 'hwb'] as const;

/**
 * Keys treated as scope selectors when the schema doesn't know where they sit.
 */
export const SELECTOR_KEYS = new Set(['scope', 'selector']);

export const DEFAULT_SETTINGS: Readonly<Settings> = {
    packagesPaths: [],
    logLevel: 'info',
    maxCompletionItems: 200,
    validation: {
        unknownKeys: true,
        unknownScopes: true,
        invalidValues: true,
    },
};
