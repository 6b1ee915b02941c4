/**
 * Schema of `.sublime-keymap` files.
 */

import { SchemaNode } from '../types';
import { bool, dictOf, enumOf, freezeSchema, list, mapping, scalar, str } from './nodes';

const CONTEXT_OPERATORS = [
    'equal',
    'not_equal',
    'regex_match',
    'not_regex_match',
    'regex_contains',
    'not_regex_contains',
] as const;

/** Built-in context keys, plus the ones this server answers */
const CONTEXT_KEYS = [
    'selector',
    'preceding_text',
    'following_text',
    'text',
    'selection_empty',
    'eol_selector',
    'auto_complete_visible',
    'has_next_field',
    'has_prev_field',
    'num_selections',
    'overlay_has_focus',
    'overlay_name',
    'panel',
    'panel_has_focus',
    'panel_visible',
    'popup_visible',
    'read_only',
    'is_recording_macro',
    'line_above_is_a_syntax_test',
    'current_line_is_a_syntax_test',
    'file_contains_syntax_tests',
];

export const KEYMAP_SCHEMA: SchemaNode = freezeSchema(list('keymap', mapping('binding', [
    list('keys', str('key'), 'Key chords, e.g. "ctrl+shift+p"'),
    str('command', 'Command to run'),
    dictOf('args', scalar('argument', 'any'), 'Command arguments'),
    list('context', mapping('condition', [
        { ...str('key', 'Context key; `setting.<name>` queries a setting'), values: CONTEXT_KEYS },
        enumOf('operator', CONTEXT_OPERATORS),
        scalar('operand', 'any'),
        bool('match_all', 'All selections must match'),
    ]), 'Conditions under which the binding applies'),
]), 'Key bindings'));
