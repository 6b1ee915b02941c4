/**
 * Schema of `.tmPreferences` metadata files.
 */

import { SchemaNode } from '../types';
import { bool, freezeSchema, list, mapping, regex, scalar, str } from './nodes';

export const TMPREFERENCES_SCHEMA: SchemaNode = freezeSchema(mapping('tmpreferences', [
    str('name'),
    scalar('scope', 'scope-selector', 'Selector of the text the settings apply to'),
    str('uuid'),
    mapping('settings', [
        list('shellVariables', mapping('variable', [
            str('name', 'Variable name, e.g. TM_COMMENT_START'),
            str('value'),
        ]), 'Variables used by commands such as toggle comment'),
        bool('showInSymbolList', 'Show matches in Goto Symbol'),
        bool('showInIndexedSymbolList', 'Show matches in Goto Symbol in Project'),
        regex('symbolTransformation', 'Substitutions applied to symbols'),
        regex('symbolIndexTransformation', 'Substitutions applied to indexed symbols'),
        regex('increaseIndentPattern'),
        regex('decreaseIndentPattern'),
        regex('bracketIndentNextLinePattern'),
        regex('disableIndentNextLinePattern'),
        regex('unIndentedLinePattern'),
        bool('indentParens'),
        bool('indentSquareBrackets'),
        bool('preserveIndent'),
        regex('cancelCompletion', 'Suppress auto complete when the line matches'),
        bool('isIgnoredByAutoIndent'),
        str('icon', 'Icon shown for matching files'),
    ], 'Metadata settings'),
], 'Metadata'));
