/**
 * Schema of `.sublime-color-scheme` files.
 */

import { SchemaNode } from '../types';
import globalKeys from '../data/color-scheme-globals.json';
import { color, dictOf, enumOf, freezeSchema, list, mapping, scalar, str } from './nodes';

const FONT_STYLES = [
    'normal',
    'bold',
    'italic',
    'underline',
    'stippled_underline',
    'squiggly_underline',
    'glow',
] as const;

const fontStyle = (name: string) => enumOf(name, FONT_STYLES, 'Space-separated font styles');

const rule = mapping('rule', [
    str('name', 'Description of the rule'),
    scalar('scope', 'scope-selector', 'Selector of the text the rule applies to'),
    color('foreground', 'Text color'),
    color('background', 'Background color'),
    str('foreground_adjust', 'Color adjusters applied to the foreground'),
    color('selection_foreground', 'Text color when selected'),
    fontStyle('font_style'),
]);

export const COLOR_SCHEME_SCHEMA: SchemaNode = freezeSchema(mapping('color-scheme', [
    str('name', 'Name of the color scheme'),
    str('author', 'Author of the color scheme'),
    dictOf('variables', color('variable'), 'Colors referenced with var(name)'),
    mapping('globals', [
        ...globalKeys.colors.map(name => color(name)),
        ...globalKeys.strings.map(name => str(name)),
        ...globalKeys.css.map(name => scalar(name, 'css-variable', 'CSS for minihtml content')),
    ], 'Colors of the editor interface'),
    list('rules', rule, 'Styles assigned to scope selectors'),
], 'Color scheme'));
