/**
 * Schema of TextMate themes (`.tmTheme` property lists).
 */

import { SchemaNode } from '../types';
import { color, enumOf, freezeSchema, list, mapping, scalar, str } from './nodes';

const THEME_COLORS = [
    'foreground',
    'background',
    'caret',
    'invisibles',
    'lineHighlight',
    'selection',
    'selectionForeground',
    'selectionBorder',
    'inactiveSelection',
    'findHighlight',
    'findHighlightForeground',
    'highlight',
    'guide',
    'activeGuide',
    'stackGuide',
    'gutter',
    'gutterForeground',
    'misspelling',
    'accent',
    'bracketsForeground',
    'tagsForeground',
    'shadow',
];

const styleSettings = mapping('settings', [
    ...THEME_COLORS.map(name => color(name)),
    enumOf('fontStyle', ['bold', 'italic', 'underline', 'glow', 'stippled_underline', 'squiggly_underline'],
        'Space-separated font styles'),
    scalar('popupCss', 'css-variable', 'CSS for popups'),
    scalar('phantomCss', 'css-variable', 'CSS for phantoms'),
    str('bracketsOptions'),
    str('tagsOptions'),
    str('shadowWidth'),
], 'Style attributes');

export const TMTHEME_SCHEMA: SchemaNode = freezeSchema(mapping('tmtheme', [
    str('name', 'Name of the theme'),
    str('author'),
    str('uuid'),
    str('comment'),
    str('semanticClass'),
    enumOf('colorSpaceName', ['sRGB', 'GenericRGB']),
    list('settings', mapping('rule', [
        str('name', 'Description of the rule'),
        scalar('scope', 'scope-selector', 'Selector of the text the rule applies to'),
        styleSettings,
    ]), 'Global settings followed by scope rules'),
], 'TextMate theme'));
