/**
 * Schema of TextMate grammars (`.tmLanguage` property lists).
 */

import { SchemaNode } from '../types';
import { bool, dictOf, freezeSchema, list, mapping, reference, regex, scalar, str } from './nodes';

const ruleKeys: SchemaNode[] = [];
const rule = mapping('rule', ruleKeys, 'Grammar rule');

const capture = mapping('capture', [
    scalar('name', 'scope-name', 'Scope assigned to the capture group'),
    list('patterns', rule, 'Rules applied inside the capture'),
]);

const captures = (name: string, description: string) => dictOf(name, capture, description);

ruleKeys.push(
    regex('match', 'Single-line pattern'),
    regex('begin', 'Pattern that opens the region'),
    regex('end', 'Pattern that closes the region'),
    regex('while', 'Pattern that must match each following line'),
    scalar('name', 'scope-name', 'Scope assigned to the match or region'),
    scalar('contentName', 'scope-name', 'Scope assigned to the text between begin and end'),
    captures('captures', 'Scopes of capture groups'),
    captures('beginCaptures', 'Scopes of `begin` capture groups'),
    captures('endCaptures', 'Scopes of `end` capture groups'),
    captures('whileCaptures', 'Scopes of `while` capture groups'),
    reference('include', 'include', 'Repository item, grammar scope or $self', ['$self', '$base']),
    list('patterns', rule, 'Nested rules'),
    scalar('applyEndPatternLast', 'any', 'Try `end` after the nested patterns'),
    str('comment'),
    scalar('disabled', 'any', 'Skip this rule'),
    dictOf('repository', rule, 'Rules referenced with #name'),
);

export const TMLANGUAGE_SCHEMA: SchemaNode = freezeSchema(mapping('tmlanguage', [
    str('name', 'Name shown in the syntax menu'),
    scalar('scopeName', 'scope-name', 'Base scope of the grammar'),
    list('fileTypes', str('extension'), 'File extensions handled by the grammar'),
    regex('firstLineMatch', 'Pattern matched against the first line of unrecognised files'),
    regex('foldingStartMarker'),
    regex('foldingStopMarker'),
    list('patterns', rule, 'Top-level rules'),
    dictOf('repository', rule, 'Rules referenced with #name'),
    bool('hideFromUser', 'Hide the grammar from the menu'),
    str('uuid'),
    str('comment'),
    str('keyEquivalent'),
], 'TextMate grammar'));
