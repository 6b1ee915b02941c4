/**
 * Schema of `.sublime-syntax` definitions.
 */

import { SchemaNode } from '../types';
import { bool, dictOf, freezeSchema, list, mapping, reference, regex, scalar, str } from './nodes';

const ruleKeys: SchemaNode[] = [];

/** A context name, a list of names, or an anonymous context */
const contextTarget: SchemaNode = {
    ...reference('context', 'context', 'Context name or `scope:` reference'),
    children: ruleKeys,
};

const pushLike = (name: string, description: string): SchemaNode => ({
    ...reference(name, 'context', description),
    items: contextTarget,
});

const rule = mapping('rule', ruleKeys, 'Match rule');

ruleKeys.push(
    regex('match', 'Regular expression matched against the line'),
    scalar('scope', 'scope-name', 'Scope assigned to the matched text'),
    dictOf('captures', scalar('capture', 'scope-name'), 'Scopes assigned to capture groups'),
    pushLike('push', 'Push contexts onto the stack'),
    pushLike('set', 'Replace the current context with other contexts'),
    scalar('pop', 'any', 'Pop the current context (or the given number of contexts)'),
    reference('embed', 'context', 'Embed a context until `escape` matches'),
    scalar('embed_scope', 'scope-name', 'Scope applied to embedded text'),
    regex('escape', 'Pattern that leaves the embedded context'),
    dictOf('escape_captures', scalar('capture', 'scope-name'), 'Scopes assigned to escape capture groups'),
    reference('include', 'context', 'Include the rules of another context'),
    bool('apply_prototype', 'Apply the included context\'s prototype'),
    scalar('meta_scope', 'scope-name', 'Scope applied to all text of the context, including the match that pushed it'),
    scalar('meta_content_scope', 'scope-name', 'Scope applied to the text inside the context'),
    bool('meta_include_prototype', 'Whether the prototype context is included'),
    bool('meta_prepend', 'Prepend rules to the inherited context'),
    bool('meta_append', 'Append rules to the inherited context'),
    scalar('clear_scopes', 'any', 'Clear `true` (all) or a number of scopes from the stack'),
    str('branch_point', 'Name of a branch point'),
    list('branch', contextTarget, 'Contexts to try in order'),
    str('fail', 'Fail the named branch point'),
    list('with_prototype', rule, 'Rules applied inside every pushed context'),
);

export const SUBLIME_SYNTAX_SCHEMA: SchemaNode = freezeSchema(mapping('sublime-syntax', [
    str('name', 'Name shown in the syntax menu'),
    list('file_extensions', str('extension'), 'File extensions handled by the syntax'),
    list('hidden_file_extensions', str('extension'), 'Extensions handled but not shown in file dialogs'),
    regex('first_line_match', 'Pattern matched against the first line of unrecognised files'),
    scalar('scope', 'scope-name', 'Base scope of the syntax'),
    scalar('version', 'number', 'Syntax definition version'),
    {
        ...reference('extends', 'syntax-file', 'Syntax this one inherits from'),
        items: reference('syntax', 'syntax-file'),
    },
    bool('hidden', 'Hide the syntax from the menu'),
    dictOf('variables', regex('variable'), 'Patterns substituted with {{name}}'),
    dictOf('contexts', list('context', rule), 'Named lists of rules'),
], 'Syntax definition'));
