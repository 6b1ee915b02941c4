/**
 * Schema of `.sublime-build` files.
 */

import { SchemaNode } from '../types';
import { bool, dictOf, freezeSchema, list, mapping, reference, regex, scalar, str } from './nodes';

const buildKeys: SchemaNode[] = [
    { ...str('cmd', 'Command and arguments, without a shell'), items: str('argument') },
    str('shell_cmd', 'Command run through the shell'),
    regex('file_regex', 'Captures file, line, column and message from output'),
    regex('line_regex', 'Captures line, column and message when file_regex does not match'),
    str('working_dir', 'Directory the command runs in'),
    scalar('selector', 'scope-selector', 'Selects this build system automatically'),
    list('file_patterns', str('pattern'), 'File name patterns selecting this build system'),
    list('keyfiles', str('file'), 'File names whose presence selects this build system'),
    str('target', 'Command that runs the build'),
    scalar('cancel', 'any', 'Command or args used to cancel the build'),
    bool('kill', 'Cancel by terminating the process'),
    dictOf('env', str('variable'), 'Environment variables'),
    bool('shell', 'Run cmd through the shell'),
    str('path', 'PATH used to find the command'),
    reference('syntax', 'syntax-file', 'Syntax of the output panel'),
    bool('word_wrap', 'Wrap lines in the output panel'),
    bool('quiet', 'Suppress build messages'),
    str('encoding', 'Encoding of the command output'),
];

const platformOverride = (name: string) => mapping(name, buildKeys, `Overrides for ${name}`);

export const BUILD_SYSTEM_SCHEMA: SchemaNode = freezeSchema(mapping('build-system', [
    ...buildKeys,
    list('variants', mapping('variant', [str('name', 'Name shown in the build menu'), ...buildKeys]),
        'Alternative commands'),
    platformOverride('windows'),
    platformOverride('osx'),
    platformOverride('linux'),
], 'Build system'));
