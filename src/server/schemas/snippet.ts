/**
 * Schema of `.sublime-snippet` files.
 */

import { SchemaNode } from '../types';
import { freezeSchema, mapping, scalar, str } from './nodes';

export const SNIPPET_SCHEMA: SchemaNode = freezeSchema(mapping('document', [
    mapping('snippet', [
        str('content', 'Inserted text, with fields like $1 and ${2:default}'),
        str('tabTrigger', 'Text that expands the snippet'),
        scalar('scope', 'scope-selector', 'Where the snippet is available'),
        str('description', 'Shown in the completion list'),
    ]),
]));
