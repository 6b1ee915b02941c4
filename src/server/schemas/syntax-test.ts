/**
 * Positions completable in syntax test files.
 */

import { SchemaNode } from '../types';
import { freezeSchema, mapping, reference, scalar } from './nodes';

export const SYNTAX_TEST_SCHEMA: SchemaNode = freezeSchema(mapping('syntax-test', [
    reference('header', 'syntax-file', 'Syntax under test'),
    scalar('assertion', 'scope-selector', 'Selector the asserted text must match'),
]));
