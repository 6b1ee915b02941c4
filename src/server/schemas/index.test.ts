/**
 * Tests for schema lookup.
 */

import { describe, it, expect } from 'vitest';
import { acceptsMapping, acceptsScalar, childSchema, lookup, rootSchema } from './index';

describe('lookup', () => {
    it('should follow mappings, author keys and sequence items', () => {
        expect(lookup('sublime-syntax', ['contexts', 'main', 0, 'push'])).toMatchObject({
            name: 'push',
            kind: 'action-reference',
            reference: 'context',
        });
    });

    it('should reach rules of anonymous contexts', () => {
        expect(lookup('sublime-syntax', ['contexts', 'main', 0, 'push', 0, 'match'])?.kind).toBe('regex');
    });

    it('should find selectors in color scheme rules', () => {
        expect(lookup('color-scheme', ['rules', 3, 'scope'])?.kind).toBe('scope-selector');
    });

    it('should return null off the schema', () => {
        expect(lookup('sublime-syntax', ['nope'])).toBeNull();
        expect(lookup('sublime-syntax', ['name', 'x'])).toBeNull();
    });
});

describe('schema nodes', () => {
    it('should name each root after its dialect', () => {
        expect(rootSchema('tmlanguage').name).toBe('tmlanguage');
    });

    it('should fall back to the author key node', () => {
        const contexts = childSchema(rootSchema('sublime-syntax'), 'contexts');

        expect(contexts && childSchema(contexts, 'anything')?.kind).toBe('array');
    });

    it('should tell mappings from scalars', () => {
        const root = rootSchema('sublime-syntax');
        const name = childSchema(root, 'name');
        const extensions = childSchema(root, 'file_extensions');

        expect(acceptsMapping(root)).toBe(true);
        expect(name && acceptsScalar(name)).toBe(true);
        expect(extensions && acceptsScalar(extensions)).toBe(false);
    });
});
