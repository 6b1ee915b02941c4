/**
 * Tests for YAML cursor resolution.
 */

import { describe, it, expect } from 'vitest';
import { parseLineEntries, resolveYamlCursor } from './yaml-cursor';
import { parseCursor } from './test-utils';

function resolveAt(textWithCursor: string, marker = '|') {
    const { cleanText, offset } = parseCursor(textWithCursor, marker);
    return { offset, resolution: resolveYamlCursor(cleanText, offset) };
}

describe('resolveYamlCursor', () => {
    it('should resolve a partial root key', () => {
        const { resolution } = resolveAt('name: Test\nsc|');

        expect(resolution.path).toEqual(['sc']);
        expect(resolution.token).toMatchObject({ text: 'sc', start: 11, end: 13, quote: null, position: 'key' });
        expect(resolution.siblingKeys).toEqual(['name']);
    });

    it('should collect sibling keys below the cursor too', () => {
        const { resolution } = resolveAt('name: a\n|\ncontexts:\n');

        expect(resolution.siblingKeys).toEqual(['name', 'contexts']);
    });

    it('should walk up through sequences and mappings', () => {
        const text = [
            'scope: source.test',
            'contexts:',
            '  main:',
            '    - match: a',
            '      push: |',
        ].join('\n');

        const { resolution } = resolveAt(text);

        expect(resolution.path).toEqual(['contexts', 'main', 0, 'push']);
        expect(resolution.token).toMatchObject({ text: '', position: 'value' });
        expect(resolution.malformed).toBe(false);
    });

    it('should count previous sequence items', () => {
        const text = [
            'contexts:',
            '  main:',
            '    - match: a',
            '    - match: b',
            '    - inc|',
        ].join('\n');

        const { resolution } = resolveAt(text);

        expect(resolution.path).toEqual(['contexts', 'main', 2, 'inc']);
        expect(resolution.token.position).toBe('key');
    });

    it('should index flow sequences', () => {
        const { resolution } = resolveAt('file_extensions: [py, py|');

        expect(resolution.path).toEqual(['file_extensions', 1]);
        expect(resolution.token.text).toBe('py');
    });

    it('should treat a block scalar line as the key\'s value', () => {
        const { offset, resolution } = resolveAt('first_line_match: |\n  ^#!@', '@');

        expect(resolution.path).toEqual(['first_line_match']);
        expect(resolution.token).toMatchObject({ text: '^#!', start: offset - 3, position: 'value' });
    });

    it('should strip the opening quote', () => {
        const { resolution } = resolveAt("scope: 'source.py|");

        expect(resolution.token).toMatchObject({ text: 'source.py', start: 8, quote: "'" });
    });

    it('should not complete inside a comment', () => {
        expect(resolveAt('name: x # comm|').resolution.token.position).toBe('unknown');
    });

    it('should flag indentation under a scalar value as malformed', () => {
        expect(resolveAt('name: x\n  sc|').resolution.malformed).toBe(true);
    });
});

describe('parseLineEntries', () => {
    it('should split dashes and keys', () => {
        expect(parseLineEntries('    - match: a')).toEqual([
            { kind: 'dash', col: 4 },
            { kind: 'key', col: 6, key: 'match', hasValue: true, blockScalar: false },
        ]);
    });

    it('should ignore comments and directives', () => {
        expect(parseLineEntries('  # note')).toEqual([]);
        expect(parseLineEntries('%YAML 1.2')).toEqual([]);
    });
});
