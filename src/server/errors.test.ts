/**
 * Tests for error types.
 */

import { describe, it, expect } from 'vitest';
import { EmbedCycleError, IndexingError, SyntaxDevError, toError } from './errors';

describe('errors', () => {
    it('should describe indexing failures with their cause', () => {
        const error = new IndexingError('Packages/A/A.sublime-syntax', 'unreadable file', new Error('ENOENT'));

        expect(error).toBeInstanceOf(SyntaxDevError);
        expect(error.name).toBe('IndexingError');
        expect(error.filePath).toBe('Packages/A/A.sublime-syntax');
        expect(error.message).toBe('Failed to index Packages/A/A.sublime-syntax: unreadable file');
        expect(error.chain).toBe('Failed to index Packages/A/A.sublime-syntax: unreadable file -> ENOENT');
    });

    it('should follow nested causes', () => {
        const error = new SyntaxDevError('outer', new SyntaxDevError('middle', new Error('root')));

        expect(error.chain).toBe('outer -> middle -> root');
    });

    it('should list the files of a cycle', () => {
        const error = new EmbedCycleError(['a', 'b', 'a']);

        expect(error.message).toBe('Circular syntax reference: a -> b -> a');
        expect(error.cycle).toEqual(['a', 'b', 'a']);
    });

    it('should normalize thrown values', () => {
        const original = new Error('x');

        expect(toError(original)).toBe(original);
        expect(toError('plain').message).toBe('plain');
    });
});
