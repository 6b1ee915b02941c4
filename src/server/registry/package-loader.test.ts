/**
 * Tests for reading package syntax files from disk
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { discoverPackages, findSyntaxFiles, isSyntaxFileName, loadPackage, readSyntaxFiles, resourcePathFor } from './package-loader';
import { PYTHON_SYNTAX } from '../test-utils';

describe('package loader', () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'syntax-dev-'));
        fs.mkdirSync(path.join(root, 'Python', 'syntax'), { recursive: true });
        fs.mkdirSync(path.join(root, 'Empty'));
        fs.mkdirSync(path.join(root, '.git'));
        fs.writeFileSync(path.join(root, 'Python', 'syntax', 'Python.sublime-syntax'), PYTHON_SYNTAX);
        fs.writeFileSync(path.join(root, 'Python', 'Regex.hidden-tmLanguage'), '<plist><dict/></plist>');
        fs.writeFileSync(path.join(root, 'Python', 'Python.sublime-settings'), '{}');
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('should discover package directories, skipping dot directories', async () => {
        const packages = await discoverPackages(root);

        expect(packages).toEqual([
            { packageId: 'Empty', packagePath: path.join(root, 'Empty') },
            { packageId: 'Python', packagePath: path.join(root, 'Python') },
        ]);
    });

    it('should find syntax files recursively', async () => {
        const files = await findSyntaxFiles(path.join(root, 'Python'));

        expect(files).toEqual([
            path.join(root, 'Python', 'Regex.hidden-tmLanguage'),
            path.join(root, 'Python', 'syntax', 'Python.sublime-syntax'),
        ]);
    });

    it('should load a package with resource paths', async () => {
        const result = await loadPackage({ packageId: 'Python', packagePath: path.join(root, 'Python') });

        expect(result.failures).toEqual([]);
        expect(result.files.map(f => f.resourcePath)).toEqual([
            'Packages/Python/Regex.hidden-tmLanguage',
            'Packages/Python/syntax/Python.sublime-syntax',
        ]);
        expect(result.files[1].text).toBe(PYTHON_SYNTAX);
        expect(result.files[1].packageId).toBe('Python');
    });

    it('should report unreadable files as failures', async () => {
        const missing = path.join(root, 'Python', 'Missing.sublime-syntax');

        const result = await readSyntaxFiles('Python', path.join(root, 'Python'), [missing]);

        expect(result.files).toEqual([]);
        expect(result.failures).toHaveLength(1);
        expect(result.failures[0].message).toBe('Failed to index Packages/Python/Missing.sublime-syntax: unreadable file');
    });
});

describe('resourcePathFor', () => {
    it('should fall back to the file name without a package path', () => {
        expect(resourcePathFor('User', undefined, '/tmp/a/Test.sublime-syntax')).toBe('Packages/User/Test.sublime-syntax');
    });
});

describe('isSyntaxFileName', () => {
    it('should match syntax extensions case-insensitively', () => {
        expect(isSyntaxFileName('A.tmLanguage')).toBe(true);
        expect(isSyntaxFileName('A.sublime-syntax')).toBe(true);
        expect(isSyntaxFileName('A.sublime-color-scheme')).toBe(false);
    });
});
