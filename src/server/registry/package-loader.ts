/**
 * Reading syntax files of installed packages from disk.
 */

import * as fs from 'fs';
import * as path from 'path';
import { IndexingError, toError } from '../errors';
import { SyntaxFile } from '../types';

const SYNTAX_EXTENSIONS = new Set(['.sublime-syntax', '.tmlanguage', '.hidden-tmlanguage']);

export interface PackageLocation {
    packageId: string;
    packagePath: string;
}

export interface LoadResult {
    files: SyntaxFile[];
    failures: IndexingError[];
}

export function isSyntaxFileName(fileName: string): boolean {
    return SYNTAX_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

/**
 * `Packages/<package>/<path inside the package>`, with forward slashes.
 */
export function resourcePathFor(packageId: string, packagePath: string | undefined, filePath: string): string {
    const relative = packagePath ? path.relative(packagePath, filePath) : path.basename(filePath);
    return ['Packages', packageId, ...relative.split(path.sep)].join('/');
}

/**
 * Package directories directly below a packages root.
 */
export async function discoverPackages(root: string): Promise<PackageLocation[]> {
    const entries = await fs.promises.readdir(root, { withFileTypes: true });
    return entries
        .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
        .map(entry => ({ packageId: entry.name, packagePath: path.join(root, entry.name) }))
        .sort((a, b) => (a.packageId < b.packageId ? -1 : a.packageId > b.packageId ? 1 : 0));
}

/**
 * Syntax files anywhere below a directory, sorted.
 */
export async function findSyntaxFiles(dir: string): Promise<string[]> {
    const found: string[] = [];
    const pending = [dir];
    while (pending.length > 0) {
        const current = pending.pop();
        if (current === undefined) continue;
        const entries = await fs.promises.readdir(current, { withFileTypes: true });
        for (const entry of entries) {
            const fullPath = path.join(current, entry.name);
            if (entry.isDirectory()) {
                if (!entry.name.startsWith('.')) pending.push(fullPath);
            } else if (entry.isFile() && isSyntaxFileName(entry.name)) {
                found.push(fullPath);
            }
        }
    }
    return found.sort();
}

/**
 * Read the given syntax files. Unreadable files are returned as failures.
 */
export async function readSyntaxFiles(
    packageId: string,
    packagePath: string | undefined,
    filePaths: readonly string[]
): Promise<LoadResult> {
    const files: SyntaxFile[] = [];
    const failures: IndexingError[] = [];

    for (const filePath of filePaths) {
        const resourcePath = resourcePathFor(packageId, packagePath, filePath);
        try {
            const text = await fs.promises.readFile(filePath, 'utf-8');
            files.push({ resourcePath, packageId, text });
        } catch (error) {
            failures.push(new IndexingError(resourcePath, 'unreadable file', toError(error)));
        }
    }

    return { files, failures };
}

/**
 * Read every syntax file of a package directory.
 */
export async function loadPackage(location: PackageLocation): Promise<LoadResult> {
    const filePaths = await findSyntaxFiles(location.packagePath);
    return readSyntaxFiles(location.packageId, location.packagePath, filePaths);
}
