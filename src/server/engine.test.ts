/**
 * Tests for the engine facade.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SyntaxDevEngine } from './engine';
import { DEFAULT_SETTINGS } from './constants';
import { createRecordingLogger, syntaxFile, PYTHON_SYNTAX } from './test-utils';

const PYTHON_PATH = 'Packages/Python/Python.sublime-syntax';

function scopeCompletions(engine: SyntaxDevEngine, typed: string): string[] {
    const text = `scope: ${typed}`;
    return engine.getCompletions(text, text.length, 'sublime-syntax').map(c => c.displayText);
}

describe('SyntaxDevEngine', () => {
    describe('onPackageChanged', () => {
        it('should index supplied syntax files and drop them on removal', async () => {
            const engine = new SyntaxDevEngine();

            await engine.onPackageChanged({
                kind: 'added',
                packageId: 'Python',
                syntaxFiles: [syntaxFile(PYTHON_PATH, PYTHON_SYNTAX)],
            });
            expect(scopeCompletions(engine, 'source.py')).toEqual(['source.python']);

            await engine.onPackageChanged({ kind: 'removed', packageId: 'Python', syntaxFiles: [] });
            expect(scopeCompletions(engine, 'source.py')).toEqual([]);
        });

        it('should index a file listed twice once', async () => {
            const engine = new SyntaxDevEngine();
            const file = syntaxFile(PYTHON_PATH, PYTHON_SYNTAX);

            await engine.onPackageChanged({ kind: 'added', packageId: 'Python', syntaxFiles: [file, file] });

            expect(engine.registry.query('source.python').map(e => e.source)).toEqual([PYTHON_PATH]);
        });

        it('should keep serving the previous snapshot until a change completes', async () => {
            const engine = new SyntaxDevEngine();

            const pending = engine.onPackageChanged({
                kind: 'added',
                packageId: 'Python',
                syntaxFiles: [syntaxFile(PYTHON_PATH, PYTHON_SYNTAX)],
            });
            expect(engine.registry.isEmpty()).toBe(true);

            await pending;
            expect(engine.registry.isEmpty()).toBe(false);
        });

        describe('with files on disk', () => {
            let root: string;

            beforeEach(() => {
                root = fs.mkdtempSync(path.join(os.tmpdir(), 'syntax-dev-engine-'));
                fs.mkdirSync(path.join(root, 'Python'));
                fs.writeFileSync(path.join(root, 'Python', 'Python.sublime-syntax'), PYTHON_SYNTAX);
            });

            afterEach(() => {
                fs.rmSync(root, { recursive: true, force: true });
            });

            it('should read syntax files named by path', async () => {
                const engine = new SyntaxDevEngine();
                const packagePath = path.join(root, 'Python');

                await engine.onPackageChanged({
                    kind: 'updated',
                    packageId: 'Python',
                    packagePath,
                    syntaxFiles: [path.join(packagePath, 'Python.sublime-syntax')],
                });

                expect(engine.registry.hasSyntax(PYTHON_PATH)).toBe(true);
            });

            it('should load packages below the packages directories', async () => {
                const logger = createRecordingLogger();
                const engine = new SyntaxDevEngine(logger);
                const missing = path.join(root, 'missing');

                const loaded = await engine.loadPackages([missing, root]);

                expect(loaded).toBe(1);
                expect(engine.registry.syntaxPaths()).toEqual([PYTHON_PATH]);
                expect(logger.records.some(r => r.level === 'warn' && r.message.startsWith(
                    `Cannot read packages directory ${missing}`
                ))).toBe(true);
            });

            it('should drop packages a later scan no longer finds', async () => {
                const engine = new SyntaxDevEngine();
                const other = path.join(root, 'other');
                fs.mkdirSync(other);

                await engine.loadPackages([root]);
                fs.rmSync(path.join(root, 'Python'), { recursive: true, force: true });
                const loaded = await engine.loadPackages([other]);

                expect(loaded).toBe(0);
                expect(engine.registry.syntaxPaths()).toEqual([]);
                expect(engine.registry.isEmpty()).toBe(true);
            });

            it('should keep packages added by change events across scans', async () => {
                const engine = new SyntaxDevEngine();
                const userPath = 'Packages/User/Test.sublime-syntax';

                await engine.onPackageChanged({
                    kind: 'added',
                    packageId: 'User',
                    syntaxFiles: [syntaxFile(userPath, 'scope: source.test\ncontexts:\n  main: []\n')],
                });
                await engine.loadPackages([root]);

                expect(engine.registry.syntaxPaths()).toEqual([PYTHON_PATH, userPath]);
            });
        });
    });

    describe('getDiagnostics', () => {
        it('should follow the validation settings', () => {
            const engine = new SyntaxDevEngine();
            expect(engine.getDiagnostics('foo: 1\n', 'sublime-syntax').map(f => f.code)).toEqual(['unknown-key']);

            engine.updateSettings({
                ...DEFAULT_SETTINGS,
                validation: { ...DEFAULT_SETTINGS.validation, unknownKeys: false },
            });
            expect(engine.getDiagnostics('foo: 1\n', 'sublime-syntax')).toEqual([]);
        });
    });

    it('should truncate completions to the configured maximum', () => {
        const engine = new SyntaxDevEngine(undefined, { ...DEFAULT_SETTINGS, maxCompletionItems: 3 });

        expect(scopeCompletions(engine, '')).toEqual(['comment', 'constant', 'entity']);
    });
});
