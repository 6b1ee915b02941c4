/**
 * Tests for document validation.
 */

import { describe, it, expect } from 'vitest';
import { validateDocument, ValidationContext, isColorValue } from '.';
import { createRecordingLogger, createRegistry, JSON_TM_LANGUAGE, PYTHON_SYNTAX } from '../../test-utils';
import { ScopeRegistry } from '../../registry';
import { ValidationSettings } from '../../types';

const ALL_CHECKS: ValidationSettings = { unknownKeys: true, unknownScopes: true, invalidValues: true };

function createContext(registry: ScopeRegistry = createRegistry({}), settings = ALL_CHECKS): ValidationContext {
    return { registry, logger: createRecordingLogger(), settings };
}

const pythonRegistry = () => createRegistry({
    'Packages/Python/Python.sublime-syntax': PYTHON_SYNTAX,
});

describe('validateDocument', () => {
    describe('unknown keys', () => {
        it('should report exactly one finding for an unknown top-level key', () => {
            const text = '{"name": "Example", "foo": 1, "scope": "source.example"}';

            const findings = validateDocument(text, 'sublime-syntax', createContext());

            expect(findings).toEqual([{
                range: { start: 20, end: 25 },
                severity: 'information',
                message: "Unknown key 'foo' in sublime-syntax",
                code: 'unknown-key',
            }]);
        });

        it('should not visit the children of an unknown key', () => {
            const findings = validateDocument('foo:\n  bar: 1\nname: X\n', 'sublime-syntax', createContext());

            expect(findings.map(f => f.message)).toEqual(["Unknown key 'foo' in sublime-syntax"]);
        });

        it('should report unknown keys inside match rules', () => {
            const text = [
                'contexts:',
                '  main:',
                '    - match: a',
                '      scopee: x',
                '',
            ].join('\n');

            const findings = validateDocument(text, 'sublime-syntax', createContext());

            expect(findings).toHaveLength(1);
            expect(findings[0].message).toBe("Unknown key 'scopee' in rule");
            expect(findings[0].range.start).toBe(text.indexOf('scopee'));
        });

        it('should be disabled by settings', () => {
            const context = createContext(undefined, { ...ALL_CHECKS, unknownKeys: false });

            expect(validateDocument('foo: 1\n', 'sublime-syntax', context)).toEqual([]);
        });

        it('should accept a complete property list grammar', () => {
            const registry = createRegistry({ 'Packages/JSON/JSON.tmLanguage': JSON_TM_LANGUAGE });

            expect(validateDocument(JSON_TM_LANGUAGE, 'tmlanguage', createContext(registry))).toEqual([]);
        });
    });

    describe('duplicate keys', () => {
        it('should report the second occurrence', () => {
            const findings = validateDocument('name: A\nname: B\n', 'sublime-syntax', createContext());

            expect(findings).toEqual([{
                range: { start: 8, end: 12 },
                severity: 'information',
                message: "Duplicate key 'name'",
                code: 'duplicate-key',
            }]);
        });
    });

    describe('values', () => {
        it('should report enum words and colors outside their domain', () => {
            const text = '{"rules": [{"scope": "comment", "font_style": "bold wavy", "foreground": "#12"}]}';

            const findings = validateDocument(text, 'color-scheme', createContext());

            expect(findings.map(f => f.message)).toEqual([
                "Invalid value 'wavy' for font_style; expected normal, bold, italic, underline, " +
                    'stippled_underline, squiggly_underline, glow',
                'Invalid color for foreground',
            ]);
            expect(findings.every(f => f.severity === 'hint' && f.code === 'invalid-value')).toBe(true);
        });

        it('should report non-boolean values for boolean keys', () => {
            const findings = validateDocument('hidden: yes\n', 'sublime-syntax', createContext());

            expect(findings.map(f => f.message)).toEqual(['Expected a boolean for hidden']);
        });

        it('should report references to syntaxes no package provides', () => {
            const findings = validateDocument(
                'extends: Packages/Nope/Nope.sublime-syntax\n',
                'sublime-syntax',
                createContext(pythonRegistry())
            );

            expect(findings.map(f => f.message)).toEqual(["Unknown syntax 'Packages/Nope/Nope.sublime-syntax'"]);
        });
    });

    describe('scope selectors', () => {
        const text = '{"rules": [{"scope": "source.python meta.nothing"}]}';

        it('should report unknown scopes at their position', () => {
            const findings = validateDocument(text, 'color-scheme', createContext(pythonRegistry()));

            expect(findings).toEqual([{
                range: { start: 36, end: 48 },
                severity: 'information',
                message: "Unknown scope 'meta.nothing'",
                code: 'unknown-scope',
            }]);
        });

        it('should skip scope checks while the registry is empty', () => {
            expect(validateDocument(text, 'color-scheme', createContext())).toEqual([]);
        });

        it('should not check scopes a syntax declares', () => {
            expect(validateDocument(PYTHON_SYNTAX, 'sublime-syntax', createContext(pythonRegistry()))).toEqual([]);
        });
    });

    describe('syntax tests', () => {
        it('should check assertion selectors', () => {
            const text = [
                '# SYNTAX TEST "Packages/Python/Python.sublime-syntax"',
                '# comment',
                '# <- comment.line.number-sign.python',
                '#^^^^^^^ comment.line.bogus.python',
                '',
            ].join('\n');

            const findings = validateDocument(text, 'syntax-test', createContext(pythonRegistry()));

            const start = text.indexOf('comment.line.bogus.python');
            expect(findings).toEqual([{
                range: { start, end: start + 'comment.line.bogus.python'.length },
                severity: 'information',
                message: "Unknown scope 'comment.line.bogus.python'",
                code: 'unknown-scope',
            }]);
        });

        it('should report an unknown syntax in the header', () => {
            const text = '# SYNTAX TEST "Packages/Nope/Nope.sublime-syntax"\n';

            const findings = validateDocument(text, 'syntax-test', createContext(pythonRegistry()));

            expect(findings).toEqual([{
                range: { start: 15, end: 15 + 'Packages/Nope/Nope.sublime-syntax'.length },
                severity: 'hint',
                message: "Unknown syntax 'Packages/Nope/Nope.sublime-syntax'",
                code: 'invalid-value',
            }]);
        });
    });

    it('should report parse errors and keep validating', () => {
        const findings = validateDocument('{"name": }', 'color-scheme', createContext());

        expect(findings.map(f => f.code)).toEqual(['parse-error']);
        expect(findings[0].message).toBe('Parse error: ValueExpected');
    });
});

describe('isColorValue', () => {
    it('should accept the color notations of color schemes', () => {
        expect(isColorValue('#fff')).toBe(true);
        expect(isColorValue('#11223344')).toBe(true);
        expect(isColorValue('Red')).toBe(true);
        expect(isColorValue('var(bg)')).toBe(true);
        expect(isColorValue('rgb(0, 0, 0)')).toBe(true);
        expect(isColorValue('color(var(bg) alpha(0.5))')).toBe(true);
    });

    it('should reject anything else', () => {
        expect(isColorValue('#12')).toBe(false);
        expect(isColorValue('reddish')).toBe(false);
        expect(isColorValue('')).toBe(false);
    });
});
