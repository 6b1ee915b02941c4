/**
 * Tests for scope extraction from syntax definitions
 */

import { describe, it, expect } from 'vitest';
import { indexSyntaxFile, parseSublimeReference, parseTextMateInclude, splitScopes } from './syntax-indexer';
import { IndexingError } from '../errors';
import { JSON_TM_LANGUAGE, PYTHON_SYNTAX, syntaxFile } from '../test-utils';

describe('indexSyntaxFile', () => {
    describe('sublime-syntax', () => {
        it('should collect the base scope and every assigned scope', () => {
            const record = indexSyntaxFile(syntaxFile('Packages/Python/Python.sublime-syntax', PYTHON_SYNTAX));

            expect(record.baseScope).toBe('source.python');
            expect(record.hidden).toBe(false);
            expect(record.packageId).toBe('Python');
            expect(record.ownScopes).toEqual([
                'comment.line.number-sign.python',
                'punctuation.definition.string.begin.python',
                'source.python',
                'string.quoted.double.python',
            ]);
            expect(record.references).toEqual([]);
        });

        it('should split multi-scope values and skip substitutions', () => {
            const text = `scope: source.demo
contexts:
  main:
    - match: x
      scope: keyword.demo storage.type.\${1}.demo
      captures:
        1: entity.name.demo
    - match: y
      scope: meta.{{name}}.demo
`;
            const record = indexSyntaxFile(syntaxFile('Packages/Demo/Demo.sublime-syntax', text));

            expect(record.ownScopes).toEqual(['entity.name.demo', 'keyword.demo', 'source.demo']);
        });

        it('should record references to other syntaxes only', () => {
            const text = `scope: text.html.demo
contexts:
  main:
    - match: '<script>'
      embed: scope:source.js#main
      escape: '</script>'
    - include: Packages/CSS/CSS.sublime-syntax
    - match: x
      push:
        - local-context
        - scope:source.regexp
`;
            const record = indexSyntaxFile(syntaxFile('Packages/Demo/Demo.sublime-syntax', text));

            expect(record.references).toHaveLength(3);
            expect(record.references).toContainEqual({ kind: 'scope', scope: 'source.js' });
            expect(record.references).toContainEqual({ kind: 'path', path: 'Packages/CSS/CSS.sublime-syntax' });
            expect(record.references).toContainEqual({ kind: 'scope', scope: 'source.regexp' });
        });

        it('should not treat variables as scopes', () => {
            const text = `scope: source.demo
variables:
  scope: 'not.a.scope'
contexts:
  main: []
`;
            const record = indexSyntaxFile(syntaxFile('Packages/Demo/Demo.sublime-syntax', text));

            expect(record.ownScopes).toEqual(['source.demo']);
        });

        it('should mark hidden syntaxes', () => {
            const text = 'scope: source.hidden-demo\nhidden: true\ncontexts:\n  main: []\n';
            const record = indexSyntaxFile(syntaxFile('Packages/Demo/Hidden.sublime-syntax', text));

            expect(record.hidden).toBe(true);
        });

        it('should throw an IndexingError for unparsable files', () => {
            const text = 'scope: source.demo\ncontexts: [\n';
            expect(() => indexSyntaxFile(syntaxFile('Packages/Demo/Broken.sublime-syntax', text)))
                .toThrow(IndexingError);
        });

        it('should reject files that are not syntax definitions', () => {
            expect(() => indexSyntaxFile(syntaxFile('Packages/Demo/Demo.sublime-build', '{}')))
                .toThrow('not a syntax definition');
        });
    });

    describe('tmLanguage', () => {
        it('should collect scopeName, rule names and skip the grammar name', () => {
            const record = indexSyntaxFile(syntaxFile('Packages/JSON/JSON.tmLanguage', JSON_TM_LANGUAGE));

            expect(record.baseScope).toBe('source.json');
            expect(record.ownScopes).toEqual(['constant.language.json', 'source.json', 'string.quoted.double.json']);
            expect(record.references).toEqual([]);
        });

        it('should treat .hidden-tmLanguage files as hidden', () => {
            const record = indexSyntaxFile(syntaxFile('Packages/JSON/JSON.hidden-tmLanguage', JSON_TM_LANGUAGE));

            expect(record.hidden).toBe(true);
        });

        it('should record includes of other grammars', () => {
            const text = `<plist><dict>
<key>scopeName</key><string>text.html.demo</string>
<key>patterns</key><array>
  <dict><key>include</key><string>source.css#rules</string></dict>
  <dict><key>include</key><string>$self</string></dict>
</array>
</dict></plist>`;
            const record = indexSyntaxFile(syntaxFile('Packages/Demo/Demo.tmLanguage', text));

            expect(record.references).toEqual([{ kind: 'scope', scope: 'source.css' }]);
        });
    });
});

describe('splitScopes', () => {
    it('should split on whitespace', () => {
        expect(splitScopes('  meta.a   meta.b ')).toEqual(['meta.a', 'meta.b']);
    });
});

describe('parseSublimeReference', () => {
    it('should parse scope and path references', () => {
        expect(parseSublimeReference('scope:source.js#expressions')).toEqual({ kind: 'scope', scope: 'source.js' });
        expect(parseSublimeReference('Packages/JS/JS.sublime-syntax')).toEqual({
            kind: 'path',
            path: 'Packages/JS/JS.sublime-syntax',
        });
    });

    it('should ignore local context names', () => {
        expect(parseSublimeReference('main')).toBeNull();
        expect(parseSublimeReference('scope:')).toBeNull();
    });
});

describe('parseTextMateInclude', () => {
    it('should ignore repository items and $self', () => {
        expect(parseTextMateInclude('#strings')).toBeNull();
        expect(parseTextMateInclude('$base')).toBeNull();
        expect(parseTextMateInclude('source.css')).toEqual({ kind: 'scope', scope: 'source.css' });
    });
});
