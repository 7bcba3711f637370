import { describe, it, expect } from 'vitest';
import { PatternTableError } from '../errors';
import { buildPatternTrie, loadPatternModule, parseCompiledPatterns, type TrieNode } from './PatternTable';

function walk(root: TrieNode, path: string): TrieNode | undefined {
    let node: TrieNode | undefined = root;
    for (const char of path) {
        node = node?.children.get(char.codePointAt(0) ?? 0);
    }
    return node;
}

describe('buildPatternTrie', () => {
    it('splits each packed string into patterns of the keyed length', () => {
        const trie = buildPatternTrie({ patterns: { 3: 'n2a1ba', 5: 'hy3ph' } });

        expect(walk(trie.root, 'na')?.points).toEqual([0, 2, 0]);
        expect(walk(trie.root, 'ba')?.points).toEqual([1, 0, 0]);
        expect(walk(trie.root, 'hyph')?.points).toEqual([0, 0, 3, 0, 0]);
        expect(walk(trie.root, 'hy')?.points).toBeUndefined();
    });

    it('chunks by codepoint rather than UTF-16 unit', () => {
        const trie = buildPatternTrie({ patterns: { 3: 'é1ré2s' } });

        expect(walk(trie.root, 'ér')?.points).toEqual([0, 1, 0]);
        expect(walk(trie.root, 'és')?.points).toEqual([0, 2, 0]);
    });

    it('parses exceptions into lowercase words and hyphen indexes', () => {
        const trie = buildPatternTrie({ patterns: {}, exceptions: 'ta-ble, As-so-ciate,,' });

        expect([...trie.exceptions.entries()]).toEqual([
            ['table', [2]],
            ['associate', [2, 4]],
        ]);
    });

    it('keeps single-codepoint letter substitutions', () => {
        const trie = buildPatternTrie({ patterns: {}, charSubstitution: { 'ſ': 's', ab: 'c', 'ß': '' } });
        expect([...trie.substitutions.entries()]).toEqual([[0x17f, 0x73]]);
    });

    it('ignores a zero chunk length', () => {
        const trie = buildPatternTrie({ patterns: { 0: 'abc' } });
        expect(trie.root.children.size).toBe(0);
    });
});

describe('parseCompiledPatterns', () => {
    it('accepts the packed layout', () => {
        expect(parseCompiledPatterns({ patterns: { 4: '_ex1' } }, 'inline')).toEqual({ patterns: { 4: '_ex1' } });
    });

    it('rejects tables without a pattern record', () => {
        expect(() => parseCompiledPatterns({ patterns: 'hy3ph' }, 'inline')).toThrow(PatternTableError);
    });

    it('rejects non-numeric chunk keys', () => {
        expect(() => parseCompiledPatterns({ patterns: { five: 'hy3ph' } }, 'inline')).toThrow(
            /Invalid hyphenation pattern table "inline"/
        );
    });
});

describe('loadPatternModule', () => {
    it('wraps a failed require', () => {
        let caught: unknown;
        try {
            loadPatternModule('hyphenation.does-not-exist');
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(PatternTableError);
        expect(caught).toHaveProperty('message', 'Cannot load hyphenation patterns "hyphenation.does-not-exist"');
        expect(caught).toHaveProperty('cause');
    });
});
