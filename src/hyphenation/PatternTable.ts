import { z } from 'zod';
import { PatternTableError } from '../errors';

/**
 * Compiled Liang pattern table in the layout published by the `hyphenation.*`
 * packages: `patterns` maps a chunk length to a string of concatenated
 * digit-annotated patterns of exactly that many characters, `_` marks a word
 * boundary, and `exceptions` lists whole words with their breaks spelled out
 * as hyphens ("as-so-ciate, project, ..."). `charSubstitution` maps letters to
 * the letter the patterns are written with (German long s to s); it is applied
 * after lowercasing, single codepoints only.
 */
export const compiledPatternsSchema = z.object({
    patterns: z.record(z.string().regex(/^\d+$/), z.string()),
    exceptions: z.string().optional(),
    charSubstitution: z.record(z.string()).optional(),
});

export type CompiledPatterns = z.infer<typeof compiledPatternsSchema>;

export interface TrieNode {
    children: Map<number, TrieNode>;
    points?: number[];
}

/**
 * Prepared form of a table: a trie over lowercase codepoints whose terminal
 * nodes carry the inter-letter weights, plus the exception words.
 */
export interface PatternTrie {
    root: TrieNode;
    exceptions: Map<string, number[]>;
    substitutions: Map<number, number>;
}

export function parseCompiledPatterns(raw: unknown, source: string): CompiledPatterns {
    const result = compiledPatternsSchema.safeParse(raw);
    if (!result.success) {
        throw new PatternTableError(
            `Invalid hyphenation pattern table "${source}": ${result.error.issues.map((issue) => issue.message).join('; ')}`
        );
    }
    return result.data;
}

/**
 * Load a pattern package by module name. Tables are large, so this happens
 * only when a language is first asked to hyphenate.
 */
export function loadPatternModule(moduleName: string): CompiledPatterns {
    let raw: unknown;
    try {
        raw = require(moduleName);
    } catch (err) {
        throw new PatternTableError(`Cannot load hyphenation patterns "${moduleName}"`, { cause: err });
    }
    return parseCompiledPatterns(raw, moduleName);
}

function isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
}

function insertPattern(root: TrieNode, pattern: string[]): void {
    const points: number[] = [0];
    let node = root;

    for (const char of pattern) {
        if (isDigit(char)) {
            points[points.length - 1] = Number(char);
            continue;
        }
        const cp = char.codePointAt(0) ?? 0;
        let child = node.children.get(cp);
        if (!child) {
            child = { children: new Map() };
            node.children.set(cp, child);
        }
        node = child;
        points.push(0);
    }

    node.points = points;
}

/**
 * Exception words map to the codepoint indexes of their hyphens.
 */
function parseExceptions(exceptions: string | undefined): Map<string, number[]> {
    const result = new Map<string, number[]>();
    if (!exceptions) {
        return result;
    }

    for (const entry of exceptions.split(',')) {
        const annotated = entry.trim().toLowerCase();
        if (annotated.length === 0) continue;

        const indexes: number[] = [];
        let letters = '';
        let count = 0;
        for (const char of annotated) {
            if (char === '-') {
                indexes.push(count);
            } else {
                letters += char;
                count++;
            }
        }
        result.set(letters, indexes);
    }

    return result;
}

function parseSubstitutions(substitutions: Record<string, string> | undefined): Map<number, number> {
    const result = new Map<number, number>();
    for (const [from, to] of Object.entries(substitutions ?? {})) {
        const source = from.codePointAt(0);
        const target = to.codePointAt(0);
        if (source === undefined || target === undefined || Array.from(from).length !== 1 || Array.from(to).length !== 1) {
            continue;
        }
        result.set(source, target);
    }
    return result;
}

export function buildPatternTrie(table: CompiledPatterns): PatternTrie {
    const root: TrieNode = { children: new Map() };

    for (const [sizeKey, packed] of Object.entries(table.patterns)) {
        const size = Number(sizeKey);
        if (size <= 0) continue;

        const chars = Array.from(packed);
        for (let i = 0; i < chars.length; i += size) {
            insertPattern(root, chars.slice(i, i + size));
        }
    }

    return {
        root,
        exceptions: parseExceptions(table.exceptions),
        substitutions: parseSubstitutions(table.charSubstitution),
    };
}
