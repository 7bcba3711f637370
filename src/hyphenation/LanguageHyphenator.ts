import type { CodepointInfo } from '../types';
import { buildPatternTrie, type CompiledPatterns, type PatternTrie } from './PatternTable';

export const DEFAULT_MIN_PREFIX = 2;
export const DEFAULT_MIN_SUFFIX = 2;

const WORD_BOUNDARY = '_'.charCodeAt(0);

export type PatternSource = CompiledPatterns | (() => CompiledPatterns);

/**
 * Liang hyphenation for a single language.
 *
 * The pattern table is turned into a trie on first use. A word is analysed
 * only when every codepoint passes the letter predicate; anything else
 * (digits, symbols, foreign scripts) yields no breaks.
 */
export class LanguageHyphenator {
    private trie: PatternTrie | null = null;
    private readonly source: PatternSource;
    private readonly isLetter: (cp: number) => boolean;
    private readonly toLower: (cp: number) => number;
    private readonly prefix: number;
    private readonly suffix: number;

    constructor(
        source: PatternSource,
        isLetter: (cp: number) => boolean,
        toLower: (cp: number) => number,
        minPrefix: number = DEFAULT_MIN_PREFIX,
        minSuffix: number = DEFAULT_MIN_SUFFIX
    ) {
        this.source = source;
        this.isLetter = isLetter;
        this.toLower = toLower;
        this.prefix = minPrefix;
        this.suffix = minSuffix;
    }

    minPrefix(): number {
        return this.prefix;
    }

    minSuffix(): number {
        return this.suffix;
    }

    /**
     * Codepoint indexes where the word may be split, ascending.
     * An index i means the break falls before codepoint i.
     */
    breakIndexes(cps: readonly CodepointInfo[]): number[] {
        const length = cps.length;
        if (length === 0 || length < this.prefix + this.suffix) {
            return [];
        }

        if (!cps.every((cp) => this.isLetter(cp.value))) {
            return [];
        }

        const trie = this.getTrie();
        const lower = cps.map((cp) => {
            const folded = this.toLower(cp.value);
            return trie.substitutions.get(folded) ?? folded;
        });

        if (trie.exceptions.size > 0) {
            const key = lower.map((cp) => String.fromCodePoint(cp)).join('');
            const exception = trie.exceptions.get(key);
            if (exception) {
                return exception.filter((index) => this.isAllowedIndex(index, length));
            }
        }

        const weights = this.computeWeights(trie, lower);
        const indexes: number[] = [];
        for (let index = 1; index < length; index++) {
            // weights[k] sits before padded codepoint k; word index i is padded index i + 1
            if (weights[index + 1] % 2 === 1 && this.isAllowedIndex(index, length)) {
                indexes.push(index);
            }
        }
        return indexes;
    }

    private isAllowedIndex(index: number, length: number): boolean {
        return index >= this.prefix && index < length - this.suffix;
    }

    private computeWeights(trie: PatternTrie, lower: readonly number[]): number[] {
        const padded = [WORD_BOUNDARY, ...lower, WORD_BOUNDARY];
        const weights = new Array<number>(padded.length + 1).fill(0);

        for (let start = 0; start < padded.length; start++) {
            let node = trie.root;
            for (let end = start; end < padded.length; end++) {
                const next = node.children.get(padded[end]);
                if (!next) break;
                node = next;

                const points = node.points;
                if (!points) continue;
                for (let k = 0; k < points.length; k++) {
                    weights[start + k] = Math.max(weights[start + k], points[k]);
                }
            }
        }

        return weights;
    }

    private getTrie(): PatternTrie {
        if (!this.trie) {
            const table = typeof this.source === 'function' ? this.source() : this.source;
            this.trie = buildPatternTrie(table);
        }
        return this.trie;
    }
}
