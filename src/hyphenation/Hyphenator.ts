import type { Logger } from 'pino';
import type { BreakInfo, CodepointInfo } from '../types';
import { isAlphabetic, isExplicitHyphen, isSoftHyphen } from '../characters';
import { decodeCodepoints, trimSurroundingPunctuationAndFootnote } from '../CodepointScanner';
import { logger as rootLogger } from '../logger';
import { DEFAULT_MIN_PREFIX, DEFAULT_MIN_SUFFIX, type LanguageHyphenator } from './LanguageHyphenator';
import { defaultLanguageRegistry, type LanguageRegistry } from './LanguageRegistry';

/**
 * Reduce a BCP-47 tag to its lowercase primary subtag ("en-US" -> "en")
 */
export function primaryLanguageTag(tag: string): string {
    let primary = '';
    for (const char of tag) {
        if (char === '-' || char === '_') break;
        primary += char >= 'A' && char <= 'Z' ? char.toLowerCase() : char;
    }
    return primary;
}

function byteOffsetForIndex(cps: readonly CodepointInfo[], index: number): number {
    if (index < cps.length) {
        return cps[index].byteOffset;
    }
    return cps.length > 0 ? cps[cps.length - 1].byteOffset : 0;
}

/**
 * Breaks written into the text as hard or soft hyphens between two letters.
 * The break lands on the codepoint after the marker.
 */
function explicitBreakInfos(cps: readonly CodepointInfo[]): BreakInfo[] {
    const breaks: BreakInfo[] = [];
    for (let i = 1; i + 1 < cps.length; i++) {
        const cp = cps[i].value;
        if (!isExplicitHyphen(cp) || !isAlphabetic(cps[i - 1].value) || !isAlphabetic(cps[i + 1].value)) {
            continue;
        }
        breaks.push({ byteOffset: cps[i + 1].byteOffset, requiresInsertedHyphen: isSoftHyphen(cp) });
    }
    return breaks;
}

/**
 * Resolves candidate break points for words in the preferred language.
 *
 * Explicit markers win over pattern breaks, which win over positional
 * fallback. Each instance carries its own language selection, so paragraphs
 * in different languages can be laid out side by side.
 */
export class Hyphenator {
    private active: LanguageHyphenator | undefined;
    private readonly registry: LanguageRegistry;
    private readonly logger: Logger;

    constructor(registry: LanguageRegistry = defaultLanguageRegistry, logger: Logger = rootLogger) {
        this.registry = registry;
        this.logger = logger.child({ component: 'Hyphenator' });
    }

    /**
     * Select rules from a language hint such as "en", "en-US" or "ru_RU".
     * Empty or unknown tags leave only fallback breaks available.
     */
    setPreferredLanguage(tag: string): void {
        const primary = primaryLanguageTag(tag);
        this.active = primary ? this.registry.lookup(primary) : undefined;
        if (!this.active && tag) {
            this.logger.debug({ tag }, 'no hyphenation rules for language, using fallback breaks only');
        }
    }

    getActiveHyphenator(): LanguageHyphenator | undefined {
        return this.active;
    }

    /**
     * Byte offsets where the word may be split. With includeFallback every
     * position honouring the minimum prefix/suffix is offered when the
     * language rules find nothing.
     */
    breakOffsets(word: string, includeFallback: boolean): BreakInfo[] {
        if (word.length === 0) {
            return [];
        }

        const cps = decodeCodepoints(word);
        trimSurroundingPunctuationAndFootnote(cps);

        const explicit = explicitBreakInfos(cps);
        if (explicit.length > 0) {
            return explicit;
        }

        const hyphenator = this.active;
        const indexes = hyphenator ? hyphenator.breakIndexes(cps) : [];

        if (includeFallback && indexes.length === 0) {
            const minPrefix = hyphenator ? hyphenator.minPrefix() : DEFAULT_MIN_PREFIX;
            const minSuffix = hyphenator ? hyphenator.minSuffix() : DEFAULT_MIN_SUFFIX;
            for (let index = minPrefix; index + minSuffix <= cps.length; index++) {
                indexes.push(index);
            }
        }

        return indexes.map((index) => ({ byteOffset: byteOffsetForIndex(cps, index), requiresInsertedHyphen: true }));
    }
}

/**
 * Shared resolver for callers that want one process-wide language setting
 */
export const defaultHyphenator = new Hyphenator();

export function setPreferredLanguage(tag: string): void {
    defaultHyphenator.setPreferredLanguage(tag);
}
