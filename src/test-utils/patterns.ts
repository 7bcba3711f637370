import { isLatinLetter, toLowerLatin } from '../characters';
import { LanguageHyphenator } from '../hyphenation/LanguageHyphenator';
import { LanguageRegistry } from '../hyphenation/LanguageRegistry';
import type { CompiledPatterns } from '../hyphenation/PatternTable';

/**
 * Tiny table in the published packed layout:
 *   hy3ph  -> hy|phen...
 *   hen5at -> ...phen|ation
 *   n2a    -> even weight that loses to hen5at
 *   _ex1   -> ex|... at the start of a word only
 */
export const TEST_PATTERNS: CompiledPatterns = {
    patterns: {
        3: 'n2a',
        4: '_ex1',
        5: 'hy3ph',
        6: 'hen5at',
    },
    exceptions: 'ta-ble',
};

export function createTestHyphenator(minPrefix = 2, minSuffix = 2): LanguageHyphenator {
    return new LanguageHyphenator(TEST_PATTERNS, isLatinLetter, toLowerLatin, minPrefix, minSuffix);
}

export function createTestRegistry(): LanguageRegistry {
    return new LanguageRegistry([{ displayName: 'testish', primaryTag: 'en', hyphenator: createTestHyphenator() }]);
}
