import { isCyrillicLetter, isLatinLetter, toLowerCyrillic, toLowerLatin } from '../characters';
import { LanguageHyphenator } from './LanguageHyphenator';
import { loadPatternModule } from './PatternTable';

export interface LanguageEntry {
    readonly displayName: string; // Name used by tooling, e.g. "english"
    readonly primaryTag: string;  // Lowercase BCP-47 primary subtag, e.g. "en"
    readonly hyphenator: LanguageHyphenator;
}

/**
 * Maps primary language tags to their hyphenators.
 */
export class LanguageRegistry {
    private readonly entries: LanguageEntry[];

    constructor(entries: readonly LanguageEntry[] = []) {
        this.entries = [...entries];
    }

    lookup(primaryTag: string): LanguageHyphenator | undefined {
        return this.entries.find((entry) => entry.primaryTag === primaryTag)?.hyphenator;
    }

    findByName(displayName: string): LanguageEntry | undefined {
        return this.entries.find((entry) => entry.displayName === displayName);
    }

    listEntries(): readonly LanguageEntry[] {
        return Object.freeze([...this.entries]);
    }

    /**
     * Add a language, replacing any entry with the same primary tag
     */
    register(entry: LanguageEntry): void {
        const index = this.entries.findIndex((existing) => existing.primaryTag === entry.primaryTag);
        if (index >= 0) {
            this.entries[index] = entry;
        } else {
            this.entries.push(entry);
        }
    }
}

function latin(moduleName: string, minPrefix?: number, minSuffix?: number): LanguageHyphenator {
    return new LanguageHyphenator(() => loadPatternModule(moduleName), isLatinLetter, toLowerLatin, minPrefix, minSuffix);
}

export function createBuiltinLanguageEntries(): LanguageEntry[] {
    return [
        { displayName: 'english', primaryTag: 'en', hyphenator: latin('hyphenation.en-us', 3, 3) },
        { displayName: 'french', primaryTag: 'fr', hyphenator: latin('hyphenation.fr') },
        { displayName: 'german', primaryTag: 'de', hyphenator: latin('hyphenation.de') },
        {
            displayName: 'russian',
            primaryTag: 'ru',
            hyphenator: new LanguageHyphenator(() => loadPatternModule('hyphenation.ru'), isCyrillicLetter, toLowerCyrillic),
        },
    ];
}

export const defaultLanguageRegistry = new LanguageRegistry(createBuiltinLanguageEntries());
