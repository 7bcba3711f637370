/**
 * Codepoint classification used by hyphenation analysis.
 */

const SOFT_HYPHEN_CP = 0x00ad;
const HYPHEN_MINUS_CP = 0x002d;
const UNICODE_HYPHEN_CP = 0x2010;

export function isSoftHyphen(cp: number): boolean {
    return cp === SOFT_HYPHEN_CP;
}

/**
 * Hard or soft hyphen written into the source text
 */
export function isExplicitHyphen(cp: number): boolean {
    return cp === HYPHEN_MINUS_CP || cp === UNICODE_HYPHEN_CP || cp === SOFT_HYPHEN_CP;
}

/**
 * Basic Latin, Latin-1 and Latin Extended-A/B letters
 */
export function isLatinLetter(cp: number): boolean {
    if ((cp >= 0x41 && cp <= 0x5a) || (cp >= 0x61 && cp <= 0x7a)) {
        return true;
    }
    // Latin-1 letters minus × and ÷
    if (cp >= 0xc0 && cp <= 0xff) {
        return cp !== 0xd7 && cp !== 0xf7;
    }
    return cp >= 0x100 && cp <= 0x24f;
}

export function isCyrillicLetter(cp: number): boolean {
    return (cp >= 0x400 && cp <= 0x481) || (cp >= 0x48a && cp <= 0x4ff);
}

export function isAlphabetic(cp: number): boolean {
    return isLatinLetter(cp) || isCyrillicLetter(cp);
}

/**
 * Lowercase a single codepoint, keeping it when the fold would change its length
 */
function foldCodepoint(cp: number): number {
    const lower = String.fromCodePoint(cp).toLowerCase();
    const folded = lower.codePointAt(0);
    if (folded === undefined || lower.length !== String.fromCodePoint(folded).length) {
        return cp;
    }
    return folded;
}

export function toLowerLatin(cp: number): number {
    if (cp >= 0x41 && cp <= 0x5a) {
        return cp + 0x20;
    }
    return isLatinLetter(cp) ? foldCodepoint(cp) : cp;
}

export function toLowerCyrillic(cp: number): number {
    if (cp >= 0x410 && cp <= 0x42f) {
        return cp + 0x20;
    }
    if (cp >= 0x400 && cp <= 0x40f) {
        return cp + 0x50;
    }
    return isCyrillicLetter(cp) ? foldCodepoint(cp) : cp;
}

export function isWhitespace(cp: number): boolean {
    return cp === 0x20 || (cp >= 0x09 && cp <= 0x0d) || cp === 0xa0 || (cp >= 0x2000 && cp <= 0x200b) ||
        cp === 0x202f || cp === 0x205f || cp === 0x3000;
}

/**
 * ASCII punctuation, Latin-1 punctuation and the General Punctuation block
 */
export function isPunctuation(cp: number): boolean {
    if ((cp >= 0x21 && cp <= 0x2f) || (cp >= 0x3a && cp <= 0x40) ||
        (cp >= 0x5b && cp <= 0x60) || (cp >= 0x7b && cp <= 0x7e)) {
        return true;
    }
    if (cp === 0xa1 || cp === 0xab || cp === 0xb7 || cp === 0xbb || cp === 0xbf) {
        return true;
    }
    return (cp >= 0x2010 && cp <= 0x2027) || (cp >= 0x2030 && cp <= 0x205e);
}

/**
 * Note reference characters that trail a word: digits, superscript digits, * † ‡
 */
export function isFootnoteMarker(cp: number): boolean {
    if (cp >= 0x30 && cp <= 0x39) {
        return true;
    }
    if (cp === 0xb9 || cp === 0xb2 || cp === 0xb3 || cp === 0x2070 || (cp >= 0x2074 && cp <= 0x2079)) {
        return true;
    }
    return cp === 0x2a || cp === 0x2020 || cp === 0x2021;
}
