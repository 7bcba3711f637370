import type { CodepointInfo } from './types';
import { isFootnoteMarker, isPunctuation, isWhitespace } from './characters';

const REPLACEMENT_CHARACTER = 0xfffd;

/**
 * Number of bytes the UTF-8 encoding of a codepoint takes
 */
export function utf8Width(cp: number): number {
    if (cp < 0x80) return 1;
    if (cp < 0x800) return 2;
    if (cp < 0x10000) return 3;
    return 4;
}

export function utf8ByteLength(text: string): number {
    return Buffer.byteLength(text, 'utf8');
}

/**
 * Slice a string by UTF-8 byte offsets. Offsets must fall on codepoint boundaries.
 */
export function sliceUtf8(text: string, start: number, end?: number): string {
    return Buffer.from(text, 'utf8').subarray(start, end).toString('utf8');
}

/**
 * Decode text into codepoints with the UTF-8 offset of each one.
 *
 * Strings: lone surrogates decode as U+FFFD, the same substitution Node's
 * encoder makes, so offsets stay valid for {@link sliceUtf8}.
 * Byte arrays: any malformed sequence decodes as U+FFFD and consumes one byte.
 */
export function decodeCodepoints(text: string | Uint8Array): CodepointInfo[] {
    return typeof text === 'string' ? decodeString(text) : decodeBytes(text);
}

function decodeString(text: string): CodepointInfo[] {
    const cps: CodepointInfo[] = [];
    let byteOffset = 0;

    for (const char of text) {
        const raw = char.codePointAt(0) ?? REPLACEMENT_CHARACTER;
        const value = raw >= 0xd800 && raw <= 0xdfff ? REPLACEMENT_CHARACTER : raw;
        cps.push({ value, byteOffset });
        byteOffset += utf8Width(value);
    }

    return cps;
}

function decodeBytes(bytes: Uint8Array): CodepointInfo[] {
    const cps: CodepointInfo[] = [];
    let i = 0;

    while (i < bytes.length) {
        const lead = bytes[i];
        let length = 0;
        let value = 0;
        let min = 0;

        if (lead < 0x80) {
            cps.push({ value: lead, byteOffset: i });
            i++;
            continue;
        } else if (lead >= 0xc2 && lead <= 0xdf) {
            length = 2; value = lead & 0x1f; min = 0x80;
        } else if (lead >= 0xe0 && lead <= 0xef) {
            length = 3; value = lead & 0x0f; min = 0x800;
        } else if (lead >= 0xf0 && lead <= 0xf4) {
            length = 4; value = lead & 0x07; min = 0x10000;
        }

        let valid = length > 0 && i + length <= bytes.length;
        for (let k = 1; valid && k < length; k++) {
            const next = bytes[i + k];
            if ((next & 0xc0) !== 0x80) {
                valid = false;
            } else {
                value = (value << 6) | (next & 0x3f);
            }
        }

        // Overlong forms, surrogates and values past U+10FFFF
        if (valid && (value < min || (value >= 0xd800 && value <= 0xdfff) || value > 0x10ffff)) {
            valid = false;
        }

        if (valid) {
            cps.push({ value, byteOffset: i });
            i += length;
        } else {
            cps.push({ value: REPLACEMENT_CHARACTER, byteOffset: i });
            i++;
        }
    }

    return cps;
}

function isLeadingTrimmable(cp: number): boolean {
    return isPunctuation(cp) || isWhitespace(cp);
}

function isTrailingTrimmable(cp: number): boolean {
    return isPunctuation(cp) || isWhitespace(cp) || isFootnoteMarker(cp);
}

/**
 * Drop leading punctuation and trailing punctuation or footnote markers in place.
 * Only for hyphenation analysis; widths are always measured on the full word.
 */
export function trimSurroundingPunctuationAndFootnote(cps: CodepointInfo[]): void {
    let end = cps.length;
    while (end > 0 && isTrailingTrimmable(cps[end - 1].value)) {
        end--;
    }
    cps.length = end;

    let start = 0;
    while (start < cps.length && isLeadingTrimmable(cps[start].value)) {
        start++;
    }
    if (start > 0) {
        cps.splice(0, start);
    }
}
