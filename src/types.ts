/**
 * Text alignment options
 */
export enum Alignment {
    Left = 'left',
    Right = 'right',
    Center = 'center',
    Justified = 'justified',
}

/**
 * Font style of a single word
 */
export enum FontStyle {
    Regular = 'regular',
    Bold = 'bold',
    Italic = 'italic',
    BoldItalic = 'bold-italic',
}

/**
 * Width measurement capability supplied by the renderer.
 * Must be pure and deterministic for a given (font, style, text) triple,
 * and must treat soft hyphens as zero width.
 */
export interface TextMeasurer {
    measure(fontId: number, text: string, style: FontStyle): number;
}

/**
 * A decoded codepoint and the UTF-8 offset of its first byte in the source
 */
export interface CodepointInfo {
    value: number;
    byteOffset: number;
}

/**
 * Legal split position inside a word
 */
export interface BreakInfo {
    byteOffset: number;             // UTF-8 offset where the remainder starts
    requiresInsertedHyphen: boolean; // Prefix needs a visible '-' appended
}

/**
 * Half-open range of word indices assigned to one line
 */
export interface LineRange {
    start: number;
    end: number;
    wordWidthSum: number;
}

/**
 * Finished line handed to the renderer
 */
export interface TextLine {
    readonly words: readonly string[];
    readonly xPositions: readonly number[];
    readonly styles: readonly FontStyle[];
    readonly alignment: Alignment;
}

/**
 * Options a paragraph is laid out with
 */
export interface ParagraphStyle {
    alignment: Alignment;
    hyphenationEnabled: boolean;
    extraParagraphSpacing: boolean; // When off, the first line gets an em-space indent
}

/**
 * Default paragraph style
 */
export const defaultParagraphStyle: ParagraphStyle = {
    alignment: Alignment.Justified,
    hyphenationEnabled: false,
    extraParagraphSpacing: true,
};

export const SOFT_HYPHEN = '\u00AD';
export const EM_SPACE = '\u2003';
export const VISIBLE_HYPHEN = '-';

/**
 * Check whether a word carries any soft hyphen
 */
export function containsSoftHyphen(word: string): boolean {
    return word.includes(SOFT_HYPHEN);
}

/**
 * Remove every soft hyphen so rendered glyphs match measured widths
 */
export function stripSoftHyphens(word: string): string {
    return containsSoftHyphen(word) ? word.split(SOFT_HYPHEN).join('') : word;
}
