import { FontStyle, SOFT_HYPHEN, type TextMeasurer } from './types';

export interface FixedAdvanceOptions {
    advance: number;      // Width of every visible codepoint
    spaceAdvance: number; // Width of a space
    boldExtra: number;    // Added per codepoint for bold styles
}

const defaultOptions: FixedAdvanceOptions = {
    advance: 10,
    spaceAdvance: 10,
    boldExtra: 0,
};

/**
 * Measurer for monospaced output (terminals, fixtures): every codepoint has
 * the same advance, soft hyphens measure zero.
 */
export class FixedAdvanceMeasurer implements TextMeasurer {
    private readonly options: FixedAdvanceOptions;

    constructor(options: Partial<FixedAdvanceOptions> = {}) {
        this.options = { ...defaultOptions, ...options };
    }

    measure(_fontId: number, text: string, style: FontStyle): number {
        const bold = style === FontStyle.Bold || style === FontStyle.BoldItalic;
        let width = 0;
        for (const char of text) {
            if (char === SOFT_HYPHEN) continue;
            if (char === ' ') {
                width += this.options.spaceAdvance;
                continue;
            }
            width += this.options.advance + (bold ? this.options.boldExtra : 0);
        }
        return width;
    }
}
