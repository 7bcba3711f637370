import {
    FontStyle,
    type TextMeasurer,
    VISIBLE_HYPHEN,
    containsSoftHyphen,
    stripSoftHyphens,
} from './types';

/**
 * TextShaper measures words for one font through the renderer's measurer
 * and turns plain text into the word stream the layout engine consumes.
 */
export class TextShaper {
    private readonly measurer: TextMeasurer;
    private readonly fontId: number;

    constructor(measurer: TextMeasurer, fontId: number) {
        this.measurer = measurer;
        this.fontId = fontId;
    }

    /**
     * Rendered width of a word. Soft hyphens are never drawn, so they are
     * removed first; appendHyphen measures the word as a split prefix.
     */
    measureWord(word: string, style: FontStyle, appendHyphen: boolean = false): number {
        if (!containsSoftHyphen(word) && !appendHyphen) {
            return this.measurer.measure(this.fontId, word, style);
        }

        let sanitized = stripSoftHyphens(word);
        if (appendHyphen) {
            sanitized += VISIBLE_HYPHEN;
        }
        return this.measurer.measure(this.fontId, sanitized, style);
    }

    /**
     * Width of the inter-word space
     */
    getSpaceWidth(): number {
        return this.measurer.measure(this.fontId, ' ', FontStyle.Regular);
    }

    /**
     * Split text into words on any run of whitespace
     */
    static splitWords(text: string): string[] {
        return text.split(/\s+/u).filter((word) => word.length > 0);
    }
}
