import {
    Alignment,
    type FontStyle,
    type LineRange,
    type TextLine,
    stripSoftHyphens,
} from './types';

/**
 * LineControl turns a finished line range into positioned words.
 * It owns the spacing rules of each alignment; the engine owns the words.
 */
export class LineControl {
    // Line data
    range: LineRange = { start: 0, end: 0, wordWidthSum: 0 };
    isLastLine = false;

    // Spacing results
    spacing = 0;
    xStart = 0;

    readonly alignment: Alignment;
    readonly pageWidth: number;
    readonly spaceWidth: number;

    constructor(alignment: Alignment, pageWidth: number, spaceWidth: number) {
        this.alignment = alignment;
        this.pageWidth = pageWidth;
        this.spaceWidth = spaceWidth;
    }

    /**
     * Initialize fields for the line covering [start, end)
     */
    startLine(start: number, end: number, widths: readonly number[], isLastLine: boolean): void {
        let wordWidthSum = 0;
        for (let i = start; i < end; i++) {
            wordWidthSum += widths[i];
        }

        this.range = { start, end, wordWidthSum };
        this.isLastLine = isLastLine;
        this.spacing = this.spaceWidth;
        this.xStart = 0;
    }

    get wordCount(): number {
        return this.range.end - this.range.start;
    }

    /**
     * Width left over once every word is placed without spaces
     */
    getSpareSpace(): number {
        return this.pageWidth - this.range.wordWidthSum;
    }

    /**
     * Stretch inter-word spacing so the line fills the page. The remainder of
     * the integer division stays as slack on the right edge.
     */
    justifyLine(): void {
        if (this.alignment !== Alignment.Justified || this.isLastLine || this.wordCount < 2) {
            return;
        }
        this.spacing = Math.trunc(this.getSpareSpace() / (this.wordCount - 1));
    }

    /**
     * Apply alignment offset to the line
     */
    alignLine(): void {
        const naturalSlack = this.getSpareSpace() - (this.wordCount - 1) * this.spaceWidth;

        switch (this.alignment) {
            case Alignment.Right:
                this.xStart = naturalSlack;
                break;
            case Alignment.Center:
                this.xStart = Math.trunc(naturalSlack / 2);
                break;
            case Alignment.Justified:
            case Alignment.Left:
            default:
                this.xStart = 0;
        }
    }

    /**
     * Running x offset of every word in the line
     */
    computePositions(widths: readonly number[]): number[] {
        const positions: number[] = [];
        let x = this.xStart;
        for (let i = this.range.start; i < this.range.end; i++) {
            positions.push(x);
            x += widths[i] + this.spacing;
        }
        return positions;
    }

    /**
     * Create the immutable record handed to the renderer
     */
    createLine(words: readonly string[], styles: readonly FontStyle[], widths: readonly number[]): TextLine {
        this.justifyLine();
        this.alignLine();

        const { start, end } = this.range;
        return Object.freeze({
            words: Object.freeze(words.slice(start, end).map(stripSoftHyphens)),
            xPositions: Object.freeze(this.computePositions(widths)),
            styles: Object.freeze(styles.slice(start, end)),
            alignment: this.alignment,
        });
    }
}
