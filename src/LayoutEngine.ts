import type { Logger } from 'pino';
import {
    Alignment,
    EM_SPACE,
    FontStyle,
    type ParagraphStyle,
    type TextLine,
    type TextMeasurer,
    VISIBLE_HYPHEN,
    defaultParagraphStyle,
} from './types';
import { sliceUtf8, utf8ByteLength } from './CodepointScanner';
import { LayoutInvariantError } from './errors';
import { defaultHyphenator, type Hyphenator } from './hyphenation/Hyphenator';
import { LineControl } from './LineControl';
import { logger as rootLogger } from './logger';
import { TextShaper } from './TextShaper';

/**
 * Saturation value of the line-breaking cost. Squared slack of a wide page
 * can pass the 32-bit range; costs are clamped here instead.
 */
export const MAX_COST = 2 ** 31 - 1;

export interface LayoutEngineOptions {
    hyphenator?: Hyphenator;
    logger?: Logger;
}

/**
 * LayoutEngine owns the words of one paragraph and turns them into lines.
 *
 * Words are consumed as lines are emitted: after a pass that includes the
 * last line the engine is empty. With includeLastLine off the final line
 * stays pending (split remainders included) so more words can be appended
 * before the next pass.
 *
 * Not reentrant: one pass at a time per paragraph.
 */
export class LayoutEngine {
    private readonly words: string[] = [];
    private readonly styles: FontStyle[] = [];
    private widths: number[] = [];
    private cursor = 0; // First word not yet emitted during a pass
    private indentApplied = false;

    private paragraphStyle: ParagraphStyle;
    private readonly measurer: TextMeasurer;
    private readonly hyphenator: Hyphenator;
    private readonly logger: Logger;

    constructor(
        measurer: TextMeasurer,
        paragraphStyle: ParagraphStyle = defaultParagraphStyle,
        options: LayoutEngineOptions = {}
    ) {
        this.measurer = measurer;
        this.paragraphStyle = { ...paragraphStyle };
        this.hyphenator = options.hyphenator ?? defaultHyphenator;
        this.logger = (options.logger ?? rootLogger).child({ component: 'LayoutEngine' });
    }

    /**
     * Set paragraph style
     */
    setParagraphStyle(style: ParagraphStyle): void {
        this.paragraphStyle = { ...style };
    }

    getParagraphStyle(): ParagraphStyle {
        return { ...this.paragraphStyle };
    }

    /**
     * Append a word. Empty words are ignored. Widths from an earlier pass are
     * discarded; every pass measures its words afresh.
     */
    addWord(word: string, style: FontStyle = FontStyle.Regular): void {
        if (word.length === 0) {
            return;
        }
        this.words.push(word);
        this.styles.push(style);
        this.widths = [];
    }

    /**
     * Number of words not yet emitted
     */
    size(): number {
        return this.words.length - this.cursor;
    }

    isEmpty(): boolean {
        return this.size() === 0;
    }

    getPendingWords(): readonly string[] {
        return this.words.slice(this.cursor);
    }

    getPendingStyles(): readonly FontStyle[] {
        return this.styles.slice(this.cursor);
    }

    /**
     * Widths the last pass measured for the pending words. Empty before the
     * first pass and once a word has been appended since.
     */
    getPendingWidths(): readonly number[] {
        return this.widths.slice(this.cursor);
    }

    /**
     * Break the paragraph into lines and hand each finished line to processLine,
     * consuming its words.
     */
    layoutAndExtractLines(
        fontId: number,
        viewportWidth: number,
        processLine: (line: TextLine) => void,
        includeLastLine: boolean = true
    ): void {
        if (this.isEmpty()) {
            return;
        }

        // Fixed transforms before any per-line work
        this.applyParagraphIndent();

        const shaper = new TextShaper(this.measurer, fontId);
        const pageWidth = viewportWidth;
        const spaceWidth = shaper.getSpaceWidth();
        this.widths = this.calculateWordWidths(shaper);
        this.assertAligned();

        const lineBreakIndices = this.paragraphStyle.hyphenationEnabled
            ? this.computeHyphenatedLineBreaks(shaper, pageWidth, spaceWidth)
            : this.computeLineBreaks(shaper, pageWidth, spaceWidth);
        const lineCount = includeLastLine ? lineBreakIndices.length : lineBreakIndices.length - 1;

        const lineControl = new LineControl(this.paragraphStyle.alignment, pageWidth, spaceWidth);
        try {
            for (let i = 0; i < lineCount; i++) {
                this.extractLine(i, lineBreakIndices, lineControl, processLine);
            }
        } finally {
            this.dropConsumed();
        }
    }

    /**
     * Collect every line of the paragraph into an array
     */
    layout(fontId: number, viewportWidth: number, includeLastLine: boolean = true): TextLine[] {
        const lines: TextLine[] = [];
        this.layoutAndExtractLines(fontId, viewportWidth, (line) => lines.push(line), includeLastLine);
        return lines;
    }

    /**
     * Indent the first line with an em space when paragraphs are not
     * separated by extra spacing. Applied once per paragraph.
     */
    private applyParagraphIndent(): void {
        if (this.indentApplied || this.paragraphStyle.extraParagraphSpacing || this.isEmpty()) {
            return;
        }
        this.indentApplied = true;

        const { alignment } = this.paragraphStyle;
        if (alignment === Alignment.Justified || alignment === Alignment.Left) {
            this.words[this.cursor] = EM_SPACE + this.words[this.cursor];
        }
    }

    private calculateWordWidths(shaper: TextShaper): number[] {
        return this.words.map((word, i) => shaper.measureWord(word, this.styles[i]));
    }

    /**
     * Minimum-raggedness breaking. dp[i] is the least cost of setting words
     * i.. and ans[i] the last word of the first line in that setting.
     * Returns, per line, the index of the word that starts the next line.
     */
    private computeLineBreaks(shaper: TextShaper, pageWidth: number, spaceWidth: number): number[] {
        // Split any word that overflows even as the only word on a line
        for (let i = 0; i < this.widths.length; i++) {
            while (this.widths[i] > pageWidth) {
                if (!this.hyphenateWordAtIndex(i, pageWidth, shaper, true)) {
                    break;
                }
            }
        }

        const totalWordCount = this.words.length;
        const dp = new Array<number>(totalWordCount).fill(0);
        const ans = new Array<number>(totalWordCount).fill(0);

        dp[totalWordCount - 1] = 0;
        ans[totalWordCount - 1] = totalWordCount - 1;

        for (let i = totalWordCount - 2; i >= 0; i--) {
            let currentLength = -spaceWidth;
            dp[i] = MAX_COST;

            for (let j = i; j < totalWordCount; j++) {
                currentLength += this.widths[j] + spaceWidth;
                if (currentLength > pageWidth) {
                    break;
                }

                let cost: number;
                if (j === totalWordCount - 1) {
                    cost = 0; // Last line is never penalized
                } else {
                    const remainingSpace = pageWidth - currentLength;
                    cost = Math.min(remainingSpace * remainingSpace + dp[j + 1], MAX_COST);
                }

                // Strict comparison keeps the first minimum, i.e. the shortest line
                if (cost < dp[i]) {
                    dp[i] = cost;
                    ans[i] = j;
                }
            }

            // Nothing fits: set the word alone and inherit the next cost so
            // earlier words still find valid lines
            if (dp[i] === MAX_COST) {
                this.logger.debug({ word: this.words[i], width: this.widths[i], pageWidth }, 'forcing word onto its own line');
                ans[i] = i;
                dp[i] = i + 1 < totalWordCount ? dp[i + 1] : 0;
            }
        }

        const lineBreakIndices: number[] = [];
        let currentWordIndex = 0;
        while (currentWordIndex < totalWordCount) {
            const nextBreakIndex = Math.max(ans[currentWordIndex] + 1, currentWordIndex + 1);
            lineBreakIndices.push(nextBreakIndex);
            currentWordIndex = nextBreakIndex;
        }

        return lineBreakIndices;
    }

    /**
     * Greedy breaking that splits the overflowing word when a hyphenated
     * prefix fits the rest of the line.
     */
    private computeHyphenatedLineBreaks(shaper: TextShaper, pageWidth: number, spaceWidth: number): number[] {
        const lineBreakIndices: number[] = [];
        let currentIndex = 0;

        while (currentIndex < this.widths.length) {
            const lineStart = currentIndex;
            let lineWidth = 0;

            while (currentIndex < this.widths.length) {
                const isFirstWord = currentIndex === lineStart;
                const spacing = isFirstWord ? 0 : spaceWidth;
                const candidateWidth = spacing + this.widths[currentIndex];

                if (lineWidth + candidateWidth <= pageWidth) {
                    lineWidth += candidateWidth;
                    currentIndex++;
                    continue;
                }

                // Fallback breaks only for the first word on a line
                const availableWidth = pageWidth - lineWidth - spacing;
                if (availableWidth > 0 && this.hyphenateWordAtIndex(currentIndex, availableWidth, shaper, isFirstWord)) {
                    lineWidth += spacing + this.widths[currentIndex];
                    currentIndex++;
                    break;
                }

                // At least one word per line
                if (currentIndex === lineStart) {
                    this.logger.debug(
                        { word: this.words[currentIndex], width: this.widths[currentIndex], pageWidth },
                        'word cannot be split to fit, setting it alone'
                    );
                    lineWidth += candidateWidth;
                    currentIndex++;
                }
                break;
            }

            lineBreakIndices.push(currentIndex);
        }

        return lineBreakIndices;
    }

    /**
     * Split words[wordIndex] at the break point giving the widest prefix that
     * fits availableWidth. The remainder is inserted right after the prefix
     * together with its style and width.
     */
    private hyphenateWordAtIndex(
        wordIndex: number,
        availableWidth: number,
        shaper: TextShaper,
        allowFallbackBreaks: boolean
    ): boolean {
        if (availableWidth <= 0 || wordIndex >= this.words.length) {
            return false;
        }

        const word = this.words[wordIndex];
        const style = this.styles[wordIndex];
        const wordBytes = utf8ByteLength(word);

        const breakInfos = this.hyphenator.breakOffsets(word, allowFallbackBreaks);
        if (breakInfos.length === 0) {
            return false;
        }

        let chosenOffset = 0;
        let chosenWidth = -1;
        let chosenNeedsHyphen = true;

        for (const info of breakInfos) {
            const offset = info.byteOffset;
            if (offset === 0 || offset >= wordBytes) {
                continue;
            }

            const prefixWidth = shaper.measureWord(sliceUtf8(word, 0, offset), style, info.requiresInsertedHyphen);
            if (prefixWidth > availableWidth || prefixWidth <= chosenWidth) {
                continue;
            }

            chosenWidth = prefixWidth;
            chosenOffset = offset;
            chosenNeedsHyphen = info.requiresInsertedHyphen;
        }

        if (chosenWidth < 0) {
            return false;
        }

        const prefix = sliceUtf8(word, 0, chosenOffset);
        const remainder = sliceUtf8(word, chosenOffset);

        this.words[wordIndex] = chosenNeedsHyphen ? prefix + VISIBLE_HYPHEN : prefix;
        this.words.splice(wordIndex + 1, 0, remainder);
        this.styles.splice(wordIndex + 1, 0, style);
        this.widths[wordIndex] = chosenWidth;
        this.widths.splice(wordIndex + 1, 0, shaper.measureWord(remainder, style));
        this.assertAligned();

        return true;
    }

    /**
     * Position one computed line and hand it to the callback
     */
    private extractLine(
        breakIndex: number,
        lineBreakIndices: readonly number[],
        lineControl: LineControl,
        processLine: (line: TextLine) => void
    ): void {
        const lineBreak = lineBreakIndices[breakIndex];
        const lastBreakAt = breakIndex > 0 ? lineBreakIndices[breakIndex - 1] : 0;
        const isLastLine = breakIndex === lineBreakIndices.length - 1;

        lineControl.startLine(lastBreakAt, lineBreak, this.widths, isLastLine);
        const line = lineControl.createLine(this.words, this.styles, this.widths);
        this.cursor = lineBreak;
        processLine(line);
    }

    /**
     * Remove emitted words from the front of the owned lists
     */
    private dropConsumed(): void {
        if (this.cursor === 0) {
            return;
        }
        this.words.splice(0, this.cursor);
        this.styles.splice(0, this.cursor);
        this.widths.splice(0, this.cursor);
        this.cursor = 0;
        this.assertAligned();
    }

    private assertAligned(): void {
        if (this.words.length !== this.styles.length || this.words.length !== this.widths.length) {
            throw new LayoutInvariantError(
                `word lists out of step: ${this.words.length} words, ${this.styles.length} styles, ${this.widths.length} widths`
            );
        }
    }
}
