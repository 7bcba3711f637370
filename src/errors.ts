/**
 * Base class for errors raised by the layout package.
 * Layout itself degrades instead of throwing; these cover misconfiguration,
 * malformed data and broken internal invariants.
 */
export class LayoutError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A compiled hyphenation pattern table failed validation
 */
export class PatternTableError extends LayoutError {}

/**
 * Paragraph configuration failed validation
 */
export class ParagraphConfigError extends LayoutError {
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = []) {
        super(message);
        this.issues = issues;
    }
}

/**
 * Word, style and width lists went out of alignment
 */
export class LayoutInvariantError extends LayoutError {}

/**
 * Hyphenation evaluation data could not be read
 */
export class EvaluationDataError extends LayoutError {}
