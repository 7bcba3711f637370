import { z } from 'zod';
import { ParagraphConfigError } from './errors';
import type { Hyphenator } from './hyphenation/Hyphenator';
import { LayoutEngine } from './LayoutEngine';
import type { Logger } from './logger';
import { Alignment, FontStyle, type ParagraphStyle, type TextLine, type TextMeasurer } from './types';

/**
 * Paragraph configuration as supplied by reader settings
 */
export const paragraphConfigSchema = z.object({
    alignment: z.nativeEnum(Alignment).default(Alignment.Justified),
    hyphenationEnabled: z.boolean().default(false),
    extraParagraphSpacing: z.boolean().default(true),
    viewportWidth: z.number().int().nonnegative(),
});

export type ParagraphConfig = z.infer<typeof paragraphConfigSchema>;
export type ParagraphConfigInput = z.input<typeof paragraphConfigSchema>;

export function parseParagraphConfig(input: unknown): ParagraphConfig {
    const result = paragraphConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ParagraphConfigError(`Invalid paragraph configuration: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

export function toParagraphStyle(config: ParagraphConfig): ParagraphStyle {
    return {
        alignment: config.alignment,
        hyphenationEnabled: config.hyphenationEnabled,
        extraParagraphSpacing: config.extraParagraphSpacing,
    };
}

export interface WordInput {
    text: string;
    style?: FontStyle;
}

export interface LayoutParagraphOptions {
    fontId?: number;
    includeLastLine?: boolean;
    hyphenator?: Hyphenator;
    logger?: Logger;
}

/**
 * Lay out a whole paragraph in one call and return its lines
 */
export function layoutParagraph(
    words: ReadonlyArray<string | WordInput>,
    config: ParagraphConfigInput,
    measurer: TextMeasurer,
    options: LayoutParagraphOptions = {}
): TextLine[] {
    const parsed = parseParagraphConfig(config);
    const engine = new LayoutEngine(measurer, toParagraphStyle(parsed), {
        hyphenator: options.hyphenator,
        logger: options.logger,
    });

    for (const word of words) {
        if (typeof word === 'string') {
            engine.addWord(word);
        } else {
            engine.addWord(word.text, word.style ?? FontStyle.Regular);
        }
    }

    return engine.layout(options.fontId ?? 0, parsed.viewportWidth, options.includeLastLine ?? true);
}
