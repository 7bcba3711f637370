import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import chalk from 'chalk';
import { Command, InvalidArgumentError, Option } from 'commander';
import { parseParagraphConfig, toParagraphStyle } from '../config';
import {
    evaluateLanguage,
    hyphenateWordWithHyphenator,
    loadTestData,
    positionsToHyphenated,
    type LanguageEvaluation,
} from '../evaluation/HyphenationEvaluation';
import { FixedAdvanceMeasurer } from '../FixedAdvanceMeasurer';
import { Hyphenator, primaryLanguageTag } from '../hyphenation/Hyphenator';
import { defaultLanguageRegistry, type LanguageEntry } from '../hyphenation/LanguageRegistry';
import { LayoutEngine } from '../LayoutEngine';
import { TextShaper } from '../TextShaper';
import { Alignment, type TextLine } from '../types';

export interface CliOutput {
    write(text: string): void;
}

const stdout: CliOutput = {
    write: (text) => {
        process.stdout.write(text);
    },
};

function parseWidth(value: string): number {
    const width = Number.parseInt(value, 10);
    if (Number.isNaN(width) || width <= 0) {
        throw new InvalidArgumentError('Width must be a positive integer.');
    }
    return width;
}

/**
 * Render a positioned line as monospace text, one column per width unit
 */
export function renderMonospaceLine(line: TextLine): string {
    let text = '';
    let column = 0;
    line.words.forEach((word, i) => {
        const x = Math.max(line.xPositions[i], column);
        text += ' '.repeat(x - column) + word;
        column = x + Array.from(word).length;
    });
    return text;
}

function formatPercent(value: number): string {
    return `${(value * 100).toFixed(2)}%`;
}

function printEvaluation(out: CliOutput, entry: LanguageEntry, evaluation: LanguageEvaluation): void {
    const title = `${entry.displayName.toUpperCase()} HYPHENATION EVALUATION RESULTS`;
    out.write(`${chalk.bold(title)}\n\n`);
    out.write(`Total test cases:   ${evaluation.totalCases}\n`);
    out.write(`Perfect matches:    ${evaluation.perfectMatches}\n`);
    out.write(`Partial matches:    ${evaluation.partialMatches}\n`);
    out.write(`Complete misses:    ${evaluation.completeMisses}\n\n`);
    out.write(`Average precision:  ${formatPercent(evaluation.averagePrecision)}\n`);
    out.write(`Average recall:     ${formatPercent(evaluation.averageRecall)}\n`);
    out.write(`Average F1:         ${formatPercent(evaluation.averageF1)}\n`);
    out.write(`Weighted score:     ${formatPercent(evaluation.averageWeightedScore)} (FP penalty: 2x)\n\n`);
    out.write(`Overall precision:  ${formatPercent(evaluation.overallPrecision)}\n`);
    out.write(`Overall recall:     ${formatPercent(evaluation.overallRecall)}\n`);
    out.write(`Overall F1:         ${formatPercent(evaluation.overallF1)}\n`);

    if (evaluation.worstCases.length > 0) {
        out.write(`\n${chalk.yellow('Worst cases')}\n`);
        for (const { testCase, actual } of evaluation.worstCases) {
            out.write(`  ${testCase.word}: expected ${testCase.hyphenated}, got ${positionsToHyphenated(testCase.word, actual)}\n`);
        }
    }
    out.write('\n');
}

export function createProgram(out: CliOutput = stdout): Command {
    const program: Command = new Command('paragraph-layout')
        .description('Paragraph line breaking and hyphenation tools')
        .version('0.1.0');

    program
        .command('hyphenate')
        .description('Print the hyphenation points of words')
        .argument('<words...>', 'Words to hyphenate')
        .option('--lang <tag>', 'Language tag', 'en')
        .action((words: string[], options: { lang: string }) => {
            const hyphenator = defaultLanguageRegistry.lookup(primaryLanguageTag(options.lang));
            if (!hyphenator) {
                program.error(`No hyphenation rules for language "${options.lang}".`);
            }
            for (const word of words) {
                out.write(`${positionsToHyphenated(word, hyphenateWordWithHyphenator(word, hyphenator))}\n`);
            }
        });

    program
        .command('layout')
        .description('Lay out a text file as monospace lines (paragraphs separated by blank lines)')
        .argument('<file>', 'Text file')
        .option('--width <columns>', 'Line width in columns', parseWidth, 60)
        .addOption(new Option('--align <alignment>', 'Paragraph alignment').choices(Object.values(Alignment)).default(Alignment.Left))
        .option('--hyphenate', 'Split words with hyphens while filling lines', false)
        .option('--indent', 'Indent first lines instead of separating paragraphs', false)
        .option('--lang <tag>', 'Language tag for hyphenation rules', 'en')
        .action(async (file: string, options: { width: number; align: string; hyphenate: boolean; indent: boolean; lang: string }) => {
            const config = parseParagraphConfig({
                alignment: options.align,
                hyphenationEnabled: options.hyphenate,
                extraParagraphSpacing: !options.indent,
                viewportWidth: options.width,
            });
            const hyphenator = new Hyphenator();
            hyphenator.setPreferredLanguage(options.lang);
            const measurer = new FixedAdvanceMeasurer({ advance: 1, spaceAdvance: 1 });

            const text = await readFile(file, 'utf8');
            const paragraphs = text.split(/\n\s*\n/).map(TextShaper.splitWords).filter((words) => words.length > 0);

            paragraphs.forEach((words, index) => {
                if (index > 0 && config.extraParagraphSpacing) {
                    out.write('\n');
                }
                const engine = new LayoutEngine(measurer, toParagraphStyle(config), { hyphenator });
                for (const word of words) {
                    engine.addWord(word);
                }
                engine.layoutAndExtractLines(0, config.viewportWidth, (line) => out.write(`${renderMonospaceLine(line)}\n`));
            });
        });

    program
        .command('evaluate')
        .description('Score hyphenation rules against reference data')
        .argument('<language>', 'Language name (english, french, german, russian) or "all"')
        .requiredOption('--data <dir>', 'Directory holding <language>_hyphenation_tests.txt files')
        .option('--worst <count>', 'Number of worst cases to list', parseWidth, 10)
        .action(async (language: string, options: { data: string; worst: number }) => {
            const selected = language === 'all' ? undefined : defaultLanguageRegistry.findByName(language);
            if (language !== 'all' && !selected) {
                program.error(`Unknown language "${language}".`);
            }
            const entries = selected ? [selected] : defaultLanguageRegistry.listEntries();

            for (const entry of entries) {
                const testCases = await loadTestData(join(options.data, `${entry.displayName}_hyphenation_tests.txt`));
                const evaluation = evaluateLanguage(
                    testCases,
                    (word) => hyphenateWordWithHyphenator(word, entry.hyphenator),
                    options.worst
                );
                printEvaluation(out, entry, evaluation);
            }
        });

    return program;
}
