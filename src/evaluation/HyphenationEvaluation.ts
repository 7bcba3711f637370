import { readFile } from 'node:fs/promises';
import { decodeCodepoints, trimSurroundingPunctuationAndFootnote } from '../CodepointScanner';
import { EvaluationDataError } from '../errors';
import type { LanguageHyphenator } from '../hyphenation/LanguageHyphenator';

/**
 * One reference word: `word|hy=phen=ation|frequency`
 */
export interface TestCase {
    word: string;
    hyphenated: string;
    expectedPositions: number[];
    frequency: number;
}

export interface EvaluationResult {
    truePositives: number;
    falsePositives: number;
    falseNegatives: number;
    precision: number;
    recall: number;
    f1Score: number;
    weightedScore: number;
}

export interface LanguageEvaluation {
    totalCases: number;
    perfectMatches: number;
    partialMatches: number;
    completeMisses: number;
    averagePrecision: number;
    averageRecall: number;
    averageF1: number;
    averageWeightedScore: number;
    truePositives: number;
    falsePositives: number;
    falseNegatives: number;
    overallPrecision: number;
    overallRecall: number;
    overallF1: number;
    worstCases: Array<{ testCase: TestCase; result: EvaluationResult; actual: number[] }>;
}

export type HyphenateFn = (word: string) => number[];

const FALSE_POSITIVE_PENALTY = 2;
const FALSE_NEGATIVE_PENALTY = 1;

/**
 * Codepoint indexes marked with '=' in an annotated word
 */
export function expectedPositionsFromAnnotatedWord(annotated: string): number[] {
    const positions: number[] = [];
    let codepointIndex = 0;
    for (const char of annotated) {
        if (char === '=') {
            positions.push(codepointIndex);
        } else {
            codepointIndex++;
        }
    }
    return positions;
}

/**
 * Insert '=' before each given codepoint index (an index equal to the word
 * length appends a trailing marker)
 */
export function positionsToHyphenated(word: string, positions: readonly number[]): string {
    const sorted = [...positions].sort((a, b) => a - b);
    let result = '';
    let next = 0;
    let codepointIndex = 0;

    for (const char of word) {
        while (next < sorted.length && sorted[next] === codepointIndex) {
            result += '=';
            next++;
        }
        result += char;
        codepointIndex++;
    }
    while (next < sorted.length && sorted[next] === codepointIndex) {
        result += '=';
        next++;
    }

    return result;
}

export function hyphenateWordWithHyphenator(word: string, hyphenator: LanguageHyphenator): number[] {
    const cps = decodeCodepoints(word);
    trimSurroundingPunctuationAndFootnote(cps);
    return hyphenator.breakIndexes(cps);
}

/**
 * Parse `word|hyphenated|frequency` lines. Blank lines, '#' comments and
 * lines missing a field or a numeric frequency are skipped.
 */
export function parseTestData(content: string): TestCase[] {
    const testCases: TestCase[] = [];

    for (const line of content.split(/\r?\n/)) {
        if (line.length === 0 || line.startsWith('#')) continue;

        const [word, hyphenated, frequencyField] = line.split('|');
        if (word === undefined || hyphenated === undefined || frequencyField === undefined) continue;

        const frequency = Number.parseInt(frequencyField, 10);
        if (Number.isNaN(frequency)) continue;

        testCases.push({
            word,
            hyphenated,
            expectedPositions: expectedPositionsFromAnnotatedWord(hyphenated),
            frequency,
        });
    }

    return testCases;
}

export async function loadTestData(path: string): Promise<TestCase[]> {
    let content: string;
    try {
        content = await readFile(path, 'utf8');
    } catch (err) {
        throw new EvaluationDataError(`Could not open ${path}`, { cause: err });
    }
    return parseTestData(content);
}

export function evaluateWord(testCase: TestCase, hyphenate: HyphenateFn): EvaluationResult {
    return scorePositions(testCase.expectedPositions, hyphenate(testCase.word));
}

function scorePositions(expectedPositions: readonly number[], actualPositions: readonly number[]): EvaluationResult {
    const expected = new Set(expectedPositions);
    const actual = new Set(actualPositions);

    let truePositives = 0;
    let falsePositives = 0;
    for (const position of actual) {
        if (expected.has(position)) {
            truePositives++;
        } else {
            falsePositives++;
        }
    }
    let falseNegatives = 0;
    for (const position of expected) {
        if (!actual.has(position)) falseNegatives++;
    }

    let precision = truePositives + falsePositives > 0 ? truePositives / (truePositives + falsePositives) : 0;
    let recall = truePositives + falseNegatives > 0 ? truePositives / (truePositives + falseNegatives) : 0;
    let f1Score = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;

    // Nothing expected and nothing found is a perfect answer
    if (expected.size === 0 && actual.size === 0) {
        precision = 1;
        recall = 1;
        f1Score = 1;
    }

    const totalErrors = falsePositives * FALSE_POSITIVE_PENALTY + falseNegatives * FALSE_NEGATIVE_PENALTY;
    const totalPossible = expected.size * FALSE_POSITIVE_PENALTY;
    let weightedScore = 0;
    if (totalPossible > 0) {
        weightedScore = Math.max(0, 1 - totalErrors / totalPossible);
    } else if (falsePositives === 0) {
        weightedScore = 1;
    }

    return { truePositives, falsePositives, falseNegatives, precision, recall, f1Score, weightedScore };
}

/**
 * Score a hyphenation function against a set of reference words
 */
export function evaluateLanguage(testCases: readonly TestCase[], hyphenate: HyphenateFn, worstCount = 10): LanguageEvaluation {
    const evaluation: LanguageEvaluation = {
        totalCases: testCases.length,
        perfectMatches: 0,
        partialMatches: 0,
        completeMisses: 0,
        averagePrecision: 0,
        averageRecall: 0,
        averageF1: 0,
        averageWeightedScore: 0,
        truePositives: 0,
        falsePositives: 0,
        falseNegatives: 0,
        overallPrecision: 0,
        overallRecall: 0,
        overallF1: 0,
        worstCases: [],
    };
    if (testCases.length === 0) {
        return evaluation;
    }

    let totalPrecision = 0;
    let totalRecall = 0;
    let totalF1 = 0;
    let totalWeighted = 0;
    const scored: LanguageEvaluation['worstCases'] = [];

    for (const testCase of testCases) {
        const actual = hyphenate(testCase.word);
        const result = scorePositions(testCase.expectedPositions, actual);

        totalPrecision += result.precision;
        totalRecall += result.recall;
        totalF1 += result.f1Score;
        totalWeighted += result.weightedScore;
        evaluation.truePositives += result.truePositives;
        evaluation.falsePositives += result.falsePositives;
        evaluation.falseNegatives += result.falseNegatives;

        if (result.f1Score === 1) {
            evaluation.perfectMatches++;
        } else if (result.truePositives > 0) {
            evaluation.partialMatches++;
        } else {
            evaluation.completeMisses++;
        }

        if (result.weightedScore < 1) {
            scored.push({ testCase, result, actual });
        }
    }

    const count = testCases.length;
    evaluation.averagePrecision = totalPrecision / count;
    evaluation.averageRecall = totalRecall / count;
    evaluation.averageF1 = totalF1 / count;
    evaluation.averageWeightedScore = totalWeighted / count;

    const { truePositives: tp, falsePositives: fp, falseNegatives: fn } = evaluation;
    evaluation.overallPrecision = tp + fp > 0 ? tp / (tp + fp) : 0;
    evaluation.overallRecall = tp + fn > 0 ? tp / (tp + fn) : 0;
    evaluation.overallF1 = evaluation.overallPrecision + evaluation.overallRecall > 0
        ? (2 * evaluation.overallPrecision * evaluation.overallRecall) / (evaluation.overallPrecision + evaluation.overallRecall)
        : 0;

    evaluation.worstCases = scored
        .sort((a, b) => a.result.weightedScore - b.result.weightedScore || b.testCase.frequency - a.testCase.frequency)
        .slice(0, worstCount);

    return evaluation;
}
