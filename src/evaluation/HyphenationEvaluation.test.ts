import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { EvaluationDataError } from '../errors';
import { createTestHyphenator } from '../test-utils/patterns';
import {
    evaluateLanguage,
    evaluateWord,
    expectedPositionsFromAnnotatedWord,
    hyphenateWordWithHyphenator,
    loadTestData,
    parseTestData,
    positionsToHyphenated,
    type TestCase,
} from './HyphenationEvaluation';

const SAMPLE = [
    '# word|hyphenated|frequency',
    'hyphenation|hy=phen=ation|5',
    '',
    'example|ex=am=ple|3',
    'table|ta=ble|7',
    'broken line',
    'word|wo=rd|many',
].join('\n');

const hyphenator = createTestHyphenator();
const hyphenate = (word: string) => hyphenateWordWithHyphenator(word, hyphenator);

function testCase(word: string, hyphenated: string, frequency = 1): TestCase {
    return { word, hyphenated, expectedPositions: expectedPositionsFromAnnotatedWord(hyphenated), frequency };
}

describe('annotated words', () => {
    it('reads break positions as codepoint indexes', () => {
        expect(expectedPositionsFromAnnotatedWord('hy=phen=ation')).toEqual([2, 6]);
        expect(expectedPositionsFromAnnotatedWord('сл=ово')).toEqual([2]);
        expect(expectedPositionsFromAnnotatedWord('word')).toEqual([]);
    });

    it('writes positions back in order', () => {
        expect(positionsToHyphenated('hyphenation', [6, 2])).toBe('hy=phen=ation');
        expect(positionsToHyphenated('слово', [2])).toBe('сл=ово');
        expect(positionsToHyphenated('ab', [2])).toBe('ab=');
    });

    it('agrees with the hyphenator output', () => {
        expect(positionsToHyphenated('hyphenation', hyphenate('hyphenation'))).toBe('hy=phen=ation');
        expect(hyphenate('“example”')).toEqual([2]);
    });
});

describe('parseTestData', () => {
    it('skips comments, blank and malformed lines', () => {
        expect(parseTestData(SAMPLE)).toEqual([
            testCase('hyphenation', 'hy=phen=ation', 5),
            testCase('example', 'ex=am=ple', 3),
            testCase('table', 'ta=ble', 7),
        ]);
    });

    it('accepts CRLF line endings', () => {
        expect(parseTestData('table|ta=ble|7\r\nexample|ex=am=ple|3\r\n')).toHaveLength(2);
    });
});

describe('loadTestData', () => {
    it('reads a data file', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'hyphenation-data-'));
        try {
            const path = join(dir, 'testish_hyphenation_tests.txt');
            await writeFile(path, SAMPLE, 'utf8');
            expect(await loadTestData(path)).toHaveLength(3);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });

    it('rejects a missing file', async () => {
        await expect(loadTestData(join(tmpdir(), 'no-such-dir', 'missing.txt'))).rejects.toBeInstanceOf(EvaluationDataError);
    });
});

describe('evaluateWord', () => {
    it('weighs false positives double', () => {
        expect(evaluateWord(testCase('hyphenation', 'hy=phen=ation'), () => [2, 4])).toEqual({
            truePositives: 1,
            falsePositives: 1,
            falseNegatives: 1,
            precision: 0.5,
            recall: 0.5,
            f1Score: 0.5,
            weightedScore: 0.25,
        });
    });

    it('scores an unbreakable word left whole as perfect', () => {
        expect(evaluateWord(testCase('word', 'word'), () => [])).toEqual({
            truePositives: 0,
            falsePositives: 0,
            falseNegatives: 0,
            precision: 1,
            recall: 1,
            f1Score: 1,
            weightedScore: 1,
        });
    });

    it('scores a break in an unbreakable word as zero', () => {
        const result = evaluateWord(testCase('word', 'word'), () => [2]);
        expect([result.precision, result.recall, result.f1Score, result.weightedScore]).toEqual([0, 0, 0, 0]);
    });
});

describe('evaluateLanguage', () => {
    it('aggregates per-word and overall scores', () => {
        const evaluation = evaluateLanguage(parseTestData(SAMPLE), hyphenate);

        expect(evaluation.totalCases).toBe(3);
        expect(evaluation.perfectMatches).toBe(2);
        expect(evaluation.partialMatches).toBe(1);
        expect(evaluation.completeMisses).toBe(0);
        expect([evaluation.truePositives, evaluation.falsePositives, evaluation.falseNegatives]).toEqual([4, 0, 1]);
        expect(evaluation.overallPrecision).toBe(1);
        expect(evaluation.overallRecall).toBeCloseTo(0.8);
        expect(evaluation.overallF1).toBeCloseTo(16 / 18);
        expect(evaluation.averageRecall).toBeCloseTo(2.5 / 3);
        expect(evaluation.averageWeightedScore).toBeCloseTo(2.75 / 3);
        expect(evaluation.worstCases.map(({ testCase: worst, actual }) => [worst.word, actual])).toEqual([['example', [2]]]);
    });

    it('orders worst cases by score then frequency', () => {
        const cases = [testCase('abcd', 'ab=cd', 1), testCase('efgh', 'ef=gh', 9), testCase('ijkl', 'ij=kl', 4)];
        const evaluation = evaluateLanguage(cases, () => [], 2);

        expect(evaluation.completeMisses).toBe(3);
        expect(evaluation.worstCases.map(({ testCase: worst }) => worst.word)).toEqual(['efgh', 'ijkl']);
    });

    it('returns zeros for no data', () => {
        const evaluation = evaluateLanguage([], hyphenate);
        expect(evaluation.totalCases).toBe(0);
        expect(evaluation.averageF1).toBe(0);
        expect(evaluation.worstCases).toEqual([]);
    });
});
