import { describe, it, expect } from 'vitest';
import { createTestRegistry } from '../test-utils/patterns';
import { Hyphenator, defaultHyphenator, primaryLanguageTag, setPreferredLanguage } from './Hyphenator';
import { LanguageRegistry } from './LanguageRegistry';

const offsets = (hyphenator: Hyphenator, word: string, includeFallback = false) =>
    hyphenator.breakOffsets(word, includeFallback).map((info) => [info.byteOffset, info.requiresInsertedHyphen]);

function testHyphenator(tag = 'en'): Hyphenator {
    const hyphenator = new Hyphenator(createTestRegistry());
    hyphenator.setPreferredLanguage(tag);
    return hyphenator;
}

describe('primaryLanguageTag', () => {
    it('keeps the lowercase primary subtag', () => {
        expect(primaryLanguageTag('en-US')).toBe('en');
        expect(primaryLanguageTag('ru_RU')).toBe('ru');
        expect(primaryLanguageTag('DE')).toBe('de');
        expect(primaryLanguageTag('')).toBe('');
    });
});

describe('Hyphenator', () => {
    it('selects rules from regional tags', () => {
        const hyphenator = testHyphenator('EN-gb');
        expect(hyphenator.getActiveHyphenator()).toBeDefined();
        expect(offsets(hyphenator, 'hyphenation')).toEqual([
            [2, true],
            [6, true],
        ]);
    });

    it('clears the selection for empty or unknown tags', () => {
        const hyphenator = testHyphenator();
        hyphenator.setPreferredLanguage('xx');
        expect(hyphenator.getActiveHyphenator()).toBeUndefined();

        hyphenator.setPreferredLanguage('en');
        hyphenator.setPreferredLanguage('');
        expect(hyphenator.getActiveHyphenator()).toBeUndefined();
    });

    it('uses soft hyphens instead of patterns', () => {
        const hyphenator = testHyphenator();
        expect(offsets(hyphenator, 'hy\u00ADphenation')).toEqual([[4, true]]);
        expect(offsets(hyphenator, 'hy\u00ADphenation', true)).toEqual([[4, true]]);
    });

    it('breaks after a hard hyphen without inserting another', () => {
        expect(offsets(testHyphenator(), 'well-known')).toEqual([[5, false]]);
    });

    it('ignores hyphens not between letters', () => {
        const hyphenator = new Hyphenator(new LanguageRegistry());
        expect(offsets(hyphenator, 'well-')).toEqual([]);
        expect(offsets(hyphenator, 'well-', true)).toEqual([[2, true]]);
    });

    it('maps breaks past leading punctuation to source offsets', () => {
        // '“' takes three bytes
        expect(offsets(testHyphenator(), '“hyphenation”,')).toEqual([
            [5, true],
            [9, true],
        ]);
    });

    it('drops footnote markers before analysis', () => {
        expect(offsets(testHyphenator(), 'example12')).toEqual([[2, true]]);
    });

    it('offers fallback breaks only when asked and nothing else matched', () => {
        const hyphenator = new Hyphenator(new LanguageRegistry());
        expect(offsets(hyphenator, 'words')).toEqual([]);
        expect(offsets(hyphenator, 'words', true)).toEqual([
            [2, true],
            [3, true],
        ]);
        expect(offsets(hyphenator, 'word', true)).toEqual([[2, true]]);
        expect(offsets(hyphenator, 'wor', true)).toEqual([]);
    });

    it('keeps pattern breaks over fallback', () => {
        expect(offsets(testHyphenator(), 'hyphenation', true)).toEqual([
            [2, true],
            [6, true],
        ]);
    });

    it('uses the active language minimums for fallback', () => {
        // no pattern matches "sandwich", so every 2/2 position is offered
        expect(offsets(testHyphenator(), 'sandwich', true).map(([offset]) => offset)).toEqual([2, 3, 4, 5, 6]);
    });

    it('reports fallback offsets in bytes for Cyrillic', () => {
        const hyphenator = new Hyphenator(new LanguageRegistry());
        expect(offsets(hyphenator, 'слово', true)).toEqual([
            [4, true],
            [6, true],
        ]);
    });

    it('returns nothing for empty words or words of only punctuation', () => {
        const hyphenator = testHyphenator();
        expect(offsets(hyphenator, '', true)).toEqual([]);
        expect(offsets(hyphenator, '...', true)).toEqual([]);
    });

    it('shares the process-wide selection through setPreferredLanguage', () => {
        setPreferredLanguage('fr-CA');
        expect(defaultHyphenator.getActiveHyphenator()).toBeDefined();
        setPreferredLanguage('');
        expect(defaultHyphenator.getActiveHyphenator()).toBeUndefined();
    });
});
