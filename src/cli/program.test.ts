import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { Alignment, FontStyle } from '../types';
import { createProgram, renderMonospaceLine } from './program';

function run(args: string[]): { output: () => string; done: Promise<unknown> } {
    let text = '';
    const program = createProgram({ write: (chunk) => { text += chunk; } });
    program.exitOverride();
    program.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
    return { output: () => text, done: program.parseAsync(['node', 'paragraph-layout', ...args]) };
}

describe('renderMonospaceLine', () => {
    it('pads words to their positions', () => {
        const line = { words: ['ab', 'cd'], xPositions: [3, 8], styles: [FontStyle.Regular, FontStyle.Regular], alignment: Alignment.Right };
        expect(renderMonospaceLine(line)).toBe('   ab   cd');
    });

    it('never moves a word back over the previous one', () => {
        const line = { words: ['abc', 'd'], xPositions: [-3, 2], styles: [FontStyle.Regular, FontStyle.Regular], alignment: Alignment.Right };
        expect(renderMonospaceLine(line)).toBe('abcd');
    });
});

describe('paragraph-layout CLI', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'paragraph-layout-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    async function textFile(content: string): Promise<string> {
        const path = join(dir, 'input.txt');
        await writeFile(path, content, 'utf8');
        return path;
    }

    it('prints hyphenation points', async () => {
        const { output, done } = run(['hyphenate', 'hyphenation']);
        await done;
        expect(output()).toBe('hyphen=ation\n');
    });

    it('rejects an unknown language', async () => {
        const { done } = run(['hyphenate', '--lang', 'xx', 'word']);
        await expect(done).rejects.toThrow('No hyphenation rules for language "xx".');
    });

    it('lays out paragraphs separated by blank lines', async () => {
        const file = await textFile('The quick brown fox\n\nJumps over\n');
        const { output, done } = run(['layout', file, '--width', '15']);
        await done;
        expect(output()).toBe('The quick brown\nfox\n\nJumps over\n');
    });

    it('right-aligns lines', async () => {
        const file = await textFile('The quick brown fox\n\nJumps over\n');
        const { output, done } = run(['layout', file, '--width', '15', '--align', 'right']);
        await done;
        expect(output()).toBe('The quick brown\n            fox\n\n     Jumps over\n');
    });

    it('indents paragraphs instead of spacing them', async () => {
        const file = await textFile('The quick brown fox\n\nJumps over\n');
        const { output, done } = run(['layout', file, '--width', '15', '--indent']);
        await done;
        expect(output()).toBe('\u2003The quick\nbrown fox\n\u2003Jumps over\n');
    });

    it('evaluates a language against a data file', async () => {
        await writeFile(join(dir, 'english_hyphenation_tests.txt'), 'hyphenation|hy=phen=ation|5\n', 'utf8');
        const { output, done } = run(['evaluate', 'english', '--data', dir]);
        await done;

        expect(output()).toContain('Total test cases:   1\n');
        expect(output()).toContain('Partial matches:    1\n');
        expect(output()).toContain('Overall precision:  100.00%\n');
        expect(output()).toContain('  hyphenation: expected hy=phen=ation, got hyphen=ation\n');
    });

    it('rejects an unknown evaluation language', async () => {
        const { done } = run(['evaluate', 'klingon', '--data', dir]);
        await expect(done).rejects.toThrow('Unknown language "klingon".');
    });
});
