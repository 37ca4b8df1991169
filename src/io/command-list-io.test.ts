import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { fileURLToPath } from 'url';
import { loadCommandList, parseCommandList, tokenizeLine } from './command-list-io.js';

const SRC = 'graphics.txt';
const BASE = '/assets/text';

describe('tokenizeLine', () => {
    it('splits words and quoted strings', () => {
        expect(tokenizeLine('text 0  2 small "New Game"')).toEqual([
            { value: 'text', quoted: false },
            { value: '0', quoted: false },
            { value: '2', quoted: false },
            { value: 'small', quoted: false },
            { value: 'New Game', quoted: true },
        ]);
    });

    it('drops comments outside strings', () => {
        expect(tokenizeLine('image 1 2 "a#b.png" # trailing')).toEqual([
            { value: 'image', quoted: false },
            { value: '1', quoted: false },
            { value: '2', quoted: false },
            { value: 'a#b.png', quoted: true },
        ]);
        expect(tokenizeLine('   # only a comment')).toEqual([]);
    });

    it('unescapes quotes and backslashes', () => {
        expect(tokenizeLine('"say \\"hi\\" \\\\ bye"')).toEqual([{ value: 'say "hi" \\ bye', quoted: true }]);
    });

    it('reports unterminated strings and bad escapes', () => {
        expect(tokenizeLine('text 0 0 small "oops')).toBe('unterminated string');
        expect(tokenizeLine('"a\\nb"')).toBe('bad escape sequence in string at column 3');
    });
});

describe('parseCommandList', () => {
    it('parses graphics with text and image commands', () => {
        const text = [
            '# menu',
            'graphic M_NGAME',
            '  text 0 0 large "New Game"',
            '',
            'graphic M_SKILL 200x20',
            '  image 0 2 "../patches/skull.png"',
            '  text center 4 small "Choose Skill Level:"',
        ].join('\n');

        expect(parseCommandList(text, SRC, BASE)).toEqual([
            {
                name: 'M_NGAME',
                line: 2,
                commands: [{ type: 'text', line: 3, x: 0, y: 0, font: 'large', text: 'New Game' }],
            },
            {
                name: 'M_SKILL',
                line: 5,
                size: { width: 200, height: 20 },
                commands: [
                    { type: 'image', line: 6, x: 0, y: 2, path: '/assets/patches/skull.png' },
                    { type: 'text', line: 7, x: 'center', y: 4, font: 'small', text: 'Choose Skill Level:' },
                ],
            },
        ]);
    });

    it('accepts negative offsets and CRLF line endings', () => {
        const graphics = parseCommandList('graphic A\r\ntext -1 -2 small "x"\r\n', SRC, BASE);
        expect(graphics[0].commands[0]).toMatchObject({ x: -1, y: -2 });
    });

    it('names the line of a draw command before any graphic', () => {
        expect(() => parseCommandList('\ntext 0 0 small "x"', SRC, BASE)).toThrow('graphics.txt:2: text before any graphic');
    });

    it('rejects unknown directives', () => {
        expect(() => parseCommandList('graphic A\nfill 0 0', SRC, BASE)).toThrow("graphics.txt:2: unknown directive 'fill'");
    });

    it('rejects non-integer coordinates', () => {
        expect(() => parseCommandList('graphic A\ntext 1.5 0 small "x"', SRC, BASE)).toThrow(
            "graphics.txt:2: x must be an integer, got '1.5'",
        );
    });

    it('requires the text to be quoted', () => {
        expect(() => parseCommandList('graphic A\ntext 0 0 small hello', SRC, BASE)).toThrow(
            "graphics.txt:2: text must be a quoted string, got 'hello'",
        );
    });

    it('checks the argument count', () => {
        expect(() => parseCommandList('graphic A\nimage 0 0', SRC, BASE)).toThrow('graphics.txt:2: expected: image X Y "PATH"');
    });

    it('rejects duplicate graphic names', () => {
        expect(() => parseCommandList('graphic A\ntext 0 0 f "x"\ngraphic A\ntext 0 0 f "y"', SRC, BASE)).toThrow(
            "graphics.txt:3: graphic 'A' is defined twice",
        );
    });

    it('rejects graphics without draw commands', () => {
        expect(() => parseCommandList('graphic A\ngraphic B\ntext 0 0 f "x"', SRC, BASE)).toThrow(
            "graphics.txt:1: graphic 'A' has no draw commands",
        );
        expect(() => parseCommandList('graphic A\ntext 0 0 f "x"\ngraphic B', SRC, BASE)).toThrow(
            "graphics.txt:3: graphic 'B' has no draw commands",
        );
    });

    it('rejects bad canvas sizes and names', () => {
        expect(() => parseCommandList('graphic A 20by10', SRC, BASE)).toThrow(
            "graphics.txt:1: canvas size must look like WIDTHxHEIGHT, got '20by10'",
        );
        expect(() => parseCommandList('graphic A 0x10', SRC, BASE)).toThrow('graphics.txt:1: canvas size must be at least 1x1');
        expect(() => parseCommandList('graphic ../evil', SRC, BASE)).toThrow(
            "graphics.txt:1: graphic name '../evil' may only use letters, digits, '_' and '-'",
        );
    });

    it('requires a canvas size for centred text', () => {
        expect(() => parseCommandList('graphic A\ntext center 0 f "x"', SRC, BASE)).toThrow(
            "graphics.txt:2: centred text needs an explicit canvas size on graphic 'A'",
        );
    });
});

describe('loadCommandList', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'textgen-commands-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('resolves image paths against the file directory', async () => {
        const filePath = path.join(tempDir, 'graphics.txt');
        await fs.writeFile(filePath, 'graphic LOGO\nimage 0 0 "art/logo.png"\n');
        const graphics = await loadCommandList(filePath);
        expect(graphics[0].commands[0]).toMatchObject({ type: 'image', path: path.join(tempDir, 'art', 'logo.png') });
    });

    it('throws file not found', async () => {
        const filePath = path.join(tempDir, 'missing.txt');
        await expect(loadCommandList(filePath)).rejects.toThrow(`File not found: ${filePath}`);
    });
});

describe('bundled command list', () => {
    it('parses data/text/graphics.txt', async () => {
        const textDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../data/text');
        const graphics = await loadCommandList(path.join(textDir, 'graphics.txt'));
        expect(graphics).toHaveLength(15);
        expect(graphics[0]).toEqual({
            name: 'M_NGAME',
            line: 9,
            commands: [{ type: 'text', line: 10, x: 0, y: 0, font: 'large', text: 'New Game' }],
        });
        expect(graphics.find((g) => g.name === 'M_SKILL')?.size).toEqual({ width: 200, height: 16 });
    });
});
