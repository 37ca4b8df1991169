import * as fs from 'fs/promises';
import * as path from 'node:path';
import { type DrawCommand, type GraphicDefinition, type ImageSize, type TextX } from '../types/graphic.js';
import * as errors from '../errors.js';

interface Token {
    value: string;
    quoted: boolean;
}

const GRAPHIC_NAME = /^[A-Za-z0-9_-]+$/;
const INTEGER = /^-?\d+$/;
const SIZE = /^(\d+)x(\d+)$/;

/**
 * Splits one line into whitespace-separated tokens. Double-quoted strings
 * may hold spaces and the escapes \" and \\. An unquoted # starts a comment.
 *
 * @returns The tokens, or a string describing why the line is malformed.
 */
export function tokenizeLine(line: string): Token[] | string {
    const tokens: Token[] = [];
    let i = 0;

    while (i < line.length) {
        const ch = line[i];
        if (ch === ' ' || ch === '\t') {
            i++;
            continue;
        }
        if (ch === '#') break;

        if (ch === '"') {
            let value = '';
            i++;
            let closed = false;
            while (i < line.length) {
                const c = line[i];
                if (c === '\\') {
                    const escaped = line[i + 1];
                    if (escaped !== '"' && escaped !== '\\') {
                        return `bad escape sequence in string at column ${String(i + 1)}`;
                    }
                    value += escaped;
                    i += 2;
                } else if (c === '"') {
                    closed = true;
                    i++;
                    break;
                } else {
                    value += c;
                    i++;
                }
            }
            if (!closed) return 'unterminated string';
            tokens.push({ value, quoted: true });
            continue;
        }

        let value = '';
        while (i < line.length && line[i] !== ' ' && line[i] !== '\t' && line[i] !== '"' && line[i] !== '#') {
            value += line[i];
            i++;
        }
        tokens.push({ value, quoted: false });
    }

    return tokens;
}

class LineParser {
    constructor(
        private readonly source: string,
        private readonly line: number,
    ) {}

    fail(detail: string): never {
        throw errors.invalidCommandLine(this.source, this.line, detail);
    }

    integer(token: Token, what: string): number {
        if (token.quoted || !INTEGER.test(token.value)) {
            this.fail(`${what} must be an integer, got '${token.value}'`);
        }
        return parseInt(token.value, 10);
    }

    string(token: Token, what: string): string {
        if (!token.quoted) {
            this.fail(`${what} must be a quoted string, got '${token.value}'`);
        }
        return token.value;
    }

    word(token: Token, what: string): string {
        if (token.quoted) {
            this.fail(`${what} must not be quoted`);
        }
        return token.value;
    }

    arity(args: Token[], count: number, usage: string): void {
        if (args.length !== count) {
            this.fail(`expected: ${usage}`);
        }
    }
}

function parseSize(parser: LineParser, token: Token): ImageSize {
    const match = token.quoted ? null : SIZE.exec(token.value);
    if (!match) {
        parser.fail(`canvas size must look like WIDTHxHEIGHT, got '${token.value}'`);
    }
    const width = parseInt(match[1], 10);
    const height = parseInt(match[2], 10);
    if (width === 0 || height === 0) {
        parser.fail('canvas size must be at least 1x1');
    }
    return { width, height };
}

/**
 * Parses a command list into graphic definitions.
 *
 * Image paths are resolved against `baseDir`; `source` names the file in error messages.
 */
export function parseCommandList(text: string, source: string, baseDir: string): GraphicDefinition[] {
    const graphics: GraphicDefinition[] = [];
    const names = new Set<string>();
    let current: GraphicDefinition | null = null;

    const finish = (graphic: GraphicDefinition | null) => {
        if (graphic && graphic.commands.length === 0) {
            throw errors.invalidCommandLine(source, graphic.line, `graphic '${graphic.name}' has no draw commands`);
        }
    };

    const lines = text.split(/\r?\n/);
    for (const [i, raw] of lines.entries()) {
        const lineNumber = i + 1;
        const parser: LineParser = new LineParser(source, lineNumber);
        const tokens = tokenizeLine(raw);
        if (typeof tokens === 'string') {
            parser.fail(tokens);
        }
        if (tokens.length === 0) continue;

        const [head, ...args] = tokens;
        const directive = head.quoted ? '' : head.value;

        switch (directive) {
            case 'graphic': {
                if (args.length !== 1 && args.length !== 2) {
                    parser.fail('expected: graphic NAME [WIDTHxHEIGHT]');
                }
                const name = parser.word(args[0], 'graphic name');
                if (!GRAPHIC_NAME.test(name)) {
                    parser.fail(`graphic name '${name}' may only use letters, digits, '_' and '-'`);
                }
                if (names.has(name)) {
                    parser.fail(`graphic '${name}' is defined twice`);
                }
                finish(current);
                names.add(name);
                current = { name, line: lineNumber, commands: [] };
                if (args.length === 2) {
                    current.size = parseSize(parser, args[1]);
                }
                graphics.push(current);
                break;
            }
            case 'text': {
                parser.arity(args, 4, 'text X|center Y FONT "STRING"');
                if (!current) parser.fail('text before any graphic');
                let x: TextX;
                if (!args[0].quoted && args[0].value === 'center') {
                    if (!current.size) {
                        parser.fail(`centred text needs an explicit canvas size on graphic '${current.name}'`);
                    }
                    x = 'center';
                } else {
                    x = parser.integer(args[0], 'x');
                }
                const command: DrawCommand = {
                    type: 'text',
                    line: lineNumber,
                    x,
                    y: parser.integer(args[1], 'y'),
                    font: parser.word(args[2], 'font'),
                    text: parser.string(args[3], 'text'),
                };
                current.commands.push(command);
                break;
            }
            case 'image': {
                parser.arity(args, 3, 'image X Y "PATH"');
                if (!current) parser.fail('image before any graphic');
                const file = parser.string(args[2], 'path');
                if (file === '') parser.fail('image path is empty');
                current.commands.push({
                    type: 'image',
                    line: lineNumber,
                    x: parser.integer(args[0], 'x'),
                    y: parser.integer(args[1], 'y'),
                    path: path.resolve(baseDir, file),
                });
                break;
            }
            default:
                parser.fail(`unknown directive '${head.value}'`);
        }
    }

    finish(current);
    return graphics;
}

/**
 * Loads and parses a command list file. Image paths are relative to the file.
 *
 * @param filePath - Path to the command list, e.g. data/text/graphics.txt
 */
export async function loadCommandList(filePath: string): Promise<GraphicDefinition[]> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw errors.fileNotFound(filePath);
        }
        throw error;
    }
    return parseCommandList(text, filePath, path.dirname(path.resolve(filePath)));
}
