import * as fs from 'fs/promises';
import * as path from 'node:path';
import { FontClass, type ReadImageSize } from '../classes/font.js';
import { buildImageToolArgs, type DrawBlock, planGraphic } from '../algorithms/compose-plan.js';
import { loadCommandList } from '../io/command-list-io.js';
import { loadFontDefinitions } from '../io/font-io.js';
import { readPngSize } from '../io/png-io.js';
import { ExternalImageTool, type ImageTool } from '../io/image-tool.js';
import { type FontDefinition, type GraphicDefinition } from '../types/graphic.js';
import { DEFAULT_IMAGE_TOOL } from '../config.js';
import * as errors from '../errors.js';

export const TEXTGEN_USAGE =
    'Usage: textgen [--fonts <file>] [--image-tool <cmd>] [--only <name>] [--quiet] <command-file> <output-dir>';

export interface TextgenArgs {
    commandFile: string;
    outputDir: string;
    fontsFile: string;
    imageTool: string;
    only?: string;
    quiet: boolean;
}

/**
 * Parses the arguments after the program name. Returns null when they do
 * not form a valid invocation.
 */
export function parseTextgenArgs(args: readonly string[]): TextgenArgs | null {
    const positional: string[] = [];
    let fontsFile: string | undefined;
    let imageTool = DEFAULT_IMAGE_TOOL;
    let only: string | undefined;
    let quiet = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const next: string | undefined = args[i + 1];
        if (arg === '--fonts' || arg === '--image-tool' || arg === '--only') {
            if (next === undefined || next === '') return null;
            if (arg === '--fonts') fontsFile = next;
            else if (arg === '--image-tool') imageTool = next;
            else only = next;
            i++;
        } else if (arg === '--quiet') {
            quiet = true;
        } else if (arg.startsWith('-')) {
            return null;
        } else {
            positional.push(arg);
        }
    }

    if (positional.length !== 2 || positional.includes('')) return null;
    const [commandFile, outputDir] = positional;
    return {
        commandFile,
        outputDir,
        fontsFile: fontsFile ?? path.join(path.dirname(commandFile), 'fonts.json'),
        imageTool,
        only,
        quiet,
    };
}

/**
 * Caches one FontClass per font name so glyph sizes are read once per run.
 */
class FontRegistry {
    private readonly fonts = new Map<string, FontClass>();

    constructor(
        private readonly definitions: Map<string, FontDefinition>,
        private readonly readSize: ReadImageSize,
    ) {}

    get(name: string): FontClass {
        const existing = this.fonts.get(name);
        if (existing) return existing;
        const definition = this.definitions.get(name);
        if (!definition) {
            throw errors.unknownFont(name);
        }
        const font = new FontClass(name, definition, this.readSize);
        this.fonts.set(name, font);
        return font;
    }
}

async function blocksFor(graphic: GraphicDefinition, fonts: FontRegistry | null, readSize: ReadImageSize): Promise<DrawBlock[]> {
    const blocks: DrawBlock[] = [];
    for (const command of graphic.commands) {
        if (command.type === 'text') {
            if (!fonts) {
                throw errors.unknownFont(command.font);
            }
            const layout = await fonts.get(command.font).layout(command.text);
            blocks.push({ x: command.x, y: command.y, layout });
        } else {
            const size = await readSize(command.path);
            blocks.push({
                x: command.x,
                y: command.y,
                layout: { ...size, overlays: [{ file: command.path, x: 0, y: 0, ...size }] },
            });
        }
    }
    return blocks;
}

/**
 * Renders every graphic in the command list (or just `args.only`) through the image tool.
 *
 * @returns Paths of the files written, in command list order.
 */
export async function generateGraphics(
    args: TextgenArgs,
    tool: ImageTool,
    readSize: ReadImageSize = readPngSize,
): Promise<string[]> {
    const graphics = await loadCommandList(args.commandFile);

    let selected = graphics;
    if (args.only !== undefined) {
        selected = graphics.filter((g) => g.name === args.only);
        if (selected.length === 0) {
            throw errors.unknownGraphic(args.only);
        }
    }

    const needsFonts = selected.some((g) => g.commands.some((c) => c.type === 'text'));
    const fonts = needsFonts ? new FontRegistry(await loadFontDefinitions(args.fontsFile), readSize) : null;

    await fs.mkdir(args.outputDir, { recursive: true });

    const written: string[] = [];
    for (const graphic of selected) {
        const blocks = await blocksFor(graphic, fonts, readSize);
        const plan = planGraphic(graphic.name, graphic.size, blocks);
        const output = path.join(args.outputDir, `${graphic.name}.png`);
        await tool.run(buildImageToolArgs(plan, output));
        written.push(output);
        if (!args.quiet) {
            console.log(`Wrote ${output} (${String(plan.width)}x${String(plan.height)})`);
        }
    }
    return written;
}

/**
 * Entry point for the `textgen` command. Returns the process exit status.
 *
 * @param tool - Overrides the image tool named by --image-tool.
 */
export async function runTextgen(argv: readonly string[], tool?: ImageTool): Promise<number> {
    const args = parseTextgenArgs(argv);
    if (!args) {
        console.error(TEXTGEN_USAGE);
        return 1;
    }

    try {
        await generateGraphics(args, tool ?? new ExternalImageTool(args.imageTool));
        return 0;
    } catch (error: unknown) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
}
