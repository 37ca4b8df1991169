import * as path from 'node:path';
import { z } from 'zod';
import { type FontDefinition } from '../types/graphic.js';
import { readJsonFile } from './json-io.js';

const fontSchema = z.object({
    dir: z.string().min(1).describe('Glyph directory, relative to the fonts file'),
    pattern: z
        .string()
        .refine((p) => p.includes('{code}'), { message: 'pattern must contain {code}' })
        .describe('Glyph file name, e.g. font{code}.png'),
    spaceWidth: z.number().int().nonnegative().describe('Advance of a space in pixels'),
    spacing: z.number().int().default(0).describe('Extra pixels between characters'),
    uppercaseOnly: z.boolean().default(false).describe('Upper-case text before lookup'),
});

const fontsFileSchema = z.record(z.string().regex(/^\S+$/), fontSchema);

/**
 * Loads font definitions, keyed by font name. Glyph directories are
 * resolved against the fonts file's directory.
 *
 * @param filePath - Path to fonts.json
 */
export async function loadFontDefinitions(filePath: string): Promise<Map<string, FontDefinition>> {
    const parsed = await readJsonFile(filePath, fontsFileSchema);
    const baseDir = path.dirname(path.resolve(filePath));

    const fonts = new Map<string, FontDefinition>();
    for (const [name, font] of Object.entries(parsed)) {
        fonts.set(name, { ...font, dir: path.resolve(baseDir, font.dir) });
    }
    return fonts;
}
