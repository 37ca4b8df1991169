import * as path from 'node:path';
import { type FontDefinition, type ImageSize } from '../types/graphic.js';
import { type GlyphSlot, type TextLayout, layoutText } from '../algorithms/glyph-layout.js';
import { readPngSize } from '../io/png-io.js';
import * as errors from '../errors.js';

export type ReadImageSize = (filePath: string) => Promise<ImageSize>;

export interface Glyph {
    char: string;
    file: string;
    width: number;
    height: number;
}

/**
 * A bitmap font backed by one PNG per character.
 * Glyph sizes are read on first use and cached for the font's lifetime.
 */
export class FontClass {
    private readonly cache = new Map<string, Glyph>();

    constructor(
        readonly name: string,
        private readonly definition: FontDefinition,
        private readonly readSize: ReadImageSize = readPngSize,
    ) {}

    /**
     * Path of the glyph image for a character, e.g. `<dir>/font065.png` for 'A'.
     */
    glyphPath(char: string): string {
        const code = char.codePointAt(0) ?? 0;
        const file = this.definition.pattern.replaceAll('{code}', String(code).padStart(3, '0'));
        return path.join(this.definition.dir, file);
    }

    /**
     * Throws `glyphNotFound` when the glyph image does not exist.
     */
    async glyph(char: string): Promise<Glyph> {
        const cached = this.cache.get(char);
        if (cached) return cached;

        const file = this.glyphPath(char);
        let size: ImageSize;
        try {
            size = await this.readSize(file);
        } catch (error: unknown) {
            if (errors.isDomainError(error) && error.kind === 'file_not_found') {
                throw errors.glyphNotFound(this.name, char, file);
            }
            throw error;
        }

        const glyph: Glyph = { char, file, width: size.width, height: size.height };
        this.cache.set(char, glyph);
        return glyph;
    }

    /**
     * Turns a string into glyph slots, upper-casing first for fonts without lower case.
     */
    async shape(text: string): Promise<GlyphSlot[]> {
        const source = this.definition.uppercaseOnly ? text.toUpperCase() : text;
        const slots: GlyphSlot[] = [];
        for (const char of source) {
            if (char === ' ') {
                slots.push({ kind: 'space' });
                continue;
            }
            const glyph = await this.glyph(char);
            slots.push({ kind: 'glyph', file: glyph.file, width: glyph.width, height: glyph.height });
        }
        return slots;
    }

    async layout(text: string): Promise<TextLayout> {
        const slots = await this.shape(text);
        return layoutText(slots, this.definition.spaceWidth, this.definition.spacing);
    }
}
