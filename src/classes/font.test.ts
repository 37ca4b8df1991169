import { describe, it, expect, vi } from 'vitest';
import { FontClass } from './font.js';
import { type FontDefinition, type ImageSize } from '../types/graphic.js';
import * as errors from '../errors.js';

const definition: FontDefinition = {
    dir: '/fonts/small',
    pattern: 'stcfn{code}.png',
    spaceWidth: 4,
    spacing: 1,
    uppercaseOnly: true,
};

const widths: Record<string, number> = {
    '/fonts/small/stcfn065.png': 7,
    '/fonts/small/stcfn066.png': 6,
    '/fonts/small/stcfn033.png': 2,
};

function fakeReader() {
    return vi.fn((file: string): Promise<ImageSize> => {
        const width = widths[file];
        if (width === undefined) {
            return Promise.reject(errors.fileNotFound(file));
        }
        return Promise.resolve({ width, height: 8 });
    });
}

describe('FontClass', () => {
    it('builds glyph paths from zero-padded decimal character codes', () => {
        const font = new FontClass('small', definition, fakeReader());
        expect(font.glyphPath('A')).toBe('/fonts/small/stcfn065.png');
        expect(font.glyphPath('!')).toBe('/fonts/small/stcfn033.png');
        expect(font.glyphPath('é')).toBe('/fonts/small/stcfn233.png');
    });

    it('reads each glyph size once', async () => {
        const reader = fakeReader();
        const font = new FontClass('small', definition, reader);

        await font.layout('AAB');
        await font.layout('BA');

        expect(reader).toHaveBeenCalledTimes(2);
    });

    it('upper-cases text for fonts without lower case', async () => {
        const font = new FontClass('small', definition, fakeReader());
        const layout = await font.layout('ab!');
        expect(layout.overlays.map((o) => o.file)).toEqual([
            '/fonts/small/stcfn065.png',
            '/fonts/small/stcfn066.png',
            '/fonts/small/stcfn033.png',
        ]);
        // 7 + 1 + 6 + 1 + 2
        expect(layout.width).toBe(17);
        expect(layout.height).toBe(8);
    });

    it('lays out spaces without reading a glyph', async () => {
        const reader = fakeReader();
        const font = new FontClass('small', definition, reader);
        const layout = await font.layout('A B');
        expect(layout.overlays.map((o) => o.x)).toEqual([0, 13]);
        expect(reader).toHaveBeenCalledTimes(2);
    });

    it('reports a missing glyph with the font and character', async () => {
        const font = new FontClass('small', definition, fakeReader());
        await expect(font.layout('AZ')).rejects.toThrow(
            "Font 'small' has no glyph for 'Z' (expected /fonts/small/stcfn090.png).",
        );
    });

    it('passes through other read failures', async () => {
        const reader = vi.fn((file: string): Promise<ImageSize> => Promise.reject(errors.invalidFile(file, 'cannot decode PNG (bad)')));
        const font = new FontClass('small', definition, reader);
        await expect(font.glyph('A')).rejects.toThrow('Invalid file /fonts/small/stcfn065.png: cannot decode PNG (bad)');
    });
});
