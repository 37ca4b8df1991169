import * as fs from 'fs/promises';
import { PNG } from 'pngjs';
import { type ImageSize } from '../types/graphic.js';
import * as errors from '../errors.js';

/**
 * Reads the pixel dimensions of a PNG file.
 *
 * @throws `fileNotFound` when the file does not exist, `invalid_file` when it is not a PNG.
 */
export async function readPngSize(filePath: string): Promise<ImageSize> {
    let buf: Buffer;
    try {
        buf = await fs.readFile(filePath);
    } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw errors.fileNotFound(filePath);
        }
        throw error;
    }

    let png: PNG;
    try {
        png = PNG.sync.read(buf);
    } catch (e: unknown) {
        throw errors.invalidFile(filePath, `cannot decode PNG (${e instanceof Error ? e.message : String(e)})`);
    }

    return { width: png.width, height: png.height };
}
