import { type CompositionPlan, type ImageSize, type Overlay, type TextX } from '../types/graphic.js';
import { type TextLayout, translateLayout } from './glyph-layout.js';
import * as errors from '../errors.js';

/**
 * A laid-out draw command waiting for its canvas position.
 */
export interface DrawBlock {
    x: TextX;
    y: number;
    layout: TextLayout;
}

/**
 * Places blocks on the canvas and fixes the canvas size.
 *
 * With an explicit size, `center` blocks are centred horizontally (rounding
 * down). Without one, the canvas is the bounding box of the placed blocks
 * measured from the origin.
 */
export function planGraphic(name: string, size: ImageSize | undefined, blocks: readonly DrawBlock[]): CompositionPlan {
    const overlays: Overlay[] = [];
    let right = 0;
    let bottom = 0;

    for (const block of blocks) {
        let x: number;
        if (block.x === 'center') {
            if (!size) {
                throw errors.invalidArgument(`graphic '${name}' centres text but has no canvas size.`);
            }
            x = Math.floor((size.width - block.layout.width) / 2);
        } else {
            x = block.x;
        }

        overlays.push(...translateLayout(block.layout, x, block.y));
        right = Math.max(right, x + block.layout.width);
        bottom = Math.max(bottom, block.y + block.layout.height);
    }

    const width = size ? size.width : right;
    const height = size ? size.height : bottom;
    if (width <= 0 || height <= 0) {
        throw errors.invalidArgument(`graphic '${name}' would be empty (${String(width)}x${String(height)}).`);
    }

    return { name, width, height, overlays };
}

function offset(value: number): string {
    return value < 0 ? String(value) : `+${String(value)}`;
}

/**
 * Argument vector for the image tool: a transparent canvas, each overlay
 * paged in at its offset, then flattened and written as 32-bit PNG.
 */
export function buildImageToolArgs(plan: CompositionPlan, outputPath: string): string[] {
    const args = ['-size', `${String(plan.width)}x${String(plan.height)}`, 'xc:none'];
    for (const overlay of plan.overlays) {
        args.push('-page', `${offset(overlay.x)}${offset(overlay.y)}`, overlay.file);
    }
    args.push('-background', 'none', '-flatten', `PNG32:${outputPath}`);
    return args;
}
