import { type Overlay } from '../types/graphic.js';

/**
 * One character of a shaped string: either a glyph image or a space.
 */
export type GlyphSlot =
    | { kind: 'space' }
    | { kind: 'glyph'; file: string; width: number; height: number };

export interface TextLayout {
    width: number;
    height: number;
    /** Positions relative to the top-left of the text */
    overlays: Overlay[];
}

/**
 * Lays glyphs out left to right on a common top line.
 *
 * Each slot advances the pen by its width (or `spaceWidth`) plus `spacing`.
 * The reported width drops the spacing after the last slot; the height is
 * the tallest glyph.
 */
export function layoutText(slots: readonly GlyphSlot[], spaceWidth: number, spacing: number): TextLayout {
    const overlays: Overlay[] = [];
    let penX = 0;
    let height = 0;

    for (const slot of slots) {
        if (slot.kind === 'space') {
            penX += spaceWidth + spacing;
            continue;
        }
        overlays.push({ file: slot.file, x: penX, y: 0, width: slot.width, height: slot.height });
        if (slot.height > height) height = slot.height;
        penX += slot.width + spacing;
    }

    const width = slots.length > 0 ? Math.max(0, penX - spacing) : 0;
    return { width, height, overlays };
}

/**
 * Moves every overlay of a layout by (dx, dy).
 */
export function translateLayout(layout: TextLayout, dx: number, dy: number): Overlay[] {
    return layout.overlays.map((o) => ({ ...o, x: o.x + dx, y: o.y + dy }));
}
