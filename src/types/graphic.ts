/**
 * Core types for text graphics.
 *
 * A command list defines named graphics. Each graphic is a sequence of draw
 * commands (text in a bitmap font, or an embedded PNG) that the external
 * image tool flattens onto a transparent canvas.
 */

export interface ImageSize {
    width: number;
    height: number;
}

/** Horizontal position of a text command: a pixel offset or centred on the canvas. */
export type TextX = number | 'center';

export interface TextCommand {
    type: 'text';
    /** 1-based line in the command file, for error messages */
    line: number;
    x: TextX;
    y: number;
    font: string;
    text: string;
}

export interface ImageCommand {
    type: 'image';
    line: number;
    x: number;
    y: number;
    /** Absolute path of the PNG to overlay */
    path: string;
}

export type DrawCommand = TextCommand | ImageCommand;

export interface GraphicDefinition {
    name: string;
    line: number;
    /** Explicit canvas size; when absent the canvas is the bounding box of the commands */
    size?: ImageSize;
    commands: DrawCommand[];
}

/**
 * A bitmap font: one PNG per character, named by `pattern`.
 */
export interface FontDefinition {
    /** Absolute directory holding the glyph files */
    dir: string;
    /** File name with `{code}` standing for the zero-padded decimal character code */
    pattern: string;
    /** Advance of a space character in pixels */
    spaceWidth: number;
    /** Extra pixels between characters */
    spacing: number;
    /** Upper-case text before looking up glyphs */
    uppercaseOnly: boolean;
}

/**
 * One image placed on the canvas at its top-left corner.
 */
export interface Overlay {
    file: string;
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * Everything the image tool needs to produce one graphic.
 */
export interface CompositionPlan {
    name: string;
    width: number;
    height: number;
    /** Bottom to top */
    overlays: Overlay[];
}
