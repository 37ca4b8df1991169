export * from './types/instrument.js';
export * from './types/graphic.js';
export * from './errors.js';
export * from './config.js';
export { InstrumentTableClass } from './classes/instrument-table.js';
export { FontClass, type Glyph, type ReadImageSize } from './classes/font.js';
export * from './algorithms/usage-normalize.js';
export * from './algorithms/prioritize.js';
export * from './algorithms/glyph-layout.js';
export * from './algorithms/compose-plan.js';
export { loadInstrumentTable } from './io/instrument-table-io.js';
export { formatGusConfig, gusConfigHeader, writeGusConfig, type GusConfigColumn } from './io/gus-config-io.js';
export { loadCommandList, parseCommandList } from './io/command-list-io.js';
export { loadFontDefinitions } from './io/font-io.js';
export { readPngSize } from './io/png-io.js';
export { ExternalImageTool, type ImageTool } from './io/image-tool.js';
export { runGusConfig, generateGusConfig } from './tools/gus-config.js';
export { runTextgen, generateGraphics } from './tools/textgen.js';
