import * as fs from 'fs/promises';
import * as path from 'node:path';
import { type Instrument, type Mapping } from '../types/instrument.js';
import * as errors from '../errors.js';

/**
 * One column of the substitution table: the mapping computed for a GUS memory size.
 */
export interface GusConfigColumn {
    budgetKb: number;
    mapping: Mapping;
}

/**
 * Fixed comment block at the top of the table. The column line is filled
 * in from the budgets being written.
 */
export function gusConfigHeader(budgetsKb: readonly number[]): string[] {
    const columns = ['patch', ...budgetsKb.map((kb) => `${String(kb)}K`), 'name'].join(', ');
    return [
        '# GUS instrument substitution table (DMXGUS).',
        '#',
        '# Generated file: edit the instrument tables and regenerate it instead',
        '# of changing it by hand.',
        '#',
        '# Each line gives a patch number, the patch loaded in its place for',
        '# each GUS memory size, and the patch name:',
        '#',
        `#   ${columns}`,
        '#',
    ];
}

/**
 * Renders the table: header, then one `index, m1, ..., mN, name` line per
 * instrument in ascending index order. Every line ends in a newline.
 */
export function formatGusConfig(instruments: readonly Instrument[], columns: readonly GusConfigColumn[]): string {
    const lines = gusConfigHeader(columns.map((c) => c.budgetKb));
    const sorted = [...instruments].sort((a, b) => a.index - b.index);

    for (const instrument of sorted) {
        const targets = columns.map((column) => {
            const target = column.mapping.get(instrument.index);
            if (target === undefined) {
                throw errors.mappingViolation(
                    `'${instrument.name}' has no entry for ${String(column.budgetKb)}K.`,
                );
            }
            return String(target);
        });
        lines.push([String(instrument.index), ...targets, instrument.name].join(', '));
    }

    return lines.map((line) => `${line}\n`).join('');
}

/**
 * Writes the rendered table, creating the parent directory if needed.
 *
 * @param filePath - Destination file, e.g. build/dmxgus.lmp
 */
export async function writeGusConfig(filePath: string, text: string): Promise<void> {
    try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, text, 'utf8');
    } catch (error: unknown) {
        throw errors.cannotWritePath(filePath, error instanceof Error ? error.message : String(error));
    }
}
