import * as path from 'node:path';
import { fileURLToPath } from 'url';
import { InstrumentTableClass } from '../classes/instrument-table.js';
import {
    computeMappings,
    DEFAULT_PRIORITIZER_OPTIONS,
    residentSize,
    usableCapacity,
    verifyMapping,
} from '../algorithms/prioritize.js';
import { loadInstrumentTable } from '../io/instrument-table-io.js';
import { formatGusConfig, writeGusConfig, type GusConfigColumn } from '../io/gus-config-io.js';
import { residentIndices } from '../types/instrument.js';
import { kilobytes, MEMORY_BUDGETS_KB } from '../config.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_GUS_DATA_DIR = path.resolve(__dirname, '../../data/gus');

export const GUS_CONFIG_USAGE = 'Usage: gus-config [--data <dir>] [--quiet] <output-file>';

export interface GusConfigArgs {
    output: string;
    dataDir: string;
    quiet: boolean;
}

/**
 * Parses the arguments after the program name. Returns null when they do
 * not form a valid invocation.
 */
export function parseGusConfigArgs(args: readonly string[]): GusConfigArgs | null {
    const positional: string[] = [];
    let dataDir = DEFAULT_GUS_DATA_DIR;
    let quiet = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const next: string | undefined = args[i + 1];
        if (arg === '--data') {
            if (next === undefined) return null;
            dataDir = next;
            i++;
        } else if (arg === '--quiet') {
            quiet = true;
        } else if (arg.startsWith('-')) {
            return null;
        } else {
            positional.push(arg);
        }
    }

    if (positional.length !== 1 || positional[0] === '') return null;
    return { output: positional[0], dataDir, quiet };
}

/**
 * Loads the tables, computes one mapping per memory size and renders the file text.
 */
export async function generateGusConfig(args: GusConfigArgs): Promise<string> {
    const data = await loadInstrumentTable(args.dataDir);
    const table = new InstrumentTableClass(data);
    const budgets = MEMORY_BUDGETS_KB.map(kilobytes);
    const mappings = computeMappings(table, budgets, DEFAULT_PRIORITIZER_OPTIONS);

    const columns: GusConfigColumn[] = mappings.map((mapping, i) => {
        const budgetKb = MEMORY_BUDGETS_KB[i];
        const capacity = usableCapacity(kilobytes(budgetKb), DEFAULT_PRIORITIZER_OPTIONS.reservedBytes);
        verifyMapping(mapping, table, capacity);
        if (!args.quiet) {
            const used = residentSize(mapping, table);
            const selected = residentIndices(mapping).length;
            console.log(
                `${String(budgetKb)}K: ${String(selected)}/${String(table.size)} patches resident, ${String(used)} of ${String(capacity)} bytes`,
            );
        }
        return { budgetKb, mapping };
    });

    return formatGusConfig(table.instruments(), columns);
}

/**
 * Entry point for the `gus-config` command. Returns the process exit status.
 */
export async function runGusConfig(argv: readonly string[]): Promise<number> {
    const args = parseGusConfigArgs(argv);
    if (!args) {
        console.error(GUS_CONFIG_USAGE);
        return 1;
    }

    try {
        const text = await generateGusConfig(args);
        await writeGusConfig(args.output, text);
        if (!args.quiet) {
            console.log(`Wrote ${args.output}`);
        }
        return 0;
    } catch (error: unknown) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
}
