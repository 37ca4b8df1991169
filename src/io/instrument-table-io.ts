import * as path from 'node:path';
import { z } from 'zod';
import { type InstrumentTableData } from '../types/instrument.js';
import { readJsonFile } from './json-io.js';
import * as errors from '../errors.js';

export const INSTRUMENTS_FILE = 'instruments.json';
export const GROUPS_FILE = 'similarity-groups.json';
export const USAGE_STATS_FILE = 'usage-stats.json';

const instrumentSchema = z.object({
    index: z.number().int().min(0),
    name: z.string().min(1).regex(/^[^\s,]+$/, 'patch names cannot contain whitespace or commas'),
    size: z.number().int().positive(),
});

const instrumentsSchema = z.array(instrumentSchema).nonempty();
const groupsSchema = z.array(z.array(z.string().min(1)));
const usageStatsSchema = z.array(z.number().int().nonnegative());

function checkUnique(filePath: string, data: InstrumentTableData): void {
    const indices = new Set<number>();
    const names = new Set<string>();
    for (const instrument of data.instruments) {
        if (indices.has(instrument.index)) {
            throw errors.invalidFile(filePath, `duplicate instrument index ${String(instrument.index)}`);
        }
        if (names.has(instrument.name)) {
            throw errors.invalidFile(filePath, `duplicate instrument name '${instrument.name}'`);
        }
        indices.add(instrument.index);
        names.add(instrument.name);
    }
}

/**
 * Loads the instrument table, similarity groups and usage statistics from a directory.
 *
 * @param dir - Directory holding instruments.json, similarity-groups.json and usage-stats.json
 */
export async function loadInstrumentTable(dir: string): Promise<InstrumentTableData> {
    const instrumentsPath = path.join(dir, INSTRUMENTS_FILE);
    const [instruments, groups, usageStats] = await Promise.all([
        readJsonFile(instrumentsPath, instrumentsSchema),
        readJsonFile(path.join(dir, GROUPS_FILE), groupsSchema),
        readJsonFile(path.join(dir, USAGE_STATS_FILE), usageStatsSchema),
    ]);

    const data: InstrumentTableData = { instruments, groups, usageStats };
    checkUnique(instrumentsPath, data);
    return data;
}
