import { InstrumentTableClass } from '../classes/instrument-table.js';
import {
    type Instrument,
    type InstrumentTableData,
    type Mapping,
    type PatchIndex,
    type SimilarityGroup,
} from '../types/instrument.js';
import { RESERVED_BYTES } from '../config.js';
import { DEFAULT_NORMALIZE_OPTIONS, type NormalizeOptions, normalizeUsage } from './usage-normalize.js';
import * as errors from '../errors.js';

export interface PrioritizerOptions extends NormalizeOptions {
    /** Bytes subtracted from every budget before any patch is placed. */
    reservedBytes: number;
}

export const DEFAULT_PRIORITIZER_OPTIONS: PrioritizerOptions = {
    ...DEFAULT_NORMALIZE_OPTIONS,
    reservedBytes: RESERVED_BYTES,
};

export interface RankedInstrument extends Instrument {
    /** Usage after percussion normalisation. */
    usage: number;
    /** Usage per byte of GUS memory. */
    priority: number;
}

export function usableCapacity(budgetBytes: number, reservedBytes: number): number {
    return budgetBytes - reservedBytes;
}

function compareNames(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Orders instruments by descending usage per byte.
 * Equal priorities are ordered by ascending patch name.
 *
 * @param adjustedStats Normalised usage, indexed by patch index.
 */
export function rankInstruments(instruments: readonly Instrument[], adjustedStats: readonly number[]): RankedInstrument[] {
    const ranked = instruments.map((instrument) => {
        const usage: number | undefined = adjustedStats[instrument.index];
        if (usage === undefined) {
            throw errors.missingUsageStat(instrument.index);
        }
        return { ...instrument, usage, priority: usage / instrument.size };
    });

    return ranked.sort((a, b) => {
        if (b.priority !== a.priority) return b.priority - a.priority;
        return compareNames(a.name, b.name);
    });
}

/**
 * Maps every group member, leader included, to its group leader.
 */
export function seedMapping(groups: readonly SimilarityGroup[]): Mapping {
    const mapping: Mapping = new Map();
    for (const group of groups) {
        for (const member of group.members) {
            mapping.set(member, group.leader);
        }
    }
    return mapping;
}

/**
 * Total size of the self-mapped (resident) entries.
 */
export function residentSize(mapping: Mapping, table: InstrumentTableClass): number {
    let total = 0;
    for (const [from, to] of mapping) {
        if (from === to) total += table.sizeOf(from);
    }
    return total;
}

/**
 * Greedy selection for one budget over a precomputed ranking.
 *
 * Starts from the leader-only mapping and admits patches in ranking order
 * while the resident total stays strictly below the usable capacity. A patch
 * that does not fit is skipped for good; later, smaller patches may still fit.
 */
export function selectWithinBudget(
    table: InstrumentTableClass,
    ranking: readonly RankedInstrument[],
    budgetBytes: number,
    reservedBytes: number,
): Mapping {
    const capacity = usableCapacity(budgetBytes, reservedBytes);
    const mapping = seedMapping(table.similarityGroups());

    let used = residentSize(mapping, table);
    if (used >= capacity) {
        throw errors.configurationInfeasible(budgetBytes, capacity, used);
    }

    for (const entry of ranking) {
        if (mapping.get(entry.index) === entry.index) continue;
        if (used + entry.size < capacity) {
            mapping.set(entry.index, entry.index);
            used += entry.size;
        }
    }

    return mapping;
}

/**
 * Builds the priority ranking for a table.
 */
export function rankTable(table: InstrumentTableClass, options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS): RankedInstrument[] {
    const adjusted = normalizeUsage(table.usageStats, options);
    return rankInstruments(table.instruments(), adjusted);
}

function toTable(data: InstrumentTableData | InstrumentTableClass): InstrumentTableClass {
    return data instanceof InstrumentTableClass ? data : new InstrumentTableClass(data);
}

/**
 * Computes the substitution mapping for one memory budget.
 *
 * @throws `configurationInfeasible` when the group leaders alone do not fit.
 * @throws `unknownInstrumentReference` when a group names a patch missing from the table.
 */
export function computeMapping(
    data: InstrumentTableData | InstrumentTableClass,
    budgetBytes: number,
    options: PrioritizerOptions = DEFAULT_PRIORITIZER_OPTIONS,
): Mapping {
    const table = toTable(data);
    return selectWithinBudget(table, rankTable(table, options), budgetBytes, options.reservedBytes);
}

/**
 * Computes one independent mapping per budget, sharing a single ranking.
 */
export function computeMappings(
    data: InstrumentTableData | InstrumentTableClass,
    budgetsBytes: readonly number[],
    options: PrioritizerOptions = DEFAULT_PRIORITIZER_OPTIONS,
): Mapping[] {
    const table = toTable(data);
    const ranking = rankTable(table, options);
    return budgetsBytes.map((budget) => selectWithinBudget(table, ranking, budget, options.reservedBytes));
}

/**
 * Re-checks a finished mapping: every table entry is mapped, every target is
 * resident (one hop), and the resident total is within the capacity.
 *
 * @throws `mappingViolation` naming the first broken entry.
 */
export function verifyMapping(mapping: Mapping, table: InstrumentTableClass, capacity: number): void {
    for (const instrument of table.instruments()) {
        const target: PatchIndex | undefined = mapping.get(instrument.index);
        if (target === undefined) {
            throw errors.mappingViolation(`'${instrument.name}' has no entry.`);
        }
        if (!table.has(target)) {
            throw errors.mappingViolation(`'${instrument.name}' maps to unknown index ${String(target)}.`);
        }
        if (mapping.get(target) !== target) {
            throw errors.mappingViolation(`'${instrument.name}' maps to ${String(target)}, which is not resident.`);
        }
    }

    for (const from of mapping.keys()) {
        if (!table.has(from)) {
            throw errors.mappingViolation(`entry for unknown index ${String(from)}.`);
        }
    }

    const used = residentSize(mapping, table);
    if (used > capacity) {
        throw errors.mappingViolation(`resident patches use ${String(used)} bytes, over the ${String(capacity)} available.`);
    }
}
