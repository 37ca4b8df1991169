import { MELODIC_INSTRUMENT_COUNT, UNUSED_PERCUSSION_SLOTS } from '../config.js';
import { isPercussion } from '../types/instrument.js';
import * as errors from '../errors.js';

export interface NormalizeOptions {
    /** Number of leading entries that are melodic programs. */
    melodicCount: number;
    /** Percussion slots known to be unused; left out of the percussion mean's denominator. */
    unusedPercussionSlots: number;
}

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
    melodicCount: MELODIC_INSTRUMENT_COUNT,
    unusedPercussionSlots: UNUSED_PERCUSSION_SLOTS,
};

export interface UsageMeans {
    melodicMean: number;
    percussionMean: number;
}

function sum(values: readonly number[]): number {
    let total = 0;
    for (const v of values) total += v;
    return total;
}

/**
 * Mean usage of the melodic range and corrected mean of the percussion range.
 *
 * @throws `missingUsageStat` when the statistics do not cover the melodic range.
 * @throws `invalidPercussionRange` when the unused slots leave no percussion entries to average.
 */
export function usageMeans(stats: readonly number[], options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS): UsageMeans {
    const { melodicCount, unusedPercussionSlots } = options;
    if (stats.length < melodicCount) {
        throw errors.missingUsageStat(stats.length);
    }

    const melodic = stats.slice(0, melodicCount);
    const percussion = stats.slice(melodicCount);
    const melodicMean = melodicCount > 0 ? sum(melodic) / melodicCount : 0;

    if (percussion.length === 0) {
        return { melodicMean, percussionMean: 0 };
    }

    const counted = percussion.length - unusedPercussionSlots;
    if (counted <= 0) {
        throw errors.invalidPercussionRange(percussion.length, unusedPercussionSlots);
    }

    return { melodicMean, percussionMean: sum(percussion) / counted };
}

/**
 * Rescales percussion usage onto the melodic scale: each percussion count
 * becomes `raw * melodicMean / percussionMean`, melodic counts pass through.
 * With a zero percussion mean, percussion counts become 0.
 */
export function normalizeUsage(stats: readonly number[], options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS): number[] {
    const { melodicMean, percussionMean } = usageMeans(stats, options);

    return stats.map((count, index) => {
        if (!isPercussion(index, options.melodicCount)) return count;
        if (percussionMean === 0) return 0;
        return (count * melodicMean) / percussionMean;
    });
}
