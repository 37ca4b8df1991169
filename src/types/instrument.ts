/**
 * Core types for the GUS instrument substitution table.
 *
 * Instruments are addressed by patch index: 0-127 are the General MIDI
 * melodic programs, 128 + n is the percussion patch for MIDI note n.
 */

export type PatchIndex = number;

/**
 * A loadable patch and the GUS memory it occupies when resident.
 */
export interface Instrument {
    index: PatchIndex;
    /** Patch file name without extension, e.g. "acpiano" */
    name: string;
    /** Bytes of GUS memory used when the patch is loaded */
    size: number;
}

/**
 * Patches similar enough to stand in for each other.
 * `members[0]` is the leader; every member falls back to it.
 */
export interface SimilarityGroup {
    leader: PatchIndex;
    members: PatchIndex[];
}

/**
 * Static tables the prioritizer works from.
 * `groups` names patches; `usageStats` is indexed by patch index.
 */
export interface InstrumentTableData {
    instruments: Instrument[];
    groups: string[][];
    usageStats: number[];
}

/**
 * Patch index → index of the patch actually loaded in its place.
 * A self-mapped entry is resident.
 */
export type Mapping = Map<PatchIndex, PatchIndex>;

export function isPercussion(index: PatchIndex, melodicCount: number): boolean {
    return index >= melodicCount;
}

/**
 * Returns the indices that map to themselves, ascending.
 */
export function residentIndices(mapping: Mapping): PatchIndex[] {
    const resident: PatchIndex[] = [];
    for (const [from, to] of mapping) {
        if (from === to) resident.push(from);
    }
    return resident.sort((a, b) => a - b);
}
