import {
    type Instrument,
    type InstrumentTableData,
    type PatchIndex,
    type SimilarityGroup,
} from '../types/instrument.js';
import * as errors from '../errors.js';

/**
 * Read-only view over the instrument tables with lookups by index and name.
 * Similarity groups are resolved from patch names to indices on construction.
 */
export class InstrumentTableClass {
    private readonly byIndex = new Map<PatchIndex, Instrument>();
    private readonly byPatchName = new Map<string, Instrument>();
    private readonly declaredSingletons = new Set<PatchIndex>();
    private readonly groups: SimilarityGroup[];
    readonly usageStats: readonly number[];

    constructor(data: InstrumentTableData) {
        const sorted = [...data.instruments].sort((a, b) => a.index - b.index);
        for (const instrument of sorted) {
            if (this.byIndex.has(instrument.index) || this.byPatchName.has(instrument.name)) {
                throw errors.duplicateInstrument(instrument.index, instrument.name);
            }
            this.byIndex.set(instrument.index, { ...instrument });
            this.byPatchName.set(instrument.name, { ...instrument });
        }
        this.usageStats = [...data.usageStats];
        this.groups = this.resolveGroups(data.groups);
    }

    static fromJSON(data: InstrumentTableData): InstrumentTableClass {
        return new InstrumentTableClass(data);
    }

    get size(): number {
        return this.byIndex.size;
    }

    /**
     * All instruments, ascending by index.
     */
    instruments(): Instrument[] {
        return [...this.byIndex.values()].map((i) => ({ ...i }));
    }

    has(index: PatchIndex): boolean {
        return this.byIndex.has(index);
    }

    /**
     * Throws `unknownInstrumentReference` for an index outside the table.
     */
    get(index: PatchIndex): Instrument {
        const instrument = this.byIndex.get(index);
        if (!instrument) {
            throw errors.unknownInstrumentReference(`#${String(index)}`);
        }
        return { ...instrument };
    }

    /**
     * Throws `unknownInstrumentReference` for a name outside the table.
     */
    byName(name: string): Instrument {
        const instrument = this.byPatchName.get(name);
        if (!instrument) {
            throw errors.unknownInstrumentReference(name);
        }
        return { ...instrument };
    }

    sizeOf(index: PatchIndex): number {
        return this.get(index).size;
    }

    /**
     * Declared groups in file order, then a singleton group for every
     * instrument no group mentions, ascending by index.
     */
    similarityGroups(): SimilarityGroup[] {
        return this.groups.map((g) => ({ leader: g.leader, members: [...g.members] }));
    }

    toJSON(): InstrumentTableData {
        const declared = this.groups.filter((g) => g.members.length > 1 || this.declaredSingletons.has(g.leader));
        return {
            instruments: this.instruments(),
            groups: declared.map((g) => g.members.map((i) => this.get(i).name)),
            usageStats: [...this.usageStats],
        };
    }

    private resolveGroups(names: string[][]): SimilarityGroup[] {
        const seen = new Set<PatchIndex>();
        const groups: SimilarityGroup[] = [];

        names.forEach((group, position) => {
            if (group.length === 0) {
                throw errors.emptySimilarityGroup(position);
            }
            const members = group.map((name) => {
                const index = this.byName(name).index;
                if (seen.has(index)) {
                    throw errors.instrumentInSeveralGroups(name);
                }
                seen.add(index);
                return index;
            });
            if (members.length === 1) {
                this.declaredSingletons.add(members[0]);
            }
            groups.push({ leader: members[0], members });
        });

        for (const index of this.byIndex.keys()) {
            if (!seen.has(index)) {
                groups.push({ leader: index, members: [index] });
            }
        }

        return groups;
    }
}
