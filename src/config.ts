/**
 * Fixed constants of the target sound driver and the build.
 */

/** Bytes of GUS memory the driver keeps for itself before loading patches. */
export const RESERVED_BYTES = 32 * 1024 + 8;

/** Percussion slots below the first General MIDI drum note (35); always zero in the usage statistics. */
export const UNUSED_PERCUSSION_SLOTS = 35;

export const MELODIC_INSTRUMENT_COUNT = 128;

/** GUS memory sizes the substitution table has a column for, in KB. */
export const MEMORY_BUDGETS_KB = [256, 512, 768, 1024] as const;

export const DEFAULT_IMAGE_TOOL = 'magick';

export function kilobytes(kb: number): number {
    return kb * 1024;
}
