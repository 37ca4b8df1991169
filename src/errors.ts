/**
 * Shared error factory for the asset generators.
 *
 * Every domain failure is a `DomainError` with a `kind` discriminator. The
 * message text lives here so tools and tests agree on it; callers do:
 *   throw errors.unknownInstrumentReference(name);
 */

export type DomainErrorKind =
    | 'configuration_infeasible'
    | 'unknown_instrument_reference'
    | 'invalid_configuration'
    | 'invalid_argument'
    | 'file_not_found'
    | 'invalid_file'
    | 'glyph_not_found'
    | 'image_tool_failed';

export class DomainError extends Error {
    readonly kind: DomainErrorKind;

    constructor(kind: DomainErrorKind, message: string) {
        super(message);
        this.name = 'DomainError';
        this.kind = kind;
    }
}

/**
 * Base helper to construct a DomainError from a kind and message string.
 */
export function domainError(kind: DomainErrorKind, message: string): DomainError {
    return new DomainError(kind, message);
}

export function isDomainError(value: unknown): value is DomainError {
    return value instanceof DomainError;
}

export function invalidArgument(message: string): DomainError {
    return domainError('invalid_argument', `Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// files
// ----------------------------------------------------------------------------

export function fileNotFound(path: string): DomainError {
    return domainError('file_not_found', `File not found: ${path}`);
}

export function invalidJson(path: string, detail: string): DomainError {
    return domainError('invalid_file', `Invalid JSON in ${path}. ${detail}`.trimEnd());
}

export function invalidFile(path: string, detail: string): DomainError {
    return domainError('invalid_file', `Invalid file ${path}: ${detail}`);
}

export function cannotWritePath(path: string, detail: string): DomainError {
    return domainError('invalid_argument', `Cannot write to path: ${path} (${detail})`);
}

export function invalidCommandLine(path: string, line: number, detail: string): DomainError {
    return domainError('invalid_file', `${path}:${String(line)}: ${detail}`);
}

// ----------------------------------------------------------------------------
// instrument prioritizer
// ----------------------------------------------------------------------------

export function configurationInfeasible(budget: number, capacity: number, minimal: number): DomainError {
    return domainError(
        'configuration_infeasible',
        `Budget of ${String(budget)} bytes leaves ${String(capacity)} usable bytes, but the group leaders alone need ${String(minimal)} bytes.`,
    );
}

export function unknownInstrumentReference(name: string): DomainError {
    return domainError('unknown_instrument_reference', `Instrument '${name}' is not in the instrument table.`);
}

export function duplicateInstrument(index: number, name: string): DomainError {
    return domainError('invalid_configuration', `Instrument #${String(index)} '${name}' duplicates an index or name already in the table.`);
}

export function instrumentInSeveralGroups(name: string): DomainError {
    return domainError('invalid_configuration', `Instrument '${name}' appears in more than one similarity group.`);
}

export function emptySimilarityGroup(position: number): DomainError {
    return domainError('invalid_configuration', `Similarity group ${String(position)} has no members.`);
}

export function missingUsageStat(index: number): DomainError {
    return domainError('invalid_configuration', `No usage statistic for instrument index ${String(index)}.`);
}

export function invalidPercussionRange(count: number, unused: number): DomainError {
    return domainError(
        'invalid_configuration',
        `Percussion range has ${String(count)} entries but ${String(unused)} are declared unused.`,
    );
}

export function mappingViolation(detail: string): DomainError {
    return domainError('invalid_configuration', `Mapping check failed: ${detail}`);
}

// ----------------------------------------------------------------------------
// text graphics
// ----------------------------------------------------------------------------

export function unknownFont(font: string): DomainError {
    return domainError('invalid_configuration', `Font '${font}' is not defined.`);
}

export function glyphNotFound(font: string, char: string, path: string): DomainError {
    return domainError('glyph_not_found', `Font '${font}' has no glyph for '${char}' (expected ${path}).`);
}

export function unknownGraphic(name: string): DomainError {
    return domainError('invalid_argument', `Graphic '${name}' is not in the command list.`);
}

export function imageToolFailed(command: string, detail: string): DomainError {
    return domainError('image_tool_failed', `Image tool '${command}' failed: ${detail}`);
}
