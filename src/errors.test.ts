import { describe, it, expect } from 'vitest';
import * as errors from './errors.js';

describe('Shared Error Factory (src/errors.ts)', () => {
    it('domainError helper constructs the correct shape', () => {
        const err = errors.domainError('invalid_file', 'Test message');
        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe('DomainError');
        expect(err.kind).toBe('invalid_file');
        expect(err.message).toBe('Test message');
    });

    it('isDomainError distinguishes domain errors from other errors', () => {
        expect(errors.isDomainError(errors.fileNotFound('a.json'))).toBe(true);
        expect(errors.isDomainError(new Error('plain'))).toBe(false);
        expect(errors.isDomainError('text')).toBe(false);
    });

    describe('file errors', () => {
        it('fileNotFound', () => {
            const err = errors.fileNotFound('data/gus/instruments.json');
            expect(err.kind).toBe('file_not_found');
            expect(err.message).toBe('File not found: data/gus/instruments.json');
        });

        it('invalidJson', () => {
            expect(errors.invalidJson('a.json', 'Unexpected token').message).toBe('Invalid JSON in a.json. Unexpected token');
            expect(errors.invalidJson('a.json', '').message).toBe('Invalid JSON in a.json.');
        });

        it('invalidCommandLine', () => {
            const err = errors.invalidCommandLine('graphics.txt', 12, 'unterminated string');
            expect(err.kind).toBe('invalid_file');
            expect(err.message).toBe('graphics.txt:12: unterminated string');
        });

        it('cannotWritePath', () => {
            expect(errors.cannotWritePath('/ro/out.cfg', 'EACCES').message).toBe(
                'Cannot write to path: /ro/out.cfg (EACCES)',
            );
        });
    });

    describe('instrument prioritizer errors', () => {
        it('configurationInfeasible', () => {
            const err = errors.configurationInfeasible(32926, 150, 330);
            expect(err.kind).toBe('configuration_infeasible');
            expect(err.message).toBe(
                'Budget of 32926 bytes leaves 150 usable bytes, but the group leaders alone need 330 bytes.',
            );
        });

        it('unknownInstrumentReference', () => {
            const err = errors.unknownInstrumentReference('harpsichord');
            expect(err.kind).toBe('unknown_instrument_reference');
            expect(err.message).toBe("Instrument 'harpsichord' is not in the instrument table.");
        });

        it('table consistency errors are invalid_configuration', () => {
            expect(errors.duplicateInstrument(3, 'organ').kind).toBe('invalid_configuration');
            expect(errors.instrumentInSeveralGroups('organ').message).toBe(
                "Instrument 'organ' appears in more than one similarity group.",
            );
            expect(errors.emptySimilarityGroup(2).message).toBe('Similarity group 2 has no members.');
            expect(errors.invalidPercussionRange(10, 12).message).toBe(
                'Percussion range has 10 entries but 12 are declared unused.',
            );
        });
    });

    describe('text graphic errors', () => {
        it('glyphNotFound', () => {
            const err = errors.glyphNotFound('small', 'Q', '/fonts/small/stcfn081.png');
            expect(err.kind).toBe('glyph_not_found');
            expect(err.message).toBe("Font 'small' has no glyph for 'Q' (expected /fonts/small/stcfn081.png).");
        });

        it('imageToolFailed', () => {
            const err = errors.imageToolFailed('magick', 'command not found');
            expect(err.kind).toBe('image_tool_failed');
            expect(err.message).toBe("Image tool 'magick' failed: command not found");
        });

        it('unknownGraphic', () => {
            expect(errors.unknownGraphic('M_FOO').message).toBe("Graphic 'M_FOO' is not in the command list.");
        });
    });
});
