import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import * as errors from '../errors.js';

const execFileAsync = promisify(execFile);

/**
 * The external image-processing command that does the actual pixel work.
 */
export interface ImageTool {
    readonly command: string;
    run(args: readonly string[]): Promise<void>;
}

/**
 * Runs an ImageMagick-compatible command (`magick` or `convert`) without a shell.
 */
export class ExternalImageTool implements ImageTool {
    constructor(readonly command: string) {}

    async run(args: readonly string[]): Promise<void> {
        try {
            await execFileAsync(this.command, [...args]);
        } catch (error: unknown) {
            throw errors.imageToolFailed(this.command, describeFailure(error));
        }
    }
}

function describeFailure(error: unknown): string {
    if (!(error instanceof Error)) return String(error);
    if ('code' in error && error.code === 'ENOENT') return 'command not found';
    if ('stderr' in error && typeof error.stderr === 'string' && error.stderr.trim() !== '') {
        return error.stderr.trim();
    }
    return error.message;
}
