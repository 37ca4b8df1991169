import * as fs from 'fs/promises';
import { type z } from 'zod';
import * as errors from '../errors.js';

export function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Reads a JSON file and validates it against a schema.
 * Missing files become `fileNotFound`; syntax and shape problems become `invalid_file` errors.
 */
export async function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.infer<S>> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw errors.fileNotFound(filePath);
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch (e: unknown) {
        throw errors.invalidJson(filePath, e instanceof Error ? e.message : '');
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        throw errors.invalidFile(filePath, describeIssues(result.error));
    }
    return result.data;
}
