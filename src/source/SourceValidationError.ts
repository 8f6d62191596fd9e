/**
 * SourceValidationError — Unusable Documentation Document
 *
 * Raised only when the processed documentation JSON is not an object
 * at all. Malformed sections and rows inside it are tolerated.
 *
 * @module
 */
import type { ZodError } from 'zod';

export class SourceValidationError extends Error {
    constructor(zodError: ZodError) {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super(`[source document] Validation failed:\n${fieldErrors}`, { cause: zodError });
        this.name = 'SourceValidationError';
    }
}
