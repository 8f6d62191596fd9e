/**
 * ConfigValidationError — Invalid Generator Config File
 *
 * @module
 */
import type { ZodError } from 'zod';

export class ConfigValidationError extends Error {
    /** File (or `(inline)`) the config came from */
    readonly source: string;

    constructor(source: string, zodError: ZodError) {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super(`[config ${source}] Validation failed:\n${fieldErrors}`, { cause: zodError });
        this.name = 'ConfigValidationError';
        this.source = source;
    }
}
