/**
 * ErrorCodeBuilder — Error Code Rows → Error Code Schema
 *
 * Each documented code becomes one `oneOf` alternative: an exact
 * `const`, or, when the code carries the `*` wildcard, a prefix
 * pattern (`TP*` → `^TP.*$`).
 *
 * @module
 */
import type { DocumentationRow, SchemaNode } from '../model/types.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { cell, COLUMNS } from './RowCells.js';

const WILDCARD = '*';

/** Escape regex metacharacters so the text matches literally. */
export function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Alternative for a single documented code. */
export function buildErrorCodeAlternative(code: string, description: string): SchemaNode {
    if (code.includes(WILDCARD)) {
        const prefix = escapeRegExp(code.split(WILDCARD).join(''));
        return { type: 'string', description, pattern: `^${prefix}.*$` };
    }
    return { const: code, description };
}

export interface ErrorCodeBuildOptions {
    readonly description: string;
    readonly observer?: DebugObserverFn;
}

/** Rows without a code are skipped. With no alternatives, `oneOf` is omitted. */
export function buildErrorCodeSchema(rows: readonly DocumentationRow[], options: ErrorCodeBuildOptions): SchemaNode {
    const oneOf = rows.flatMap((row, index): SchemaNode[] => {
        const code = cell(row, COLUMNS.errorCode).trim();
        if (!code) {
            options.observer?.({ type: 'skip', section: 'error-code', index, reason: `missing '${COLUMNS.errorCode}'`, timestamp: Date.now() });
            return [];
        }
        return [buildErrorCodeAlternative(code, cell(row, COLUMNS.description).trim())];
    });

    return {
        type: 'string',
        description: options.description,
        ...(oneOf.length > 0 ? { oneOf } : {}),
    };
}
