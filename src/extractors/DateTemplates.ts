/**
 * DateTemplates — Fixed ISO-8601 Schema Fragments
 *
 * Not extractors: the builders pick these by field name.
 *
 * @module
 */
import type { SchemaNode } from '../model/types.js';

export const ISO_TIMESTAMP_PATTERN = '^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}$';

export const ISO_DATE_PATTERN = '^\\d{4}-\\d{2}-\\d{2}$';

/** UTC timestamp, `yyyy-MM-ddTHH:mm:ss` */
export function isoTimestampSchema(description?: string): SchemaNode {
    return {
        type: 'string',
        description: description ?? 'UTC ISO-8601 timestamp (yyyy-MM-ddTHH:mm:ss)',
        pattern: ISO_TIMESTAMP_PATTERN,
        examples: ['2025-12-13T09:56:03'],
    };
}

/** UTC date, `yyyy-MM-dd` */
export function isoDateSchema(description?: string): SchemaNode {
    return {
        type: 'string',
        description: description ?? 'UTC ISO-8601 date (yyyy-MM-dd)',
        pattern: ISO_DATE_PATTERN,
        examples: ['2025-12-13'],
    };
}
