/**
 * SourceDocument — Processed Documentation JSON → DocumentationSet
 *
 * Validates the boundary input produced by the page extractor:
 *
 * ```json
 * {
 *   "metadata": { "url": "...", "extracted_at": "...", "html_sha256": "..." },
 *   "sections": {
 *     "code_sample": { "code": "...", "assets": { "stylesheet": { "href": "..." } }, "notes": [] },
 *     "input_parameters": { "rows": [{ "Field Name": "mode", ... }] },
 *     "return_parameters": { "tables": [{ "label": "...", "rows": [] }] },
 *     "error_codes": { "rows": [] }
 *   }
 * }
 * ```
 *
 * Only a non-object top level is fatal. Wrong-typed sections read as
 * empty, non-object rows are dropped and non-string cells are absent.
 *
 * @module
 */
import { z } from 'zod';
import type { CodeSample, DocumentationRow, DocumentationSet, ResultTable } from '../model/types.js';
import { SourceValidationError } from './SourceValidationError.js';

// ── Schemas ──────────────────────────────────────────────

const OptionalText = z.string().optional().catch(undefined);

const RowsSchema = z.array(z.unknown()).catch([]);

const RowSchema = z.record(z.string(), z.unknown());

const AssetSchema = z.object({
    href: OptionalText,
    display: OptionalText,
}).catch({});

const CodeSampleSchema = z.union([
    z.string(),
    z.object({
        code: OptionalText,
        assets: z.object({
            stylesheet: AssetSchema,
            javascript: AssetSchema,
        }).catch({ stylesheet: {}, javascript: {} }),
        notes: RowsSchema,
    }),
]).optional().catch(undefined);

const RowSectionSchema = z.object({ rows: RowsSchema }).catch({ rows: [] });

const TableSchema = z.object({
    label: z.string().catch(''),
    rows: RowsSchema,
});

export const SourceDocumentSchema = z.object({
    metadata: z.object({
        url: OptionalText,
        extracted_at: OptionalText,
        html_sha256: OptionalText,
    }).catch({}),
    sections: z.object({
        code_sample: CodeSampleSchema,
        input_parameters: RowSectionSchema,
        return_parameters: z.object({ tables: RowsSchema }).catch({ tables: [] }),
        error_codes: RowSectionSchema,
    }).catch({
        input_parameters: { rows: [] },
        return_parameters: { tables: [] },
        error_codes: { rows: [] },
    }),
});

export type SourceDocument = z.infer<typeof SourceDocumentSchema>;

// ── Public API ───────────────────────────────────────────

/**
 * Validate a parsed JSON document and extract the builder inputs.
 *
 * @throws {SourceValidationError} If the top level is not an object
 */
export function parseSourceDocument(input: unknown): DocumentationSet {
    const result = SourceDocumentSchema.safeParse(input);
    if (!result.success) {
        throw new SourceValidationError(result.error);
    }

    const { metadata, sections } = result.data;

    return {
        metadata: {
            ...(metadata.url !== undefined ? { url: metadata.url } : {}),
            ...(metadata.extracted_at !== undefined ? { extractedAt: metadata.extracted_at } : {}),
            ...(metadata.html_sha256 !== undefined ? { htmlSha256: metadata.html_sha256 } : {}),
        },
        codeSample: toCodeSample(sections.code_sample),
        inputRows: toRows(sections.input_parameters.rows),
        resultTables: sections.return_parameters.tables.flatMap((raw): ResultTable[] => {
            const table = TableSchema.safeParse(raw);
            return table.success ? [{ label: table.data.label, rows: toRows(table.data.rows) }] : [];
        }),
        errorRows: toRows(sections.error_codes.rows),
    };
}

/** Keep object rows; keep only their string cells. */
export function toRows(raw: readonly unknown[]): DocumentationRow[] {
    return raw.flatMap((item): DocumentationRow[] => {
        const row = RowSchema.safeParse(item);
        if (!row.success) return [];
        const cells = Object.entries(row.data)
            .filter((entry): entry is [string, string] => typeof entry[1] === 'string');
        return [Object.fromEntries(cells)];
    });
}

// ── Internal ─────────────────────────────────────────────

function toCodeSample(raw: SourceDocument['sections']['code_sample']): CodeSample {
    if (raw === undefined) return { code: '', notes: [] };
    if (typeof raw === 'string') return { code: raw, notes: [] };

    const { stylesheet, javascript } = raw.assets;
    return {
        code: raw.code ?? '',
        ...(stylesheet.href !== undefined ? { stylesheetHref: stylesheet.href } : {}),
        ...(stylesheet.display !== undefined ? { stylesheetDisplay: stylesheet.display } : {}),
        ...(javascript.href !== undefined ? { javascriptHref: javascript.href } : {}),
        ...(javascript.display !== undefined ? { javascriptDisplay: javascript.display } : {}),
        notes: raw.notes.filter((note): note is string => typeof note === 'string'),
    };
}
