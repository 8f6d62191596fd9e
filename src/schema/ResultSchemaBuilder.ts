/**
 * ResultSchemaBuilder — Return Parameter Tables → Result Schemas
 *
 * Tables are split by label: a label mentioning "mode 1" describes
 * the tokenisation result, everything else the redirect/callback
 * result. Unknown result fields are tolerated (`additionalProperties: true`).
 *
 * @module
 */
import type { DocumentationRow, ResultTable, SchemaNode } from '../model/types.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { extractEnumFromValueMap, guessStringEnum } from '../extractors/EnumExtractors.js';
import { isoDateSchema, isoTimestampSchema } from '../extractors/DateTemplates.js';
import { cell, COLUMNS } from './RowCells.js';

// ── Partitioning ─────────────────────────────────────────

const TOKENISATION_LABEL = 'mode 1';

export interface PartitionedResults {
    /** Mode 0 and 2 (redirect/callback) */
    readonly redirect: readonly DocumentationRow[];
    /** Mode 1 (tokenisation) */
    readonly tokenisation: readonly DocumentationRow[];
}

export function partitionResultTables(tables: readonly ResultTable[]): PartitionedResults {
    return tables.reduce<PartitionedResults>(
        (acc, table) => table.label.toLowerCase().includes(TOKENISATION_LABEL)
            ? { ...acc, tokenisation: [...acc.tokenisation, ...table.rows] }
            : { ...acc, redirect: [...acc.redirect, ...table.rows] },
        { redirect: [], tokenisation: [] },
    );
}

// ── Field Schemas ────────────────────────────────────────

/** Result fields (lower-cased) with a fixed date template */
const DATE_FIELDS: ReadonlyMap<string, (description?: string) => SchemaNode> = new Map([
    ['processingdate', isoTimestampSchema],
    ['settlementdate', isoDateSchema],
]);

/**
 * Schema for one result field, from its `Value` cell.
 *
 * An integer enumeration (`N => text` lines) wins over a string
 * enumeration guessed from a "Possible values" listing.
 */
export function buildResultProperty(parameter: string, value: string): SchemaNode {
    const dateTemplate = parameter.toLowerCase().endsWith('date')
        ? DATE_FIELDS.get(parameter.toLowerCase())
        : undefined;
    if (dateTemplate) {
        return value ? dateTemplate(value) : dateTemplate();
    }

    const base: SchemaNode = value ? { type: 'string', description: value } : { type: 'string' };

    const intEnum = extractEnumFromValueMap(value);
    if (intEnum) return { ...base, type: 'integer', enum: intEnum };

    const stringEnum = guessStringEnum(value);
    if (stringEnum) return { ...base, type: 'string', enum: stringEnum };

    return base;
}

export interface ResultBuildOptions {
    readonly description: string;
    readonly observer?: DebugObserverFn;
}

/** Object schema over a group of result rows. Rows without a parameter name are skipped. */
export function buildResultSchema(rows: readonly DocumentationRow[], options: ResultBuildOptions): SchemaNode {
    const properties = rows.reduce<ReadonlyMap<string, SchemaNode>>((props, row, index) => {
        const parameter = cell(row, COLUMNS.parameter).trim();
        if (!parameter) {
            options.observer?.({ type: 'skip', section: 'result', index, reason: `missing '${COLUMNS.parameter}'`, timestamp: Date.now() });
            return props;
        }
        return new Map(props).set(parameter, buildResultProperty(parameter, cell(row, COLUMNS.value)));
    }, new Map<string, SchemaNode>());

    return {
        type: 'object',
        description: options.description,
        additionalProperties: true,
        properties,
    };
}
