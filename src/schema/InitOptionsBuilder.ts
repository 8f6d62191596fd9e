/**
 * InitOptionsBuilder — Input Parameter Rows → Init Options Schema
 *
 * Folds each row into an immutable accumulator (properties, required
 * names, rule flags), then finalizes the object schema:
 *
 * 1. Generic type from `Data Type` ({@link mapDataType})
 * 2. Per-field override ({@link applyFieldOverride})
 * 3. `function` types keep their JS semantic as `x-javascriptType`
 * 4. `Conditional: required` joins `required` (timestamp spellings excepted)
 *
 * Unknown options are rejected (`additionalProperties: false`).
 *
 * @module
 */
import type { DocumentationRow, SchemaNode } from '../model/types.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { isoTimestampSchema } from '../extractors/DateTemplates.js';
import { mapDataType } from './TypeMapper.js';
import {
    applyFieldOverride, TIMESTAMP_ALIAS, TIMESTAMP_ALIAS_DESCRIPTION, TIMESTAMP_FIELD,
} from './FieldOverrides.js';
import { cell, COLUMNS } from './RowCells.js';

// ── Conditional Rules ────────────────────────────────────

/** Remark phrase that triggers the customer/amount rule (matched case-insensitively) */
export const MODE_0_OR_2_PHRASE = 'required if mode is set to 0 or 2';

/** Fields required when `mode` is 0 or 2 */
export const MODE_0_OR_2_REQUIRED = ['customerName', 'customerReference', 'paymentAmount'] as const;

const TIMESTAMP_SPELLINGS = new Set<string>([TIMESTAMP_FIELD, TIMESTAMP_ALIAS]);

/** Either timestamp spelling satisfies presence. */
export const TIMESTAMP_ONE_OF_RULE: SchemaNode = {
    oneOf: [
        { required: [TIMESTAMP_FIELD] },
        { required: [TIMESTAMP_ALIAS] },
    ],
};

/**
 * The single hard-coded `if`/`then` rule: `mode` in {0, 2} requires
 * {@link MODE_0_OR_2_REQUIRED}. Not a general rule engine.
 */
export const MODE_0_OR_2_RULE: SchemaNode = {
    if: {
        properties: new Map<string, SchemaNode>([['mode', { enum: [0, 2] }]]),
        required: ['mode'],
    },
    then: { required: [...MODE_0_OR_2_REQUIRED] },
};

// ── Accumulator ──────────────────────────────────────────

interface InitOptionsAccumulator {
    readonly properties: ReadonlyMap<string, SchemaNode>;
    readonly required: readonly string[];
    readonly requiresCustomerForMode0or2: boolean;
}

const EMPTY: InitOptionsAccumulator = {
    properties: new Map<string, SchemaNode>(),
    required: [],
    requiresCustomerForMode0or2: false,
};

// ── Public API ───────────────────────────────────────────

export interface InitOptionsBuildOptions {
    /** Description of the options object */
    readonly description: string;
    readonly observer?: DebugObserverFn;
}

/** Schema node for one input row, before any cross-row rules. */
export function buildInitProperty(row: DocumentationRow): SchemaNode {
    const name = cell(row, COLUMNS.fieldName).trim();
    const remarks = cell(row, COLUMNS.remarks);
    const mapped = mapDataType(cell(row, COLUMNS.dataType) || 'string');

    const generic: SchemaNode = remarks
        ? { type: mapped.type, description: remarks }
        : { type: mapped.type };

    const node = applyFieldOverride(name, generic, remarks);

    return mapped.javascriptType
        ? { ...node, type: 'string', javascriptType: mapped.javascriptType }
        : node;
}

/**
 * Build the init options schema from the input parameter rows.
 * Rows without a field name are skipped.
 */
export function buildInitOptionsSchema(
    rows: readonly DocumentationRow[],
    options: InitOptionsBuildOptions,
): SchemaNode {
    const acc = rows.reduce<InitOptionsAccumulator>(
        (state, row, index) => foldRow(state, row, index, options.observer),
        EMPTY,
    );

    const properties = new Map(acc.properties);
    const hasCanonical = properties.has(TIMESTAMP_FIELD);
    const hasAlias = properties.has(TIMESTAMP_ALIAS);

    if (hasCanonical && !hasAlias) {
        properties.set(TIMESTAMP_ALIAS, isoTimestampSchema(TIMESTAMP_ALIAS_DESCRIPTION));
    } else if (hasAlias && !hasCanonical) {
        // oneOf names both spellings and the properties are closed
        properties.set(TIMESTAMP_FIELD, isoTimestampSchema());
    }

    const required = acc.required.filter(name => !TIMESTAMP_SPELLINGS.has(name));

    const allOf: SchemaNode[] = [];
    if (hasCanonical || hasAlias) {
        allOf.push(TIMESTAMP_ONE_OF_RULE);
        options.observer?.({ type: 'rule', rule: 'timestamp-alias', timestamp: Date.now() });
    }
    if (acc.requiresCustomerForMode0or2) {
        allOf.push(MODE_0_OR_2_RULE);
        options.observer?.({ type: 'rule', rule: 'mode-0-or-2-requires-customer', timestamp: Date.now() });
    }

    return {
        type: 'object',
        description: options.description,
        additionalProperties: false,
        properties,
        ...(required.length > 0 ? { required } : {}),
        ...(allOf.length > 0 ? { allOf } : {}),
    };
}

// ── Internal ─────────────────────────────────────────────

function foldRow(
    state: InitOptionsAccumulator,
    row: DocumentationRow,
    index: number,
    observer: DebugObserverFn | undefined,
): InitOptionsAccumulator {
    const name = cell(row, COLUMNS.fieldName).trim();
    if (!name) {
        observer?.({ type: 'skip', section: 'input', index, reason: `missing '${COLUMNS.fieldName}'`, timestamp: Date.now() });
        return state;
    }

    const isRequired = cell(row, COLUMNS.conditional).trim().toLowerCase() === 'required';
    const remarks = cell(row, COLUMNS.remarks).toLowerCase();

    return {
        properties: new Map(state.properties).set(name, buildInitProperty(row)),
        required: isRequired && !state.required.includes(name) ? [...state.required, name] : state.required,
        requiresCustomerForMode0or2: state.requiresCustomerForMode0or2 || remarks.includes(MODE_0_OR_2_PHRASE),
    };
}
