/**
 * FieldOverrides — Per-Field Schema Corrections
 *
 * Known init-option fields whose documented type is wrong or too
 * loose. Each override runs after the generic type mapping and
 * replaces its result; add an entry here to cover a new field.
 *
 * @module
 */
import type { SchemaNode } from '../model/types.js';
import { extractEnumFromRemarks } from '../extractors/EnumExtractors.js';
import { isoDateSchema, isoTimestampSchema } from '../extractors/DateTemplates.js';

/** Canonical timestamp option name */
export const TIMESTAMP_FIELD = 'timestamp';

/** Spelling used by the upstream code sample */
export const TIMESTAMP_ALIAS = 'timeStamp';

export const TIMESTAMP_ALIAS_DESCRIPTION =
    'Alias of `timestamp` (seen in code sample). Prefer `timestamp` where possible.';

/** Rewrites a generically mapped node; `remarks` is the row's raw remark text. */
export type FieldOverride = (node: SchemaNode, remarks: string) => SchemaNode;

function integerEnumFromRemarks(node: SchemaNode, remarks: string): SchemaNode {
    const values = extractEnumFromRemarks(remarks);
    return values ? { ...node, type: 'integer', enum: values } : { ...node, type: 'integer' };
}

export const FIELD_OVERRIDES: ReadonlyMap<string, FieldOverride> = new Map<string, FieldOverride>([
    ['mode', node => ({ ...node, type: 'integer', enum: [0, 1, 2, 3] })],
    ['displayMode', node => ({ ...node, type: 'integer', enum: [0, 1] })],
    ['overrideFeePayer', integerEnumFromRemarks],
    ['userMode', integerEnumFromRemarks],
    [TIMESTAMP_FIELD, () => isoTimestampSchema()],
    [TIMESTAMP_ALIAS, () => isoTimestampSchema(TIMESTAMP_ALIAS_DESCRIPTION)],
    ['departureDate', () => isoDateSchema()],
]);

/** Apply the override registered for `name`, if any. */
export function applyFieldOverride(name: string, node: SchemaNode, remarks: string): SchemaNode {
    const override = FIELD_OVERRIDES.get(name);
    return override ? override(node, remarks) : node;
}
