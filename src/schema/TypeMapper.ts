/**
 * TypeMapper — Documentation "Data Type" → JSON Schema Type
 *
 * Total: anything unrecognised is a string.
 *
 * @module
 */
import type { SchemaType } from '../model/types.js';

export interface MappedType {
    readonly type: SchemaType;
    /** Set when the documented type was a JS callback (`function`) */
    readonly javascriptType?: 'function';
}

const INTEGER_NAMES = new Set(['int', 'integer']);
const NUMBER_NAMES = new Set(['number', 'float', 'double', 'decimal']);

/**
 * @example
 * mapDataType('Boolean (optional)') → { type: 'boolean' }
 * mapDataType(' Integer ')          → { type: 'integer' }
 * mapDataType('function')           → { type: 'string', javascriptType: 'function' }
 * mapDataType('varchar(50)')        → { type: 'string' }
 */
export function mapDataType(dataType: string): MappedType {
    const t = dataType.trim().toLowerCase().replace(/\s+/g, ' ');

    if (t.includes('boolean')) return { type: 'boolean' };
    if (INTEGER_NAMES.has(t)) return { type: 'integer' };
    if (NUMBER_NAMES.has(t)) return { type: 'number' };
    if (t === 'function') return { type: 'string', javascriptType: 'function' };
    return { type: 'string' };
}
