/**
 * SchemaLowering — SchemaNode → Value Tree
 *
 * Emits JSON Schema keywords in one fixed order so that output is
 * stable regardless of how a node was constructed.
 *
 * @module
 */
import type { SchemaNode } from '../model/types.js';
import {
    bool, int, mapping, sequence, text,
    type MappingEntry, type Value,
} from '../model/Value.js';

/**
 * Keyword order: `$ref`, `type`, `const`, `description`, `pattern`,
 * `examples`, `enum`, `x-javascriptType`, `additionalProperties`,
 * `properties`, `required`, `oneOf`, `allOf`, `if`, `then`.
 */
export function schemaToValue(node: SchemaNode): Value {
    const entries: MappingEntry[] = [];

    if (node.$ref !== undefined) entries.push(['$ref', text(node.$ref)]);
    if (node.type !== undefined) entries.push(['type', text(node.type)]);
    if (node.const !== undefined) entries.push(['const', text(node.const)]);
    if (node.description !== undefined) entries.push(['description', text(node.description)]);
    if (node.pattern !== undefined) entries.push(['pattern', text(node.pattern)]);
    if (node.examples !== undefined) entries.push(['examples', sequence(node.examples.map(text))]);
    if (node.enum !== undefined) {
        const values: readonly (number | string)[] = node.enum;
        entries.push(['enum', sequence(values.map(v => typeof v === 'number' ? int(v) : text(v)))]);
    }
    if (node.javascriptType !== undefined) entries.push(['x-javascriptType', text(node.javascriptType)]);
    if (node.additionalProperties !== undefined) entries.push(['additionalProperties', bool(node.additionalProperties)]);
    if (node.properties !== undefined) {
        entries.push(['properties', mapping(
            [...node.properties].map(([name, child]): MappingEntry => [name, schemaToValue(child)]),
        )]);
    }
    if (node.required !== undefined) entries.push(['required', sequence(node.required.map(text))]);
    if (node.oneOf !== undefined) entries.push(['oneOf', sequence(node.oneOf.map(schemaToValue))]);
    if (node.allOf !== undefined) entries.push(['allOf', sequence(node.allOf.map(schemaToValue))]);
    if (node.if !== undefined) entries.push(['if', schemaToValue(node.if)]);
    if (node.then !== undefined) entries.push(['then', schemaToValue(node.then)]);

    return mapping(entries);
}
