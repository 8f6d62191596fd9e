/**
 * JsonEmitter — Structural Dump of a Value Tree
 *
 * Two-space indented JSON with mapping order preserved exactly,
 * integer-like keys included (a plain object would hoist those).
 *
 * @module
 */
import type { Value } from '../model/Value.js';
import { SerializerContractError } from './SerializerContractError.js';

/**
 * Serialize a Value tree as JSON, ending with one newline.
 *
 * @throws {SerializerContractError} On duplicate mapping keys or non-finite numbers
 */
export function emitJson(root: Value): string {
    return renderJson(root, 0, []) + '\n';
}

function renderJson(node: Value, depth: number, path: readonly string[]): string {
    const inner = '  '.repeat(depth + 1);
    const outer = '  '.repeat(depth);

    switch (node.kind) {
        case 'null':
            return 'null';
        case 'bool':
            return node.value ? 'true' : 'false';
        case 'int':
        case 'float':
            if (!Number.isFinite(node.value)) {
                throw new SerializerContractError(`Non-finite number ${String(node.value)} has no JSON form`, path);
            }
            return JSON.stringify(node.value);
        case 'text':
            return JSON.stringify(node.value);
        case 'sequence': {
            if (node.items.length === 0) return '[]';
            const items = node.items.map((item, i) => inner + renderJson(item, depth + 1, [...path, String(i)]));
            return `[\n${items.join(',\n')}\n${outer}]`;
        }
        case 'mapping': {
            if (node.entries.length === 0) return '{}';
            const seen = new Set<string>();
            const entries = node.entries.map(([key, value]) => {
                if (seen.has(key)) {
                    throw new SerializerContractError(`Duplicate mapping key '${key}'`, path);
                }
                seen.add(key);
                return `${inner}${JSON.stringify(key)}: ${renderJson(value, depth + 1, [...path, key])}`;
            });
            return `{\n${entries.join(',\n')}\n${outer}}`;
        }
    }
}
