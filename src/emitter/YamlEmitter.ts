/**
 * YamlEmitter — Block-Style Tree Serializer
 *
 * Renders a {@link Value} tree depth-first into indented block-style
 * YAML, two spaces per level. Mapping order is the only ordering
 * source, so equal trees always produce byte-identical text.
 *
 * ```yaml
 * a: 1
 * b:
 *   - 1
 *   - 2
 * notes: |
 *   first line
 *   second line
 * ```
 *
 * @module
 */
import { isContainer, type MappingValue, type SequenceValue, type Value } from '../model/Value.js';
import { formatKey, formatScalar, isMultiline } from './ScalarFormatter.js';
import { SerializerContractError } from './SerializerContractError.js';

const INDENT = 2;

// ── Public API ───────────────────────────────────────────

/**
 * Serialize a Value tree. The result ends with exactly one newline.
 *
 * Empty containers are written in flow form (`{}` / `[]`) so they
 * stay distinguishable from a key without a value.
 *
 * @throws {SerializerContractError} When a mapping repeats a key
 */
export function emitYaml(root: Value): string {
    const lines: string[] = [];
    emitNode(root, 0, [], lines);
    return lines.join('\n') + '\n';
}

/** Split literal block content into lines; one trailing break is dropped. */
export function splitBlockLines(value: string): string[] {
    const lines = value.split(/\r\n|\r|\n/);
    if (lines.length > 1 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

// ── Internal ─────────────────────────────────────────────

function emitNode(node: Value, depth: number, path: readonly string[], lines: string[]): void {
    switch (node.kind) {
        case 'mapping':
            if (node.entries.length === 0) {
                lines.push(pad(depth) + '{}');
                return;
            }
            emitMapping(node, depth, path, lines);
            return;
        case 'sequence':
            if (node.items.length === 0) {
                lines.push(pad(depth) + '[]');
                return;
            }
            emitSequence(node, depth, path, lines);
            return;
        case 'text':
            if (isMultiline(node.value)) {
                // A root node sits at indentation -1.
                lines.push(pad(depth) + blockHeader(node.value, INDENT + 1));
                pushBlock(node.value, depth + INDENT, lines);
                return;
            }
            lines.push(pad(depth) + formatScalar(node));
            return;
        default:
            lines.push(pad(depth) + formatScalar(node));
    }
}

function emitMapping(node: MappingValue, depth: number, path: readonly string[], lines: string[]): void {
    const seen = new Set<string>();
    const sp = pad(depth);

    for (const [key, value] of node.entries) {
        if (seen.has(key)) {
            throw new SerializerContractError(`Duplicate mapping key '${key}'`, path);
        }
        seen.add(key);

        const k = formatKey(key);
        const childPath = [...path, key];

        if (isContainer(value)) {
            const empty = value.kind === 'mapping' ? value.entries.length === 0 : value.items.length === 0;
            if (empty) {
                lines.push(`${sp}${k}: ${value.kind === 'mapping' ? '{}' : '[]'}`);
                continue;
            }
            lines.push(`${sp}${k}:`);
            emitNode(value, depth + INDENT, childPath, lines);
        } else if (value.kind === 'text' && isMultiline(value.value)) {
            lines.push(`${sp}${k}: ${blockHeader(value.value, INDENT)}`);
            pushBlock(value.value, depth + INDENT, lines);
        } else {
            lines.push(`${sp}${k}: ${formatScalar(value)}`);
        }
    }
}

function emitSequence(node: SequenceValue, depth: number, path: readonly string[], lines: string[]): void {
    const sp = pad(depth);

    node.items.forEach((item, i) => {
        if (isContainer(item)) {
            lines.push(`${sp}-`);
            emitNode(item, depth + INDENT, [...path, String(i)], lines);
        } else if (item.kind === 'text' && isMultiline(item.value)) {
            lines.push(`${sp}- ${blockHeader(item.value, INDENT)}`);
            pushBlock(item.value, depth + INDENT, lines);
        } else {
            lines.push(`${sp}- ${formatScalar(item)}`);
        }
    });
}

/**
 * `|`, or `|N` when the first non-empty line starts with a space and
 * the content indentation cannot be detected from it.
 */
function blockHeader(value: string, indicator: number): string {
    const first = splitBlockLines(value).find(line => line.length > 0);
    return first?.startsWith(' ') ? `|${indicator}` : '|';
}

/** Literal block content, reproduced verbatim. Blank lines carry no padding. */
function pushBlock(value: string, depth: number, lines: string[]): void {
    const sp = pad(depth);
    for (const line of splitBlockLines(value)) {
        lines.push(line.length > 0 ? sp + line : line);
    }
}

function pad(depth: number): string {
    return ' '.repeat(depth);
}
