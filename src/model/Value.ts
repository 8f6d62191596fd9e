/**
 * Value — Generic Document Tree
 *
 * The only data type the emitters understand: scalars, ordered
 * mappings and sequences. It carries no schema semantics.
 *
 * @module
 */
import { SerializerContractError } from '../emitter/SerializerContractError.js';

// ── Node Types ───────────────────────────────────────────

export interface NullValue {
    readonly kind: 'null';
}

export interface BoolValue {
    readonly kind: 'bool';
    readonly value: boolean;
}

export interface IntValue {
    readonly kind: 'int';
    readonly value: number;
}

export interface FloatValue {
    readonly kind: 'float';
    readonly value: number;
    /** Source literal, emitted verbatim when present (e.g. `'150.50'`) */
    readonly literal?: string;
}

export interface TextValue {
    readonly kind: 'text';
    readonly value: string;
}

/** Ordered key/value pairs. Keys must be unique. */
export interface MappingValue {
    readonly kind: 'mapping';
    readonly entries: readonly MappingEntry[];
}

export type MappingEntry = readonly [key: string, value: Value];

export interface SequenceValue {
    readonly kind: 'sequence';
    readonly items: readonly Value[];
}

export type ScalarValue = NullValue | BoolValue | IntValue | FloatValue | TextValue;

export type Value = ScalarValue | MappingValue | SequenceValue;

// ── Constructors ─────────────────────────────────────────

export const NULL: NullValue = { kind: 'null' };

export function bool(value: boolean): BoolValue {
    return { kind: 'bool', value };
}

export function int(value: number): IntValue {
    return { kind: 'int', value };
}

export function float(value: number, literal?: string): FloatValue {
    return literal !== undefined ? { kind: 'float', value, literal } : { kind: 'float', value };
}

export function text(value: string): TextValue {
    return { kind: 'text', value };
}

/** Text, or `null` when the value is absent. */
export function optionalText(value: string | undefined | null): TextValue | NullValue {
    return value === undefined || value === null ? NULL : text(value);
}

export function mapping(entries: readonly MappingEntry[]): MappingValue {
    return { kind: 'mapping', entries };
}

export function sequence(items: readonly Value[]): SequenceValue {
    return { kind: 'sequence', items };
}

export function isContainer(value: Value): value is MappingValue | SequenceValue {
    return value.kind === 'mapping' || value.kind === 'sequence';
}

// ── Plain Data Bridge ────────────────────────────────────

/**
 * Convert plain JavaScript data into a Value tree.
 *
 * Integers become `int`, other finite numbers `float`. Object key
 * order follows `Object.keys()`.
 *
 * @throws {SerializerContractError} For `undefined`, functions, symbols,
 *   bigints, non-finite numbers and non-plain objects.
 */
export function toValue(input: unknown, path: readonly string[] = []): Value {
    if (input === null) return NULL;

    switch (typeof input) {
        case 'boolean':
            return bool(input);
        case 'string':
            return text(input);
        case 'number':
            if (!Number.isFinite(input)) {
                throw new SerializerContractError(`Non-finite number ${String(input)}`, path);
            }
            return Number.isInteger(input) ? int(input) : float(input);
        case 'object':
            break;
        default:
            throw new SerializerContractError(`Unsupported ${typeof input} node`, path);
    }

    if (Array.isArray(input)) {
        return sequence(input.map((item: unknown, i) => toValue(item, [...path, String(i)])));
    }

    if (!isPlainObject(input)) {
        throw new SerializerContractError('Unsupported non-plain object node', path);
    }

    return mapping(Object.entries(input).map(([k, v]): MappingEntry => [k, toValue(v, [...path, k])]));
}

/**
 * Convert a Value tree back into plain data.
 *
 * Integer-like mapping keys lose their position in a plain object;
 * use {@link emitJson} when the exact key order matters.
 */
export function fromValue(value: Value): unknown {
    switch (value.kind) {
        case 'null':
            return null;
        case 'bool':
        case 'int':
        case 'float':
        case 'text':
            return value.value;
        case 'sequence':
            return value.items.map(fromValue);
        case 'mapping': {
            const out: Record<string, unknown> = {};
            for (const [k, v] of value.entries) {
                out[k] = fromValue(v);
            }
            return out;
        }
    }
}

function isPlainObject(input: object): input is Record<string, unknown> {
    const proto: unknown = Object.getPrototypeOf(input);
    return proto === Object.prototype || proto === null;
}
