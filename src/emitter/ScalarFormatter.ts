/**
 * ScalarFormatter — Leaf Rendering for Block-Style YAML
 *
 * Decides how a single scalar or mapping key is written: bare,
 * single-quoted (embedded quotes doubled), or as a keyword literal.
 * Every scalar has a representation; nothing here throws.
 *
 * @module
 */
import type { ScalarValue } from '../model/Value.js';

// ── Quoting Rules ────────────────────────────────────────

const SPECIAL_CHARS = [':', '#', '{', '}', '[', ']', ',', '&', '*', '!', '|', '>', '%', '@', '`'];

const RESERVED_WORDS = new Set(['null', 'true', 'false', 'yes', 'no', '~']);

const LEADING_INDICATORS = ['-', '?', ':', ' '];

const SAFE_KEY = /^[A-Za-z0-9_-]+$/;

/** Wrap in single quotes, doubling any embedded quote. */
export function quote(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
}

/** Whether a line of text needs the quoted form to survive as a plain string. */
export function needsQuoting(value: string): boolean {
    return value.trim() !== value
        || SPECIAL_CHARS.some(ch => value.includes(ch))
        || RESERVED_WORDS.has(value.toLowerCase())
        || LEADING_INDICATORS.some(prefix => value.startsWith(prefix));
}

/** Multi-line text is emitted as a literal block, never as a scalar. */
export function isMultiline(value: string): boolean {
    return /[\r\n]/.test(value);
}

// ── Public API ───────────────────────────────────────────

/**
 * Render one scalar. Multi-line text is the serializer's concern
 * (literal block) and must not be passed here.
 *
 * @example
 * formatScalar(text(''))          → "''"
 * formatScalar(text('a: b'))      → "'a: b'"
 * formatScalar(text("it's"))      → "it's"
 * formatScalar(text("it's #1"))   → "'it''s #1'"
 * formatScalar(bool(true))        → 'true'
 */
export function formatScalar(value: ScalarValue): string {
    switch (value.kind) {
        case 'null':
            return 'null';
        case 'bool':
            return value.value ? 'true' : 'false';
        case 'int':
            return String(value.value);
        case 'float':
            return value.literal ?? formatFloat(value.value);
        case 'text':
            return formatText(value.value);
    }
}

/**
 * Render a mapping key. Only ASCII letters, digits, `_` and `-` may
 * appear bare; anything else is quoted.
 *
 * @example
 * formatKey('paymentAmount')        → 'paymentAmount'
 * formatKey('x-javascript-plugin')  → 'x-javascript-plugin'
 * formatKey('$ref')                 → "'$ref'"
 */
export function formatKey(key: string): string {
    return SAFE_KEY.test(key) && !needsQuoting(key) ? key : quote(key);
}

// ── Internal ─────────────────────────────────────────────

function formatText(value: string): string {
    if (value === '') return "''";
    return needsQuoting(value) ? quote(value) : value;
}

function formatFloat(value: number): string {
    if (Number.isNaN(value)) return '.nan';
    if (value === Infinity) return '.inf';
    if (value === -Infinity) return '-.inf';
    return String(value);
}
