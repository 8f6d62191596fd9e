/**
 * EnumExtractors — Enumeration Heuristics over Free Prose
 *
 * Independent, side-effect-free matchers. Each returns `undefined`
 * for "no match", which callers treat as "keep the default shape".
 * The source pages follow no grammar, so these stay separate regex
 * heuristics rather than one parser.
 *
 * @module
 */

// ── Patterns ─────────────────────────────────────────────

/** `0 - Success` */
const REMARK_ENUM_LINE = /^\s*(\d+)\s*-\s+.+$/;

/** `1 => Approved` */
const VALUE_MAP_LINE = /^\s*(\d+)\s*=>\s*.+$/;

/** Includes a misspelling seen on the upstream page */
const POSSIBLE_VALUES_MARKERS = ['possible values', 'possiible values'];

const ARROW = '=>';

// ── Helpers ──────────────────────────────────────────────

/** Split like a text file: `\r\n`, `\r` and `\n` all end a line. */
export function splitLines(value: string): string[] {
    if (value === '') return [];
    const lines = value.split(/\r\n|\r|\n/);
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
}

/** Narrow a list to the non-empty tuple form used by `enum`. */
export function isNonEmpty<T>(values: readonly T[]): values is readonly [T, ...T[]] {
    return values.length > 0;
}

function hasMarker(line: string): boolean {
    const low = line.toLowerCase();
    return POSSIBLE_VALUES_MARKERS.some(marker => low.includes(marker));
}

function collectLeadingInts(text: string, pattern: RegExp): readonly [number, ...number[]] | undefined {
    const values: number[] = [];
    for (const line of splitLines(text)) {
        const digits = pattern.exec(line.trim())?.[1];
        if (digits === undefined) continue;
        const code = Number.parseInt(digits, 10);
        // Codes that do not fit a double exactly are not enum members.
        if (Number.isSafeInteger(code)) {
            values.push(code);
        }
    }
    return isNonEmpty(values) ? values : undefined;
}

// ── Public API ───────────────────────────────────────────

/**
 * Leading integers of `N - text` lines, in order. Repeated codes are
 * kept as they appear.
 *
 * @example
 * extractEnumFromRemarks('0 - Success\n1 - Failure') → [0, 1]
 */
export function extractEnumFromRemarks(remarks: string): readonly [number, ...number[]] | undefined {
    if (!remarks) return undefined;
    return collectLeadingInts(remarks, REMARK_ENUM_LINE);
}

/**
 * Leading integers of `N => text` lines (output value tables).
 *
 * @example
 * extractEnumFromValueMap('0 => Pending\n1 => Paid') → [0, 1]
 */
export function extractEnumFromValueMap(value: string): readonly [number, ...number[]] | undefined {
    if (!value) return undefined;
    return collectLeadingInts(value, VALUE_MAP_LINE);
}

/**
 * Guess a string enumeration from a "Possible values:" listing.
 *
 * Marker lines at the top and bare `format:` lines are dropped; each
 * remaining line contributes the text before `=>` (or the whole line).
 * Values are deduplicated in first-seen order.
 *
 * @example
 * guessStringEnum('Possible Values:\nA => Approved\nD => Declined') → ['A', 'D']
 */
export function guessStringEnum(value: string): readonly [string, ...string[]] | undefined {
    if (!value || !hasMarker(value)) return undefined;

    const lines = splitLines(value)
        .map(line => line.trim())
        .filter(line => line.length > 0);

    let start = 0;
    while (start < lines.length && hasMarker(lines[start] ?? '')) {
        start++;
    }

    const seen = new Set<string>();
    const values: string[] = [];

    for (const line of lines.slice(start)) {
        if (line.toLowerCase() === 'format:') continue;

        const arrowAt = line.indexOf(ARROW);
        const candidate = (arrowAt >= 0 ? line.slice(0, arrowAt) : line).trim();
        if (!candidate || seen.has(candidate)) continue;

        seen.add(candidate);
        values.push(candidate);
    }

    return isNonEmpty(values) ? values : undefined;
}
