/**
 * Curation — Raw Extraction → Normalized (Markdown-Safe) Document
 *
 * Produces a second document from the raw extraction snapshot; the
 * input is never modified:
 *
 * - `md_field` / `md_parameter` / `md_error_code`: key copies escaped
 *   for use inside Markdown bold
 * - `metadata.normalized_at`, `metadata.normalized_from_html_sha256`
 * - the `fingerprint` row keeps only the v5 (SHA3-512) guidance
 *
 * @module
 */

export type JsonObject = Record<string, unknown>;

export const FINGERPRINT_CURATION_NOTE = 'Kept v5 (SHA3-512) only; removed v4/v3 references.';

/** v5-only fingerprint guidance, one item per line. */
export const FINGERPRINT_V5_GUIDANCE = [
    'Fingerprint (v5) is a SHA3-512 hash of the following pipe-delimited string:',
    '`apiKey|userName|password|mode|paymentAmount|merchantUniquePaymentId|timestamp`',
    'Credentials provided by Zenith Payments are case sensitive.',
    'Field notes:',
    '`apiKey`: refer apiKey parameter',
    '`userName`: provided by Zenith Payments',
    '`password`: provided by Zenith Payments',
    '`mode`: refer mode parameter',
    '`paymentAmount`: amount in cents without symbol (e.g. $150.53 => 15053). Pass 0 when mode is 2.',
    '`merchantUniquePaymentId`: refer merchantUniquePaymentId parameter',
    '`timestamp`: current datetime in UTC ISO 8601 format (yyyy-MM-ddTHH:mm:ss).',
].join('\n');

/**
 * Escape characters that break `**bold**` Markdown.
 *
 * @example
 * escapeMarkdownBold('TP*')       → 'TP\\*'
 * escapeMarkdownBold('user_name') → 'user\\_name'
 */
export function escapeMarkdownBold(value: string): string {
    return value
        .replace(/\\/g, '\\\\')
        .replace(/\*/g, '\\*')
        .replace(/_/g, '\\_');
}

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build the normalized document.
 *
 * @param raw - Raw extraction snapshot
 * @param now - Clock for `normalized_at`
 */
export function normalizeDocument(raw: JsonObject, now: () => Date = () => new Date()): JsonObject {
    const doc = structuredClone(raw);

    const rawMetadata = isJsonObject(raw['metadata']) ? raw['metadata'] : {};
    const metadata = isJsonObject(doc['metadata']) ? doc['metadata'] : {};
    metadata['normalized_at'] = now().toISOString();
    metadata['normalized_from_html_sha256'] = rawMetadata['html_sha256'] ?? null;
    doc['metadata'] = metadata;

    const sections = isJsonObject(doc['sections']) ? doc['sections'] : {};

    for (const row of objectRows(sections['input_parameters'], 'rows')) {
        const field = (stringCell(row, 'Field Name') || stringCell(row, 'Field')).trim();
        if (!field) continue;

        row['md_field'] = escapeMarkdownBold(field);
        if (field.toLowerCase() === 'fingerprint') {
            row['Remarks'] = FINGERPRINT_V5_GUIDANCE;
            row['curated'] = true;
            row['curation_note'] = FINGERPRINT_CURATION_NOTE;
        }
    }

    for (const table of objectRows(sections['return_parameters'], 'tables')) {
        for (const row of objectRows(table, 'rows')) {
            const parameter = stringCell(row, 'Parameter').trim();
            if (parameter) row['md_parameter'] = escapeMarkdownBold(parameter);
        }
    }

    for (const row of objectRows(sections['error_codes'], 'rows')) {
        const code = stringCell(row, 'Error Code').trim();
        if (code) row['md_error_code'] = escapeMarkdownBold(code);
    }

    return doc;
}

// ── Internal ─────────────────────────────────────────────

/** Object entries of `container[key]`, when that is an array. */
function objectRows(container: unknown, key: string): JsonObject[] {
    if (!isJsonObject(container)) return [];
    const list = container[key];
    return Array.isArray(list) ? list.filter(isJsonObject) : [];
}

function stringCell(row: JsonObject, key: string): string {
    const value = row[key];
    return typeof value === 'string' ? value : '';
}
