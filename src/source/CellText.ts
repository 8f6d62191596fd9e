/**
 * CellText — Table Cell and Code Text Cleanup
 *
 * Repairs layout artifacts of the upstream documentation tables
 * while keeping meaningful line breaks.
 *
 * @module
 */

/**
 * Normalize one cell's text.
 *
 * @example
 * normalizeCellText('( \n | \n )')        → '(|)'
 * normalizeCellText('apiKey\n : value')   → 'apiKey: value'
 * normalizeCellText('a\n*\nb')            → 'a\nb'
 */
export function normalizeCellText(value: string): string {
    let t = value.replace(/\r\n|\r/g, '\n');

    // "( \n | \n )" → "(|)"
    t = t.replace(/\(\s*\n\s*\|\s*\n\s*\)/g, '(|)');
    // "token \n : value" → "token: value"
    t = t.replace(/\n\s*:\s*/g, ': ');
    // "token: : value" → "token: value"
    t = t.replace(/:\s*:\s*/g, ': ');

    t = t.split('\n')
        .filter(line => line.trim() !== '*' && line.trim() !== '•')
        .join('\n');

    t = t.replace(/[ \t]+\n/g, '\n')
        .replace(/\n[ \t]+/g, '\n')
        .replace(/[ \t]{2,}/g, ' ')
        .replace(/\n{3,}/g, '\n\n');

    return t.trim();
}

/** Normalize, then flatten to a single line of prose. */
export function cleanProse(value: string): string {
    return normalizeCellText(value).replace(/\s+/g, ' ').trim();
}

/**
 * Code block cleanup: unify line endings, trim trailing spaces per
 * line and drop blank lines at both ends. Indentation is kept.
 */
export function cleanCode(value: string): string {
    const lines = value.replace(/\r\n|\r/g, '\n').split('\n').map(line => line.trimEnd());

    let start = 0;
    let end = lines.length;
    while (start < end && (lines[start] ?? '').trim() === '') start++;
    while (end > start && (lines[end - 1] ?? '').trim() === '') end--;

    return lines.slice(start, end).join('\n');
}
