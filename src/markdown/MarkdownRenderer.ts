/**
 * MarkdownRenderer — Human-Readable Digest of a Documentation Set
 *
 * Rendered from the structured rows only, never from page markup.
 * Multi-line cells become nested bullets rather than table cells.
 * Rows carrying `md_*` columns (see {@link normalizeDocument}) use
 * those pre-escaped keys.
 *
 * @module
 */
import type { DocumentationRow, DocumentationSet } from '../model/types.js';
import { cleanCode, cleanProse, normalizeCellText } from '../source/CellText.js';
import { escapeMarkdownBold } from '../source/Curation.js';
import { splitLines } from '../extractors/EnumExtractors.js';
import { cell, COLUMNS } from '../schema/RowCells.js';

export interface MarkdownOptions {
    /** Top-level heading */
    readonly title?: string;
}

const DEFAULT_TITLE = 'TravelPay Demo Extract';

// ── Helpers ──────────────────────────────────────────────

/** Inline code span; backticks inside are escaped. */
export function inlineCode(value: string): string {
    const s = value.trim();
    if (!s) return '``';
    return '`' + s.replace(/`/g, '\\`') + '`';
}

function collapse(value: string): string {
    return value.trim().replace(/\s+/g, ' ');
}

/** Cell text after artifact cleanup, one entry per non-blank line. */
function nonBlankLines(value: string): string[] {
    return splitLines(normalizeCellText(value))
        .map(line => line.trim())
        .filter(line => line.length > 0);
}

/** Bold key, then the value inline (one line) or as nested bullets. */
function pushEntry(out: string[], key: string, lines: readonly string[], meta = ''): void {
    const [first] = lines;
    if (first === undefined) {
        out.push(`- **${key}**${meta}`);
    } else if (lines.length === 1) {
        out.push(`- **${key}**${meta} — ${first}`);
    } else {
        out.push(`- **${key}**${meta}`);
        for (const line of lines) out.push(`  - ${line}`);
    }
}

function joinBullets(out: readonly string[]): string {
    return out.length > 0 ? out.join('\n') + '\n' : '';
}

// ── Sections ─────────────────────────────────────────────

export function renderInputBullets(rows: readonly DocumentationRow[]): string {
    const out: string[] = [];
    for (const row of rows) {
        const field = (cell(row, COLUMNS.fieldName) || cell(row, 'Field')).trim();
        if (!field) continue;

        const key = cell(row, 'md_field').trim() || escapeMarkdownBold(field);
        const metaParts = [collapse(cell(row, COLUMNS.dataType)), collapse(cell(row, COLUMNS.conditional))]
            .filter(part => part.length > 0);
        const meta = metaParts.length > 0 ? ` (${metaParts.join(', ')})` : '';

        pushEntry(out, key, nonBlankLines(cell(row, COLUMNS.remarks)), meta);
    }
    return joinBullets(out);
}

export function renderKeyValueBullets(
    rows: readonly DocumentationRow[],
    keyColumn: string,
    valueColumn: string,
    escapedKeyColumn: string,
): string {
    const out: string[] = [];
    for (const row of rows) {
        const raw = cell(row, keyColumn).trim();
        if (!raw) continue;

        const key = cell(row, escapedKeyColumn).trim() || escapeMarkdownBold(raw);
        pushEntry(out, key, nonBlankLines(cell(row, valueColumn)));
    }
    return joinBullets(out);
}

// ── Public API ───────────────────────────────────────────

export function renderMarkdown(set: DocumentationSet, options: MarkdownOptions = {}): string {
    const { metadata, codeSample } = set;
    const md: string[] = [];

    md.push(`# ${options.title ?? DEFAULT_TITLE}\n\n`);
    md.push(`- Source: ${inlineCode(metadata.url ?? '')}\n`);
    md.push(`- Extracted (UTC): ${inlineCode(metadata.extractedAt ?? '')}\n`);
    if (metadata.htmlSha256) {
        md.push(`- HTML SHA256: ${inlineCode(metadata.htmlSha256)}\n`);
    }
    md.push('\n');

    md.push('## Code Sample\n\n');
    if (codeSample.stylesheetHref || codeSample.stylesheetDisplay) {
        md.push(`- Stylesheet: ${inlineCode(codeSample.stylesheetDisplay ?? '')} (${codeSample.stylesheetHref ?? ''})\n`);
    }
    if (codeSample.javascriptHref || codeSample.javascriptDisplay) {
        md.push(`- Javascript: ${inlineCode(codeSample.javascriptDisplay ?? '')} (${codeSample.javascriptHref ?? ''})\n`);
    }
    md.push('\n');
    if (codeSample.code) {
        md.push('```js\n', cleanCode(codeSample.code) + '\n', '```\n\n');
    }
    if (codeSample.notes.length > 0) {
        md.push('Notes:\n');
        for (const note of codeSample.notes) md.push(`- ${cleanProse(note)}\n`);
        md.push('\n');
    }

    md.push('## Input Parameters\n\n');
    md.push(renderInputBullets(set.inputRows) || '_No rows found._\n');
    md.push('\n');

    md.push('## Return Parameters\n\n');
    if (set.resultTables.length === 0) {
        md.push('_No tables found._\n\n');
    } else {
        set.resultTables.forEach((table, index) => {
            md.push(`### ${table.label.trim() || `Table ${index}`}\n\n`);
            md.push(renderKeyValueBullets(table.rows, COLUMNS.parameter, COLUMNS.value, 'md_parameter') || '_No rows found._\n');
            md.push('\n');
        });
    }

    md.push('## Error Codes\n\n');
    md.push(
        renderKeyValueBullets(set.errorRows, COLUMNS.errorCode, COLUMNS.description, 'md_error_code')
            || '_No error code rows found._\n',
    );
    md.push('\n');

    return md.join('');
}
