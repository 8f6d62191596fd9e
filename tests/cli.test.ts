import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { main, parseArgs } from '../src/cli.js';

// ============================================================================
// CLI Tests
// ============================================================================

const SOURCE = {
    metadata: { url: 'https://docs.example.test/plugin', extracted_at: '2025-12-13T09:56:03Z', html_sha256: 'abc123' },
    sections: {
        code_sample: { code: 'payment.init();', notes: [] },
        input_parameters: {
            rows: [
                { 'Field Name': 'api_key', 'Data Type': 'String', 'Conditional': 'Required', 'Remarks': 'Provided key' },
                { 'Field Name': 'fingerprint', 'Data Type': 'String', 'Conditional': 'Required', 'Remarks': 'Legacy guidance' },
            ],
        },
        return_parameters: { tables: [{ label: 'Mode 1', rows: [{ Parameter: 'Token', Value: 'Card token' }] }] },
        error_codes: { rows: [{ 'Error Code': 'E01', 'Description': 'Invalid key' }] },
    },
};

describe('parseArgs()', () => {
    it('should read the command and every flag', () => {
        expect(parseArgs([
            'node', 'cli.js', 'generate',
            '-i', 'in.json', '--output', 'out.yaml', '-c', 'cfg.yaml',
            '--format', 'json', '--title', 'T', '--debug',
        ])).toEqual({
            command: 'generate',
            input: 'in.json',
            output: 'out.yaml',
            config: 'cfg.yaml',
            format: 'json',
            title: 'T',
            debug: true,
            normalize: false,
        });
    });

    it('should leave absent flags out', () => {
        expect(parseArgs(['node', 'cli.js', 'markdown', '--normalize'])).toEqual({
            command: 'markdown',
            debug: false,
            normalize: true,
        });
    });

    it('should read an empty command when none is given', () => {
        expect(parseArgs(['node', 'cli.js']).command).toBe('');
    });

    it('should reject an unknown format', () => {
        expect(() => parseArgs(['node', 'cli.js', 'generate', '-f', 'xml'])).toThrow('Unknown format "xml". Use yaml or json.');
    });
});

describe('main()', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'plugin-schema-gen-cli-'));
        writeFileSync(join(dir, 'doc.json'), JSON.stringify(SOURCE));
        writeFileSync(join(dir, 'config.yaml'), 'schemaPrefix: Acme\n');
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    const run = (...args: string[]): number => main(['node', 'cli.js', ...args]);

    // ── generate ──

    it('should write a YAML document', () => {
        const out = join(dir, 'out', 'openapi.plugin.yaml');
        expect(run('generate', '-i', join(dir, 'doc.json'), '-o', out, '-c', join(dir, 'config.yaml'))).toBe(0);

        const doc: unknown = parseYaml(readFileSync(out, 'utf-8'));
        expect(doc).toMatchObject({
            openapi: '3.1.0',
            info: { version: '2025-12-13' },
            components: { schemas: { AcmeInitOptions: { required: ['api_key', 'fingerprint'] } } },
        });
        expect(console.log).toHaveBeenCalledWith(`Wrote OpenAPI: ${out}`);
    });

    it('should pick JSON from the output extension', () => {
        const out = join(dir, 'openapi.plugin.json');
        expect(run('generate', '-i', join(dir, 'doc.json'), '-o', out, '-c', join(dir, 'config.yaml'))).toBe(0);
        expect(JSON.parse(readFileSync(out, 'utf-8'))).toMatchObject({ info: { title: expect.any(String) } });
    });

    it('should let --format and --title override the defaults', () => {
        const out = join(dir, 'openapi.txt');
        const code = run(
            'generate', '-i', join(dir, 'doc.json'), '-o', out,
            '-c', join(dir, 'config.yaml'), '-f', 'json', '--title', 'Custom Title',
        );
        expect(code).toBe(0);
        expect(JSON.parse(readFileSync(out, 'utf-8'))).toMatchObject({ info: { title: 'Custom Title' } });
    });

    it('should fail when the input is missing', () => {
        expect(run('generate', '-o', join(dir, 'x.yaml'), '-c', join(dir, 'config.yaml'))).toBe(1);
        expect(console.error).toHaveBeenCalledWith(
            'Error: --input (-i) is required.\nUsage: plugin-schema-gen generate -i <doc.json> -o <out.yaml>',
        );
    });

    it('should fail on a document that is not an object', () => {
        writeFileSync(join(dir, 'bad.json'), '[]');
        expect(run('generate', '-i', join(dir, 'bad.json'), '-o', join(dir, 'x.yaml'), '-c', join(dir, 'config.yaml'))).toBe(1);
        expect(vi.mocked(console.error).mock.calls[0]?.[0]).toMatch(/^Error: \[source document\] Validation failed:/);
    });

    it('should fail on an unreadable input file', () => {
        const missing = join(dir, 'missing.json');
        expect(run('generate', '-i', missing, '-o', join(dir, 'x.yaml'), '-c', join(dir, 'config.yaml'))).toBe(1);
        expect(console.error).toHaveBeenCalledWith(`Error: Cannot read file "${missing}".`);
    });

    // ── markdown / normalize ──

    it('should render Markdown, curated with --normalize', () => {
        const out = join(dir, 'doc.md');
        expect(run('markdown', '-i', join(dir, 'doc.json'), '-o', out, '--normalize', '--title', 'Plugin Docs')).toBe(0);

        const lines = readFileSync(out, 'utf-8').split('\n');
        expect(lines[0]).toBe('# Plugin Docs');
        expect(lines).toContain('- **api\\_key** (String, Required) — Provided key');
        expect(lines).toContain('  - Fingerprint (v5) is a SHA3-512 hash of the following pipe-delimited string:');
    });

    it('should write the normalized JSON', () => {
        const out = join(dir, 'normalized.json');
        expect(run('normalize', '-i', join(dir, 'doc.json'), '-o', out)).toBe(0);

        const doc: unknown = JSON.parse(readFileSync(out, 'utf-8'));
        expect(doc).toMatchObject({
            metadata: { normalized_from_html_sha256: 'abc123' },
            sections: { input_parameters: { rows: [{ md_field: 'api\\_key' }, { curated: true }] } },
        });
    });

    it('should refuse to normalize a non-object document', () => {
        writeFileSync(join(dir, 'list.json'), '[1]');
        expect(run('normalize', '-i', join(dir, 'list.json'), '-o', join(dir, 'n.json'))).toBe(1);
    });

    // ── help / unknown ──

    it('should print help', () => {
        expect(run('--help')).toBe(0);
        expect(vi.mocked(console.log).mock.calls[0]?.[0]).toContain('USAGE:');
    });

    it('should reject an unknown command', () => {
        expect(run('publish')).toBe(1);
        expect(console.error).toHaveBeenCalledWith('Unknown command: "publish". Use --help for usage.');
    });
});
