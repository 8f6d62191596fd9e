import { describe, it, expect } from 'vitest';
import {
    buildDocument, documentToValue, ERROR_CODE_DESCRIPTION, generate,
    REDIRECT_RESULT_DESCRIPTION, TOKENISATION_RESULT_DESCRIPTION,
} from '../../src/assembler/DocumentAssembler.js';
import { DEFAULT_CONFIG, mergeConfig } from '../../src/config/GeneratorConfig.js';
import { fromValue } from '../../src/model/Value.js';
import type { DocumentationSet } from '../../src/model/types.js';
import type { DebugEvent } from '../../src/observability/DebugObserver.js';

// ============================================================================
// DocumentAssembler Tests
// ============================================================================

const SET: DocumentationSet = {
    metadata: {
        url: 'https://docs.example.test/plugin',
        extractedAt: '2025-12-13T09:56:03Z',
        htmlSha256: 'abc123',
    },
    codeSample: {
        code: '$.zpPayment({ mode: 0 });\npayment.init();',
        javascriptHref: 'https://cdn.example.test/p.js',
        notes: [],
    },
    inputRows: [
        { 'Field Name': 'mode', 'Data Type': 'Integer', 'Conditional': 'Required', 'Remarks': 'Payment mode' },
        { 'Field Name': 'timestamp', 'Data Type': 'String', 'Conditional': 'Required', 'Remarks': '' },
        { 'Field Name': 'customerName', 'Data Type': 'String', 'Conditional': 'Optional', 'Remarks': 'Required if mode is set to 0 or 2' },
        { 'Field Name': 'onPluginClose', 'Data Type': 'function', 'Conditional': 'Optional', 'Remarks': '' },
    ],
    resultTables: [
        {
            label: 'Mode 0 and 2',
            rows: [
                { Parameter: 'PaymentStatus', Value: '0 => Pending\n1 => Paid' },
                { Parameter: 'ProcessingDate', Value: '' },
            ],
        },
        { label: 'Mode 1', rows: [{ Parameter: 'Token', Value: '' }] },
    ],
    errorRows: [
        { 'Error Code': 'E01', 'Description': 'Invalid key' },
        { 'Error Code': 'TP*', 'Description': 'Gateway' },
    ],
};

const NOW = (): Date => new Date('2026-01-02T03:04:05.000Z');

describe('DocumentAssembler', () => {
    // ── buildDocument ──

    describe('buildDocument()', () => {
        const doc = buildDocument(SET, DEFAULT_CONFIG, { now: NOW });

        it('should fill the info block from config and metadata', () => {
            expect(doc.openapi).toBe('3.1.0');
            expect(doc.info.title).toBe(DEFAULT_CONFIG.document.title);
            expect(doc.info.summary).toBe(DEFAULT_CONFIG.document.summary);
            expect(doc.info.version).toBe('2025-12-13');
        });

        it('should describe the source page and hash', () => {
            const lines = doc.info.description.split('\n');
            expect(lines[0]).toBe('This OpenAPI 3.1 document is intentionally not a server-side REST API specification.');
            expect(lines).toContain('- JavaScript plugin init options passed to `$.zpPayment(options)`');
            expect(lines.slice(-2)).toEqual([
                'Source page: https://docs.example.test/plugin',
                'HTML SHA256: abc123',
            ]);
        });

        it('should keep servers and paths empty', () => {
            expect(doc.servers).toEqual([]);
            expect(doc.paths).toEqual({});
        });

        it('should carry plugin metadata with null for a missing asset', () => {
            expect(doc.plugin).toEqual({
                library: 'jQuery',
                function: '$.zpPayment',
                initCall: 'payment.init()',
                assets: { stylesheet: null, javascript: 'https://cdn.example.test/p.js' },
                codeSample: '$.zpPayment({ mode: 0 });\npayment.init();',
            });
        });

        it('should order the schemas by section', () => {
            expect([...doc.schemas.keys()]).toEqual([
                'ZpPaymentInitOptions',
                'ZpPaymentResultMode0or2',
                'ZpPaymentResultMode1',
                'ZpPaymentResult',
                'ZpPaymentErrorCode',
            ]);
        });

        it('should build the init options with alias and rules', () => {
            const init = doc.schemas.get('ZpPaymentInitOptions');
            expect(init?.description).toBe('Options passed to `$.zpPayment(options)` (jQuery).');
            expect([...(init?.properties?.keys() ?? [])]).toEqual([
                'mode', 'timestamp', 'customerName', 'onPluginClose', 'timeStamp',
            ]);
            expect(init?.required).toEqual(['mode']);
            expect(init?.allOf).toHaveLength(2);
            expect(init?.properties?.get('onPluginClose')?.javascriptType).toBe('function');
        });

        it('should split results by mode', () => {
            const redirect = doc.schemas.get('ZpPaymentResultMode0or2');
            const tokenisation = doc.schemas.get('ZpPaymentResultMode1');

            expect(redirect?.description).toBe(REDIRECT_RESULT_DESCRIPTION);
            expect([...(redirect?.properties?.keys() ?? [])]).toEqual(['PaymentStatus', 'ProcessingDate']);
            expect(redirect?.properties?.get('PaymentStatus')?.enum).toEqual([0, 1]);
            expect(tokenisation?.description).toBe(TOKENISATION_RESULT_DESCRIPTION);
            expect([...(tokenisation?.properties?.keys() ?? [])]).toEqual(['Token']);
        });

        it('should reference both result variants from the union', () => {
            expect(doc.schemas.get('ZpPaymentResult')).toEqual({
                oneOf: [
                    { $ref: '#/components/schemas/ZpPaymentResultMode0or2' },
                    { $ref: '#/components/schemas/ZpPaymentResultMode1' },
                ],
            });
        });

        it('should build the error codes', () => {
            expect(doc.schemas.get('ZpPaymentErrorCode')).toEqual({
                type: 'string',
                description: ERROR_CODE_DESCRIPTION,
                oneOf: [
                    { const: 'E01', description: 'Invalid key' },
                    { type: 'string', description: 'Gateway', pattern: '^TP.*$' },
                ],
            });
        });
    });

    // ── Fallbacks & Config ──

    describe('fallbacks', () => {
        const empty: DocumentationSet = {
            metadata: {},
            codeSample: { code: '', notes: [] },
            inputRows: [],
            resultTables: [],
            errorRows: [],
        };

        it('should take the version from the clock without an extraction time', () => {
            expect(buildDocument(empty, DEFAULT_CONFIG, { now: NOW }).info.version).toBe('2026-01-02');
        });

        it('should take the version from the clock for an empty extraction time', () => {
            const blank: DocumentationSet = { ...empty, metadata: { extractedAt: '' } };
            expect(buildDocument(blank, DEFAULT_CONFIG, { now: NOW }).info.version).toBe('2026-01-02');
        });

        it('should write unknown for a missing url and hash', () => {
            const lines = buildDocument(empty, DEFAULT_CONFIG, { now: NOW }).info.description.split('\n');
            expect(lines.slice(-2)).toEqual(['Source page: unknown', 'HTML SHA256: unknown']);
        });

        it('should still emit every schema for an empty set', () => {
            const doc = buildDocument(empty, DEFAULT_CONFIG, { now: NOW });
            expect(doc.schemas.size).toBe(5);
            expect(doc.schemas.get('ZpPaymentErrorCode')).toEqual({ type: 'string', description: ERROR_CODE_DESCRIPTION });
        });

        it('should use the configured prefix in names and references', () => {
            const doc = buildDocument(empty, mergeConfig({ schemaPrefix: 'Acme' }), { now: NOW });
            expect([...doc.schemas.keys()]).toEqual([
                'AcmeInitOptions', 'AcmeResultMode0or2', 'AcmeResultMode1', 'AcmeResult', 'AcmeErrorCode',
            ]);
            expect(doc.schemas.get('AcmeResult')?.oneOf?.[1]).toEqual({ $ref: '#/components/schemas/AcmeResultMode1' });
        });
    });

    // ── Lowering & Pipeline ──

    describe('documentToValue()', () => {
        it('should order the top-level keys', () => {
            const data = fromValue(documentToValue(buildDocument(SET, DEFAULT_CONFIG, { now: NOW })));
            expect(typeof data === 'object' && data !== null ? Object.keys(data) : []).toEqual([
                'openapi', 'info', 'servers', 'paths', 'x-javascript-plugin', 'components',
            ]);
        });
    });

    describe('generate()', () => {
        it('should start the YAML output with the document header', () => {
            const yaml = generate(SET, DEFAULT_CONFIG, 'yaml', { now: NOW });
            expect(yaml.split('\n').slice(0, 4)).toEqual([
                'openapi: 3.1.0',
                'info:',
                `  title: ${DEFAULT_CONFIG.document.title}`,
                '  version: 2025-12-13',
            ]);
        });

        it('should produce byte-identical output for repeated runs', () => {
            expect(generate(SET, DEFAULT_CONFIG, 'json', { now: NOW })).toBe(generate(SET, DEFAULT_CONFIG, 'json', { now: NOW }));
        });

        it('should report every stage in order', () => {
            const events: DebugEvent[] = [];
            generate(SET, DEFAULT_CONFIG, 'yaml', { now: NOW, observer: e => events.push(e) });

            const stages = events.flatMap(e => e.type === 'stage' ? [[e.stage, e.count]] : []);
            expect(stages.slice(0, 4)).toEqual([
                ['init-options', 5],
                ['results', 3],
                ['error-codes', 2],
                ['assemble', 5],
            ]);
            expect(stages[4]?.[0]).toBe('emit');

            const rules = events.flatMap(e => e.type === 'rule' ? [e.rule] : []);
            expect(rules).toEqual(['timestamp-alias', 'mode-0-or-2-requires-customer']);
        });
    });
});
