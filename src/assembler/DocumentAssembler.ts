/**
 * DocumentAssembler — Schemas + Metadata → OpenAPI Schema Container
 *
 * The output is an OpenAPI 3.1 document used purely as a container
 * for the plugin's schemas: `servers` and `paths` stay empty, the
 * plugin metadata lives under `x-javascript-plugin`, and everything
 * else is under `components.schemas`.
 *
 * Section order is fixed by assembly, not by build order:
 * init options, redirect result, tokenisation result, result union,
 * error codes.
 *
 * @module
 */
import type { DocumentationSet, OpenApiDocument, SchemaNode } from '../model/types.js';
import { mapping, optionalText, sequence, text, type MappingEntry, type Value } from '../model/Value.js';
import { schemaNames, type GeneratorConfig } from '../config/GeneratorConfig.js';
import { timeStage, type DebugObserverFn } from '../observability/DebugObserver.js';
import { buildInitOptionsSchema } from '../schema/InitOptionsBuilder.js';
import { buildResultSchema, partitionResultTables } from '../schema/ResultSchemaBuilder.js';
import { buildErrorCodeSchema } from '../schema/ErrorCodeBuilder.js';
import { schemaToValue } from '../schema/SchemaLowering.js';
import { renderDocument, type OutputFormat } from '../emitter/DocumentWriter.js';

const SCHEMA_REF_PREFIX = '#/components/schemas/';

export const REDIRECT_RESULT_DESCRIPTION = 'Result payload returned for mode 0 and 2 (redirect/callback).';
export const TOKENISATION_RESULT_DESCRIPTION = 'Result payload returned for mode 1 (tokenisation).';
export const ERROR_CODE_DESCRIPTION = 'Error codes returned by the plugin.';

export interface AssembleOptions {
    /** Clock used when the source has no extraction timestamp */
    readonly now?: () => Date;
    readonly observer?: DebugObserverFn;
}

// ── Build ────────────────────────────────────────────────

/** Build the complete document from one documentation set. */
export function buildDocument(
    set: DocumentationSet,
    config: GeneratorConfig,
    options: AssembleOptions = {},
): OpenApiDocument {
    const { observer } = options;
    const names = schemaNames(config);
    const { plugin } = config;

    const initOptions = timeStage(observer, 'init-options',
        () => buildInitOptionsSchema(set.inputRows, {
            description: `Options passed to \`${plugin.function}(options)\` (${plugin.library}).`,
            ...(observer ? { observer } : {}),
        }),
        schema => schema.properties?.size ?? 0,
    );

    const results = timeStage(observer, 'results', () => {
        const groups = partitionResultTables(set.resultTables);
        return {
            redirect: buildResultSchema(groups.redirect, {
                description: REDIRECT_RESULT_DESCRIPTION,
                ...(observer ? { observer } : {}),
            }),
            tokenisation: buildResultSchema(groups.tokenisation, {
                description: TOKENISATION_RESULT_DESCRIPTION,
                ...(observer ? { observer } : {}),
            }),
        };
    }, r => (r.redirect.properties?.size ?? 0) + (r.tokenisation.properties?.size ?? 0));

    const errorCodes = timeStage(observer, 'error-codes',
        () => buildErrorCodeSchema(set.errorRows, {
            description: ERROR_CODE_DESCRIPTION,
            ...(observer ? { observer } : {}),
        }),
        schema => schema.oneOf?.length ?? 0,
    );

    const resultUnion: SchemaNode = {
        oneOf: [
            { $ref: SCHEMA_REF_PREFIX + names.resultRedirect },
            { $ref: SCHEMA_REF_PREFIX + names.resultTokenisation },
        ],
    };

    const extractedAt = set.metadata.extractedAt || (options.now ?? (() => new Date()))().toISOString();

    return {
        openapi: '3.1.0',
        info: {
            title: config.document.title,
            version: extractedAt.split('T')[0] ?? extractedAt,
            summary: config.document.summary,
            description: describeDocument(set, config),
        },
        servers: [],
        paths: {},
        plugin: {
            library: plugin.library,
            function: plugin.function,
            initCall: plugin.initCall,
            assets: {
                stylesheet: set.codeSample.stylesheetHref ?? null,
                javascript: set.codeSample.javascriptHref ?? null,
            },
            codeSample: set.codeSample.code,
        },
        schemas: new Map<string, SchemaNode>([
            [names.initOptions, initOptions],
            [names.resultRedirect, results.redirect],
            [names.resultTokenisation, results.tokenisation],
            [names.result, resultUnion],
            [names.errorCode, errorCodes],
        ]),
    };
}

// ── Lowering ─────────────────────────────────────────────

/** Value tree for serialization, keys in document order. */
export function documentToValue(doc: OpenApiDocument): Value {
    const schemas = [...doc.schemas].map(([name, node]): MappingEntry => [name, schemaToValue(node)]);

    return mapping([
        ['openapi', text(doc.openapi)],
        ['info', mapping([
            ['title', text(doc.info.title)],
            ['version', text(doc.info.version)],
            ['summary', text(doc.info.summary)],
            ['description', text(doc.info.description)],
        ])],
        ['servers', sequence([])],
        ['paths', mapping([])],
        ['x-javascript-plugin', mapping([
            ['library', text(doc.plugin.library)],
            ['function', text(doc.plugin.function)],
            ['initCall', text(doc.plugin.initCall)],
            ['assets', mapping([
                ['stylesheet', optionalText(doc.plugin.assets.stylesheet)],
                ['javascript', optionalText(doc.plugin.assets.javascript)],
            ])],
            ['codeSample', text(doc.plugin.codeSample)],
        ])],
        ['components', mapping([
            ['schemas', mapping(schemas)],
        ])],
    ]);
}

// ── Pipeline ─────────────────────────────────────────────

/**
 * Documentation set → serialized document text.
 *
 * @example
 * ```typescript
 * const set = parseSourceDocument(JSON.parse(raw));
 * const yaml = generate(set, DEFAULT_CONFIG, 'yaml');
 * ```
 */
export function generate(
    set: DocumentationSet,
    config: GeneratorConfig,
    format: OutputFormat,
    options: AssembleOptions = {},
): string {
    const doc = timeStage(options.observer, 'assemble', () => buildDocument(set, config, options), d => d.schemas.size);
    return timeStage(options.observer, 'emit', () => renderDocument(documentToValue(doc), format), out => out.length);
}

// ── Internal ─────────────────────────────────────────────

function describeDocument(set: DocumentationSet, config: GeneratorConfig): string {
    return [
        'This OpenAPI 3.1 document is intentionally not a server-side REST API specification.',
        '',
        'It exists so OpenAPI-capable tooling can consume a single canonical spec describing:',
        `- JavaScript plugin init options passed to \`${config.plugin.function}(options)\``,
        '- Result payloads delivered via redirect URL query string and/or callbackUrl',
        '',
        `Source page: ${set.metadata.url ?? 'unknown'}`,
        `HTML SHA256: ${set.metadata.htmlSha256 ?? 'unknown'}`,
    ].join('\n');
}
