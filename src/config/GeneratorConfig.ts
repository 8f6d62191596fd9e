/**
 * GeneratorConfig — Configuration for the Plugin Schema Generator
 *
 * Controls document metadata, schema naming, plugin metadata and the
 * output format. Can be loaded from a YAML file
 * (`plugin-schema-gen.yaml`) or passed programmatically.
 *
 * @module
 */
import type { OutputFormat } from '../emitter/DocumentWriter.js';

// ── Document Config ──────────────────────────────────────

/** `info` block text */
export interface DocumentConfig {
    readonly title: string;
    readonly summary: string;
}

// ── Plugin Config ────────────────────────────────────────

/** Values for the `x-javascript-plugin` extension block */
export interface PluginConfig {
    /** Host library, e.g. `jQuery` */
    readonly library: string;
    /** Entry point called with the init options */
    readonly function: string;
    /** Call that starts the payment flow */
    readonly initCall: string;
}

// ── Full Config ──────────────────────────────────────────

export interface GeneratorConfig {
    /** Processed documentation JSON */
    readonly input?: string;
    /** Output file; its extension picks the format unless `format` is set */
    readonly output?: string;
    readonly format?: OutputFormat;
    /** Prefix for every `components.schemas` name */
    readonly schemaPrefix: string;
    readonly document: DocumentConfig;
    readonly plugin: PluginConfig;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: GeneratorConfig = {
    schemaPrefix: 'ZpPayment',
    document: {
        title: 'TravelPay / Zenith Payments - zpPayment JavaScript Plugin Schemas (v5)',
        summary: 'OpenAPI used as a schema container for the zpPayment JavaScript plugin (not an HTTP API).',
    },
    plugin: {
        library: 'jQuery',
        function: '$.zpPayment',
        initCall: 'payment.init()',
    },
};

// ── Merge Helper ─────────────────────────────────────────

/** Partial config shape for merging */
export interface PartialConfig {
    readonly input?: string;
    readonly output?: string;
    readonly format?: OutputFormat;
    readonly schemaPrefix?: string;
    readonly document?: Partial<DocumentConfig>;
    readonly plugin?: Partial<PluginConfig>;
}

/**
 * Deep-merge a partial config with defaults.
 * Partial values override defaults at each level.
 */
export function mergeConfig(partial: PartialConfig): GeneratorConfig {
    return {
        ...(partial.input !== undefined ? { input: partial.input } : {}),
        ...(partial.output !== undefined ? { output: partial.output } : {}),
        ...(partial.format !== undefined ? { format: partial.format } : {}),
        schemaPrefix: partial.schemaPrefix ?? DEFAULT_CONFIG.schemaPrefix,
        document: {
            title: partial.document?.title ?? DEFAULT_CONFIG.document.title,
            summary: partial.document?.summary ?? DEFAULT_CONFIG.document.summary,
        },
        plugin: {
            library: partial.plugin?.library ?? DEFAULT_CONFIG.plugin.library,
            function: partial.plugin?.function ?? DEFAULT_CONFIG.plugin.function,
            initCall: partial.plugin?.initCall ?? DEFAULT_CONFIG.plugin.initCall,
        },
    };
}

// ── Schema Names ─────────────────────────────────────────

export interface SchemaNames {
    readonly initOptions: string;
    readonly resultRedirect: string;
    readonly resultTokenisation: string;
    readonly result: string;
    readonly errorCode: string;
}

/** `components.schemas` names, in output order */
export function schemaNames(config: GeneratorConfig): SchemaNames {
    const p = config.schemaPrefix;
    return {
        initOptions: `${p}InitOptions`,
        resultRedirect: `${p}ResultMode0or2`,
        resultTokenisation: `${p}ResultMode1`,
        result: `${p}Result`,
        errorCode: `${p}ErrorCode`,
    };
}
