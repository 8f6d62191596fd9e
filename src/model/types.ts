/**
 * Schema & Document Types
 *
 * Boundary inputs (documentation rows as produced by the table
 * extractor) and the schema/document structures built from them.
 * These are the contract between the extractors, the schema builders
 * and the document assembler.
 *
 * @module
 */

// ── Documentation Rows ───────────────────────────────────

/**
 * One table row: column header → cell text.
 *
 * Column names used by the builders: `Field Name`, `Data Type`,
 * `Conditional`, `Remarks` (inputs), `Parameter`, `Value` (results),
 * `Error Code`, `Description` (errors).
 */
export type DocumentationRow = Readonly<Record<string, string>>;

/** A return-parameter table and the label found just above it */
export interface ResultTable {
    readonly label: string;
    readonly rows: readonly DocumentationRow[];
}

/** Scalar metadata accompanying the rows */
export interface SourceMetadata {
    readonly url?: string;
    /** ISO-8601 extraction time, e.g. `2025-12-13T09:56:03Z` */
    readonly extractedAt?: string;
    /** SHA-256 of the raw upstream HTML */
    readonly htmlSha256?: string;
}

/** Code sample section: raw sample text, asset links and prose notes */
export interface CodeSample {
    readonly code: string;
    readonly stylesheetHref?: string;
    readonly stylesheetDisplay?: string;
    readonly javascriptHref?: string;
    readonly javascriptDisplay?: string;
    readonly notes: readonly string[];
}

/** Everything the schema builders and assembler consume */
export interface DocumentationSet {
    readonly metadata: SourceMetadata;
    readonly codeSample: CodeSample;
    readonly inputRows: readonly DocumentationRow[];
    readonly resultTables: readonly ResultTable[];
    readonly errorRows: readonly DocumentationRow[];
}

// ── Schema Node (JSON Schema subset) ─────────────────────

export type SchemaType = 'boolean' | 'integer' | 'number' | 'string' | 'object';

/** Homogeneous, non-empty enumeration */
export type EnumValues = readonly [number, ...number[]] | readonly [string, ...string[]];

/**
 * Typed description of one field or payload shape.
 *
 * `pattern` is only set on string-typed nodes. `allOf` carries the
 * conditional-requirement rules (`oneOf` presence rules and `if`/`then`).
 */
export interface SchemaNode {
    readonly $ref?: string;
    readonly type?: SchemaType;
    readonly const?: string;
    readonly description?: string;
    readonly pattern?: string;
    readonly examples?: readonly string[];
    readonly enum?: EnumValues;
    /** Original JS semantic for `function`-typed options (`x-javascriptType`) */
    readonly javascriptType?: 'function';
    readonly additionalProperties?: boolean;
    readonly properties?: ReadonlyMap<string, SchemaNode>;
    readonly required?: readonly string[];
    readonly oneOf?: readonly SchemaNode[];
    readonly allOf?: readonly SchemaNode[];
    readonly if?: SchemaNode;
    readonly then?: SchemaNode;
}

// ── OpenAPI Document ─────────────────────────────────────

export interface DocumentInfo {
    readonly title: string;
    readonly version: string;
    readonly summary: string;
    readonly description: string;
}

/** `x-javascript-plugin` extension block */
export interface PluginExtension {
    readonly library: string;
    readonly function: string;
    readonly initCall: string;
    readonly assets: {
        readonly stylesheet: string | null;
        readonly javascript: string | null;
    };
    readonly codeSample: string;
}

/**
 * Schema container for a JavaScript plugin. Not a REST API:
 * `servers` and `paths` are always empty.
 */
export interface OpenApiDocument {
    readonly openapi: '3.1.0';
    readonly info: DocumentInfo;
    readonly servers: readonly [];
    readonly paths: Readonly<Record<string, never>>;
    readonly plugin: PluginExtension;
    /** Insertion order is output order */
    readonly schemas: ReadonlyMap<string, SchemaNode>;
}
