/**
 * plugin-schema-gen — Root Barrel Export
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```typescript
 * import { parseSourceDocument, generate, DEFAULT_CONFIG } from 'plugin-schema-gen';
 *
 * const set = parseSourceDocument(JSON.parse(json));
 * const yaml = generate(set, DEFAULT_CONFIG, 'yaml');
 * ```
 *
 * @module
 */

// ── Config ───────────────────────────────────────────────
export { mergeConfig, schemaNames, DEFAULT_CONFIG } from './config/GeneratorConfig.js';
export type {
    GeneratorConfig, PartialConfig, DocumentConfig, PluginConfig, SchemaNames,
} from './config/GeneratorConfig.js';
export { loadConfig, parseConfigText, applyCliOverrides } from './config/ConfigLoader.js';
export type { CliOverrides } from './config/ConfigLoader.js';
export { ConfigValidationError } from './config/ConfigValidationError.js';

// ── Model ────────────────────────────────────────────────
export {
    NULL, bool, int, float, text, optionalText, mapping, sequence,
    isContainer, toValue, fromValue,
} from './model/Value.js';
export type {
    Value, ScalarValue, NullValue, BoolValue, IntValue, FloatValue, TextValue,
    MappingValue, MappingEntry, SequenceValue,
} from './model/Value.js';
export type {
    DocumentationRow, ResultTable, SourceMetadata, CodeSample, DocumentationSet,
    SchemaType, EnumValues, SchemaNode, DocumentInfo, PluginExtension, OpenApiDocument,
} from './model/types.js';

// ── Emitters ─────────────────────────────────────────────
export { formatScalar, formatKey, needsQuoting, quote } from './emitter/ScalarFormatter.js';
export { emitYaml } from './emitter/YamlEmitter.js';
export { emitJson } from './emitter/JsonEmitter.js';
export { renderDocument, formatForPath } from './emitter/DocumentWriter.js';
export type { OutputFormat } from './emitter/DocumentWriter.js';
export { SerializerContractError } from './emitter/SerializerContractError.js';

// ── Pattern Extractors ───────────────────────────────────
export {
    extractEnumFromRemarks, extractEnumFromValueMap, guessStringEnum,
} from './extractors/EnumExtractors.js';
export {
    isoTimestampSchema, isoDateSchema, ISO_TIMESTAMP_PATTERN, ISO_DATE_PATTERN,
} from './extractors/DateTemplates.js';

// ── Schema Builders ──────────────────────────────────────
export { mapDataType } from './schema/TypeMapper.js';
export type { MappedType } from './schema/TypeMapper.js';
export { FIELD_OVERRIDES, applyFieldOverride } from './schema/FieldOverrides.js';
export type { FieldOverride } from './schema/FieldOverrides.js';
export { buildInitOptionsSchema, buildInitProperty } from './schema/InitOptionsBuilder.js';
export { buildResultSchema, buildResultProperty, partitionResultTables } from './schema/ResultSchemaBuilder.js';
export { buildErrorCodeSchema, buildErrorCodeAlternative } from './schema/ErrorCodeBuilder.js';
export { schemaToValue } from './schema/SchemaLowering.js';

// ── Document Assembler ───────────────────────────────────
export { buildDocument, documentToValue, generate } from './assembler/DocumentAssembler.js';
export type { AssembleOptions } from './assembler/DocumentAssembler.js';

// ── Source Documents ─────────────────────────────────────
export { parseSourceDocument, toRows } from './source/SourceDocument.js';
export { SourceValidationError } from './source/SourceValidationError.js';
export { normalizeCellText, cleanProse, cleanCode } from './source/CellText.js';
export { normalizeDocument, escapeMarkdownBold } from './source/Curation.js';
export { renderMarkdown } from './markdown/MarkdownRenderer.js';

// ── Observability ────────────────────────────────────────
export { createDebugObserver } from './observability/DebugObserver.js';
export type { DebugEvent, DebugObserverFn, StageEvent, SkipEvent, RuleEvent } from './observability/DebugObserver.js';
