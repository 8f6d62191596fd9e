/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `plugin-schema-gen.yaml` from cwd or a specified path,
 * validates the structure, and merges with defaults. CLI args
 * override file values.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { mergeConfig, type GeneratorConfig, type PartialConfig } from './GeneratorConfig.js';
import { ConfigValidationError } from './ConfigValidationError.js';

// ── Filename Conventions ─────────────────────────────────

const CONFIG_FILENAMES = [
    'plugin-schema-gen.yaml',
    'plugin-schema-gen.yml',
    'plugin-schema-gen.json',
];

// ── File Schema ──────────────────────────────────────────

const PartialConfigSchema = z.object({
    input: z.string().optional(),
    output: z.string().optional(),
    format: z.enum(['yaml', 'json']).optional(),
    schemaPrefix: z.string().min(1).optional(),
    document: z.object({
        title: z.string().optional(),
        summary: z.string().optional(),
    }).optional(),
    plugin: z.object({
        library: z.string().optional(),
        function: z.string().optional(),
        initCall: z.string().optional(),
    }).optional(),
}).strict();

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `plugin-schema-gen.yaml` in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @throws {ConfigValidationError} If the file content does not match the config shape
 */
export function loadConfig(configPath?: string, cwd?: string): GeneratorConfig {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new Error(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return mergeConfig({});
}

/** Parse and validate config text (YAML, which also accepts JSON). */
export function parseConfigText(content: string, source = '(inline)'): GeneratorConfig {
    const raw: unknown = parseYaml(content) ?? {};
    const result = PartialConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigValidationError(source, result.error);
    }
    const partial: PartialConfig = result.data;
    return mergeConfig(partial);
}

/**
 * Merge a loaded config with CLI argument overrides.
 *
 * CLI args take precedence over file values.
 */
export function applyCliOverrides(config: GeneratorConfig, cli: CliOverrides): GeneratorConfig {
    return {
        ...config,
        ...(cli.input !== undefined ? { input: cli.input } : {}),
        ...(cli.output !== undefined ? { output: cli.output } : {}),
        ...(cli.format !== undefined ? { format: cli.format } : {}),
        document: {
            ...config.document,
            ...(cli.title !== undefined ? { title: cli.title } : {}),
        },
    };
}

/** CLI arguments that can override config file values */
export interface CliOverrides {
    readonly input?: string;
    readonly output?: string;
    readonly format?: GeneratorConfig['format'];
    readonly title?: string;
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): GeneratorConfig {
    return parseConfigText(readFileSync(filePath, 'utf-8'), filePath);
}
