#!/usr/bin/env node
/**
 * CLI Entry Point — plugin-schema-gen
 *
 * Usage:
 *   plugin-schema-gen generate -i <doc.json> -o <out.yaml|out.json> [--config <config.yaml>]
 *   plugin-schema-gen markdown -i <doc.json> -o <out.md> [--normalize]
 *   plugin-schema-gen normalize -i <raw.json> -o <out.json>
 *
 * @module
 */
import { readFileSync, writeFileSync, mkdirSync, realpathSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { loadConfig, applyCliOverrides, type CliOverrides } from './config/ConfigLoader.js';
import type { GeneratorConfig } from './config/GeneratorConfig.js';
import { formatForPath, type OutputFormat } from './emitter/DocumentWriter.js';
import { generate } from './assembler/DocumentAssembler.js';
import { parseSourceDocument } from './source/SourceDocument.js';
import { isJsonObject, normalizeDocument } from './source/Curation.js';
import { renderMarkdown } from './markdown/MarkdownRenderer.js';
import { createDebugObserver } from './observability/DebugObserver.js';

// ── Arg Parsing ──────────────────────────────────────────

export interface RawCliArgs {
    readonly command: string;
    readonly input?: string;
    readonly output?: string;
    readonly config?: string;
    readonly format?: OutputFormat;
    readonly title?: string;
    readonly debug: boolean;
    readonly normalize: boolean;
}

export function parseArgs(argv: readonly string[]): RawCliArgs {
    const args = argv.slice(2);
    const command = args[0] ?? '';

    const result: Record<string, string | undefined> = {};
    let debug = false;
    let normalize = false;

    for (let i = 1; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '-i':
            case '--input':
                result['input'] = args[++i];
                break;
            case '-o':
            case '--output':
                result['output'] = args[++i];
                break;
            case '-c':
            case '--config':
                result['config'] = args[++i];
                break;
            case '-f':
            case '--format':
                result['format'] = args[++i];
                break;
            case '--title':
                result['title'] = args[++i];
                break;
            case '--debug':
                debug = true;
                break;
            case '--normalize':
                normalize = true;
                break;
        }
    }

    const format = result['format'];
    if (format !== undefined && format !== 'yaml' && format !== 'json') {
        throw new Error(`Unknown format "${format}". Use yaml or json.`);
    }

    return {
        command,
        ...(result['input'] !== undefined ? { input: result['input'] } : {}),
        ...(result['output'] !== undefined ? { output: result['output'] } : {}),
        ...(result['config'] !== undefined ? { config: result['config'] } : {}),
        ...(format !== undefined ? { format } : {}),
        ...(result['title'] !== undefined ? { title: result['title'] } : {}),
        debug,
        normalize,
    };
}

// ── Commands ─────────────────────────────────────────────

function readJson(path: string): unknown {
    const absPath = resolve(path);
    let content: string;
    try {
        content = readFileSync(absPath, 'utf-8');
    } catch (err) {
        throw new Error(`Cannot read file "${absPath}".`, { cause: err });
    }
    return JSON.parse(content);
}

function writeOutput(path: string, content: string): string {
    const absPath = resolve(path);
    mkdirSync(dirname(absPath), { recursive: true });
    writeFileSync(absPath, content, 'utf-8');
    return absPath;
}

function requirePath(value: string | undefined, flag: string, usage: string): string {
    if (!value) {
        throw new Error(`${flag} is required.\nUsage: ${usage}`);
    }
    return value;
}

function runGenerate(rawArgs: RawCliArgs): void {
    const baseConfig = loadConfig(rawArgs.config);

    const overrides: CliOverrides = {
        ...(rawArgs.input !== undefined ? { input: rawArgs.input } : {}),
        ...(rawArgs.output !== undefined ? { output: rawArgs.output } : {}),
        ...(rawArgs.format !== undefined ? { format: rawArgs.format } : {}),
        ...(rawArgs.title !== undefined ? { title: rawArgs.title } : {}),
    };
    const config: GeneratorConfig = applyCliOverrides(baseConfig, overrides);

    const usage = 'plugin-schema-gen generate -i <doc.json> -o <out.yaml>';
    const inputPath = requirePath(config.input, '--input (-i)', usage);
    const outputPath = requirePath(config.output, '--output (-o)', usage);
    const format = config.format ?? formatForPath(outputPath);

    const set = parseSourceDocument(readJson(inputPath));
    const text = generate(set, config, format, rawArgs.debug ? { observer: createDebugObserver() } : {});

    console.log(`Wrote OpenAPI: ${writeOutput(outputPath, text)}`);
}

function runMarkdown(rawArgs: RawCliArgs): void {
    const usage = 'plugin-schema-gen markdown -i <doc.json> -o <out.md>';
    const inputPath = requirePath(rawArgs.input, '--input (-i)', usage);
    const outputPath = requirePath(rawArgs.output, '--output (-o)', usage);

    const raw = readJson(inputPath);
    const source = rawArgs.normalize && isJsonObject(raw) ? normalizeDocument(raw) : raw;
    const markdown = renderMarkdown(parseSourceDocument(source), rawArgs.title !== undefined ? { title: rawArgs.title } : {});

    console.log(`Wrote: ${writeOutput(outputPath, markdown)}`);
}

function runNormalize(rawArgs: RawCliArgs): void {
    const usage = 'plugin-schema-gen normalize -i <raw.json> -o <out.json>';
    const inputPath = requirePath(rawArgs.input, '--input (-i)', usage);
    const outputPath = requirePath(rawArgs.output, '--output (-o)', usage);

    const raw = readJson(inputPath);
    if (!isJsonObject(raw)) {
        throw new Error(`Expected a JSON object in "${inputPath}".`);
    }

    const normalized = normalizeDocument(raw);
    console.log(`Wrote: ${writeOutput(outputPath, JSON.stringify(normalized, null, 2) + '\n')}`);
}

function printHelp(): void {
    console.log(`
plugin-schema-gen — Plugin documentation → OpenAPI schema container

USAGE:
  plugin-schema-gen <command> -i <file> -o <file> [options]

COMMANDS:
  generate    Build the OpenAPI schema document (YAML, or JSON for *.json)
  markdown    Render a Markdown digest of the documentation
  normalize   Write the curated, Markdown-safe documentation JSON

OPTIONS:
  -i, --input <file>         Processed documentation JSON
  -o, --output <file>        Output file
  -c, --config <file>        Config file (default: auto-detect plugin-schema-gen.yaml)
  -f, --format <yaml|json>   Override the format implied by the output name
  --title <text>             Document title
  --normalize                (markdown) curate the input before rendering
  --debug                    Print pipeline events
  --help                     Show this help message

CONFIG FILE (plugin-schema-gen.yaml):
  input: ./docs/travelpay_demo.json
  output: ./docs/openapi.plugin.yaml
  schemaPrefix: ZpPayment
  document:
    title: My Plugin Schemas
  plugin:
    library: jQuery
    function: $.zpPayment
    initCall: payment.init()
`);
}

// ── Main ─────────────────────────────────────────────────

export function main(argv: readonly string[]): number {
    try {
        const cliArgs = parseArgs(argv);

        switch (cliArgs.command) {
            case 'generate':
                runGenerate(cliArgs);
                return 0;
            case 'markdown':
                runMarkdown(cliArgs);
                return 0;
            case 'normalize':
                runNormalize(cliArgs);
                return 0;
            case '--help':
            case 'help':
            case '':
                printHelp();
                return 0;
            default:
                console.error(`Unknown command: "${cliArgs.command}". Use --help for usage.`);
                return 1;
        }
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }
}

const entry = process.argv[1];
if (entry !== undefined && existsSync(entry) && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
    process.exitCode = main(process.argv);
}
