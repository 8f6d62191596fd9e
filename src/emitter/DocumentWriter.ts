/**
 * DocumentWriter — Output Format Dispatch
 *
 * @module
 */
import type { Value } from '../model/Value.js';
import { emitJson } from './JsonEmitter.js';
import { emitYaml } from './YamlEmitter.js';

export type OutputFormat = 'yaml' | 'json';

/** `json` for `*.json` targets, `yaml` for everything else. */
export function formatForPath(path: string): OutputFormat {
    return path.toLowerCase().endsWith('.json') ? 'json' : 'yaml';
}

/** Render a document tree in the selected format. */
export function renderDocument(root: Value, format: OutputFormat): string {
    return format === 'json' ? emitJson(root) : emitYaml(root);
}
