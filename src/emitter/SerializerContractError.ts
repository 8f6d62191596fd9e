/**
 * SerializerContractError — Malformed Value Tree
 *
 * Raised when a tree handed to the emitters breaks the Value contract
 * (duplicate mapping keys, unsupported nodes). Trees produced by the
 * schema builders never trigger it.
 *
 * @example
 * ```typescript
 * try {
 *     emitYaml(mapping([['a', int(1)], ['a', int(2)]]));
 * } catch (e) {
 *     if (e instanceof SerializerContractError) {
 *         console.log(e.path);    // []
 *         console.log(e.message); // "Duplicate mapping key 'a' at (root)"
 *     }
 * }
 * ```
 *
 * @module
 */

export class SerializerContractError extends Error {
    /** Keys/indices leading to the offending node */
    readonly path: readonly string[];

    constructor(reason: string, path: readonly string[]) {
        const at = path.length > 0 ? `'${path.join('.')}'` : '(root)';
        super(`${reason} at ${at}`);
        this.name = 'SerializerContractError';
        this.path = path;
    }
}
