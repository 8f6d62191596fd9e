/**
 * DebugObserver — Opt-In Pipeline Events
 *
 * Typed events emitted by the schema builders, the assembler and the
 * emitters. Nothing is emitted unless an observer is passed in.
 *
 * @example
 * ```typescript
 * import { createDebugObserver, buildDocument } from 'plugin-schema-gen';
 *
 * // Default: compact console.debug output
 * const doc = buildDocument(set, config, { observer: createDebugObserver() });
 *
 * // Custom handler
 * const events: DebugEvent[] = [];
 * buildDocument(set, config, { observer: (e) => events.push(e) });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Pipeline stage names, in execution order */
export type Stage = 'init-options' | 'results' | 'error-codes' | 'assemble' | 'emit';

/** Table section a row came from */
export type RowSection = 'input' | 'result' | 'error-code';

/**
 * Emitted when a stage completes.
 * `count` is the number of schema properties/alternatives produced
 * (or output length in characters for `emit`).
 */
export interface StageEvent {
    readonly type: 'stage';
    readonly stage: Stage;
    readonly count: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a row is tolerated and skipped (missing key column). */
export interface SkipEvent {
    readonly type: 'skip';
    readonly section: RowSection;
    /** Row index within its table */
    readonly index: number;
    readonly reason: string;
    readonly timestamp: number;
}

/** Emitted when a conditional-requirement rule is synthesized. */
export interface RuleEvent {
    readonly type: 'rule';
    readonly rule: 'timestamp-alias' | 'mode-0-or-2-requires-customer';
    readonly timestamp: number;
}

export type DebugEvent = StageEvent | SkipEvent | RuleEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * Without a handler, events are printed via `console.debug`:
 *
 * ```
 * [plugin-schema-gen] skip      input#3 missing 'Field Name'
 * [plugin-schema-gen] rule      timestamp-alias
 * [plugin-schema-gen] stage     init-options (24) 0.4ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[plugin-schema-gen]';

        switch (event.type) {
            case 'stage':
                console.debug(`${prefix} stage     ${event.stage} (${event.count}) ${event.durationMs.toFixed(1)}ms`);
                break;
            case 'skip':
                console.debug(`${prefix} skip      ${event.section}#${event.index} ${event.reason}`);
                break;
            case 'rule':
                console.debug(`${prefix} rule      ${event.rule}`);
                break;
        }
    };
}

/** Run `fn`, reporting its duration and result size as a stage event. */
export function timeStage<T>(
    observer: DebugObserverFn | undefined,
    stage: Stage,
    fn: () => T,
    count: (result: T) => number,
): T {
    if (!observer) return fn();

    const start = performance.now();
    const result = fn();
    observer({
        type: 'stage',
        stage,
        count: count(result),
        durationMs: performance.now() - start,
        timestamp: Date.now(),
    });
    return result;
}
