/**
 * @file Context Log
 *
 * Ordered, append-only record of every text input processed, with a
 * response derived per input. State is memory-only and owned by the
 * instance; callers create as many logs as they need.
 *
 * Within one generation the sequence only grows. `reset()` is the
 * explicit end of a generation: it empties the log and bumps the
 * generation counter so observers can tell the lifecycles apart.
 *
 * @module context
 */

import type { MemoryBus } from '../bus/MemoryBus.js';
import type { ContextLogOptions, ContextLogView, ResponseDeriver } from './types.js';

/** Prefix of the default derived response. */
export const RESPONSE_PREFIX = 'processed' as const;

/**
 * Default response: the input echoed behind a fixed prefix.
 */
export function response_derive(input: string): string {
    return `${RESPONSE_PREFIX}: ${input}`;
}

export class ContextLog implements ContextLogView {
    private entries: string[] = [];
    private generationCount: number = 0;
    private readonly deriver: ResponseDeriver;
    private readonly bus: MemoryBus | null;

    constructor(options: ContextLogOptions = {}) {
        this.deriver = options.deriver ?? response_derive;
        this.bus = options.bus ?? null;
    }

    /**
     * Append `input` and return its derived response.
     *
     * Accepts any string, including the empty string. The append and the
     * derivation run without yielding, so no caller can observe one
     * without the other.
     */
    record(input: string): string {
        this.entries.push(input);
        const response: string = this.deriver(input);
        this.bus?.emit({ type: 'record', input, response, index: this.entries.length - 1 });
        return response;
    }

    /**
     * Frozen snapshot of the log in insertion order.
     */
    history(): readonly string[] {
        return Object.freeze([...this.entries]);
    }

    /**
     * Recorded inputs containing `query`, most recent first.
     *
     * Plain substring match; the empty query matches every entry.
     */
    recall(query: string): readonly string[] {
        const matches: string[] = [];
        for (let i = this.entries.length - 1; i >= 0; i--) {
            if (this.entries[i].includes(query)) {
                matches.push(this.entries[i]);
            }
        }
        return Object.freeze(matches);
    }

    size(): number {
        return this.entries.length;
    }

    /**
     * Number of times this log has been reset.
     */
    generation(): number {
        return this.generationCount;
    }

    /**
     * End the current generation and start an empty one.
     */
    reset(): void {
        this.entries = [];
        this.generationCount++;
        this.bus?.emit({ type: 'reset', generation: this.generationCount });
    }
}
