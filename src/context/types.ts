/**
 * @file Context Log Type Definitions
 *
 * @module context
 */

import type { MemoryBus } from '../bus/MemoryBus.js';

/**
 * The one interface every caller of a context log conforms to.
 */
export interface ContextLogView {
    /**
     * Append `input` and return the response derived from it.
     */
    record(input: string): string;

    /**
     * Every input recorded so far, in insertion order.
     */
    history(): readonly string[];
}

/**
 * Pure function producing the response for one recorded input.
 * The returned string must contain `input`.
 */
export type ResponseDeriver = (input: string) => string;

export interface ContextLogOptions {
    deriver?: ResponseDeriver;
    bus?: MemoryBus;
}
