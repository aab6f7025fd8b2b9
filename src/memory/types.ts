/**
 * @file Memory Consolidation Types
 *
 * @module memory
 */

import type { MemoryBus } from '../bus/MemoryBus.js';
import type { Fingerprint } from '../integrity/types.js';
import type { IntegrityChecker } from '../integrity/IntegrityChecker.js';

/**
 * A consolidated block of short-term entries.
 *
 * @property sequence - 1-based position in long-term memory
 * @property entries - Entries in the order they were observed
 * @property openedAt - Clock value when the short-term window opened
 * @property consolidatedAt - Clock value at consolidation
 * @property digest - Fingerprint of `JSON.stringify(entries)`
 */
export interface MemoryBatch {
    sequence: number;
    entries: readonly string[];
    openedAt: number;
    consolidatedAt: number;
    digest: Fingerprint;
}

export type Clock = () => number;

export interface ConsolidatorConfig {
    /** Short-term entries that trigger consolidation. */
    capacity: number;
    /** Window age (ms) that triggers consolidation. */
    windowMs: number;
    checker: IntegrityChecker;
    clock?: Clock;
    bus?: MemoryBus;
}
