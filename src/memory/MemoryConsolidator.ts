/**
 * @file Memory Consolidator
 *
 * Short-term buffer that folds into long-term memory once it holds
 * `capacity` entries or its window has been open for `windowMs`.
 * Each consolidated batch carries a fingerprint of its entries so a
 * batch handed back by a caller can be checked for tampering.
 *
 * @module memory
 */

import type { MemoryBus } from '../bus/MemoryBus.js';
import type { IntegrityChecker } from '../integrity/IntegrityChecker.js';
import type { Clock, ConsolidatorConfig, MemoryBatch } from './types.js';

/** Serialized form that batch digests are computed over. */
export function entries_serialize(entries: readonly string[]): string {
    return JSON.stringify(entries);
}

export class MemoryConsolidator {
    private readonly capacity: number;
    private readonly windowMs: number;
    private readonly checker: IntegrityChecker;
    private readonly clock: Clock;
    private readonly bus: MemoryBus | null;

    private shortTerm: string[] = [];
    private readonly longTerm: MemoryBatch[] = [];
    private windowStart: number;

    constructor(config: ConsolidatorConfig) {
        if (!Number.isInteger(config.capacity) || config.capacity < 1) {
            throw new RangeError(`capacity must be a positive integer, got ${config.capacity}`);
        }
        if (!Number.isFinite(config.windowMs) || config.windowMs <= 0) {
            throw new RangeError(`windowMs must be positive, got ${config.windowMs}`);
        }
        this.capacity = config.capacity;
        this.windowMs = config.windowMs;
        this.checker = config.checker;
        this.clock = config.clock ?? Date.now;
        this.bus = config.bus ?? null;
        this.windowStart = this.clock();
    }

    /**
     * Add an entry to short-term memory, consolidating if a threshold is hit.
     *
     * @returns The new batch, or null if nothing was consolidated.
     */
    observe(input: string): MemoryBatch | null {
        this.shortTerm.push(input);
        const now: number = this.clock();
        if (this.shortTerm.length >= this.capacity || now - this.windowStart >= this.windowMs) {
            return this.batch_seal(now);
        }
        return null;
    }

    /**
     * Consolidate whatever short-term memory holds.
     *
     * @returns The new batch, or null when short-term memory is empty.
     */
    consolidate(): MemoryBatch | null {
        if (this.shortTerm.length === 0) return null;
        return this.batch_seal(this.clock());
    }

    /**
     * Recompute a batch digest and compare it with the one it carries.
     */
    batch_verify(batch: MemoryBatch): boolean {
        return this.checker.verify(entries_serialize(batch.entries), batch.digest);
    }

    stm(): readonly string[] {
        return Object.freeze([...this.shortTerm]);
    }

    ltm(): readonly MemoryBatch[] {
        return Object.freeze([...this.longTerm]);
    }

    private batch_seal(now: number): MemoryBatch {
        const entries: readonly string[] = Object.freeze([...this.shortTerm]);
        const batch: MemoryBatch = Object.freeze({
            sequence: this.longTerm.length + 1,
            entries,
            openedAt: this.windowStart,
            consolidatedAt: now,
            digest: this.checker.fingerprint(entries_serialize(entries)),
        });
        this.longTerm.push(batch);
        this.shortTerm = [];
        this.windowStart = now;
        this.bus?.emit({ type: 'consolidate', sequence: batch.sequence, size: entries.length, digest: batch.digest });
        return batch;
    }
}
