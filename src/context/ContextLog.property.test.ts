/**
 * @file Context Log Property Tests
 *
 * Invariants under test:
 *   1. history() equals the recorded sequence, in order.
 *   2. history().length equals the number of record calls.
 *   3. Recording never alters earlier entries.
 *   4. The response always contains the input.
 *   5. recall(q) is the reversed history filtered to entries containing q.
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { ContextLog } from './ContextLog.js';

// ─── Arbitraries ──────────────────────────────────────────────────────────────

/** Short inputs drawn from a small alphabet so duplicates are common. */
const inputs = fc.array(fc.string({ maxLength: 4 }), { maxLength: 40 });

// ─── Properties ──────────────────────────────────────────────────────────────

describe('ContextLog — property invariants', (): void => {
    it('history equals the recorded sequence', (): void => {
        fc.assert(fc.property(inputs, (xs): boolean => {
            const log = new ContextLog();
            xs.forEach((x: string): void => { log.record(x); });
            const h = log.history();
            return h.length === xs.length && h.every((v: string, i: number): boolean => v === xs[i]);
        }));
    });

    it('each append grows the log by one and keeps the prefix', (): void => {
        fc.assert(fc.property(inputs, fc.string(), (xs, next): boolean => {
            const log = new ContextLog();
            xs.forEach((x: string): void => { log.record(x); });
            const before = log.history();
            log.record(next);
            const after = log.history();
            return after.length === before.length + 1
                && before.every((v: string, i: number): boolean => after[i] === v)
                && after[after.length - 1] === next;
        }));
    });

    it('response always contains the input', (): void => {
        fc.assert(fc.property(fc.string(), (x): boolean => new ContextLog().record(x).includes(x)));
    });

    it('recall is the newest-first filter of history', (): void => {
        fc.assert(fc.property(inputs, fc.string({ maxLength: 2 }), (xs, q): boolean => {
            const log = new ContextLog();
            xs.forEach((x: string): void => { log.record(x); });
            const expected: string[] = [...xs].reverse().filter((x: string): boolean => x.includes(q));
            const got = log.recall(q);
            return got.length === expected.length && got.every((v: string, i: number): boolean => v === expected[i]);
        }));
    });
});
