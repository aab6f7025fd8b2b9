/**
 * @file Memory Bus Types
 *
 * Events emitted by the context log and the consolidator.
 *
 * @module bus
 */

export type MemoryEvent =
    | { type: 'record'; input: string; response: string; index: number }
    | { type: 'reset'; generation: number }
    | { type: 'consolidate'; sequence: number; size: number; digest: string };

export type MemoryObserver = (event: MemoryEvent) => void;
