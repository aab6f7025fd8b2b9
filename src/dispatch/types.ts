/**
 * @file Dispatch Types
 *
 * @module dispatch
 */

import type { MemoryBatch } from '../memory/types.js';

export type DispatchData =
    | { op: 'record'; response: string; history: readonly string[]; batch: MemoryBatch | null }
    | { op: 'history'; history: readonly string[] }
    | { op: 'recall'; query: string; matches: readonly string[] }
    | { op: 'fingerprint'; fingerprint: string }
    | { op: 'verify'; valid: boolean }
    | { op: 'consolidate'; batch: MemoryBatch | null }
    | { op: 'help' };

/**
 * Result of one dispatched request. `message` is plain text with
 * Presenter markers; `data` is absent when the request failed.
 */
export interface DispatchResponse {
    success: boolean;
    message: string;
    data?: DispatchData;
}
