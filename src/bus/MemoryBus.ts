/**
 * @file Memory Bus
 *
 * Typed facade over Node.js EventEmitter for observing log appends,
 * resets and consolidations. The CLI subscribes to it for verbose
 * output; library callers may subscribe for their own logging.
 *
 * @module bus
 */

import { EventEmitter } from 'events';
import type { MemoryEvent, MemoryObserver } from './types.js';

/** Internal event channel. */
const CHANNEL = 'memory' as const;

/**
 * Emits MemoryEvents to any number of observers.
 */
export class MemoryBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to memory events.
     *
     * @param observer - Callback for each event.
     * @returns Unsubscribe function.
     */
    subscribe(observer: MemoryObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    emit(event: MemoryEvent): void {
        this.emitter.emit(CHANNEL, event);
    }

    observerCount(): number {
        return this.emitter.listenerCount(CHANNEL);
    }
}
