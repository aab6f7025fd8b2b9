/**
 * @file Context Log Tests
 *
 * @module context
 */

import { describe, it, expect } from 'vitest';
import { ContextLog, response_derive } from './ContextLog.js';
import { MemoryBus } from '../bus/MemoryBus.js';
import type { MemoryEvent } from '../bus/types.js';
import type { ContextLogView } from './types.js';

describe('context/ContextLog', () => {

    it('echoes the input in its response and records it', () => {
        const log = new ContextLog();
        const response = log.record('Hello, Persistent World!');

        expect(response).toBe('processed: Hello, Persistent World!');
        expect(response).toContain('Hello, Persistent World!');
        expect(log.history()).toEqual(['Hello, Persistent World!']);
    });

    it('keeps duplicates in insertion order', () => {
        const log = new ContextLog();
        log.record('a');
        log.record('b');
        log.record('a');

        expect(log.history()).toEqual(['a', 'b', 'a']);
        expect(log.size()).toBe(3);
    });

    it('appends on every call with identical input', () => {
        const log = new ContextLog();
        log.record('x');
        log.record('x');
        expect(log.history()).toEqual(['x', 'x']);
    });

    it('accepts the empty string', () => {
        const log = new ContextLog();
        expect(log.record('')).toBe('processed: ');
        expect(log.history()).toEqual(['']);
    });

    it('starts empty', () => {
        const log = new ContextLog();
        expect(log.history()).toEqual([]);
        expect(log.size()).toBe(0);
        expect(log.generation()).toBe(0);
    });

    it('returns a frozen snapshot that does not track later appends', () => {
        const log = new ContextLog();
        log.record('first');
        const snapshot = log.history();
        log.record('second');

        expect(Object.isFrozen(snapshot)).toBe(true);
        expect(snapshot).toEqual(['first']);
        expect(log.history()).toEqual(['first', 'second']);
    });

    it('keeps separate state per instance', () => {
        const a = new ContextLog();
        const b = new ContextLog();
        a.record('only-a');
        expect(b.history()).toEqual([]);
    });

    it('uses an injected response deriver', () => {
        const log = new ContextLog({ deriver: (input: string): string => `<${input}>` });
        expect(log.record('q')).toBe('<q>');
        expect(log.history()).toEqual(['q']);
    });

    it('reset empties the log and advances the generation', () => {
        const log = new ContextLog();
        log.record('a');
        log.reset();

        expect(log.history()).toEqual([]);
        expect(log.generation()).toBe(1);

        log.record('b');
        expect(log.history()).toEqual(['b']);
    });

    it('emits record and reset events on the bus', () => {
        const bus = new MemoryBus();
        const events: MemoryEvent[] = [];
        bus.subscribe((e: MemoryEvent): void => { events.push(e); });
        const log = new ContextLog({ bus });

        log.record('a');
        log.record('b');
        log.reset();

        expect(events).toEqual([
            { type: 'record', input: 'a', response: 'processed: a', index: 0 },
            { type: 'record', input: 'b', response: 'processed: b', index: 1 },
            { type: 'reset', generation: 1 },
        ]);
    });

    it('recall returns nothing when no entry contains the query', () => {
        const log = new ContextLog();
        log.record('alpha');
        expect(log.recall('zeta')).toEqual([]);
    });

    it('recall returns every containing entry, most recent first', () => {
        const log = new ContextLog();
        for (const text of ['red apple', 'green pear', 'bored', 'red apple']) {
            log.record(text);
        }

        const matches = log.recall('red');
        expect(matches).toEqual(['red apple', 'bored', 'red apple']);
        expect(Object.isFrozen(matches)).toBe(true);
        expect(log.history()).toEqual(['red apple', 'green pear', 'bored', 'red apple']);
    });

    it('recall with an empty query matches every entry, newest first', () => {
        const log = new ContextLog();
        log.record('one');
        log.record('');
        log.record('three');
        expect(log.recall('')).toEqual(['three', '', 'one']);
    });

    it('recall matches case-sensitively', () => {
        const log = new ContextLog();
        log.record('Red');
        expect(log.recall('red')).toEqual([]);
    });

    it('satisfies the ContextLogView interface', () => {
        const view: ContextLogView = new ContextLog();
        expect(view.record('v')).toBe(response_derive('v'));
        expect(view.history()).toEqual(['v']);
    });
});
