/**
 * @file Session Registry
 *
 * Per-user context logs held in memory. Each user key maps to its own
 * ContextLog, created on first record. Nothing is persisted.
 *
 * @module session
 */

import { ContextLog } from '../context/ContextLog.js';
import type { ContextLogOptions } from '../context/types.js';

/** Key used when a caller supplies a blank user id. */
export const ANONYMOUS_USER = 'anonymous' as const;

/**
 * Normalize a user id into a registry key.
 */
export function userKey_normalize(userId: string): string {
    const normalized: string = userId.trim().toLowerCase();
    return normalized || ANONYMOUS_USER;
}

export class SessionRegistry {
    private readonly byUser: Map<string, ContextLog> = new Map();

    /**
     * @param logOptions - Passed to every ContextLog the registry creates.
     */
    constructor(private readonly logOptions: ContextLogOptions = {}) {}

    /**
     * Append a message to a user's session, creating it if needed.
     *
     * @returns The derived response.
     */
    public session_record(userId: string, message: string): string {
        const key: string = userKey_normalize(userId);
        let log: ContextLog | undefined = this.byUser.get(key);
        if (!log) {
            log = new ContextLog(this.logOptions);
            this.byUser.set(key, log);
        }
        return log.record(message);
    }

    /**
     * History of a user's session; empty for unknown users.
     */
    public session_history(userId: string): readonly string[] {
        const log: ContextLog | undefined = this.byUser.get(userKey_normalize(userId));
        return log ? log.history() : Object.freeze([]);
    }

    /**
     * Entries of a user's session containing `query`, most recent first.
     */
    public session_recall(userId: string, query: string): readonly string[] {
        const log: ContextLog | undefined = this.byUser.get(userKey_normalize(userId));
        return log ? log.recall(query) : Object.freeze([]);
    }

    /**
     * User keys in creation order.
     */
    public sessions_list(): string[] {
        return [...this.byUser.keys()];
    }

    /**
     * Drop a user's session.
     *
     * @returns Whether a session existed.
     */
    public session_drop(userId: string): boolean {
        return this.byUser.delete(userKey_normalize(userId));
    }
}
