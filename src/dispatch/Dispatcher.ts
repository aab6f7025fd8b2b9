/**
 * @file Dispatcher
 *
 * Single entry point for external callers (CLI, REPL, tests). Validates
 * a request, runs it against the configured user's session, an integrity
 * checker and a consolidator, and returns a DispatchResponse. Caller errors come
 * back as unsuccessful responses; the dispatcher never exits the process.
 *
 * @module dispatch/Dispatcher
 */

import { SessionRegistry, userKey_normalize } from '../session/SessionRegistry.js';
import { IntegrityChecker } from '../integrity/IntegrityChecker.js';
import { EncodingError } from '../integrity/errors.js';
import { MemoryConsolidator } from '../memory/MemoryConsolidator.js';
import type { MemoryBatch, Clock } from '../memory/types.js';
import { MemoryBus } from '../bus/MemoryBus.js';
import { SettingsService } from '../config/settings.js';
import type { ResolvedUserSettings } from '../config/settings.js';
import { DispatchRequestSchema } from './schemas.js';
import type { DispatchRequest } from './schemas.js';
import { USAGE } from './argv.js';
import { Presenter } from './Presenter.js';
import type { DispatchResponse } from './types.js';

/**
 * Collaborators a dispatcher runs requests against.
 */
export interface DispatcherServiceBag {
    sessions: SessionRegistry;
    /** Normalized key of the session record, history and recall act on. */
    user: string;
    checker: IntegrityChecker;
    consolidator: MemoryConsolidator;
    bus: MemoryBus;
}

export interface DispatcherConfig {
    settingsService?: SettingsService;
    user?: string;
    bus?: MemoryBus;
    clock?: Clock;
}

/**
 * Assemble a service bag from settings.
 */
export function dispatcher_assemble(config: DispatcherConfig = {}): DispatcherServiceBag {
    const bus: MemoryBus = config.bus ?? new MemoryBus();
    const settingsService: SettingsService = config.settingsService ?? SettingsService.instance_get();
    const user: string = userKey_normalize(config.user ?? '');
    const settings: ResolvedUserSettings = settingsService.snapshot(user);
    const checker = new IntegrityChecker();
    return {
        sessions: new SessionRegistry({ bus }),
        user,
        checker,
        consolidator: new MemoryConsolidator({
            capacity: settings.stm_capacity,
            windowMs: settings.stm_windowMs,
            checker,
            clock: config.clock,
            bus,
        }),
        bus,
    };
}

export class Dispatcher {
    constructor(private readonly services: DispatcherServiceBag) {}

    static create(config: DispatcherConfig = {}): Dispatcher {
        return new Dispatcher(dispatcher_assemble(config));
    }

    get bus(): MemoryBus {
        return this.services.bus;
    }

    /**
     * Validate and execute one request.
     *
     * @param raw - Untrusted request object
     */
    request_execute(raw: unknown): DispatchResponse {
        const parsed = DispatchRequestSchema.safeParse(raw);
        if (!parsed.success) {
            const detail: string = parsed.error.issues
                .map((issue): string => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
                .join('; ');
            return { success: false, message: Presenter.error_format(`invalid request: ${detail}`) };
        }

        try {
            return this.request_run(parsed.data);
        } catch (e: unknown) {
            if (e instanceof EncodingError) {
                return { success: false, message: Presenter.error_format(e.message) };
            }
            throw e;
        }
    }

    private request_run(request: DispatchRequest): DispatchResponse {
        const { sessions, user, checker, consolidator } = this.services;

        switch (request.op) {
            case 'record': {
                const response: string = sessions.session_record(user, request.text);
                const batch: MemoryBatch | null = consolidator.observe(request.text);
                const history: readonly string[] = sessions.session_history(user);
                const lines: string[] = [Presenter.success_format(response)];
                if (batch) {
                    lines.push(Presenter.info_format(this.batch_describe(batch)));
                }
                lines.push(Presenter.history_format(history));
                return {
                    success: true,
                    message: lines.join('\n'),
                    data: { op: 'record', response, history, batch },
                };
            }
            case 'history': {
                const history: readonly string[] = sessions.session_history(user);
                return {
                    success: true,
                    message: Presenter.history_format(history),
                    data: { op: 'history', history },
                };
            }
            case 'recall': {
                const matches: readonly string[] = sessions.session_recall(user, request.query);
                return {
                    success: true,
                    message: Presenter.recall_format(request.query, matches),
                    data: { op: 'recall', query: request.query, matches },
                };
            }
            case 'fingerprint': {
                const fingerprint: string = checker.fingerprint(request.text);
                return {
                    success: true,
                    message: Presenter.success_format(fingerprint),
                    data: { op: 'fingerprint', fingerprint },
                };
            }
            case 'verify': {
                const valid: boolean = checker.verify(request.text, request.signature);
                return {
                    success: valid,
                    message: valid
                        ? Presenter.success_format('fingerprint verified')
                        : Presenter.warning_format('fingerprint mismatch'),
                    data: { op: 'verify', valid },
                };
            }
            case 'consolidate': {
                const batch: MemoryBatch | null = consolidator.consolidate();
                return {
                    success: true,
                    message: batch
                        ? Presenter.success_format(this.batch_describe(batch))
                        : Presenter.info_format('short-term memory is empty'),
                    data: { op: 'consolidate', batch },
                };
            }
            case 'help':
                return { success: true, message: USAGE, data: { op: 'help' } };
        }
    }

    private batch_describe(batch: MemoryBatch): string {
        return `consolidated batch #${batch.sequence} (${batch.entries.length} entries) ${batch.digest}`;
    }
}
