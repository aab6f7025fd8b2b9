/**
 * @file CLI Runtime
 *
 * Process-independent pieces of the command-line front end: one-shot
 * dispatch, REPL line handling, config loading and verbose event lines.
 * The entry script wires these to process.argv, stdin and stdout.
 *
 * @module cli/run
 */

import fs from 'fs';
import type { ChalkInstance } from 'chalk';
import { argv_parse, line_parse } from '../dispatch/argv.js';
import type { ArgvParseResult } from '../dispatch/argv.js';
import type { Dispatcher } from '../dispatch/Dispatcher.js';
import { Presenter } from '../dispatch/Presenter.js';
import type { DispatchResponse } from '../dispatch/types.js';
import type { MemoryEvent } from '../bus/types.js';
import type { SettingsService, OverridesLoadResult } from '../config/settings.js';

/** Words that leave the REPL. */
export const EXIT_WORDS: readonly string[] = ['quit', 'exit', 'q'];

export type LineWriter = (line: string) => void;

/**
 * Parse argv words, dispatch once, and write the rendered response.
 *
 * @returns Process exit code
 */
export function oneShot_run(argv: readonly string[], dispatcher: Dispatcher, write: LineWriter, ink?: ChalkInstance): number {
    return parsed_run(argv_parse(argv), dispatcher, write, ink);
}

function parsed_run(parsed: ArgvParseResult, dispatcher: Dispatcher, write: LineWriter, ink?: ChalkInstance): number {
    const response: DispatchResponse = parsed.ok
        ? dispatcher.request_execute(parsed.request)
        : { success: false, message: Presenter.error_format(parsed.error) };
    write(Presenter.response_render(response, ink));
    return response.success ? 0 : 1;
}

/**
 * Handle one REPL line.
 *
 * Only the leading verb is split off; the operand text reaches the
 * dispatcher exactly as typed.
 *
 * @returns 'exit' when the line asks to leave, otherwise 'continue'
 */
export function replLine_handle(line: string, dispatcher: Dispatcher, write: LineWriter, ink?: ChalkInstance): 'exit' | 'continue' {
    const trimmed: string = line.trim();
    if (trimmed.length === 0) return 'continue';
    if (EXIT_WORDS.includes(trimmed)) return 'exit';
    parsed_run(line_parse(line), dispatcher, write, ink);
    return 'continue';
}

/**
 * Describe a bus event as a tagged log line.
 */
export function event_describe(event: MemoryEvent): string {
    switch (event.type) {
        case 'record':
            return `[MEMLOOP] record #${event.index} (${event.input.length} chars)`;
        case 'reset':
            return `[MEMLOOP] reset -> generation ${event.generation}`;
        case 'consolidate':
            return `[MEMLOOP] consolidate batch #${event.sequence} (${event.size} entries) ${event.digest.slice(0, 12)}`;
    }
}

/**
 * Apply YAML overrides from `configPath` for `user`.
 *
 * A missing file is not an error; no overrides are applied.
 */
export function config_load(settings: SettingsService, user: string, configPath: string): OverridesLoadResult {
    if (!fs.existsSync(configPath)) {
        return { ok: true, applied: [] };
    }
    const content: string = fs.readFileSync(configPath, 'utf-8');
    return settings.overrides_load(user, content);
}
